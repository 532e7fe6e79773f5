import type { AudioFormat } from '../config';
import type { VoiceBackend } from '../voices/voiceRegistry';

export interface EngineRequest {
  text: string;
  /** The engine's own voice identifier (VoiceProfile.nativeVoiceKey). */
  voiceKey: string;
  format: AudioFormat;
  language?: string;
  /** Aborted when the caller disconnects. */
  signal?: AbortSignal;
}

export interface EngineAudio {
  audio: Buffer;
  format: AudioFormat;
  contentType: string;
}

/**
 * Uniform synthesis capability over one external TTS backend.
 * Adapters return bytes only; persisting them is the artifact store's job.
 */
export interface TtsEngineAdapter {
  readonly backend: VoiceBackend;
  readonly name: string;
  supports(format: AudioFormat): boolean;
  /** Fails with EngineError (EngineUnavailable, EngineTimeout, EngineRejected) or CancelledError. */
  synthesize(request: EngineRequest): Promise<EngineAudio>;
  /** Cheap liveness check (no synthesis). Resolves when up, rejects otherwise. */
  probe(signal: AbortSignal): Promise<void>;
}

export type EngineAdapters = Record<VoiceBackend, TtsEngineAdapter>;
