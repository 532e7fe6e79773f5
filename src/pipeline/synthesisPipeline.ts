/**
 * Per-request synthesis state machine:
 *
 *   Received → Validated → VoiceResolved → Synthesizing → Persisted → Completed
 *
 * Any non-terminal state may move to Failed. Every failure leaves as a
 * {@link PipelineError} tagged with the stage it happened in; lower-layer
 * errors ride along as `cause`. There is no retry here, only the bounded
 * retry inside the cloud adapter.
 */
import type { AppConfig, AudioFormat } from '../config';
import { readAudioInfo, type AudioInfo } from '../audio/audioInfo';
import {
  CancelledError,
  EngineError,
  PipelineError,
  StorageError,
  VoiceNotFoundError,
  describeError,
  errorKindOf,
  type PipelineStage,
  type ValidationIssue,
} from '../errors';
import { log } from '../log';
import { incrementCounter, recordEngineCall, recordSynthesisOutcome, setGauge } from '../monitoring/metrics';
import { sleep } from '../retry';
import type { ArtifactStore, AudioArtifact } from '../storage/artifactStore';
import { findControlCharacter, normalizeTtsText, textLength } from '../text/normalizeText';
import type { EngineAdapters } from '../tts/types';
import type { VoiceProfile, VoiceRegistry } from '../voices/voiceRegistry';

export type PipelineState =
  | 'Received'
  | 'Validated'
  | 'VoiceResolved'
  | 'Synthesizing'
  | 'Persisted'
  | 'Completed'
  | 'Failed';

export interface SynthesisRequest {
  text: string;
  voiceId?: string;
  language?: string;
  /** Defaults to wav. */
  format?: string;
}

export interface RunOptions {
  /** Aborted when the caller disconnects; the engine call is cancelled. */
  signal?: AbortSignal;
  requestId?: string;
}

export interface SynthesisResult {
  artifact: AudioArtifact;
  voice: VoiceProfile;
  /** Length of the submitted text in code points. */
  textLength: number;
  processingMs: number;
  states: PipelineState[];
}

export type PipelineConfig = Pick<AppConfig, 'maxTextLength' | 'supportedFormats' | 'defaultLanguage'>;

export interface SynthesisPipelineDeps {
  config: PipelineConfig;
  registry: VoiceRegistry;
  engines: EngineAdapters;
  store: ArtifactStore;
}

interface ValidatedRequest {
  text: string;
  format: AudioFormat;
  textLength: number;
}

const DEFAULT_FORMAT: AudioFormat = 'wav';

export class SynthesisPipeline {
  private readonly config: PipelineConfig;
  private readonly registry: VoiceRegistry;
  private readonly engines: EngineAdapters;
  private readonly store: ArtifactStore;
  private inflight = 0;

  constructor(deps: SynthesisPipelineDeps) {
    this.config = deps.config;
    this.registry = deps.registry;
    this.engines = deps.engines;
    this.store = deps.store;
  }

  get inflightCount(): number {
    return this.inflight;
  }

  /** Resolves with the number of runs still in flight once none remain or `timeoutMs` has passed. */
  async waitForIdle(timeoutMs: number, pollMs = 500): Promise<number> {
    const deadline = Date.now() + timeoutMs;
    while (this.inflight > 0 && Date.now() < deadline) {
      log.info({ active_syntheses: this.inflight }, 'waiting for syntheses to drain');
      await sleep(Math.min(pollMs, Math.max(deadline - Date.now(), 0)));
    }
    return this.inflight;
  }

  async run(request: SynthesisRequest, options: RunOptions = {}): Promise<SynthesisResult> {
    const startedAt = Date.now();
    const states: PipelineState[] = [];
    const runLog = log.child({ request_id: options.requestId });
    const enter = (state: PipelineState): void => {
      states.push(state);
      runLog.debug({ event: 'tts_state', state }, `synthesis ${state}`);
    };

    this.inflight += 1;
    setGauge('tts_inflight_syntheses', this.inflight);
    enter('Received');

    try {
      const valid = this.validate(request);
      enter('Validated');

      const voice = this.resolveVoice(request);
      enter('VoiceResolved');

      enter('Synthesizing');
      const { audio, info } = await this.synthesize(valid, voice, options.signal);

      if (options.signal?.aborted) {
        runLog.info({ event: 'tts_result_discarded', voice_id: voice.id }, 'caller went away, audio discarded');
        throw new PipelineError('RequestCancelled', 'synthesis', 'request cancelled by caller', {
          cause: new CancelledError(),
        });
      }

      const artifact = await this.persist(audio, valid.format, info);
      enter('Persisted');
      incrementCounter('tts_artifact_bytes_total', artifact.sizeBytes);

      enter('Completed');
      const processingMs = Date.now() - startedAt;
      recordSynthesisOutcome('success');
      runLog.info(
        {
          event: 'tts_synthesis',
          artifact_id: artifact.artifactId,
          voice_id: voice.id,
          backend: voice.backend,
          format: artifact.format,
          text_length: valid.textLength,
          size_bytes: artifact.sizeBytes,
          processing_ms: processingMs,
        },
        'synthesis completed',
      );

      return { artifact, voice, textLength: valid.textLength, processingMs, states };
    } catch (err) {
      states.push('Failed');
      const failure = err instanceof PipelineError ? err : new PipelineError('SynthesisFailed', 'synthesis', describeError(err), { cause: err });
      const kind = errorKindOf(failure);
      recordSynthesisOutcome(kind);

      const clientSide = failure.kind === 'ValidationError' || failure.kind === 'VoiceNotFound' || failure.kind === 'RequestCancelled';
      runLog[clientSide ? 'warn' : 'error'](
        {
          event: 'tts_synthesis_error',
          stage: failure.stage,
          kind,
          err: failure.cause ?? failure,
          processing_ms: Date.now() - startedAt,
        },
        failure.message,
      );
      throw failure;
    } finally {
      this.inflight -= 1;
      setGauge('tts_inflight_syntheses', this.inflight);
    }
  }

  private validate(request: SynthesisRequest): ValidatedRequest {
    const issues: ValidationIssue[] = [];
    const trimmed = request.text.trim();
    const length = textLength(trimmed);

    if (length === 0) {
      issues.push({ path: 'text', message: 'text must not be empty' });
    } else if (length > this.config.maxTextLength) {
      issues.push({ path: 'text', message: `text exceeds ${this.config.maxTextLength} characters (got ${length})` });
    }

    const control = findControlCharacter(request.text);
    if (control) {
      const hex = control.codePoint.toString(16).toUpperCase().padStart(4, '0');
      issues.push({ path: 'text', message: `text contains control character U+${hex} at index ${control.index}` });
    }

    const requested = (request.format ?? DEFAULT_FORMAT).toLowerCase();
    const format = this.config.supportedFormats.find((candidate) => candidate === requested);
    if (!format) {
      issues.push({
        path: 'format',
        message: `unsupported format "${requested}"; expected one of ${this.config.supportedFormats.join(', ')}`,
      });
    }

    const text = normalizeTtsText(trimmed);
    if (length > 0 && text.length === 0) {
      issues.push({ path: 'text', message: 'text has no speakable characters' });
    }

    if (issues.length > 0 || !format) {
      throw new PipelineError('ValidationError', 'validation', issues.map((issue) => issue.message).join('; '), {
        issues,
      });
    }
    return { text, format, textLength: length };
  }

  private resolveVoice(request: SynthesisRequest): VoiceProfile {
    if (request.voiceId !== undefined) {
      try {
        return this.registry.resolve(request.voiceId);
      } catch (err) {
        if (err instanceof VoiceNotFoundError) {
          throw new PipelineError('VoiceNotFound', 'voice_resolution', err.message, { cause: err });
        }
        throw err;
      }
    }

    const language = request.language ?? this.config.defaultLanguage;
    const voice = this.registry.defaultFor(language);
    if (!voice) {
      throw new PipelineError('VoiceNotFound', 'voice_resolution', `no voice registered for language: ${language}`);
    }
    return voice;
  }

  private async synthesize(
    request: ValidatedRequest,
    voice: VoiceProfile,
    signal?: AbortSignal,
  ): Promise<{ audio: Buffer; info: AudioInfo }> {
    const engine = this.engines[voice.backend];
    const stage: PipelineStage = 'synthesis';

    if (!engine.supports(request.format)) {
      const engineErr = new EngineError('EngineRejected', engine.name, `${engine.name} cannot produce ${request.format} audio`);
      throw new PipelineError('SynthesisFailed', stage, engineErr.message, { cause: engineErr });
    }

    const startedAt = Date.now();

    let audio: Buffer;
    try {
      const result = await engine.synthesize({
        text: request.text,
        voiceKey: voice.nativeVoiceKey,
        format: request.format,
        language: voice.language,
        signal,
      });
      audio = result.audio;
    } catch (err) {
      if (err instanceof CancelledError) {
        throw new PipelineError('RequestCancelled', stage, err.message, { cause: err });
      }
      const engineErr =
        err instanceof EngineError
          ? err
          : new EngineError('EngineUnavailable', engine.name, `${engine.name} failed: ${describeError(err)}`, { cause: err });
      throw new PipelineError('SynthesisFailed', stage, engineErr.message, { cause: engineErr });
    } finally {
      recordEngineCall(voice.backend, Date.now() - startedAt);
    }

    try {
      return { audio, info: readAudioInfo(audio, request.format) };
    } catch (err) {
      const engineErr = new EngineError(
        'EngineUnavailable',
        engine.name,
        `${engine.name} returned unreadable ${request.format} audio: ${describeError(err)}`,
        { cause: err },
      );
      throw new PipelineError('SynthesisFailed', stage, engineErr.message, { cause: engineErr });
    }
  }

  private async persist(audio: Buffer, format: AudioFormat, info: AudioInfo): Promise<AudioArtifact> {
    try {
      return await this.store.persist(audio, format, info);
    } catch (err) {
      const storageErr =
        err instanceof StorageError ? err : new StorageError('WriteError', describeError(err), { cause: err });
      throw new PipelineError('PersistenceFailed', 'persistence', `could not store audio: ${storageErr.message}`, {
        cause: storageErr,
      });
    }
  }
}
