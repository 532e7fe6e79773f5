import './testEnv';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadConfig, type AppConfig, type AudioFormat } from '../src/config';
import { CONTENT_TYPES } from '../src/audio/audioInfo';
import { CancelledError } from '../src/errors';
import { sleep } from '../src/retry';
import type { EngineAudio, EngineRequest, TtsEngineAdapter } from '../src/tts/types';
import { VoiceRegistry, type VoiceBackend } from '../src/voices/voiceRegistry';

export const SEED_VOICES_FILE = path.join(__dirname, '..', 'data', 'voices.json');

/** 16-bit PCM WAV with a canonical 44-byte header and silent samples. */
export function buildWav(options: { sampleRate?: number; samples?: number; channels?: number } = {}): Buffer {
  const sampleRate = options.sampleRate ?? 22050;
  const samples = options.samples ?? 2205;
  const channels = options.channels ?? 1;
  const blockAlign = channels * 2;
  const dataBytes = samples * blockAlign;

  const buf = Buffer.alloc(44 + dataBytes);
  buf.write('RIFF', 0, 'ascii');
  buf.writeUInt32LE(36 + dataBytes, 4);
  buf.write('WAVE', 8, 'ascii');
  buf.write('fmt ', 12, 'ascii');
  buf.writeUInt32LE(16, 16);
  buf.writeUInt16LE(1, 20);
  buf.writeUInt16LE(channels, 22);
  buf.writeUInt32LE(sampleRate, 24);
  buf.writeUInt32LE(sampleRate * blockAlign, 28);
  buf.writeUInt16LE(blockAlign, 32);
  buf.writeUInt16LE(16, 34);
  buf.write('data', 36, 'ascii');
  buf.writeUInt32LE(dataBytes, 40);
  return buf;
}

/** MPEG-1 layer III, 128 kbps, 44.1 kHz, mono: a frame header followed by padding. */
export function buildMp3(totalBytes = 16000): Buffer {
  const buf = Buffer.alloc(totalBytes);
  buf[0] = 0xff;
  buf[1] = 0xfb;
  buf[2] = 0x90;
  buf[3] = 0xc4;
  return buf;
}

export function audioFor(format: AudioFormat): Buffer {
  return format === 'wav' ? buildWav() : buildMp3();
}

export async function makeTempDir(prefix = 'tts-gateway-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function testConfig(outputDir: string, env: Record<string, string> = {}): AppConfig {
  return loadConfig({ OUTPUT_DIR: outputDir, VOICES_FILE: SEED_VOICES_FILE, LOG_LEVEL: 'silent', ...env });
}

export function seedRegistry(): VoiceRegistry {
  return VoiceRegistry.fromFile(SEED_VOICES_FILE);
}

export interface FakeEngineOptions {
  name?: string;
  formats?: AudioFormat[];
  /** Bytes to return; defaults to a valid file of the requested format. */
  audio?: (request: EngineRequest) => Buffer;
  delayMs?: number;
  /** Called per invocation (1-based); a returned error is thrown. */
  failOn?: (call: number) => Error | undefined;
  probeError?: Error;
  probeDelayMs?: number;
}

/** In-memory engine that records every call. */
export class FakeEngine implements TtsEngineAdapter {
  readonly backend: VoiceBackend;
  readonly name: string;
  readonly calls: EngineRequest[] = [];
  probes = 0;

  constructor(
    backend: VoiceBackend,
    private readonly options: FakeEngineOptions = {},
  ) {
    this.backend = backend;
    this.name = options.name ?? `fake_${backend}`;
  }

  get invocations(): number {
    return this.calls.length;
  }

  supports(format: AudioFormat): boolean {
    const formats: AudioFormat[] = this.options.formats ?? ['wav', 'mp3'];
    return formats.includes(format);
  }

  async synthesize(request: EngineRequest): Promise<EngineAudio> {
    this.calls.push(request);
    if (this.options.delayMs) {
      await sleep(this.options.delayMs, request.signal);
    }
    if (request.signal?.aborted) {
      throw new CancelledError();
    }
    const failure = this.options.failOn?.(this.calls.length);
    if (failure) throw failure;

    const audio = this.options.audio ? this.options.audio(request) : audioFor(request.format);
    return { audio, format: request.format, contentType: CONTENT_TYPES[request.format] };
  }

  async probe(signal: AbortSignal): Promise<void> {
    this.probes += 1;
    if (this.options.probeDelayMs) {
      await sleep(this.options.probeDelayMs, signal);
    }
    if (this.options.probeError) throw this.options.probeError;
  }
}

export function fakeEngines(options: { cloud?: FakeEngineOptions; local?: FakeEngineOptions } = {}): {
  cloud: FakeEngine;
  local: FakeEngine;
} {
  return {
    cloud: new FakeEngine('cloud', options.cloud),
    local: new FakeEngine('local', options.local),
  };
}

/** A `fetch` double that answers from a queue of handlers, one per call. */
export function scriptedFetch(
  handlers: Array<(url: string, init: RequestInit | undefined) => Promise<Response> | Response>,
): { fetchImpl: typeof fetch; calls: Array<{ url: string; init: RequestInit | undefined }> } {
  const calls: Array<{ url: string; init: RequestInit | undefined }> = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    calls.push({ url, init });
    const handler = handlers[Math.min(calls.length - 1, handlers.length - 1)];
    if (!handler) throw new Error('scriptedFetch: no handlers');
    return handler(url, init);
  };
  return { fetchImpl, calls };
}

/** Resolves after `ms`, or rejects with the signal's reason once it aborts. */
export function waitOrAbort(ms: number, signal: AbortSignal | null | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true },
    );
  });
}

export function networkError(message = 'fetch failed'): TypeError {
  return new TypeError(message, { cause: Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9'), { code: 'ECONNREFUSED' }) });
}
