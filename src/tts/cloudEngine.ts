import type { AudioFormat, CloudTtsConfig } from '../config';
import { CONTENT_TYPES } from '../audio/audioInfo';
import { DeadlineExceededError, withDeadline } from '../deadline';
import { CancelledError, EngineError, describeError } from '../errors';
import { log } from '../log';
import { withRetry } from '../retry';
import type { EngineAudio, EngineRequest, TtsEngineAdapter } from './types';

export interface CloudEngineOptions extends CloudTtsConfig {
  /** Swappable for tests; defaults to the global fetch. */
  fetchImpl?: typeof fetch;
}

const ENGINE_NAME = 'cloud_tts';

/**
 * A failure worth one more attempt: the request never got an answer
 * (connection refused/reset, DNS) or the provider answered 5xx.
 * Timeouts are not retried so the per-request deadline holds.
 */
export function isRetryableCloudFailure(err: unknown): boolean {
  if (err instanceof CancelledError || err instanceof DeadlineExceededError) return false;
  if (err instanceof EngineError) {
    return err.code === 'EngineUnavailable' && err.status !== undefined && err.status >= 500;
  }
  return true;
}

/**
 * HTTP client for the cloud TTS provider: POST text + voice key + format,
 * receive audio bytes.
 */
export class CloudEngineAdapter implements TtsEngineAdapter {
  readonly backend = 'cloud' as const;
  readonly name = ENGINE_NAME;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: CloudEngineOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  supports(format: AudioFormat): boolean {
    return format === 'wav' || format === 'mp3';
  }

  async synthesize(request: EngineRequest): Promise<EngineAudio> {
    const url = this.options.url;
    if (!url) {
      throw new EngineError('EngineUnavailable', ENGINE_NAME, 'cloud tts: CLOUD_TTS_URL is not configured');
    }

    log.info(
      {
        event: 'tts_request',
        provider: ENGINE_NAME,
        voice: request.voiceKey,
        language: request.language ?? null,
        format: request.format,
        text_length: request.text.length,
      },
      'cloud tts request',
    );

    try {
      return await withRetry(
        () =>
          withDeadline((signal) => this.requestOnce(url, request, signal), {
            label: ENGINE_NAME,
            timeoutMs: this.options.timeoutMs,
            signal: request.signal,
          }),
        {
          label: ENGINE_NAME,
          retries: this.options.retries,
          baseDelayMs: this.options.retryBackoffMs,
          shouldRetry: isRetryableCloudFailure,
          signal: request.signal,
        },
      );
    } catch (err) {
      throw classifyCloudFailure(err);
    }
  }

  async probe(signal: AbortSignal): Promise<void> {
    const healthUrl = this.options.healthUrl;
    if (!healthUrl) {
      throw new Error('cloud tts is not configured');
    }
    const res = await this.fetchImpl(healthUrl, { method: 'GET', signal });
    if (!res.ok) {
      throw new Error(`cloud tts health ${res.status}`);
    }
  }

  private async requestOnce(url: string, request: EngineRequest, signal: AbortSignal): Promise<EngineAudio> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: `${CONTENT_TYPES[request.format]}, application/json;q=0.5`,
    };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    const res = await this.fetchImpl(url, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        text: request.text,
        voice: request.voiceKey,
        language: request.language,
        format: request.format,
      }),
      signal,
    });

    const contentType = res.headers.get('content-type') ?? '';
    const raw = Buffer.from(await res.arrayBuffer());

    if (!res.ok) {
      const body = raw.toString('utf8').slice(0, 500);
      log.error({ status: res.status, body }, 'cloud tts error');
      const code = res.status >= 400 && res.status < 500 && res.status !== 408 && res.status !== 429 ? 'EngineRejected' : 'EngineUnavailable';
      throw new EngineError(code, ENGINE_NAME, `cloud tts error ${res.status}: ${errorMessageFrom(raw)}`, {
        status: res.status,
      });
    }

    if (contentType.includes('application/json')) {
      const errMsg = errorMessageFrom(raw);
      log.error({ body: errMsg }, 'cloud tts returned JSON instead of audio');
      throw new EngineError('EngineUnavailable', ENGINE_NAME, `cloud tts: ${errMsg}`);
    }

    if (raw.length === 0) {
      throw new EngineError('EngineUnavailable', ENGINE_NAME, 'cloud tts returned an empty body');
    }

    return {
      audio: raw,
      format: request.format,
      contentType: contentType || CONTENT_TYPES[request.format],
    };
  }
}

function errorMessageFrom(raw: Buffer): string {
  const text = raw.toString('utf8');
  try {
    const json: unknown = JSON.parse(text);
    if (typeof json === 'object' && json !== null) {
      const candidate = ['error', 'detail', 'message']
        .map((key) => Object.getOwnPropertyDescriptor(json, key)?.value)
        .find((value) => value !== undefined && value !== null);
      if (typeof candidate === 'string') return candidate;
    }
    return text.slice(0, 200);
  } catch {
    return text.slice(0, 200);
  }
}

export function classifyCloudFailure(err: unknown): Error {
  if (err instanceof EngineError || err instanceof CancelledError) {
    return err;
  }
  if (err instanceof DeadlineExceededError) {
    return new EngineError('EngineTimeout', ENGINE_NAME, err.message, { cause: err });
  }
  return new EngineError('EngineUnavailable', ENGINE_NAME, `cloud tts unreachable: ${describeError(err)}`, {
    cause: err,
  });
}
