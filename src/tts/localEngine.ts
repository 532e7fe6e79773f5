import { spawn } from 'child_process';
import type { AudioFormat, LocalTtsConfig } from '../config';
import { CONTENT_TYPES } from '../audio/audioInfo';
import { DeadlineExceededError, withDeadline } from '../deadline';
import { CancelledError, EngineError, describeError } from '../errors';
import { log } from '../log';
import type { EngineAudio, EngineRequest, TtsEngineAdapter } from './types';

const ENGINE_NAME = 'local_tts';
const STDERR_LIMIT = 4096;
const UNKNOWN_VOICE = /voice.*(not found|unknown|does not exist|failed to read)|(unknown|invalid) (voice|language)/i;

interface ProcessResult {
  stdout: Buffer;
  stderr: string;
}

/** Substitute `{voice}` and `{rate}` in each argument; text never goes on argv. */
export function buildLocalArgs(template: readonly string[], voiceKey: string, rate: number): string[] {
  return template.map((arg) => arg.replaceAll('{voice}', voiceKey).replaceAll('{rate}', String(rate)));
}

/**
 * Runs a locally installed speech engine (espeak-ng by default) as a child
 * process: text on stdin, WAV on stdout. The process is killed when the
 * deadline passes or the caller goes away.
 */
export class LocalEngineAdapter implements TtsEngineAdapter {
  readonly backend = 'local' as const;
  readonly name = ENGINE_NAME;

  constructor(private readonly options: LocalTtsConfig) {}

  supports(format: AudioFormat): boolean {
    return format === 'wav';
  }

  async synthesize(request: EngineRequest): Promise<EngineAudio> {
    const args = buildLocalArgs(this.options.args, request.voiceKey, this.options.rate);
    log.info(
      {
        event: 'tts_request',
        provider: ENGINE_NAME,
        command: this.options.command,
        voice: request.voiceKey,
        text_length: request.text.length,
      },
      'local tts request',
    );

    let result: ProcessResult;
    try {
      result = await withDeadline((signal) => this.run(args, request.text, signal), {
        label: ENGINE_NAME,
        timeoutMs: this.options.timeoutMs,
        signal: request.signal,
      });
    } catch (err) {
      throw classifyLocalFailure(err);
    }

    if (result.stdout.length === 0) {
      throw new EngineError('EngineUnavailable', ENGINE_NAME, 'local tts produced no audio');
    }

    return {
      audio: result.stdout,
      format: 'wav',
      contentType: CONTENT_TYPES.wav,
    };
  }

  async probe(signal: AbortSignal): Promise<void> {
    try {
      await this.run(['--version'], '', signal);
    } catch (err) {
      throw classifyLocalFailure(err);
    }
  }

  private run(args: string[], input: string, signal: AbortSignal): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.options.command, args, {
        stdio: ['pipe', 'pipe', 'pipe'],
        signal,
        killSignal: 'SIGKILL',
        windowsHide: true,
      });

      const chunks: Buffer[] = [];
      let stdoutBytes = 0;
      let stderr = '';
      let failed = false;

      const fail = (err: Error): void => {
        if (failed) return;
        failed = true;
        reject(err);
      };

      child.stdout.on('data', (chunk: Buffer) => {
        stdoutBytes += chunk.length;
        if (stdoutBytes > this.options.maxOutputBytes) {
          child.kill('SIGKILL');
          fail(
            new EngineError(
              'EngineUnavailable',
              ENGINE_NAME,
              `local tts output exceeded ${this.options.maxOutputBytes} bytes`,
            ),
          );
          return;
        }
        chunks.push(chunk);
      });

      child.stderr.on('data', (chunk: Buffer) => {
        if (stderr.length < STDERR_LIMIT) {
          stderr += chunk.toString('utf8').slice(0, STDERR_LIMIT - stderr.length);
        }
      });

      child.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code === 'ENOENT' || err.code === 'EACCES') {
          fail(
            new EngineError('EngineUnavailable', ENGINE_NAME, `local tts command not runnable: ${this.options.command}`, {
              cause: err,
            }),
          );
          return;
        }
        fail(err);
      });

      // the engine may exit before reading all of stdin
      child.stdin.on('error', (err: NodeJS.ErrnoException) => {
        log.debug({ err, code: err.code }, 'local tts stdin closed early');
      });

      child.on('close', (code, killedBy) => {
        if (failed) return;
        if (code === 0) {
          resolve({ stdout: Buffer.concat(chunks), stderr });
          return;
        }
        const detail = stderr.trim() || (killedBy ? `killed by ${killedBy}` : `exit code ${code}`);
        log.error({ code, signal: killedBy, stderr: stderr.trim() }, 'local tts error');
        fail(
          new EngineError(
            UNKNOWN_VOICE.test(stderr) ? 'EngineRejected' : 'EngineUnavailable',
            ENGINE_NAME,
            `local tts failed: ${detail}`,
            { status: code ?? undefined },
          ),
        );
      });

      child.stdin.end(input, 'utf8');
    });
  }
}

export function classifyLocalFailure(err: unknown): Error {
  if (err instanceof EngineError || err instanceof CancelledError) {
    return err;
  }
  if (err instanceof DeadlineExceededError) {
    return new EngineError('EngineTimeout', ENGINE_NAME, err.message, { cause: err });
  }
  return new EngineError('EngineUnavailable', ENGINE_NAME, `local tts failed: ${describeError(err)}`, { cause: err });
}
