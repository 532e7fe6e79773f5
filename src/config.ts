// src/config.ts
import path from 'path';
import { z } from 'zod';

// ───────────────────────── helpers ─────────────────────────

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
};

const numberFromEnv = (value: unknown): unknown => {
  // prevent z.coerce.number from treating booleans as 1/0
  if (typeof value === 'boolean') return NaN;

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return undefined;

    const normalized = trimmed.toLowerCase();
    if (normalized === 'true' || normalized === 'false') return NaN;

    return trimmed;
  }

  return value;
};

const csvList = (value: unknown): unknown => {
  const normalized = emptyToUndefined(value);
  if (typeof normalized !== 'string') return normalized;
  return normalized
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
};

/** Split an argv template on whitespace. Placeholders stay intact for per-call substitution. */
const argsTemplate = (value: unknown): unknown => {
  const normalized = emptyToUndefined(value);
  if (typeof normalized !== 'string') return normalized;
  return normalized.trim().split(/\s+/);
};

export const SERVICE_NAME = 'tts-gateway';
export const SERVICE_VERSION = process.env.npm_package_version ?? '1.0.0';

export const AUDIO_FORMATS = ['wav', 'mp3'] as const;
export type AudioFormat = (typeof AUDIO_FORMATS)[number];

export const DEFAULT_LOCAL_TTS_ARGS = ['-v', '{voice}', '-s', '{rate}', '--stdin', '--stdout'];

// ───────────────────────── schema ─────────────────────────

const ConfigSchema = z
  .object({
    /* ───────────────────────── Core ───────────────────────── */
    PORT: z.preprocess(numberFromEnv, z.coerce.number().int().positive().default(8000)),
    HOST: z.preprocess(emptyToUndefined, z.string().min(1).default('0.0.0.0')),
    NODE_ENV: z.preprocess(emptyToUndefined, z.string().default('development')),
    LOG_LEVEL: z.preprocess(
      emptyToUndefined,
      z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    ),
    /** Absolute base for artifact URLs in responses. Relative URLs when unset. */
    PUBLIC_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
    REQUEST_BODY_LIMIT: z.preprocess(emptyToUndefined, z.string().min(1).default('1mb')),

    /* ───────────────────────── Requests ───────────────────────── */
    MAX_TEXT_LENGTH: z.preprocess(numberFromEnv, z.coerce.number().int().positive().default(5000)),
    SUPPORTED_FORMATS: z.preprocess(csvList, z.array(z.enum(AUDIO_FORMATS)).min(1).default(['wav', 'mp3'])),
    DEFAULT_LANGUAGE: z.preprocess(emptyToUndefined, z.string().min(2).default('pt')),
    MAX_CONCURRENT_SYNTHESES: z.preprocess(numberFromEnv, z.coerce.number().int().positive().default(16)),
    /** Requests per minute per client IP; 0 disables the limiter. */
    API_RATE_LIMIT: z.preprocess(numberFromEnv, z.coerce.number().int().nonnegative().default(60)),
    /** Browser origins allowed on /v1; `*` allows any. */
    ALLOWED_ORIGINS: z.preprocess(
      csvList,
      z
        .array(z.string().min(1))
        .default(['http://localhost:3000', 'http://localhost:8000', 'http://127.0.0.1:8000']),
    ),

    /* ───────────────────────── Storage ───────────────────────── */
    OUTPUT_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('outputs')),
    VOICES_FILE: z.preprocess(emptyToUndefined, z.string().min(1).default('data/voices.json')),

    /* ───────────────────────── Cloud TTS ───────────────────────── */
    CLOUD_TTS_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
    CLOUD_TTS_API_KEY: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
    /** Defaults to <origin of CLOUD_TTS_URL>/health. */
    CLOUD_TTS_HEALTH_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
    CLOUD_TTS_TIMEOUT_MS: z.preprocess(numberFromEnv, z.coerce.number().int().positive().default(10_000)),
    CLOUD_TTS_RETRIES: z.preprocess(numberFromEnv, z.coerce.number().int().min(0).max(3).default(1)),
    CLOUD_TTS_RETRY_BACKOFF_MS: z.preprocess(numberFromEnv, z.coerce.number().int().nonnegative().default(500)),

    /* ───────────────────────── Local TTS ───────────────────────── */
    LOCAL_TTS_COMMAND: z.preprocess(emptyToUndefined, z.string().min(1).default('espeak-ng')),
    LOCAL_TTS_ARGS: z.preprocess(argsTemplate, z.array(z.string().min(1)).default(DEFAULT_LOCAL_TTS_ARGS)),
    LOCAL_TTS_RATE: z.preprocess(numberFromEnv, z.coerce.number().int().min(80).max(450).default(150)),
    LOCAL_TTS_TIMEOUT_MS: z.preprocess(numberFromEnv, z.coerce.number().int().positive().default(15_000)),
    LOCAL_TTS_MAX_OUTPUT_BYTES: z.preprocess(
      numberFromEnv,
      z.coerce.number().int().positive().default(50_000_000),
    ),

    /* ───────────────────────── Health ───────────────────────── */
    HEALTH_PROBE_TIMEOUT_MS: z.preprocess(numberFromEnv, z.coerce.number().int().positive().default(2000)),
  })
  .superRefine((data, ctx) => {
    if (!data.SUPPORTED_FORMATS.includes('wav')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'SUPPORTED_FORMATS must include wav',
        path: ['SUPPORTED_FORMATS'],
      });
    }
  });

export interface CloudTtsConfig {
  url?: string;
  apiKey?: string;
  healthUrl?: string;
  timeoutMs: number;
  retries: number;
  retryBackoffMs: number;
}

export interface LocalTtsConfig {
  command: string;
  args: string[];
  rate: number;
  timeoutMs: number;
  maxOutputBytes: number;
}

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  publicBaseUrl?: string;
  requestBodyLimit: string;
  maxTextLength: number;
  supportedFormats: AudioFormat[];
  defaultLanguage: string;
  maxConcurrentSyntheses: number;
  apiRateLimit: number;
  allowedOrigins: string[];
  outputDir: string;
  voicesFile: string;
  cloud: CloudTtsConfig;
  local: LocalTtsConfig;
  healthProbeTimeoutMs: number;
}

/**
 * Build the application config from an environment record.
 * Relative directories resolve against `cwd`.
 */
export function loadConfig(
  source: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const parsed = ConfigSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }

  const env = parsed.data;
  return {
    port: env.PORT,
    host: env.HOST,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    publicBaseUrl: env.PUBLIC_BASE_URL?.replace(/\/+$/, ''),
    requestBodyLimit: env.REQUEST_BODY_LIMIT,
    maxTextLength: env.MAX_TEXT_LENGTH,
    supportedFormats: Array.from(new Set(env.SUPPORTED_FORMATS)),
    defaultLanguage: env.DEFAULT_LANGUAGE.toLowerCase(),
    maxConcurrentSyntheses: env.MAX_CONCURRENT_SYNTHESES,
    apiRateLimit: env.API_RATE_LIMIT,
    allowedOrigins: env.ALLOWED_ORIGINS.map((origin) => origin.replace(/\/+$/, '')),
    outputDir: path.resolve(cwd, env.OUTPUT_DIR),
    voicesFile: path.resolve(cwd, env.VOICES_FILE),
    cloud: {
      url: env.CLOUD_TTS_URL,
      apiKey: env.CLOUD_TTS_API_KEY,
      healthUrl: env.CLOUD_TTS_HEALTH_URL ?? (env.CLOUD_TTS_URL ? `${new URL(env.CLOUD_TTS_URL).origin}/health` : undefined),
      timeoutMs: env.CLOUD_TTS_TIMEOUT_MS,
      retries: env.CLOUD_TTS_RETRIES,
      retryBackoffMs: env.CLOUD_TTS_RETRY_BACKOFF_MS,
    },
    local: {
      command: env.LOCAL_TTS_COMMAND,
      args: env.LOCAL_TTS_ARGS,
      rate: env.LOCAL_TTS_RATE,
      timeoutMs: env.LOCAL_TTS_TIMEOUT_MS,
      maxOutputBytes: env.LOCAL_TTS_MAX_OUTPUT_BYTES,
    },
    healthProbeTimeoutMs: env.HEALTH_PROBE_TIMEOUT_MS,
  };
}
