/**
 * Failure taxonomy for the synthesis path.
 *
 * Engines fail with {@link EngineError}, the artifact store with
 * {@link StorageError}; the pipeline wraps both in a {@link PipelineError}
 * tagged with the stage it was in. The HTTP layer only needs
 * {@link httpStatusFor} and {@link errorKindOf}.
 */

export type EngineErrorCode = 'EngineUnavailable' | 'EngineTimeout' | 'EngineRejected';

export type StorageErrorCode = 'DiskFull' | 'WriteError' | 'NotFound';

export type PipelineErrorKind =
  | 'ValidationError'
  | 'VoiceNotFound'
  | 'SynthesisFailed'
  | 'PersistenceFailed'
  | 'RequestCancelled';

/** Where a request was when it failed. */
export type PipelineStage = 'validation' | 'voice_resolution' | 'synthesis' | 'persistence';

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly engine: string;
  /** Upstream HTTP status or process exit code, when there was one. */
  readonly status?: number;

  constructor(code: EngineErrorCode, engine: string, message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'EngineError';
    this.code = code;
    this.engine = engine;
    this.status = options?.status;
  }
}

export class StorageError extends Error {
  readonly code: StorageErrorCode;

  constructor(code: StorageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'StorageError';
    this.code = code;
  }
}

/** Raised when the caller went away before the engine finished. */
export class CancelledError extends Error {
  constructor(message = 'request cancelled by caller') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class VoiceNotFoundError extends Error {
  readonly voiceId: string;

  constructor(voiceId: string, message = `voice not found: ${voiceId}`) {
    super(message);
    this.name = 'VoiceNotFoundError';
    this.voiceId = voiceId;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly stage: PipelineStage;
  readonly issues?: ValidationIssue[];

  constructor(
    kind: PipelineErrorKind,
    stage: PipelineStage,
    message: string,
    options?: { cause?: unknown; issues?: ValidationIssue[] },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PipelineError';
    this.kind = kind;
    this.stage = stage;
    this.issues = options?.issues;
  }

  /** The engine failure behind a SynthesisFailed, if any. */
  get engineError(): EngineError | undefined {
    return this.cause instanceof EngineError ? this.cause : undefined;
  }

  get storageError(): StorageError | undefined {
    return this.cause instanceof StorageError ? this.cause : undefined;
  }
}

const ENGINE_STATUS: Record<EngineErrorCode, number> = {
  EngineRejected: 422,
  EngineUnavailable: 502,
  EngineTimeout: 504,
};

const PIPELINE_STATUS: Record<PipelineErrorKind, number> = {
  ValidationError: 400,
  VoiceNotFound: 400,
  SynthesisFailed: 502,
  PersistenceFailed: 500,
  // nginx convention for "client closed request"
  RequestCancelled: 499,
};

/**
 * Stable error kind reported to callers. Synthesis failures report the
 * engine code (EngineTimeout etc.) rather than the generic wrapper.
 */
export function errorKindOf(error: PipelineError): string {
  if (error.kind === 'SynthesisFailed' && error.engineError) {
    return error.engineError.code;
  }
  return error.kind;
}

export function httpStatusFor(error: PipelineError): number {
  if (error.kind === 'SynthesisFailed' && error.engineError) {
    return ENGINE_STATUS[error.engineError.code];
  }
  return PIPELINE_STATUS[error.kind];
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** `code` of a Node system error (ENOENT, ENOSPC, ...), if it is one. */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
