/**
 * Express middleware shared by every route.
 */
import type { ErrorRequestHandler, Request, Response, NextFunction, RequestHandler } from 'express';
import { randomUUID } from 'crypto';
import { ZodError, type ZodSchema } from 'zod';
import { PipelineError, errorKindOf, httpStatusFor, type ValidationIssue } from './errors';
import { log } from './log';

// ────────────────────────────────────────────────
// Request ID / Correlation ID
// ────────────────────────────────────────────────

const REQUEST_ID = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Adds a request ID to each request for tracing.
 * Uses a well-formed X-Request-ID header if provided, otherwise a new UUID.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const existingId = req.headers['x-request-id'];
  const requestId = typeof existingId === 'string' && REQUEST_ID.test(existingId) ? existingId : randomUUID();
  res.locals.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);
  next();
}

export function getRequestId(res: Response): string {
  const value: unknown = res.locals.requestId;
  return typeof value === 'string' ? value : 'unknown';
}

// ────────────────────────────────────────────────
// Request logging
// ────────────────────────────────────────────────

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  res.on('finish', () => {
    const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
    log[level](
      {
        event: 'http_request',
        request_id: getRequestId(res),
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Date.now() - startTime,
      },
      'request completed',
    );
  });

  next();
}

// ────────────────────────────────────────────────
// Async handler wrapper
// ────────────────────────────────────────────────

/**
 * Wraps an async route handler so rejections reach the error handler.
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

// ────────────────────────────────────────────────
// Errors
// ────────────────────────────────────────────────

export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, statusCode = 500, code = 'internal_error', details?: unknown) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export function createApiError(message: string, statusCode: number = 500, code?: string, details?: unknown): ApiError {
  return new ApiError(message, statusCode, code, details);
}

interface ErrorBody {
  error: string;
  message: string;
  stage?: string;
  details?: unknown;
  requestId: string;
}

/** body-parser failures carry `type` and `status`. */
function bodyParserStatus(err: unknown): { type: string; status: number } | undefined {
  if (err instanceof Error && 'type' in err && 'status' in err) {
    const { type, status } = err;
    if (typeof type === 'string' && typeof status === 'number') return { type, status };
  }
  return undefined;
}

function toErrorResponse(err: unknown, requestId: string, isProduction: boolean): { status: number; body: ErrorBody } {
  if (err instanceof PipelineError) {
    const status = httpStatusFor(err);
    return {
      status,
      body: {
        error: errorKindOf(err),
        message: err.message,
        stage: err.stage,
        ...(err.issues && err.issues.length > 0 ? { details: err.issues } : {}),
        requestId,
      },
    };
  }

  if (err instanceof ApiError) {
    const hide = err.statusCode >= 500 && isProduction;
    return {
      status: err.statusCode,
      body: {
        error: err.code,
        message: hide ? 'An internal error occurred' : err.message,
        ...(err.details !== undefined ? { details: err.details } : {}),
        requestId,
      },
    };
  }

  const parser = bodyParserStatus(err);
  if (parser && parser.status < 500) {
    const tooLarge = parser.type === 'entity.too.large';
    return {
      status: parser.status,
      body: {
        error: 'ValidationError',
        message: tooLarge ? 'request body too large' : 'request body is not valid JSON',
        stage: 'validation',
        requestId,
      },
    };
  }

  return {
    status: 500,
    body: {
      error: 'internal_error',
      message: isProduction ? 'An internal error occurred' : err instanceof Error ? err.message : String(err),
      requestId,
    },
  };
}

/**
 * Global error handler. Must be registered last. In production, 5xx
 * messages are replaced with a generic one.
 */
export function globalErrorHandler(opts: { isProduction: boolean }): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const requestId = getRequestId(res);
    const { status, body } = toErrorResponse(err, requestId, opts.isProduction);

    // pipeline failures are already logged with their stage
    if (!(err instanceof PipelineError)) {
      log[status >= 500 ? 'error' : 'warn'](
        { event: 'request_error', request_id: requestId, path: req.path, method: req.method, status, err },
        'request error',
      );
    }

    if (res.headersSent) {
      res.destroy();
      return;
    }
    res.status(status).json(body);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: 'not_found', message: `no route for ${req.method} ${req.path}`, requestId: getRequestId(res) });
}

// ────────────────────────────────────────────────
// Input validation
// ────────────────────────────────────────────────

function issuesFrom(err: ZodError): ValidationIssue[] {
  return err.errors.map((e) => ({ path: e.path.join('.'), message: e.message }));
}

/**
 * Validates a request body against a Zod schema.
 * Returns the parsed data or throws a ValidationError.
 */
export function validateBody<T>(schema: ZodSchema<T>, body: unknown): T {
  try {
    return schema.parse(body);
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = issuesFrom(err);
      throw new PipelineError(
        'ValidationError',
        'validation',
        issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; '),
        { issues },
      );
    }
    throw err;
  }
}

export function validateQuery<T>(schema: ZodSchema<T>, query: unknown): T {
  const parsed = schema.safeParse(query);
  if (!parsed.success) {
    throw createApiError('Invalid query parameters', 400, 'ValidationError', issuesFrom(parsed.error));
  }
  return parsed.data;
}

// ────────────────────────────────────────────────
// CORS allowlist
// ────────────────────────────────────────────────

const CORS_ALLOW_HEADERS = 'content-type,accept,x-request-id';
const CORS_EXPOSE_HEADERS = 'X-Request-ID,X-Artifact-Id,X-Processing-Time,X-Text-Length,X-Voice-ID';

/**
 * Browser origin allowlist. Requests without an Origin header pass untouched.
 * An unlisted origin is refused with 403.
 */
export function corsAllowlist(allowedOrigins: string[]): RequestHandler {
  const anyOrigin = allowedOrigins.includes('*');
  const isAllowed = (origin: string): boolean => anyOrigin || allowedOrigins.includes(origin.toLowerCase());

  return (req: Request, res: Response, next: NextFunction) => {
    const origin = typeof req.headers.origin === 'string' ? req.headers.origin : undefined;
    if (!origin) return next();

    if (!isAllowed(origin)) {
      log.warn({ event: 'cors_origin_rejected', request_id: getRequestId(res), origin, path: req.path }, 'CORS origin rejected');
      res.status(403).json({
        error: 'origin_not_allowed',
        message: `origin ${origin} is not allowed`,
        requestId: getRequestId(res),
      });
      return;
    }

    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Vary', 'Origin');
    res.setHeader('Access-Control-Allow-Credentials', 'true');
    res.setHeader('Access-Control-Allow-Headers', CORS_ALLOW_HEADERS);
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
    res.setHeader('Access-Control-Expose-Headers', CORS_EXPOSE_HEADERS);

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    return next();
  };
}

// ────────────────────────────────────────────────
// Admission control
// ────────────────────────────────────────────────

interface RateLimitOptions {
  windowMs: number;
  max: number;
  keyFn?: (req: Request) => string;
}

/** Fixed-window request limit per client IP. */
export function ipRateLimit(opts: RateLimitOptions): RequestHandler {
  const { windowMs, max } = opts;

  // key -> { resetAt, count }
  const buckets = new Map<string, { resetAt: number; count: number }>();

  const keyFn =
    opts.keyFn ??
    ((req: Request) => {
      // Prefer X-Forwarded-For if behind a proxy/load balancer
      const header = req.headers['x-forwarded-for'];
      const xff = (Array.isArray(header) ? header[0] : header)?.split(',')[0]?.trim();
      return xff || req.ip || 'unknown';
    });

  return (req: Request, res: Response, next: NextFunction) => {
    const now = Date.now();
    const key = keyFn(req);

    for (const [bucketKey, bucket] of buckets) {
      if (now > bucket.resetAt) buckets.delete(bucketKey);
    }

    const cur = buckets.get(key);
    if (!cur) {
      buckets.set(key, { resetAt: now + windowMs, count: 1 });
      return next();
    }

    cur.count += 1;
    if (cur.count > max) {
      const retryAfterSec = Math.ceil((cur.resetAt - now) / 1000);
      res.setHeader('Retry-After', String(retryAfterSec));
      res.status(429).json({
        error: 'rate_limited',
        message: 'Too many requests from this IP. Try again shortly.',
        retryAfterSec,
        requestId: getRequestId(res),
      });
      return;
    }

    return next();
  };
}

/**
 * Rejects with 503 once `max` requests are in flight, instead of queueing
 * them behind slow engines. The slot is released when the response ends.
 */
export function capacityGuard(max: number): RequestHandler {
  let inflight = 0;

  return (_req: Request, res: Response, next: NextFunction) => {
    if (inflight >= max) {
      res.setHeader('Retry-After', '1');
      res.status(503).json({
        error: 'at_capacity',
        message: `server is handling ${max} synthesis requests; try again shortly`,
        requestId: getRequestId(res),
      });
      return;
    }

    inflight += 1;
    let released = false;
    const release = (): void => {
      if (released) return;
      released = true;
      inflight -= 1;
    };
    res.on('finish', release);
    res.on('close', release);
    next();
  };
}
