/**
 * Base application error.
 * Carries the HTTP status and a stable code for API responses.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR'
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Bad job parameters. Rejected synchronously, never enters orchestration.
 */
export class InvalidConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'INVALID_CONFIGURATION');
    this.name = 'InvalidConfigurationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/**
 * Raised when a job-level cancellation reaches a waiting caller.
 */
export class CancelledError extends AppError {
  constructor(message = 'Job cancelled') {
    super(message, 409, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

/**
 * Abort reason used when the process stops. Work interrupted this way is not
 * journaled as failed, so it resumes on the next recovery.
 */
export class EngineShutdownError extends AppError {
  constructor() {
    super('Engine shutting down', 503, 'SHUTTING_DOWN');
    this.name = 'EngineShutdownError';
  }
}

export type ErrorKind = 'transient' | 'permanent';

/**
 * Error thrown by an activity handler that knows whether it is retryable.
 */
export class ActivityError extends AppError {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly status?: number
  ) {
    super(message, 502, kind === 'transient' ? 'ACTIVITY_TRANSIENT' : 'ACTIVITY_PERMANENT');
    this.name = 'ActivityError';
  }

  static transient(message: string, status?: number): ActivityError {
    return new ActivityError(message, 'transient', status);
  }

  static permanent(message: string, status?: number): ActivityError {
    return new ActivityError(message, 'permanent', status);
  }
}

/**
 * Terminal outcome of an activity: a permanent error or an exhausted retry budget.
 */
export class ActivityFailedError extends AppError {
  constructor(
    public readonly activity: string,
    public readonly activityId: string,
    public readonly attempts: number,
    public readonly reason: string,
    public readonly exhausted: boolean
  ) {
    super(
      exhausted
        ? `${activity} failed after ${attempts} attempts: ${reason}`
        : `${activity} failed: ${reason}`,
      502,
      'ACTIVITY_FAILED'
    );
    this.name = 'ActivityFailedError';
  }
}

/**
 * The re-executed workflow asked for something other than what its journal recorded.
 */
export class ReplayMismatchError extends AppError {
  constructor(message: string) {
    super(message, 500, 'REPLAY_MISMATCH');
    this.name = 'ReplayMismatchError';
  }
}

/**
 * A journal whose stage events move backwards.
 */
export class ReplayCorruptionError extends AppError {
  constructor(message: string) {
    super(message, 500, 'REPLAY_CORRUPTION');
    this.name = 'ReplayCorruptionError';
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === 'string' ? error : 'Unknown error';
}

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'ENOTFOUND',
]);

function readNumber(source: object, key: string): number | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' ? value : undefined;
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

export function isTransientHttpStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Maps an arbitrary thrown value onto the transient/permanent taxonomy.
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof ActivityError) {
    return error.kind;
  }

  if (error instanceof AppError) {
    return 'permanent';
  }

  if (!error || typeof error !== 'object') {
    return 'permanent';
  }

  const status = readNumber(error, 'status') ?? readNumber(error, 'statusCode');
  if (status !== undefined && status >= 400) {
    return isTransientHttpStatus(status) ? 'transient' : 'permanent';
  }

  const code = readString(error, 'code');
  if (code && (TRANSIENT_ERROR_CODES.has(code) || code.startsWith('UND_ERR_'))) {
    return 'transient';
  }

  const name = readString(error, 'name');
  if (name === 'AbortError' || name === 'TimeoutError') {
    return 'transient';
  }

  // undici wraps network failures as TypeError('fetch failed') with the socket error as cause.
  const message = readString(error, 'message');
  if (message === 'fetch failed') {
    return 'transient';
  }

  const cause: unknown = Reflect.get(error, 'cause');
  if (cause && cause !== error && typeof cause === 'object') {
    return classifyError(cause);
  }

  return 'permanent';
}
