/**
 * Pipeline errors
 *
 * Every failure that crosses a component boundary is a PodcastError with a
 * typed code. Vendor adapters throw ServiceCallError so callers can tell a
 * transient failure (retry) from a permanent one (give up).
 */

// =============================================================================
// Codes & categories
// =============================================================================

export type PodcastErrorCode =
  // Transcript buffer
  | 'INVALID_CHUNK'
  | 'OUT_OF_ORDER_CHUNK'
  | 'OVERLAP'
  | 'BUFFER_CLOSED'
  | 'PRODUCER_TAKEN'
  // Narration
  | 'INVALID_VOICE'
  | 'SYNTHESIS_UNAVAILABLE'
  // Selection
  | 'SCORER_UNAVAILABLE'
  // Assembly
  | 'EMPTY_TIMELINE'
  | 'ASSET_UNREADABLE'
  | 'RENDER_FAILED'
  // Pipeline
  | 'INVALID_CONFIG'
  | 'INVALID_OPERATION'
  | 'INVALID_TRANSITION'
  | 'JOB_NOT_FOUND'
  | 'RECORDING_DISCONNECTED'
  | 'TRANSCRIPTION_FAILED'
  | 'STORAGE_FAILED'
  | 'CANCELLED'
  | 'UNKNOWN';

export type ErrorCategory = 'input' | 'transient' | 'resource' | 'cancellation' | 'internal';

const CODE_CATEGORIES: Record<PodcastErrorCode, ErrorCategory> = {
  INVALID_CHUNK: 'input',
  OUT_OF_ORDER_CHUNK: 'input',
  OVERLAP: 'input',
  BUFFER_CLOSED: 'input',
  PRODUCER_TAKEN: 'input',
  INVALID_VOICE: 'input',
  INVALID_CONFIG: 'input',
  ASSET_UNREADABLE: 'input',
  INVALID_OPERATION: 'input',
  INVALID_TRANSITION: 'input',
  JOB_NOT_FOUND: 'input',
  SYNTHESIS_UNAVAILABLE: 'transient',
  SCORER_UNAVAILABLE: 'transient',
  TRANSCRIPTION_FAILED: 'transient',
  RECORDING_DISCONNECTED: 'resource',
  EMPTY_TIMELINE: 'resource',
  RENDER_FAILED: 'resource',
  STORAGE_FAILED: 'resource',
  CANCELLED: 'cancellation',
  UNKNOWN: 'internal',
};

// =============================================================================
// Error classes
// =============================================================================

/**
 * Structured error raised by any pipeline component.
 */
export class PodcastError extends Error {
  public readonly category: ErrorCategory;

  constructor(
    message: string,
    public readonly code: PodcastErrorCode,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PodcastError';
    this.category = CODE_CATEGORIES[code];
  }
}

/**
 * Failure of a call to an external service (HTTP API, SDK, subprocess).
 */
export class ServiceCallError extends Error {
  constructor(
    message: string,
    public readonly transient: boolean,
    public readonly status?: number,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ServiceCallError';
  }
}

// =============================================================================
// Classification helpers
// =============================================================================

export function isPodcastError(error: unknown, code?: PodcastErrorCode): error is PodcastError {
  return error instanceof PodcastError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function isAuthError(error: unknown): boolean {
  const message = errorMessage(error).toLowerCase();
  return (
    message.includes('401') ||
    message.includes('unauthorized') ||
    message.includes('invalid api key') ||
    message.includes('authentication') ||
    message.includes('forbidden')
  );
}

export function isRateLimitError(error: unknown): boolean {
  const message = errorMessage(error).toLowerCase();
  return message.includes('429') || message.includes('rate limit') || message.includes('too many');
}

export function isNetworkError(error: unknown): boolean {
  const message = errorMessage(error).toLowerCase();
  return (
    message.includes('network') ||
    message.includes('connection') ||
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('enotfound') ||
    message.includes('socket')
  );
}

/**
 * HTTP statuses worth retrying.
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Whether a failed service call may succeed if tried again.
 */
export function isTransientServiceError(error: unknown): boolean {
  if (error instanceof ServiceCallError) {
    return error.transient;
  }
  if (error instanceof PodcastError) {
    return error.category === 'transient';
  }
  if (isAuthError(error)) {
    return false;
  }
  return isRateLimitError(error) || isNetworkError(error);
}

/**
 * Normalize anything thrown into a PodcastError, keeping existing codes.
 */
export function toPodcastError(error: unknown, fallbackCode: PodcastErrorCode): PodcastError {
  if (error instanceof PodcastError) {
    return error;
  }
  const cause = error instanceof Error ? error : undefined;
  return new PodcastError(errorMessage(error), fallbackCode, cause);
}

export function cancelledError(message = 'Operation cancelled'): PodcastError {
  return new PodcastError(message, 'CANCELLED');
}

/**
 * Throw CANCELLED if the signal has already fired.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw cancelledError();
  }
}
