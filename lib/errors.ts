export type MediaEngineErrorCode =
  | 'TIMEOUT'
  | 'NETWORK'
  | 'UNSUPPORTED'
  | 'CAPACITY_OVERFLOW'
  | 'STALE_FETCH';

export class MediaEngineError extends Error {
  readonly code: MediaEngineErrorCode;

  constructor(code: MediaEngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MediaEngineError';
    this.code = code;
  }
}

/** Playback initialization or a network probe exceeded its bound. */
export class TimeoutError extends MediaEngineError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super('TIMEOUT', `${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class NetworkError extends MediaEngineError {
  readonly status?: number;
  readonly url?: string;

  constructor(message: string, details: { status?: number; url?: string; cause?: unknown } = {}) {
    super('NETWORK', message, { cause: details.cause });
    this.name = 'NetworkError';
    this.status = details.status;
    this.url = details.url;
  }
}

/** The decoder rejected the content. */
export class UnsupportedFormatError extends MediaEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UNSUPPORTED', message, options);
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * Every occupied pool slot is pinned, so nothing could be evicted. Advisory only:
 * reported through the pool's events, never thrown from acquire.
 */
export class CapacityOverflowError extends MediaEngineError {
  readonly size: number;
  readonly capacity: number;

  constructor(size: number, capacity: number) {
    super('CAPACITY_OVERFLOW', `Pool holds ${size} resources with capacity ${capacity}; all slots are pinned`);
    this.name = 'CapacityOverflowError';
    this.size = size;
    this.capacity = capacity;
  }
}

/** A result that completed after its epoch or slot was superseded. Discarded, not reported. */
export class StaleFetchError extends MediaEngineError {
  constructor(message = 'Result superseded before it could be applied') {
    super('STALE_FETCH', message);
    this.name = 'StaleFetchError';
  }
}

export const isStaleFetch = (error: unknown): error is StaleFetchError =>
  error instanceof StaleFetchError;
