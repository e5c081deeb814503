import { isAxiosError } from 'axios';
import { NetworkError, TimeoutError } from '@/lib/errors';

const NETWORK_ERROR_CODES = new Set([
  'ERR_NETWORK',
  'NETWORK_ERROR',
  'ECONNABORTED',
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
]);

const NETWORK_MESSAGE_PATTERNS = [
  'Network Error',
  'network',
  'timeout',
  'ECONNREFUSED',
  'ENOTFOUND',
  'socket hang up',
  'Failed to fetch',
];

const errorCode = (error: unknown): string | undefined => {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
};

/**
 * Checks if an error is a network error (no usable response reached us)
 */
export const isNetworkError = (error: unknown): boolean => {
  if (!error) return false;
  if (error instanceof TimeoutError) return true;
  if (error instanceof NetworkError) return error.status === undefined;

  const code = errorCode(error);
  if (code && NETWORK_ERROR_CODES.has(code)) {
    return true;
  }

  // No response usually means network error
  if (isAxiosError(error) && !error.response && error.request) {
    return true;
  }

  const message = error instanceof Error ? error.message : '';
  return NETWORK_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern));
};

/**
 * Normalizes transport failures into the engine's NetworkError
 */
export const toNetworkError = (error: unknown, url?: string): NetworkError | TimeoutError => {
  if (error instanceof NetworkError || error instanceof TimeoutError) return error;

  if (isAxiosError(error)) {
    return new NetworkError(error.message, {
      status: error.response?.status,
      url: url ?? error.config?.url,
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(message, { url, cause: error });
};
