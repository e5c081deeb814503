import { AxiosError, AxiosHeaders } from 'axios';
import { describe, expect, it } from 'vitest';
import { NetworkError, TimeoutError } from '@/lib/errors';
import { isNetworkError, toNetworkError } from '@/lib/utils/network-error-handler';

const withResponse = (status: number): AxiosError =>
  new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, undefined, {}, {
    status,
    statusText: String(status),
    data: {},
    headers: {},
    config: { url: '/x', headers: new AxiosHeaders() },
  });

describe('isNetworkError', () => {
  it('recognises connectivity failures', () => {
    expect(isNetworkError(new TimeoutError('probe', 10))).toBe(true);
    expect(isNetworkError(new NetworkError('down'))).toBe(true);
    expect(isNetworkError(Object.assign(new Error('refused'), { code: 'ECONNREFUSED' }))).toBe(true);
    expect(isNetworkError(new AxiosError('no answer', 'ERR_SOMETHING', undefined, {}))).toBe(true);
    expect(isNetworkError(new Error('socket hang up'))).toBe(true);
  });

  it('does not treat server responses as connectivity failures', () => {
    expect(isNetworkError(new NetworkError('bad', { status: 500 }))).toBe(false);
    expect(isNetworkError(withResponse(404))).toBe(false);
    expect(isNetworkError(new Error('boom'))).toBe(false);
    expect(isNetworkError(null)).toBe(false);
  });
});

describe('toNetworkError', () => {
  it('keeps engine errors as they are', () => {
    const timeout = new TimeoutError('probe', 10);
    expect(toNetworkError(timeout)).toBe(timeout);
  });

  it('carries the status of an HTTP failure', () => {
    const error = toNetworkError(withResponse(502), '/api/posts/all');
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ status: 502, url: '/api/posts/all', message: 'Request failed with status code 502' });
  });

  it('wraps anything else', () => {
    expect(toNetworkError('plain failure', '/x')).toMatchObject({ message: 'plain failure', url: '/x' });
  });
});
