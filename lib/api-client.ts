import axios, { type AxiosError, type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import { API_BASE_URL } from './config';
import type { NetworkStatusSignal } from './network-status';
import { isNetworkError } from './utils/network-error-handler';

export interface ApiClientOptions {
  baseURL?: string;
  timeout?: number;
  networkStatus?: NetworkStatusSignal;
  getAuthToken?: () => Promise<string | null>;
  /** Custom axios adapter, used to run requests in process. */
  adapter?: CreateAxiosDefaults['adapter'];
}

/**
 * Create the axios instance used for metadata calls, probes and media reads.
 */
export function createApiClient(options: ApiClientOptions = {}): AxiosInstance {
  const { networkStatus, getAuthToken } = options;

  const client = axios.create({
    baseURL: options.baseURL ?? API_BASE_URL,
    timeout: options.timeout ?? 10000,
    headers: {
      'Content-Type': 'application/json',
    },
    adapter: options.adapter,
  });

  // Request interceptor to add auth token
  client.interceptors.request.use(
    async (config) => {
      if (!getAuthToken) return config;
      try {
        const token = await getAuthToken();
        if (token) {
          config.headers.Authorization = `Bearer ${token}`;
        }
      } catch (error) {
        console.warn('[ApiClient] Token lookup failed, sending request without auth:', error);
      }
      return config;
    },
    (error) => {
      return Promise.reject(error);
    }
  );

  // Response interceptor to track connectivity
  client.interceptors.response.use(
    (response) => {
      // Any response implies we have connectivity
      networkStatus?.reportOnline({ source: 'api-client' });
      return response;
    },
    (error: AxiosError) => {
      if (isNetworkError(error)) {
        networkStatus?.reportOffline({
          source: 'api-client',
          message: `${error.config?.method || 'request'} ${error.config?.url || ''}`.trim(),
        });
      }

      return Promise.reject(error);
    }
  );

  return client;
}
