import type { Readable } from 'node:stream';
import type { AxiosInstance } from 'axios';
import { toNetworkError } from './utils/network-error-handler';

export interface TransportResponse {
  status: number;
  body: AsyncIterable<Uint8Array>;
  close(): void;
}

/**
 * Opens ranged reads for media URLs. Status policy (fallbacks, errors) is the
 * caller's business, so every HTTP status is handed back as-is.
 */
export interface MediaTransport {
  open(url: string, range?: { start: number }): Promise<TransportResponse>;
}

const MEDIA_ACCEPT = 'video/*, application/vnd.apple.mpegurl, application/x-mpegURL, application/octet-stream, */*';

export function createAxiosTransport(client: AxiosInstance): MediaTransport {
  return {
    async open(url, range = { start: 0 }) {
      try {
        const response = await client.get<Readable>(url, {
          responseType: 'stream',
          headers: {
            Range: `bytes=${range.start}-`,
            Accept: MEDIA_ACCEPT,
          },
          validateStatus: () => true,
        });

        const body = response.data;
        return {
          status: response.status,
          body,
          close: () => {
            body.destroy();
          },
        };
      } catch (error) {
        throw toNetworkError(error, url);
      }
    },
  };
}
