import { vi } from 'vitest';
import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import type { MediaItem, MediaPlayer, PlayerFactory, PlayerSource } from '@/types';
import type { MediaTransport, TransportResponse } from '@/lib/media-transport';

export const makeItem = (id: string, overrides: Partial<MediaItem> = {}): MediaItem => ({
  id,
  url: `https://cdn.test/hls/${id}/master.m3u8`,
  fallbackUrls: [],
  durationMs: 15000,
  aspectRatio: 9 / 16,
  streamType: 'hls',
  ...overrides,
});

export class FakePlayer implements MediaPlayer {
  loop = false;
  muted = false;
  volume = 1;
  readonly calls: string[] = [];
  private loader: () => Promise<void>;

  constructor(readonly source: PlayerSource, loader: () => Promise<void> = async () => undefined) {
    this.loader = loader;
  }

  load(): Promise<void> {
    this.calls.push('load');
    return this.loader();
  }

  play(): void {
    this.calls.push('play');
  }

  pause(): void {
    this.calls.push('pause');
  }

  release(): void {
    this.calls.push('release');
  }
}

/**
 * Records every player it creates. `loaders` decides per URL how load()
 * behaves; anything unlisted loads immediately.
 */
export class FakePlayerFactory implements PlayerFactory {
  readonly players: FakePlayer[] = [];
  readonly loaders = new Map<string, () => Promise<void>>();

  create(source: PlayerSource): FakePlayer {
    const player = new FakePlayer(source, this.loaders.get(source.uri));
    this.players.push(player);
    return player;
  }

  playersFor(uri: string): FakePlayer[] {
    return this.players.filter((player) => player.source.uri === uri);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export const bytes = (length: number, fill = 1): Uint8Array => new Uint8Array(length).fill(fill);

async function* fromChunks(chunks: Uint8Array[]): AsyncGenerator<Uint8Array> {
  for (const chunk of chunks) {
    yield chunk;
  }
}

export interface FakeRoute {
  status: number;
  chunks?: Uint8Array[];
}

/**
 * In-process transport serving fixed responses per URL.
 */
export class FakeTransport implements MediaTransport {
  readonly requested: string[] = [];
  closed = 0;

  constructor(private readonly routes: Record<string, FakeRoute>) {}

  async open(url: string): Promise<TransportResponse> {
    this.requested.push(url);
    const route = this.routes[url];
    if (!route) {
      return { status: 404, body: fromChunks([]), close: () => this.closed++ };
    }
    return { status: route.status, body: fromChunks(route.chunks ?? []), close: () => this.closed++ };
  }
}

export const collect = async (source: AsyncIterable<Uint8Array>): Promise<Uint8Array[]> => {
  const chunks: Uint8Array[] = [];
  for await (const chunk of source) {
    chunks.push(chunk);
  }
  return chunks;
};

export const totalLength = (chunks: Uint8Array[]): number => chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);

export interface FakeReply {
  status?: number;
  data: unknown;
}

/**
 * Axios adapter answering in process. Statuses of 400 and up reject the way
 * the http adapter does.
 */
export function fakeAdapter(handler: (config: InternalAxiosRequestConfig) => FakeReply) {
  return vi.fn<AxiosAdapter>(async (config) => {
    const { status = 200, data } = handler(config);
    const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
    }
    return response;
  });
}
