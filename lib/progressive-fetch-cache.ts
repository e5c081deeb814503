import type { QualityTier } from '@/types';
import { DEBUG_LOGS } from './config';
import { NetworkError } from './errors';
import type { MediaTransport, TransportResponse } from './media-transport';
import { chunkSizeFor, initialBufferFor } from './network-quality-estimator';
import { ProgressiveStream } from './progressive-stream';
import type { MediaFileReader, MediaFileStore } from './utils/media-file-store';
import { buildFallbackChain } from './utils/url-fallback';

/** Anything that knows the current network tier, normally the estimator. */
export interface TierSource {
  readonly currentTier: QualityTier;
}

export interface ProgressiveFetchCacheOptions {
  transport: MediaTransport;
  files: MediaFileStore;
  tiers: TierSource;
  retentionMs?: number;
  fallbackChain?: (url: string) => string[];
}

export interface ProgressiveFetchStats {
  active: number;
  retained: number;
  networkFetches: number;
  diskHits: number;
  warmReuses: number;
  fallbacks: number;
  bytesFromNetwork: number;
}

interface StreamRecord {
  mediaId: string;
  stream: ProgressiveStream;
  state: 'open' | 'closed';
  cancelled: boolean;
  response: TransportResponse | null;
  /** Open handle on the finished file, held for the retention window. */
  reader: MediaFileReader | null;
  retentionTimer: ReturnType<typeof setTimeout> | null;
}

const isSuccess = (status: number): boolean => status === 200 || status === 206;
const shouldFallback = (status: number): boolean => status === 400 || status === 401;

const concat = (parts: Uint8Array[], length: number): Uint8Array => {
  if (parts.length === 1 && parts[0]) return parts[0];
  const out = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.byteLength;
  }
  return out;
};

/**
 * Streams media bytes to the player while writing them to disk. Chunk size
 * and readiness threshold follow whatever tier the network is in at the
 * moment each chunk is cut.
 */
export class ProgressiveFetchCache {
  private readonly transport: MediaTransport;
  private readonly files: MediaFileStore;
  private readonly tiers: TierSource;
  private readonly retentionMs: number;
  private readonly fallbackChain: (url: string) => string[];
  private readonly records = new Map<string, StreamRecord>();
  private readonly diskStreams = new Set<ProgressiveStream>();
  private readonly stats = {
    networkFetches: 0,
    diskHits: 0,
    warmReuses: 0,
    fallbacks: 0,
    bytesFromNetwork: 0,
  };

  constructor(options: ProgressiveFetchCacheOptions) {
    this.transport = options.transport;
    this.files = options.files;
    this.tiers = options.tiers;
    this.retentionMs = options.retentionMs ?? 8000;
    this.fallbackChain = options.fallbackChain ?? buildFallbackChain;
  }

  private chunkSize(): number {
    return chunkSizeFor(this.tiers.currentTier);
  }

  private initialBuffer(): number {
    return initialBufferFor(this.tiers.currentTier);
  }

  stream(mediaId: string, url: string): ProgressiveStream {
    const record = this.records.get(mediaId);

    if (record?.state === 'open') {
      return record.stream;
    }

    if (record?.state === 'closed') {
      // Warm reuse inside the retention window: the retained handle moves to the new stream
      this.clearRetention(record);
      this.records.delete(mediaId);
      this.stats.warmReuses++;
      const { reader } = record;
      record.reader = null;
      if (reader) {
        return this.serveFromDisk(mediaId, reader);
      }
      if (this.files.isComplete(mediaId)) {
        return this.serveFromDisk(mediaId);
      }
    }

    if (this.files.isComplete(mediaId)) {
      this.stats.diskHits++;
      return this.serveFromDisk(mediaId);
    }

    return this.fetchFromNetwork(mediaId, url);
  }

  isCached(mediaId: string): boolean {
    return this.files.isComplete(mediaId);
  }

  /**
   * The consumer gave up on the stream: stop the network loop at the next
   * fragment and discard the partial file. Completed streams stay retained.
   * Disk reads for the media id stop as well.
   */
  release(mediaId: string): void {
    for (const stream of this.diskStreams) {
      if (stream.mediaId === mediaId) stream.cancel();
    }

    const record = this.records.get(mediaId);
    if (record?.state !== 'open') return;

    record.cancelled = true;
    this.records.delete(mediaId);
    if (DEBUG_LOGS) {
      console.log(`⏹️ [ProgressiveCache] Released ${mediaId}`);
    }
  }

  getStats(): ProgressiveFetchStats {
    let active = 0;
    let retained = 0;
    for (const record of this.records.values()) {
      if (record.state === 'open') active++;
      else retained++;
    }
    return { active, retained, ...this.stats };
  }

  async clearAll(): Promise<void> {
    this.shutdown();
    await this.files.clear();
  }

  shutdown(): void {
    for (const record of this.records.values()) {
      record.cancelled = record.state === 'open';
      this.clearRetention(record);
      this.closeReader(record);
    }
    this.records.clear();
    for (const stream of [...this.diskStreams]) {
      stream.cancel();
    }
  }

  private fetchFromNetwork(mediaId: string, url: string): ProgressiveStream {
    const record: StreamRecord = {
      mediaId,
      stream: new ProgressiveStream(mediaId, () => this.release(mediaId)),
      state: 'open',
      cancelled: false,
      response: null,
      reader: null,
      retentionTimer: null,
    };
    this.records.set(mediaId, record);
    this.stats.networkFetches++;

    this.pump(record, url).catch((error: unknown) => {
      console.error(`[ProgressiveCache] Stream loop crashed for ${mediaId}:`, error);
    });
    return record.stream;
  }

  private async pump(record: StreamRecord, url: string): Promise<void> {
    const { mediaId, stream } = record;
    let fileStarted = false;

    try {
      const response = await this.open(url);
      record.response = response;
      if (record.cancelled) {
        response.close();
        return;
      }

      await this.files.beginWrite(mediaId);
      fileStarted = true;

      let pending: Uint8Array[] = [];
      let pendingBytes = 0;
      let received = 0;

      for await (const fragment of response.body) {
        if (record.cancelled) break;
        pending.push(fragment);
        pendingBytes += fragment.byteLength;
        received += fragment.byteLength;
        this.stats.bytesFromNetwork += fragment.byteLength;

        // Chunk size is re-read each time so a tier change applies mid-stream
        for (let size = this.chunkSize(); pendingBytes >= size && !record.cancelled; size = this.chunkSize()) {
          const buffer = concat(pending, pendingBytes);
          const rest = buffer.subarray(size);
          pending = rest.byteLength > 0 ? [rest] : [];
          pendingBytes = rest.byteLength;
          await this.emit(record, buffer.subarray(0, size));
        }

        if (received >= this.initialBuffer() && !record.cancelled) {
          stream.markReady();
        }
      }
      response.close();

      if (pendingBytes > 0) {
        await this.emit(record, concat(pending, pendingBytes));
      }
      if (record.cancelled) {
        await this.discard(record);
        return;
      }
      await this.files.markComplete(mediaId);
      record.reader = await this.openForRetention(mediaId);
      stream.end();
      this.retain(record);

      if (DEBUG_LOGS) {
        console.log(`✅ [ProgressiveCache] Completed ${mediaId} (${stream.receivedBytes} bytes)`);
      }
    } catch (error) {
      record.response?.close();
      stream.fail(error);
      if (this.records.get(mediaId) === record) {
        this.records.delete(mediaId);
      }
      if (fileStarted) {
        await this.discard(record);
      }
      if (!record.cancelled) {
        console.warn(`[ProgressiveCache] Stream failed for ${mediaId}:`, error instanceof Error ? error.message : error);
      }
    }
  }

  private async emit(record: StreamRecord, chunk: Uint8Array): Promise<void> {
    if (record.cancelled) return;
    record.stream.push(chunk);
    await this.files.append(record.mediaId, chunk);
  }

  /** Drop a partial file unless a newer stream for the same media owns it now. */
  private async discard(record: StreamRecord): Promise<void> {
    const current = this.records.get(record.mediaId);
    if (current && current !== record) return;
    await this.files.remove(record.mediaId);
  }

  /**
   * Open the URL, walking the fallback chain when the CDN rejects the
   * request with 400/401.
   */
  private async open(url: string): Promise<TransportResponse> {
    const response = await this.transport.open(url, { start: 0 });
    if (isSuccess(response.status)) return response;
    response.close();

    const status = response.status;
    if (!shouldFallback(status)) {
      throw new NetworkError(`Media request failed with status ${status}`, { status, url });
    }

    let lastError: unknown = new NetworkError(`Media request failed with status ${status}`, { status, url });
    for (const candidate of this.fallbackChain(url)) {
      this.stats.fallbacks++;
      if (DEBUG_LOGS) {
        console.log(`🔄 [ProgressiveCache] Trying fallback URL: ${candidate}`);
      }
      try {
        const next = await this.transport.open(candidate, { start: 0 });
        if (isSuccess(next.status)) return next;
        next.close();
        lastError = new NetworkError(`Fallback request failed with status ${next.status}`, {
          status: next.status,
          url: candidate,
        });
      } catch (error) {
        lastError = error;
      }
    }
    throw lastError;
  }

  private serveFromDisk(mediaId: string, reader?: MediaFileReader): ProgressiveStream {
    const stream = new ProgressiveStream(mediaId);
    this.diskStreams.add(stream);
    this.readFromDisk(stream, reader)
      .finally(() => {
        this.diskStreams.delete(stream);
      })
      .catch((error: unknown) => {
        console.error(`[ProgressiveCache] Disk read crashed for ${mediaId}:`, error);
      });
    return stream;
  }

  /**
   * Disk reads stay at most one initial buffer ahead of the consumer, so an
   * unread stream never holds more than that in memory.
   */
  private async readFromDisk(stream: ProgressiveStream, retained?: MediaFileReader): Promise<void> {
    let reader = retained;
    try {
      reader ??= await this.files.openReader(stream.mediaId);
      for await (const chunk of reader.chunks(() => this.chunkSize())) {
        await stream.whenDrained(this.initialBuffer());
        if (stream.isAbandoned) return;
        stream.push(chunk);
        if (stream.receivedBytes >= this.initialBuffer()) {
          stream.markReady();
        }
      }
      stream.end();
    } catch (error) {
      stream.fail(error);
      console.warn(`[ProgressiveCache] Failed to read cached ${stream.mediaId}:`, error instanceof Error ? error.message : error);
    } finally {
      await reader?.close();
    }
  }

  private async openForRetention(mediaId: string): Promise<MediaFileReader | null> {
    try {
      return await this.files.openReader(mediaId);
    } catch (error) {
      console.warn(`[ProgressiveCache] Could not keep ${mediaId} open for reuse:`, error instanceof Error ? error.message : error);
      return null;
    }
  }

  private retain(record: StreamRecord): void {
    record.state = 'closed';
    record.response = null;
    if (this.records.get(record.mediaId) !== record) {
      this.closeReader(record);
      return;
    }
    record.retentionTimer = setTimeout(() => {
      this.closeReader(record);
      if (this.records.get(record.mediaId) === record) {
        this.records.delete(record.mediaId);
      }
    }, this.retentionMs);
  }

  private closeReader(record: StreamRecord): void {
    const { reader } = record;
    record.reader = null;
    reader?.close().catch((error: unknown) => {
      console.error(`[ProgressiveCache] Failed to close ${record.mediaId}:`, error);
    });
  }

  private clearRetention(record: StreamRecord): void {
    if (record.retentionTimer) {
      clearTimeout(record.retentionTimer);
      record.retentionTimer = null;
    }
  }
}
