import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { DEBUG_LOGS } from '@/lib/config';

const DEFAULT_MAX_SIZE = 500 * 1024 * 1024; // 500MB
const DEFAULT_EXPIRY_MS = 7 * 24 * 60 * 60 * 1000; // 7 days
const METADATA_FILE = 'metadata.json';
const MEDIA_EXTENSION = '.media';

export interface MediaFileEntry {
  fileName: string;
  size: number;
  timestamp: number;
  lastAccessed: number;
  complete: boolean;
}

export interface MediaFileStoreOptions {
  maxSize?: number;
  expiryMs?: number;
  now?: () => number;
}

export interface MediaFileStoreStats {
  size: number;
  count: number;
  complete: number;
}

/**
 * Format bytes to human readable
 */
export const formatBytes = (bytes: number): string => {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
};

const isMediaFileEntry = (value: unknown): value is MediaFileEntry =>
  typeof value === 'object' &&
  value !== null &&
  'fileName' in value &&
  typeof value.fileName === 'string' &&
  'size' in value &&
  typeof value.size === 'number' &&
  'timestamp' in value &&
  typeof value.timestamp === 'number' &&
  'lastAccessed' in value &&
  typeof value.lastAccessed === 'number' &&
  'complete' in value &&
  typeof value.complete === 'boolean';

const parseEntries = (content: string): Map<string, MediaFileEntry> => {
  const entries = new Map<string, MediaFileEntry>();
  const parsed: unknown = JSON.parse(content);
  if (typeof parsed !== 'object' || parsed === null || !('entries' in parsed)) return entries;

  const raw = parsed.entries;
  if (typeof raw !== 'object' || raw === null) return entries;
  for (const [mediaId, entry] of Object.entries(raw)) {
    if (isMediaFileEntry(entry)) {
      entries.set(mediaId, entry);
    }
  }
  return entries;
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Open handle on one complete media file. Each `chunks()` call reads from the
 * start again, so a retained reader can serve several streams in turn.
 */
export class MediaFileReader {
  private closed = false;

  constructor(
    readonly mediaId: string,
    private readonly handle: FileHandle
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** Chunk size is asked for before every read so it can follow the current network tier. */
  async *chunks(chunkSize: () => number): AsyncGenerator<Uint8Array> {
    let position = 0;
    while (!this.closed) {
      const size = chunkSize();
      const buffer = Buffer.alloc(size);
      const { bytesRead } = await this.handle.read(buffer, 0, size, position);
      if (bytesRead === 0) return;
      position += bytesRead;
      yield buffer.subarray(0, bytesRead);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

/**
 * Persisted media bytes, one file per media id, with a JSON metadata index
 * kept beside them. Files are written incrementally and only count as cached
 * once marked complete.
 */
export class MediaFileStore {
  private readonly maxSize: number;
  private readonly expiryMs: number;
  private readonly now: () => number;
  private entries = new Map<string, MediaFileEntry>();
  private initPromise: Promise<void> | null = null;
  private saveChain: Promise<void> = Promise.resolve();

  constructor(
    readonly directory: string,
    options: MediaFileStoreOptions = {}
  ) {
    this.maxSize = options.maxSize ?? DEFAULT_MAX_SIZE;
    this.expiryMs = options.expiryMs ?? DEFAULT_EXPIRY_MS;
    this.now = options.now ?? Date.now;
  }

  get totalSize(): number {
    let total = 0;
    for (const entry of this.entries.values()) {
      total += entry.size;
    }
    return total;
  }

  /**
   * Create the cache directory, load the index and drop expired or
   * unfinished files left over from a previous run.
   */
  init(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.load();
    }
    return this.initPromise;
  }

  private async load(): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });

    try {
      const content = await fs.readFile(this.metadataPath(), 'utf8');
      this.entries = parseEntries(content);
    } catch (error) {
      if (!isMissingFile(error)) {
        console.error('[MediaStore] Failed to read metadata, starting empty:', error);
      }
      this.entries = new Map();
    }

    const stale = [...this.entries.entries()]
      .filter(([, entry]) => !entry.complete || this.now() - entry.timestamp > this.expiryMs)
      .map(([mediaId]) => mediaId);
    for (const mediaId of stale) {
      await this.remove(mediaId);
    }

    if (DEBUG_LOGS) {
      console.log('📦 [MediaStore] Initialized, size:', formatBytes(this.totalSize));
      if (stale.length > 0) {
        console.log(`🧹 [MediaStore] Cleaned ${stale.length} expired entries`);
      }
    }
  }

  isComplete(mediaId: string): boolean {
    const entry = this.entries.get(mediaId);
    return entry !== undefined && entry.complete && this.now() - entry.timestamp <= this.expiryMs;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  getEntry(mediaId: string): MediaFileEntry | undefined {
    return this.entries.get(mediaId);
  }

  /** Start (or restart) the file for a media id from zero bytes. */
  async beginWrite(mediaId: string): Promise<void> {
    await this.init();
    const fileName = this.fileNameFor(mediaId);
    await fs.writeFile(path.join(this.directory, fileName), new Uint8Array(0));
    const now = this.now();
    this.entries.set(mediaId, { fileName, size: 0, timestamp: now, lastAccessed: now, complete: false });
  }

  async append(mediaId: string, chunk: Uint8Array): Promise<void> {
    const entry = this.entries.get(mediaId);
    if (!entry) {
      throw new Error(`No file is open for media ${mediaId}`);
    }
    await fs.appendFile(path.join(this.directory, entry.fileName), chunk);
    entry.size += chunk.byteLength;
  }

  async markComplete(mediaId: string): Promise<void> {
    const entry = this.entries.get(mediaId);
    if (!entry) return;

    const now = this.now();
    entry.complete = true;
    entry.timestamp = now;
    entry.lastAccessed = now;

    if (this.totalSize > this.maxSize) {
      await this.evictLRU(this.totalSize - this.maxSize, mediaId);
    }
    await this.saveMetadata();

    if (DEBUG_LOGS) {
      console.log(`✅ [MediaStore] Cached ${mediaId} (${formatBytes(entry.size)}), total ${formatBytes(this.totalSize)}`);
    }
  }

  async openReader(mediaId: string): Promise<MediaFileReader> {
    const entry = this.entries.get(mediaId);
    if (!entry || !entry.complete) {
      throw new Error(`Media ${mediaId} is not cached`);
    }
    entry.lastAccessed = this.now();

    const handle = await fs.open(path.join(this.directory, entry.fileName), 'r');
    return new MediaFileReader(mediaId, handle);
  }

  /**
   * Read a complete file in chunks, closing it afterwards.
   */
  async *read(mediaId: string, chunkSize: () => number): AsyncGenerator<Uint8Array> {
    const reader = await this.openReader(mediaId);
    try {
      yield* reader.chunks(chunkSize);
    } finally {
      await reader.close();
    }
  }

  async remove(mediaId: string): Promise<void> {
    const entry = this.entries.get(mediaId);
    if (!entry) return;

    this.entries.delete(mediaId);
    await fs.rm(path.join(this.directory, entry.fileName), { force: true });
    await this.saveMetadata();
  }

  async clear(): Promise<void> {
    await fs.rm(this.directory, { recursive: true, force: true });
    this.entries = new Map();
    this.initPromise = null;
    await this.init();
    if (DEBUG_LOGS) {
      console.log('🧹 [MediaStore] Cache cleared');
    }
  }

  getStats(): MediaFileStoreStats {
    let complete = 0;
    for (const entry of this.entries.values()) {
      if (entry.complete) complete++;
    }
    return { size: this.totalSize, count: this.entries.size, complete };
  }

  /**
   * Evict least recently used complete files until enough space is freed
   */
  private async evictLRU(neededSpace: number, keepId: string): Promise<void> {
    const candidates = [...this.entries.entries()]
      .filter(([mediaId, entry]) => mediaId !== keepId && entry.complete)
      .sort(([, a], [, b]) => a.lastAccessed - b.lastAccessed);

    let freedSpace = 0;
    for (const [mediaId, entry] of candidates) {
      if (freedSpace >= neededSpace) break;
      freedSpace += entry.size;
      await this.remove(mediaId);
    }

    if (DEBUG_LOGS) {
      console.log(`🗑️ [MediaStore] Evicted ${formatBytes(freedSpace)} via LRU`);
    }
  }

  private saveMetadata(): Promise<void> {
    const snapshot = JSON.stringify({ entries: Object.fromEntries(this.entries) });
    // Writes are chained so an older snapshot never lands after a newer one
    this.saveChain = this.saveChain.then(async () => {
      try {
        await fs.writeFile(this.metadataPath(), snapshot, 'utf8');
      } catch (error) {
        console.error('[MediaStore] Failed to save metadata:', error);
      }
    });
    return this.saveChain;
  }

  private metadataPath(): string {
    return path.join(this.directory, METADATA_FILE);
  }

  private fileNameFor(mediaId: string): string {
    return `${encodeURIComponent(mediaId)}${MEDIA_EXTENSION}`;
  }
}
