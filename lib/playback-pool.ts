import type { DeviceClass, MediaItem, PlayerFactory, PlayerSource } from '@/types';
import { DEBUG_LOGS } from './config';
import { CapacityOverflowError, StaleFetchError, UnsupportedFormatError, isStaleFetch } from './errors';
import { PlaybackResource, type PlaybackHandle } from './playback-resource';
import type { ProgressiveFetchCache } from './progressive-fetch-cache';
import { SimpleEventEmitter } from './simple-event-emitter';
import { isAdaptiveSource, rankPlaybackUrls } from './utils/file-url';

export const INIT_TIMEOUTS: Readonly<Record<DeviceClass, number>> = {
  'high-end': 10000,
  'low-end': 15000,
};

export const DEFAULT_POOL_CAPACITY = 7;

export interface PlaybackPoolOptions {
  factory: PlayerFactory;
  /** Streams raw single-file sources; without it every source goes to the player as a URL. */
  fetchCache?: ProgressiveFetchCache;
  capacity?: number;
  deviceClass?: DeviceClass;
  initTimeoutMs?: number;
  maxAttempts?: number;
  now?: () => number;
}

export interface AcquireOptions {
  /** Checked after initialization; returning false discards the new resource. */
  shouldCommit?: () => boolean;
}

export interface EvictionEvent {
  index: number;
  mediaId: string;
}

interface PoolEvents {
  evicted: EvictionEvent;
  'capacity-overflow': CapacityOverflowError;
}

export interface PlaybackPoolStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
  indices: number[];
  pinned: number[];
  initializing: number;
}

interface PreparedResource {
  resource: PlaybackResource;
  readiness?: Promise<void>;
}

interface InFlightAcquire {
  mediaId: string;
  promise: Promise<PlaybackResource>;
}

const settled = (promise: Promise<unknown>): Promise<void> =>
  promise.then(
    () => undefined,
    () => undefined
  );

/**
 * Bounded set of playback resources keyed by feed index. Least recently
 * used unpinned slots are evicted once the pool grows past capacity.
 */
export class PlaybackPool {
  readonly capacity: number;
  private readonly factory: PlayerFactory;
  private readonly fetchCache?: ProgressiveFetchCache;
  private readonly initTimeoutMs: number;
  private readonly maxAttempts: number;
  private readonly now: () => number;
  private readonly events = new SimpleEventEmitter<PoolEvents>();

  private readonly slots = new Map<number, PlaybackResource>();
  private readonly pinned = new Set<number>();
  private readonly inFlight = new Map<number, InFlightAcquire>();
  // Bumped by release(index); a pending acquire for that index is then stale
  private readonly slotGenerations = new Map<number, number>();
  private poolGeneration = 0;
  private sequence = 0;
  private closed = false;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: PlaybackPoolOptions) {
    this.factory = options.factory;
    this.fetchCache = options.fetchCache;
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_POOL_CAPACITY);
    this.initTimeoutMs = options.initTimeoutMs ?? INIT_TIMEOUTS[options.deviceClass ?? 'high-end'];
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 2);
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.slots.size;
  }

  on<K extends keyof PoolEvents>(event: K, listener: (payload: PoolEvents[K]) => void): () => void {
    return this.events.on(event, listener);
  }

  /**
   * Get a ready playback handle for a feed index, creating one if needed.
   */
  async acquire(index: number, item: MediaItem, options: AcquireOptions = {}): Promise<PlaybackHandle> {
    if (this.closed) {
      throw new StaleFetchError('Playback pool has been shut down');
    }

    const pending = this.inFlight.get(index);
    if (pending) {
      if (pending.mediaId === item.id) {
        try {
          const resource = await pending.promise;
          if (this.slots.get(index) === resource && resource.isUsable) {
            this.touch(resource);
            return resource;
          }
        } catch (error) {
          if (!isStaleFetch(error)) throw error;
        }
      } else {
        await settled(pending.promise);
      }
      return this.acquire(index, item, options);
    }

    const existing = this.slots.get(index);
    if (existing && existing.mediaId === item.id && existing.isUsable) {
      this.hits++;
      this.touch(existing);
      return existing;
    }

    // A superseded acquire leaves whatever the slot holds untouched
    if (options.shouldCommit?.() === false) {
      throw new StaleFetchError(`Acquire for index ${index} was superseded`);
    }

    if (existing) {
      // Errored, or the index now holds a different item
      this.slots.delete(index);
      existing.dispose();
    }

    this.misses++;
    const entry: InFlightAcquire = { mediaId: item.id, promise: this.create(index, item, options) };
    this.inFlight.set(index, entry);
    try {
      return await entry.promise;
    } finally {
      if (this.inFlight.get(index) === entry) {
        this.inFlight.delete(index);
      }
    }
  }

  get(index: number): PlaybackHandle | undefined {
    return this.slots.get(index);
  }

  release(index: number): void {
    this.slotGenerations.set(index, (this.slotGenerations.get(index) ?? 0) + 1);
    const resource = this.slots.get(index);
    if (!resource) return;

    this.slots.delete(index);
    resource.dispose();
  }

  pin(indices: Iterable<number>): void {
    for (const index of indices) {
      this.pinned.add(index);
    }
  }

  unpin(indices: Iterable<number>): void {
    for (const index of indices) {
      this.pinned.delete(index);
    }
    this.enforceCapacity();
  }

  isPinned(index: number): boolean {
    return this.pinned.has(index);
  }

  /**
   * Release unpinned slots farther than `keepRange` from the current index.
   */
  releaseDistant(current: number, keepRange: number): number {
    const distant = [...this.slots.keys()].filter(
      (index) => Math.abs(index - current) > keepRange && !this.pinned.has(index)
    );
    for (const index of distant) {
      this.release(index);
    }
    if (distant.length > 0 && DEBUG_LOGS) {
      console.log(`🧹 [PlaybackPool] Released ${distant.length} distant players around ${current}`);
    }
    return distant.length;
  }

  pauseAll(): void {
    for (const resource of this.slots.values()) {
      resource.pause();
    }
  }

  clear(): void {
    this.poolGeneration++;
    for (const resource of this.slots.values()) {
      resource.dispose();
    }
    this.slots.clear();
    this.pinned.clear();
  }

  getStats(): PlaybackPoolStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.slots.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups > 0 ? Math.round((this.hits / lookups) * 10000) / 100 : 0,
      indices: [...this.slots.keys()].sort((a, b) => a - b),
      pinned: [...this.pinned].sort((a, b) => a - b),
      initializing: this.inFlight.size,
    };
  }

  shutdown(): void {
    this.closed = true;
    this.clear();
    this.events.removeAllListeners();
  }

  private async create(index: number, item: MediaItem, options: AcquireOptions): Promise<PlaybackResource> {
    const slotGeneration = this.slotGenerations.get(index) ?? 0;
    const poolGeneration = this.poolGeneration;
    const canCommit = (): boolean =>
      !this.closed &&
      this.poolGeneration === poolGeneration &&
      (this.slotGenerations.get(index) ?? 0) === slotGeneration &&
      (options.shouldCommit?.() ?? true);

    const candidates = rankPlaybackUrls(item).slice(0, this.maxAttempts);
    let lastError: unknown = new UnsupportedFormatError(`No playable URL for media ${item.id}`);

    for (const url of candidates) {
      if (!canCommit()) break;

      let resource: PlaybackResource | undefined;
      try {
        const prepared = this.createResource(index, item, url);
        resource = prepared.resource;
        await resource.initialize(this.initTimeoutMs, prepared.readiness);
      } catch (error) {
        lastError = error;
        resource?.dispose();
        console.warn(`[PlaybackPool] Failed to initialize ${item.id} from ${url}:`, error instanceof Error ? error.message : error);
        continue;
      }

      // Re-validate after the await: the pool may have moved on
      if (!canCommit()) {
        resource.dispose();
        throw new StaleFetchError(`Acquire for index ${index} was superseded`);
      }

      this.insert(index, resource);
      if (DEBUG_LOGS) {
        console.log(`✅ [PlaybackPool] Ready index ${index} (${item.id}), pool ${this.slots.size}/${this.capacity}`);
      }
      return resource;
    }

    if (!canCommit()) {
      throw new StaleFetchError(`Acquire for index ${index} was superseded`);
    }
    throw lastError;
  }

  /**
   * Raw single-file sources are streamed through the fetch cache and their
   * initial buffer becomes part of readiness. Adaptive sources go to the
   * player as a plain URL.
   */
  private createResource(index: number, item: MediaItem, url: string): PreparedResource {
    const stream = this.fetchCache && !isAdaptiveSource(item, url) ? this.fetchCache.stream(item.id, url) : undefined;
    const source: PlayerSource = { uri: url, mediaId: item.id, stream };
    const releaseStream = (): void => {
      if (stream) this.fetchCache?.release(item.id);
    };

    try {
      const resource = new PlaybackResource({
        index,
        mediaId: item.id,
        url,
        player: this.factory.create(source),
        onDispose: releaseStream,
      });
      return { resource, readiness: stream?.whenReady() };
    } catch (error) {
      releaseStream();
      throw error;
    }
  }

  private touch(resource: PlaybackResource): void {
    resource.touch(++this.sequence, this.now());
  }

  private insert(index: number, resource: PlaybackResource): void {
    const previous = this.slots.get(index);
    if (previous && previous !== resource) {
      previous.dispose();
    }
    this.slots.set(index, resource);
    this.touch(resource);
    this.enforceCapacity(index);
  }

  /**
   * Evict least recently accessed unpinned slots until the pool fits. The
   * slot that was just inserted is never chosen.
   */
  private enforceCapacity(justInserted?: number): void {
    while (this.slots.size > this.capacity) {
      let victim: PlaybackResource | undefined;
      for (const [index, resource] of this.slots) {
        if (index === justInserted || this.pinned.has(index)) continue;
        if (!victim || resource.accessSequence < victim.accessSequence) {
          victim = resource;
        }
      }

      if (!victim) {
        const overflow = new CapacityOverflowError(this.slots.size, this.capacity);
        console.warn(`[PlaybackPool] ${overflow.message}`);
        this.events.emit('capacity-overflow', overflow);
        return;
      }

      this.slots.delete(victim.index);
      victim.dispose();
      this.evictions++;
      this.events.emit('evicted', { index: victim.index, mediaId: victim.mediaId });
    }
  }
}
