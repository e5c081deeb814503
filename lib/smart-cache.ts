import { DEBUG_LOGS } from './config';
import {
  createFeedCacheCategories,
  EVICTION_FRACTION,
  isCacheKey,
  matchesPattern,
  serializeCacheKey,
  type CacheKey,
  type CacheCategory,
  type CacheKeyPattern,
  type CacheTypeConfig,
  type CategoryOptions,
  type FeedCachePayloads,
} from './cache-keys';
import type { CacheStore } from './utils/cache-store';
import { delay } from './utils/with-timeout';

export interface CacheEntry<T> {
  data: T;
  createdAt: number;
  maxAge: number;
  accessCount: number;
  lastAccessed: number;
}

const SOFT_REFRESH_RATIO = 0.8;
const DURABLE_PREFIX = 'smart-cache:';

export const isExpired = (entry: CacheEntry<unknown>, now: number): boolean =>
  now - entry.createdAt > entry.maxAge;

export const shouldRefresh = (entry: CacheEntry<unknown>, now: number): boolean =>
  now - entry.createdAt > entry.maxAge * SOFT_REFRESH_RATIO;

export interface GetOptions {
  maxAge?: number;
  forceRefresh?: boolean;
}

export interface PeekOptions {
  allowStale?: boolean;
}

export interface SmartCacheStats {
  hits: number;
  misses: number;
  staleResponses: number;
  backgroundRefreshes: number;
  refreshFailures: number;
  evictions: number;
  /** Share of reads served from memory (fresh or stale), in percent. */
  hitRate: number;
  size: number;
  categories: Record<string, number>;
  pendingRefreshes: number;
}

type Counters = Omit<SmartCacheStats, 'hitRate' | 'size' | 'categories' | 'pendingRefreshes'>;

const emptyCounters = (): Counters => ({
  hits: 0,
  misses: 0,
  staleResponses: 0,
  backgroundRefreshes: 0,
  refreshFailures: 0,
  evictions: 0,
});

interface RefreshTask {
  key: string;
  /** Resolves to whether the refreshed payload was written. */
  run: () => Promise<boolean>;
}

/** What the shared runtime needs from every category, whatever its payload. */
interface ManagedCategory {
  readonly category: string;
  readonly size: number;
  sweep(now: number): number;
  clear(): Promise<void>;
}

export interface CacheRuntimeOptions {
  store?: CacheStore;
  now?: () => number;
  refreshSpacingMs?: number;
  sweepIntervalMs?: number;
}

/**
 * State shared by every category of one cache: clock, durable store,
 * counters and the background refresh queue.
 */
export class CacheRuntime {
  readonly store?: CacheStore;
  readonly now: () => number;
  readonly counters: Counters = emptyCounters();
  readonly categories: ManagedCategory[] = [];

  private readonly refreshSpacingMs: number;
  private readonly sweepIntervalMs: number;
  private readonly queue: RefreshTask[] = [];
  private readonly pending = new Set<string>();
  private draining = false;
  private stopped = false;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: CacheRuntimeOptions = {}) {
    this.store = options.store;
    this.now = options.now ?? Date.now;
    this.refreshSpacingMs = options.refreshSpacingMs ?? 200;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60 * 1000;
  }

  get pendingRefreshes(): number {
    return this.pending.size;
  }

  register(category: ManagedCategory): void {
    this.categories.push(category);
  }

  /**
   * Queue a refresh unless one is already queued or running for the key.
   * Returns whether a new task was queued.
   */
  enqueueRefresh(key: string, run: () => Promise<boolean>): boolean {
    if (this.stopped || this.pending.has(key)) return false;

    this.pending.add(key);
    this.queue.push({ key, run });
    if (!this.draining) {
      this.drain().catch((error: unknown) => {
        console.error('[SmartCache] Refresh queue stopped unexpectedly:', error);
      });
    }
    return true;
  }

  cancelRefreshes(matches: (key: string) => boolean): void {
    for (let i = this.queue.length - 1; i >= 0; i--) {
      const task = this.queue[i];
      if (task && matches(task.key)) {
        this.queue.splice(i, 1);
        this.pending.delete(task.key);
      }
    }
  }

  startSweep(): void {
    this.stopped = false;
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.sweepIntervalMs);
  }

  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const category of this.categories) {
      removed += category.sweep(now);
    }
    if (removed > 0 && DEBUG_LOGS) {
      console.log(`🧹 [SmartCache] Swept ${removed} expired entries`);
    }
    return removed;
  }

  stop(): void {
    this.stopped = true;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.cancelRefreshes(() => true);
  }

  private async drain(): Promise<void> {
    this.draining = true;
    try {
      for (let task = this.queue.shift(); task; task = this.queue.shift()) {
        try {
          const applied = await task.run();
          if (applied) {
            this.counters.backgroundRefreshes++;
          }
          if (DEBUG_LOGS) {
            console.log(applied ? `🔄 [SmartCache] Refreshed ${task.key}` : `🚮 [SmartCache] Dropped refresh for ${task.key}`);
          }
        } catch (error) {
          this.counters.refreshFailures++;
          console.warn(`[SmartCache] Background refresh failed for ${task.key}:`, error instanceof Error ? error.message : error);
        } finally {
          this.pending.delete(task.key);
        }

        if (this.stopped) break;
        await delay(this.refreshSpacingMs);
      }
    } finally {
      this.draining = false;
    }
  }
}

interface DurableRecord {
  data: unknown;
  createdAt: number;
  maxAge: number;
  accessCount: number;
  lastAccessed: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const parseDurableRecord = (raw: string): DurableRecord | undefined => {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!isRecord(value)) return undefined;

  const { data, createdAt, maxAge, accessCount, lastAccessed } = value;
  if (
    typeof createdAt !== 'number' ||
    typeof maxAge !== 'number' ||
    typeof accessCount !== 'number' ||
    typeof lastAccessed !== 'number'
  ) {
    return undefined;
  }
  return { data, createdAt, maxAge, accessCount, lastAccessed };
};

/**
 * Typed stale-while-revalidate store for one category of payloads.
 */
export class CategoryCache<T> implements ManagedCategory {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly config: CacheTypeConfig;
  // One token per id with a refresh queued or running; invalidating the id drops it
  private readonly refreshTokens = new Map<string, symbol>();

  constructor(
    readonly category: string,
    private readonly options: CategoryOptions<T>,
    private readonly runtime: CacheRuntime
  ) {
    this.config = options.config;
    runtime.register(this);
  }

  get size(): number {
    return this.entries.size;
  }

  private get persistent(): boolean {
    return this.config.persist && this.options.revive !== undefined && this.runtime.store !== undefined;
  }

  async get(id: string, fetchFn: () => Promise<T>, options: GetOptions = {}): Promise<T> {
    const maxAge = options.maxAge ?? this.config.maxAgeMs;

    if (!options.forceRefresh) {
      const cached = this.entries.get(id) ?? (await this.hydrate(id));
      if (cached) {
        const now = this.runtime.now();
        if (!isExpired(cached, now)) {
          this.touch(cached, now);
          this.runtime.counters.hits++;
          if (this.config.staleWhileRevalidate && shouldRefresh(cached, now)) {
            this.scheduleRefresh(id, fetchFn, maxAge);
          }
          return cached.data;
        }

        if (this.config.staleWhileRevalidate && now - cached.createdAt <= cached.maxAge + this.config.staleWindowMs) {
          this.touch(cached, now);
          this.runtime.counters.staleResponses++;
          this.scheduleRefresh(id, fetchFn, maxAge);
          if (DEBUG_LOGS) {
            console.log(`⏳ [SmartCache] Serving stale ${this.describe(id)}`);
          }
          return cached.data;
        }
      }
    }

    this.runtime.counters.misses++;
    try {
      const data = await fetchFn();
      if (this.options.isPlaceholder?.(data)) {
        // A transient empty payload must not shadow real data later
        await this.remove(id);
        return data;
      }
      await this.write(id, data, maxAge);
      return data;
    } catch (error) {
      const fallback = this.entries.get(id);
      if (fallback) {
        console.warn(`[SmartCache] Fetch failed for ${this.describe(id)}, serving cached copy:`, error instanceof Error ? error.message : error);
        return fallback.data;
      }
      throw error;
    }
  }

  peek(id: string, options: PeekOptions = {}): T | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    if (options.allowStale === false && isExpired(entry, this.runtime.now())) return undefined;
    return entry.data;
  }

  async invalidate(id: string): Promise<void> {
    this.refreshTokens.delete(id);
    this.runtime.cancelRefreshes((key) => key === this.serialize(id));
    await this.remove(id);
  }

  async invalidatePrefix(idPrefix = ''): Promise<number> {
    const pattern = { category: this.category, idPrefix };
    const matches = (id: string): boolean => matchesPattern({ category: this.category, id }, pattern);

    for (const id of [...this.refreshTokens.keys()].filter(matches)) {
      this.refreshTokens.delete(id);
    }
    const prefix = this.serialize(idPrefix);
    this.runtime.cancelRefreshes((key) => key.startsWith(prefix));

    const ids = [...this.entries.keys()].filter(matches);
    for (const id of ids) {
      this.entries.delete(id);
    }

    const store = this.runtime.store;
    if (store && this.persistent) {
      const durableKeys = (await store.getAllKeys()).filter((key) => key.startsWith(`${DURABLE_PREFIX}${prefix}`));
      await Promise.all(durableKeys.map((key) => store.removeItem(key)));
    }
    return ids.length;
  }

  sweep(now: number): number {
    const window = this.config.staleWhileRevalidate ? this.config.staleWindowMs : 0;
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (now - entry.createdAt > entry.maxAge + window) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async clear(): Promise<void> {
    await this.invalidatePrefix('');
  }

  private serialize(id: string): string {
    return serializeCacheKey({ category: this.category, id });
  }

  private describe(id: string): string {
    return this.serialize(id);
  }

  private touch(entry: CacheEntry<T>, now: number): void {
    entry.accessCount++;
    entry.lastAccessed = Math.max(now, entry.createdAt);
  }

  private scheduleRefresh(id: string, fetchFn: () => Promise<T>, maxAge: number): void {
    const token = Symbol(id);
    const queued = this.runtime.enqueueRefresh(this.serialize(id), async () => {
      try {
        const data = await fetchFn();
        // Invalidated while the refresh was in flight
        if (this.refreshTokens.get(id) !== token) return false;
        if (this.options.isPlaceholder?.(data)) return false;
        await this.write(id, data, maxAge);
        return true;
      } finally {
        if (this.refreshTokens.get(id) === token) {
          this.refreshTokens.delete(id);
        }
      }
    });
    if (queued) {
      this.refreshTokens.set(id, token);
    }
  }

  private async write(id: string, data: T, maxAge: number): Promise<void> {
    const now = this.runtime.now();
    const previous = this.entries.get(id);
    const entry: CacheEntry<T> = {
      data,
      createdAt: now,
      maxAge,
      accessCount: (previous?.accessCount ?? 0) + 1,
      lastAccessed: now,
    };
    this.insert(id, entry);
    await this.persist(id, entry);
  }

  private insert(id: string, entry: CacheEntry<T>): void {
    this.entries.set(id, entry);
    if (this.entries.size > this.config.maxEntries) {
      this.evict(id);
    }
  }

  /**
   * Drop the coldest share of the category, ordered by access count and then
   * last access. The entry that triggered eviction is kept.
   */
  private evict(keepId: string): void {
    const count = Math.ceil(this.entries.size * EVICTION_FRACTION);
    const victims = [...this.entries.entries()]
      .filter(([id]) => id !== keepId)
      .sort(([, a], [, b]) => a.accessCount - b.accessCount || a.lastAccessed - b.lastAccessed)
      .slice(0, count);

    for (const [id] of victims) {
      this.entries.delete(id);
    }
    this.runtime.counters.evictions += victims.length;

    if (DEBUG_LOGS) {
      console.log(`🗑️ [SmartCache] Evicted ${victims.length} entries from ${this.category}`);
    }
  }

  private async remove(id: string): Promise<void> {
    this.entries.delete(id);
    const store = this.runtime.store;
    if (store && this.persistent) {
      await store.removeItem(`${DURABLE_PREFIX}${this.serialize(id)}`);
    }
  }

  private async hydrate(id: string): Promise<CacheEntry<T> | undefined> {
    const store = this.runtime.store;
    const revive = this.options.revive;
    if (!store || !revive || !this.persistent) return undefined;

    try {
      const raw = await store.getItem(`${DURABLE_PREFIX}${this.serialize(id)}`);
      // Filled by a concurrent caller while the record was being read
      const current = this.entries.get(id);
      if (current) return current;
      if (raw === null) return undefined;

      const record = parseDurableRecord(raw);
      const data = record ? revive(record.data) : undefined;
      if (!record || data === undefined) return undefined;

      const entry: CacheEntry<T> = {
        data,
        createdAt: record.createdAt,
        maxAge: record.maxAge,
        accessCount: record.accessCount,
        lastAccessed: Math.max(record.lastAccessed, record.createdAt),
      };
      this.insert(id, entry);
      return entry;
    } catch (error) {
      console.error(`[SmartCache] Failed to read durable record for ${this.describe(id)}:`, error);
      return undefined;
    }
  }

  private async persist(id: string, entry: CacheEntry<T>): Promise<void> {
    const store = this.runtime.store;
    if (!store || !this.persistent) return;

    try {
      await store.setItem(`${DURABLE_PREFIX}${this.serialize(id)}`, JSON.stringify(entry));
      await this.trimDurable(store);
    } catch (error) {
      console.error(`[SmartCache] Failed to persist ${this.describe(id)}:`, error);
    }
  }

  private async trimDurable(store: CacheStore): Promise<void> {
    const prefix = `${DURABLE_PREFIX}${this.serialize('')}`;
    const keys = (await store.getAllKeys()).filter((key) => key.startsWith(prefix));
    const excess = keys.length - this.config.maxPersistedEntries;
    if (excess <= 0) return;

    const records = await Promise.all(
      keys.map(async (key) => {
        const raw = await store.getItem(key);
        const record = raw === null ? undefined : parseDurableRecord(raw);
        return { key, lastAccessed: record?.lastAccessed ?? 0 };
      })
    );
    records.sort((a, b) => a.lastAccessed - b.lastAccessed);
    await Promise.all(records.slice(0, excess).map(({ key }) => store.removeItem(key)));
  }
}

export type CategoryCaches<P> = { [C in keyof P]: CategoryCache<P[C]> };

type CategoryName<P> = keyof P & string;

/**
 * Stale-while-revalidate cache over a fixed set of typed categories. Keys
 * carry their category, so each read is typed by the payload of that category.
 */
export class SmartCache<P extends object> {
  constructor(
    private readonly runtime: CacheRuntime,
    private readonly caches: CategoryCaches<P>
  ) {}

  init(): void {
    this.runtime.startSweep();
    if (DEBUG_LOGS) {
      console.log('✅ [SmartCache] Initialized');
    }
  }

  get<C extends CategoryName<P>>(key: CacheKey<C>, fetchFn: () => Promise<P[C]>, options?: GetOptions): Promise<P[C]> {
    return this.caches[key.category].get(key.id, fetchFn, options);
  }

  peek<C extends CategoryName<P>>(key: CacheKey<C>, options?: PeekOptions): P[C] | undefined {
    return this.caches[key.category].peek(key.id, options);
  }

  async invalidate<C extends CategoryName<P>>(target: CacheKey<C> | CacheKeyPattern<C>): Promise<void> {
    const cache = this.caches[target.category];
    if (isCacheKey(target)) {
      await cache.invalidate(target.id);
    } else {
      await cache.invalidatePrefix(target.idPrefix);
    }
  }

  async clear(): Promise<void> {
    await Promise.all(this.runtime.categories.map((category) => category.clear()));
  }

  /** Run one expiry sweep now; the periodic sweep does the same. */
  sweep(): number {
    return this.runtime.sweep();
  }

  getStats(): SmartCacheStats {
    const { counters } = this.runtime;
    const served = counters.hits + counters.staleResponses;
    const total = served + counters.misses;
    const categories: Record<string, number> = {};
    let size = 0;
    for (const category of this.runtime.categories) {
      categories[category.category] = category.size;
      size += category.size;
    }

    return {
      ...counters,
      hitRate: total > 0 ? Math.round((served / total) * 10000) / 100 : 0,
      size,
      categories,
      pendingRefreshes: this.runtime.pendingRefreshes,
    };
  }

  shutdown(): void {
    this.runtime.stop();
  }
}

export interface FeedCacheOptions extends CacheRuntimeOptions {
  overrides?: Partial<Record<CacheCategory, Partial<CacheTypeConfig>>>;
}

export type FeedCache = SmartCache<FeedCachePayloads>;

/**
 * The cache the feed uses for page, profile, ad and metadata payloads.
 */
export function createFeedCache(options: FeedCacheOptions = {}): FeedCache {
  const runtime = new CacheRuntime(options);
  const categories = createFeedCacheCategories(options.overrides);

  return new SmartCache<FeedCachePayloads>(runtime, {
    default: new CategoryCache('default', categories.default, runtime),
    'media-list': new CategoryCache('media-list', categories['media-list'], runtime),
    profile: new CategoryCache('profile', categories.profile, runtime),
    'ad-list': new CategoryCache('ad-list', categories['ad-list'], runtime),
    'media-metadata': new CategoryCache('media-metadata', categories['media-metadata'], runtime),
  });
}
