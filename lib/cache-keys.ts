import type { AdList, MediaItem, MediaPage, ProfileDocument } from '@/types';
import { isAdList, isMediaItem, isMediaPage, isProfileDocument } from './utils/payload-guards';

export const CacheCategory = {
  Default: 'default',
  MediaList: 'media-list',
  Profile: 'profile',
  AdList: 'ad-list',
  MediaMetadata: 'media-metadata',
} as const;

export type CacheCategory = (typeof CacheCategory)[keyof typeof CacheCategory];

export interface CacheKey<C extends string = CacheCategory> {
  category: C;
  id: string;
}

export interface CacheKeyPattern<C extends string = CacheCategory> {
  category: C;
  idPrefix?: string;
}

export const cacheKey = <C extends string>(category: C, ...parts: Array<string | number>): CacheKey<C> => ({
  category,
  id: parts.join(':'),
});

export const serializeCacheKey = (key: CacheKey<string>): string => `${key.category}/${key.id}`;

export const isCacheKey = <C extends string>(target: CacheKey<C> | CacheKeyPattern<C>): target is CacheKey<C> =>
  'id' in target;

export const matchesPattern = (key: CacheKey<string>, pattern: CacheKeyPattern<string>): boolean =>
  key.category === pattern.category && (pattern.idPrefix === undefined || key.id.startsWith(pattern.idPrefix));

export interface CacheTypeConfig {
  maxAgeMs: number;
  maxEntries: number;
  staleWhileRevalidate: boolean;
  /** How long past maxAge an entry may still be served while it refreshes. */
  staleWindowMs: number;
  /** Write entries to the durable store; needs a `revive` on the category. */
  persist: boolean;
  /** Cap on durable records for the category. */
  maxPersistedEntries: number;
}

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

export const CACHE_TYPE_CONFIGS: Readonly<Record<CacheCategory, CacheTypeConfig>> = {
  default: {
    maxAgeMs: 10 * MINUTE,
    maxEntries: 50,
    staleWhileRevalidate: true,
    staleWindowMs: 2 * MINUTE,
    persist: false,
    maxPersistedEntries: 0,
  },
  'media-list': {
    maxAgeMs: 60 * MINUTE,
    maxEntries: 150,
    staleWhileRevalidate: true,
    staleWindowMs: 2 * MINUTE,
    persist: true,
    maxPersistedEntries: 20,
  },
  profile: {
    maxAgeMs: 24 * HOUR,
    maxEntries: 40,
    staleWhileRevalidate: true,
    staleWindowMs: 2 * MINUTE,
    persist: true,
    maxPersistedEntries: 40,
  },
  'ad-list': {
    maxAgeMs: 30 * MINUTE,
    maxEntries: 60,
    staleWhileRevalidate: true,
    staleWindowMs: 2 * MINUTE,
    persist: false,
    maxPersistedEntries: 0,
  },
  'media-metadata': {
    maxAgeMs: 2 * HOUR,
    maxEntries: 200,
    staleWhileRevalidate: true,
    staleWindowMs: 2 * MINUTE,
    persist: false,
    maxPersistedEntries: 0,
  },
};

/** Fraction of a category's coldest entries dropped when it exceeds capacity. */
export const EVICTION_FRACTION = 0.3;

export interface CategoryOptions<T> {
  config: CacheTypeConfig;
  /** Payloads that stand for a transient empty state and must not be cached. */
  isPlaceholder?: (payload: T) => boolean;
  /** Turns a durable record back into a payload; categories without it stay in memory. */
  revive?: (raw: unknown) => T | undefined;
}

export type CategoryTable<P> = { [C in keyof P]: CategoryOptions<P[C]> };

export type FeedCachePayloads = {
  default: unknown;
  'media-list': MediaPage;
  profile: ProfileDocument;
  'ad-list': AdList;
  'media-metadata': MediaItem;
};

export const isEmptyMediaPage = (page: MediaPage): boolean => page.items.length === 0;

const reviveWith =
  <T>(guard: (value: unknown) => value is T) =>
  (raw: unknown): T | undefined =>
    guard(raw) ? raw : undefined;

export function createFeedCacheCategories(
  overrides: Partial<Record<CacheCategory, Partial<CacheTypeConfig>>> = {}
): CategoryTable<FeedCachePayloads> {
  const config = (category: CacheCategory): CacheTypeConfig => ({
    ...CACHE_TYPE_CONFIGS[category],
    ...overrides[category],
  });

  return {
    default: { config: config('default') },
    'media-list': {
      config: config('media-list'),
      isPlaceholder: isEmptyMediaPage,
      revive: reviveWith(isMediaPage),
    },
    profile: {
      config: config('profile'),
      revive: reviveWith(isProfileDocument),
    },
    'ad-list': {
      config: config('ad-list'),
      revive: reviveWith(isAdList),
    },
    'media-metadata': {
      config: config('media-metadata'),
      revive: reviveWith(isMediaItem),
    },
  };
}
