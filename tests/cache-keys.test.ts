import { describe, expect, it } from 'vitest';
import {
  CACHE_TYPE_CONFIGS,
  cacheKey,
  createFeedCacheCategories,
  isCacheKey,
  matchesPattern,
  serializeCacheKey,
} from '@/lib/cache-keys';
import { makeItem } from './helpers/fakes';

describe('cache keys', () => {
  it('joins id parts and serializes with the category', () => {
    const key = cacheKey('media-list', 'feed', 2, 10);
    expect(key).toEqual({ category: 'media-list', id: 'feed:2:10' });
    expect(serializeCacheKey(key)).toBe('media-list/feed:2:10');
  });

  it('tells keys from patterns and matches prefixes', () => {
    const key = cacheKey('profile', 'u1');
    expect(isCacheKey(key)).toBe(true);
    expect(isCacheKey({ category: 'profile' })).toBe(false);
    expect(matchesPattern(key, { category: 'profile' })).toBe(true);
    expect(matchesPattern(key, { category: 'profile', idPrefix: 'u' })).toBe(true);
    expect(matchesPattern(key, { category: 'profile', idPrefix: 'x' })).toBe(false);
    expect(matchesPattern(key, { category: 'ad-list' })).toBe(false);
  });
});

describe('createFeedCacheCategories', () => {
  it('applies overrides on top of the category defaults', () => {
    const categories = createFeedCacheCategories({ profile: { maxEntries: 5 } });
    expect(categories.profile.config).toEqual({ ...CACHE_TYPE_CONFIGS.profile, maxEntries: 5 });
    expect(categories['media-list'].config).toEqual(CACHE_TYPE_CONFIGS['media-list']);
  });

  it('treats an empty media page as a placeholder', () => {
    const { isPlaceholder } = createFeedCacheCategories()['media-list'];
    expect(isPlaceholder?.({ items: [], page: 1, hasMore: false })).toBe(true);
    expect(isPlaceholder?.({ items: [makeItem('a')], page: 1, hasMore: false })).toBe(false);
  });

  it('revives only payloads of the right shape', () => {
    const { revive } = createFeedCacheCategories()['media-metadata'];
    const item = makeItem('a');
    expect(revive?.(JSON.parse(JSON.stringify(item)))).toEqual(item);
    expect(revive?.({ id: 'a' })).toBeUndefined();
    expect(createFeedCacheCategories().default.revive).toBeUndefined();
  });
});
