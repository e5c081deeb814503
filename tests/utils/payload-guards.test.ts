import { describe, expect, it } from 'vitest';
import { isAdList, isMediaItem, isMediaPage, isProfileDocument } from '@/lib/utils/payload-guards';
import { makeItem } from '../helpers/fakes';

describe('payload guards', () => {
  it('accepts well-formed media items and pages', () => {
    expect(isMediaItem(makeItem('a'))).toBe(true);
    expect(isMediaItem({ ...makeItem('a'), streamType: undefined })).toBe(true);
    expect(isMediaPage({ items: [makeItem('a')], page: 1, hasMore: true })).toBe(true);
  });

  it('rejects malformed media items and pages', () => {
    expect(isMediaItem({ ...makeItem('a'), streamType: 'dash' })).toBe(false);
    expect(isMediaItem({ ...makeItem('a'), fallbackUrls: [1] })).toBe(false);
    expect(isMediaItem([makeItem('a')])).toBe(false);
    expect(isMediaPage({ items: [{ id: 'a' }], page: 1, hasMore: true })).toBe(false);
    expect(isMediaPage({ items: [], page: '1', hasMore: true })).toBe(false);
  });

  it('checks profiles and ad lists', () => {
    expect(isProfileDocument({ id: 'u1', username: 'sample-user', mediaIds: ['a'] })).toBe(true);
    expect(isProfileDocument({ id: 'u1', mediaIds: [] })).toBe(false);
    expect(isAdList({ items: [{ id: '1', mediaUrl: 'https://cdn.test/ad.mp4', placement: 'feed' }] })).toBe(true);
    expect(isAdList({ items: [{ id: '1', placement: 'feed' }] })).toBe(false);
    expect(isAdList(null)).toBe(false);
  });
});
