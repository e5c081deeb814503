// @vitest-environment jsdom
import { renderHook, waitFor } from '@testing-library/react';
import { describe, expect, it } from 'vitest';
import type { FeedSource, MediaItem } from '@/types';
import { useFeedPreload } from '@/lib/hooks/use-feed-preload';
import { PlaybackResource } from '@/lib/playback-resource';
import { PreloadScheduler, type PreloadTarget } from '@/lib/preload-scheduler';
import { FakePlayer, makeItem } from '../helpers/fakes';

const createScheduler = (count: number) => {
  const items = Array.from({ length: count }, (_, i) => makeItem(`m${i}`));
  const feed: FeedSource = { itemCount: () => items.length, itemAt: (index) => items[index] };
  const acquired: number[] = [];
  const pool: PreloadTarget = {
    acquire: async (index: number, item: MediaItem) => {
      acquired.push(index);
      const player = new FakePlayer({ uri: item.url, mediaId: item.id });
      return new PlaybackResource({ index, mediaId: item.id, url: item.url, player });
    },
  };
  return { scheduler: new PreloadScheduler({ pool, feed }), acquired };
};

describe('useFeedPreload', () => {
  it('reports the active index and exposes scheduler progress', async () => {
    const { scheduler, acquired } = createScheduler(3);
    const { result, rerender } = renderHook(({ index }) => useFeedPreload(scheduler, index), {
      initialProps: { index: 0 },
    });

    await waitFor(() => expect(result.current.completed).toBe(2));
    expect(acquired).toEqual([0, 1]);

    rerender({ index: 1 });
    await waitFor(() => expect(result.current.completed).toBe(5));
    expect(result.current.epoch).toBe(2);

    rerender({ index: 1 });
    expect(scheduler.currentEpoch).toBe(2);
  });

  it('does nothing while disabled', () => {
    const { scheduler, acquired } = createScheduler(3);
    renderHook(() => useFeedPreload(scheduler, 0, { enabled: false }));

    expect(acquired).toEqual([]);
    expect(scheduler.currentEpoch).toBe(0);
  });

  it('stops preloading when the feed unmounts', async () => {
    const { scheduler } = createScheduler(3);
    const { result, unmount } = renderHook(() => useFeedPreload(scheduler, 0));
    await waitFor(() => expect(result.current.completed).toBe(2));

    unmount();

    expect(scheduler.currentEpoch).toBe(2);
  });
});
