import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { FeedSource } from '@/types';
import { createApiClient } from '@/lib/api-client';
import type { EngineConfig } from '@/lib/config';
import { createMediaEngine, type MediaEngine } from '@/lib/media-engine';
import { createNetworkStatus } from '@/lib/network-status';
import { PRELOAD_PROFILES } from '@/lib/preload-profiles';
import { MemoryCacheStore } from '@/lib/utils/cache-store';
import { FakePlayerFactory, FakeTransport, fakeAdapter, makeItem } from './helpers/fakes';

// Large enough to classify as high whatever the measured elapsed time
const fastProbe = async () => 100 * 1024 * 1024;

const createFeed = (count: number): FeedSource => {
  const items = Array.from({ length: count }, (_, i) => makeItem(`m${i}`));
  return { itemCount: () => items.length, itemAt: (index) => items[index] };
};

describe('MediaEngine', () => {
  let directory: string;
  let config: EngineConfig;
  let engine: MediaEngine | undefined;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'engine-'));
    config = {
      apiBaseUrl: 'http://api.test',
      probeUrl: 'http://api.test/api/network/probe',
      cacheDir: directory,
      deviceClass: 'high-end',
      poolCapacity: 7,
    };
  });

  afterEach(async () => {
    engine?.shutdown();
    engine = undefined;
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('measures the network on init and preloads around the visible item', async () => {
    const factory = new FakePlayerFactory();
    engine = createMediaEngine({
      playerFactory: factory,
      feed: createFeed(6),
      config,
      probe: fastProbe,
      transport: new FakeTransport({}),
      cacheStore: new MemoryCacheStore(),
    });

    await engine.init();
    expect(engine.estimator.currentTier).toBe('high');
    expect(engine.scheduler.currentProfile).toBe(PRELOAD_PROFILES.aggressive);

    engine.onViewportChanged(1);
    await vi.waitFor(() => expect(engine?.pool.getStats().indices).toEqual([0, 1, 2, 3, 4]));
    expect(engine.pool.getStats().pinned).toEqual([1]);

    engine.onViewportChanged(2);
    expect(engine.pool.getStats().pinned).toEqual([2]);
  });

  it('drops to the lite profile when the network goes away', async () => {
    const networkStatus = createNetworkStatus();
    engine = createMediaEngine({
      playerFactory: new FakePlayerFactory(),
      feed: createFeed(3),
      config,
      networkStatus,
      probe: fastProbe,
      transport: new FakeTransport({}),
      cacheStore: new MemoryCacheStore(),
    });
    await engine.init();

    networkStatus.reportOffline({ source: 'test' });

    expect(engine.estimator.currentTier).toBe('very-low');
    expect(engine.scheduler.currentProfile).toBe(PRELOAD_PROFILES.lite);
  });

  it('keeps a fixed profile regardless of the network', async () => {
    const networkStatus = createNetworkStatus();
    engine = createMediaEngine({
      playerFactory: new FakePlayerFactory(),
      feed: createFeed(3),
      config,
      networkStatus,
      probe: fastProbe,
      transport: new FakeTransport({}),
      cacheStore: new MemoryCacheStore(),
      profile: PRELOAD_PROFILES.balanced,
    });
    await engine.init();

    networkStatus.reportOffline({ source: 'test' });

    expect(engine.scheduler.currentProfile).toBe(PRELOAD_PROFILES.balanced);
  });

  it('reads the feed through the metadata cache', async () => {
    const adapter = fakeAdapter(() => ({
      data: { status: 'success', data: { posts: [{ id: 1, video_url: '/uploads/1.mp4' }] } },
    }));
    engine = createMediaEngine({
      playerFactory: new FakePlayerFactory(),
      feed: createFeed(0),
      config,
      client: createApiClient({ baseURL: config.apiBaseUrl, adapter }),
      probe: fastProbe,
      transport: new FakeTransport({}),
      cacheStore: new MemoryCacheStore(),
    });
    await engine.init();

    const page = await engine.api.getFeedPage(1, 1);
    await engine.api.getFeedPage(1, 1);

    expect(page.items.map((item) => item.url)).toEqual(['http://api.test/uploads/1.mp4']);
    expect(adapter).toHaveBeenCalledTimes(1);
    expect(engine.cache.getStats()).toMatchObject({ hits: 1, misses: 1 });
  });

  it('releases everything on shutdown', async () => {
    const factory = new FakePlayerFactory();
    const started = createMediaEngine({
      playerFactory: factory,
      feed: createFeed(2),
      config,
      probe: fastProbe,
      transport: new FakeTransport({}),
      cacheStore: new MemoryCacheStore(),
    });
    await started.init();
    started.onViewportChanged(0);
    await vi.waitFor(() => expect(started.pool.size).toBe(2));

    started.shutdown();

    expect(started.pool.size).toBe(0);
    expect(started.estimator.isMonitoring).toBe(false);
    expect(factory.players.every((player) => player.calls.includes('release'))).toBe(true);
  });
});
