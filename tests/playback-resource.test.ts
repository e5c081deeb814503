import { afterEach, describe, expect, it, vi } from 'vitest';
import { TimeoutError } from '@/lib/errors';
import { PlaybackResource, canTransition, type StateChange } from '@/lib/playback-resource';
import { FakePlayer, deferred } from './helpers/fakes';

const createResource = (loader?: () => Promise<void>, onDispose?: () => void) => {
  const player = new FakePlayer({ uri: 'https://cdn.test/a.m3u8', mediaId: 'a' }, loader);
  const resource = new PlaybackResource({ index: 0, mediaId: 'a', url: player.source.uri, player, onDispose });
  return { player, resource };
};

describe('canTransition', () => {
  it('follows the playback lifecycle', () => {
    expect(canTransition('uninitialized', 'initializing')).toBe(true);
    expect(canTransition('initializing', 'ready')).toBe(true);
    expect(canTransition('ready', 'playing')).toBe(true);
    expect(canTransition('paused', 'playing')).toBe(true);
    expect(canTransition('error', 'disposed')).toBe(true);
    expect(canTransition('uninitialized', 'playing')).toBe(false);
    expect(canTransition('error', 'ready')).toBe(false);
    expect(canTransition('disposed', 'initializing')).toBe(false);
  });
});

describe('PlaybackResource', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('moves through initializing to ready and reports each change', async () => {
    const { resource, player } = createResource();
    const changes: StateChange[] = [];
    resource.onStateChange((change) => changes.push(change));

    await resource.initialize(1000);

    expect(resource.state).toBe('ready');
    expect(resource.isUsable).toBe(true);
    expect(player.calls).toEqual(['load']);
    expect(changes).toEqual([
      { previous: 'uninitialized', current: 'initializing' },
      { previous: 'initializing', current: 'ready' },
    ]);
  });

  it('plays and pauses only from states that allow it', async () => {
    const { resource, player } = createResource();
    resource.play();
    expect(resource.state).toBe('uninitialized');

    await resource.initialize(1000);
    resource.pause();
    resource.play();
    resource.pause();
    resource.play();

    expect(resource.state).toBe('playing');
    expect(player.calls).toEqual(['load', 'play', 'pause', 'play']);
  });

  it('waits for the extra readiness signal and fails with it', async () => {
    const { resource } = createResource();

    await expect(resource.initialize(1000, Promise.reject(new Error('stream failed')))).rejects.toThrow(
      'stream failed'
    );
    expect(resource.state).toBe('error');
    expect(resource.isUsable).toBe(false);
  });

  it('gives up when the player does not load in time', async () => {
    vi.useFakeTimers();
    const { resource } = createResource(() => new Promise<void>(() => undefined));

    const result = resource.initialize(500).catch((error: unknown) => error);
    await vi.advanceTimersByTimeAsync(500);

    const error = await result;
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ timeoutMs: 500 });
    expect(resource.state).toBe('error');
  });

  it('silences and releases the player exactly once', async () => {
    const onDispose = vi.fn();
    const { resource, player } = createResource(undefined, onDispose);
    await resource.initialize(1000);
    resource.play();

    resource.dispose();
    resource.dispose();

    expect(player.calls).toEqual(['load', 'play', 'pause', 'release']);
    expect(player.volume).toBe(0);
    expect(player.muted).toBe(true);
    expect(onDispose).toHaveBeenCalledTimes(1);
    expect(resource.state).toBe('disposed');
    expect(resource.isUsable).toBe(false);
  });

  it('stays disposed when disposal interrupts initialization', async () => {
    const load = deferred();
    const { resource } = createResource(() => load.promise);

    const initializing = resource.initialize(1000);
    resource.dispose();
    load.resolve();
    await initializing;

    expect(resource.state).toBe('disposed');
  });

  it('keeps disposing when the player throws', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const onDispose = vi.fn();
    const { resource, player } = createResource(undefined, onDispose);
    player.release = () => {
      throw new Error('native crash');
    };

    resource.dispose();

    expect(onDispose).toHaveBeenCalledTimes(1);
    expect(resource.state).toBe('disposed');
    expect(warn).toHaveBeenCalledWith('[PlaybackPool] Failed to dispose player for a:', 'native crash');
  });
});
