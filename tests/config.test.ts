import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { debugLogsEnabled, loadEngineConfig } from '@/lib/config';

describe('loadEngineConfig', () => {
  it('falls back to defaults', () => {
    expect(loadEngineConfig({})).toEqual({
      apiBaseUrl: 'http://localhost:3000',
      probeUrl: 'http://localhost:3000/api/network/probe',
      cacheDir: path.join(os.tmpdir(), 'feed-media-cache'),
      deviceClass: 'high-end',
      poolCapacity: 7,
    });
  });

  it('reads the environment', () => {
    expect(
      loadEngineConfig({
        API_BASE_URL: ' https://api.test/ ',
        MEDIA_PROBE_URL: 'https://probe.test/blob',
        MEDIA_CACHE_DIR: '/var/cache/feed',
        MEDIA_DEVICE_CLASS: 'low-end',
        MEDIA_POOL_CAPACITY: '4',
      })
    ).toEqual({
      apiBaseUrl: 'https://api.test',
      probeUrl: 'https://probe.test/blob',
      cacheDir: '/var/cache/feed',
      deviceClass: 'low-end',
      poolCapacity: 4,
    });
  });

  it('ignores malformed values', () => {
    const config = loadEngineConfig({ MEDIA_POOL_CAPACITY: '-2', MEDIA_DEVICE_CLASS: 'toaster' });
    expect(config).toMatchObject({ poolCapacity: 7, deviceClass: 'high-end' });
    expect(loadEngineConfig({ MEDIA_POOL_CAPACITY: '2.5' }).poolCapacity).toBe(7);
  });
});

describe('debugLogsEnabled', () => {
  it('turns on for 1 or true in any case', () => {
    expect(debugLogsEnabled({ MEDIA_DEBUG_LOGS: '1' })).toBe(true);
    expect(debugLogsEnabled({ MEDIA_DEBUG_LOGS: 'TRUE' })).toBe(true);
    expect(debugLogsEnabled({ MEDIA_DEBUG_LOGS: 'yes' })).toBe(false);
    expect(debugLogsEnabled({})).toBe(false);
  });
});
