import os from 'node:os';
import path from 'node:path';
import type { DeviceClass } from '@/types';

export interface EngineConfig {
  apiBaseUrl: string;
  probeUrl: string;
  cacheDir: string;
  deviceClass: DeviceClass;
  poolCapacity: number;
}

type Env = Record<string, string | undefined>;

const DEFAULT_API_BASE_URL = 'http://localhost:3000';
const DEFAULT_POOL_CAPACITY = 7;

const parseFlag = (value: string | undefined): boolean =>
  value === '1' || value?.toLowerCase() === 'true';

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

const parseDeviceClass = (value: string | undefined): DeviceClass =>
  value === 'low-end' ? 'low-end' : 'high-end';

const stripTrailingSlash = (url: string): string => url.replace(/\/+$/, '');

/**
 * Read engine settings from the environment, falling back to defaults for
 * anything missing or malformed.
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const apiBaseUrl = stripTrailingSlash(env.API_BASE_URL?.trim() || DEFAULT_API_BASE_URL);

  return {
    apiBaseUrl,
    probeUrl: env.MEDIA_PROBE_URL?.trim() || `${apiBaseUrl}/api/network/probe`,
    cacheDir: env.MEDIA_CACHE_DIR?.trim() || path.join(os.tmpdir(), 'feed-media-cache'),
    deviceClass: parseDeviceClass(env.MEDIA_DEVICE_CLASS),
    poolCapacity: parsePositiveInt(env.MEDIA_POOL_CAPACITY, DEFAULT_POOL_CAPACITY),
  };
}

export const API_BASE_URL = loadEngineConfig().apiBaseUrl;

export const debugLogsEnabled = (env: Env = process.env): boolean => parseFlag(env.MEDIA_DEBUG_LOGS);

// Verbose progress logs for the whole process, off unless MEDIA_DEBUG_LOGS is set
export const DEBUG_LOGS = debugLogsEnabled();
