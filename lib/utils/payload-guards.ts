import type { AdCreative, AdList, MediaItem, MediaPage, ProfileDocument } from '@/types';

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

export const isMediaItem = (value: unknown): value is MediaItem =>
  isRecord(value) &&
  typeof value.id === 'string' &&
  typeof value.url === 'string' &&
  isStringArray(value.fallbackUrls) &&
  typeof value.durationMs === 'number' &&
  typeof value.aspectRatio === 'number' &&
  (value.streamType === undefined || value.streamType === 'hls' || value.streamType === 'raw');

export const isMediaPage = (value: unknown): value is MediaPage =>
  isRecord(value) &&
  Array.isArray(value.items) &&
  value.items.every(isMediaItem) &&
  typeof value.page === 'number' &&
  typeof value.hasMore === 'boolean';

export const isProfileDocument = (value: unknown): value is ProfileDocument =>
  isRecord(value) &&
  typeof value.id === 'string' &&
  typeof value.username === 'string' &&
  isStringArray(value.mediaIds);

const isAdCreative = (value: unknown): value is AdCreative =>
  isRecord(value) &&
  typeof value.id === 'string' &&
  typeof value.mediaUrl === 'string' &&
  typeof value.placement === 'string';

export const isAdList = (value: unknown): value is AdList =>
  isRecord(value) && Array.isArray(value.items) && value.items.every(isAdCreative);
