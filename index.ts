export * from './types';

export { loadEngineConfig, type EngineConfig } from './lib/config';
export {
  MediaEngineError,
  TimeoutError,
  NetworkError,
  UnsupportedFormatError,
  CapacityOverflowError,
  StaleFetchError,
  isStaleFetch,
  type MediaEngineErrorCode,
} from './lib/errors';
export { SimpleEventEmitter } from './lib/simple-event-emitter';
export { createNetworkStatus, type NetworkStatus, type NetworkStatusSignal, type LinkType } from './lib/network-status';
export { createApiClient, type ApiClientOptions } from './lib/api-client';
export { createAxiosTransport, type MediaTransport, type TransportResponse } from './lib/media-transport';

export {
  NetworkQualityEstimator,
  TIER_SIZING,
  DEFAULT_THRESHOLDS,
  chunkSizeFor,
  initialBufferFor,
  classifyThroughput,
  createHttpProbe,
  type ThroughputProbe,
  type TierChange,
  type TierThresholds,
} from './lib/network-quality-estimator';

export {
  CacheCategory,
  CACHE_TYPE_CONFIGS,
  cacheKey,
  createFeedCacheCategories,
  isEmptyMediaPage,
  type CacheKey,
  type CacheKeyPattern,
  type CacheTypeConfig,
  type CategoryOptions,
  type FeedCachePayloads,
} from './lib/cache-keys';
export {
  SmartCache,
  CategoryCache,
  CacheRuntime,
  createFeedCache,
  type CacheEntry,
  type FeedCache,
  type GetOptions,
  type SmartCacheStats,
} from './lib/smart-cache';
export { FileCacheStore, MemoryCacheStore, type CacheStore } from './lib/utils/cache-store';

export { ProgressiveStream } from './lib/progressive-stream';
export { ProgressiveFetchCache, type ProgressiveFetchStats, type TierSource } from './lib/progressive-fetch-cache';
export { MediaFileReader, MediaFileStore } from './lib/utils/media-file-store';
export { buildFallbackChain, canonicalUrl, minimalQualityVariant, reducedQualityVariant } from './lib/utils/url-fallback';

export { PlaybackResource, type PlaybackHandle, type StateChange } from './lib/playback-resource';
export { PlaybackPool, INIT_TIMEOUTS, type AcquireOptions, type PlaybackPoolStats } from './lib/playback-pool';
export { PRELOAD_PROFILES, selectPreloadProfile, type PreloadProfile } from './lib/preload-profiles';
export { PreloadScheduler, type PreloadSchedulerStats, type PreloadTask } from './lib/preload-scheduler';

export { MediaEngine, createMediaEngine, type MediaEngineOptions } from './lib/media-engine';
export { createFeedApi, type FeedApi } from './lib/api';
export { getFileUrl, rankPlaybackUrls, toMediaItem, type RawPost } from './lib/utils/file-url';

export { useNetworkQuality } from './lib/hooks/use-network-quality';
export { useFeedPreload } from './lib/hooks/use-feed-preload';
