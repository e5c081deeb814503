import path from 'node:path';
import type { AxiosInstance } from 'axios';
import type { FeedSource, PlayerFactory } from '@/types';
import { createFeedApi, type FeedApi } from './api';
import { createApiClient } from './api-client';
import { DEBUG_LOGS, loadEngineConfig, type EngineConfig } from './config';
import { createAxiosTransport, type MediaTransport } from './media-transport';
import { createNetworkStatus, type NetworkStatusSignal } from './network-status';
import { createHttpProbe, NetworkQualityEstimator, type ThroughputProbe } from './network-quality-estimator';
import { PlaybackPool } from './playback-pool';
import { selectPreloadProfile, type PreloadProfile } from './preload-profiles';
import { PreloadScheduler } from './preload-scheduler';
import { ProgressiveFetchCache } from './progressive-fetch-cache';
import { createFeedCache, type FeedCache } from './smart-cache';
import { FileCacheStore, type CacheStore } from './utils/cache-store';
import { MediaFileStore } from './utils/media-file-store';

export interface MediaEngineOptions {
  playerFactory: PlayerFactory;
  feed: FeedSource;
  config?: EngineConfig;
  client?: AxiosInstance;
  networkStatus?: NetworkStatusSignal;
  probe?: ThroughputProbe;
  transport?: MediaTransport;
  cacheStore?: CacheStore;
  /** Fixed preload profile. Without one the profile follows device class and network tier. */
  profile?: PreloadProfile;
  getAuthToken?: () => Promise<string | null>;
}

/**
 * Composition root: builds every service once, wires them together and owns
 * their lifecycle.
 */
export class MediaEngine {
  readonly config: EngineConfig;
  readonly networkStatus: NetworkStatusSignal;
  readonly client: AxiosInstance;
  readonly estimator: NetworkQualityEstimator;
  readonly cache: FeedCache;
  readonly files: MediaFileStore;
  readonly fetchCache: ProgressiveFetchCache;
  readonly pool: PlaybackPool;
  readonly scheduler: PreloadScheduler;
  readonly api: FeedApi;

  private readonly fixedProfile?: PreloadProfile;
  private activeIndex: number | null = null;
  private unsubscribeTier: (() => void) | null = null;
  private started = false;

  constructor(options: MediaEngineOptions) {
    this.config = options.config ?? loadEngineConfig();
    this.networkStatus = options.networkStatus ?? createNetworkStatus();
    this.client =
      options.client ??
      createApiClient({
        baseURL: this.config.apiBaseUrl,
        networkStatus: this.networkStatus,
        getAuthToken: options.getAuthToken,
      });

    this.estimator = new NetworkQualityEstimator({
      probe: options.probe ?? createHttpProbe(this.client, this.config.probeUrl),
      networkStatus: this.networkStatus,
    });
    this.cache = createFeedCache({
      store: options.cacheStore ?? new FileCacheStore(path.join(this.config.cacheDir, 'records')),
    });
    this.files = new MediaFileStore(path.join(this.config.cacheDir, 'media'));
    this.fetchCache = new ProgressiveFetchCache({
      transport: options.transport ?? createAxiosTransport(this.client),
      files: this.files,
      tiers: this.estimator,
    });
    this.pool = new PlaybackPool({
      factory: options.playerFactory,
      fetchCache: this.fetchCache,
      capacity: this.config.poolCapacity,
      deviceClass: this.config.deviceClass,
    });

    this.fixedProfile = options.profile;
    this.scheduler = new PreloadScheduler({
      pool: this.pool,
      feed: options.feed,
      profile: options.profile ?? this.profileFor(),
    });
    this.api = createFeedApi({ client: this.client, cache: this.cache, baseUrl: this.config.apiBaseUrl });
  }

  async init(): Promise<void> {
    if (this.started) return;
    this.started = true;

    await this.files.init();
    this.cache.init();

    if (!this.fixedProfile) {
      this.unsubscribeTier = this.estimator.onTierChange(() => {
        this.scheduler.setProfile(this.profileFor());
      });
    }
    await this.estimator.start();

    if (DEBUG_LOGS) {
      console.log(`✅ [MediaEngine] Ready (${this.config.deviceClass}, tier ${this.estimator.currentTier})`);
    }
  }

  /**
   * The visible item changed: keep it pinned and re-plan preloading around it.
   */
  onViewportChanged(index: number): void {
    if (this.activeIndex !== null && this.activeIndex !== index) {
      this.pool.unpin([this.activeIndex]);
    }
    this.activeIndex = index;
    this.pool.pin([index]);
    this.scheduler.onViewportChanged(index);
  }

  shutdown(): void {
    this.unsubscribeTier?.();
    this.unsubscribeTier = null;
    this.scheduler.stop();
    this.pool.shutdown();
    this.fetchCache.shutdown();
    this.cache.shutdown();
    this.estimator.stop();
    this.started = false;

    if (DEBUG_LOGS) {
      console.log('👋 [MediaEngine] Shut down');
    }
  }

  private profileFor(): PreloadProfile {
    return selectPreloadProfile({ deviceClass: this.config.deviceClass, tier: this.estimator.currentTier });
  }
}

export function createMediaEngine(options: MediaEngineOptions): MediaEngine {
  return new MediaEngine(options);
}
