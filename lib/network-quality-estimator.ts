import type { AxiosInstance } from 'axios';
import type { QualityTier } from '@/types';
import { DEBUG_LOGS } from './config';
import type { NetworkStatusSignal } from './network-status';
import { SimpleEventEmitter } from './simple-event-emitter';
import { withTimeout } from './utils/with-timeout';

const KIB = 1024;
const MIB = 1024 * KIB;

export interface TierSizing {
  chunkSize: number;
  initialBuffer: number;
}

export const TIER_SIZING: Readonly<Record<QualityTier, TierSizing>> = {
  high: { chunkSize: 128 * KIB, initialBuffer: 2 * MIB },
  medium: { chunkSize: 64 * KIB, initialBuffer: 1 * MIB },
  low: { chunkSize: 32 * KIB, initialBuffer: 512 * KIB },
  'very-low': { chunkSize: 16 * KIB, initialBuffer: 256 * KIB },
};

/** Ascending throughput thresholds in KiB/s. */
export interface TierThresholds {
  high: number;
  medium: number;
  low: number;
}

export const DEFAULT_THRESHOLDS: TierThresholds = {
  high: 1000,
  medium: 500,
  low: 100,
};

export const chunkSizeFor = (tier: QualityTier): number => TIER_SIZING[tier].chunkSize;

export const initialBufferFor = (tier: QualityTier): number => TIER_SIZING[tier].initialBuffer;

export function classifyThroughput(kibPerSecond: number, thresholds: TierThresholds = DEFAULT_THRESHOLDS): QualityTier {
  if (kibPerSecond >= thresholds.high) return 'high';
  if (kibPerSecond >= thresholds.medium) return 'medium';
  if (kibPerSecond >= thresholds.low) return 'low';
  return 'very-low';
}

/** Downloads the probe payload and resolves with the number of bytes received. */
export type ThroughputProbe = () => Promise<number>;

export function createHttpProbe(client: AxiosInstance, probeUrl: string): ThroughputProbe {
  return async () => {
    const response = await client.get<ArrayBuffer>(probeUrl, {
      responseType: 'arraybuffer',
      headers: { 'Cache-Control': 'no-cache' },
    });
    return response.data.byteLength;
  };
}

export interface TierChange {
  previous: QualityTier;
  current: QualityTier;
  speed: number;
}

interface EstimatorEvents {
  'tier-change': TierChange;
}

export interface NetworkQualityEstimatorOptions {
  probe: ThroughputProbe;
  thresholds?: TierThresholds;
  probeTimeoutMs?: number;
  intervalMs?: number;
  networkStatus?: NetworkStatusSignal;
  now?: () => number;
}

/**
 * Classifies recent throughput into a quality tier. A failed probe counts as
 * evidence of a bad network and drops straight to the lowest tier.
 */
export class NetworkQualityEstimator {
  private readonly probe: ThroughputProbe;
  private readonly thresholds: TierThresholds;
  private readonly probeTimeoutMs: number;
  private readonly intervalMs: number;
  private readonly networkStatus?: NetworkStatusSignal;
  private readonly now: () => number;
  private readonly events = new SimpleEventEmitter<EstimatorEvents>();

  private tier: QualityTier = 'high';
  private speed = 0;
  private measuredAt: number | null = null;
  private inFlight: Promise<QualityTier> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private unsubscribeStatus: (() => void) | null = null;

  constructor(options: NetworkQualityEstimatorOptions) {
    this.probe = options.probe;
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 5000;
    this.intervalMs = options.intervalMs ?? 30000;
    this.networkStatus = options.networkStatus;
    this.now = options.now ?? Date.now;
  }

  get currentTier(): QualityTier {
    return this.tier;
  }

  /** Last measured throughput in KiB/s. */
  get currentSpeed(): number {
    return this.speed;
  }

  get lastMeasuredAt(): number | null {
    return this.measuredAt;
  }

  get isSlowNetwork(): boolean {
    return this.tier === 'low' || this.tier === 'very-low';
  }

  get isMonitoring(): boolean {
    return this.timer !== null;
  }

  chunkSizeFor(tier: QualityTier = this.tier): number {
    return chunkSizeFor(tier);
  }

  initialBufferFor(tier: QualityTier = this.tier): number {
    return initialBufferFor(tier);
  }

  onTierChange(listener: (change: TierChange) => void): () => void {
    return this.events.on('tier-change', listener);
  }

  /**
   * Run one probe and reclassify. Concurrent callers share the same probe.
   */
  measure(): Promise<QualityTier> {
    if (!this.inFlight) {
      this.inFlight = this.runProbe().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  start(): Promise<QualityTier> {
    if (!this.timer) {
      this.timer = setInterval(() => this.remeasure('interval'), this.intervalMs);
    }

    if (this.networkStatus && !this.unsubscribeStatus) {
      this.unsubscribeStatus = this.networkStatus.subscribe((status, meta) => {
        if (meta?.source === 'subscribe') return;
        if (status === 'offline') {
          this.speed = 0;
          this.apply('very-low');
        } else {
          this.remeasure('connectivity');
        }
      });
    }

    return this.measure();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.unsubscribeStatus?.();
    this.unsubscribeStatus = null;
  }

  private remeasure(reason: string): void {
    if (DEBUG_LOGS) {
      console.log(`🌐 [Estimator] Re-measuring (${reason})`);
    }
    this.measure().catch((error: unknown) => {
      console.error('[Estimator] Unexpected measurement failure:', error);
    });
  }

  private async runProbe(): Promise<QualityTier> {
    const startedAt = this.now();
    try {
      const bytes = await withTimeout(this.probe(), this.probeTimeoutMs, 'Network probe');
      const elapsedSeconds = Math.max(this.now() - startedAt, 1) / 1000;
      this.speed = bytes / KIB / elapsedSeconds;
      this.measuredAt = this.now();
      this.apply(classifyThroughput(this.speed, this.thresholds));

      if (DEBUG_LOGS) {
        console.log(`🌐 [Estimator] Speed: ${this.speed.toFixed(1)} KiB/s, tier: ${this.tier}`);
      }
    } catch (error) {
      // Failure is treated as a bad network, not as "unknown"
      this.speed = 0;
      this.measuredAt = this.now();
      this.apply('very-low');
      console.warn('[Estimator] Probe failed, assuming very-low tier:', error instanceof Error ? error.message : error);
    }

    return this.tier;
  }

  private apply(next: QualityTier): void {
    const previous = this.tier;
    this.tier = next;
    if (previous !== next) {
      this.events.emit('tier-change', { previous, current: next, speed: this.speed });
    }
  }
}
