import type { FeedSource, MediaItem } from '@/types';
import { DEBUG_LOGS } from './config';
import { isStaleFetch } from './errors';
import type { AcquireOptions } from './playback-pool';
import type { PlaybackHandle } from './playback-resource';
import { PRELOAD_PROFILES, type PreloadProfile } from './preload-profiles';
import { SimpleEventEmitter } from './simple-event-emitter';

export interface PreloadTask {
  index: number;
  item: MediaItem;
  /** 0 is the visible item; lower runs first. */
  priority: number;
  epoch: number;
}

/** The part of the playback pool the scheduler drives. */
export interface PreloadTarget {
  acquire(index: number, item: MediaItem, options?: AcquireOptions): Promise<PlaybackHandle>;
}

export interface PreloadSchedulerOptions {
  pool: PreloadTarget;
  feed: FeedSource;
  profile?: PreloadProfile;
}

export interface PreloadedEvent {
  index: number;
  mediaId: string;
  epoch: number;
}

export interface PreloadFailedEvent {
  index: number;
  mediaId: string;
  error: unknown;
}

interface SchedulerEvents {
  preloaded: PreloadedEvent;
  failed: PreloadFailedEvent;
}

export interface PreloadSchedulerStats {
  epoch: number;
  profile: string;
  inFlight: number[];
  queued: number;
  dispatched: number;
  completed: number;
  failed: number;
  discarded: number;
}

/**
 * Decides which feed items to prepare around the visible one. Every viewport
 * change starts a new epoch; work from older epochs is dropped before it runs
 * and discarded if it finishes late.
 */
export class PreloadScheduler {
  private readonly pool: PreloadTarget;
  private readonly feed: FeedSource;
  private readonly events = new SimpleEventEmitter<SchedulerEvents>();
  private profile: PreloadProfile;
  private epoch = 0;
  private queue: PreloadTask[] = [];
  private readonly inFlight = new Set<number>();
  private readonly counters = { dispatched: 0, completed: 0, failed: 0, discarded: 0 };

  constructor(options: PreloadSchedulerOptions) {
    this.pool = options.pool;
    this.feed = options.feed;
    this.profile = options.profile ?? PRELOAD_PROFILES.lite;
  }

  get currentEpoch(): number {
    return this.epoch;
  }

  get currentProfile(): PreloadProfile {
    return this.profile;
  }

  on<K extends keyof SchedulerEvents>(event: K, listener: (payload: SchedulerEvents[K]) => void): () => void {
    return this.events.on(event, listener);
  }

  onViewportChanged(index: number): void {
    this.epoch++;
    this.queue = this.buildTasks(index, this.epoch);

    if (DEBUG_LOGS) {
      console.log(`🎯 [Preload] Viewport ${index}, epoch ${this.epoch}, ${this.queue.length} candidates (${this.profile.name})`);
    }
    this.pump();
  }

  setProfile(profile: PreloadProfile): void {
    this.profile = profile;
    this.pump();
  }

  /** Drop queued work and make everything in flight stale. */
  stop(): void {
    this.epoch++;
    this.queue = [];
  }

  getStats(): PreloadSchedulerStats {
    return {
      epoch: this.epoch,
      profile: this.profile.name,
      inFlight: [...this.inFlight].sort((a, b) => a - b),
      queued: this.queue.length,
      ...this.counters,
    };
  }

  private buildTasks(current: number, epoch: number): PreloadTask[] {
    const { ahead, behind } = this.profile;
    const offsets: Array<{ index: number; priority: number }> = [{ index: current, priority: 0 }];
    for (let i = 1; i <= ahead; i++) {
      offsets.push({ index: current + i, priority: i });
    }
    for (let i = 1; i <= behind; i++) {
      offsets.push({ index: current - i, priority: ahead + i });
    }

    const count = this.feed.itemCount();
    const tasks: PreloadTask[] = [];
    for (const { index, priority } of offsets) {
      if (index < 0 || index >= count) continue;
      const item = this.feed.itemAt(index);
      if (item) {
        tasks.push({ index, item, priority, epoch });
      }
    }
    return tasks.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Dispatch queued tasks while slots are free. An index that is still in
   * flight from an earlier epoch waits in the queue until it settles.
   */
  private pump(): void {
    const waiting: PreloadTask[] = [];
    while (this.inFlight.size < this.profile.concurrency && this.queue.length > 0) {
      const task = this.queue.shift();
      if (!task) break;
      if (this.inFlight.has(task.index)) {
        waiting.push(task);
        continue;
      }
      this.dispatch(task);
    }
    this.queue.unshift(...waiting);
  }

  private dispatch(task: PreloadTask): void {
    this.inFlight.add(task.index);
    this.counters.dispatched++;

    this.run(task)
      .finally(() => {
        this.inFlight.delete(task.index);
        this.pump();
      })
      .catch((error: unknown) => {
        console.error(`[Preload] Unexpected failure settling task ${task.index}:`, error);
      });
  }

  private async run(task: PreloadTask): Promise<void> {
    if (task.epoch !== this.epoch) {
      this.counters.discarded++;
      return;
    }

    try {
      await this.pool.acquire(task.index, task.item, {
        shouldCommit: () => task.epoch === this.epoch,
      });
      this.counters.completed++;
      this.events.emit('preloaded', { index: task.index, mediaId: task.item.id, epoch: task.epoch });
    } catch (error) {
      if (isStaleFetch(error)) {
        this.counters.discarded++;
        return;
      }
      this.counters.failed++;
      console.warn(`[Preload] Failed to prepare index ${task.index}:`, error instanceof Error ? error.message : error);
      this.events.emit('failed', { index: task.index, mediaId: task.item.id, error });
    }
  }
}
