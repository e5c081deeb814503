import type { MediaPlayer, PlaybackState } from '@/types';
import { DEBUG_LOGS } from './config';
import { SimpleEventEmitter } from './simple-event-emitter';
import { withTimeout } from './utils/with-timeout';

const TRANSITIONS: Readonly<Record<PlaybackState, readonly PlaybackState[]>> = {
  uninitialized: ['initializing', 'disposed'],
  initializing: ['ready', 'error', 'disposed'],
  ready: ['playing', 'disposed'],
  playing: ['ready', 'paused', 'disposed'],
  paused: ['playing', 'disposed'],
  error: ['disposed'],
  disposed: [],
};

export const canTransition = (from: PlaybackState, to: PlaybackState): boolean => TRANSITIONS[from].includes(to);

const USABLE_STATES: readonly PlaybackState[] = ['ready', 'playing', 'paused'];

export interface StateChange {
  previous: PlaybackState;
  current: PlaybackState;
}

interface ResourceEvents {
  'state-change': StateChange;
}

/**
 * What callers of the pool get back. The pool keeps ownership: callers may
 * play and pause, never dispose.
 */
export interface PlaybackHandle {
  readonly index: number;
  readonly mediaId: string;
  readonly url: string;
  readonly state: PlaybackState;
  readonly player: MediaPlayer;
  readonly isUsable: boolean;
  play(): void;
  pause(): void;
  onStateChange(listener: (change: StateChange) => void): () => void;
}

export interface PlaybackResourceInit {
  index: number;
  mediaId: string;
  url: string;
  player: MediaPlayer;
  onDispose?: () => void;
}

export class PlaybackResource implements PlaybackHandle {
  readonly index: number;
  readonly mediaId: string;
  readonly url: string;
  readonly player: MediaPlayer;

  private currentState: PlaybackState = 'uninitialized';
  private lastAccess = 0;
  private sequence = 0;
  private readonly onDispose?: () => void;
  private readonly events = new SimpleEventEmitter<ResourceEvents>();

  constructor(init: PlaybackResourceInit) {
    this.index = init.index;
    this.mediaId = init.mediaId;
    this.url = init.url;
    this.player = init.player;
    this.onDispose = init.onDispose;
  }

  get state(): PlaybackState {
    return this.currentState;
  }

  get isUsable(): boolean {
    return USABLE_STATES.includes(this.currentState);
  }

  get lastAccessedAt(): number {
    return this.lastAccess;
  }

  get accessSequence(): number {
    return this.sequence;
  }

  touch(sequence: number, now: number): void {
    this.sequence = sequence;
    this.lastAccess = now;
  }

  onStateChange(listener: (change: StateChange) => void): () => void {
    return this.events.on('state-change', listener);
  }

  /**
   * Load the player, together with any extra readiness signal (the initial
   * buffer of a streamed source), inside one time bound.
   */
  async initialize(timeoutMs: number, readiness?: Promise<void>): Promise<void> {
    this.transition('initializing');
    try {
      await withTimeout(
        Promise.all([this.player.load(), readiness]).then(() => undefined),
        timeoutMs,
        `Playback initialization of ${this.mediaId}`
      );
    } catch (error) {
      this.transition('error');
      throw error;
    }
    this.transition('ready');
  }

  play(): void {
    if (this.currentState !== 'ready' && this.currentState !== 'paused') return;
    this.player.play();
    this.transition('playing');
  }

  pause(): void {
    if (this.currentState !== 'playing') return;
    this.player.pause();
    this.transition('paused');
  }

  /**
   * Silence and release the player. Runs once; later calls are no-ops and
   * failures are logged, never thrown.
   */
  dispose(): void {
    if (this.currentState === 'disposed') return;

    try {
      this.player.pause();
      this.player.volume = 0;
      this.player.muted = true;
      this.player.release();
    } catch (error) {
      console.warn(`[PlaybackPool] Failed to dispose player for ${this.mediaId}:`, error instanceof Error ? error.message : error);
    }

    try {
      this.onDispose?.();
    } catch (error) {
      console.warn(`[PlaybackPool] Dispose hook failed for ${this.mediaId}:`, error instanceof Error ? error.message : error);
    }

    this.transition('disposed');
    this.events.removeAllListeners();

    if (DEBUG_LOGS) {
      console.log(`🗑️ [PlaybackPool] Disposed player for index ${this.index} (${this.mediaId})`);
    }
  }

  private transition(next: PlaybackState): void {
    const previous = this.currentState;
    // Disposal may interrupt a pending initialization; its outcome is then dropped
    if (previous === 'disposed' || !canTransition(previous, next)) return;
    this.currentState = next;
    this.events.emit('state-change', { previous, current: next });
  }
}
