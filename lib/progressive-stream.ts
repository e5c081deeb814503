type StreamState = 'open' | 'ended' | 'failed';

interface ReadyWaiter {
  resolve: () => void;
  reject: (error: unknown) => void;
}

/**
 * Lazy byte sequence for one media item, filled by the fetch cache and read
 * by exactly one consumer. It cannot be restarted; ask the cache for a new
 * stream instead.
 */
export class ProgressiveStream implements AsyncIterable<Uint8Array> {
  private readonly chunks: Uint8Array[] = [];
  private readonly readyWaiters: ReadyWaiter[] = [];
  private state: StreamState = 'open';
  private failure: unknown = null;
  private ready = false;
  private consumed = false;
  private abandoned = false;
  private received = 0;
  private buffered = 0;
  private wake: (() => void) | null = null;
  private drain: (() => void) | null = null;

  constructor(
    readonly mediaId: string,
    private readonly onAbandon?: () => void
  ) {}

  get receivedBytes(): number {
    return this.received;
  }

  /** No more bytes will arrive, because the stream ended, failed or was abandoned. */
  get isClosed(): boolean {
    return this.state !== 'open' || this.abandoned;
  }

  get isAbandoned(): boolean {
    return this.abandoned;
  }

  /**
   * Resolves once the initial buffer has arrived (or the whole payload, when
   * it is shorter). Rejects if the stream fails first.
   */
  whenReady(): Promise<void> {
    if (this.ready || this.state === 'ended') return Promise.resolve();
    if (this.state === 'failed') return Promise.reject(this.failure);
    return new Promise<void>((resolve, reject) => {
      this.readyWaiters.push({ resolve, reject });
    });
  }

  /** Bytes pushed but not yet taken by the consumer. */
  get bufferedBytes(): number {
    return this.buffered;
  }

  /**
   * Resolves once fewer than `highWaterMark` bytes wait unread, or once
   * nothing more will be read. Producers await it before pushing.
   */
  whenDrained(highWaterMark: number): Promise<void> {
    if (this.buffered < highWaterMark || this.isClosed) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.drain = resolve;
    });
  }

  push(chunk: Uint8Array): void {
    if (this.state !== 'open' || this.abandoned) return;
    this.chunks.push(chunk);
    this.received += chunk.byteLength;
    this.buffered += chunk.byteLength;
    this.notify();
  }

  markReady(): void {
    if (this.ready) return;
    this.ready = true;
    for (const waiter of this.readyWaiters.splice(0)) {
      waiter.resolve();
    }
  }

  end(): void {
    if (this.state !== 'open') return;
    this.state = 'ended';
    this.markReady();
    this.notify();
    this.releaseDrain();
  }

  fail(error: unknown): void {
    if (this.state !== 'open') return;
    this.state = 'failed';
    this.failure = error;
    for (const waiter of this.readyWaiters.splice(0)) {
      waiter.reject(error);
    }
    this.notify();
    this.releaseDrain();
  }

  /**
   * Stop reading: unread chunks are dropped, a waiting producer is released
   * and the owner is told the stream was abandoned.
   */
  cancel(): void {
    if (this.abandoned) return;
    this.abandoned = true;
    this.chunks.length = 0;
    this.buffered = 0;
    this.notify();
    this.releaseDrain();
    this.onAbandon?.();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array> {
    if (this.consumed) {
      throw new Error(`Stream for media ${this.mediaId} has already been consumed`);
    }
    this.consumed = true;

    let finished = false;
    try {
      for (;;) {
        if (this.abandoned) return;
        const chunk = this.chunks.shift();
        if (chunk) {
          this.buffered -= chunk.byteLength;
          this.releaseDrain();
          yield chunk;
          continue;
        }
        if (this.state === 'ended') {
          finished = true;
          return;
        }
        if (this.state === 'failed') {
          finished = true;
          throw this.failure;
        }
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
      }
    } finally {
      if (!finished) {
        this.cancel();
      }
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private releaseDrain(): void {
    const drain = this.drain;
    this.drain = null;
    drain?.();
  }
}
