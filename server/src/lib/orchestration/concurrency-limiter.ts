import { CancelledError } from '../errors';

export const DEFAULT_PARALLELISM = 20;

/**
 * Proof of admission. Handed out by {@link ConcurrencyLimiter.acquire} and
 * given back through {@link ConcurrencyLimiter.release}.
 */
export class LimiterToken {
  released = false;

  constructor(readonly id: number) {}
}

type Waiter = {
  resolve: (token: LimiterToken) => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

/**
 * Bounded FIFO admission gate. At most `capacity` tokens are held at once;
 * a released slot goes straight to the oldest waiter so later callers cannot
 * overtake it.
 */
export class ConcurrencyLimiter {
  private readonly queue: Waiter[] = [];
  private held = 0;
  private nextTokenId = 1;

  constructor(readonly capacity: number = DEFAULT_PARALLELISM) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${capacity}`);
    }
  }

  /** Tokens currently held. */
  get active(): number {
    return this.held;
  }

  /** Callers suspended in {@link acquire}. */
  get waiting(): number {
    return this.queue.length;
  }

  acquire(signal?: AbortSignal): Promise<LimiterToken> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }

    if (this.held < this.capacity && this.queue.length === 0) {
      return Promise.resolve(this.issue());
    }

    return new Promise<LimiterToken>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };

      if (signal) {
        waiter.onAbort = () => {
          const index = this.queue.indexOf(waiter);
          if (index >= 0) {
            this.queue.splice(index, 1);
            reject(new CancelledError());
          }
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.queue.push(waiter);
    });
  }

  release(token: LimiterToken): void {
    if (token.released) {
      return;
    }

    token.released = true;
    this.held -= 1;

    const next = this.queue.shift();
    if (next) {
      if (next.signal && next.onAbort) {
        next.signal.removeEventListener('abort', next.onAbort);
      }
      next.resolve(this.issue());
    }
  }

  private issue(): LimiterToken {
    this.held += 1;
    const token = new LimiterToken(this.nextTokenId);
    this.nextTokenId += 1;
    return token;
  }
}
