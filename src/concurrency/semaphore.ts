import { safeCheckInvariants } from '../invariants/checker.js';

export interface SemaphoreStats {
  inFlight: number;
  peak: number;
  available: number;
  waiting: number;
}

/**
 * Counting semaphore with FIFO hand-off: a released permit goes straight to
 * the longest waiter, so a late caller can never overtake a queued one.
 */
export class InMemorySemaphore {
  private permits: number;
  private readonly maxPermits: number;
  private waiting: Array<() => void> = [];
  private currentInFlight = 0;
  private peakInFlight = 0;

  constructor(maxPermits: number) {
    if (!Number.isInteger(maxPermits) || maxPermits <= 0) {
      throw new Error('Semaphore maxPermits must be a positive integer');
    }
    this.permits = maxPermits;
    this.maxPermits = maxPermits;
  }

  tryAcquire(): boolean {
    if (this.permits === 0) return false;

    this.permits--;
    this.markAcquired();
    return true;
  }

  acquire(): Promise<void> {
    if (this.tryAcquire()) return Promise.resolve();

    return new Promise<void>(resolve => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    if (this.currentInFlight === 0) {
      throw new Error('Semaphore released more times than acquired');
    }

    this.currentInFlight--;

    const next = this.waiting.shift();
    if (next) {
      this.markAcquired();
      next();
    } else {
      this.permits++;
    }

    this.checkBookkeeping();
  }

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  getStats(): SemaphoreStats {
    return {
      inFlight: this.currentInFlight,
      peak: this.peakInFlight,
      available: this.permits,
      waiting: this.waiting.length,
    };
  }

  private markAcquired(): void {
    this.currentInFlight++;
    if (this.currentInFlight > this.peakInFlight) {
      this.peakInFlight = this.currentInFlight;
    }
    this.checkBookkeeping();
  }

  private checkBookkeeping(): void {
    safeCheckInvariants({
      semaphorePermits: this.permits,
      semaphoreInFlight: this.currentInFlight,
      semaphoreMaxPermits: this.maxPermits,
    }, ['SEMAPHORE_PERMITS_NON_NEGATIVE', 'SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED']);
  }
}

export class Mutex extends InMemorySemaphore {
  constructor() {
    super(1);
  }
}
