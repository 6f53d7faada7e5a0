import type { SemaphoreStats } from '../concurrency/semaphore.js';

export type StorageMode = 'memory' | 'redis' | 'redis-degraded';

export interface MetricsSnapshot {
  processStartTime: string;
  uptimeSeconds: number;
  chain: {
    length: number;
    pendingTransactions: number;
  };
  mining: {
    blocksMined: number;
    proofAttempts: number;
    lastMineDurationMs: number;
    averageMineDurationMs: number;
  };
  transactions: {
    submitted: number;
    rejected: number;
  };
  consensus: {
    resolveCount: number;
    replacements: number;
    peersQueried: number;
    peerFailures: number;
  };
  invariants: {
    violations: number;
  };
  storage: {
    mode: StorageMode;
    saveFailures: number;
  };
  ledgerLock: SemaphoreStats;
}

export interface LedgerGauge {
  chainLength: number;
  pendingTransactions: number;
  lock: SemaphoreStats;
}

function emptyCounters() {
  return {
    blocksMined: 0,
    proofAttempts: 0,
    mineDurationTotalMs: 0,
    lastMineDurationMs: 0,
    transactionsSubmitted: 0,
    transactionsRejected: 0,
    resolveCount: 0,
    replacements: 0,
    peersQueried: 0,
    peerFailures: 0,
    invariantViolations: 0,
    storageSaveFailures: 0,
  };
}

class Metrics {
  private startTime: Date = new Date();

  private counters = emptyCounters();

  recordBlockMined(proof: number, durationMs: number): void {
    this.counters.blocksMined++;
    // The search starts at 0, so the winning proof is one less than the attempts.
    this.counters.proofAttempts += proof + 1;
    this.counters.mineDurationTotalMs += durationMs;
    this.counters.lastMineDurationMs = durationMs;
  }

  recordTransactionSubmitted(): void {
    this.counters.transactionsSubmitted++;
  }

  recordTransactionRejected(): void {
    this.counters.transactionsRejected++;
  }

  recordResolve(peersQueried: number, peerFailures: number, replaced: boolean): void {
    this.counters.resolveCount++;
    this.counters.peersQueried += peersQueried;
    this.counters.peerFailures += peerFailures;
    if (replaced) this.counters.replacements++;
  }

  recordInvariantViolations(count: number): void {
    this.counters.invariantViolations += count;
  }

  recordStorageSaveFailure(): void {
    this.counters.storageSaveFailures++;
  }

  reset(): void {
    this.startTime = new Date();
    this.counters = emptyCounters();
  }

  snapshot(ledger: LedgerGauge, storageMode: StorageMode): MetricsSnapshot {
    const uptimeSeconds = Math.floor((Date.now() - this.startTime.getTime()) / 1000);
    const averageMineDurationMs = this.counters.blocksMined > 0
      ? this.counters.mineDurationTotalMs / this.counters.blocksMined
      : 0;

    return {
      processStartTime: this.startTime.toISOString(),
      uptimeSeconds,
      chain: {
        length: ledger.chainLength,
        pendingTransactions: ledger.pendingTransactions,
      },
      mining: {
        blocksMined: this.counters.blocksMined,
        proofAttempts: this.counters.proofAttempts,
        lastMineDurationMs: this.counters.lastMineDurationMs,
        averageMineDurationMs: parseFloat(averageMineDurationMs.toFixed(2)),
      },
      transactions: {
        submitted: this.counters.transactionsSubmitted,
        rejected: this.counters.transactionsRejected,
      },
      consensus: {
        resolveCount: this.counters.resolveCount,
        replacements: this.counters.replacements,
        peersQueried: this.counters.peersQueried,
        peerFailures: this.counters.peerFailures,
      },
      invariants: {
        violations: this.counters.invariantViolations,
      },
      storage: {
        mode: storageMode,
        saveFailures: this.counters.storageSaveFailures,
      },
      ledgerLock: ledger.lock,
    };
  }
}

export const metrics = new Metrics();
