export type InvariantSeverity = 'warn' | 'error' | 'fatal';

export type InvariantID =
  | 'SEMAPHORE_PERMITS_NON_NEGATIVE'
  | 'SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED'
  | 'CHAIN_STARTS_AT_GENESIS'
  | 'CHAIN_TIP_INDEX_MATCHES_LENGTH'
  | 'SEALED_BLOCK_LINKS_TO_TIP'
  | 'PENDING_POOL_CLEARED_AFTER_SEAL'
  | 'REPLACEMENT_STRICTLY_LONGER';

export interface InvariantContext {
  // Semaphore context
  semaphorePermits?: number;
  semaphoreInFlight?: number;
  semaphoreMaxPermits?: number;

  // Chain context
  chainLength?: number;
  firstBlockIndex?: number;
  tipIndex?: number;

  // Seal context
  previousTipHash?: string;
  sealedPreviousHash?: string;
  pendingAfterSeal?: number;

  // Replacement context
  lengthBeforeReplace?: number;
  lengthAfterReplace?: number;
}

export interface InvariantDefinition {
  id: InvariantID;
  description: string;
  severity: InvariantSeverity;
  evaluate: (context: InvariantContext) => boolean;
}

export interface InvariantViolation {
  invariantId: InvariantID;
  description: string;
  severity: InvariantSeverity;
  context: InvariantContext;
  timestamp: string;
}

export interface InvariantCheckResult {
  passed: boolean;
  violations: InvariantViolation[];
}
