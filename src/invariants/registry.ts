import type { InvariantDefinition, InvariantContext, InvariantID } from './types.js';

const INVARIANTS: Record<InvariantID, InvariantDefinition> = {
  SEMAPHORE_PERMITS_NON_NEGATIVE: {
    id: 'SEMAPHORE_PERMITS_NON_NEGATIVE',
    description: 'Semaphore available permits must never be negative',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.semaphorePermits === undefined) return true;
      return ctx.semaphorePermits >= 0;
    },
  },

  SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED: {
    id: 'SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED',
    description: 'In-flight count must equal (max - available) permits',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.semaphoreInFlight === undefined ||
          ctx.semaphorePermits === undefined ||
          ctx.semaphoreMaxPermits === undefined) {
        return true;
      }
      return ctx.semaphoreInFlight === ctx.semaphoreMaxPermits - ctx.semaphorePermits;
    },
  },

  CHAIN_STARTS_AT_GENESIS: {
    id: 'CHAIN_STARTS_AT_GENESIS',
    description: 'A non-empty chain must start at index 1',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.chainLength || ctx.firstBlockIndex === undefined) return true;
      return ctx.firstBlockIndex === 1;
    },
  },

  CHAIN_TIP_INDEX_MATCHES_LENGTH: {
    id: 'CHAIN_TIP_INDEX_MATCHES_LENGTH',
    description: 'The tip block index must equal the chain length',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.chainLength === undefined || ctx.tipIndex === undefined) return true;
      return ctx.tipIndex === ctx.chainLength;
    },
  },

  SEALED_BLOCK_LINKS_TO_TIP: {
    id: 'SEALED_BLOCK_LINKS_TO_TIP',
    description: 'A newly sealed block must reference the hash of the previous tip',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.previousTipHash === undefined || ctx.sealedPreviousHash === undefined) return true;
      return ctx.previousTipHash === ctx.sealedPreviousHash;
    },
  },

  PENDING_POOL_CLEARED_AFTER_SEAL: {
    id: 'PENDING_POOL_CLEARED_AFTER_SEAL',
    description: 'The pending pool must be empty immediately after a seal',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.pendingAfterSeal === undefined) return true;
      return ctx.pendingAfterSeal === 0;
    },
  },

  REPLACEMENT_STRICTLY_LONGER: {
    id: 'REPLACEMENT_STRICTLY_LONGER',
    description: 'A replacement chain must be strictly longer than the chain it replaces',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.lengthBeforeReplace === undefined || ctx.lengthAfterReplace === undefined) return true;
      return ctx.lengthAfterReplace > ctx.lengthBeforeReplace;
    },
  },
};

export function getAllInvariants(): InvariantDefinition[] {
  return Object.values(INVARIANTS);
}

export function getInvariantsByIds(ids: InvariantID[]): InvariantDefinition[] {
  return ids.map(id => INVARIANTS[id]);
}
