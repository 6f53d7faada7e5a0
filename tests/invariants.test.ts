import { describe, it, expect } from 'vitest';
import { checkInvariants, enforceInvariants, safeCheckInvariants } from '../src/invariants/checker.js';
import { getAllInvariants } from '../src/invariants/registry.js';
import { InvariantViolationError, summarizeViolations } from '../src/invariants/violations.js';

describe('ledger invariants', () => {
  it('passes on an empty context', () => {
    expect(checkInvariants({})).toEqual({ passed: true, violations: [] });
  });

  it('flags a tip index that disagrees with the chain length', () => {
    const result = checkInvariants({ chainLength: 3, firstBlockIndex: 1, tipIndex: 4 });

    expect(result.passed).toBe(false);
    expect(result.violations.map(v => v.invariantId)).toEqual(['CHAIN_TIP_INDEX_MATCHES_LENGTH']);
  });

  it('throws only for fatal violations', () => {
    expect(() => enforceInvariants({ pendingAfterSeal: 1 })).toThrow(InvariantViolationError);

    const lesser = enforceInvariants({ previousTipHash: 'a', sealedPreviousHash: 'b' });
    expect(lesser.map(v => v.severity)).toEqual(['error']);
  });

  it('limits evaluation to the requested invariants', () => {
    expect(safeCheckInvariants({ pendingAfterSeal: 2 }, ['REPLACEMENT_STRICTLY_LONGER'])).toEqual([]);
  });

  it('summarizes violations by severity', () => {
    const { violations } = checkInvariants({
      pendingAfterSeal: 1,
      previousTipHash: 'a',
      sealedPreviousHash: 'b',
      semaphorePermits: 0,
      semaphoreInFlight: 2,
      semaphoreMaxPermits: 1,
    });

    expect(summarizeViolations(violations)).toEqual({ total: 3, warn: 0, error: 2, fatal: 1 });
  });

  it('registers every invariant under its own id', () => {
    for (const invariant of getAllInvariants()) {
      expect(invariant.description.length).toBeGreaterThan(0);
    }
    expect(getAllInvariants()).toHaveLength(7);
  });
});
