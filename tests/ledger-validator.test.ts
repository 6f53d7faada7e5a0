import { describe, it, expect } from 'vitest';
import {
  assertAdoptableChain,
  assertNonEmptyChain,
  isValidChain,
  verifyChain,
} from '../src/ledger/ledger-validator.js';
import { hashBlock } from '../src/ledger/ledger-hasher.js';
import { EmptyChainError, InvalidChainError } from '../src/ledger/ledger-types.js';
import { buildChain, firstInvalidProof, withBlock } from './helpers/chain.js';

describe('isValidChain', () => {
  it('accepts the empty chain and a genesis-only chain', () => {
    expect(isValidChain([])).toBe(true);
    expect(isValidChain(buildChain(1))).toBe(true);
  });

  it('accepts chains grown block by block from genesis', () => {
    for (let length = 1; length <= 5; length++) {
      expect(isValidChain(buildChain(length))).toBe(true);
    }
  });

  it('rejects a tampered previous hash', () => {
    const chain = buildChain(4);
    expect(isValidChain(withBlock(chain, 2, { previousHash: 'tampered' }))).toBe(false);
  });

  it('rejects a proof that does not satisfy the puzzle', () => {
    const chain = buildChain(4);
    const badProof = firstInvalidProof(chain[1].proof);

    expect(isValidChain(withBlock(chain, 2, { proof: badProof }))).toBe(false);
  });

  it('rejects an edited transaction in an earlier block', () => {
    const chain = buildChain(3);
    const edited = withBlock(chain, 1, {
      transactions: [{ ...chain[1].transactions[0], value: 999_999 }],
    });

    expect(isValidChain(edited)).toBe(false);
  });

  it('does not re-check the genesis block itself', () => {
    const chain = withBlock(buildChain(1), 0, { proof: 7, previousHash: 'anything' });
    expect(isValidChain(chain)).toBe(true);
  });
});

describe('verifyChain', () => {
  it('reports where the chain breaks', () => {
    const chain = buildChain(4);
    const result = verifyChain(withBlock(chain, 3, { previousHash: 'x' }));

    expect(result).toEqual({
      valid: false,
      length: 4,
      brokenAtIndex: 3,
      reason: `Previous hash mismatch at position 3: expected ${hashBlock(chain[2])}, got x`,
    });
  });

  it('reports an index gap', () => {
    const chain = buildChain(3);
    const result = verifyChain(withBlock(chain, 2, { index: 5 }));

    expect(result.valid).toBe(false);
    expect(result.brokenAtIndex).toBe(2);
    expect(result.reason).toBe('Index 5 does not follow 2');
  });
});

describe('assertAdoptableChain', () => {
  it('rejects an empty chain', () => {
    expect(() => assertNonEmptyChain([], 'peer-a')).toThrow(EmptyChainError);
    expect(() => assertAdoptableChain([], 'peer-a')).toThrow('Received an empty chain from peer-a');
  });

  it('rejects a chain not rooted at index 1', () => {
    const chain = buildChain(3).slice(1);
    expect(() => assertAdoptableChain(chain, 'peer-a')).toThrow(InvalidChainError);
  });

  it('accepts a valid chain', () => {
    expect(() => assertAdoptableChain(buildChain(3), 'peer-a')).not.toThrow();
  });
});
