import { hashBlock } from './ledger-hasher.js';
import { validProof } from './proof-of-work.js';
import type { Chain, ChainVerificationResult } from './ledger-types.js';
import { EmptyChainError, InvalidChainError } from './ledger-types.js';
import { logger } from '../observability/logger.js';

function broken(chain: Chain, index: number, reason: string): ChainVerificationResult {
  logger.warn('chain_verification_failed', 'Chain link broken', {
    brokenAtIndex: index,
    length: chain.length,
    reason,
  });

  return {
    valid: false,
    length: chain.length,
    brokenAtIndex: index,
    reason,
  };
}

/**
 * Walk every adjacent pair from the second block on. The genesis block is
 * taken as given; an empty chain verifies trivially.
 */
export function verifyChain(chain: Chain): ChainVerificationResult {
  for (let i = 1; i < chain.length; i++) {
    const previous = chain[i - 1];
    const current = chain[i];

    if (current.index !== previous.index + 1) {
      return broken(chain, i, `Index ${current.index} does not follow ${previous.index}`);
    }

    const expectedHash = hashBlock(previous);
    if (current.previousHash !== expectedHash) {
      return broken(chain, i, `Previous hash mismatch at position ${i}: expected ${expectedHash}, got ${current.previousHash}`);
    }

    if (!validProof(previous.proof, current.proof)) {
      return broken(chain, i, `Proof ${current.proof} does not satisfy difficulty against ${previous.proof}`);
    }
  }

  return {
    valid: true,
    length: chain.length,
  };
}

export function isValidChain(chain: Chain): boolean {
  return verifyChain(chain).valid;
}

export function assertNonEmptyChain(chain: Chain, source: string): void {
  if (chain.length === 0) {
    throw new EmptyChainError(source);
  }
}

/**
 * Full check for a chain arriving from outside the process (peer response,
 * snapshot): non-empty, rooted at index 1, every link verified.
 */
export function assertAdoptableChain(chain: Chain, source: string): void {
  assertNonEmptyChain(chain, source);

  if (chain[0].index !== 1) {
    throw new InvalidChainError(`first block has index ${chain[0].index}, expected 1`, 0);
  }

  const verification = verifyChain(chain);
  if (!verification.valid) {
    throw new InvalidChainError(verification.reason ?? 'verification failed', verification.brokenAtIndex);
  }
}
