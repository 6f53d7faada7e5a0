import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { sha256Hex } from './ledger-hasher.js';

export const DIFFICULTY_PREFIX = '0000';
export const DEFAULT_YIELD_EVERY = 10_000;

export interface ProofSearchOptions {
  signal?: AbortSignal;
  /** Attempts between event-loop yields. */
  yieldEvery?: number;
}

export class ProofSearchAbortedError extends Error {
  constructor(
    public readonly lastProof: number,
    public readonly attempts: number
  ) {
    super(`Proof search for last proof ${lastProof} aborted after ${attempts} attempts`);
    this.name = 'ProofSearchAbortedError';
  }
}

/**
 * True iff sha256(`${lastProof}${proof}`) starts with the difficulty prefix.
 */
export function validProof(lastProof: number, proof: number): boolean {
  return sha256Hex(`${lastProof}${proof}`).startsWith(DIFFICULTY_PREFIX);
}

/**
 * Smallest non-negative proof satisfying validProof against lastProof.
 * Blocks the calling thread until found.
 */
export function proofOfWork(lastProof: number): number {
  let proof = 0;
  while (!validProof(lastProof, proof)) {
    proof++;
  }
  return proof;
}

/**
 * Same search as proofOfWork, run as a cancellable unit of work. Without a
 * signal it runs until a proof is found.
 */
export async function searchProof(lastProof: number, options: ProofSearchOptions = {}): Promise<number> {
  const yieldEvery = options.yieldEvery ?? DEFAULT_YIELD_EVERY;
  if (!Number.isInteger(yieldEvery) || yieldEvery <= 0) {
    throw new RangeError('yieldEvery must be a positive integer');
  }

  const { signal } = options;
  let proof = 0;

  while (true) {
    if (signal?.aborted) {
      throw new ProofSearchAbortedError(lastProof, proof);
    }

    const batchEnd = proof + yieldEvery;
    for (; proof < batchEnd; proof++) {
      if (validProof(lastProof, proof)) {
        return proof;
      }
    }

    await yieldToEventLoop();
  }
}
