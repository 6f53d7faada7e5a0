import { hashBlock } from './ledger-hasher.js';
import { searchProof } from './proof-of-work.js';
import { assertAdoptableChain } from './ledger-validator.js';
import type { Block, Chain, Transaction } from './ledger-types.js';
import { GENESIS_PREVIOUS_HASH, GENESIS_PROOF } from './ledger-types.js';
import { Mutex } from '../concurrency/semaphore.js';
import type { SemaphoreStats } from '../concurrency/semaphore.js';
import { enforceInvariants } from '../invariants/checker.js';
import { logger } from '../observability/logger.js';

export interface LedgerOptions {
  /** Seconds since the epoch; fractional part allowed. */
  clock?: () => number;
  /** Attempts between event-loop yields while mining. */
  proofYieldEvery?: number;
}

export interface MineOptions {
  signal?: AbortSignal;
  /** Appended to the pending pool after the proof is found, before sealing. */
  reward?: Transaction;
}

export interface ReplaceChainOptions {
  /** The caller already ran assertAdoptableChain on this exact chain. */
  verified?: boolean;
}

const systemClock = (): number => Date.now() / 1000;

function freezeBlock(block: Block): Block {
  return Object.freeze({
    ...block,
    transactions: Object.freeze(block.transactions.map(tx => Object.freeze({ ...tx }))),
  });
}

/**
 * The chain plus the pending pool. One instance per node, passed explicitly
 * to whoever needs it.
 *
 * submitTransaction and mine take the ledger lock themselves. The primitives
 * addTransaction, newBlock and replaceChain assume the caller already holds
 * it through runExclusive, or owns the instance outright.
 */
export class Ledger {
  private chain: Block[] = [];
  private pending: Transaction[] = [];
  private readonly lock = new Mutex();
  private readonly clock: () => number;
  private readonly proofYieldEvery?: number;

  constructor(options: LedgerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.proofYieldEvery = options.proofYieldEvery;
    this.newBlock(GENESIS_PROOF, GENESIS_PREVIOUS_HASH);
  }

  /**
   * Rebuild a ledger from a previously persisted or transported chain. The
   * chain is re-verified in full before it is adopted.
   */
  static fromChain(chain: Chain, source: string, options: LedgerOptions = {}): Ledger {
    assertAdoptableChain(chain, source);
    const adopted = chain.map(freezeBlock);
    const ledger = new Ledger(options);
    ledger.chain = adopted;
    ledger.checkChainShape();
    return ledger;
  }

  get lastBlock(): Block {
    return this.chain[this.chain.length - 1];
  }

  get length(): number {
    return this.chain.length;
  }

  getChain(): Chain {
    return [...this.chain];
  }

  getPendingTransactions(): readonly Transaction[] {
    return [...this.pending];
  }

  getLockStats(): SemaphoreStats {
    return this.lock.getStats();
  }

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    return this.lock.runExclusive(task);
  }

  /** Returns the index of the block that will hold the transaction. */
  addTransaction(tx: Transaction): number {
    this.pending.push(tx);
    return this.lastBlock.index + 1;
  }

  /**
   * Seal the pending pool into a new block and append it. For the genesis
   * block previousHash is the sentinel; otherwise it defaults to the hash of
   * the current tip.
   */
  newBlock(proof: number, previousHash?: string): Block {
    const tip = this.chain.length > 0 ? this.lastBlock : undefined;
    const linkedHash = previousHash ?? (tip ? hashBlock(tip) : GENESIS_PREVIOUS_HASH);

    const block = freezeBlock({
      index: this.chain.length + 1,
      timestamp: this.clock(),
      transactions: this.pending,
      proof,
      previousHash: linkedHash,
    });

    this.pending = [];
    this.chain.push(block);

    enforceInvariants({
      previousTipHash: tip ? hashBlock(tip) : undefined,
      sealedPreviousHash: tip ? block.previousHash : undefined,
      pendingAfterSeal: this.pending.length,
    }, ['SEALED_BLOCK_LINKS_TO_TIP', 'PENDING_POOL_CLEARED_AFTER_SEAL']);
    this.checkChainShape();

    return block;
  }

  /**
   * Swap in a peer's chain wholesale. The pending pool is left as it is.
   */
  replaceChain(candidate: Chain, source = 'replacement', options: ReplaceChainOptions = {}): void {
    if (!options.verified) {
      assertAdoptableChain(candidate, source);
    }
    const adopted = candidate.map(freezeBlock);

    enforceInvariants({
      lengthBeforeReplace: this.chain.length,
      lengthAfterReplace: candidate.length,
    }, ['REPLACEMENT_STRICTLY_LONGER']);

    const previousLength = this.chain.length;
    this.chain = adopted;
    this.checkChainShape();

    logger.info('chain_replaced', 'Local chain replaced', {
      previousLength,
      newLength: this.chain.length,
      tipHash: hashBlock(this.lastBlock),
    });
  }

  submitTransaction(tx: Transaction): Promise<number> {
    return this.runExclusive(() => this.addTransaction(tx));
  }

  /**
   * Search a proof against the tip, then seal and clear the pool. The lock is
   * held for the whole search, so submissions queue behind it.
   */
  mine(options: MineOptions = {}): Promise<Block> {
    return this.runExclusive(async () => {
      const tip = this.lastBlock;
      const proof = await searchProof(tip.proof, {
        signal: options.signal,
        yieldEvery: this.proofYieldEvery,
      });

      if (options.reward) {
        this.addTransaction(options.reward);
      }

      const block = this.newBlock(proof, hashBlock(tip));

      logger.info('block_forged', 'New block forged', {
        index: block.index,
        proof: block.proof,
        transactionCount: block.transactions.length,
        previousHash: block.previousHash,
      });

      return block;
    });
  }

  private checkChainShape(): void {
    enforceInvariants({
      chainLength: this.chain.length,
      firstBlockIndex: this.chain[0]?.index,
      tipIndex: this.chain[this.chain.length - 1]?.index,
    }, ['CHAIN_STARTS_AT_GENESIS', 'CHAIN_TIP_INDEX_MATCHES_LENGTH']);
  }
}
