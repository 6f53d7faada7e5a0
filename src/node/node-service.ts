import type { Ledger } from '../ledger/ledger-manager.js';
import type { Block, Chain, Transaction } from '../ledger/ledger-types.js';
import { InvalidFieldError, MissingFieldError } from '../ledger/ledger-types.js';
import { newTransaction, transactionInputFrom } from '../ledger/transaction.js';
import type { ConsensusResolver, ResolveResult } from '../consensus/resolver.js';
import type { PeerRegistry } from '../peers/peer-registry.js';
import { MissingNodeListError } from '../peers/peer-types.js';
import type { ChainStore } from '../persistence/types.js';
import { metrics } from '../metrics/metrics.js';
import type { MetricsSnapshot } from '../metrics/metrics.js';
import { logger, errorMessage } from '../observability/logger.js';

export const REWARD_STAMP = 'Genesis Stamp';

export interface NodeServiceOptions {
  nodeId: string;
  miningRewardEnabled: boolean;
  store?: ChainStore;
}

export interface MineResult {
  block: Block;
  persisted: boolean;
}

export interface SubmitResult {
  transaction: Transaction;
  index: number;
}

export interface NodeResolveResult extends ResolveResult {
  persisted: boolean;
}

/**
 * The node's logical operations over one ledger. The HTTP layer only
 * translates requests to these calls and results to responses.
 */
export class NodeService {
  constructor(
    private readonly ledger: Ledger,
    private readonly registry: PeerRegistry,
    private readonly resolver: ConsensusResolver,
    private readonly options: NodeServiceOptions
  ) {}

  get nodeId(): string {
    return this.options.nodeId;
  }

  async mine(signal?: AbortSignal): Promise<MineResult> {
    const startedAt = Date.now();
    const reward = this.options.miningRewardEnabled
      ? newTransaction({ owner: this.options.nodeId, stamp: REWARD_STAMP, year: 0, value: 0 })
      : undefined;

    const block = await this.ledger.mine({ signal, reward });
    metrics.recordBlockMined(block.proof, Date.now() - startedAt);

    const persisted = await this.persist('mine');
    return { block, persisted };
  }

  async submitTransaction(body: unknown): Promise<SubmitResult> {
    let transaction: Transaction;
    try {
      transaction = newTransaction(transactionInputFrom(body));
    } catch (error) {
      if (error instanceof MissingFieldError || error instanceof InvalidFieldError) {
        metrics.recordTransactionRejected();
        logger.warn('transaction_rejected', 'Transaction rejected', { error: error.message });
      }
      throw error;
    }

    const index = await this.ledger.submitTransaction(transaction);
    metrics.recordTransactionSubmitted();

    logger.info('transaction_queued', 'Transaction added to pending pool', {
      owner: transaction.owner,
      stamp: transaction.stamp,
      targetBlock: index,
    });

    return { transaction, index };
  }

  getChain(): { chain: Chain; length: number } {
    const chain = this.ledger.getChain();
    return { chain, length: chain.length };
  }

  getChainLength(): number {
    return this.ledger.length;
  }

  registerNodes(nodes: unknown): string[] {
    if (!Array.isArray(nodes) || !nodes.every((node): node is string => typeof node === 'string')) {
      throw new MissingNodeListError();
    }

    this.registry.registerAll(nodes);
    return this.registry.list();
  }

  listNodes(): string[] {
    return this.registry.list();
  }

  async resolve(): Promise<NodeResolveResult> {
    const result = await this.resolver.resolve();
    const persisted = result.replaced ? await this.persist('resolve') : true;
    return { ...result, persisted };
  }

  metricsSnapshot(): MetricsSnapshot {
    return metrics.snapshot(
      {
        chainLength: this.ledger.length,
        pendingTransactions: this.ledger.getPendingTransactions().length,
        lock: this.ledger.getLockStats(),
      },
      this.options.store?.mode() ?? 'memory'
    );
  }

  /**
   * Save the current chain. A storage failure does not undo the in-memory
   * change; it is logged, counted and reported back as persisted=false.
   */
  private async persist(trigger: 'mine' | 'resolve'): Promise<boolean> {
    if (!this.options.store) return true;

    try {
      await this.options.store.save(this.ledger.getChain());
      return true;
    } catch (error) {
      metrics.recordStorageSaveFailure();
      logger.error('chain_persist_failed', 'Failed to save chain snapshot', {
        trigger,
        length: this.ledger.length,
        error: errorMessage(error),
      });
      return false;
    }
  }
}
