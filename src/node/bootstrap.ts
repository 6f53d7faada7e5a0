import { Ledger } from '../ledger/ledger-manager.js';
import type { LedgerOptions } from '../ledger/ledger-manager.js';
import { ConsensusResolver } from '../consensus/resolver.js';
import { PeerRegistry } from '../peers/peer-registry.js';
import type { PeerChainFetcher } from '../peers/peer-types.js';
import type { ChainStore } from '../persistence/types.js';
import type { NodeSettings } from '../config/settings.js';
import { NodeService } from './node-service.js';
import { logger, errorMessage } from '../observability/logger.js';

export interface NodeDependencies {
  fetchPeerChain: PeerChainFetcher;
  store?: ChainStore;
  clock?: LedgerOptions['clock'];
}

/**
 * Load the persisted chain, or start from genesis when there is none or it
 * does not verify.
 */
export async function loadLedger(store: ChainStore | undefined, options: LedgerOptions): Promise<Ledger> {
  if (!store) {
    return new Ledger(options);
  }

  try {
    const chain = await store.load();
    if (chain === null) {
      logger.info('ledger_initialized', 'No chain snapshot found, starting from genesis');
      return new Ledger(options);
    }

    const ledger = Ledger.fromChain(chain, 'snapshot', options);
    logger.info('ledger_initialized', 'Ledger restored from snapshot', {
      length: ledger.length,
    });
    return ledger;
  } catch (error) {
    logger.error('ledger_snapshot_rejected', 'Chain snapshot rejected, starting from genesis', {
      error: errorMessage(error),
    });
    return new Ledger(options);
  }
}

export async function createNode(settings: NodeSettings, deps: NodeDependencies): Promise<NodeService> {
  const ledger = await loadLedger(deps.store, {
    clock: deps.clock,
    proofYieldEvery: settings.proofYieldEvery,
  });
  const registry = new PeerRegistry();
  const resolver = new ConsensusResolver(ledger, registry, deps.fetchPeerChain);

  return new NodeService(ledger, registry, resolver, {
    nodeId: settings.nodeId,
    miningRewardEnabled: settings.miningRewardEnabled,
    store: deps.store,
  });
}
