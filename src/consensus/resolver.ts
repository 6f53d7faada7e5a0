import type { Ledger } from '../ledger/ledger-manager.js';
import type { Chain } from '../ledger/ledger-types.js';
import { EmptyChainError, InvalidChainError } from '../ledger/ledger-types.js';
import { assertAdoptableChain, isValidChain } from '../ledger/ledger-validator.js';
import type { PeerRegistry } from '../peers/peer-registry.js';
import type { PeerChain, PeerChainFetcher } from '../peers/peer-types.js';
import { UnreachablePeerError } from '../peers/peer-types.js';
import { metrics } from '../metrics/metrics.js';
import { logger, errorMessage } from '../observability/logger.js';

export interface CandidateChain {
  length: number;
  chain: Chain;
}

export type PeerStatus = 'adopted' | 'not_longer' | 'invalid' | 'empty' | 'unreachable';

export interface PeerOutcome {
  address: string;
  status: PeerStatus;
  length?: number;
  error?: string;
}

export interface ResolveResult {
  replaced: boolean;
  chain: Chain;
  length: number;
  peers: PeerOutcome[];
}

/**
 * Longest-valid-chain rule. A candidate displaces the running best only when
 * it is strictly longer and passes isValid (isValidChain by default), so ties
 * keep whatever came first (the local chain if nothing beats it). Returns
 * null when the local chain stands.
 */
export function selectLongestValidChain<T extends CandidateChain>(
  localLength: number,
  candidates: Iterable<T>,
  isValid: (chain: Chain) => boolean = isValidChain
): T | null {
  let bestLength = localLength;
  let best: T | null = null;

  for (const candidate of candidates) {
    if (candidate.length > bestLength && candidate.chain.length === candidate.length && isValid(candidate.chain)) {
      bestLength = candidate.length;
      best = candidate;
    }
  }

  return best;
}

// Every candidate passed assertAdoptableChain before the lock was taken.
const alreadyVerified = (): boolean => true;

function classifyFailure(address: string, error: unknown): PeerOutcome {
  if (error instanceof UnreachablePeerError) {
    return { address, status: 'unreachable', error: error.message };
  }
  if (error instanceof EmptyChainError) {
    return { address, status: 'empty', error: error.message };
  }
  if (error instanceof InvalidChainError) {
    return { address, status: 'invalid', error: error.message };
  }
  return { address, status: 'unreachable', error: errorMessage(error) };
}

export class ConsensusResolver {
  constructor(
    private readonly ledger: Ledger,
    private readonly registry: PeerRegistry,
    private readonly fetchPeerChain: PeerChainFetcher
  ) {}

  /**
   * Fetch every registered peer's chain, then replace the local chain with
   * the longest valid one if it beats the local length. Peer fetches
   * and chain verification happen before the ledger lock is taken; only the
   * length comparison and the swap happen under it, against the local chain
   * as it stands at that moment.
   */
  async resolve(): Promise<ResolveResult> {
    const addresses = this.registry.list();

    logger.info('consensus_started', 'Resolving chain against peers', {
      peerCount: addresses.length,
    });

    const settled = await Promise.allSettled(addresses.map(address => this.fetchPeerChain(address)));

    const outcomes = new Map<string, PeerOutcome>();
    const candidates: PeerChain[] = [];

    settled.forEach((result, i) => {
      const address = addresses[i];

      if (result.status === 'rejected') {
        outcomes.set(address, classifyFailure(address, result.reason));
        return;
      }

      try {
        assertAdoptableChain(result.value.chain, address);
        candidates.push(result.value);
        outcomes.set(address, { address, status: 'not_longer', length: result.value.length });
      } catch (error) {
        outcomes.set(address, { ...classifyFailure(address, error), length: result.value.length });
      }
    });

    const result = await this.ledger.runExclusive(() => {
      const best = selectLongestValidChain(this.ledger.length, candidates, alreadyVerified);

      if (best) {
        this.ledger.replaceChain(best.chain, best.address, { verified: true });
        outcomes.set(best.address, { address: best.address, status: 'adopted', length: best.length });
      }

      return {
        replaced: best !== null,
        chain: this.ledger.getChain(),
        length: this.ledger.length,
      };
    });

    const peers = addresses.map(address => outcomes.get(address) ?? { address, status: 'unreachable' as const });
    const failures = peers.filter(p => p.status === 'invalid' || p.status === 'empty' || p.status === 'unreachable');

    for (const failure of failures) {
      logger.warn('consensus_peer_skipped', 'Peer skipped during resolution', {
        address: failure.address,
        status: failure.status,
        error: failure.error,
      });
    }

    metrics.recordResolve(addresses.length, failures.length, result.replaced);

    logger.info('consensus_completed', result.replaced ? 'Local chain replaced' : 'Local chain is authoritative', {
      replaced: result.replaced,
      length: result.length,
      peersQueried: addresses.length,
      peersSkipped: failures.length,
    });

    return { ...result, peers };
  }
}
