import { ChainResponseSchema, describeIssues } from '../ledger/ledger-schema.js';
import { EmptyChainError, InvalidChainError } from '../ledger/ledger-types.js';
import { logger, errorMessage } from '../observability/logger.js';
import type { PeerChain, PeerChainFetcher } from './peer-types.js';
import { UnreachablePeerError } from './peer-types.js';

export interface HttpPeerFetcherOptions {
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/**
 * Turn a peer's GET /chain body into a PeerChain. Shape problems and a
 * declared length that disagrees with the chain are InvalidChainError; an
 * empty chain is EmptyChainError. Link and proof checks are left to the
 * resolver.
 */
export function parsePeerChainResponse(address: string, body: unknown): PeerChain {
  const parsed = ChainResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidChainError(`malformed response from ${address}: ${describeIssues(parsed.error)}`);
  }

  const { chain, length } = parsed.data;

  if (chain.length === 0) {
    throw new EmptyChainError(address);
  }

  if (length !== chain.length) {
    throw new InvalidChainError(
      `peer ${address} declared length ${length} but sent ${chain.length} blocks`
    );
  }

  return { address, length, chain };
}

export function createHttpPeerFetcher(options: HttpPeerFetcherOptions): PeerChainFetcher {
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (address: string): Promise<PeerChain> => {
    const url = `http://${address}/chain`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.timeoutMs);

    const unreachable = (error: unknown): UnreachablePeerError => {
      const reason = controller.signal.aborted
        ? `timed out after ${options.timeoutMs}ms`
        : errorMessage(error);

      logger.warn('peer_fetch_failed', 'Could not fetch chain from peer', {
        address,
        reason,
      });
      return new UnreachablePeerError(address, reason);
    };

    try {
      let response: Response;
      try {
        response = await fetchImpl(url, {
          signal: controller.signal,
          headers: { accept: 'application/json' },
        });
      } catch (error) {
        throw unreachable(error);
      }

      if (!response.ok) {
        await response.body?.cancel();
        throw unreachable(new Error(`HTTP ${response.status}`));
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        // The timer can fire while the body is still streaming.
        if (controller.signal.aborted) throw unreachable(error);
        throw new InvalidChainError(`response from ${address} is not JSON: ${errorMessage(error)}`);
      }

      return parsePeerChainResponse(address, body);
    } finally {
      clearTimeout(timer);
    }
  };
}
