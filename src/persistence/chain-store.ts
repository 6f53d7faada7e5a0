import type { Chain } from '../ledger/ledger-types.js';
import { InvalidChainError } from '../ledger/ledger-types.js';
import { ChainSchema, describeIssues } from '../ledger/ledger-schema.js';
import type { StorageMode } from '../metrics/metrics.js';
import { isRedisHealthy } from './redis-client.js';
import type { ChainStore, KeyValueClient } from './types.js';

export const CHAIN_SNAPSHOT_KEY = 'stampchain:chain';

export class InMemoryChainStore implements ChainStore {
  private snapshot: string | null = null;

  async load(): Promise<Chain | null> {
    return this.snapshot === null ? null : decodeChainSnapshot(this.snapshot);
  }

  async save(chain: Chain): Promise<void> {
    this.snapshot = JSON.stringify(chain);
  }

  mode(): StorageMode {
    return 'memory';
  }
}

export class RedisChainStore implements ChainStore {
  constructor(
    private readonly client: KeyValueClient,
    private readonly healthy: () => boolean = isRedisHealthy,
    private readonly key: string = CHAIN_SNAPSHOT_KEY
  ) {}

  async load(): Promise<Chain | null> {
    const raw = await this.client.get(this.key);
    return raw === null ? null : decodeChainSnapshot(raw);
  }

  async save(chain: Chain): Promise<void> {
    await this.client.set(this.key, JSON.stringify(chain));
  }

  mode(): StorageMode {
    return this.healthy() ? 'redis' : 'redis-degraded';
  }
}

/**
 * Decode a stored chain. Only the shape is checked here; links and proofs
 * are re-verified by Ledger.fromChain.
 */
export function decodeChainSnapshot(raw: string): Chain {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new InvalidChainError(`snapshot is not JSON: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }

  const result = ChainSchema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidChainError(`malformed snapshot: ${describeIssues(result.error)}`);
  }
  return result.data;
}
