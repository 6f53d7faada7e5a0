import type { Chain } from '../ledger/ledger-types.js';
import type { StorageMode } from '../metrics/metrics.js';

export interface ChainStore {
  /** Null when nothing has been saved yet. */
  load(): Promise<Chain | null>;
  save(chain: Chain): Promise<void>;
  mode(): StorageMode;
}

/** The subset of the ioredis client the chain store uses. */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}
