import crypto from 'crypto';
import { DEFAULT_YIELD_EVERY } from '../ledger/proof-of-work.js';

export interface NodeSettings {
  port: number;
  nodeId: string;
  redisUrl?: string;
  peerFetchTimeoutMs: number;
  proofYieldEvery: number;
  miningRewardEnabled: boolean;
}

export const DEFAULT_PORT = 5000;
export const DEFAULT_PEER_FETCH_TIMEOUT_MS = 5000;

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;

  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) return fallback;
  return parsed;
}

function parseFlag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): NodeSettings {
  return {
    port: parsePositiveInt(env.PORT, DEFAULT_PORT),
    nodeId: env.NODE_ID || crypto.randomUUID().replace(/-/g, ''),
    redisUrl: env.REDIS_URL || undefined,
    peerFetchTimeoutMs: parsePositiveInt(env.PEER_FETCH_TIMEOUT_MS, DEFAULT_PEER_FETCH_TIMEOUT_MS),
    proofYieldEvery: parsePositiveInt(env.PROOF_YIELD_EVERY, DEFAULT_YIELD_EVERY),
    miningRewardEnabled: parseFlag(env.MINING_REWARD_ENABLED),
  };
}
