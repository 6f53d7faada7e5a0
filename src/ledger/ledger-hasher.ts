import crypto from 'crypto';
import type { Block } from './ledger-types.js';

/**
 * Canonical JSON: object keys sorted recursively, array order preserved,
 * no whitespace, undefined members dropped.
 */
export function canonicalStringify(value: unknown): string {
  if (value === null || value === undefined) return 'null';

  if (typeof value === 'string') {
    return JSON.stringify(value);
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? JSON.stringify(value) : 'null';
  }

  if (typeof value === 'boolean') {
    return String(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map(item => canonicalStringify(item)).join(',')}]`;
  }

  if (typeof value === 'object') {
    const pairs = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, member]) => `${JSON.stringify(key)}:${canonicalStringify(member)}`);
    return `{${pairs.join(',')}}`;
  }

  return 'null';
}

export function sha256Hex(payload: string): string {
  return crypto
    .createHash('sha256')
    .update(payload, 'utf8')
    .digest('hex');
}

export function hashBlock(block: Block): string {
  const payload = canonicalStringify({
    index: block.index,
    timestamp: block.timestamp,
    transactions: block.transactions.map(tx => ({
      owner: tx.owner,
      stamp: tx.stamp,
      year: tx.year,
      value: tx.value,
    })),
    proof: block.proof,
    previousHash: block.previousHash,
  });

  return sha256Hex(payload);
}
