import type { Chain } from '../ledger/ledger-types.js';

export class InvalidPeerAddressError extends Error {
  constructor(public readonly address: string, reason: string) {
    super(`Invalid peer address "${address}": ${reason}`);
    this.name = 'InvalidPeerAddressError';
  }
}

export class UnreachablePeerError extends Error {
  constructor(
    public readonly address: string,
    public readonly reason: string
  ) {
    super(`Peer ${address} unreachable: ${reason}`);
    this.name = 'UnreachablePeerError';
  }
}

export interface PeerChain {
  address: string;
  length: number;
  chain: Chain;
}

/** Fetches a peer's chain. Rejects with UnreachablePeerError, InvalidChainError or EmptyChainError. */
export type PeerChainFetcher = (address: string) => Promise<PeerChain>;

export class MissingNodeListError extends Error {
  constructor() {
    super('Please supply a valid list of nodes');
    this.name = 'MissingNodeListError';
  }
}
