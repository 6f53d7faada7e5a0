import { InvalidPeerAddressError } from './peer-types.js';
import { logger } from '../observability/logger.js';

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Reduce an address to host[:port]. Both "http://10.0.0.5:5000/anything" and
 * "10.0.0.5:5000" register as "10.0.0.5:5000".
 */
export function normalizePeerAddress(address: string): string {
  const trimmed = address.trim();
  if (trimmed.length === 0) {
    throw new InvalidPeerAddressError(address, 'empty address');
  }

  const withScheme = SCHEME_PATTERN.test(trimmed) ? trimmed : `http://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    throw new InvalidPeerAddressError(address, 'not a valid URL or host:port');
  }

  if (!parsed.host) {
    throw new InvalidPeerAddressError(address, 'missing host');
  }

  return parsed.host;
}

export class PeerRegistry {
  private readonly nodes = new Set<string>();

  /** Returns the normalized address. Registering twice is a no-op. */
  register(address: string): string {
    const normalized = normalizePeerAddress(address);
    this.add(normalized);
    return normalized;
  }

  /**
   * All or nothing: every address is normalized before any is added, so one
   * bad entry leaves the registry untouched.
   */
  registerAll(addresses: readonly string[]): string[] {
    const normalized = addresses.map(normalizePeerAddress);
    for (const address of normalized) {
      this.add(address);
    }
    return normalized;
  }

  list(): string[] {
    return [...this.nodes];
  }

  get size(): number {
    return this.nodes.size;
  }

  private add(normalized: string): void {
    if (this.nodes.has(normalized)) return;

    this.nodes.add(normalized);
    logger.info('peer_registered', 'Peer node registered', {
      address: normalized,
      totalNodes: this.nodes.size,
    });
  }
}
