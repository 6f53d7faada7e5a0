import { describe, it, expect } from 'vitest';
import { PeerRegistry, normalizePeerAddress } from '../src/peers/peer-registry.js';
import { InvalidPeerAddressError } from '../src/peers/peer-types.js';

describe('normalizePeerAddress', () => {
  it('keeps host and port of a full URL', () => {
    expect(normalizePeerAddress('http://192.168.0.5:5000')).toBe('192.168.0.5:5000');
    expect(normalizePeerAddress('http://192.168.0.5:5000/chain?x=1')).toBe('192.168.0.5:5000');
  });

  it('accepts a bare host:port', () => {
    expect(normalizePeerAddress('node-b.local:5001')).toBe('node-b.local:5001');
  });

  it('drops the default port of the scheme', () => {
    expect(normalizePeerAddress('http://ledger.example:80')).toBe('ledger.example');
  });

  it('rejects empty and unparsable addresses', () => {
    expect(() => normalizePeerAddress('   ')).toThrow(InvalidPeerAddressError);
    expect(() => normalizePeerAddress('http://')).toThrow(InvalidPeerAddressError);
  });
});

describe('PeerRegistry', () => {
  it('collapses duplicate registrations', () => {
    const registry = new PeerRegistry();

    registry.register('http://10.0.0.2:5000');
    registry.register('10.0.0.2:5000');
    registry.register('http://10.0.0.3:5000/');

    expect(registry.list()).toEqual(['10.0.0.2:5000', '10.0.0.3:5000']);
    expect(registry.size).toBe(2);
  });

  it('leaves the registry unchanged on an invalid address', () => {
    const registry = new PeerRegistry();
    registry.register('10.0.0.2:5000');

    expect(() => registry.register('')).toThrow(InvalidPeerAddressError);
    expect(registry.list()).toEqual(['10.0.0.2:5000']);
  });

  it('registers a batch only when every address is valid', () => {
    const registry = new PeerRegistry();

    expect(() => registry.registerAll(['10.0.0.2:5000', '  '])).toThrow(InvalidPeerAddressError);
    expect(registry.size).toBe(0);

    expect(registry.registerAll(['http://10.0.0.2:5000', '10.0.0.3:5000'])).toEqual(['10.0.0.2:5000', '10.0.0.3:5000']);
    expect(registry.list()).toEqual(['10.0.0.2:5000', '10.0.0.3:5000']);
  });
});
