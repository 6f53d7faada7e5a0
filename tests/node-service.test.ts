import { describe, it, expect } from 'vitest';
import { createNode, loadLedger } from '../src/node/bootstrap.js';
import { REWARD_STAMP } from '../src/node/node-service.js';
import type { NodeSettings } from '../src/config/settings.js';
import { InMemoryChainStore } from '../src/persistence/chain-store.js';
import type { ChainStore } from '../src/persistence/types.js';
import type { PeerChainFetcher } from '../src/peers/peer-types.js';
import { InvalidPeerAddressError, MissingNodeListError, UnreachablePeerError } from '../src/peers/peer-types.js';
import { InvalidFieldError, MissingFieldError } from '../src/ledger/ledger-types.js';
import type { Chain } from '../src/ledger/ledger-types.js';
import { isValidChain } from '../src/ledger/ledger-validator.js';
import { buildChain, withBlock } from './helpers/chain.js';

const settings: NodeSettings = {
  port: 5000,
  nodeId: 'node-a',
  peerFetchTimeoutMs: 1000,
  proofYieldEvery: 5000,
  miningRewardEnabled: false,
};

const noPeers: PeerChainFetcher = async address => {
  throw new UnreachablePeerError(address, 'no route');
};

class FailingChainStore implements ChainStore {
  async load(): Promise<Chain | null> {
    return null;
  }

  async save(): Promise<void> {
    throw new Error('disk full');
  }

  mode(): 'memory' {
    return 'memory';
  }
}

const penny = { owner: 'alice', stamp: 'Penny Black', year: 1840, value: 250 };

describe('NodeService', () => {
  it('puts exactly the submitted transaction into the next mined block', async () => {
    const node = await createNode(settings, { fetchPeerChain: noPeers });

    const submitted = await node.submitTransaction(penny);
    const { block, persisted } = await node.mine();

    expect(submitted.index).toBe(2);
    expect(block.transactions).toEqual([penny]);
    expect(persisted).toBe(true);
    expect(node.metricsSnapshot().chain).toEqual({ length: 2, pendingTransactions: 0 });
  });

  it('adds the reward transaction when enabled', async () => {
    const node = await createNode({ ...settings, miningRewardEnabled: true }, { fetchPeerChain: noPeers });

    const { block } = await node.mine();

    expect(block.transactions).toEqual([{ owner: 'node-a', stamp: REWARD_STAMP, year: 0, value: 0 }]);
  });

  it('rejects an incomplete transaction and leaves the pool unchanged', async () => {
    const node = await createNode(settings, { fetchPeerChain: noPeers });

    await expect(node.submitTransaction({ owner: 'alice', stamp: 'Penny Black' })).rejects.toBeInstanceOf(MissingFieldError);
    await expect(node.submitTransaction({ ...penny, year: 'old' })).rejects.toBeInstanceOf(InvalidFieldError);

    const snapshot = node.metricsSnapshot();
    expect(snapshot.chain.pendingTransactions).toBe(0);
    expect(snapshot.transactions).toEqual({ submitted: 0, rejected: 2 });
  });

  it('registers and lists peers', async () => {
    const node = await createNode(settings, { fetchPeerChain: noPeers });

    expect(node.registerNodes(['http://10.0.0.2:5000', '10.0.0.3:5000'])).toEqual(['10.0.0.2:5000', '10.0.0.3:5000']);
    expect(node.listNodes()).toEqual(['10.0.0.2:5000', '10.0.0.3:5000']);
    expect(() => node.registerNodes(undefined)).toThrow(MissingNodeListError);
    expect(() => node.registerNodes(['ok:1', 5])).toThrow(MissingNodeListError);
  });

  it('registers none of a batch that holds an invalid address', async () => {
    const node = await createNode(settings, { fetchPeerChain: noPeers });

    expect(() => node.registerNodes(['10.0.0.2:5000', 'http://'])).toThrow(InvalidPeerAddressError);
    expect(node.listNodes()).toEqual([]);
  });

  it('adopts a longer peer chain and persists it', async () => {
    const store = new InMemoryChainStore();
    const remote = buildChain(4, 'peer');
    const node = await createNode(settings, {
      store,
      fetchPeerChain: async address => ({ address, length: remote.length, chain: remote }),
    });
    node.registerNodes(['10.0.0.2:5000']);

    const result = await node.resolve();

    expect(result.replaced).toBe(true);
    expect(result.persisted).toBe(true);
    expect(node.getChain()).toEqual({ chain: remote, length: 4 });
    await expect(store.load()).resolves.toEqual(remote);
  });

  it('reports a failed save without undoing the mined block', async () => {
    const node = await createNode(settings, { fetchPeerChain: noPeers, store: new FailingChainStore() });

    const { block, persisted } = await node.mine();

    expect(persisted).toBe(false);
    expect(node.getChainLength()).toBe(2);
    expect(block.index).toBe(2);
    expect(node.metricsSnapshot().storage).toEqual({ mode: 'memory', saveFailures: 1 });
  });

  it('keeps a valid chain across a restart through the store', async () => {
    const store = new InMemoryChainStore();
    const first = await createNode(settings, { fetchPeerChain: noPeers, store });
    await first.submitTransaction(penny);
    await first.mine();

    const restarted = await createNode(settings, { fetchPeerChain: noPeers, store });

    expect(restarted.getChain()).toEqual(first.getChain());
    expect(isValidChain(restarted.getChain().chain)).toBe(true);
  });
});

describe('loadLedger', () => {
  it('starts from genesis when the snapshot is tampered', async () => {
    const store = new InMemoryChainStore();
    await store.save(withBlock(buildChain(3), 2, { previousHash: 'x' }));

    const ledger = await loadLedger(store, {});

    expect(ledger.length).toBe(1);
  });

  it('starts from genesis when the snapshot is empty', async () => {
    const store = new InMemoryChainStore();
    await store.save([]);

    const ledger = await loadLedger(store, {});

    expect(ledger.length).toBe(1);
  });

  it('starts from genesis without a store', async () => {
    expect((await loadLedger(undefined, {})).length).toBe(1);
  });
});
