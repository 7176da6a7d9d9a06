import { describe, it, expect, vi } from 'vitest';
import { createRpcRail, RpcRail } from './createRpcRail';
import { InMemoryConfigStore } from './infrastructure/config/ConfigSnapshot';
import { ConfigurationService } from './infrastructure/config/ConfigurationService';
import type { ChainReader } from './adapters/ViemChainReader';
import type { ChainIdReader } from './rpc/EndpointProbe';

const MAINNET_A = 'https://mainnet-a.test';
const MAINNET_B = 'https://mainnet-b.test';
const MAINNET_C = 'https://mainnet-c.test';
const POLYGON = 'https://polygon.test';
const OWNER = '0x1111111111111111111111111111111111111111';

const CHAIN_BY_URL: Record<string, number> = {
  [MAINNET_A]: 1,
  [MAINNET_B]: 1,
  [MAINNET_C]: 1,
  [POLYGON]: 137,
};

const readChainId: ChainIdReader = async (url) => {
  const chainId = CHAIN_BY_URL[url];
  if (chainId === undefined) throw new Error('fetch failed');
  return chainId;
};

function createTestRail(store = new InMemoryConfigStore()) {
  const reader: ChainReader = {
    getNativeBalance: vi.fn(async () => 2_000_000_000_000_000_000n),
    getTokenBalance: vi.fn(async () => ({ raw: 0n, decimals: 18 })),
    getTokenMetadata: vi.fn(async () => ({ name: 'Test', symbol: 'TST', decimals: 18, totalSupply: 0n })),
  };
  const rail = createRpcRail({
    store,
    configuration: new ConfigurationService(undefined, {}),
    readChainId,
    fetchDirectory: async () => [
      { chainId: 1, name: 'Test Mainnet', rpc: [MAINNET_C, 'https://gone.test', MAINNET_A] },
    ],
    readerFactory: () => reader,
  });
  return { rail, store, reader };
}

describe('createRpcRail', () => {
  it('should create a rail with default settings', () => {
    const { rail } = createTestRail();

    expect(rail).toBeInstanceOf(RpcRail);
    expect(rail.list()).toEqual([]);
  });

  it('should throw on invalid settings', () => {
    expect(() => createRpcRail({ settings: { registry: { maxCandidates: 0 } } })).toThrow(
      'Invalid RPC rail configuration: registry.maxCandidates must be a positive integer'
    );
  });

  it('should throw when the probe timeout exceeds the attempt timeout', () => {
    const configuration = new ConfigurationService({ rpc: { probeTimeoutMs: 20_000 } }, {});

    expect(() => createRpcRail({ configuration })).toThrow(
      'Invalid timeout hierarchy: PROBE (20000ms) must be <= ATTEMPT (15000ms)'
    );
  });

  describe('pool management', () => {
    it('should verify, store and rotate endpoints', async () => {
      const { rail, store } = createTestRail();
      await rail.load();

      expect((await rail.setPrimary(1, MAINNET_A)).ok).toBe(true);
      expect((await rail.addBackup(1, MAINNET_B)).ok).toBe(true);
      expect((await rail.addBackup(1, MAINNET_C)).ok).toBe(true);

      const rotated = await rail.rotate(1);

      expect(rotated).toEqual({ ok: true, value: MAINNET_B });
      expect(rail.get(1)).toEqual({ chainId: 1, primary: MAINNET_B, backups: [MAINNET_C, MAINNET_A] });
      expect(store.current()).toEqual({ rpcs: { '1': [MAINNET_B, MAINNET_C, MAINNET_A] }, apiKeys: {} });
    });

    it('should refuse an endpoint serving another chain', async () => {
      const { rail } = createTestRail();

      const result = await rail.setPrimary(1, POLYGON);

      expect(result.ok || result.error.kind).toBe('ChainMismatch');
      expect(rail.get(1)).toBeUndefined();
    });

    it('should load a legacy snapshot and delete pools', async () => {
      const { rail } = createTestRail(
        new InMemoryConfigStore({ rpcs: { '137': POLYGON }, apiKeys: {} })
      );

      await expect(rail.load()).resolves.toEqual([{ chainId: 137, primary: POLYGON, backups: [] }]);
      expect((await rail.delete(137)).ok).toBe(true);
      expect(rail.list()).toEqual([]);
    });
  });

  describe('reads and reports', () => {
    it('should fail over, promote and record metrics', async () => {
      const { rail } = createTestRail(
        new InMemoryConfigStore({ rpcs: { '1': [MAINNET_A, MAINNET_B] }, apiKeys: {} })
      );
      await rail.load();

      const result = await rail.execute(1, async (url) => {
        if (url === MAINNET_A) throw new Error('fetch failed');
        return 19_000_000n;
      });

      expect(result.ok && result.value.value).toBe(19_000_000n);
      expect(rail.get(1)?.primary).toBe(MAINNET_B);
      expect(rail.getMetrics(1).map(m => [m.endpoint, m.totalErrors])).toEqual([
        [MAINNET_A, 1],
        [MAINNET_B, 0],
      ]);
    });

    it('should read native balances through the pool', async () => {
      const { rail } = createTestRail(new InMemoryConfigStore({ rpcs: { '1': [MAINNET_A] }, apiKeys: {} }));
      await rail.load();

      const result = await rail.getNativeBalance(1, OWNER);

      expect(result.ok && result.value.formatted).toBe('2');
    });

    it('should report pool health in order', async () => {
      const { rail } = createTestRail(
        new InMemoryConfigStore({ rpcs: { '1': [MAINNET_A, 'https://gone.test'] }, apiKeys: {} })
      );
      await rail.load();

      const result = await rail.report(1);

      expect(result.ok && result.value.map(e => [e.role, e.result.ok])).toEqual([
        ['primary', true],
        ['backup', false],
      ]);
    });

    it('should discover working candidates from the directory', async () => {
      const { rail } = createTestRail();

      const result = await rail.getCandidates(1);

      expect(result.ok).toBe(true);
      expect(result.ok && [...result.value].sort()).toEqual([MAINNET_A, MAINNET_C]);
      await expect(rail.getChainInfo(1)).resolves.toEqual({
        ok: true,
        value: { chainId: 1, name: 'Test Mainnet', nativeCurrency: undefined, rpcCount: 3 },
      });
    });
  });
});
