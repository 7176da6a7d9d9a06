import { describe, it, expect, vi } from 'vitest';
import { EndpointPoolManager } from './EndpointPoolManager';
import { InMemoryConfigStore, type ConfigStore } from '../infrastructure/config/ConfigSnapshot';
import { createScriptedProbe, type ScriptedEndpoint } from '../test-utils';

const P = 'https://primary.test';
const B1 = 'https://backup-one.test';
const B2 = 'https://backup-two.test';
const C = 'https://candidate.test';

const HEALTHY: Record<string, ScriptedEndpoint> = {
  [P]: { latencyMs: 40 },
  [B1]: { latencyMs: 50 },
  [B2]: { latencyMs: 60 },
  [C]: { latencyMs: 70 },
};

async function setup(rpcs: Record<string, string[] | string> = {}, script = HEALTHY) {
  const store = new InMemoryConfigStore({ rpcs, apiKeys: { etherscan: 'test-secret' } });
  const scripted = createScriptedProbe(script);
  const pools = new EndpointPoolManager({ probe: scripted.probe, store });
  await pools.load();
  return { pools, store, calls: scripted.calls };
}

describe('EndpointPoolManager', () => {
  describe('load', () => {
    it('should migrate legacy entries and list pools by chain id', async () => {
      const { pools } = await setup({ '137': 'https://polygon.test', '1': [P, B1] });

      expect(pools.list()).toEqual([
        { chainId: 1, primary: P, backups: [B1] },
        { chainId: 137, primary: 'https://polygon.test', backups: [] },
      ]);
    });

    it('should reject when the store cannot be read', async () => {
      const store: ConfigStore = {
        load: vi.fn(async () => {
          throw new Error('disk unavailable');
        }),
        save: vi.fn(async () => undefined),
      };
      const pools = new EndpointPoolManager({ probe: createScriptedProbe({}).probe, store });

      await expect(pools.load()).rejects.toThrow('disk unavailable');
    });
  });

  describe('setPrimary', () => {
    it('should create the pool, return latency and save', async () => {
      const { pools, store } = await setup();

      const result = await pools.setPrimary(1, P);

      expect(result).toEqual({ ok: true, value: 40 });
      expect(pools.get(1)).toEqual({ chainId: 1, primary: P, backups: [] });
      expect(store.saveCount).toBe(1);
      expect(store.current()).toEqual({ rpcs: { '1': [P] }, apiKeys: { etherscan: 'test-secret' } });
    });

    it('should leave the pool untouched when the probe fails', async () => {
      const { pools, store } = await setup({}, { [P]: { chainId: 137 } });

      const result = await pools.setPrimary(1, P);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('ChainMismatch');
      }
      expect(pools.get(1)).toBeUndefined();
      expect(store.saveCount).toBe(0);
    });

    it('should replace an existing primary and keep backups', async () => {
      const { pools } = await setup({ '1': [P, B1] });

      await pools.setPrimary(1, C);

      expect(pools.get(1)).toEqual({ chainId: 1, primary: C, backups: [B1] });
    });

    it('should remove the URL from backups when it becomes primary', async () => {
      const { pools } = await setup({ '1': [P, B1, B2] });

      await pools.setPrimary(1, B1);

      expect(pools.get(1)).toEqual({ chainId: 1, primary: B1, backups: [B2] });
    });

    it('should reject malformed input before probing', async () => {
      const { pools, calls } = await setup();

      const badUrl = await pools.setPrimary(1, 'ftp://files.test');
      const badChain = await pools.setPrimary(0, P);

      expect(badUrl.ok || badUrl.error.kind).toBe('InvalidInput');
      expect(badChain.ok || badChain.error.kind).toBe('InvalidInput');
      expect(calls).toEqual([]);
    });
  });

  describe('addBackup', () => {
    it('should require a primary', async () => {
      const { pools, calls } = await setup();

      const result = await pools.addBackup(1, B1);

      expect(result.ok || result.error.kind).toBe('NoPrimaryConfigured');
      expect(calls).toEqual([]);
    });

    it('should append a verified backup', async () => {
      const { pools, store } = await setup({ '1': [P, B1] });

      const result = await pools.addBackup(1, B2);

      expect(result).toEqual({ ok: true, value: 60 });
      expect(pools.get(1)).toEqual({ chainId: 1, primary: P, backups: [B1, B2] });
      expect(store.current()?.rpcs).toEqual({ '1': [P, B1, B2] });
    });

    it('should reject duplicates of the primary or a backup', async () => {
      const { pools } = await setup({ '1': [P, B1] });

      const samePrimary = await pools.addBackup(1, P);
      const sameBackup = await pools.addBackup(1, B1);

      expect(samePrimary.ok || samePrimary.error.kind).toBe('DuplicateEndpoint');
      expect(sameBackup.ok || sameBackup.error.kind).toBe('DuplicateEndpoint');
    });

    it('should reject a third backup', async () => {
      const { pools, calls } = await setup({ '1': [P, B1, B2] });

      const result = await pools.addBackup(1, C);

      expect(result.ok || result.error.kind).toBe('PoolFull');
      expect(calls).toEqual([]);
    });

    it('should return the probe failure kind', async () => {
      const { pools } = await setup({ '1': [P] }, { ...HEALTHY, [C]: { error: 'Timeout' } });

      const result = await pools.addBackup(1, C);

      expect(result.ok || result.error.kind).toBe('Timeout');
      expect(pools.get(1)?.backups).toEqual([]);
    });

    it('should re-check capacity after concurrent probes finish', async () => {
      const D = 'https://candidate-two.test';
      const { pools } = await setup(
        { '1': [P, B1] },
        { ...HEALTHY, [C]: { delayMs: 20 }, [D]: { delayMs: 20 } }
      );

      const results = await Promise.all([pools.addBackup(1, C), pools.addBackup(1, D)]);

      const outcomes = results.map(r => (r.ok ? 'ok' : r.error.kind)).sort();
      expect(outcomes).toEqual(['PoolFull', 'ok']);
      expect(pools.get(1)?.backups).toHaveLength(2);
    });
  });

  describe('rotate', () => {
    it('should move the old primary to the end of the backups', async () => {
      const { pools } = await setup({ '1': [P, B1, B2] });

      const result = await pools.rotate(1);

      expect(result).toEqual({ ok: true, value: B1 });
      expect(pools.get(1)).toEqual({ chainId: 1, primary: B1, backups: [B2, P] });
    });

    it('should swap primary and the single backup', async () => {
      const { pools } = await setup({ '1': [P, B1] });

      await pools.rotate(1);

      expect(pools.get(1)).toEqual({ chainId: 1, primary: B1, backups: [P] });
    });

    it('should not probe', async () => {
      const { pools, calls } = await setup({ '1': [P, B1] });

      await pools.rotate(1);

      expect(calls).toEqual([]);
    });

    it('should report missing pools and empty backups', async () => {
      const { pools } = await setup({ '1': [P] });

      const noBackups = await pools.rotate(1);
      const noPool = await pools.rotate(5);

      expect(noBackups.ok || noBackups.error.kind).toBe('NoBackupsAvailable');
      expect(noPool.ok || noPool.error.message).toBe('No RPC configuration found for chain 5');
    });
  });

  describe('promote', () => {
    it('should put the old primary at the front of the backups', async () => {
      const { pools, store } = await setup({ '1': [P, B1, B2] });

      const changed = await pools.promote(1, B2);

      expect(changed).toBe(true);
      expect(pools.get(1)).toEqual({ chainId: 1, primary: B2, backups: [P, B1] });
      expect(store.saveCount).toBe(1);
    });

    it('should do nothing for the primary, unknown URLs or missing pools', async () => {
      const { pools, store } = await setup({ '1': [P, B1] });

      expect(await pools.promote(1, P)).toBe(false);
      expect(await pools.promote(1, C)).toBe(false);
      expect(await pools.promote(10, B1)).toBe(false);
      expect(pools.get(1)).toEqual({ chainId: 1, primary: P, backups: [B1] });
      expect(store.saveCount).toBe(0);
    });
  });

  describe('delete', () => {
    it('should remove the pool and save', async () => {
      const { pools, store } = await setup({ '1': [P, B1], '10': ['https://optimism.test'] });

      const result = await pools.delete(1);

      expect(result).toEqual({ ok: true, value: { chainId: 1, primary: P, backups: [B1] } });
      expect(pools.list().map(p => p.chainId)).toEqual([10]);
      expect(store.current()?.rpcs).toEqual({ '10': ['https://optimism.test'] });
    });

    it('should report a missing pool', async () => {
      const { pools } = await setup();

      const result = await pools.delete(1);

      expect(result.ok || result.error.kind).toBe('NoRpcConfigured');
    });
  });

  describe('persistence failures', () => {
    it('should keep the in-memory change when saving fails', async () => {
      const store: ConfigStore = {
        load: vi.fn(async () => undefined),
        save: vi.fn(async () => {
          throw new Error('read-only filesystem');
        }),
      };
      const pools = new EndpointPoolManager({ probe: createScriptedProbe(HEALTHY).probe, store });
      await pools.load();

      const result = await pools.setPrimary(1, P);

      expect(result.ok).toBe(true);
      expect(store.save).toHaveBeenCalledTimes(1);
      expect(pools.get(1)?.primary).toBe(P);
    });
  });

  it('should return copies from list and get', async () => {
    const { pools } = await setup({ '1': [P, B1] });

    const snapshot = pools.get(1);
    snapshot?.backups.push(C);

    expect(pools.get(1)?.backups).toEqual([B1]);
  });
});
