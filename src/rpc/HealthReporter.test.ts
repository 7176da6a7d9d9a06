import { describe, it, expect } from 'vitest';
import { HealthReporter } from './HealthReporter';
import { EndpointPoolManager } from './EndpointPoolManager';
import { InMemoryConfigStore } from '../infrastructure/config/ConfigSnapshot';
import { createScriptedProbe, type ScriptedEndpoint } from '../test-utils';

const P = 'https://primary.test';
const B1 = 'https://backup-one.test';
const B2 = 'https://backup-two.test';

async function setup(script: Record<string, ScriptedEndpoint>) {
  const store = new InMemoryConfigStore({ rpcs: { '1': [P, B1, B2] }, apiKeys: {} });
  const scripted = createScriptedProbe(script);
  const pools = new EndpointPoolManager({ probe: scripted.probe, store });
  await pools.load();
  const reporter = new HealthReporter({ pools, probe: scripted.probe });
  return { reporter, pools, store };
}

describe('HealthReporter', () => {
  it('should report every member in pool order with roles', async () => {
    const { reporter } = await setup({
      [P]: { latencyMs: 30 },
      [B1]: { error: 'Timeout' },
      [B2]: { chainId: 10, latencyMs: 45 },
    });

    const result = await reporter.report(1);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map(e => [e.role, e.position, e.url])).toEqual([
      ['primary', 0, P],
      ['backup', 1, B1],
      ['backup', 2, B2],
    ]);
    expect(result.value[0].result).toEqual({ url: P, ok: true, latencyMs: 30, reportedChainId: 1 });
    expect(result.value[1].result.error).toBe('Timeout');
    expect(result.value[1].result.latencyMs).toBeUndefined();
    expect(result.value[2].result.error).toBe('ChainMismatch');
    expect(result.value[2].result.reportedChainId).toBe(10);
  });

  it('should probe members concurrently', async () => {
    const { reporter } = await setup({
      [P]: { delayMs: 40 },
      [B1]: { delayMs: 40 },
      [B2]: { delayMs: 40 },
    });

    const started = Date.now();
    await reporter.report(1);

    expect(Date.now() - started).toBeLessThan(110);
  });

  it('should never reorder the pool', async () => {
    const { reporter, pools, store } = await setup({ [P]: { error: 'Unreachable' }, [B1]: {}, [B2]: {} });

    await reporter.report(1);

    expect(pools.get(1)).toEqual({ chainId: 1, primary: P, backups: [B1, B2] });
    expect(store.saveCount).toBe(0);
  });

  it('should report a missing pool', async () => {
    const { reporter } = await setup({});

    const result = await reporter.report(56);

    expect(result.ok || result.error.kind).toBe('NoRpcConfigured');
  });
});
