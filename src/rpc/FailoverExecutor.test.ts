import { describe, it, expect, vi } from 'vitest';
import { FailoverExecutor } from './FailoverExecutor';
import { EndpointPoolManager } from './EndpointPoolManager';
import { ProviderMetrics } from './ProviderMetrics';
import { InMemoryConfigStore } from '../infrastructure/config/ConfigSnapshot';
import { AllEndpointsFailedError } from '../utils/errors';
import { createScriptedProbe } from '../test-utils';

const P = 'https://primary.test';
const B1 = 'https://backup-one.test';
const B2 = 'https://backup-two.test';

async function setup(endpoints: string[] = [P, B1, B2]) {
  const store = new InMemoryConfigStore({ rpcs: { '1': endpoints }, apiKeys: {} });
  const pools = new EndpointPoolManager({ probe: createScriptedProbe({}).probe, store });
  await pools.load();
  const metrics = new ProviderMetrics();
  const executor = new FailoverExecutor({ pools, metrics, attemptTimeoutMs: 1000 });
  return { executor, pools, store, metrics };
}

function answeringFrom(working: string[]) {
  return vi.fn(async (url: string) => {
    if (!working.includes(url)) {
      throw new Error(`connect ECONNREFUSED ${url}`);
    }
    return `block from ${url}`;
  });
}

describe('FailoverExecutor', () => {
  it('should return NoRpcConfigured when the chain has no pool', async () => {
    const { executor } = await setup();
    const operation = vi.fn(async () => 'unused');

    const result = await executor.execute(5, operation);

    expect(result.ok || result.error.kind).toBe('NoRpcConfigured');
    expect(operation).not.toHaveBeenCalled();
  });

  it('should reject an invalid chain id', async () => {
    const { executor } = await setup();

    const result = await executor.execute(-1, async () => 'unused');

    expect(result.ok || result.error.kind).toBe('InvalidInput');
  });

  it('should use the primary without touching the pool', async () => {
    const { executor, pools, store } = await setup();
    const operation = answeringFrom([P, B1, B2]);

    const result = await executor.execute(1, operation);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.value).toBe(`block from ${P}`);
      expect(result.value.endpoint).toBe(P);
      expect(result.value.attempts).toBe(1);
      expect(result.value.promoted).toBe(false);
    }
    expect(operation).toHaveBeenCalledTimes(1);
    expect(pools.get(1)).toEqual({ chainId: 1, primary: P, backups: [B1, B2] });
    expect(store.saveCount).toBe(0);
  });

  it('should fail over in order and promote the backup that answered', async () => {
    const { executor, pools, store } = await setup();
    const operation = answeringFrom([B2]);

    const result = await executor.execute(1, operation);

    expect(operation.mock.calls.map(call => call[0])).toEqual([P, B1, B2]);
    expect(result.ok && result.value.endpoint).toBe(B2);
    expect(result.ok && result.value.attempts).toBe(3);
    expect(result.ok && result.value.promoted).toBe(true);
    expect(pools.get(1)).toEqual({ chainId: 1, primary: B2, backups: [P, B1] });
    expect(store.current()?.rpcs).toEqual({ '1': [B2, P, B1] });
  });

  it('should report every failure in try order when all endpoints fail', async () => {
    const { executor, pools } = await setup();
    const signals: AbortSignal[] = [];

    const result = await executor.execute(
      1,
      async (url, signal) => {
        if (url === P) throw new Error('fetch failed');
        if (url === B1) {
          signals.push(signal);
          return new Promise<string>(() => undefined);
        }
        throw new SyntaxError('Unexpected token < in JSON');
      },
      { attemptTimeoutMs: 20, operationName: 'eth_blockNumber' }
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(AllEndpointsFailedError);
      expect(result.error.kind).toBe('AllEndpointsFailed');
      if (result.error instanceof AllEndpointsFailedError) {
        expect(result.error.kinds).toEqual(['Unreachable', 'Timeout', 'MalformedResponse']);
        expect(result.error.failures.map(f => f.url)).toEqual([P, B1, B2]);
        expect(result.error.failures[0].detail).toBe('fetch failed');
      }
      expect(result.error.message).toBe(
        'All 3 RPC endpoints failed for chain 1 (Unreachable, Timeout, MalformedResponse)'
      );
    }
    expect(signals[0].aborted).toBe(true);
    expect(pools.get(1)).toEqual({ chainId: 1, primary: P, backups: [B1, B2] });
  });

  it('should record per-endpoint metrics', async () => {
    const { executor, metrics } = await setup([P, B1]);

    await executor.execute(1, answeringFrom([B1]));

    expect(metrics.getSnapshot(1, P)?.totalErrors).toBe(1);
    expect(metrics.getSnapshot(1, B1)?.totalErrors).toBe(0);
    expect(metrics.getSnapshot(1, B1)?.totalRequests).toBe(1);
  });

  it('should promote at most once per call', async () => {
    const promote = vi.fn(async (_chainId: number, _url: string) => true);
    const spied = new FailoverExecutor({
      pools: { get: () => ({ chainId: 1, primary: P, backups: [B1, B2] }), promote },
      attemptTimeoutMs: 1000,
    });

    const result = await spied.execute(1, answeringFrom([B2]));

    expect(result.ok && result.value.promoted).toBe(true);

    expect(promote).toHaveBeenCalledTimes(1);
    expect(promote).toHaveBeenCalledWith(1, B2);
  });
});
