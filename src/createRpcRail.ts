import { ConfigurationService, type RailSettingsOverrides } from './infrastructure/config/ConfigurationService';
import { InMemoryConfigStore, type ConfigStore } from './infrastructure/config/ConfigSnapshot';
import { TimeoutLevel, TimeoutManager } from './resilience/TimeoutManager';
import { EndpointProbe, type ChainIdReader, type StateReader } from './rpc/EndpointProbe';
import { EndpointPoolManager } from './rpc/EndpointPoolManager';
import { FailoverExecutor, type ExecuteOptions } from './rpc/FailoverExecutor';
import { HealthReporter } from './rpc/HealthReporter';
import { ProviderMetrics } from './rpc/ProviderMetrics';
import { ChainRegistry, type ChainInfo, type DirectoryFetcher } from './registry/ChainRegistry';
import {
  ChainReadService,
  type NativeBalance,
  type TokenBalance,
  type TokenInfo,
} from './services/ChainReadService';
import type { ChainReaderFactory } from './adapters/ViemChainReader';
import { createChildLogger, type Logger } from './utils/logger';
import type {
  EndpointHealth,
  EndpointMetricsSnapshot,
  EndpointPool,
  FailoverCallResult,
  ProbeFn,
  RailResult,
  RpcOperation,
} from './rpc/types';

/**
 * Options for creating an RpcRail instance.
 * Every network collaborator can be replaced; defaults go over viem and global fetch.
 */
export interface RpcRailOptions {
  /** Where pools are loaded from and saved to. Defaults to an in-memory store. */
  store?: ConfigStore;

  /** Settings merged over defaults and RAIL_* environment variables */
  settings?: RailSettingsOverrides;

  /** Use a prepared configuration instead of building one from settings */
  configuration?: ConfigurationService;

  /** Replaces the endpoint probe entirely */
  probe?: ProbeFn;

  /** Chain id query used by the default probe */
  readChainId?: ChainIdReader;

  /** State read used by the default probe when verifyStateRead is on */
  readState?: StateReader;

  /** Chain directory download */
  fetchDirectory?: DirectoryFetcher;

  /** Per-endpoint reader used for balance and token reads */
  readerFactory?: ChainReaderFactory;

  /** Clock for the registry cache */
  now?: () => number;

  logger?: Logger;
}

/**
 * Fully wired RPC rail: endpoint pools, failover reads, health reports and registry discovery
 */
export class RpcRail {
  readonly pools: EndpointPoolManager;
  readonly executor: FailoverExecutor;
  readonly reporter: HealthReporter;
  readonly registry: ChainRegistry;
  readonly reads: ChainReadService;
  private metrics: ProviderMetrics;

  constructor(
    pools: EndpointPoolManager,
    executor: FailoverExecutor,
    reporter: HealthReporter,
    registry: ChainRegistry,
    reads: ChainReadService,
    metrics: ProviderMetrics,
  ) {
    this.pools = pools;
    this.executor = executor;
    this.reporter = reporter;
    this.registry = registry;
    this.reads = reads;
    this.metrics = metrics;
  }

  /**
   * Read the stored pools. Rejects only when the store itself fails.
   */
  load(): Promise<EndpointPool[]> {
    return this.pools.load();
  }

  setPrimary(chainId: number, url: string): Promise<RailResult<number>> {
    return this.pools.setPrimary(chainId, url);
  }

  addBackup(chainId: number, url: string): Promise<RailResult<number>> {
    return this.pools.addBackup(chainId, url);
  }

  rotate(chainId: number): Promise<RailResult<string>> {
    return this.pools.rotate(chainId);
  }

  delete(chainId: number): Promise<RailResult<EndpointPool>> {
    return this.pools.delete(chainId);
  }

  list(): EndpointPool[] {
    return this.pools.list();
  }

  get(chainId: number): EndpointPool | undefined {
    return this.pools.get(chainId);
  }

  execute<T>(
    chainId: number,
    operation: RpcOperation<T>,
    options?: ExecuteOptions
  ): Promise<RailResult<FailoverCallResult<T>>> {
    return this.executor.execute(chainId, operation, options);
  }

  report(chainId: number): Promise<RailResult<EndpointHealth[]>> {
    return this.reporter.report(chainId);
  }

  getCandidates(chainId: number): Promise<RailResult<string[]>> {
    return this.registry.getCandidates(chainId);
  }

  getChainInfo(chainId: number): Promise<RailResult<ChainInfo | undefined>> {
    return this.registry.getChainInfo(chainId);
  }

  getNativeBalance(chainId: number, address: string): Promise<RailResult<NativeBalance>> {
    return this.reads.getNativeBalance(chainId, address);
  }

  getTokenBalance(chainId: number, token: string, owner: string): Promise<RailResult<TokenBalance>> {
    return this.reads.getTokenBalance(chainId, token, owner);
  }

  getTokenInfo(chainId: number, token: string): Promise<RailResult<TokenInfo>> {
    return this.reads.getTokenInfo(chainId, token);
  }

  /**
   * Rolling per-endpoint latency and error rate, for one chain or all
   */
  getMetrics(chainId?: number): EndpointMetricsSnapshot[] {
    return this.metrics.getSnapshots(chainId);
  }
}

/**
 * Factory that wires an RpcRail from settings and injectable collaborators.
 * Throws when the settings are invalid; call load() afterwards to read the store.
 */
export function createRpcRail(options: RpcRailOptions = {}): RpcRail {
  const configuration = options.configuration ?? new ConfigurationService(options.settings);
  const problems = configuration.validate();
  if (problems.length > 0) {
    throw new Error(`Invalid RPC rail configuration: ${problems.join('; ')}`);
  }

  const { rpc, registry: registrySettings } = configuration.getSettings();
  const timeouts = new TimeoutManager({
    scanProbe: registrySettings.scanProbeTimeoutMs,
    probe: rpc.probeTimeoutMs,
    attempt: rpc.attemptTimeoutMs,
    registryFetch: registrySettings.fetchTimeoutMs,
  });

  const componentLogger = (component: string): Logger =>
    options.logger ? options.logger.child({ component }) : createChildLogger(component);

  const probe: ProbeFn =
    options.probe ?? createDefaultProbe(options, rpc.verifyStateRead, componentLogger('probe'));
  const store = options.store ?? new InMemoryConfigStore();
  const metrics = new ProviderMetrics();

  const pools = new EndpointPoolManager({
    probe,
    store,
    probeTimeoutMs: timeouts.getTimeout(TimeoutLevel.PROBE),
    logger: componentLogger('pool'),
  });

  const executor = new FailoverExecutor({
    pools,
    metrics,
    attemptTimeoutMs: timeouts.getTimeout(TimeoutLevel.ATTEMPT),
    logger: componentLogger('failover'),
  });

  const reporter = new HealthReporter({
    pools,
    probe,
    probeTimeoutMs: timeouts.getTimeout(TimeoutLevel.PROBE),
    logger: componentLogger('health'),
  });

  const registry = new ChainRegistry({
    probe,
    fetchDirectory: options.fetchDirectory,
    settings: {
      ...registrySettings,
      scanProbeTimeoutMs: timeouts.getTimeout(TimeoutLevel.SCAN_PROBE),
      fetchTimeoutMs: timeouts.getTimeout(TimeoutLevel.REGISTRY_FETCH),
    },
    now: options.now,
    logger: componentLogger('registry'),
  });

  const reads = new ChainReadService({
    executor,
    readerFactory: options.readerFactory,
    attemptTimeoutMs: timeouts.getTimeout(TimeoutLevel.ATTEMPT),
  });

  return new RpcRail(pools, executor, reporter, registry, reads, metrics);
}

function createDefaultProbe(options: RpcRailOptions, verifyStateRead: boolean, logger: Logger): ProbeFn {
  const endpointProbe = new EndpointProbe({
    readChainId: options.readChainId,
    readState: options.readState,
    verifyStateRead,
    logger,
  });
  return (url, expectedChainId, timeoutMs) => endpointProbe.probe(url, expectedChainId, timeoutMs);
}
