/**
 * RPC Infrastructure
 *
 * Per-chain endpoint pools, verification probes, failover execution,
 * health reports and rolling provider metrics.
 *
 * @module rpc
 */

// Types
export type {
  ProbeErrorKind,
  RailErrorKind,
  RailResult,
  EndpointPool,
  ProbeResult,
  ProbeFn,
  RpcOperation,
  FailoverCallResult,
  EndpointRole,
  EndpointHealth,
  LatencyPercentiles,
  EndpointMetricsSnapshot,
} from './types';

export {
  success,
  failure,
  mapResult,
  MAX_BACKUPS,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_SCAN_PROBE_TIMEOUT_MS,
  DEFAULT_ATTEMPT_TIMEOUT_MS,
  METRICS_ROLLING_WINDOW_MS,
} from './types';

// Probe
export {
  EndpointProbe,
  MalformedResponseError,
  classifyRpcError,
  describeRpcError,
  viemChainIdReader,
  viemStateReader,
} from './EndpointProbe';
export type { ChainIdReader, StateReader, EndpointProbeOptions } from './EndpointProbe';

// Pools
export { EndpointPoolManager } from './EndpointPoolManager';
export type { EndpointPoolManagerOptions } from './EndpointPoolManager';

// Failover
export { FailoverExecutor } from './FailoverExecutor';
export type { PoolAccess, FailoverExecutorOptions, ExecuteOptions } from './FailoverExecutor';

// Health
export { HealthReporter } from './HealthReporter';
export type { HealthReporterOptions } from './HealthReporter';

// Provider Metrics
export { ProviderMetrics } from './ProviderMetrics';
