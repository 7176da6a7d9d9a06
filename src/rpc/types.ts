/**
 * RPC pool types
 *
 * Pool, probe and result shapes shared by the probe, pool manager,
 * failover executor, health reporter and registry.
 *
 * @module rpc/types
 */

import type { RailError } from '../utils/errors';

/**
 * Failure causes a probe or a single attempt can report
 */
export type ProbeErrorKind = 'Unreachable' | 'Timeout' | 'ChainMismatch' | 'MalformedResponse';

/**
 * Every tagged failure the rail can return
 */
export type RailErrorKind =
  | ProbeErrorKind
  | 'NoRpcConfigured'
  | 'NoPrimaryConfigured'
  | 'NoBackupsAvailable'
  | 'PoolFull'
  | 'DuplicateEndpoint'
  | 'AllEndpointsFailed'
  | 'RegistryUnavailable'
  | 'InvalidInput';

/**
 * Success payload or tagged error; rail operations resolve to this instead of throwing
 */
export type RailResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RailError };

export function success<T>(value: T): RailResult<T> {
  return { ok: true, value };
}

export function failure<T>(error: RailError): RailResult<T> {
  return { ok: false, error };
}

/**
 * Endpoints configured for one chain
 */
export interface EndpointPool {
  chainId: number;
  /** Preferred endpoint, tried first */
  primary: string;
  /** Ranked fallbacks, at most MAX_BACKUPS */
  backups: string[];
}

/**
 * Outcome of a single identity probe
 */
export interface ProbeResult {
  url: string;
  ok: boolean;
  /** Wall-clock time of the identity query; absent when no response arrived */
  latencyMs?: number;
  error?: ProbeErrorKind;
  reportedChainId?: number;
  /** Human-readable failure detail */
  detail?: string;
}

/**
 * Performs a probe; injected so tests and callers can substitute the network
 */
export type ProbeFn = (url: string, expectedChainId: number, timeoutMs: number) => Promise<ProbeResult>;

/**
 * Single-endpoint read executed by the failover executor
 */
export type RpcOperation<T> = (endpointUrl: string, signal: AbortSignal) => Promise<T>;

/**
 * Successful failover execution with metadata
 */
export interface FailoverCallResult<T> {
  value: T;
  endpoint: string;
  latencyMs: number;
  /** Number of endpoints tried, including the successful one */
  attempts: number;
  /** Whether the successful endpoint was promoted to primary */
  promoted: boolean;
}

export type EndpointRole = 'primary' | 'backup';

/**
 * Health report entry for one pool member
 */
export interface EndpointHealth {
  role: EndpointRole;
  /** 0 for the primary, 1..n for backups */
  position: number;
  url: string;
  result: ProbeResult;
}

/**
 * Latency percentile snapshot
 */
export interface LatencyPercentiles {
  p50: number;
  p95: number;
  p99: number;
}

/**
 * Endpoint metrics snapshot
 */
export interface EndpointMetricsSnapshot {
  chainId: number;
  endpoint: string;
  latency: LatencyPercentiles;
  errorRate: number;
  totalRequests: number;
  totalErrors: number;
  windowStart: Date;
  windowEnd: Date;
}

/**
 * Maximum number of backups per chain
 */
export const MAX_BACKUPS = 2;

/**
 * Probe timeout used for pool mutations and health reports
 */
export const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

/**
 * Probe timeout used while scanning the registry directory
 */
export const DEFAULT_SCAN_PROBE_TIMEOUT_MS = 3_000;

/**
 * Per-attempt timeout for failover reads
 */
export const DEFAULT_ATTEMPT_TIMEOUT_MS = 15_000;

/**
 * Rolling metrics window duration (5 minutes)
 */
export const METRICS_ROLLING_WINDOW_MS = 5 * 60 * 1000;

/**
 * Transform the value of a successful result; failures pass through
 */
export function mapResult<T, U>(result: RailResult<T>, fn: (value: T) => U): RailResult<U> {
  return result.ok ? success(fn(result.value)) : result;
}
