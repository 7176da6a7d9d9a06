/**
 * Failover Executor
 *
 * Runs a read against a chain's pool in order (primary, then backups).
 * Each attempt has its own timeout and AbortSignal. The first backup that
 * succeeds is promoted to primary. No retries beyond the pool itself.
 *
 * @module rpc/FailoverExecutor
 */

import { TimeoutLevel, withTimeout } from '../resilience/TimeoutManager';
import { AllEndpointsFailedError, RailError, ValidationError, type EndpointFailure } from '../utils/errors';
import { Validators } from '../utils/validators';
import { createChildLogger, type Logger } from '../utils/logger';
import { classifyRpcError, describeRpcError } from './EndpointProbe';
import type { EndpointPoolManager } from './EndpointPoolManager';
import { ProviderMetrics } from './ProviderMetrics';
import {
  DEFAULT_ATTEMPT_TIMEOUT_MS,
  failure,
  success,
  type FailoverCallResult,
  type RailResult,
  type RpcOperation,
} from './types';

/**
 * The parts of the pool the executor needs
 */
export type PoolAccess = Pick<EndpointPoolManager, 'get' | 'promote'>;

export interface FailoverExecutorOptions {
  pools: PoolAccess;
  metrics?: ProviderMetrics;
  /** @default 15000 */
  attemptTimeoutMs?: number;
  logger?: Logger;
}

export interface ExecuteOptions {
  /** Overrides the per-attempt timeout for this call */
  attemptTimeoutMs?: number;
  /** Name used in logs and timeout errors */
  operationName?: string;
}

export class FailoverExecutor {
  private pools: PoolAccess;
  private metrics: ProviderMetrics;
  private attemptTimeoutMs: number;
  private log: Logger;

  constructor(options: FailoverExecutorOptions) {
    this.pools = options.pools;
    this.metrics = options.metrics ?? new ProviderMetrics();
    this.attemptTimeoutMs = options.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS;
    this.log = options.logger ?? createChildLogger('failover');
  }

  async execute<T>(
    chainId: number,
    operation: RpcOperation<T>,
    options: ExecuteOptions = {}
  ): Promise<RailResult<FailoverCallResult<T>>> {
    try {
      Validators.validateChainId(chainId);
    } catch (err) {
      if (err instanceof ValidationError) return failure(RailError.invalidInput(err));
      throw err;
    }

    const pool = this.pools.get(chainId);
    if (!pool) {
      return failure(RailError.noRpcConfigured(chainId));
    }

    const timeoutMs = options.attemptTimeoutMs ?? this.attemptTimeoutMs;
    const operationName = options.operationName ?? 'rpc';
    const endpoints = [pool.primary, ...pool.backups];
    const failures: EndpointFailure[] = [];

    for (const [index, endpoint] of endpoints.entries()) {
      const startMs = performance.now();
      try {
        const value = await withTimeout(
          (signal) => operation(endpoint, signal),
          timeoutMs,
          operationName,
          TimeoutLevel.ATTEMPT
        );

        const latencyMs = Math.round(performance.now() - startMs);
        this.metrics.recordSuccess(chainId, endpoint, latencyMs);

        const promoted = index > 0 ? await this.pools.promote(chainId, endpoint) : false;
        if (promoted) {
          this.log.info(
            { chainId, url: Validators.maskUrl(endpoint), attempts: index + 1 },
            'Backup RPC answered and was promoted to primary'
          );
        }

        return success({ value, endpoint, latencyMs, attempts: index + 1, promoted });
      } catch (err) {
        const latencyMs = Math.round(performance.now() - startMs);
        this.metrics.recordError(chainId, endpoint, latencyMs);

        const kind = classifyRpcError(err);
        failures.push({ url: endpoint, kind, detail: describeRpcError(err) });

        this.log.warn(
          { chainId, url: Validators.maskUrl(endpoint), kind, attempt: index + 1, operation: operationName },
          'RPC attempt failed'
        );
      }
    }

    const error = new AllEndpointsFailedError(chainId, failures);
    this.log.error({ chainId, kinds: error.kinds, operation: operationName }, error.message);
    return failure(error);
  }

  getMetrics(): ProviderMetrics {
    return this.metrics;
  }
}
