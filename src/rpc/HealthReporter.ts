/**
 * Health Reporter
 *
 * Probes every member of a chain's pool concurrently and reports the results
 * in pool order. Read-only: never promotes or reorders.
 *
 * @module rpc/HealthReporter
 */

import { BulkheadManager } from '../resilience/BulkheadManager';
import { RailError, ValidationError } from '../utils/errors';
import { Validators } from '../utils/validators';
import { createChildLogger, type Logger } from '../utils/logger';
import type { EndpointPoolManager } from './EndpointPoolManager';
import {
  DEFAULT_PROBE_TIMEOUT_MS,
  failure,
  success,
  type EndpointHealth,
  type ProbeFn,
  type RailResult,
} from './types';

export interface HealthReporterOptions {
  pools: Pick<EndpointPoolManager, 'get'>;
  probe: ProbeFn;
  /** @default 5000 */
  probeTimeoutMs?: number;
  logger?: Logger;
}

export class HealthReporter {
  private pools: Pick<EndpointPoolManager, 'get'>;
  private probe: ProbeFn;
  private probeTimeoutMs: number;
  private log: Logger;

  constructor(options: HealthReporterOptions) {
    this.pools = options.pools;
    this.probe = options.probe;
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.log = options.logger ?? createChildLogger('health');
  }

  async report(chainId: number): Promise<RailResult<EndpointHealth[]>> {
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

    const endpoints = [pool.primary, ...pool.backups];
    const bulkhead = new BulkheadManager({ maxConcurrent: endpoints.length });

    const entries = await bulkhead.map(endpoints, async (url, position): Promise<EndpointHealth> => ({
      role: position === 0 ? 'primary' : 'backup',
      position,
      url,
      result: await this.probe(url, chainId, this.probeTimeoutMs),
    }));

    const healthy = entries.filter(e => e.result.ok).length;
    this.log.info({ chainId, healthy, total: entries.length }, 'Health report complete');

    return success(entries);
  }
}
