/**
 * Endpoint Pool Manager
 *
 * Owns the per-chain pools (one primary, up to MAX_BACKUPS backups).
 * Mutations for one chain are serialised; every successful mutation is
 * written to the config store. Probes run outside the chain lock, so
 * admission checks are repeated once the lock is held.
 *
 * @module rpc/EndpointPoolManager
 */

import { KeyedMutex } from '../resilience/KeyedMutex';
import {
  decodeSnapshot,
  encodeSnapshot,
  type ConfigStore,
} from '../infrastructure/config/ConfigSnapshot';
import { RailError, ValidationError, ErrorUtils } from '../utils/errors';
import { Validators } from '../utils/validators';
import { createChildLogger, type Logger } from '../utils/logger';
import {
  DEFAULT_PROBE_TIMEOUT_MS,
  MAX_BACKUPS,
  failure,
  success,
  type EndpointPool,
  type ProbeFn,
  type RailResult,
} from './types';

export interface EndpointPoolManagerOptions {
  probe: ProbeFn;
  store: ConfigStore;
  /** @default 5000 */
  probeTimeoutMs?: number;
  logger?: Logger;
}

export class EndpointPoolManager {
  private pools: Map<number, EndpointPool> = new Map();
  private apiKeys: Record<string, string> = {};
  private chainLocks = new KeyedMutex<number>();
  private saveLock = new KeyedMutex<'snapshot'>();
  private probe: ProbeFn;
  private store: ConfigStore;
  private probeTimeoutMs: number;
  private log: Logger;

  constructor(options: EndpointPoolManagerOptions) {
    this.probe = options.probe;
    this.store = options.store;
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.log = options.logger ?? createChildLogger('pool');
  }

  /**
   * Replaces in-memory state with the store's snapshot.
   * A store failure rejects: starting empty would overwrite the stored pools on the next save.
   */
  async load(): Promise<EndpointPool[]> {
    const raw = await this.store.load();
    const decoded = decodeSnapshot(raw);

    this.pools = new Map(decoded.pools.map(pool => [pool.chainId, pool]));
    this.apiKeys = decoded.apiKeys;

    if (decoded.dropped.length > 0) {
      this.log.warn({ keys: decoded.dropped }, 'Ignored unusable RPC entries in stored configuration');
    }
    this.log.info({ chains: decoded.pools.length }, 'RPC configuration loaded');

    return this.list();
  }

  /**
   * Probe the URL and make it the chain's primary.
   * Backups are kept; the URL is removed from them if present.
   * @returns Measured probe latency
   */
  async setPrimary(chainId: number, url: string): Promise<RailResult<number>> {
    const input = this.validateInput(chainId, url);
    if (!input.ok) return input;
    const endpoint = input.value;

    const probe = await this.probe(endpoint, chainId, this.probeTimeoutMs);
    if (!probe.ok) {
      return failure(
        RailError.fromProbe(chainId, probe.error ?? 'Unreachable', Validators.maskUrl(endpoint), probe.detail)
      );
    }

    return this.chainLocks.runExclusive(chainId, async (): Promise<RailResult<number>> => {
      const existing = this.pools.get(chainId);
      const backups = existing ? existing.backups.filter(b => b !== endpoint) : [];
      this.pools.set(chainId, { chainId, primary: endpoint, backups });

      this.log.info(
        { chainId, url: Validators.maskUrl(endpoint), latencyMs: probe.latencyMs },
        'Primary RPC set'
      );
      await this.persist();
      return success(probe.latencyMs ?? 0);
    });
  }

  /**
   * Probe the URL and append it to the chain's backups
   * @returns Measured probe latency
   */
  async addBackup(chainId: number, url: string): Promise<RailResult<number>> {
    const input = this.validateInput(chainId, url);
    if (!input.ok) return input;
    const endpoint = input.value;

    const admission = this.checkBackupAdmission(chainId, endpoint);
    if (!admission.ok) return admission;

    const probe = await this.probe(endpoint, chainId, this.probeTimeoutMs);
    if (!probe.ok) {
      return failure(
        RailError.fromProbe(chainId, probe.error ?? 'Unreachable', Validators.maskUrl(endpoint), probe.detail)
      );
    }

    return this.chainLocks.runExclusive(chainId, async (): Promise<RailResult<number>> => {
      // The pool may have changed while the probe was running
      const recheck = this.checkBackupAdmission(chainId, endpoint);
      if (!recheck.ok) return recheck;

      const pool = recheck.value;
      this.pools.set(chainId, { ...pool, backups: [...pool.backups, endpoint] });

      this.log.info(
        { chainId, url: Validators.maskUrl(endpoint), latencyMs: probe.latencyMs },
        'Backup RPC added'
      );
      await this.persist();
      return success(probe.latencyMs ?? 0);
    });
  }

  /**
   * Make the first backup primary; the old primary goes to the end of the backups
   * @returns The new primary
   */
  async rotate(chainId: number): Promise<RailResult<string>> {
    const input = this.validateChain(chainId);
    if (!input.ok) return input;

    return this.chainLocks.runExclusive(chainId, async (): Promise<RailResult<string>> => {
      const pool = this.pools.get(chainId);
      if (!pool) {
        return failure(RailError.noRpcConfigured(chainId));
      }
      if (pool.backups.length === 0) {
        return failure(RailError.noBackupsAvailable(chainId));
      }

      const [next, ...rest] = pool.backups;
      this.pools.set(chainId, { chainId, primary: next, backups: [...rest, pool.primary] });

      this.log.info(
        { chainId, from: Validators.maskUrl(pool.primary), to: Validators.maskUrl(next) },
        'Rotated primary RPC'
      );
      await this.persist();
      return success(next);
    });
  }

  /**
   * Move a backup that just served a request into the primary slot.
   * The old primary becomes the first backup. No-op when the URL is already
   * primary or is no longer part of the pool.
   * @returns Whether the pool changed
   */
  async promote(chainId: number, url: string): Promise<boolean> {
    return this.chainLocks.runExclusive(chainId, async (): Promise<boolean> => {
      const pool = this.pools.get(chainId);
      if (!pool || pool.primary === url || !pool.backups.includes(url)) {
        return false;
      }

      const remaining = pool.backups.filter(b => b !== url);
      const backups = [pool.primary, ...remaining].slice(0, MAX_BACKUPS);
      this.pools.set(chainId, { chainId, primary: url, backups });

      this.log.info(
        { chainId, from: Validators.maskUrl(pool.primary), to: Validators.maskUrl(url) },
        'Promoted backup RPC to primary'
      );
      await this.persist();
      return true;
    });
  }

  /**
   * Remove the chain's pool
   * @returns The removed pool
   */
  async delete(chainId: number): Promise<RailResult<EndpointPool>> {
    const input = this.validateChain(chainId);
    if (!input.ok) return input;

    return this.chainLocks.runExclusive(chainId, async (): Promise<RailResult<EndpointPool>> => {
      const pool = this.pools.get(chainId);
      if (!pool) {
        return failure(RailError.noRpcConfigured(chainId));
      }

      this.pools.delete(chainId);
      this.log.info({ chainId }, 'RPC configuration deleted');
      await this.persist();
      return success(copyPool(pool));
    });
  }

  /**
   * Every pool, ordered by chain id
   */
  list(): EndpointPool[] {
    return [...this.pools.values()]
      .sort((a, b) => a.chainId - b.chainId)
      .map(copyPool);
  }

  get(chainId: number): EndpointPool | undefined {
    const pool = this.pools.get(chainId);
    return pool ? copyPool(pool) : undefined;
  }

  private checkBackupAdmission(chainId: number, url: string): RailResult<EndpointPool> {
    const pool = this.pools.get(chainId);
    if (!pool) {
      return failure(RailError.noPrimaryConfigured(chainId));
    }
    if (pool.primary === url || pool.backups.includes(url)) {
      return failure(RailError.duplicateEndpoint(chainId, Validators.maskUrl(url)));
    }
    if (pool.backups.length >= MAX_BACKUPS) {
      return failure(RailError.poolFull(chainId, MAX_BACKUPS));
    }
    return success(pool);
  }

  private validateChain(chainId: number): RailResult<number> {
    try {
      Validators.validateChainId(chainId);
      return success(chainId);
    } catch (err) {
      return failure(toInvalidInput(err));
    }
  }

  private validateInput(chainId: number, url: string): RailResult<string> {
    try {
      Validators.validateChainId(chainId);
      return success(Validators.validateRpcUrl(url));
    } catch (err) {
      return failure(toInvalidInput(err, Number.isSafeInteger(chainId) ? chainId : undefined));
    }
  }

  /**
   * Write the current pools; a failed save is logged and the in-memory state stands
   */
  private async persist(): Promise<void> {
    await this.saveLock.runExclusive('snapshot', async () => {
      const snapshot = encodeSnapshot(this.list(), this.apiKeys);
      try {
        await this.store.save(snapshot);
      } catch (err) {
        this.log.error({ err: ErrorUtils.toError(err) }, 'Failed to save RPC configuration');
      }
    });
  }
}

function toInvalidInput(err: unknown, chainId?: number): RailError {
  if (err instanceof ValidationError) {
    return RailError.invalidInput(err, chainId);
  }
  throw err;
}

function copyPool(pool: EndpointPool): EndpointPool {
  return { chainId: pool.chainId, primary: pool.primary, backups: [...pool.backups] };
}
