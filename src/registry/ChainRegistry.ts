/**
 * Chain Registry cache
 *
 * Downloads the public chain directory, memoises it for a TTL and turns it
 * into ranked RPC candidates for a chain by probing every usable URL.
 * Read-only with respect to the endpoint pools.
 *
 * @module registry/ChainRegistry
 */

import { BulkheadManager } from '../resilience/BulkheadManager';
import { TimeoutLevel, withTimeout } from '../resilience/TimeoutManager';
import {
  DEFAULT_CHAIN_LIST_URL,
  type RegistrySettings,
} from '../infrastructure/config/ConfigurationService';
import { MalformedResponseError } from '../rpc/EndpointProbe';
import { ErrorUtils, RailError, ValidationError } from '../utils/errors';
import { Validators } from '../utils/validators';
import { createChildLogger, type Logger } from '../utils/logger';
import {
  DEFAULT_SCAN_PROBE_TIMEOUT_MS,
  failure,
  success,
  type ProbeFn,
  type ProbeResult,
  type RailResult,
} from '../rpc/types';

export interface NativeCurrency {
  name: string;
  symbol: string;
  decimals: number;
}

export interface ChainDirectoryEntry {
  chainId: number;
  name?: string;
  rpc: string[];
  nativeCurrency?: NativeCurrency;
}

export interface ChainInfo {
  chainId: number;
  name?: string;
  nativeCurrency?: NativeCurrency;
  /** Usable RPC URLs listed for the chain */
  rpcCount: number;
}

interface RegistryCacheEntry {
  fetchedAt: number;
  payload: ChainDirectoryEntry[];
}

/**
 * Downloads the raw directory document
 */
export type DirectoryFetcher = (url: string, signal: AbortSignal) => Promise<unknown>;

export const fetchChainDirectory: DirectoryFetcher = async (url, signal) => {
  const response = await fetch(url, { signal, headers: { accept: 'application/json' } });
  if (!response.ok) {
    throw new Error(`Chain registry responded with HTTP ${response.status}`);
  }
  return response.json();
};

export interface ChainRegistryOptions {
  probe: ProbeFn;
  fetchDirectory?: DirectoryFetcher;
  settings?: Partial<RegistrySettings>;
  /** Clock used for cache freshness */
  now?: () => number;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseNativeCurrency(value: unknown): NativeCurrency | undefined {
  if (!isRecord(value)) return undefined;
  const { name, symbol, decimals } = value;
  if (typeof name !== 'string' || typeof symbol !== 'string' || typeof decimals !== 'number') {
    return undefined;
  }
  return { name, symbol, decimals };
}

/**
 * Keep entries with a numeric chainId and an rpc array; other fields are optional
 * @throws MalformedResponseError when the document is not an array
 */
export function parseChainDirectory(payload: unknown): ChainDirectoryEntry[] {
  if (!Array.isArray(payload)) {
    throw new MalformedResponseError('Chain registry payload is not an array');
  }

  const entries: ChainDirectoryEntry[] = [];
  for (const item of payload) {
    if (!isRecord(item) || typeof item.chainId !== 'number' || !Array.isArray(item.rpc)) {
      continue;
    }
    entries.push({
      chainId: item.chainId,
      name: typeof item.name === 'string' ? item.name : undefined,
      rpc: item.rpc.filter((url): url is string => typeof url === 'string'),
      nativeCurrency: parseNativeCurrency(item.nativeCurrency),
    });
  }
  return entries;
}

/**
 * Usable http(s) URLs for a chain, in directory order, first occurrence wins
 */
export function candidateUrls(entries: readonly ChainDirectoryEntry[], chainId: number): string[] {
  const seen = new Set<string>();
  for (const entry of entries) {
    if (entry.chainId !== chainId) continue;
    for (const raw of entry.rpc) {
      const url = raw.trim();
      if (Validators.isUsableRpcUrl(url)) {
        seen.add(url);
      }
    }
  }
  return [...seen];
}

/**
 * Successful probes by ascending latency; ties keep directory order
 */
export function rankProbeResults(results: readonly ProbeResult[], limit: number): string[] {
  return results
    .map((result, index) => ({ result, index }))
    .filter(({ result }) => result.ok)
    .sort((a, b) => {
      const byLatency = (a.result.latencyMs ?? Infinity) - (b.result.latencyMs ?? Infinity);
      return byLatency !== 0 ? byLatency : a.index - b.index;
    })
    .slice(0, limit)
    .map(({ result }) => result.url);
}

export class ChainRegistry {
  private cache: RegistryCacheEntry | undefined;
  /** Download in flight; concurrent lookups share it */
  private inflight: Promise<ChainDirectoryEntry[]> | undefined;
  private probe: ProbeFn;
  private fetchDirectory: DirectoryFetcher;
  private settings: RegistrySettings;
  private now: () => number;
  private log: Logger;

  constructor(options: ChainRegistryOptions) {
    this.probe = options.probe;
    this.fetchDirectory = options.fetchDirectory ?? fetchChainDirectory;
    this.settings = {
      chainListUrl: DEFAULT_CHAIN_LIST_URL,
      cacheTtlMs: 60 * 60 * 1000,
      fetchTimeoutMs: 10_000,
      scanProbeTimeoutMs: DEFAULT_SCAN_PROBE_TIMEOUT_MS,
      scanConcurrency: 10,
      maxCandidates: 5,
      ...options.settings,
    };
    this.now = options.now ?? (() => Date.now());
    this.log = options.logger ?? createChildLogger('registry');
  }

  /**
   * Probe the directory's URLs for a chain and return the fastest working ones
   */
  async getCandidates(chainId: number): Promise<RailResult<string[]>> {
    const valid = validateChain(chainId);
    if (!valid.ok) return valid;

    const directory = await this.loadDirectory();
    if (!directory.ok) return directory;

    const urls = candidateUrls(directory.value, chainId);
    if (urls.length === 0) {
      this.log.info({ chainId }, 'No usable RPC URLs listed for chain');
      return success([]);
    }

    const bulkhead = new BulkheadManager({ maxConcurrent: this.settings.scanConcurrency });
    const results = await bulkhead.map(urls, url =>
      this.probe(url, chainId, this.settings.scanProbeTimeoutMs)
    );
    const ranked = rankProbeResults(results, this.settings.maxCandidates);

    this.log.info(
      { chainId, scanned: urls.length, working: results.filter(r => r.ok).length, returned: ranked.length },
      'Registry scan complete'
    );
    return success(ranked);
  }

  /**
   * Directory metadata for a chain; undefined when the directory does not list it
   */
  async getChainInfo(chainId: number): Promise<RailResult<ChainInfo | undefined>> {
    const valid = validateChain(chainId);
    if (!valid.ok) return valid;

    const directory = await this.loadDirectory();
    if (!directory.ok) return directory;

    const entry = directory.value.find(e => e.chainId === chainId);
    if (!entry) {
      return success(undefined);
    }
    return success({
      chainId,
      name: entry.name,
      nativeCurrency: entry.nativeCurrency,
      rpcCount: candidateUrls([entry], chainId).length,
    });
  }

  /**
   * Drop the cached directory; the next lookup downloads it again
   */
  invalidate(): void {
    this.cache = undefined;
  }

  private async loadDirectory(): Promise<RailResult<ChainDirectoryEntry[]>> {
    const cached = this.cache;
    if (cached && this.now() - cached.fetchedAt < this.settings.cacheTtlMs) {
      return success(cached.payload);
    }

    try {
      return success(await this.refreshOnce());
    } catch (err) {
      const error = ErrorUtils.toError(err);
      if (this.cache) {
        this.log.warn(
          { err: error, ageMs: this.now() - this.cache.fetchedAt },
          'Chain registry refresh failed; using stale copy'
        );
        return success(this.cache.payload);
      }
      this.log.error({ err: error }, 'Chain registry unavailable');
      return failure(RailError.registryUnavailable(error));
    }
  }

  private refreshOnce(): Promise<ChainDirectoryEntry[]> {
    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  private async refresh(): Promise<ChainDirectoryEntry[]> {
    const raw = await withTimeout(
      signal => this.fetchDirectory(this.settings.chainListUrl, signal),
      this.settings.fetchTimeoutMs,
      'chain-registry',
      TimeoutLevel.REGISTRY_FETCH
    );
    const payload = parseChainDirectory(raw);

    this.cache = { fetchedAt: this.now(), payload };
    this.log.info({ chains: payload.length }, 'Chain registry downloaded');
    return payload;
  }
}

function validateChain(chainId: number): RailResult<number> {
  try {
    Validators.validateChainId(chainId);
    return success(chainId);
  } catch (err) {
    if (err instanceof ValidationError) return failure(RailError.invalidInput(err));
    throw err;
  }
}
