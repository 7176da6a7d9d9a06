/**
 * Configuration snapshot codec
 *
 * The pool state is persisted by an external store as a plain object:
 * `{ rpcs: { "<chainId>": [primary, ...backups] }, apiKeys: {...} }`.
 * Older snapshots stored a single URL string per chain; those are migrated
 * to a one-element list when decoded.
 */

import { MAX_BACKUPS, type EndpointPool } from '../../rpc/types';

export interface ConfigSnapshot {
  rpcs: Record<string, string[] | string>;
  apiKeys: Record<string, string>;
}

/**
 * Persistence boundary for the pool; implementations live outside this package
 */
export interface ConfigStore {
  load(): Promise<ConfigSnapshot | undefined>;
  save(snapshot: ConfigSnapshot): Promise<void>;
}

export interface DecodedSnapshot {
  pools: EndpointPool[];
  apiKeys: Record<string, string>;
  /** Chain keys or values that could not be used */
  dropped: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseChainKey(key: string): number | undefined {
  if (!/^[1-9]\d*$/.test(key)) return undefined;
  const chainId = Number(key);
  return Number.isSafeInteger(chainId) ? chainId : undefined;
}

function toUrlList(value: unknown): string[] {
  const raw = typeof value === 'string' ? [value] : Array.isArray(value) ? value : [];
  const urls: string[] = [];
  for (const entry of raw) {
    if (typeof entry !== 'string') continue;
    const url = entry.trim();
    if (url.length > 0 && !urls.includes(url)) {
      urls.push(url);
    }
  }
  return urls.slice(0, 1 + MAX_BACKUPS);
}

/**
 * Decode whatever the store returned into pools, tolerating legacy and partial shapes
 */
export function decodeSnapshot(raw: unknown): DecodedSnapshot {
  const pools: EndpointPool[] = [];
  const apiKeys: Record<string, string> = {};
  const dropped: string[] = [];

  if (!isRecord(raw)) {
    return { pools, apiKeys, dropped };
  }

  if (isRecord(raw.rpcs)) {
    for (const [key, value] of Object.entries(raw.rpcs)) {
      const chainId = parseChainKey(key);
      const urls = toUrlList(value);
      if (chainId === undefined || urls.length === 0) {
        dropped.push(key);
        continue;
      }
      const [primary, ...backups] = urls;
      pools.push({ chainId, primary, backups });
    }
  }

  if (isRecord(raw.apiKeys)) {
    for (const [name, value] of Object.entries(raw.apiKeys)) {
      if (typeof value === 'string') {
        apiKeys[name] = value;
      }
    }
  }

  pools.sort((a, b) => a.chainId - b.chainId);
  return { pools, apiKeys, dropped };
}

/**
 * Encode pools in array form; apiKeys pass through untouched
 */
export function encodeSnapshot(
  pools: Iterable<EndpointPool>,
  apiKeys: Record<string, string> = {}
): ConfigSnapshot {
  const rpcs: Record<string, string[]> = {};
  for (const pool of pools) {
    rpcs[String(pool.chainId)] = [pool.primary, ...pool.backups];
  }
  return { rpcs, apiKeys: { ...apiKeys } };
}

/**
 * Store kept in memory; useful for embedding and tests
 */
export class InMemoryConfigStore implements ConfigStore {
  private snapshot: ConfigSnapshot | undefined;
  private saves = 0;

  constructor(initial?: ConfigSnapshot) {
    this.snapshot = initial ? cloneSnapshot(initial) : undefined;
  }

  async load(): Promise<ConfigSnapshot | undefined> {
    return this.snapshot ? cloneSnapshot(this.snapshot) : undefined;
  }

  async save(snapshot: ConfigSnapshot): Promise<void> {
    this.snapshot = cloneSnapshot(snapshot);
    this.saves++;
  }

  get saveCount(): number {
    return this.saves;
  }

  current(): ConfigSnapshot | undefined {
    return this.snapshot ? cloneSnapshot(this.snapshot) : undefined;
  }
}

function cloneSnapshot(snapshot: ConfigSnapshot): ConfigSnapshot {
  const rpcs: Record<string, string[] | string> = {};
  for (const [key, value] of Object.entries(snapshot.rpcs)) {
    rpcs[key] = Array.isArray(value) ? [...value] : value;
  }
  return { rpcs, apiKeys: { ...snapshot.apiKeys } };
}
