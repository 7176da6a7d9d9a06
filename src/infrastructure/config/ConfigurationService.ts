import {
  DEFAULT_ATTEMPT_TIMEOUT_MS,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_SCAN_PROBE_TIMEOUT_MS,
} from '../../rpc/types';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface RpcSettings {
  /** Probe timeout for setPrimary/addBackup/health reports (ms) */
  probeTimeoutMs: number;
  /** Per-attempt timeout for failover reads (ms) */
  attemptTimeoutMs: number;
  /**
   * Read the zero address balance after the identity check. Off by default so a
   * probe costs one request; turn it on to also reject endpoints that answer
   * eth_chainId but fail state reads.
   */
  verifyStateRead: boolean;
}

export interface RegistrySettings {
  chainListUrl: string;
  /** Directory cache lifetime (ms) */
  cacheTtlMs: number;
  /** Directory fetch timeout (ms) */
  fetchTimeoutMs: number;
  /** Probe timeout while scanning candidates (ms) */
  scanProbeTimeoutMs: number;
  /** Concurrent probes while scanning */
  scanConcurrency: number;
  /** Ranked candidates returned */
  maxCandidates: number;
}

export interface LoggingSettings {
  level: LogLevel;
  prettyPrint: boolean;
}

export interface RailSettings {
  rpc: RpcSettings;
  registry: RegistrySettings;
  logging: LoggingSettings;
}

export type RailSettingsOverrides = {
  [K in keyof RailSettings]?: Partial<RailSettings[K]>;
};

export type Environment = Record<string, string | undefined>;

export const DEFAULT_CHAIN_LIST_URL = 'https://chainid.network/chains.json';

/**
 * Configuration service for the RPC rail
 * Merges defaults, RAIL_* environment variables and programmatic overrides
 */
export class ConfigurationService {
  private static instance: ConfigurationService | undefined;
  private settings: RailSettings;

  constructor(overrides?: RailSettingsOverrides, env: Environment = process.env) {
    this.settings = this.loadConfiguration(overrides, env);
  }

  /**
   * Gets the process-wide instance built from process.env
   */
  static getInstance(): ConfigurationService {
    if (!ConfigurationService.instance) {
      ConfigurationService.instance = new ConfigurationService();
    }
    return ConfigurationService.instance;
  }

  private loadConfiguration(overrides: RailSettingsOverrides | undefined, env: Environment): RailSettings {
    const defaults: RailSettings = {
      rpc: {
        probeTimeoutMs: DEFAULT_PROBE_TIMEOUT_MS,
        attemptTimeoutMs: DEFAULT_ATTEMPT_TIMEOUT_MS,
        verifyStateRead: false,
      },
      registry: {
        chainListUrl: DEFAULT_CHAIN_LIST_URL,
        cacheTtlMs: 60 * 60 * 1000, // 1 hour
        fetchTimeoutMs: 10_000,
        scanProbeTimeoutMs: DEFAULT_SCAN_PROBE_TIMEOUT_MS,
        scanConcurrency: 10,
        maxCandidates: 5,
      },
      logging: {
        level: 'info',
        prettyPrint: false,
      },
    };

    const fromEnv = this.loadFromEnvironment(env);

    return {
      rpc: { ...defaults.rpc, ...fromEnv.rpc, ...overrides?.rpc },
      registry: { ...defaults.registry, ...fromEnv.registry, ...overrides?.registry },
      logging: { ...defaults.logging, ...fromEnv.logging, ...overrides?.logging },
    };
  }

  private loadFromEnvironment(env: Environment): RailSettingsOverrides {
    const rpc: Partial<RpcSettings> = {};
    const registry: Partial<RegistrySettings> = {};
    const logging: Partial<LoggingSettings> = {};

    const probeTimeout = parseInteger(env.RAIL_RPC_TIMEOUT);
    if (probeTimeout !== undefined) {
      rpc.probeTimeoutMs = probeTimeout;
    }

    const attemptTimeout = parseInteger(env.RAIL_ATTEMPT_TIMEOUT);
    if (attemptTimeout !== undefined) {
      rpc.attemptTimeoutMs = attemptTimeout;
    }

    if (env.RAIL_VERIFY_STATE_READ !== undefined) {
      rpc.verifyStateRead = parseBoolean(env.RAIL_VERIFY_STATE_READ);
    }

    if (env.RAIL_CHAIN_LIST_URL) {
      registry.chainListUrl = env.RAIL_CHAIN_LIST_URL;
    }

    // Seconds, to stay compatible with existing deployments
    const cacheDuration = parseInteger(env.RAIL_CACHE_DURATION);
    if (cacheDuration !== undefined) {
      registry.cacheTtlMs = cacheDuration * 1000;
    }

    const scanTimeout = parseInteger(env.RAIL_SCAN_TIMEOUT);
    if (scanTimeout !== undefined) {
      registry.scanProbeTimeoutMs = scanTimeout;
    }

    const scanConcurrency = parseInteger(env.RAIL_SCAN_CONCURRENCY);
    if (scanConcurrency !== undefined) {
      registry.scanConcurrency = scanConcurrency;
    }

    const maxCandidates = parseInteger(env.RAIL_MAX_CANDIDATES);
    if (maxCandidates !== undefined) {
      registry.maxCandidates = maxCandidates;
    }

    const level = env.RAIL_LOG_LEVEL?.toLowerCase();
    if (isLogLevel(level)) {
      logging.level = level;
    }

    if (env.RAIL_LOG_PRETTY !== undefined) {
      logging.prettyPrint = parseBoolean(env.RAIL_LOG_PRETTY);
    }

    return { rpc, registry, logging };
  }

  getSettings(): Readonly<RailSettings> {
    return this.settings;
  }

  getLoggingSettings(): Readonly<LoggingSettings> {
    return this.settings.logging;
  }

  /**
   * Validates numeric settings
   * @returns Problems found; empty when valid
   */
  validate(): string[] {
    const errors: string[] = [];
    const positive: Array<[string, number]> = [
      ['rpc.probeTimeoutMs', this.settings.rpc.probeTimeoutMs],
      ['rpc.attemptTimeoutMs', this.settings.rpc.attemptTimeoutMs],
      ['registry.cacheTtlMs', this.settings.registry.cacheTtlMs],
      ['registry.fetchTimeoutMs', this.settings.registry.fetchTimeoutMs],
      ['registry.scanProbeTimeoutMs', this.settings.registry.scanProbeTimeoutMs],
      ['registry.scanConcurrency', this.settings.registry.scanConcurrency],
      ['registry.maxCandidates', this.settings.registry.maxCandidates],
    ];

    for (const [name, value] of positive) {
      if (!Number.isInteger(value) || value <= 0) {
        errors.push(`${name} must be a positive integer`);
      }
    }

    try {
      new URL(this.settings.registry.chainListUrl);
    } catch {
      errors.push('registry.chainListUrl must be an absolute URL');
    }

    return errors;
  }
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

function parseBoolean(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}
