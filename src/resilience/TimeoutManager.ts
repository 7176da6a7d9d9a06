import { ConnectionError } from '../utils/errors';
import {
  DEFAULT_ATTEMPT_TIMEOUT_MS,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_SCAN_PROBE_TIMEOUT_MS,
} from '../rpc/types';

/**
 * Timeout levels
 */
export enum TimeoutLevel {
  SCAN_PROBE = 'SCAN_PROBE',         // 3s
  PROBE = 'PROBE',                   // 5s
  ATTEMPT = 'ATTEMPT',               // 15s
  REGISTRY_FETCH = 'REGISTRY_FETCH', // 10s
}

/**
 * Timeout configuration
 */
export interface TimeoutConfig {
  /**
   * Probe timeout while scanning registry candidates (ms)
   * @default 3000
   */
  scanProbe: number;

  /**
   * Probe timeout for pool mutations and health reports (ms)
   * @default 5000
   */
  probe: number;

  /**
   * Single failover attempt timeout (ms)
   * @default 15000
   */
  attempt: number;

  /**
   * Registry directory download timeout (ms)
   * @default 10000
   */
  registryFetch: number;
}

/**
 * Operation that observes cancellation through an AbortSignal
 */
export type CancellableOperation<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Timeout error with level information
 */
export class TimeoutError extends ConnectionError {
  readonly level: TimeoutLevel;
  readonly timeoutMs: number;

  constructor(
    level: TimeoutLevel,
    timeoutMs: number,
    operation: string
  ) {
    super(
      `Operation '${operation}' timed out after ${timeoutMs}ms (${level} timeout)`,
      'TIMEOUT',
      operation,
      'TIMEOUT',
      { level, timeoutMs, operation }
    );
    this.level = level;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Races an operation against a timer. On expiry the operation's signal is
 * aborted and the returned promise rejects with TimeoutError. The timer is
 * always cleared once the race settles.
 */
export async function withTimeout<T>(
  operation: CancellableOperation<T>,
  timeoutMs: number,
  operationName: string = 'operation',
  level: TimeoutLevel = TimeoutLevel.ATTEMPT
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(level, timeoutMs, operationName);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Timeout manager holding one duration per level
 */
export class TimeoutManager {
  private config: TimeoutConfig;

  constructor(config: Partial<TimeoutConfig> = {}) {
    this.config = {
      scanProbe: config.scanProbe ?? DEFAULT_SCAN_PROBE_TIMEOUT_MS,
      probe: config.probe ?? DEFAULT_PROBE_TIMEOUT_MS,
      attempt: config.attempt ?? DEFAULT_ATTEMPT_TIMEOUT_MS,
      registryFetch: config.registryFetch ?? 10_000,
    };

    this.validateHierarchy();
  }

  getTimeout(level: TimeoutLevel): number {
    switch (level) {
      case TimeoutLevel.SCAN_PROBE:
        return this.config.scanProbe;
      case TimeoutLevel.PROBE:
        return this.config.probe;
      case TimeoutLevel.ATTEMPT:
        return this.config.attempt;
      case TimeoutLevel.REGISTRY_FETCH:
        return this.config.registryFetch;
    }
  }

  /**
   * Validates timeout hierarchy (scan probe <= probe <= attempt), all positive
   * @throws Error if hierarchy is violated
   */
  private validateHierarchy(): void {
    const { scanProbe, probe, attempt, registryFetch } = this.config;

    for (const [name, value] of Object.entries({ scanProbe, probe, attempt, registryFetch })) {
      if (!Number.isFinite(value) || value <= 0) {
        throw new Error(`Invalid timeout: ${name} must be positive (got ${value})`);
      }
    }

    if (scanProbe > probe) {
      throw new Error(
        `Invalid timeout hierarchy: SCAN_PROBE (${scanProbe}ms) must be <= PROBE (${probe}ms)`
      );
    }

    if (probe > attempt) {
      throw new Error(
        `Invalid timeout hierarchy: PROBE (${probe}ms) must be <= ATTEMPT (${attempt}ms)`
      );
    }
  }
}
