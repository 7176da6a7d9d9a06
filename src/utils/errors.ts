import type { ProbeErrorKind, RailErrorKind } from '../rpc/types';

/**
 * Base error class for all rail errors
 * Provides structured error information with context and retry guidance
 */
export class IntegrationError extends Error {
  /**
   * Unique error code for categorization
   * Format: CATEGORY_SPECIFIC_ERROR (e.g., POOL_FULL, VALIDATION_URL_INVALID)
   */
  readonly code: string;

  /**
   * Indicates if this error is transient and can be retried
   */
  readonly retriable: boolean;

  /**
   * Additional context for debugging and logging
   * Should include relevant data without exposing sensitive information
   */
  readonly context: Record<string, unknown>;

  /**
   * Original error that caused this error (if applicable)
   */
  declare readonly cause?: Error;

  /**
   * Timestamp when the error occurred
   */
  readonly timestamp: Date;

  /**
   * Chain ID where the error occurred (if applicable)
   */
  readonly chainId?: number;

  constructor(
    message: string,
    code: string,
    retriable: boolean,
    context?: Record<string, unknown>,
    cause?: Error,
    chainId?: number
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.retriable = retriable;
    this.context = context || {};
    this.cause = cause;
    this.timestamp = new Date();
    this.chainId = chainId;

    // Preserve stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Converts error to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retriable: this.retriable,
      context: ErrorUtils.sanitizeContext(this.context),
      timestamp: this.timestamp.toISOString(),
      chainId: this.chainId,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
    };
  }
}

/**
 * Connection-related errors (network, timeout, etc.)
 * Always retriable
 */
export class ConnectionError extends IntegrationError {
  /**
   * RPC endpoint URL that failed
   */
  readonly endpoint: string;

  /**
   * Type of connection error
   */
  readonly connectionType: 'TIMEOUT' | 'REFUSED' | 'RESET' | 'DNS_FAILED' | 'UNKNOWN';

  constructor(
    message: string,
    code: string,
    endpoint: string,
    connectionType: 'TIMEOUT' | 'REFUSED' | 'RESET' | 'DNS_FAILED' | 'UNKNOWN',
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, true, context, cause);
    this.endpoint = endpoint;
    this.connectionType = connectionType;
  }
}

/**
 * Input validation error
 * Not retriable - indicates client-side error
 */
export class ValidationError extends IntegrationError {
  /**
   * Field or parameter that failed validation
   */
  readonly field: string;

  /**
   * Expected format or constraint
   */
  readonly expected: string;

  /**
   * Actual value received (masked where it may carry secrets)
   */
  readonly received: string;

  constructor(
    message: string,
    field: string,
    expected: string,
    received: string,
    context?: Record<string, unknown>
  ) {
    super(message, `VALIDATION_${field.toUpperCase()}_INVALID`, false, context);
    this.field = field;
    this.expected = expected;
    this.received = received;
  }

  static invalidAddress(address: string): ValidationError {
    return new ValidationError(
      `Invalid address: ${address}`,
      'address',
      '0x-prefixed 40-character hex string',
      address
    );
  }

  static invalidChainId(chainId: unknown): ValidationError {
    return new ValidationError(
      `Invalid chain ID: ${String(chainId)}`,
      'chainId',
      'positive integer',
      String(chainId)
    );
  }

  static invalidUrl(maskedUrl: string): ValidationError {
    return new ValidationError(
      `Invalid RPC URL: ${maskedUrl}`,
      'url',
      'http:// or https:// URL',
      maskedUrl
    );
  }
}

const RAIL_ERROR_CODES: Record<RailErrorKind, string> = {
  Unreachable: 'RPC_UNREACHABLE',
  Timeout: 'RPC_TIMEOUT',
  ChainMismatch: 'RPC_CHAIN_MISMATCH',
  MalformedResponse: 'RPC_MALFORMED_RESPONSE',
  NoRpcConfigured: 'POOL_NO_RPC_CONFIGURED',
  NoPrimaryConfigured: 'POOL_NO_PRIMARY_CONFIGURED',
  NoBackupsAvailable: 'POOL_NO_BACKUPS_AVAILABLE',
  PoolFull: 'POOL_FULL',
  DuplicateEndpoint: 'POOL_DUPLICATE_ENDPOINT',
  AllEndpointsFailed: 'RPC_ALL_ENDPOINTS_FAILED',
  RegistryUnavailable: 'REGISTRY_UNAVAILABLE',
  InvalidInput: 'INVALID_INPUT',
};

const RETRIABLE_KINDS: ReadonlySet<RailErrorKind> = new Set<RailErrorKind>([
  'Unreachable',
  'Timeout',
  'MalformedResponse',
  'AllEndpointsFailed',
  'RegistryUnavailable',
]);

/**
 * Tagged error returned (never thrown) by the pool, executor, reporter and registry.
 */
export class RailError extends IntegrationError {
  readonly kind: RailErrorKind;

  constructor(
    kind: RailErrorKind,
    message: string,
    chainId?: number,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, RAIL_ERROR_CODES[kind], RETRIABLE_KINDS.has(kind), context, cause, chainId);
    this.kind = kind;
  }

  static noRpcConfigured(chainId: number): RailError {
    return new RailError('NoRpcConfigured', `No RPC configuration found for chain ${chainId}`, chainId);
  }

  static noPrimaryConfigured(chainId: number): RailError {
    return new RailError(
      'NoPrimaryConfigured',
      `No primary RPC configured for chain ${chainId}; set a primary before adding backups`,
      chainId
    );
  }

  static noBackupsAvailable(chainId: number): RailError {
    return new RailError('NoBackupsAvailable', `No backup RPCs available for chain ${chainId}`, chainId);
  }

  static poolFull(chainId: number, maxBackups: number): RailError {
    return new RailError(
      'PoolFull',
      `Chain ${chainId} already has ${maxBackups} backup RPCs`,
      chainId,
      { maxBackups }
    );
  }

  static duplicateEndpoint(chainId: number, maskedUrl: string): RailError {
    return new RailError(
      'DuplicateEndpoint',
      `RPC ${maskedUrl} is already configured for chain ${chainId}`,
      chainId,
      { url: maskedUrl }
    );
  }

  /**
   * Wraps a failed probe; the probe's kind becomes the error kind
   */
  static fromProbe(chainId: number, kind: ProbeErrorKind, maskedUrl: string, detail?: string): RailError {
    return new RailError(
      kind,
      `RPC ${maskedUrl} failed verification for chain ${chainId}: ${detail ?? kind}`,
      chainId,
      { url: maskedUrl }
    );
  }

  static registryUnavailable(cause?: Error): RailError {
    return new RailError(
      'RegistryUnavailable',
      'Chain registry is unavailable and no cached copy exists',
      undefined,
      {},
      cause
    );
  }

  static invalidInput(error: ValidationError, chainId?: number): RailError {
    return new RailError(
      'InvalidInput',
      error.message,
      chainId,
      { field: error.field, expected: error.expected },
      error
    );
  }
}

/**
 * One failed attempt inside a failover pass
 */
export interface EndpointFailure {
  /** Endpoint URL as configured */
  url: string;
  kind: RailErrorKind;
  detail: string;
}

/**
 * Every pool member failed; failures are kept in try order
 */
export class AllEndpointsFailedError extends RailError {
  readonly failures: readonly EndpointFailure[];

  constructor(chainId: number, failures: EndpointFailure[]) {
    super(
      'AllEndpointsFailed',
      `All ${failures.length} RPC endpoints failed for chain ${chainId} ` +
        `(${failures.map(f => f.kind).join(', ')})`,
      chainId,
      { attempts: failures.length }
    );
    this.failures = failures;
  }

  /**
   * Ordered failure kinds, one per pool member
   */
  get kinds(): RailErrorKind[] {
    return this.failures.map(f => f.kind);
  }
}

/**
 * Utility functions for error handling
 */
export class ErrorUtils {
  private static readonly SENSITIVE_KEYS = [
    'apiKey',
    'api_key',
    'secret',
    'password',
    'token',
    'privateKey',
    'private_key',
    'mnemonic',
    'seed',
  ];

  /**
   * Normalises anything caught into an Error instance
   */
  static toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
  }

  /**
   * Sanitizes error context to remove sensitive data
   */
  static sanitizeContext(context: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(context)) {
      const lowerKey = key.toLowerCase();

      const isSensitive = this.SENSITIVE_KEYS.some((sensitive) => {
        const lowerSensitive = sensitive.toLowerCase();
        return lowerKey === lowerSensitive || lowerKey.includes(lowerSensitive);
      });

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
        continue;
      }

      if (isPlainRecord(value)) {
        sanitized[key] = this.sanitizeContext(value);
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }

  /**
   * Creates user-friendly error message from technical error
   */
  static toUserMessage(error: Error): string {
    if (error instanceof ValidationError) {
      return `Invalid ${error.field}: ${error.message}`;
    }

    if (error instanceof RailError) {
      switch (error.kind) {
        case 'NoRpcConfigured':
          return 'No RPC is configured for this chain. Set a primary RPC first.';
        case 'NoPrimaryConfigured':
          return 'Set a primary RPC before adding backups.';
        case 'NoBackupsAvailable':
          return 'There are no backup RPCs to rotate to.';
        case 'PoolFull':
          return 'This chain already has the maximum number of backup RPCs.';
        case 'DuplicateEndpoint':
          return 'This RPC is already configured for the chain.';
        case 'ChainMismatch':
          return 'The RPC serves a different chain than the one requested.';
        case 'AllEndpointsFailed':
          return 'Every configured RPC for this chain failed. Check their health or add new ones.';
        case 'RegistryUnavailable':
          return 'The public chain registry could not be reached. Please try again later.';
        case 'InvalidInput':
          return error.message;
        default:
          return 'Unable to connect to blockchain network. Please check your connection and try again.';
      }
    }

    if (error instanceof ConnectionError) {
      return 'Unable to connect to blockchain network. Please check your connection and try again.';
    }

    return 'An unexpected error occurred. Please try again later.';
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
