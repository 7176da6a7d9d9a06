/**
 * Endpoint Probe
 *
 * Bounded-time connectivity + identity check (eth_chainId) against one URL.
 * Never throws: every failure is classified into a ProbeResult.
 *
 * @module rpc/EndpointProbe
 */

import {
  BaseError,
  HttpRequestError,
  RpcRequestError,
  TimeoutError as ViemTimeoutError,
  createPublicClient,
  hexToNumber,
  http,
  isHex,
  zeroAddress,
} from 'viem';
import { TimeoutError, TimeoutLevel, withTimeout } from '../resilience/TimeoutManager';
import { ErrorUtils } from '../utils/errors';
import { Validators } from '../utils/validators';
import { createChildLogger, type Logger } from '../utils/logger';
import { DEFAULT_PROBE_TIMEOUT_MS, type ProbeErrorKind, type ProbeResult } from './types';

/**
 * Reads the chain id an endpoint reports
 */
export type ChainIdReader = (url: string, timeoutMs: number, signal: AbortSignal) => Promise<number>;

/**
 * Performs a basic state read against an endpoint; resolves when the read succeeds
 */
export type StateReader = (url: string, timeoutMs: number, signal: AbortSignal) => Promise<void>;

export interface EndpointProbeOptions {
  readChainId?: ChainIdReader;
  readState?: StateReader;
  /** Also read the zero address balance after the identity check @default false */
  verifyStateRead?: boolean;
  logger?: Logger;
}

/**
 * Raised when an endpoint answers with something that is not a usable value
 */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

function viemTransport(url: string, timeoutMs: number, signal: AbortSignal) {
  return http(url, { timeout: timeoutMs, retryCount: 0, fetchOptions: { signal } });
}

export const viemChainIdReader: ChainIdReader = async (url, timeoutMs, signal) => {
  const client = createPublicClient({ transport: viemTransport(url, timeoutMs, signal) });
  const reported: unknown = await client.request({ method: 'eth_chainId' });
  if (!isHex(reported)) {
    throw new MalformedResponseError(`Expected a hex chain ID, got ${JSON.stringify(reported) ?? 'nothing'}`);
  }
  return hexToNumber(reported);
};

export const viemStateReader: StateReader = async (url, timeoutMs, signal) => {
  const client = createPublicClient({ transport: viemTransport(url, timeoutMs, signal) });
  await client.getBalance({ address: zeroAddress });
};

/**
 * Maps a failure from an RPC call to the probe error kinds
 */
export function classifyRpcError(error: unknown): ProbeErrorKind {
  if (error instanceof TimeoutError || error instanceof ViemTimeoutError) {
    return 'Timeout';
  }

  if (error instanceof BaseError) {
    if (error.walk((e) => e instanceof ViemTimeoutError)) return 'Timeout';
    if (error.walk((e) => e instanceof RpcRequestError)) return 'MalformedResponse';
    const httpError = error.walk((e) => e instanceof HttpRequestError);
    if (httpError instanceof HttpRequestError) {
      return httpAnswered(httpError) ? 'MalformedResponse' : 'Unreachable';
    }
    return 'MalformedResponse';
  }

  if (error instanceof MalformedResponseError || error instanceof SyntaxError) {
    return 'MalformedResponse';
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return 'Timeout';
  }

  // undici reports connection failures as TypeError('fetch failed'); any other
  // TypeError comes from decoding a response that is missing fields
  if (error instanceof TypeError && error.message !== 'fetch failed') {
    return 'MalformedResponse';
  }

  return 'Unreachable';
}

/**
 * The server answered with a 2xx status, or with a body that failed to parse
 */
function httpAnswered(error: HttpRequestError): boolean {
  if (error.status !== undefined && error.status >= 200 && error.status < 300) {
    return true;
  }
  return error.walk((e) => e instanceof SyntaxError) !== null;
}

/**
 * Short description of an RPC failure for diagnostics
 */
export function describeRpcError(error: unknown): string {
  if (error instanceof BaseError) {
    return error.shortMessage;
  }
  return ErrorUtils.toError(error).message;
}

export class EndpointProbe {
  private readChainId: ChainIdReader;
  private readState: StateReader;
  private verifyStateRead: boolean;
  private log: Logger;

  constructor(options: EndpointProbeOptions = {}) {
    this.readChainId = options.readChainId ?? viemChainIdReader;
    this.readState = options.readState ?? viemStateReader;
    this.verifyStateRead = options.verifyStateRead ?? false;
    this.log = options.logger ?? createChildLogger('probe');
  }

  /**
   * Probe one endpoint.
   * ok iff the endpoint answers within the timeout and reports exactly expectedChainId.
   */
  async probe(
    url: string,
    expectedChainId: number,
    timeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS
  ): Promise<ProbeResult> {
    const startMs = performance.now();
    let reportedChainId: number;

    try {
      reportedChainId = await withTimeout(
        (signal) => this.readChainId(url, timeoutMs, signal),
        timeoutMs,
        'eth_chainId',
        TimeoutLevel.PROBE
      );
    } catch (err) {
      const kind = classifyRpcError(err);
      const result: ProbeResult = {
        url,
        ok: false,
        error: kind,
        detail: describeRpcError(err),
      };
      // A response arrived, so the round trip is meaningful
      if (kind === 'MalformedResponse') {
        result.latencyMs = elapsedSince(startMs);
      }
      return this.logged(result);
    }

    const latencyMs = elapsedSince(startMs);

    if (!Number.isSafeInteger(reportedChainId) || reportedChainId <= 0) {
      return this.logged({
        url,
        ok: false,
        latencyMs,
        error: 'MalformedResponse',
        detail: `Endpoint reported an invalid chain ID: ${String(reportedChainId)}`,
      });
    }

    if (reportedChainId !== expectedChainId) {
      return this.logged({
        url,
        ok: false,
        latencyMs,
        reportedChainId,
        error: 'ChainMismatch',
        detail: `Expected chain ID ${expectedChainId}, endpoint reported ${reportedChainId}`,
      });
    }

    if (this.verifyStateRead) {
      try {
        await withTimeout(
          (signal) => this.readState(url, timeoutMs, signal),
          timeoutMs,
          'eth_getBalance',
          TimeoutLevel.PROBE
        );
      } catch (err) {
        return this.logged({
          url,
          ok: false,
          latencyMs,
          reportedChainId,
          error: classifyRpcError(err),
          detail: `State read failed: ${describeRpcError(err)}`,
        });
      }
    }

    return this.logged({ url, ok: true, latencyMs, reportedChainId });
  }

  private logged(result: ProbeResult): ProbeResult {
    this.log.debug(
      {
        url: Validators.maskUrl(result.url),
        ok: result.ok,
        latencyMs: result.latencyMs,
        error: result.error,
      },
      'Probe finished'
    );
    return result;
  }
}

function elapsedSince(startMs: number): number {
  return Math.round(performance.now() - startMs);
}
