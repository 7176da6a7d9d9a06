/**
 * Test utilities for the RPC rail
 */

import type { ProbeErrorKind, ProbeFn, ProbeResult } from '../rpc/types';

/**
 * Behaviour of one scripted endpoint
 */
export interface ScriptedEndpoint {
  /** Chain id the endpoint reports; defaults to the expected one */
  chainId?: number;
  latencyMs?: number;
  error?: ProbeErrorKind;
  /** Real delay before answering */
  delayMs?: number;
}

export interface ScriptedProbe {
  probe: ProbeFn;
  calls: string[];
}

/**
 * Creates a probe function answering from a URL → behaviour table.
 * Unknown URLs are Unreachable.
 */
export function createScriptedProbe(script: Record<string, ScriptedEndpoint>): ScriptedProbe {
  const calls: string[] = [];

  const probe: ProbeFn = async (url, expectedChainId) => {
    calls.push(url);
    const entry = script[url];
    if (entry?.delayMs) {
      await sleep(entry.delayMs);
    }

    if (!entry || entry.error === 'Unreachable' || entry.error === 'Timeout') {
      return { url, ok: false, error: entry?.error ?? 'Unreachable', detail: 'scripted failure' };
    }

    const latencyMs = entry.latencyMs ?? 10;
    if (entry.error === 'MalformedResponse') {
      return { url, ok: false, latencyMs, error: 'MalformedResponse', detail: 'scripted failure' };
    }

    const reportedChainId = entry.chainId ?? expectedChainId;
    if (reportedChainId !== expectedChainId) {
      return { url, ok: false, latencyMs, reportedChainId, error: 'ChainMismatch', detail: 'scripted mismatch' };
    }

    const result: ProbeResult = { url, ok: true, latencyMs, reportedChainId };
    return result;
  };

  return { probe, calls };
}

/**
 * Waits for real time to pass
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export { startRpcServer, refusedUrl, rpcResult, rpcError } from './rpcServer';
export type { JsonRpcRequest, RpcReply, RpcHandler, LocalRpcServer } from './rpcServer';
