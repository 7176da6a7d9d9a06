/**
 * Provider Metrics
 *
 * Tracks P50/P95/P99 latency and rolling 5-minute error rate per (chainId, endpoint).
 *
 * @module rpc/ProviderMetrics
 */

import {
  METRICS_ROLLING_WINDOW_MS,
  type EndpointMetricsSnapshot,
  type LatencyPercentiles,
} from './types';

interface MetricEntry {
  timestamp: number;
  latencyMs: number;
  isError: boolean;
}

export class ProviderMetrics {
  private entries: Map<number, Map<string, MetricEntry[]>> = new Map();
  private windowMs: number;

  constructor(windowMs: number = METRICS_ROLLING_WINDOW_MS) {
    this.windowMs = windowMs;
  }

  recordSuccess(chainId: number, endpoint: string, latencyMs: number): void {
    this.addEntry(chainId, endpoint, { timestamp: Date.now(), latencyMs, isError: false });
  }

  recordError(chainId: number, endpoint: string, latencyMs: number): void {
    this.addEntry(chainId, endpoint, { timestamp: Date.now(), latencyMs, isError: true });
  }

  getSnapshot(chainId: number, endpoint: string): EndpointMetricsSnapshot | undefined {
    const byEndpoint = this.entries.get(chainId);
    const raw = byEndpoint?.get(endpoint);
    if (!byEndpoint || !raw) return undefined;

    const now = Date.now();
    const active = raw.filter(e => now - e.timestamp <= this.windowMs);

    // Update stored entries to pruned set
    if (active.length === 0) {
      byEndpoint.delete(endpoint);
      if (byEndpoint.size === 0) this.entries.delete(chainId);
      return undefined;
    }
    byEndpoint.set(endpoint, active);

    const totalRequests = active.length;
    const totalErrors = active.filter(e => e.isError).length;
    const errorRate = totalErrors / totalRequests;

    const latencies = active.map(e => e.latencyMs).sort((a, b) => a - b);
    const latency = this.computePercentiles(latencies);

    return {
      chainId,
      endpoint,
      latency,
      errorRate,
      totalRequests,
      totalErrors,
      windowStart: new Date(now - this.windowMs),
      windowEnd: new Date(now),
    };
  }

  /**
   * Snapshots for one chain, or for every chain when chainId is omitted
   */
  getSnapshots(chainId?: number): EndpointMetricsSnapshot[] {
    const chainIds = chainId === undefined ? [...this.entries.keys()] : [chainId];
    const snapshots: EndpointMetricsSnapshot[] = [];

    for (const id of chainIds.sort((a, b) => a - b)) {
      const endpoints = [...(this.entries.get(id)?.keys() ?? [])];
      for (const endpoint of endpoints) {
        const snap = this.getSnapshot(id, endpoint);
        if (snap) snapshots.push(snap);
      }
    }
    return snapshots;
  }

  reset(): void {
    this.entries.clear();
  }

  private addEntry(chainId: number, endpoint: string, entry: MetricEntry): void {
    let byEndpoint = this.entries.get(chainId);
    if (!byEndpoint) {
      byEndpoint = new Map();
      this.entries.set(chainId, byEndpoint);
    }
    const list = byEndpoint.get(endpoint) ?? [];
    list.push(entry);
    byEndpoint.set(endpoint, list);
  }

  private computePercentiles(sorted: number[]): LatencyPercentiles {
    return {
      p50: this.percentile(sorted, 0.50),
      p95: this.percentile(sorted, 0.95),
      p99: this.percentile(sorted, 0.99),
    };
  }

  private percentile(sorted: number[], q: number): number {
    const idx = Math.ceil(sorted.length * q) - 1;
    return sorted[Math.max(0, idx)];
  }
}
