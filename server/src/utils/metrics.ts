// Simple in-memory metrics aggregator for upstream fetches
// Not persistent; reset on process restart.

export type FetchMetricKind = 'ok' | 'error' | 'retry';

interface UpstreamStats {
  ok: number;
  error: number;
  retry: number;
  count: number;
  sumMs: number;
  minMs: number;
  maxMs: number;
}

export interface UpstreamSnapshot {
  ok: number;
  error: number;
  retry: number;
  count: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
}

const upstreams: Record<string, UpstreamStats> = {};

function ensure(label: string): UpstreamStats {
  if (!upstreams[label]) upstreams[label] = { ok:0, error:0, retry:0, count:0, sumMs:0, minMs: Number.POSITIVE_INFINITY, maxMs: 0 };
  return upstreams[label];
}

export function recordFetchMetric(label: string, kind: FetchMetricKind, ms: number) {
  const s = ensure(label);
  if (kind === 'ok') s.ok++; else if (kind === 'error') s.error++; else s.retry++;
  s.count++;
  s.sumMs += ms;
  if (ms < s.minMs) s.minMs = ms;
  if (ms > s.maxMs) s.maxMs = ms;
}

export function getMetricsSnapshot(): Record<string, UpstreamSnapshot> {
  const out: Record<string, UpstreamSnapshot> = {};
  for (const [k, v] of Object.entries(upstreams)) {
    out[k] = {
      ok: v.ok,
      error: v.error,
      retry: v.retry,
      count: v.count,
      avgMs: v.count ? Number((v.sumMs / v.count).toFixed(1)) : 0,
      minMs: Number.isFinite(v.minMs) ? v.minMs : 0,
      maxMs: v.maxMs
    };
  }
  return out;
}
