// Reusable fetch with retry/backoff + simple metrics hook
import fetch, { type RequestInit, type Response } from 'node-fetch';
import { logger } from './logger.js';
import { recordFetchMetric } from './metrics.js';

export type FetchRetryOptions = {
  retries?: number;          // total attempts including first (default 3)
  backoffMs?: number;        // initial backoff (default 500)
  backoffFactor?: number;    // multiplier (default 2)
  maxBackoffMs?: number;     // cap (default 5000)
  retryOn?: Array<number>;   // status codes to retry (default [429,502,503,504])
  timeoutMs?: number;        // per attempt timeout (optional)
  label?: string;            // upstream label for metrics
  beforeAttempt?: () => Promise<void>; // runs before every attempt, e.g. to take a rate-limit token
};

function redact(url: string) {
  return url.replace(/([?&]apiKey=)[^&]*/i, '$1***');
}

export async function fetchWithRetry(url: string, init: RequestInit = {}, opts: FetchRetryOptions = {}): Promise<Response> {
  const {
    retries = 3,
    backoffMs = 500,
    backoffFactor = 2,
    maxBackoffMs = 5000,
    retryOn = [429,502,503,504],
    timeoutMs,
    label = 'generic',
    beforeAttempt
  } = opts;
  const attempts = Math.max(1, retries);
  const safeUrl = redact(url);
  let delay = backoffMs;
  let lastErr: unknown = null;
  const started = Date.now();
  for (let attempt = 0; attempt < attempts; attempt++) {
    if (beforeAttempt) await beforeAttempt();
    const aStart = Date.now();
    const controller = timeoutMs ? new AbortController() : null;
    const t = controller && timeoutMs ? setTimeout(()=> controller.abort(), timeoutMs).unref() : undefined;
    try {
      const res = await fetch(url, { ...init, signal: controller?.signal });
      const ms = Date.now() - aStart;
      if (retryOn.includes(res.status) && attempt < attempts - 1) {
        logger.warn({ url: safeUrl, status: res.status, attempt }, 'fetch_retry_status');
        recordFetchMetric(label, 'retry', ms);
      } else {
        // non-ok responses are returned, the caller decides
        recordFetchMetric(label, res.ok ? 'ok' : 'error', ms);
        return res;
      }
    } catch (err) {
      lastErr = err;
      const ms = Date.now() - aStart;
      if (attempt >= attempts - 1) {
        recordFetchMetric(label, 'error', ms);
        break;
      }
      recordFetchMetric(label, 'retry', ms);
      logger.warn({ url: safeUrl, err, attempt }, 'fetch_retry_err');
    } finally {
      if (t) clearTimeout(t);
    }
    await new Promise(r=> setTimeout(r, delay));
    delay = Math.min(maxBackoffMs, delay * backoffFactor);
  }
  logger.error({ url: safeUrl, attempts, totalMs: Date.now() - started, err: lastErr }, 'fetch_failed_exhausted');
  throw lastErr instanceof Error ? lastErr : new Error('fetch_failed');
}
