/**
 * Prometheus 指標收集
 * 追蹤權杖交換、快取命中與權杖檔寫入
 */

import { register, Counter, Histogram } from 'prom-client';

/**
 * 權杖交換指標
 */
export const tokenExchangesTotal = new Counter({
  name: 'token_exchanges_total',
  help: '權杖交換次數',
  labelNames: ['kind', 'outcome'] // outcome: 'success' | 'failed'
});

export const tokenExchangeDurationSeconds = new Histogram({
  name: 'token_exchange_duration_seconds',
  help: '權杖交換延遲（秒）',
  labelNames: ['kind'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1.0, 2.0, 5.0]
});

/**
 * 解析器快取指標
 */
export const tokenCacheHitsTotal = new Counter({
  name: 'token_cache_hits_total',
  help: '權杖快取命中次數',
  labelNames: ['kind']
});

export const tokenCacheMissesTotal = new Counter({
  name: 'token_cache_misses_total',
  help: '權杖快取未命中次數',
  labelNames: ['kind']
});

/**
 * 權杖檔寫入指標
 */
export const tokenStoreWritesTotal = new Counter({
  name: 'token_store_writes_total',
  help: '權杖檔寫入次數',
  labelNames: ['outcome']
});

/**
 * 記錄一次交換的結果與耗時
 */
export function recordExchange(kind: string, outcome: 'success' | 'failed', durationMs: number): void {
  tokenExchangesTotal.inc({ kind, outcome });
  tokenExchangeDurationSeconds.observe({ kind }, durationMs / 1000);
}

/**
 * 以 Prometheus 文字格式輸出所有指標
 */
export async function getMetricsText(): Promise<string> {
  return register.metrics();
}

/**
 * 重置所有指標（測試用）
 */
export function resetMetrics(): void {
  register.resetMetrics();
}
