/**
 * Prometheus 指標收集
 * 追蹤回應快取、token store、認證與 API 請求
 */

import { register, Counter, Gauge, Histogram } from 'prom-client';
import type { CacheTier } from '../types/cache.js';

/**
 * 回應快取指標
 */
export const cacheHitsTotal = new Counter({
  name: 'tonearm_cache_hits_total',
  help: '回應快取命中次數',
  labelNames: ['tier'],
});

export const cacheMissesTotal = new Counter({
  name: 'tonearm_cache_misses_total',
  help: '回應快取未命中次數',
  labelNames: ['tier'],
});

export const cacheExpirationsTotal = new Counter({
  name: 'tonearm_cache_expirations_total',
  help: '讀取時發現過期而移除的項目數',
});

export const cacheEvictionsTotal = new Counter({
  name: 'tonearm_cache_evictions_total',
  help: '超過容量而淘汰的項目數',
});

export const cacheEntries = new Gauge({
  name: 'tonearm_cache_entries',
  help: '回應快取目前項目數量',
});

/**
 * Token store 指標
 */
export const tokenStoreOperationsTotal = new Counter({
  name: 'tonearm_token_store_operations_total',
  help: 'Token store 操作次數',
  labelNames: ['operation', 'status'], // status: 'success' | 'failed'
});

/**
 * 認證指標
 */
export const authenticationsTotal = new Counter({
  name: 'tonearm_authentications_total',
  help: '建立憑證次數（依來源）',
  labelNames: ['client', 'source'], // source: 'explicit' | 'store' | 'fresh'
});

export const secretProbesTotal = new Counter({
  name: 'tonearm_secret_probes_total',
  help: '候選 secret 探測次數',
  labelNames: ['result'], // 'accepted' | 'rejected'
});

/**
 * API 指標
 */
export const apiRequestsTotal = new Counter({
  name: 'tonearm_api_requests_total',
  help: 'API 請求總數',
  labelNames: ['method', 'endpoint', 'status'],
});

export const apiRequestDurationSeconds = new Histogram({
  name: 'tonearm_api_request_duration_seconds',
  help: 'API 請求延遲（秒）',
  labelNames: ['method', 'endpoint'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1.0, 2.0, 5.0],
});

/**
 * 收集所有指標的 Prometheus 格式
 */
export async function getMetricsSnapshot(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * 重置所有指標（用於測試）
 */
export function resetMetrics(): void {
  register.resetMetrics();
}

export function recordCacheHit(tier: CacheTier): void {
  cacheHitsTotal.inc({ tier });
}

export function recordCacheMiss(tier: CacheTier): void {
  cacheMissesTotal.inc({ tier });
}

export function recordCacheExpiration(): void {
  cacheExpirationsTotal.inc();
}

export function recordCacheEviction(): void {
  cacheEvictionsTotal.inc();
}

export function updateCacheEntriesCount(count: number): void {
  cacheEntries.set(count);
}

export function recordTokenStoreOperation(operation: string, success: boolean): void {
  tokenStoreOperationsTotal.inc({ operation, status: success ? 'success' : 'failed' });
}

export function recordAuthentication(client: string, source: string): void {
  authenticationsTotal.inc({ client, source });
}

export function recordSecretProbe(accepted: boolean): void {
  secretProbesTotal.inc({ result: accepted ? 'accepted' : 'rejected' });
}

/**
 * 更新 API 請求指標
 */
export function recordApiRequest(
  method: string,
  endpoint: string,
  statusCode: number,
  durationMs: number
): void {
  apiRequestsTotal.inc({ method, endpoint, status: String(statusCode) });
  apiRequestDurationSeconds.observe({ method, endpoint }, durationMs / 1000);
}
