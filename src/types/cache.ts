/**
 * 回應快取相關型別
 */

/**
 * 快取層級（tier）：封閉集合，每個被快取的方法在定義時宣告其中一個
 */
export const CACHE_TIERS = ['static', 'catalog', 'daily', 'popularity', 'search', 'user'] as const;

export type CacheTier = (typeof CACHE_TIERS)[number];

/**
 * 可作為快取鍵的參數值
 * 函式、symbol、類別實例等無法正規化的值在型別層級即被排除
 */
export type CacheableValue =
  | string
  | number
  | boolean
  | bigint
  | null
  | undefined
  | Date
  | readonly CacheableValue[]
  | ReadonlySet<CacheableValue>
  | ReadonlyMap<CacheableValue, CacheableValue>
  | { readonly [key: string]: CacheableValue };

export type CacheableArgs = readonly CacheableValue[];

export interface ResponseCacheStatus {
  entries: number;
  maxEntries: number;
  hits: number;
  misses: number;
  evictions: number;
}
