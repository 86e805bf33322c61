/**
 * Response Cache
 * 行程內共用的回應快取 - 依呼叫簽章記憶讀取方法的結果，TTL 由快取層級決定
 *
 * - 命中時不會呼叫原函式（沒有任何副作用）
 * - 原函式失敗時錯誤原樣拋出且不寫入快取
 * - 過期檢查在讀取時進行；另以 maxEntries 做 LRU 淘汰
 * - 同一個鍵的並發未命中可能都會呼叫原函式（不保證 single-flight），最後完成的結果留在快取
 * - 呼叫進行中發生清除時，該次結果照常回傳但不寫入快取
 * - 命中回傳的是快取中的同一個物件，呼叫端必須視為唯讀
 */

import { buildCacheKey, methodKeyPrefix, ownerKeyPrefix } from '../lib/cache-key.js';
import { loggers } from '../lib/logger.js';
import {
  recordCacheEviction,
  recordCacheExpiration,
  recordCacheHit,
  recordCacheMiss,
  updateCacheEntriesCount,
} from '../lib/metrics.js';
import type { CacheableArgs, CacheTier, ResponseCacheStatus } from '../types/cache.js';
import { getTtlPolicyRegistry, type TtlPolicyRegistry } from './ttl-policy.js';

const DEFAULT_MAX_ENTRIES = 1024;

export interface ResponseCacheOptions {
  /** 最大項目數，超過時淘汰最久未使用者 (default: 1024) */
  maxEntries?: number;
  /** 未指定時使用行程預設的 registry */
  registry?: TtlPolicyRegistry;
}

export interface WrapOptions {
  /** 接收者物件，預設為原函式本身 */
  owner?: object;
  /** 方法名稱，預設為原函式的 name */
  method?: string;
}

export interface CachedFunctionInfo {
  owner: object;
  method: string;
  tier: CacheTier;
}

/**
 * 全域索引：包裝後的函式 → 其擁有者與方法名稱，供清除特定方法時使用
 */
const cachedFunctions = new WeakMap<object, CachedFunctionInfo>();

export function registerCachedFunction(fn: object, info: CachedFunctionInfo): void {
  cachedFunctions.set(fn, info);
}

export function getCachedFunctionInfo(fn: object): CachedFunctionInfo | undefined {
  return cachedFunctions.get(fn);
}

/**
 * 各包裝函式自己保存值的 Map；索引只需要能移除其中的項目
 */
interface ValueStore {
  delete(key: string): boolean;
}

/**
 * 快取索引中的一格；實際的值保存在 store 中，淘汰或清除時一併移除
 */
interface Slot {
  readonly expiresAt: number;
  readonly tier: CacheTier;
  readonly store: ValueStore;
}

export class ResponseCache {
  private slots = new Map<string, Slot>();
  private maxEntries: number;
  private registry: TtlPolicyRegistry | null;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  // 每次清除都遞增；呼叫期間有清除時，結果不寫入快取
  private generation = 0;

  constructor(options: ResponseCacheOptions = {}) {
    const maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}.`);
    }
    this.maxEntries = maxEntries;
    this.registry = options.registry ?? null;
  }

  private getRegistry(): TtlPolicyRegistry {
    return this.registry ?? getTtlPolicyRegistry();
  }

  /**
   * 包裝讀取函式，回傳簽章相同但具記憶功能的函式
   *
   * 結果不會複製：第一次呼叫與之後的命中拿到同一個參照，
   * 修改它等於修改快取內容，需要變更時請先自行複製。
   * @throws UnknownTierError 層級名稱未註冊（於包裝時拋出）
   */
  wrap<A extends CacheableArgs, R>(
    tier: CacheTier,
    fn: (...args: A) => Promise<R>,
    options: WrapOptions = {}
  ): (...args: A) => Promise<R> {
    this.getRegistry().resolve(tier);

    const owner = options.owner ?? fn;
    const method = options.method ?? (fn.name || 'anonymous');
    const values = new Map<string, { value: R }>();

    const wrapped = async (...args: A): Promise<R> => {
      // 鍵無法建立時在呼叫原函式之前就拋出 CacheKeyError
      const key = buildCacheKey(owner, method, args);

      const box = this.isFresh(key) ? values.get(key) : undefined;
      if (box) {
        this.hits++;
        recordCacheHit(tier);
        loggers.cache.debug('Cache hit', { method, tier });
        return box.value;
      }

      this.misses++;
      recordCacheMiss(tier);
      loggers.cache.debug('Cache miss', { method, tier });

      const generation = this.generation;
      const value = await fn(...args);

      if (generation !== this.generation) {
        loggers.cache.debug('Discarding result invalidated during the call', { method, tier });
        return value;
      }

      values.set(key, { value });
      this.admit(key, tier, values);
      return value;
    };

    registerCachedFunction(wrapped, { owner, method, tier });
    return wrapped;
  }

  /**
   * 檢查鍵是否仍有效；過期則移除，有效則更新 LRU 順序
   */
  private isFresh(key: string): boolean {
    const slot = this.slots.get(key);
    if (!slot) {
      return false;
    }

    if (Date.now() >= slot.expiresAt) {
      this.drop(key, slot);
      recordCacheExpiration();
      return false;
    }

    this.slots.delete(key);
    this.slots.set(key, slot);
    return true;
  }

  /**
   * 寫入新項目（整筆替換舊項目）
   */
  private admit(key: string, tier: CacheTier, store: ValueStore): void {
    const duration = this.getRegistry().resolve(tier);
    const previous = this.slots.get(key);
    if (previous) {
      this.slots.delete(key);
      // 同一個鍵可能由另一個包裝函式寫入，先移除它保存的值
      if (previous.store !== store) previous.store.delete(key);
    }

    this.slots.set(key, Object.freeze({ expiresAt: Date.now() + duration, tier, store }));

    while (this.slots.size > this.maxEntries) {
      const oldest = this.slots.entries().next();
      if (oldest.done) break;
      const [oldestKey, oldestSlot] = oldest.value;
      this.drop(oldestKey, oldestSlot);
      this.evictions++;
      recordCacheEviction();
    }

    updateCacheEntriesCount(this.slots.size);
  }

  private drop(key: string, slot: Slot): void {
    this.slots.delete(key);
    slot.store.delete(key);
    updateCacheEntriesCount(this.slots.size);
  }

  private dropByPrefix(prefix: string): number {
    let removed = 0;
    for (const [key, slot] of [...this.slots]) {
      if (key.startsWith(prefix)) {
        this.drop(key, slot);
        removed++;
      }
    }
    return removed;
  }

  /**
   * 清除特定呼叫的快取；不存在時不做任何事
   * @param fn 由 wrap() 或 API 用戶端回傳的快取函式
   */
  invalidate<A extends CacheableArgs>(fn: (...args: A) => unknown, args: A): void {
    const info = getCachedFunctionInfo(fn);
    if (!info) return;

    this.generation++;
    const key = buildCacheKey(info.owner, info.method, args);
    const slot = this.slots.get(key);
    if (slot) {
      this.drop(key, slot);
    }
  }

  /**
   * 清除某個快取函式的所有項目
   */
  invalidateMethod(fn: object): number {
    const info = getCachedFunctionInfo(fn);
    if (!info) return 0;
    this.generation++;
    return this.dropByPrefix(methodKeyPrefix(info.owner, info.method));
  }

  /**
   * 清除某個擁有者（例如一個 API 用戶端）的所有項目
   */
  invalidateOwner(owner: object): number {
    this.generation++;
    return this.dropByPrefix(ownerKeyPrefix(owner));
  }

  /**
   * 清除全部
   */
  invalidateAll(): void {
    this.generation++;
    for (const [key, slot] of this.slots) {
      slot.store.delete(key);
    }
    this.slots.clear();
    updateCacheEntriesCount(0);
    loggers.cache.debug('Cache cleared');
  }

  getStatus(): ResponseCacheStatus {
    return {
      entries: this.slots.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}

// 預設實例
let defaultInstance: ResponseCache | null = null;

export function getResponseCache(): ResponseCache {
  if (!defaultInstance) {
    defaultInstance = new ResponseCache();
  }
  return defaultInstance;
}

/**
 * 以設定建立新的預設實例（啟動時或測試時）
 */
export function setResponseCache(cache: ResponseCache | null): void {
  defaultInstance = cache;
}
