/**
 * TTL Policy Registry
 * 快取層級 → 存活時間對照表，行程啟動時設定一次，之後唯讀
 */

import { CACHE_TIERS, type CacheTier } from '../types/cache.js';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * 預設 TTL（毫秒）
 * user 層級很短，因為收藏、個人檔案等資料會在外部被修改
 */
export const DEFAULT_TIER_DURATIONS: Readonly<Record<CacheTier, number>> = {
  static: Number.POSITIVE_INFINITY, // 直到行程結束
  catalog: 7 * DAY_MS, // 專輯、廠牌等目錄資料幾乎不變
  daily: DAY_MS,
  popularity: HOUR_MS,
  search: 10 * MINUTE_MS,
  user: 2 * MINUTE_MS,
};

export class UnknownTierError extends Error {
  public readonly code = 'UNKNOWN_TIER';
  public readonly tier: string;

  constructor(tier: string) {
    super(`Unknown cache tier '${tier}'. Valid tiers: '${CACHE_TIERS.join("', '")}'.`);
    this.name = 'UnknownTierError';
    this.tier = tier;
  }
}

export class InvalidTierDurationError extends Error {
  public readonly code = 'INVALID_TIER_DURATION';

  constructor(tier: string, value: unknown) {
    super(`Cache tier '${tier}' must have a positive duration, got ${String(value)}.`);
    this.name = 'InvalidTierDurationError';
  }
}

export function isCacheTier(name: string): name is CacheTier {
  return CACHE_TIERS.some((tier) => tier === name);
}

export class TtlPolicyRegistry {
  private durations: ReadonlyMap<CacheTier, number>;

  /**
   * @param overridesSeconds 覆寫特定層級的 TTL（秒）
   */
  constructor(overridesSeconds: Partial<Record<string, number>> = {}) {
    const durations = new Map<CacheTier, number>();
    for (const tier of CACHE_TIERS) {
      durations.set(tier, DEFAULT_TIER_DURATIONS[tier]);
    }

    for (const [name, seconds] of Object.entries(overridesSeconds)) {
      if (!isCacheTier(name)) {
        throw new UnknownTierError(name);
      }
      if (typeof seconds !== 'number' || Number.isNaN(seconds) || seconds <= 0) {
        throw new InvalidTierDurationError(name, seconds);
      }
      durations.set(name, seconds * 1000);
    }

    this.durations = durations;
  }

  /**
   * 取得層級的 TTL（毫秒）
   * @throws UnknownTierError 未註冊的層級名稱
   */
  resolve(name: string): number {
    if (!isCacheTier(name)) {
      throw new UnknownTierError(name);
    }
    const duration = this.durations.get(name);
    if (duration === undefined) {
      throw new UnknownTierError(name);
    }
    return duration;
  }

  has(name: string): boolean {
    return isCacheTier(name);
  }

  /**
   * 所有層級與其 TTL（毫秒），依宣告順序
   */
  entries(): Array<[CacheTier, number]> {
    return CACHE_TIERS.map((tier) => [tier, this.resolve(tier)]);
  }
}

// 預設實例
let defaultInstance: TtlPolicyRegistry | null = null;

export function getTtlPolicyRegistry(): TtlPolicyRegistry {
  if (!defaultInstance) {
    defaultInstance = new TtlPolicyRegistry();
  }
  return defaultInstance;
}

/**
 * 替換預設實例（啟動時依設定檔建立，或測試時替換）
 */
export function setTtlPolicyRegistry(registry: TtlPolicyRegistry | null): void {
  defaultInstance = registry;
}
