import type { LogLevel } from '../lib/logger.js';

/**
 * 設定檔結構
 */
export interface AppConfig {
  /** 日誌最小級別 */
  logLevel?: LogLevel;
  /** 預設輸出格式 */
  format?: 'json' | 'table';
  /** Token store 檔案路徑 */
  tokenStorePath?: string;
  /** Token store 存取逾時（毫秒） */
  storeTimeoutMs?: number;
  /** 覆寫快取層級 TTL（秒）；未知的層級名稱在啟動時即報錯 */
  cacheTiers?: Record<string, number>;
  /** 回應快取最大項目數 */
  cacheMaxEntries?: number;
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof AppConfig;

/**
 * 從環境變數取得的應用程式憑證
 */
export interface AppCredentials {
  appId?: string;
  /** 可能含多個以逗號分隔的候選值 */
  appSecret?: string | string[];
}
