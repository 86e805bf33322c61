/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀取與環境變數
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { z } from 'zod';
import { isLogLevel, loggers, type LogLevel } from '../lib/logger.js';
import type { AppConfig, AppCredentials, ConfigKey } from '../types/config.js';

export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'tonearm');
const DEFAULT_CONFIG_FILE = 'config.json';
const DEFAULT_TOKEN_FILE = 'tokens.json';
const DEFAULT_STORE_TIMEOUT_MS = 5000;
const DEFAULT_CACHE_MAX_ENTRIES = 1024;

const appConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  format: z.enum(['json', 'table']).optional(),
  tokenStorePath: z.string().min(1).optional(),
  storeTimeoutMs: z.number().int().positive().optional(),
  cacheTiers: z.record(z.number()).optional(),
  cacheMaxEntries: z.number().int().positive().optional(),
});

function readEnv(name: string): string | undefined {
  const value = process.env[name];
  return value && value.length > 0 ? value : undefined;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath =
      configPath || readEnv('TONEARM_CONFIG') || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * 載入設定檔；不存在時為空設定，內容錯誤時記錄警告後使用空設定
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }

    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      const parsed = appConfigSchema.safeParse(JSON.parse(content));
      if (parsed.success) {
        return parsed.data;
      }
      loggers.config.warn('Ignoring invalid config file', {
        path: this.configPath,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    } catch (error) {
      loggers.config.warn('Ignoring unreadable config file', {
        path: this.configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    return {};
  }

  /**
   * 取得設定值
   */
  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  /**
   * 取得所有設定
   */
  getAll(): AppConfig {
    return { ...this.config };
  }

  /**
   * 取得設定檔路徑
   */
  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 日誌級別（優先環境變數）
   */
  getLogLevel(): LogLevel | undefined {
    const envValue = readEnv('TONEARM_LOG_LEVEL');
    if (isLogLevel(envValue)) {
      return envValue;
    }
    return this.config.logLevel;
  }

  /**
   * Token store 檔案路徑（優先環境變數）
   */
  getTokenStorePath(): string {
    return (
      readEnv('TONEARM_TOKEN_STORE') ||
      this.config.tokenStorePath ||
      path.join(path.dirname(this.configPath), DEFAULT_TOKEN_FILE)
    );
  }

  getStoreTimeoutMs(): number {
    return this.config.storeTimeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
  }

  /**
   * 快取層級 TTL 覆寫（秒）
   */
  getCacheTierOverrides(): Record<string, number> {
    return { ...this.config.cacheTiers };
  }

  getCacheMaxEntries(): number {
    return this.config.cacheMaxEntries ?? DEFAULT_CACHE_MAX_ENTRIES;
  }

  /**
   * 從環境變數取得應用程式憑證
   * `${prefix}_APP_SECRET` 可包含多個以逗號分隔的候選值
   */
  getAppCredentials(prefix: string): AppCredentials {
    const appId = readEnv(`${prefix}_APP_ID`);
    const rawSecret = readEnv(`${prefix}_APP_SECRET`);

    if (!rawSecret) {
      return { appId };
    }

    const candidates = rawSecret
      .split(',')
      .map((secret) => secret.trim())
      .filter((secret) => secret.length > 0);

    return {
      appId,
      appSecret: candidates.length === 1 ? candidates[0] : candidates,
    };
  }
}

// 預設實例
let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService();
  }
  return defaultInstance;
}

/**
 * 替換預設實例（測試用）
 */
export function setConfigService(service: ConfigService | null): void {
  defaultInstance = service;
}
