/**
 * Token Store
 * 多帳號憑證儲存 - 依 (clientName, authorizationFlow, clientId, userIdentifier) 保存 token
 *
 * - userIdentifier 省略時取最近使用的紀錄
 * - userIdentifier 以 `~` 開頭表示略過已存的紀錄，之後以去掉 `~` 的名稱寫回
 * - 持久化失敗一律拋出 StoreUnavailableError，絕不當作「找不到」
 */

import { loggers } from '../lib/logger.js';
import { recordTokenStoreOperation } from '../lib/metrics.js';
import { ValidationError } from '../lib/validation.js';
import type {
  CredentialFilter,
  CredentialInput,
  CredentialLookup,
  CredentialRecord,
  CredentialSummary,
} from '../types/token.js';
import { getConfigService } from './config.js';
import {
  JsonFileTokenPersistence,
  StoreUnavailableError,
  type TokenPersistence,
} from './token-persistence.js';

export { StoreUnavailableError } from './token-persistence.js';

export const BYPASS_MARKER = '~';

const DEFAULT_TIMEOUT_MS = 5000;

export interface ParsedUserIdentifier {
  /** 去掉標記後的識別碼；undefined 表示未指定 */
  userIdentifier: string | null | undefined;
  /** 是否要求略過已存的紀錄 */
  bypass: boolean;
}

/**
 * 拆解使用者識別碼中的略過標記
 * @example parseUserIdentifier('~carol') // { userIdentifier: 'carol', bypass: true }
 */
export function parseUserIdentifier(userIdentifier?: string | null): ParsedUserIdentifier {
  if (typeof userIdentifier === 'string' && userIdentifier.startsWith(BYPASS_MARKER)) {
    const stripped = userIdentifier.slice(BYPASS_MARKER.length);
    return { userIdentifier: stripped.length > 0 ? stripped : null, bypass: true };
  }
  return { userIdentifier, bypass: false };
}

export interface TokenStoreOptions {
  /** 持久化後端，預設為設定中的 JSON 檔案 */
  persistence?: TokenPersistence;
  /** 單次持久化存取的逾時（毫秒） */
  timeoutMs?: number;
}

function toList(value: string | readonly string[] | undefined): readonly string[] | undefined {
  if (value === undefined) return undefined;
  return typeof value === 'string' ? [value] : value;
}

function matchesFilter(record: CredentialRecord, filter: CredentialFilter): boolean {
  const checks: Array<[readonly string[] | undefined, string | null]> = [
    [toList(filter.clientNames), record.clientName],
    [toList(filter.authorizationFlows), record.authorizationFlow],
    [toList(filter.clientIds), record.clientId],
    [toList(filter.userIdentifiers), record.userIdentifier],
  ];
  return checks.every(
    ([allowed, actual]) => allowed === undefined || (actual !== null && allowed.includes(actual))
  );
}

function isEmptyFilter(filter: CredentialFilter): boolean {
  return (
    filter.clientNames === undefined &&
    filter.authorizationFlows === undefined &&
    filter.clientIds === undefined &&
    filter.userIdentifiers === undefined
  );
}

function sameIdentity(
  record: CredentialRecord,
  identity: Pick<CredentialRecord, 'clientName' | 'authorizationFlow' | 'clientId' | 'userIdentifier'>
): boolean {
  return (
    record.clientName === identity.clientName &&
    record.authorizationFlow === identity.authorizationFlow &&
    record.clientId === identity.clientId &&
    record.userIdentifier === identity.userIdentifier
  );
}

/**
 * 最近使用：lastAccessed 最大者；相同時取陣列中較後面（較晚寫入）的紀錄
 */
function selectMostRecent(records: readonly CredentialRecord[]): CredentialRecord | null {
  let best: CredentialRecord | null = null;
  let bestTime = Number.NEGATIVE_INFINITY;
  for (const record of records) {
    const time = Date.parse(record.lastAccessed);
    if (best === null || time >= bestTime) {
      best = record;
      bestTime = time;
    }
  }
  return best;
}

function toSummary(record: CredentialRecord): CredentialSummary {
  return {
    clientName: record.clientName,
    authorizationFlow: record.authorizationFlow,
    clientId: record.clientId,
    userIdentifier: record.userIdentifier,
    tokenType: record.tokenType,
    scopes: [...record.scopes],
    redirectUri: record.redirectUri,
    expiresAt: record.expiresAt,
    hasRefreshToken: record.refreshToken !== null,
    lastAccessed: record.lastAccessed,
  };
}

export class TokenStore {
  private persistence: TokenPersistence;
  private timeoutMs: number;
  // 所有操作依序執行，避免讀-改-寫互相覆蓋
  private queue: Promise<void> = Promise.resolve();
  // 最近一次送出的持久化存取；逾時後它可能仍在背景執行
  private inflight: Promise<void> = Promise.resolve();

  constructor(options: TokenStoreOptions = {}) {
    this.persistence =
      options.persistence ?? new JsonFileTokenPersistence(getConfigService().getTokenStorePath());
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  describe(): string {
    return this.persistence.describe();
  }

  /**
   * 查詢憑證；找到時更新其最近使用時間
   * @returns 找不到（或要求略過）時為 null
   * @throws StoreUnavailableError
   */
  async find(lookup: CredentialLookup): Promise<CredentialRecord | null> {
    const parsed = parseUserIdentifier(lookup.userIdentifier);
    if (parsed.bypass) {
      loggers.tokens.debug('Bypassing stored token', {
        clientName: lookup.clientName,
        authorizationFlow: lookup.authorizationFlow,
      });
      return null;
    }

    return this.enqueue('find', async () => {
      const records = await this.load();
      const candidates = records.filter(
        (record) =>
          record.clientName === lookup.clientName &&
          record.authorizationFlow === lookup.authorizationFlow &&
          record.clientId === lookup.clientId
      );

      const found =
        parsed.userIdentifier === undefined
          ? selectMostRecent(candidates)
          : (candidates.find((record) => record.userIdentifier === parsed.userIdentifier) ?? null);

      if (!found) {
        return null;
      }

      const touched: CredentialRecord = { ...found, lastAccessed: new Date().toISOString() };
      await this.save([...records.filter((record) => record !== found), touched]);
      return structuredClone(touched);
    });
  }

  /**
   * 新增或覆寫同一識別四元組的紀錄；userIdentifier 的略過標記會先去掉
   * @throws StoreUnavailableError
   */
  async upsert(input: CredentialInput): Promise<CredentialRecord> {
    if (!input.clientName || !input.authorizationFlow || !input.clientId) {
      throw new ValidationError(
        'credential',
        'clientName, authorizationFlow and clientId are required to store a token.'
      );
    }

    const record: CredentialRecord = {
      clientName: input.clientName,
      authorizationFlow: input.authorizationFlow,
      clientId: input.clientId,
      userIdentifier: parseUserIdentifier(input.userIdentifier).userIdentifier ?? null,
      clientSecret: input.clientSecret ?? null,
      accessToken: input.accessToken,
      refreshToken: input.refreshToken ?? null,
      expiresAt: input.expiresAt ?? null,
      tokenType: input.tokenType ?? null,
      scopes: [...(input.scopes ?? [])],
      redirectUri: input.redirectUri ?? null,
      extras: input.extras ?? null,
      lastAccessed: new Date().toISOString(),
    };

    return this.enqueue('upsert', async () => {
      const records = await this.load();
      await this.save([...records.filter((existing) => !sameIdentity(existing, record)), record]);
      loggers.tokens.info('Token stored', {
        clientName: record.clientName,
        authorizationFlow: record.authorizationFlow,
        userIdentifier: record.userIdentifier,
      });
      return structuredClone(record);
    });
  }

  /**
   * 刪除符合條件的紀錄
   *
   * 注意：不帶任何條件會刪除 store 中的所有紀錄
   * @returns 刪除的筆數；沒有符合的紀錄時為 0
   * @throws StoreUnavailableError
   */
  async remove(filter: CredentialFilter = {}): Promise<number> {
    if (isEmptyFilter(filter)) {
      loggers.tokens.warn('Removing every stored token', { store: this.describe() });
    }

    return this.enqueue('remove', async () => {
      const records = await this.load();
      const kept = records.filter((record) => !matchesFilter(record, filter));
      const removed = records.length - kept.length;
      if (removed > 0) {
        await this.save(kept);
      }
      return removed;
    });
  }

  /**
   * 列出符合條件的紀錄摘要（不含 secret），最近使用的在前
   * @throws StoreUnavailableError
   */
  async list(filter: CredentialFilter = {}): Promise<CredentialSummary[]> {
    return this.enqueue('list', async () => {
      const records = await this.load();
      return records
        .filter((record) => matchesFilter(record, filter))
        .reverse()
        .map(toSummary);
    });
  }

  private async load(): Promise<CredentialRecord[]> {
    return this.withTimeout('load', this.persistence.load());
  }

  private async save(records: readonly CredentialRecord[]): Promise<void> {
    return this.withTimeout('save', this.persistence.save(records));
  }

  /**
   * 排入序列佇列；前一個操作失敗不影響後續操作。
   * 逾時的呼叫端立即收到錯誤，下一個操作則等底層存取真正結束後才開始
   */
  private enqueue<T>(operation: string, task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    const release = (): Promise<void> => this.inflight;
    this.queue = run.then(release, release);

    return run.then(
      (result) => {
        recordTokenStoreOperation(operation, true);
        return result;
      },
      (error: unknown) => {
        recordTokenStoreOperation(operation, false);
        loggers.tokens.error(
          `Token store ${operation} failed`,
          error instanceof Error ? error : new Error(String(error)),
          { store: this.describe() }
        );
        throw error;
      }
    );
  }

  private async withTimeout<T>(step: string, operation: Promise<T>): Promise<T> {
    this.inflight = operation.then(
      () => undefined,
      () => undefined
    );

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new StoreUnavailableError(
            `Token store ${step} timed out after ${this.timeoutMs}ms (${this.describe()})`
          )
        );
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([operation, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

// 預設實例
let defaultInstance: TokenStore | null = null;

export function getTokenStore(): TokenStore {
  if (!defaultInstance) {
    const config = getConfigService();
    defaultInstance = new TokenStore({
      persistence: new JsonFileTokenPersistence(config.getTokenStorePath()),
      timeoutMs: config.getStoreTimeoutMs(),
    });
  }
  return defaultInstance;
}

/**
 * 替換預設實例（測試用）
 */
export function setTokenStore(store: TokenStore | null): void {
  defaultInstance = store;
}
