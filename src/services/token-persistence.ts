/**
 * Token Persistence
 * Token store 的持久化後端：JSON 檔案（預設）與記憶體（測試用）
 *
 * 檔案格式（欄位一律採 snake_case，依 version 判斷結構）：
 * { "version": 1, "tokens": [{ "client_name": ..., "last_accessed": ... }] }
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { CredentialRecord, JsonValue } from '../types/token.js';

const FILE_VERSION = 1;

export class StoreUnavailableError extends Error {
  public readonly code = 'STORE_UNAVAILABLE';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreUnavailableError';
  }
}

/**
 * 持久化合約：整批讀取、整批寫入；序列化由 TokenStore 負責
 */
export interface TokenPersistence {
  /** 不存在時回傳空陣列；無法讀取或內容損毀時拋出 StoreUnavailableError */
  load(): Promise<CredentialRecord[]>;
  save(records: readonly CredentialRecord[]): Promise<void>;
  /** 顯示用的位置描述 */
  describe(): string;
}

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const storedTokenSchema = z.object({
  client_name: z.string().min(1),
  authorization_flow: z.string(),
  client_id: z.string(),
  client_secret: z.union([z.string(), z.array(z.string()), z.null()]),
  user_identifier: z.string().nullable(),
  redirect_uri: z.string().nullable(),
  scopes: z.array(z.string()),
  token_type: z.string().nullable(),
  access_token: z.string(),
  refresh_token: z.string().nullable(),
  expires_at: z.string().nullable(),
  extras: z.record(jsonValueSchema).nullable(),
  last_accessed: z.string().datetime(),
});

const tokenFileSchema = z.object({
  version: z.literal(FILE_VERSION),
  tokens: z.array(storedTokenSchema),
});

type StoredToken = z.infer<typeof storedTokenSchema>;

function fromStored(stored: StoredToken): CredentialRecord {
  return {
    clientName: stored.client_name,
    authorizationFlow: stored.authorization_flow,
    clientId: stored.client_id,
    userIdentifier: stored.user_identifier,
    clientSecret: stored.client_secret,
    accessToken: stored.access_token,
    refreshToken: stored.refresh_token,
    expiresAt: stored.expires_at,
    tokenType: stored.token_type,
    scopes: stored.scopes,
    redirectUri: stored.redirect_uri,
    extras: stored.extras,
    lastAccessed: stored.last_accessed,
  };
}

function toStored(record: CredentialRecord): StoredToken {
  return {
    client_name: record.clientName,
    authorization_flow: record.authorizationFlow,
    client_id: record.clientId,
    client_secret: record.clientSecret,
    user_identifier: record.userIdentifier,
    redirect_uri: record.redirectUri,
    scopes: record.scopes,
    token_type: record.tokenType,
    access_token: record.accessToken,
    refresh_token: record.refreshToken,
    expires_at: record.expiresAt,
    extras: record.extras,
    last_accessed: record.lastAccessed,
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * JSON 檔案後端
 * 寫入時先寫暫存檔再 rename，讀取端不會看到寫到一半的檔案；權限 0600
 */
export class JsonFileTokenPersistence implements TokenPersistence {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  describe(): string {
    return this.filePath;
  }

  async load(): Promise<CredentialRecord[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw new StoreUnavailableError(
        `Cannot read token store at ${this.filePath}: ${describeCause(error)}`,
        error
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new StoreUnavailableError(`Token store at ${this.filePath} is not valid JSON`, error);
    }

    const parsed = tokenFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid content';
      throw new StoreUnavailableError(
        `Token store at ${this.filePath} is corrupt (${where})`,
        parsed.error
      );
    }

    return parsed.data.tokens.map(fromStored);
  }

  async save(records: readonly CredentialRecord[]): Promise<void> {
    const payload = JSON.stringify(
      { version: FILE_VERSION, tokens: records.map(toStored) },
      null,
      2
    );
    const tempPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
      await fs.writeFile(tempPath, payload, { encoding: 'utf-8', mode: 0o600 });
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new StoreUnavailableError(
        `Cannot write token store at ${this.filePath}: ${describeCause(error)}`,
        error
      );
    }
  }
}

/**
 * 記憶體後端，行程結束即消失
 */
export class MemoryTokenPersistence implements TokenPersistence {
  private records: CredentialRecord[];

  constructor(initial: readonly CredentialRecord[] = []) {
    this.records = structuredClone([...initial]);
  }

  describe(): string {
    return 'memory';
  }

  async load(): Promise<CredentialRecord[]> {
    return structuredClone(this.records);
  }

  async save(records: readonly CredentialRecord[]): Promise<void> {
    this.records = structuredClone([...records]);
  }
}
