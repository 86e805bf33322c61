/**
 * Token Store 型別
 */

/**
 * 憑證識別四元組
 * userIdentifier 為 null 表示未綁定特定帳號（如 client credentials flow）
 */
export interface CredentialIdentity {
  clientName: string;
  authorizationFlow: string;
  clientId: string;
  userIdentifier: string | null;
}

/**
 * 查詢用識別：userIdentifier 省略時取最近使用的紀錄
 */
export interface CredentialLookup {
  clientName: string;
  authorizationFlow: string;
  clientId: string;
  userIdentifier?: string | null;
}

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * 寫入 store 的憑證內容（lastAccessed 由 store 設定）
 */
export interface CredentialInput {
  clientName: string;
  authorizationFlow: string;
  clientId: string;
  userIdentifier?: string | null;
  /** 單一 secret 或候選清單 */
  clientSecret?: string | string[] | null;
  accessToken: string;
  refreshToken?: string | null;
  /** ISO 8601 */
  expiresAt?: string | null;
  tokenType?: string | null;
  scopes?: string[];
  redirectUri?: string | null;
  /** provider 特有的附加資料 */
  extras?: JsonObject | null;
}

export interface CredentialRecord extends CredentialIdentity {
  clientSecret: string | string[] | null;
  accessToken: string;
  refreshToken: string | null;
  expiresAt: string | null;
  tokenType: string | null;
  scopes: string[];
  redirectUri: string | null;
  extras: JsonObject | null;
  /** ISO 8601 */
  lastAccessed: string;
}

/**
 * 顯示用摘要：不含任何 secret 內容
 */
export interface CredentialSummary extends CredentialIdentity {
  tokenType: string | null;
  scopes: string[];
  redirectUri: string | null;
  expiresAt: string | null;
  hasRefreshToken: boolean;
  lastAccessed: string;
}

/**
 * 篩選條件：各欄位可為單值或清單，彼此取交集；全部省略表示全部
 */
export interface CredentialFilter {
  clientNames?: string | readonly string[];
  authorizationFlows?: string | readonly string[];
  clientIds?: string | readonly string[];
  userIdentifiers?: string | readonly string[];
}
