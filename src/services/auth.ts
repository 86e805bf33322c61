/**
 * Auth Pipeline
 * 建立 API 用戶端憑證：明確傳入 > 環境變數 > 已存 token > 重新認證
 *
 * 認證交換本身（登入、OAuth 等）由各 provider 的 AuthFlow 實作；
 * 這裡只負責決定憑證來源、探測可用的 secret，以及寫回 token store
 */

import { loggers } from '../lib/logger.js';
import { recordAuthentication, recordSecretProbe } from '../lib/metrics.js';
import type { CredentialRecord, JsonObject } from '../types/token.js';
import { parseUserIdentifier, type TokenStore } from './token-store.js';
import { ApiRequestError } from './transport.js';

export class NoValidCredentialError extends Error {
  public readonly code = 'NO_VALID_CREDENTIAL';
  public readonly attempted: number;

  constructor(attempted: number, clientName?: string) {
    const subject = clientName ? ` for ${clientName}` : '';
    super(
      attempted === 0
        ? `No candidate secret available${subject}.`
        : `None of the ${attempted} candidate secret(s)${subject} was accepted.`
    );
    this.name = 'NoValidCredentialError';
    this.attempted = attempted;
  }
}

/**
 * 探測時視為「secret 被拒」的錯誤；其他錯誤（網路中斷等）原樣拋出
 */
export function isCredentialRejection(error: unknown): boolean {
  return error instanceof ApiRequestError && (error.status === 400 || error.status === 401);
}

/**
 * 依序嘗試候選 secret，回傳第一個通過探測者
 * 探測次數以候選清單長度為上限，不會重試
 * @throws NoValidCredentialError 全部被拒時
 */
export async function selectWorkingSecret(
  candidates: readonly string[],
  probe: (secret: string) => Promise<void>,
  clientName?: string
): Promise<string> {
  for (const [index, candidate] of candidates.entries()) {
    try {
      await probe(candidate);
    } catch (error) {
      if (!isCredentialRejection(error)) {
        throw error;
      }
      recordSecretProbe(false);
      loggers.auth.debug('Candidate secret rejected', { clientName, candidate: index + 1 });
      continue;
    }

    recordSecretProbe(true);
    loggers.auth.debug('Candidate secret accepted', { clientName, candidate: index + 1 });
    return candidate;
  }

  throw new NoValidCredentialError(candidates.length, clientName);
}

/**
 * 認證交換的結果
 */
export interface AuthenticationResult {
  accessToken: string;
  refreshToken?: string | null;
  /** ISO 8601 */
  expiresAt?: string | null;
  tokenType?: string | null;
  scopes?: string[];
  redirectUri?: string | null;
  /** provider 回傳的其他資料（例如使用者資訊） */
  extras?: JsonObject | null;
}

/**
 * Provider 特有的認證流程
 */
export interface AuthFlow {
  /** 執行認證交換 */
  authenticate(): Promise<AuthenticationResult>;
  /**
   * 以剛取得的 token 探測 secret；被拒時拋出 400/401 的 ApiRequestError
   * 未實作時只接受單一 secret
   */
  probeSecret?(secret: string, accessToken: string): Promise<void>;
  /** 未指定 userIdentifier 時，由認證結果推導帳號識別碼 */
  resolveUserIdentifier?(result: AuthenticationResult): Promise<string | null>;
}

export interface AuthRequest {
  clientName: string;
  authorizationFlow: string;
  clientId: string;
  /** 明確傳入或來自環境變數的 secret（可為候選清單） */
  clientSecret?: string | readonly string[] | null;
  /** 向 provider 重新取得的候選 secret，優先順序最低 */
  fallbackSecrets?: readonly string[];
  /** `~` 開頭表示略過已存 token */
  userIdentifier?: string | null;
  /** 明確傳入的 token，略過 store 與認證 */
  accessToken?: string | null;
}

export type CredentialSource = 'explicit' | 'store' | 'fresh';

export interface EstablishedCredential {
  source: CredentialSource;
  accessToken: string;
  /** 確認可用的 secret；沒有 secret 時為 null */
  clientSecret: string | null;
  userIdentifier: string | null;
  extras: JsonObject | null;
  /** 對應的 store 紀錄（explicit 或未啟用 store 時為 null） */
  record: CredentialRecord | null;
}

function toCandidates(secret: string | readonly string[] | null | undefined): readonly string[] | null {
  if (secret === null || secret === undefined) return null;
  return typeof secret === 'string' ? [secret] : secret;
}

export interface AuthPipelineOptions {
  /** null 表示不讀寫 token store */
  store: TokenStore | null;
}

export class AuthPipeline {
  private store: TokenStore | null;

  constructor(options: AuthPipelineOptions) {
    this.store = options.store;
  }

  /**
   * 依優先順序建立憑證
   * @throws StoreUnavailableError token store 無法存取
   * @throws NoValidCredentialError 沒有可用的 secret
   */
  async establish(request: AuthRequest, flow: AuthFlow): Promise<EstablishedCredential> {
    const { userIdentifier, bypass } = parseUserIdentifier(request.userIdentifier);

    if (request.accessToken) {
      const clientSecret = await this.chooseSecret(
        toCandidates(request.clientSecret) ?? request.fallbackSecrets ?? null,
        flow,
        request.accessToken,
        request.clientName
      );
      return this.settle(request, {
        source: 'explicit',
        accessToken: request.accessToken,
        clientSecret,
        userIdentifier: userIdentifier ?? null,
        extras: null,
        record: null,
      });
    }

    if (!bypass && this.store) {
      const stored = await this.store.find({
        clientName: request.clientName,
        authorizationFlow: request.authorizationFlow,
        clientId: request.clientId,
        userIdentifier,
      });

      if (stored) {
        const candidates =
          toCandidates(request.clientSecret) ??
          toCandidates(stored.clientSecret) ??
          request.fallbackSecrets ??
          null;
        const clientSecret = await this.chooseSecret(
          candidates,
          flow,
          stored.accessToken,
          request.clientName
        );
        return this.settle(request, {
          source: 'store',
          accessToken: stored.accessToken,
          clientSecret,
          userIdentifier: stored.userIdentifier,
          extras: stored.extras,
          record: stored,
        });
      }
    }

    return this.authenticateFresh(request, flow, userIdentifier ?? null);
  }

  /**
   * 略過 store 重新認證並寫回（例如 token 失效時）
   */
  async reauthenticate(request: AuthRequest, flow: AuthFlow): Promise<EstablishedCredential> {
    const { userIdentifier } = parseUserIdentifier(request.userIdentifier);
    return this.authenticateFresh(request, flow, userIdentifier ?? null);
  }

  private async authenticateFresh(
    request: AuthRequest,
    flow: AuthFlow,
    userIdentifier: string | null
  ): Promise<EstablishedCredential> {
    const result = await loggers.auth.trackAsync('Authentication', () => flow.authenticate(), {
      clientName: request.clientName,
      authorizationFlow: request.authorizationFlow,
    });

    const clientSecret = await this.chooseSecret(
      toCandidates(request.clientSecret) ?? request.fallbackSecrets ?? null,
      flow,
      result.accessToken,
      request.clientName
    );

    const resolvedIdentifier =
      userIdentifier ?? (flow.resolveUserIdentifier ? await flow.resolveUserIdentifier(result) : null);

    let record: CredentialRecord | null = null;
    if (this.store) {
      record = await this.store.upsert({
        clientName: request.clientName,
        authorizationFlow: request.authorizationFlow,
        clientId: request.clientId,
        userIdentifier: resolvedIdentifier,
        clientSecret,
        accessToken: result.accessToken,
        refreshToken: result.refreshToken,
        expiresAt: result.expiresAt,
        tokenType: result.tokenType,
        scopes: result.scopes,
        redirectUri: result.redirectUri,
        extras: result.extras,
      });
    }

    return this.settle(request, {
      source: 'fresh',
      accessToken: result.accessToken,
      clientSecret,
      userIdentifier: resolvedIdentifier,
      extras: result.extras ?? null,
      record,
    });
  }

  /**
   * 單一 secret 直接採用；多個候選時逐一探測
   */
  private async chooseSecret(
    candidates: readonly string[] | null,
    flow: AuthFlow,
    accessToken: string,
    clientName: string
  ): Promise<string | null> {
    if (candidates === null) {
      return null;
    }
    if (candidates.length === 1 && candidates[0] !== undefined) {
      return candidates[0];
    }

    const probe = flow.probeSecret;
    if (!probe) {
      throw new NoValidCredentialError(0, clientName);
    }
    return selectWorkingSecret(
      candidates,
      (secret) => probe.call(flow, secret, accessToken),
      clientName
    );
  }

  private settle(request: AuthRequest, credential: EstablishedCredential): EstablishedCredential {
    recordAuthentication(request.clientName, credential.source);
    loggers.auth.info('Credential established', {
      clientName: request.clientName,
      authorizationFlow: request.authorizationFlow,
      source: credential.source,
      userIdentifier: credential.userIdentifier,
    });
    return credential;
  }
}
