/**
 * API Client 基底類別
 * 傳輸、回應快取、日誌與指標由這裡統一處理，各 provider 只需實作 decorate()
 */

import { loggers } from '../lib/logger.js';
import { recordApiRequest } from '../lib/metrics.js';
import type { CacheableArgs, CacheTier } from '../types/cache.js';
import type { HttpMethod, HttpTransport, QueryValue, TransportRequest } from '../types/http.js';
import type { JsonObject } from '../types/token.js';
import {
  getResponseCache,
  registerCachedFunction,
  type ResponseCache,
} from './response-cache.js';
import { getTtlPolicyRegistry } from './ttl-policy.js';
import { ApiRequestError, expectJsonObject, ofetchTransport } from './transport.js';

export class AuthenticationRequiredError extends Error {
  public readonly code = 'AUTHENTICATION_REQUIRED';

  constructor(operation: string) {
    super(`${operation}() requires user authentication.`);
    this.name = 'AuthenticationRequiredError';
  }
}

export interface ApiRequest {
  method: HttpMethod;
  /** 相對於 baseURL 的端點，例如 'track/get' */
  endpoint: string;
  query?: Record<string, QueryValue>;
  form?: Record<string, QueryValue>;
  json?: Record<string, unknown>;
  /** 收到 401 時是否允許重新認證後重送一次 (default: true) */
  replayOnUnauthorized?: boolean;
}

export interface ApiClientOptions {
  /** 預設使用 ofetch */
  transport?: HttpTransport;
  /** 回應快取；false 停用，省略時使用行程共用的快取 */
  cache?: ResponseCache | boolean;
  /** 單次請求逾時（毫秒） */
  timeoutMs?: number;
}

export abstract class ApiClient<R extends ApiRequest = ApiRequest> {
  /** 寫入 token store 時使用的用戶端名稱 */
  abstract readonly clientName: string;

  protected readonly transport: HttpTransport;
  protected readonly timeoutMs: number | undefined;
  private preferredCache: ResponseCache | null;
  private cache: ResponseCache | null;

  constructor(options: ApiClientOptions = {}) {
    this.transport = options.transport ?? ofetchTransport;
    this.timeoutMs = options.timeoutMs;

    const cache = options.cache ?? true;
    this.preferredCache = typeof cache === 'boolean' ? null : cache;
    this.cache = cache === false ? null : (this.preferredCache ?? getResponseCache());
  }

  /**
   * 加上 provider 需要的 baseURL、header、簽章等；每次嘗試都會重新呼叫
   */
  protected abstract decorate(request: R): TransportRequest;

  /**
   * 收到 401 時的處理；回傳 true 表示已重新認證，請求會重送一次
   */
  protected async recoverFromUnauthorized(): Promise<boolean> {
    return false;
  }

  getCache(): ResponseCache | null {
    return this.cache;
  }

  /**
   * 啟用或停用這個用戶端的回應快取；停用時一併清除它的項目
   */
  setCacheEnabled(enabled: boolean): void {
    if (enabled && !this.cache) {
      this.cache = this.preferredCache ?? getResponseCache();
    } else if (!enabled && this.cache) {
      this.cache.invalidateOwner(this);
      this.cache = null;
    }
  }

  /**
   * 清除特定端點方法或這個用戶端全部的快取項目
   *
   * 注意：不帶參數時會清除這個用戶端所有的快取項目
   * @param methods 端點方法，例如 `[client.search.search, client.tracks.getTracks]`
   */
  clearCache(methods?: readonly object[]): void {
    if (!this.cache) return;
    if (methods === undefined) {
      this.cache.invalidateOwner(this);
      return;
    }
    for (const method of methods) {
      this.cache.invalidateMethod(method);
    }
  }

  /**
   * 發送請求並回傳 JSON 物件
   * @throws ApiRequestError HTTP 錯誤或回應格式不符
   */
  async request(request: R): Promise<JsonObject> {
    try {
      return await this.send(request);
    } catch (error) {
      if (
        error instanceof ApiRequestError &&
        error.status === 401 &&
        request.replayOnUnauthorized !== false &&
        (await this.recoverFromUnauthorized())
      ) {
        loggers.api.info('Replaying request after re-authentication', {
          endpoint: request.endpoint,
        });
        return this.send(request);
      }
      throw error;
    }
  }

  /**
   * 取得純文字內容（例如網頁、JS bundle），不經 decorate()
   */
  protected async fetchText(url: string, baseURL?: string): Promise<string> {
    const body = await this.dispatch({ method: 'GET', url, baseURL, responseType: 'text' }, url);
    if (typeof body !== 'string') {
      throw new ApiRequestError(url, undefined, 'expected a text response');
    }
    return body;
  }

  private async send(request: R): Promise<JsonObject> {
    const body = await this.dispatch(this.decorate(request), request.endpoint);
    return expectJsonObject(body, request.endpoint);
  }

  private async dispatch(transportRequest: TransportRequest, endpoint: string): Promise<unknown> {
    const startTime = Date.now();
    const requestId = loggers.api.getCurrentRequestId();
    const method = transportRequest.method;

    loggers.api.debug('API request started', { requestId, method, url: endpoint });

    try {
      const body = await this.transport({ timeoutMs: this.timeoutMs, ...transportRequest });
      const duration = Date.now() - startTime;
      recordApiRequest(method, endpoint, 200, duration);
      loggers.api.info('API request completed', {
        requestId,
        method,
        url: endpoint,
        duration,
        statusCode: 200,
      });
      return body;
    } catch (error) {
      const duration = Date.now() - startTime;
      const statusCode = error instanceof ApiRequestError ? error.status : undefined;
      recordApiRequest(method, endpoint, statusCode ?? 0, duration);
      loggers.api.error(
        'API request failed',
        error instanceof Error ? error : new Error(String(error)),
        { requestId, method, url: endpoint, duration, statusCode }
      );
      throw error;
    }
  }
}

/**
 * 擁有回應快取的物件（通常是 ApiClient）
 */
export interface CacheHost {
  getCache(): ResponseCache | null;
}

/**
 * 端點群組基底類別（albums、tracks…），由用戶端在建構時依固定順序組合
 */
export abstract class ResourceApi<C extends CacheHost> {
  protected readonly client: C;

  constructor(client: C) {
    this.client = client;
  }

  /**
   * 宣告具快取的端點方法
   * 快取鍵以用戶端為擁有者、`<類別>.<方法>` 為方法名稱；停用快取時直接呼叫
   * @throws UnknownTierError 層級名稱未註冊（於宣告時拋出）
   */
  protected cached<A extends CacheableArgs, T>(
    tier: CacheTier,
    method: string,
    fn: (...args: A) => Promise<T>
  ): (...args: A) => Promise<T> {
    getTtlPolicyRegistry().resolve(tier);

    const owner = this.client;
    const qualified = `${this.constructor.name}.${method}`;
    let bound: { cache: ResponseCache; call: (...args: A) => Promise<T> } | null = null;

    const call = (...args: A): Promise<T> => {
      const cache = owner.getCache();
      if (!cache) {
        return fn(...args);
      }
      if (!bound || bound.cache !== cache) {
        bound = { cache, call: cache.wrap(tier, fn, { owner, method: qualified }) };
      }
      return bound.call(...args);
    };

    registerCachedFunction(call, { owner, method: qualified, tier });
    return call;
  }
}
