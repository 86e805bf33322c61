/**
 * HTTP Transport
 * 以 ofetch 實作的預設傳輸層，將 HTTP 錯誤轉為 ApiRequestError
 */

import { ofetch, FetchError } from 'ofetch';
import type { JsonObject, JsonValue } from '../types/token.js';
import type { HttpTransport, QueryValue, TransportRequest } from '../types/http.js';

const DEFAULT_TIMEOUT_MS = 30 * 1000;

export class ApiRequestError extends Error {
  public readonly code = 'API_REQUEST_FAILED';
  /** HTTP 狀態碼；連線層錯誤時為 undefined */
  public readonly status: number | undefined;
  public readonly endpoint: string;

  constructor(endpoint: string, status: number | undefined, detail: string, cause?: unknown) {
    const prefix = status === undefined ? 'failed' : `failed with status ${status}`;
    super(`Request to ${endpoint} ${prefix}: ${detail}`, { cause });
    this.name = 'ApiRequestError';
    this.endpoint = endpoint;
    this.status = status;
  }
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      return Array.isArray(value) ? value.every(isJsonValue) : isJsonObject(value);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(isJsonValue);
}

/**
 * 確認回應為 JSON 物件
 * @throws ApiRequestError 回應格式不符時
 */
export function expectJsonObject(value: unknown, endpoint: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new ApiRequestError(endpoint, undefined, 'response is not a JSON object');
  }
  return value;
}

/**
 * 取出錯誤回應中的說明文字（API 通常回傳 { message: string }）
 */
function describeFailure(error: FetchError): string {
  const data: unknown = error.data;
  if (isJsonObject(data) && typeof data.message === 'string') {
    return data.message;
  }
  return error.statusText || error.message;
}

function stringifyValues(values: Record<string, QueryValue>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    result[key] = String(value);
  }
  return result;
}

/**
 * 預設傳輸函式
 */
export const ofetchTransport: HttpTransport = async (request: TransportRequest) => {
  const headers: Record<string, string> = { ...request.headers };
  let body: URLSearchParams | Record<string, unknown> | undefined;
  if (request.form) {
    body = new URLSearchParams(stringifyValues(request.form));
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
  } else if (request.json) {
    body = request.json;
  }

  const options = {
    method: request.method,
    baseURL: request.baseURL,
    query: request.query,
    headers,
    body,
    timeout: request.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  };

  try {
    if (request.responseType === 'text') {
      return await ofetch(request.url, { ...options, responseType: 'text' });
    }
    return await ofetch<unknown>(request.url, options);
  } catch (error) {
    if (error instanceof FetchError) {
      throw new ApiRequestError(request.url, error.statusCode, describeFailure(error), error);
    }
    throw error;
  }
};
