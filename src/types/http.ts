/**
 * HTTP 傳輸層型別
 */

export type HttpMethod = 'GET' | 'POST';

export type QueryValue = string | number | boolean;

export interface TransportRequest {
  method: HttpMethod;
  /** 相對於 baseURL 的端點路徑，或完整 URL */
  url: string;
  baseURL?: string;
  query?: Record<string, QueryValue>;
  /** 表單欄位（application/x-www-form-urlencoded）或 JSON body */
  form?: Record<string, QueryValue>;
  json?: Record<string, unknown>;
  headers?: Record<string, string>;
  responseType?: 'json' | 'text';
  timeoutMs?: number;
}

/**
 * 傳輸函式：預設以 ofetch 實作，測試可注入假實作
 */
export type HttpTransport = (request: TransportRequest) => Promise<unknown>;
