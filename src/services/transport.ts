/**
 * HTTP Transport
 * 以 ofetch 發送請求；非 2xx 不拋錯，交由 API 客戶端判斷
 */

import { ofetch } from 'ofetch';
import { NetworkError, TimeoutError } from '../lib/errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean;

export type QueryParams = Record<string, QueryValue | undefined>;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  query?: QueryParams;
  body?: unknown;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  /** 已解析的 JSON（或文字）；沒有內容時為 null */
  body: unknown;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * 移除 undefined 的查詢參數
 */
export function compactQuery(query: QueryParams | undefined): Record<string, QueryValue> | undefined {
  if (!query) return undefined;
  const entries = Object.entries(query).filter(
    (entry): entry is [string, QueryValue] => entry[1] !== undefined
  );
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

function errorName(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string') {
    return value.name;
  }
  return undefined;
}

/**
 * ofetch 逾時會以 AbortSignal 中斷，錯誤本身或 cause 帶有 TimeoutError / AbortError
 */
function isTimeout(error: unknown): boolean {
  const names = [errorName(error)];
  if (error instanceof Error) {
    names.push(errorName(error.cause));
  }
  return names.includes('TimeoutError') || names.includes('AbortError');
}

export class OfetchTransport implements HttpTransport {
  async send(request: HttpRequest): Promise<HttpResponse> {
    try {
      const response = await ofetch.raw<unknown>(request.url, {
        method: request.method,
        headers: request.headers,
        query: compactQuery(request.query),
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        timeout: request.timeoutMs,
        // 重試由 API 客戶端控制（只有 401 會重試一次）
        retry: 0,
        ignoreResponseError: true,
      });

      return {
        status: response.status,
        body: response._data ?? null,
      };
    } catch (error) {
      if (isTimeout(error)) {
        throw new TimeoutError(request.url, request.timeoutMs, error);
      }
      throw new NetworkError(request.url, error);
    }
  }
}
