/**
 * Auth Service
 * OAuth2 OOB 授權流程 - 授權碼交換、refresh 與 token 持久化
 *
 * 狀態：unauthenticated → authorization-pending → authenticated
 * OOB 流程沒有 callback server，使用者手動貼回授權碼，
 * 因此「等待授權碼」是可以跨行程恢復的獨立狀態。
 */

import { ofetch, FetchError } from 'ofetch';
import { z } from 'zod';
import {
  AuthenticationExpiredError,
  AuthenticationRequiredError,
  AuthorizationError,
} from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { StructuredLogger } from '../lib/logger.js';
import type { TokenStore } from './token-store.js';
import type {
  AuthState,
  Credentials,
  TokenProvider,
  TokenRecord,
  TokenResponse,
} from '../types/auth.js';

export const AUTHORIZE_ENDPOINT = 'https://auth.teamsnap.com/oauth/authorize';
export const TOKEN_ENDPOINT = 'https://auth.teamsnap.com/oauth/token';

export const DEFAULT_SCOPE = 'read write';

// 伺服器沒有回 expires_in 時的預設值（2 小時）
const DEFAULT_EXPIRES_IN_SECONDS = 7200;

// Token 提前 60 秒過期，避免邊界問題
const TOKEN_EXPIRY_BUFFER_MS = 60 * 1000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  expires_in: z.number().positive().optional(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
});

export interface AuthorizerOptions {
  scope?: string;
  logger?: StructuredLogger;
  /** token endpoint 逾時（毫秒） */
  timeoutMs?: number;
  /** 測試用時鐘 */
  now?: () => number;
}

export class Authorizer implements TokenProvider {
  private credentials: Credentials;
  private store: TokenStore;
  private scope: string;
  private logger: StructuredLogger;
  private timeoutMs: number;
  private now: () => number;

  private state: AuthState = 'unauthenticated';
  private token: TokenRecord | null = null;

  constructor(credentials: Credentials, store: TokenStore, options: AuthorizerOptions = {}) {
    this.credentials = credentials;
    this.store = store;
    this.scope = options.scope ?? DEFAULT_SCOPE;
    this.logger = options.logger ?? loggers.auth;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.now = options.now ?? Date.now;

    this.token = this.loadStoredToken();
    if (this.token) {
      this.state = 'authenticated';
    }
  }

  /**
   * 讀取已存的 token；讀不到的檔案視為沒有 token
   */
  private loadStoredToken(): TokenRecord | null {
    try {
      return this.store.load();
    } catch (error) {
      this.logger.warn('Token file unreadable, starting unauthenticated', {
        path: this.store.getPath(),
        reason: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  getState(): AuthState {
    return this.state;
  }

  getToken(): TokenRecord | null {
    return this.token ? { ...this.token } : null;
  }

  /**
   * 檢查 token 是否有效；沒有 expiresAt 時視為有效
   */
  isTokenValid(): boolean {
    if (!this.token) {
      return false;
    }
    if (this.token.expiresAt === undefined) {
      return true;
    }
    return this.now() < this.token.expiresAt;
  }

  /**
   * 產生授權網址，使用者在瀏覽器同意後會看到授權碼
   * 可重複呼叫
   */
  beginAuthorization(scope: string = this.scope): string {
    const params = new URLSearchParams({
      client_id: this.credentials.clientId,
      redirect_uri: this.credentials.redirectUri,
      response_type: 'code',
      scope,
    });

    this.state = 'authorization-pending';
    this.logger.debug('Authorization URL generated', { scope });

    return `${AUTHORIZE_ENDPOINT}?${params.toString()}`;
  }

  /**
   * 以使用者貼回的授權碼交換 token
   * 可以在另一個行程呼叫（例如 `teamsnap auth complete <code>`）
   * @throws AuthorizationError 授權碼無效、過期或網路錯誤；狀態維持 authorization-pending
   * @throws PersistenceError token 無法寫入
   */
  async completeAuthorization(code: string): Promise<TokenRecord> {
    const trimmed = code.trim();
    this.state = 'authorization-pending';

    if (trimmed.length === 0) {
      throw new AuthorizationError('No authorization code provided');
    }

    let response: TokenResponse;
    try {
      response = await this.requestToken({
        grant_type: 'authorization_code',
        code: trimmed,
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
        redirect_uri: this.credentials.redirectUri,
      });
    } catch (error) {
      this.logger.error(
        'Authorization code exchange failed',
        error instanceof Error ? error : new Error(String(error))
      );
      throw toAuthorizationError(error);
    }

    // 寫入失敗時維持 authorization-pending
    const record = this.toRecord(response);
    this.store.save(record);
    this.token = record;
    this.state = 'authenticated';

    this.logger.info('Authorization completed', { expiresAt: record.expiresAt });
    return { ...record };
  }

  /**
   * 取得有效的 Access Token
   * - 有效：直接返回，不發請求
   * - 過期且有 refresh token：refresh 一次
   * - 沒有 token：AuthenticationRequiredError
   */
  async ensureValidToken(): Promise<string> {
    if (!this.token) {
      throw new AuthenticationRequiredError();
    }

    if (this.isTokenValid()) {
      return this.token.accessToken;
    }

    this.logger.info('Access token expired, refreshing', { expiresAt: this.token.expiresAt });
    return this.refresh();
  }

  /**
   * 用 refresh token 換新的 access token
   * 不加鎖：並發呼叫可能重複 refresh，最後寫入者為準
   * @throws AuthenticationExpiredError 沒有 refresh token 或 refresh 失敗
   */
  async refresh(): Promise<string> {
    const refreshToken = this.token?.refreshToken;
    if (!refreshToken) {
      this.markUnauthenticated();
      throw new AuthenticationExpiredError('The access token expired and no refresh token is stored');
    }

    let response: TokenResponse;
    try {
      response = await this.requestToken({
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
      });
    } catch (error) {
      this.logger.error(
        'Token refresh failed',
        error instanceof Error ? error : new Error(String(error))
      );
      this.markUnauthenticated();
      throw new AuthenticationExpiredError(
        `Token refresh failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }

    // 伺服器沒有發新的 refresh token 時沿用舊的
    const record = this.toRecord(response, refreshToken);
    this.store.save(record);
    this.token = record;
    this.state = 'authenticated';

    this.logger.info('Access token refreshed', { expiresAt: record.expiresAt });
    return record.accessToken;
  }

  private markUnauthenticated(): void {
    this.token = null;
    this.state = 'unauthenticated';
  }

  private toRecord(response: TokenResponse, previousRefreshToken?: string): TokenRecord {
    const lifetimeMs = (response.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS) * 1000;
    const buffer = Math.min(TOKEN_EXPIRY_BUFFER_MS, lifetimeMs / 2);

    const record: TokenRecord = {
      accessToken: response.access_token,
      expiresAt: this.now() + lifetimeMs - buffer,
    };
    const refreshToken = response.refresh_token || previousRefreshToken;
    if (refreshToken) {
      record.refreshToken = refreshToken;
    }
    return record;
  }

  /**
   * 呼叫 token endpoint
   */
  private async requestToken(params: Record<string, string>): Promise<TokenResponse> {
    const body = new URLSearchParams(params).toString();

    const response = await ofetch<unknown>(TOKEN_ENDPOINT, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body,
      retry: 0,
      timeout: this.timeoutMs,
    });

    const parsed = tokenResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new AuthorizationError('Token endpoint response did not contain an access_token');
    }
    return parsed.data;
  }
}

function toAuthorizationError(error: unknown): AuthorizationError {
  if (error instanceof AuthorizationError) {
    return error;
  }
  if (error instanceof FetchError) {
    const status = error.statusCode ?? error.status;
    return new AuthorizationError(
      `Token exchange failed${status ? ` (${status})` : ''}: ${error.message}`,
      status,
      error
    );
  }
  return new AuthorizationError(
    `Token exchange failed: ${error instanceof Error ? error.message : String(error)}`,
    undefined,
    error
  );
}

/**
 * 固定 token（例如 TEAMSNAP_ACCESS_TOKEN），無法 refresh
 */
export class StaticTokenProvider implements TokenProvider {
  private accessToken: string;

  constructor(accessToken: string) {
    this.accessToken = accessToken;
  }

  async ensureValidToken(): Promise<string> {
    return this.accessToken;
  }

  async refresh(): Promise<string> {
    throw new AuthenticationExpiredError(
      'The access token from TEAMSNAP_ACCESS_TOKEN was rejected and cannot be refreshed'
    );
  }
}
