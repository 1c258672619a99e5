/**
 * Auth Types
 * OAuth2 OOB 流程相關類型
 */

/** OOB 流程固定的 redirect_uri：授權碼直接顯示給使用者複製 */
export const OOB_REDIRECT_URI = 'urn:ietf:wg:oauth:2.0:oob';

/**
 * OAuth 應用程式憑證
 */
export interface Credentials {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly redirectUri: string;
}

/**
 * OAuth2 Token Response
 */
export interface TokenResponse {
  access_token: string;
  refresh_token?: string;
  expires_in?: number;
  token_type?: string;
  scope?: string;
}

/**
 * 持久化的 token
 */
export interface TokenRecord {
  accessToken: string;
  refreshToken?: string;
  /** Unix timestamp (ms)；沒有時視為不會過期 */
  expiresAt?: number;
}

export type AuthState = 'unauthenticated' | 'authorization-pending' | 'authenticated';

/**
 * 提供 bearer token 給 API 客戶端
 */
export interface TokenProvider {
  /** 取得可用的 access token，必要時先 refresh */
  ensureValidToken(): Promise<string>;
  /** 伺服器回 401 時強制 refresh 一次 */
  refresh(): Promise<string>;
}
