/**
 * Errors
 * TeamSnap 整合的錯誤類型 - 每種錯誤帶有 code 與補救提示
 */

export type TeamSnapErrorCode =
  | 'PERSISTENCE_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'AUTHORIZATION_ERROR'
  | 'AUTHENTICATION_REQUIRED'
  | 'AUTHENTICATION_EXPIRED'
  | 'MALFORMED_ENVELOPE'
  | 'API_ERROR'
  | 'WRITE_DISABLED'
  | 'TIMEOUT'
  | 'NETWORK_ERROR';

export class TeamSnapError extends Error {
  public readonly code: TeamSnapErrorCode;
  /** 給使用者的補救提示 */
  public readonly hint: string;

  constructor(code: TeamSnapErrorCode, message: string, hint: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TeamSnapError';
    this.code = code;
    this.hint = hint;
  }
}

/**
 * Token 檔無法讀寫
 */
export class PersistenceError extends TeamSnapError {
  public readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(
      'PERSISTENCE_ERROR',
      message,
      `Check that ${path} exists, contains valid JSON and is readable and writable.`,
      { cause }
    );
    this.name = 'PersistenceError';
    this.path = path;
  }
}

/**
 * 缺少或仍為範本值的憑證
 */
export class ConfigurationError extends TeamSnapError {
  constructor(message: string, hint: string) {
    super('CONFIGURATION_ERROR', message, hint);
    this.name = 'ConfigurationError';
  }
}

/**
 * 授權碼交換失敗（無效或過期的 code）
 */
export class AuthorizationError extends TeamSnapError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number, cause?: unknown) {
    super(
      'AUTHORIZATION_ERROR',
      message,
      'Run `teamsnap auth login` again and paste a freshly issued authorization code.',
      { cause }
    );
    this.name = 'AuthorizationError';
    this.statusCode = statusCode;
  }
}

export class AuthenticationRequiredError extends TeamSnapError {
  constructor(message = 'No access token is available') {
    super(
      'AUTHENTICATION_REQUIRED',
      message,
      'Run `teamsnap auth login` to authorize, or set TEAMSNAP_ACCESS_TOKEN.'
    );
    this.name = 'AuthenticationRequiredError';
  }
}

export class AuthenticationExpiredError extends TeamSnapError {
  constructor(message = 'The access token has expired and could not be refreshed', cause?: unknown) {
    super(
      'AUTHENTICATION_EXPIRED',
      message,
      'Run `teamsnap auth login` to authorize again, or set a new TEAMSNAP_ACCESS_TOKEN.',
      { cause }
    );
    this.name = 'AuthenticationExpiredError';
  }
}

/**
 * 回應不符合 Collection+JSON 格式
 */
export class MalformedEnvelopeError extends TeamSnapError {
  constructor(message: string) {
    super(
      'MALFORMED_ENVELOPE',
      message,
      'The TeamSnap response format changed; update teamsnap-kit or report the payload.'
    );
    this.name = 'MalformedEnvelopeError';
  }
}

/**
 * 非 2xx 回應
 */
export class ApiError extends TeamSnapError {
  public readonly statusCode: number;
  public readonly body: unknown;

  constructor(statusCode: number, message: string, body?: unknown) {
    super('API_ERROR', message, hintForStatus(statusCode));
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.body = body;
  }
}

function hintForStatus(statusCode: number): string {
  if (statusCode === 401) return 'The access token was rejected; authorize again.';
  if (statusCode === 403) return 'The authorized user lacks permission for this resource.';
  if (statusCode === 404) return 'Check that the id exists and is visible to the authorized user.';
  if (statusCode === 422) return 'Check the submitted field values.';
  if (statusCode === 429) return 'TeamSnap is rate limiting requests; wait and retry.';
  if (statusCode >= 500) return 'TeamSnap is having trouble; retry later.';
  return 'Check the request parameters.';
}

/**
 * 唯讀模式下拒絕寫入（不會發出任何 HTTP 請求）
 */
export class WriteDisabledError extends TeamSnapError {
  public readonly operation: string;

  constructor(operation: string) {
    super(
      'WRITE_DISABLED',
      `Write operation blocked: ${operation} is not allowed in read-only mode`,
      'Set TEAMSNAP_READONLY=false in the server environment (.env or the assistant config) and restart the server.'
    );
    this.name = 'WriteDisabledError';
    this.operation = operation;
  }
}

export class TimeoutError extends TeamSnapError {
  public readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number, cause?: unknown) {
    super('TIMEOUT', `Request to ${url} timed out after ${timeoutMs}ms`, 'Retry the request.', {
      cause,
    });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * 沒有收到回應（DNS、連線被拒或中斷）
 */
export class NetworkError extends TeamSnapError {
  constructor(url: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      'NETWORK_ERROR',
      `Request to ${url} failed: ${detail}`,
      'Check the network connection to api.teamsnap.com and retry.',
      { cause }
    );
    this.name = 'NetworkError';
  }
}

export function isTeamSnapError(error: unknown): error is TeamSnapError {
  return error instanceof TeamSnapError;
}
