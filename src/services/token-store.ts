/**
 * Token Store
 * Token 持久化 - 讀寫設定檔的 `teamsnap` 區段，不發出任何網路請求
 */

import { readConfigFile, updateSection } from './config-file.js';
import { loggers } from '../lib/logger.js';
import type { StructuredLogger } from '../lib/logger.js';
import type { TokenRecord } from '../types/auth.js';

export class TokenStore {
  private filePath: string;
  private logger: StructuredLogger;

  constructor(filePath: string, logger: StructuredLogger = loggers.store) {
    this.filePath = filePath;
    this.logger = logger;
  }

  getPath(): string {
    return this.filePath;
  }

  /**
   * 讀取 token；檔案或 access_token 不存在時回傳 null
   * @throws PersistenceError 檔案無法讀取或解析
   */
  load(): TokenRecord | null {
    const section = readConfigFile(this.filePath)?.teamsnap;
    const accessToken = section?.access_token;
    if (!section || !accessToken) {
      return null;
    }

    const record: TokenRecord = { accessToken };
    if (section.refresh_token) {
      record.refreshToken = section.refresh_token;
    }

    if (section.token_expires_at) {
      const expiresAt = Date.parse(section.token_expires_at);
      if (Number.isNaN(expiresAt)) {
        this.logger.warn('Ignoring unparseable token_expires_at', {
          path: this.filePath,
          value: section.token_expires_at,
        });
      } else {
        record.expiresAt = expiresAt;
      }
    }

    return record;
  }

  /**
   * 寫入 token，保留憑證與其他欄位
   * @throws PersistenceError 無法寫入
   */
  save(record: TokenRecord): void {
    updateSection(this.filePath, {
      access_token: record.accessToken,
      // 空字串代表伺服器沒有發 refresh token
      refresh_token: record.refreshToken ?? '',
      token_expires_at:
        record.expiresAt !== undefined ? new Date(record.expiresAt).toISOString() : undefined,
    });

    this.logger.debug('Token saved', {
      path: this.filePath,
      expiresAt: record.expiresAt,
    });
  }
}
