/**
 * API Client Helper
 * 提供 CLI 共用的 TeamSnapClient 建立函數
 */

import { TeamSnapClient } from '../services/client.js';
import { ConfigService } from '../services/config.js';
import { loggers } from './logger.js';

let cachedClient: TeamSnapClient | null = null;

/**
 * 取得 TeamSnapClient 實例（設定檔 + token）
 * @throws ConfigurationError 尚未設定憑證
 */
export function getApiClient(): TeamSnapClient {
  if (!cachedClient) {
    cachedClient = TeamSnapClient.fromConfig(new ConfigService(), {
      logger: loggers.api,
      auth: { logger: loggers.auth },
    });
  }
  return cachedClient;
}

/**
 * 清除快取的 Client（用於測試）
 */
export function clearApiClientCache(): void {
  cachedClient = null;
}
