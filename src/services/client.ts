/**
 * TeamSnap Client
 * 腳本用客戶端 - 從設定檔建立，使用 OAuth token 檔，寫入不受限制
 */

import { BaseApiClient } from './api.js';
import type { ApiClientOptions } from './api.js';
import { Authorizer } from './auth.js';
import type { AuthorizerOptions } from './auth.js';
import { ConfigService } from './config.js';
import { TokenStore } from './token-store.js';
import type { TokenProvider } from '../types/auth.js';

export type TeamSnapClientOptions = Omit<ApiClientOptions, 'tokens'> & {
  auth?: AuthorizerOptions;
};

export class TeamSnapClient extends BaseApiClient {
  /** 設定檔建立時的授權器；直接傳入 TokenProvider 時為 null */
  readonly authorizer: Authorizer | null;

  constructor(tokens: TokenProvider, options: Omit<ApiClientOptions, 'tokens'> = {}) {
    super({ ...options, tokens });
    this.authorizer = tokens instanceof Authorizer ? tokens : null;
  }

  /**
   * 從設定檔（憑證 + token）建立客戶端
   * @throws ConfigurationError 缺少憑證
   * @throws PersistenceError 設定檔無法讀取
   */
  static fromConfig(
    config: ConfigService = new ConfigService(),
    options: TeamSnapClientOptions = {}
  ): TeamSnapClient {
    const { auth, ...clientOptions } = options;
    const credentials = config.getCredentials();
    const store = new TokenStore(config.getConfigPath());
    const authorizer = new Authorizer(credentials, store, auth);
    return new TeamSnapClient(authorizer, clientOptions);
  }

  /**
   * 讀取一次 API 根目錄，記錄目前的 API 版本
   */
  async connect(): Promise<string | undefined> {
    const root = await this.getRoot();
    this.logger.info('Connected to TeamSnap API', { version: root.version });
    return root.version;
  }

  protected beforeWrite(): void {
    // 腳本端不限制寫入
  }
}
