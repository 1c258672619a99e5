/**
 * Assistant Client
 * 助理端客戶端 - 從環境變數建立，所有寫入先經過 Mode Gate
 */

import { BaseApiClient } from './api.js';
import type { ApiClientOptions } from './api.js';
import { Authorizer, StaticTokenProvider } from './auth.js';
import type { AuthorizerOptions } from './auth.js';
import { ConfigService, readAssistantSettings } from './config.js';
import { ModeGate } from './mode-gate.js';
import type { Mode } from './mode-gate.js';
import { TokenStore } from './token-store.js';
import type { TokenProvider } from '../types/auth.js';

export type AssistantClientOptions = Omit<ApiClientOptions, 'tokens'> & {
  auth?: AuthorizerOptions;
};

export class AssistantClient extends BaseApiClient {
  private gate: ModeGate;

  constructor(tokens: TokenProvider, gate: ModeGate, options: Omit<ApiClientOptions, 'tokens'> = {}) {
    super({ ...options, tokens });
    this.gate = gate;
  }

  /**
   * 從環境變數建立（啟動時呼叫一次）
   * - TEAMSNAP_ACCESS_TOKEN：固定 token，不讀 token 檔
   * - 否則使用設定檔的憑證與 token
   * - TEAMSNAP_READONLY：未設定時為唯讀
   * @throws ConfigurationError 沒有 token 覆寫值也沒有憑證
   */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    options: AssistantClientOptions = {}
  ): AssistantClient {
    const { auth, ...clientOptions } = options;
    const settings = readAssistantSettings(env);
    const logger = clientOptions.logger;

    let tokens: TokenProvider;
    if (settings.accessToken) {
      tokens = new StaticTokenProvider(settings.accessToken);
    } else {
      const config = new ConfigService(settings.configPath, env);
      const store = new TokenStore(settings.configPath);
      tokens = new Authorizer(config.getCredentials(), store, auth);
    }

    const gate = ModeGate.fromReadOnlyFlag(settings.readOnly, logger);
    return new AssistantClient(tokens, gate, clientOptions);
  }

  get mode(): Mode {
    return this.gate.mode;
  }

  isReadOnly(): boolean {
    return this.gate.isReadOnly();
  }

  protected beforeWrite(operation: string): void {
    this.gate.assertWritable(operation);
  }
}
