/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀寫與環境變數
 */

import path from 'node:path';
import os from 'node:os';
import { ConfigurationError } from '../lib/errors.js';
import { readConfigFile, updateSection } from './config-file.js';
import { parseReadOnlyFlag } from './mode-gate.js';
import { OOB_REDIRECT_URI } from '../types/auth.js';
import type { Credentials } from '../types/auth.js';
import type { AssistantSettings, TeamSnapSection } from '../types/config.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'teamsnap');
const DEFAULT_CONFIG_FILE = 'config.json';

// 範本設定檔裡的佔位值
const PLACEHOLDER_VALUES = new Set(['YOUR_CLIENT_ID_HERE', 'YOUR_CLIENT_SECRET_HERE']);

type Env = Record<string, string | undefined>;

/**
 * 解析設定檔路徑（TEAMSNAP_CONFIG 優先）
 */
export function resolveConfigPath(env: Env = process.env): string {
  const fromEnv = env.TEAMSNAP_CONFIG;
  if (fromEnv && fromEnv.length > 0) {
    return fromEnv;
  }
  return path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
}

export class ConfigService {
  private configPath: string;
  private env: Env;

  constructor(configPath?: string, env: Env = process.env) {
    this.configPath = configPath || resolveConfigPath(env);
    this.env = env;
  }

  /**
   * 讀取 `teamsnap` 區段；每次都重新讀檔，token 可能已被其他指令更新
   */
  private section(): TeamSnapSection {
    return readConfigFile(this.configPath)?.teamsnap ?? {};
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 取得 Client ID（優先環境變數）
   */
  getClientId(): string | undefined {
    const envValue = this.env.TEAMSNAP_CLIENT_ID;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.section().client_id;
  }

  /**
   * 取得 Client Secret（優先環境變數）
   */
  getClientSecret(): string | undefined {
    const envValue = this.env.TEAMSNAP_CLIENT_SECRET;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.section().client_secret;
  }

  getRedirectUri(): string {
    return this.section().redirect_uri || OOB_REDIRECT_URI;
  }

  hasCredentials(): boolean {
    return Boolean(this.getClientId() && this.getClientSecret());
  }

  /**
   * 取得完整憑證
   * @throws ConfigurationError 缺少憑證或仍為範本值
   */
  getCredentials(): Credentials {
    const clientId = this.getClientId();
    const clientSecret = this.getClientSecret();

    if (!clientId || !clientSecret) {
      throw new ConfigurationError(
        `client_id and client_secret are not set in ${this.configPath}`,
        'Run `teamsnap auth init <client-id> <client-secret>` or set TEAMSNAP_CLIENT_ID and TEAMSNAP_CLIENT_SECRET.'
      );
    }
    if (PLACEHOLDER_VALUES.has(clientId) || PLACEHOLDER_VALUES.has(clientSecret)) {
      throw new ConfigurationError(
        `${this.configPath} still contains placeholder credentials`,
        'Replace the placeholder values with the client id and secret of your TeamSnap application.'
      );
    }

    return Object.freeze({
      clientId,
      clientSecret,
      redirectUri: this.getRedirectUri(),
    });
  }

  /**
   * 寫入憑證（保留既有 token）
   */
  setCredentials(clientId: string, clientSecret: string): void {
    updateSection(this.configPath, {
      client_id: clientId,
      client_secret: clientSecret,
      redirect_uri: OOB_REDIRECT_URI,
    });
  }
}

/**
 * 讀取助理端環境設定（啟動時讀一次）
 */
export function readAssistantSettings(env: Env = process.env): AssistantSettings {
  const accessToken = env.TEAMSNAP_ACCESS_TOKEN?.trim();
  return {
    accessToken: accessToken && accessToken.length > 0 ? accessToken : undefined,
    readOnly: parseReadOnlyFlag(env.TEAMSNAP_READONLY),
    configPath: resolveConfigPath(env),
  };
}
