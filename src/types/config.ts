/**
 * 設定檔結構
 * 憑證與 token 共用同一個 JSON 檔的 `teamsnap` 區段
 */
export interface TeamSnapSection {
  client_id?: string;
  client_secret?: string;
  redirect_uri?: string;
  access_token?: string;
  refresh_token?: string;
  /** ISO-8601 */
  token_expires_at?: string;
  [key: string]: string | undefined;
}

export interface ConfigFile {
  teamsnap?: TeamSnapSection;
  [section: string]: unknown;
}

/**
 * 助理端（MCP server）啟動時讀取的環境設定
 */
export interface AssistantSettings {
  /** TEAMSNAP_ACCESS_TOKEN 覆寫值 */
  accessToken?: string;
  readOnly: boolean;
  configPath: string;
}
