/**
 * Config File
 * 設定檔讀寫 - 憑證與 token 共用的 JSON 檔
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { PersistenceError } from '../lib/errors.js';
import type { ConfigFile, TeamSnapSection } from '../types/config.js';

const configFileSchema = z
  .object({
    teamsnap: z.record(z.string()).optional(),
  })
  .passthrough();

/**
 * 讀取設定檔；檔案不存在時回傳 null
 * @throws PersistenceError 無法讀取或內容不是預期的 JSON
 */
export function readConfigFile(filePath: string): ConfigFile | null {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new PersistenceError(`Cannot read ${filePath}`, filePath, error);
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new PersistenceError(`${filePath} is not valid JSON`, filePath, error);
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new PersistenceError(
      `${filePath} does not contain a valid "teamsnap" section`,
      filePath,
      parsed.error
    );
  }
  return parsed.data;
}

/**
 * 寫入設定檔（含 secret，權限 0600）
 * @throws PersistenceError 無法寫入
 */
export function writeConfigFile(filePath: string, config: ConfigFile): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n', {
      encoding: 'utf-8',
      mode: 0o600,
    });
  } catch (error) {
    throw new PersistenceError(`Cannot write ${filePath}`, filePath, error);
  }
}

/**
 * 合併更新 `teamsnap` 區段，其他區段與欄位保持不變
 * 值為 undefined 的欄位會從檔案中移除
 */
export function updateSection(filePath: string, patch: TeamSnapSection): void {
  const current = readConfigFile(filePath) ?? {};
  const section: TeamSnapSection = { ...current.teamsnap };

  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) {
      delete section[key];
    } else {
      section[key] = value;
    }
  }

  writeConfigFile(filePath, { ...current, teamsnap: section });
}
