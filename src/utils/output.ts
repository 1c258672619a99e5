/**
 * Output Formatter Module
 * 輸出格式化模組 - JSON 與表格，以及統一的錯誤輸出
 */

import Table from 'cli-table3';
import { isTeamSnapError } from '../lib/errors.js';
import type { EntityRecord, FieldValue } from '../types/envelope.js';

/**
 * 輸出格式類型
 */
export type OutputFormat = 'json' | 'table';

export function resolveFormat(value: unknown): OutputFormat {
  return value === 'table' ? 'table' : 'json';
}

/**
 * 欄位定義
 */
export interface ColumnDef {
  key: string;
  label: string;
  width?: number;
}

/**
 * 表格儲存格文字；null 與缺少的欄位顯示為空白
 */
export function formatCell(value: FieldValue | undefined): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * 格式化記錄表格
 */
export function formatTable(records: EntityRecord[], columns: ColumnDef[]): string {
  const widths = columns.map((col) => col.width ?? null);
  const table = new Table({
    head: columns.map((col) => col.label),
    style: { head: ['cyan'] },
    ...(widths.some((w) => w !== null) ? { colWidths: widths, wordWrap: true } : {}),
  });

  for (const record of records) {
    table.push(columns.map((col) => formatCell(record.data[col.key])));
  }

  return table.toString();
}

/**
 * 格式化 JSON
 */
export function formatJSON<T>(data: T, pretty: boolean = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * 輸出記錄清單：JSON 輸出資料本身，表格只顯示指定欄位
 */
export function printRecords(records: EntityRecord[], columns: ColumnDef[], format: OutputFormat): void {
  if (format === 'json') {
    console.log(formatJSON(records.map((record) => record.data)));
    return;
  }
  if (records.length === 0) {
    console.log('(no results)');
    return;
  }
  console.log(formatTable(records, columns));
  console.log(`\n${records.length} result(s)`);
}

export interface ErrorPayload {
  success: false;
  error: {
    code: string;
    message: string;
    hint?: string;
  };
}

export function toErrorPayload(error: unknown): ErrorPayload {
  if (isTeamSnapError(error)) {
    return { success: false, error: { code: error.code, message: error.message, hint: error.hint } };
  }
  return {
    success: false,
    error: {
      code: 'UNEXPECTED_ERROR',
      message: error instanceof Error ? error.message : String(error),
    },
  };
}

/**
 * 輸出錯誤並設定結束碼 1
 */
export function printError(error: unknown, format: OutputFormat): void {
  const payload = toErrorPayload(error);
  if (format === 'json') {
    console.log(formatJSON(payload));
  } else {
    console.error(`❌ ${payload.error.message}`);
    if (payload.error.hint) {
      console.error(`   💡 ${payload.error.hint}`);
    }
  }
  process.exitCode = 1;
}
