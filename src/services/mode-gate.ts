/**
 * Mode Gate
 * 唯讀 / 可寫入開關 - 建立客戶端時決定，之後不可變更
 */

import { WriteDisabledError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { StructuredLogger } from '../lib/logger.js';

export type Mode = 'read-only' | 'read-write';

const READ_WRITE_VALUES = new Set(['false', '0', 'no', 'off']);

/**
 * 解析 TEAMSNAP_READONLY；未設定或無法辨識時視為唯讀
 */
export function parseReadOnlyFlag(value: string | undefined): boolean {
  if (value === undefined) return true;
  return !READ_WRITE_VALUES.has(value.trim().toLowerCase());
}

export class ModeGate {
  readonly mode: Mode;
  private logger: StructuredLogger;

  constructor(mode: Mode, logger: StructuredLogger = loggers.api) {
    this.mode = mode;
    this.logger = logger;
  }

  static fromReadOnlyFlag(readOnly: boolean, logger?: StructuredLogger): ModeGate {
    return new ModeGate(readOnly ? 'read-only' : 'read-write', logger);
  }

  isReadOnly(): boolean {
    return this.mode === 'read-only';
  }

  /**
   * @throws WriteDisabledError 唯讀模式
   */
  assertWritable(operation: string): void {
    if (!this.isReadOnly()) return;

    this.logger.warn('Write operation blocked by read-only mode', { operation });
    throw new WriteDisabledError(operation);
  }
}
