/**
 * Argument Parsers
 * commander 選項解析函數
 */

import { InvalidArgumentError } from 'commander';

/**
 * 正整數 ID
 */
export function parseId(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) === 0) {
    throw new InvalidArgumentError('Expected a positive integer ID.');
  }
  return Number(trimmed);
}
