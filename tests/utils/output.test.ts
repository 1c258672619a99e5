import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  formatCell,
  formatJSON,
  formatTable,
  printError,
  printRecords,
  resolveFormat,
  toErrorPayload,
  type ColumnDef,
} from '../../src/utils/output.js';
import { WriteDisabledError } from '../../src/lib/errors.js';
import type { EntityRecord } from '../../src/types/envelope.js';

const columns: ColumnDef[] = [
  { key: 'id', label: 'ID' },
  { key: 'name', label: 'Name' },
];

const records: EntityRecord[] = [
  { data: { id: 456, name: 'Tigers', sport_name: 'Soccer' }, links: {} },
  { data: { id: 457, name: null }, links: {} },
];

describe('Output Formatter', () => {
  describe('resolveFormat', () => {
    it('should default to json', () => {
      expect(resolveFormat('table')).toBe('table');
      expect(resolveFormat('json')).toBe('json');
      expect(resolveFormat('csv')).toBe('json');
      expect(resolveFormat(undefined)).toBe('json');
    });
  });

  describe('formatCell', () => {
    it('should render values as text', () => {
      expect(formatCell(undefined)).toBe('');
      expect(formatCell(null)).toBe('');
      expect(formatCell('Tigers')).toBe('Tigers');
      expect(formatCell(true)).toBe('true');
      expect(formatCell({ a: 1 })).toBe('{"a":1}');
    });
  });

  describe('formatTable', () => {
    it('should include headers and the selected columns only', () => {
      const table = formatTable(records, columns);

      expect(table).toContain('ID');
      expect(table).toContain('Name');
      expect(table).toContain('Tigers');
      expect(table).toContain('457');
      expect(table).not.toContain('Soccer');
    });
  });

  describe('formatJSON', () => {
    it('should pretty print by default', () => {
      expect(formatJSON({ id: 1 })).toBe('{\n  "id": 1\n}');
      expect(formatJSON({ id: 1 }, false)).toBe('{"id":1}');
    });
  });

  describe('printRecords', () => {
    const spyLog = () => vi.spyOn(console, 'log').mockImplementation(() => {});

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should print record data as JSON', () => {
      const log = spyLog();
      printRecords(records, columns, 'json');

      expect(log).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual([
        { id: 456, name: 'Tigers', sport_name: 'Soccer' },
        { id: 457, name: null },
      ]);
    });

    it('should print a placeholder for an empty table', () => {
      const log = spyLog();
      printRecords([], columns, 'table');

      expect(log).toHaveBeenCalledWith('(no results)');
    });

    it('should print the table and a count', () => {
      const log = spyLog();
      printRecords(records, columns, 'table');

      expect(log).toHaveBeenCalledTimes(2);
      expect(log.mock.calls[1][0]).toBe('\n2 result(s)');
    });
  });

  describe('errors', () => {
    afterEach(() => {
      vi.restoreAllMocks();
      process.exitCode = undefined;
    });

    it('should build a payload with code and hint', () => {
      expect(toErrorPayload(new WriteDisabledError('create event'))).toEqual({
        success: false,
        error: {
          code: 'WRITE_DISABLED',
          message: 'Write operation blocked: create event is not allowed in read-only mode',
          hint: 'Set TEAMSNAP_READONLY=false in the server environment (.env or the assistant config) and restart the server.',
        },
      });
      expect(toErrorPayload(new Error('boom'))).toEqual({
        success: false,
        error: { code: 'UNEXPECTED_ERROR', message: 'boom' },
      });
    });

    it('should print JSON errors to stdout and set the exit code', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});

      printError(new Error('boom'), 'json');

      expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
        success: false,
        error: { code: 'UNEXPECTED_ERROR', message: 'boom' },
      });
      expect(process.exitCode).toBe(1);
    });

    it('should print table errors with a hint to stderr', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});

      printError(new WriteDisabledError('delete member'), 'table');

      expect(error).toHaveBeenNthCalledWith(
        1,
        '❌ Write operation blocked: delete member is not allowed in read-only mode'
      );
      expect(error).toHaveBeenNthCalledWith(
        2,
        '   💡 Set TEAMSNAP_READONLY=false in the server environment (.env or the assistant config) and restart the server.'
      );
    });
  });
});
