import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseId } from '../../src/utils/args.js';

describe('parseId', () => {
  it('should parse positive integers', () => {
    expect(parseId('456')).toBe(456);
    expect(parseId(' 7 ')).toBe(7);
  });

  it.each(['0', '-1', '1.5', 'abc', ''])('should reject %j', (value) => {
    expect(() => parseId(value)).toThrow(InvalidArgumentError);
  });
});
