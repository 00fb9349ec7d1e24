import { describe, it, expect, afterEach } from 'vitest';
import { getConfig } from '../config/environment-config';

describe('getConfig', () => {
  afterEach(() => {
    delete process.env.DIARY_TEST_VALUE;
  });

  it('should fall back to the default when unset or empty', () => {
    expect(getConfig('DIARY_TEST_VALUE', 'fallback')).toBe('fallback');
    process.env.DIARY_TEST_VALUE = '';
    expect(getConfig('DIARY_TEST_VALUE', 7)).toBe(7);
  });

  it('should infer numbers and booleans from the default', () => {
    process.env.DIARY_TEST_VALUE = '25';
    expect(getConfig('DIARY_TEST_VALUE', 10)).toBe(25);

    process.env.DIARY_TEST_VALUE = 'TRUE';
    expect(getConfig('DIARY_TEST_VALUE', false)).toBe(true);

    process.env.DIARY_TEST_VALUE = 'many';
    expect(getConfig('DIARY_TEST_VALUE', 10)).toBe(10);
  });

  it('should use the parser and fall back when it throws', () => {
    const parseList = (value: string) => {
      if (!value.includes(',')) throw new Error('not a list');
      return value.split(',');
    };

    process.env.DIARY_TEST_VALUE = 'a,b';
    expect(getConfig('DIARY_TEST_VALUE', ['x'], parseList)).toEqual(['a', 'b']);

    process.env.DIARY_TEST_VALUE = 'single';
    expect(getConfig('DIARY_TEST_VALUE', ['x'], parseList)).toEqual(['x']);
  });
});
