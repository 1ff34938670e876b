import { describe, expect, it } from 'vitest';
import { KEY_PATTERN, globToRegExp, storageKey, topLevelNamespace } from '../keys.js';

describe('storage keys', () => {
  it('should join namespace and id', () => {
    expect(storageKey('ui', 'main')).toBe('ui:main');
    expect(storageKey('', 'main')).toBe('main');
    expect(topLevelNamespace('ui:dash:main')).toBe('ui');
    expect(topLevelNamespace('main')).toBe('main');
  });

  it('should accept the allowed key characters only', () => {
    expect(KEY_PATTERN.test('brew-1.main:tab (copy)~')).toBe(true);
    expect(KEY_PATTERN.test('')).toBe(true);
    expect(KEY_PATTERN.test('a/b')).toBe(false);
    expect(KEY_PATTERN.test('a*')).toBe(false);
  });
});

describe('globToRegExp', () => {
  it('should translate wildcards', () => {
    const glob = globToRegExp('ui:m*');
    expect(glob.test('ui:main')).toBe(true);
    expect(glob.test('ui:m')).toBe(true);
    expect(glob.test('ui2:main')).toBe(false);
    expect(globToRegExp('h?llo').test('hallo')).toBe(true);
    expect(globToRegExp('h?llo').test('hllo')).toBe(false);
  });

  it('should translate character classes', () => {
    expect(globToRegExp('h[ae]llo').test('hello')).toBe(true);
    expect(globToRegExp('h[ae]llo').test('hillo')).toBe(false);
    expect(globToRegExp('h[^e]llo').test('hallo')).toBe(true);
    expect(globToRegExp('h[^e]llo').test('hello')).toBe(false);
    expect(globToRegExp('v[0-9]').test('v7')).toBe(true);
  });

  it('should match other characters literally', () => {
    expect(globToRegExp('a.b (1)').test('a.b (1)')).toBe(true);
    expect(globToRegExp('a.b').test('axb')).toBe(false);
    expect(globToRegExp('a\\*').test('a*')).toBe(true);
    expect(globToRegExp('a\\*').test('ab')).toBe(false);
    expect(globToRegExp('a[b').test('a[b')).toBe(true);
  });
});
