import { describe, expect, test } from 'vitest';
import { FolderIgnores, compileIgnoreRule, globToRegex } from './ignores.js';

// ============================================================================
// globToRegex
// ============================================================================

describe('globToRegex', () => {
  test('matches a bare name at any depth', () => {
    const regex = globToRegex('node_modules');
    expect(regex.test('node_modules')).toBe(true);
    expect(regex.test('app/node_modules')).toBe(true);
    expect(regex.test('my_node_modules')).toBe(false);
  });

  test('anchors a leading slash at the root', () => {
    const regex = globToRegex('/build');
    expect(regex.test('build')).toBe(true);
    expect(regex.test('src/build')).toBe(false);
  });

  test('* stays within one path segment', () => {
    const regex = globToRegex('*.tmp');
    expect(regex.test('a.tmp')).toBe(true);
    expect(regex.test('dir/a.tmp')).toBe(true);
    expect(regex.test('a.tmp/b')).toBe(false);
  });

  test('** crosses segments', () => {
    const regex = globToRegex('/cache/**');
    expect(regex.test('cache/a/b/c')).toBe(true);
    expect(regex.test('other/cache/a')).toBe(false);
  });

  test('? matches one character', () => {
    const regex = globToRegex('file?.txt');
    expect(regex.test('file1.txt')).toBe(true);
    expect(regex.test('file12.txt')).toBe(false);
  });

  test('escapes regex characters', () => {
    const regex = globToRegex('a+b.txt');
    expect(regex.test('a+b.txt')).toBe(true);
    expect(regex.test('aab.txt')).toBe(false);
    expect(regex.test('a+bxtxt')).toBe(false);
  });
});

// ============================================================================
// compileIgnoreRule
// ============================================================================

describe('compileIgnoreRule', () => {
  test('peels prefixes in any order', () => {
    const rule = compileIgnoreRule('(?d)!(?i)Thumbs.db');
    expect(rule.source).toBe('(?d)!(?i)Thumbs.db');
    expect(rule.negated).toBe(true);
    expect(rule.deletable).toBe(true);
    expect(rule.regex.test('THUMBS.DB')).toBe(true);
  });

  test('plain patterns have no flags', () => {
    const rule = compileIgnoreRule('*.log');
    expect(rule.negated).toBe(false);
    expect(rule.deletable).toBe(false);
    expect(rule.regex.flags).toBe('');
  });
});

// ============================================================================
// FolderIgnores
// ============================================================================

describe('FolderIgnores', () => {
  const ignores = new FolderIgnores(
    ['!keep.log', '*.log', '// comment'],
    ['!keep.log', '!keep.log/**', '*.log', '*.log/**', '', '// comment']
  );

  test('keeps the written patterns and skips blanks and comments when compiling', () => {
    expect(ignores.ignorePatterns).toEqual(['!keep.log', '*.log', '// comment']);
    expect(ignores.regexPatterns.map((rule) => rule.source)).toEqual([
      '!keep.log',
      '!keep.log/**',
      '*.log',
      '*.log/**',
    ]);
  });

  test('the first matching rule decides', () => {
    expect(ignores.isIgnored('debug.log')).toBe(true);
    expect(ignores.isIgnored('logs/debug.log')).toBe(true);
    expect(ignores.isIgnored('keep.log')).toBe(false);
    expect(ignores.isIgnored('notes.txt')).toBe(false);
  });

  test('normalizes separators and leading slashes', () => {
    expect(ignores.isIgnored('\\logs\\debug.log')).toBe(true);
    expect(ignores.isIgnored('/')).toBe(false);
  });

  test('empty ignores nothing', () => {
    expect(FolderIgnores.empty().isIgnored('anything')).toBe(false);
  });
});
