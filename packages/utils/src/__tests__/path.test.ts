import { describe, expect, it } from 'vitest';
import {
  getBaseName,
  getParentPath,
  getRepoPathSegments,
  joinRepoPath,
  normalizeRepoPath,
} from '../path.js';

describe('normalizeRepoPath', () => {
  it('adds a leading slash and collapses empty segments', () => {
    expect(normalizeRepoPath('docs//reports/q3.xlsx')).toBe('/docs/reports/q3.xlsx');
  });

  it('drops "." segments and trailing slashes', () => {
    expect(normalizeRepoPath('/./docs/./notes/')).toBe('/docs/notes');
  });

  it('maps the empty path to the root', () => {
    expect(normalizeRepoPath('')).toBe('/');
  });
});

describe('getRepoPathSegments', () => {
  it('returns only the named segments', () => {
    expect(getRepoPathSegments('/a/b/c.txt')).toEqual(['a', 'b', 'c.txt']);
  });
});

describe('getParentPath', () => {
  it('returns the directory of a nested file', () => {
    expect(getParentPath('/docs/reports/q3.xlsx')).toBe('/docs/reports');
  });

  it('returns the root for a top-level file', () => {
    expect(getParentPath('/readme.md')).toBe('/');
  });
});

describe('getBaseName', () => {
  it('returns the last path component', () => {
    expect(getBaseName('/tmp/cache/repo-1/docs/q3.xlsx')).toBe('q3.xlsx');
  });
});

describe('joinRepoPath', () => {
  it('joins a parent and a name', () => {
    expect(joinRepoPath('/docs/reports', 'q3.xlsx')).toBe('/docs/reports/q3.xlsx');
  });

  it('joins against the root without doubling the slash', () => {
    expect(joinRepoPath('/', 'readme.md')).toBe('/readme.md');
  });
});
