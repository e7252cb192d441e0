import * as path from 'path';
import { describe, expect, test } from 'vitest';
import { compareArchivePaths, normalizeArchivePath, relativePosix, stableStringify } from '../src/utils/paths';
import { renderTree } from '../src/utils/tree';

describe('compareArchivePaths', () => {
  test('should order by code unit, not locale', () => {
    expect(['b', 'B', 'a', '_'].sort(compareArchivePaths)).toEqual(['B', '_', 'a', 'b']);
    expect(['pkg/z.py', 'pkg.py', 'pkg/a.py'].sort(compareArchivePaths)).toEqual(['pkg.py', 'pkg/a.py', 'pkg/z.py']);
  });
});

describe('normalizeArchivePath', () => {
  test('should collapse slashes and strip the leading and trailing ones', () => {
    expect(normalizeArchivePath('/a//b/')).toBe('a/b');
    expect(normalizeArchivePath('a\\b\\c.py')).toBe('a/b/c.py');
  });

  test('should reject paths that escape or name the root', () => {
    expect(normalizeArchivePath('a/../b')).toBeNull();
    expect(normalizeArchivePath('.')).toBeNull();
    expect(normalizeArchivePath('/')).toBeNull();
  });
});

describe('relativePosix', () => {
  test('should return a slash-separated path inside the root', () => {
    expect(relativePosix('/work/project', path.join('/work/project', 'src', 'app.py'))).toBe('src/app.py');
  });

  test('should return null outside the root', () => {
    expect(relativePosix('/work/project', '/work/other/app.py')).toBeNull();
    expect(relativePosix('/work/project', '/work')).toBeNull();
  });
});

describe('stableStringify', () => {
  test('should sort keys at every depth', () => {
    expect(stableStringify({ b: 1, a: { d: 2, c: 3 } })).toBe('{"a":{"c":3,"d":2},"b":1}');
  });

  test('should keep array order', () => {
    expect(stableStringify([3, 1, { z: null, y: true }])).toBe('[3,1,{"y":true,"z":null}]');
  });
});

describe('renderTree', () => {
  test('should list directories before files', () => {
    expect(renderTree(['setup.py', 'app/core.py', 'app/__init__.py'])).toBe(
      '├── app\n│   ├── __init__.py\n│   └── core.py\n└── setup.py\n',
    );
  });
});
