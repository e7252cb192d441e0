import { describe, expect, test } from 'vitest';
import { isCommandName, parseCommandLine, toCliOverrides } from '../src/cli/options';
import { ConfigError } from '../src/utils/errors';

function overridesFor(argv: string[]) {
  return toCliOverrides(parseCommandLine(argv).values);
}

describe('parseCommandLine', () => {
  test('should collect repeated includes and positionals', () => {
    const parsed = parseCommandLine(['build', '--include', 'src/a', '--include', 'src/b:lib', '-o', 'out.pyz']);

    expect(parsed.positionals).toEqual(['build']);
    expect(parsed.values.include).toEqual(['src/a', 'src/b:lib']);
    expect(parsed.values.output).toBe('out.pyz');
  });

  test('should reject unknown options', () => {
    expect(() => parseCommandLine(['build', '--bogus'])).toThrow();
  });
});

describe('toCliOverrides', () => {
  test('should map flags onto override fields', () => {
    expect(
      overridesFor(['--entry-point', 'app:main', '--compression-level', '9', '--interval', '2', '--allow-overlay']),
    ).toMatchObject({
      entryPoint: 'app:main',
      compressionLevel: 9,
      watchIntervalSeconds: 2,
      allowOverlay: true,
    });
  });

  test('should let the negative form of a flag pair win', () => {
    const overrides = overridesFor(['--compress', '--no-compress', '--no-main-guard', '--gitignore']);

    expect(overrides.compress).toBe(false);
    expect(overrides.insertMainGuard).toBe(false);
    expect(overrides.respectGitignore).toBe(true);
  });

  test('should turn --no-shebang into no interpreter', () => {
    expect(overridesFor(['--no-shebang', '--interpreter', 'python3']).interpreter).toBe(false);
    expect(overridesFor(['-p', 'python3']).interpreter).toBe('python3');
  });

  test('should leave unset options undefined', () => {
    const overrides = overridesFor([]);

    expect(overrides.include).toBeUndefined();
    expect(overrides.compress).toBeUndefined();
    expect(overrides.compressionLevel).toBeUndefined();
  });

  test('should reject non-numeric numbers', () => {
    expect(() => overridesFor(['--debounce', 'soon'])).toThrow(ConfigError);
  });
});

describe('isCommandName', () => {
  test('should accept known commands only', () => {
    expect(isCommandName('build')).toBe(true);
    expect(isCommandName('deploy')).toBe(false);
  });
});
