import * as path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { ConfigResolver, parseEntryPoint, parseInclude } from '../src/core/ConfigResolver';
import { ConfigError } from '../src/utils/errors';
import { captureLogs, makeProject, removeProject, resolveFor } from './helpers';

const PYPROJECT = `[project]
name = "demo"
version = "1.2.3"
description = "Demo app"
authors = [{ name = "Jane Doe", email = "jane@example.com" }]

[tool.zipcraft]
include = ["src/demo"]
output = "from-pyproject.pyz"
mainGuard = false
`;

describe('parseEntryPoint', () => {
  test('should split module and function', () => {
    expect(parseEntryPoint('app.cli:main')).toEqual({ module: 'app.cli', func: 'main' });
  });

  test('should accept a bare module', () => {
    expect(parseEntryPoint('app')).toEqual({ module: 'app', func: null });
  });

  test('should reject malformed strings', () => {
    expect(parseEntryPoint('app:')).toBeNull();
    expect(parseEntryPoint('1app')).toBeNull();
    expect(parseEntryPoint('app cli')).toBeNull();
  });
});

describe('parseInclude', () => {
  test('should split source and destination on the last colon', () => {
    expect(parseInclude('src/app:lib/app')).toEqual({ source: 'src/app', dest: 'lib/app' });
  });

  test('should keep a drive letter in the source', () => {
    expect(parseInclude('C:\\code\\app')).toEqual({ source: 'C:/code/app', dest: null });
  });

  test('should treat an empty destination as none', () => {
    expect(parseInclude('src/app:')).toEqual({ source: 'src/app', dest: null });
  });
});

describe('ConfigResolver', () => {
  let root: string;

  beforeEach(() => {
    captureLogs();
  });

  afterEach(async () => {
    await removeProject(root);
  });

  test('should fill every field from defaults', async () => {
    root = await makeProject({});
    const config = await resolveFor(root, { include: ['src'] });

    expect(config.includes).toEqual([{ source: 'src', dest: null }]);
    expect(config.outputPath).toBe(path.join(root, 'dist', 'bundle.pyz'));
    expect(config.interpreter).toBe('/usr/bin/env python3');
    expect(config.compress).toBe(true);
    expect(config.compressionMethod).toBe('deflate');
    expect(config.compressionLevel).toBeNull();
    expect(config.insertMainGuard).toBe(true);
    expect(config.mainMode).toBe('auto');
    expect(config.respectGitignore).toBe(true);
    expect(config.fingerprintMode).toBe('content');
    expect(config.watchIntervalMs).toBe(1000);
    expect(config.watchDebounceMs).toBe(500);
    expect(Object.isFrozen(config)).toBe(true);
  });

  test('should apply CLI over config file over pyproject', async () => {
    root = await makeProject({
      'pyproject.toml': PYPROJECT,
      '.zipcraft.jsonc': '{\n  // local settings\n  "output": "from-config.pyz",\n}\n',
    });

    const fromFiles = await resolveFor(root);
    expect(fromFiles.outputPath).toBe(path.join(root, 'from-config.pyz'));
    expect(fromFiles.insertMainGuard).toBe(false);
    expect(fromFiles.includes).toEqual([{ source: 'src/demo', dest: null }]);

    const fromCli = await resolveFor(root, { output: 'from-cli.pyz', insertMainGuard: true });
    expect(fromCli.outputPath).toBe(path.join(root, 'from-cli.pyz'));
    expect(fromCli.insertMainGuard).toBe(true);
  });

  test('should read metadata from the [project] table', async () => {
    root = await makeProject({ 'pyproject.toml': PYPROJECT });
    const config = await resolveFor(root);

    expect(config.metadata).toEqual({
      displayName: 'demo',
      version: '1.2.3',
      description: 'Demo app',
      author: 'Jane Doe',
    });
    expect(config.outputPath).toBe(path.join(root, 'from-pyproject.pyz'));
  });

  test('should append with addInclude and replace with include', async () => {
    root = await makeProject({ '.zipcraft.jsonc': '{ "include": ["src/a"], "exclude": ["*.txt"] }' });

    const appended = await resolveFor(root, { addInclude: ['src/b:lib'], addExclude: ['*.md'] });
    expect(appended.includes).toEqual([
      { source: 'src/a', dest: null },
      { source: 'src/b', dest: 'lib' },
    ]);
    expect(appended.excludes).toEqual(['*.txt', '*.md']);

    const replaced = await resolveFor(root, { include: ['src/c'], exclude: [] });
    expect(replaced.includes).toEqual([{ source: 'src/c', dest: null }]);
    expect(replaced.excludes).toEqual([]);
  });

  test('should let environment variables override the config file but not the CLI', async () => {
    root = await makeProject({ '.zipcraft.jsonc': '{ "include": ["src"], "compress": true }' });

    const fromEnv = await resolveFor(root, {}, { env: { COMPRESS: '0', DISABLE_BUILD_TIMESTAMP: 'yes' } });
    expect(fromEnv.compress).toBe(false);
    expect(fromEnv.disableBuildTimestamp).toBe(true);

    const fromCli = await resolveFor(root, { compress: true }, { env: { COMPRESS: '0' } });
    expect(fromCli.compress).toBe(true);
  });

  test('should warn about unknown keys in lenient mode', async () => {
    root = await makeProject({ '.zipcraft.jsonc': '{ "include": ["src"], "bogus": 1 }' });
    const outcome = await new ConfigResolver(root).resolve({ env: {} });

    expect(outcome.warnings).toEqual(['Unknown configuration key "bogus" in .zipcraft.jsonc']);
    expect(outcome.configFile).toBe(path.join(root, '.zipcraft.jsonc'));
  });

  test('should log warnings at debug level when quiet', async () => {
    const logs = captureLogs();
    root = await makeProject({ '.zipcraft.jsonc': '{ "include": ["src"], "bogus": 1 }' });
    const outcome = await new ConfigResolver(root).resolve({ env: {}, quiet: true });

    const message = 'Unknown configuration key "bogus" in .zipcraft.jsonc';
    expect(outcome.warnings).toEqual([message]);
    expect(logs.filter((line) => line.endsWith(`[DEBUG] ${message}`))).toHaveLength(1);
    expect(logs.some((line) => line.includes('[WARN]'))).toBe(false);
  });

  test('should ignore config files under the root when told not to read them', async () => {
    root = await makeProject({
      'pyproject.toml': PYPROJECT,
      '.zipcraft.jsonc': '{ "include": ["other"], "exclude": ["src/demo/core.py"], "entryPoint": "demo:main" }',
    });
    const outcome = await new ConfigResolver(root).resolve({
      env: {},
      cli: { include: ['src'] },
      readProjectFiles: false,
    });

    expect(outcome.configFile).toBeNull();
    expect(outcome.config.excludes).toEqual([]);
    expect(outcome.config.entryPoint).toBeNull();
    expect(outcome.config.metadata).toEqual({});
    expect(outcome.config.outputPath).toBe(path.join(root, 'dist', 'bundle.pyz'));
  });

  test('should reject unknown keys in strict mode', async () => {
    root = await makeProject({ '.zipcraft.jsonc': '{ "include": ["src"], "bogus": 1 }' });
    const attempt = new ConfigResolver(root).resolve({ env: {}, strict: true });

    await expect(attempt).rejects.toBeInstanceOf(ConfigError);
    await expect(attempt).rejects.toMatchObject({ field: 'bogus' });
  });

  test('should drop an unknown enum value with a warning in lenient mode', async () => {
    root = await makeProject({ '.zipcraft.jsonc': '{ "include": ["src"], "compressionMethod": "zstd" }' });
    const outcome = await new ConfigResolver(root).resolve({ env: {} });

    expect(outcome.config.compressionMethod).toBe('deflate');
    expect(outcome.warnings).toEqual(['Unknown compressionMethod "zstd"; valid options: bzip2, deflate, lzma, stored']);
  });

  test('should fail on a malformed config file', async () => {
    root = await makeProject({ '.zipcraft.jsonc': '{ "include": [ }' });

    await expect(resolveFor(root)).rejects.toMatchObject({ name: 'ConfigError', field: 'config' });
  });

  test('should fail on a type violation even in lenient mode', async () => {
    root = await makeProject({ '.zipcraft.jsonc': '{ "include": "src" }' });

    await expect(resolveFor(root)).rejects.toBeInstanceOf(ConfigError);
  });

  test('should fail on an entry point that is not a module path', async () => {
    root = await makeProject({});

    await expect(resolveFor(root, { include: ['src'], entryPoint: 'not a module' })).rejects.toMatchObject({
      field: 'entryPoint',
    });
  });

  test('should fail when nothing is included', async () => {
    root = await makeProject({});

    await expect(resolveFor(root)).rejects.toMatchObject({ field: 'include' });
  });

  test('should fail when the output path is a directory', async () => {
    root = await makeProject({ 'out/keep.txt': 'x' });

    await expect(resolveFor(root, { include: ['src'], output: 'out' })).rejects.toBeInstanceOf(ConfigError);
  });

  test('should fail when an explicit config file is missing', async () => {
    root = await makeProject({});

    await expect(resolveFor(root, { include: ['src'] }, { configPath: 'nope.jsonc' })).rejects.toMatchObject({
      field: 'config',
    });
  });

  test('should map interpreter false to no shebang', async () => {
    root = await makeProject({ '.zipcraft.jsonc': '{ "include": ["src"], "interpreter": "#!/usr/bin/python3.12" }' });

    expect((await resolveFor(root)).interpreter).toBe('/usr/bin/python3.12');
    expect((await resolveFor(root, { interpreter: false })).interpreter).toBeNull();
  });
});
