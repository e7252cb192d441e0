import * as fs from 'fs/promises';
import * as path from 'path';
import { applyEdits, modify } from 'jsonc-parser';
import { z } from 'zod';
import {
  extractArchive,
  isEntryModulePackaged,
  listArchive,
  readArchiveInfo,
  readInterpreter,
} from '../core/ArchiveAssembler';
import { Bundler } from '../core/Bundler';
import { ConfigResolver, formatEntryPoint } from '../core/ConfigResolver';
import { PathFilter } from '../core/PathFilter';
import { Watcher } from '../core/Watcher';
import { CliOverrides, ResolveOptions, ResolveOutcome } from '../types/config';
import { BuildResult } from '../types/state';
import { CONFIG_FILE_NAME, DEFAULT_OUTPUT_PATH, PKG_INFO_NAME, TOOL_NAME } from '../utils/constants';
import { ConfigError, EXIT_GENERIC, EXIT_SUCCESS, describeError, exitCodeFor } from '../utils/errors';
import { pathExists } from '../utils/files';
import { Logger } from '../utils/Logger';
import { renderTree } from '../utils/tree';
import {
  CommandName,
  ParsedCommandLine,
  ParsedValues,
  isCommandName,
  parseCommandLine,
  toCliOverrides,
} from './options';
import { StatusLine } from './StatusLine';

// Resolves from both src/cli and dist/cli
const PACKAGE_ROOT = path.resolve(__dirname, '../..');
const TEMPLATE_DIR = path.join(PACKAGE_ROOT, 'templates');

export const PRESETS = {
  basic: 'Standard configuration for a typical Python package',
  cli: 'Command-line application with an entry point',
  library: 'Importable library without an entry point or shebang',
  minimal: 'Just the essentials',
} as const;

export type PresetName = keyof typeof PRESETS;

function isPresetName(value: string): value is PresetName {
  return Object.prototype.hasOwnProperty.call(PRESETS, value);
}

export interface CommandContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Receives command output, one line per call. */
  out: (line: string) => void;
  signal?: AbortSignal;
}

export const HELP_TEXT = `Usage: ${TOOL_NAME} <command> [options]

Commands:
  build              Build the archive (skipped when nothing changed)
  watch              Rebuild whenever sources or config change
  init               Write a starter ${CONFIG_FILE_NAME}
  validate           Resolve the config and the file set without building
  list [archive]     List the files that would be packaged, or an archive's entries
  info [archive]     Show an archive's interpreter and metadata

Options:
  --include <src[:dest]>      Replace the include list (repeatable)
  --add-include <src[:dest]>  Append to the include list (repeatable)
  --exclude <glob>            Replace the exclude list (repeatable)
  --add-exclude <glob>        Append to the exclude list (repeatable)
  -o, --output <path>         Output archive path
  -m, --entry-point <mod[:fn]>
  -p, --interpreter <cmd>     Shebang interpreter; --no-shebang to omit it
  --main-guard, --no-main-guard
  --main-mode <auto|always|never>
  --compress, --no-compress
  --compression-method <stored|deflate|bzip2|lzma>
  --compression-level <0-9>
  --disable-build-timestamp   Reproducible PKG-INFO
  --no-gitignore              Ignore .gitignore files
  --allow-overlay             Let later includes lose archive-path collisions silently
  --fingerprint <content|mtime>
  --interval <seconds>        Watch poll interval
  --debounce <seconds>        Watch settle delay
  --config <path>             Config file (default ${CONFIG_FILE_NAME})
  --pyproject <path>          pyproject.toml to read metadata from
  --dry-run, -f/--force, --strict
  --source <archive>          Rebuild from an existing archive (build)
  --tree, --count             Output shape for list
  --preset <name>, --list-presets, --force   (init)
  -v/--verbose, -q/--quiet, -h/--help, -V/--version
`;

async function readVersion(): Promise<string> {
  const raw = await fs.readFile(path.join(PACKAGE_ROOT, 'package.json'), 'utf-8');
  return z.object({ version: z.string() }).parse(JSON.parse(raw)).version;
}

function configureLogging(values: ParsedValues, env: NodeJS.ProcessEnv): void {
  Logger.activate({ env });
  if (values.verbose) {
    Logger.setLevel('debug');
  } else if (values.quiet) {
    Logger.setLevel('warn');
  }
}

/** Parses `argv`, runs the command and returns the process exit code. */
export async function runCli(argv: string[], ctx: CommandContext): Promise<number> {
  let parsed: ParsedCommandLine;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    Logger.error(describeError(error));
    return EXIT_GENERIC;
  }

  const { values, positionals } = parsed;
  configureLogging(values, ctx.env);

  if (values.version) {
    ctx.out(await readVersion());
    return EXIT_SUCCESS;
  }

  const [command, ...args] = positionals;
  if (values.help || command === undefined) {
    ctx.out(HELP_TEXT);
    return command === undefined && !values.help ? EXIT_GENERIC : EXIT_SUCCESS;
  }
  if (!isCommandName(command)) {
    Logger.error(`Unknown command "${command}". Run "${TOOL_NAME} --help" for usage.`);
    return EXIT_GENERIC;
  }

  try {
    return await runCommand(command, args, values, ctx);
  } catch (error) {
    Logger.error(describeError(error));
    if (error instanceof Error && error.stack) {
      Logger.debug(error.stack);
    }
    return exitCodeFor(error);
  }
}

export async function runCommand(
  command: CommandName,
  args: string[],
  values: ParsedValues,
  ctx: CommandContext,
): Promise<number> {
  switch (command) {
    case 'build':
      return buildCommand(values, ctx);
    case 'watch':
      return watchCommand(values, ctx);
    case 'init':
      return initCommand(values, ctx);
    case 'validate':
      return validateCommand(values, ctx);
    case 'list':
      return listCommand(args[0], values, ctx);
    case 'info':
      return infoCommand(args[0], values, ctx);
    default:
      throw new Error(`Unhandled command: ${command satisfies never}`);
  }
}

function resolveConfig(
  projectRoot: string,
  values: ParsedValues,
  ctx: CommandContext,
  cli: CliOverrides = toCliOverrides(values),
  extra: Pick<ResolveOptions, 'readProjectFiles' | 'quiet'> = {},
): Promise<ResolveOutcome> {
  return new ConfigResolver(projectRoot).resolve({
    cli,
    configPath: values.config,
    pyprojectPath: values.pyproject,
    strict: values.strict ?? false,
    env: ctx.env,
    ...extra,
  });
}

function displayPath(ctx: CommandContext, target: string): string {
  const rel = path.relative(ctx.cwd, target);
  return rel && !rel.startsWith('..') && !path.isAbsolute(rel) ? rel : target;
}

function formatSize(bytes: number): string {
  return `${(bytes / 1024).toFixed(1)} KB`;
}

function reportBuild(result: BuildResult, ctx: CommandContext): void {
  const output = displayPath(ctx, result.outputPath);
  if (result.skipped) {
    ctx.out(`${output} is up to date (${result.fileCount} files)`);
  } else if (result.dryRun) {
    ctx.out(`Dry run: would write ${output} (${result.fileCount} files, ${formatSize(result.sizeBytes)})`);
  } else {
    ctx.out(`Built ${output}: ${result.fileCount} files, ${formatSize(result.sizeBytes)} in ${result.durationMs} ms`);
  }
}

// build

async function buildCommand(values: ParsedValues, ctx: CommandContext): Promise<number> {
  if (values.source) {
    return buildFromArchive(values.source, values, ctx);
  }
  const { config } = await resolveConfig(ctx.cwd, values, ctx);
  const result = await new Bundler(config).build({ dryRun: values['dry-run'], force: values.force });
  reportBuild(result, ctx);
  return EXIT_SUCCESS;
}

/**
 * Repackages an existing archive: its contents become the project, its
 * shebang the default interpreter.
 */
async function buildFromArchive(source: string, values: ParsedValues, ctx: CommandContext): Promise<number> {
  const archivePath = path.resolve(ctx.cwd, source);
  const extracted = await extractArchive(archivePath);

  try {
    // Regenerated on every build
    await fs.rm(path.join(extracted, PKG_INFO_NAME), { force: true });

    const cli = toCliOverrides(values);
    cli.include = cli.include ?? ['.'];
    cli.output = path.resolve(ctx.cwd, cli.output ?? DEFAULT_OUTPUT_PATH);
    if (cli.interpreter === undefined) {
      const interpreter = await readInterpreter(archivePath);
      cli.interpreter = interpreter ?? false;
    }

    // Config files packaged inside the archive are sources, not settings
    const { config } = await resolveConfig(extracted, values, ctx, cli, { readProjectFiles: false });
    const result = await new Bundler(config).build({ dryRun: values['dry-run'], force: true });
    reportBuild(result, ctx);
    return EXIT_SUCCESS;
  } finally {
    await fs.rm(extracted, { recursive: true, force: true });
  }
}

// watch

async function watchCommand(values: ParsedValues, ctx: CommandContext): Promise<number> {
  const cli = toCliOverrides(values);
  // Fail fast on a broken config; later scans re-resolve every tick
  await resolveConfig(ctx.cwd, values, ctx, cli);

  const watcher = new Watcher(async () => (await resolveConfig(ctx.cwd, values, ctx, cli, { quiet: true })).config);
  const status = new StatusLine(watcher);
  Logger.info('Watching for changes. Press Ctrl+C to stop.');

  try {
    await watcher.start(ctx.signal);
  } finally {
    status.dispose();
    watcher.dispose();
  }
  return EXIT_SUCCESS;
}

// init

async function initCommand(values: ParsedValues, ctx: CommandContext): Promise<number> {
  if (values['list-presets']) {
    ctx.out('Available presets:');
    for (const [name, description] of Object.entries(PRESETS)) {
      ctx.out(`  ${name.padEnd(10)}${description}`);
    }
    return EXIT_SUCCESS;
  }

  const preset = values.preset ?? 'basic';
  if (!isPresetName(preset)) {
    throw new ConfigError(`Unknown preset "${preset}"; available: ${Object.keys(PRESETS).join(', ')}`, 'preset');
  }

  const target = path.resolve(ctx.cwd, values.config ?? CONFIG_FILE_NAME);
  if ((await pathExists(target)) && !values.force) {
    throw new ConfigError(`${displayPath(ctx, target)} already exists; use --force to overwrite`, 'config');
  }

  let content = await fs.readFile(path.join(TEMPLATE_DIR, `${preset}.jsonc`), 'utf-8');
  const edit = (jsonPath: Array<string | number>, value: unknown) => {
    const edits = modify(content, jsonPath, value, {
      formattingOptions: { insertSpaces: true, tabSize: 2 },
    });
    content = applyEdits(content, edits);
  };

  if (values.include) edit(['include'], values.include);
  if (values.output) edit(['output', 'path'], values.output);
  if (values['entry-point']) edit(['entryPoint'], values['entry-point']);

  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content, 'utf-8');
  ctx.out(`Created ${displayPath(ctx, target)} from the "${preset}" preset`);
  return EXIT_SUCCESS;
}

// validate

async function validateCommand(values: ParsedValues, ctx: CommandContext): Promise<number> {
  const { config, warnings, configFile } = await resolveConfig(ctx.cwd, values, ctx);
  const fileSet = await new PathFilter(config).collect();

  if (config.entryPoint && config.mainMode !== 'never' && !isEntryModulePackaged(config.entryPoint, fileSet)) {
    throw new ConfigError(
      `Entry point module "${config.entryPoint.module}" is not in the collected files`,
      'entryPoint',
    );
  }

  ctx.out(`Configuration OK (${configFile ? displayPath(ctx, configFile) : 'defaults'})`);
  ctx.out(`  Files:       ${fileSet.length}`);
  ctx.out(`  Output:      ${displayPath(ctx, config.outputPath)}`);
  ctx.out(`  Entry point: ${config.entryPoint ? formatEntryPoint(config.entryPoint) : 'none'}`);
  ctx.out(`  Warnings:    ${warnings.length}`);
  return EXIT_SUCCESS;
}

// list

async function listCommand(archive: string | undefined, values: ParsedValues, ctx: CommandContext): Promise<number> {
  let paths: string[];
  if (archive) {
    paths = await listArchive(path.resolve(ctx.cwd, archive));
  } else {
    const { config } = await resolveConfig(ctx.cwd, values, ctx);
    const fileSet = await new PathFilter(config).collect();
    paths = fileSet.map((entry) => entry.archivePath);
  }

  if (values.count) {
    ctx.out(String(paths.length));
  } else if (values.tree) {
    ctx.out(renderTree(paths).trimEnd());
  } else {
    for (const archivePath of paths) {
      ctx.out(archivePath);
    }
  }
  return EXIT_SUCCESS;
}

// info

async function infoCommand(archive: string | undefined, values: ParsedValues, ctx: CommandContext): Promise<number> {
  let archivePath: string;
  if (archive) {
    archivePath = path.resolve(ctx.cwd, archive);
  } else {
    const { config } = await resolveConfig(ctx.cwd, values, ctx);
    archivePath = config.outputPath;
  }

  const info = await readArchiveInfo(archivePath);
  ctx.out(`Archive:     ${displayPath(ctx, archivePath)}`);
  ctx.out(`Interpreter: ${info.interpreter ?? 'none'}`);
  ctx.out(`Entries:     ${info.entries.length}`);
  if (info.metadata) {
    for (const [key, value] of Object.entries(info.metadata)) {
      ctx.out(`${key}: ${value}`);
    }
  }
  return EXIT_SUCCESS;
}
