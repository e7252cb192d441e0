import * as fs from 'fs/promises';
import * as path from 'path';
import { parse as parseJsonc, printParseErrorCode, ParseError } from 'jsonc-parser';
import * as TOML from '@iarna/toml';
import { z } from 'zod';
import {
  CliOverrides,
  COMPRESSION_METHODS,
  ConfigLayer,
  ConfigSource,
  EntryPoint,
  FINGERPRINT_MODES,
  IncludeSpec,
  MAIN_MODES,
  ResolvedConfig,
  ResolveOptions,
  ResolveOutcome,
} from '../types/config';
import {
  CONFIG_FILE_NAME,
  DEFAULT_DEBOUNCE_MS,
  DEFAULT_INTERPRETER,
  DEFAULT_OUTPUT_EXTENSION,
  DEFAULT_OUTPUT_PATH,
  DEFAULT_WATCH_INTERVAL_MS,
  ENV_COMPRESS,
  ENV_DISABLE_BUILD_TIMESTAMP,
  ENV_RESPECT_GITIGNORE,
  ENV_WATCH_INTERVAL,
  PYPROJECT_FILE_NAME,
  PYPROJECT_TOOL_TABLE,
} from '../utils/constants';
import { ConfigError, isErrnoException } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { toPosix } from '../utils/paths';

const IDENTIFIER = '[A-Za-z_][A-Za-z0-9_]*';
const ENTRY_POINT_PATTERN = new RegExp(`^(${IDENTIFIER}(?:\\.${IDENTIFIER})*)(?::(${IDENTIFIER}))?$`);

const outputSchema = z.union([
  z.string().min(1),
  z
    .object({
      path: z.string().min(1).optional(),
      directory: z.string().min(1).optional(),
      name: z.string().min(1).optional(),
    })
    .strict(),
]);

const fileConfigShape = {
  include: z.array(z.string().min(1)).optional(),
  exclude: z.array(z.string().min(1)).optional(),
  respectGitignore: z.boolean().optional(),
  output: outputSchema.optional(),
  entryPoint: z.string().optional(),
  interpreter: z.union([z.string(), z.boolean()]).optional(),
  mainGuard: z.boolean().optional(),
  mainMode: z.string().optional(),
  compress: z.boolean().optional(),
  compressionMethod: z.string().optional(),
  compressionLevel: z.number().int().optional(),
  disableBuildTimestamp: z.boolean().optional(),
  metadata: z.record(z.string(), z.string()).optional(),
  allowOverlay: z.boolean().optional(),
  fingerprint: z.string().optional(),
  watch: z
    .object({
      interval: z.number().positive().optional(),
      debounce: z.number().nonnegative().optional(),
    })
    .strict()
    .optional(),
};

const KNOWN_KEYS: readonly string[] = Object.keys(fileConfigShape);

const fileConfigSchema = z.object(fileConfigShape).passthrough();

export type FileConfig = z.infer<typeof fileConfigSchema>;

const pyprojectSchema = z
  .object({
    project: z
      .object({
        name: z.string().optional(),
        version: z.string().optional(),
        description: z.string().optional(),
        license: z.union([z.string(), z.object({ text: z.string().optional() }).passthrough()]).optional(),
        authors: z.array(z.object({ name: z.string().optional(), email: z.string().optional() }).passthrough()).optional(),
      })
      .passthrough()
      .optional(),
    tool: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

interface LayerContext {
  label: string;
  strict: boolean;
  warnings: string[];
}

const DEFAULTS: Omit<ResolvedConfig, 'projectRoot' | 'outputPath' | 'sources'> = {
  includes: [],
  excludes: [],
  respectGitignore: true,
  entryPoint: null,
  interpreter: DEFAULT_INTERPRETER,
  insertMainGuard: true,
  mainMode: 'auto',
  compress: true,
  compressionMethod: 'deflate',
  compressionLevel: null,
  disableBuildTimestamp: false,
  metadata: {},
  allowOverlay: false,
  fingerprintMode: 'content',
  watchIntervalMs: DEFAULT_WATCH_INTERVAL_MS,
  watchDebounceMs: DEFAULT_DEBOUNCE_MS,
};

/**
 * Parses `module.sub:function` (function optional). Returns null when the
 * string is not a dotted Python module path.
 */
export function parseEntryPoint(raw: string): EntryPoint | null {
  const match = ENTRY_POINT_PATTERN.exec(raw.trim());
  if (!match) return null;
  return { module: match[1], func: match[2] ?? null };
}

export function formatEntryPoint(entryPoint: EntryPoint): string {
  return entryPoint.func ? `${entryPoint.module}:${entryPoint.func}` : entryPoint.module;
}

/**
 * Splits `source:dest` on the last colon. A leading drive letter (`C:`)
 * is part of the source, not a separator.
 */
export function parseInclude(raw: string): IncludeSpec {
  const idx = raw.lastIndexOf(':');
  if (idx === -1) {
    return { source: toPosix(raw), dest: null };
  }
  const sourcePart = raw.slice(0, idx);
  const destPart = raw.slice(idx + 1);
  const isDriveLetter = /^[A-Za-z]$/.test(sourcePart);
  if (isDriveLetter || sourcePart === '') {
    return { source: toPosix(raw), dest: null };
  }
  return { source: toPosix(sourcePart), dest: destPart === '' ? null : toPosix(destPart) };
}

export function normalizeInterpreter(raw: string): string | null {
  const stripped = raw.trim().replace(/^#!/, '').trim();
  return stripped === '' ? null : stripped;
}

export function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
  return undefined;
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

export class ConfigResolver {
  constructor(private readonly projectRoot: string) {}

  /**
   * Locates the dedicated config file: the explicit path when given,
   * otherwise `.zipcraft.jsonc`, otherwise a `pyproject.toml` that carries a
   * `[tool.zipcraft]` table.
   */
  public async findConfigFile(explicitPath?: string): Promise<string | null> {
    if (explicitPath) {
      const resolved = path.resolve(this.projectRoot, explicitPath);
      const stats = await fs.stat(resolved).catch(() => null);
      if (!stats) {
        throw new ConfigError(`Specified config file not found: ${resolved}`, 'config');
      }
      if (stats.isDirectory()) {
        throw new ConfigError(`Specified config path is a directory, not a file: ${resolved}`, 'config');
      }
      return resolved;
    }

    const jsoncPath = path.join(this.projectRoot, CONFIG_FILE_NAME);
    if (await fileExists(jsoncPath)) {
      return jsoncPath;
    }

    const pyprojectPath = path.join(this.projectRoot, PYPROJECT_FILE_NAME);
    if (await fileExists(pyprojectPath)) {
      const pyproject = await this.loadPyproject(pyprojectPath);
      if (pyproject.tool?.[PYPROJECT_TOOL_TABLE] !== undefined) {
        return pyprojectPath;
      }
    }
    return null;
  }

  public async resolve(options: Omit<ResolveOptions, 'projectRoot'> = {}): Promise<ResolveOutcome> {
    const strict = options.strict ?? false;
    const warnings: string[] = [];
    const env = options.env ?? process.env;

    const readProjectFiles = options.readProjectFiles ?? true;
    const configFile = readProjectFiles ? await this.findConfigFile(options.configPath) : null;
    const configIsToml = configFile !== null && configFile.endsWith('.toml');

    const pyprojectPath = !readProjectFiles
      ? null
      : options.pyprojectPath
        ? path.resolve(this.projectRoot, options.pyprojectPath)
        : configIsToml
          ? configFile
          : path.join(this.projectRoot, PYPROJECT_FILE_NAME);

    const layers: Array<[ConfigSource, ConfigLayer]> = [];

    if (pyprojectPath && (await fileExists(pyprojectPath))) {
      const pyLayer = await this.loadPyprojectLayer(pyprojectPath, { label: PYPROJECT_FILE_NAME, strict, warnings });
      if (pyLayer) layers.push(['pyproject', pyLayer]);
    } else if (pyprojectPath && options.pyprojectPath) {
      throw new ConfigError(`Specified pyproject file not found: ${pyprojectPath}`, 'pyproject');
    }

    if (configFile && !configIsToml) {
      const raw = await this.readJsonc(configFile);
      layers.push([
        'config',
        this.toLayer(raw, { label: path.basename(configFile), strict, warnings }),
      ]);
    }

    layers.push(['env', this.envLayer(env, { label: 'environment', strict, warnings })]);

    if (options.cli) {
      layers.push(['cli', this.cliLayer(options.cli, { label: 'command line', strict, warnings })]);
    }

    const config = this.fold(layers);
    await this.validateResolved(config);

    for (const warning of warnings) {
      if (options.quiet) {
        Logger.debug(warning);
      } else {
        Logger.warn(warning);
      }
    }
    return { config, warnings, configFile };
  }

  /**
   * Precedence fold: layers arrive lowest first, so each later layer
   * overrides scalars, replaces lists (`include`/`exclude`) or appends to
   * them (`addInclude`/`addExclude`), and merges metadata key by key.
   */
  public fold(layers: ReadonlyArray<[ConfigSource, ConfigLayer]>): ResolvedConfig {
    let includes: IncludeSpec[] = [...DEFAULTS.includes];
    let excludes: string[] = [...DEFAULTS.excludes];
    let metadata: Record<string, string> = {};
    let outputPath = DEFAULT_OUTPUT_PATH;
    const scalars: Mutable<typeof DEFAULTS> = { ...DEFAULTS };
    const sources: ConfigSource[] = ['defaults'];

    for (const [source, layer] of layers) {
      if (layer.include !== undefined) includes = [...layer.include];
      if (layer.addInclude !== undefined) includes = [...includes, ...layer.addInclude];
      if (layer.exclude !== undefined) excludes = [...layer.exclude];
      if (layer.addExclude !== undefined) excludes = [...excludes, ...layer.addExclude];
      if (layer.metadata !== undefined) metadata = { ...metadata, ...layer.metadata };
      if (layer.outputPath !== undefined) outputPath = layer.outputPath;

      if (layer.respectGitignore !== undefined) scalars.respectGitignore = layer.respectGitignore;
      if (layer.entryPoint !== undefined) scalars.entryPoint = layer.entryPoint;
      if (layer.interpreter !== undefined) scalars.interpreter = layer.interpreter;
      if (layer.insertMainGuard !== undefined) scalars.insertMainGuard = layer.insertMainGuard;
      if (layer.mainMode !== undefined) scalars.mainMode = layer.mainMode;
      if (layer.compress !== undefined) scalars.compress = layer.compress;
      if (layer.compressionMethod !== undefined) scalars.compressionMethod = layer.compressionMethod;
      if (layer.compressionLevel !== undefined) scalars.compressionLevel = layer.compressionLevel;
      if (layer.disableBuildTimestamp !== undefined) scalars.disableBuildTimestamp = layer.disableBuildTimestamp;
      if (layer.allowOverlay !== undefined) scalars.allowOverlay = layer.allowOverlay;
      if (layer.fingerprintMode !== undefined) scalars.fingerprintMode = layer.fingerprintMode;
      if (layer.watchIntervalMs !== undefined) scalars.watchIntervalMs = layer.watchIntervalMs;
      if (layer.watchDebounceMs !== undefined) scalars.watchDebounceMs = layer.watchDebounceMs;

      if (!sources.includes(source)) sources.push(source);
    }

    return Object.freeze({
      ...scalars,
      projectRoot: this.projectRoot,
      includes: Object.freeze(includes.map((inc) => Object.freeze({ ...inc }))),
      excludes: Object.freeze(excludes),
      metadata: Object.freeze(metadata),
      outputPath: path.resolve(this.projectRoot, outputPath),
      sources: Object.freeze(sources),
    });
  }

  private async validateResolved(config: ResolvedConfig): Promise<void> {
    if (config.includes.length === 0) {
      throw new ConfigError('No include patterns configured; nothing to package', 'include');
    }
    await ensureOutputParent(config.outputPath);
  }

  private async readJsonc(filePath: string): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ConfigError(`Cannot read config file ${filePath}: ${describeIo(error)}`, 'config');
    }

    const errors: ParseError[] = [];
    const parsed: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
    if (errors.length > 0) {
      const first = errors[0];
      throw new ConfigError(
        `Malformed config file ${path.basename(filePath)}: ${printParseErrorCode(first.error)} at offset ${first.offset}`,
        'config',
      );
    }
    return parsed;
  }

  public async loadPyproject(filePath: string): Promise<z.infer<typeof pyprojectSchema>> {
    let parsed: unknown;
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      parsed = TOML.parse(content);
    } catch (error) {
      throw new ConfigError(`Malformed ${path.basename(filePath)}: ${describeIo(error)}`, 'pyproject');
    }
    const result = pyprojectSchema.safeParse(parsed);
    if (!result.success) {
      throw zodToConfigError(result.error, path.basename(filePath), '');
    }
    return result.data;
  }

  private async loadPyprojectLayer(filePath: string, ctx: LayerContext): Promise<ConfigLayer | null> {
    const pyproject = await this.loadPyproject(filePath);
    const tool = pyproject.tool?.[PYPROJECT_TOOL_TABLE];
    const layer: ConfigLayer = tool === undefined ? {} : this.toLayer(tool, { ...ctx, label: `[tool.${PYPROJECT_TOOL_TABLE}]` });

    const project = pyproject.project;
    if (project) {
      const projectMetadata: Record<string, string> = {};
      if (project.name) projectMetadata.displayName = project.name;
      if (project.version) projectMetadata.version = project.version;
      if (project.description) projectMetadata.description = project.description;
      const license = typeof project.license === 'string' ? project.license : project.license?.text;
      if (license) projectMetadata.license = license;
      const author = project.authors?.[0]?.name;
      if (author) projectMetadata.author = author;
      // Tool-table metadata wins over [project]
      layer.metadata = { ...projectMetadata, ...layer.metadata };
    }

    return tool === undefined && !project ? null : layer;
  }

  /**
   * Converts one raw file-level object (dedicated file or pyproject tool
   * table) into a typed layer. Type violations always fail; unknown keys
   * and out-of-range enum values fail only in strict mode.
   */
  public toLayer(raw: unknown, ctx: LayerContext): ConfigLayer {
    const result = fileConfigSchema.safeParse(raw);
    if (!result.success) {
      throw zodToConfigError(result.error, ctx.label, '');
    }
    const file = result.data;
    const issue = issueReporter(ctx);
    const layer: ConfigLayer = {};

    for (const key of Object.keys(file)) {
      if (!KNOWN_KEYS.includes(key)) {
        issue(`Unknown configuration key "${key}" in ${ctx.label}`, key);
      }
    }

    if (file.include !== undefined) layer.include = file.include.map(parseInclude);
    if (file.exclude !== undefined) layer.exclude = file.exclude.map(toPosix);
    if (file.respectGitignore !== undefined) layer.respectGitignore = file.respectGitignore;
    if (file.output !== undefined) layer.outputPath = resolveOutputSetting(file.output);
    if (file.entryPoint !== undefined) layer.entryPoint = requireEntryPoint(file.entryPoint, ctx.label);

    if (file.interpreter !== undefined) {
      if (typeof file.interpreter === 'boolean') {
        layer.interpreter = file.interpreter ? DEFAULT_INTERPRETER : null;
      } else {
        layer.interpreter = normalizeInterpreter(file.interpreter);
      }
    }

    if (file.mainGuard !== undefined) layer.insertMainGuard = file.mainGuard;
    if (file.mainMode !== undefined) layer.mainMode = checkEnum(MAIN_MODES, file.mainMode, 'mainMode', issue);
    if (file.compress !== undefined) layer.compress = file.compress;
    if (file.compressionMethod !== undefined) {
      layer.compressionMethod = checkEnum(COMPRESSION_METHODS, file.compressionMethod, 'compressionMethod', issue);
    }
    if (file.compressionLevel !== undefined) {
      layer.compressionLevel = checkLevel(file.compressionLevel, file.compressionMethod, issue);
    }
    if (file.disableBuildTimestamp !== undefined) layer.disableBuildTimestamp = file.disableBuildTimestamp;
    if (file.metadata !== undefined) layer.metadata = { ...file.metadata };
    if (file.allowOverlay !== undefined) layer.allowOverlay = file.allowOverlay;
    if (file.fingerprint !== undefined) {
      layer.fingerprintMode = checkEnum(FINGERPRINT_MODES, file.fingerprint, 'fingerprint', issue);
    }
    if (file.watch?.interval !== undefined) layer.watchIntervalMs = Math.round(file.watch.interval * 1000);
    if (file.watch?.debounce !== undefined) layer.watchDebounceMs = Math.round(file.watch.debounce * 1000);

    return layer;
  }

  private envLayer(env: NodeJS.ProcessEnv, ctx: LayerContext): ConfigLayer {
    const issue = issueReporter(ctx);
    const layer: ConfigLayer = {};

    const readBool = (key: string): boolean | undefined => {
      const raw = env[key];
      if (raw === undefined) return undefined;
      const value = parseBooleanEnv(raw);
      if (value === undefined) {
        issue(`Environment variable ${key} must be a boolean, got "${raw}"`, key);
      }
      return value;
    };

    layer.disableBuildTimestamp = readBool(ENV_DISABLE_BUILD_TIMESTAMP);
    layer.respectGitignore = readBool(ENV_RESPECT_GITIGNORE);
    layer.compress = readBool(ENV_COMPRESS);

    const interval = env[ENV_WATCH_INTERVAL];
    if (interval !== undefined && interval.trim() !== '') {
      const seconds = Number(interval);
      if (Number.isFinite(seconds) && seconds > 0) {
        layer.watchIntervalMs = Math.round(seconds * 1000);
      } else {
        issue(`Environment variable ${ENV_WATCH_INTERVAL} must be a positive number, got "${interval}"`, ENV_WATCH_INTERVAL);
      }
    }

    return layer;
  }

  private cliLayer(cli: CliOverrides, ctx: LayerContext): ConfigLayer {
    const issue = issueReporter(ctx);
    const layer: ConfigLayer = {
      include: cli.include?.map(parseInclude),
      addInclude: cli.addInclude?.map(parseInclude),
      exclude: cli.exclude?.map(toPosix),
      addExclude: cli.addExclude?.map(toPosix),
      respectGitignore: cli.respectGitignore,
      outputPath: cli.output,
      insertMainGuard: cli.insertMainGuard,
      compress: cli.compress,
      disableBuildTimestamp: cli.disableBuildTimestamp,
      allowOverlay: cli.allowOverlay,
    };

    if (cli.entryPoint !== undefined) layer.entryPoint = requireEntryPoint(cli.entryPoint, ctx.label);
    if (cli.interpreter !== undefined) {
      layer.interpreter = cli.interpreter === false ? null : normalizeInterpreter(cli.interpreter);
    }
    if (cli.mainMode !== undefined) layer.mainMode = checkEnum(MAIN_MODES, cli.mainMode, 'mainMode', issue);
    if (cli.compressionMethod !== undefined) {
      layer.compressionMethod = checkEnum(COMPRESSION_METHODS, cli.compressionMethod, 'compressionMethod', issue);
    }
    if (cli.compressionLevel !== undefined) {
      if (!Number.isInteger(cli.compressionLevel)) {
        throw new ConfigError(`Compression level must be an integer, got ${cli.compressionLevel}`, 'compressionLevel');
      }
      layer.compressionLevel = checkLevel(cli.compressionLevel, cli.compressionMethod, issue);
    }
    if (cli.fingerprintMode !== undefined) {
      layer.fingerprintMode = checkEnum(FINGERPRINT_MODES, cli.fingerprintMode, 'fingerprint', issue);
    }
    if (cli.watchIntervalSeconds !== undefined) {
      if (!(cli.watchIntervalSeconds > 0)) {
        throw new ConfigError(`Watch interval must be positive, got ${cli.watchIntervalSeconds}`, 'watch.interval');
      }
      layer.watchIntervalMs = Math.round(cli.watchIntervalSeconds * 1000);
    }
    if (cli.watchDebounceSeconds !== undefined) {
      if (!(cli.watchDebounceSeconds >= 0)) {
        throw new ConfigError(`Debounce must not be negative, got ${cli.watchDebounceSeconds}`, 'watch.debounce');
      }
      layer.watchDebounceMs = Math.round(cli.watchDebounceSeconds * 1000);
    }

    return layer;
  }
}

type IssueReporter = (message: string, field: string) => void;

function issueReporter(ctx: LayerContext): IssueReporter {
  return (message, field) => {
    if (ctx.strict) {
      throw new ConfigError(message, field);
    }
    ctx.warnings.push(message);
  };
}

function checkEnum<T extends string>(values: readonly T[], value: string, field: string, issue: IssueReporter): T | undefined {
  if (isOneOf(values, value)) {
    return value;
  }
  issue(`Unknown ${field} "${value}"; valid options: ${[...values].sort().join(', ')}`, field);
  return undefined;
}

function checkLevel(level: number, method: string | undefined, issue: IssueReporter): number | undefined {
  if (level < 0 || level > 9) {
    issue(`compressionLevel must be between 0 and 9, got ${level}`, 'compressionLevel');
    return undefined;
  }
  if (method !== undefined && method !== 'deflate') {
    issue(`compressionLevel is only used with compressionMethod "deflate" (got "${method}")`, 'compressionLevel');
  }
  return level;
}

function requireEntryPoint(raw: string, label: string): EntryPoint {
  const entryPoint = parseEntryPoint(raw);
  if (!entryPoint) {
    throw new ConfigError(
      `Invalid entry point "${raw}" in ${label}; expected "module.path:function" or "module.path"`,
      'entryPoint',
    );
  }
  return entryPoint;
}

function resolveOutputSetting(output: z.infer<typeof outputSchema>): string | undefined {
  if (typeof output === 'string') return output;
  if (output.path) return output.path;
  if (output.directory || output.name) {
    const directory = output.directory ?? path.dirname(DEFAULT_OUTPUT_PATH);
    const name = output.name ?? path.basename(DEFAULT_OUTPUT_PATH, DEFAULT_OUTPUT_EXTENSION);
    return path.join(directory, `${name}${DEFAULT_OUTPUT_EXTENSION}`);
  }
  return undefined;
}

function zodToConfigError(error: z.ZodError, label: string, prefix: string): ConfigError {
  const first = error.issues[0];
  const field = [prefix, ...first.path.map(String)].filter(Boolean).join('.');
  return new ConfigError(`Invalid configuration in ${label}: ${first.message}`, field || null);
}

function describeIo(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * The output's parent must be a directory or creatable. A directory created
 * only for this check is removed again.
 */
async function ensureOutputParent(outputPath: string): Promise<void> {
  try {
    const stats = await fs.stat(outputPath);
    if (stats.isDirectory()) {
      throw new ConfigError(`Output path is a directory: ${outputPath}`, 'output');
    }
  } catch (error) {
    if (error instanceof ConfigError) throw error;
  }

  const parent = path.dirname(outputPath);
  try {
    const stats = await fs.stat(parent);
    if (!stats.isDirectory()) {
      throw new ConfigError(`Output path parent is not a directory: ${parent}`, 'output');
    }
    return;
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      throw new ConfigError(`Cannot access output directory ${parent}: ${describeIo(error)}`, 'output');
    }
  }

  try {
    const created = await fs.mkdir(parent, { recursive: true });
    if (created) {
      await fs.rm(created, { recursive: true, force: true });
    }
  } catch (error) {
    throw new ConfigError(`Cannot create output directory ${parent}: ${describeIo(error)}`, 'output');
  }
}
