export const COMPRESSION_METHODS = ['stored', 'deflate', 'bzip2', 'lzma'] as const;

export type CompressionMethod = (typeof COMPRESSION_METHODS)[number];

export const MAIN_MODES = ['auto', 'always', 'never'] as const;

export type MainMode = (typeof MAIN_MODES)[number];

export const FINGERPRINT_MODES = ['content', 'mtime'] as const;

export type FingerprintMode = (typeof FINGERPRINT_MODES)[number];

export type ConfigSource = 'cli' | 'env' | 'config' | 'pyproject' | 'defaults';

export interface IncludeSpec {
  source: string;
  dest: string | null;
}

export interface EntryPoint {
  module: string;
  func: string | null;
}

/**
 * One configuration layer before resolution. Every field is optional; the
 * resolver folds layers from lowest to highest precedence.
 */
export interface ConfigLayer {
  include?: IncludeSpec[];
  addInclude?: IncludeSpec[];
  exclude?: string[];
  addExclude?: string[];
  respectGitignore?: boolean;
  outputPath?: string;
  entryPoint?: EntryPoint | null;
  interpreter?: string | null;
  insertMainGuard?: boolean;
  mainMode?: MainMode;
  compress?: boolean;
  compressionMethod?: CompressionMethod;
  compressionLevel?: number | null;
  disableBuildTimestamp?: boolean;
  metadata?: Record<string, string>;
  allowOverlay?: boolean;
  fingerprintMode?: FingerprintMode;
  watchIntervalMs?: number;
  watchDebounceMs?: number;
}

/**
 * Raw CLI values as the command layer hands them over. Entry points and
 * includes are still strings here so they get the same validation as
 * values read from files.
 */
export interface CliOverrides {
  include?: string[];
  addInclude?: string[];
  exclude?: string[];
  addExclude?: string[];
  respectGitignore?: boolean;
  output?: string;
  entryPoint?: string;
  interpreter?: string | false;
  insertMainGuard?: boolean;
  mainMode?: string;
  compress?: boolean;
  compressionMethod?: string;
  compressionLevel?: number;
  disableBuildTimestamp?: boolean;
  allowOverlay?: boolean;
  fingerprintMode?: string;
  watchIntervalSeconds?: number;
  watchDebounceSeconds?: number;
}

export interface ResolvedConfig {
  readonly projectRoot: string;
  readonly includes: readonly IncludeSpec[];
  readonly excludes: readonly string[];
  readonly respectGitignore: boolean;
  readonly outputPath: string;
  readonly entryPoint: EntryPoint | null;
  readonly interpreter: string | null;
  readonly insertMainGuard: boolean;
  readonly mainMode: MainMode;
  readonly compress: boolean;
  readonly compressionMethod: CompressionMethod;
  readonly compressionLevel: number | null;
  readonly disableBuildTimestamp: boolean;
  readonly metadata: Readonly<Record<string, string>>;
  readonly allowOverlay: boolean;
  readonly fingerprintMode: FingerprintMode;
  readonly watchIntervalMs: number;
  readonly watchDebounceMs: number;
  readonly sources: readonly ConfigSource[];
}

export interface ResolveOptions {
  projectRoot: string;
  cli?: CliOverrides;
  configPath?: string;
  pyprojectPath?: string;
  strict?: boolean;
  env?: NodeJS.ProcessEnv;
  /** When false, no config file or pyproject.toml is looked up under the project root. */
  readProjectFiles?: boolean;
  /** Log warnings at debug level; they are still returned. */
  quiet?: boolean;
}

export interface ResolveOutcome {
  config: ResolvedConfig;
  warnings: string[];
  configFile: string | null;
}
