import { parseArgs } from 'util';
import { CliOverrides } from '../types/config';
import { ConfigError } from '../utils/errors';

export const COMMANDS = ['build', 'watch', 'init', 'validate', 'list', 'info'] as const;

export type CommandName = (typeof COMMANDS)[number];

const OPTIONS = {
  // Config overrides
  include: { type: 'string', multiple: true },
  'add-include': { type: 'string', multiple: true },
  exclude: { type: 'string', multiple: true },
  'add-exclude': { type: 'string', multiple: true },
  output: { type: 'string', short: 'o' },
  'entry-point': { type: 'string', short: 'm' },
  interpreter: { type: 'string', short: 'p' },
  'no-shebang': { type: 'boolean' },
  'main-guard': { type: 'boolean' },
  'no-main-guard': { type: 'boolean' },
  'main-mode': { type: 'string' },
  compress: { type: 'boolean', short: 'c' },
  'no-compress': { type: 'boolean' },
  'compression-method': { type: 'string' },
  'compression-level': { type: 'string' },
  'disable-build-timestamp': { type: 'boolean' },
  gitignore: { type: 'boolean' },
  'no-gitignore': { type: 'boolean' },
  'allow-overlay': { type: 'boolean' },
  fingerprint: { type: 'string' },
  interval: { type: 'string' },
  debounce: { type: 'string' },
  config: { type: 'string' },
  pyproject: { type: 'string' },

  // Command switches
  'dry-run': { type: 'boolean' },
  force: { type: 'boolean', short: 'f' },
  strict: { type: 'boolean' },
  source: { type: 'string' },
  tree: { type: 'boolean' },
  count: { type: 'boolean' },
  preset: { type: 'string' },
  'list-presets': { type: 'boolean' },

  // Global
  verbose: { type: 'boolean', short: 'v' },
  quiet: { type: 'boolean', short: 'q' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'V' },
} as const;

export function parseCommandLine(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

export type ParsedCommandLine = ReturnType<typeof parseCommandLine>;

export type ParsedValues = ParsedCommandLine['values'];

export function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

function parseNumber(raw: string | undefined, field: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new ConfigError(`Expected a number, got "${raw}"`, field);
  }
  return value;
}

/** Boolean flag pairs: the negative form wins when both are given. */
function flagPair(positive: boolean | undefined, negative: boolean | undefined): boolean | undefined {
  if (negative) return false;
  if (positive) return true;
  return undefined;
}

export function toCliOverrides(values: ParsedValues): CliOverrides {
  const overrides: CliOverrides = {};

  if (values.include) overrides.include = values.include;
  if (values['add-include']) overrides.addInclude = values['add-include'];
  if (values.exclude) overrides.exclude = values.exclude;
  if (values['add-exclude']) overrides.addExclude = values['add-exclude'];
  if (values.output !== undefined) overrides.output = values.output;
  if (values['entry-point'] !== undefined) overrides.entryPoint = values['entry-point'];

  if (values['no-shebang']) {
    overrides.interpreter = false;
  } else if (values.interpreter !== undefined) {
    overrides.interpreter = values.interpreter;
  }

  overrides.insertMainGuard = flagPair(values['main-guard'], values['no-main-guard']);
  overrides.compress = flagPair(values.compress, values['no-compress']);
  overrides.respectGitignore = flagPair(values.gitignore, values['no-gitignore']);

  if (values['main-mode'] !== undefined) overrides.mainMode = values['main-mode'];
  if (values['compression-method'] !== undefined) overrides.compressionMethod = values['compression-method'];
  overrides.compressionLevel = parseNumber(values['compression-level'], 'compressionLevel');
  if (values['disable-build-timestamp']) overrides.disableBuildTimestamp = true;
  if (values['allow-overlay']) overrides.allowOverlay = true;
  if (values.fingerprint !== undefined) overrides.fingerprintMode = values.fingerprint;
  overrides.watchIntervalSeconds = parseNumber(values.interval, 'watch.interval');
  overrides.watchDebounceSeconds = parseNumber(values.debounce, 'watch.debounce');

  return overrides;
}
