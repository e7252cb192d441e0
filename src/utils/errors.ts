export const EXIT_SUCCESS = 0;
export const EXIT_GENERIC = 1;
export const EXIT_CONFIG = 2;
export const EXIT_BUILD = 3;

export abstract class ZipcraftError extends Error {
  abstract readonly exitCode: number;

  /** One-line description naming the offending field or path. */
  public describe(): string {
    return this.message;
  }
}

export class ConfigError extends ZipcraftError {
  readonly exitCode = EXIT_CONFIG;
  readonly field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message);
    this.name = 'ConfigError';
    this.field = field;
  }

  public describe(): string {
    return this.field ? `${this.message} (field: ${this.field})` : this.message;
  }
}

export class CollisionError extends ZipcraftError {
  readonly exitCode = EXIT_BUILD;
  readonly archivePath: string;
  readonly sources: readonly string[];

  constructor(archivePath: string, sources: readonly string[]) {
    super(`Archive path "${archivePath}" is produced by more than one source: ${sources.join(', ')}`);
    this.name = 'CollisionError';
    this.archivePath = archivePath;
    this.sources = sources;
  }
}

export class BuildError extends ZipcraftError {
  readonly exitCode = EXIT_BUILD;
  readonly path: string | null;

  constructor(message: string, path: string | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BuildError';
    this.path = path;
  }

  public describe(): string {
    return this.path ? `${this.message} (path: ${this.path})` : this.message;
  }
}

/** A source file disappeared between collection and assembly. */
export class FilesystemRaceError extends BuildError {
  constructor(path: string, options?: { cause?: unknown }) {
    super('Source file vanished during the build', path, options);
    this.name = 'FilesystemRaceError';
  }
}

export function exitCodeFor(error: unknown): number {
  return error instanceof ZipcraftError ? error.exitCode : EXIT_GENERIC;
}

export function describeError(error: unknown): string {
  if (error instanceof ZipcraftError) return error.describe();
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
