import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { DeflateOptions, FlateError, strFromU8, strToU8, unzipSync, Zip, ZipDeflate, ZipPassThrough } from 'fflate';
import { EntryPoint, ResolvedConfig } from '../types/config';
import { FileSet } from '../types/state';
import {
  BUILD_TIMESTAMP_PLACEHOLDER,
  DEFAULT_COMPRESSION_LEVEL,
  DEFAULT_LICENSE_FALLBACK,
  MAIN_MODULE_NAME,
  PKG_INFO_METADATA_VERSION,
  PKG_INFO_NAME,
  TOOL_NAME,
  ZIP_ENTRY_MTIME,
} from '../utils/constants';
import { BuildError, FilesystemRaceError, isErrnoException } from '../utils/errors';
import { writeFileAtomic } from '../utils/files';
import { Logger } from '../utils/Logger';
import { compareArchivePaths, normalizeArchivePath } from '../utils/paths';

type ZipLevel = NonNullable<DeflateOptions['level']>;

const ZIP_LEVELS: readonly ZipLevel[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

const EOCD_SIGNATURE = 0x06054b50;
const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
const EOCD_MIN_SIZE = 22;
const CENTRAL_HEADER_SIZE = 46;

const EXECUTABLE_MODE = 0o755;

export interface EffectiveCompression {
  method: 'stored' | 'deflate';
  level: ZipLevel;
}

export interface AssembleOptions {
  now?: Date;
}

export interface AssembledArchive {
  bytes: Uint8Array;
  /** Archive paths in the order they were written. */
  entries: string[];
  executable: boolean;
}

export interface ArchiveInfo {
  interpreter: string | null;
  metadata: Record<string, string> | null;
  entries: string[];
}

function toZipLevel(level: number): ZipLevel {
  const found = ZIP_LEVELS.find((candidate) => candidate === level);
  if (found === undefined) {
    throw new BuildError(`Unsupported compression level ${level}`);
  }
  return found;
}

/**
 * Maps the configured method onto what the zip writer can produce. The
 * writer only speaks stored and deflate, so the other names fall back to
 * stored.
 */
export function resolveCompression(config: ResolvedConfig): EffectiveCompression {
  if (!config.compress) {
    return { method: 'stored', level: 0 };
  }
  const method = config.compressionMethod;
  switch (method) {
    case 'stored':
      return { method: 'stored', level: 0 };
    case 'deflate':
      return { method: 'deflate', level: toZipLevel(config.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL) };
    case 'bzip2':
    case 'lzma':
      Logger.warn(`Compression method "${method}" is not available; writing entries stored`);
      return { method: 'stored', level: 0 };
    default:
      throw new BuildError(`Unsupported compression method: ${method satisfies never}`);
  }
}

/** True when the entry module's top-level package or module is in the file set. */
export function isEntryModulePackaged(entryPoint: EntryPoint, fileSet: FileSet): boolean {
  const topLevel = entryPoint.module.split('.')[0];
  return fileSet.some((entry) => entry.archivePath === `${topLevel}.py` || entry.archivePath.startsWith(`${topLevel}/`));
}

/** Source of the `__main__.py` that starts `entryPoint`. */
export function generateMainModule(entryPoint: EntryPoint, insertMainGuard: boolean): string {
  const imports = entryPoint.func ? `from ${entryPoint.module} import ${entryPoint.func}` : 'import runpy';
  const call = entryPoint.func
    ? `${entryPoint.func}()`
    : `runpy.run_module('${entryPoint.module}', run_name='__main__', alter_sys=True)`;

  const body = insertMainGuard ? `if __name__ == '__main__':\n    ${call}` : call;
  return `# Generated by ${TOOL_NAME}\n${imports}\n\n${body}\n`;
}

export function generatePkgInfo(config: ResolvedConfig, now: Date): string {
  const metadata = config.metadata;
  const name = metadata.displayName || metadata.name || path.basename(config.outputPath, path.extname(config.outputPath));

  const lines = [`Metadata-Version: ${PKG_INFO_METADATA_VERSION}`, `Name: ${name}`];
  if (metadata.version) lines.push(`Version: ${metadata.version}`);
  if (metadata.description) lines.push(`Summary: ${metadata.description.replace(/\r?\n/g, ' ')}`);
  if (metadata.author) lines.push(`Author: ${metadata.author}`);
  lines.push(`License: ${metadata.license || DEFAULT_LICENSE_FALLBACK}`);
  lines.push(`Build-Timestamp: ${config.disableBuildTimestamp ? BUILD_TIMESTAMP_PLACEHOLDER : now.toISOString()}`);

  return lines.join('\n') + '\n';
}

export function parsePkgInfo(text: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const line of text.split(/\r?\n/)) {
    const separator = line.indexOf(':');
    if (separator <= 0) continue;
    fields[line.slice(0, separator).trim()] = line.slice(separator + 1).trim();
  }
  return fields;
}

/**
 * Streams the entries into one zip in the order given. The streaming writer
 * keeps that order in the central directory, whatever the entry names.
 */
function writeZip(entries: ReadonlyArray<[string, Uint8Array]>, compression: EffectiveCompression): Uint8Array {
  const chunks: Uint8Array[] = [];
  const errors: FlateError[] = [];
  const zip = new Zip((error, chunk) => {
    if (error) {
      errors.push(error);
      return;
    }
    chunks.push(chunk);
  });

  for (const [archivePath, data] of entries) {
    const file =
      compression.method === 'deflate'
        ? new ZipDeflate(archivePath, { level: compression.level })
        : new ZipPassThrough(archivePath);
    file.mtime = ZIP_ENTRY_MTIME;
    zip.add(file);
    file.push(data, true);
  }
  zip.end();

  if (errors.length > 0) {
    throw new BuildError(`Cannot write zip data: ${errors[0].message}`, null, { cause: errors[0] });
  }

  const out = new Uint8Array(chunks.reduce((total, chunk) => total + chunk.length, 0));
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

function findEndRecord(view: DataView): number {
  for (let i = view.byteLength - EOCD_MIN_SIZE; i >= 0; i--) {
    if (view.getUint32(i, true) === EOCD_SIGNATURE) {
      return i;
    }
  }
  return -1;
}

/**
 * zip offsets count from the start of the zip data. Once a shebang sits in
 * front, every central-directory record and the end record must point
 * `shift` bytes further on for readers that trust the stored offsets.
 */
function shiftZipOffsets(zip: Uint8Array, shift: number): void {
  const view = new DataView(zip.buffer, zip.byteOffset, zip.byteLength);

  const eocd = findEndRecord(view);
  if (eocd < 0) {
    throw new BuildError('Zip data has no end of central directory record');
  }

  const entryCount = view.getUint16(eocd + 10, true);
  const directoryOffset = view.getUint32(eocd + 16, true);

  let cursor = directoryOffset;
  for (let n = 0; n < entryCount; n++) {
    if (view.getUint32(cursor, true) !== CENTRAL_HEADER_SIGNATURE) {
      throw new BuildError(`Corrupt central directory at offset ${cursor}`);
    }
    const nameLength = view.getUint16(cursor + 28, true);
    const extraLength = view.getUint16(cursor + 30, true);
    const commentLength = view.getUint16(cursor + 32, true);
    view.setUint32(cursor + 42, view.getUint32(cursor + 42, true) + shift, true);
    cursor += CENTRAL_HEADER_SIZE + nameLength + extraLength + commentLength;
  }

  view.setUint32(eocd + 16, directoryOffset + shift, true);
}

export function prependShebang(zip: Uint8Array, interpreter: string): Uint8Array {
  const prefix = strToU8(`#!${interpreter}\n`);
  shiftZipOffsets(zip, prefix.length);
  const out = new Uint8Array(prefix.length + zip.length);
  out.set(prefix, 0);
  out.set(zip, prefix.length);
  return out;
}

export class ArchiveAssembler {
  constructor(private readonly config: ResolvedConfig) {}

  public async assemble(fileSet: FileSet, options: AssembleOptions = {}): Promise<AssembledArchive> {
    const now = options.now ?? new Date();
    const compression = resolveCompression(this.config);
    const generated = this.generatedEntries(fileSet, now);

    const contents = new Map<string, Uint8Array>();
    for (const entry of fileSet) {
      if (generated.has(entry.archivePath)) {
        Logger.warn(`Replacing ${entry.archivePath} from ${entry.sourcePath} with a generated one`);
        continue;
      }
      contents.set(entry.archivePath, await this.readSource(entry.sourcePath));
    }
    for (const [archivePath, text] of generated) {
      contents.set(archivePath, strToU8(text));
    }

    const entries = [...contents.keys()].sort(compareArchivePaths);
    const zip = writeZip(
      entries.map((archivePath): [string, Uint8Array] => [archivePath, contents.get(archivePath) ?? new Uint8Array(0)]),
      compression,
    );
    const interpreter = this.config.interpreter;
    const bytes = interpreter ? prependShebang(zip, interpreter) : zip;

    Logger.debug(`Assembled ${entries.length} entries (${compression.method}, level ${compression.level})`);
    return { bytes, entries, executable: interpreter !== null };
  }

  /** Atomically replaces the output file; returns the number of bytes written. */
  public async write(archive: AssembledArchive): Promise<number> {
    const outputPath = this.config.outputPath;
    try {
      await writeFileAtomic(outputPath, archive.bytes, archive.executable ? EXECUTABLE_MODE : undefined);
    } catch (error) {
      throw new BuildError('Cannot write archive', outputPath, { cause: error });
    }
    return archive.bytes.length;
  }

  private generatedEntries(fileSet: FileSet, now: Date): Map<string, string> {
    const generated = new Map<string, string>();
    generated.set(PKG_INFO_NAME, generatePkgInfo(this.config, now));

    const mainModule = this.mainModuleFor(fileSet);
    if (mainModule !== null) {
      generated.set(MAIN_MODULE_NAME, mainModule);
    }
    return generated;
  }

  private mainModuleFor(fileSet: FileSet): string | null {
    const { entryPoint, mainMode } = this.config;
    if (mainMode === 'never') {
      return null;
    }
    if (!entryPoint) {
      if (mainMode === 'always') {
        Logger.warn('mainMode "always" has no entry point to run; no __main__.py generated');
      }
      return null;
    }

    const hasMain = fileSet.some((entry) => entry.archivePath === MAIN_MODULE_NAME);
    if (hasMain && mainMode === 'auto') {
      Logger.debug(`Keeping the packaged ${MAIN_MODULE_NAME}`);
      return null;
    }

    this.assertEntryModulePackaged(entryPoint, fileSet);
    return generateMainModule(entryPoint, this.config.insertMainGuard);
  }

  private assertEntryModulePackaged(entryPoint: EntryPoint, fileSet: FileSet): void {
    if (!isEntryModulePackaged(entryPoint, fileSet)) {
      throw new BuildError(`Entry point module "${entryPoint.module}" is not part of the archive`, entryPoint.module);
    }
  }

  private async readSource(sourcePath: string): Promise<Uint8Array> {
    try {
      return await fs.readFile(sourcePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new FilesystemRaceError(sourcePath, { cause: error });
      }
      throw new BuildError('Cannot read source file', sourcePath, { cause: error });
    }
  }
}

// Reading existing archives

function shebangLength(bytes: Uint8Array): number {
  if (bytes.length < 2 || bytes[0] !== 0x23 || bytes[1] !== 0x21) {
    return 0;
  }
  const newline = bytes.indexOf(0x0a);
  return newline < 0 ? bytes.length : newline + 1;
}

function decodeInterpreter(raw: Uint8Array): string {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(raw);
  } catch {
    text = Buffer.from(raw).toString('latin1');
  }
  return text.replace(/\r$/, '').trim();
}

/**
 * The bytes the zip reader should see. Archives written by other tools may
 * keep their offsets relative to the zip data behind the shebang.
 */
function zipData(bytes: Uint8Array): Uint8Array {
  const prefix = shebangLength(bytes);
  if (prefix === 0) return bytes;

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const eocd = findEndRecord(view);
  if (eocd < 0) return bytes;

  const directoryOffset = view.getUint32(eocd + 16, true);
  const absolute =
    directoryOffset + 4 <= bytes.length && view.getUint32(directoryOffset, true) === CENTRAL_HEADER_SIGNATURE;
  return absolute ? bytes : bytes.subarray(prefix);
}

function openZip(bytes: Uint8Array, archivePath: string): Record<string, Uint8Array> {
  try {
    return unzipSync(zipData(bytes));
  } catch (error) {
    throw new BuildError('Not a readable zip archive', archivePath, { cause: error });
  }
}

async function readArchiveBytes(archivePath: string): Promise<Uint8Array> {
  try {
    return await fs.readFile(archivePath);
  } catch (error) {
    throw new BuildError('Cannot read archive', archivePath, { cause: error });
  }
}

export function interpreterOf(bytes: Uint8Array): string | null {
  const length = shebangLength(bytes);
  if (length === 0) return null;
  return decodeInterpreter(bytes.subarray(2, length));
}

export async function readInterpreter(archivePath: string): Promise<string | null> {
  return interpreterOf(await readArchiveBytes(archivePath));
}

/** Archive paths of the files inside an archive, sorted. */
export async function listArchive(archivePath: string): Promise<string[]> {
  const files = openZip(await readArchiveBytes(archivePath), archivePath);
  return Object.keys(files)
    .filter((name) => !name.endsWith('/'))
    .sort(compareArchivePaths);
}

export async function readArchiveInfo(archivePath: string): Promise<ArchiveInfo> {
  const bytes = await readArchiveBytes(archivePath);
  const files = openZip(bytes, archivePath);
  const pkgInfo = files[PKG_INFO_NAME];

  return {
    interpreter: interpreterOf(bytes),
    metadata: pkgInfo ? parsePkgInfo(strFromU8(pkgInfo)) : null,
    entries: Object.keys(files)
      .filter((name) => !name.endsWith('/'))
      .sort(compareArchivePaths),
  };
}

/** Unpacks an archive into a fresh temporary directory and returns its path. */
export async function extractArchive(archivePath: string): Promise<string> {
  const files = openZip(await readArchiveBytes(archivePath), archivePath);
  const target = await fs.mkdtemp(path.join(os.tmpdir(), `${TOOL_NAME}-`));

  for (const name of Object.keys(files).sort(compareArchivePaths)) {
    if (name.endsWith('/')) continue;
    const safeName = normalizeArchivePath(name);
    if (safeName === null) {
      throw new BuildError(`Archive entry "${name}" escapes the extraction directory`, archivePath);
    }
    const destination = path.join(target, ...safeName.split('/'));
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.writeFile(destination, files[name]);
  }

  Logger.debug(`Extracted ${archivePath} to ${target}`);
  return target;
}
