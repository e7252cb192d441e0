import * as fs from 'fs/promises';
import { FingerprintMode, ResolvedConfig } from '../types/config';
import { BuildDecision, BuildManifest, FileFingerprint, FileSet } from '../types/state';
import { FilesystemRaceError, isErrnoException } from '../utils/errors';
import { sha256Hex, stableStringify } from '../utils/paths';
import { formatEntryPoint } from './ConfigResolver';

export const MANIFEST_VERSION = 1;

export interface DecideOptions {
  force?: boolean;
  outputExists: boolean;
}

async function fingerprintOne(sourcePath: string, mode: FingerprintMode): Promise<FileFingerprint> {
  try {
    if (mode === 'mtime') {
      const stats = await fs.stat(sourcePath);
      return { fingerprint: `mtime:${Math.trunc(stats.mtimeMs)}`, size: stats.size };
    }
    const content = await fs.readFile(sourcePath);
    return { fingerprint: `sha256:${sha256Hex(content)}`, size: content.length };
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new FilesystemRaceError(sourcePath, { cause: error });
    }
    throw error;
  }
}

/** Fingerprints keyed by archive path, in FileSet order. */
export async function fingerprintFiles(fileSet: FileSet, mode: FingerprintMode): Promise<Map<string, FileFingerprint>> {
  const fingerprints = new Map<string, FileFingerprint>();
  for (const entry of fileSet) {
    fingerprints.set(entry.archivePath, await fingerprintOne(entry.sourcePath, mode));
  }
  return fingerprints;
}

/** Hash of every setting that changes the archive bytes. */
export function configFingerprint(config: ResolvedConfig): string {
  const relevant = {
    outputPath: config.outputPath,
    entryPoint: config.entryPoint ? formatEntryPoint(config.entryPoint) : null,
    interpreter: config.interpreter,
    insertMainGuard: config.insertMainGuard,
    mainMode: config.mainMode,
    compress: config.compress,
    compressionMethod: config.compressionMethod,
    compressionLevel: config.compressionLevel,
    disableBuildTimestamp: config.disableBuildTimestamp,
    metadata: { ...config.metadata },
  };
  return `sha256:${sha256Hex(stableStringify(relevant))}`;
}

function describeFileSetChange(previous: Record<string, FileFingerprint>, current: Map<string, FileFingerprint>): string | null {
  const added = [...current.keys()].filter((p) => !Object.hasOwn(previous, p));
  const removed = Object.keys(previous).filter((p) => !current.has(p));
  if (added.length === 0 && removed.length === 0) {
    return null;
  }
  const parts: string[] = [];
  if (added.length > 0) parts.push(`${added.length} added`);
  if (removed.length > 0) parts.push(`${removed.length} removed`);
  return `file set changed (${parts.join(', ')})`;
}

/**
 * Decides whether the archive must be rebuilt. Reasons are checked in a
 * fixed order and the first that applies is reported.
 */
export async function decide(
  fileSet: FileSet,
  config: ResolvedConfig,
  manifest: BuildManifest | null,
  options: DecideOptions,
): Promise<BuildDecision> {
  const fingerprints = await fingerprintFiles(fileSet, config.fingerprintMode);
  const rebuild = (reason: string): BuildDecision => ({ rebuild: true, reason, fingerprints });

  if (options.force) return rebuild('forced');
  if (!manifest) return rebuild('no previous build manifest');
  if (!options.outputExists) return rebuild('output missing');
  if (manifest.outputPath !== config.outputPath) return rebuild('output path changed');
  if (manifest.configFingerprint !== configFingerprint(config)) return rebuild('configuration changed');

  const setChange = describeFileSetChange(manifest.files, fingerprints);
  if (setChange) return rebuild(setChange);

  for (const [archivePath, current] of fingerprints) {
    const previous = manifest.files[archivePath];
    if (previous.fingerprint !== current.fingerprint || previous.size !== current.size) {
      return rebuild(`file changed: ${archivePath}`);
    }
  }

  return { rebuild: false, reason: 'up to date', fingerprints };
}

export function createManifest(decision: BuildDecision, config: ResolvedConfig, epoch: number | null): BuildManifest {
  return {
    version: MANIFEST_VERSION,
    files: Object.fromEntries(decision.fingerprints),
    configFingerprint: configFingerprint(config),
    outputPath: config.outputPath,
    buildEpoch: epoch,
  };
}
