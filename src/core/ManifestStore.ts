import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { BuildManifest } from '../types/state';
import { MANIFEST_DIR } from '../utils/constants';
import { isErrnoException } from '../utils/errors';
import { writeFileAtomic } from '../utils/files';
import { Logger } from '../utils/Logger';
import { sha256Hex } from '../utils/paths';

const manifestSchema = z.object({
  version: z.literal(1),
  files: z.record(z.object({ fingerprint: z.string(), size: z.number().int().nonnegative() })),
  configFingerprint: z.string(),
  outputPath: z.string(),
  buildEpoch: z.number().nullable(),
});

/** Build manifests, one per output path, under the project's cache directory. */
export class ManifestStore {
  constructor(private readonly projectRoot: string) {}

  public manifestPath(outputPath: string): string {
    const key = sha256Hex(path.resolve(outputPath)).slice(0, 16);
    return path.join(this.projectRoot, MANIFEST_DIR, `${key}.json`);
  }

  /** The stored manifest, or null when there is none or it cannot be read. */
  public async load(outputPath: string): Promise<BuildManifest | null> {
    const manifestPath = this.manifestPath(outputPath);
    let raw: string;
    try {
      raw = await fs.readFile(manifestPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      Logger.warn(`Ignoring unreadable build manifest ${manifestPath}`);
      return null;
    }

    const parsed = manifestSchema.safeParse(data);
    if (!parsed.success) {
      Logger.warn(`Ignoring invalid build manifest ${manifestPath}`);
      return null;
    }
    return parsed.data;
  }

  public async save(manifest: BuildManifest): Promise<void> {
    const manifestPath = this.manifestPath(manifest.outputPath);
    await writeFileAtomic(manifestPath, JSON.stringify(manifest, null, 2) + '\n');
    Logger.debug(`Saved build manifest ${manifestPath}`);
  }
}
