import * as fs from 'fs/promises';
import * as path from 'path';

export async function pathExists(target: string): Promise<boolean> {
  const stats = await fs.stat(target).catch(() => null);
  return stats !== null;
}

/**
 * Writes `data` next to `target` under a temporary name, then renames it
 * into place. Readers see either the old file or the new one.
 */
export async function writeFileAtomic(target: string, data: Uint8Array | string, mode?: number): Promise<void> {
  const dir = path.dirname(target);
  await fs.mkdir(dir, { recursive: true });
  const tempPath = path.join(dir, `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`);

  try {
    await fs.writeFile(tempPath, data);
    if (mode !== undefined) {
      await fs.chmod(tempPath, mode);
    }
    await fs.rename(tempPath, target);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
