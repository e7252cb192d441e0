import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigResolver } from '../src/core/ConfigResolver';
import { CliOverrides, ResolvedConfig, ResolveOptions } from '../src/types/config';
import { Logger } from '../src/utils/Logger';

/** Creates a throwaway project directory holding `files` (relative path → content). */
export async function makeProject(files: Record<string, string>): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'zipcraft-test-'));
  await writeFiles(root, files);
  return root;
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const target = path.join(root, rel);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf-8');
  }
}

export async function removeProject(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true });
}

export async function resolveFor(
  root: string,
  cli: CliOverrides = {},
  options: Omit<ResolveOptions, 'projectRoot' | 'cli'> = {},
): Promise<ResolvedConfig> {
  const outcome = await new ConfigResolver(root).resolve({ env: {}, ...options, cli });
  return outcome.config;
}

/** Routes log output into an array for the duration of a test. */
export function captureLogs(): string[] {
  const lines: string[] = [];
  Logger.activate({ level: 'debug', sink: (line) => lines.push(line) });
  return lines;
}
