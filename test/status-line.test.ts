import { beforeEach, describe, expect, test } from 'vitest';
import { StatusLine } from '../src/cli/StatusLine';
import { ConfigResolver } from '../src/core/ConfigResolver';
import { Watcher } from '../src/core/Watcher';
import { captureLogs } from './helpers';

const CONFIG = new ConfigResolver('/tmp/project').fold([['cli', { include: [{ source: '.', dest: null }] }]]);

function messages(lines: string[]): string[] {
  return lines.map((line) => line.replace(/^\[[^\]]*\] /, ''));
}

describe('StatusLine', () => {
  let logs: string[];

  beforeEach(() => {
    logs = captureLogs();
  });

  test('should log each state change and the build outcome', async () => {
    const watcher = new Watcher(async () => CONFIG, {
      scan: async () => ({ config: CONFIG, signature: 'a' }),
      build: async (config) => ({
        outputPath: config.outputPath,
        fileCount: 3,
        sizeBytes: 2048,
        durationMs: 12,
        skipped: false,
        dryRun: false,
        reason: 'no previous build manifest',
      }),
      sleep: async () => undefined,
    });
    const status = new StatusLine(watcher);
    watcher.onBuildFinished(() => watcher.stop());

    await watcher.start();
    status.dispose();

    expect(messages(logs)).toEqual([
      '[DEBUG] Scanning for changes...',
      '[INFO] Building...',
      '[INFO] Built bundle.pyz: 3 files, 2.0 KB in 12 ms',
      '[INFO] Stopping watcher...',
      '[DEBUG] Watching (3 files)',
    ]);
  });

  test('should warn when a build fails', async () => {
    const watcher = new Watcher(async () => CONFIG, {
      scan: async () => ({ config: CONFIG, signature: 'a' }),
      build: async () => {
        throw new Error('disk full');
      },
      sleep: async () => undefined,
    });
    const status = new StatusLine(watcher);
    watcher.onBuildFailed(() => watcher.stop());

    await watcher.start();
    status.dispose();

    expect(messages(logs)).toContain('[WARN] Last build failed: disk full');
  });
});
