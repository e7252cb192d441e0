import { beforeEach, describe, expect, test } from 'vitest';
import { ConfigResolver } from '../src/core/ConfigResolver';
import { Watcher, WatchSeams } from '../src/core/Watcher';
import { ResolvedConfig } from '../src/types/config';
import { BuildResult, WatcherState } from '../src/types/state';
import { captureLogs, makeProject, removeProject, resolveFor } from './helpers';

const CONFIG = new ConfigResolver('/tmp/project').fold([['cli', { include: [{ source: '.', dest: null }] }]]);

function resultFor(config: ResolvedConfig): BuildResult {
  return {
    outputPath: config.outputPath,
    fileCount: 1,
    sizeBytes: 100,
    durationMs: 1,
    skipped: false,
    dryRun: false,
    reason: 'forced',
  };
}

interface Counters {
  states: WatcherState[];
  sleeps: number[];
  builds: number;
}

interface Harness extends Counters {
  watcher: Watcher;
}

/** Watcher over scripted scan signatures; stops after `stopAfterBuilds` builds. */
function harness(signatures: string[], stopAfterBuilds: number, overrides: Partial<WatchSeams> = {}): Harness {
  const counters: Counters = { states: [], sleeps: [], builds: 0 };
  let scans = 0;

  const seams: WatchSeams = {
    scan: async () => {
      const signature = signatures[Math.min(scans, signatures.length - 1)];
      scans++;
      return { config: CONFIG, signature };
    },
    build: async (config) => {
      counters.builds++;
      return resultFor(config);
    },
    sleep: async (ms) => {
      counters.sleeps.push(ms);
    },
    ...overrides,
  };

  const watcher = new Watcher(async () => CONFIG, seams);
  watcher.onStateChange((value) => counters.states.push(value));
  const stopWhenDone = () => {
    if (counters.builds >= stopAfterBuilds) watcher.stop();
  };
  watcher.onBuildFinished(stopWhenDone);
  watcher.onBuildFailed(stopWhenDone);

  return Object.assign(counters, { watcher });
}

describe('Watcher', () => {
  beforeEach(() => {
    captureLogs();
  });

  test('should build once at start and once per settled change', async () => {
    const run = harness(['a', 'a', 'b', 'c', 'c'], 2);

    await run.watcher.start();

    expect(run.builds).toBe(2);
    expect(run.sleeps).toEqual([1000, 1000, 500, 500]);
    expect(run.states).toEqual([
      WatcherState.Scanning,
      WatcherState.Building,
      WatcherState.Idle,
      WatcherState.Scanning,
      WatcherState.Idle,
      WatcherState.Scanning,
      WatcherState.Debouncing,
      WatcherState.Scanning,
      WatcherState.Debouncing,
      WatcherState.Scanning,
      WatcherState.Building,
      WatcherState.Idle,
    ]);
    expect(run.watcher.state).toBe(WatcherState.Idle);
    expect(run.watcher.currentResult?.outputPath).toBe(CONFIG.outputPath);
  });

  test('should keep watching after a failed build', async () => {
    const failures: string[] = [];
    let attempts = 0;
    const run = harness(['a', 'b', 'b'], 2, {
      build: async (config) => {
        attempts++;
        run.builds = attempts;
        if (attempts === 1) throw new Error('disk full');
        return resultFor(config);
      },
    });
    run.watcher.onBuildFailed((error) => failures.push(error.message));

    await run.watcher.start();

    expect(failures).toEqual(['disk full']);
    expect(attempts).toBe(2);
    expect(run.watcher.currentResult?.reason).toBe('forced');
  });

  test('should report scan failures and retry on the next tick', async () => {
    const failures: string[] = [];
    let scans = 0;
    const run = harness([], 1, {
      scan: async () => {
        scans++;
        if (scans === 1) throw new Error('config unreadable');
        return { config: CONFIG, signature: 'a' };
      },
    });
    run.watcher.onBuildFailed((error) => failures.push(error.message));

    await run.watcher.start();

    expect(failures).toEqual(['config unreadable']);
    // Failed initial scan, then a change scan and one debounce scan
    expect(scans).toBe(3);
    expect(run.builds).toBe(1);
  });

  test('should stop after the initial build when the signal is already aborted', async () => {
    const run = harness(['a'], 99);
    const controller = new AbortController();
    controller.abort();

    await run.watcher.start(controller.signal);

    expect(run.builds).toBe(1);
    expect(run.sleeps).toEqual([]);
  });

  test('should refuse to start twice', async () => {
    const run = harness(['a'], 1);
    const first = run.watcher.start();

    await expect(run.watcher.start()).rejects.toThrow('Watcher is already running');
    await first;
  });

  test('should warn about an unmatched include on the first scan only', async () => {
    const logs = captureLogs();
    const root = await makeProject({ 'src/app.py': 'X = 1\n' });
    try {
      const config = await resolveFor(root, { include: ['src', 'missing'], output: 'dist/app.pyz' });
      let sleeps = 0;
      const watcher: Watcher = new Watcher(async () => config, {
        build: async (resolved) => resultFor(resolved),
        sleep: async () => {
          if (++sleeps === 2) watcher.stop();
        },
      });

      await watcher.start();

      const message = 'Include "missing" does not match anything';
      expect(logs.filter((line) => line.endsWith(`[WARN] ${message}`))).toHaveLength(1);
      expect(logs.filter((line) => line.endsWith(`[DEBUG] ${message}`))).toHaveLength(1);
    } finally {
      await removeProject(root);
    }
  });
});
