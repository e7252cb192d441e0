import * as fs from 'fs/promises';
import { setTimeout as delay } from 'timers/promises';
import { ResolvedConfig } from '../types/config';
import { BuildResult, FileSet, WatcherState } from '../types/state';
import { DEFAULT_WATCH_INTERVAL_MS } from '../utils/constants';
import { Disposable, Emitter } from '../utils/Emitter';
import { describeError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { sha256Hex } from '../utils/paths';
import { Bundler } from './Bundler';
import { configFingerprint } from './IncrementalPlanner';
import { PathFilter } from './PathFilter';

export interface WatchSnapshot {
  config: ResolvedConfig;
  /** Changes whenever the config or any file's path, mtime or size does. */
  signature: string;
}

export interface WatchSeams {
  scan(): Promise<WatchSnapshot>;
  build(config: ResolvedConfig): Promise<BuildResult>;
  sleep(ms: number, signal: AbortSignal): Promise<void>;
}

export async function snapshotSignature(config: ResolvedConfig, fileSet: FileSet): Promise<string> {
  const lines = [configFingerprint(config)];
  for (const entry of fileSet) {
    const stats = await fs.stat(entry.sourcePath).catch(() => null);
    const state = stats ? `${stats.mtimeMs}:${stats.size}` : 'missing';
    lines.push(`${entry.archivePath}\0${entry.sourcePath}\0${state}`);
  }
  return sha256Hex(lines.join('\n'));
}

async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) throw error;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Polling rebuild loop. Each tick re-resolves the config and the file set;
 * a change is debounced until two consecutive scans agree, then built once.
 */
export class Watcher implements Disposable {
  private _state: WatcherState = WatcherState.Idle;
  private controller: AbortController | null = null;
  private running = false;
  private lastResult: BuildResult | null = null;

  private readonly seams: WatchSeams;

  private readonly _onStateChange = new Emitter<WatcherState>();
  public readonly onStateChange = this._onStateChange.event;

  private readonly _onBuildFinished = new Emitter<BuildResult>();
  public readonly onBuildFinished = this._onBuildFinished.event;

  private readonly _onBuildFailed = new Emitter<Error>();
  public readonly onBuildFailed = this._onBuildFailed.event;

  constructor(resolveConfig: () => Promise<ResolvedConfig>, seams: Partial<WatchSeams> = {}) {
    let scans = 0;
    this.seams = {
      scan:
        seams.scan ??
        (async () => {
          const config = await resolveConfig();
          // Only the first scan warns
          const fileSet = await new PathFilter(config, { quiet: scans++ > 0 }).collect();
          return { config, signature: await snapshotSignature(config, fileSet) };
        }),
      build: seams.build ?? ((config) => new Bundler(config).build()),
      sleep: seams.sleep ?? abortableSleep,
    };
  }

  public get state(): WatcherState {
    return this._state;
  }

  public get currentResult(): BuildResult | null {
    return this.lastResult;
  }

  /** Runs until `stop()` is called or `signal` aborts. */
  public async start(signal?: AbortSignal): Promise<void> {
    if (this.running) {
      throw new Error('Watcher is already running');
    }
    this.running = true;
    const controller = new AbortController();
    this.controller = controller;
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort);
    if (signal?.aborted) controller.abort();

    try {
      await this.loop(controller.signal);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.controller = null;
      this.running = false;
      this.setState(WatcherState.Idle);
    }
  }

  public stop(): void {
    if (this.controller && !this.controller.signal.aborted) {
      Logger.info('Stopping watcher...');
      this.controller.abort();
    }
  }

  public dispose(): void {
    this.stop();
    this._onStateChange.dispose();
    this._onBuildFinished.dispose();
    this._onBuildFailed.dispose();
  }

  private async loop(signal: AbortSignal): Promise<void> {
    // Initial build
    this.setState(WatcherState.Scanning);
    let previous = await this.scan();
    if (previous) {
      await this.build(previous.config);
    }

    while (true) {
      this.setState(WatcherState.Idle);
      if (signal.aborted) return;

      await this.seams.sleep(previous?.config.watchIntervalMs ?? DEFAULT_WATCH_INTERVAL_MS, signal);
      if (signal.aborted) return;

      this.setState(WatcherState.Scanning);
      const current = await this.scan();
      if (!current) continue;
      if (previous && current.signature === previous.signature) {
        previous = current;
        continue;
      }

      const settled = await this.debounce(current, signal);
      if (signal.aborted) return;
      if (!settled) continue;

      previous = settled;
      await this.build(settled.config);
    }
  }

  /** Rescans until the snapshot stops changing; null when a scan fails. */
  private async debounce(first: WatchSnapshot, signal: AbortSignal): Promise<WatchSnapshot | null> {
    let settled = first;
    while (!signal.aborted) {
      this.setState(WatcherState.Debouncing);
      await this.seams.sleep(settled.config.watchDebounceMs, signal);
      if (signal.aborted) break;

      this.setState(WatcherState.Scanning);
      const next = await this.scan();
      if (!next) return null;
      if (next.signature === settled.signature) break;
      settled = next;
    }
    return settled;
  }

  private async scan(): Promise<WatchSnapshot | null> {
    try {
      return await this.seams.scan();
    } catch (error) {
      Logger.error(`Scan failed: ${describeError(error)}`, error);
      this._onBuildFailed.fire(toError(error));
      return null;
    }
  }

  private async build(config: ResolvedConfig): Promise<void> {
    this.setState(WatcherState.Building);
    try {
      const result = await this.seams.build(config);
      this.lastResult = result;
      this._onBuildFinished.fire(result);
    } catch (error) {
      Logger.error(`Build failed: ${describeError(error)}`, error);
      this._onBuildFailed.fire(toError(error));
    }
  }

  private setState(newState: WatcherState) {
    if (this._state !== newState) {
      this._state = newState;
      this._onStateChange.fire(newState);
    }
  }
}
