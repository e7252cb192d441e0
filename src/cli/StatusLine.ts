import * as path from 'path';
import { Watcher } from '../core/Watcher';
import { BuildResult, WatcherState } from '../types/state';
import { Disposable } from '../utils/Emitter';
import { describeError } from '../utils/errors';
import { Logger } from '../utils/Logger';

/** Terminal status for the watch command, one log line per state change. */
export class StatusLine implements Disposable {
  private readonly subscriptions: Disposable[] = [];

  constructor(private readonly watcher: Watcher) {
    this.subscriptions.push(
      watcher.onStateChange((state) => this.update(state)),
      watcher.onBuildFinished((result) => this.reportBuild(result)),
      watcher.onBuildFailed((error) => Logger.warn(`Last build failed: ${describeError(error)}`)),
    );
  }

  public update(state: WatcherState): void {
    switch (state) {
      case WatcherState.Idle: {
        const result = this.watcher.currentResult;
        const countStr = result ? `${result.fileCount} files` : 'Ready';
        Logger.debug(`Watching (${countStr})`);
        break;
      }

      case WatcherState.Scanning:
        Logger.debug('Scanning for changes...');
        break;

      case WatcherState.Debouncing:
        Logger.info('Change detected, waiting for files to settle...');
        break;

      case WatcherState.Building:
        Logger.info('Building...');
        break;
    }
  }

  private reportBuild(result: BuildResult): void {
    const name = path.basename(result.outputPath);
    if (result.skipped) {
      Logger.info(`${name} is up to date (${result.fileCount} files)`);
      return;
    }
    Logger.info(`Built ${name}: ${result.fileCount} files, ${(result.sizeBytes / 1024).toFixed(1)} KB in ${result.durationMs} ms`);
  }

  public dispose(): void {
    for (const subscription of this.subscriptions) {
      subscription.dispose();
    }
  }
}
