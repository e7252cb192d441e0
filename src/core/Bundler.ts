import { ResolvedConfig } from '../types/config';
import { BuildDecision, BuildResult, FileSet } from '../types/state';
import { FilesystemRaceError } from '../utils/errors';
import { pathExists } from '../utils/files';
import { Logger } from '../utils/Logger';
import { ArchiveAssembler } from './ArchiveAssembler';
import { createManifest, decide } from './IncrementalPlanner';
import { ManifestStore } from './ManifestStore';
import { PathFilter } from './PathFilter';

export interface BuildOptions {
  dryRun?: boolean;
  force?: boolean;
  /** Clock for the build timestamp; defaults to now. */
  now?: Date;
}

/**
 * One build from a resolved config: collect, plan, assemble, write. The
 * watch loop and the CLI both go through here.
 */
export class Bundler {
  private readonly manifests: ManifestStore;

  constructor(private readonly config: ResolvedConfig) {
    this.manifests = new ManifestStore(config.projectRoot);
  }

  public async collect(): Promise<FileSet> {
    return new PathFilter(this.config).collect();
  }

  public async build(options: BuildOptions = {}): Promise<BuildResult> {
    try {
      return await this.attempt(options);
    } catch (error) {
      if (!(error instanceof FilesystemRaceError)) {
        throw error;
      }
      // A source vanished mid-build: collect again and retry once
      Logger.warn(`${error.describe()}; collecting files again`);
      return this.attempt(options);
    }
  }

  private async attempt(options: BuildOptions): Promise<BuildResult> {
    const startTime = Date.now();
    const { config } = this;

    const fileSet = await this.collect();
    Logger.info(`Resolved ${fileSet.length} files. Planning build...`);

    const manifest = await this.manifests.load(config.outputPath);
    const decision = await decide(fileSet, config, manifest, {
      force: options.force,
      outputExists: await pathExists(config.outputPath),
    });

    if (!decision.rebuild) {
      Logger.info(`Skipping build: ${decision.reason}`);
      return this.result(fileSet, decision, startTime, { skipped: true, sizeBytes: 0 });
    }

    Logger.info(`Rebuilding: ${decision.reason}`);
    const assembler = new ArchiveAssembler(config);
    const now = options.now ?? new Date();
    const archive = await assembler.assemble(fileSet, { now });

    if (options.dryRun) {
      Logger.info(`(dry run) Would write ${archive.entries.length} entries to ${config.outputPath}`);
      return this.result(fileSet, decision, startTime, { dryRun: true, sizeBytes: archive.bytes.length });
    }

    const sizeBytes = await assembler.write(archive);
    await this.manifests.save(createManifest(decision, config, config.disableBuildTimestamp ? null : now.getTime()));

    Logger.debug(`Wrote ${config.outputPath} (${archive.entries.length} entries, ${(sizeBytes / 1024).toFixed(1)} KB)`);
    return this.result(fileSet, decision, startTime, { sizeBytes });
  }

  private result(
    fileSet: FileSet,
    decision: BuildDecision,
    startTime: number,
    extra: { sizeBytes: number; skipped?: boolean; dryRun?: boolean },
  ): BuildResult {
    return {
      outputPath: this.config.outputPath,
      fileCount: fileSet.length,
      sizeBytes: extra.sizeBytes,
      durationMs: Date.now() - startTime,
      skipped: extra.skipped ?? false,
      dryRun: extra.dryRun ?? false,
      reason: decision.reason,
    };
  }
}
