import * as fs from 'fs/promises';
import * as path from 'path';
import fg from 'fast-glob';
import * as mm from 'micromatch';
import ignore, { Ignore } from 'ignore';
import { IncludeSpec, ResolvedConfig } from '../types/config';
import { FileEntry, FileSet } from '../types/state';
import { HARDCODED_EXCLUDES } from '../utils/constants';
import { CollisionError, ConfigError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { compareArchivePaths, normalizeArchivePath, relativePosix, toPosix } from '../utils/paths';

interface Candidate {
  /** Project-relative posix path of the source file. */
  relPath: string;
  archivePath: string;
  isDirectoryMember: boolean;
  includeIndex: number;
}

interface ExpandedInclude {
  /** Non-glob base of the include, project-relative ('' for the root). */
  base: string;
  /** Parent of the base: archive paths are measured from here. */
  anchor: string;
  patterns: string[];
  singleFile: boolean;
}

const GITIGNORE = '.gitignore';

function byRelPath(a: Candidate, b: Candidate): number {
  return compareArchivePaths(a.relPath, b.relPath) || a.includeIndex - b.includeIndex;
}

export interface PathFilterOptions {
  /** Log the include and overlay warnings at debug level. */
  quiet?: boolean;
}

/**
 * Turns the include/exclude/gitignore settings of a resolved config into
 * the sorted FileSet the planner and assembler consume.
 */
export class PathFilter {
  private readonly gitIgnoreCache = new Map<string, Ignore | null>();
  private readonly dirDecisionCache = new Map<string, boolean>();

  constructor(
    private readonly config: ResolvedConfig,
    private readonly options: PathFilterOptions = {},
  ) {}

  private warn(message: string): void {
    if (this.options.quiet) {
      Logger.debug(message);
    } else {
      Logger.warn(message);
    }
  }

  public async collect(): Promise<FileSet> {
    // 1. Scan: expand every include, in declaration order
    let candidates = await this.scanIncluded();

    // 2. Filter (Explicit): user excludes plus the baseline set
    candidates = this.applyExclude(candidates);

    // 3. Filter (Git): nested .gitignore files
    if (this.config.respectGitignore) {
      candidates = await this.applyGitIgnore(candidates);
    }

    // 4. Safety: never package the output into itself
    candidates = this.excludeOutputFile(candidates);

    // 5. Dedupe by archive path, first include wins
    const entries = this.dedupe(candidates);

    return Object.freeze(entries.sort((a, b) => compareArchivePaths(a.archivePath, b.archivePath)));
  }

  private async scanIncluded(): Promise<Candidate[]> {
    const candidates: Candidate[] = [];

    for (const [includeIndex, include] of this.config.includes.entries()) {
      const expanded = await this.expandInclude(include);
      if (!expanded) {
        this.warn(`Include "${include.source}" does not match anything`);
        continue;
      }

      const matches = await fg(expanded.patterns, {
        cwd: this.config.projectRoot,
        dot: true,
        onlyFiles: true,
        absolute: false,
        followSymbolicLinks: true,
      });
      // fast-glob order follows the directory walk; sort before anything else sees it
      matches.sort(compareArchivePaths);

      if (matches.length === 0) {
        this.warn(`Include "${include.source}" does not match any files`);
      }

      for (const match of matches) {
        const relPath = toPosix(match);
        candidates.push({
          relPath,
          archivePath: this.archivePathFor(include, expanded, relPath),
          isDirectoryMember: !expanded.singleFile,
          includeIndex,
        });
      }
    }

    return candidates;
  }

  private async expandInclude(include: IncludeSpec): Promise<ExpandedInclude | null> {
    const source = include.source.replace(/^\.\//, '').replace(/\/+$/, '');
    const absolute = path.resolve(this.config.projectRoot, source);
    const relSource = relativePosix(this.config.projectRoot, absolute);
    if (relSource === null) {
      throw new ConfigError(`Include "${include.source}" points outside the project root`, 'include');
    }

    const scan = mm.scan(relSource);
    if (scan.isGlob) {
      const base = scan.base === '.' ? '' : scan.base.replace(/\/+$/, '');
      return { base, anchor: parentOf(base), patterns: [relSource], singleFile: false };
    }

    const stats = await fs.stat(absolute).catch(() => null);
    if (!stats) {
      return null;
    }

    if (stats.isDirectory()) {
      const pattern = relSource === '' ? '**/*' : `${fg.escapePath(relSource)}/**/*`;
      return { base: relSource, anchor: parentOf(relSource), patterns: [pattern], singleFile: false };
    }
    return { base: relSource, anchor: parentOf(relSource), patterns: [fg.escapePath(relSource)], singleFile: true };
  }

  private archivePathFor(include: IncludeSpec, expanded: ExpandedInclude, relPath: string): string {
    let raw: string;
    if (include.dest === null) {
      raw = stripPrefix(relPath, expanded.anchor);
    } else if (expanded.singleFile) {
      raw = include.dest.endsWith('/') ? `${include.dest}${path.posix.basename(relPath)}` : include.dest;
    } else {
      // Directory and glob includes keep their tree below the include's base
      raw = path.posix.join(include.dest, stripPrefix(relPath, expanded.base));
    }

    const archivePath = normalizeArchivePath(raw);
    if (archivePath === null) {
      throw new ConfigError(`Include "${include.source}" maps "${relPath}" outside the archive root`, 'include');
    }
    return archivePath;
  }

  private applyExclude(candidates: Candidate[]): Candidate[] {
    const userExcludes = [...this.config.excludes];
    return candidates.filter((c) => {
      if (mm.isMatch(c.relPath, HARDCODED_EXCLUDES, { dot: true })) return false;
      if (userExcludes.length > 0 && mm.isMatch(c.relPath, userExcludes, { dot: true, basename: true })) {
        Logger.debug(`Excluded ${c.relPath} (exclude pattern)`);
        return false;
      }
      return true;
    });
  }

  private async applyGitIgnore(candidates: Candidate[]): Promise<Candidate[]> {
    const kept: Candidate[] = [];
    for (const candidate of candidates) {
      if (await this.isGitIgnored(candidate.relPath)) {
        Logger.debug(`Excluded ${candidate.relPath} (.gitignore)`);
        continue;
      }
      kept.push(candidate);
    }
    return kept;
  }

  /**
   * Git semantics: a path inside an ignored directory stays ignored, and
   * for the path itself every `.gitignore` from the root down gets a say,
   * deeper files overriding shallower ones.
   */
  public async isGitIgnored(relPath: string): Promise<boolean> {
    const segments = relPath.split('/');
    for (let depth = 1; depth < segments.length; depth++) {
      const dir = segments.slice(0, depth).join('/');
      if (await this.isDirectoryIgnored(dir)) {
        return true;
      }
    }
    return this.evaluateLayers(relPath, false);
  }

  private async isDirectoryIgnored(dir: string): Promise<boolean> {
    const cached = this.dirDecisionCache.get(dir);
    if (cached !== undefined) return cached;
    const decision = await this.evaluateLayers(dir, true);
    this.dirDecisionCache.set(dir, decision);
    return decision;
  }

  private async evaluateLayers(relPath: string, isDir: boolean): Promise<boolean> {
    const segments = relPath.split('/');
    let ignored = false;

    // Layer 0 is the project root; layer n is the directory n segments deep
    for (let depth = 0; depth < segments.length; depth++) {
      const layerDir = segments.slice(0, depth).join('/');
      const matcher = await this.loadGitIgnore(layerDir);
      if (!matcher) continue;

      const local = segments.slice(depth).join('/') + (isDir ? '/' : '');
      const result = matcher.test(local);
      if (result.ignored) {
        ignored = true;
      } else if (result.unignored) {
        ignored = false;
      }
    }
    return ignored;
  }

  private async loadGitIgnore(dir: string): Promise<Ignore | null> {
    if (this.gitIgnoreCache.has(dir)) {
      return this.gitIgnoreCache.get(dir) ?? null;
    }
    const gitIgnorePath = path.join(this.config.projectRoot, dir, GITIGNORE);
    let matcher: Ignore | null = null;
    try {
      const content = await fs.readFile(gitIgnorePath, 'utf-8');
      matcher = ignore().add(content);
    } catch {
      matcher = null; // No .gitignore at this level
    }
    this.gitIgnoreCache.set(dir, matcher);
    return matcher;
  }

  private excludeOutputFile(candidates: Candidate[]): Candidate[] {
    const outputRel = relativePosix(this.config.projectRoot, this.config.outputPath);
    if (outputRel === null) return candidates;
    return candidates.filter((c) => c.relPath !== outputRel);
  }

  private dedupe(candidates: Candidate[]): FileEntry[] {
    // Declaration order first, then path, so "first occurrence" is well defined
    const ordered = [...candidates].sort((a, b) => a.includeIndex - b.includeIndex || byRelPath(a, b));
    const byArchivePath = new Map<string, Candidate>();

    for (const candidate of ordered) {
      const existing = byArchivePath.get(candidate.archivePath);
      if (!existing) {
        byArchivePath.set(candidate.archivePath, candidate);
        continue;
      }
      if (existing.relPath === candidate.relPath) {
        continue;
      }
      if (!this.config.allowOverlay) {
        throw new CollisionError(candidate.archivePath, [existing.relPath, candidate.relPath]);
      }
      this.warn(
        `Archive path "${candidate.archivePath}" already provided by ${existing.relPath}; ignoring ${candidate.relPath}`,
      );
    }

    return Array.from(byArchivePath.values(), (c) => ({
      sourcePath: path.join(this.config.projectRoot, c.relPath),
      archivePath: c.archivePath,
      isDirectoryMember: c.isDirectoryMember,
    }));
  }
}

function stripPrefix(relPath: string, dir: string): string {
  return dir === '' ? relPath : relPath.slice(dir.length + 1);
}

function parentOf(relPath: string): string {
  const parent = path.posix.dirname(relPath);
  return parent === '.' ? '' : parent;
}
