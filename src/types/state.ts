export enum WatcherState {
  Idle = 'Idle', // Sleeping until the next poll
  Scanning = 'Scanning', // Re-resolving config and file set
  Debouncing = 'Debouncing', // Change seen, waiting for the burst to settle
  Building = 'Building', // Planning and writing the archive
}

export interface FileEntry {
  readonly sourcePath: string;
  readonly archivePath: string;
  readonly isDirectoryMember: boolean;
}

export type FileSet = readonly FileEntry[];

export interface FileFingerprint {
  fingerprint: string;
  size: number;
}

export interface BuildManifest {
  version: 1;
  files: Record<string, FileFingerprint>;
  configFingerprint: string;
  outputPath: string;
  buildEpoch: number | null;
}

export interface BuildDecision {
  rebuild: boolean;
  reason: string;
  fingerprints: Map<string, FileFingerprint>;
}

export interface BuildResult {
  outputPath: string;
  fileCount: number;
  sizeBytes: number;
  durationMs: number;
  skipped: boolean;
  dryRun: boolean;
  reason: string;
}
