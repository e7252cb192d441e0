export * from './types/config';
export * from './types/state';
export * from './utils/errors';
export { Logger } from './utils/Logger';
export type { LogLevel, LogSink } from './utils/Logger';
export { ConfigResolver, parseEntryPoint, formatEntryPoint, parseInclude } from './core/ConfigResolver';
export { PathFilter } from './core/PathFilter';
export { configFingerprint, createManifest, decide, fingerprintFiles } from './core/IncrementalPlanner';
export { ManifestStore } from './core/ManifestStore';
export {
  ArchiveAssembler,
  extractArchive,
  generateMainModule,
  generatePkgInfo,
  listArchive,
  readArchiveInfo,
  readInterpreter,
  resolveCompression,
} from './core/ArchiveAssembler';
export type { AssembledArchive, ArchiveInfo } from './core/ArchiveAssembler';
export { Bundler } from './core/Bundler';
export type { BuildOptions } from './core/Bundler';
export { Watcher } from './core/Watcher';
export type { WatchSeams, WatchSnapshot } from './core/Watcher';
export { runCli } from './cli/Commands';
