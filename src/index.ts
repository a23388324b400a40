export {
  syncTrees,
  validateRoots,
  type SyncOptions,
  type SyncResult,
} from "./sync.js";

export {
  scanTree,
  buildTreeIndex,
  type Entry,
  type TreeIndex,
  type ScanOptions,
} from "./scan.js";

export {
  diffTrees,
  type DiffResult,
  type DiffOptions,
  type ComparisonFailure,
} from "./diff.js";

export {
  applyDiff,
  blockingDeletes,
  summarizeResults,
  type ApplyOptions,
  type ApplyReport,
  type EntryResult,
  type EntryOutcome,
  type ActionKind,
} from "./apply.js";

export { compareEntries, sortChildFirst, sortParentFirst } from "./order.js";

export {
  fileDigest,
  normalizeHashAlg,
  defaultHashAlg,
  HASH_ALGOS,
  type HashAlg,
} from "./hash.js";

export {
  resolveSyncConfig,
  APPLY_ORDERS,
  type ApplyOrder,
  type SyncConfig,
  type SyncConfigInput,
} from "./config.js";

export {
  SyncError,
  ConfigError,
  ScanError,
  ComparisonError,
  ApplyError,
  ExitCodes,
  type ExitCode,
} from "./errors.js";

export { formatReport, writeReport, formatSummary } from "./report.js";

export { parallelMapLimit, defaultConcurrency } from "./pool.js";

export {
  ConsoleLogger,
  ScopedLogger,
  NullLogger,
  formatLogLine,
  parseLogLevel,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogMeta,
  type LogSink,
} from "./logger.js";
