// @grantgraph/runtime
// Permission queries, mutations and the AccessManager facade

// Access manager
export {
  AccessManager,
  createAccessManager,
  createStringAccessManager,
  type AccessManagerOptions,
} from './manager.js';

// Configuration
export {
  resolveConfig,
  type AccessManagerConfig,
  type ResolvedAccessManagerConfig,
} from './config.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type AccessLogger,
  type LogEntry,
  type LogLevel,
} from './logging.js';

// Error types
export {
  AccessGraphError,
  DuplicateElementError,
  NotFoundError,
  InvalidReferenceError,
  ValidationError,
  ConcurrentAccessError,
} from '@grantgraph/protocol';

// Subjects and codecs, for convenience
export {
  asUser,
  asGroup,
  stringCodec,
  stringCodecs,
  numberCodec,
  createEnumCodec,
  type Subject,
  type KeyCodec,
  type AccessGraphCodecs,
  type ComponentAccess,
  type EntityRef,
  type AccessGraphSnapshot,
} from '@grantgraph/protocol';

// Queries
export * from './query/index.js';

// Mutations
export * from './mutation/index.js';

// Concurrency
export { ReadWriteGuard } from './concurrency/guard.js';

// Snapshots
export * from './snapshot/index.js';
