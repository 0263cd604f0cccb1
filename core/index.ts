/**
 * drivepath core - path resolution and mutation over a flat object store
 *
 * Everything here is transport-agnostic: the engine talks to a
 * {@link RemoteStore} and never to HTTP directly. Concrete stores live in
 * `storage/`.
 *
 * @example
 * ```typescript
 * import { DrivePath, MemoryStore } from 'drivepath'
 *
 * const drive = new DrivePath({ store: new MemoryStore() })
 * await drive.mkdir('a/b', { recursive: true })
 * await drive.insert('a/b/hello.txt', 'Hello, World!')
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Facade
// =============================================================================

export { DrivePath, type DrivePathOptions } from './drive-path.js'
export type { MkdirOptions } from './fs/mkdir.js'
export type { InsertOptions, InsertFileOptions } from './fs/insert.js'

// =============================================================================
// Data model
// =============================================================================

export type {
  RemoteObject,
  ChildReference,
  ChildListPage,
  ObjectContent,
  InsertObjectInput,
  ObjectPatch,
  RemoteStore,
  RemoteStoreOperation,
} from './types.js'

export {
  isDir,
  createDate,
  modifiedDate,
  formatModifiedDate,
  parseRfc3339,
  truncateToSecond,
} from './object-info.js'

// =============================================================================
// Paths and queries
// =============================================================================

export {
  sep,
  ROOT_PATH,
  type SplitPath,
  splitPath,
  joinPath,
  canonicalPath,
  isRootPath,
  isSameOrDescendant,
  escapeQuotes,
} from './path.js'

export {
  type QueryOperator,
  type QueryTerm,
  type QueryCandidate,
  buildQuery,
  childQuery,
  formatTerm,
  titleIs,
  notTrashed,
  isFolder,
  isNotFolder,
  parseQuery,
  matchesQuery,
} from './query.js'

// =============================================================================
// Errors
// =============================================================================

export {
  type ErrorCode,
  type ErrorKind,
  type ErrorDetails,
  type RemoteErrorOptions,
  DrivePathError,
  ENOENT,
  EDUPLICATE,
  ENOTDIR,
  EISDIR,
  EINVAL,
  RemoteError,
  isDrivePathError,
  isObjectNotFound,
  isDuplicateObject,
  isTypeMismatch,
  isInvalidInput,
  isRemoteError,
  isTransient,
  classifyError,
  getErrorMessage,
  ALL_ERROR_CODES,
} from './errors.js'

// =============================================================================
// Configuration, caching and retries
// =============================================================================

export {
  type RetryConfig,
  type DrivePathConfig,
  type DrivePathConfigOptions,
  defaultConfig,
  createConfig,
  configFromEnv,
} from './config.js'

export { ObjectCache, type ObjectCacheOptions } from './object-cache.js'

export {
  type BackoffPolicy,
  type RetryPredicate,
  type RetryOptions,
  linearBackoff,
  exponentialBackoff,
  noBackoff,
  isRetryableError,
  withRetry,
} from './retry.js'

export { FOLDER_MIME_TYPE, DEFAULT_MIME_TYPE, ROOT_ID, DEFAULT_LIST_QUERY } from './constants.js'
