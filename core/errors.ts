/**
 * @fileoverview Error taxonomy for drivepath
 *
 * Every failure surfaced by the path engine is a {@link DrivePathError}. Each
 * error class carries a POSIX-flavoured `code` and a coarse `kind` so callers
 * can branch on what happened without `instanceof` chains:
 *
 * - `NotFound`     - the path does not exist (expected, recoverable)
 * - `Duplicate`    - several siblings share a title; needs human cleanup
 * - `TypeMismatch` - a file where a folder is required, or the reverse
 * - `Invalid`      - blank path, missing argument, bad configuration
 * - `Transient`    - a 5xx-class remote failure that survived every retry
 * - `Other`        - any other remote or foreign failure
 *
 * @example
 * ```typescript
 * import { ENOENT, isObjectNotFound } from 'drivepath'
 *
 * throw new ENOENT('stat', 'docs/report.txt')
 * // ENOENT: no such file or directory, stat 'docs/report.txt'
 *
 * try {
 *   await drive.stat('docs/report.txt')
 * } catch (err) {
 *   if (isObjectNotFound(err)) {
 *     // create it
 *   }
 * }
 * ```
 *
 * @module core/errors
 */

// ============================================================================
// Error Code Definitions
// ============================================================================

/**
 * Classification of a failure, independent of the concrete error class.
 */
export type ErrorKind = 'NotFound' | 'Duplicate' | 'TypeMismatch' | 'Invalid' | 'Transient' | 'Other'

/**
 * Maps each error code to its kind and human-readable description.
 */
const ERROR_CODES = {
  ENOENT: { kind: 'NotFound', message: 'no such file or directory' },
  EDUPLICATE: { kind: 'Duplicate', message: 'more than one object with the same name' },
  ENOTDIR: { kind: 'TypeMismatch', message: 'not a directory' },
  EISDIR: { kind: 'TypeMismatch', message: 'illegal operation on a directory' },
  EINVAL: { kind: 'Invalid', message: 'invalid argument' },
  EREMOTE: { kind: 'Other', message: 'remote call failed' },
} as const satisfies Record<string, { kind: ErrorKind; message: string }>

/**
 * Union type of all drivepath error codes.
 */
export type ErrorCode = keyof typeof ERROR_CODES

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Context attached to an error beyond the code itself.
 */
export interface ErrorDetails {
  /** Operation that failed (e.g., 'stat', 'move') */
  syscall?: string
  /** Source path involved in the operation */
  path?: string
  /** Destination path for move-like operations */
  dest?: string
  /** Free-form detail appended to the message */
  detail?: string
  /** Underlying error */
  cause?: unknown
}

/**
 * Base class for all drivepath errors.
 *
 * Messages follow the Node.js fs convention:
 * `CODE: description, syscall 'path' -> 'dest': detail`
 *
 * @example
 * ```typescript
 * const error = new DrivePathError('ENOENT', { syscall: 'stat', path: 'a/b' })
 * console.log(error.message)  // "ENOENT: no such file or directory, stat 'a/b'"
 * console.log(error.kind)     // "NotFound"
 * ```
 */
export class DrivePathError extends Error {
  /** Error code (e.g., 'ENOENT', 'EDUPLICATE') */
  readonly code: ErrorCode

  /** Coarse classification of the failure */
  readonly kind: ErrorKind

  /** Operation that triggered the error */
  readonly syscall?: string

  /** Source path involved in the operation */
  readonly path?: string

  /** Destination path for move-like operations */
  readonly dest?: string

  /** Free-form detail appended to the message */
  readonly detail?: string

  constructor(code: ErrorCode, details: ErrorDetails = {}, kind: ErrorKind = ERROR_CODES[code].kind) {
    const { syscall, path, dest, detail, cause } = details
    const fullMessage =
      `${code}: ${ERROR_CODES[code].message}` +
      `${syscall ? `, ${syscall}` : ''}` +
      `${path !== undefined ? ` '${path}'` : ''}` +
      `${dest !== undefined ? ` -> '${dest}'` : ''}` +
      `${detail ? `: ${detail}` : ''}`
    super(fullMessage, cause === undefined ? undefined : { cause })
    this.name = 'DrivePathError'
    this.code = code
    this.kind = kind
    this.syscall = syscall
    this.path = path
    this.dest = dest
    this.detail = detail
  }
}

// ============================================================================
// Error Class Factory
// ============================================================================

/**
 * Factory for the path-level error classes, which all share the
 * `(syscall, path, dest?, detail?)` constructor shape.
 *
 * @internal
 */
function createErrorClass<T extends Exclude<ErrorCode, 'EREMOTE'>>(code: T) {
  return class extends DrivePathError {
    constructor(syscall?: string, path?: string, dest?: string, detail?: string) {
      super(code, { syscall, path, dest, detail })
      this.name = code
    }
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

/**
 * ENOENT - the object (or one of its parent folders) does not exist.
 *
 * Expected and recoverable: mkdir and the upload strategies use it to choose
 * between creating and reusing.
 */
export class ENOENT extends createErrorClass('ENOENT') {}

/**
 * EDUPLICATE - more than one non-trashed sibling carries the requested title.
 *
 * The store allows this, Unix paths do not. It is never resolved
 * automatically: someone has to trash or rename one of the siblings.
 */
export class EDUPLICATE extends createErrorClass('EDUPLICATE') {}

/**
 * ENOTDIR - a path component that must be a folder is a file.
 */
export class ENOTDIR extends createErrorClass('ENOTDIR') {}

/**
 * EISDIR - a folder sits where the operation needs a file.
 */
export class EISDIR extends createErrorClass('EISDIR') {}

/**
 * EINVAL - invalid argument (blank path, bad option, malformed timestamp).
 */
export class EINVAL extends createErrorClass('EINVAL') {}

/**
 * Options for {@link RemoteError}.
 */
export interface RemoteErrorOptions extends ErrorDetails {
  /** HTTP status reported by the remote service, when there was one */
  status?: number
}

/**
 * EREMOTE - a call to the remote store failed.
 *
 * Carries the HTTP status when the transport reported one. A 5xx status makes
 * the error `Transient`; everything else is `Other`.
 */
export class RemoteError extends DrivePathError {
  readonly status?: number

  constructor(options: RemoteErrorOptions = {}) {
    super('EREMOTE', options, isServerErrorStatus(options.status) ? 'Transient' : 'Other')
    this.name = 'RemoteError'
    this.status = options.status
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Type guard for any drivepath error.
 */
export function isDrivePathError(error: unknown): error is DrivePathError {
  return error instanceof DrivePathError
}

/**
 * True when the error means "this path does not exist".
 *
 * @example
 * ```typescript
 * try {
 *   return await drive.stat(path)
 * } catch (err) {
 *   if (!isObjectNotFound(err)) throw err
 *   return drive.mkdir(path)
 * }
 * ```
 */
export function isObjectNotFound(error: unknown): error is ENOENT {
  return error instanceof ENOENT
}

/**
 * True when the error reports duplicate siblings.
 */
export function isDuplicateObject(error: unknown): error is EDUPLICATE {
  return error instanceof EDUPLICATE
}

/**
 * True for file/folder type mismatches (ENOTDIR, EISDIR).
 */
export function isTypeMismatch(error: unknown): error is ENOTDIR | EISDIR {
  return error instanceof ENOTDIR || error instanceof EISDIR
}

/**
 * True for invalid input (EINVAL).
 */
export function isInvalidInput(error: unknown): error is EINVAL {
  return error instanceof EINVAL
}

/**
 * True for remote failures.
 */
export function isRemoteError(error: unknown): error is RemoteError {
  return error instanceof RemoteError
}

/**
 * True for remote failures that carry a server-error status.
 */
export function isTransient(error: unknown): error is RemoteError {
  return isRemoteError(error) && error.kind === 'Transient'
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * True for HTTP statuses in the 500-599 range.
 */
export function isServerErrorStatus(status: number | undefined): boolean {
  return status !== undefined && status >= 500 && status <= 599
}

/**
 * Read an HTTP-style status from an arbitrary error value.
 *
 * Understands `status`, `statusCode` and `code` (when numeric), which covers
 * RemoteError as well as most HTTP client errors.
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined
  for (const key of ['status', 'statusCode', 'code'] as const) {
    const value: unknown = Reflect.get(error, key)
    if (typeof value === 'number' && Number.isInteger(value)) {
      return value
    }
  }
  return undefined
}

/**
 * Map any thrown value to its {@link ErrorKind}.
 *
 * Foreign errors are `Transient` when they carry a 5xx status and `Other`
 * otherwise.
 */
export function classifyError(error: unknown): ErrorKind {
  if (isDrivePathError(error)) return error.kind
  return isServerErrorStatus(getErrorStatus(error)) ? 'Transient' : 'Other'
}

/**
 * Extract a message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

/**
 * Attach operation context to a failure from a mutating remote call.
 *
 * Path-level errors (ENOENT, EDUPLICATE, ...) already name their operation and
 * pass through untouched. Remote and foreign errors are rethrown as a
 * {@link RemoteError} naming the operation and paths, keeping the status and
 * the original error as `cause`.
 *
 * @example
 * ```typescript
 * try {
 *   await store.trashObject(id)
 * } catch (err) {
 *   throw withOperationContext(err, 'move', src, dst)
 * }
 * ```
 */
export function withOperationContext(error: unknown, syscall: string, path?: string, dest?: string): DrivePathError {
  if (isDrivePathError(error) && !isRemoteError(error)) {
    return error
  }
  return new RemoteError({
    syscall,
    path,
    dest,
    status: getErrorStatus(error),
    detail: isRemoteError(error) ? error.detail : getErrorMessage(error),
    cause: error,
  })
}

/**
 * All supported error codes as a constant array.
 */
export const ALL_ERROR_CODES: readonly ErrorCode[] = ['ENOENT', 'EDUPLICATE', 'ENOTDIR', 'EISDIR', 'EINVAL', 'EREMOTE']
