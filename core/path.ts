/**
 * Path utilities for drivepath - Unix-style path handling over a flat store
 *
 * The remote store has no notion of a path; this module is the single place
 * that decides what a path string means. Every path is reduced to a canonical
 * form (slash-joined segments, no empty, leading or trailing segments) that is
 * also the cache key for the resolved object.
 *
 * There is no current directory: every path is anchored at the root, so
 * `report.txt`, `/report.txt` and `//report.txt/` all name the same object.
 *
 * @module path
 * @example
 * ```typescript
 * import { splitPath, joinPath } from './path.js'
 *
 * splitPath('/a//b/c/')   // { dir: 'a/b', name: 'c', path: 'a/b/c' }
 * splitPath('notes.txt')  // { dir: '', name: 'notes.txt', path: 'notes.txt' }
 * joinPath('a/', '/b')    // 'a/b'
 * ```
 */

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Path separator.
 */
export const sep = '/' as const

/**
 * Cache key reserved for the root folder. Never produced by {@link splitPath}.
 */
export const ROOT_PATH = '/' as const

// =============================================================================
// TYPES
// =============================================================================

/**
 * A path decomposed into its parent directory and leaf.
 *
 * @example
 * ```typescript
 * // For 'photos/2024/beach.jpg':
 * {
 *   dir: 'photos/2024',
 *   name: 'beach.jpg',
 *   path: 'photos/2024/beach.jpg'
 * }
 * ```
 */
export interface SplitPath {
  /** Canonical parent directory; '' when the leaf lives in the root */
  dir: string
  /** Final segment */
  name: string
  /** Canonical form of the whole path; '' for blank input */
  path: string
}

// =============================================================================
// SPLITTING
// =============================================================================

/**
 * Break a path into its non-empty segments.
 */
export function segments(pathName: string): string[] {
  return pathName.split(sep).filter((segment) => segment !== '')
}

/**
 * Split a path into directory, leaf and canonical path.
 *
 * Repeated, leading and trailing separators are dropped. Blank or
 * separator-only input yields empty strings for all three parts, which callers
 * must reject as invalid input. Pure and total: never throws.
 *
 * @example
 * ```typescript
 * splitPath('/a//b/c/')  // { dir: 'a/b', name: 'c', path: 'a/b/c' }
 * splitPath('c')         // { dir: '', name: 'c', path: 'c' }
 * splitPath('')          // { dir: '', name: '', path: '' }
 * splitPath('///')       // { dir: '', name: '', path: '' }
 * ```
 */
export function splitPath(pathName: string): SplitPath {
  const parts = segments(pathName)
  if (parts.length === 0) {
    return { dir: '', name: '', path: '' }
  }
  const name = parts[parts.length - 1] ?? ''
  return {
    dir: parts.slice(0, -1).join(sep),
    name,
    path: parts.join(sep),
  }
}

/**
 * Canonical form of a path ('' for blank input).
 */
export function canonicalPath(pathName: string): string {
  return segments(pathName).join(sep)
}

/**
 * Join path fragments and canonicalize the result.
 *
 * @example
 * ```typescript
 * joinPath('tmp', 'temp-1-2')  // 'tmp/temp-1-2'
 * joinPath('', 'a', '/b/')     // 'a/b'
 * ```
 */
export function joinPath(...parts: string[]): string {
  return canonicalPath(parts.join(sep))
}

/**
 * True for non-empty input made only of separators ('/', '//', ...).
 */
export function isRootPath(pathName: string): boolean {
  return pathName.length > 0 && segments(pathName).length === 0
}

/**
 * True when `pathName` equals `ancestor` or lies below it.
 *
 * Both arguments must be canonical.
 */
export function isSameOrDescendant(pathName: string, ancestor: string): boolean {
  return pathName === ancestor || pathName.startsWith(ancestor + sep)
}

/**
 * Every directory prefix of a canonical directory path, shortest first.
 *
 * @example
 * ```typescript
 * prefixes('a/b/c')  // ['a', 'a/b', 'a/b/c']
 * prefixes('')       // []
 * ```
 */
export function prefixes(dir: string): string[] {
  const parts = segments(dir)
  return parts.map((_, idx) => parts.slice(0, idx + 1).join(sep))
}

// =============================================================================
// QUOTING
// =============================================================================

/**
 * Escape a value for use inside a single-quoted query literal.
 *
 * Backslashes and single quotes are prefixed with a backslash.
 *
 * @example
 * ```typescript
 * escapeQuotes("it's")    // "it\\'s"
 * escapeQuotes('plain')   // 'plain'
 * ```
 */
export function escapeQuotes(value: string): string {
  return value.replace(/[\\']/g, (ch) => `\\${ch}`)
}
