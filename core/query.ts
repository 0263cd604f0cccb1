/**
 * Children-listing query language
 *
 * Listings are filtered with a small Drive-style query language: a conjunction
 * of comparisons on `title`, `mimeType` and `trashed`.
 *
 * ```
 * title = 'reports' and trashed = false and mimeType != 'application/vnd.google-apps.folder'
 * ```
 *
 * The resolver only ever builds such conjunctions through the helpers below,
 * which quote every literal with {@link escapeQuotes}. {@link parseQuery} and
 * {@link matchesQuery} evaluate the same language for in-process stores.
 *
 * @module core/query
 */

import { FOLDER_MIME_TYPE } from './constants.js'
import { EINVAL } from './errors.js'
import { escapeQuotes } from './path.js'

// =============================================================================
// Types
// =============================================================================

export type QueryOperator = '=' | '!='

/**
 * One comparison in a query.
 */
export type QueryTerm =
  | { field: 'title' | 'mimeType'; op: QueryOperator; value: string }
  | { field: 'trashed'; op: QueryOperator; value: boolean }

/**
 * The object attributes a query can test.
 */
export interface QueryCandidate {
  title: string
  mimeType: string
  trashed: boolean
}

// =============================================================================
// Building
// =============================================================================

/**
 * Render a single term.
 */
export function formatTerm(term: QueryTerm): string {
  if (term.field === 'trashed') {
    return `trashed ${term.op} ${term.value}`
  }
  return `${term.field} ${term.op} '${escapeQuotes(term.value)}'`
}

/**
 * Render a conjunction of terms.
 */
export function buildQuery(...terms: QueryTerm[]): string {
  return terms.map(formatTerm).join(' and ')
}

export const titleIs = (title: string): QueryTerm => ({ field: 'title', op: '=', value: title })

export const notTrashed = (): QueryTerm => ({ field: 'trashed', op: '=', value: false })

export const isFolder = (): QueryTerm => ({ field: 'mimeType', op: '=', value: FOLDER_MIME_TYPE })

export const isNotFolder = (): QueryTerm => ({ field: 'mimeType', op: '!=', value: FOLDER_MIME_TYPE })

/**
 * Non-trashed children named `title`, optionally restricted to folders or
 * non-folders.
 *
 * @example
 * ```typescript
 * childQuery("it's", 'folder')
 * // "title = 'it\\'s' and trashed = false and mimeType = 'application/vnd.google-apps.folder'"
 * ```
 */
export function childQuery(title: string, type?: 'folder' | 'file'): string {
  const terms = [titleIs(title), notTrashed()]
  if (type === 'folder') terms.push(isFolder())
  if (type === 'file') terms.push(isNotFolder())
  return buildQuery(...terms)
}

// =============================================================================
// Parsing
// =============================================================================

function queryError(query: string, detail: string): EINVAL {
  return new EINVAL('query', query, undefined, detail)
}

/**
 * Parse a query into its terms. A blank query has no terms and matches
 * everything.
 *
 * @throws {EINVAL} On anything outside the supported language
 */
export function parseQuery(query: string): QueryTerm[] {
  const terms: QueryTerm[] = []
  let pos = 0

  const skipSpaces = () => {
    while (pos < query.length && /\s/.test(query.charAt(pos))) pos++
  }
  const readWord = (): string => {
    const match = /^[A-Za-z]+/.exec(query.slice(pos))
    if (!match) return ''
    pos += match[0].length
    return match[0]
  }
  const readLiteral = (): string => {
    if (query.charAt(pos) !== "'") {
      throw queryError(query, `expected a quoted value at position ${pos}`)
    }
    pos++
    let value = ''
    while (pos < query.length) {
      const ch = query.charAt(pos)
      if (ch === '\\' && pos + 1 < query.length) {
        value += query.charAt(pos + 1)
        pos += 2
      } else if (ch === "'") {
        pos++
        return value
      } else {
        value += ch
        pos++
      }
    }
    throw queryError(query, 'unterminated quoted value')
  }

  skipSpaces()
  if (pos === query.length) return terms

  for (;;) {
    skipSpaces()
    const fieldAt = pos
    const field = readWord()
    if (field !== 'title' && field !== 'mimeType' && field !== 'trashed') {
      throw queryError(query, `unknown field '${field}' at position ${fieldAt}`)
    }

    skipSpaces()
    let op: QueryOperator
    if (query.startsWith('!=', pos)) {
      op = '!='
      pos += 2
    } else if (query.startsWith('=', pos)) {
      op = '='
      pos += 1
    } else {
      throw queryError(query, `expected '=' or '!=' at position ${pos}`)
    }

    skipSpaces()
    if (field === 'trashed') {
      const word = readWord()
      if (word !== 'true' && word !== 'false') {
        throw queryError(query, `expected true or false at position ${pos - word.length}`)
      }
      terms.push({ field, op, value: word === 'true' })
    } else {
      terms.push({ field, op, value: readLiteral() })
    }

    skipSpaces()
    if (pos === query.length) return terms

    const conjunctionAt = pos
    if (readWord().toLowerCase() !== 'and') {
      throw queryError(query, `expected 'and' at position ${conjunctionAt}`)
    }
  }
}

/**
 * True when the candidate satisfies every term.
 */
export function matchesQuery(terms: readonly QueryTerm[], candidate: QueryCandidate): boolean {
  return terms.every((term) => {
    const equal = candidate[term.field] === term.value
    return term.op === '=' ? equal : !equal
  })
}
