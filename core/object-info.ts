/**
 * Accessors for RemoteObject metadata
 *
 * Timestamps travel as RFC 3339 strings, sometimes with nanosecond fractions
 * that `Date.parse` does not reliably accept, so parsing is done here.
 *
 * @module core/object-info
 */

import { FOLDER_MIME_TYPE } from './constants.js'
import { EINVAL } from './errors.js'
import type { RemoteObject } from './types.js'

const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/

/**
 * True when the object is a folder.
 */
export function isDir(object: Pick<RemoteObject, 'mimeType'>): boolean {
  return object.mimeType === FOLDER_MIME_TYPE
}

/**
 * Parse an RFC 3339 timestamp. Fractions beyond milliseconds are truncated.
 *
 * @throws {EINVAL} When the value is not a valid RFC 3339 timestamp
 *
 * @example
 * ```typescript
 * parseRfc3339('2024-05-01T10:20:30.000000001Z').toISOString()
 * // '2024-05-01T10:20:30.000Z'
 * ```
 */
export function parseRfc3339(value: string): Date {
  const match = RFC3339.exec(value)
  if (!match) {
    throw new EINVAL('parseRfc3339', value, undefined, 'not an RFC 3339 timestamp')
  }
  const [, year, month, day, hour, minute, second, fraction = '', zulu, sign, offsetHours, offsetMinutes] = match
  const fields = [year, month, day, hour, minute, second].map(Number)
  const [y = 0, mo = 0, d = 0, h = 0, mi = 0, s = 0] = fields
  if (mo < 1 || mo > 12 || d < 1 || d > 31 || h > 23 || mi > 59 || s > 60) {
    throw new EINVAL('parseRfc3339', value, undefined, 'field out of range')
  }

  const ms = Number(fraction.padEnd(3, '0').slice(0, 3))
  let time = Date.UTC(y, mo - 1, d, h, mi, s, ms)
  if (!zulu) {
    const offset = (Number(offsetHours) * 60 + Number(offsetMinutes)) * 60_000
    time += sign === '+' ? -offset : offset
  }
  return new Date(time)
}

/**
 * Creation time of an object.
 */
export function createDate(object: Pick<RemoteObject, 'createdDate'>): Date {
  return parseRfc3339(object.createdDate)
}

/**
 * Last modification time of an object.
 */
export function modifiedDate(object: Pick<RemoteObject, 'modifiedDate'>): Date {
  return parseRfc3339(object.modifiedDate)
}

/**
 * Drop the sub-second part of a time.
 */
export function truncateToSecond(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000)
}

/**
 * Format a time for a modified-date patch.
 *
 * The time is truncated to whole seconds and one nanosecond is added, so the
 * value always carries a nine-digit fraction.
 *
 * @throws {EINVAL} For an invalid Date
 *
 * @example
 * ```typescript
 * formatModifiedDate(new Date('2024-05-01T10:20:30.750Z'))
 * // '2024-05-01T10:20:30.000000001Z'
 * ```
 */
export function formatModifiedDate(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new EINVAL('formatModifiedDate', String(date), undefined, 'invalid date')
  }
  return `${truncateToSecond(date).toISOString().slice(0, 19)}.000000001Z`
}
