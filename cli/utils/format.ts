/**
 * Formatting utilities for CLI output
 */

import { isDir, modifiedDate } from '../../core/object-info.js'
import type { RemoteObject } from '../../core/types.js'
import type { LsFormatOptions } from '../types.js'

/**
 * Month names for date formatting
 */
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const

/**
 * Format a time for ls -l output, in UTC
 */
export function formatDate(date: Date): string {
  const month = MONTHS[date.getUTCMonth()]
  const day = date.getUTCDate().toString().padStart(2, ' ')
  const hours = date.getUTCHours().toString().padStart(2, '0')
  const minutes = date.getUTCMinutes().toString().padStart(2, '0')
  return `${month} ${day} ${hours}:${minutes}`
}

/**
 * Entry name; folders get a trailing slash
 */
export function displayName(object: RemoteObject): string {
  return isDir(object) ? `${object.title}/` : object.title
}

/**
 * Format ls output, one entry per line
 *
 * Long format: type, size (`-` for folders), modification time, name.
 */
export function formatLsOutput(entries: readonly RemoteObject[], options: LsFormatOptions = {}): string {
  if (!options.long) {
    return entries.map(displayName).join('\n')
  }

  return entries
    .map((entry) => {
      const type = isDir(entry) ? 'd' : '-'
      const size = (isDir(entry) ? '-' : String(entry.fileSize ?? 0)).padStart(10, ' ')
      return `${type} ${size} ${formatDate(modifiedDate(entry))} ${displayName(entry)}`
    })
    .join('\n')
}

/**
 * Format the metadata of one object as `key: value` lines
 */
export function formatObject(object: RemoteObject): string {
  const rows: Array<[string, string]> = [
    ['id', object.id],
    ['title', object.title],
    ['type', isDir(object) ? 'folder' : 'file'],
    ['mimeType', object.mimeType],
    ['size', object.fileSize === undefined ? '-' : String(object.fileSize)],
    ['created', object.createdDate],
    ['modified', object.modifiedDate],
    ['parents', object.parents.join(', ')],
  ]
  return rows.map(([key, value]) => `${key}: ${value}`).join('\n')
}
