/**
 * listDir - List the children of a folder
 *
 * @module core/fs/listDir
 */

import { DEFAULT_LIST_QUERY } from '../constants.js'
import type { RemoteObject } from '../types.js'
import type { DriveContext } from './context.js'
import { listAllChildren, statDir } from './stat.js'

/**
 * Fetch every child of the folder at `pathName` matching `query`.
 *
 * A blank query lists everything not in the trash. Children are fetched one
 * by one, in listing order. Blank and separator-only paths list the root.
 *
 * @throws {ENOTDIR} When the path is a file
 *
 * @example
 * ```typescript
 * const pdfs = await listDir(ctx, 'reports', "trashed = false and mimeType = 'application/pdf'")
 * ```
 */
export async function listDir(ctx: DriveContext, pathName: string, query?: string): Promise<RemoteObject[]> {
  const folder = await statDir(ctx, pathName, 'listDir')
  const filter = query === undefined || query.trim() === '' ? DEFAULT_LIST_QUERY : query

  const children = await listAllChildren(ctx, folder.id, filter)
  const objects: RemoteObject[] = []
  for (const child of children) {
    objects.push(await ctx.store.getObject(child.id))
  }
  return objects
}
