/**
 * stat - Resolve a path to a remote object
 *
 * The store only knows parent ids, so a path is resolved one segment at a
 * time, each directory segment costing up to two children listings:
 *
 * 1. anything but a folder carrying the segment's title -> ENOTDIR
 * 2. folders carrying the title: none -> ENOENT, several -> EDUPLICATE
 *
 * The leaf takes one listing (any type) and a final `getObject`. Resolved
 * directory prefixes and objects are cached, so repeated lookups under the
 * same folders cost nothing until the entries expire.
 *
 * @module core/fs/stat
 */

import { EDUPLICATE, EINVAL, ENOENT, ENOTDIR } from '../errors.js'
import { isDir } from '../object-info.js'
import { ROOT_PATH, isRootPath, prefixes, splitPath } from '../path.js'
import { childQuery } from '../query.js'
import type { ChildReference, RemoteObject } from '../types.js'
import type { DriveContext } from './context.js'

// =============================================================================
// Listing
// =============================================================================

/**
 * Every child of `parentId` matching `query`, following page tokens until the
 * listing is exhausted. Pages are fetched one after another.
 */
export async function listAllChildren(ctx: DriveContext, parentId: string, query: string): Promise<ChildReference[]> {
  const children: ChildReference[] = []
  let pageToken: string | undefined
  do {
    const page = await ctx.store.listChildren(parentId, query, pageToken)
    children.push(...page.items)
    pageToken = page.nextPageToken
  } while (pageToken)
  return children
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * The root folder, cached under '/'.
 */
export async function statRoot(ctx: DriveContext): Promise<RemoteObject> {
  const cached = ctx.objects.get(ROOT_PATH)
  if (cached) return cached

  const root = await ctx.store.getObject(ctx.config.rootId)
  ctx.objects.put(ROOT_PATH, root)
  return root
}

/**
 * Walk the directory part of a path and return the id of its last folder.
 *
 * @param dir - Canonical directory path; '' is the root
 * @param syscall - Operation named in errors
 * @param target - Path named in errors
 */
async function resolveFolderId(ctx: DriveContext, dir: string, syscall: string, target: string): Promise<string> {
  let parentId = ctx.config.rootId

  for (const prefix of prefixes(dir)) {
    const cached = ctx.children.get(prefix)
    if (cached) {
      parentId = cached.id
      continue
    }

    const { name } = splitPath(prefix)
    const files = await listAllChildren(ctx, parentId, childQuery(name, 'file'))
    if (files.length > 0) {
      throw new ENOTDIR(syscall, target, undefined, `'${prefix}' is a file`)
    }

    const folders = await listAllChildren(ctx, parentId, childQuery(name, 'folder'))
    const [folder] = folders
    if (!folder) {
      throw new ENOENT(syscall, target, undefined, `folder '${prefix}' not found`)
    }
    if (folders.length > 1) {
      throw new EDUPLICATE(syscall, target, undefined, `${folders.length} folders named '${prefix}'`)
    }

    ctx.children.put(prefix, folder)
    parentId = folder.id
  }

  return parentId
}

/**
 * Resolve a path to its remote object.
 *
 * Separator-only input is the root. A cached object is returned without any
 * remote call.
 *
 * @param syscall - Operation named in errors (default: 'stat')
 * @throws {EINVAL} For blank input
 * @throws {ENOENT} When the path or one of its folders does not exist
 * @throws {ENOTDIR} When a directory component is a file
 * @throws {EDUPLICATE} When a component matches several siblings
 *
 * @example
 * ```typescript
 * const file = await stat(ctx, 'reports/2024/q1.pdf')
 * ```
 */
export async function stat(ctx: DriveContext, pathName: string, syscall = 'stat'): Promise<RemoteObject> {
  if (isRootPath(pathName)) {
    return statRoot(ctx)
  }

  const { dir, name, path } = splitPath(pathName)
  if (path === '') {
    throw new EINVAL(syscall, pathName, undefined, 'empty path')
  }

  const cached = ctx.objects.get(path)
  if (cached) {
    ctx.logger.debug('cache hit', path)
    return cached
  }

  const parentId = await resolveFolderId(ctx, dir, syscall, path)
  const matches = await listAllChildren(ctx, parentId, childQuery(name))
  const [match] = matches
  if (!match) {
    throw new ENOENT(syscall, path)
  }
  if (matches.length > 1) {
    throw new EDUPLICATE(syscall, path, undefined, `${matches.length} objects named '${name}'`)
  }

  const object = await ctx.store.getObject(match.id)
  ctx.objects.put(path, object)
  if (isDir(object)) {
    ctx.children.put(path, { id: object.id })
  }
  return object
}

/**
 * Resolve a directory path to its folder. An empty path is the root.
 *
 * @throws {ENOTDIR} When the path resolves to a file
 */
export async function statDir(ctx: DriveContext, dir: string, syscall = 'stat'): Promise<RemoteObject> {
  if (splitPath(dir).path === '') {
    return statRoot(ctx)
  }

  const folder = await stat(ctx, dir, syscall)
  if (!isDir(folder)) {
    throw new ENOTDIR(syscall, splitPath(dir).path)
  }
  return folder
}
