/**
 * move - Rename and/or reparent an object
 *
 * A single patch call changes the title and swaps the parent. An existing
 * file at the destination is trashed first; an existing folder is never
 * replaced.
 *
 * The operation is not transactional: when the patch fails after the
 * destination was trashed, the trashed file stays in the trash.
 *
 * @module core/fs/move
 * @see https://man7.org/linux/man-pages/man2/rename.2.html
 */

import { EINVAL, EISDIR, isObjectNotFound, withOperationContext } from '../errors.js'
import { isDir } from '../object-info.js'
import { isSameOrDescendant, splitPath } from '../path.js'
import type { ObjectPatch, RemoteObject } from '../types.js'
import { forgetTree, type DriveContext } from './context.js'
import { stat, statDir } from './stat.js'

/**
 * Move `src` to `dst`, replacing a file at `dst`.
 *
 * @returns The object at its new location
 * @throws {EINVAL} For blank paths, or when moving a folder below itself
 * @throws {EISDIR} When `dst` is an existing folder
 *
 * @example
 * ```typescript
 * await move(ctx, 'inbox/report.pdf', 'archive/2024/report.pdf')
 * ```
 */
export async function move(ctx: DriveContext, src: string, dst: string): Promise<RemoteObject> {
  const from = splitPath(src)
  const to = splitPath(dst)
  if (from.path === '') {
    throw new EINVAL('move', src, dst, 'empty source path')
  }
  if (to.path === '') {
    throw new EINVAL('move', src, dst, 'empty destination path')
  }

  const srcParent = await statDir(ctx, from.dir, 'move')
  const source = await stat(ctx, from.path, 'move')
  const dstParent = await statDir(ctx, to.dir, 'move')

  if (isDir(source) && to.path !== from.path && isSameOrDescendant(to.path, from.path)) {
    throw new EINVAL('move', from.path, to.path, 'cannot move a folder below itself')
  }

  let target: RemoteObject | undefined
  try {
    target = await stat(ctx, to.path, 'move')
  } catch (error) {
    if (!isObjectNotFound(error)) throw error
  }

  if (target) {
    if (target.id === source.id) {
      return source
    }
    if (isDir(target)) {
      throw new EISDIR('move', from.path, to.path, 'destination is a folder')
    }
    try {
      await ctx.store.trashObject(target.id)
    } catch (error) {
      throw withOperationContext(error, 'move', from.path, to.path)
    }
    forgetTree(ctx, to.path)
    ctx.logger.debug('trashed', to.path, target.id)
  }

  const patch: ObjectPatch = { title: to.name }
  if (srcParent.id !== dstParent.id) {
    patch.addParents = [dstParent.id]
    patch.removeParents = [srcParent.id]
  }

  let moved: RemoteObject
  try {
    moved = await ctx.store.patchObject(source.id, patch)
  } catch (error) {
    throw withOperationContext(error, 'move', from.path, to.path)
  }

  forgetTree(ctx, from.path)
  ctx.objects.put(to.path, moved)
  if (isDir(moved)) {
    ctx.children.put(to.path, { id: moved.id })
  }
  return moved
}
