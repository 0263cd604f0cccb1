/**
 * setModifiedDate - Change an object's modification time
 *
 * @module core/fs/setModifiedDate
 */

import { withOperationContext } from '../errors.js'
import { formatModifiedDate } from '../object-info.js'
import type { RemoteObject } from '../types.js'
import { cacheKey, type DriveContext } from './context.js'
import { stat } from './stat.js'

/**
 * Set the modification time of the object at `pathName`.
 *
 * Sub-second precision is dropped; see {@link formatModifiedDate}.
 *
 * @returns The patched object
 */
export async function setModifiedDate(ctx: DriveContext, pathName: string, time: Date): Promise<RemoteObject> {
  const modifiedDate = formatModifiedDate(time)
  const object = await stat(ctx, pathName, 'setModifiedDate')

  let patched: RemoteObject
  try {
    patched = await ctx.store.patchObject(object.id, { modifiedDate })
  } catch (error) {
    throw withOperationContext(error, 'setModifiedDate', cacheKey(pathName))
  }

  ctx.objects.put(cacheKey(pathName), patched)
  return patched
}
