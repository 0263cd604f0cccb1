/**
 * download, downloadToFile - Read file content
 *
 * @module core/fs/download
 */

import { createWriteStream } from 'node:fs'
import { rename, rm, stat as statLocal } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { pipeline } from 'node:stream/promises'
import { EINVAL, EISDIR, withOperationContext } from '../errors.js'
import { isDir } from '../object-info.js'
import type { DriveContext } from './context.js'
import { stat } from './stat.js'

/**
 * Open the content of the file at `pathName` as a byte stream.
 *
 * @throws {EISDIR} When the path is a folder
 * @throws {EINVAL} When the object has no downloadable content
 */
export async function download(ctx: DriveContext, pathName: string): Promise<AsyncIterable<Uint8Array>> {
  const object = await stat(ctx, pathName, 'download')
  if (isDir(object)) {
    throw new EISDIR('download', pathName)
  }
  if (!object.downloadUrl) {
    throw new EINVAL('download', pathName, undefined, 'object has no downloadable content')
  }

  try {
    return await ctx.store.download(object.downloadUrl)
  } catch (error) {
    throw withOperationContext(error, 'download', pathName)
  }
}

/**
 * Copy the file at `pathName` to `localFile`.
 *
 * Content is written to a temporary file beside `localFile` and renamed into
 * place once complete, so a failed download never leaves a partial file at
 * `localFile`.
 *
 * @returns Number of bytes written
 * @throws {EINVAL} For blank arguments
 * @throws {EISDIR} When `localFile` exists and is not a regular file
 *
 * @example
 * ```typescript
 * const bytes = await downloadToFile(ctx, 'reports/q1.pdf', './q1.pdf')
 * ```
 */
export async function downloadToFile(ctx: DriveContext, pathName: string, localFile: string): Promise<number> {
  if (localFile === '') {
    throw new EINVAL('downloadToFile', pathName, localFile, 'empty local path')
  }

  const existing = await statLocal(localFile).catch((error: unknown) => {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return undefined
    throw error
  })
  if (existing && !existing.isFile()) {
    throw new EISDIR('downloadToFile', pathName, localFile, 'local path exists and is not a regular file')
  }

  const stream = await download(ctx, pathName)
  const tmpFile = join(dirname(localFile), `.${basename(localFile)}.${ctx.tempName()}`)

  let written = 0
  async function* counted(): AsyncGenerator<Uint8Array> {
    for await (const chunk of stream) {
      written += chunk.byteLength
      yield chunk
    }
  }

  try {
    await pipeline(counted(), createWriteStream(tmpFile))
    await rename(tmpFile, localFile)
  } catch (error) {
    await rm(tmpFile, { force: true })
    throw error
  }

  ctx.logger.debug('downloaded', pathName, 'to', localFile, `(${written} bytes)`)
  return written
}
