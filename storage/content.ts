/**
 * Upload content helpers
 *
 * @module storage/content
 */

import type { ObjectContent } from '../core/types.js'

/**
 * Concatenate chunks into one buffer.
 */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0)
  const result = new Uint8Array(total)
  let offset = 0
  for (const chunk of chunks) {
    result.set(chunk, offset)
    offset += chunk.byteLength
  }
  return result
}

/**
 * Drain a byte stream into one buffer.
 */
export async function collectBytes(stream: AsyncIterable<Uint8Array>): Promise<Uint8Array> {
  const chunks: Uint8Array[] = []
  for await (const chunk of stream) {
    chunks.push(chunk)
  }
  return concatBytes(chunks)
}

/**
 * Materialize upload content. Strings are UTF-8 encoded; streams are drained.
 */
export async function contentToBytes(content: ObjectContent): Promise<Uint8Array> {
  if (typeof content === 'string') {
    return new TextEncoder().encode(content)
  }
  if (content instanceof Uint8Array) {
    return content
  }
  return collectBytes(content)
}

/**
 * Expose a buffer as a byte stream of `chunkSize`-byte chunks.
 */
export async function* bytesToStream(data: Uint8Array, chunkSize = 64 * 1024): AsyncGenerator<Uint8Array> {
  for (let offset = 0; offset < data.byteLength; offset += chunkSize) {
    yield data.subarray(offset, offset + chunkSize)
  }
}
