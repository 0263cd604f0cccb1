import { describe, it, expect } from 'vitest'
import { bytesToStream, collectBytes, concatBytes, contentToBytes } from './content.js'

async function* chunks(...parts: string[]): AsyncGenerator<Uint8Array> {
  for (const part of parts) yield new TextEncoder().encode(part)
}

describe('content helpers', () => {
  it('should concatenate chunks in order', () => {
    expect(Array.from(concatBytes([new Uint8Array([1, 2]), new Uint8Array(0), new Uint8Array([3])]))).toEqual([1, 2, 3])
  })

  it('should encode strings as UTF-8', async () => {
    expect(Array.from(await contentToBytes('é'))).toEqual([0xc3, 0xa9])
  })

  it('should return byte arrays unchanged', async () => {
    const bytes = new Uint8Array([7])
    await expect(contentToBytes(bytes)).resolves.toBe(bytes)
  })

  it('should drain streams', async () => {
    const bytes = await contentToBytes(chunks('ab', 'cd'))
    expect(new TextDecoder().decode(bytes)).toBe('abcd')
  })

  it('should split buffers into fixed-size chunks', async () => {
    const seen: number[][] = []
    for await (const chunk of bytesToStream(new Uint8Array([1, 2, 3, 4, 5]), 2)) {
      seen.push(Array.from(chunk))
    }
    expect(seen).toEqual([[1, 2], [3, 4], [5]])
  })

  it('should yield nothing for an empty buffer', async () => {
    await expect(collectBytes(bytesToStream(new Uint8Array(0)))).resolves.toEqual(new Uint8Array(0))
  })
})
