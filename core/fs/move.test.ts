import { describe, it, expect, beforeEach } from 'vitest'
import { createTestDrive, seedFolders, type TestDrive } from '../../tests/test-utils.js'
import type { RemoteObject } from '../types.js'
import { EINVAL, EISDIR, ENOENT } from '../errors.js'

describe('move', () => {
  let t: TestDrive
  let b: RemoteObject
  let c: RemoteObject
  let file: RemoteObject

  beforeEach(() => {
    t = createTestDrive()
    b = seedFolders(t.memory, 'a/b')
    c = t.memory.seed({ title: 'c', parentId: b.id, folder: true })
    file = t.memory.seed({ title: 'file.txt', parentId: b.id, content: 'payload' })
  })

  it('should move a file into a sibling folder', async () => {
    const moved = await t.drive.move('a/b/file.txt', 'a/b/c/file.txt')

    expect(moved.id).toBe(file.id)
    expect(moved.parents).toEqual([c.id])
    await expect(t.drive.stat('a/b/c/file.txt')).resolves.toBe(moved)
    await expect(t.drive.stat('a/b/file.txt')).rejects.toThrow(ENOENT)
  })

  it('should patch title and parents in a single call', async () => {
    await t.drive.move('a/b/file.txt', 'a/b/c/renamed.txt')

    const patches = t.remote.calls.filter((call) => call.operation === 'patchObject')
    expect(patches).toEqual([
      {
        operation: 'patchObject',
        args: [file.id, { title: 'renamed.txt', addParents: [c.id], removeParents: [b.id] }],
      },
    ])
  })

  it('should only change the title when renaming in place', async () => {
    const renamed = await t.drive.move('a/b/file.txt', 'a/b/other.txt')

    expect(renamed.title).toBe('other.txt')
    expect(renamed.parents).toEqual([b.id])
    const patch = t.remote.calls.find((call) => call.operation === 'patchObject')
    expect(patch?.args).toEqual([file.id, { title: 'other.txt' }])
  })

  it('should trash a file at the destination', async () => {
    const existing = t.memory.seed({ title: 'file.txt', parentId: c.id, content: 'old' })

    const moved = await t.drive.move('a/b/file.txt', 'a/b/c/file.txt')

    expect(t.memory.isTrashed(existing.id)).toBe(true)
    await expect(t.drive.stat('a/b/c/file.txt')).resolves.toBe(moved)
    expect(t.memory.childrenOf(c.id)).toEqual([moved])
  })

  it('should refuse to replace a folder and trash nothing', async () => {
    const error = await t.drive.move('a/b/file.txt', 'a/b/c').catch((err: unknown) => err)

    expect(error).toBeInstanceOf(EISDIR)
    expect(error).toMatchObject({ path: 'a/b/file.txt', dest: 'a/b/c' })
    expect(t.remote.count('trashObject')).toBe(0)
    expect(t.remote.count('patchObject')).toBe(0)
  })

  it('should return the source unchanged when moved onto itself', async () => {
    const same = await t.drive.move('a/b/file.txt', '/a/b/file.txt')

    expect(same).toEqual(file)
    expect(t.remote.count('patchObject')).toBe(0)
    expect(t.remote.count('trashObject')).toBe(0)
  })

  it('should move folders and forget paths below the old location', async () => {
    const inner = t.memory.seed({ title: 'inner.txt', parentId: c.id })
    await t.drive.stat('a/b/c/inner.txt')

    const moved = await t.drive.move('a/b/c', 'a/c2')

    await expect(t.drive.stat('a/b/c/inner.txt')).rejects.toThrow(ENOENT)
    await expect(t.drive.stat('a/c2/inner.txt')).resolves.toEqual(inner)
    await expect(t.drive.stat('a/c2')).resolves.toBe(moved)
  })

  it('should refuse to move a folder below itself', async () => {
    await expect(t.drive.move('a/b', 'a/b/c/b')).rejects.toThrow(
      "EINVAL: invalid argument, move 'a/b' -> 'a/b/c/b': cannot move a folder below itself"
    )
  })

  it('should fail when the source does not exist', async () => {
    await expect(t.drive.move('a/b/missing.txt', 'a/b/c/x.txt')).rejects.toThrow(ENOENT)
    expect(t.remote.count('patchObject')).toBe(0)
  })

  it('should fail when the destination folder does not exist', async () => {
    await expect(t.drive.move('a/b/file.txt', 'nowhere/file.txt')).rejects.toThrow(ENOENT)
    expect(t.remote.count('patchObject')).toBe(0)
  })

  it('should reject blank paths', async () => {
    await expect(t.drive.move('', 'x')).rejects.toThrow(EINVAL)
    await expect(t.drive.move('x', '/')).rejects.toThrow(EINVAL)
  })

  it('should wrap patch failures with both paths', async () => {
    t.remote.failNext('patchObject', 404)

    await expect(t.drive.move('a/b/file.txt', 'a/b/c/file.txt')).rejects.toThrow(
      "EREMOTE: remote call failed, move 'a/b/file.txt' -> 'a/b/c/file.txt': injected patchObject failure"
    )
  })
})
