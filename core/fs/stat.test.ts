import { describe, it, expect } from 'vitest'
import { createTestDrive, seedFolders } from '../../tests/test-utils.js'
import { EDUPLICATE, EINVAL, ENOENT, ENOTDIR } from '../errors.js'

describe('stat', () => {
  describe('root', () => {
    it('should resolve separator-only paths to the root with one call', async () => {
      const { drive, remote } = createTestDrive()

      const root = await drive.stat('/')
      expect(root.id).toBe('root')
      expect(remote.calls).toEqual([{ operation: 'getObject', args: ['root'] }])

      await drive.stat('//')
      expect(remote.count()).toBe(1)
    })

    it('should use the configured root id', async () => {
      const { drive } = createTestDrive({ config: { rootId: 'top' } }, { rootId: 'top' })
      await expect(drive.stat('/')).resolves.toMatchObject({ id: 'top' })
    })
  })

  describe('invalid input', () => {
    it('should reject blank paths', async () => {
      const { drive, remote } = createTestDrive()
      await expect(drive.stat('')).rejects.toThrow(EINVAL)
      expect(remote.count()).toBe(0)
    })
  })

  describe('resolution', () => {
    it('should resolve a nested file', async () => {
      const { drive, memory } = createTestDrive()
      const b = seedFolders(memory, 'a/b')
      const file = memory.seed({ title: 'file.txt', parentId: b.id, content: 'x' })

      await expect(drive.stat('a/b/file.txt')).resolves.toEqual(file)
    })

    it('should treat non-canonical spellings as the same path', async () => {
      const { drive, memory, remote } = createTestDrive()
      const b = seedFolders(memory, 'a/b')
      memory.seed({ title: 'file.txt', parentId: b.id })

      const first = await drive.stat('/a//b/file.txt/')
      const calls = remote.count()
      const second = await drive.stat('a/b/file.txt')

      expect(second).toBe(first)
      expect(remote.count()).toBe(calls)
    })

    it('should issue two listings per folder, one for the leaf and one fetch', async () => {
      const { drive, memory, remote } = createTestDrive()
      const b = seedFolders(memory, 'a/b')
      memory.seed({ title: 'file.txt', parentId: b.id })

      await drive.stat('a/b/file.txt')

      expect(remote.count('listChildren')).toBe(5)
      expect(remote.count('getObject')).toBe(1)
    })

    it('should resolve a second stat within the TTL without remote calls', async () => {
      const { drive, memory, remote } = createTestDrive()
      const b = seedFolders(memory, 'a/b')
      memory.seed({ title: 'file.txt', parentId: b.id })

      await drive.stat('a/b/file.txt')
      remote.reset()
      await drive.stat('a/b/file.txt')

      expect(remote.count()).toBe(0)
    })

    it('should reuse cached folders for siblings', async () => {
      const { drive, memory, remote } = createTestDrive()
      const b = seedFolders(memory, 'a/b')
      memory.seed({ title: 'one.txt', parentId: b.id })
      memory.seed({ title: 'two.txt', parentId: b.id })

      await drive.stat('a/b/one.txt')
      remote.reset()
      await drive.stat('a/b/two.txt')

      expect(remote.calls.map((call) => call.operation)).toEqual(['listChildren', 'getObject'])
    })

    it('should go back to the store once entries expire', async () => {
      let clock = 0
      const { drive, memory, remote } = createTestDrive({ now: () => clock, config: { cacheTtlMs: 1000 } })
      memory.seed({ title: 'f.txt' })

      await drive.stat('f.txt')
      clock = 999
      await drive.stat('f.txt')
      expect(remote.count()).toBe(2)

      clock = 1000
      await drive.stat('f.txt')
      expect(remote.count()).toBe(4)
    })

    it('should follow listing pages', async () => {
      const { drive, memory } = createTestDrive({}, { pageSize: 1 })
      const folder = memory.seed({ title: 'docs', folder: true })
      const file = memory.seed({ title: 'x', parentId: folder.id })

      await expect(drive.stat('docs/x')).resolves.toEqual(file)
    })

    it('should ignore trashed objects', async () => {
      const { drive, memory } = createTestDrive()
      const old = memory.seed({ title: 'f.txt', content: 'old' })
      const current = memory.seed({ title: 'f.txt', content: 'new' })
      await memory.trashObject(old.id)

      await expect(drive.stat('f.txt')).resolves.toEqual(current)
    })
  })

  describe('failures', () => {
    it('should report missing leaves as ENOENT', async () => {
      const { drive } = createTestDrive()
      await expect(drive.stat('missing.txt')).rejects.toThrow("ENOENT: no such file or directory, stat 'missing.txt'")
    })

    it('should report missing folders as ENOENT naming the folder', async () => {
      const { drive, memory } = createTestDrive()
      seedFolders(memory, 'a')

      await expect(drive.stat('a/b/c.txt')).rejects.toThrow(
        "ENOENT: no such file or directory, stat 'a/b/c.txt': folder 'a/b' not found"
      )
    })

    it('should report a file used as a folder as ENOTDIR', async () => {
      const { drive, memory } = createTestDrive()
      memory.seed({ title: 'notes.txt' })

      const error = await drive.stat('notes.txt/inner').catch((err: unknown) => err)
      expect(error).toBeInstanceOf(ENOTDIR)
      expect(error).toMatchObject({ kind: 'TypeMismatch', path: 'notes.txt/inner' })
    })

    it('should report duplicate folders on any path through them', async () => {
      const { drive, memory } = createTestDrive()
      const first = memory.seed({ title: 'dup', folder: true })
      memory.seed({ title: 'dup', folder: true })
      memory.seed({ title: 'x', parentId: first.id })

      await expect(drive.stat('dup/x')).rejects.toThrow(EDUPLICATE)
      await expect(drive.stat('dup')).rejects.toThrow(EDUPLICATE)
    })

    it('should report duplicate leaves', async () => {
      const { drive, memory } = createTestDrive()
      memory.seed({ title: 'twin.txt' })
      memory.seed({ title: 'twin.txt' })

      await expect(drive.stat('twin.txt')).rejects.toThrow(
        "EDUPLICATE: more than one object with the same name, stat 'twin.txt': 2 objects named 'twin.txt'"
      )
    })

    it('should not cache failed resolutions', async () => {
      const { drive, memory } = createTestDrive()
      await expect(drive.stat('later.txt')).rejects.toThrow(ENOENT)

      const file = memory.seed({ title: 'later.txt' })
      await expect(drive.stat('later.txt')).resolves.toEqual(file)
    })

    it('should surface remote failures that outlast the retries', async () => {
      const { drive, remote } = createTestDrive()
      remote.failNext('listChildren', 503, 3)

      await expect(drive.stat('x')).rejects.toMatchObject({ code: 'EREMOTE', kind: 'Transient', status: 503 })
      expect(remote.count('listChildren')).toBe(3)
    })
  })

  describe('statDir', () => {
    it('should resolve blank input to the root', async () => {
      const { drive } = createTestDrive()
      await expect(drive.statDir('')).resolves.toMatchObject({ id: 'root' })
    })

    it('should reject files', async () => {
      const { drive, memory } = createTestDrive()
      memory.seed({ title: 'f.txt' })
      await expect(drive.statDir('f.txt')).rejects.toThrow(ENOTDIR)
    })
  })
})
