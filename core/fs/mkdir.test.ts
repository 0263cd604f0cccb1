import { describe, it, expect } from 'vitest'
import { createTestDrive, seedFolders } from '../../tests/test-utils.js'
import { FOLDER_MIME_TYPE } from '../constants.js'
import { EINVAL, ENOENT, ENOTDIR } from '../errors.js'

describe('mkdir', () => {
  it('should create a folder under the root', async () => {
    const { drive, memory } = createTestDrive()

    const folder = await drive.mkdir('docs')

    expect(folder.title).toBe('docs')
    expect(folder.mimeType).toBe(FOLDER_MIME_TYPE)
    expect(folder.parents).toEqual(['root'])
    expect(memory.childrenOf('root')).toEqual([folder])
  })

  it('should create a folder inside an existing one', async () => {
    const { drive, memory } = createTestDrive()
    const parent = seedFolders(memory, 'a/b')

    const folder = await drive.mkdir('/a/b/c/')

    expect(folder.parents).toEqual([parent.id])
  })

  it('should make the new folder resolvable without remote calls', async () => {
    const { drive, remote } = createTestDrive()

    const folder = await drive.mkdir('docs')
    remote.reset()

    await expect(drive.stat('docs')).resolves.toBe(folder)
    expect(remote.count()).toBe(0)
  })

  it('should cache the folder for paths below it', async () => {
    const { drive, memory, remote } = createTestDrive()

    const folder = await drive.mkdir('docs')
    memory.seed({ title: 'a.txt', parentId: folder.id })
    remote.reset()

    await drive.stat('docs/a.txt')
    expect(remote.calls.map((call) => call.operation)).toEqual(['listChildren', 'getObject'])
  })

  it('should be idempotent', async () => {
    const { drive, remote } = createTestDrive()

    const first = await drive.mkdir('docs')
    const second = await drive.mkdir('docs')

    expect(second.id).toBe(first.id)
    expect(remote.count('insertObject')).toBe(1)
  })

  it('should return a folder that already exists remotely', async () => {
    const { drive, memory, remote } = createTestDrive()
    const existing = memory.seed({ title: 'docs', folder: true })

    await expect(drive.mkdir('docs')).resolves.toEqual(existing)
    expect(remote.count('insertObject')).toBe(0)
  })

  it('should return a file already at the path unchanged', async () => {
    const { drive, memory, remote } = createTestDrive()
    const file = memory.seed({ title: 'docs' })

    await expect(drive.mkdir('docs')).resolves.toEqual(file)
    expect(remote.count('insertObject')).toBe(0)
  })

  it('should reject blank paths and the root', async () => {
    const { drive } = createTestDrive()
    await expect(drive.mkdir('')).rejects.toThrow(EINVAL)
    await expect(drive.mkdir('/')).rejects.toThrow(EINVAL)
  })

  it('should fail on missing parents unless recursive', async () => {
    const { drive, remote } = createTestDrive()

    await expect(drive.mkdir('a/b/c')).rejects.toThrow(ENOENT)
    expect(remote.count('insertObject')).toBe(0)
  })

  it('should create missing parents when recursive', async () => {
    const { drive, memory } = createTestDrive()

    const c = await drive.mkdir('a/b/c', { recursive: true })

    const [a] = memory.childrenOf('root')
    const [b] = memory.childrenOf(a?.id ?? '')
    expect(a?.title).toBe('a')
    expect(b?.title).toBe('b')
    expect(c.parents).toEqual([b?.id])
  })

  it('should fail when a parent is a file', async () => {
    const { drive, memory } = createTestDrive()
    memory.seed({ title: 'a' })

    await expect(drive.mkdir('a/b')).rejects.toThrow(ENOTDIR)
    await expect(drive.mkdir('a/b', { recursive: true })).rejects.toThrow(ENOTDIR)
  })

  it('should wrap insert failures with the operation', async () => {
    const { drive, remote } = createTestDrive()
    remote.failNext('insertObject', 403)

    await expect(drive.mkdir('docs')).rejects.toThrow(
      "EREMOTE: remote call failed, mkdir 'docs': injected insertObject failure"
    )
  })
})
