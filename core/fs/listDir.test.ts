import { describe, it, expect } from 'vitest'
import { createTestDrive, seedFolders } from '../../tests/test-utils.js'
import { FOLDER_MIME_TYPE } from '../constants.js'
import { ENOENT, ENOTDIR } from '../errors.js'
import { buildQuery, isFolder, notTrashed } from '../query.js'

describe('listDir', () => {
  it('should list children in listing order', async () => {
    const { drive, memory } = createTestDrive()
    const docs = seedFolders(memory, 'docs')
    const a = memory.seed({ title: 'a.txt', parentId: docs.id })
    const sub = memory.seed({ title: 'sub', parentId: docs.id, folder: true })

    await expect(drive.listDir('docs')).resolves.toEqual([a, sub])
  })

  it('should skip trashed children by default', async () => {
    const { drive, memory } = createTestDrive()
    const keep = memory.seed({ title: 'keep' })
    const gone = memory.seed({ title: 'gone' })
    await memory.trashObject(gone.id)

    await expect(drive.listDir('/')).resolves.toEqual([keep])
    await expect(drive.listDir('', '   ')).resolves.toEqual([keep])
  })

  it('should apply a custom query', async () => {
    const { drive, memory } = createTestDrive()
    memory.seed({ title: 'file' })
    const folder = memory.seed({ title: 'folder', folder: true })

    const folders = await drive.listDir('/', buildQuery(notTrashed(), isFolder()))

    expect(folders).toEqual([folder])
    expect(folders.every((entry) => entry.mimeType === FOLDER_MIME_TYPE)).toBe(true)
  })

  it('should see trashed children when the query asks for them', async () => {
    const { drive, memory } = createTestDrive()
    const gone = memory.seed({ title: 'gone' })
    await memory.trashObject(gone.id)

    await expect(drive.listDir('/', 'trashed = true')).resolves.toEqual([gone])
  })

  it('should walk every page and fetch children one by one', async () => {
    const { drive, memory, remote } = createTestDrive({}, { pageSize: 2 })
    const docs = seedFolders(memory, 'docs')
    for (const title of ['1', '2', '3']) {
      memory.seed({ title, parentId: docs.id })
    }

    const entries = await drive.listDir('docs')

    expect(entries.map((entry) => entry.title)).toEqual(['1', '2', '3'])
    expect(remote.calls.map((call) => call.operation)).toEqual([
      'listChildren',
      'getObject',
      'listChildren',
      'listChildren',
      'getObject',
      'getObject',
      'getObject',
    ])
  })

  it('should return an empty list for an empty folder', async () => {
    const { drive, memory } = createTestDrive()
    seedFolders(memory, 'empty')
    await expect(drive.listDir('empty')).resolves.toEqual([])
  })

  it('should reject files', async () => {
    const { drive, memory } = createTestDrive()
    memory.seed({ title: 'f.txt' })
    await expect(drive.listDir('f.txt')).rejects.toThrow(ENOTDIR)
  })

  it('should report missing folders', async () => {
    const { drive } = createTestDrive()
    await expect(drive.listDir('nowhere')).rejects.toThrow(ENOENT)
  })
})
