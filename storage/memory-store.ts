/**
 * MemoryStore - In-process RemoteStore
 *
 * Behaves like the remote service as far as the path engine can tell:
 * - flat objects with parent ids and non-unique titles
 * - children listings filtered by the query language and paginated
 * - trash keeps objects around, excluded only by `trashed = false` queries
 * - failures are RemoteError values with HTTP statuses (404, 400, 403)
 *
 * Used by the test suites and by the CLI's `--memory` mode.
 *
 * @module storage/memory-store
 */

import { DEFAULT_MIME_TYPE, FOLDER_MIME_TYPE, ROOT_ID } from '../core/constants.js'
import { RemoteError, isInvalidInput } from '../core/errors.js'
import { parseRfc3339 } from '../core/object-info.js'
import { matchesQuery, parseQuery, type QueryTerm } from '../core/query.js'
import type {
  ChildListPage,
  InsertObjectInput,
  ObjectPatch,
  RemoteObject,
  RemoteStore,
} from '../core/types.js'
import { bytesToStream, contentToBytes } from './content.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Options for {@link MemoryStore}.
 */
export interface MemoryStoreOptions {
  /** Id of the root folder (default: 'root') */
  rootId?: string
  /** Children per listing page (default: 100) */
  pageSize?: number
  /** Clock used for created/modified timestamps */
  now?: () => Date
}

interface StoredObject {
  object: RemoteObject
  trashed: boolean
  content?: Uint8Array
}

const DOWNLOAD_SCHEME = 'memory://'

/** Native document types (folders included) have no downloadable content */
const NATIVE_TYPE_PREFIX = 'application/vnd.google-apps.'

// =============================================================================
// MemoryStore
// =============================================================================

/**
 * In-memory implementation of the remote object store.
 *
 * @example
 * ```typescript
 * const store = new MemoryStore({ pageSize: 2 })
 * const docs = store.seed({ title: 'docs', folder: true })
 * store.seed({ title: 'a.txt', parentId: docs.id, content: 'hello' })
 *
 * const drive = new DrivePath({ store })
 * await drive.stat('docs/a.txt')
 * ```
 */
export class MemoryStore implements RemoteStore {
  readonly rootId: string
  private readonly records = new Map<string, StoredObject>()
  private readonly pageSize: number
  private readonly now: () => Date
  private nextId = 1

  constructor(options: MemoryStoreOptions = {}) {
    this.rootId = options.rootId ?? ROOT_ID
    this.pageSize = Math.max(1, options.pageSize ?? 100)
    this.now = options.now ?? (() => new Date())

    const timestamp = this.now().toISOString()
    this.records.set(this.rootId, {
      trashed: false,
      object: {
        id: this.rootId,
        title: 'My Drive',
        mimeType: FOLDER_MIME_TYPE,
        createdDate: timestamp,
        modifiedDate: timestamp,
        parents: [],
      },
    })
  }

  // ===========================================================================
  // RemoteStore
  // ===========================================================================

  async getObject(id: string): Promise<RemoteObject> {
    return this.require(id).object
  }

  async listChildren(parentId: string, query: string, pageToken?: string): Promise<ChildListPage> {
    this.require(parentId)
    const terms = this.parse(query)

    const offset = pageToken === undefined ? 0 : Number(pageToken)
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RemoteError({ status: 400, detail: `invalid page token '${pageToken}'` })
    }

    const matches = [...this.records.values()].filter(
      (record) =>
        record.object.parents.includes(parentId) &&
        matchesQuery(terms, {
          title: record.object.title,
          mimeType: record.object.mimeType,
          trashed: record.trashed,
        })
    )
    const end = offset + this.pageSize
    const page: ChildListPage = {
      items: matches.slice(offset, end).map((record) => ({ id: record.object.id })),
    }
    if (end < matches.length) {
      page.nextPageToken = String(end)
    }
    return page
  }

  async insertObject(input: InsertObjectInput): Promise<RemoteObject> {
    const parent = this.require(input.parentId)
    if (parent.object.mimeType !== FOLDER_MIME_TYPE) {
      throw new RemoteError({ status: 400, detail: `parent ${input.parentId} is not a folder` })
    }
    const content = input.content === undefined ? undefined : await contentToBytes(input.content)
    return this.create(input.title, input.parentId, input.mimeType, content)
  }

  async patchObject(id: string, patch: ObjectPatch): Promise<RemoteObject> {
    const record = this.require(id)
    for (const parentId of patch.addParents ?? []) {
      this.require(parentId)
    }

    let modifiedDate = record.object.modifiedDate
    if (patch.modifiedDate !== undefined) {
      try {
        modifiedDate = parseRfc3339(patch.modifiedDate).toISOString()
      } catch (error) {
        throw new RemoteError({ status: 400, detail: `invalid modifiedDate '${patch.modifiedDate}'`, cause: error })
      }
    }

    const removed = new Set(patch.removeParents ?? [])
    const parents = record.object.parents.filter((parentId) => !removed.has(parentId))
    for (const parentId of patch.addParents ?? []) {
      if (!parents.includes(parentId)) parents.push(parentId)
    }

    record.object = {
      ...record.object,
      title: patch.title ?? record.object.title,
      modifiedDate,
      parents,
    }
    return record.object
  }

  async trashObject(id: string): Promise<RemoteObject> {
    if (id === this.rootId) {
      throw new RemoteError({ status: 403, detail: 'the root folder cannot be trashed' })
    }
    const record = this.require(id)
    record.trashed = true
    return record.object
  }

  async download(url: string): Promise<AsyncIterable<Uint8Array>> {
    const id = url.startsWith(DOWNLOAD_SCHEME) ? url.slice(DOWNLOAD_SCHEME.length) : ''
    const record = this.records.get(id)
    if (!record || record.content === undefined) {
      throw new RemoteError({ status: 404, detail: `nothing to download at ${url}` })
    }
    return bytesToStream(record.content)
  }

  // ===========================================================================
  // Inspection and seeding
  // ===========================================================================

  /**
   * Create an object synchronously, bypassing the RemoteStore surface.
   *
   * Unlike the path engine, seeding happily creates duplicate siblings.
   */
  seed(options: {
    title: string
    parentId?: string
    folder?: boolean
    mimeType?: string
    content?: Uint8Array | string
  }): RemoteObject {
    const parentId = options.parentId ?? this.rootId
    this.require(parentId)
    const mimeType = options.folder ? FOLDER_MIME_TYPE : options.mimeType
    const content =
      typeof options.content === 'string' ? new TextEncoder().encode(options.content) : options.content
    return this.create(options.title, parentId, mimeType, options.folder ? undefined : content ?? new Uint8Array(0))
  }

  /**
   * Whether an object has been trashed.
   */
  isTrashed(id: string): boolean {
    return this.require(id).trashed
  }

  /**
   * Raw content of a file, if it has any.
   */
  contentOf(id: string): Uint8Array | undefined {
    return this.require(id).content
  }

  /**
   * Children of a folder in insertion order, trashed ones included on request.
   */
  childrenOf(parentId: string, options: { includeTrashed?: boolean } = {}): RemoteObject[] {
    return [...this.records.values()]
      .filter((record) => record.object.parents.includes(parentId) && (options.includeTrashed || !record.trashed))
      .map((record) => record.object)
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private create(title: string, parentId: string, mimeType: string | undefined, content?: Uint8Array): RemoteObject {
    const id = `obj-${this.nextId++}`
    const timestamp = this.now().toISOString()
    const resolvedType = mimeType ?? DEFAULT_MIME_TYPE
    const native = resolvedType.startsWith(NATIVE_TYPE_PREFIX)
    const object: RemoteObject = {
      id,
      title,
      mimeType: resolvedType,
      createdDate: timestamp,
      modifiedDate: timestamp,
      parents: [parentId],
      ...(native ? {} : { downloadUrl: `${DOWNLOAD_SCHEME}${id}`, fileSize: content?.byteLength ?? 0 }),
    }
    this.records.set(id, { object, trashed: false, content: native ? undefined : content ?? new Uint8Array(0) })
    return object
  }

  private require(id: string): StoredObject {
    const record = this.records.get(id)
    if (!record) {
      throw new RemoteError({ status: 404, detail: `object ${id} not found` })
    }
    return record
  }

  private parse(query: string): QueryTerm[] {
    try {
      return parseQuery(query)
    } catch (error) {
      if (isInvalidInput(error)) {
        throw new RemoteError({ status: 400, detail: error.detail, cause: error })
      }
      throw error
    }
  }
}
