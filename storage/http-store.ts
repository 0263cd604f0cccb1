/**
 * HttpDriveStore - RemoteStore over a Drive v2-style REST API
 *
 * Maps each RemoteStore call to one HTTP request:
 *
 * | Operation      | Request                                              |
 * |----------------|------------------------------------------------------|
 * | getObject      | `GET    files/{id}`                                  |
 * | listChildren   | `GET    files/{parentId}/children?q=...&pageToken=`  |
 * | insertObject   | `POST   files` (folders), multipart upload otherwise |
 * | patchObject    | `PATCH  files/{id}?addParents=&removeParents=`       |
 * | trashObject    | `POST   files/{id}/trash`                            |
 * | download       | `GET    {downloadUrl}`                               |
 *
 * Every request carries a bearer token. Non-2xx responses and transport
 * failures become {@link RemoteError} values; retrying them is left to
 * {@link RetryingStore}.
 *
 * @example
 * ```typescript
 * const store = new HttpDriveStore({
 *   accessToken: async () => tokens.current(),
 * })
 * const drive = new DrivePath({ store })
 * ```
 *
 * @module storage/http-store
 */

import { FOLDER_MIME_TYPE } from '../core/constants.js'
import { RemoteError, getErrorMessage } from '../core/errors.js'
import type {
  ChildListPage,
  ChildReference,
  InsertObjectInput,
  ObjectPatch,
  RemoteObject,
  RemoteStore,
} from '../core/types.js'
import { concatBytes, contentToBytes } from './content.js'

// =============================================================================
// Types
// =============================================================================

/**
 * The subset of `fetch` the store relies on.
 */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>

/**
 * Options for {@link HttpDriveStore}.
 */
export interface HttpDriveStoreOptions {
  /** OAuth access token, or a function returning a fresh one per request */
  accessToken: string | (() => Promise<string>)
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike
  /** Metadata endpoint (default: https://www.googleapis.com/drive/v2) */
  baseUrl?: string
  /** Upload endpoint (default: https://www.googleapis.com/upload/drive/v2) */
  uploadUrl?: string
}

export const DEFAULT_BASE_URL = 'https://www.googleapis.com/drive/v2'
export const DEFAULT_UPLOAD_URL = 'https://www.googleapis.com/upload/drive/v2'

const MULTIPART_BOUNDARY = 'drivepath-multipart-boundary'

// =============================================================================
// Response decoding
// =============================================================================

type JsonRecord = Record<string, unknown>

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function malformed(what: string, detail: string): RemoteError {
  return new RemoteError({ detail: `malformed ${what} response: ${detail}` })
}

function requireString(record: JsonRecord, key: string, what: string): string {
  const value = record[key]
  if (typeof value !== 'string') {
    throw malformed(what, `missing string field '${key}'`)
  }
  return value
}

/**
 * Decode a file resource. `fileSize` arrives as a decimal string.
 */
export function toRemoteObject(body: unknown): RemoteObject {
  if (!isRecord(body)) {
    throw malformed('file', 'expected an object')
  }

  const parents: string[] = []
  const rawParents = body['parents']
  if (Array.isArray(rawParents)) {
    for (const parent of rawParents) {
      const parentId = isRecord(parent) ? parent['id'] : undefined
      if (typeof parentId === 'string') {
        parents.push(parentId)
      }
    }
  }

  const object: RemoteObject = {
    id: requireString(body, 'id', 'file'),
    title: requireString(body, 'title', 'file'),
    mimeType: requireString(body, 'mimeType', 'file'),
    createdDate: requireString(body, 'createdDate', 'file'),
    modifiedDate: requireString(body, 'modifiedDate', 'file'),
    parents,
  }

  const downloadUrl = body['downloadUrl']
  const fileSize = body['fileSize']
  return {
    ...object,
    ...(typeof downloadUrl === 'string' ? { downloadUrl } : {}),
    ...(typeof fileSize === 'string' || typeof fileSize === 'number' ? { fileSize: Number(fileSize) } : {}),
  }
}

/**
 * Decode a children listing page.
 */
export function toChildListPage(body: unknown): ChildListPage {
  const rawItems = isRecord(body) ? body['items'] : undefined
  if (!isRecord(body) || !Array.isArray(rawItems)) {
    throw malformed('children', "missing array field 'items'")
  }

  const items: ChildReference[] = []
  for (const item of rawItems) {
    const id = isRecord(item) ? item['id'] : undefined
    if (typeof id !== 'string') {
      throw malformed('children', "child without an 'id'")
    }
    items.push({ id })
  }

  const page: ChildListPage = { items }
  const nextPageToken = body['nextPageToken']
  if (typeof nextPageToken === 'string' && nextPageToken !== '') {
    page.nextPageToken = nextPageToken
  }
  return page
}

/**
 * Best-effort message from an error response: the API's `error.message`
 * when present, the raw body otherwise.
 */
async function errorDetail(response: Response): Promise<string> {
  const fallback = `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`
  const text = await response.text().catch((error: unknown) => `${fallback} (${getErrorMessage(error)})`)
  if (text === '') return fallback

  let body: unknown
  try {
    body = JSON.parse(text)
  } catch {
    return text
  }
  const error = isRecord(body) ? body['error'] : undefined
  const message = isRecord(error) ? error['message'] : undefined
  return typeof message === 'string' ? message : text
}

// =============================================================================
// HttpDriveStore
// =============================================================================

export class HttpDriveStore implements RemoteStore {
  private readonly accessToken: string | (() => Promise<string>)
  private readonly fetchImpl: FetchLike
  private readonly baseUrl: string
  private readonly uploadUrl: string

  constructor(options: HttpDriveStoreOptions) {
    this.accessToken = options.accessToken
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init))
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')
    this.uploadUrl = (options.uploadUrl ?? DEFAULT_UPLOAD_URL).replace(/\/+$/, '')
  }

  // ===========================================================================
  // RemoteStore
  // ===========================================================================

  async getObject(id: string): Promise<RemoteObject> {
    const response = await this.request(`${this.baseUrl}/files/${encodeURIComponent(id)}`)
    return toRemoteObject(await response.json())
  }

  async listChildren(parentId: string, query: string, pageToken?: string): Promise<ChildListPage> {
    const params = new URLSearchParams({ q: query })
    if (pageToken) params.set('pageToken', pageToken)
    const response = await this.request(`${this.baseUrl}/files/${encodeURIComponent(parentId)}/children?${params}`)
    return toChildListPage(await response.json())
  }

  async insertObject(input: InsertObjectInput): Promise<RemoteObject> {
    const metadata = {
      title: input.title,
      parents: [{ id: input.parentId }],
      ...(input.mimeType !== undefined ? { mimeType: input.mimeType } : {}),
    }

    if (input.content === undefined || input.mimeType === FOLDER_MIME_TYPE) {
      const response = await this.request(`${this.baseUrl}/files`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json; charset=UTF-8' },
        body: JSON.stringify(metadata),
      })
      return toRemoteObject(await response.json())
    }

    const encoder = new TextEncoder()
    const head = encoder.encode(
      `--${MULTIPART_BOUNDARY}\r\n` +
        'Content-Type: application/json; charset=UTF-8\r\n\r\n' +
        `${JSON.stringify(metadata)}\r\n` +
        `--${MULTIPART_BOUNDARY}\r\n` +
        `Content-Type: ${input.mimeType ?? 'application/octet-stream'}\r\n\r\n`
    )
    const tail = encoder.encode(`\r\n--${MULTIPART_BOUNDARY}--`)
    const body = concatBytes([head, await contentToBytes(input.content), tail])

    const response = await this.request(`${this.uploadUrl}/files?uploadType=multipart`, {
      method: 'POST',
      headers: { 'Content-Type': `multipart/related; boundary=${MULTIPART_BOUNDARY}` },
      body,
    })
    return toRemoteObject(await response.json())
  }

  async patchObject(id: string, patch: ObjectPatch): Promise<RemoteObject> {
    const params = new URLSearchParams()
    if (patch.addParents?.length) params.set('addParents', patch.addParents.join(','))
    if (patch.removeParents?.length) params.set('removeParents', patch.removeParents.join(','))
    if (patch.modifiedDate !== undefined) params.set('setModifiedDate', 'true')

    const body: JsonRecord = {}
    if (patch.title !== undefined) body['title'] = patch.title
    if (patch.modifiedDate !== undefined) body['modifiedDate'] = patch.modifiedDate

    const query = params.toString()
    const response = await this.request(`${this.baseUrl}/files/${encodeURIComponent(id)}${query ? `?${query}` : ''}`, {
      method: 'PATCH',
      headers: { 'Content-Type': 'application/json; charset=UTF-8' },
      body: JSON.stringify(body),
    })
    return toRemoteObject(await response.json())
  }

  async trashObject(id: string): Promise<RemoteObject> {
    const response = await this.request(`${this.baseUrl}/files/${encodeURIComponent(id)}/trash`, { method: 'POST' })
    return toRemoteObject(await response.json())
  }

  async download(url: string): Promise<AsyncIterable<Uint8Array>> {
    const response = await this.request(url)
    const body = response.body
    if (!body) {
      return (async function* () {})()
    }
    const reader = body.getReader()

    // A consumer that stops early must cancel the body, or the response stays open.
    return (async function* () {
      let finished = false
      try {
        for (;;) {
          const { done, value } = await reader.read().catch((error: unknown) => {
            finished = true
            throw error
          })
          if (done) {
            finished = true
            return
          }
          if (!(value instanceof Uint8Array)) {
            throw malformed('download', 'expected binary chunks')
          }
          yield value
        }
      } finally {
        if (!finished) {
          await reader.cancel()
        }
        reader.releaseLock()
      }
    })()
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  private async token(): Promise<string> {
    return typeof this.accessToken === 'string' ? this.accessToken : this.accessToken()
  }

  /**
   * Authenticated request; resolves only for 2xx responses.
   *
   * @throws {RemoteError} With the HTTP status for error responses, without
   *   one when the request never completed
   */
  private async request(url: string, init: RequestInit = {}): Promise<Response> {
    const headers = new Headers(init.headers)
    headers.set('Authorization', `Bearer ${await this.token()}`)

    let response: Response
    try {
      response = await this.fetchImpl(url, { ...init, headers })
    } catch (error) {
      throw new RemoteError({ detail: getErrorMessage(error), cause: error })
    }

    if (!response.ok) {
      throw new RemoteError({ status: response.status, detail: await errorDetail(response) })
    }
    return response
  }
}
