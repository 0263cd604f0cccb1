/**
 * Core type definitions for drivepath
 *
 * The remote store is flat: objects know their parents by id and nothing
 * knows its path. These types describe the store contract the path engine is
 * written against; adapters in `storage/` implement it.
 *
 * @module core/types
 */

// =============================================================================
// Data Model
// =============================================================================

/**
 * An object held by the remote store: a file or a folder.
 *
 * Values are never mutated in place. A patch returns a fresh object.
 */
export interface RemoteObject {
  /** Opaque, store-assigned identifier */
  readonly id: string
  /** Leaf name; not unique among siblings */
  readonly title: string
  /** MIME type; folders carry the folder MIME type */
  readonly mimeType: string
  /** RFC 3339 creation timestamp */
  readonly createdDate: string
  /** RFC 3339 modification timestamp */
  readonly modifiedDate: string
  /** Ids of the containing folders */
  readonly parents: readonly string[]
  /** Where the content can be fetched from (files only) */
  readonly downloadUrl?: string
  /** Content length in bytes (files only) */
  readonly fileSize?: number
}

/**
 * Lightweight child entry returned by a children listing.
 */
export interface ChildReference {
  readonly id: string
}

/**
 * One page of a children listing.
 */
export interface ChildListPage {
  items: ChildReference[]
  /** Present when more pages follow */
  nextPageToken?: string
}

/**
 * Upload payload. Streams are read once; RetryingStore buffers them so a
 * retried upload can resend the bytes.
 */
export type ObjectContent = Uint8Array | string | AsyncIterable<Uint8Array>

/**
 * Arguments for creating an object.
 */
export interface InsertObjectInput {
  title: string
  parentId: string
  /** Defaults to application/octet-stream for content uploads */
  mimeType?: string
  /** Omitted for folders */
  content?: ObjectContent
}

/**
 * Metadata changes applied by a single patch call.
 */
export interface ObjectPatch {
  title?: string
  /** RFC 3339 timestamp; the store must keep it instead of stamping its own */
  modifiedDate?: string
  addParents?: string[]
  removeParents?: string[]
}

// =============================================================================
// Store Contract
// =============================================================================

/**
 * The remote object store.
 *
 * Failures are RemoteError values carrying the HTTP status where one is
 * known; a 5xx status marks the failure as retryable.
 */
export interface RemoteStore {
  /** Fetch an object by id */
  getObject(id: string): Promise<RemoteObject>

  /**
   * List one page of the children of `parentId` that match `query`.
   * Pass the previous page's `nextPageToken` to continue.
   */
  listChildren(parentId: string, query: string, pageToken?: string): Promise<ChildListPage>

  /** Create an object, with content when given */
  insertObject(input: InsertObjectInput): Promise<RemoteObject>

  /** Apply a metadata patch and return the updated object */
  patchObject(id: string, patch: ObjectPatch): Promise<RemoteObject>

  /** Move an object to the trash and return it */
  trashObject(id: string): Promise<RemoteObject>

  /** Stream the bytes behind a download URL */
  download(url: string): Promise<AsyncIterable<Uint8Array>>
}

/**
 * Names of the {@link RemoteStore} operations.
 */
export type RemoteStoreOperation = keyof RemoteStore
