/**
 * RetryingStore - RemoteStore decorator that retries transient failures
 *
 * Every call is routed through {@link withRetry}. Upload content is buffered
 * before the first attempt so a retried insert resends the same bytes, and
 * downloads retry only the request that opens the stream.
 *
 * @module storage/retrying-store
 */

import { withRetry, type RetryOptions } from '../core/retry.js'
import type {
  ChildListPage,
  InsertObjectInput,
  ObjectPatch,
  RemoteObject,
  RemoteStore,
  RemoteStoreOperation,
} from '../core/types.js'
import type { Logger } from '../utils/logger.js'
import { contentToBytes } from './content.js'

/**
 * Options for {@link RetryingStore}.
 */
export interface RetryingStoreOptions extends Omit<RetryOptions, 'operation' | 'logger'> {
  /** Receives a debug line per remote call and a warning per retry */
  logger?: Pick<Logger, 'debug' | 'warn'>
}

export class RetryingStore implements RemoteStore {
  private readonly inner: RemoteStore
  private readonly options: RetryingStoreOptions

  constructor(inner: RemoteStore, options: RetryingStoreOptions = {}) {
    this.inner = inner
    this.options = options
  }

  getObject(id: string): Promise<RemoteObject> {
    return this.call('getObject', [id], () => this.inner.getObject(id))
  }

  listChildren(parentId: string, query: string, pageToken?: string): Promise<ChildListPage> {
    return this.call('listChildren', [parentId, query, pageToken], () =>
      this.inner.listChildren(parentId, query, pageToken)
    )
  }

  async insertObject(input: InsertObjectInput): Promise<RemoteObject> {
    const buffered: InsertObjectInput =
      input.content === undefined ? input : { ...input, content: await contentToBytes(input.content) }
    return this.call('insertObject', [input.parentId, input.title], () => this.inner.insertObject(buffered))
  }

  patchObject(id: string, patch: ObjectPatch): Promise<RemoteObject> {
    return this.call('patchObject', [id, patch], () => this.inner.patchObject(id, patch))
  }

  trashObject(id: string): Promise<RemoteObject> {
    return this.call('trashObject', [id], () => this.inner.trashObject(id))
  }

  download(url: string): Promise<AsyncIterable<Uint8Array>> {
    return this.call('download', [url], () => this.inner.download(url))
  }

  private call<T>(operation: RemoteStoreOperation, args: unknown[], fn: () => Promise<T>): Promise<T> {
    this.options.logger?.debug(operation, ...args.filter((arg) => arg !== undefined))
    return withRetry(fn, { ...this.options, operation })
  }
}
