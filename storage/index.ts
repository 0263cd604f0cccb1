/**
 * RemoteStore implementations
 *
 * - {@link HttpDriveStore} - REST client for the hosted service
 * - {@link MemoryStore} - in-process store for tests and dry runs
 * - {@link RetryingStore} - decorator retrying transient failures
 *
 * @module storage
 */

export {
  HttpDriveStore,
  type HttpDriveStoreOptions,
  type FetchLike,
  DEFAULT_BASE_URL,
  DEFAULT_UPLOAD_URL,
  toRemoteObject,
  toChildListPage,
} from './http-store.js'

export { MemoryStore, type MemoryStoreOptions } from './memory-store.js'

export { RetryingStore, type RetryingStoreOptions } from './retrying-store.js'

export { collectBytes, contentToBytes, bytesToStream } from './content.js'
