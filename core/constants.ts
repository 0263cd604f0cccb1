/**
 * Constants shared across drivepath.
 *
 * @module core/constants
 */

/** MIME type the store reserves for folders */
export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder'

/** MIME type used for uploads when the caller gives none */
export const DEFAULT_MIME_TYPE = 'application/octet-stream'

/** Well-known identifier of the root folder */
export const ROOT_ID = 'root'

/** Folder (relative to the root) that receives two-phase uploads */
export const TMP_FOLDER = 'tmp'

/** Lifetime of a cache entry: 60 seconds */
export const CACHE_TTL_MS = 60_000

/** Total attempts per remote call, including the first */
export const RETRY_MAX_ATTEMPTS = 3

/** Linear backoff step: attempt n waits n * 1000 ms */
export const RETRY_BASE_DELAY_MS = 1000

/** Default query for directory listings */
export const DEFAULT_LIST_QUERY = 'trashed = false'
