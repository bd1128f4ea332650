import { encodeMultipart } from "./multipart.js"

export type UploadErrorKind = "invalid-encoding" | "url-not-found" | "transport-failure" | "missing-metadata"

interface UploadErrorDetails {
  readonly status?: number
  readonly body?: string
  readonly timedOut?: boolean
  readonly aborted?: boolean
  readonly cause?: unknown
}

export class UploadError extends Error {
  readonly kind: UploadErrorKind
  readonly status?: number
  readonly body?: string
  readonly timedOut: boolean
  readonly aborted: boolean

  constructor(kind: UploadErrorKind, message: string, details: UploadErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause })
    this.name = "UploadError"
    this.kind = kind
    this.status = details.status
    this.body = details.body
    this.timedOut = details.timedOut ?? false
    this.aborted = details.aborted ?? false
  }
}

export const isUploadError = (value: unknown): value is UploadError => value instanceof UploadError

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>

export interface UploadClientConfig {
  readonly uploadUrl: string
  readonly fieldName?: string
  readonly requestTimeoutMs?: number
  readonly fetch?: FetchLike
}

export interface UploadRequest {
  readonly mimeType: string
  readonly extension: string
  readonly bytes: Uint8Array
}

export interface UploadOptions {
  readonly signal?: AbortSignal
  /** Fixed multipart boundary, for tests. */
  readonly boundary?: string
}

export interface UploadClient {
  readonly upload: (request: UploadRequest, options?: UploadOptions) => Promise<string>
}

export const DEFAULT_UPLOAD_URL = "https://nostr.build/upload.php"
export const DEFAULT_UPLOAD_FIELD = "fileToUpload"
export const DEFAULT_UPLOAD_TIMEOUT_MS = 30_000

export const HOSTED_URL_PATTERN = /https:\/\/nostr\.build\/(?:i|av)\/nostr\.build_[a-z0-9]{64}\.[a-z0-9]+/

export const extractHostedUrl = (text: string): string | undefined => text.match(HOSTED_URL_PATTERN)?.[0]

const utf8 = new TextDecoder("utf-8", { fatal: true })

export const decodeResponseText = (bytes: Uint8Array): string => {
  try {
    return utf8.decode(bytes)
  } catch (error) {
    throw new UploadError("invalid-encoding", "Upload response is not valid UTF-8", { cause: error })
  }
}

export const parseUploadResponse = (bytes: Uint8Array): string => {
  const text = decodeResponseText(bytes)
  const url = extractHostedUrl(text)
  if (!url) {
    throw new UploadError("url-not-found", "Upload response does not contain a hosted URL", { body: text })
  }
  return url
}

const readErrorBody = async (response: Response): Promise<string | undefined> => {
  try {
    return await response.text()
  } catch {
    return undefined
  }
}

export const createUploadClient = (config: UploadClientConfig): UploadClient => ({
  upload: async (request, options = {}) => {
    const fetchImpl = config.fetch ?? fetch
    const encoded = encodeMultipart({
      fieldName: config.fieldName ?? DEFAULT_UPLOAD_FIELD,
      fileName: `file.${request.extension}`,
      mimeType: request.mimeType,
      bytes: request.bytes,
      boundary: options.boundary,
    })
    const controller = new AbortController()
    const timeoutMs = config.requestTimeoutMs ?? DEFAULT_UPLOAD_TIMEOUT_MS
    let timedOut = false
    const timeout = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)
    const onAbort = () => controller.abort()
    const { signal } = options
    if (signal?.aborted) {
      controller.abort()
    } else {
      signal?.addEventListener("abort", onAbort, { once: true })
    }
    const cutOff = () => ({ timedOut, aborted: signal?.aborted ?? false })
    try {
      let payload: Uint8Array
      try {
        const response = await fetchImpl(config.uploadUrl, {
          method: "POST",
          headers: { "Content-Type": encoded.contentType },
          body: encoded.body,
          signal: controller.signal,
        })
        if (!response.ok) {
          const body = await readErrorBody(response)
          throw new UploadError("transport-failure", `Upload failed with status ${response.status}`, {
            status: response.status,
            body,
          })
        }
        payload = new Uint8Array(await response.arrayBuffer())
      } catch (error) {
        if (isUploadError(error)) throw error
        const state = cutOff()
        const message = state.timedOut
          ? `Upload timed out after ${timeoutMs}ms`
          : state.aborted
            ? "Upload aborted"
            : "Upload request failed"
        throw new UploadError("transport-failure", message, { ...state, cause: error })
      }
      return parseUploadResponse(payload)
    } finally {
      clearTimeout(timeout)
      signal?.removeEventListener("abort", onAbort)
    }
  },
})
