import { UploadError, isUploadError, type UploadClient } from "../api/uploadClient.js"
import { createComposeSession } from "../compose/composeSession.js"
import {
  EVENT_KIND_NUMBERS,
  type ComposeResult,
  type PostKind,
  type PostReference,
  type UploadOutcome,
} from "../compose/types.js"
import { fileMediaItem } from "../media/fileMediaItem.js"
import type { Diagnostics } from "../util/diagnostics.js"

export type OutputMode = "text" | "json"

export const runUpload = async (client: UploadClient, filePath: string): Promise<string> => {
  const item = fileMediaItem(filePath)
  const { mimeType, extension } = item
  if (!mimeType || !extension) {
    throw new UploadError("missing-metadata", `Unsupported file type: ${filePath}`)
  }
  let bytes: Uint8Array | undefined
  try {
    bytes = await item.loadBytes(new AbortController().signal)
  } catch (error) {
    throw new UploadError("missing-metadata", `Could not read ${filePath}`, { cause: error })
  }
  if (!bytes) {
    throw new UploadError("missing-metadata", `Could not read ${filePath}`)
  }
  return client.upload({ mimeType, extension, bytes })
}

export const formatUploadError = (error: unknown): string => {
  if (isUploadError(error)) {
    const status = error.status !== undefined ? ` (status ${error.status})` : ""
    return `[upload] ${error.kind}: ${error.message}${status}`
  }
  return `[upload] ${error instanceof Error ? error.message : String(error)}`
}

export const parseReference = (value: string): PostReference => {
  const [type, id, ...relay] = value.split(":")
  if ((type !== "e" && type !== "p") || !id) {
    throw new Error(`Invalid reference "${value}" (expected e:<id> or p:<pubkey>[:<relay>])`)
  }
  const relayHint = relay.join(":")
  return relayHint ? { type, id, relayHint } : { type, id }
}

export interface ComposeRunOptions {
  readonly client: UploadClient
  readonly text: string
  readonly attachPath?: string
  readonly replyKind?: PostKind
  readonly references?: ReadonlyArray<PostReference>
  readonly confirmPrivateKey?: boolean
  readonly looksLikePrivateKey?: (text: string) => boolean
  readonly diagnostics?: Diagnostics
}

export interface ComposeRun {
  readonly result: ComposeResult
  readonly upload?: UploadOutcome
  readonly blockedByPrivateKey: boolean
  readonly empty: boolean
}

export const runCompose = async (options: ComposeRunOptions): Promise<ComposeRun> => {
  const session = createComposeSession({
    uploadClient: options.client,
    initialText: options.text,
    replyingTo: options.replyKind ? { kind: options.replyKind } : undefined,
    references: options.references,
    looksLikePrivateKey: options.looksLikePrivateKey,
    diagnostics: options.diagnostics,
  })
  const upload = options.attachPath ? await session.attach(fileMediaItem(options.attachPath)) : undefined
  let blockedByPrivateKey = false
  let empty = false
  const requested = session.requestSend()
  if (requested === "needs-confirmation") {
    if (options.confirmPrivateKey) {
      session.confirmSend()
    } else {
      blockedByPrivateKey = true
      session.dismissWarning()
      session.cancel()
    }
  } else if (requested === "empty") {
    empty = true
    session.cancel()
  }
  const result = await session.result
  return { result, upload, blockedByPrivateKey, empty }
}

export const toEventTemplate = (result: ComposeResult) => {
  if (result.type !== "post") return null
  const { post } = result
  return {
    kind: EVENT_KIND_NUMBERS[post.kind],
    content: post.content,
    tags: post.references.map((ref) => (ref.relayHint ? [ref.type, ref.id, ref.relayHint] : [ref.type, ref.id])),
  }
}

export const formatComposeRun = (run: ComposeRun, mode: OutputMode): string => {
  if (mode === "json") {
    return JSON.stringify({ result: run.result.type, event: toEventTemplate(run.result) }, null, 2)
  }
  if (run.result.type === "post") {
    return run.result.post.content
  }
  if (run.blockedByPrivateKey) {
    return 'Note contains "nsec1" private key. Not posted (pass --yes to post anyway).'
  }
  if (run.empty) {
    return "Nothing to post."
  }
  return "Cancelled."
}
