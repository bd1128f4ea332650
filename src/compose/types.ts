import type { UploadError } from "../api/uploadClient.js"

/** One attachment chosen in a media picker. */
export interface MediaItem {
  readonly mimeType: string | undefined
  readonly extension: string | undefined
  readonly loadBytes: (signal: AbortSignal) => Promise<Uint8Array | undefined>
}

export type CoordinatorState = "idle" | "preparing" | "uploading" | "reconciling" | "failed"

export type SkipReason = "missing-metadata"

export type UploadOutcome =
  | { readonly status: "uploaded"; readonly url: string }
  | { readonly status: "failed"; readonly error: UploadError }
  | { readonly status: "skipped"; readonly reason: SkipReason }
  | { readonly status: "superseded" }

export type PostKind = "text" | "chat"

export const EVENT_KIND_NUMBERS: Record<PostKind, number> = {
  text: 1,
  chat: 42,
}

export interface PostReference {
  readonly type: "e" | "p"
  readonly id: string
  readonly relayHint?: string
}

export interface ComposedPost {
  readonly content: string
  readonly references: ReadonlyArray<PostReference>
  readonly kind: PostKind
}

export type ComposeResult = { readonly type: "post"; readonly post: ComposedPost } | { readonly type: "cancel" }

export type SendRequestResult = "sent" | "needs-confirmation" | "empty" | "closed"
