import type { UploadClient } from "../api/uploadClient.js"
import type { Diagnostics } from "../util/diagnostics.js"
import { CompositionBuffer } from "./compositionBuffer.js"
import { detectMention } from "./mentionTrigger.js"
import { looksLikePrivateKey as defaultPrivateKeyCheck } from "./privateKey.js"
import { UploadCoordinator } from "./uploadCoordinator.js"
import type {
  ComposeResult,
  ComposedPost,
  CoordinatorState,
  MediaItem,
  PostKind,
  PostReference,
  SendRequestResult,
  UploadOutcome,
} from "./types.js"

export interface ReplyTarget {
  readonly kind: PostKind | "other"
}

export interface ComposeSessionOptions {
  readonly uploadClient: UploadClient
  readonly initialText?: string
  readonly replyingTo?: ReplyTarget
  readonly references?: ReadonlyArray<PostReference>
  readonly looksLikePrivateKey?: (text: string) => boolean
  readonly submit?: (post: ComposedPost) => void
  readonly onCancel?: () => void
  readonly diagnostics?: Diagnostics
}

export type MentionListener = (query: string | undefined) => void

export const isBlank = (text: string): boolean => text.trim().length === 0

export const resolvePostKind = (replyingTo: ReplyTarget | undefined): PostKind =>
  replyingTo?.kind === "chat" ? "chat" : "text"

/**
 * One compose-a-note session: the buffer, the attachment uploader, and the
 * send/cancel gate. `result` settles once, when the note is sent or the
 * session is cancelled.
 */
export class ComposeSession {
  readonly buffer: CompositionBuffer
  readonly result: Promise<ComposeResult>
  private readonly coordinator: UploadCoordinator
  private readonly references: ReadonlyArray<PostReference>
  private readonly kind: PostKind
  private readonly privateKeyCheck: (text: string) => boolean
  private readonly submit?: (post: ComposedPost) => void
  private readonly onCancel?: () => void
  private readonly mentionListeners = new Set<MentionListener>()
  private resolveResult: (result: ComposeResult) => void = () => undefined
  private lastMention: string | undefined
  private warningPending = false
  private closed = false

  constructor(options: ComposeSessionOptions) {
    this.buffer = new CompositionBuffer(options.initialText ?? "")
    this.coordinator = new UploadCoordinator({
      buffer: this.buffer,
      client: options.uploadClient,
      diagnostics: options.diagnostics,
    })
    this.references = options.references ?? []
    this.kind = resolvePostKind(options.replyingTo)
    this.privateKeyCheck = options.looksLikePrivateKey ?? defaultPrivateKeyCheck
    this.submit = options.submit
    this.onCancel = options.onCancel
    this.result = new Promise<ComposeResult>((resolve) => {
      this.resolveResult = resolve
    })
    this.lastMention = detectMention(this.buffer.text)
    this.buffer.subscribe((text) => {
      const next = detectMention(text)
      if (next === this.lastMention) return
      this.lastMention = next
      for (const listener of this.mentionListeners) {
        listener(next)
      }
    })
  }

  get isClosed(): boolean {
    return this.closed
  }

  get isEmpty(): boolean {
    return isBlank(this.buffer.text)
  }

  get mentionQuery(): string | undefined {
    return this.lastMention
  }

  get privateKeyWarning(): boolean {
    return this.warningPending
  }

  get uploadState(): CoordinatorState {
    return this.coordinator.state
  }

  onMentionChange(listener: MentionListener): () => void {
    this.mentionListeners.add(listener)
    return () => {
      this.mentionListeners.delete(listener)
    }
  }

  attach(item: MediaItem): Promise<UploadOutcome> {
    if (this.closed) return Promise.resolve({ status: "superseded" })
    return this.coordinator.select(item)
  }

  requestSend(): SendRequestResult {
    if (this.closed) return "closed"
    if (this.isEmpty) return "empty"
    if (this.privateKeyCheck(this.buffer.text)) {
      this.warningPending = true
      return "needs-confirmation"
    }
    this.send()
    return "sent"
  }

  confirmSend(): SendRequestResult {
    if (this.closed) return "closed"
    this.send()
    return "sent"
  }

  dismissWarning(): void {
    this.warningPending = false
  }

  cancel(): void {
    if (this.closed) return
    this.close()
    this.onCancel?.()
    this.resolveResult({ type: "cancel" })
  }

  private send(): void {
    const post: ComposedPost = {
      content: this.buffer.text.trim(),
      references: this.references,
      kind: this.kind,
    }
    this.close()
    this.submit?.(post)
    this.resolveResult({ type: "post", post })
  }

  private close(): void {
    this.closed = true
    this.warningPending = false
    this.mentionListeners.clear()
    this.coordinator.cancel()
  }
}

export const createComposeSession = (options: ComposeSessionOptions): ComposeSession => new ComposeSession(options)
