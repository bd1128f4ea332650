import { UploadError, isUploadError, type UploadClient } from "../api/uploadClient.js"
import { silentDiagnostics, type Diagnostics } from "../util/diagnostics.js"
import type { CompositionBuffer } from "./compositionBuffer.js"
import type { CoordinatorState, MediaItem, SkipReason, UploadOutcome } from "./types.js"

export const UPLOADING_MARKER = "[uploading...]"

export type TransitionListener = (next: CoordinatorState, previous: CoordinatorState) => void

export interface UploadCoordinatorOptions {
  readonly buffer: CompositionBuffer
  readonly client: UploadClient
  readonly diagnostics?: Diagnostics
  readonly marker?: string
  readonly onTransition?: TransitionListener
}

interface UploadTask {
  readonly generation: number
  readonly controller: AbortController
  placeholderInserted: boolean
}

type Settled = { readonly status: "uploaded"; readonly url: string } | { readonly status: "failed"; readonly error: UploadError }

/**
 * Runs one attachment upload at a time against a compose buffer. A newer
 * selection aborts the older one; results of a task that is no longer current
 * never reach the buffer.
 */
export class UploadCoordinator {
  private readonly buffer: CompositionBuffer
  private readonly client: UploadClient
  private readonly diagnostics: Diagnostics
  private readonly marker: string
  private readonly onTransition?: TransitionListener
  private generation = 0
  private current: UploadTask | null = null
  private currentState: CoordinatorState = "idle"

  constructor(options: UploadCoordinatorOptions) {
    this.buffer = options.buffer
    this.client = options.client
    this.diagnostics = options.diagnostics ?? silentDiagnostics
    this.marker = options.marker ?? UPLOADING_MARKER
    this.onTransition = options.onTransition
  }

  get state(): CoordinatorState {
    return this.currentState
  }

  get busy(): boolean {
    return this.current !== null
  }

  select(item: MediaItem): Promise<UploadOutcome> {
    this.cancel()
    this.generation += 1
    const task: UploadTask = {
      generation: this.generation,
      controller: new AbortController(),
      placeholderInserted: false,
    }
    this.current = task
    return this.run(task, item)
  }

  cancel(): void {
    const task = this.current
    if (!task) return
    this.current = null
    task.controller.abort()
    if (task.placeholderInserted) {
      this.dropPlaceholder()
    }
    this.diagnostics.debug({ event: "cancelled", generation: task.generation })
    this.transition("idle")
  }

  private async run(task: UploadTask, item: MediaItem): Promise<UploadOutcome> {
    this.transition("preparing")
    const { mimeType, extension } = item
    if (!mimeType || !extension) {
      return this.skip(task, "missing-metadata", "no MIME type or file extension")
    }

    let bytes: Uint8Array | undefined
    try {
      bytes = await item.loadBytes(task.controller.signal)
    } catch (error) {
      this.diagnostics.debug({ event: "load-failed", generation: task.generation, error: String(error) })
      bytes = undefined
    }
    if (!this.isCurrent(task)) return { status: "superseded" }
    if (!bytes) {
      return this.skip(task, "missing-metadata", "no supported content type found")
    }

    this.buffer.insertPlaceholder(this.marker)
    task.placeholderInserted = true
    this.transition("uploading")

    let settled: Settled
    try {
      const url = await this.client.upload({ mimeType, extension, bytes }, { signal: task.controller.signal })
      settled = { status: "uploaded", url }
    } catch (error) {
      settled = {
        status: "failed",
        error: isUploadError(error)
          ? error
          : new UploadError("transport-failure", "Upload request failed", { cause: error }),
      }
    }
    return this.apply(task, settled)
  }

  private skip(task: UploadTask, reason: SkipReason, detail: string): UploadOutcome {
    if (!this.isCurrent(task)) return { status: "superseded" }
    this.current = null
    this.diagnostics.debug({ event: "skipped", generation: task.generation, reason, detail })
    this.transition("idle")
    return { status: "skipped", reason }
  }

  // Only the current task may write to the buffer.
  private apply(task: UploadTask, settled: Settled): UploadOutcome {
    if (!this.isCurrent(task)) {
      this.diagnostics.debug({ event: "stale-result", generation: task.generation, status: settled.status })
      return { status: "superseded" }
    }
    if (settled.status === "uploaded") {
      this.transition("reconciling")
      this.buffer.replacePlaceholder(this.marker, settled.url)
    } else {
      this.transition("failed")
      this.dropPlaceholder()
      this.diagnostics.error(`upload failed (${settled.error.kind})`, settled.error)
    }
    this.current = null
    this.transition("idle")
    return settled
  }

  // The user may have joined the marker onto the previous line.
  private dropPlaceholder(): void {
    if (!this.buffer.removePlaceholder(this.marker)) {
      this.buffer.replacePlaceholder(this.marker, "")
    }
  }

  private isCurrent(task: UploadTask): boolean {
    return this.current === task
  }

  private transition(next: CoordinatorState): void {
    const previous = this.currentState
    if (previous === next) return
    this.currentState = next
    this.diagnostics.debug({ event: "state", from: previous, to: next })
    this.onTransition?.(next, previous)
  }
}
