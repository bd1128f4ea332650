import { describe, expect, it, vi } from "vitest"
import { createComposeSession, isBlank, resolvePostKind, type ComposeSessionOptions } from "../composeSession.js"
import type { ComposedPost } from "../types.js"
import { HASH_A, createPendingClient, flush, hostedUrl, mediaItem } from "./fakes.js"

const openSession = (overrides: Partial<ComposeSessionOptions> = {}) => {
  const { client, calls } = createPendingClient()
  const submit = vi.fn<(post: ComposedPost) => void>()
  const onCancel = vi.fn<() => void>()
  const session = createComposeSession({
    uploadClient: client,
    submit,
    onCancel,
    looksLikePrivateKey: () => false,
    ...overrides,
  })
  return { session, calls, submit, onCancel }
}

describe("resolvePostKind", () => {
  it("answers chat with chat and everything else with text", () => {
    expect(resolvePostKind({ kind: "chat" })).toBe("chat")
    expect(resolvePostKind({ kind: "text" })).toBe("text")
    expect(resolvePostKind({ kind: "other" })).toBe("text")
    expect(resolvePostKind(undefined)).toBe("text")
  })
})

describe("isBlank", () => {
  it("treats whitespace and newlines as empty", () => {
    expect(isBlank(" \n\t ")).toBe(true)
    expect(isBlank(" a ")).toBe(false)
  })
})

describe("ComposeSession", () => {
  it("does not send an empty note", () => {
    const { session, submit } = openSession({ initialText: "  \n " })
    expect(session.isEmpty).toBe(true)
    expect(session.requestSend()).toBe("empty")
    expect(submit).not.toHaveBeenCalled()
    expect(session.isClosed).toBe(false)
  })

  it("sends trimmed content with the references and resolves the result", async () => {
    const references = [{ type: "e", id: "note-1" }, { type: "p", id: "author-1", relayHint: "wss://relay.test" }] as const
    const { session, submit } = openSession({ initialText: "\n  hello world \n", references })

    expect(session.requestSend()).toBe("sent")
    const post = { content: "hello world", references, kind: "text" }
    expect(submit).toHaveBeenCalledTimes(1)
    expect(submit).toHaveBeenCalledWith(post)
    await expect(session.result).resolves.toEqual({ type: "post", post })
    expect(session.isClosed).toBe(true)
  })

  it("posts as chat when replying to a chat message", async () => {
    const { session } = openSession({ initialText: "yo", replyingTo: { kind: "chat" } })
    session.requestSend()
    await expect(session.result).resolves.toEqual({
      type: "post",
      post: { content: "yo", references: [], kind: "chat" },
    })
  })

  it("holds a note that looks like it leaks a private key until confirmed", async () => {
    const check = vi.fn((text: string) => text.includes("nsec1"))
    const { session, submit } = openSession({ initialText: "nsec1 secret", looksLikePrivateKey: check })

    expect(session.requestSend()).toBe("needs-confirmation")
    expect(check).toHaveBeenCalledWith("nsec1 secret")
    expect(session.privateKeyWarning).toBe(true)
    expect(submit).not.toHaveBeenCalled()

    session.dismissWarning()
    expect(session.privateKeyWarning).toBe(false)
    expect(session.isClosed).toBe(false)

    expect(session.requestSend()).toBe("needs-confirmation")
    expect(session.confirmSend()).toBe("sent")
    expect(submit).toHaveBeenCalledWith({ content: "nsec1 secret", references: [], kind: "text" })
    expect(session.privateKeyWarning).toBe(false)
    await expect(session.result).resolves.toMatchObject({ type: "post" })
  })

  it("cancels once and ignores everything afterwards", async () => {
    const { session, submit, onCancel } = openSession({ initialText: "draft" })
    session.cancel()
    session.cancel()

    expect(onCancel).toHaveBeenCalledTimes(1)
    await expect(session.result).resolves.toEqual({ type: "cancel" })
    expect(session.requestSend()).toBe("closed")
    expect(session.confirmSend()).toBe("closed")
    expect(submit).not.toHaveBeenCalled()
    await expect(session.attach(mediaItem())).resolves.toEqual({ status: "superseded" })
  })

  it("reports mention queries as the buffer changes", () => {
    const { session } = openSession()
    const listener = vi.fn()
    session.onMentionChange(listener)

    session.buffer.setText("hi @al")
    session.buffer.setText("hi @ali")
    session.buffer.setText("hi @ali")
    expect(session.mentionQuery).toBe("ali")
    session.buffer.setText("hi @ali ")

    expect(listener.mock.calls).toEqual([["al"], ["ali"], [undefined]])
    expect(session.mentionQuery).toBeUndefined()
  })

  it("stops reporting mention changes once the session closes", async () => {
    const { session, calls } = openSession({ initialText: "hi @al" })
    const listener = vi.fn()
    session.onMentionChange(listener)
    const outcome = session.attach(mediaItem())
    await flush()
    expect(session.buffer.text).toBe("hi @al\n[uploading...]")

    session.cancel()
    expect(session.buffer.text).toBe("hi @al")
    expect(listener.mock.calls).toEqual([[undefined]])
    calls[0].resolve(hostedUrl(HASH_A))
    await expect(outcome).resolves.toEqual({ status: "superseded" })
  })

  it("splices an uploaded attachment into the note", async () => {
    const { session, calls, submit } = openSession({ initialText: "check this" })
    const outcome = session.attach(mediaItem())
    await flush()
    expect(session.uploadState).toBe("uploading")
    expect(session.buffer.text).toBe("check this\n[uploading...]")

    calls[0].resolve(hostedUrl(HASH_A))
    await outcome
    session.requestSend()
    expect(submit).toHaveBeenCalledWith({
      content: `check this\n${hostedUrl(HASH_A)}`,
      references: [],
      kind: "text",
    })
  })

  it("aborts an in-flight upload when the session is cancelled", async () => {
    const { session, calls } = openSession({ initialText: "draft" })
    const outcome = session.attach(mediaItem())
    await flush()
    session.cancel()

    expect(calls[0].signal?.aborted).toBe(true)
    expect(session.buffer.text).toBe("draft")
    calls[0].resolve(hostedUrl(HASH_A))
    await expect(outcome).resolves.toEqual({ status: "superseded" })
    expect(session.buffer.text).toBe("draft")
  })
})
