import { describe, expect, it } from "vitest"
import { detectMention, graphemeLength } from "../mentionTrigger.js"

describe("detectMention", () => {
  it("returns the trailing @ token without the @", () => {
    expect(detectMention("hello @ji")).toBe("ji")
    expect(detectMention("first line\n@bob")).toBe("bob")
    expect(detectMention("@al")).toBe("al")
  })

  it("ignores a lone @", () => {
    expect(detectMention("hello @")).toBeUndefined()
  })

  it("ignores key-length tokens", () => {
    const token = `@${"n".repeat(63)}`
    expect(token).toHaveLength(64)
    expect(detectMention(`cc ${token}`)).toBeUndefined()
    expect(detectMention(`cc @${"n".repeat(62)}`)).toBe("n".repeat(62))
  })

  it("splits on line and paragraph separators but not on a byte order mark", () => {
    expect(detectMention("hi\u0085@bob")).toBe("bob")
    expect(detectMention("hi\u2028@bob")).toBe("bob")
    expect(detectMention("hi\u00a0@bob")).toBe("bob")
    expect(detectMention("hi\ufeff@bob")).toBeUndefined()
  })

  it("counts user-perceived characters", () => {
    expect(graphemeLength("👍🏽")).toBe(1)
    expect(detectMention("@\u0301")).toBeUndefined()
    expect(detectMention(`cc @${"a".repeat(62)}👍🏽`)).toBeUndefined()
    expect(detectMention(`cc @${"a".repeat(61)}👍🏽`)).toBe(`${"a".repeat(61)}👍🏽`)
  })

  it("ignores text without a trailing @ token", () => {
    expect(detectMention("no at sign here")).toBeUndefined()
    expect(detectMention("mail me@host")).toBeUndefined()
    expect(detectMention("hello @ji ")).toBeUndefined()
    expect(detectMention("")).toBeUndefined()
  })
})
