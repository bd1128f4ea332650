import { describe, expect, it } from "vitest"
import { encodeMultipart } from "../multipart.js"

const countOccurrences = (haystack: string, needle: string): number => haystack.split(needle).length - 1

describe("encodeMultipart", () => {
  it("lays out a single file part around a fixed boundary", () => {
    const encoded = encodeMultipart({
      fieldName: "fileToUpload",
      fileName: "file.png",
      mimeType: "image/png",
      bytes: Buffer.from("PNGDATA", "utf8"),
      boundary: "test-boundary",
    })
    expect(encoded.boundary).toBe("test-boundary")
    expect(encoded.contentType).toBe("multipart/form-data; boundary=test-boundary")
    expect(encoded.body.toString("utf8")).toBe(
      "\r\n--test-boundary\r\n" +
        'Content-Disposition: form-data; name="fileToUpload"; filename="file.png"\r\n' +
        "Content-Type: image/png\r\n\r\n" +
        "PNGDATA" +
        "\r\n--test-boundary--\r\n",
    )
  })

  it("keeps arbitrary bytes verbatim and contiguous between one opening and one closing delimiter", () => {
    const bytes = Uint8Array.from([0x00, 0xff, 0x0d, 0x0a, 0x2d, 0x2d, 0x80, 0x7f])
    const encoded = encodeMultipart({
      fieldName: "f",
      fileName: "file.bin",
      mimeType: "application/octet-stream",
      bytes,
      boundary: "b0undary",
    })
    const latin = encoded.body.toString("latin1")
    expect(countOccurrences(latin, "--b0undary\r\n")).toBe(1)
    expect(countOccurrences(latin, "--b0undary--")).toBe(1)
    expect(encoded.body.indexOf(Buffer.from(bytes))).toBeGreaterThan(0)
    const head = latin.indexOf("\r\n\r\n") + 4
    expect(Array.from(encoded.body.subarray(head, head + bytes.length))).toEqual(Array.from(bytes))
  })

  it("generates a boundary when none is given", () => {
    const encoded = encodeMultipart({ fieldName: "f", fileName: "file.txt", mimeType: "text/plain", bytes: new Uint8Array() })
    expect(encoded.boundary).toMatch(/^[0-9a-f-]{36}$/)
    expect(encoded.contentType).toBe(`multipart/form-data; boundary=${encoded.boundary}`)
  })
})
