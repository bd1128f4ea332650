import { randomUUID } from "node:crypto"

export interface MultipartFilePart {
  readonly fieldName: string
  readonly fileName: string
  readonly mimeType: string
  readonly bytes: Uint8Array
  /** Fixed boundary, for tests. A random one is generated otherwise. */
  readonly boundary?: string
}

export interface MultipartBody {
  readonly body: Buffer
  readonly boundary: string
  readonly contentType: string
}

// The payload is not scanned for the boundary; a UUID is assumed never to occur in it.
export const encodeMultipart = (part: MultipartFilePart): MultipartBody => {
  const boundary = part.boundary ?? randomUUID()
  const head =
    `\r\n--${boundary}\r\n` +
    `Content-Disposition: form-data; name="${part.fieldName}"; filename="${part.fileName}"\r\n` +
    `Content-Type: ${part.mimeType}\r\n\r\n`
  const tail = `\r\n--${boundary}--\r\n`
  return {
    body: Buffer.concat([Buffer.from(head, "utf8"), part.bytes, Buffer.from(tail, "utf8")]),
    boundary,
    contentType: `multipart/form-data; boundary=${boundary}`,
  }
}
