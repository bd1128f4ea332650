import { promises as fs } from "node:fs"
import path from "node:path"
import type { MediaItem } from "../compose/types.js"

const MIME_BY_EXTENSION: Record<string, string> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  webp: "image/webp",
  heic: "image/heic",
  avif: "image/avif",
  mp4: "video/mp4",
  mov: "video/quicktime",
  webm: "video/webm",
  mp3: "audio/mpeg",
  m4a: "audio/mp4",
  ogg: "audio/ogg",
  wav: "audio/wav",
}

export const extensionOf = (filePath: string): string | undefined => {
  const ext = path.extname(filePath).slice(1).toLowerCase()
  return ext.length > 0 ? ext : undefined
}

export const mimeTypeForExtension = (extension: string | undefined): string | undefined =>
  extension && Object.hasOwn(MIME_BY_EXTENSION, extension) ? MIME_BY_EXTENSION[extension] : undefined

export const fileMediaItem = (filePath: string): MediaItem => {
  const extension = extensionOf(filePath)
  return {
    extension,
    mimeType: mimeTypeForExtension(extension),
    loadBytes: (signal) => fs.readFile(filePath, { signal }),
  }
}
