// Full-length keys pasted with an @ in front are not treated as a search.
const KEY_TOKEN_LENGTH = 64

// Unicode space separators plus the tab, line and paragraph breaks (U+0009-U+000D, NEL, LS, PS).
const TOKEN_SEPARATOR = /[\p{Zs}\t\n\v\f\r\u0085\u2028\u2029]/u

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" })

export const graphemeLength = (text: string): number => Array.from(segmenter.segment(text)).length

export const detectMention = (buffer: string): string | undefined => {
  const tokens = buffer.split(TOKEN_SEPARATOR)
  const last = tokens[tokens.length - 1] ?? ""
  const length = graphemeLength(last)
  if (length < 2) return undefined
  if (!last.startsWith("@")) return undefined
  if (length === KEY_TOKEN_LENGTH) return undefined
  return last.slice(1)
}
