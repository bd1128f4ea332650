export type BufferListener = (text: string) => void

/**
 * The text of one compose session. User edits arrive through `setText`; the
 * upload coordinator only ever touches its own placeholder, and every
 * placeholder operation is a silent no-op once the user has edited the marker
 * away.
 */
export class CompositionBuffer {
  private value: string
  private readonly listeners = new Set<BufferListener>()

  constructor(initial = "") {
    this.value = initial
  }

  get text(): string {
    return this.value
  }

  setText(next: string): void {
    this.commit(next)
  }

  subscribe(listener: BufferListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  insertPlaceholder(marker: string): string {
    this.commit(`${this.value}\n${marker}`)
    return this.value
  }

  replacePlaceholder(marker: string, replacement: string): boolean {
    return this.spliceFirst(marker, replacement)
  }

  removePlaceholder(marker: string): boolean {
    return this.spliceFirst(`\n${marker}`, "")
  }

  private spliceFirst(needle: string, replacement: string): boolean {
    if (needle.length === 0) return false
    const index = this.value.indexOf(needle)
    if (index < 0) return false
    return this.commit(this.value.slice(0, index) + replacement + this.value.slice(index + needle.length))
  }

  private commit(next: string): boolean {
    if (next === this.value) return false
    this.value = next
    for (const listener of this.listeners) {
      listener(next)
    }
    return true
  }
}
