export type DiagnosticsSink = (line: string) => void

export interface Diagnostics {
  readonly debug: (payload: Record<string, unknown>) => void
  readonly error: (message: string, error?: unknown) => void
}

export interface DiagnosticsOptions {
  readonly tag?: string
  readonly debug?: boolean
  readonly sink?: DiagnosticsSink
}

const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message ? `${error.name}: ${error.message}` : error.name
  }
  return String(error)
}

export const isDebugEnabled = (): boolean => process.env.POSTDRAFT_DEBUG === "1"

export const createDiagnostics = (options: DiagnosticsOptions = {}): Diagnostics => {
  const tag = options.tag ?? "upload"
  const sink: DiagnosticsSink = options.sink ?? ((line) => console.error(line))
  const debugEnabled = options.debug ?? isDebugEnabled()
  return {
    debug: (payload) => {
      if (!debugEnabled) return
      sink(JSON.stringify({ tag, ...payload }))
    },
    error: (message, error) => {
      sink(error === undefined ? `[${tag}] ${message}` : `[${tag}] ${message}: ${describeError(error)}`)
    },
  }
}

export const silentDiagnostics: Diagnostics = {
  debug: () => undefined,
  error: () => undefined,
}
