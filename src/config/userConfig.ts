import { homedir } from "node:os"
import path from "node:path"
import fs from "node:fs"
import { promises as fsp } from "node:fs"

export interface UserConfigFile {
  readonly uploadUrl?: string
  readonly uploadField?: string
  readonly requestTimeoutMs?: number
}

const resolveConfigPath = (): string => {
  const explicit = process.env.POSTDRAFT_USER_CONFIG?.trim()
  if (explicit) {
    return path.resolve(explicit)
  }
  return path.join(homedir(), ".postdraft", "config.json")
}

export const getUserConfigPath = (): string => resolveConfigPath()

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const parseUserConfig = (raw: string): UserConfigFile => {
  const parsed = JSON.parse(raw) as unknown
  if (!isRecord(parsed)) return {}
  const uploadUrl = typeof parsed.uploadUrl === "string" ? parsed.uploadUrl : undefined
  const uploadField = typeof parsed.uploadField === "string" ? parsed.uploadField : undefined
  const requestTimeoutMs = typeof parsed.requestTimeoutMs === "number" ? parsed.requestTimeoutMs : undefined
  return { uploadUrl, uploadField, requestTimeoutMs }
}

export const loadUserConfigSync = (): UserConfigFile => {
  const configPath = resolveConfigPath()
  if (!fs.existsSync(configPath)) return {}
  try {
    return parseUserConfig(fs.readFileSync(configPath, "utf8"))
  } catch (error) {
    console.error(`[config] ignoring unreadable ${configPath}: ${error instanceof Error ? error.message : String(error)}`)
    return {}
  }
}

export const writeUserConfig = async (next: UserConfigFile): Promise<void> => {
  const configPath = resolveConfigPath()
  await fsp.mkdir(path.dirname(configPath), { recursive: true })
  const payload = {
    ...(next.uploadUrl ? { uploadUrl: next.uploadUrl } : {}),
    ...(next.uploadField ? { uploadField: next.uploadField } : {}),
    ...(typeof next.requestTimeoutMs === "number" ? { requestTimeoutMs: next.requestTimeoutMs } : {}),
  }
  await fsp.writeFile(configPath, JSON.stringify(payload, null, 2), "utf8")
}

export const updateUserConfig = async (patch: UserConfigFile): Promise<string> => {
  const current = loadUserConfigSync()
  await writeUserConfig({
    uploadUrl: patch.uploadUrl ?? current.uploadUrl,
    uploadField: patch.uploadField ?? current.uploadField,
    requestTimeoutMs: patch.requestTimeoutMs ?? current.requestTimeoutMs,
  })
  return resolveConfigPath()
}
