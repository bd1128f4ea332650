import dotenv from "dotenv"
import { Context, Effect, Layer } from "effect"
import { DEFAULT_UPLOAD_FIELD, DEFAULT_UPLOAD_TIMEOUT_MS, DEFAULT_UPLOAD_URL } from "../api/uploadClient.js"
import { loadUserConfigSync } from "./userConfig.js"

dotenv.config()

export interface AppConfig {
  readonly uploadUrl: string
  readonly uploadField: string
  readonly requestTimeoutMs: number
  readonly debug: boolean
}

const positiveOr = (value: number | undefined, fallback: number): number =>
  value !== undefined && Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback

const computeConfig = (): AppConfig => {
  const userConfig = loadUserConfigSync()
  const uploadUrl = process.env.POSTDRAFT_UPLOAD_URL?.trim() || userConfig.uploadUrl || DEFAULT_UPLOAD_URL
  const uploadField = process.env.POSTDRAFT_UPLOAD_FIELD?.trim() || userConfig.uploadField || DEFAULT_UPLOAD_FIELD
  const timeoutEnv = process.env.POSTDRAFT_UPLOAD_TIMEOUT_MS?.trim()
  const requestTimeoutMs = timeoutEnv
    ? positiveOr(Number(timeoutEnv), DEFAULT_UPLOAD_TIMEOUT_MS)
    : positiveOr(userConfig.requestTimeoutMs, DEFAULT_UPLOAD_TIMEOUT_MS)
  return {
    uploadUrl,
    uploadField,
    requestTimeoutMs,
    debug: process.env.POSTDRAFT_DEBUG === "1",
  }
}

export const AppConfigTag = Context.GenericTag<AppConfig>("AppConfig")

export const AppConfigLayer = Layer.effect(AppConfigTag, Effect.sync(computeConfig))

export const loadAppConfig = (): AppConfig => computeConfig()
