import dotenv from "dotenv"
import type { RenderFaultPolicy } from "../session/pagerSession.js"
import { resolveColorMode, type ColorMode } from "../ui/theme.js"
import { parseBooleanLike } from "./schema.js"
import { loadUserConfigSync, resolveUserConfigPath } from "./userConfig.js"

dotenv.config()

export interface AppConfig {
  readonly manBinary: string
  readonly colBinary: string
  readonly altScreen: boolean
  readonly renderFaultPolicy: RenderFaultPolicy
  readonly debugLogPath: string | null
  readonly colorMode: ColorMode
  readonly configPath: string
}

export interface AppConfigOverrides {
  readonly configPath?: string | null
  readonly debugLogPath?: string | null
  readonly altScreen?: boolean | null
  readonly strictConfig?: boolean
}

export interface LoadedAppConfig {
  readonly config: AppConfig
  readonly warnings: string[]
}

const DEFAULT_MAN_BINARY = "man"
const DEFAULT_COL_BINARY = "col"

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

const parseFaultPolicy = (value: string | undefined): RenderFaultPolicy | undefined => {
  const normalized = (value ?? "").trim().toLowerCase()
  if (normalized === "terminate" || normalized === "status") return normalized
  return undefined
}

export const loadAppConfig = (overrides: AppConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): LoadedAppConfig => {
  const explicitPath = overrides.configPath ?? null
  const configPath = resolveUserConfigPath(explicitPath, env)
  const user = loadUserConfigSync(configPath, {
    required: Boolean(explicitPath?.trim() || env.MANTABS_CONFIG?.trim()),
    strict: overrides.strictConfig,
  })
  const file = user.config

  const config: AppConfig = {
    manBinary: nonEmpty(env.MANTABS_MAN_BIN) ?? file.manBinary ?? DEFAULT_MAN_BINARY,
    colBinary: nonEmpty(env.MANTABS_COL_BIN) ?? file.colBinary ?? DEFAULT_COL_BINARY,
    altScreen: overrides.altScreen ?? parseBooleanLike(env.MANTABS_ALT_SCREEN) ?? file.altScreen ?? true,
    renderFaultPolicy: parseFaultPolicy(env.MANTABS_RENDER_FAULT_POLICY) ?? file.renderFaultPolicy ?? "terminate",
    debugLogPath: overrides.debugLogPath ?? nonEmpty(env.MANTABS_DEBUG_LOG) ?? file.debugLog ?? null,
    colorMode: resolveColorMode(file.color, env),
    configPath,
  }
  return { config, warnings: user.warnings }
}
