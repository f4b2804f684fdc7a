import fs from "node:fs"
import { homedir } from "node:os"
import path from "node:path"
import { Data } from "effect"
import { parse } from "yaml"
import { formatValidationIssues, validateUserConfigInput, type UserConfigInput } from "./schema.js"

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string
}> {}

export interface LoadedUserConfig {
  readonly path: string
  readonly exists: boolean
  readonly config: UserConfigInput
  readonly warnings: string[]
}

export const defaultUserConfigPath = (): string => path.join(homedir(), ".config", "mantabs", "config.yaml")

export const resolveUserConfigPath = (explicit: string | null, env: NodeJS.ProcessEnv = process.env): string => {
  const fromEnv = env.MANTABS_CONFIG?.trim()
  const chosen = explicit?.trim() || fromEnv
  return chosen ? path.resolve(chosen) : defaultUserConfigPath()
}

export const parseUserConfig = (raw: string, filePath: string, strictUnknownKeys = false): UserConfigInput & { warnings: string[] } => {
  let parsed: unknown
  try {
    parsed = parse(raw)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError({ message: `Invalid mantabs config at ${filePath}\n${reason}` })
  }
  const validated = validateUserConfigInput(parsed, { strictUnknownKeys })
  const errors = validated.issues.filter((issue) => issue.severity === "error")
  if (errors.length > 0) {
    throw new ConfigError({ message: `Invalid mantabs config at ${filePath}\n${formatValidationIssues(errors).join("\n")}` })
  }
  const warnings = formatValidationIssues(validated.issues.filter((issue) => issue.severity === "warning"))
  return { ...validated.config, warnings }
}

/** Reads the YAML user config. A missing file is only an error when its path was given explicitly. */
export const loadUserConfigSync = (filePath: string, options: { required: boolean; strict?: boolean }): LoadedUserConfig => {
  let raw: string
  try {
    raw = fs.readFileSync(filePath, "utf8")
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined
    if (code === "ENOENT" && !options.required) {
      return { path: filePath, exists: false, config: {}, warnings: [] }
    }
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError({ message: `Cannot read mantabs config at ${filePath}: ${reason}` })
  }
  const { warnings, ...config } = parseUserConfig(raw, filePath, options.strict ?? false)
  return { path: filePath, exists: true, config, warnings }
}
