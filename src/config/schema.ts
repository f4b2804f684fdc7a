import type { RenderFaultPolicy } from "../session/pagerSession.js"
import type { ColorMode } from "../ui/theme.js"

export interface UserConfigInput {
  readonly manBinary?: string
  readonly colBinary?: string
  readonly altScreen?: boolean
  readonly renderFaultPolicy?: RenderFaultPolicy
  readonly debugLog?: string
  readonly color?: ColorMode
}

export type ValidationIssue = {
  readonly severity: "error" | "warning"
  readonly path: string
  readonly message: string
}

export type ValidationResult = {
  readonly config: UserConfigInput
  readonly issues: readonly ValidationIssue[]
}

export type ValidationOptions = {
  readonly strictUnknownKeys: boolean
}

const KNOWN_KEYS = new Set(["manBinary", "colBinary", "altScreen", "renderFaultPolicy", "debugLog", "color"])
const FAULT_POLICIES: ReadonlyArray<RenderFaultPolicy> = ["terminate", "status"]
const COLOR_MODES: ReadonlyArray<ColorMode> = ["color", "none"]

const BOOL_TRUE = new Set(["1", "true", "yes", "on"])
const BOOL_FALSE = new Set(["0", "false", "no", "off"])

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value != null && !Array.isArray(value)

export const parseBooleanLike = (value: unknown): boolean | undefined => {
  if (typeof value === "boolean") return value
  if (typeof value !== "string") return undefined
  const normalized = value.trim().toLowerCase()
  if (BOOL_TRUE.has(normalized)) return true
  if (BOOL_FALSE.has(normalized)) return false
  return undefined
}

const readString = (source: Record<string, unknown>, key: string, issues: ValidationIssue[]): string | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  if (typeof value !== "string" || value.trim().length === 0) {
    issues.push({ severity: "error", path: key, message: "Expected a non-empty string." })
    return undefined
  }
  return value.trim()
}

const readBoolean = (source: Record<string, unknown>, key: string, issues: ValidationIssue[]): boolean | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const parsed = parseBooleanLike(source[key])
  if (parsed === undefined) {
    issues.push({ severity: "error", path: key, message: `Expected boolean, received ${typeof source[key]}.` })
  }
  return parsed
}

const readEnum = <T extends string>(
  source: Record<string, unknown>,
  key: string,
  allowed: ReadonlyArray<T>,
  issues: ValidationIssue[],
): T | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  const match = allowed.find((candidate) => candidate === value)
  if (match === undefined) {
    issues.push({ severity: "error", path: key, message: `Expected one of ${allowed.join(", ")}.` })
  }
  return match
}

export const validateUserConfigInput = (raw: unknown, options: ValidationOptions): ValidationResult => {
  if (raw == null) return { config: {}, issues: [] }
  if (!isRecord(raw)) {
    return {
      config: {},
      issues: [{ severity: "error", path: "<root>", message: `Expected object, received ${typeof raw}.` }],
    }
  }
  const issues: ValidationIssue[] = []
  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      issues.push({
        severity: options.strictUnknownKeys ? "error" : "warning",
        path: key,
        message: "Unknown key.",
      })
    }
  }
  const config: UserConfigInput = {
    manBinary: readString(raw, "manBinary", issues),
    colBinary: readString(raw, "colBinary", issues),
    altScreen: readBoolean(raw, "altScreen", issues),
    renderFaultPolicy: readEnum(raw, "renderFaultPolicy", FAULT_POLICIES, issues),
    debugLog: readString(raw, "debugLog", issues),
    color: readEnum(raw, "color", COLOR_MODES, issues),
  }
  return { config, issues }
}

export const formatValidationIssues = (issues: readonly ValidationIssue[]): string[] =>
  issues.map((issue) => `${issue.severity.toUpperCase()} ${issue.path}: ${issue.message}`)
