import { promises as fs } from "node:fs"
import os from "node:os"
import path from "node:path"
import { describe, expect, it } from "vitest"
import { loadAppConfig } from "../src/config/appConfig.js"
import { formatValidationIssues, parseBooleanLike, validateUserConfigInput } from "../src/config/schema.js"
import { ConfigError, loadUserConfigSync, parseUserConfig, resolveUserConfigPath } from "../src/config/userConfig.js"
import { resolveColorMode } from "../src/ui/theme.js"

const writeConfig = async (contents: string): Promise<string> => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "mantabs-config-"))
  const file = path.join(root, "config.yaml")
  await fs.writeFile(file, contents, "utf8")
  return file
}

describe("validateUserConfigInput", () => {
  it("normalizes known keys", () => {
    const result = validateUserConfigInput(
      { manBinary: " /usr/bin/man ", altScreen: "off", renderFaultPolicy: "status", color: "none" },
      { strictUnknownKeys: false },
    )
    expect(result.issues).toEqual([])
    expect(result.config).toEqual({
      manBinary: "/usr/bin/man",
      altScreen: false,
      renderFaultPolicy: "status",
      color: "none",
    })
  })

  it("warns about unknown keys unless strict", () => {
    expect(validateUserConfigInput({ theme: "dark" }, { strictUnknownKeys: false }).issues).toEqual([
      { severity: "warning", path: "theme", message: "Unknown key." },
    ])
    expect(validateUserConfigInput({ theme: "dark" }, { strictUnknownKeys: true }).issues[0]?.severity).toBe("error")
  })

  it("reports values of the wrong type", () => {
    const result = validateUserConfigInput(
      { altScreen: 3, renderFaultPolicy: "explode", colBinary: "" },
      { strictUnknownKeys: false },
    )
    expect(formatValidationIssues(result.issues)).toEqual([
      "ERROR colBinary: Expected a non-empty string.",
      "ERROR altScreen: Expected boolean, received number.",
      "ERROR renderFaultPolicy: Expected one of terminate, status.",
    ])
  })

  it("rejects a document that is not a mapping", () => {
    expect(validateUserConfigInput("hello", { strictUnknownKeys: false }).issues).toEqual([
      { severity: "error", path: "<root>", message: "Expected object, received string." },
    ])
    expect(validateUserConfigInput(null, { strictUnknownKeys: false })).toEqual({ config: {}, issues: [] })
  })

  it("parses boolean-like strings", () => {
    expect(parseBooleanLike(" YES ")).toBe(true)
    expect(parseBooleanLike("0")).toBe(false)
    expect(parseBooleanLike("maybe")).toBeUndefined()
  })
})

describe("user config file", () => {
  it("returns warnings alongside the parsed values", () => {
    expect(parseUserConfig("colBinary: /opt/col\nextra: 1\n", "/tmp/config.yaml")).toEqual({
      colBinary: "/opt/col",
      warnings: ["WARNING extra: Unknown key."],
    })
  })

  it("throws a ConfigError for invalid values", () => {
    expect(() => parseUserConfig("altScreen: sometimes\n", "/tmp/config.yaml")).toThrow(ConfigError)
    expect(() => parseUserConfig("altScreen: sometimes\n", "/tmp/config.yaml")).toThrow(
      "Invalid mantabs config at /tmp/config.yaml\nERROR altScreen: Expected boolean, received string.",
    )
  })

  it("tolerates a missing optional file", async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "mantabs-config-"))
    const missing = path.join(root, "absent.yaml")
    expect(loadUserConfigSync(missing, { required: false })).toEqual({
      path: missing,
      exists: false,
      config: {},
      warnings: [],
    })
    expect(() => loadUserConfigSync(missing, { required: true })).toThrow(`Cannot read mantabs config at ${missing}`)
  })

  it("prefers an explicit path over the environment", () => {
    expect(resolveUserConfigPath("/etc/mantabs.yaml", { MANTABS_CONFIG: "/env/config.yaml" })).toBe("/etc/mantabs.yaml")
    expect(resolveUserConfigPath(null, { MANTABS_CONFIG: "/env/config.yaml" })).toBe("/env/config.yaml")
  })
})

describe("loadAppConfig", () => {
  it("layers the file over the defaults", async () => {
    const file = await writeConfig("manBinary: /opt/man\naltScreen: false\ncolor: none\nrenderFaultPolicy: status\n")
    const { config, warnings } = loadAppConfig({ configPath: file }, {})
    expect(warnings).toEqual([])
    expect(config).toEqual({
      manBinary: "/opt/man",
      colBinary: "col",
      altScreen: false,
      renderFaultPolicy: "status",
      debugLogPath: null,
      colorMode: "none",
      configPath: file,
    })
  })

  it("lets the environment override the file and flags override both", async () => {
    const file = await writeConfig("manBinary: /opt/man\naltScreen: false\ncolor: none\ndebugLog: /tmp/file.jsonl\n")
    const env = {
      MANTABS_MAN_BIN: "/env/man",
      MANTABS_ALT_SCREEN: "1",
      MANTABS_RENDER_FAULT_POLICY: "Status",
      MANTABS_COLOR: "color",
      MANTABS_DEBUG_LOG: "/tmp/env.jsonl",
    }
    const fromEnv = loadAppConfig({ configPath: file }, env).config
    expect(fromEnv.manBinary).toBe("/env/man")
    expect(fromEnv.altScreen).toBe(true)
    expect(fromEnv.renderFaultPolicy).toBe("status")
    expect(fromEnv.colorMode).toBe("color")
    expect(fromEnv.debugLogPath).toBe("/tmp/env.jsonl")

    const fromFlags = loadAppConfig({ configPath: file, altScreen: false, debugLogPath: "/tmp/flag.jsonl" }, env).config
    expect(fromFlags.altScreen).toBe(false)
    expect(fromFlags.debugLogPath).toBe("/tmp/flag.jsonl")
  })

  it("requires the file named by MANTABS_CONFIG", async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "mantabs-config-"))
    const missing = path.join(root, "absent.yaml")
    expect(() => loadAppConfig({}, { MANTABS_CONFIG: missing })).toThrow(ConfigError)
  })
})

describe("resolveColorMode", () => {
  it("lets NO_COLOR win", () => {
    expect(resolveColorMode("color", { NO_COLOR: "1", MANTABS_COLOR: "color" })).toBe("none")
  })

  it("falls back to the configured mode", () => {
    expect(resolveColorMode("none", {})).toBe("none")
    expect(resolveColorMode(undefined, {})).toBe("color")
    expect(resolveColorMode("color", { MANTABS_COLOR: "off" })).toBe("none")
  })
})
