import { Either } from "effect"
import { describe, expect, it } from "vitest"
import type { DebugFields, DebugLog } from "../src/logging/debugLog.js"
import { RenderFault } from "../src/render/types.js"
import { TabRegistry } from "../src/session/tabRegistry.js"
import { expectLeft, expectRight, FakeManRenderer, numberedLines } from "./helpers/fakeRenderer.js"

const WIDTH = 80
const HEIGHT = 10

const createRenderer = () =>
  new FakeManRenderer({
    ls: numberedLines(40, "ls"),
    cat: numberedLines(40, "cat"),
    printf: numberedLines(3, "printf"),
    "read(2)": numberedLines(12, "read"),
  })

const titles = (registry: TabRegistry) => registry.tabs().map((tab) => tab.title())

describe("TabRegistry", () => {
  it("skips missing pages and keeps opening the rest", () => {
    const registry = new TabRegistry()
    const result = expectRight(registry.open(["ls", "doesnotexist", "cat"], null, createRenderer(), WIDTH, HEIGHT))
    expect(result).toEqual({ opened: 2, lastError: "No manual entry for doesnotexist" })
    expect(titles(registry)).toEqual(["ls", "cat"])
    expect(registry.activeIndex()).toBe(1)
  })

  it("stops the batch on a renderer fault", () => {
    const registry = new TabRegistry()
    const renderer = createRenderer().failWith("broken")
    const fault = expectLeft(registry.open(["ls", "broken", "cat"], null, renderer, WIDTH, HEIGHT))
    expect(fault).toBeInstanceOf(RenderFault)
    expect(titles(registry)).toEqual(["ls"])
    expect(registry.activeIndex()).toBe(0)
  })

  it("opens pages under a category", () => {
    const registry = new TabRegistry()
    const renderer = createRenderer()
    registry.open(["read"], "2", renderer, WIDTH, HEIGHT)
    expect(titles(registry)).toEqual(["read(2)"])
    expect(renderer.calls).toEqual([{ name: "read", category: "2", width: WIDTH }])
  })

  it("closes the active tab and keeps the selection in range", () => {
    const registry = new TabRegistry()
    const renderer = createRenderer()
    registry.open(["ls", "cat", "printf"], null, renderer, WIDTH, HEIGHT)

    expect(Either.isRight(registry.closeActive(renderer, WIDTH, HEIGHT))).toBe(true)
    expect(titles(registry)).toEqual(["ls", "cat"])
    expect(registry.activeIndex()).toBe(1)

    registry.cycle("left", renderer, WIDTH, HEIGHT)
    registry.closeActive(renderer, WIDTH, HEIGHT)
    expect(titles(registry)).toEqual(["cat"])
    expect(registry.activeIndex()).toBe(0)

    registry.closeActive(renderer, WIDTH, HEIGHT)
    expect(registry.isEmpty()).toBe(true)
    expect(registry.activeIndex()).toBe(0)
    expect(registry.activeDocument()).toBeNull()
    expect(Either.isRight(registry.closeActive(renderer, WIDTH, HEIGHT))).toBe(true)
  })

  it("cycles with wraparound", () => {
    const registry = new TabRegistry()
    const renderer = createRenderer()
    registry.open(["ls", "cat", "printf"], null, renderer, WIDTH, HEIGHT)
    registry.cycle("right", renderer, WIDTH, HEIGHT)
    expect(registry.activeIndex()).toBe(0)
    registry.cycle("left", renderer, WIDTH, HEIGHT)
    expect(registry.activeIndex()).toBe(2)
  })

  it("re-renders on activation only when the width changed", () => {
    const registry = new TabRegistry()
    const renderer = createRenderer()
    registry.open(["ls", "cat"], null, renderer, WIDTH, HEIGHT)
    registry.cycle("left", renderer, WIDTH, HEIGHT)
    expect(renderer.calls).toHaveLength(2)
    registry.cycle("right", renderer, 100, HEIGHT)
    expect(renderer.calls).toHaveLength(3)
    expect(renderer.calls[2]).toEqual({ name: "cat", category: null, width: 100 })
  })

  it("logs opens, failures and closes", () => {
    const events: Array<{ event: string; fields?: DebugFields }> = []
    const log: DebugLog = {
      enabled: true,
      write: (event, fields) => {
        events.push({ event, fields })
      },
      close: async () => undefined,
    }
    const registry = new TabRegistry(log)
    const renderer = createRenderer()
    registry.open(["ls", "nope"], null, renderer, WIDTH, HEIGHT)
    registry.closeActive(renderer, WIDTH, HEIGHT)
    expect(events).toEqual([
      { event: "open", fields: { name: "ls", category: null, tabs: 1 } },
      {
        event: "open_failed",
        fields: { name: "nope", category: null, reason: "No manual entry for nope", recoverable: true },
      },
      { event: "close", fields: { name: "ls", tabs: 0 } },
    ])
  })
})
