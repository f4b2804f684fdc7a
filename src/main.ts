#!/usr/bin/env node
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { CLI_VERSION, pagerCommand } from "./commands/pager.js"

const cli = Command.run(pagerCommand, { name: "mantabs", version: CLI_VERSION })

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
