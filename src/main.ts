#!/usr/bin/env node
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { composeCommand } from "./commands/compose.js"
import { configCommand } from "./commands/config.js"
import { mentionCommand } from "./commands/mention.js"
import { uploadCommand } from "./commands/upload.js"
import { AppConfigLayer } from "./config/appConfig.js"

const root = Command.make("postdraft").pipe(
  Command.withSubcommands([composeCommand, uploadCommand, mentionCommand, configCommand]),
)

const cli = Command.run(root, { name: "postdraft", version: "0.1.0" })

cli(process.argv).pipe(Effect.provide(AppConfigLayer), Effect.provide(NodeContext.layer), NodeRuntime.runMain)
