import { Command, Options } from "@effect/cli"
import chalk from "chalk"
import { Console, Effect, Option } from "effect"
import { createUploadClient } from "../api/uploadClient.js"
import { AppConfigTag } from "../config/appConfig.js"
import { createDiagnostics } from "../util/diagnostics.js"
import { formatComposeRun, parseReference, runCompose } from "./composeLogic.js"

const textOption = Options.text("text").pipe(Options.withDefault(""))
const attachOption = Options.text("attach").pipe(Options.optional)
const replyKindOption = Options.choice("reply-kind", ["text", "chat"] as const).pipe(Options.optional)
const referenceOption = Options.text("reference").pipe(Options.repeated)
const yesOption = Options.boolean("yes")
const outputOption = Options.choice("output", ["text", "json"] as const).pipe(Options.withDefault("text"))

export const composeCommand = Command.make(
  "compose",
  {
    text: textOption,
    attach: attachOption,
    replyKind: replyKindOption,
    reference: referenceOption,
    yes: yesOption,
    output: outputOption,
  },
  ({ text, attach, replyKind, reference, yes, output }) =>
    Effect.gen(function* () {
      const config = yield* AppConfigTag
      const references = yield* Effect.try(() => reference.map(parseReference))
      const client = createUploadClient({
        uploadUrl: config.uploadUrl,
        fieldName: config.uploadField,
        requestTimeoutMs: config.requestTimeoutMs,
      })
      const run = yield* Effect.promise(() =>
        runCompose({
          client,
          text,
          attachPath: Option.getOrUndefined(attach),
          replyKind: Option.getOrUndefined(replyKind),
          references,
          confirmPrivateKey: yes,
          diagnostics: createDiagnostics({ debug: config.debug }),
        }),
      )
      const rendered = formatComposeRun(run, output)
      if (run.blockedByPrivateKey && output === "text") {
        yield* Console.error(chalk.yellow(rendered))
        return
      }
      yield* Console.log(rendered)
    }),
)
