import { Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { stringify } from "yaml"
import { AppConfigTag } from "../config/appConfig.js"
import { getUserConfigPath, updateUserConfig } from "../config/userConfig.js"

const outputOption = Options.choice("output", ["json", "yaml", "summary"] as const).pipe(Options.withDefault("json"))

const showCommand = Command.make("show", { output: outputOption }, ({ output }) =>
  Effect.gen(function* () {
    const config = yield* AppConfigTag
    if (output === "yaml") {
      yield* Console.log(stringify(config))
      return
    }
    if (output === "summary") {
      yield* Console.log("Effective postdraft config")
      yield* Console.log(`file: ${getUserConfigPath()}`)
      yield* Console.log(`uploadUrl: ${config.uploadUrl}`)
      yield* Console.log(`uploadField: ${config.uploadField}`)
      yield* Console.log(`requestTimeoutMs: ${config.requestTimeoutMs}`)
      yield* Console.log(`debug: ${config.debug}`)
      return
    }
    yield* Console.log(JSON.stringify(config, null, 2))
  }),
)

const setCommand = Command.make(
  "set",
  {
    uploadUrl: Options.text("upload-url").pipe(Options.optional),
    uploadField: Options.text("upload-field").pipe(Options.optional),
    timeoutMs: Options.integer("timeout-ms").pipe(Options.optional),
  },
  ({ uploadUrl, uploadField, timeoutMs }) =>
    Effect.tryPromise(() =>
      updateUserConfig({
        uploadUrl: Option.getOrUndefined(uploadUrl),
        uploadField: Option.getOrUndefined(uploadField),
        requestTimeoutMs: Option.getOrUndefined(timeoutMs),
      }),
    ).pipe(Effect.flatMap((configPath) => Console.log(`Saved ${configPath}`))),
)

export const configCommand = Command.make("config").pipe(Command.withSubcommands([showCommand, setCommand]))
