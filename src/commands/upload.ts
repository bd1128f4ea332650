import { Args, Command } from "@effect/cli"
import chalk from "chalk"
import { Console, Effect } from "effect"
import { createUploadClient } from "../api/uploadClient.js"
import { AppConfigTag } from "../config/appConfig.js"
import { formatUploadError, runUpload } from "./composeLogic.js"

const fileArg = Args.text({ name: "file" })

export const uploadCommand = Command.make("upload", { file: fileArg }, ({ file }) =>
  Effect.gen(function* () {
    const config = yield* AppConfigTag
    const client = createUploadClient({
      uploadUrl: config.uploadUrl,
      fieldName: config.uploadField,
      requestTimeoutMs: config.requestTimeoutMs,
    })
    const url = yield* Effect.tryPromise({
      try: () => runUpload(client, file),
      catch: (error) => error,
    }).pipe(Effect.tapError((error) => Console.error(chalk.red(formatUploadError(error)))))
    yield* Console.log(url)
  }),
)
