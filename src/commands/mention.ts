import { Args, Command } from "@effect/cli"
import { Console, Effect } from "effect"
import { detectMention } from "../compose/mentionTrigger.js"

export const mentionCommand = Command.make("mention", { text: Args.text({ name: "text" }) }, ({ text }) => {
  const query = detectMention(text)
  return query === undefined ? Effect.void : Console.log(query)
})
