#!/usr/bin/env node
import { Command, ValidationError } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Console, Effect } from "effect"
import { formatCommandFailure } from "./commands/context.js"
import { doctorCommand } from "./commands/doctor.js"
import { listCommand } from "./commands/list.js"
import { renderCommand } from "./commands/render.js"
import { viewEffect } from "./commands/view.js"

const root = Command.make("chatview", {}, () => viewEffect).pipe(
  Command.withSubcommands([doctorCommand, listCommand, renderCommand]),
)

const cli = Command.run(root, { name: "chatview", version: "0.1.0" })

// Failures are printed here only; the CLI has already printed its own usage errors.
const reportFailure = (error: unknown) =>
  Effect.gen(function* () {
    if (!ValidationError.isValidationError(error)) {
      yield* Console.error(formatCommandFailure(error))
    }
    yield* Effect.sync(() => {
      process.exitCode = 1
    })
  })

cli(process.argv).pipe(Effect.catchAll(reportFailure), Effect.provide(NodeContext.layer), NodeRuntime.runMain)
