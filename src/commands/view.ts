import { Prompt } from "@effect/cli"
import type { Terminal } from "@effect/platform/Terminal"
import { Console, Effect, Runtime } from "effect"
import { createSystemPager } from "../shell/pager.js"
import { createFzfSelector } from "../shell/selector.js"
import { runViewer } from "../viewer/runViewer.js"
import { loadCommandContext, requireDependencies, toError } from "./context.js"

const identityPrompt = Prompt.text({ message: "Enter your email:" })

/** The interactive viewer: dependency check, then archive → identity → category → chat → pager. */
export const viewEffect = Effect.gen(function* () {
  const context = yield* loadCommandContext()
  const { config } = context
  yield* Console.log("🔍 Checking requirements...\n")
  yield* requireDependencies(config.selectorCommand)
  yield* Console.log("✅ All requirements satisfied.\n")

  const runtime = yield* Effect.runtime<Terminal>()
  yield* Effect.tryPromise({
    try: () =>
      runViewer({
        config,
        geometry: context.geometry,
        selector: createFzfSelector(config.selectorCommand),
        pager: createSystemPager(config.pagerCommand),
        promptIdentity: () => Runtime.runPromise(runtime)(identityPrompt),
        log: (line) => console.log(line),
        error: (line) => console.error(line),
      }),
    catch: toError,
  })
})
