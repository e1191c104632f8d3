#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { runCliToExitCode } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with the exit code from runCliToExitCode
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: non-zero exit codes terminate the process
// COMPLEXITY: O(1)

const main = Effect.gen(function*(_) {
  const exitCode = yield* _(runCliToExitCode(process.argv))
  if (exitCode !== 0) {
    yield* _(
      Effect.sync(() => {
        process.exitCode = exitCode
      })
    )
  }
})

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
