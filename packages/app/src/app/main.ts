import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, pipe } from "effect"

import { program } from "./program.js"

// CHANGE: run the program through the Node platform runtime with its layer
// WHY: ensure effects execute under the platform runtime with proper teardown/logging behavior
// QUOTE(TZ): n/a
// REF: user-2025-05-02-invite-relay
// SOURCE: https://effect.website/docs/platform/runtime/ "runMain helps you execute a main effect with built-in error handling, logging, and signal management."
// FORMAT THEOREM: forall env: decode(env) = config -> runMain(program)
// PURITY: SHELL
// EFFECT: Effect<never, ConfigError, never>
// INVARIANT: program executed with NodeContext.layer
// COMPLEXITY: O(1)/O(1)
const main = pipe(program, Effect.provide(NodeContext.layer))

NodeRuntime.runMain(main)
