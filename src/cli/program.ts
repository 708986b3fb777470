/**
 * Command dispatch: runs one command against the services and prints its
 * result to stdout.
 */

import { Clock, Console, Effect, Logger } from "effect"
import { AppConfig } from "../effect/Config"
import type { PasteError } from "../effect/errors"
import { ClipboardManager } from "../effect/services"
import { makeAppLayer } from "../effect/runtime"
import { Command, USAGE, parseArgs } from "./args"
import { CLEARED_MESSAGE, renderCut, renderList, renderPaste } from "./render"

/**
 * Run a command and return the text it prints.
 */
export const describeCommand = (command: Command) =>
  Effect.gen(function* () {
    const manager = yield* ClipboardManager
    const config = yield* AppConfig

    const output: Effect.Effect<string, PasteError> = Command.$match(command, {
      Cut: ({ path }) => manager.cut(path).pipe(Effect.map(renderCut)),
      Paste: ({ persist }) => manager.paste(persist).pipe(Effect.map(renderPaste)),
      List: () =>
        Effect.gen(function* () {
          const rows = yield* manager.list()
          const now = new Date(yield* Clock.currentTimeMillis)
          return renderList(rows, { color: config.color, now })
        }),
      Clear: () => manager.clear().pipe(Effect.as(CLEARED_MESSAGE)),
      Help: () => Effect.succeed(USAGE),
    })

    return yield* output.pipe(Logger.withMinimumLogLevel(config.logLevel))
  })

/**
 * Run a command and print its result.
 */
export const runCommand = (command: Command) =>
  describeCommand(command).pipe(Effect.flatMap(Console.log))

/**
 * Parse the command line, build the services and run the command.
 */
export const main = (argv: ReadonlyArray<string>) =>
  Effect.gen(function* () {
    const invocation = yield* parseArgs(argv)
    const config = AppConfig.layer(
      invocation.clipboardPath === undefined
        ? {}
        : { clipboardPath: invocation.clipboardPath }
    )

    yield* runCommand(invocation.command).pipe(
      Effect.provide(makeAppLayer(config))
    )
  })
