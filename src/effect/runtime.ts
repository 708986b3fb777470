/**
 * Layer composition and helpers for running effects from plain async code.
 */
import { Cause, Effect, Exit, Layer, Logger } from "effect"
import type { AppConfig } from "./Config"
import { ClipboardManager, ClipboardStore, FileSystem } from "./services"

/** Services every command runs against */
export type AppServices = AppConfig | FileSystem | ClipboardStore | ClipboardManager

/**
 * Build the full service graph on top of a configuration layer.
 * `fileSystem` replaces the node:fs backed service.
 */
export const makeAppLayer = <E>(
  config: Layer.Layer<AppConfig, E>,
  fileSystem: Layer.Layer<FileSystem> = FileSystem.layer
): Layer.Layer<AppServices, E> => {
  const base = Layer.merge(fileSystem, config)
  const store = ClipboardStore.layer.pipe(Layer.provideMerge(base))
  return ClipboardManager.layer.pipe(Layer.provideMerge(store))
}

/** Diagnostics go to stderr as logfmt so stdout only carries command output */
export const StderrLogger = Logger.replace(
  Logger.defaultLogger,
  Logger.withConsoleError(Logger.logfmtLogger)
)

/**
 * Run an effect to completion, rejecting with the underlying failure
 * (not a fiber wrapper) so callers can print its message.
 */
export async function runEffect<A, E>(
  effect: Effect.Effect<A, E>
): Promise<A> {
  const exit = await Effect.runPromiseExit(
    effect.pipe(Effect.provide(StderrLogger))
  )

  if (Exit.isSuccess(exit)) {
    return exit.value
  }

  throw Cause.squash(exit.cause)
}
