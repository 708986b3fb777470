/**
 * Clipboard store service for persisting the clipboard to disk.
 *
 * The whole clipboard is read at the start of an operation and written back
 * in full at the end. Writes are neither atomic nor locked: concurrent
 * invocations against the same file can lose an update.
 */
import * as path from "node:path"
import { Context, Effect, Layer, Ref } from "effect"
import { FileSystem } from "./FileSystem"
import { AppConfig } from "../Config"
import type { FsError, StoreReadError } from "../errors"
import { Clipboard, emptyClipboard } from "../models"

// =============================================================================
// ClipboardStore Service
// =============================================================================

export class ClipboardStore extends Context.Tag("@cx/ClipboardStore")<
  ClipboardStore,
  {
    /** Return the store location, creating an empty store if none exists */
    readonly ensureStorePath: () => Effect.Effect<string, FsError>

    /** Load the full clipboard */
    readonly read: () => Effect.Effect<Clipboard, StoreReadError>

    /** Overwrite the store with the given clipboard */
    readonly write: (clipboard: Clipboard) => Effect.Effect<void, FsError>
  }
>() {
  /** Production layer */
  static readonly layer = Layer.effect(
    ClipboardStore,
    Effect.gen(function* () {
      const fs = yield* FileSystem
      const config = yield* AppConfig

      const storePath = config.clipboardPath

      const ensureStorePath = Effect.fn("ClipboardStore.ensureStorePath")(
        function* () {
          const exists = yield* fs.exists(storePath)

          if (!exists) {
            yield* Effect.logDebug("creating clipboard store").pipe(
              Effect.annotateLogs("path", storePath)
            )
            yield* fs.ensureDir(path.dirname(storePath))
            yield* fs.writeJson(storePath, Clipboard, emptyClipboard())
          }

          return storePath
        }
      )

      const read = Effect.fn("ClipboardStore.read")(function* () {
        const location = yield* ensureStorePath()
        return yield* fs.readJson(location, Clipboard)
      })

      const write = Effect.fn("ClipboardStore.write")(function* (
        clipboard: Clipboard
      ) {
        const location = yield* ensureStorePath()
        yield* fs.writeJson(location, Clipboard, clipboard)
      })

      return ClipboardStore.of({
        ensureStorePath,
        read,
        write,
      })
    })
  )

  /** Test layer - in-memory clipboard, no file touched */
  static readonly testLayer = Layer.effect(
    ClipboardStore,
    Effect.gen(function* () {
      const clipboardRef = yield* Ref.make(emptyClipboard())

      const ensureStorePath = () => Effect.succeed("memory://clipboard")

      const read = Effect.fn("ClipboardStore.read")(function* () {
        return yield* Ref.get(clipboardRef)
      })

      const write = Effect.fn("ClipboardStore.write")(function* (
        clipboard: Clipboard
      ) {
        yield* Ref.set(clipboardRef, clipboard)
      })

      return ClipboardStore.of({
        ensureStorePath,
        read,
        write,
      })
    })
  )
}
