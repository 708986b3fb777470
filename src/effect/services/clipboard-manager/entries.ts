/**
 * Entry operations for ClipboardManager
 * Handles cut and clear
 */

import { Clock, Effect } from "effect"
import type { ClipboardStore } from "../ClipboardStore"
import type { FileSystem } from "../FileSystem"
import type { AppConfigShape } from "../../Config"
import { PermissionError } from "../../errors"
import { Clipboard, Entry, emptyClipboard } from "../../models"
import { resolvePath } from "../../types"

export interface EntryDeps {
  store: ClipboardStore["Type"]
  fs: FileSystem["Type"]
  config: AppConfigShape
}

/**
 * Create entry operations for ClipboardManager
 */
export function createEntryOperations(deps: EntryDeps) {
  const { store, fs, config } = deps

  const cut = Effect.fn("ClipboardManager.cut")(function* (target: string) {
    const absolutePath = resolvePath(config.cwd, target)

    // lstat so that a broken symlink still counts as existing
    const stat = yield* fs.lstat(absolutePath)

    if (stat.kind !== "symlink") {
      const readable = yield* fs.canRead(absolutePath)
      if (!readable) {
        return yield* new PermissionError({ path: absolutePath, access: "read" })
      }
    }

    const clipboard = yield* store.read()
    const entry = Entry.make({
      originalPath: absolutePath,
      currentPath: absolutePath,
      timestamp: new Date(yield* Clock.currentTimeMillis),
    })

    yield* store.write(
      Clipboard.make({ entries: [...clipboard.entries, entry] })
    )

    yield* Effect.logDebug("cut").pipe(
      Effect.annotateLogs({
        path: absolutePath,
        index: clipboard.entries.length,
      })
    )

    return entry
  })

  // Written without reading first, so clearing also recovers a corrupt store
  const clear = Effect.fn("ClipboardManager.clear")(function* () {
    yield* store.write(emptyClipboard())
    yield* Effect.logDebug("clipboard cleared")
  })

  return {
    cut,
    clear,
  }
}
