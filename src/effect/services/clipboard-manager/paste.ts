/**
 * Paste operations for ClipboardManager
 * Handles move and copy of the most recent or an indexed entry
 */

import * as path from "node:path"
import { Effect } from "effect"
import type { ClipboardStore } from "../ClipboardStore"
import type { FileSystem } from "../FileSystem"
import type { AppConfigShape } from "../../Config"
import {
  EmptyClipboardError,
  InvalidIndexError,
  StaleEntryError,
} from "../../errors"
import { Clipboard, Entry } from "../../models"
import { resolvePath } from "../../types"
import type { createTransferOperations } from "./transfer"
import type { PasteResult } from "./types"

export interface PasteDeps {
  store: ClipboardStore["Type"]
  fs: FileSystem["Type"]
  config: AppConfigShape
  transfer: ReturnType<typeof createTransferOperations>
}

/**
 * Create paste operations for ClipboardManager
 */
export function createPasteOperations(deps: PasteDeps) {
  const { store, fs, config, transfer } = deps

  /**
   * Paste the entry at `index` of an already loaded clipboard into the
   * working directory. Move removes the entry; copy keeps it in place with
   * its current path pointing at the new copy.
   */
  const pasteEntry = Effect.fn("ClipboardManager.pasteEntry")(function* (
    clipboard: Clipboard,
    index: number,
    persist: boolean
  ) {
    const size = clipboard.entries.length
    if (!Number.isInteger(index) || index < 0 || index >= size) {
      return yield* new InvalidIndexError({ index, size })
    }

    const entry = clipboard.entries[index]
    const source = entry.currentPath

    const exists = yield* fs.exists(source)
    if (!exists) {
      return yield* new StaleEntryError({ path: source })
    }

    const destination = resolvePath(config.cwd, path.basename(source))

    if (destination === source) {
      yield* Effect.logWarning("source is already in the working directory").pipe(
        Effect.annotateLogs("path", source)
      )
    } else if (persist) {
      yield* transfer.copy(source, destination)
    } else {
      yield* transfer.move(source, destination)
    }

    const entries = persist
      ? clipboard.entries.map((current, i) =>
          i === index ? Entry.make({ ...current, currentPath: destination }) : current
        )
      : clipboard.entries.filter((_, i) => i !== index)

    yield* store.write(Clipboard.make({ entries }))

    const result: PasteResult = {
      mode: persist ? "copy" : "move",
      source,
      destination,
    }

    yield* Effect.logDebug("pasted").pipe(
      Effect.annotateLogs({ index, ...result })
    )

    return result
  })

  const paste = Effect.fn("ClipboardManager.paste")(function* (
    persist: boolean
  ) {
    const clipboard = yield* store.read()

    if (clipboard.entries.length === 0) {
      return yield* new EmptyClipboardError()
    }

    return yield* pasteEntry(clipboard, clipboard.entries.length - 1, persist)
  })

  const pasteAt = Effect.fn("ClipboardManager.pasteAt")(function* (
    index: number,
    persist: boolean
  ) {
    const clipboard = yield* store.read()
    return yield* pasteEntry(clipboard, index, persist)
  })

  return {
    paste,
    pasteAt,
  }
}
