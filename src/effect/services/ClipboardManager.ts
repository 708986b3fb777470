/**
 * Clipboard manager service for cut, paste, list and clear.
 * Each operation reads the store once and writes it back at most once.
 */
import { Context, Effect, Layer } from "effect"
import { ClipboardStore } from "./ClipboardStore"
import { FileSystem } from "./FileSystem"
import { AppConfig } from "../Config"
import type {
  FsError,
  PasteError,
  PermissionError,
  StoreReadError,
} from "../errors"
import type { Entry } from "../models"

// Import extracted modules
import type { ListRow, PasteResult } from "./clipboard-manager/types"
import {
  createTransferOperations,
  createEntryOperations,
  createPasteOperations,
  createListingOperations,
} from "./clipboard-manager"

// =============================================================================
// ClipboardManager Service
// =============================================================================

export class ClipboardManager extends Context.Tag("@cx/ClipboardManager")<
  ClipboardManager,
  {
    /** Record a path as the most recent entry */
    readonly cut: (
      path: string
    ) => Effect.Effect<Entry, StoreReadError | PermissionError>

    /** Paste the most recent entry into the working directory */
    readonly paste: (persist: boolean) => Effect.Effect<PasteResult, PasteError>

    /** Paste the entry at an index into the working directory */
    readonly pasteAt: (
      index: number,
      persist: boolean
    ) => Effect.Effect<PasteResult, PasteError>

    /** Describe every entry, oldest first */
    readonly list: () => Effect.Effect<ReadonlyArray<ListRow>, StoreReadError>

    /** Drop every entry */
    readonly clear: () => Effect.Effect<void, FsError>
  }
>() {
  /** Production layer */
  static readonly layer = Layer.effect(
    ClipboardManager,
    Effect.gen(function* () {
      const store = yield* ClipboardStore
      const fs = yield* FileSystem
      const config = yield* AppConfig

      // Create operation groups using extracted factories
      const transfer = createTransferOperations({ fs })
      const entries = createEntryOperations({ store, fs, config })
      const pasting = createPasteOperations({ store, fs, config, transfer })
      const listing = createListingOperations({ store, fs })

      return ClipboardManager.of({
        cut: entries.cut,
        clear: entries.clear,
        paste: pasting.paste,
        pasteAt: pasting.pasteAt,
        list: listing.list,
      })
    })
  )
}
