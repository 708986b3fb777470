/**
 * Listing operations for ClipboardManager
 */

import { Effect, Option } from "effect"
import type { ClipboardStore } from "../ClipboardStore"
import type { FileSystem } from "../FileSystem"
import type { Entry } from "../../models"
import type { ListRow } from "./types"

export interface ListingDeps {
  store: ClipboardStore["Type"]
  fs: FileSystem["Type"]
}

/**
 * Create listing operations for ClipboardManager
 */
export function createListingOperations(deps: ListingDeps) {
  const { store, fs } = deps

  /**
   * Describe an entry by what currently sits at its original path.
   * Inspection failures never fail the listing.
   */
  const describeEntry = (entry: Entry, index: number): Effect.Effect<ListRow> =>
    Effect.gen(function* () {
      const found = yield* Effect.option(fs.lstat(entry.originalPath))

      if (Option.isNone(found)) {
        const missing: ListRow = { kind: "missing", index, path: entry.originalPath }
        return missing
      }

      const stat = found.value

      if (stat.kind === "symlink") {
        const target = yield* fs.readLink(entry.originalPath).pipe(
          Effect.option,
          Effect.map(Option.getOrNull)
        )
        const link: ListRow = {
          kind: "symlink",
          index,
          path: entry.originalPath,
          target,
          size: stat.size,
          modifiedAt: stat.mtime,
        }
        return link
      }

      const row: ListRow = {
        kind: stat.kind === "directory" ? "directory" : "file",
        index,
        path: entry.originalPath,
        size: stat.size,
        modifiedAt: stat.mtime,
      }
      return row
    })

  const list = Effect.fn("ClipboardManager.list")(function* () {
    const clipboard = yield* store.read()
    return yield* Effect.forEach(clipboard.entries, describeEntry)
  })

  return {
    list,
  }
}
