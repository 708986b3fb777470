/**
 * Domain models for the persisted clipboard.
 * Encoded field names match the on-disk JSON; decoded names are camelCase.
 */
import { Schema } from "effect"
import { AbsolutePath } from "./types"

// =============================================================================
// Entry
// =============================================================================

/** One cut item: where it was cut from, where it lives now, when it was cut */
export const Entry = Schema.Struct({
  originalPath: AbsolutePath.pipe(
    Schema.propertySignature,
    Schema.fromKey("original_path")
  ),
  currentPath: AbsolutePath.pipe(
    Schema.propertySignature,
    Schema.fromKey("current_path")
  ),
  timestamp: Schema.Date,
})
export type Entry = typeof Entry.Type

// =============================================================================
// Clipboard
// =============================================================================

/**
 * Ordered log of entries. Index 0 is the oldest cut, the last index the most
 * recent. A `null` or absent `entries` key decodes as an empty log.
 */
export const Clipboard = Schema.Struct({
  entries: Schema.optionalWith(Schema.Array(Entry), {
    nullable: true,
    default: () => [],
  }),
})
export type Clipboard = typeof Clipboard.Type

export const emptyClipboard = (): Clipboard => Clipboard.make({ entries: [] })
