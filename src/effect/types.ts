/**
 * Branded types for domain primitives.
 * These prevent mixing values that have the same underlying type.
 */
import * as path from "node:path"
import { Schema } from "effect"

// =============================================================================
// Paths
// =============================================================================

/** Absolute filesystem path */
export const AbsolutePath = Schema.String.pipe(
  Schema.filter((value) => path.isAbsolute(value), {
    message: () => "expected an absolute path",
  }),
  Schema.brand("AbsolutePath")
)
export type AbsolutePath = typeof AbsolutePath.Type

// =============================================================================
// Paste
// =============================================================================

/** Whether a paste relocates the item or duplicates it */
export const PasteMode = Schema.Literal("move", "copy")
export type PasteMode = typeof PasteMode.Type

// =============================================================================
// Helpers
// =============================================================================

/** Resolve a possibly relative path against a base directory */
export const resolvePath = (base: string, target: string): AbsolutePath =>
  AbsolutePath.make(path.resolve(base, target))
