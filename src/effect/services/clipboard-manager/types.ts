/**
 * Types for ClipboardManager service
 */

import type { AbsolutePath, PasteMode } from "../../types"

/**
 * Outcome of a paste
 */
export interface PasteResult {
  readonly mode: PasteMode
  readonly source: AbsolutePath
  readonly destination: AbsolutePath
}

/**
 * One listed entry, described by what is found at its original path
 */
export type ListRow =
  | {
      readonly kind: "missing"
      readonly index: number
      readonly path: string
    }
  | {
      readonly kind: "file" | "directory"
      readonly index: number
      readonly path: string
      readonly size: number
      readonly modifiedAt: Date
    }
  | {
      readonly kind: "symlink"
      readonly index: number
      readonly path: string
      /** Link text, `null` when the link cannot be read */
      readonly target: string | null
      readonly size: number
      readonly modifiedAt: Date
    }
