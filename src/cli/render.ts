/**
 * Text rendering for command results.
 */

import type { Entry } from "../effect/models"
import type { ListRow, PasteResult } from "../effect/services"
import { paint, type StyleName } from "./ansi"
import { formatDetails } from "./format"

export interface RenderOptions {
  color: boolean
  now: Date
}

export const EMPTY_MESSAGE = "Clipboard is empty"
export const CLEARED_MESSAGE = "Clipboard cleared"

export function renderCut(entry: Entry): string {
  return `Cut: ${entry.originalPath}`
}

export function renderPaste(result: PasteResult): string {
  const verb = result.mode === "copy" ? "Copied" : "Moved"
  return `${verb}: ${result.source} -> ${result.destination}`
}

/** Path column text; symlinks show their target */
export function displayPath(row: ListRow): string {
  if (row.kind === "symlink") {
    return `${row.path} -> ${row.target ?? "(broken)"}`
  }
  return row.path
}

const styleFor = (row: ListRow): StyleName => {
  switch (row.kind) {
    case "missing":
      return "missing"
    case "directory":
      return "directory"
    case "symlink":
      return "symlink"
    case "file":
      return "file"
  }
}

/**
 * Aligned table of entries, one line each:
 * right-aligned `<index>:`, padded path, then details.
 */
export function renderList(
  rows: ReadonlyArray<ListRow>,
  options: RenderOptions
): string {
  if (rows.length === 0) {
    return EMPTY_MESSAGE
  }

  const indexWidth = String(rows.length).length + 1
  const pathWidth = Math.max(...rows.map((row) => displayPath(row).length))

  return rows
    .map((row) => {
      const index = paint(`${row.index}:`.padStart(indexWidth), "muted", options.color)
      const path = paint(displayPath(row).padEnd(pathWidth), styleFor(row), options.color)
      const details =
        row.kind === "missing"
          ? "(file not found)"
          : formatDetails(row.size, row.modifiedAt, options.now)

      return `${index} ${path} ${paint(details, "muted", options.color)}`
    })
    .join("\n")
}
