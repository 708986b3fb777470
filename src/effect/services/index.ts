/**
 * Service barrel export.
 */

export { FileSystem } from "./FileSystem"

export { ClipboardStore } from "./ClipboardStore"

export { ClipboardManager } from "./ClipboardManager"

export type { ListRow, PasteResult } from "./clipboard-manager"
