/**
 * Clipboard manager module exports
 */

export type { ListRow, PasteResult } from "./types"

export {
  createTransferOperations,
  type TransferDeps,
} from "./transfer"

export {
  createEntryOperations,
  type EntryDeps,
} from "./entries"

export {
  createPasteOperations,
  type PasteDeps,
} from "./paste"

export {
  createListingOperations,
  type ListingDeps,
} from "./listing"
