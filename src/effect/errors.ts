/**
 * Tagged errors for clipboard and filesystem operations.
 * Every error carries the path or index it concerns and renders its own message.
 */
import { Schema } from "effect"

// =============================================================================
// Filesystem Errors
// =============================================================================

/** Path does not resolve to an existing filesystem object */
export class NotFoundError extends Schema.TaggedError<NotFoundError>()(
  "NotFoundError",
  {
    path: Schema.String,
  }
) {
  get message(): string {
    return `no such file or directory: ${this.path}`
  }
}

/** Process lacks the access a filesystem operation needs */
export class PermissionError extends Schema.TaggedError<PermissionError>()(
  "PermissionError",
  {
    path: Schema.String,
    access: Schema.Literal("read", "write"),
  }
) {
  get message(): string {
    return `no ${this.access} permission for ${this.path}`
  }
}

/** Rename crossed a filesystem boundary */
export class CrossDeviceError extends Schema.TaggedError<CrossDeviceError>()(
  "CrossDeviceError",
  {
    source: Schema.String,
    destination: Schema.String,
  }
) {
  get message(): string {
    return `cannot move ${this.source} to ${this.destination}: cross-device link not permitted`
  }
}

/** Any other OS-level failure, reported with the system's own message */
export class FileSystemError extends Schema.TaggedError<FileSystemError>()(
  "FileSystemError",
  {
    operation: Schema.String,
    path: Schema.String,
    code: Schema.optional(Schema.String),
    reason: Schema.String,
  }
) {
  get message(): string {
    return `${this.operation} ${this.path}: ${this.reason}`
  }
}

// =============================================================================
// Store Errors
// =============================================================================

/** Store file content is not valid JSON or does not match the schema */
export class DeserializationError extends Schema.TaggedError<DeserializationError>()(
  "DeserializationError",
  {
    path: Schema.String,
    reason: Schema.String,
  }
) {
  get message(): string {
    return `malformed clipboard file ${this.path}: ${this.reason}`
  }
}

// =============================================================================
// Clipboard Errors
// =============================================================================

export class EmptyClipboardError extends Schema.TaggedError<EmptyClipboardError>()(
  "EmptyClipboardError",
  {}
) {
  get message(): string {
    return "clipboard is empty"
  }
}

/** Entry's current path vanished since it was recorded */
export class StaleEntryError extends Schema.TaggedError<StaleEntryError>()(
  "StaleEntryError",
  {
    path: Schema.String,
  }
) {
  get message(): string {
    return `source path no longer exists: ${this.path}`
  }
}

export class InvalidIndexError extends Schema.TaggedError<InvalidIndexError>()(
  "InvalidIndexError",
  {
    index: Schema.Number,
    size: Schema.Number,
  }
) {
  get message(): string {
    return `invalid clipboard index: ${this.index}`
  }
}

// =============================================================================
// CLI Errors
// =============================================================================

export class UsageError extends Schema.TaggedError<UsageError>()(
  "UsageError",
  {
    reason: Schema.String,
  }
) {
  get message(): string {
    return this.reason
  }
}

// =============================================================================
// Error Unions
// =============================================================================

/** Errors any filesystem call can produce */
export type FsError =
  | NotFoundError
  | PermissionError
  | CrossDeviceError
  | FileSystemError

/** Errors reading the store can produce */
export type StoreReadError = FsError | DeserializationError

/** Errors a paste can produce */
export type PasteError =
  | StoreReadError
  | EmptyClipboardError
  | StaleEntryError
  | InvalidIndexError
