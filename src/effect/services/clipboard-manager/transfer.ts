/**
 * Filesystem transfer for ClipboardManager
 * Moves by rename, copies files, directory trees and symlinks
 */

import * as path from "node:path"
import { Effect } from "effect"
import type { FileSystem } from "../FileSystem"
import { FileSystemError, type FsError } from "../../errors"

export interface TransferDeps {
  fs: FileSystem["Type"]
}

/**
 * Create transfer operations for ClipboardManager
 */
export function createTransferOperations(deps: TransferDeps) {
  const { fs } = deps

  const copySymlink = Effect.fn("ClipboardManager.copySymlink")(function* (
    source: string,
    destination: string
  ) {
    // Recreated from the link text; the target is never dereferenced
    const target = yield* fs.readLink(source)
    yield* fs.symlink(target, destination)
  })

  const copyFile = Effect.fn("ClipboardManager.copyFile")(function* (
    source: string,
    destination: string,
    mode: number
  ) {
    yield* fs.copyFile(source, destination)
    yield* fs.chmod(destination, mode)
  })

  /**
   * Depth-first copy. Every directory gets its source mode once its children
   * are written, so read-only directories still receive their contents.
   * A partially copied tree is left in place on failure.
   */
  const copyTree: (
    source: string,
    destination: string
  ) => Effect.Effect<void, FsError> = Effect.fn("ClipboardManager.copyTree")(
    function* (source: string, destination: string) {
      const stat = yield* fs.lstat(source)

      switch (stat.kind) {
        case "directory": {
          yield* fs.ensureDir(destination)
          const children = yield* fs.readDir(source)
          for (const name of children) {
            yield* copyTree(path.join(source, name), path.join(destination, name))
          }
          yield* fs.chmod(destination, stat.mode)
          return
        }
        case "symlink":
          return yield* copySymlink(source, destination)
        case "file":
          return yield* copyFile(source, destination, stat.mode)
        case "other":
          return yield* new FileSystemError({
            operation: "copy",
            path: source,
            reason: "not a regular file, directory or symlink",
          })
      }
    }
  )

  /** Copy a tree, refusing a destination inside the source */
  const copy = Effect.fn("ClipboardManager.copy")(function* (
    source: string,
    destination: string
  ) {
    const relative = path.relative(source, destination)
    const outside =
      relative === ".." ||
      relative.startsWith(`..${path.sep}`) ||
      path.isAbsolute(relative)
    if (!outside) {
      return yield* new FileSystemError({
        operation: "copy",
        path: source,
        reason: `cannot copy into itself: ${destination}`,
      })
    }
    yield* copyTree(source, destination)
  })

  /** Rename within a volume; EXDEV surfaces as CrossDeviceError */
  const move = Effect.fn("ClipboardManager.move")(function* (
    source: string,
    destination: string
  ) {
    yield* fs.rename(source, destination)
  })

  return {
    copy,
    move,
  }
}
