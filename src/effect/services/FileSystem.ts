/**
 * FileSystem service wrapping node:fs with typed errors.
 */
import * as fs from "node:fs/promises"
import { constants } from "node:fs"
import { Context, Effect, Layer, Schema } from "effect"
import {
  CrossDeviceError,
  DeserializationError,
  FileSystemError,
  NotFoundError,
  PermissionError,
  type FsError,
} from "../errors"

// =============================================================================
// Types
// =============================================================================

export type FileKind = "file" | "directory" | "symlink" | "other"

/** Result of `lstat`: the object itself, links are not followed */
export interface FileStat {
  readonly kind: FileKind
  readonly size: number
  /** Permission bits only */
  readonly mode: number
  readonly mtime: Date
}

type Access = "read" | "write"

// =============================================================================
// Error Classification
// =============================================================================

const errnoCode = (cause: unknown): string | undefined =>
  typeof cause === "object" &&
  cause !== null &&
  "code" in cause &&
  typeof cause.code === "string"
    ? cause.code
    : undefined

/** Operations whose ENOTDIR means the looked-up path does not resolve */
const LOOKUP_OPERATIONS: ReadonlySet<string> = new Set([
  "lstat",
  "read",
  "readdir",
  "readlink",
])

/**
 * Map a rejected fs promise onto the error union by errno.
 * For operations that create or replace a path, ENOTDIR is a conflict at the
 * destination and keeps the system message.
 */
export const classifyError =
  (operation: string, path: string, access: Access, destination?: string) =>
  (cause: unknown): FsError => {
    const code = errnoCode(cause)
    switch (code) {
      case "ENOTDIR":
        if (!LOOKUP_OPERATIONS.has(operation)) break
        return new NotFoundError({ path })
      case "ENOENT":
        return new NotFoundError({ path })
      case "EACCES":
      case "EPERM":
        return new PermissionError({ path, access })
      case "EXDEV":
        return new CrossDeviceError({
          source: path,
          destination: destination ?? path,
        })
    }
    return new FileSystemError({
      operation,
      path,
      code,
      reason: cause instanceof Error ? cause.message : String(cause),
    })
  }

const attempt = <A>(
  operation: string,
  path: string,
  access: Access,
  run: () => Promise<A>,
  destination?: string
): Effect.Effect<A, FsError> =>
  Effect.tryPromise({
    try: run,
    catch: classifyError(operation, path, access, destination),
  })

const kindOf = (stats: {
  isFile(): boolean
  isDirectory(): boolean
  isSymbolicLink(): boolean
}): FileKind => {
  if (stats.isSymbolicLink()) return "symlink"
  if (stats.isDirectory()) return "directory"
  if (stats.isFile()) return "file"
  return "other"
}

// =============================================================================
// FileSystem Service
// =============================================================================

export interface FileSystemShape {
  /** True when anything (a broken symlink included) exists at the path */
  readonly exists: (path: string) => Effect.Effect<boolean>

  /** Stat without following symlinks */
  readonly lstat: (path: string) => Effect.Effect<FileStat, FsError>

  /** Whether the process may read the path */
  readonly canRead: (path: string) => Effect.Effect<boolean>

  readonly readFile: (path: string) => Effect.Effect<string, FsError>

  readonly writeFile: (path: string, data: string) => Effect.Effect<void, FsError>

  /** Create a directory and any missing parents */
  readonly ensureDir: (path: string) => Effect.Effect<void, FsError>

  readonly rename: (source: string, destination: string) => Effect.Effect<void, FsError>

  /** Byte copy of a regular file, overwriting the destination */
  readonly copyFile: (source: string, destination: string) => Effect.Effect<void, FsError>

  readonly chmod: (path: string, mode: number) => Effect.Effect<void, FsError>

  /** Child names of a directory, sorted */
  readonly readDir: (path: string) => Effect.Effect<ReadonlyArray<string>, FsError>

  readonly readLink: (path: string) => Effect.Effect<string, FsError>

  readonly symlink: (target: string, path: string) => Effect.Effect<void, FsError>

  /** Read and decode a JSON file against a schema */
  readonly readJson: <A, I>(
    path: string,
    schema: Schema.Schema<A, I>
  ) => Effect.Effect<A, FsError | DeserializationError>

  /** Encode against a schema and write as 2-space indented JSON */
  readonly writeJson: <A, I>(
    path: string,
    schema: Schema.Schema<A, I>,
    value: A
  ) => Effect.Effect<void, FsError>
}

/** node:fs backed implementation */
export const makeNodeFileSystem = (): FileSystemShape => {
  const exists = (path: string) =>
    Effect.promise(() =>
      fs.lstat(path).then(
        () => true,
        () => false
      )
    )

  const lstat = (path: string) =>
    attempt("lstat", path, "read", () => fs.lstat(path)).pipe(
      Effect.map(
        (stats): FileStat => ({
          kind: kindOf(stats),
          size: stats.size,
          mode: stats.mode & 0o7777,
          mtime: stats.mtime,
        })
      )
    )

  const canRead = (path: string) =>
    Effect.promise(() =>
      fs.access(path, constants.R_OK).then(
        () => true,
        () => false
      )
    )

  const readFile = (path: string) =>
    attempt("read", path, "read", () => fs.readFile(path, "utf8"))

  const writeFile = (path: string, data: string) =>
    attempt("write", path, "write", () => fs.writeFile(path, data, { mode: 0o644 }))

  const ensureDir = (path: string) =>
    attempt("mkdir", path, "write", () => fs.mkdir(path, { recursive: true })).pipe(
      Effect.asVoid
    )

  const rename = (source: string, destination: string) =>
    attempt(
      "rename",
      source,
      "write",
      () => fs.rename(source, destination),
      destination
    )

  const copyFile = (source: string, destination: string) =>
    attempt(
      "copy",
      source,
      "read",
      () => fs.copyFile(source, destination),
      destination
    )

  const chmod = (path: string, mode: number) =>
    attempt("chmod", path, "write", () => fs.chmod(path, mode))

  const readDir = (path: string) =>
    attempt("readdir", path, "read", () => fs.readdir(path)).pipe(
      Effect.map((names) => [...names].sort())
    )

  const readLink = (path: string) =>
    attempt("readlink", path, "read", () => fs.readlink(path))

  const symlink = (target: string, path: string) =>
    attempt("symlink", path, "write", () => fs.symlink(target, path))

  const readJson = <A, I>(path: string, schema: Schema.Schema<A, I>) =>
    Effect.gen(function* () {
      const text = yield* readFile(path)
      const json = yield* Effect.try({
        try: (): unknown => JSON.parse(text),
        catch: (cause) =>
          new DeserializationError({
            path,
            reason: cause instanceof Error ? cause.message : String(cause),
          }),
      })
      return yield* Schema.decodeUnknown(schema)(json).pipe(
        Effect.mapError(
          (error) => new DeserializationError({ path, reason: error.message })
        )
      )
    })

  const writeJson = <A, I>(path: string, schema: Schema.Schema<A, I>, value: A) =>
    Effect.gen(function* () {
      // Values are built through the schema, so encoding cannot fail here
      const encoded = yield* Schema.encode(schema)(value).pipe(Effect.orDie)
      yield* writeFile(path, JSON.stringify(encoded, null, 2))
    })

  return {
    exists,
    lstat,
    canRead,
    readFile,
    writeFile,
    ensureDir,
    rename,
    copyFile,
    chmod,
    readDir,
    readLink,
    symlink,
    readJson,
    writeJson,
  }
}

export class FileSystem extends Context.Tag("@cx/FileSystem")<
  FileSystem,
  FileSystemShape
>() {
  /** Production layer */
  static readonly layer = Layer.sync(FileSystem, () =>
    FileSystem.of(makeNodeFileSystem())
  )
}
