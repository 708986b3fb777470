/**
 * Tests for command dispatch.
 */
import * as fs from "node:fs"
import * as path from "node:path"
import { Effect } from "effect"
import { describe, expect, it } from "@effect/vitest"
import { afterEach, beforeEach } from "vitest"
import { Command, USAGE } from "../../src/cli/args"
import { describeCommand, main } from "../../src/cli/program"
import { createSandbox, readStoreFile, sandboxLayer, type Sandbox } from "../helpers/sandbox"

describe("describeCommand", () => {
  let sandbox: Sandbox

  beforeEach(() => {
    sandbox = createSandbox()
  })

  afterEach(() => {
    sandbox.cleanup()
  })

  it.effect("prints usage for help", () =>
    Effect.gen(function* () {
      expect(yield* describeCommand(Command.Help())).toBe(USAGE)
    }).pipe(Effect.provide(sandboxLayer(sandbox)))
  )

  it.effect("reports each step of a cut, list, paste cycle", () =>
    Effect.gen(function* () {
      const source = sandbox.file("file1.txt")

      const cut = yield* describeCommand(Command.Cut({ path: source }))
      const pasted = yield* describeCommand(Command.Paste({ persist: false }))
      const listed = yield* describeCommand(Command.List())

      expect(cut).toBe(`Cut: ${source}`)
      expect(pasted).toBe(`Moved: ${source} -> ${path.join(sandbox.destination, "file1.txt")}`)
      expect(listed).toBe("Clipboard is empty")
    }).pipe(Effect.provide(sandboxLayer(sandbox)))
  )

  it.effect("lists entries whose originals are gone as not found", () =>
    Effect.gen(function* () {
      const source = sandbox.file("file2.txt")
      yield* describeCommand(Command.Cut({ path: source }))
      yield* describeCommand(Command.Paste({ persist: true }))
      fs.rmSync(source)

      const listed = yield* describeCommand(Command.List())

      expect(listed).toBe(`0: ${source} (file not found)`)
    }).pipe(Effect.provide(sandboxLayer(sandbox)))
  )

  it.effect("confirms a clear", () =>
    Effect.gen(function* () {
      yield* describeCommand(Command.Cut({ path: sandbox.file("file1.txt") }))

      expect(yield* describeCommand(Command.Clear())).toBe("Clipboard cleared")
      expect(readStoreFile(sandbox)).toEqual({ entries: [] })
    }).pipe(Effect.provide(sandboxLayer(sandbox)))
  )

  it.effect("fails a paste on an empty clipboard", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(describeCommand(Command.Paste({ persist: false })))

      expect(error.message).toBe("clipboard is empty")
    }).pipe(Effect.provide(sandboxLayer(sandbox)))
  )
})

describe("main", () => {
  let sandbox: Sandbox

  beforeEach(() => {
    sandbox = createSandbox()
  })

  afterEach(() => {
    sandbox.cleanup()
  })

  it.effect("rejects unknown flags before touching the store", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(main(["--bogus", "--clipboard", sandbox.storePath]))

      expect(error).toMatchObject({ _tag: "UsageError", reason: "unknown flag: --bogus" })
      expect(fs.existsSync(sandbox.storePath)).toBe(false)
    })
  )

  it.effect("uses the store named by --clipboard", () =>
    Effect.gen(function* () {
      yield* main(["--clipboard", sandbox.storePath, sandbox.file("file1.txt")])

      expect(readStoreFile(sandbox)).toMatchObject({
        entries: [{ original_path: sandbox.file("file1.txt") }],
      })
    })
  )
})
