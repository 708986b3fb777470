/**
 * Command-line parsing.
 *
 *   cx <path>                   cut
 *   cx paste [--persist|-p]     paste (move, or copy with --persist)
 *   cx list | ls | l            list
 *   cx clear | c                clear
 *
 * `--clipboard <path>` may appear anywhere.
 */

import { Data, Either } from "effect"
import { UsageError } from "../effect/errors"

export type Command = Data.TaggedEnum<{
  Cut: { readonly path: string }
  Paste: { readonly persist: boolean }
  List: {}
  Clear: {}
  Help: {}
}>

export const Command = Data.taggedEnum<Command>()

export interface Invocation {
  readonly command: Command
  /** Store path given with --clipboard */
  readonly clipboardPath?: string
}

export const USAGE = `cx - cut and paste files and directories from the command line

Usage:
  cx [path]              cut a file or directory
  cx paste [-p]          paste the most recent entry here
  cx list                list clipboard contents (aliases: ls, l)
  cx clear               clear clipboard contents (alias: c)

Flags:
  -p, --persist          copy instead of move, keeping the entry
      --clipboard <path> path to the clipboard file (default ~/.cx_clipboard.json)
  -h, --help             show this help`

const LIST_ALIASES = new Set(["list", "ls", "l"])
const CLEAR_ALIASES = new Set(["clear", "c"])

const usageError = (reason: string) => Either.left(new UsageError({ reason }))

export function parseArgs(
  argv: ReadonlyArray<string>
): Either.Either<Invocation, UsageError> {
  const positionals: string[] = []
  let clipboardPath: string | undefined
  let persist = false
  let help = false
  let optionsEnded = false
  // Positionals from this index on came after `--` and are never subcommands
  let literalFrom = Number.POSITIVE_INFINITY

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    if (optionsEnded || !arg.startsWith("-") || arg === "-") {
      positionals.push(arg)
      continue
    }

    if (arg === "--") {
      optionsEnded = true
      literalFrom = positionals.length
    } else if (arg === "-h" || arg === "--help") {
      help = true
    } else if (arg === "-p" || arg === "--persist") {
      persist = true
    } else if (arg === "--clipboard") {
      const value = argv[i + 1]
      if (value === undefined) {
        return usageError("flag needs an argument: --clipboard")
      }
      clipboardPath = value
      i++
    } else if (arg.startsWith("--clipboard=")) {
      clipboardPath = arg.slice("--clipboard=".length)
    } else {
      return usageError(`unknown flag: ${arg}`)
    }
  }

  const invocation = (command: Command): Either.Either<Invocation, UsageError> =>
    Either.right(clipboardPath === undefined ? { command } : { command, clipboardPath })

  if (help) {
    return invocation(Command.Help())
  }

  if (positionals.length === 0) {
    return persist ? usageError("unknown flag: --persist") : invocation(Command.Help())
  }

  const [first, ...rest] = positionals
  const isSubcommand = literalFrom > 0

  if (isSubcommand && first === "paste") {
    if (rest.length > 0) {
      return usageError(`unexpected argument for paste: ${rest[0]}`)
    }
    return invocation(Command.Paste({ persist }))
  }

  if (persist) {
    return usageError("--persist only applies to paste")
  }

  if (isSubcommand && (LIST_ALIASES.has(first) || CLEAR_ALIASES.has(first))) {
    if (rest.length > 0) {
      return usageError(`unexpected argument for ${first}: ${rest[0]}`)
    }
    return invocation(LIST_ALIASES.has(first) ? Command.List() : Command.Clear())
  }

  if (rest.length > 0) {
    return usageError(`accepts at most 1 path, received ${positionals.length}`)
  }

  return invocation(Command.Cut({ path: first }))
}
