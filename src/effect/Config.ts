/**
 * Application configuration service.
 * Store location, working directory and output settings are threaded
 * through this tag instead of living in module globals.
 */
import * as os from "node:os"
import * as path from "node:path"
import { Config, Context, Effect, Layer, LogLevel, Option } from "effect"

export interface AppConfigShape {
  /** Absolute path of the clipboard store file */
  readonly clipboardPath: string

  /** Paste destination, and the base for relative cut paths */
  readonly cwd: string

  /** Emit ANSI styling in rendered output */
  readonly color: boolean

  /** Minimum level for diagnostic logs on stderr */
  readonly logLevel: LogLevel.LogLevel
}

export type AppConfigOverrides = Partial<AppConfigShape>

/** `~/.cx_clipboard.json` */
export const defaultClipboardPath = (): string =>
  path.join(os.homedir(), ".cx_clipboard.json")

export class AppConfig extends Context.Tag("@cx/AppConfig")<
  AppConfig,
  AppConfigShape
>() {
  /**
   * Production layer. Reads `CX_CLIPBOARD`, `CX_LOG_LEVEL` and `NO_COLOR`
   * from the environment; explicit overrides (command-line flags) win.
   */
  static readonly layer = (overrides: AppConfigOverrides = {}) =>
    Layer.effect(
      AppConfig,
      Effect.gen(function* () {
        const cwd = overrides.cwd ?? process.cwd()

        const clipboardPath =
          overrides.clipboardPath ??
          (yield* Config.string("CX_CLIPBOARD").pipe(
            Config.withDefault(defaultClipboardPath())
          ))

        const noColor = yield* Config.string("NO_COLOR").pipe(Config.option)
        const color =
          overrides.color ??
          (Option.isNone(noColor) && process.stdout.isTTY === true)

        const logLevel =
          overrides.logLevel ??
          (yield* Config.logLevel("CX_LOG_LEVEL").pipe(
            Config.withDefault(LogLevel.Warning)
          ))

        return AppConfig.of({
          clipboardPath: path.resolve(cwd, clipboardPath),
          cwd,
          color,
          logLevel,
        })
      })
    )

  /** Test layer - fixed values, nothing read from the environment */
  static readonly testLayer = (
    values: Pick<AppConfigShape, "clipboardPath" | "cwd"> & AppConfigOverrides
  ) =>
    Layer.succeed(
      AppConfig,
      AppConfig.of({
        color: false,
        logLevel: LogLevel.None,
        ...values,
      })
    )
}
