/**
 * SGR styling for terminal output.
 */

const ESC = "\x1b"
const RESET = `${ESC}[0m`

/** SGR parameter lists, joined with `;` */
export const Style = {
  muted: ["90"],
  file: ["97"],
  symlink: ["96"],
  directory: ["1", "34"],
  missing: ["91", "9"],
} as const satisfies Record<string, ReadonlyArray<string>>

export type StyleName = keyof typeof Style

export function paint(text: string, style: StyleName, enabled: boolean): string {
  if (!enabled) return text
  return `${ESC}[${Style[style].join(";")}m${text}${RESET}`
}
