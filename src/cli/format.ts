/**
 * Human-readable sizes and relative times for listing output.
 */

const SIZE_UNITS = ["B", "kB", "MB", "GB", "TB", "PB", "EB"] as const

/**
 * SI byte count: `9 B`, `14 B`, `1.2 kB`, `35 MB`.
 * One decimal below 10 of a unit, none above.
 */
export function formatBytes(bytes: number): string {
  if (bytes < 10) {
    return `${bytes} B`
  }

  const exponent = Math.min(
    Math.floor(Math.log(bytes) / Math.log(1000)),
    SIZE_UNITS.length - 1
  )
  const value = Math.floor((bytes / Math.pow(1000, exponent)) * 10 + 0.5) / 10
  const digits = value < 10 ? 1 : 0

  return `${value.toFixed(digits)} ${SIZE_UNITS[exponent]}`
}

const SECOND = 1000
const MINUTE = 60 * SECOND
const HOUR = 60 * MINUTE
const DAY = 24 * HOUR
const WEEK = 7 * DAY
const MONTH = 30 * DAY
const YEAR = 12 * MONTH
const LONG_TIME = 37 * YEAR

interface Magnitude {
  /** Applies while the elapsed time is below this bound */
  readonly below: number
  /** `%d` is replaced by elapsed / divideBy, `%s` by the direction */
  readonly format: string
  readonly divideBy: number
}

const MAGNITUDES: ReadonlyArray<Magnitude> = [
  { below: SECOND, format: "now", divideBy: SECOND },
  { below: 2 * SECOND, format: "1 second %s", divideBy: 1 },
  { below: MINUTE, format: "%d seconds %s", divideBy: SECOND },
  { below: 2 * MINUTE, format: "1 minute %s", divideBy: 1 },
  { below: HOUR, format: "%d minutes %s", divideBy: MINUTE },
  { below: 2 * HOUR, format: "1 hour %s", divideBy: 1 },
  { below: DAY, format: "%d hours %s", divideBy: HOUR },
  { below: 2 * DAY, format: "1 day %s", divideBy: 1 },
  { below: WEEK, format: "%d days %s", divideBy: DAY },
  { below: 2 * WEEK, format: "1 week %s", divideBy: 1 },
  { below: MONTH, format: "%d weeks %s", divideBy: WEEK },
  { below: 2 * MONTH, format: "1 month %s", divideBy: 1 },
  { below: YEAR, format: "%d months %s", divideBy: MONTH },
  { below: 18 * MONTH, format: "1 year %s", divideBy: 1 },
  { below: 2 * YEAR, format: "2 years %s", divideBy: 1 },
  { below: LONG_TIME, format: "%d years %s", divideBy: YEAR },
  { below: Number.POSITIVE_INFINITY, format: "a long while %s", divideBy: 1 },
]

/**
 * Relative time such as `3 minutes ago` or `2 days from now`.
 */
export function formatRelativeTime(then: Date, now: Date): string {
  const delta = now.getTime() - then.getTime()
  const direction = delta < 0 ? "from now" : "ago"
  const elapsed = Math.abs(delta)

  const magnitude =
    MAGNITUDES.find((m) => elapsed < m.below) ?? MAGNITUDES[MAGNITUDES.length - 1]

  return magnitude.format
    .replace("%d", String(Math.floor(elapsed / magnitude.divideBy)))
    .replace("%s", direction)
}

/** `(1.2 kB, 3 minutes ago)` */
export function formatDetails(size: number, modifiedAt: Date, now: Date): string {
  return `(${formatBytes(size)}, ${formatRelativeTime(modifiedAt, now)})`
}
