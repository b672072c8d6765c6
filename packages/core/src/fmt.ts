/**
 * Fmt: text formatting interface.
 *
 * Two implementations: ANSI terminal styling and a no-op passthrough.
 * Obtain the right one via Fmt.from(boolean).
 */
import {StaticTypeCompanion} from "./companion.js";

export type FmtColor = "red" | "green" | "yellow" | "blue" | "magenta" | "cyan" | "gray" | "normal"

/** Style flags: b = bold, u = underline, i = italic */
export type FmtStyles = string

export interface Fmt {
  readonly isColor: boolean
  dim(text: string): string
  bold(text: string): string
  italic(text: string): string
  underline(text: string): string
  strikethrough(text: string): string
  red(text: string): string
  green(text: string): string
  yellow(text: string): string
  cyan(text: string): string
  gray(text: string): string
  normal(text: string): string
  /** Combine a colour with style flags, e.g. style("x", "red", "bu") */
  style(text: string, color?: FmtColor, styles?: FmtStyles): string
}

const RESET = "\x1b[0m";

const COLOR_CODES: Record<FmtColor, string> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  normal: "\x1b[37m",
}

const STYLE_CODES: ReadonlyArray<[flag: string, code: string]> = [
  ["b", "\x1b[1m"],
  ["u", "\x1b[4m"],
  ["i", "\x1b[3m"],
]

const wrap = (code: string) => (text: string) => `${code}${text}${RESET}`

const ansiFmt: Fmt = {
  isColor: true,
  dim: wrap("\x1b[2m"),
  bold: wrap("\x1b[1m"),
  italic: wrap("\x1b[3m"),
  underline: wrap("\x1b[4m"),
  strikethrough: wrap("\x1b[9m"),
  red: wrap(COLOR_CODES.red),
  green: wrap(COLOR_CODES.green),
  yellow: wrap(COLOR_CODES.yellow),
  cyan: wrap(COLOR_CODES.cyan),
  gray: wrap(COLOR_CODES.gray),
  normal: wrap(COLOR_CODES.normal),
  style(text, color, styles = "") {
    const codes = STYLE_CODES.filter(([flag]) => styles.includes(flag)).map(([, code]) => code)
    if (color) codes.push(COLOR_CODES[color])
    if (codes.length === 0) return text
    return `${codes.join("")}${text}${RESET}`
  },
}

const identity = (text: string) => text

const noopFmt: Fmt = {
  isColor: false,
  dim: identity,
  bold: identity,
  italic: identity,
  underline: identity,
  strikethrough: identity,
  red: identity,
  green: identity,
  yellow: identity,
  cyan: identity,
  gray: identity,
  normal: identity,
  style: identity,
}

export const Fmt = StaticTypeCompanion({
  ansi: ansiFmt,
  noop: noopFmt,
  from(color: boolean): Fmt {
    return color ? ansiFmt : noopFmt
  },
  /** Whether stdout should receive colour by default */
  detectColor(): boolean {
    if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== "") return false
    return process.stdout.isTTY === true
  },
})
