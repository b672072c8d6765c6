import {StaticTypeCompanion} from "./companion.js";
import {PathCodec} from "./path-codec.js";

export interface SlugifyOptions {
  /** Decompose accented letters and drop what is not ASCII */
  transliterate?: boolean
  separator?: string
}

/** Small text helpers shared by printers and diagnostics */
export const Str = StaticTypeCompanion({
  slugify(text: string, opts: SlugifyOptions = {}): string {
    const separator = opts.separator ?? "-"
    let out = text
    if (opts.transliterate) {
      out = out.normalize("NFKD").replace(/[^\x00-\x7f]/g, "")
    }
    out = out
      .toLowerCase()
      .replace(/[^\p{L}\p{N}_\s-]/gu, "")
      .replace(/[\s_]+/g, separator)
    return trimChars(out, separator)
  },

  /** Prefix every non-blank line */
  indent(text: string, prefix = "\t"): string {
    return text
      .split(/\r?\n/)
      .map((line) => (line.trim() ? `${prefix}${line}` : line))
      .join("\n")
  },

  /** Drop leading whitespace from every line after the first, then trim */
  unindent(text: string): string {
    return text.replace(/\n\s+/g, "\n").trim()
  },

  isEmpty(text: string | null | undefined): boolean {
    return !text || text.trim() === ""
  },

  /** CamelCase or kebab-case to snake_case */
  toSnakeCase(name: string): string {
    return PathCodec.toFsName(name).replaceAll("-", "_")
  },

  normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim()
  },
})

function trimChars(text: string, chars: string): string {
  if (!chars) return text
  let start = 0
  let end = text.length
  while (start < end && chars.includes(text.charAt(start))) start++
  while (end > start && chars.includes(text.charAt(end - 1))) end--
  return text.slice(start, end)
}
