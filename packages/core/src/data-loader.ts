import {readFile} from "node:fs/promises";
import YAML from "yaml";
import {StaticTypeCompanion} from "./companion.js";

const DATA_EXTENSIONS = ["yml", "yaml", "json"] as const
const TEXT_EXTENSIONS = ["txt", "md"] as const

/** Structured data and plain text leaves. Parse errors propagate unchanged. */
export const DataLoader = StaticTypeCompanion({
  /** In lookup priority order */
  extensions: DATA_EXTENSIONS,
  textExtensions: TEXT_EXTENSIONS,

  isDataExtension(ext: string | undefined): boolean {
    return DATA_EXTENSIONS.some((e) => e === ext)
  },

  isTextExtension(ext: string | undefined): boolean {
    return TEXT_EXTENSIONS.some((e) => e === ext)
  },

  async parse(filePath: string, ext: string): Promise<unknown> {
    const text = await readFile(filePath, "utf8")
    if (ext === "json") {
      const value: unknown = JSON.parse(text)
      return value
    }
    const value: unknown = YAML.parse(text)
    return value
  },

  readText(filePath: string): Promise<string> {
    return readFile(filePath, "utf8")
  },
})
