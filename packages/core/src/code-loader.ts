import * as path from "node:path";
import {pathToFileURL} from "node:url";
import {StaticTypeCompanion} from "./companion.js";
import {isModuleClass} from "./module.js";
import type {Module} from "./module.js";
import {Service} from "./service.js";
import {ErrAmbiguousDefinition, ErrDefinitionMissing, ErrNotACapability} from "./errors/errors.js";
import {isRecord} from "./type-system-utils.js";
import type {ClassOf} from "./type-system-utils.js";

export type CodeUnit = Readonly<Record<string, unknown>>

/** Imported units by absolute path, shared by every library in the process */
const units = new Map<string, Promise<CodeUnit>>()

const CODE_EXTENSIONS = ["js", "mjs", "cjs", "ts", "mts"] as const

async function importUnit(absPath: string): Promise<CodeUnit> {
  const unit: unknown = await import(pathToFileURL(absPath).href)
  return isRecord(unit) ? unit : {}
}

function isCapabilityClass(value: unknown): value is ClassOf<Module> {
  return isModuleClass(value) && value !== Service
}

export const CodeLoader = StaticTypeCompanion({
  extensions: CODE_EXTENSIONS,

  isCodeExtension(ext: string | undefined): boolean {
    return CODE_EXTENSIONS.some((e) => e === ext)
  },

  isPackageEntry(fileName: string): boolean {
    return CODE_EXTENSIONS.some((ext) => fileName === `index.${ext}`)
  },

  /** Import a code file once per process. A failed import is forgotten so the next call retries. */
  import(filePath: string): Promise<CodeUnit> {
    const absPath = path.resolve(filePath)
    let pending = units.get(absPath)
    if (!pending) {
      pending = importUnit(absPath).catch((err: unknown) => {
        units.delete(absPath)
        throw err
      })
      units.set(absPath, pending)
    }
    return pending
  },

  isImported(filePath: string): boolean {
    return units.has(path.resolve(filePath))
  },

  /**
   * The capability class a unit exports under `expected`. It must exist,
   * extend Module, and be the only capability class the unit exports.
   */
  extractDefinition(unit: CodeUnit, expected: string, filePath: string): ClassOf<Module> {
    if (!Object.hasOwn(unit, expected)) {
      throw ErrDefinitionMissing.create({ path: filePath, expected })
    }
    const definition = unit[expected]
    if (!isCapabilityClass(definition)) {
      throw ErrNotACapability.create({ path: filePath, expected })
    }

    const others = new Map<unknown, string>()
    for (const [key, value] of Object.entries(unit)) {
      if (value !== definition && isCapabilityClass(value) && !others.has(value)) {
        others.set(value, key)
      }
    }
    if (others.size > 0) {
      throw ErrAmbiguousDefinition.create({ path: filePath, expected, others: [...others.values()] })
    }
    return definition
  },
})
