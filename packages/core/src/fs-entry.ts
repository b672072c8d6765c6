import * as fs from "node:fs";
import * as path from "node:path";
import {Inspect} from "./inspect.js";
import {Lazy} from "./lazy.js";
import type {Library} from "./library.js";

/**
 * Read-only view of one filesystem path. Metadata is captured once at
 * construction and never refreshed; build a new entry to see changes.
 */
export class FsEntry {
  readonly path: string
  /** Extension without the dot */
  readonly ext: string | undefined
  /** Base name without extension */
  readonly name: string
  /** Absolute path without extension */
  readonly stem: string
  readonly exists: boolean
  readonly isDirectory: boolean
  readonly mtimeMs: number | undefined

  readonly #parent = Lazy.once((): FsEntry | undefined => {
    const dir = path.dirname(this.path)
    return dir === this.path ? undefined : new FsEntry(this.library, dir)
  })

  static {
    Inspect(this, (self) => ({
      format: '<%s.%s path="%s">',
      params: [self.library.libraryName, self.constructor.name, self.path],
    }))
  }

  constructor(readonly library: Library, entryPath: string) {
    this.path = path.resolve(entryPath)
    const ext = path.extname(this.path)
    this.ext = ext ? ext.slice(1) : undefined
    this.stem = ext ? this.path.slice(0, -ext.length) : this.path
    this.name = path.basename(this.stem)

    const stat = fs.statSync(this.path, { throwIfNoEntry: false })
    this.exists = stat !== undefined
    this.isDirectory = stat?.isDirectory() ?? false
    this.mtimeMs = stat?.mtimeMs
  }

  /** The containing directory, `undefined` at the filesystem root */
  get parent(): FsEntry | undefined {
    return this.#parent.get
  }
}
