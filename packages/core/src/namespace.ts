import * as fs from "node:fs";
import * as path from "node:path";
import {FsEntry} from "./fs-entry.js";
import {File} from "./file.js";
import {CodeLoader} from "./code-loader.js";
import {makeLazyPath} from "./lazy.js";
import type {LazyPath} from "./lazy.js";

/**
 * Handle over one directory of the tree. Names are looked up in the
 * directory's package entry (`index.ts`, `index.js`, ...) first, then
 * resolved from the filesystem.
 */
export class Namespace extends FsEntry {
  async get(name: string): Promise<unknown> {
    const entry = await this.library.packageEntry(this.path)
    if (entry && Object.hasOwn(entry, name)) return entry[name]
    return this.library.resolveIn(name, this.path)
  }

  /** Filesystem resolution only; the package entry is not consulted */
  at(name: string): Promise<unknown> {
    return this.library.resolveIn(name, this.path)
  }

  /** Child directories and files, sorted by name */
  entries(): Array<Namespace | File> {
    return fs
      .readdirSync(this.path, { withFileTypes: true })
      .filter((dirent) => !dirent.name.startsWith("__") && !dirent.name.startsWith("."))
      .filter((dirent) => !(dirent.isFile() && CodeLoader.isPackageEntry(dirent.name)))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map((dirent) => {
        const child = path.join(this.path, dirent.name)
        return dirent.isDirectory() ? this.library.namespace(child) : new File(this.library, child)
      })
  }

  /** `await ns.$.circle.Circle` */
  get $(): LazyPath {
    return makeLazyPath((segments) => this.library.walk(this, segments))
  }
}
