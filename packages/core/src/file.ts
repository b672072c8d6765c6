import {FsEntry} from "./fs-entry.js";

/** A leaf of the tree. What `load` returns depends on plugins and the extension */
export class File extends FsEntry {
  load(): Promise<unknown> {
    return this.library.loadFile(this)
  }
}
