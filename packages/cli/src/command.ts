/**
 * CommandContext: what every command handler gets per request.
 *
 * Handlers return the text for stdout; anything they throw becomes the
 * response's stderr.
 */

import * as path from 'node:path'
import { Fmt, Library, PrintFormatter } from '@wl/core'
import { BufferedDiagnostics } from './buffered-diagnostics.js'
import { ErrNoCoreDirectory } from './errors.js'

export interface LibrarySelection {
  root?: string
  name?: string
}

export class CommandContext {
  readonly printer: PrintFormatter
  readonly diagnostics: BufferedDiagnostics

  constructor(
    readonly cwd: string,
    readonly color: boolean,
  ) {
    this.printer = new PrintFormatter(Fmt.from(color))
    this.diagnostics = new BufferedDiagnostics(color)
  }

  /** A fresh library over the selected root; fails when it has no core directory */
  openLibrary(selection: LibrarySelection): Library {
    const root = path.resolve(this.cwd, selection.root ?? '.')
    const name = selection.name ?? path.basename(root).toLowerCase()
    const library = Library.define(name, {
      root,
      color: this.color,
      diagnostics: this.diagnostics,
    })
    if (!library.core.isDirectory) {
      throw ErrNoCoreDirectory.create({ root, path: library.corePath })
    }
    return library
  }
}
