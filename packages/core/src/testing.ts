/**
 * Test helpers for code built on the library.
 */

import type { Diagnostics } from "./diagnostics.js"
import { Library } from "./library.js"
import type { LibraryOptions } from "./library.js"
import type { WlError } from "./wl-error.js"

// -- RecordingDiagnostics -----------------------------------------------------

/** Keeps everything reported instead of printing it */
export class RecordingDiagnostics implements Diagnostics {
  readonly infos: string[] = []
  readonly warnings: WlError[] = []

  info(message: string): void {
    this.infos.push(message)
  }

  warn(error: WlError): void {
    this.warnings.push(error)
  }

  /** Codes of the recorded warnings, in order */
  get codes(): string[] {
    return this.warnings.map((w) => w.code)
  }
}

// -- testLibrary --------------------------------------------------------------

export interface TestLibrary {
  readonly library: Library
  readonly diagnostics: RecordingDiagnostics
}

/**
 * A fresh library class and instance over `root`, quiet and colourless,
 * ignoring any `.env` file. Each call defines a new class, so tests never
 * collide on the one-instance-per-class rule.
 */
export function testLibrary(name: string, root: string, options: LibraryOptions = {}): TestLibrary {
  const diagnostics = new RecordingDiagnostics()
  const library = Library.define(name, {
    root,
    verbose: false,
    color: false,
    envFile: false,
    diagnostics,
    ...options,
  })
  return { library, diagnostics }
}
