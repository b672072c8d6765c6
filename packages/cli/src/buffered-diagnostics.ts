import type { Diagnostics, WlError } from '@wl/core'

/** Collects library diagnostics for the response's stderr */
export class BufferedDiagnostics implements Diagnostics {
  readonly #lines: string[] = []

  constructor(private readonly color: boolean) {}

  info(message: string): void {
    this.#lines.push(message)
  }

  warn(error: WlError): void {
    this.#lines.push(error.prettyPrint({ color: this.color }))
  }

  get isEmpty(): boolean {
    return this.#lines.length === 0
  }

  drain(): string {
    const text = this.#lines.map((line) => `${line}\n`).join('')
    this.#lines.length = 0
    return text
  }
}
