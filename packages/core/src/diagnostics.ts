import type {WlError} from "./wl-error.js";

/** Where a library reports what it noticed but did not throw */
export interface Diagnostics {
  info(message: string): void
  warn(error: WlError): void
}

export class ConsoleDiagnostics implements Diagnostics {
  constructor(private readonly color: boolean) {}

  info(message: string): void {
    console.log(message)
  }

  warn(error: WlError): void {
    console.warn(error.prettyPrint({ color: this.color }))
  }
}
