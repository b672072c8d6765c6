import { Fmt } from './fmt.js'

type PrintFn<T> = (value: T, fmt: Fmt) => string

export class Printer<T> {
  constructor(private fn: PrintFn<T>) {}

  static define<T>(fn: (value: T, fmt: Fmt) => string): Printer<T> {
    return new Printer(fn)
  }

  print(value: T, fmt: Fmt): string {
    return this.fn(value, fmt)
  }

  /** Convenience function for multi-line output */
  static lines(strings: string[]): string {
    return strings.join('\n')
  }
}

/** Binds printers to one Fmt, so call sites don't thread it through */
export class PrintFormatter {
  constructor(readonly fmt: Fmt) {}

  print<T>(printer: Printer<T>, value: T): string {
    return printer.print(value, this.fmt)
  }

  printList<T>(printer: Printer<T>, values: readonly T[], separator: string = '\n'): string {
    return values.map((v) => printer.print(v, this.fmt)).join(separator)
  }
}
