/** Named stopwatches that accumulate samples across start/stop pairs */
export interface TimerOptions {
  /** Milliseconds; defaults to performance.now */
  clock?: () => number
  /** Where report lines go; defaults to console.log */
  sink?: (line: string) => void
}

export class Timer {
  readonly #clock: () => number
  readonly #sink: (line: string) => void
  readonly #samples = new Map<string, number[]>()
  readonly #started = new Map<string, number>()
  #last: string | undefined

  constructor(options: TimerOptions = {}) {
    this.#clock = options.clock ?? (() => performance.now())
    this.#sink = options.sink ?? ((line) => console.log(line))
  }

  get names(): string[] {
    return [...this.#samples.keys()]
  }

  start(name: string): this {
    this.#started.set(name, this.#clock())
    this.#last = name
    return this
  }

  /** Stop `name` (default: the last started) and record the sample. Stopping an idle timer records nothing. */
  stop(name?: string, opts: { report?: boolean } = {}): this {
    const key = name ?? this.#last
    if (key === undefined) return this
    const startedAt = this.#started.get(key)
    if (startedAt !== undefined) {
      const samples = this.#samples.get(key) ?? []
      samples.push((this.#clock() - startedAt) / 1000)
      this.#samples.set(key, samples)
      this.#started.delete(key)
    }
    this.#last = key
    if (opts.report) this.reportOne(key)
    return this
  }

  /** Accumulated seconds, rounded */
  total(name?: string, precision = 3): number {
    const key = name ?? this.#last
    const samples = key === undefined ? [] : this.#samples.get(key) ?? []
    const sum = samples.reduce((acc, s) => acc + s, 0)
    return Number(sum.toFixed(precision))
  }

  /** One line per timer, names padded to a common width */
  report(precision = 3): string[] {
    const width = Math.max(0, ...this.names.map((n) => n.length))
    return this.names.map((name) => this.reportOne(name, precision, width))
  }

  reportOne(name: string, precision = 3, width = name.length): string {
    const samples = this.#samples.get(name) ?? []
    const total = samples.reduce((acc, s) => acc + s, 0)
    let line = `${name.padEnd(width)} : ${total.toFixed(precision)}s`
    if (samples.length > 1) {
      const mean = total / samples.length
      const min = Math.min(...samples)
      const max = Math.max(...samples)
      line += ` ≈ ${samples.length} x ${mean.toFixed(precision)}s - (${min.toFixed(precision)}-${max.toFixed(precision)})`
    }
    this.#sink(line)
    return line
  }
}
