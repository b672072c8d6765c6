import * as fs from "node:fs";
import dotenv from "dotenv";
import {Inspect} from "./inspect.js";
import {ErrConfKeyNotFound} from "./errors/errors.js";

/**
 * Two-tier configuration: values set on the overlay win, then the process
 * environment. A key found in neither is an error.
 */
export class Conf {
  readonly #overlay: Map<string, string>

  static {
    Inspect(this, (self) => ({ format: "<Conf %d keys>", params: [self.size] }))
  }

  constructor(entries: Record<string, string> = {}) {
    this.#overlay = new Map(Object.entries(entries))
  }

  /** Overlay seeded from a `.env` file; a missing file gives an empty overlay */
  static fromEnvFile(envPath: string): Conf {
    if (!fs.existsSync(envPath)) return new Conf()
    return new Conf(dotenv.parse(fs.readFileSync(envPath)))
  }

  /** Number of overlay keys */
  get size(): number {
    return this.#overlay.size
  }

  get(key: string): string {
    const value = this.#overlay.get(key) ?? process.env[key]
    if (value === undefined) throw ErrConfKeyNotFound.create({ key })
    return value
  }

  /** Like get, with a fallback instead of an error */
  getOr(key: string, fallback: string): string {
    return this.#overlay.get(key) ?? process.env[key] ?? fallback
  }

  has(key: string): boolean {
    return this.#overlay.has(key) || process.env[key] !== undefined
  }

  set(key: string, value: string): this {
    this.#overlay.set(key, value)
    return this
  }

  delete(key: string): boolean {
    return this.#overlay.delete(key)
  }

  keys(): string[] {
    return [...this.#overlay.keys()].sort()
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this.#overlay)
  }

  toString(): string {
    return this.keys()
      .map((key) => `${key.padEnd(24)}: ${this.#overlay.get(key) ?? ""}`)
      .join("\n")
  }
}
