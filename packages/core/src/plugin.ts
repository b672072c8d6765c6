import type {Library} from "./library.js";
import type {Diagnostics} from "./diagnostics.js";
import {ErrPluginAlreadyRegistered, ErrPluginFailed} from "./errors/errors.js";
import {WlError} from "./wl-error.js";

/**
 * Custom leaf handling. `match` receives the candidate path (without
 * extension during name resolution, the full file path from `File.load`).
 */
export interface Plugin {
  match(candidatePath: string): boolean
  load(candidatePath: string, library: Library): unknown
}

export type PluginClass = new () => Plugin

/** A plugin's answer, boxed so `undefined` is a valid loaded value */
export interface PluginHit {
  readonly plugin: string
  readonly value: unknown
}

export class PluginRegistry {
  readonly #plugins = new Map<string, Plugin>()

  constructor(private readonly diagnostics: Diagnostics) {}

  get size(): number {
    return this.#plugins.size
  }

  names(): string[] {
    return [...this.#plugins.keys()]
  }

  has(name: string): boolean {
    return this.#plugins.has(name)
  }

  /** Register a plugin instance, or a class to instantiate. The name defaults to the class name. */
  register(plugin: Plugin | PluginClass, name?: string): Plugin {
    const instance = typeof plugin === "function" ? new plugin() : plugin
    const key = name ?? (typeof plugin === "function" ? plugin.name : plugin.constructor.name)
    if (this.#plugins.has(key)) throw ErrPluginAlreadyRegistered.create({ plugin: key })
    this.#plugins.set(key, instance)
    return instance
  }

  /**
   * Ask plugins in registration order; the first match loads. A plugin that
   * throws is reported and skipped.
   */
  async tryLoad(candidatePath: string, library: Library): Promise<PluginHit | undefined> {
    for (const [name, plugin] of this.#plugins) {
      let stage: "match" | "load" = "match"
      try {
        if (!plugin.match(candidatePath)) continue
        stage = "load"
        const value: unknown = await plugin.load(candidatePath, library)
        return { plugin: name, value }
      } catch (err) {
        this.diagnostics.warn(
          ErrPluginFailed.create({ plugin: name, path: candidatePath, stage }, undefined, WlError.wrap(err)),
        )
      }
    }
    return undefined
  }
}
