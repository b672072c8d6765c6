import {Module} from "./module.js";
import {Mutex} from "./mutex.js";
import {ErrServiceInitFailed} from "./errors/errors.js";
import {WlError} from "./wl-error.js";

/**
 * A capability the library holds exactly one instance of.
 * Override `initialize` for setup that should run once, after construction.
 */
export class Service extends Module {
  // instances live behind the interception proxy, so no #private state here
  private initialization: Promise<void> | undefined
  private ready = false

  get isReady(): boolean {
    return this.ready
  }

  initialize(): void | Promise<void> {}

  /** Run `initialize` once. Concurrent callers share the run; a failure lets the next call retry. */
  ensureInitialized(): Promise<void> {
    this.initialization ??= this.runInitialize().catch((err: unknown) => {
      // runs after the assignment, even when initialize throws synchronously
      this.initialization = undefined
      throw err
    })
    return this.initialization
  }

  private async runInitialize(): Promise<void> {
    await this.initialize()
    this.ready = true
  }
}

export type ServiceClass<S extends Service = Service> = new () => S

export function isServiceClass(value: unknown): value is ServiceClass {
  return typeof value === "function" && value.prototype instanceof Service
}

/**
 * One instance per concrete service class. Construction happens under the
 * registry lock; initialization happens outside it, shared by every caller
 * that asks while it runs.
 */
export class ServiceRegistry {
  readonly #instances = new Map<ServiceClass, Service>()
  readonly #lock = new Mutex()

  get size(): number {
    return this.#instances.size
  }

  has(type: ServiceClass): boolean {
    return this.#instances.has(type)
  }

  /** The instance for `type` if it exists and finished initializing */
  peek<S extends Service>(type: ServiceClass<S>): S | undefined {
    const instance = this.#instances.get(type)
    return instance instanceof type && instance.isReady ? instance : undefined
  }

  /**
   * The ready instance for `type`, constructing and initializing it on first
   * request. `prepare` runs on a freshly constructed instance before it is
   * published.
   */
  async getOrCreate<S extends Service>(type: ServiceClass<S>, prepare?: (instance: S) => void): Promise<S> {
    const instance = this.#lookup(type) ?? (await this.#lock.runExclusive(() => {
      const existing = this.#lookup(type)
      if (existing) return existing
      const created = new type()
      prepare?.(created)
      this.#instances.set(type, created)
      return created
    }))

    try {
      await instance.ensureInitialized()
    } catch (err) {
      if (this.#instances.get(type) === instance) this.#instances.delete(type)
      throw ErrServiceInitFailed.create({ service: type.name }, undefined, WlError.wrap(err))
    }
    return instance
  }

  #lookup<S extends Service>(type: ServiceClass<S>): S | undefined {
    const instance = this.#instances.get(type)
    return instance instanceof type ? instance : undefined
  }
}
