import {Callee} from "./callee.js";
import type {Callable} from "./callee.js";
import type {Diagnostics} from "./diagnostics.js";
import {ErrHookCallbackFailed} from "./errors/errors.js";
import {isPromiseLike} from "./type-system-utils.js";
import {WlError} from "./wl-error.js";

/** What every callback receives */
export interface HookEvent {
  readonly trigger: Callee
  /** The object the trigger was called on, `null` for a free function */
  readonly owner: object | null
  readonly args: readonly unknown[]
}

interface HookList {
  readonly trigger: Callee
  readonly callbacks: Callee[]
}

/**
 * Trigger -> ordered callbacks. Callbacks run synchronously, in attach
 * order; a failing callback is reported and the rest still run.
 */
export class HookRegistry {
  readonly #lists = new Map<string, HookList>()

  constructor(private readonly diagnostics: Diagnostics) {}

  attach(trigger: Callable | Callee, callback: Callable | Callee): Callee {
    const key = Callee.from(trigger)
    const cb = Callee.from(callback)
    const list = this.#lists.get(key.hash)
    if (list) list.callbacks.push(cb)
    else this.#lists.set(key.hash, { trigger: key, callbacks: [cb] })
    return cb
  }

  /** Remove the first callback equal to `callback`. Returns whether one was removed */
  detach(trigger: Callable | Callee, callback: Callable | Callee): boolean {
    const key = Callee.from(trigger)
    const list = this.#lists.get(key.hash)
    if (!list) return false
    const cb = Callee.from(callback)
    const index = list.callbacks.findIndex((c) => c.equals(cb))
    if (index === -1) return false
    list.callbacks.splice(index, 1)
    if (list.callbacks.length === 0) this.#lists.delete(key.hash)
    return true
  }

  hasHooks(trigger: Callable | Callee): boolean {
    return this.#lists.has(Callee.from(trigger).hash)
  }

  count(trigger: Callable | Callee): number {
    return this.#lists.get(Callee.from(trigger).hash)?.callbacks.length ?? 0
  }

  /** Run every callback attached to `trigger`. Returns how many were invoked */
  fire(trigger: Callable | Callee, args: readonly unknown[] = []): number {
    const key = Callee.from(trigger)
    const list = this.#lists.get(key.hash)
    if (!list) return 0

    const event: HookEvent = Object.freeze({ trigger: key, owner: key.owner, args: Object.freeze([...args]) })
    const callbacks = [...list.callbacks]
    for (const cb of callbacks) {
      try {
        const result = cb.invoke(event)
        if (isPromiseLike(result)) {
          result.then(undefined, (err: unknown) => this.#report(key, cb, err))
        }
      } catch (err) {
        this.#report(key, cb, err)
      }
    }
    return callbacks.length
  }

  clear(): void {
    this.#lists.clear()
  }

  #report(trigger: Callee, callback: Callee, err: unknown): void {
    this.diagnostics.warn(
      ErrHookCallbackFailed.create(
        { trigger: trigger.qualifiedName, callback: callback.qualifiedName },
        undefined,
        WlError.wrap(err),
      ),
    )
  }
}
