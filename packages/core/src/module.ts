/**
 * Module - base class of every capability loaded from a code file.
 *
 * Instances (and, once loaded, the classes themselves) sit behind an
 * interception proxy. Reading a method that is a registered hook trigger
 * returns a forwarding function that fires the hooks before calling through.
 */

import {Callee} from "./callee.js";
import type {Callable} from "./callee.js";
import {Inspect} from "./inspect.js";
import {formatValues} from "./inspect.js";
import type {Library} from "./library.js";
import {ErrDetachedCapability} from "./errors/errors.js";
import type {ClassOf} from "./type-system-utils.js";

interface Stamp {
  readonly library: Library
  readonly moduleName: string
}

const stamps = new WeakMap<object, Stamp>()

/** interception proxy -> the object behind it */
const proxied = new WeakMap<object, object>()

function stampOf(cls: object): Stamp | undefined {
  return stamps.get(proxied.get(cls) ?? cls)
}

/**
 * Wrap a module instance or class. Only callable, public, string-keyed members
 * with hooks attached are replaced; everything else reads through.
 */
export function intercept<T extends object>(target: T): T {
  const proxy = new Proxy(target, {
    get(obj, prop, receiver) {
      const value: unknown = Reflect.get(obj, prop, receiver)
      if (typeof prop === "symbol" || typeof value !== "function") return value
      if (prop.startsWith("_") || prop === "constructor") return value

      // proxy invariant: frozen own members must read back unchanged
      const own = Reflect.getOwnPropertyDescriptor(obj, prop)
      if (own && !own.configurable && !own.writable) return value

      const stamp = stampOf(typeof obj === "function" ? obj : obj.constructor)
      if (!stamp) return value

      const callee = Callee.bound(receiver, value)
      const hooks = stamp.library.hooks
      if (!hooks.hasHooks(callee)) return value
      return callee.toCallable((args) => {
        hooks.fire(callee, args)
      })
    },
  })
  proxied.set(proxy, target)
  return proxy
}

export class Module {
  static {
    Inspect(this, (self) => {
      const stamp = stampOf(self.constructor)
      return stamp
        ? { format: "<%s>", params: [stamp.moduleName] }
        : { format: "<%s (detached)>", params: [self.constructor.name] }
    })
  }

  constructor() {
    return intercept(this)
  }

  /**
   * Attach a capability class to a library under its canonical dotted name.
   * Stamping again replaces the previous stamp.
   */
  static stamp(cls: ClassOf<Module>, library: Library, moduleName: string): void {
    stamps.set(proxied.get(cls) ?? cls, { library, moduleName })
  }

  static libraryOf(cls: object): Library | undefined {
    return stampOf(cls)?.library
  }

  static moduleNameOf(cls: object): string | undefined {
    return stampOf(cls)?.moduleName
  }

  get library(): Library {
    const library = Module.libraryOf(this.constructor)
    if (!library) throw ErrDetachedCapability.create({ className: this.constructor.name })
    return library
  }

  get moduleName(): string {
    const name = Module.moduleNameOf(this.constructor)
    if (name === undefined) throw ErrDetachedCapability.create({ className: this.constructor.name })
    return name
  }

  /**
   * Run one of this module's members whenever `trigger` fires.
   * The member receives the HookEvent.
   */
  on(trigger: Callable | Callee, member: string | Callable | Callee): Callee {
    const callback = typeof member === "string" ? Callee.of(this, member) : member
    return this.library.hooks.attach(trigger, callback)
  }

  /** Debug output, shown only when the library is verbose */
  print(...args: unknown[]): void {
    const library = this.library
    if (!library.verbose) return
    library.diagnostics.info(`${library.fmt.gray(`${this.moduleName}:`)} ${formatValues(args)}`)
  }
}

export function isModuleClass(value: unknown): value is ClassOf<Module> {
  return typeof value === "function" && value.prototype instanceof Module
}
