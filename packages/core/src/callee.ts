/**
 * Callee - stable identity for a callable and the object it is called on.
 *
 * JavaScript member access hands back the shared prototype function with no
 * owner attached, so `Callee.of(owner, "member")` records the pairing
 * explicitly. Two callees are equal when they share the owner reference and
 * the function reference.
 */

import {Inspect} from "./inspect.js";
import {isPromiseLike} from "./type-system-utils.js";
import {ErrNotCallable} from "./errors/errors.js";

/** Any function value; parameters are never inspected */
export type Callable = (...args: never[]) => unknown

/** Forwarding wrappers carry the identity they forward to */
const IDENTITY: unique symbol = Symbol("wl.callee")

const objectIds = new WeakMap<object, number>()
let nextObjectId = 1

function objectId(value: object | null): number {
  if (value === null) return 0
  let id = objectIds.get(value)
  if (id === undefined) {
    id = nextObjectId++
    objectIds.set(value, id)
  }
  return id
}

function ownerName(owner: object | null): string | undefined {
  if (owner === null) return undefined
  if (typeof owner === "function") return owner.name || "<anonymous>"
  const ctor: unknown = Reflect.get(owner, "constructor")
  return (typeof ctor === "function" && ctor.name) || "Object"
}

function identityOf(fn: Function): Callee | undefined {
  const tagged: unknown = Reflect.get(fn, IDENTITY)
  return tagged instanceof Callee ? tagged : undefined
}

export class Callee {
  readonly owner: object | null
  readonly fn: Function
  readonly qualifiedName: string
  readonly hash: string

  static {
    Inspect(this, (self) => ({ format: "<Callee %s>", params: [self.qualifiedName] }))
  }

  private constructor(owner: object | null, fn: Function) {
    this.owner = owner
    this.fn = fn
    const name = fn.name || "<anonymous>"
    const owned = ownerName(owner)
    this.qualifiedName = owned ? `${owned}.${name}` : name
    this.hash = `${objectId(owner)}:${objectId(fn)}:${this.qualifiedName}`
  }

  /**
   * Normalize a callable. Callees and forwarding wrappers yield the identity
   * they already carry; anything else is a free function.
   */
  static from(value: Callable | Callee): Callee {
    if (value instanceof Callee) return value
    return identityOf(value) ?? new Callee(null, value)
  }

  /** Identity of `owner[member]` called on `owner` (an instance or a class) */
  static of(owner: object, member: string): Callee {
    const value: unknown = Reflect.get(owner, member)
    if (typeof value !== "function") throw ErrNotCallable.create({ member })
    return Callee.bound(owner, value)
  }

  /** Pair a function with its owner, unwrapping a forwarding wrapper first */
  static bound(owner: object, fn: Function): Callee {
    return new Callee(owner, identityOf(fn)?.fn ?? fn)
  }

  equals(other: Callee): boolean {
    return this.owner === other.owner && this.fn === other.fn
  }

  /**
   * Call with `this` bound to the owner. A thenable result comes back as a
   * Promise and is not awaited.
   */
  invoke(...args: unknown[]): unknown {
    const result: unknown = Reflect.apply(this.fn, this.owner ?? undefined, args)
    return isPromiseLike(result) ? Promise.resolve(result) : result
  }

  isAsync(): boolean {
    const tag = Object.prototype.toString.call(this.fn)
    return tag === "[object AsyncFunction]" || tag === "[object AsyncGeneratorFunction]"
  }

  /**
   * A plain function that invokes this identity, optionally running `before`
   * with the call arguments first. `Callee.from` on the result gives back
   * this identity.
   */
  toCallable(before?: (args: readonly unknown[]) => void): (...args: unknown[]) => unknown {
    const forward = (...args: unknown[]): unknown => {
      before?.(args)
      return this.invoke(...args)
    }
    Object.defineProperty(forward, IDENTITY, { value: this })
    Object.defineProperty(forward, "name", { value: this.fn.name, configurable: true })
    return forward
  }
}
