import util from 'node-inspect-extracted'
import type { InspectOptions } from 'node-inspect-extracted'

/**
 * Give a class a custom `util.inspect` rendering.
 * Call from a `static {}` block so the renderer lands on the prototype once.
 *
 * `fn` returns a printf-style format plus params; formatting (colours, depth)
 * is delegated to `util.formatWithOptions`.
 *
 * ```typescript
 * class Namespace {
 *   static {
 *     Inspect(this, (self) => ({ format: '<Namespace path="%s">', params: [self.path] }))
 *   }
 * }
 * ```
 */
export function Inspect<T>(
  cls: { prototype: T },
  fn: (self: T, options: InspectOptions) => { format: string; params: unknown[] },
): void {
  Object.defineProperty(cls.prototype, inspect, {
    configurable: true,
    writable: true,
    value: function (this: T, depth: number | undefined, options: InspectOptions) {
      const opts = { ...options, depth: (depth ?? 2) - 1 }
      const data = fn(this, opts)
      return util.formatWithOptions(opts, data.format, ...data.params)
    },
  })
}

/** Render arbitrary values the way `console.log` would, without colour */
export function formatValues(values: readonly unknown[]): string {
  return util.formatWithOptions({ colors: false }, ...values)
}

export const inspect: unique symbol = Symbol.for('nodejs.util.inspect.custom')
