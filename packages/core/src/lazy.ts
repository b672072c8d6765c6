export interface LazyOne<T> {
  readonly get: T
}

export const Lazy = {
  /** Compute on first read, then keep the value */
  once<F>(fn: () => F): LazyOne<F> {
    let cell: { value: F } | undefined
    return {
      get get() {
        cell ??= { value: fn() }
        return cell.value
      },
    }
  },
}

/**
 * A property chain that resolves when awaited:
 * `await lib.$.shapes.Circle` calls `resolve(["shapes", "Circle"])`.
 */
export type LazyPath = PromiseLike<unknown> & { readonly [segment: string]: LazyPath }

export function makeLazyPath(
  resolve: (segments: readonly string[]) => Promise<unknown>,
  prefix: readonly string[] = [],
): LazyPath {
  return new Proxy({} as LazyPath, {
    get(_target, prop) {
      if (typeof prop === "symbol") return undefined
      if (prop === "then") {
        // the bare root is not awaitable, so `await lib.$` yields the proxy
        if (prefix.length === 0) return undefined
        return (onFulfilled?: (value: unknown) => unknown, onRejected?: (reason: unknown) => unknown) =>
          resolve(prefix).then(onFulfilled, onRejected)
      }
      return makeLazyPath(resolve, [...prefix, prop])
    },
  })
}
