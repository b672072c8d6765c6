/** Convert a union to an intersection */
export type UnionToIntersection<U> = (U extends unknown ? (x: U) => void : never) extends (
    x: infer I,
  ) => void
  ? I
  : never;

/** Any class whose instances are T. Constructor arguments are irrelevant to callers that only inspect it. */
export type ClassOf<T> = abstract new (...args: never[]) => T

/** Plain record check used when walking loaded modules and parsed data */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/** Anything with a callable `then` */
export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (typeof value === "object" || typeof value === "function")
    && value !== null
    && typeof Reflect.get(value, "then") === "function"
}
