/**
 * Marks an object literal as the companion of a same-named type, e.g.
 * `PathCodec` the type-free namespace of functions, or `WlError` the
 * interface plus its static helpers.
 *
 * Purely a readability marker: returns its argument untouched.
 */
export function StaticTypeCompanion<const Companion>(companion: Companion): Companion {
  return companion
}
