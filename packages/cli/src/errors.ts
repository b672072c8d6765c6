/**
 * CLI error boundary: errors owned by the CLI dispatch layer.
 */

import { ErrFacet, HasPath, NotFound, WlError } from '@wl/core'

export const CliBoundary = WlError.boundary('cli')

/** The library root has no directory to resolve names from. */
export const ErrNoCoreDirectory = CliBoundary.define('no_core_directory', {
  customProps: ErrFacet.props<{ root: string }>(),
  facets: [NotFound, HasPath],
  message: (d) => `No core directory under ${d.root} (expected ${d.path})`,
})
