export { CLI } from './cli.js'
export type { CliOptions } from './cli.js'
export type { CliRequest, CliResponse } from './types.js'
export { CommandContext } from './command.js'
export type { LibrarySelection } from './command.js'
export { BufferedDiagnostics } from './buffered-diagnostics.js'
export { CliBoundary, ErrNoCoreDirectory } from './errors.js'
export { ResolvedPrinter } from './printers/resolve-printers.js'
export type { ResolvedView } from './printers/resolve-printers.js'
export { TreePrinter } from './printers/tree-printers.js'
export type { TreeView } from './printers/tree-printers.js'
