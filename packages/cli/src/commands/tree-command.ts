import { object } from '@optique/core/constructs'
import { constant, option } from '@optique/core/primitives'
import { optional } from '@optique/core/modifiers'
import { integer } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import type { CommandContext } from '../command.js'
import { nameOption, rootOption } from '../parsers/standard-opts.js'
import { TreePrinter } from '../printers/tree-printers.js'

export const treeCommand = object({
  cmd: constant('tree' as const),
  root: rootOption,
  name: nameOption,
  depth: optional(option('-d', '--depth', integer({ min: 1 }), { description: message`Levels to show` })),
})

export function handleTree(
  opts: { root?: string; name?: string; depth?: number },
  ctx: CommandContext,
): string {
  const library = ctx.openLibrary(opts)
  return ctx.printer.print(TreePrinter, {
    libraryName: library.libraryName,
    core: library.core,
    depth: opts.depth,
  })
}
