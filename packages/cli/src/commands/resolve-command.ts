import { object } from '@optique/core/constructs'
import { argument, constant, option } from '@optique/core/primitives'
import { string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import type { CommandContext } from '../command.js'
import { nameOption, rootOption } from '../parsers/standard-opts.js'
import { ResolvedPrinter } from '../printers/resolve-printers.js'

export const resolveCommand = object({
  cmd: constant('resolve' as const),
  target: argument(string({ metavar: 'PATH' }), { description: message`Dotted path, e.g. shop.checkout.Cart` }),
  root: rootOption,
  name: nameOption,
  json: option('--json', { description: message`Print data as JSON` }),
})

export async function handleResolve(
  opts: { target: string; root?: string; name?: string; json: boolean },
  ctx: CommandContext,
): Promise<string> {
  const library = ctx.openLibrary(opts)
  const value = await library.resolve(opts.target)
  return ctx.printer.print(ResolvedPrinter, { value, json: opts.json })
}
