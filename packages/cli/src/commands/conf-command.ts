import { object } from '@optique/core/constructs'
import { argument, constant } from '@optique/core/primitives'
import { string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'
import type { CommandContext } from '../command.js'
import { rootOption } from '../parsers/standard-opts.js'

export const confCommand = object({
  cmd: constant('conf' as const),
  key: argument(string({ metavar: 'KEY' }), { description: message`Configuration key` }),
  root: rootOption,
})

/** The overlay (root/.env) wins over the process environment */
export function handleConf(opts: { key: string; root?: string }, ctx: CommandContext): string {
  return ctx.openLibrary(opts).conf.get(opts.key)
}
