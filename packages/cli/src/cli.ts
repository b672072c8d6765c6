/**
 * CLI: the dispatch engine.
 *
 * Pure logic: argv in, a CliResponse out. Process-level concerns (reading
 * process.argv, writing streams, exit codes) live in main.ts.
 */

import { or } from '@optique/core/constructs'
import { command } from '@optique/core/primitives'
import { formatMessage, message } from '@optique/core/message'
import { parse } from '@optique/core/parser'
import type { InferValue } from '@optique/core/parser'
import { formatValues, Lazy, WlError } from '@wl/core'

import { CommandContext } from './command.js'
import { confCommand, handleConf } from './commands/conf-command.js'
import { handleResolve, resolveCommand } from './commands/resolve-command.js'
import { handleTree, treeCommand } from './commands/tree-command.js'
import type { CliRequest, CliResponse } from './types.js'

export interface CliOptions {
  /** Colour when a request does not say; defaults to false */
  color?: boolean
}

export class CLI {
  constructor(private opts: CliOptions = {}) {}

  program = Lazy.once(() => or(
    command('resolve', resolveCommand, { description: message`Resolve a dotted path and print the value` }),
    command('tree', treeCommand, { description: message`Print the namespace tree of a library` }),
    command('conf', confCommand, { description: message`Print a configuration value` }),
  ))

  async execute(req: CliRequest): Promise<CliResponse> {
    const color = req.color ?? this.opts.color ?? false
    const parsed = parse(this.program.get, req.argv)
    if (!parsed.success) {
      return { exitCode: 1, stderr: `Error: ${formatMessage(parsed.error, { colors: color })}\n` }
    }

    const ctx = new CommandContext(req.cwd ?? process.cwd(), color)
    try {
      const result = await this.dispatch(parsed.value, ctx)
      const response: CliResponse = { exitCode: 0, stdout: result ? result.concat('\n') : '' }
      if (!ctx.diagnostics.isEmpty) response.stderr = ctx.diagnostics.drain()
      return response
    } catch (err) {
      const msg = WlError.isWlError(err) ? err.prettyPrint({ color }) : formatValues([err])
      return { exitCode: 1, stderr: `${ctx.diagnostics.drain()}${msg}\n` }
    }
  }

  private async dispatch(instruction: InferValue<CLI['program']['get']>, ctx: CommandContext): Promise<string> {
    switch (instruction.cmd) {
      case 'resolve':
        return handleResolve(instruction, ctx)
      case 'tree':
        return handleTree(instruction, ctx)
      case 'conf':
        return handleConf(instruction, ctx)
    }
  }
}
