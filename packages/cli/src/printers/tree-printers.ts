/**
 * Printer for `wl tree`: the namespace tree under a library's core directory.
 */

import * as path from 'node:path'
import { Fmt, Namespace, Printer } from '@wl/core'

export interface TreeView {
  libraryName: string
  core: Namespace
  /** Levels below the core directory to show; unlimited when absent */
  depth?: number
}

function branch(ns: Namespace, prefix: string, remaining: number, fmt: Fmt, lines: string[]): void {
  if (remaining <= 0) return
  const children = ns.entries()
  children.forEach((child, i) => {
    const last = i === children.length - 1
    const connector = fmt.dim(last ? '└── ' : '├── ')
    if (child instanceof Namespace) {
      lines.push(`${prefix}${connector}${fmt.bold(child.name)}/`)
      branch(child, prefix + (last ? '    ' : fmt.dim('│   ')), remaining - 1, fmt, lines)
    } else {
      lines.push(`${prefix}${connector}${path.basename(child.path)}`)
    }
  })
}

export const TreePrinter = Printer.define<TreeView>((view, fmt) => {
  const lines = [fmt.bold(view.libraryName)]
  branch(view.core, '', view.depth ?? Number.POSITIVE_INFINITY, fmt, lines)
  return Printer.lines(lines)
})
