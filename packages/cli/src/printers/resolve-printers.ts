/**
 * Printers for `wl resolve`.
 *
 * A resolved value is one of: a namespace, a capability class, a module
 * instance (services resolve to theirs), text, or parsed data.
 */

import { formatValues, isModuleClass, Module, Namespace, Printer } from '@wl/core'

export interface ResolvedView {
  value: unknown
  json: boolean
}

export const ResolvedPrinter = Printer.define<ResolvedView>(({ value, json }, fmt) => {
  if (value instanceof Namespace) {
    return `${fmt.dim('<Namespace')} ${value.path}${fmt.dim('>')}`
  }
  if (isModuleClass(value)) {
    return `${fmt.dim('class')} ${fmt.bold(Module.moduleNameOf(value) ?? value.name)}`
  }
  if (value instanceof Module) {
    return formatValues([value])
  }
  if (json) {
    return JSON.stringify(value, null, 2) ?? 'null'
  }
  if (typeof value === 'string') {
    return value.endsWith('\n') ? value.slice(0, -1) : value
  }
  return formatValues([value])
})
