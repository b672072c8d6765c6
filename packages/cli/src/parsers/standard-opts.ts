import { optional } from '@optique/core/modifiers'
import { option } from '@optique/core/primitives'
import { string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'

/** Library directory; the working directory when absent */
export const rootOption = optional(option('-r', '--root', string({ metavar: 'DIR' }), {
  description: message`Library root directory (contains core/)`,
}))

/** Public library name; the root directory's name when absent */
export const nameOption = optional(option('-n', '--name', string({ metavar: 'NAME' }), {
  description: message`Library name used as the first segment of dotted paths`,
}))
