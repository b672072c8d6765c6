import { Service } from '@wl/core'

export class SessionStore extends Service {
  readonly sessions = new Map<string, string[]>()
}
