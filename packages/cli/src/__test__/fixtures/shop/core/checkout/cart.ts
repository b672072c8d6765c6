import { Module } from '@wl/core'

export class Cart extends Module {
  items: string[] = []

  add(item: string): number {
    this.items.push(item)
    return this.items.length
  }
}
