import {Module} from "../../../../../module.js";

export class Beacon extends Module {
  pings = 0

  ping(message = "ping"): string {
    this.pings++
    return message
  }

  async later(): Promise<string> {
    return "later"
  }

  _quiet(): string {
    return "quiet"
  }

  static create(): Beacon {
    return new Beacon()
  }
}
