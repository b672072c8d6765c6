import {Service} from "../../../../../service.js";

export class CounterService extends Service {
  static initializations = 0

  hits = 0

  override async initialize(): Promise<void> {
    CounterService.initializations++
    await new Promise((resolve) => setTimeout(resolve, 5))
  }

  hit(): number {
    this.hits++
    return this.hits
  }
}
