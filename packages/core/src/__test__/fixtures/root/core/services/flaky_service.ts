import {Service} from "../../../../../service.js";

export class FlakyService extends Service {
  static attempts = 0

  override initialize(): void {
    FlakyService.attempts++
    if (this.library.conf.has("FLAKY_FAIL")) throw new Error("flaky init")
  }
}
