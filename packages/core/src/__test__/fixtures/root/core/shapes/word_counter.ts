import {Module} from "../../../../../module.js";

export class WordCounter extends Module {
  count(text: string): number {
    return text.split(/\s+/).filter((word) => word.length > 0).length
  }
}
