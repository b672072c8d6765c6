import {StaticTypeCompanion} from "./companion.js";

/** Conversion between public names (`TextEncoder`) and filesystem names (`text_encoder`) */
export const PathCodec = StaticTypeCompanion({
  separator: "_",

  toFsName(publicName: string): string {
    return publicName.replace(/(?<!^)(?=[A-Z])/g, "_").toLowerCase()
  },

  /** `capitalizeFirst: false` gives the camel form: `text_encoder` -> `textEncoder` */
  toPublicName(fsName: string, capitalizeFirst = true): string {
    const [head = "", ...rest] = fsName.split("_")
    const first = capitalizeFirst ? titleCase(head) : head.toLowerCase()
    return first + rest.map(titleCase).join("")
  },
})

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
}
