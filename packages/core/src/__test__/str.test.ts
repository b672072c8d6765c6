import { describe, test, expect } from "vitest";
import { Str } from "../str.js";

describe("Str", () => {
  test("slugify", () => {
    expect(Str.slugify("Hello, World!")).toBe("hello-world");
    expect(Str.slugify("  spaced_out  name ", { separator: "_" })).toBe("spaced_out_name");
    expect(Str.slugify("Crème Brûlée", { transliterate: true })).toBe("creme-brulee");
  });

  test("indent skips blank lines", () => {
    expect(Str.indent("a\n\nb", "  ")).toBe("  a\n\n  b");
  });

  test("unindent", () => {
    expect(Str.unindent("\n    first\n      second\n")).toBe("first\nsecond");
  });

  test("isEmpty", () => {
    expect(Str.isEmpty("   ")).toBe(true);
    expect(Str.isEmpty(undefined)).toBe(true);
    expect(Str.isEmpty(" x ")).toBe(false);
  });

  test("toSnakeCase handles camel and kebab", () => {
    expect(Str.toSnakeCase("WordCounter")).toBe("word_counter");
    expect(Str.toSnakeCase("word-counter")).toBe("word_counter");
  });

  test("normalizeWhitespace", () => {
    expect(Str.normalizeWhitespace(" a \n\t b  c ")).toBe("a b c");
  });
});
