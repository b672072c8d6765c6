import { describe, test, expect } from "vitest";
import { PathCodec } from "../path-codec.js";

describe("PathCodec", () => {
  test("toFsName splits at capitals", () => {
    expect(PathCodec.toFsName("TextEncoder")).toBe("text_encoder");
    expect(PathCodec.toFsName("Circle")).toBe("circle");
    expect(PathCodec.toFsName("shapes")).toBe("shapes");
    expect(PathCodec.toFsName("Base64Codec")).toBe("base64_codec");
  });

  test("toPublicName title-cases each component", () => {
    expect(PathCodec.toPublicName("text_encoder")).toBe("TextEncoder");
    expect(PathCodec.toPublicName("circle")).toBe("Circle");
    expect(PathCodec.toPublicName("text_encoder", false)).toBe("textEncoder");
  });

  test("the camel form lower-cases the first component", () => {
    expect(PathCodec.toPublicName("Text_encoder", false)).toBe("textEncoder");
    expect(PathCodec.toPublicName("HTML", false)).toBe("html");
  });

  test("round trip over word-boundary identifiers", () => {
    for (const fsName of ["text_encoder", "word_counter", "a_b_c", "shapes"]) {
      expect(PathCodec.toFsName(PathCodec.toPublicName(fsName))).toBe(fsName);
    }
  });
});
