import { describe, test, expect } from "vitest";
import { WlError, ErrFacet } from "../wl-error.js";
import { Core, ErrUnresolved, HasPath, NotFound, LoadContract, ErrDefinitionMissing } from "../errors/errors.js";

// -- Test facets and error definitions -----------------------------------------

const Retryable = ErrFacet.marker("Retryable");
const HasRef = ErrFacet.data<{ ref: string }>("HasRef");

const Storage = WlError.boundary("storage");

const ErrEntityMissing = Storage.define("entity_missing", {
  facets: [NotFound, HasRef],
  message: (d) => `Entity not found: ${d.ref}`,
});

const ErrFlaky = Storage.define("flaky", {
  customProps: ErrFacet.props<{ attempt: number }>(),
  facets: [Retryable],
  message: (d) => `Attempt ${d.attempt} failed`,
});

// -- Tests ---------------------------------------------------------------------

describe("ErrFacet", () => {
  test("marker() and data() create frozen facets", () => {
    expect(Retryable.kind).toBe("marker");
    expect(HasRef.kind).toBe("data");
    expect(HasRef.name).toBe("HasRef");
    expect(Object.isFrozen(Retryable)).toBe(true);
    expect(Object.isFrozen(HasRef)).toBe(true);
  });
});

describe("boundary.define()", () => {
  test("prefixes the code with the domain", () => {
    expect(ErrEntityMissing.code).toBe("storage.entity_missing");
    expect(ErrEntityMissing.domain).toBe("storage");
    expect(ErrUnresolved.code).toBe("core.unresolved");
  });

  test("create() carries message, data and facets", () => {
    const err = ErrEntityMissing.create({ ref: "user:1" });
    expect(err).toBeInstanceOf(Error);
    expect(err.message).toBe("Entity not found: user:1");
    expect(err.data.ref).toBe("user:1");
    expect([...err.facetNames]).toEqual(["NotFound", "HasRef"]);
    expect(err.name).toBe("WlError[storage.entity_missing]");
  });

  test("custom props flow into the message", () => {
    expect(ErrFlaky.create({ attempt: 2 }).message).toBe("Attempt 2 failed");
  });

  test("context is appended to the message", () => {
    const err = ErrEntityMissing.create({ ref: "user:1" }, "during sync");
    expect(err.message).toBe("Entity not found: user:1 (during sync)");
    expect(err.context).toBe("during sync");
  });
});

// ============================================================================
// Discrimination
// ============================================================================

describe("discrimination", () => {
  const err = ErrUnresolved.create({ name: "Circle", path: "/lib/core/circle" });

  test("ErrorDef.is matches by exact code", () => {
    expect(ErrUnresolved.is(err)).toBe(true);
    expect(ErrDefinitionMissing.is(err)).toBe(false);
    expect(ErrUnresolved.is(new Error("plain"))).toBe(false);
  });

  test("has() checks facets and narrows data", () => {
    expect(WlError.has(err, NotFound)).toBe(true);
    expect(WlError.has(err, LoadContract)).toBe(false);
    if (WlError.has(err, HasPath)) {
      expect(err.data.path).toBe("/lib/core/circle");
    }
  });

  test("boundaries and domains", () => {
    expect(Core.is(err)).toBe(true);
    expect(Storage.is(err)).toBe(false);
    expect(WlError.inDomain(err, "core")).toBe(true);
    expect(WlError.isWlError(err)).toBe(true);
    expect(WlError.isWlError(new Error("x"))).toBe(false);
  });
});

// ============================================================================
// Wrapping and serialization
// ============================================================================

describe("wrapping", () => {
  test("WlError.wrap converts plain errors and passes WlErrors through", () => {
    const plain = WlError.wrap(new TypeError("bad"));
    expect(plain.code).toBe("unknown");
    expect(plain.message).toBe("bad");
    expect(plain.name).toBe("TypeError");

    const original = ErrFlaky.create({ attempt: 1 });
    expect(WlError.wrap(original)).toBe(original);
    expect(WlError.wrap("text").message).toBe("text");
  });

  test("wrapAsync rewraps a rejection with the original as cause", async () => {
    const failing = ErrEntityMissing.wrapAsync({ ref: "r" }, async () => {
      throw new Error("disk gone");
    });
    const err = await failing.catch((e: unknown) => e);
    expect(ErrEntityMissing.is(err)).toBe(true);
    if (ErrEntityMissing.is(err)) {
      expect(err.cause?.message).toBe("disk gone");
    }
  });

  test("wrapAsync passes values through", async () => {
    await expect(ErrEntityMissing.wrapAsync({ ref: "r" }, async () => 42)).resolves.toBe(42);
  });
});

describe("toJSON / prettyPrint", () => {
  const cause = ErrFlaky.create({ attempt: 3 });
  const err = ErrEntityMissing.create({ ref: "a" }, undefined, cause);

  test("toJSON includes the cause chain", () => {
    const json = err.toJSON();
    expect(json.code).toBe("storage.entity_missing");
    expect(json.data).toEqual({ ref: "a" });
    expect(json.facets).toEqual(["NotFound", "HasRef"]);
    expect(json.cause?.code).toBe("storage.flaky");
    expect(json.cause?.data).toEqual({ attempt: 3 });
  });

  test("prettyPrint without colour", () => {
    expect(err.prettyPrint()).toBe(
      [
        "WlError: storage.entity_missing: Entity not found: a",
        '  ├ data: {"ref":"a"}',
        "  └ caused by: storage.flaky: Attempt 3 failed",
        '    └ data: {"attempt":3}',
      ].join("\n"),
    );
  });
});
