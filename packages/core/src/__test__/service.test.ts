import { describe, test, expect } from "vitest";
import { ErrServiceInitFailed } from "../errors/errors.js";
import { Service, ServiceRegistry, isServiceClass } from "../service.js";
import { Module } from "../module.js";

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms))

class Clock extends Service {
  static inits = 0
  override async initialize(): Promise<void> {
    Clock.inits++
    await delay(5)
  }
}

class Fragile extends Service {
  static shouldFail = true
  static inits = 0
  override initialize(): void {
    Fragile.inits++
    if (Fragile.shouldFail) throw new Error("nope")
  }
}

class Plain extends Service {}

class Brittle extends Service {
  static shouldFail = true
  static inits = 0
  override initialize(): void {
    Brittle.inits++
    if (Brittle.shouldFail) throw new Error("sync failure")
  }
}

describe("ServiceRegistry", () => {
  test("concurrent first requests share one instance and one initialization", async () => {
    const registry = new ServiceRegistry()
    const before = Clock.inits
    const instances = await Promise.all(Array.from({ length: 10 }, () => registry.getOrCreate(Clock)))

    expect(Clock.inits - before).toBe(1)
    expect(new Set(instances).size).toBe(1)
    expect(instances[0]?.isReady).toBe(true)
    expect(registry.size).toBe(1)
  })

  test("later requests return the ready instance without re-initializing", async () => {
    const registry = new ServiceRegistry()
    const first = await registry.getOrCreate(Clock)
    const inits = Clock.inits
    expect(await registry.getOrCreate(Clock)).toBe(first)
    expect(Clock.inits).toBe(inits)
  })

  test("registries are independent", async () => {
    const a = await new ServiceRegistry().getOrCreate(Plain)
    const b = await new ServiceRegistry().getOrCreate(Plain)
    expect(a).not.toBe(b)
  })

  test("peek and has", async () => {
    const registry = new ServiceRegistry()
    expect(registry.has(Plain)).toBe(false)
    expect(registry.peek(Plain)).toBeUndefined()
    const plain = await registry.getOrCreate(Plain)
    expect(registry.has(Plain)).toBe(true)
    expect(registry.peek(Plain)).toBe(plain)
  })

  test("prepare runs before the instance is published", async () => {
    const registry = new ServiceRegistry()
    const seen: boolean[] = []
    await registry.getOrCreate(Plain, (instance) => {
      seen.push(registry.has(Plain), instance.isReady)
    })
    expect(seen).toEqual([false, false])
  })

  test("initialization failure is not published and the next request retries", async () => {
    const registry = new ServiceRegistry()
    Fragile.shouldFail = true
    const before = Fragile.inits

    const err = await registry.getOrCreate(Fragile).catch((e: unknown) => e)
    expect(ErrServiceInitFailed.is(err)).toBe(true)
    if (ErrServiceInitFailed.is(err)) {
      expect(err.data.service).toBe("Fragile")
      expect(err.cause?.message).toBe("nope")
    }
    expect(registry.has(Fragile)).toBe(false)
    expect(registry.peek(Fragile)).toBeUndefined()

    Fragile.shouldFail = false
    const fragile = await registry.getOrCreate(Fragile)
    expect(fragile.isReady).toBe(true)
    expect(Fragile.inits - before).toBe(2)
  })
})

describe("Service", () => {
  test("ensureInitialized runs initialize once", async () => {
    const before = Clock.inits
    const clock = new Clock()
    await Promise.all([clock.ensureInitialized(), clock.ensureInitialized()])
    await clock.ensureInitialized()
    expect(Clock.inits - before).toBe(1)
    expect(clock.isReady).toBe(true)
  })

  test("ensureInitialized retries after a synchronous failure", async () => {
    Brittle.shouldFail = true
    const brittle = new Brittle()
    const err = await brittle.ensureInitialized().catch((e: unknown) => e)
    expect(err).toBeInstanceOf(Error)
    if (err instanceof Error) expect(err.message).toBe("sync failure")
    expect(brittle.isReady).toBe(false)

    Brittle.shouldFail = false
    await brittle.ensureInitialized()
    expect(Brittle.inits).toBe(2)
    expect(brittle.isReady).toBe(true)
  })

  test("isServiceClass", () => {
    expect(isServiceClass(Clock)).toBe(true)
    expect(isServiceClass(Service)).toBe(false)
    expect(isServiceClass(class Other extends Module {})).toBe(false)
  })
})
