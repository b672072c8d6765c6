import {afterEach, describe, expect, test} from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {Conf} from "../conf.js";
import {ErrConfKeyNotFound} from "../errors/errors.js";
import {FIXTURE_ROOT} from "./fixture-paths.js";

const ENV_KEY = "WL_CONF_TEST_KEY"

afterEach(() => {
  delete process.env[ENV_KEY]
})

describe("Conf", () => {
  test("overlay wins over the environment", () => {
    process.env[ENV_KEY] = "from-env"
    const conf = new Conf()
    expect(conf.get(ENV_KEY)).toBe("from-env")
    conf.set(ENV_KEY, "from-overlay")
    expect(conf.get(ENV_KEY)).toBe("from-overlay")
    expect(conf.delete(ENV_KEY)).toBe(true)
    expect(conf.get(ENV_KEY)).toBe("from-env")
  })

  test("missing keys throw, getOr falls back", () => {
    const conf = new Conf()
    expect(() => conf.get(ENV_KEY)).toThrow(`Configuration key '${ENV_KEY}' is neither set nor present in the environment`)
    try {
      conf.get(ENV_KEY)
    } catch (err) {
      expect(ErrConfKeyNotFound.is(err)).toBe(true)
    }
    expect(conf.getOr(ENV_KEY, "fallback")).toBe("fallback")
    expect(conf.has(ENV_KEY)).toBe(false)
  })

  test("listing covers the overlay only", () => {
    const conf = new Conf({ zeta: "1", alpha: "2" })
    expect(conf.size).toBe(2)
    expect(conf.keys()).toEqual(["alpha", "zeta"])
    expect(conf.toObject()).toEqual({ zeta: "1", alpha: "2" })
    expect(conf.toString()).toBe(`${"alpha".padEnd(24)}: 2\n${"zeta".padEnd(24)}: 1`)
  })

  test("fromEnvFile parses dotenv syntax", () => {
    const conf = Conf.fromEnvFile(path.join(FIXTURE_ROOT, ".env"))
    expect(conf.get("GREETING")).toBe("hello-from-env-file")
    expect(conf.get("WL_VERBOSE")).toBe("0")
  })

  test("fromEnvFile with no file is empty", () => {
    const missing = path.join(os.tmpdir(), "wl-conf-test-missing", ".env")
    expect(fs.existsSync(missing)).toBe(false)
    expect(Conf.fromEnvFile(missing).size).toBe(0)
  })
})
