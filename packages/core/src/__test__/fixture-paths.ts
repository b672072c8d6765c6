import { fileURLToPath } from "node:url"
import * as path from "node:path"

/** Library root with a `core/` tree used across the resolution tests */
export const FIXTURE_ROOT = fileURLToPath(new URL("./fixtures/root", import.meta.url))

export const FIXTURE_CORE = path.join(FIXTURE_ROOT, "core")
