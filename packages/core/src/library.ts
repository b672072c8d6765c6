/**
 * Library - the root of a lazily resolved capability tree.
 *
 * A library maps dotted public names onto a directory (its core path):
 * directories become namespaces, code files become capability classes (or
 * their singleton instance, for services), data files become parsed values.
 * Nothing is read until it is asked for, and everything read is cached for
 * the life of the library.
 *
 * ```typescript
 * const shop = Library.define("shop", { root: import.meta.url })
 * const Cart = await shop.resolve("shop.checkout.Cart")
 * const rates = await shop.$.pricing.rates
 * ```
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {fileURLToPath} from "node:url";
import {CodeLoader} from "./code-loader.js";
import type {CodeUnit} from "./code-loader.js";
import {Conf} from "./conf.js";
import {ConsoleDiagnostics} from "./diagnostics.js";
import type {Diagnostics} from "./diagnostics.js";
import {DataLoader} from "./data-loader.js";
import {ErrLibraryAlreadyConstructed, ErrNoLibraryExported, ErrNoLoader, ErrUnresolved} from "./errors/errors.js";
import {File} from "./file.js";
import {Fmt} from "./fmt.js";
import {HookRegistry} from "./hooks.js";
import {Inspect} from "./inspect.js";
import {Lazy, makeLazyPath} from "./lazy.js";
import type {LazyPath} from "./lazy.js";
import {intercept, Module} from "./module.js";
import type {ClassOf} from "./type-system-utils.js";
import {isRecord} from "./type-system-utils.js";
import {KeyedMutex} from "./mutex.js";
import {Namespace} from "./namespace.js";
import {PathCodec} from "./path-codec.js";
import {PluginRegistry} from "./plugin.js";
import type {Plugin, PluginClass} from "./plugin.js";
import {isServiceClass, ServiceRegistry} from "./service.js";
import {Timer} from "./timer.js";

export interface LibraryOptions {
  /** Library directory, or a file inside it (path or `file:` URL). Defaults to the working directory. */
  readonly root?: string | URL
  /** Directory under root that is resolved. Defaults to "core". */
  readonly coreDir?: string
  /** Defaults to the lower-cased class name */
  readonly name?: string
  /** Defaults to WL_VERBOSE ("1" or "true") */
  readonly verbose?: boolean
  readonly diagnostics?: Diagnostics
  /** Defaults to colour when stdout is a terminal and NO_COLOR is unset */
  readonly color?: boolean
  /** `.env` file seeding `conf`. Defaults to `<root>/.env`; `false` skips it. */
  readonly envFile?: string | false
}

/** One instance per concrete library class */
const instances = new Map<Function, Library>()

function rootDirectory(root: string | URL | undefined): string {
  if (root === undefined) return process.cwd()
  const rootPath = root instanceof URL || root.startsWith("file:") ? fileURLToPath(root) : path.resolve(root)
  const stat = fs.statSync(rootPath, { throwIfNoEntry: false })
  return stat && !stat.isDirectory() ? path.dirname(rootPath) : rootPath
}

function existingFile(stem: string, extensions: readonly string[]): string | undefined {
  for (const ext of extensions) {
    const candidate = `${stem}.${ext}`
    if (fs.statSync(candidate, { throwIfNoEntry: false })?.isFile()) return candidate
  }
  return undefined
}

function isDirectory(dirPath: string): boolean {
  return fs.statSync(dirPath, { throwIfNoEntry: false })?.isDirectory() ?? false
}

function isLibraryClass(value: unknown): value is typeof Library {
  return typeof value === "function" && (value === Library || value.prototype instanceof Library)
}

export class Library {
  readonly libraryName: string
  readonly rootPath: string
  readonly corePath: string
  readonly verbose: boolean
  readonly fmt: Fmt
  readonly diagnostics: Diagnostics
  readonly conf: Conf
  readonly timer: Timer
  readonly hooks: HookRegistry
  readonly plugins: PluginRegistry
  readonly services = new ServiceRegistry()

  readonly #namespaces = new Map<string, Namespace>()
  readonly #classes = new Map<string, ClassOf<Module>>()
  readonly #data = new Map<string, unknown>()
  readonly #packages = new Map<string, CodeUnit>()
  /** Serializes loading per absolute path; unrelated paths load concurrently */
  readonly #loading = new KeyedMutex<string>()
  readonly #lazyRoot = Lazy.once(() => makeLazyPath((segments) => this.walk(this.core, segments)))

  static {
    Inspect(this, (self) => ({ format: '<Library %s root="%s">', params: [self.libraryName, self.rootPath] }))
  }

  constructor(options: LibraryOptions = {}) {
    const type = new.target
    if (instances.has(type)) throw ErrLibraryAlreadyConstructed.create({ library: type.name })

    this.libraryName = options.name ?? type.name.toLowerCase()
    this.rootPath = rootDirectory(options.root)
    this.corePath = path.join(this.rootPath, options.coreDir ?? "core")

    const envFile = options.envFile ?? path.join(this.rootPath, ".env")
    this.conf = envFile === false ? new Conf() : Conf.fromEnvFile(envFile)
    this.verbose = options.verbose ?? ["1", "true"].includes(this.conf.getOr("WL_VERBOSE", "").toLowerCase())

    const color = options.color ?? Fmt.detectColor()
    this.fmt = Fmt.from(color)
    this.diagnostics = options.diagnostics ?? new ConsoleDiagnostics(color)
    this.hooks = new HookRegistry(this.diagnostics)
    this.plugins = new PluginRegistry(this.diagnostics)
    this.timer = new Timer({ sink: (line) => this.diagnostics.info(line) })

    if (this.verbose) this.#banner()
    // published only once fully built
    instances.set(type, this)
  }

  /** The existing instance of this library class, or a new one built from `options` */
  static open<L extends Library>(this: new (options?: LibraryOptions) => L, options?: LibraryOptions): L {
    const existing = instances.get(this)
    if (existing instanceof this) return existing
    return new this(options)
  }

  /** Create a fresh library class called `name` and its instance */
  static define(name: string, options: LibraryOptions = {}): Library {
    const Defined = class extends Library {}
    Object.defineProperty(Defined, "name", { value: name })
    return new Defined({ ...options, name: options.name ?? name })
  }

  /**
   * Import a library definition file. The first exported Library instance is
   * returned; failing that, the first exported Library class is opened with
   * the file's directory as root.
   */
  static async importFrom(file: string | URL): Promise<Library> {
    const filePath = file instanceof URL || file.startsWith("file:") ? fileURLToPath(file) : path.resolve(file)
    const unit = await CodeLoader.import(filePath)
    const values = Object.values(unit)
    const instance = values.find((value) => value instanceof Library)
    if (instance instanceof Library) return instance
    const type = values.find(isLibraryClass)
    if (type) return type.open({ root: path.dirname(filePath) })
    throw ErrNoLibraryExported.create({ path: filePath })
  }

  /** The core directory as a namespace */
  get core(): Namespace {
    return this.namespace(this.corePath)
  }

  /** `await lib.$.shapes.Circle` */
  get $(): LazyPath {
    return this.#lazyRoot.get
  }

  addPlugin(plugin: Plugin | PluginClass, name?: string): Plugin {
    return this.plugins.register(plugin, name)
  }

  /** Resolve a top-level name under the core directory */
  get(name: string): Promise<unknown> {
    return this.resolveIn(name, this.corePath)
  }

  /**
   * Resolve a dotted path such as `shop.checkout.Cart` or `checkout.Cart`.
   * Segments after a data file index into the parsed value.
   */
  resolve(dotted: string): Promise<unknown> {
    const segments = dotted.split(".").filter((s) => s.length > 0)
    if (segments[0] === this.libraryName) segments.shift()
    return this.walk(this.core, segments)
  }

  /** Follow `segments` from `start` through namespaces and plain records */
  async walk(start: unknown, segments: readonly string[]): Promise<unknown> {
    let current = start
    const visited: string[] = [this.libraryName]
    for (const segment of segments) {
      if (current instanceof Namespace) {
        current = await current.get(segment)
      } else if (isRecord(current) && Object.hasOwn(current, segment)) {
        current = current[segment]
      } else {
        throw ErrUnresolved.create({ name: segment, path: visited.join(".") })
      }
      visited.push(segment)
    }
    return current
  }

  /**
   * Resolve one name inside `basePath`: a directory, then plugins, then a
   * code file, then a data file, then a text file.
   */
  async resolveIn(name: string, basePath: string): Promise<unknown> {
    const candidate = path.join(path.resolve(basePath), PathCodec.toFsName(name))

    const cached = this.#namespaces.get(candidate)
    if (cached) return cached
    if (isDirectory(candidate)) return this.namespace(candidate)

    const hit = await this.plugins.tryLoad(candidate, this)
    if (hit) return hit.value

    const codeFile = existingFile(candidate, CodeLoader.extensions)
    if (codeFile) return this.loadCapability(codeFile)

    const dataFile = existingFile(candidate, DataLoader.extensions)
    if (dataFile) return this.loadData(dataFile)

    const textFile = existingFile(candidate, DataLoader.textExtensions)
    if (textFile) return this.loadText(textFile)

    throw ErrUnresolved.create({ name, path: candidate })
  }

  /** The cached handle for a directory; the first one built wins */
  namespace(dirPath: string): Namespace {
    const absPath = path.resolve(dirPath)
    let ns = this.#namespaces.get(absPath)
    if (!ns) {
      ns = new Namespace(this, absPath)
      this.#namespaces.set(absPath, ns)
    }
    return ns
  }

  /** Load a file by plugin or by extension */
  async loadFile(file: File): Promise<unknown> {
    const hit = await this.plugins.tryLoad(file.path, this)
    if (hit) return hit.value
    if (CodeLoader.isCodeExtension(file.ext)) return this.loadCapability(file.path)
    if (DataLoader.isDataExtension(file.ext)) return this.loadData(file.path)
    if (DataLoader.isTextExtension(file.ext)) return this.loadText(file.path)
    throw ErrNoLoader.create({ path: file.path, ext: file.ext ?? "" })
  }

  /** The capability class a code file defines, or its singleton instance for a service */
  async loadCapability(filePath: string): Promise<unknown> {
    const cls = await this.#loadClass(path.resolve(filePath))
    return isServiceClass(cls) ? this.services.getOrCreate(cls) : cls
  }

  async loadData(filePath: string): Promise<unknown> {
    const absPath = path.resolve(filePath)
    if (this.#data.has(absPath)) return this.#data.get(absPath)
    return this.#loading.runExclusive(absPath, async () => {
      if (this.#data.has(absPath)) return this.#data.get(absPath)
      const value = await DataLoader.parse(absPath, path.extname(absPath).slice(1).toLowerCase())
      this.#data.set(absPath, value)
      return value
    })
  }

  /** Text is read on every call */
  loadText(filePath: string): Promise<string> {
    return DataLoader.readText(filePath)
  }

  /** Exports of the directory's `index.<ext>` file, if it has one */
  async packageEntry(dirPath: string): Promise<CodeUnit | undefined> {
    const entryPath = existingFile(path.join(path.resolve(dirPath), "index"), CodeLoader.extensions)
    if (!entryPath) return undefined
    const cached = this.#packages.get(entryPath)
    if (cached) return cached
    const unit = await CodeLoader.import(entryPath)
    this.#packages.set(entryPath, unit)
    return unit
  }

  /** `core/shapes/word_counter.ts` -> `<library>.shapes.WordCounter` */
  canonicalName(filePath: string): string {
    const relative = path.relative(this.corePath, path.resolve(filePath))
    const parts = relative.split(path.sep)
    const leaf = parts.pop() ?? ""
    const stem = leaf.slice(0, leaf.length - path.extname(leaf).length)
    return [this.libraryName, ...parts, PathCodec.toPublicName(stem)].join(".")
  }

  async #loadClass(absPath: string): Promise<ClassOf<Module>> {
    const cached = this.#classes.get(absPath)
    if (cached) return cached
    return this.#loading.runExclusive(absPath, async () => {
      const loaded = this.#classes.get(absPath)
      if (loaded) return loaded

      this.timer.start(absPath)
      const unit = await CodeLoader.import(absPath)
      const expected = PathCodec.toPublicName(path.basename(absPath, path.extname(absPath)))
      const definition = CodeLoader.extractDefinition(unit, expected, absPath)
      Module.stamp(definition, this, this.canonicalName(absPath))
      const wrapped = intercept(definition)
      this.#classes.set(absPath, wrapped)
      this.timer.stop(absPath, { report: this.verbose })
      return wrapped
    })
  }

  #banner(): void {
    const info = (line: string) => this.diagnostics.info(line)
    info(`\nInitialized library ${this.fmt.bold(this.libraryName)}`)
    info("-".repeat(70))
    info(`– ${`Main \`${this.libraryName}\` directory`.padEnd(27)} : \`${this.rootPath}\``)
    info(`– Import files expected under : \`${this.corePath}\``)
  }
}
