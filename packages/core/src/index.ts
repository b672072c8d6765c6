/**
 * @wl/core - lazily resolved, filesystem-driven capability libraries
 */

// Library root and resolution
export { Library } from "./library.js";
export type { LibraryOptions } from "./library.js";
export { CodeLoader } from "./code-loader.js";
export type { CodeUnit } from "./code-loader.js";
export { DataLoader } from "./data-loader.js";
export { PathCodec } from "./path-codec.js";

// Filesystem model
export { FsEntry } from "./fs-entry.js";
export { Namespace } from "./namespace.js";
export { File } from "./file.js";

// Capabilities
export { Module, isModuleClass, intercept } from "./module.js";
export { Service, ServiceRegistry, isServiceClass } from "./service.js";
export type { ServiceClass } from "./service.js";

// Execution identity and hooks
export { Callee } from "./callee.js";
export type { Callable } from "./callee.js";
export { HookRegistry } from "./hooks.js";
export type { HookEvent } from "./hooks.js";

// Plugins
export { PluginRegistry } from "./plugin.js";
export type { Plugin, PluginClass, PluginHit } from "./plugin.js";

// Errors (WlError is both type and value)
export { WlError, ErrFacet } from "./wl-error.js";
export type { ErrMarkerFacet, ErrDataFacet, ErrFacetAny, ErrProps, InferPropsData, FacetProps, MergeFacetProps, ErrorDef, ErrorBoundary, WlErrorJSON } from "./wl-error.js";
export * from "./errors/errors.js";

// Ambient utilities
export { ConsoleDiagnostics } from "./diagnostics.js";
export type { Diagnostics } from "./diagnostics.js";
export { Conf } from "./conf.js";
export { Timer } from "./timer.js";
export type { TimerOptions } from "./timer.js";
export { Fmt } from "./fmt.js";
export type { FmtColor, FmtStyles } from "./fmt.js";
export { Str } from "./str.js";
export type { SlugifyOptions } from "./str.js";
export { Printer, PrintFormatter } from "./printable.js";
export { Mutex, KeyedMutex } from "./mutex.js";
export { Lazy, makeLazyPath } from "./lazy.js";
export type { LazyOne, LazyPath } from "./lazy.js";
export { Inspect, inspect, formatValues } from "./inspect.js";
export { StaticTypeCompanion } from "./companion.js";
export { isRecord, isPromiseLike } from "./type-system-utils.js";
export type { ClassOf, UnionToIntersection } from "./type-system-utils.js";
