/**
 * Standard facets and domain-owned error definitions for the core boundary.
 *
 * Facets are reusable markers/data traits composed into any ErrorDef.
 * Every error here is owned by the Core boundary.
 */

import {ErrFacet, WlError} from "../wl-error.js";

// ============================================================================
// Core Boundary
// ============================================================================

export const Core = WlError.boundary("core");

// ============================================================================
// Standard Facets
// ============================================================================

/** Something expected was not found */
export const NotFound = ErrFacet.marker("NotFound");

/** Caller provided invalid input */
export const BadInput = ErrFacet.marker("BadInput");

export const NotSupported = ErrFacet.marker("NotSupported");

/** Internal invariant violated, always a bug */
export const InvariantViolated = ErrFacet.marker("InvariantViolated");

/** A code file broke the one-capability-per-file contract */
export const LoadContract = ErrFacet.marker("LoadContract");

/** Carries the filesystem path involved */
export const HasPath = ErrFacet.data<{ path: string }>("HasPath");

export const HasPlugin = ErrFacet.data<{ plugin: string }>("HasPlugin");

export const HasService = ErrFacet.data<{ service: string }>("HasService");

/** Carries the qualified name of a hook trigger */
export const HasTrigger = ErrFacet.data<{ trigger: string }>("HasTrigger");

// ============================================================================
// Resolution
// ============================================================================

/** No namespace, plugin, code file or data file answers to the name */
export const ErrUnresolved = Core.define("unresolved", {
  customProps: ErrFacet.props<{ name: string }>(),
  facets: [NotFound, HasPath],
  message: (d) => `Cannot resolve '${d.name}' at ${d.path}`,
});

export const ErrNoLoader = Core.define("no_loader", {
  customProps: ErrFacet.props<{ ext: string }>(),
  facets: [NotSupported, HasPath],
  message: (d) => `No loader for '.${d.ext}' files: ${d.path}`,
});

// ============================================================================
// Load contract
// ============================================================================

export const ErrDefinitionMissing = Core.define("definition_missing", {
  customProps: ErrFacet.props<{ expected: string }>(),
  facets: [LoadContract, HasPath],
  message: (d) => `${d.path} does not export '${d.expected}'`,
});

export const ErrNotACapability = Core.define("not_a_capability", {
  customProps: ErrFacet.props<{ expected: string }>(),
  facets: [LoadContract, HasPath],
  message: (d) => `'${d.expected}' in ${d.path} does not extend Module`,
});

export const ErrAmbiguousDefinition = Core.define("ambiguous_definition", {
  customProps: ErrFacet.props<{ expected: string; others: string[] }>(),
  facets: [LoadContract, HasPath],
  message: (d) => `${d.path} exports more than one capability: ${[d.expected, ...d.others].join(", ")}`,
});

// ============================================================================
// Plugins, hooks, services
// ============================================================================

/** Reported through diagnostics; resolution moves on to the next plugin */
export const ErrPluginFailed = Core.define("plugin_failed", {
  customProps: ErrFacet.props<{ stage: "match" | "load" }>(),
  facets: [HasPlugin, HasPath],
  message: (d) => `Plugin \`${d.plugin}\` raised during ${d.stage}`,
});

export const ErrPluginAlreadyRegistered = Core.define("plugin_already_registered", {
  facets: [BadInput, HasPlugin],
  message: (d) => `A plugin named '${d.plugin}' is already registered`,
});

/** Reported through diagnostics; remaining callbacks still run */
export const ErrHookCallbackFailed = Core.define("hook_callback_failed", {
  customProps: ErrFacet.props<{ callback: string }>(),
  facets: [HasTrigger],
  message: (d) => `Hook ${d.callback} failed while firing ${d.trigger}`,
});

export const ErrServiceInitFailed = Core.define("service_init_failed", {
  facets: [HasService],
  message: (d) => `Service ${d.service} failed to initialize`,
});

// ============================================================================
// Configuration and misuse
// ============================================================================

export const ErrLibraryAlreadyConstructed = Core.define("library_already_constructed", {
  customProps: ErrFacet.props<{ library: string }>(),
  facets: [InvariantViolated],
  message: (d) => `${d.library} is already constructed; use ${d.library}.open()`,
});

export const ErrConfKeyNotFound = Core.define("conf_key_not_found", {
  customProps: ErrFacet.props<{ key: string }>(),
  facets: [NotFound],
  message: (d) => `Configuration key '${d.key}' is neither set nor present in the environment`,
});

export const ErrNotCallable = Core.define("not_callable", {
  customProps: ErrFacet.props<{ member: string }>(),
  facets: [BadInput],
  message: (d) => `'${d.member}' is not a callable member`,
});

export const ErrNoLibraryExported = Core.define("no_library_exported", {
  facets: [NotFound, HasPath],
  message: (d) => `${d.path} exports no Library`,
});

/** A capability was used before any library stamped it */
export const ErrDetachedCapability = Core.define("detached_capability", {
  customProps: ErrFacet.props<{ className: string }>(),
  facets: [InvariantViolated],
  message: (d) => `${d.className} is not attached to a library`,
});
