/**
 * WlError - Composable error system with facets and boundaries.
 *
 * Errors are composed from facets (marker traits and data traits) instead of
 * class inheritance. Three discrimination axes: exact type (code), facet, domain.
 *
 * Wrapping: ErrorDef.wrapAsync says "if this fails, the error is X",
 * keeping whatever escaped as the cause.
 */

import {StaticTypeCompanion} from "./companion.js";
import type {UnionToIntersection} from "./type-system-utils.js";
import {isRecord} from "./type-system-utils.js";
import {Inspect} from "./inspect.js";
import {Fmt} from "./fmt.js";

// ============================================================================
// Facet Types
// ============================================================================

export interface ErrMarkerFacet {
  readonly kind: "marker";
  readonly name: string;
}

export interface ErrDataFacet<TData extends Record<string, unknown> = Record<string, unknown>> {
  readonly kind: "data";
  readonly name: string;
  readonly _data?: TData; // phantom type for compile-time inference
}

export type ErrFacetAny = ErrMarkerFacet | ErrDataFacet;

/** Phantom type carrier for error-local custom props */
export interface ErrProps<T extends Record<string, unknown> = {}> {
  readonly _kind: "props";
  readonly _phantom?: T;
}

export type InferPropsData<P> = P extends ErrProps<infer T extends Record<string, unknown>> ? T : {};

// ============================================================================
// Facet Companion
// ============================================================================

export const ErrFacet = StaticTypeCompanion({
  /** Create a marker facet (no associated data) */
  marker(name: string): ErrMarkerFacet {
    return Object.freeze({ kind: "marker" as const, name });
  },

  /** Create a data facet with typed associated data */
  data<TData extends Record<string, unknown>>(name: string): ErrDataFacet<TData> {
    return Object.freeze({ kind: "data" as const, name });
  },

  /** Declare error-local custom props (phantom type only) */
  props<T extends Record<string, unknown>>(): ErrProps<T> {
    return { _kind: "props" };
  },
});

// ============================================================================
// Type Utilities
// ============================================================================

/** Extract the data type from a facet. Markers contribute {} */
export type FacetProps<F> = F extends ErrDataFacet<infer D> ? D : {};

export type MergeFacetProps<Fs extends readonly ErrFacetAny[]> = UnionToIntersection<
  FacetProps<Fs[number]>
>;

type ErrData<Fs extends readonly ErrFacetAny[]> = Readonly<Record<string, unknown>> & MergeFacetProps<Fs>

// ============================================================================
// ErrorDef / ErrorBoundary
// ============================================================================

export interface ErrorDef<
  Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[],
  D extends Record<string, unknown> = {},
> {
  readonly code: string;
  readonly domain: string;
  readonly facets: Fs;
  create(data: MergeFacetProps<Fs> & D, context?: string, cause?: WlError): WlError<Fs>;
  is(err: unknown): err is WlError<Fs> & { readonly data: MergeFacetProps<Fs> & D };

  /** Await fn; a rejection is rethrown as this error, with the original as cause */
  wrapAsync<T>(data: MergeFacetProps<Fs> & D, fn: () => PromiseLike<T>): Promise<T>;
}

export interface ErrorBoundary {
  readonly domain: string;
  /** Define an error within this boundary. Code is prefixed with the domain. */
  define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
    code: string,
    opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
  ): ErrorDef<Fs, InferPropsData<P>>;
  /** Check if an error belongs to this boundary's domain */
  is(err: unknown): err is WlError;
}

// ============================================================================
// WlError Interface
// ============================================================================

export interface WlError<Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[]> extends Error {
  readonly code: string;
  readonly domain: string;
  readonly context?: string;
  readonly data: ErrData<Fs>;
  readonly facetNames: ReadonlySet<string>;
  readonly cause?: WlError;
  toJSON(): WlErrorJSON;
  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string;
}

export interface WlErrorJSON {
  code: string;
  domain: string;
  message: string;
  context?: string;
  data: Record<string, unknown>;
  facets: string[];
  stack?: string;
  cause?: WlErrorJSON;
}

// ============================================================================
// Helpers
// ============================================================================

/** Extract stack frames, stripping the error message line and the internal create() frame */
function stackFrames(stack: string | undefined): string {
  if (!stack) return "";
  const first = stack.indexOf("\n    at ");
  if (first === -1) return "";
  const secondFrame = stack.indexOf("\n    at ", first + 1);
  if (secondFrame !== -1 && stack.slice(first, secondFrame).includes("at create (")) {
    return stack.slice(secondFrame + 1);
  }
  return stack.slice(first + 1);
}

/** Convert any thrown value to a WlError, preserving stack */
function asWlError(thrown: unknown): WlError {
  if (thrown instanceof WlErrorImpl) return thrown;
  const message = thrown instanceof Error ? thrown.message : String(thrown);
  const wrapped = new WlErrorImpl<readonly []>("unknown", "unknown", message, NO_FACETS, {});
  if (thrown instanceof Error) {
    wrapped.name = thrown.name;
    if (thrown.stack) wrapped.stack = thrown.stack;
  }
  return wrapped;
}

const NO_FACETS: ReadonlySet<string> = Object.freeze(new Set<string>());

// ============================================================================
// WlError Implementation (internal)
// ============================================================================

class WlErrorImpl<Fs extends readonly ErrFacetAny[]> extends Error implements WlError<Fs> {
  readonly code: string;
  readonly domain: string;
  readonly context?: string;
  readonly data: ErrData<Fs>;
  readonly facetNames: ReadonlySet<string>;
  override cause?: WlError;

  static {
    Inspect(this, (self, opts) => ({
      format: self.prettyPrint({ color: opts.colors, includeStackTrace: true }),
      params: [],
    }));
  }

  constructor(
    code: string,
    domain: string,
    message: string,
    facetNames: ReadonlySet<string>,
    data: ErrData<Fs>,
    context?: string,
    cause?: WlError,
  ) {
    super(context ? `${message} (${context})` : message);
    this.name = `WlError[${code}]`;
    this.code = code;
    this.domain = domain;
    this.context = context;
    this.data = { ...data };
    this.facetNames = facetNames;
    if (cause) this.cause = cause;
  }

  toJSON(): WlErrorJSON {
    const json: WlErrorJSON = {
      code: this.code,
      domain: this.domain,
      message: this.message,
      data: dataRecord(this),
      facets: [...this.facetNames],
      stack: this.stack,
    };
    if (this.context !== undefined) json.context = this.context;
    if (this.cause) json.cause = this.cause.toJSON();
    return json;
  }

  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string {
    const fmt = Fmt.from(opts?.color ?? false);
    const lines: string[] = [`WlError: ${formatErrorLine(this, "", fmt, !this.cause)}`];

    let current = this.cause;
    let indent = "  ";
    while (current) {
      lines.push(`${indent}${fmt.dim("└ caused by:")} ${formatErrorLine(current, indent, fmt, !current.cause)}`);
      current = current.cause;
      indent += "  ";
    }

    if (opts?.includeStackTrace) {
      const frames = stackFrames(this.stack);
      if (frames) {
        lines.push(`  ${fmt.dim("➝ Stack trace:")}`);
        for (const frame of frames.split("\n")) {
          if (frame.trim()) lines.push(fmt.dim(frame));
        }
      }
    }

    return lines.join("\n");
  }
}

function dataRecord(err: WlError): Record<string, unknown> {
  return isRecord(err.data) ? { ...err.data } : {};
}

function formatErrorLine(err: WlError, indent: string, fmt: Fmt, isLast: boolean): string {
  const data = dataRecord(err);
  let line = `${fmt.red(err.code)}: ${err.message}`;
  if (Object.keys(data).length > 0) {
    const connectorChar = isLast ? "└" : "├";
    line += `\n${indent}  ${fmt.dim(`${connectorChar} data: ${JSON.stringify(data)}`)}`;
  }
  return line;
}

// ============================================================================
// Internal: create an ErrorDef
// ============================================================================

function defineError<const Fs extends readonly ErrFacetAny[], D extends Record<string, unknown> = {}>(
  fullCode: string,
  domain: string,
  opts: { facets: Fs; message: (data: MergeFacetProps<Fs> & D) => string },
): ErrorDef<Fs, D> {
  const facetNames: ReadonlySet<string> = Object.freeze(new Set(opts.facets.map((f) => f.name)));

  function create(data: MergeFacetProps<Fs> & D, context?: string, cause?: WlError): WlError<Fs> {
    const err = new WlErrorImpl<Fs>(fullCode, domain, opts.message(data), facetNames, data, context, cause);
    Error.captureStackTrace(err, create);
    return err;
  }

  return Object.freeze({
    code: fullCode,
    domain,
    facets: opts.facets,
    create,

    is(err: unknown): err is WlError<Fs> & { readonly data: MergeFacetProps<Fs> & D } {
      return err instanceof WlErrorImpl && err.code === fullCode;
    },

    async wrapAsync<T>(data: MergeFacetProps<Fs> & D, fn: () => PromiseLike<T>): Promise<T> {
      try {
        return await fn();
      } catch (thrown) {
        throw create(data, undefined, asWlError(thrown));
      }
    },
  });
}

// ============================================================================
// WlError Companion
// ============================================================================

/** Static methods for WlError */
export const WlError = StaticTypeCompanion({
  /**
   * Create an error boundary for a domain.
   * Errors defined via the boundary are prefixed with the domain.
   *
   *   const Core = WlError.boundary("core");
   *   const ErrUnresolved = Core.define("unresolved", { facets: [NotFound], message: ... });
   */
  boundary(domain: string): ErrorBoundary {
    return {
      domain,

      define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
        code: string,
        opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
      ): ErrorDef<Fs, InferPropsData<P>> {
        return defineError<Fs, InferPropsData<P>>(`${domain}.${code}`, domain, opts);
      },

      is(err: unknown): err is WlError {
        return err instanceof WlErrorImpl && err.domain === domain;
      },
    };
  },

  isWlError(err: unknown): err is WlError {
    return err instanceof WlErrorImpl;
  },

  /**
   * Check if a WlError has a specific facet.
   * For DataFacet<D>, narrows err.data to include D.
   */
  has<F extends ErrFacetAny>(err: unknown, facet: F): err is WlError & { readonly data: FacetProps<F> } {
    return err instanceof WlErrorImpl && err.facetNames.has(facet.name);
  },

  inDomain(err: unknown, domain: string): boolean {
    return err instanceof WlErrorImpl && err.domain === domain;
  },

  /** Convert any value to a WlError. WlErrors are returned unchanged. */
  wrap(err: unknown): WlError {
    return asWlError(err);
  },
});
