import type { RawSourceMap } from "source-map-js";

/**
 * A value a cell receives from outside the cell chain, declared with the
 * TypeScript type it is checked against.
 */
export interface CellInput {
  readonly name: string;
  // A type expression, e.g. `number` or `Map<string, Point>`.
  readonly type: string;
  // Implicit inputs are candidates for `implicitly<T>()`.
  readonly implicit?: boolean;
}

/**
 * The resolved type of a public top-level value of a cell, for display.
 */
export interface OutputDeclaration {
  readonly name: string;
  readonly type: string;
  // Offset of the declared name within the cell source.
  readonly start: number;
  // 1-based
  readonly line: number;
  readonly column: number;
}

/**
 * Type declarations and value of a module cells may import by name.
 */
export interface RuntimeModule {
  // `.d.ts` text describing the module's exports.
  readonly types: string;
  // Produces the module's exports. Called at most once per compiler.
  readonly load: () => unknown;
}

// A ready-to-execute string of JavaScript, with optional metadata.
export interface JsScript {
  js: string;
  sourceMap?: SourceMap;
  filename?: string;
}

export interface SourceMap extends RawSourceMap {}

/**
 * An implicit value found by `resolveImplicits`.
 */
export interface ImplicitValue {
  readonly value: unknown;
}
