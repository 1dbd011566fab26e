import type { JsScript, SourceMap } from "../interface.ts";
import { type CellPositionMapper, SourceMapParser } from "./source-map.ts";

export class JsValue {
  private internals: IsolateInternals;
  private value: unknown;
  constructor(internals: IsolateInternals, value: unknown) {
    this.internals = internals;
    this.value = value;
  }
  invoke(...args: unknown[]): JsValue {
    const func = this.value;
    if (typeof func !== "function") {
      throw new Error("Cannot invoke non function");
    }
    const result: unknown = this.internals.exec(() => func.apply(null, args));
    return new JsValue(this.internals, result);
  }

  // Stops mapping stacks of `filename`, a script executed before.
  forget(filename: string) {
    this.internals.unloadSourceMap(filename);
  }
}

class IsolateInternals {
  private sourceMaps = new SourceMapParser();

  exec<T>(callback: () => T): T {
    try {
      return callback();
    } catch (error: unknown) {
      if (error instanceof Error && error.stack) {
        error.stack = this.sourceMaps.parse(error.stack);
      }
      throw error;
    }
  }

  loadSourceMap(
    filename: string,
    sourceMap: SourceMap,
    mapper?: CellPositionMapper,
  ) {
    this.sourceMaps.load(filename, sourceMap, mapper);
  }

  unloadSourceMap(filename: string) {
    this.sourceMaps.unload(filename);
  }
}

/**
 * Evaluates compiled cells in the host's global scope. Errors thrown from
 * evaluated code have their stacks mapped back to cell sources.
 */
export class UnsafeEvalIsolate {
  private internals = new IsolateInternals();

  execute(
    input: string | JsScript,
    mapper?: CellPositionMapper,
  ): JsValue {
    const { js, filename, sourceMap } = typeof input === "string"
      ? { js: input, filename: "NO-NAME.js", sourceMap: undefined }
      : input;

    if (filename && sourceMap) {
      this.internals.loadSourceMap(filename, sourceMap, mapper);
    }

    // Indirect, so evaluated code cannot see this module's scope.
    const evaluate = eval;
    const result: unknown = this.internals.exec(() => evaluate(js));
    return new JsValue(this.internals, result);
  }

  // Stops mapping stacks of `filename`, a script executed before.
  forget(filename: string) {
    this.internals.unloadSourceMap(filename);
  }
}
