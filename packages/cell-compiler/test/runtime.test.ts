import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CellCompiler } from "../mod.ts";
import { CellLoader } from "../runtime/loader.ts";
import { UnsafeEvalIsolate } from "../runtime/isolate.ts";
import {
  isSourceMap,
  parseSourceMap,
  SourceMapParser,
} from "../runtime/source-map.ts";
import {
  bodyPositionMapper,
  synthesizeWrapper,
} from "../typescript/wrapper.ts";

describe("source maps", () => {
  let compiler: CellCompiler;

  beforeEach(() => {
    compiler = new CellCompiler();
  });

  afterEach(() => {
    compiler.dispose();
  });

  it("maps stack frames of compiled cells back to the cell source", async () => {
    const cell = compiler.build(
      "Thrower",
      'const a = 1;\nthrow new Error("boom");',
    );
    const { script } = await compiler.compile(cell);
    const lines = script.js.split("\n");
    const index = lines.findIndex((line) => line.includes("throw new Error"));
    const column = lines[index].indexOf("throw") + 1;
    const filename = script.filename ?? "";
    const parser = new SourceMapParser();
    if (!script.sourceMap) {
      throw new Error("missing source map");
    }
    parser.load(
      filename,
      script.sourceMap,
      bodyPositionMapper(synthesizeWrapper(cell, compiler.notebookPackage)),
    );

    const stack = parser.parse(
      `Error: boom\n    at eval (${filename}:${index + 1}:${column})`,
    );

    expect(filename).toBe("Thrower$1.js");
    expect(stack).toBe("Error: boom\n    at eval (Thrower:2:1)");

    parser.unload(filename);
    const frame = `    at eval (${filename}:${index + 1}:${column})`;
    expect(parser.parse(frame)).toBe(frame);
  });

  it("leaves frames of other scripts untouched", () => {
    const parser = new SourceMapParser();
    const stack = "Error: boom\n    at run (other.js:3:4)";

    expect(parser.parse(stack)).toBe(stack);
  });

  it("keeps wrapper positions for synthesized code", async () => {
    const cell = compiler.build("Plain", "const a = 1;");
    const { script } = await compiler.compile(cell);
    const filename = script.filename ?? "";
    const parser = new SourceMapParser();
    if (!script.sourceMap) {
      throw new Error("missing source map");
    }
    parser.load(filename, script.sourceMap, () => undefined);
    const lines = script.js.split("\n");
    const index = lines.findIndex((line) => line.startsWith("const a"));

    const stack = parser.parse(`    at eval (${filename}:${index + 1}:1)`);

    expect(stack).toBe("    at eval (Plain$1.ts:2:0)");
  });

  it("parses TypeScript source maps", () => {
    const map = parseSourceMap(
      '{"version":3,"file":"a.js","sources":["a.ts"],"names":[],"mappings":"AAAA"}',
    );

    expect(map.version).toBe("3");
    expect(map.sources).toEqual(["a.ts"]);
    expect(isSourceMap(map)).toBe(true);
  });

  it("rejects values that are not source maps", () => {
    expect(() => parseSourceMap('{"version":3}')).toThrow(
      "Could not parse source map",
    );
    expect(isSourceMap({ version: 3 })).toBe(false);
  });
});

describe("CellLoader", () => {
  it("defines factories taking exports, require and parameters", () => {
    const loader = new CellLoader({});
    const factory = loader.define(
      { js: "exports.sum = a + b;", filename: "Sum.js" },
      ["a", "b"],
    );
    const exports: Record<string, unknown> = {};

    factory.invoke(exports, () => undefined, 2, 3);

    expect(exports).toEqual({ sum: 5 });
  });

  it("strips source mapping comments", () => {
    const loader = new CellLoader({});
    const factory = loader.define(
      {
        js: "exports.one = 1;\n//# sourceMappingURL=One.js.map",
        filename: "One.js",
      },
      [],
    );
    const exports: Record<string, unknown> = {};

    factory.invoke(exports, () => undefined);

    expect(exports).toEqual({ one: 1 });
  });

  it("loads runtime modules lazily and once", () => {
    const load = vi.fn(() => ({ answer: 42 }));
    const loader = new CellLoader({ answers: { types: "", load } });

    expect(load).not.toHaveBeenCalled();
    const first = loader.require("answers");
    const second = loader.require("answers");

    expect(first).toEqual({ answer: 42 });
    expect(second).toBe(first);
    expect(load).toHaveBeenCalledTimes(1);
  });

  it("reloads runtime modules after clear", () => {
    const load = vi.fn(() => ({}));
    const loader = new CellLoader({ fresh: { types: "", load } });

    loader.require("fresh");
    loader.clear();
    loader.require("fresh");

    expect(load).toHaveBeenCalledTimes(2);
  });

  it("fails on unknown modules", () => {
    const loader = new CellLoader({});

    expect(() => loader.require("unknown")).toThrow(
      "Cannot find module 'unknown'",
    );
  });
});

describe("UnsafeEvalIsolate", () => {
  it("evaluates scripts to functions it can invoke", () => {
    const isolate = new UnsafeEvalIsolate();
    const out: number[] = [];

    const push = isolate.execute("(function (out, x) { out.push(x * 2); })");
    push.invoke(out, 21);

    expect(out).toEqual([42]);
  });

  it("refuses to invoke values that are not functions", () => {
    const isolate = new UnsafeEvalIsolate();
    const value = isolate.execute("({ a: 1 })");

    expect(() => value.invoke()).toThrow("Cannot invoke non function");
  });
});
