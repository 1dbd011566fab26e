import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CellCompiler, importedNames, Imports } from "../mod.ts";

const MATHLIB = {
  types: [
    "export declare function sum(a: number, b: number): number;",
    "export declare const e: number;",
  ].join("\n"),
  load: () => ({ sum: (a: number, b: number) => a + b, e: 3 }),
};

describe("CellCompiler.splitImports", () => {
  let compiler: CellCompiler;

  beforeEach(() => {
    compiler = new CellCompiler({ runtimeModules: { mathlib: MATHLIB } });
  });

  afterEach(() => {
    compiler.dispose();
  });

  async function setup() {
    const shapes = compiler.build(
      "Shapes",
      "namespace Shapes { export const pi = 3; }",
    );
    const importing = compiler.build(
      "I",
      [
        'import { sum } from "mathlib";',
        "import pi = Shapes.pi;",
        'import * as math from "mathlib";',
        "const v = sum(pi, math.e);",
      ].join("\n"),
      [shapes],
    );
    const shapesInstance = (await compiler.compile(shapes)).instantiate();
    return { shapes, shapesInstance, importing };
  }

  it("separates imports of the cell chain from external ones", async () => {
    const { importing } = await setup();

    const imports = await compiler.splitImports(importing);

    expect(imports.local.flatMap(importedNames)).toEqual(["pi"]);
    expect(imports.external.flatMap(importedNames)).toEqual(["sum", "math"]);
    expect(imports.size).toBe(3);
  });

  it("returns the cell's own import statements", async () => {
    const { importing } = await setup();

    const imports = await compiler.splitImports(importing);

    expect(imports.external[0]).toBe(importing.imports[0]);
    expect(imports.local[0]).toBe(importing.imports[1]);
    expect(imports.external[1]).toBe(importing.imports[2]);
  });

  it("leaves the cell compilable", async () => {
    const { importing, shapesInstance } = await setup();
    await compiler.splitImports(importing);

    const instance = (await compiler.compile(importing)).instantiate([
      shapesInstance,
    ]);

    expect(compiler.phaseOf(importing)).toBe("compiled");
    expect(instance.field("v")).toEqual({ value: 6 });
  });

  it("splits the imports of a compiled cell", async () => {
    const { importing } = await setup();
    await compiler.compile(importing);

    const imports = await compiler.splitImports(importing);

    expect(imports.local).toHaveLength(1);
    expect(imports.external).toHaveLength(2);
  });

  it("passes split imports on to later cells", async () => {
    const { shapes, shapesInstance, importing } = await setup();
    const imports = await compiler.splitImports(importing);
    const importingInstance = (await compiler.compile(importing)).instantiate([
      shapesInstance,
    ]);

    const later = compiler.build(
      "T",
      "const w = sum(pi, 1);",
      [shapes, importing],
      [],
      imports,
    );
    const instance = (await compiler.compile(later)).instantiate([
      shapesInstance,
      importingInstance,
    ]);

    expect(instance.field("w")).toEqual({ value: 4 });
  });

  it("returns nothing for a cell without imports", async () => {
    const cell = compiler.build("N", "const n = 1;");

    const imports = await compiler.splitImports(cell);

    expect(imports.local).toHaveLength(0);
    expect(imports.external).toHaveLength(0);
  });
});

describe("Imports", () => {
  it("concatenates local and external imports separately", () => {
    const compiler = new CellCompiler();
    const cell = compiler.build(
      "I",
      'import { a } from "x";\nimport { b } from "y";\nimport c = require("z");',
    );
    const [a, b, c] = cell.imports;

    const joined = new Imports([a], [b]).concat(new Imports([c], []));

    expect(joined.local).toEqual([a, c]);
    expect(joined.external).toEqual([b]);
    expect(joined.size).toBe(3);
    expect(Imports.empty.size).toBe(0);
    compiler.dispose();
  });

  it("lists the names an import binds", () => {
    const compiler = new CellCompiler();
    const cell = compiler.build(
      "I",
      [
        'import d, { a, b as c } from "x";',
        'import * as ns from "y";',
        'import "z";',
        'import eq = require("w");',
      ].join("\n"),
    );

    expect(cell.imports.map(importedNames)).toEqual([
      ["d", "a", "c"],
      ["ns"],
      [],
      ["eq"],
    ]);
    expect(cell.importedNames).toEqual(["d", "a", "c", "ns", "eq"]);
    compiler.dispose();
  });
});
