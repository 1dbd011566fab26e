import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CellCompiler, CellStateError } from "../mod.ts";

describe("CellCompiler.prune", () => {
  let compiler: CellCompiler;

  beforeEach(() => {
    compiler = new CellCompiler();
  });

  afterEach(() => {
    compiler.dispose();
  });

  it("keeps only the prior cells the cell uses", async () => {
    const a = compiler.build("A", "const x = 1;");
    const b = compiler.build("B", "const y = 2;");
    const c = compiler.build("C", "const z = x + 1;", [a, b]);
    await compiler.compile(a);
    await compiler.compile(b);

    const pruned = await compiler.prune(c);

    expect(pruned.priorCells).toHaveLength(1);
    expect(pruned.priorCells[0]).toBe(a);
    expect(pruned.name).toBe("C");
    expect(pruned.source).toBe(c.source);
    expect(compiler.phaseOf(c)).toBe("consumed");
    expect(compiler.phaseOf(pruned)).toBe("parsed");
  });

  it("drops a prior cell nothing refers to", async () => {
    const a = compiler.build("A", "const x = 5;");
    const b = compiler.build("B", "const y = x * 2;", [a]);
    const c = compiler.build("C", "const z = 1;", [a]);
    await compiler.compile(a);

    const prunedB = await compiler.prune(b);
    const prunedC = await compiler.prune(c);

    expect(prunedB.priorCells).toHaveLength(1);
    expect(prunedB.priorCells[0]).toBe(a);
    expect(prunedC.priorCells).toEqual([]);
  });

  it("produces a cell that compiles against its remaining priors", async () => {
    const a = compiler.build("A", "const x = 1;");
    const b = compiler.build("B", "const y = 2;");
    const c = compiler.build("C", "const z = x + 1;", [a, b]);
    const instanceA = (await compiler.compile(a)).instantiate();
    await compiler.compile(b);

    const pruned = await compiler.prune(c);
    const instance = (await compiler.compile(pruned)).instantiate([instanceA]);

    expect(instance.field("z")).toEqual({ value: 2 });
  });

  it("keeps only the inputs the cell uses", async () => {
    const cell = compiler.build("C", "const z = n;", [], [
      { name: "n", type: "number" },
      { name: "m", type: "number" },
    ]);

    const pruned = await compiler.prune(cell);

    expect(pruned.inputs).toEqual([{ name: "n", type: "number" }]);
  });

  it("keeps prior cells declaring the type of a used input", async () => {
    const a = compiler.build("A", "interface Box { v: number }");
    const c = compiler.build("C", "const v = box.v;", [a], [
      { name: "box", type: "Box" },
    ]);
    await compiler.compile(a);

    const pruned = await compiler.prune(c);

    expect(pruned.priorCells).toHaveLength(1);
    expect(pruned.priorCells[0]).toBe(a);
    expect(pruned.inputs).toEqual([{ name: "box", type: "Box" }]);
  });

  it("drops an unused input together with the prior cell typing it", async () => {
    const a = compiler.build("A", "interface Box { v: number }");
    const c = compiler.build("C", "const v = 1;", [a], [
      { name: "box", type: "Box" },
    ]);
    await compiler.compile(a);

    const pruned = await compiler.prune(c);

    expect(pruned.priorCells).toEqual([]);
    expect(pruned.inputs).toEqual([]);
  });

  it("keeps prior cells used only in types", async () => {
    const a = compiler.build("A", "type Id = string;");
    const b = compiler.build("B", 'const id: Id = "i";', [a]);
    await compiler.compile(a);

    const pruned = await compiler.prune(b);

    expect(pruned.priorCells).toHaveLength(1);
    expect(pruned.priorCells[0]).toBe(a);
  });

  it("keeps prior cells providing an implicit value", async () => {
    const a = compiler.build("A", "/** @implicit */ const three: number = 3;");
    const other = compiler.build("Other", "const unrelated = 0;");
    const b = compiler.build("B", "const k = implicitly<number>();", [
      a,
      other,
    ]);
    await compiler.compile(a);
    await compiler.compile(other);

    const pruned = await compiler.prune(b);

    expect(pruned.priorCells).toHaveLength(1);
    expect(pruned.priorCells[0]).toBe(a);
  });

  it("keeps prior cells reached through inherited local imports", async () => {
    const shapes = compiler.build(
      "Shapes",
      "namespace Shapes { export const pi = 3; }",
    );
    const other = compiler.build("Other", "const unrelated = 0;");
    await compiler.compile(shapes);
    await compiler.compile(other);
    const importing = compiler.build("L", "import pi = Shapes.pi;", [shapes]);
    const imports = await compiler.splitImports(importing);
    const cell = compiler.build(
      "M",
      "const r = pi * 2;",
      [shapes, other],
      [],
      imports,
    );

    const pruned = await compiler.prune(cell);

    expect(imports.local).toHaveLength(1);
    expect(pruned.priorCells).toHaveLength(1);
    expect(pruned.priorCells[0]).toBe(shapes);
    expect(pruned.inheritedImports).toBe(imports);
  });

  it("ignores members declared by other prior cells", async () => {
    const shape = compiler.build("Shape", "interface HasX { x: number }");
    const point = compiler.build(
      "Point",
      "const point: HasX = { x: 1 };",
      [shape],
    );
    const cell = compiler.build("C", "const px = point.x;", [shape, point]);
    await compiler.compile(shape);
    await compiler.compile(point);

    const pruned = await compiler.prune(cell);

    expect(pruned.priorCells).toHaveLength(1);
    expect(pruned.priorCells[0]).toBe(point);
  });

  it("is idempotent", async () => {
    const a = compiler.build("A", "const x = 1;");
    const b = compiler.build("B", "const y = 2;");
    const c = compiler.build("C", "const z = x + n;", [a, b], [
      { name: "n", type: "number" },
      { name: "m", type: "number" },
    ]);
    await compiler.compile(a);
    await compiler.compile(b);

    const once = await compiler.prune(c);
    const twice = await compiler.prune(once);

    expect(twice.priorCells).toHaveLength(once.priorCells.length);
    expect(twice.priorCells[0]).toBe(once.priorCells[0]);
    expect(twice.inputs).toEqual(once.inputs);
  });

  it("consumes the cell it prunes", async () => {
    const cell = compiler.build("C", "const z = 1;");
    await compiler.prune(cell);

    await expect(compiler.prune(cell)).rejects.toThrow(CellStateError);
    await expect(compiler.compile(cell)).rejects.toThrow(
      "Cannot compile cell C: it is consumed.",
    );
  });

  it("requires prior cells to be compiled", async () => {
    const a = compiler.build("A", "const x = 1;");
    const c = compiler.build("C", "const z = x;", [a]);

    await expect(compiler.prune(c)).rejects.toThrow(
      "Prior cell A of C has not been compiled.",
    );
  });
});
