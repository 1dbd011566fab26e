import ts from "typescript";
import type { CellUnit } from "../cell.ts";
import type { CellPositionMapper } from "../runtime/source-map.ts";
import { type ImportStatement, importedNames } from "../imports.ts";

export const SUMMON_FUNCTION = "implicitly";
export const IMPLICIT_TAG = "implicit";

const PRELUDE = `declare function ${SUMMON_FUNCTION}<T>(): T;\n`;

export interface TextRange {
  readonly start: number;
  readonly end: number;
}

export interface PriorImport {
  readonly cell: CellUnit;
  readonly fileName: string;
  // Public names of the prior cell visible in this cell.
  readonly names: readonly string[];
}

/**
 * The module a cell is compiled as, with the ranges of its synthesized
 * sections.
 */
export interface CellWrapper {
  readonly cell: CellUnit;
  readonly fileName: string;
  readonly text: string;
  readonly priorImports: readonly PriorImport[];
  readonly prelude: TextRange;
  readonly externalImports: TextRange;
  readonly localImports: TextRange;
  readonly inputs: TextRange;
  // The cell's own source, verbatim.
  readonly body: TextRange;
  // 0-based line of `body.start`.
  readonly bodyLine: number;
}

export function cellFileName(notebookPackage: string, typeName: string) {
  return `/${notebookPackage}/${typeName}.ts`;
}

export function cellModuleSpecifier(typeName: string) {
  return `./${typeName}`;
}

const printer = ts.createPrinter({
  newLine: ts.NewLineKind.LineFeed,
  removeComments: false,
});

// Prints a statement from another cell afresh, without its source positions.
function print(statement: ImportStatement): string {
  return printer.printNode(
    ts.EmitHint.Unspecified,
    statement,
    statement.getSourceFile(),
  );
}

function braces(names: readonly string[]): string {
  return names.length ? `{ ${names.join(", ")} }` : "{}";
}

class TextBuilder {
  #text = "";

  section(lines: readonly string[]): TextRange {
    const start = this.#text.length;
    for (const line of lines) {
      this.#text += line.endsWith("\n") ? line : `${line}\n`;
    }
    return { start, end: this.#text.length };
  }

  toString(): string {
    return this.#text;
  }
}

/**
 * Names each prior cell contributes, the latest prior winning. Names the cell
 * itself binds shadow all of them.
 */
function priorImportNames(
  priorCells: readonly CellUnit[],
  shadowed: Set<string>,
): string[][] {
  const names: string[][] = [];
  for (let index = priorCells.length - 1; index >= 0; index--) {
    const visible = priorCells[index].publicNames.filter((name) =>
      !shadowed.has(name)
    );
    visible.forEach((name) => shadowed.add(name));
    names[index] = visible;
  }
  return names;
}

/**
 * Synthesizes the module a cell compiles as:
 *
 * ```ts
 * declare function implicitly<T>(): T;
 * import { Point, origin } from "./Geometry$1";   // one per prior cell
 * import { sum } from "mathlib";                  // inherited external
 * import pi = Shapes.pi;                          // inherited local
 * declare const scale: number;                    // inputs
 * /** @implicit *\/ declare const show: Show<number>;
 * ...cell source...
 * export { area };
 * ```
 *
 * Inherited imports that rebind a name the cell declares or imports are
 * left out. The cell's statements are taken from its source text, so every
 * synthesis yields independent nodes.
 */
export function synthesizeWrapper(
  cell: CellUnit,
  notebookPackage: string,
): CellWrapper {
  const own = new Set([...cell.declaredNames, ...cell.importedNames]);
  const inherit = (statements: readonly ImportStatement[]) =>
    statements.filter((statement) =>
      importedNames(statement).every((name) => !own.has(name))
    );
  const externalImports = inherit(cell.inheritedImports.external);
  const localImports = inherit(cell.inheritedImports.local);

  const shadowed = new Set([
    ...own,
    SUMMON_FUNCTION,
    ...cell.inputs.map(({ name }) => name),
    ...[...externalImports, ...localImports].flatMap(importedNames),
  ]);
  const names = priorImportNames(cell.priorCells, shadowed);
  const priorImports: PriorImport[] = cell.priorCells.map((prior, index) => ({
    cell: prior,
    fileName: cellFileName(notebookPackage, prior.typeName),
    names: names[index],
  }));

  const text = new TextBuilder();
  const prelude = text.section([
    PRELUDE,
    ...priorImports.map(({ cell: prior, names }) =>
      `import ${braces(names)} from "${cellModuleSpecifier(prior.typeName)}";`
    ),
  ]);
  const external = text.section(externalImports.map(print));
  const local = text.section(localImports.map(print));
  const inputs = text.section([
    ...cell.nonImplicitInputs.map(({ name, type }) =>
      `declare const ${name}: ${type};`
    ),
    ...cell.implicitInputs.map(({ name, type }) =>
      `/** @${IMPLICIT_TAG} */ declare const ${name}: ${type};`
    ),
  ]);
  const bodyLine = text.toString().split("\n").length - 1;
  const body = text.section([cell.source]);
  const exported = new Set(
    cell.topLevelNames.filter(({ exported }) => exported).map(({ name }) =>
      name
    ),
  );
  text.section([
    `export ${
      braces(cell.declaredNames.filter((name) => !exported.has(name)))
    };`,
  ]);

  return {
    cell,
    fileName: cellFileName(notebookPackage, cell.typeName),
    text: text.toString(),
    priorImports,
    prelude,
    externalImports: external,
    localImports: local,
    inputs,
    body: { start: body.start, end: body.start + cell.source.length },
    bodyLine,
  };
}

/**
 * Maps 1-based positions in the wrapper to positions in the cell source,
 * named after the cell. Positions in synthesized sections map to nothing.
 */
export function bodyPositionMapper(wrapper: CellWrapper): CellPositionMapper {
  const lineCount = wrapper.cell.source.split("\n").length;
  return (line, column) => {
    const cellLine = line - wrapper.bodyLine;
    return cellLine >= 1 && cellLine <= lineCount
      ? { source: wrapper.cell.name, line: cellLine, column: column + 1 }
      : undefined;
  };
}
