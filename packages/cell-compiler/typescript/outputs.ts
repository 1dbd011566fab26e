import ts from "typescript";
import type { OutputDeclaration } from "../interface.ts";
import type { TypedCell } from "./symbols.ts";

function identifierAt(
  node: ts.Node,
  position: number,
  sourceFile: ts.SourceFile,
): ts.Identifier | undefined {
  if (ts.isIdentifier(node) && node.getStart(sourceFile) === position) {
    return node;
  }
  return ts.forEachChild(node, (child) =>
    child.pos <= position && position < child.end
      ? identifierAt(child, position, sourceFile)
      : undefined);
}

// The checked type of a top-level name of the cell, found at its position in
// the wrapper.
function checkedType(
  typed: TypedCell,
  node: ts.Identifier,
): { type: ts.Type; identifier: ts.Identifier } | undefined {
  const { checker, sourceFile, wrapper } = typed;
  const identifier = identifierAt(
    sourceFile,
    wrapper.body.start + node.getStart(wrapper.cell.sourceFile),
    sourceFile,
  );
  return identifier
    ? { type: checker.getTypeAtLocation(identifier), identifier }
    : undefined;
}

const UNIT_TYPES = ts.TypeFlags.Void | ts.TypeFlags.Undefined;

/**
 * Checked types of the cell's public top-level variables, in declaration
 * order. Variables of type `void` or `undefined` are left out.
 */
export function outputTypes(typed: TypedCell): OutputDeclaration[] {
  const { checker, wrapper } = typed;
  const cellSource = wrapper.cell.sourceFile;
  const outputs: OutputDeclaration[] = [];
  for (const { name, node } of wrapper.cell.outputs) {
    const checked = checkedType(typed, node);
    if (!checked || checked.type.flags & UNIT_TYPES) {
      continue;
    }
    const start = node.getStart(cellSource);
    const { line, character } = cellSource.getLineAndCharacterOfPosition(
      start,
    );
    outputs.push({
      name,
      type: checker.typeToString(
        checked.type,
        checked.identifier,
        ts.TypeFormatFlags.NoTruncation,
      ),
      start,
      line: line + 1,
      column: character + 1,
    });
  }
  return outputs;
}

// Printed types of the cell's public top-level variables, `void` included.
export function declaredTypes(typed: TypedCell): string[] {
  return typed.wrapper.cell.outputs.map(({ name, node }) => {
    const checked = checkedType(typed, node);
    if (!checked) {
      throw new Error(`No declaration of ${name} in its wrapper.`);
    }
    return typed.checker.typeToString(
      checked.type,
      checked.identifier,
      ts.TypeFormatFlags.NoTruncation,
    );
  });
}
