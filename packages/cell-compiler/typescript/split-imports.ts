import ts from "typescript";
import { Imports, isImportStatement, type ImportStatement } from "../imports.ts";
import {
  aliasChain,
  declaringFiles,
  statementsIn,
  type TypedCell,
} from "./symbols.ts";

// The symbol an import statement binds from.
function importTarget(
  checker: ts.TypeChecker,
  statement: ImportStatement,
): ts.Symbol | undefined {
  if (ts.isImportDeclaration(statement)) {
    return checker.getSymbolAtLocation(statement.moduleSpecifier);
  }
  const reference = statement.moduleReference;
  if (ts.isExternalModuleReference(reference)) {
    return checker.getSymbolAtLocation(reference.expression);
  }
  return checker.getSymbolAtLocation(
    ts.isQualifiedName(reference) ? reference.right : reference,
  );
}

/**
 * Sorts the cell's own imports into those resolving to a declaration of this
 * cell or one of its prior cells, and the rest. The returned statements are
 * the cell's parsed originals, in source order.
 */
export function classifyImports(typed: TypedCell): Imports {
  const { checker, sourceFile, wrapper } = typed;
  const chainFiles = new Set([
    wrapper.fileName,
    ...wrapper.priorImports.map(({ fileName }) => fileName),
  ]);
  const typedImports = statementsIn(sourceFile, wrapper.body).filter(
    isImportStatement,
  );
  const originals = wrapper.cell.imports;
  if (typedImports.length !== originals.length) {
    throw new Error(
      `Cell ${wrapper.cell.name} has ${originals.length} imports, but ${typedImports.length} were type checked.`,
    );
  }

  const local: ImportStatement[] = [];
  const external: ImportStatement[] = [];
  typedImports.forEach((statement, index) => {
    const target = importTarget(checker, statement);
    const isLocal = target !== undefined &&
      aliasChain(checker, target).some((symbol) =>
        declaringFiles(symbol).some((fileName) => chainFiles.has(fileName))
      );
    (isLocal ? local : external).push(originals[index]);
  });
  return new Imports(local, external);
}
