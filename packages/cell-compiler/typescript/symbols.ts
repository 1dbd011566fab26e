import ts from "typescript";
import type { CellWrapper, TextRange } from "./wrapper.ts";

/**
 * A cell module after type checking, with the `implicitly<T>()` calls of its
 * body resolved to the symbols in scope they stand for.
 */
export interface TypedCell {
  readonly wrapper: CellWrapper;
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  readonly sourceFile: ts.SourceFile;
  readonly implicits: ReadonlyMap<ts.CallExpression, ts.Symbol>;
}

// Top-level statements of `sourceFile` lying within `range`.
export function statementsIn(
  sourceFile: ts.SourceFile,
  range: TextRange,
): ts.Statement[] {
  return sourceFile.statements.filter((statement) =>
    statement.getStart(sourceFile) >= range.start && statement.end <= range.end
  );
}

export function forEachIdentifier(
  node: ts.Node,
  callback: (identifier: ts.Identifier) => void,
) {
  if (ts.isIdentifier(node)) {
    callback(node);
    return;
  }
  ts.forEachChild(node, (child) => forEachIdentifier(child, callback));
}

/**
 * Whether `identifier` names the declaration it belongs to rather than
 * referring to something in scope.
 */
export function isDefinitionName(identifier: ts.Identifier): boolean {
  const parent = identifier.parent;
  if (
    ts.isVariableDeclaration(parent) ||
    ts.isBindingElement(parent) ||
    ts.isParameter(parent) ||
    ts.isFunctionDeclaration(parent) ||
    ts.isFunctionExpression(parent) ||
    ts.isClassDeclaration(parent) ||
    ts.isClassExpression(parent) ||
    ts.isInterfaceDeclaration(parent) ||
    ts.isTypeAliasDeclaration(parent) ||
    ts.isEnumDeclaration(parent) ||
    ts.isEnumMember(parent) ||
    ts.isModuleDeclaration(parent) ||
    ts.isTypeParameterDeclaration(parent) ||
    ts.isPropertyDeclaration(parent) ||
    ts.isPropertySignature(parent) ||
    ts.isMethodDeclaration(parent) ||
    ts.isMethodSignature(parent) ||
    ts.isGetAccessorDeclaration(parent) ||
    ts.isSetAccessorDeclaration(parent) ||
    ts.isPropertyAssignment(parent) ||
    ts.isImportClause(parent) ||
    ts.isNamespaceImport(parent) ||
    ts.isImportEqualsDeclaration(parent)
  ) {
    return parent.name === identifier;
  }
  if (ts.isImportSpecifier(parent)) {
    return true;
  }
  return false;
}

/**
 * The symbol `identifier` refers to. Shorthand properties and export
 * specifiers refer to the local they name.
 */
export function referencedSymbol(
  checker: ts.TypeChecker,
  identifier: ts.Identifier,
): ts.Symbol | undefined {
  const parent = identifier.parent;
  if (ts.isShorthandPropertyAssignment(parent) && parent.name === identifier) {
    return checker.getShorthandAssignmentValueSymbol(parent);
  }
  if (ts.isExportSpecifier(parent)) {
    return checker.getExportSpecifierLocalTargetSymbol(parent);
  }
  return checker.getSymbolAtLocation(identifier);
}

/**
 * `symbol` followed by every alias it forwards to, one import or export at a
 * time.
 */
export function aliasChain(
  checker: ts.TypeChecker,
  symbol: ts.Symbol,
): ts.Symbol[] {
  const chain = [symbol];
  let current = symbol;
  while (current.flags & ts.SymbolFlags.Alias) {
    const next = checker.getImmediateAliasedSymbol(current);
    if (!next || chain.includes(next)) {
      break;
    }
    chain.push(next);
    current = next;
  }
  return chain;
}

export function declaringFiles(symbol: ts.Symbol): string[] {
  return (symbol.declarations ?? []).map((declaration) =>
    declaration.getSourceFile().fileName
  );
}

/**
 * Whether `declaration` binds a name at the top level of its module, and so
 * can only be reached by importing that module.
 */
export function isModuleLevel(declaration: ts.Node): boolean {
  let node = declaration;
  while (!ts.isSourceFile(node)) {
    const parent = node.parent;
    if (ts.isSourceFile(parent)) {
      return true;
    }
    if (
      !(ts.isVariableDeclaration(parent) ||
        ts.isVariableDeclarationList(parent) ||
        ts.isVariableStatement(parent) ||
        ts.isObjectBindingPattern(parent) ||
        ts.isArrayBindingPattern(parent) ||
        ts.isBindingElement(parent) ||
        ts.isNamedExports(parent) ||
        ts.isExportDeclaration(parent))
    ) {
      return false;
    }
    node = parent;
  }
  return true;
}

export function within(node: ts.Node, range: TextRange): boolean {
  return node.getStart() >= range.start && node.end <= range.end;
}
