import ts from "typescript";
import { IMPLICIT_NOT_FOUND_CODE } from "./diagnostics/mod.ts";
import { isModuleLevel, type TypedCell, within } from "./symbols.ts";
import {
  cellModuleSpecifier,
  type CellWrapper,
  IMPLICIT_TAG,
  SUMMON_FUNCTION,
} from "./wrapper.ts";

export interface ImplicitResolution {
  readonly resolved: Map<ts.CallExpression, ts.Symbol>;
  readonly diagnostics: ts.Diagnostic[];
}

// Candidate binding sites, most preferred first.
enum Precedence {
  Body,
  Input,
  PriorCell,
  Other,
}

function isSummon(
  node: ts.Node,
  checker: ts.TypeChecker,
  wrapper: CellWrapper,
): node is ts.CallExpression {
  if (
    !ts.isCallExpression(node) || !ts.isIdentifier(node.expression) ||
    node.expression.text !== SUMMON_FUNCTION ||
    node.typeArguments?.length !== 1 || node.arguments.length !== 0
  ) {
    return false;
  }
  // A local binding may shadow the prelude's declaration.
  const declarations =
    checker.getSymbolAtLocation(node.expression)?.declarations ?? [];
  return declarations.some((declaration) =>
    declaration.getSourceFile().fileName === wrapper.fileName &&
    within(declaration, wrapper.prelude)
  );
}

function findSummons(
  sourceFile: ts.SourceFile,
  checker: ts.TypeChecker,
  wrapper: CellWrapper,
): ts.CallExpression[] {
  const summons: ts.CallExpression[] = [];
  const visit = (node: ts.Node) => {
    if (isSummon(node, checker, wrapper)) {
      summons.push(node);
    }
    ts.forEachChild(node, visit);
  };
  for (const statement of sourceFile.statements) {
    if (within(statement, wrapper.body)) {
      visit(statement);
    }
  }
  return summons;
}

function hasImplicitTag(declaration: ts.Declaration): boolean {
  return ts.getJSDocTags(declaration).some((tag) =>
    tag.tagName.text === IMPLICIT_TAG
  );
}

function contains(outer: ts.Node, inner: ts.Node): boolean {
  return outer.getSourceFile() === inner.getSourceFile() &&
    outer.pos <= inner.pos && inner.end <= outer.end;
}

function priorIndex(
  declaration: ts.Declaration,
  wrapper: CellWrapper,
): number {
  if (!ts.isImportSpecifier(declaration)) {
    return -1;
  }
  const { moduleSpecifier } = declaration.parent.parent.parent;
  if (!ts.isStringLiteral(moduleSpecifier)) {
    return -1;
  }
  return wrapper.priorImports.findIndex(({ cell }) =>
    cellModuleSpecifier(cell.typeName) === moduleSpecifier.text
  );
}

interface Candidate {
  readonly symbol: ts.Symbol;
  readonly precedence: Precedence;
  // Orders candidates of equal precedence, highest first.
  readonly rank: number;
}

function classify(
  symbol: ts.Symbol,
  declaration: ts.Declaration,
  sourceFile: ts.SourceFile,
  wrapper: CellWrapper,
): Candidate {
  if (declaration.getSourceFile() === sourceFile) {
    if (within(declaration, wrapper.body)) {
      return { symbol, precedence: Precedence.Body, rank: declaration.pos };
    }
    if (within(declaration, wrapper.inputs)) {
      return { symbol, precedence: Precedence.Input, rank: 0 };
    }
    const index = priorIndex(declaration, wrapper);
    if (index >= 0) {
      return { symbol, precedence: Precedence.PriorCell, rank: index };
    }
  }
  return { symbol, precedence: Precedence.Other, rank: 0 };
}

function candidatesFor(
  call: ts.CallExpression,
  target: ts.Type,
  typed: Omit<TypedCell, "implicits">,
): Candidate[] {
  const { checker, program, sourceFile, wrapper } = typed;
  const candidates: Candidate[] = [];
  const symbols = checker.getSymbolsInScope(
    call,
    ts.SymbolFlags.Value | ts.SymbolFlags.Alias,
  );
  for (const symbol of symbols) {
    const declaration = symbol.declarations?.[0];
    if (
      !declaration ||
      program.isSourceFileDefaultLibrary(declaration.getSourceFile())
    ) {
      continue;
    }
    const resolved = symbol.flags & ts.SymbolFlags.Alias
      ? checker.getAliasedSymbol(symbol)
      : symbol;
    const declarations = resolved.declarations ?? [];
    if (
      !(resolved.flags & ts.SymbolFlags.Value) ||
      !declarations.some(hasImplicitTag) ||
      declarations.some((node) => contains(node, call))
    ) {
      continue;
    }
    const type = checker.getTypeOfSymbolAtLocation(resolved, call);
    if (checker.isTypeAssignableTo(type, target)) {
      candidates.push(classify(symbol, declaration, sourceFile, wrapper));
    }
  }
  return candidates.sort((a, b) =>
    a.precedence - b.precedence || b.rank - a.rank
  );
}

/**
 * Resolves every `implicitly<T>()` in the cell body to the `@implicit` value
 * in scope whose type is assignable to `T`. The cell's own declarations win
 * over implicit inputs, which win over prior cells, the latest first.
 */
export function resolveSummons(
  typed: Omit<TypedCell, "implicits">,
): ImplicitResolution {
  const { checker, sourceFile, wrapper } = typed;
  const resolved = new Map<ts.CallExpression, ts.Symbol>();
  const diagnostics: ts.Diagnostic[] = [];
  for (const call of findSummons(sourceFile, checker, wrapper)) {
    const [typeArgument] = call.typeArguments ?? [];
    if (!typeArgument) {
      continue;
    }
    const target = checker.getTypeFromTypeNode(typeArgument);
    const [best] = candidatesFor(call, target, typed);
    if (best) {
      resolved.set(call, best.symbol);
      continue;
    }
    diagnostics.push({
      file: sourceFile,
      start: call.getStart(sourceFile),
      length: call.getWidth(sourceFile),
      category: ts.DiagnosticCategory.Error,
      code: IMPLICIT_NOT_FOUND_CODE,
      messageText: `No implicit value found for type '${
        checker.typeToString(target)
      }'.`,
    });
  }
  return { resolved, diagnostics };
}

function requireCall(factory: ts.NodeFactory, specifier: string) {
  return factory.createCallExpression(
    factory.createIdentifier("require"),
    undefined,
    [factory.createStringLiteral(specifier)],
  );
}

function member(
  factory: ts.NodeFactory,
  object: ts.Expression,
  name: ts.Identifier | ts.StringLiteral,
): ts.Expression {
  return ts.isIdentifier(name)
    ? factory.createPropertyAccessExpression(object, name.text)
    : factory.createElementAccessExpression(
      object,
      factory.createStringLiteral(name.text),
    );
}

function moduleOf(
  declaration: { readonly moduleSpecifier: ts.Expression },
): string | undefined {
  return ts.isStringLiteral(declaration.moduleSpecifier)
    ? declaration.moduleSpecifier.text
    : undefined;
}

/**
 * An expression for `symbol` that holds in the emitted CommonJS module.
 * Imports are read through `require` because the module transform only
 * rewrites references it saw during type checking.
 */
function referenceTo(
  factory: ts.NodeFactory,
  checker: ts.TypeChecker,
  symbol: ts.Symbol,
  typed: TypedCell,
): ts.Expression {
  const declaration = symbol.declarations?.[0];
  if (declaration && ts.isImportSpecifier(declaration)) {
    const specifier = moduleOf(declaration.parent.parent.parent);
    if (specifier !== undefined) {
      return member(
        factory,
        requireCall(factory, specifier),
        declaration.propertyName ?? declaration.name,
      );
    }
  }
  if (declaration && ts.isImportClause(declaration)) {
    const specifier = moduleOf(declaration.parent);
    if (specifier !== undefined) {
      return factory.createPropertyAccessExpression(
        requireCall(factory, specifier),
        "default",
      );
    }
  }
  if (declaration && ts.isNamespaceImport(declaration)) {
    const specifier = moduleOf(declaration.parent.parent);
    if (specifier !== undefined) {
      return requireCall(factory, specifier);
    }
  }
  if (declaration && ts.isImportEqualsDeclaration(declaration)) {
    return entityReference(factory, checker, declaration.moduleReference, typed);
  }
  if (
    declaration && declaration.getSourceFile() === typed.sourceFile &&
    within(declaration, typed.wrapper.body) && isModuleLevel(declaration)
  ) {
    // Every top-level declaration is exported, and CommonJS emit reads
    // exported bindings from `exports`.
    return factory.createPropertyAccessExpression(
      factory.createIdentifier("exports"),
      symbol.name,
    );
  }
  return factory.createIdentifier(symbol.name);
}

function entityReference(
  factory: ts.NodeFactory,
  checker: ts.TypeChecker,
  reference: ts.ModuleReference,
  typed: TypedCell,
): ts.Expression {
  if (ts.isExternalModuleReference(reference)) {
    return ts.isStringLiteral(reference.expression)
      ? requireCall(factory, reference.expression.text)
      : factory.createIdentifier("undefined");
  }
  if (ts.isQualifiedName(reference)) {
    return factory.createPropertyAccessExpression(
      entityReference(factory, checker, reference.left, typed),
      reference.right.text,
    );
  }
  const symbol = checker.getSymbolAtLocation(reference);
  return symbol
    ? referenceTo(factory, checker, symbol, typed)
    : factory.createIdentifier(reference.text);
}

/**
 * Replaces each resolved `implicitly<T>()` with a reference to its value.
 */
export function implicitTransformer(
  typed: TypedCell,
): ts.TransformerFactory<ts.SourceFile> {
  return (context) => (sourceFile) => {
    const visit = (node: ts.Node): ts.Node => {
      const original = ts.getOriginalNode(node);
      const symbol = ts.isCallExpression(original)
        ? typed.implicits.get(original)
        : undefined;
      if (symbol) {
        return referenceTo(context.factory, typed.checker, symbol, typed);
      }
      return ts.visitEachChild(node, visit, context);
    };
    return ts.visitNode(sourceFile, visit, ts.isSourceFile);
  };
}
