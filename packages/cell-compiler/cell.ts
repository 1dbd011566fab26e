import ts from "typescript";
import type { CellInput } from "./interface.ts";
import {
  type ImportStatement,
  importedNames,
  Imports,
  isImportStatement,
} from "./imports.ts";

export interface TopLevelName {
  readonly name: string;
  readonly node: ts.Identifier;
  // Declared with an `export` modifier in the cell source.
  readonly exported: boolean;
  // `const`, `let` or `var` binding.
  readonly variable: boolean;
}

export interface CellUnitInit {
  readonly name: string;
  readonly sourceFile: ts.SourceFile;
  readonly priorCells?: readonly CellUnit[];
  readonly inputs?: readonly CellInput[];
  readonly inheritedImports?: Imports;
  // Hands out the session-unique type name on first use.
  readonly assignTypeName: (name: string) => string;
}

// Top-level names starting with an underscore stay private to their cell.
export function isPublicName(name: string): boolean {
  return !name.startsWith("_");
}

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  return ts.canHaveModifiers(node) &&
    (ts.getModifiers(node) ?? []).some((modifier) => modifier.kind === kind);
}

function bindingIdentifiers(name: ts.BindingName): ts.Identifier[] {
  if (ts.isIdentifier(name)) {
    return [name];
  }
  return name.elements.flatMap((element) =>
    ts.isOmittedExpression(element) ? [] : bindingIdentifiers(element.name)
  );
}

function topLevelNames(statement: ts.Statement): TopLevelName[] {
  if (hasModifier(statement, ts.SyntaxKind.DefaultKeyword)) {
    return [];
  }
  // `declare global { ... }` augments the global scope and binds no name.
  if (statement.flags & ts.NodeFlags.GlobalAugmentation) {
    return [];
  }
  const exported = hasModifier(statement, ts.SyntaxKind.ExportKeyword);
  if (ts.isVariableStatement(statement)) {
    return statement.declarationList.declarations
      .flatMap((declaration) => bindingIdentifiers(declaration.name))
      .map((node) => ({ name: node.text, node, exported, variable: true }));
  }
  if (
    (ts.isFunctionDeclaration(statement) ||
      ts.isClassDeclaration(statement) ||
      ts.isInterfaceDeclaration(statement) ||
      ts.isTypeAliasDeclaration(statement) ||
      ts.isEnumDeclaration(statement) ||
      ts.isModuleDeclaration(statement)) &&
    statement.name && ts.isIdentifier(statement.name)
  ) {
    const node = statement.name;
    return [{ name: node.text, node, exported, variable: false }];
  }
  return [];
}

function unique(names: Iterable<string>): string[] {
  return [...new Set(names)];
}

/**
 * One notebook cell: its parsed statements and the dependency surface it is
 * compiled against (prior cells, inputs and inherited imports).
 *
 * A `CellUnit` never changes. Pruning and code transformation build new
 * units; the compiler tracks each unit's lifecycle separately.
 */
export class CellUnit {
  readonly name: string;
  readonly sourceFile: ts.SourceFile;
  readonly priorCells: readonly CellUnit[];
  readonly inputs: readonly CellInput[];
  readonly inheritedImports: Imports;
  readonly #assignTypeName: (name: string) => string;
  #typeName?: string;
  #names?: readonly TopLevelName[];

  constructor(init: CellUnitInit) {
    this.name = init.name;
    this.sourceFile = init.sourceFile;
    this.priorCells = init.priorCells ?? [];
    this.inputs = init.inputs ?? [];
    this.inheritedImports = init.inheritedImports ?? Imports.empty;
    this.#assignTypeName = init.assignTypeName;
  }

  get source(): string {
    return this.sourceFile.text;
  }

  get statements(): readonly ts.Statement[] {
    return this.sourceFile.statements;
  }

  // Assigned on first access and stable afterwards.
  get typeName(): string {
    this.#typeName ??= this.#assignTypeName(this.name);
    return this.#typeName;
  }

  get implicitInputs(): readonly CellInput[] {
    return this.inputs.filter((input) => input.implicit);
  }

  get nonImplicitInputs(): readonly CellInput[] {
    return this.inputs.filter((input) => !input.implicit);
  }

  get topLevelNames(): readonly TopLevelName[] {
    this.#names ??= this.statements.flatMap(topLevelNames);
    return this.#names;
  }

  get declaredNames(): string[] {
    return unique(this.topLevelNames.map(({ name }) => name));
  }

  get publicNames(): string[] {
    return this.declaredNames.filter(isPublicName);
  }

  get imports(): readonly ImportStatement[] {
    return this.statements.filter(isImportStatement);
  }

  get importedNames(): string[] {
    return unique(this.imports.flatMap(importedNames));
  }

  // Public `const`, `let` and `var` bindings, first declaration of each.
  get outputs(): readonly TopLevelName[] {
    const seen = new Set<string>();
    return this.topLevelNames.filter(({ name, variable }) => {
      if (!variable || !isPublicName(name) || seen.has(name)) {
        return false;
      }
      seen.add(name);
      return true;
    });
  }
}
