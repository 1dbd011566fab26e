import ts from "typescript";

export type ImportStatement = ts.ImportDeclaration | ts.ImportEqualsDeclaration;

export function isImportStatement(node: ts.Node): node is ImportStatement {
  return ts.isImportDeclaration(node) || ts.isImportEqualsDeclaration(node);
}

/**
 * Names an import statement binds in the importing scope.
 */
export function importedNames(statement: ImportStatement): string[] {
  if (ts.isImportEqualsDeclaration(statement)) {
    return [statement.name.text];
  }
  const clause = statement.importClause;
  if (!clause) {
    return [];
  }
  const names = clause.name ? [clause.name.text] : [];
  const bindings = clause.namedBindings;
  if (bindings && ts.isNamespaceImport(bindings)) {
    names.push(bindings.name.text);
  } else if (bindings) {
    names.push(...bindings.elements.map((element) => element.name.text));
  }
  return names;
}

/**
 * Imports a cell passes on to the cells that follow it.
 *
 * `local` imports resolve to something a cell of the chain defines and are
 * re-resolved in every descendant's own scope; `external` imports point
 * outside the chain and are inherited verbatim.
 */
export class Imports {
  static readonly empty: Imports = new Imports();

  constructor(
    readonly local: readonly ImportStatement[] = [],
    readonly external: readonly ImportStatement[] = [],
  ) {}

  concat(that: Imports): Imports {
    return new Imports(
      [...this.local, ...that.local],
      [...this.external, ...that.external],
    );
  }

  get size(): number {
    return this.local.length + this.external.length;
  }
}
