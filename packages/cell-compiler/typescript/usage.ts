import ts from "typescript";
import type { CellUnit } from "../cell.ts";
import {
  aliasChain,
  forEachIdentifier,
  isDefinitionName,
  isModuleLevel,
  referencedSymbol,
  statementsIn,
  type TypedCell,
} from "./symbols.ts";

export interface Usage {
  // Names of the inputs referenced.
  readonly inputs: Set<string>;
  readonly priorCells: Set<CellUnit>;
}

function inputDeclarations(
  typed: TypedCell,
): Map<ts.Symbol, ts.VariableDeclaration> {
  const { checker, sourceFile, wrapper } = typed;
  const declarations = new Map<ts.Symbol, ts.VariableDeclaration>();
  for (const statement of statementsIn(sourceFile, wrapper.inputs)) {
    if (!ts.isVariableStatement(statement)) {
      continue;
    }
    for (const declaration of statement.declarationList.declarations) {
      const symbol = checker.getSymbolAtLocation(declaration.name);
      if (symbol) {
        declarations.set(symbol, declaration);
      }
    }
  }
  return declarations;
}

class UsageCollector {
  readonly inputs = new Set<string>();
  readonly priorCells = new Set<CellUnit>();
  readonly #inputSymbols: Map<ts.Symbol, ts.VariableDeclaration>;
  readonly #priorFiles: Map<string, CellUnit>;

  constructor(readonly typed: TypedCell) {
    this.#inputSymbols = inputDeclarations(typed);
    this.#priorFiles = new Map(
      typed.wrapper.priorImports.map(({ cell, fileName }) => [fileName, cell]),
    );
  }

  get inputDeclarations(): Map<ts.Symbol, ts.VariableDeclaration> {
    return this.#inputSymbols;
  }

  visit(node: ts.Node) {
    forEachIdentifier(node, (identifier) => {
      if (isDefinitionName(identifier)) {
        return;
      }
      const symbol = referencedSymbol(this.typed.checker, identifier);
      if (symbol) {
        this.reference(symbol);
      }
    });
  }

  reference(symbol: ts.Symbol) {
    for (const link of aliasChain(this.typed.checker, symbol)) {
      const input = this.#inputSymbols.get(link);
      if (input && ts.isIdentifier(input.name)) {
        this.inputs.add(input.name.text);
      }
      for (const declaration of link.declarations ?? []) {
        const prior = this.#priorFiles.get(declaration.getSourceFile().fileName);
        if (prior && isModuleLevel(declaration)) {
          this.priorCells.add(prior);
        }
      }
    }
  }
}

function collect(typed: TypedCell): UsageCollector {
  const collector = new UsageCollector(typed);
  const { sourceFile, wrapper } = typed;
  for (
    const statement of [
      ...statementsIn(sourceFile, wrapper.localImports),
      ...statementsIn(sourceFile, wrapper.body),
    ]
  ) {
    collector.visit(statement);
  }
  for (const symbol of typed.implicits.values()) {
    collector.reference(symbol);
  }
  return collector;
}

/**
 * What the cell needs of its dependency surface: the inputs its body uses,
 * and the prior cells reached from its body, its inherited local imports or
 * the declared types of those inputs. Definitions don't count as uses, and
 * neither does anything else the wrapper synthesized.
 */
export function analyzeUsage(typed: TypedCell): Usage {
  const collector = collect(typed);
  for (const declaration of collector.inputDeclarations.values()) {
    if (
      declaration.type && ts.isIdentifier(declaration.name) &&
      collector.inputs.has(declaration.name.text)
    ) {
      collector.visit(declaration.type);
    }
  }
  return { inputs: collector.inputs, priorCells: collector.priorCells };
}
