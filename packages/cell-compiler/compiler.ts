import ts from "typescript";
import { getLogger } from "@cellchain/utils/logger";
import { CellUnit } from "./cell.ts";
import { Imports } from "./imports.ts";
import type {
  CellInput,
  ImplicitValue,
  OutputDeclaration,
  RuntimeModule,
} from "./interface.ts";
import { type CellInstance, CellLoader, CompiledCell } from "./runtime/loader.ts";
import {
  CellDiagnostic,
  CellStateError,
  CompilerError,
  ToolchainError,
} from "./typescript/diagnostics/mod.ts";
import { parseSource } from "./typescript/host.ts";
import { implicitTransformer, resolveSummons } from "./typescript/implicits.ts";
import { getCompilerOptions } from "./typescript/options.ts";
import { declaredTypes, outputTypes } from "./typescript/outputs.ts";
import { classifyImports } from "./typescript/split-imports.ts";
import type { TypedCell } from "./typescript/symbols.ts";
import { Toolchain } from "./typescript/toolchain.ts";
import { analyzeUsage } from "./typescript/usage.ts";
import {
  bodyPositionMapper,
  cellFileName,
  type CellWrapper,
  SUMMON_FUNCTION,
  synthesizeWrapper,
} from "./typescript/wrapper.ts";

const logger = getLogger("cell-compiler");

export const DEFAULT_NOTEBOOK_PACKAGE = "$notebook";

const IMPLICITS_CELL = "Implicits";
const TYPES_CELL = "Types";

/**
 * Where a cell is in its lifecycle. A cell is compiled at most once; pruning
 * or transforming it consumes it.
 *
 * ```
 * parsed -> compiled -> consumed
 * parsed -> compiled -> released
 * parsed -> consumed
 * parsed -> failed
 * ```
 */
export type CellPhase =
  | "parsed"
  | "compiled"
  | "failed"
  | "consumed"
  | "released";

interface LedgerEntry {
  readonly phase: CellPhase;
  // Kept for compiled cells, for later analysis.
  readonly typed?: TypedCell;
  // Script name of compiled cells, whose source map the loader holds.
  readonly filename?: string;
}

export interface CellCompilerOptions {
  // Directory cell modules are compiled in. Defaults to `$notebook`.
  notebookPackage?: string;
  // Modules cells may import by name.
  runtimeModules?: Record<string, RuntimeModule>;
  // Merged over the defaults of `getCompilerOptions()`.
  compilerOptions?: ts.CompilerOptions;
  // Whether `build` throws on syntax errors. Defaults to true.
  strictParse?: boolean;
}

export interface BuildOptions {
  strictParse?: boolean;
}

/**
 * Where `resolveImplicits` looks for implicit values besides runtime modules.
 */
export interface ImplicitScope {
  readonly instances?: readonly CellInstance[];
  readonly imports?: Imports;
}

export type StatementTransform = (
  statements: readonly ts.Statement[],
) => readonly ts.Statement[];

// Hands out names of the form `<base>$<n>`, unique per compiler.
class FreshNames {
  readonly #counts = new Map<string, number>();

  next(base: string): string {
    const sanitized = base.replace(/[^A-Za-z0-9_$]/g, "_").replace(
      /^(?=\d|$)/,
      "_",
    );
    const count = (this.#counts.get(sanitized) ?? 0) + 1;
    this.#counts.set(sanitized, count);
    return `${sanitized}$${count}`;
  }
}

const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });

/**
 * Compiles notebook cells one at a time against the cells before them.
 *
 * Each cell becomes a module importing what its prior cells declare, so a
 * cell sees prior values and types as if all cells shared one scope. All
 * compiler work of a session runs on one serial queue.
 *
 * @example
 * ```ts
 * const compiler = new CellCompiler();
 * const a = compiler.build("A", "const x = 5;");
 * const b = compiler.build("B", "const y = x + 1;", [a]);
 * const instanceA = (await compiler.compile(a)).instantiate();
 * const instanceB = (await compiler.compile(b)).instantiate([instanceA]);
 * instanceB.field("y"); // { value: 6 }
 * ```
 */
export class CellCompiler {
  readonly notebookPackage: string;
  readonly #strictParse: boolean;
  readonly #toolchain: Toolchain;
  readonly #loader: CellLoader;
  readonly #names = new FreshNames();
  readonly #ledger = new WeakMap<CellUnit, LedgerEntry>();

  constructor(options: CellCompilerOptions = {}) {
    this.notebookPackage = options.notebookPackage ?? DEFAULT_NOTEBOOK_PACKAGE;
    this.#strictParse = options.strictParse ?? true;
    const runtimeModules = options.runtimeModules ?? {};
    this.#toolchain = new Toolchain({
      compilerOptions: { ...getCompilerOptions(), ...options.compilerOptions },
      runtimeModules: Object.fromEntries(
        Object.entries(runtimeModules).map(([name, { types }]) => [
          name,
          types,
        ]),
      ),
    });
    this.#loader = new CellLoader(runtimeModules);
  }

  /**
   * Parses `source` into a cell depending on `priorCells`, `inputs` and the
   * imports inherited from earlier cells.
   *
   * @throws {CompilerError} On syntax errors, unless parsing is lenient.
   */
  build(
    name: string,
    source: string,
    priorCells: readonly CellUnit[] = [],
    inputs: readonly CellInput[] = [],
    inheritedImports: Imports = Imports.empty,
    options: BuildOptions = {},
  ): CellUnit {
    const { sourceFile, diagnostics } = parseSource(
      `/${this.notebookPackage}/${name}.cell.ts`,
      source,
    );
    if (diagnostics.length && (options.strictParse ?? this.#strictParse)) {
      throw new CompilerError(
        diagnostics.map((diagnostic) =>
          new CellDiagnostic({
            diagnostic,
            cell: name,
            source,
            start: diagnostic.start,
          })
        ),
      );
    }
    const cell = new CellUnit({
      name,
      sourceFile,
      priorCells,
      inputs,
      inheritedImports,
      assignTypeName: (base) => this.#names.next(base),
    });
    this.#ledger.set(cell, { phase: "parsed" });
    return cell;
  }

  /**
   * Type checks and emits `cell`. Its prior cells must have been compiled.
   *
   * @throws {CompilerError} With the cell's diagnostics when it fails to
   * compile. The cell cannot be compiled again.
   * @throws {CellStateError} When the cell was compiled, pruned or
   * transformed before.
   */
  compile(cell: CellUnit): Promise<CompiledCell> {
    return this.#toolchain.run(() => {
      this.#expectParsed(cell, "compile");
      this.#expectPriorsCompiled(cell);
      const wrapper = synthesizeWrapper(cell, this.notebookPackage);
      logger.debug(() => `Compiling ${cell.name} as ${wrapper.fileName}`);
      this.#toolchain.register(wrapper.fileName, wrapper.text);
      try {
        const { typed, diagnostics } = this.#typeCheck(wrapper);
        if (diagnostics.some((diagnostic) => diagnostic.isError)) {
          throw new CompilerError(diagnostics);
        }
        const script = this.#toolchain.emit(
          typed.program,
          typed.sourceFile,
          [implicitTransformer(typed)],
        );
        this.#ledger.set(cell, {
          phase: "compiled",
          typed,
          filename: script.filename,
        });
        return new CompiledCell({
          cell,
          script,
          diagnostics,
          loader: this.#loader,
          mapper: bodyPositionMapper(wrapper),
        });
      } catch (error) {
        this.#toolchain.unregister(wrapper.fileName);
        this.#ledger.set(cell, { phase: "failed" });
        logger.debug(() => [`Compiling ${cell.name} failed`, `${error}`]);
        throw error;
      }
    });
  }

  /**
   * Narrows `cell` to the prior cells and inputs it uses. A parsed cell is
   * type checked first.
   *
   * Consumes `cell`: only the returned cell may be compiled afterwards.
   */
  prune(cell: CellUnit): Promise<CellUnit> {
    return this.#toolchain.run(() => {
      const usage = analyzeUsage(this.#typed(cell, "prune"));
      this.#ledger.set(cell, { phase: "consumed" });
      const pruned = new CellUnit({
        name: cell.name,
        sourceFile: cell.sourceFile,
        priorCells: cell.priorCells.filter((prior) =>
          usage.priorCells.has(prior)
        ),
        inputs: cell.inputs.filter(({ name }) => usage.inputs.has(name)),
        inheritedImports: cell.inheritedImports,
        assignTypeName: (base) => this.#names.next(base),
      });
      this.#ledger.set(pruned, { phase: "parsed" });
      logger.debug(() =>
        `Pruned ${cell.name} to ${pruned.priorCells.length}/${cell.priorCells.length} prior cells, ${pruned.inputs.length}/${cell.inputs.length} inputs`
      );
      return pruned;
    });
  }

  /**
   * Sorts the imports of `cell` into local and external ones, for cells
   * that follow it to inherit.
   */
  splitImports(cell: CellUnit): Promise<Imports> {
    return this.#toolchain.run(() =>
      classifyImports(this.#typed(cell, "split the imports of"))
    );
  }

  /**
   * Finds an implicit value for each of `types`, in order. A type without
   * one yields `undefined`.
   *
   * All types are summoned by one cell first; when that fails, each type is
   * summoned by a cell of its own. Nothing is cached between calls, since a
   * later cell may declare a better candidate.
   */
  async resolveImplicits(
    types: readonly string[],
    scope: ImplicitScope = {},
  ): Promise<(ImplicitValue | undefined)[]> {
    if (types.length === 0) {
      return [];
    }
    const names = types.map(() => this.#names.next("anon"));
    try {
      return await this.#summon(types, names, scope);
    } catch (error) {
      if (error instanceof ToolchainError) {
        throw error;
      }
      logger.debug(() => ["Summoning implicits together failed", `${error}`]);
    }
    return Promise.all(types.map(async (type, index) => {
      try {
        const [value] = await this.#summon([type], [names[index]], scope);
        return value;
      } catch (error) {
        if (error instanceof ToolchainError) {
          throw error;
        }
        logger.debug(() => [`No implicit ${type}`, `${error}`]);
        return undefined;
      }
    }));
  }

  /**
   * Types of the public top-level variables of `cell`, for display.
   */
  extractOutputTypes(cell: CellUnit): Promise<OutputDeclaration[]> {
    return this.#toolchain.run(() =>
      outputTypes(this.#typed(cell, "extract the outputs of"))
    );
  }

  /**
   * Renders `type`, a type expression, as the checker prints it in the scope
   * of `priorCells` and `imports`.
   *
   * @throws {CompilerError} When the type does not check.
   */
  async formatType(
    type: string,
    priorCells: readonly CellUnit[] = [],
    imports: Imports = Imports.empty,
  ): Promise<string> {
    const [formatted] = await this.formatTypes([type], priorCells, imports);
    return formatted;
  }

  /**
   * Renders each of `types` like `formatType`, in order.
   */
  async formatTypes(
    types: readonly string[],
    priorCells: readonly CellUnit[] = [],
    imports: Imports = Imports.empty,
  ): Promise<string[]> {
    if (types.length === 0) {
      return [];
    }
    const source = types.map((type) =>
      `declare const ${this.#names.next("anon")}: ${type};`
    ).join("\n");
    const cell = this.build(TYPES_CELL, source, priorCells, [], imports, {
      strictParse: true,
    });
    return this.#toolchain.run(() => {
      try {
        const { typed, diagnostics } = this.#check(cell, "format types for");
        const errors = diagnostics.filter((diagnostic) => diagnostic.isError);
        if (errors.length) {
          throw new CompilerError(errors);
        }
        return declaredTypes(typed);
      } finally {
        this.#ledger.set(cell, { phase: "consumed" });
      }
    });
  }

  /**
   * Rebuilds `cell` from the statements `transform` returns. Consumes `cell`.
   */
  transformCode(cell: CellUnit, transform: StatementTransform): CellUnit {
    this.#expectParsed(cell, "transform");
    const source = transform(cell.statements)
      .map((statement) =>
        printer.printNode(ts.EmitHint.Unspecified, statement, cell.sourceFile)
      )
      .join("\n");
    const transformed = this.build(
      cell.name,
      source,
      cell.priorCells,
      cell.inputs,
      cell.inheritedImports,
    );
    this.#ledger.set(cell, { phase: "consumed" });
    return transformed;
  }

  /**
   * Drops a compiled cell from the session, typically one a re-run replaced.
   * Its module is no longer available to later cells and stacks through its
   * code are no longer mapped. Existing instances keep working.
   */
  release(cell: CellUnit): Promise<void> {
    return this.#toolchain.run(() => {
      const { phase } = this.#entry(cell);
      if (phase !== "compiled") {
        throw new CellStateError(
          `Cannot release cell ${cell.name}: it is ${phase}.`,
        );
      }
      this.#release(cell, "released");
    });
  }

  phaseOf(cell: CellUnit): CellPhase | undefined {
    return this.#ledger.get(cell)?.phase;
  }

  // Releases the session. Any later compiler work fails.
  dispose() {
    this.#toolchain.dispose();
    this.#loader.clear();
  }

  async #summon(
    types: readonly string[],
    names: readonly string[],
    scope: ImplicitScope,
  ): Promise<(ImplicitValue | undefined)[]> {
    const instances = scope.instances ?? [];
    const source = types.map((type, index) =>
      `const ${names[index]}: ${type} = ${SUMMON_FUNCTION}<${type}>();`
    ).join("\n");
    const cell = this.build(
      IMPLICITS_CELL,
      source,
      instances.map(({ cell }) => cell),
      [],
      scope.imports,
      { strictParse: true },
    );
    const compiled = await this.compile(cell);
    try {
      const instance = compiled.instantiate(instances);
      return names.map((name) => instance.field(name));
    } finally {
      await this.#discard(compiled);
    }
  }

  #discard(compiled: CompiledCell): Promise<void> {
    return this.#toolchain.run(() =>
      this.#release(compiled.cell, "consumed")
    );
  }

  #release(cell: CellUnit, phase: CellPhase) {
    const { filename } = this.#entry(cell);
    this.#toolchain.unregister(
      cellFileName(this.notebookPackage, cell.typeName),
    );
    if (filename) {
      this.#loader.release(filename);
    }
    this.#ledger.set(cell, { phase });
  }

  #typeCheck(
    wrapper: CellWrapper,
  ): { typed: TypedCell; diagnostics: CellDiagnostic[] } {
    const program = this.#toolchain.typeCheck(wrapper.fileName);
    const sourceFile = program.getSourceFile(wrapper.fileName);
    if (!sourceFile) {
      throw new Error(`${wrapper.fileName} is missing from its program.`);
    }
    const checker = program.getTypeChecker();
    const base = { wrapper, program, checker, sourceFile };
    const summons = resolveSummons(base);
    const diagnostics = [
      ...ts.getPreEmitDiagnostics(program, sourceFile),
      ...summons.diagnostics,
    ].map((diagnostic) => this.#diagnostic(wrapper, diagnostic));
    return { typed: { ...base, implicits: summons.resolved }, diagnostics };
  }

  // Positions diagnostics within the cell source. Diagnostics about
  // synthesized code keep no position.
  #diagnostic(wrapper: CellWrapper, diagnostic: ts.Diagnostic): CellDiagnostic {
    const { start } = diagnostic;
    const { body } = wrapper;
    return new CellDiagnostic({
      diagnostic,
      cell: wrapper.cell.name,
      source: wrapper.cell.source,
      start: diagnostic.file?.fileName === wrapper.fileName &&
          start !== undefined && start >= body.start && start <= body.end
        ? start - body.start
        : undefined,
    });
  }

  // The typed tree of `cell`: kept from compilation, or made for this use
  // only when the cell is merely parsed.
  #typed(cell: CellUnit, operation: string): TypedCell {
    const entry = this.#entry(cell);
    if (entry.phase === "compiled" && entry.typed) {
      return entry.typed;
    }
    return this.#check(cell, operation).typed;
  }

  // Type checks a parsed cell without compiling it.
  #check(
    cell: CellUnit,
    operation: string,
  ): { typed: TypedCell; diagnostics: CellDiagnostic[] } {
    this.#expectParsed(cell, operation);
    this.#expectPriorsCompiled(cell);
    const wrapper = synthesizeWrapper(cell, this.notebookPackage);
    this.#toolchain.register(wrapper.fileName, wrapper.text);
    try {
      return this.#typeCheck(wrapper);
    } finally {
      this.#toolchain.unregister(wrapper.fileName);
    }
  }

  #entry(cell: CellUnit): LedgerEntry {
    const entry = this.#ledger.get(cell);
    if (!entry) {
      throw new CellStateError(
        `Cell ${cell.name} was not built by this compiler.`,
      );
    }
    return entry;
  }

  #expectParsed(cell: CellUnit, operation: string) {
    const { phase } = this.#entry(cell);
    if (phase !== "parsed") {
      throw new CellStateError(
        `Cannot ${operation} cell ${cell.name}: it is ${phase}.`,
      );
    }
  }

  #expectPriorsCompiled(cell: CellUnit) {
    for (const prior of cell.priorCells) {
      const fileName = cellFileName(this.notebookPackage, prior.typeName);
      if (!this.#toolchain.isRegistered(fileName)) {
        throw new CellStateError(
          `Prior cell ${prior.name} of ${cell.name} has not been compiled.`,
        );
      }
    }
  }
}
