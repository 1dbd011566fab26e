import { getLogger } from "@cellchain/utils/logger";
import type { CellUnit } from "../cell.ts";
import type { JsScript, RuntimeModule } from "../interface.ts";
import { CellStateError } from "../typescript/diagnostics/mod.ts";
import type { CellDiagnostic } from "../typescript/diagnostics/mod.ts";
import { cellModuleSpecifier } from "../typescript/wrapper.ts";
import { type JsValue, UnsafeEvalIsolate } from "./isolate.ts";
import type { CellPositionMapper } from "./source-map.ts";

const logger = getLogger("cell-loader");

const SOURCE_MAPPING_URL = /\n\/\/# sourceMappingURL=[^\n]*\n?$/;

/**
 * Evaluates compiled cells and supplies the runtime modules they require.
 * Each runtime module is loaded at most once.
 */
export class CellLoader {
  readonly #isolate = new UnsafeEvalIsolate();
  readonly #modules: Record<string, RuntimeModule>;
  readonly #loaded = new Map<string, unknown>();

  constructor(modules: Record<string, RuntimeModule>) {
    this.#modules = modules;
  }

  /**
   * Evaluates `script` to a factory taking `exports`, `require` and then the
   * values of `parameters`.
   */
  define(
    script: JsScript,
    parameters: readonly string[],
    mapper?: CellPositionMapper,
  ): JsValue {
    // The header shares the first line of the module, so generated lines
    // keep the numbers their source map gives them.
    const js = `(function (exports, require${
      parameters.map((name) => `, ${name}`).join("")
    }) {${script.js.replace(SOURCE_MAPPING_URL, "\n")}})\n//# sourceURL=${
      script.filename ?? "cell.js"
    }`;
    return this.#isolate.execute({ ...script, js }, mapper);
  }

  require(specifier: string): unknown {
    if (this.#loaded.has(specifier)) {
      return this.#loaded.get(specifier);
    }
    const runtimeModule = this.#modules[specifier];
    if (!runtimeModule) {
      throw new Error(`Cannot find module '${specifier}'`);
    }
    logger.debug(() => `Loading runtime module ${specifier}`);
    const exports = runtimeModule.load();
    this.#loaded.set(specifier, exports);
    return exports;
  }

  // Drops the source map of a script defined before.
  release(filename: string) {
    this.#isolate.forget(filename);
  }

  clear() {
    this.#loaded.clear();
  }
}

/**
 * An evaluated cell. Its exports are the cell's top-level declarations.
 */
export class CellInstance {
  constructor(
    readonly compiled: CompiledCell,
    readonly exports: Record<string, unknown>,
  ) {}

  get cell(): CellUnit {
    return this.compiled.cell;
  }

  // Looks up a top-level value by name.
  field(name: string): { value: unknown } | undefined {
    if (!Object.prototype.hasOwnProperty.call(this.exports, name)) {
      logger.debug(() => `${this.cell.name} has no field ${name}`);
      return undefined;
    }
    return { value: this.exports[name] };
  }
}

export interface CompiledCellInit {
  readonly cell: CellUnit;
  readonly script: JsScript;
  readonly diagnostics: readonly CellDiagnostic[];
  readonly loader: CellLoader;
  readonly mapper?: CellPositionMapper;
}

/**
 * A cell compiled to a CommonJS module. Instantiating it runs the module
 * against instances of its prior cells and values for its inputs.
 */
export class CompiledCell {
  readonly cell: CellUnit;
  readonly script: JsScript;
  // Non-error diagnostics of the compilation.
  readonly diagnostics: readonly CellDiagnostic[];
  readonly #loader: CellLoader;
  readonly #mapper?: CellPositionMapper;
  #factory?: JsValue;

  constructor(init: CompiledCellInit) {
    this.cell = init.cell;
    this.script = init.script;
    this.diagnostics = init.diagnostics;
    this.#loader = init.loader;
    this.#mapper = init.mapper;
  }

  get typeName(): string {
    return this.cell.typeName;
  }

  /**
   * Runs the cell. Prior instances, inputs and implicit inputs are given in
   * the order the cell declares them.
   */
  instantiate(
    priorInstances: readonly CellInstance[] = [],
    inputs: readonly unknown[] = [],
    implicitInputs: readonly unknown[] = [],
  ): CellInstance {
    const { priorCells, nonImplicitInputs, implicitInputs: implicits } =
      this.cell;
    if (
      priorInstances.length !== priorCells.length ||
      priorInstances.some((instance, index) =>
        instance.cell !== priorCells[index]
      )
    ) {
      throw new CellStateError(
        `${this.cell.name} expects instances of ${
          priorCells.map((cell) => cell.name).join(", ") || "no prior cells"
        }.`,
      );
    }
    if (
      inputs.length !== nonImplicitInputs.length ||
      implicitInputs.length !== implicits.length
    ) {
      throw new CellStateError(
        `${this.cell.name} expects ${nonImplicitInputs.length} inputs and ${implicits.length} implicit inputs.`,
      );
    }

    const priors = new Map(
      priorInstances.map((instance) => [
        cellModuleSpecifier(instance.cell.typeName),
        instance.exports,
      ]),
    );
    const require = (specifier: string): unknown =>
      priors.has(specifier)
        ? priors.get(specifier)
        : this.#loader.require(specifier);
    const exports: Record<string, unknown> = {};
    this.#factory ??= this.#loader.define(
      this.script,
      [...nonImplicitInputs, ...implicits].map(({ name }) => name),
      this.#mapper,
    );
    this.#factory.invoke(exports, require, ...inputs, ...implicitInputs);
    return new CellInstance(this, exports);
  }
}
