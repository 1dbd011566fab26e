export {
  type BuildOptions,
  CellCompiler,
  type CellCompilerOptions,
  type CellPhase,
  DEFAULT_NOTEBOOK_PACKAGE,
  type ImplicitScope,
  type StatementTransform,
} from "./compiler.ts";
export { CellUnit, isPublicName, type TopLevelName } from "./cell.ts";
export { type ImportStatement, importedNames, Imports } from "./imports.ts";
export type {
  CellInput,
  ImplicitValue,
  JsScript,
  OutputDeclaration,
  RuntimeModule,
  SourceMap,
} from "./interface.ts";
export { CellInstance, CompiledCell } from "./runtime/loader.ts";
export * from "./typescript/diagnostics/mod.ts";
export { getCompilerOptions } from "./typescript/options.ts";
export {
  type CellWrapper,
  synthesizeWrapper,
} from "./typescript/wrapper.ts";
