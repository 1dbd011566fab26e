export {
  CellDiagnostic,
  type CellDiagnosticType,
  CellStateError,
  CompilerError,
  type DiagnosticDetails,
  type DiagnosticSeverity,
  IMPLICIT_NOT_FOUND_CODE,
  ToolchainError,
} from "./errors.ts";
export { renderInline } from "./render.ts";
