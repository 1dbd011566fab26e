import ts, { type Diagnostic, type DiagnosticMessageChain } from "typescript";
import { renderInline } from "./render.ts";

// Diagnostic code reported when `implicitly<T>()` finds no candidate.
export const IMPLICIT_NOT_FOUND_CODE = 90_001;

export type CellDiagnosticType =
  | "MODULE_NOT_FOUND"
  | "IMPLICIT_NOT_FOUND"
  | "ERROR";

export type DiagnosticSeverity = "error" | "warning" | "suggestion" | "message";

export interface DiagnosticDetails {
  readonly diagnostic: Diagnostic;
  // Name of the cell the diagnostic belongs to.
  readonly cell: string;
  // The cell's own source text.
  readonly source: string;
  // Offset of the diagnostic within `source`, when it points into the cell's
  // own code rather than synthesized code.
  readonly start?: number;
}

const SEVERITIES: Record<ts.DiagnosticCategory, DiagnosticSeverity> = {
  [ts.DiagnosticCategory.Error]: "error",
  [ts.DiagnosticCategory.Warning]: "warning",
  [ts.DiagnosticCategory.Suggestion]: "suggestion",
  [ts.DiagnosticCategory.Message]: "message",
};

/**
 * A toolchain diagnostic positioned within the source of the cell that
 * produced it.
 */
export class CellDiagnostic {
  readonly cell: string;
  readonly source: string;
  readonly message: string;
  readonly type: CellDiagnosticType;
  readonly severity: DiagnosticSeverity;
  readonly code: number;
  readonly start?: number;
  readonly length?: number;
  // 1-based
  readonly line?: number;
  readonly column?: number;

  constructor({ diagnostic, cell, source, start }: DiagnosticDetails) {
    const { message, type } = parseMessage(
      diagnostic.messageText,
      diagnostic.code,
    );
    this.cell = cell;
    this.source = source;
    this.message = message;
    this.type = type;
    this.severity = SEVERITIES[diagnostic.category];
    this.code = diagnostic.code;

    if (start !== undefined) {
      const result = ts.getLineAndCharacterOfPosition({ text: source }, start);
      this.start = start;
      this.length = diagnostic.length;
      this.line = result.line + 1;
      this.column = result.character + 1;
    }
  }

  get isError(): boolean {
    return this.severity === "error";
  }

  display(): string {
    const location = this.line !== undefined && this.column !== undefined
      ? `:${this.line}:${this.column}`
      : "";
    return `[${this.type}] ${this.message} [${this.cell}${location}]`;
  }

  displayInline(): string {
    if (this.line === undefined || this.column === undefined) {
      return this.display();
    }
    const inline = renderInline({
      source: this.source,
      line: this.line,
      column: this.column,
      contextLines: 2,
    });
    return `${this.display()}\n${inline}`;
  }
}

function parseMessage(
  input: string | DiagnosticMessageChain,
  code: number,
): { type: CellDiagnosticType; message: string } {
  const message = ts.flattenDiagnosticMessageText(input, "\n");
  if (code === IMPLICIT_NOT_FOUND_CODE) {
    return { type: "IMPLICIT_NOT_FOUND", message };
  }
  const match = message.match(/^(Cannot find module '[^']*')/);
  if (match) {
    // Strip the moduleResolution hints TypeScript appends.
    return { type: "MODULE_NOT_FOUND", message: `${match[1]}.` };
  }
  return { type: "ERROR", message };
}

/**
 * Parse or type failure of a cell. Diagnostics keep the toolchain's order.
 */
export class CompilerError extends Error {
  override name = "CompilerError";
  readonly #diagnostics: readonly CellDiagnostic[];

  constructor(diagnostics: readonly CellDiagnostic[]) {
    super(diagnostics.map((d) => d.displayInline()).join("\n"));
    this.#diagnostics = diagnostics;
  }

  get diagnostics(): readonly CellDiagnostic[] {
    return this.#diagnostics;
  }
}

/**
 * A cell was used in a way its lifecycle forbids, e.g. compiled twice or
 * compiled after being pruned. This is a bug in the caller.
 */
export class CellStateError extends Error {
  override name = "CellStateError";
}

/**
 * The toolchain was misused: a task scheduled from inside another task, or
 * work submitted after `dispose()`.
 */
export class ToolchainError extends Error {
  override name = "ToolchainError";
}
