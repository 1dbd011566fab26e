import ts from "typescript";
import { describe, expect, it } from "vitest";
import {
  CellDiagnostic,
  CompilerError,
  IMPLICIT_NOT_FOUND_CODE,
  renderInline,
} from "../mod.ts";

const SOURCE = "const a = 1;\nconst b: string = a;\nconst c = 3;";

function diagnostic(
  overrides: Partial<ts.Diagnostic> = {},
): ts.Diagnostic {
  return {
    file: undefined,
    start: undefined,
    length: 1,
    category: ts.DiagnosticCategory.Error,
    code: 2322,
    messageText: "Type 'number' is not assignable to type 'string'.",
    ...overrides,
  };
}

describe("renderInline", () => {
  it("renders the failing line with context and a caret", () => {
    const rendered = renderInline({
      source: SOURCE,
      line: 2,
      column: 7,
      contextLines: 1,
    });

    expect(rendered).toBe(
      [
        "1 | const a = 1;",
        "2 | const b: string = a;",
        "  |       ^",
        "3 | const c = 3;",
        "",
      ].join("\n"),
    );
  });

  it("clips context at the start and end of the source", () => {
    const rendered = renderInline({
      source: "only();",
      line: 1,
      column: 1,
      contextLines: 2,
    });

    expect(rendered).toBe("1 | only();\n  | ^\n");
  });

  it("pads line numbers to the widest shown", () => {
    const source = Array.from({ length: 10 }, (_, i) => `line${i + 1}`).join(
      "\n",
    );

    const rendered = renderInline({
      source,
      line: 9,
      column: 2,
      contextLines: 1,
    });

    expect(rendered).toBe(
      [" 8 | line8", " 9 | line9", "   |  ^", "10 | line10", ""].join("\n"),
    );
  });
});

describe("CellDiagnostic", () => {
  it("positions a diagnostic within the cell source", () => {
    const cellDiagnostic = new CellDiagnostic({
      diagnostic: diagnostic(),
      cell: "Cell",
      source: SOURCE,
      start: 19,
    });

    expect(cellDiagnostic.type).toBe("ERROR");
    expect(cellDiagnostic.severity).toBe("error");
    expect(cellDiagnostic.isError).toBe(true);
    expect(cellDiagnostic.code).toBe(2322);
    expect(cellDiagnostic.start).toBe(19);
    expect(cellDiagnostic.length).toBe(1);
    expect(cellDiagnostic.line).toBe(2);
    expect(cellDiagnostic.column).toBe(7);
    expect(cellDiagnostic.displayInline()).toBe(
      [
        "[ERROR] Type 'number' is not assignable to type 'string'. [Cell:2:7]",
        "1 | const a = 1;",
        "2 | const b: string = a;",
        "  |       ^",
        "3 | const c = 3;",
        "",
      ].join("\n"),
    );
  });

  it("displays diagnostics without a position by cell name only", () => {
    const cellDiagnostic = new CellDiagnostic({
      diagnostic: diagnostic({ messageText: "Cannot find name 'Missing'." }),
      cell: "Cell",
      source: SOURCE,
    });

    expect(cellDiagnostic.line).toBeUndefined();
    expect(cellDiagnostic.length).toBeUndefined();
    expect(cellDiagnostic.displayInline()).toBe(
      "[ERROR] Cannot find name 'Missing'. [Cell]",
    );
  });

  it("shortens missing module messages", () => {
    const cellDiagnostic = new CellDiagnostic({
      diagnostic: diagnostic({
        code: 2307,
        messageText:
          "Cannot find module 'nowhere' or its corresponding type declarations.",
      }),
      cell: "Cell",
      source: SOURCE,
    });

    expect(cellDiagnostic.type).toBe("MODULE_NOT_FOUND");
    expect(cellDiagnostic.message).toBe("Cannot find module 'nowhere'.");
  });

  it("recognizes missing implicit values", () => {
    const cellDiagnostic = new CellDiagnostic({
      diagnostic: diagnostic({
        code: IMPLICIT_NOT_FOUND_CODE,
        messageText: "No implicit value found for type 'Show<number>'.",
      }),
      cell: "Cell",
      source: SOURCE,
    });

    expect(cellDiagnostic.type).toBe("IMPLICIT_NOT_FOUND");
  });

  it("flattens message chains", () => {
    const cellDiagnostic = new CellDiagnostic({
      diagnostic: diagnostic({
        messageText: {
          messageText: "Outer problem.",
          category: ts.DiagnosticCategory.Error,
          code: 2322,
          next: [{
            messageText: "Inner problem.",
            category: ts.DiagnosticCategory.Error,
            code: 2322,
          }],
        },
      }),
      cell: "Cell",
      source: SOURCE,
    });

    expect(cellDiagnostic.message).toBe("Outer problem.\n  Inner problem.");
  });

  it("maps categories to severities", () => {
    const warning = new CellDiagnostic({
      diagnostic: diagnostic({ category: ts.DiagnosticCategory.Warning }),
      cell: "Cell",
      source: SOURCE,
    });

    expect(warning.severity).toBe("warning");
    expect(warning.isError).toBe(false);
  });
});

describe("CompilerError", () => {
  it("carries its diagnostics and renders them as its message", () => {
    const diagnostics = [
      new CellDiagnostic({
        diagnostic: diagnostic({ messageText: "First." }),
        cell: "Cell",
        source: SOURCE,
      }),
      new CellDiagnostic({
        diagnostic: diagnostic({ messageText: "Second." }),
        cell: "Cell",
        source: SOURCE,
      }),
    ];

    const error = new CompilerError(diagnostics);

    expect(error.name).toBe("CompilerError");
    expect(error.diagnostics).toEqual(diagnostics);
    expect(error.message).toBe(
      "[ERROR] First. [Cell]\n[ERROR] Second. [Cell]",
    );
  });
});
