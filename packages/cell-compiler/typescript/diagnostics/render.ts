export interface ErrorRenderLocation {
  line: number;
  column: number;
  source: string;
}

export interface ErrorRenderInlineConfig extends ErrorRenderLocation {
  // The number of lines before and after the failing
  // line to render.
  contextLines: number;
}

function renderLine(
  line: number | string,
  content: string,
  lineNumPad: number,
) {
  return `${String(line).padStart(lineNumPad, " ")} | ${content}\n`;
}

// Renders the failing line of a cell with its neighbours and a caret under
// the failing column. `line` and `column` are 1-based.
//
// ```
// 1 | const a = 1;
// 2 | const b: string = a;
//   |       ^
// ```
export function renderInline(
  { contextLines, line, source, column }: ErrorRenderInlineConfig,
): string {
  const lines = source.split("\n");
  const targetLine = line - 1;
  const preambleLineStart = Math.max(targetLine - contextLines, 0);
  const postambleLineStart = targetLine + 1;
  const postambleLineEnd = Math.min(
    postambleLineStart + contextLines,
    lines.length,
  );
  const lineNumPad = Math.min(String(postambleLineEnd).length, 10);

  const preamble = lines.slice(preambleLineStart, targetLine).map((
    content,
    index,
  ) => renderLine(preambleLineStart + index + 1, content, lineNumPad));
  const postamble = lines.slice(postambleLineStart, postambleLineEnd).map((
    content,
    index,
  ) => renderLine(postambleLineStart + index + 1, content, lineNumPad));

  return [
    ...preamble,
    renderLine(line, lines[targetLine] ?? "", lineNumPad),
    renderLine("", `${" ".repeat(Math.max(column - 1, 0))}^`, lineNumPad),
    ...postamble,
  ].join("");
}
