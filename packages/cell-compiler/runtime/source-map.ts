import type { SourceMap } from "../interface.ts";
import { type MappedPosition, SourceMapConsumer } from "source-map-js";

// Parses stack lines of evaluated cells into function, filename, line and
// column:
/// ```
// at eval (Cell$2.js:4:15)
// at Object.eval [as factory] (Cell$2.js, <anonymous>:4:52)
/// ```
const stackTracePattern =
  /at ([a-zA-Z\.$]*) (?:\[as [a-zA-Z]+\] )?\((.+?)(?:, <anonymous>)?(?:\):|\:)(\d+):(\d+)\)/;
const UNMAPPED = `    at <UNMAPPED>`;

/**
 * Maps a generated position back to a position in the cell source, or
 * `undefined` when it lies in synthesized code.
 */
export type CellPositionMapper = (
  line: number,
  column: number,
) => { source: string; line: number; column: number } | undefined;

export class SourceMapParser {
  private sourceMaps = new Map<string, SourceMap>();
  private consumers = new Map<string, SourceMapConsumer>();
  private mappers = new Map<string, CellPositionMapper>();

  load(filename: string, sourceMap: SourceMap, mapper?: CellPositionMapper) {
    this.sourceMaps.set(filename, sourceMap);
    if (mapper) {
      this.mappers.set(filename, mapper);
    } else {
      this.mappers.delete(filename);
    }
    this.consumers.delete(filename);
  }

  unload(filename: string) {
    this.sourceMaps.delete(filename);
    this.consumers.delete(filename);
    this.mappers.delete(filename);
  }

  // Rewrites stack traces of evaluated cells. Node observes the `sourceURL`
  // of evaluated code but not its source map, so the former selects the map
  // to apply here.
  parse(stack: string): string {
    return stack.split("\n").map((line) => {
      const match = line.match(stackTracePattern);
      if (!match) {
        return line;
      }
      const [, fnName, filename, lineText, columnText] = match;
      const consumer = this.getConsumer(filename);
      if (!consumer) {
        return line;
      }

      const originalPosition = consumer.originalPositionFor({
        line: parseInt(lineText, 10),
        column: parseInt(columnText, 10),
      });
      if (mapIsEmpty(originalPosition)) {
        return UNMAPPED;
      }

      const mapper = this.mappers.get(filename);
      const cellPosition = mapper?.(
        originalPosition.line,
        originalPosition.column,
      );
      if (cellPosition) {
        return `    at ${fnName} (${cellPosition.source}:${cellPosition.line}:${cellPosition.column})`;
      }
      return `    at ${fnName} (${originalPosition.source}:${originalPosition.line}:${originalPosition.column})`;
    }).join("\n");
  }

  private getConsumer(filename: string): SourceMapConsumer | undefined {
    const existing = this.consumers.get(filename);
    if (existing) {
      return existing;
    }
    const sourceMap = this.sourceMaps.get(filename);
    if (!sourceMap) {
      return undefined;
    }
    const consumer = new SourceMapConsumer(sourceMap);
    this.consumers.set(filename, consumer);
    return consumer;
  }
}

function mapIsEmpty(position: MappedPosition): boolean {
  return position.source === null && position.line === null &&
    position.column === null;
}

export const isSourceMap = (value: unknown): value is SourceMap =>
  !!(value && typeof value === "object" &&
    "version" in value && value.version === "3" &&
    "file" in value && typeof value.file === "string" &&
    "sources" in value && Array.isArray(value.sources) &&
    "names" in value && Array.isArray(value.names) &&
    "mappings" in value && typeof value.mappings === "string");

// Parses string as a `SourceMap`, or throws if unable.
export function parseSourceMap(stringMap: string): SourceMap {
  const sourceMap: unknown = JSON.parse(stringMap);
  if (sourceMap && typeof sourceMap === "object" && "version" in sourceMap) {
    // TypeScript generates `version` as an integer, but `source-map-js`'s
    // `RawSourceMap` expects a string.
    sourceMap.version = `${sourceMap.version}`;
  }
  if (!isSourceMap(sourceMap)) {
    throw new Error(
      `Could not parse source map: ${JSON.stringify(sourceMap, null, 2)}`,
    );
  }
  return sourceMap;
}
