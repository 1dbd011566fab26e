import type {
  CompilerHost,
  CompilerOptions,
  CreateSourceFileOptions,
  Diagnostic,
  ModuleResolutionHost,
  ResolvedModuleWithFailedLookupLocations,
  ScriptTarget,
  SourceFile,
  StringLiteralLike,
} from "typescript";
import ts from "typescript";
import * as path from "pathe";
import { getLogger } from "@cellchain/utils/logger";
import {
  ENVIRONMENT_TYPES,
  ENVIRONMENT_TYPES_FILE,
  TARGET,
  VFS_MODULES_DIR,
} from "./options.ts";

const DEBUG_VIRTUAL_FS = false;

const vfsLogger = getLogger("virtualfs", {
  enabled: DEBUG_VIRTUAL_FS,
  level: "debug",
});

// Lib declarations never change within a process, so every program shares
// their parsed source files.
const libSourceFiles = new Map<string, SourceFile>();

/**
 * In-memory files of a session. The bundled `lib.*.d.ts` declarations are
 * read from the installed `typescript` package.
 */
export class VirtualFs implements ModuleResolutionHost {
  protected readonly libDirectory: string;
  private readonly files = new Map<string, string>();
  private readonly sourceFiles = new Map<string, SourceFile>();
  private writes = new Map<string, string>();

  constructor(options: CompilerOptions) {
    this.libDirectory = path.dirname(ts.getDefaultLibFilePath(options));
  }

  register(fileName: string, content: string) {
    vfsLogger.debug(() => `register - ${fileName} (${content.length} chars)`);
    this.files.set(fileName, content);
    this.sourceFiles.delete(fileName);
  }

  unregister(fileName: string) {
    vfsLogger.debug(() => `unregister - ${fileName}`);
    this.files.delete(fileName);
    this.sourceFiles.delete(fileName);
  }

  isRegistered(fileName: string): boolean {
    return this.files.has(fileName);
  }

  clear() {
    this.files.clear();
    this.sourceFiles.clear();
    this.writes.clear();
  }

  writeFile(fileName: string, content: string) {
    vfsLogger.debug(() => `writeFile - ${fileName} (${content.length} chars)`);
    this.writes.set(fileName, content);
  }

  // Returns the files written since the last call.
  takeWrites(): Map<string, string> {
    const writes = this.writes;
    this.writes = new Map();
    return writes;
  }

  getCurrentDirectory(): string {
    return "/";
  }

  getDirectories(_path: string): string[] {
    throw new Error("getDirectories() not implemented.");
  }

  fileExists(fileName: string): boolean {
    const exists = this.files.has(fileName) ||
      (this.isLibFile(fileName) && ts.sys.fileExists(fileName));
    vfsLogger.debug(() => `fileExists - ${fileName}: ${exists}`);
    return exists;
  }

  readFile(fileName: string): string | undefined {
    const content = this.files.get(fileName) ??
      (this.isLibFile(fileName) ? ts.sys.readFile(fileName) : undefined);
    vfsLogger.debug(() =>
      `readFile - ${fileName}: ${
        content !== undefined ? content.length + " chars" : "not found"
      }`
    );
    return content;
  }

  useCaseSensitiveFileNames() {
    return true;
  }

  protected isLibFile(fileName: string): boolean {
    return fileName.startsWith(`${this.libDirectory}/`);
  }

  protected cachedSourceFile(
    fileName: string,
    languageVersion: ScriptTarget | CreateSourceFileOptions,
  ): SourceFile | undefined {
    const cache = this.isLibFile(fileName) ? libSourceFiles : this.sourceFiles;
    const cached = cache.get(fileName);
    if (cached) {
      return cached;
    }
    const text = this.readFile(fileName);
    if (text === undefined) {
      return undefined;
    }
    const sourceFile = ts.createSourceFile(
      fileName,
      text,
      languageVersion,
      true,
    );
    cache.set(fileName, sourceFile);
    return sourceFile;
  }
}

/**
 * Compiler host over a session's `VirtualFs`. Relative specifiers resolve to
 * cell modules next to the importing cell; bare specifiers resolve to the
 * declarations of runtime modules.
 */
export class ToolchainHost extends VirtualFs implements CompilerHost {
  private readonly runtimeModules: readonly string[];

  constructor(
    options: CompilerOptions,
    runtimeModules: Record<string, string>,
  ) {
    super(options);
    this.runtimeModules = Object.keys(runtimeModules);
    this.register(ENVIRONMENT_TYPES_FILE, ENVIRONMENT_TYPES);
    for (const [name, types] of Object.entries(runtimeModules)) {
      this.register(runtimeModuleFileName(name), types);
    }
  }

  getDefaultLibFileName(options: CompilerOptions): string {
    return ts.getDefaultLibFilePath(options);
  }

  getDefaultLibLocation(): string {
    return this.libDirectory;
  }

  getEnvironmentVariable(_name: string): string | undefined {
    return undefined;
  }

  getCanonicalFileName(fileName: string): string {
    return fileName;
  }

  getNewLine() {
    return "\n";
  }

  getSourceFile(
    fileName: string,
    languageVersion: ScriptTarget | CreateSourceFileOptions,
    _onError?: (message: string) => void,
  ): SourceFile | undefined {
    return this.cachedSourceFile(fileName, languageVersion);
  }

  resolveModuleNameLiterals(
    moduleLiterals: readonly StringLiteralLike[],
    containingFile: string,
  ): readonly ResolvedModuleWithFailedLookupLocations[] {
    return moduleLiterals.map((literal) => {
      const name = literal.text;
      if (name[0] === "." || name[0] === "/") {
        const resolved = `${
          path.join(path.dirname(containingFile), name)
        }.ts`;
        return this.fileExists(resolved)
          ? {
            resolvedModule: {
              resolvedFileName: resolved,
              extension: ts.Extension.Ts,
            },
          }
          : { resolvedModule: undefined };
      }
      // Runtime modules have declarations only; their implementation is
      // supplied when a cell is instantiated.
      if (this.runtimeModules.includes(name)) {
        return {
          resolvedModule: {
            resolvedFileName: runtimeModuleFileName(name),
            extension: ts.Extension.Dts,
            isExternalLibraryImport: true,
            packageId: undefined,
          },
        };
      }
      return { resolvedModule: undefined };
    });
  }
}

export function runtimeModuleFileName(name: string): string {
  return `${VFS_MODULES_DIR}${name}.d.ts`;
}

export interface ParsedSource {
  readonly sourceFile: SourceFile;
  readonly diagnostics: readonly Diagnostic[];
}

class ParseHost extends VirtualFs implements CompilerHost {
  constructor(private readonly sourceFile: SourceFile) {
    super({});
  }

  getSourceFile(fileName: string): SourceFile | undefined {
    return fileName === this.sourceFile.fileName ? this.sourceFile : undefined;
  }

  getDefaultLibFileName(): string {
    return "lib.d.ts";
  }

  getCanonicalFileName(fileName: string): string {
    return fileName;
  }

  getNewLine() {
    return "\n";
  }
}

/**
 * Parses cell source on its own. Syntax errors are reported by a program
 * holding only this file, with neither libs nor imports resolved.
 */
export function parseSource(fileName: string, text: string): ParsedSource {
  const sourceFile = ts.createSourceFile(fileName, text, TARGET, true);
  const program = ts.createProgram({
    rootNames: [fileName],
    options: { noLib: true, noResolve: true, target: TARGET },
    host: new ParseHost(sourceFile),
  });
  return {
    sourceFile,
    diagnostics: program.getSyntacticDiagnostics(sourceFile),
  };
}
