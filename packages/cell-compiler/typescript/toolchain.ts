import ts from "typescript";
import { getLogger } from "@cellchain/utils/logger";
import { Semaphore } from "@cellchain/utils/semaphore";
import { ToolchainError } from "./diagnostics/mod.ts";
import { ToolchainHost } from "./host.ts";
import { ENVIRONMENT_TYPES_FILE } from "./options.ts";
import { parseSourceMap } from "../runtime/source-map.ts";
import type { JsScript } from "../interface.ts";

const logger = getLogger("toolchain");

export interface ToolchainOptions {
  readonly compilerOptions: ts.CompilerOptions;
  // Runtime module name to the text of its declarations.
  readonly runtimeModules: Record<string, string>;
}

/**
 * The TypeScript compiler state of a session: registered cell modules, the
 * last program and the host they are read through.
 *
 * The compiler API is not reentrant, so all work touching this state runs as
 * a task on one serial queue. Tasks are synchronous; a task scheduling
 * another task is an error rather than a deadlock.
 */
export class Toolchain {
  readonly #queue = new Semaphore({ maxConcurrent: 1 });
  readonly #options: ts.CompilerOptions;
  readonly #host: ToolchainHost;
  #program?: ts.Program;
  #running = false;
  #disposed = false;

  constructor({ compilerOptions, runtimeModules }: ToolchainOptions) {
    this.#options = compilerOptions;
    this.#host = new ToolchainHost(compilerOptions, runtimeModules);
  }

  get disposed(): boolean {
    return this.#disposed;
  }

  /**
   * Queues `task` behind every task scheduled before it.
   */
  run<T>(task: () => T): Promise<T> {
    if (this.#running) {
      return Promise.reject(
        new ToolchainError("Toolchain task scheduled from inside a task."),
      );
    }
    return this.#queue.withPermit(() => {
      if (this.#disposed) {
        throw new ToolchainError("Toolchain has been disposed.");
      }
      this.#running = true;
      try {
        return task();
      } finally {
        this.#running = false;
      }
    });
  }

  register(fileName: string, text: string) {
    this.#assertRunning();
    this.#host.register(fileName, text);
  }

  unregister(fileName: string) {
    this.#assertRunning();
    this.#host.unregister(fileName);
  }

  isRegistered(fileName: string): boolean {
    this.#assertRunning();
    return this.#host.isRegistered(fileName);
  }

  /**
   * Creates a program rooted at the registered module `fileName`, reusing
   * what it can of the previous one.
   */
  typeCheck(fileName: string): ts.Program {
    this.#assertRunning();
    const program = ts.createProgram({
      rootNames: [ENVIRONMENT_TYPES_FILE, fileName],
      options: this.#options,
      host: this.#host,
      oldProgram: this.#program,
    });
    this.#program = program;
    logger.debug(() => [
      `Created program for ${fileName}`,
      `(${program.getSourceFiles().length} files)`,
    ]);
    return program;
  }

  /**
   * Emits `sourceFile` as a CommonJS module with its source map.
   */
  emit(
    program: ts.Program,
    sourceFile: ts.SourceFile,
    before: ts.TransformerFactory<ts.SourceFile>[],
  ): JsScript {
    this.#assertRunning();
    const result = program.emit(
      sourceFile,
      undefined,
      undefined,
      false,
      { before },
    );
    const writes = this.#host.takeWrites();
    const jsName = sourceFile.fileName.replace(/\.ts$/, ".js");
    const js = writes.get(jsName);
    if (result.emitSkipped || js === undefined) {
      throw new Error(`Emit of ${sourceFile.fileName} failed.`);
    }
    const map = writes.get(`${jsName}.map`);
    return {
      js,
      sourceMap: map !== undefined ? parseSourceMap(map) : undefined,
      filename: jsName.slice(jsName.lastIndexOf("/") + 1),
    };
  }

  // Drops all session state. Pending and later tasks fail.
  dispose() {
    this.#disposed = true;
    this.#program = undefined;
    this.#host.clear();
  }

  #assertRunning() {
    if (!this.#running) {
      throw new ToolchainError("Toolchain used outside of a task.");
    }
  }
}
