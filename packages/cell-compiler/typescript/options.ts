import ts, { type CompilerOptions } from "typescript";

export const TARGET_TYPE_LIB = "es2022";
export const MODULE_KIND = ts.ModuleKind.CommonJS;
export const TARGET = ts.ScriptTarget.ES2022;

// Virtual directory holding ambient declarations every cell sees.
export const VFS_TYPES_DIR = "/$types/";
// Virtual directory holding the declarations of runtime modules.
export const VFS_MODULES_DIR = "/$modules/";

export const ENVIRONMENT_TYPES_FILE = `${VFS_TYPES_DIR}environment.d.ts`;

// `lib.es2022` carries no host APIs; cells run on Node's globals.
export const ENVIRONMENT_TYPES = `interface Console {
  log(...data: unknown[]): void;
  info(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;
  debug(...data: unknown[]): void;
}
declare var console: Console;
`;

export const getCompilerOptions = (): CompilerOptions => {
  return {
    /**
     * Typechecking
     */

    strict: true,
    strictNullChecks: true,
    strictFunctionTypes: true,

    /**
     * Module
     */

    // Every cell is its own module; the runtime loader hands each module
    // `exports` and a `require` that resolves prior cells to their instances.
    module: MODULE_KIND,
    // Automatic `@types` inclusion would walk a real node_modules.
    types: [],

    /**
     * Emit
     */

    removeComments: true,
    noEmitOnError: false,
    declaration: false,
    skipLibCheck: true,
    sourceMap: true,
    inlineSources: true,
    inlineSourceMap: false,

    /**
     * Interop
     */

    forceConsistentCasingInFileNames: true,
    esModuleInterop: true,
    isolatedModules: false,

    /**
     * Language and Environment
     */

    target: TARGET,
    lib: [`lib.${TARGET_TYPE_LIB}.d.ts`],
  };
};
