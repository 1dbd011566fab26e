export function isNode(): boolean {
  return typeof process !== "undefined" && !!process.versions?.node;
}

/**
 * Reads an environment variable, returning `undefined` outside Node or when
 * the variable is unset or empty.
 */
export function getEnv(name: string): string | undefined {
  if (!isNode()) {
    return undefined;
  }
  const value = process.env[name];
  return value ? value : undefined;
}
