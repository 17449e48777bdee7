/**
 * Contract checks for menu primitives.
 *
 * These only run in development builds (`import.meta.env.DEV`); production
 * bundles drop the condition and never throw. Hosts that do not inject
 * `import.meta.env` (plain Node, other bundlers) skip the checks as well.
 */
export function assertMenuContract(condition: boolean, message: string): void {
  if (import.meta.env?.DEV && !condition) {
    throw new Error(message);
  }
}
