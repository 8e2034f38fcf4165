/**
 * Debug logging: bracket-prefixed console lines, silent unless enabled.
 */

export type DebugLog = (message: string) => void;

/**
 * Create a logger that prints `[prefix] message` when `enabled` is true and
 * does nothing otherwise.
 */
export function createDebugLog(prefix: string, enabled: boolean): DebugLog {
  if (!enabled) {
    return () => {};
  }
  return (message) => {
    console.log(`[${prefix}] ${message}`);
  };
}
