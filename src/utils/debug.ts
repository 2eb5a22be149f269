/**
 * Debug output, enabled by SLASHKIT_DEBUG.
 */

export function isDebugEnabled(): boolean {
  const value = process.env.SLASHKIT_DEBUG;
  return value !== undefined && value !== '' && value !== '0' && value !== 'false';
}

export function debugLog(scope: string, message: string, detail?: unknown): void {
  if (!isDebugEnabled()) return;
  if (detail === undefined) {
    console.error(`[slashkit:${scope}] ${message}`);
  } else {
    console.error(`[slashkit:${scope}] ${message}`, detail);
  }
}
