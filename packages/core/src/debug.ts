/**
 * Debug logging, gated on the `debug` configuration flag.
 */

import { config } from "./config.js";

export function isDebugEnabled(): boolean {
  return config.get("debug");
}

/**
 * Write a `[terse:<scope>]` line to the console when debug logging is on.
 */
export function debugLog(scope: string, message: string): void {
  if (!isDebugEnabled()) return;
  console.debug(`[terse:${scope}] ${message}`);
}
