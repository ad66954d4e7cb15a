import { log } from "@warlock.js/logger";
import { getDirectoryDebugLevel } from "../config";
import type { DebugLevel } from "../types";

const SEVERITY: Record<DebugLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
};

/**
 * Log the message when the configured debug level lets it through.
 */
export function debugLog(level: DebugLevel, module: string, action: string, message: string) {
  if (SEVERITY[level] > SEVERITY[getDirectoryDebugLevel()]) return;

  log[level](module, action, message);
}
