// Console logging for builders and generators.
import { isDebugEnabled } from "./config";

function format(scope: string, message: string): string {
  return `[FIXTURES:${scope}] ${message}`;
}

/**
 * Writes a debug line when FIXTURES_DEBUG is on. Checked per call so tests can toggle it.
 */
export function debug(scope: string, message: string, details?: Record<string, unknown>): void {
  if (!isDebugEnabled()) {
    return;
  }
  if (details) {
    console.log(format(scope, message), details);
  } else {
    console.log(format(scope, message));
  }
}

/**
 * Writes a warning regardless of FIXTURES_DEBUG.
 */
export function warn(scope: string, message: string): void {
  console.warn(format(scope, message));
}
