/**
 * Debug utilities, enabled by NODE_ENV=development or TABWRAP_DEBUG=true.
 * All output goes to stderr so it never mixes with the rendered table.
 */

import { TABWRAP_CONFIG } from "../config.js";

export function isDebugEnabled(): boolean {
  return process.env.NODE_ENV === "development" || process.env[TABWRAP_CONFIG.ENV.DEBUG] === "true";
}

const noop = (..._args: unknown[]): void => {};

export const debug = {
  log: isDebugEnabled() ? console.error.bind(console) : noop,
};

export interface DebugLogger {
  readonly enabled: boolean;
  log(message: string): void;
}

/**
 * Scoped logger; the flag is read once, when the logger is created.
 */
export function createDebugLogger(scope: string): DebugLogger {
  const enabled = isDebugEnabled();
  return {
    enabled,
    log(message: string): void {
      if (enabled) {
        console.error(`[${scope}] ${new Date().toISOString()}: ${message}`);
      }
    },
  };
}
