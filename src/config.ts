// tabwrap configuration

import type { LayoutName } from "./types/index.js";

interface EnvNames {
  DEBUG: string;
  COLUMNS: string;
}

interface TabwrapConfiguration {
  DEFAULT_LAYOUT: LayoutName;
  DEFAULT_SEPARATOR: string;
  FALLBACK_TERMINAL_WIDTH: number;
  ENV: EnvNames;
  resolveTerminalWidth(): number;
}

export const TABWRAP_CONFIG: TabwrapConfiguration = {
  DEFAULT_LAYOUT: "grid_no_header",
  DEFAULT_SEPARATOR: "\t",
  FALLBACK_TERMINAL_WIDTH: 80,

  ENV: {
    DEBUG: "TABWRAP_DEBUG",
    COLUMNS: "COLUMNS",
  },

  resolveTerminalWidth(): number {
    if (process.stdout.isTTY && process.stdout.columns > 0) {
      return process.stdout.columns;
    }
    const fromEnv = process.env[this.ENV.COLUMNS];
    if (fromEnv && /^\d+$/.test(fromEnv)) {
      const columns = parseInt(fromEnv, 10);
      if (columns > 0) return columns;
    }
    return this.FALLBACK_TERMINAL_WIDTH;
  },
};
