/**
 * Build a string table from delimited plain text.
 */

import fs from "node:fs";
import { TABWRAP_CONFIG } from "../config.js";
import { EmptyTableError, InputReadError } from "../errors.js";
import type { ReadOptions } from "../types/index.js";
import { decodeEscapes } from "../utils/escape.js";
import { Table } from "./table.js";

export const DEFAULT_READ_OPTIONS: ReadOptions = {
  separator: TABWRAP_CONFIG.DEFAULT_SEPARATOR,
  backslashEscape: false,
};

function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split("\n");
  // A trailing newline terminates the last line rather than starting a new one
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Parse `text` into a table. Rows with fewer fields are padded with empty
 * cells to the widest row.
 */
export function readTable(text: string, options: ReadOptions = DEFAULT_READ_OPTIONS): Table<string> {
  const rows = splitLines(text).map((line) => {
    if (line.length === 0) return [];
    const fields = line.split(options.separator);
    return options.backslashEscape ? fields.map(decodeEscapes) : fields;
  });

  const maxFields = rows.reduce((max, row) => Math.max(max, row.length), 0);
  if (maxFields === 0) {
    throw new EmptyTableError();
  }

  const padded = rows.map((row) => [...row, ...new Array<string>(maxFields - row.length).fill("")]);
  return Table.fromRows(padded);
}

/**
 * Read the whole input, from `filename` or from stdin.
 */
export async function readInput(filename?: string): Promise<string> {
  try {
    if (filename !== undefined) {
      return await fs.promises.readFile(filename, "utf-8");
    }
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks).toString("utf-8");
  } catch (error) {
    throw new InputReadError(error);
  }
}
