/**
 * `echo -e` style backslash escape decoding for input fields.
 */

import { InvalidInputError } from "../errors.js";

type Base = 8 | 16;

const MAX_DIGITS: Record<Base, number> = { 8: 3, 16: 2 };

const SIMPLE_ESCAPES: Record<string, string> = {
  "\\": "\\",
  a: "\x07",
  b: "\x08",
  e: "\x1b",
  f: "\x0c",
  n: "\n",
  r: "\r",
  t: "\t",
  v: "\x0b",
};

const encoder = new TextEncoder();

function digitValue(char: string | undefined, base: Base): number | undefined {
  if (char === undefined) return undefined;
  const value = parseInt(char, base);
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Parse up to MAX_DIGITS[base] digits starting at `pos`. Values past 255 wrap,
 * as GNU echo does.
 */
function parseCode(chars: string[], pos: number, base: Base): { byte: number; next: number } | undefined {
  let value = digitValue(chars[pos], base);
  if (value === undefined) return undefined;
  let next = pos + 1;
  for (let n = 1; n < MAX_DIGITS[base]; n++) {
    const digit = digitValue(chars[next], base);
    if (digit === undefined) break;
    value = (value * base + digit) & 0xff;
    next++;
  }
  return { byte: value, next };
}

/**
 * Decode escapes in one field. Numeric escapes produce raw bytes, so the
 * result must still be valid UTF-8.
 */
export function decodeEscapes(input: string): string {
  const chars = Array.from(input);
  const bytes: number[] = [];
  const emit = (text: string): void => {
    bytes.push(...encoder.encode(text));
  };

  let i = 0;
  scan: while (i < chars.length) {
    const c = chars[i++] ?? "";
    if (c !== "\\") {
      emit(c);
      continue;
    }

    const peek = chars[i];
    if (peek !== undefined && peek >= "1" && peek <= "7") {
      const parsed = parseCode(chars, i, 8);
      if (parsed) {
        bytes.push(parsed.byte);
        i = parsed.next;
        continue;
      }
    }

    const next = chars[i++];
    if (next === undefined) {
      emit("\\");
      break;
    }
    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      emit(simple);
      continue;
    }
    switch (next) {
      case "c":
        break scan;
      case "x": {
        const parsed = parseCode(chars, i, 16);
        if (parsed) {
          bytes.push(parsed.byte);
          i = parsed.next;
        } else {
          emit("\\x");
        }
        break;
      }
      case "0": {
        const parsed = parseCode(chars, i, 8);
        if (parsed) {
          bytes.push(parsed.byte);
          i = parsed.next;
        } else {
          bytes.push(0);
        }
        break;
      }
      default:
        emit(`\\${next}`);
    }
  }

  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(Uint8Array.from(bytes));
  } catch (error) {
    throw new InvalidInputError(error instanceof Error ? error.message : String(error), error);
  }
}
