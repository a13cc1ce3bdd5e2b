/**
 * The WIDTHS option: a comma separated list of widths where `*` leaves the
 * column to the planner.
 */

import { InvalidArgumentError } from "../errors.js";
import type { UserWidth } from "../types/index.js";

export function parseUserWidths(text: string | undefined): UserWidth[] {
  if (text === undefined) return [];
  return text.split(",").map((field) => {
    if (field === "*") return undefined;
    if (!/^\d+$/.test(field)) {
      throw new InvalidArgumentError(`width \`${field}\` is not a nonnegative integer`);
    }
    return parseInt(field, 10);
  });
}

/**
 * Pad with `*` or truncate to `ncols` entries, warning about either.
 */
export function normalizeUserWidths(
  widths: readonly UserWidth[],
  ncols: number,
  warn: (message: string) => void,
): UserWidth[] {
  if (widths.length < ncols) {
    // No widths at all means the option was left out, not mistyped
    if (widths.length > 0) {
      warn("Padding USER_WIDTHS with `*`");
    }
    return [...widths, ...new Array<UserWidth>(ncols - widths.length).fill(undefined)];
  }
  if (widths.length > ncols) {
    warn(`Truncating USER_WIDTHS to ncols=${ncols}`);
    return widths.slice(0, ncols);
  }
  return [...widths];
}
