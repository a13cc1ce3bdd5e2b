/**
 * Shared type definitions
 */

/** A column width chosen by the user, or `undefined` for a column the planner decides. */
export type UserWidth = number | undefined;

export type LayoutName = "null" | "plain" | "grid_no_header" | "grid";

export type SearchStrategy = "bisect" | "exhaustive";

export interface ReadOptions {
  /** Field separator */
  separator: string;
  /** Decode `echo -e` style escapes in every field */
  backslashEscape: boolean;
}

export interface WrapOptions {
  /** Target line width; overwritten per candidate width by the planner */
  width: number;
  /** Break words longer than the width instead of letting them overflow */
  breakWords: boolean;
}
