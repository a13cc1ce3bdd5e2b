/**
 * Greedy word wrapping measured with string-width.
 *
 * A line may break at a run of spaces, after a hyphen between two letters or
 * digits, and before or after a CJK character (Han, kana, Hangul), except
 * before closing punctuation or small kana and after an opening bracket.
 * With `breakWords` set, wrap-ansi cuts pieces wider than the line.
 */

import stringWidth from "string-width";
import wrapAnsi from "wrap-ansi";
import type { WrapOptions } from "../types/index.js";

interface Fragment {
  text: string;
  width: number;
  /** Spaces after the fragment, printed only when another fragment follows on its line */
  gap: number;
}

const graphemes = new Intl.Segmenter(undefined, { granularity: "grapheme" });

const CJK = /^[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}]/u;
const NO_BREAK_BEFORE = /^[、。，．：；！？）」』】〕〉》ー々ゝゞ・ぁぃぅぇぉっゃゅょゎァィゥェォッャュョヮヵヶ]/u;
const NO_BREAK_AFTER = /^[（「『【〔〈《]/u;
const ALPHANUMERIC = /^[\p{L}\p{N}]/u;
// Words made of these never contain a break opportunity
const PLAIN_WORD = /^[!-,.-~]*$/;

export function displayWidth(text: string): number {
  return stringWidth(text);
}

function canBreakBetween(before: string | undefined, left: string, right: string): boolean {
  if (left === "-") {
    return before !== undefined && ALPHANUMERIC.test(before) && ALPHANUMERIC.test(right);
  }
  if (!CJK.test(left) && !CJK.test(right)) return false;
  return !NO_BREAK_BEFORE.test(right) && !NO_BREAK_AFTER.test(left);
}

/**
 * Cut a space-free word at its break opportunities.
 */
function splitWord(word: string): string[] {
  if (PLAIN_WORD.test(word)) return [word];
  const pieces: string[] = [];
  let piece = "";
  let before: string | undefined;
  let left: string | undefined;
  for (const { segment } of graphemes.segment(word)) {
    if (left !== undefined && canBreakBetween(before, left, segment)) {
      pieces.push(piece);
      piece = "";
    }
    piece += segment;
    before = left;
    left = segment;
  }
  pieces.push(piece);
  return pieces;
}

/**
 * Fragments of one line without newlines. Leading spaces are dropped.
 */
function fragmentsOf(line: string): Fragment[] {
  const fragments: Fragment[] = [];
  for (const [, word = "", spaces = ""] of line.matchAll(/([^ ]+)( *)/g)) {
    const pieces = splitWord(word);
    pieces.forEach((text, k) => {
      fragments.push({ text, width: stringWidth(text), gap: k === pieces.length - 1 ? spaces.length : 0 });
    });
  }
  return fragments;
}

function breakLongFragments(fragments: readonly Fragment[], width: number): Fragment[] {
  if (width < 1) return [...fragments];
  return fragments.flatMap((fragment) => {
    if (fragment.width <= width) return [fragment];
    const pieces = wrapAnsi(fragment.text, width, { hard: true, trim: false, wordWrap: false })
      .split("\n")
      .filter((text) => text.length > 0);
    return pieces.map((text, k) => ({
      text,
      width: stringWidth(text),
      gap: k === pieces.length - 1 ? fragment.gap : 0,
    }));
  });
}

/**
 * First fit: each fragment goes on the current line if it fits, else starts
 * the next one. A fragment wider than the line gets a line of its own.
 */
function fillLines(fragments: readonly Fragment[], width: number): string[] {
  const lines: string[] = [];
  let line: string | undefined;
  let lineWidth = 0;
  let gap = 0;
  for (const fragment of fragments) {
    if (line !== undefined && lineWidth + gap + fragment.width <= width) {
      line += " ".repeat(gap) + fragment.text;
      lineWidth += gap + fragment.width;
    } else {
      if (line !== undefined) lines.push(line);
      line = fragment.text;
      lineWidth = fragment.width;
    }
    gap = fragment.gap;
  }
  lines.push(line ?? "");
  return lines;
}

/**
 * Wrap `text` into lines of at most `options.width` columns. Pieces longer
 * than the width overflow their line unless `breakWords` is set. Embedded
 * newlines always break; a blank text wraps to a single empty line.
 */
export function wrapText(text: string, options: Readonly<WrapOptions>): string[] {
  return text
    .normalize()
    .replaceAll("\r\n", "\n")
    .split("\n")
    .flatMap((line) => {
      const fragments = fragmentsOf(line);
      return fillLines(options.breakWords ? breakLongFragments(fragments, options.width) : fragments, options.width);
    });
}

/**
 * Dry run of wrapText(): the display width of each wrapped line.
 */
export function tryWrap(text: string, options: Readonly<WrapOptions>): number[] {
  return wrapText(text, options).map(displayWidth);
}
