/**
 * Wrap options whose width is overwritten per candidate, so the planner reuses a
 * single options object instead of building one for every candidate width.
 */

import type { WrapOptions } from "../types/index.js";

export class WrapOptionsVarWidths {
  private readonly inner: WrapOptions;

  constructor(options: Partial<WrapOptions> = {}) {
    this.inner = {
      // Placeholder, replaced by every asWidth() call
      width: options.width ?? 79,
      breakWords: options.breakWords ?? false,
    };
  }

  /**
   * Set the width and return the shared options object.
   */
  asWidth(width: number): Readonly<WrapOptions> {
    this.inner.width = width;
    return this.inner;
  }

  get breakWords(): boolean {
    return this.inner.breakWords;
  }
}
