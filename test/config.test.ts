import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TABWRAP_CONFIG } from "../src/config.js";
import { createDebugLogger, isDebugEnabled } from "../src/utils/debug.js";

describe("resolveTerminalWidth", () => {
  const { isTTY, columns } = process.stdout;

  beforeEach(() => {
    process.stdout.isTTY = false;
  });

  afterEach(() => {
    process.stdout.isTTY = isTTY;
    process.stdout.columns = columns;
    vi.unstubAllEnvs();
  });

  it("uses the terminal columns on a TTY", () => {
    process.stdout.isTTY = true;
    process.stdout.columns = 120;
    expect(TABWRAP_CONFIG.resolveTerminalWidth()).toBe(120);
  });

  it("falls back to COLUMNS", () => {
    vi.stubEnv("COLUMNS", "100");
    expect(TABWRAP_CONFIG.resolveTerminalWidth()).toBe(100);
  });

  it("falls back to 80 without a usable COLUMNS", () => {
    vi.stubEnv("COLUMNS", "wide");
    expect(TABWRAP_CONFIG.resolveTerminalWidth()).toBe(80);
  });
});

describe("debug logging", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("is enabled by TABWRAP_DEBUG", () => {
    vi.stubEnv("TABWRAP_DEBUG", "true");
    expect(isDebugEnabled()).toBe(true);
  });

  it("writes scoped messages to stderr when enabled", () => {
    vi.stubEnv("TABWRAP_DEBUG", "true");
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    createDebugLogger("ColumnPlanner").log("budget=3");
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0]?.[0]).toMatch(/^\[ColumnPlanner\] \d{4}-\d{2}-\d{2}T[\d:.]+Z: budget=3$/);
  });

  it("stays quiet when disabled", () => {
    vi.stubEnv("TABWRAP_DEBUG", "false");
    vi.stubEnv("NODE_ENV", "test");
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createDebugLogger("ColumnPlanner");
    logger.log("budget=3");
    expect(logger.enabled).toBe(false);
    expect(spy).not.toHaveBeenCalled();
  });
});
