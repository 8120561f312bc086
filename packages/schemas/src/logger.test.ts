import { describe, it, expect, vi, afterEach } from "vitest";
import { PrefixLogger, resolveLogLevel } from "./logger.js";

describe("PrefixLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages with the scope", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
    new PrefixLogger("dialogue", "debug").warn("policy failed", { turn: 2 });
    expect(spy).toHaveBeenCalledWith("[dialogue] policy failed", { turn: 2 });
  });

  it("drops messages below the threshold", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    new PrefixLogger("kb", "warn").info("ignored");
    expect(spy).not.toHaveBeenCalled();
  });

  it("sanitizes control characters in the scope", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    new PrefixLogger("a\nb", "error").error("boom");
    expect(spy).toHaveBeenCalledWith("[a_b] boom", "");
  });
});

describe("resolveLogLevel", () => {
  it("parses known levels case-insensitively", () => {
    expect(resolveLogLevel(" INFO ")).toBe("info");
  });

  it("falls back for unknown or missing values", () => {
    expect(resolveLogLevel("loud")).toBe("warn");
    expect(resolveLogLevel(undefined, "error")).toBe("error");
  });
});
