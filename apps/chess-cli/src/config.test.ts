import { describe, expect, it } from "vitest";
import { ZodError } from "zod";

import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({ glyphs: "unicode", logLevel: "warn" });
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ CHESS_GLYPHS: " ", CHESS_LOG_LEVEL: "" })).toEqual({
      glyphs: "unicode",
      logLevel: "warn"
    });
  });

  it("reads values case-insensitively", () => {
    expect(loadConfig({ CHESS_GLYPHS: "ASCII", CHESS_LOG_LEVEL: "Debug" })).toEqual({
      glyphs: "ascii",
      logLevel: "debug"
    });
  });

  it("rejects unknown values", () => {
    expect(() => loadConfig({ CHESS_GLYPHS: "emoji" })).toThrow(ZodError);
    expect(() => loadConfig({ CHESS_LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });
});
