import { describe, it, expect } from "vitest";
import { validateBbcode } from "../src/validator.js";

describe("validateBbcode", () => {
  it("should report nothing for clean markup", () => {
    expect(validateBbcode("[b]ok[/b] [color=#fff]fine[/color]")).toEqual([]);
  });

  it("should list degraded constructs in document order", () => {
    expect(validateBbcode("[u]x[/u][b]").map((d) => [d.code, d.index])).toEqual([
      ["W_UNKNOWN_TAG", 0],
      ["W_UNCLOSED_TAG", 8]
    ]);
  });

  it("should keep earlier warnings when the parse fails", () => {
    const diagnostics = validateBbcode("[u]x[/u][b][i]x[/i][/b]", { maxDepth: 1 });
    expect(diagnostics.map((d) => [d.code, d.severity])).toEqual([
      ["W_UNKNOWN_TAG", "warn"],
      ["E_NEST_DEPTH", "error"]
    ]);
    expect(diagnostics[1].span).toEqual({ start: 11, end: 19 });
    expect(diagnostics[1].index).toBe(11);
  });

  it("should turn a syntax error into a diagnostic", () => {
    const [d] = validateBbcode("x [");
    expect(d.code).toBe("E_SYNTAX");
    expect(d.span).toEqual({ start: 2, end: 3 });
    expect(d.message).toBe("Unexpected '[': expected a tag, an escaped bracket or text at line 1, col 3");
  });

  it("should report limit failures", () => {
    expect(validateBbcode("abc", { maxInputSize: 2 }).map((d) => d.code)).toEqual(["E_INPUT_SIZE"]);
    expect(validateBbcode("[b]x[/b][i]y[/i]", { maxTags: 1 }).map((d) => d.code)).toEqual(["E_TAG_COUNT"]);
  });

  it("should not swallow option errors", () => {
    expect(() => validateBbcode("x", { maxTags: 1.5 })).toThrow(RangeError);
  });
});
