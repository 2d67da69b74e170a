import type { Diagnostic, DiagnosticCode, ParseOptions } from "./types.js";
import { isParseError } from "./errors.js";
import type { ParseFailure } from "./errors.js";
import { parseBbcode } from "./parser.js";
import type { BbcodeInput } from "./parser.js";

function errorDiagnostic(err: ParseFailure): Diagnostic {
  const at = (code: DiagnosticCode, start: number, end: number): Diagnostic => ({
    code,
    message: err.message,
    index: start,
    span: { start, end },
    severity: "error"
  });
  switch (err.code) {
    case "INPUT_SIZE_EXCEEDED":
      return at("E_INPUT_SIZE", 0, 0);
    case "TAG_COUNT_EXCEEDED":
      return at("E_TAG_COUNT", 0, 0);
    case "NEST_DEPTH_EXCEEDED":
      return at("E_NEST_DEPTH", err.span.start, err.span.end);
    case "SYNTAX_ERROR":
      return at("E_SYNTAX", err.span.start, err.span.end);
  }
}

/**
 * Report everything the parser would silently degrade, plus the failure that
 * aborts it, if any. Parse failures become an "error" diagnostic instead of
 * being thrown; anything else still propagates.
 */
export function validateBbcode(input: BbcodeInput, options: Partial<ParseOptions> = {}): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  try {
    parseBbcode(input, options, d => diagnostics.push(d));
  } catch (e) {
    if (!isParseError(e)) throw e;
    diagnostics.push(errorDiagnostic(e));
  }
  return diagnostics;
}
