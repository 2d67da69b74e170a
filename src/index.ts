import type { ParseOptions } from "./types.js";
import { isParseError } from "./errors.js";
import type { ParseFailure } from "./errors.js";
import { parseBbcode } from "./parser.js";
import type { BbcodeInput } from "./parser.js";
import { astToHtml } from "./render.js";

export * from "./types.js";
export * from "./errors.js";
export * from "./options.js";
export * from "./registry.js";
export * from "./tokenizer.js";
export * from "./parser.js";
export * from "./render.js";
export * from "./validator.js";
export * from "./htmlToBbcode.js";

export type ConvertResult = { ok: true; html: string } | { ok: false; error: ParseFailure };

/** Parse then render. Throws whatever parseBbcode throws. */
export function bbcodeToHtml(input: BbcodeInput, options: Partial<ParseOptions> = {}): string {
  return astToHtml(parseBbcode(input, options));
}

/** Like bbcodeToHtml, but parse failures come back as a value. */
export function tryConvertBbcode(input: BbcodeInput, options: Partial<ParseOptions> = {}): ConvertResult {
  try {
    return { ok: true, html: bbcodeToHtml(input, options) };
  } catch (e) {
    if (isParseError(e)) return { ok: false, error: e };
    throw e;
  }
}

// Friendly alias names for public API
export { parseBbcode as parse } from "./parser.js";
export { astToHtml as render } from "./render.js";
export { bbcodeToHtml as convert, tryConvertBbcode as tryConvert };
