import type { ParseOptions } from "./types.js";

const DEFAULT_OPTIONS: ParseOptions = {
  maxDepth: 3,
  maxTags: 500,
  maxInputSize: 50 * 1024
};

export const DEFAULT_PARSE_OPTIONS: Readonly<ParseOptions> = Object.freeze({ ...DEFAULT_OPTIONS });

const OPTION_KEYS = ["maxDepth", "maxTags", "maxInputSize"] as const;

/**
 * Merge caller overrides onto the defaults. Every limit must be a
 * non-negative integer; anything else throws a RangeError naming the field.
 */
export function createParseOptions(override: Partial<ParseOptions> = {}): ParseOptions {
  const merged: ParseOptions = { ...DEFAULT_OPTIONS };
  for (const key of OPTION_KEYS) {
    const value = override[key];
    if (value === undefined) continue;
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`Option '${key}' must be a non-negative integer, got ${String(value)}`);
    }
    merged[key] = value;
  }
  return merged;
}
