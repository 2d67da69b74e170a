import type { Span } from "./types.js";

export type ParseErrorCode =
  | "INPUT_SIZE_EXCEEDED"
  | "TAG_COUNT_EXCEEDED"
  | "NEST_DEPTH_EXCEEDED"
  | "SYNTAX_ERROR";

/**
 * Base class of every failure that aborts a parse. No partial AST is ever
 * returned alongside one of these.
 */
export abstract class ParseError extends Error {
  abstract readonly code: ParseErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParseError";
  }
}

export class InputSizeExceededError extends ParseError {
  readonly code = "INPUT_SIZE_EXCEEDED";
  readonly max: number;
  readonly actual: number;

  constructor(max: number, actual: number) {
    super(`Input size exceeded limit (max ${max} bytes, got ${actual})`);
    this.name = "InputSizeExceededError";
    this.max = max;
    this.actual = actual;
    Object.setPrototypeOf(this, InputSizeExceededError.prototype);
  }
}

export class TagCountExceededError extends ParseError {
  readonly code = "TAG_COUNT_EXCEEDED";
  readonly maxTags: number;

  constructor(maxTags: number) {
    super(`Parsed tag count exceeded limit (max ${maxTags})`);
    this.name = "TagCountExceededError";
    this.maxTags = maxTags;
    Object.setPrototypeOf(this, TagCountExceededError.prototype);
  }
}

export class NestDepthExceededError extends ParseError {
  readonly code = "NEST_DEPTH_EXCEEDED";
  readonly maxDepth: number;
  /** Source text of the offending tag block. */
  readonly near: string;
  readonly span: Span;
  readonly line: number;
  readonly column: number;

  constructor(maxDepth: number, near: string, span: Span, line: number, column: number) {
    super(`Nest depth exceeded limit (max ${maxDepth}) at line ${line}, col ${column}. Near: "${near}"`);
    this.name = "NestDepthExceededError";
    this.maxDepth = maxDepth;
    this.near = near;
    this.span = span;
    this.line = line;
    this.column = column;
    Object.setPrototypeOf(this, NestDepthExceededError.prototype);
  }
}

export class BbcodeSyntaxError extends ParseError {
  readonly code = "SYNTAX_ERROR";
  readonly span: Span;
  readonly line: number;
  readonly column: number;

  constructor(message: string, span: Span, line: number, column: number, options?: { cause?: unknown }) {
    super(`${message} at line ${line}, col ${column}`, options);
    this.name = "BbcodeSyntaxError";
    this.span = span;
    this.line = line;
    this.column = column;
    Object.setPrototypeOf(this, BbcodeSyntaxError.prototype);
  }
}

export type ParseFailure =
  | InputSizeExceededError
  | TagCountExceededError
  | NestDepthExceededError
  | BbcodeSyntaxError;

export function isParseError(value: unknown): value is ParseFailure {
  return value instanceof ParseError;
}
