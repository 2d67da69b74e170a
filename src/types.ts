/** Half-open range of UTF-8 byte offsets into the original input. */
export interface Span {
  start: number;
  end: number;
}

/** Half-open range of UTF-16 offsets into the decoded input string. */
export interface Loc {
  start: number;
  end: number;
}

export type BbcodeNode = BbcodeElementNode | BbcodeTextNode;

export interface BbcodeTextNode {
  type: "text";
  span: Span;
  text: string;
}

export interface BbcodeElementNode {
  type: "element";
  /** Always lowercase. */
  name: string;
  span: Span;
  /** Ordered key/value pairs; only "value" is ever populated by the parser. */
  attrs: Array<[string, string]>;
  children: BbcodeNode[];
}

export interface ParseOptions {
  maxDepth: number;
  maxTags: number;
  /** Limit in UTF-8 bytes. */
  maxInputSize: number;
}

export type DiagnosticCode =
  | "W_TAG_MISMATCH"
  | "W_UNKNOWN_TAG"
  | "W_VALUE_NOT_ALLOWED"
  | "W_INVALID_VALUE"
  | "W_UNCLOSED_TAG"
  | "E_INPUT_SIZE"
  | "E_TAG_COUNT"
  | "E_NEST_DEPTH"
  | "E_SYNTAX";

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  /** Byte offset, same as span.start. */
  index: number;
  span: Span;
  severity: "error" | "warn";
}
