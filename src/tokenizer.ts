import { BbcodeSyntaxError } from "./errors.js";
import type { Loc, Span } from "./types.js";

/*
 * Grammar matched here:
 *
 *   Document       = Content* EOF
 *   Content        = TagBlock | EscapedBracket | UnclosedTag | Text
 *   TagBlock       = "[" TagName TagAttr? "]" Content* "[/" TagName "]"
 *   TagAttr        = "=" ValueChars          (no "]", "\n" or "\r")
 *   EscapedBracket = "\["
 *   UnclosedTag    = "[" TagName TagAttr? "]"
 *   Text           = (!("[" | "\[") ANY)+
 *
 * Alternatives are ordered and repetition is greedy, as in a PEG. Every rule
 * depends only on its start position, so the whole input is matched in one
 * right-to-left pass over a table instead of by backtracking.
 */

export type CstNode = CstTagBlock | CstUnclosedTag | CstEscapedBracket | CstText;

export interface CstTagAttr {
  /** Text after "=", delimiter stripped, untrimmed. */
  value: string;
  loc: Loc;
}

export interface CstBase {
  loc: Loc;
  span: Span;
}

export interface CstTagBlock extends CstBase {
  rule: "tag_block";
  openName: string;
  attr: CstTagAttr | null;
  content: CstNode[];
  closeName: string;
}

export interface CstUnclosedTag extends CstBase {
  rule: "unclosed_tag";
  name: string;
  attr: CstTagAttr | null;
}

export interface CstEscapedBracket extends CstBase {
  rule: "escaped_bracket";
}

export interface CstText extends CstBase {
  rule: "text";
}

export interface CstDocument {
  input: string;
  nodes: CstNode[];
}

interface OpenTag {
  name: string;
  attr: CstTagAttr | null;
  end: number;
}

interface CloseTag {
  name: string;
  end: number;
}

type Match =
  | { rule: "tag_block"; open: OpenTag; close: CloseTag; contentEnd: number; end: number }
  | { rule: "unclosed_tag"; open: OpenTag; end: number }
  | { rule: "escaped_bracket"; end: number }
  | { rule: "text"; end: number };

const OPEN_BRACKET = 0x5b; // [
const CLOSE_BRACKET = 0x5d; // ]
const SLASH = 0x2f;
const BACKSLASH = 0x5c;
const EQUALS = 0x3d;
const LF = 0x0a;
const CR = 0x0d;

function isNameChar(code: number) {
  return (code >= 0x30 && code <= 0x39) || (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a);
}

/**
 * UTF-8 offset of every UTF-16 index. A lone surrogate counts as the three
 * bytes of U+FFFD, matching how Node encodes it.
 */
export function utf8Offsets(input: string): Uint32Array {
  const len = input.length;
  const out = new Uint32Array(len + 1);
  let bytes = 0;
  for (let i = 0; i < len; i++) {
    out[i] = bytes;
    const code = input.charCodeAt(i);
    if (code < 0x80) bytes += 1;
    else if (code < 0x800) bytes += 2;
    else if (code >= 0xd800 && code <= 0xdbff && i + 1 < len) {
      const next = input.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        bytes += 4;
        i++;
        out[i] = bytes;
        continue;
      }
      bytes += 3;
    } else bytes += 3;
  }
  out[len] = bytes;
  return out;
}

/**
 * 1-based line and column of a UTF-16 index; columns count Unicode scalar
 * values, so a surrogate pair advances the column once.
 */
export function indexToLineCol(input: string, index: number) {
  let line = 1, column = 1;
  const end = Math.max(0, Math.min(index | 0, input.length));
  for (let k = 0; k < end; k++) {
    const code = input.charCodeAt(k);
    if (code === LF) { line++; column = 1; continue; }
    if (code >= 0xdc00 && code <= 0xdfff && k > 0) {
      const prev = input.charCodeAt(k - 1);
      if (prev >= 0xd800 && prev <= 0xdbff) continue;
    }
    column++;
  }
  return { line, column };
}

class Matcher {
  readonly input: string;
  readonly len: number;
  // first "]", "\n" or "\r" at or after each index
  private readonly attrStop: Int32Array;

  constructor(input: string) {
    this.input = input;
    this.len = input.length;
    this.attrStop = new Int32Array(this.len + 1);
    let stop = this.len;
    this.attrStop[this.len] = stop;
    for (let i = this.len - 1; i >= 0; i--) {
      const code = input.charCodeAt(i);
      if (code === CLOSE_BRACKET || code === LF || code === CR) stop = i;
      this.attrStop[i] = stop;
    }
  }

  code(i: number) { return this.input.charCodeAt(i); }

  scanName(from: number) {
    let i = from;
    while (i < this.len && isNameChar(this.code(i))) i++;
    return i;
  }

  openTagAt(p: number): OpenTag | null {
    if (this.code(p) !== OPEN_BRACKET) return null;
    const nameEnd = this.scanName(p + 1);
    if (nameEnd === p + 1) return null;
    let q = nameEnd;
    let attr: CstTagAttr | null = null;
    if (this.code(q) === EQUALS) {
      const stop = this.attrStop[q + 1];
      attr = { value: this.input.slice(q + 1, stop), loc: { start: q + 1, end: stop } };
      q = stop;
    }
    if (this.code(q) !== CLOSE_BRACKET) return null;
    return { name: this.input.slice(p + 1, nameEnd), attr, end: q + 1 };
  }

  closeTagAt(p: number): CloseTag | null {
    if (this.code(p) !== OPEN_BRACKET || this.code(p + 1) !== SLASH) return null;
    const nameEnd = this.scanName(p + 2);
    if (nameEnd === p + 2 || this.code(nameEnd) !== CLOSE_BRACKET) return null;
    return { name: this.input.slice(p + 2, nameEnd), end: nameEnd + 1 };
  }

  isEscapedBracket(p: number) {
    return this.code(p) === BACKSLASH && this.code(p + 1) === OPEN_BRACKET;
  }

  /**
   * Fills `matches[p]` with the Content alternative that succeeds at p and
   * `stops[p]` with the index where Content* starting at p gives up.
   */
  matchAll() {
    const n = this.len;
    const matches: Array<Match | null> = new Array<Match | null>(n + 1).fill(null);
    const stops = new Int32Array(n + 1);
    stops[n] = n;
    let textEnd = n;
    for (let p = n - 1; p >= 0; p--) {
      let m: Match | null = null;
      if (this.code(p) === OPEN_BRACKET) {
        const open = this.openTagAt(p);
        if (open) {
          const contentEnd = stops[open.end];
          const close = this.closeTagAt(contentEnd);
          m = close
            ? { rule: "tag_block", open, close, contentEnd, end: close.end }
            : { rule: "unclosed_tag", open, end: open.end };
        }
      } else if (this.isEscapedBracket(p)) {
        m = { rule: "escaped_bracket", end: p + 2 };
      } else {
        m = { rule: "text", end: textEnd };
      }
      matches[p] = m;
      stops[p] = m ? stops[m.end] : p;
      if (this.code(p) === OPEN_BRACKET || this.isEscapedBracket(p)) textEnd = p;
    }
    return { matches, stops };
  }
}

/**
 * Match `input` against the grammar and return its concrete parse tree.
 * Throws BbcodeSyntaxError at the first "[" no rule can consume.
 */
export function tokenize(input: string): CstDocument {
  const matcher = new Matcher(input);
  const { matches, stops } = matcher.matchAll();
  const offsets = utf8Offsets(input);
  const n = input.length;

  if (stops[0] !== n) {
    const at = stops[0];
    const { line, column } = indexToLineCol(input, at);
    throw new BbcodeSyntaxError(
      "Unexpected '[': expected a tag, an escaped bracket or text",
      { start: offsets[at], end: offsets[at + 1] },
      line,
      column
    );
  }

  const locAndSpan = (start: number, end: number): CstBase => ({
    loc: { start, end },
    span: { start: offsets[start], end: offsets[end] }
  });

  // Explicit stack: nesting in the input never turns into call depth here.
  const nodes: CstNode[] = [];
  const frames: Array<{ pos: number; end: number; out: CstNode[] }> = [{ pos: 0, end: n, out: nodes }];
  while (frames.length > 0) {
    const frame = frames[frames.length - 1];
    if (frame.pos >= frame.end) {
      frames.pop();
      continue;
    }
    const p = frame.pos;
    const m = matches[p];
    if (!m) {
      // Content* stops are checked above, so every reachable position matches.
      throw new Error(`Tokenizer table has no match at ${p}`);
    }
    frame.pos = m.end;
    switch (m.rule) {
      case "tag_block": {
        const block: CstTagBlock = {
          rule: "tag_block",
          ...locAndSpan(p, m.end),
          openName: m.open.name,
          attr: m.open.attr,
          content: [],
          closeName: m.close.name
        };
        frame.out.push(block);
        frames.push({ pos: m.open.end, end: m.contentEnd, out: block.content });
        break;
      }
      case "unclosed_tag":
        frame.out.push({ rule: "unclosed_tag", ...locAndSpan(p, m.end), name: m.open.name, attr: m.open.attr });
        break;
      case "escaped_bracket":
        frame.out.push({ rule: "escaped_bracket", ...locAndSpan(p, m.end) });
        break;
      case "text":
        frame.out.push({ rule: "text", ...locAndSpan(p, m.end) });
        break;
    }
  }

  return { input, nodes };
}
