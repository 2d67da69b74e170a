import { Buffer } from "node:buffer";
import { TextDecoder } from "node:util";
import type { BbcodeElementNode, BbcodeNode, BbcodeTextNode, Diagnostic, DiagnosticCode, ParseOptions, Span } from "./types.js";
import {
  BbcodeSyntaxError,
  InputSizeExceededError,
  NestDepthExceededError,
  TagCountExceededError
} from "./errors.js";
import { createParseOptions } from "./options.js";
import { acceptsValue, getTagSpec } from "./registry.js";
import { indexToLineCol, tokenize } from "./tokenizer.js";
import type { CstDocument, CstNode, CstTagBlock, CstUnclosedTag } from "./tokenizer.js";
import { logger } from "./logger.js";

export type BbcodeInput = string | Uint8Array;

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

/**
 * Walks the concrete tree, enforcing depth and tag-count limits and turning
 * every irregular tag block into literal text.
 */
class AstBuilder {
  doc: CstDocument;
  opts: ParseOptions;
  tagCount: number;
  onDiagnostic: DiagnosticSink | null;

  constructor(doc: CstDocument, opts: ParseOptions, onDiagnostic: DiagnosticSink | null) {
    this.doc = doc;
    this.opts = opts;
    this.tagCount = 0;
    this.onDiagnostic = onDiagnostic;
  }

  buildDocument(): BbcodeNode[] {
    return this.doc.nodes.map(n => this.buildNode(n, 0));
  }

  buildNode(node: CstNode, depth: number): BbcodeNode {
    switch (node.rule) {
      case "tag_block":
        return this.buildTagBlock(node, depth);
      case "unclosed_tag":
        return this.buildUnclosedTag(node);
      case "escaped_bracket":
        return { type: "text", span: { ...node.span }, text: "[" };
      case "text":
        return { type: "text", span: { ...node.span }, text: this.source(node) };
    }
  }

  buildTagBlock(node: CstTagBlock, depth: number): BbcodeNode {
    this.checkDepth(node, depth);
    this.countTag();

    const openName = node.openName.toLowerCase();
    if (openName !== node.closeName.toLowerCase()) {
      return this.fallback(node, "W_TAG_MISMATCH", `Tag [${node.openName}] closed by [/${node.closeName}]`);
    }

    const spec = getTagSpec(openName);
    if (!spec) {
      return this.fallback(node, "W_UNKNOWN_TAG", `Unknown tag [${node.openName}]`);
    }

    // Children are built before the value is judged: a limit violation inside
    // a block that is about to be rejected still fails the parse.
    const children = node.content.map(c => this.buildNode(c, depth + 1));

    if (node.attr !== null) {
      if (!spec.allowValueAttr) {
        return this.fallback(node, "W_VALUE_NOT_ALLOWED", `Tag [${openName}] does not take a value`);
      }
      if (!acceptsValue(spec, node.attr.value)) {
        return this.fallback(node, "W_INVALID_VALUE", `Rejected value '${node.attr.value}' for [${openName}]`);
      }
    }

    const el: BbcodeElementNode = { type: "element", name: openName, span: { ...node.span }, attrs: [], children };
    if (node.attr !== null) el.attrs.push(["value", node.attr.value.trim()]);
    return el;
  }

  buildUnclosedTag(node: CstUnclosedTag): BbcodeNode {
    this.countTag();
    return this.fallback(node, "W_UNCLOSED_TAG", `Tag [${node.name}] is never closed`);
  }

  checkDepth(node: CstTagBlock, depth: number) {
    if (depth + 1 <= this.opts.maxDepth) return;
    const { line, column } = indexToLineCol(this.doc.input, node.loc.start);
    throw new NestDepthExceededError(this.opts.maxDepth, this.source(node), { ...node.span }, line, column);
  }

  countTag() {
    this.tagCount++;
    if (this.tagCount > this.opts.maxTags) {
      throw new TagCountExceededError(this.opts.maxTags);
    }
  }

  fallback(node: CstTagBlock | CstUnclosedTag, code: DiagnosticCode, message: string): BbcodeTextNode {
    const span: Span = { ...node.span };
    logger.debug(`[bbcode] ${code} at byte ${span.start}: ${message}`);
    if (this.onDiagnostic) {
      this.onDiagnostic({ code, message, index: span.start, span: { ...span }, severity: "warn" });
    }
    return { type: "text", span, text: this.source(node) };
  }

  source(node: CstNode) {
    return this.doc.input.slice(node.loc.start, node.loc.end);
  }
}

/** Merge adjacent text siblings at every level. */
export function normalizeTextNodes(nodes: BbcodeNode[]): BbcodeNode[] {
  const out: BbcodeNode[] = [];
  for (const n of nodes) {
    const node: BbcodeNode = n.type === "element" ? { ...n, children: normalizeTextNodes(n.children) } : n;
    const prev = out.length > 0 ? out[out.length - 1] : undefined;
    if (prev && prev.type === "text" && node.type === "text") {
      out[out.length - 1] = {
        type: "text",
        span: { start: prev.span.start, end: node.span.end },
        text: prev.text + node.text
      };
    } else {
      out.push(node);
    }
  }
  return out;
}

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Size guard, then decode. Runs before any tokenization so oversized input
 * costs nothing but its length check.
 */
function readInput(input: BbcodeInput, opts: ParseOptions): string {
  const actual = typeof input === "string" ? Buffer.byteLength(input, "utf8") : input.byteLength;
  if (actual > opts.maxInputSize) {
    throw new InputSizeExceededError(opts.maxInputSize, actual);
  }
  if (typeof input === "string") return input;
  try {
    return utf8.decode(input);
  } catch (e) {
    throw new BbcodeSyntaxError("Input is not valid UTF-8", { start: 0, end: 0 }, 1, 1, { cause: e });
  }
}

/**
 * Parse BBCode into a normalized AST. Throws a ParseError subclass when a
 * limit is exceeded or the input cannot be tokenized. `onDiagnostic` hears
 * about every tag block that degraded to text, as it happens.
 */
export function parseBbcode(
  input: BbcodeInput,
  options: Partial<ParseOptions> = {},
  onDiagnostic?: DiagnosticSink
): BbcodeNode[] {
  const opts = createParseOptions(options);
  const source = readInput(input, opts);
  const doc = tokenize(source);
  const builder = new AstBuilder(doc, opts, onDiagnostic ?? null);
  return normalizeTextNodes(builder.buildDocument());
}

export function parseBbcodeWithDiagnostics(
  input: BbcodeInput,
  options: Partial<ParseOptions> = {}
): { ast: BbcodeNode[]; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const ast = parseBbcode(input, options, d => diagnostics.push(d));
  return { ast, diagnostics };
}
