import { parseFragment } from "parse5";
import type { DefaultTreeAdapterMap } from "parse5";
import { isValidColorValue } from "./registry.js";
import { logger } from "./logger.js";

type P5ChildNode = DefaultTreeAdapterMap["childNode"];
type P5Element = DefaultTreeAdapterMap["element"];

const DROPPED_TAGS = new Set(["script", "style", "template"]);
const BLOCK_TAGS = new Set(["p", "div", "li"]);
const TAG_ALIASES = new Map<string, string>([
  ["b", "b"],
  ["strong", "b"],
  ["i", "i"],
  ["em", "i"]
]);

/** Make arbitrary text parse back to itself: every "[" becomes "\[". */
export function escapeBbcodeText(s: string) {
  return s.replace(/\[/g, "\\[");
}

function attrValue(el: P5Element, name: string) {
  const attr = el.attrs.find(a => a.name === name);
  return attr ? attr.value : null;
}

// Last `color` declaration wins, as in CSS.
function colorFromStyle(style: string) {
  let color: string | null = null;
  for (const decl of style.split(";")) {
    const idx = decl.indexOf(":");
    if (idx < 0) continue;
    if (decl.slice(0, idx).trim().toLowerCase() === "color") color = decl.slice(idx + 1).trim();
  }
  return color;
}

function elementColor(el: P5Element, tag: string) {
  if (tag === "font") return attrValue(el, "color");
  const style = attrValue(el, "style");
  return style === null ? null : colorFromStyle(style);
}

/*
 * A "\" right before a generated tag would read back as an escaped bracket,
 * and the grammar has no escape for a backslash, so the run is dropped.
 */
function beforeTag(s: string) {
  const trimmed = s.replace(/\\+$/, "");
  if (trimmed.length !== s.length) logger.warn("[bbcode] dropped trailing backslash before a tag");
  return trimmed;
}

function childrenToBbcode(nodes: P5ChildNode[]) {
  let out = "";
  for (const n of nodes) {
    const part = nodeToBbcode(n);
    // text is escaped, so a part starting with "[" starts with a generated tag
    if (part.startsWith("[")) out = beforeTag(out);
    out += part;
  }
  return out;
}

function nodeToBbcode(node: P5ChildNode): string {
  if ("value" in node) return escapeBbcodeText(node.value);
  // comments and doctypes carry no content
  if (!("tagName" in node)) return "";

  const tag = node.tagName.toLowerCase();
  if (DROPPED_TAGS.has(tag)) {
    logger.debug(`[bbcode] dropped <${tag}> element`);
    return "";
  }
  if (tag === "br") return "\n";

  const inner = childrenToBbcode(node.childNodes);
  const alias = TAG_ALIASES.get(tag);
  if (alias) return `[${alias}]${beforeTag(inner)}[/${alias}]`;

  if (tag === "span" || tag === "font") {
    const color = elementColor(node, tag);
    if (color !== null) {
      if (isValidColorValue(color)) return `[color=${color.trim()}]${beforeTag(inner)}[/color]`;
      logger.warn(`[bbcode] dropped color value '${color}' that failed validation`);
    }
    return inner;
  }
  if (BLOCK_TAGS.has(tag)) return inner + "\n";
  return inner;
}

/**
 * Convert an HTML fragment to BBCode the parser accepts. Only constructs
 * with a BBCode counterpart survive; other elements are unwrapped.
 */
export function htmlToBbcode(html: string): string {
  const fragment = parseFragment(html);
  return childrenToBbcode(fragment.childNodes).replace(/\n+$/, "");
}
