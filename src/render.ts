import type { BbcodeElementNode, BbcodeNode } from "./types.js";
import { acceptsValue, getTagSpec } from "./registry.js";

export function escapeHtml(s: string) {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function newlinesToBr(s: string) {
  return s.replace(/\r\n/g, "\n").replace(/\r/g, "\n").replace(/\n/g, "<br>");
}

function valueAttr(el: BbcodeElementNode) {
  const pair = el.attrs.find(([key]) => key === "value");
  return pair ? pair[1] : undefined;
}

/**
 * Serialize an AST to HTML. Never throws: anything the registry no longer
 * vouches for (unknown tag, missing or failing value) is rendered as its
 * children only.
 */
export function astToHtml(nodes: readonly BbcodeNode[]): string {
  let out = "";
  const writeChildren = (el: BbcodeElementNode) => {
    for (const c of el.children) writeNode(c);
  };
  const writeNode = (n: BbcodeNode) => {
    if (n.type === "text") { out += newlinesToBr(escapeHtml(n.text)); return; }
    const spec = getTagSpec(n.name);
    if (!spec) { writeChildren(n); return; }
    switch (n.name) {
      case "b":
      case "i":
        out += "<" + n.name + ">";
        writeChildren(n);
        out += "</" + n.name + ">";
        return;
      case "color": {
        const color = valueAttr(n);
        // Re-checked here on purpose: the AST may not come from parseBbcode.
        if (color === undefined || !acceptsValue(spec, color)) { writeChildren(n); return; }
        out += '<span style="color:' + escapeHtml(color) + '">';
        writeChildren(n);
        out += "</span>";
        return;
      }
      default:
        writeChildren(n);
    }
  };
  for (const n of nodes) writeNode(n);
  return out;
}
