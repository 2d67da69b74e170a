import { describe, it, expect, vi, afterEach } from "vitest";
import { escapeBbcodeText, htmlToBbcode } from "../src/htmlToBbcode.js";
import { bbcodeToHtml, tryConvertBbcode } from "../src/index.js";
import { parseBbcode } from "../src/parser.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("escapeBbcodeText", () => {
  it("should escape every opening bracket", () => {
    expect(escapeBbcodeText("[b]x[/b] [")).toBe("\\[b]x\\[/b] \\[");
  });

  it("should parse back to the original text", () => {
    const original = "[b]x[/b] [";
    expect(parseBbcode(escapeBbcodeText(original))).toEqual([
      { type: "text", span: { start: 0, end: 13 }, text: original }
    ]);
  });
});

describe("htmlToBbcode", () => {
  it("should map emphasis elements", () => {
    expect(htmlToBbcode("<strong>a</strong> <em>b</em> <b>c</b> <i>d</i>")).toBe(
      "[b]a[/b] [i]b[/i] [b]c[/b] [i]d[/i]"
    );
  });

  it("should read the color from a style attribute", () => {
    expect(htmlToBbcode('<span style="font-weight:bold; color: #FF0000">x</span>')).toBe(
      "[color=#FF0000]x[/color]"
    );
  });

  it("should read the color of a font element", () => {
    expect(htmlToBbcode('<font color="red">x</font>')).toBe("[color=red]x[/color]");
  });

  it("should unwrap a color that fails validation", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(htmlToBbcode('<span style="color:url(javascript:alert(1))">x</span>')).toBe("x");
    expect(warn).toHaveBeenCalledWith(
      "[bbcode] dropped color value 'url(javascript:alert(1))' that failed validation"
    );
  });

  it("should turn line breaks and blocks into newlines", () => {
    expect(htmlToBbcode("<p>one</p><p>two<br>three</p>")).toBe("one\ntwo\nthree");
  });

  it("should drop scripts and comments", () => {
    expect(htmlToBbcode("<script>alert(1)</script><!-- note -->safe")).toBe("safe");
  });

  it("should unwrap elements without a counterpart", () => {
    expect(htmlToBbcode('<a href="https://example.test">link</a>')).toBe("link");
  });

  it("should escape brackets and decode entities in text", () => {
    expect(htmlToBbcode("a [b] b")).toBe("a \\[b] b");
    expect(htmlToBbcode("&lt;b&gt; &amp;")).toBe("<b> &");
  });

  it("should drop a backslash that would escape the following tag", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const bbcode = htmlToBbcode("a\\<b>x</b>");
    expect(bbcode).toBe("a[b]x[/b]");
    expect(warn).toHaveBeenCalledWith("[bbcode] dropped trailing backslash before a tag");
    expect(tryConvertBbcode(bbcode)).toEqual({ ok: true, html: "a<b>x</b>" });
  });

  it("should drop a backslash that would escape a closing tag", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(htmlToBbcode("<b>a\\</b>")).toBe("[b]a[/b]");
    expect(bbcodeToHtml(htmlToBbcode("<b>a\\</b>"))).toBe("<b>a</b>");
    expect(htmlToBbcode('<span style="color:red">x\\</span>')).toBe("[color=red]x[/color]");
  });

  it("should drop the whole backslash run before a tag", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(htmlToBbcode("a\\\\<i>x</i>")).toBe("a[i]x[/i]");
  });

  it("should keep backslashes that do not touch a tag", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(htmlToBbcode("a\\ <b>x</b>\\")).toBe("a\\ [b]x[/b]\\");
    expect(bbcodeToHtml(htmlToBbcode("a\\ <b>x</b>"))).toBe("a\\ <b>x</b>");
    expect(warn).not.toHaveBeenCalled();
  });

  it("should round-trip through bbcodeToHtml", () => {
    expect(bbcodeToHtml(htmlToBbcode("<b>x [y]</b>"))).toBe("<b>x [y]</b>");
    expect(bbcodeToHtml(htmlToBbcode('<span style="color:teal"><i>t</i></span>'))).toBe(
      '<span style="color:teal"><i>t</i></span>'
    );
  });
});
