import { describe, it, expect } from "vitest";
import { decodeEntities, parseHtml } from "../../src/html-parser.js";
import { domAdapter } from "../../src/tree-adapter.js";
import type { DomNode, ElementNode, ParentNode, TextNode } from "../../src/types.js";

// ── Helpers ──

function elementAt(parent: ParentNode, index: number): ElementNode {
  const node = parent.children[index];
  if (!node || node.type !== "element") throw new Error(`No element at ${index}`);
  return node;
}

function textAt(parent: ParentNode, index: number): TextNode {
  const node = parent.children[index];
  if (!node || node.type !== "text") throw new Error(`No text node at ${index}`);
  return node;
}

function shape(node: DomNode): string {
  if (node.type === "text") return JSON.stringify(node.value);
  const name = node.type === "document" ? "#document" : node.tagName;
  return `${name}(${node.children.map(shape).join(",")})`;
}

describe("parseHtml", () => {
  it("builds a document tree without wrapping it", () => {
    const doc = parseHtml("<div><span>Hi </span><b>there</b></div>");
    expect(shape(doc)).toBe('#document(div(span("Hi "),b("there")))');
  });

  it("links every node to its parent", () => {
    const doc = parseHtml("<div><span>Hi</span></div>");
    const div = elementAt(doc, 0);
    const span = elementAt(div, 0);
    const text = textAt(span, 0);

    expect(doc.parent).toBeNull();
    expect(div.parent).toBe(doc);
    expect(span.parent).toBe(div);
    expect(text.parent).toBe(span);
  });

  it("drops whitespace-only text by default", () => {
    const doc = parseHtml("<ul>\n  <li>a</li>\n</ul>");
    expect(shape(doc)).toBe('#document(ul(li("a")))');
  });

  it("keeps whitespace-only text when asked", () => {
    const doc = parseHtml("<ul>\n  <li>a</li>\n</ul>", { keepWhitespace: true });
    expect(shape(doc)).toBe('#document(ul("\\n  ",li("a"),"\\n"))');
  });

  it("never gives void or self-closing elements children", () => {
    expect(shape(parseHtml("<p>a<br>b</p>"))).toBe('#document(p("a",br(),"b"))');
    expect(shape(parseHtml("<div/><p>x</p>"))).toBe('#document(div(),p("x"))');
  });

  it("lowercases names and keeps every attribute", () => {
    const doc = parseHtml(`<A HREF="/x" data-id='7' hidden CLASS=big>go</A>`);
    const a = elementAt(doc, 0);
    expect(a.tagName).toBe("a");
    expect(a.attributes).toStrictEqual({ href: "/x", "data-id": "7", hidden: "", class: "big" });
  });

  it("reads quoted attribute values containing >", () => {
    const doc = parseHtml(`<a title="x > y" href="/z">Z</a><b data-q='1>0'>B</b>`);
    expect(elementAt(doc, 0).attributes).toStrictEqual({ title: "x > y", href: "/z" });
    expect(elementAt(doc, 1).attributes).toStrictEqual({ "data-q": "1>0" });
    expect(shape(doc)).toBe('#document(a("Z"),b("B"))');
  });

  it("keeps a trailing slash of an unquoted value in the value", () => {
    const doc = parseHtml("<a href=/x/>text</a>");
    expect(elementAt(doc, 0).attributes).toStrictEqual({ href: "/x/" });
    expect(shape(doc)).toBe('#document(a("text"))');
  });

  it("still self-closes after a space or a quoted value", () => {
    expect(shape(parseHtml('<i /><i class="c"/><p>x</p>'))).toBe('#document(i(),i(),p("x"))');
  });

  it("keeps attributes named like Object.prototype members", () => {
    const p = elementAt(parseHtml('<p __proto__="1" constructor="2">k</p>'), 0);
    expect(Object.keys(p.attributes)).toStrictEqual(["__proto__", "constructor"]);
    expect(domAdapter.attribute(p, "__proto__")).toBe("1");
    expect(domAdapter.attribute(p, "constructor")).toBe("2");
  });

  it("keeps the first of duplicate attributes", () => {
    const p = elementAt(parseHtml('<p id="a" id="b">x</p>'), 0);
    expect(p.attributes.id).toBe("a");
  });

  it("decodes entities in text and attribute values", () => {
    const p = elementAt(parseHtml('<p title="a &amp; b">1 &lt; 2 &#65;&#x42; &copy;</p>'), 0);
    expect(p.attributes.title).toBe("a & b");
    expect(textAt(p, 0).value).toBe("1 < 2 AB &copy;");
  });

  it("keeps a lone < as text", () => {
    expect(shape(parseHtml("<p>a < b</p>"))).toBe('#document(p("a < b"))');
  });

  it("reads script bodies as raw text", () => {
    const doc = parseHtml("<script>if (a<b) { x = '</p>'; }</script><p>x</p>");
    const script = elementAt(doc, 0);
    expect(textAt(script, 0).value).toBe("if (a<b) { x = '</p>'; }");
    expect(elementAt(doc, 1).tagName).toBe("p");
  });

  it("closes back to the matching element and ignores stray closing tags", () => {
    expect(shape(parseHtml("</span><div><p>a</div>b"))).toBe('#document(div(p("a")),"b")');
  });

  it("closes unclosed elements at the end of input", () => {
    expect(shape(parseHtml("<div><p>x"))).toBe('#document(div(p("x")))');
  });

  it("skips doctype, comments and processing instructions", () => {
    expect(shape(parseHtml("<!DOCTYPE html><?xml version=\"1.0\"?><!-- <b>no</b> --><p>x</p>"))).toBe(
      '#document(p("x"))'
    );
  });
});

describe("decodeEntities", () => {
  it("leaves unknown and out-of-range references alone", () => {
    expect(decodeEntities("&bogus; &#x110000; &nbsp;")).toBe("&bogus; &#x110000; \u00a0");
  });
});

describe("domAdapter", () => {
  const doc = parseHtml('<p class="a">hi<i>!</i></p>');
  const p = elementAt(doc, 0);
  const text = textAt(p, 0);

  it("reports the document root as an element named #document", () => {
    expect(domAdapter.kind(doc)).toBe("element");
    expect(domAdapter.tag(doc)).toBe("#document");
    expect(domAdapter.parent(doc)).toBeNull();
  });

  it("reads elements", () => {
    expect(domAdapter.kind(p)).toBe("element");
    expect(domAdapter.tag(p)).toBe("p");
    expect(domAdapter.textContent(p)).toBe("");
    expect(domAdapter.attribute(p, "class")).toBe("a");
    expect(domAdapter.attribute(p, "id")).toBeUndefined();
    expect(domAdapter.attribute(p, "constructor")).toBeUndefined();
    expect(domAdapter.children(p)).toHaveLength(2);
    expect(domAdapter.parent(p)).toBe(doc);
  });

  it("reads text nodes", () => {
    expect(domAdapter.kind(text)).toBe("text");
    expect(domAdapter.tag(text)).toBe("");
    expect(domAdapter.textContent(text)).toBe("hi");
    expect(domAdapter.attribute(text, "class")).toBeUndefined();
    expect(domAdapter.children(text)).toStrictEqual([]);
    expect(domAdapter.parent(text)).toBe(p);
  });
});
