import type { DocumentNode, ElementNode, ParentNode, TextNode } from "./types.js";

export interface ParseHtmlOptions {
  /** Keep text nodes that consist only of whitespace. Defaults to false. */
  keepWhitespace?: boolean;
}

const VOID_TAGS = new Set([
  "area", "base", "br", "col", "embed", "hr",
  "img", "input", "link", "meta", "source", "track", "wbr",
]);

const RAW_TEXT_TAGS = new Set(["script", "style"]);

const NAMED_ENTITIES = new Map<string, string>([
  ["amp", "&"],
  ["lt", "<"],
  ["gt", ">"],
  ["quot", '"'],
  ["apos", "'"],
  ["nbsp", "\u00a0"],
]);

// Quoted attribute values may contain ">".
const TOKEN_RE = /<!--[\s\S]*?-->|<(?:[^<>"']|"[^"]*"|'[^']*')+>|[^<]+|</g;
// A trailing "/" closes the tag only when it is not the end of an unquoted value.
const SELF_CLOSING_RE = /(?:^|[\s"'])\/\s*$/;
const ENTITY_RE = /&(#[xX][0-9a-fA-F]+|#[0-9]+|[A-Za-z]+);/g;

interface OpenTagToken {
  tagName: string;
  attrs: Record<string, string>;
  selfClosing: boolean;
}

export function isVoidTag(tagName: string): boolean {
  return VOID_TAGS.has(tagName);
}

/**
 * Parse markup into a document tree. Nothing is sanitized or wrapped: the
 * document's children are exactly the top-level nodes of the input.
 */
export function parseHtml(html: string, options: ParseHtmlOptions = {}): DocumentNode {
  const keepWhitespace = options.keepWhitespace ?? false;
  const document: DocumentNode = { type: "document", children: [], parent: null };
  const stack: ParentNode[] = [document];

  TOKEN_RE.lastIndex = 0;

  for (let tokenMatch = TOKEN_RE.exec(html); tokenMatch; tokenMatch = TOKEN_RE.exec(html)) {
    const token = tokenMatch[0];
    const current = stack[stack.length - 1];

    if (token.startsWith("<!") || token.startsWith("<?")) {
      continue;
    }

    if (token.startsWith("</")) {
      const closeTag = parseClosingTag(token);
      if (closeTag) {
        closeStackUntil(stack, closeTag);
      }
      continue;
    }

    const openTag = token.startsWith("<") ? parseOpenTag(token) : null;
    if (openTag) {
      const { tagName, attrs, selfClosing } = openTag;
      const node: ElementNode = {
        type: "element",
        tagName,
        attributes: attrs,
        children: [],
        parent: current,
      };
      current.children.push(node);

      if (selfClosing || VOID_TAGS.has(tagName)) {
        continue;
      }

      if (RAW_TEXT_TAGS.has(tagName)) {
        TOKEN_RE.lastIndex = readRawText(html, TOKEN_RE.lastIndex, node, keepWhitespace);
        continue;
      }

      stack.push(node);
      continue;
    }

    if (!keepWhitespace && token.trim().length === 0) {
      continue;
    }

    appendText(current, decodeEntities(token));
  }

  return document;
}

/**
 * Consume the body of a script/style element up to its closing tag and
 * return the index to resume scanning from.
 */
function readRawText(html: string, from: number, node: ElementNode, keepWhitespace: boolean): number {
  const closeRe = new RegExp(`</\\s*${node.tagName}\\s*>`, "ig");
  closeRe.lastIndex = from;
  const close = closeRe.exec(html);

  const end = close ? close.index : html.length;
  const body = html.slice(from, end);
  if (keepWhitespace || body.trim().length > 0) {
    appendText(node, body);
  }

  return close ? close.index + close[0].length : html.length;
}

function appendText(parent: ParentNode, value: string): void {
  const previous = parent.children[parent.children.length - 1];
  if (previous && previous.type === "text") {
    previous.value += value;
    return;
  }

  const text: TextNode = { type: "text", value, parent };
  parent.children.push(text);
}

function parseClosingTag(token: string): string | null {
  const match = token.match(/^<\s*\/\s*([A-Za-z][A-Za-z0-9:_-]*)\s*>$/);
  return match ? match[1].toLowerCase() : null;
}

function parseOpenTag(token: string): OpenTagToken | null {
  const openTagMatch = token.match(/^<([A-Za-z][A-Za-z0-9:_-]*)([\s\S]*?)>$/);
  if (!openTagMatch) return null;

  const tagName = openTagMatch[1].toLowerCase();
  const rawAttrs = openTagMatch[2] ?? "";
  const selfClosing = SELF_CLOSING_RE.test(rawAttrs);

  const attrs = new Map<string, string>();
  const attrRe = /([:@A-Za-z0-9_.-]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'`=<>]+)))?/g;

  for (let attrMatch = attrRe.exec(rawAttrs); attrMatch; attrMatch = attrRe.exec(rawAttrs)) {
    const key = attrMatch[1].toLowerCase();
    if (attrs.has(key)) continue;

    const value = attrMatch[2] ?? attrMatch[3] ?? attrMatch[4] ?? "";
    attrs.set(key, decodeEntities(value));
  }

  // fromEntries defines own properties, so names like "__proto__" survive.
  return { tagName, attrs: Object.fromEntries(attrs), selfClosing };
}

function closeStackUntil(stack: ParentNode[], tagName: string): void {
  for (let i = stack.length - 1; i >= 1; i--) {
    const node = stack[i];
    if (node.type === "element" && node.tagName === tagName) {
      stack.length = i;
      return;
    }
  }
}

export function decodeEntities(value: string): string {
  if (!value.includes("&")) return value;

  return value.replace(ENTITY_RE, (match, body: string) => {
    if (body.startsWith("#")) {
      const isHex = body[1] === "x" || body[1] === "X";
      const code = parseInt(body.slice(isHex ? 2 : 1), isHex ? 16 : 10);
      if (!Number.isFinite(code) || code > 0x10ffff) return match;
      return String.fromCodePoint(code);
    }
    return NAMED_ENTITIES.get(body) ?? match;
  });
}
