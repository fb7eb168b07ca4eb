import { isVoidTag } from "./html-parser.js";
import type { DomNode, ElementNode, EvalValue, TextNode } from "./types.js";

const RAW_TEXT_PARENTS = new Set(["script", "style"]);

export function escapeHtml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;");
}

/**
 * Write a node back out as markup. The document root renders as the
 * concatenation of its children. Deep trees are walked with an explicit
 * stack of nodes and pending closing tags.
 */
export function renderNode(root: DomNode): string {
  const out: string[] = [];
  const pending: (DomNode | string)[] = [root];

  while (pending.length > 0) {
    const item = pending.pop();
    if (item === undefined) break;

    if (typeof item === "string") {
      out.push(item);
      continue;
    }

    switch (item.type) {
      case "document":
        pushChildren(pending, item.children);
        break;

      case "text":
        out.push(renderText(item));
        break;

      case "element":
        out.push(openTag(item));
        if (!isVoidTag(item.tagName)) {
          pending.push(`</${item.tagName}>`);
          pushChildren(pending, item.children);
        }
        break;
    }
  }

  return out.join("");
}

/**
 * Output lines for a query result: one rendered node per line, or the text
 * value as a single line.
 */
export function renderValue(value: EvalValue<DomNode>): string[] {
  if (value.kind === "text") {
    return [value.value];
  }
  return value.nodes.map((node) => renderNode(node));
}

function renderText(node: TextNode): string {
  const parent = node.parent;
  if (parent?.type === "element" && RAW_TEXT_PARENTS.has(parent.tagName)) {
    return node.value;
  }
  return escapeHtml(node.value);
}

function openTag(node: ElementNode): string {
  const attrs = Object.entries(node.attributes)
    .map(([key, value]) => `${key}="${escapeHtml(value)}"`)
    .join(" ");
  return attrs ? `<${node.tagName} ${attrs}>` : `<${node.tagName}>`;
}

function pushChildren(pending: (DomNode | string)[], children: readonly DomNode[]): void {
  for (let i = children.length - 1; i >= 0; i--) {
    pending.push(children[i]);
  }
}
