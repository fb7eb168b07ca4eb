import type { DomNode } from "./types.js";

export type NodeKind = "element" | "text";

/**
 * Read-only view of a document tree. The evaluator only ever talks to the
 * tree through this interface, so any node representation can be queried.
 */
export interface TreeAdapter<N> {
  kind(node: N): NodeKind;
  /** Tag name of an element; "" for text nodes. */
  tag(node: N): string;
  /** Content of a text node; "" for elements. */
  textContent(node: N): string;
  attribute(node: N, name: string): string | undefined;
  children(node: N): readonly N[];
  parent(node: N): N | null;
}

export const DOCUMENT_TAG = "#document";

/**
 * Adapter over trees built by parseHtml. The document root reads as an
 * element named "#document", which no HQL tag can match.
 */
export const domAdapter: TreeAdapter<DomNode> = {
  kind(node) {
    return node.type === "text" ? "text" : "element";
  },

  tag(node) {
    if (node.type === "element") return node.tagName;
    return node.type === "document" ? DOCUMENT_TAG : "";
  },

  textContent(node) {
    return node.type === "text" ? node.value : "";
  },

  attribute(node, name) {
    if (node.type !== "element") return undefined;
    return Object.prototype.hasOwnProperty.call(node.attributes, name)
      ? node.attributes[name]
      : undefined;
  },

  children(node) {
    return node.type === "text" ? [] : node.children;
  },

  parent(node) {
    return node.parent;
  },
};
