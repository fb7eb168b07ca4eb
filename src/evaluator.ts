import { EvalError } from "./errors.js";
import { formatStage } from "./stages.js";
import type { TreeAdapter } from "./tree-adapter.js";
import type { EvalValue, Pipeline, Stage } from "./types.js";

const TRIM_RE = /^[ \t\r\n]+|[ \t\r\n]+$/g;
const CLASS_SEPARATOR_RE = /[ \t\r\n\f]+/;

/**
 * Run a compiled pipeline against a set of context nodes.
 *
 * The value starts as the context node set and flows through the stages
 * left to right. Map stages keep it a node set (deduplicated, in document
 * order); extract stages turn it into text. A stage that receives the
 * other kind of value throws EvalError.
 */
export function evaluate<N>(
  pipeline: Pipeline,
  context: readonly N[],
  adapter: TreeAdapter<N>
): EvalValue<N> {
  const order = new DocumentOrder(adapter);
  let value: EvalValue<N> = { kind: "nodes", nodes: order.sort(context) };

  for (const stage of pipeline) {
    value = applyStage(stage, value, adapter, order);
  }

  return value;
}

function applyStage<N>(
  stage: Readonly<Stage>,
  value: EvalValue<N>,
  adapter: TreeAdapter<N>,
  order: DocumentOrder<N>
): EvalValue<N> {
  switch (stage.op) {
    case "flat":
      return nodeSet(order, requireNodes(stage, value).flatMap((node) => subtree(node, adapter)));

    case "path": {
      const nodes = requireNodes(stage, value);
      const candidates = stage.axis === "child"
        ? nodes.flatMap((node) => adapter.children(node))
        : nodes.flatMap((node) => subtree(node, adapter));
      const tag = asciiLower(stage.tag);
      return nodeSet(
        order,
        candidates.filter((node) => adapter.kind(node) === "element" && asciiLower(adapter.tag(node)) === tag)
      );
    }

    case "attr": {
      const { field, value: expected } = stage;
      return nodeSet(order, requireNodes(stage, value).filter((node) => {
        if (adapter.kind(node) !== "element") return false;
        const actual = adapter.attribute(node, field);
        return actual !== undefined && (expected === undefined || actual === expected);
      }));
    }

    case "id": {
      const { value: expected, caseSensitive } = stage;
      return nodeSet(order, requireNodes(stage, value).filter((node) => {
        if (adapter.kind(node) !== "element") return false;
        const id = adapter.attribute(node, "id");
        return id !== undefined && sameText(id, expected, caseSensitive);
      }));
    }

    case "class": {
      const { value: expected, caseSensitive } = stage;
      return nodeSet(order, requireNodes(stage, value).filter((node) => {
        if (adapter.kind(node) !== "element") return false;
        const classes = adapter.attribute(node, "class");
        if (classes === undefined) return false;
        return classes
          .split(CLASS_SEPARATOR_RE)
          .some((token) => token !== "" && sameText(token, expected, caseSensitive));
      }));
    }

    case "child": {
      const selected: N[] = [];
      for (const node of requireNodes(stage, value)) {
        const children = adapter.children(node);
        const index = stage.index < 0 ? children.length + stage.index : stage.index;
        if (index >= 0 && index < children.length) {
          selected.push(children[index]);
        }
      }
      return nodeSet(order, selected);
    }

    case "text":
      return text(requireNodes(stage, value).map((node) => textOf(node, adapter)).join(""));

    case "trim":
      return text(requireText(stage, value).replace(TRIM_RE, ""));

    case "trimPrefix": {
      const current = requireText(stage, value);
      return text(current.startsWith(stage.text) ? current.slice(stage.text.length) : current);
    }

    case "trimSuffix": {
      const current = requireText(stage, value);
      return text(current.endsWith(stage.text) ? current.slice(0, current.length - stage.text.length) : current);
    }

    case "attrExtract": {
      const { field } = stage;
      return text(requireNodes(stage, value).map((node) => adapter.attribute(node, field) ?? "").join(""));
    }
  }
}

function requireNodes<N>(stage: Readonly<Stage>, value: EvalValue<N>): N[] {
  if (value.kind !== "nodes") {
    throw new EvalError(formatStage(stage), "nodes", value.kind);
  }
  return value.nodes;
}

function requireText<N>(stage: Readonly<Stage>, value: EvalValue<N>): string {
  if (value.kind !== "text") {
    throw new EvalError(formatStage(stage), "text", value.kind);
  }
  return value.value;
}

function nodeSet<N>(order: DocumentOrder<N>, nodes: readonly N[]): EvalValue<N> {
  return { kind: "nodes", nodes: order.sort(nodes) };
}

function text(value: string): { kind: "text"; value: string } {
  return { kind: "text", value };
}

// ── Traversal ──

/**
 * The node and everything below it, in document order.
 */
function subtree<N>(root: N, adapter: TreeAdapter<N>): N[] {
  const result: N[] = [];
  const pending: N[] = [root];

  while (pending.length > 0) {
    const node = pending.pop();
    if (node === undefined) break;
    result.push(node);

    const children = adapter.children(node);
    for (let i = children.length - 1; i >= 0; i--) {
      pending.push(children[i]);
    }
  }

  return result;
}

/**
 * Concatenated content of every text node in the subtree, no separator.
 */
export function textOf<N>(node: N, adapter: TreeAdapter<N>): string {
  if (adapter.kind(node) === "text") {
    return adapter.textContent(node);
  }

  return subtree(node, adapter)
    .filter((n) => adapter.kind(n) === "text")
    .map((n) => adapter.textContent(n))
    .join("");
}

/**
 * Sorts and deduplicates nodes by document order. The first time a node from
 * an unseen tree is sorted, that whole tree is numbered in one pre-order walk;
 * trees numbered later sort after trees numbered earlier.
 */
class DocumentOrder<N> {
  private readonly positions = new Map<N, number>();

  constructor(private readonly adapter: TreeAdapter<N>) {}

  sort(nodes: readonly N[]): N[] {
    const unique = [...new Set(nodes)];
    if (unique.length < 2) return unique;

    return unique
      .map((node) => ({ node, position: this.positionOf(node) }))
      .sort((a, b) => a.position - b.position)
      .map((entry) => entry.node);
  }

  private positionOf(node: N): number {
    const known = this.positions.get(node);
    if (known !== undefined) return known;

    this.number(this.rootOf(node));

    const position = this.positions.get(node) ?? this.positions.size;
    this.positions.set(node, position);
    return position;
  }

  private rootOf(node: N): N {
    let current = node;
    for (let parent = this.adapter.parent(current); parent !== null; parent = this.adapter.parent(current)) {
      current = parent;
    }
    return current;
  }

  private number(root: N): void {
    for (const node of subtree(root, this.adapter)) {
      if (!this.positions.has(node)) {
        this.positions.set(node, this.positions.size);
      }
    }
  }
}

// ── Matching ──

function sameText(actual: string, expected: string, caseSensitive: boolean): boolean {
  return caseSensitive ? actual === expected : asciiLower(actual) === asciiLower(expected);
}

/**
 * Lowercase A-Z only; other characters are left untouched.
 */
function asciiLower(value: string): string {
  return value.replace(/[A-Z]/g, (ch) => String.fromCharCode(ch.charCodeAt(0) + 32));
}
