// ── Markup Tree Types ──

export type DomNode = DocumentNode | ElementNode | TextNode;

export type ParentNode = DocumentNode | ElementNode;

export interface DocumentNode {
  type: "document";
  children: DomNode[];
  parent: null;
}

export interface ElementNode {
  type: "element";
  tagName: string;
  attributes: Record<string, string>;
  children: DomNode[];
  parent: ParentNode | null;
}

export interface TextNode {
  type: "text";
  value: string;
  parent: ParentNode | null;
}

// ── Pipeline Stages ──

export type PathAxis = "child" | "descendant";

export type MapStage =
  | { op: "flat" }
  | { op: "path"; axis: PathAxis; tag: string }
  | { op: "attr"; field: string; value?: string }
  | { op: "id"; value: string; caseSensitive: boolean }
  | { op: "class"; value: string; caseSensitive: boolean }
  | { op: "child"; index: number };

export type ExtractStage =
  | { op: "text" }
  | { op: "trim" }
  | { op: "trimPrefix"; text: string }
  | { op: "trimSuffix"; text: string }
  | { op: "attrExtract"; field: string };

export type Stage = MapStage | ExtractStage;

export type StageOp = Stage["op"];

export type Pipeline = readonly Readonly<Stage>[];

// ── Evaluation Values ──

export type ValueKind = "nodes" | "text";

export type EvalValue<N> =
  | { kind: "nodes"; nodes: N[] }
  | { kind: "text"; value: string };
