import { evaluate } from "./evaluator.js";
import { parsePipeline } from "./expression-parser.js";
import type { TreeAdapter } from "./tree-adapter.js";
import type { EvalValue, Pipeline } from "./types.js";

export { parsePipeline } from "./expression-parser.js";
export { evaluate, textOf } from "./evaluator.js";
export { tokenize } from "./lexer.js";
export { stages, formatStage, formatPipeline, isMapStage, isExtractStage } from "./stages.js";
export { parseHtml, decodeEntities } from "./html-parser.js";
export { domAdapter, DOCUMENT_TAG } from "./tree-adapter.js";
export { renderNode, renderValue, escapeHtml } from "./renderer.js";
export { Querier, query } from "./querier.js";
export { ParseError, EvalError, isParseError, isEvalError } from "./errors.js";

export function compile(hql: string): Pipeline {
  return parsePipeline(hql);
}

export function run<N>(pipeline: Pipeline, context: readonly N[], adapter: TreeAdapter<N>): EvalValue<N> {
  return evaluate(pipeline, context, adapter);
}

export type { ParseHtmlOptions } from "./html-parser.js";
export type { QueryOptions } from "./querier.js";
export type { TreeAdapter, NodeKind } from "./tree-adapter.js";
export type { Token, TokenKind, PathStep } from "./lexer.js";
export type { ParseErrorCode, EvalErrorCode } from "./errors.js";
export type {
  DomNode,
  DocumentNode,
  ElementNode,
  TextNode,
  ParentNode,
  PathAxis,
  MapStage,
  ExtractStage,
  Stage,
  StageOp,
  Pipeline,
  ValueKind,
  EvalValue,
} from "./types.js";
