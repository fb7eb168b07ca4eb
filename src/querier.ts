import { evaluate } from "./evaluator.js";
import { parsePipeline } from "./expression-parser.js";
import { parseHtml, type ParseHtmlOptions } from "./html-parser.js";
import { formatPipeline } from "./stages.js";
import { domAdapter, type TreeAdapter } from "./tree-adapter.js";
import type { DocumentNode, DomNode, EvalValue, Pipeline, Stage } from "./types.js";

export type QueryOptions = ParseHtmlOptions;

/**
 * A compiled pipeline bound to nothing in particular. Build it once and run
 * it against as many documents as needed; it is never mutated.
 */
export class Querier {
  readonly stages: Pipeline;

  constructor(stages: readonly Stage[]) {
    this.stages = Object.freeze(stages.map((stage) => Object.freeze({ ...stage })));
  }

  static parse(hql: string): Querier {
    return new Querier(parsePipeline(hql));
  }

  addStage(...stages: Stage[]): Querier {
    return new Querier([...this.stages, ...stages]);
  }

  queryDocument(document: DocumentNode): EvalValue<DomNode> {
    return evaluate(this.stages, [document], domAdapter);
  }

  run<N>(context: readonly N[], adapter: TreeAdapter<N>): EvalValue<N> {
    return evaluate(this.stages, context, adapter);
  }

  toString(): string {
    return formatPipeline(this.stages);
  }
}

/**
 * Parse both the pipeline and the markup, then run the pipeline from the
 * document root.
 */
export function query(hql: string, markup: string, options: QueryOptions = {}): EvalValue<DomNode> {
  return Querier.parse(hql).queryDocument(parseHtml(markup, options));
}
