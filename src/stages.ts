import { ParseError } from "./errors.js";
import { FIELD_RE, TEXT_RE, readPathLiteral } from "./lexer.js";
import type { ExtractStage, MapStage, Pipeline, Stage } from "./types.js";

const MAP_OPS = new Set<Stage["op"]>(["flat", "path", "attr", "id", "class", "child"]);

export function isMapStage(stage: Stage): stage is MapStage {
  return MAP_OPS.has(stage.op);
}

export function isExtractStage(stage: Stage): stage is ExtractStage {
  return !MAP_OPS.has(stage.op);
}

// ── Constructors ──
// Programmatic counterparts of the HQL operators. They validate their
// arguments like the parser does and throw ParseError on bad input.

export const stages = {
  flat(): Stage {
    return freeze({ op: "flat" });
  },

  /** One stage per step, e.g. path("/body//a") yields two stages. */
  path(path: string): Stage[] {
    const steps = readPathLiteral(path);
    if (typeof steps === "string") {
      throw invalid(`@path(\`${path}\`)`, steps);
    }
    return steps.map((step) => freeze({ op: "path", axis: step.axis, tag: step.tag }));
  },

  attr(field: string, value?: string): Stage {
    checkField(field, `@attr(\`${field}\`)`);
    if (value === undefined) {
      return freeze({ op: "attr", field });
    }
    checkField(value, `@attr(\`${field}\`, \`${value}\`)`);
    return freeze({ op: "attr", field, value });
  },

  id(value: string, caseSensitive = true): Stage {
    checkField(value, `@id(\`${value}\`)`);
    return freeze({ op: "id", value, caseSensitive });
  },

  class(value: string, caseSensitive = true): Stage {
    checkField(value, `@class(\`${value}\`)`);
    return freeze({ op: "class", value, caseSensitive });
  },

  child(index: number): Stage {
    if (!Number.isSafeInteger(index)) {
      throw new ParseError("InvalidNumber", 0, `@child(${index})`, `Invalid child index "${index}"`);
    }
    return freeze({ op: "child", index: index === 0 ? 0 : index });
  },

  text(): Stage {
    return freeze({ op: "text" });
  },

  trim(): Stage {
    return freeze({ op: "trim" });
  },

  trimPrefix(text: string): Stage {
    checkText(text, `#trimPrefix(\`${text}\`)`);
    return freeze({ op: "trimPrefix", text });
  },

  trimSuffix(text: string): Stage {
    checkText(text, `#trimSuffix(\`${text}\`)`);
    return freeze({ op: "trimSuffix", text });
  },

  attrExtract(field: string): Stage {
    checkField(field, `#attr(\`${field}\`)`);
    return freeze({ op: "attrExtract", field });
  },
};

function freeze(stage: Stage): Readonly<Stage> {
  return Object.freeze(stage);
}

function checkField(value: string, segment: string): void {
  if (!FIELD_RE.test(value)) {
    throw invalid(segment, `Invalid field literal \`${value}\``);
  }
}

function checkText(value: string, segment: string): void {
  if (!TEXT_RE.test(value)) {
    throw invalid(segment, `Invalid text literal \`${value}\``);
  }
}

function invalid(segment: string, reason: string): ParseError {
  return new ParseError("MalformedStage", 0, segment, reason);
}

// ── Formatting ──

export function formatStage(stage: Stage): string {
  switch (stage.op) {
    case "flat":
      return "@flat()";
    case "path":
      return `@path(\`${pathStep(stage.axis, stage.tag)}\`)`;
    case "attr":
      return stage.value === undefined
        ? `@attr(\`${stage.field}\`)`
        : `@attr(\`${stage.field}\`, \`${stage.value}\`)`;
    case "id":
    case "class":
      return stage.caseSensitive
        ? `@${stage.op}(\`${stage.value}\`)`
        : `@${stage.op}(\`${stage.value}\`, 0)`;
    case "child":
      return `@child(${stage.index})`;
    case "text":
      return "#text()";
    case "trim":
      return "#trim()";
    case "trimPrefix":
      return `#trimPrefix(\`${stage.text}\`)`;
    case "trimSuffix":
      return `#trimSuffix(\`${stage.text}\`)`;
    case "attrExtract":
      return `#attr(\`${stage.field}\`)`;
  }
}

/**
 * Render a pipeline as canonical HQL. Runs of path stages are merged back
 * into a single @path literal.
 */
export function formatPipeline(pipeline: Pipeline): string {
  const parts: string[] = [];
  let pendingPath = "";

  for (const stage of pipeline) {
    if (stage.op === "path") {
      pendingPath += pathStep(stage.axis, stage.tag);
      continue;
    }
    if (pendingPath) {
      parts.push(`@path(\`${pendingPath}\`)`);
      pendingPath = "";
    }
    parts.push(formatStage(stage));
  }

  if (pendingPath) {
    parts.push(`@path(\`${pendingPath}\`)`);
  }

  return parts.join(" | ");
}

function pathStep(axis: "child" | "descendant", tag: string): string {
  return `${axis === "descendant" ? "//" : "/"}${tag}`;
}
