import { ParseError, type ParseErrorCode } from "./errors.js";
import {
  FIELD_RE,
  TEXT_RE,
  readCaseFlag,
  readNumber,
  readPathLiteral,
  tokenize,
  type Token,
} from "./lexer.js";
import type { Pipeline, Stage } from "./types.js";

interface SegmentContext {
  segment: string;
}

interface OperatorSpec {
  min: number;
  max: number;
  build: (args: Token[], ctx: SegmentContext) => Stage[];
}

const OPERATORS = new Map<string, OperatorSpec>([
  ["@flat", { min: 0, max: 0, build: () => [{ op: "flat" }] }],
  ["@path", { min: 1, max: 1, build: buildPath }],
  ["@attr", { min: 1, max: 2, build: buildAttr }],
  ["@id", { min: 1, max: 2, build: (args, ctx) => [buildTokenMatch("id", args, ctx)] }],
  ["@class", { min: 1, max: 2, build: (args, ctx) => [buildTokenMatch("class", args, ctx)] }],
  ["@child", { min: 1, max: 1, build: buildChild }],
  ["#text", { min: 0, max: 0, build: () => [{ op: "text" }] }],
  ["#trim", { min: 0, max: 0, build: () => [{ op: "trim" }] }],
  [
    "#trimPrefix",
    { min: 1, max: 1, build: (args, ctx) => [{ op: "trimPrefix", text: expectLiteral(args[0], TEXT_RE, "text", ctx) }] },
  ],
  [
    "#trimSuffix",
    { min: 1, max: 1, build: (args, ctx) => [{ op: "trimSuffix", text: expectLiteral(args[0], TEXT_RE, "text", ctx) }] },
  ],
  [
    "#attr",
    { min: 1, max: 1, build: (args, ctx) => [{ op: "attrExtract", field: expectLiteral(args[0], FIELD_RE, "field", ctx) }] },
  ],
]);

/**
 * Compile pipeline text such as "@path(`//div`) | @class(`item`) | #text()"
 * into a frozen list of stages.
 *
 * The parser is purely syntactic: a map stage after an extract stage is
 * accepted here and rejected by the evaluator.
 */
export function parsePipeline(text: string): Pipeline {
  const tokens = tokenize(text);
  const stages: Readonly<Stage>[] = [];

  let start = 0;
  for (let i = 0; i <= tokens.length; i++) {
    if (i < tokens.length && tokens[i].kind !== "pipe") continue;

    const segmentTokens = tokens.slice(start, i);
    if (segmentTokens.length === 0) {
      const position = i < tokens.length ? tokens[i].position : text.length;
      throw new ParseError("MalformedStage", position, "", "Empty stage");
    }

    for (const stage of parseStage(text, segmentTokens)) {
      stages.push(Object.freeze(stage));
    }
    start = i + 1;
  }

  return Object.freeze(stages);
}

function parseStage(text: string, tokens: Token[]): Stage[] {
  const first = tokens[0];
  const last = tokens[tokens.length - 1];
  const ctx: SegmentContext = { segment: text.slice(first.position, last.end).trim() };

  if (first.kind !== "operator") {
    fail(ctx, "MalformedStage", first.position, `Expected an operator, got "${first.value}"`);
  }

  const spec = OPERATORS.get(first.value);
  if (!spec) {
    fail(ctx, "UnknownOperator", first.position, `Unknown operator ${first.value}`);
  }

  const open = tokens[1];
  if (!open || open.kind !== "lparen") {
    fail(ctx, "MalformedStage", open?.position ?? first.end, `Expected "(" after ${first.value}`);
  }

  if (last === open || last.kind !== "rparen") {
    fail(ctx, "MalformedStage", last.end, `Expected ")" to close ${first.value}`);
  }

  const args = readArguments(tokens.slice(2, -1), ctx);
  if (args.length < spec.min || args.length > spec.max) {
    const expected = spec.min === spec.max ? `${spec.min}` : `${spec.min}-${spec.max}`;
    fail(ctx, "ArityMismatch", first.position, `${first.value} expects ${expected} args, got ${args.length}`);
  }

  return spec.build(args, ctx);
}

/**
 * Read a comma separated argument list: arg ("," arg)*.
 */
function readArguments(tokens: Token[], ctx: SegmentContext): Token[] {
  const args: Token[] = [];
  if (tokens.length === 0) return args;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const expectArgument = i % 2 === 0;

    if (expectArgument) {
      if (token.kind !== "literal" && token.kind !== "bare") {
        fail(ctx, "MalformedStage", token.position, `Expected an argument, got "${token.value}"`);
      }
      args.push(token);
    } else if (token.kind !== "comma") {
      fail(ctx, "MalformedStage", token.position, `Expected "," between arguments, got "${token.value}"`);
    }
  }

  if (tokens[tokens.length - 1].kind === "comma") {
    fail(ctx, "MalformedStage", tokens[tokens.length - 1].position, "Trailing comma in arguments");
  }

  return args;
}

function buildPath(args: Token[], ctx: SegmentContext): Stage[] {
  const content = expectLiteral(args[0], null, "path", ctx);
  const steps = readPathLiteral(content);
  if (typeof steps === "string") {
    fail(ctx, "MalformedStage", args[0].position, steps);
  }
  return steps.map((step): Stage => ({ op: "path", axis: step.axis, tag: step.tag }));
}

function buildAttr(args: Token[], ctx: SegmentContext): Stage[] {
  const field = expectLiteral(args[0], FIELD_RE, "field", ctx);
  if (args.length === 1) {
    return [{ op: "attr", field }];
  }
  return [{ op: "attr", field, value: expectLiteral(args[1], FIELD_RE, "field", ctx) }];
}

function buildTokenMatch(op: "id" | "class", args: Token[], ctx: SegmentContext): Stage {
  const value = expectLiteral(args[0], FIELD_RE, "field", ctx);
  if (args.length === 1) {
    return { op, value, caseSensitive: true };
  }

  const flag = args[1];
  const caseSensitive = flag.kind === "bare" ? readCaseFlag(flag.value) : null;
  if (caseSensitive === null) {
    fail(ctx, "MalformedStage", flag.position, `Case flag must be 0 or 1, got "${flag.value}"`);
  }
  return { op, value, caseSensitive };
}

function buildChild(args: Token[], ctx: SegmentContext): Stage[] {
  const arg = args[0];
  const index = arg.kind === "bare" ? readNumber(arg.value) : null;
  if (index === null) {
    fail(ctx, "InvalidNumber", arg.position, `Invalid child index "${arg.value}"`);
  }
  return [{ op: "child", index }];
}

function expectLiteral(token: Token, pattern: RegExp | null, what: string, ctx: SegmentContext): string {
  if (token.kind !== "literal") {
    fail(ctx, "MalformedStage", token.position, `Expected a backtick-quoted ${what}, got "${token.value}"`);
  }
  if (pattern && !pattern.test(token.value)) {
    fail(ctx, "MalformedStage", token.position, `Invalid ${what} literal \`${token.value}\``);
  }
  return token.value;
}

function fail(ctx: SegmentContext, code: ParseErrorCode, position: number, reason: string): never {
  throw new ParseError(code, position, ctx.segment, reason);
}
