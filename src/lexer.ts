import { ParseError } from "./errors.js";
import type { PathAxis } from "./types.js";

export type TokenKind = "operator" | "literal" | "bare" | "lparen" | "rparen" | "comma" | "pipe";

export interface Token {
  kind: TokenKind;
  /** Operator name with its sigil, literal content without backticks, or the raw text. */
  value: string;
  position: number;
  end: number;
}

export interface PathStep {
  axis: PathAxis;
  tag: string;
}

export const FIELD_RE = /^[A-Za-z0-9_-]+$/;
export const TEXT_RE = /^[A-Za-z]+$/;
const NUMBER_RE = /^-?[0-9]+$/;

const OPERATOR_RE = /[@#][A-Za-z]+/y;
const PATH_STEP_RE = /(\/\/|\/)([A-Za-z_-]*)/y;

const PUNCTUATION = new Map<string, TokenKind>([
  ["(", "lparen"],
  [")", "rparen"],
  [",", "comma"],
  ["|", "pipe"],
]);

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\r" || ch === "\n";
}

function isDelimiter(ch: string): boolean {
  return isWhitespace(ch) || PUNCTUATION.has(ch) || ch === "`";
}

/**
 * Split pipeline text into tokens. Whitespace outside backticks is dropped;
 * inside backticks every character is literal content.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let stageStart = 0;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (isWhitespace(ch)) {
      i++;
      continue;
    }

    const punctuation = PUNCTUATION.get(ch);
    if (punctuation) {
      tokens.push({ kind: punctuation, value: ch, position: i, end: i + 1 });
      i++;
      if (punctuation === "pipe") stageStart = i;
      continue;
    }

    if (ch === "`") {
      const close = text.indexOf("`", i + 1);
      if (close < 0) {
        const next = text.indexOf("|", i + 1);
        const segment = text.slice(stageStart, next < 0 ? text.length : next).trim();
        throw new ParseError("UnterminatedLiteral", i, segment, "Unterminated literal");
      }
      tokens.push({ kind: "literal", value: text.slice(i + 1, close), position: i, end: close + 1 });
      i = close + 1;
      continue;
    }

    if (ch === "@" || ch === "#") {
      OPERATOR_RE.lastIndex = i;
      const match = OPERATOR_RE.exec(text);
      if (match) {
        tokens.push({ kind: "operator", value: match[0], position: i, end: i + match[0].length });
        i += match[0].length;
        continue;
      }
    }

    let j = i + 1;
    while (j < text.length && !isDelimiter(text[j])) j++;
    tokens.push({ kind: "bare", value: text.slice(i, j), position: i, end: j });
    i = j;
  }

  return tokens;
}

/**
 * Decompose the content of a path literal such as "/body//div/a".
 * Returns the reason as a string when the content is not a path.
 */
export function readPathLiteral(content: string): PathStep[] | string {
  if (content === "") return "Empty path";

  const steps: PathStep[] = [];
  let i = 0;

  while (i < content.length) {
    PATH_STEP_RE.lastIndex = i;
    const match = PATH_STEP_RE.exec(content);
    if (!match) {
      return `Unexpected "${content[i]}" in path, expected "/" or "//"`;
    }
    if (match[2] === "") {
      return `Empty tag in path after "${match[1]}"`;
    }
    steps.push({ axis: match[1] === "//" ? "descendant" : "child", tag: match[2] });
    i += match[0].length;
  }

  return steps;
}

/**
 * Read a signed decimal integer. Leading zeros are allowed and "-0" is 0.
 */
export function readNumber(raw: string): number | null {
  if (!NUMBER_RE.test(raw)) return null;
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) return null;
  return value === 0 ? 0 : value;
}

export function readCaseFlag(raw: string): boolean | null {
  if (raw === "1") return true;
  if (raw === "0") return false;
  return null;
}
