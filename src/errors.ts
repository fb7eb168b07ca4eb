import type { ValueKind } from "./types.js";

export type ParseErrorCode =
  | "MalformedStage"
  | "ArityMismatch"
  | "InvalidNumber"
  | "UnterminatedLiteral"
  | "UnknownOperator";

/**
 * Raised while compiling pipeline text. Compilation is all-or-nothing, so a
 * ParseError never comes with a partial pipeline.
 */
export class ParseError extends Error {
  override readonly name = "ParseError";

  constructor(
    readonly code: ParseErrorCode,
    readonly position: number,
    readonly segment: string,
    readonly reason: string,
  ) {
    super(`${reason} at position ${position}: ${segment}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type EvalErrorCode = "TypeMismatch";

/**
 * Raised when a stage receives the wrong kind of value, e.g. a map stage
 * running after `#text()`.
 */
export class EvalError extends Error {
  override readonly name = "EvalError";
  readonly code: EvalErrorCode = "TypeMismatch";

  constructor(
    readonly stage: string,
    readonly expected: ValueKind,
    readonly actual: ValueKind,
  ) {
    super(`Stage ${stage} expects ${expected}, got ${actual}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}

export function isEvalError(error: unknown): error is EvalError {
  return error instanceof EvalError;
}
