import type { Span } from "./ast";

/** Base class for every error raised by the parser or the evaluator. */
export class RollKitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RollKitError";
  }
}

/** A character the lexer does not recognize. */
export class LexError extends RollKitError {
  constructor(
    public readonly character: string,
    public readonly position: number
  ) {
    super(`Unexpected character '${character}' at position ${position}`);
    this.name = "LexError";
  }
}

export type ParseErrorCode =
  | "UnexpectedToken"
  | "UnexpectedEnd"
  | "InvalidInteger"
  | "InvalidStep";

export class ParseError extends RollKitError {
  constructor(
    public readonly code: ParseErrorCode,
    public readonly position: number,
    public readonly expected: string,
    public readonly found: string,
    message?: string
  ) {
    super(
      message ??
        `Expected ${expected}, found ${found} at position ${position}`
    );
    this.name = "ParseError";
  }
}

export type EvalErrorCode =
  | "LengthMismatch"
  | "NonScalarListElement"
  | "InvalidStep"
  | "StrongWrapOfScalar"
  | "NegativeDiceCount"
  | "InvalidSides"
  | "EmptyFaceList"
  | "ExpectedList"
  | "ExpectedInteger"
  | "CountOutOfRange"
  | "UnknownFunction"
  | "ArityMismatch"
  | "InvalidArgument"
  | "IntegerOverflow"
  | "ListTooLarge";

/**
 * Evaluation failure. `span` points at the node that failed when the
 * evaluator knows it; errors raised inside value combination carry none.
 */
export class EvalError extends RollKitError {
  constructor(
    public readonly code: EvalErrorCode,
    message: string,
    public readonly details: Readonly<Record<string, number | string>> = {},
    public readonly span?: Span
  ) {
    super(message);
    this.name = "EvalError";
  }

  /** Returns a copy of this error attached to `span`, unless it already has one. */
  at(span: Span): EvalError {
    if (this.span) return this;
    return new EvalError(this.code, this.message, this.details, span);
  }
}
