import type {
  BinaryOperator,
  CallNode,
  ExpressionNode,
  IntegerNode,
  RangeNode,
  Span,
} from "./ast";
import { OPERATORS, operatorForSymbol } from "./ast";
import { LRUCache } from "./common/lru-cache";
import { ParseError } from "./errors";
import type { Token } from "./lexer";
import { tokenize } from "./lexer";

/**
 * Internal parse cache for ASTs produced from source text.
 * Keyed by the exact source, since node spans point into it.
 */
const parseCache = new LRUCache<string, ExpressionNode>(1000);

let cachingEnabled = true;

/** Enable or disable the internal parse cache. */
export function setCachingEnabled(enabled: boolean): void {
  cachingEnabled = enabled;
  if (!enabled) clearParserCache();
}

/** Returns whether the internal parse cache is currently enabled. */
export function getCachingEnabled(): boolean {
  return cachingEnabled;
}

/** Clears the internal parse cache. */
export function clearParserCache(): void {
  parseCache.clear();
}

/**
 * Parse a dice expression into an AST.
 *
 * Throws `LexError` for characters outside the grammar and `ParseError`
 * for anything malformed; a partial tree is never returned.
 */
export function parse(expression: string): ExpressionNode {
  if (cachingEnabled) {
    const cached = parseCache.get(expression);
    if (cached) return cached;
  }

  const parser = new Parser(tokenize(expression));
  const result = parser.parseExpression(0);
  parser.expectEnd();

  if (cachingEnabled) parseCache.set(expression, result);
  return result;
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  /** Precedence climbing: folds operators binding at least `minPrecedence`. */
  parseExpression(minPrecedence: number): ExpressionNode {
    let left = this.parseOperand();

    while (true) {
      const next = this.peek();
      if (next.kind !== "operator") break;

      const operator = this.binaryOperator(next);
      const { precedence, associativity } = OPERATORS[operator];
      if (precedence < minPrecedence) break;

      this.advance();
      const right = this.parseExpression(
        associativity === "left" ? precedence + 1 : precedence
      );
      left = {
        type: "binary",
        operator,
        left,
        right,
        span: join(left.span, right.span),
      };
    }

    return left;
  }

  expectEnd(): void {
    const next = this.peek();
    if (next.kind !== "end") {
      throw this.unexpected(next, "an operator or end of input");
    }
  }

  private parseOperand(): ExpressionNode {
    const t = this.peek();

    switch (t.kind) {
      case "integer":
        this.advance();
        return this.integer(t.text, false, t, t);

      case "identifier":
        return this.parseCall();

      case "operator":
        return this.parseNegativeInteger();

      case "punctuation":
        switch (t.text) {
          case "(":
            return this.parseGroup();
          case "{":
            return this.parseBraces();
          case "[":
            return this.parseRange();
        }
        break;
    }

    throw this.unexpected(t, "an expression");
  }

  // `-7` is a literal only when the minus touches the digits.
  private parseNegativeInteger(): IntegerNode {
    const minus = this.peek();
    const digits = this.tokens[this.index + 1];
    if (
      minus.text !== "-" ||
      digits === undefined ||
      digits.kind !== "integer" ||
      digits.start !== minus.end
    ) {
      throw this.unexpected(minus, "an expression");
    }

    this.advance();
    this.advance();
    return this.integer(digits.text, true, minus, digits);
  }

  private parseGroup(): ExpressionNode {
    this.expect("(");
    const inner = this.parseExpression(0);
    this.expect(")");
    return inner;
  }

  private parseCall(): CallNode {
    const name = this.advance();
    this.expect("(");
    const args = this.parseSeparated(")");
    const close = this.expect(")");
    return { type: "call", name: name.text, args, span: spanOf(name, close) };
  }

  /**
   * `{}` and `{a, b, ...}` are explicit lists; `{a}` with no comma wraps a
   * single expression as a strong list. `{a,}` is a one-element list.
   */
  private parseBraces(): ExpressionNode {
    const open = this.expect("{");

    if (this.isPunctuation("}")) {
      const close = this.advance();
      return { type: "list", elements: [], span: spanOf(open, close) };
    }

    const first = this.parseExpression(0);

    if (this.isPunctuation("}")) {
      const close = this.advance();
      return { type: "strong", inner: first, span: spanOf(open, close) };
    }

    this.expect(",", "',' or '}'");
    const elements = [first, ...this.parseSeparated("}")];
    const close = this.expect("}");
    return { type: "list", elements, span: spanOf(open, close) };
  }

  private parseRange(): RangeNode {
    const open = this.expect("[");
    const start = this.parseExpression(0);
    this.expect(",");
    const end = this.parseExpression(0);

    let step: ExpressionNode | undefined;
    if (this.isPunctuation(",")) {
      this.advance();
      step = this.parseExpression(0);
      if (step.type === "integer" && step.value === 0) {
        throw new ParseError(
          "InvalidStep",
          step.span.start,
          "a non-zero step",
          "0",
          `Range step must not be zero (position ${step.span.start})`
        );
      }
    }

    const close = this.expect("]", step ? "']'" : "',' or ']'");
    const span = spanOf(open, close);
    return step
      ? { type: "range", start, end, step, span }
      : { type: "range", start, end, span };
  }

  /** Zero or more comma-separated expressions up to `close`, trailing comma allowed. */
  private parseSeparated(close: string): ExpressionNode[] {
    const items: ExpressionNode[] = [];

    while (!this.isPunctuation(close)) {
      items.push(this.parseExpression(0));
      if (!this.isPunctuation(",")) break;
      this.advance();
    }

    return items;
  }

  private integer(
    digits: string,
    negative: boolean,
    first: Token,
    last: Token
  ): IntegerNode {
    const magnitude = Number(digits);
    if (!Number.isSafeInteger(magnitude)) {
      const text = (negative ? "-" : "") + digits;
      throw new ParseError(
        "InvalidInteger",
        first.start,
        "an integer within the safe range",
        `'${text}'`,
        `Illegal integer literal '${text}' at position ${first.start}`
      );
    }

    const value = negative && magnitude !== 0 ? -magnitude : magnitude;
    return { type: "integer", value, span: spanOf(first, last) };
  }

  private binaryOperator(t: Token): BinaryOperator {
    const operator = operatorForSymbol(t.text);
    if (operator === undefined) throw this.unexpected(t, "a binary operator");
    return operator;
  }

  private expect(text: string, expected = `'${text}'`): Token {
    const t = this.peek();
    if (t.kind !== "punctuation" || t.text !== text) {
      throw this.unexpected(t, expected);
    }
    return this.advance();
  }

  private isPunctuation(text: string): boolean {
    const t = this.peek();
    return t.kind === "punctuation" && t.text === text;
  }

  private unexpected(t: Token, expected: string): ParseError {
    if (t.kind === "end") {
      return new ParseError("UnexpectedEnd", t.start, expected, "end of input");
    }
    return new ParseError("UnexpectedToken", t.start, expected, `'${t.text}'`);
  }

  private peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private advance(): Token {
    const t = this.peek();
    if (this.index < this.tokens.length - 1) this.index++;
    return t;
  }
}

function spanOf(first: Token, last: Token): Span {
  return { start: first.start, end: last.end };
}

function join(a: Span, b: Span): Span {
  return { start: a.start, end: b.end };
}
