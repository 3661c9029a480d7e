import { LexError } from "./errors";

export type TokenKind =
  | "integer"
  | "identifier"
  | "operator"
  | "punctuation"
  | "end";

export type Token = {
  readonly kind: TokenKind;
  /** Source text of the token; empty for the end marker. */
  readonly text: string;
  readonly start: number;
  readonly end: number;
};

// Longest spelling first so that `dh` is never read as `d` followed by `h`.
const WORD_OPERATORS = ["kh", "kl", "dh", "dl", "d"];
const SYMBOL_OPERATORS = ["==", "!=", "<=", ">=", "<", ">", "+", "-", "*"];
const PUNCTUATION = new Set(["(", ")", "{", "}", "[", "]", ","]);
const CLOSERS = new Set([")", "}", "]"]);

/**
 * Splits `source` into tokens, ending with a single `end` token.
 *
 * A run of letters is an identifier only when the next non-blank character
 * is `(` and no operand ends right before it; anywhere else letters spell
 * the operators `kh kl dh dl d`. That lets `4d6kh3` and `2d(1d6)` lex as
 * dice while `max(3d6)` still names a function.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const c = source[i];

    if (isWhitespace(c)) {
      i++;
      continue;
    }

    if (isDigit(c)) {
      const start = i;
      while (i < source.length && isDigit(source[i])) i++;
      tokens.push(token("integer", source, start, i));
      continue;
    }

    if (isIdentStart(c)) {
      let wordEnd = i + 1;
      while (wordEnd < source.length && isIdentPart(source[wordEnd])) {
        wordEnd++;
      }

      if (
        nextNonBlank(source, wordEnd) === "(" &&
        !endsOperand(tokens[tokens.length - 1])
      ) {
        tokens.push(token("identifier", source, i, wordEnd));
        i = wordEnd;
        continue;
      }

      const op = WORD_OPERATORS.find((w) => source.startsWith(w, i));
      if (op === undefined) throw new LexError(c, i);
      tokens.push(token("operator", source, i, i + op.length));
      i += op.length;
      continue;
    }

    const symbol = SYMBOL_OPERATORS.find((s) => source.startsWith(s, i));
    if (symbol !== undefined) {
      tokens.push(token("operator", source, i, i + symbol.length));
      i += symbol.length;
      continue;
    }

    if (PUNCTUATION.has(c)) {
      tokens.push(token("punctuation", source, i, i + 1));
      i++;
      continue;
    }

    throw new LexError(c, i);
  }

  const end = source.length;
  tokens.push({ kind: "end", text: "", start: end, end });
  return tokens;
}

function token(
  kind: TokenKind,
  source: string,
  start: number,
  end: number
): Token {
  return { kind, text: source.slice(start, end), start, end };
}

function endsOperand(t: Token | undefined): boolean {
  if (t === undefined) return false;
  if (t.kind === "integer") return true;
  return t.kind === "punctuation" && CLOSERS.has(t.text);
}

function nextNonBlank(source: string, from: number): string | undefined {
  let i = from;
  while (i < source.length && isWhitespace(source[i])) i++;
  return source[i];
}

function isWhitespace(c: string): boolean {
  return c === " " || c === "\t" || c === "\n" || c === "\r";
}

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

function isIdentStart(c: string): boolean {
  return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
}

function isIdentPart(c: string): boolean {
  return isIdentStart(c) || isDigit(c);
}
