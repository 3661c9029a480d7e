import { evaluate, evaluateWith } from "./evaluator";
import type { EvaluateOptions } from "./evaluator";
import { parse } from "./parser";
import type { RandomSource } from "./random";
import type { Value } from "./value";

export type {
  Associativity,
  BinaryNode,
  BinaryOperator,
  CallNode,
  ExpressionNode,
  IntegerNode,
  ListNode,
  OperatorInfo,
  RangeNode,
  Span,
  StrongNode,
} from "./ast";
export { BINARY_OPERATORS, OPERATORS, operatorForSymbol } from "./ast";
export { LRUCache } from "./common/lru-cache";
export {
  EvalError,
  LexError,
  ParseError,
  RollKitError,
} from "./errors";
export type { EvalErrorCode, ParseErrorCode } from "./errors";
export {
  DEFAULT_MAX_LIST_LENGTH,
  evaluate,
  evaluateWith,
} from "./evaluator";
export type { EvaluateOptions } from "./evaluator";
export { explain, formatExpression } from "./explain";
export type { ExplainOptions } from "./explain";
export {
  createFunctionRegistry,
  defaultFunctions,
  FunctionRegistry,
  registerFunction,
  unregisterFunction,
} from "./functions";
export type { FunctionEntry, RollFunction, Signature } from "./functions";
export { tokenize } from "./lexer";
export type { Token, TokenKind } from "./lexer";
export {
  clearParserCache,
  getCachingEnabled,
  parse,
  setCachingEnabled,
} from "./parser";
export { createRandom, randomSeed, SeededRandom } from "./random";
export type { RandomSource } from "./random";
export {
  combine,
  describeValue,
  formatValue,
  rangeElements,
  rangeLength,
} from "./value";
export type {
  ArithmeticOperator,
  IntegerValue,
  ListKind,
  ListValue,
  Value,
  ValueSummary,
} from "./value";

/**
 * Parse and evaluate `expression` in one step, e.g. `roll("4d6kh3")`.
 * Pass a `random` source for reproducible rolls.
 */
export function roll(
  expression: string,
  random?: RandomSource,
  options: EvaluateOptions = {}
): Value {
  const ast = parse(expression);
  return random ? evaluateWith(ast, random, options) : evaluate(ast, options);
}
