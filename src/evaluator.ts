import type {
  BinaryNode,
  CallNode,
  ExpressionNode,
  ListNode,
  RangeNode,
  Span,
  StrongNode,
} from "./ast";
import { OPERATORS } from "./ast";
import { EvalError } from "./errors";
import type { FunctionRegistry } from "./functions";
import { defaultFunctions } from "./functions";
import type { RandomSource } from "./random";
import { createRandom } from "./random";
import type { ListValue, Value } from "./value";
import {
  combine,
  expectInteger,
  integer,
  list,
  rangeElements,
  rangeLength,
  toScalar,
} from "./value";

/** Upper bound on elements a single range or roll may produce by default. */
export const DEFAULT_MAX_LIST_LENGTH = 1000000;

export type EvaluateOptions = {
  /** Functions visible to call expressions; defaults to `defaultFunctions`. */
  functions?: FunctionRegistry;
  /** Ranges and rolls longer than this fail with `ListTooLarge`. */
  maxListLength?: number;
};

/**
 * Evaluate an expression with a freshly seeded random source.
 */
export function evaluate(
  ast: ExpressionNode,
  options: EvaluateOptions = {}
): Value {
  return evaluateWith(ast, createRandom(), options);
}

/**
 * Evaluate an expression drawing dice from `random`.
 *
 * Operands are evaluated left before right and dice are drawn one at a time
 * in roll order, so a source rebuilt from the same seed reproduces the same
 * result. The AST is only read.
 */
export function evaluateWith(
  ast: ExpressionNode,
  random: RandomSource,
  options: EvaluateOptions = {}
): Value {
  const evaluator = new Evaluator(
    random,
    options.functions ?? defaultFunctions,
    options.maxListLength ?? DEFAULT_MAX_LIST_LENGTH
  );
  return evaluator.visit(ast);
}

class Evaluator {
  constructor(
    private readonly random: RandomSource,
    private readonly functions: FunctionRegistry,
    private readonly maxListLength: number
  ) {}

  visit(node: ExpressionNode): Value {
    switch (node.type) {
      case "integer":
        return at(node.span, () => integer(node.value));
      case "list":
        return this.visitList(node);
      case "range":
        return this.visitRange(node);
      case "strong":
        return this.visitStrong(node);
      case "binary":
        return this.visitBinary(node);
      case "call":
        return this.visitCall(node);
    }
  }

  private visitList(node: ListNode): ListValue {
    const elements = node.elements.map((element) => {
      const scalar = at(element.span, () => toScalar(this.visit(element)));
      if (typeof scalar !== "number") {
        throw new EvalError(
          "NonScalarListElement",
          "List elements must be integers, but got a strong list",
          { length: scalar.elements.length },
          element.span
        );
      }
      return scalar;
    });
    return list("normal", elements);
  }

  private visitRange(node: RangeNode): ListValue {
    const start = this.integerOf(node.start, "range start");
    const end = this.integerOf(node.end, "range end");
    const step = node.step ? this.integerOf(node.step, "range step") : 1;

    const length = at(node.step?.span ?? node.span, () =>
      rangeLength(start, end, step)
    );
    this.checkLength(length, node.span);
    return list("normal", rangeElements(start, end, step));
  }

  private visitStrong(node: StrongNode): ListValue {
    const inner = this.visit(node.inner);
    if (inner.type === "integer") {
      throw new EvalError(
        "StrongWrapOfScalar",
        "Only a list can be made strong, but got an integer",
        { value: inner.value },
        node.span
      );
    }
    return list("strong", inner.elements);
  }

  private visitBinary(node: BinaryNode): Value {
    switch (node.operator) {
      case "dice":
        return this.roll(node);
      case "keepHighest":
      case "keepLowest":
      case "dropHighest":
      case "dropLowest":
        return this.keepDrop(node);
      default: {
        const operator = node.operator;
        const left = this.visit(node.left);
        const right = this.visit(node.right);
        return at(node.span, () => combine(operator, left, right));
      }
    }
  }

  private roll(node: BinaryNode): ListValue {
    const count = this.integerOf(node.left, "dice count");
    if (count < 0) {
      throw new EvalError(
        "NegativeDiceCount",
        `Cannot roll ${count} dice (must be non-negative)`,
        { count },
        node.left.span
      );
    }

    const faces = this.visit(node.right);
    this.checkLength(count, node.span);

    if (faces.type === "integer") {
      const sides = faces.value;
      if (sides < 1) {
        throw new EvalError(
          "InvalidSides",
          `A die needs at least 1 side, got ${sides}`,
          { sides },
          node.right.span
        );
      }
      const rolls = this.draw(count, () => this.random.nextInt(1, sides));
      return list("normal", rolls);
    }

    const { elements } = faces;
    if (elements.length === 0) {
      throw new EvalError(
        "EmptyFaceList",
        "Cannot roll a die with no faces",
        {},
        node.right.span
      );
    }
    const last = elements.length - 1;
    const rolls = this.draw(
      count,
      () => elements[this.random.nextInt(0, last)]
    );
    return list("normal", rolls);
  }

  private draw(count: number, next: () => number): number[] {
    const rolls: number[] = [];
    for (let i = 0; i < count; i++) rolls.push(next());
    return rolls;
  }

  /**
   * Keeps or drops the `k` highest or lowest elements. Ties go to the
   * earlier element; survivors stay in their original order.
   */
  private keepDrop(node: BinaryNode): ListValue {
    const source = this.visit(node.left);
    const { symbol } = OPERATORS[node.operator];
    if (source.type !== "list") {
      throw new EvalError(
        "ExpectedList",
        `Operator '${symbol}' expects a list on its left, but got an integer`,
        { operator: symbol },
        node.left.span
      );
    }

    const k = this.integerOf(node.right, "keep/drop count");
    const keep =
      node.operator === "keepHighest" || node.operator === "keepLowest";
    const highest =
      node.operator === "keepHighest" || node.operator === "dropHighest";
    const available = source.elements.length;

    if (k < 0 || k > available) {
      const verb = keep ? "keep" : "drop";
      throw new EvalError(
        "CountOutOfRange",
        k < 0
          ? `Cannot ${verb} ${k} elements (must be non-negative)`
          : `Cannot ${verb} ${k} elements from a list of ${available} elements`,
        { requested: k, available },
        node.right.span
      );
    }

    const order = source.elements
      .map((_, i) => i)
      .sort((a, b) => {
        const diff = source.elements[a] - source.elements[b];
        return highest ? -diff : diff;
      });
    const chosen = new Set(keep ? order.slice(0, k) : order.slice(k));

    return list(
      source.kind,
      source.elements.filter((_, i) => chosen.has(i))
    );
  }

  private visitCall(node: CallNode): Value {
    const args = node.args.map((arg) => this.visit(arg));
    return this.functions.call(node.name, args, node.span);
  }

  private integerOf(node: ExpressionNode, what: string): number {
    const value = this.visit(node);
    return at(node.span, () => expectInteger(value, what));
  }

  private checkLength(length: number, span: Span): void {
    if (length > this.maxListLength) {
      throw new EvalError(
        "ListTooLarge",
        `Result would have ${length} elements, more than the limit of ${this.maxListLength}`,
        { length, limit: this.maxListLength },
        span
      );
    }
  }
}

/** Runs `fn`, pinning any evaluation error it raises to `span`. */
function at<T>(span: Span, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof EvalError) throw error.at(span);
    throw error;
  }
}
