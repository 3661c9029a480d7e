import { EvalError } from "./errors";

export type ListKind = "normal" | "strong";

export type IntegerValue = {
  readonly type: "integer";
  readonly value: number;
};

/**
 * A normal list collapses to the sum of its elements whenever it meets an
 * arithmetic or comparison operator; a strong list never does and combines
 * element by element instead.
 */
export type ListValue = {
  readonly type: "list";
  readonly kind: ListKind;
  readonly elements: readonly number[];
};

export type Value = IntegerValue | ListValue;

export type ArithmeticOperator =
  | "multiply"
  | "add"
  | "subtract"
  | "equal"
  | "notEqual"
  | "lessThan"
  | "lessEqual"
  | "greaterThan"
  | "greaterEqual";

export function integer(value: number): IntegerValue {
  return { type: "integer", value: checked(value) };
}

export function list(kind: ListKind, elements: readonly number[]): ListValue {
  return { type: "list", kind, elements };
}

export function sum(elements: readonly number[]): number {
  return elements.reduce((total, n) => checked(total + n), 0);
}

/** Integer or normal-list value as one integer; strong lists stay lists. */
export function toScalar(value: Value): number | ListValue {
  if (value.type === "integer") return value.value;
  return value.kind === "normal" ? sum(value.elements) : value;
}

/** Like `toScalar`, but a strong list is an `ExpectedInteger` error. */
export function expectInteger(value: Value, what: string): number {
  const scalar = toScalar(value);
  if (typeof scalar !== "number") {
    throw new EvalError(
      "ExpectedInteger",
      `Expected an integer for ${what}, but got a strong list of ${scalar.elements.length} elements`,
      { length: scalar.elements.length }
    );
  }
  return scalar;
}

const APPLY: Record<ArithmeticOperator, (a: number, b: number) => number> = {
  multiply: (a, b) => a * b,
  add: (a, b) => a + b,
  subtract: (a, b) => a - b,
  equal: (a, b) => (a === b ? 1 : 0),
  notEqual: (a, b) => (a !== b ? 1 : 0),
  lessThan: (a, b) => (a < b ? 1 : 0),
  lessEqual: (a, b) => (a <= b ? 1 : 0),
  greaterThan: (a, b) => (a > b ? 1 : 0),
  greaterEqual: (a, b) => (a >= b ? 1 : 0),
};

/**
 * Combine two values under an arithmetic or comparison operator.
 *
 * - integer op integer gives an integer (comparisons give 1 or 0);
 * - normal lists are summed first;
 * - a strong list against an integer broadcasts the integer;
 * - two strong lists pair up by index and must have the same length.
 */
export function combine(
  operator: ArithmeticOperator,
  left: Value,
  right: Value
): Value {
  const apply = (a: number, b: number) => checked(APPLY[operator](a, b));
  const l = toScalar(left);
  const r = toScalar(right);

  if (typeof l === "number") {
    if (typeof r === "number") return integer(apply(l, r));
    return list("strong", r.elements.map((n) => apply(l, n)));
  }

  if (typeof r === "number") {
    return list("strong", l.elements.map((n) => apply(n, r)));
  }

  if (l.elements.length !== r.elements.length) {
    throw new EvalError(
      "LengthMismatch",
      `List length mismatch: left has ${l.elements.length} elements, right has ${r.elements.length} elements`,
      { left: l.elements.length, right: r.elements.length }
    );
  }
  return list(
    "strong",
    l.elements.map((n, i) => apply(n, r.elements[i]))
  );
}

/**
 * Number of elements in the inclusive range from `start` to `end`. Only the
 * magnitude of `step` matters; the direction follows `start` and `end`.
 */
export function rangeLength(start: number, end: number, step = 1): number {
  const magnitude = Math.abs(step);
  if (magnitude === 0) {
    throw new EvalError("InvalidStep", "Range step must not be zero", {
      step,
    });
  }
  return Math.floor(Math.abs(end - start) / magnitude) + 1;
}

/** Elements of that range: [1, 10, -2] gives {1, 3, 5, 7, 9}. */
export function rangeElements(start: number, end: number, step = 1): number[] {
  const length = rangeLength(start, end, step);
  const delta = start <= end ? Math.abs(step) : -Math.abs(step);
  return Array.from({ length }, (_, i) => start + i * delta);
}

function checked(n: number): number {
  if (!Number.isSafeInteger(n)) {
    throw new EvalError(
      "IntegerOverflow",
      `Integer result ${n} is outside the supported range`,
      { limit: Number.MAX_SAFE_INTEGER }
    );
  }
  // -0 from products like 0 * -3
  return n === 0 ? 0 : n;
}

/** What the evaluation entry point reports for a result. */
export type ValueSummary = {
  total: number;
  elements?: readonly number[];
  length?: number;
};

export function describeValue(value: Value): ValueSummary {
  if (value.type === "integer") return { total: value.value };
  return {
    total: sum(value.elements),
    elements: value.elements,
    length: value.elements.length,
  };
}

/** "7" for integers, "21 (from list with 3 elements: {6, 7, 8})" for lists. */
export function formatValue(value: Value): string {
  if (value.type === "integer") return String(value.value);
  const { total, length } = describeValue(value);
  return `${total} (from list with ${length} elements: {${value.elements.join(", ")}})`;
}
