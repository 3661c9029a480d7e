/** Half-open range of character offsets into the parsed source. */
export type Span = {
  readonly start: number;
  readonly end: number;
};

export type ExpressionNode =
  | IntegerNode
  | ListNode
  | RangeNode
  | StrongNode
  | BinaryNode
  | CallNode;

export type IntegerNode = {
  readonly type: "integer";
  readonly value: number;
  readonly span: Span;
};

/** Explicit list literal, e.g. {1, 2, 3}. Each element must evaluate to a scalar. */
export type ListNode = {
  readonly type: "list";
  readonly elements: readonly ExpressionNode[];
  readonly span: Span;
};

/** Range list literal, e.g. [1, 10] or [1, 10, 2]. */
export type RangeNode = {
  readonly type: "range";
  readonly start: ExpressionNode;
  readonly end: ExpressionNode;
  readonly step?: ExpressionNode;
  readonly span: Span;
};

/** Brace-wrapping of a single list-valued expression, e.g. {3d6}. */
export type StrongNode = {
  readonly type: "strong";
  readonly inner: ExpressionNode;
  readonly span: Span;
};

export type BinaryNode = {
  readonly type: "binary";
  readonly operator: BinaryOperator;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
  readonly span: Span;
};

export type CallNode = {
  readonly type: "call";
  readonly name: string;
  readonly args: readonly ExpressionNode[];
  readonly span: Span;
};

export type BinaryOperator =
  | "dice"
  | "keepHighest"
  | "keepLowest"
  | "dropHighest"
  | "dropLowest"
  | "multiply"
  | "add"
  | "subtract"
  | "equal"
  | "notEqual"
  | "lessThan"
  | "lessEqual"
  | "greaterThan"
  | "greaterEqual";

export type Associativity = "left" | "right";

export type OperatorInfo = {
  symbol: string;
  description: string;
  precedence: number;
  associativity: Associativity;
};

export const BINARY_OPERATORS: readonly BinaryOperator[] = [
  "dice",
  "keepHighest",
  "keepLowest",
  "dropHighest",
  "dropLowest",
  "multiply",
  "add",
  "subtract",
  "equal",
  "notEqual",
  "lessThan",
  "lessEqual",
  "greaterThan",
  "greaterEqual",
];

/** Spelling, display name and binding power of each binary operator. */
export const OPERATORS: Readonly<Record<BinaryOperator, OperatorInfo>> = {
  dice: {
    symbol: "d",
    description: "Dice Roll",
    precedence: 150,
    associativity: "right",
  },
  keepHighest: {
    symbol: "kh",
    description: "Keep Highest",
    precedence: 130,
    associativity: "left",
  },
  keepLowest: {
    symbol: "kl",
    description: "Keep Lowest",
    precedence: 130,
    associativity: "left",
  },
  dropHighest: {
    symbol: "dh",
    description: "Drop Highest",
    precedence: 130,
    associativity: "left",
  },
  dropLowest: {
    symbol: "dl",
    description: "Drop Lowest",
    precedence: 130,
    associativity: "left",
  },
  multiply: {
    symbol: "*",
    description: "Multiplication",
    precedence: 90,
    associativity: "left",
  },
  add: {
    symbol: "+",
    description: "Addition",
    precedence: 70,
    associativity: "left",
  },
  subtract: {
    symbol: "-",
    description: "Subtraction",
    precedence: 70,
    associativity: "left",
  },
  equal: {
    symbol: "==",
    description: "Equal",
    precedence: 50,
    associativity: "left",
  },
  notEqual: {
    symbol: "!=",
    description: "Not Equal",
    precedence: 50,
    associativity: "left",
  },
  lessThan: {
    symbol: "<",
    description: "Less Than",
    precedence: 50,
    associativity: "left",
  },
  lessEqual: {
    symbol: "<=",
    description: "Less or Equal",
    precedence: 50,
    associativity: "left",
  },
  greaterThan: {
    symbol: ">",
    description: "Greater Than",
    precedence: 50,
    associativity: "left",
  },
  greaterEqual: {
    symbol: ">=",
    description: "Greater or Equal",
    precedence: 50,
    associativity: "left",
  },
};

const BY_SYMBOL = new Map<string, BinaryOperator>(
  BINARY_OPERATORS.map((op) => [OPERATORS[op].symbol, op])
);

/** Looks up the binary operator spelled `symbol`, if any. */
export function operatorForSymbol(symbol: string): BinaryOperator | undefined {
  return BY_SYMBOL.get(symbol);
}
