import type { Span } from "./ast";
import { EvalError } from "./errors";
import type { ListValue, Value } from "./value";
import { expectInteger, integer, list, sum } from "./value";

/**
 * A function callable from expressions as `name(arg, ...)`.
 * Receives evaluated argument values; errors it throws reach the caller
 * of `evaluate` unchanged.
 */
export type RollFunction = (args: readonly Value[]) => Value;

/**
 * Accepted argument counts: an exact arity, an inclusive range, or a
 * validator that throws for bad arguments.
 */
export type Signature =
  | number
  | { min: number; max?: number }
  | ((args: readonly Value[]) => void);

export type FunctionEntry = {
  readonly name: string;
  readonly signature: Signature;
  readonly fn: RollFunction;
};

const NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Name-to-function table for call expressions; lookup is case-sensitive. */
export class FunctionRegistry {
  private readonly entries = new Map<string, FunctionEntry>();

  /** Adds `fn` under `name`, replacing any function already registered there. */
  register(name: string, signature: Signature, fn: RollFunction): this {
    if (!NAME.test(name)) {
      throw new TypeError(`Invalid function name '${name}'`);
    }
    this.entries.set(name, { name, signature, fn });
    return this;
  }

  unregister(name: string): boolean {
    return this.entries.delete(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): FunctionEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Looks up and invokes `name`. Lookup and arity failures are reported at
   * `span`; whatever the function itself throws passes through untouched.
   */
  call(name: string, args: readonly Value[], span?: Span): Value {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new EvalError(
        "UnknownFunction",
        `Unknown function '${name}'`,
        { name },
        span
      );
    }
    checkSignature(entry, args, span);
    return entry.fn(args);
  }
}

function checkSignature(
  { name, signature }: FunctionEntry,
  args: readonly Value[],
  span: Span | undefined
) {
  if (typeof signature === "function") {
    signature(args);
    return;
  }

  const min = typeof signature === "number" ? signature : signature.min;
  const max = typeof signature === "number" ? signature : signature.max;
  if (args.length >= min && (max === undefined || args.length <= max)) return;

  const expected =
    min === max
      ? `${min}`
      : max === undefined
        ? `at least ${min}`
        : `${min} to ${max}`;
  throw new EvalError(
    "ArityMismatch",
    `Function '${name}' expects ${expected} argument(s), got ${args.length}`,
    { name, received: args.length },
    span
  );
}

function expectList(value: Value, fn: string): ListValue {
  if (value.type !== "list") {
    throw new EvalError(
      "ExpectedList",
      `Function '${fn}' expects a list, but got an integer`,
      { name: fn }
    );
  }
  return value;
}

function extreme(
  fn: string,
  pick: (a: number, b: number) => number
): RollFunction {
  return (args) => {
    const only = args[0];
    if (args.length === 1 && only.type === "list") {
      if (only.elements.length === 0) {
        throw new EvalError(
          "InvalidArgument",
          `Function '${fn}' needs a non-empty list`,
          { name: fn }
        );
      }
      return integer(only.elements.reduce((a, b) => pick(a, b)));
    }
    return integer(
      args
        .map((a) => expectInteger(a, `${fn}() argument`))
        .reduce((a, b) => pick(a, b))
    );
  };
}

function registerBuiltins(registry: FunctionRegistry): FunctionRegistry {
  return registry
    .register("sum", 1, ([x]) =>
      x.type === "integer" ? x : integer(sum(x.elements))
    )
    .register("len", 1, ([x]) =>
      integer(expectList(x, "len").elements.length)
    )
    .register("max", { min: 1 }, extreme("max", Math.max))
    .register("min", { min: 1 }, extreme("min", Math.min))
    .register("abs", 1, ([x]) =>
      integer(Math.abs(expectInteger(x, "abs()")))
    )
    .register("sort", 1, ([x]) => {
      const { kind, elements } = expectList(x, "sort");
      return list(kind, [...elements].sort((a, b) => a - b));
    });
}

/** A registry holding only the built-in functions. */
export function createFunctionRegistry(): FunctionRegistry {
  return registerBuiltins(new FunctionRegistry());
}

/** Process-wide registry used when evaluation options name none. */
export const defaultFunctions = createFunctionRegistry();

export function registerFunction(
  name: string,
  signature: Signature,
  fn: RollFunction
): void {
  defaultFunctions.register(name, signature, fn);
}

export function unregisterFunction(name: string): boolean {
  return defaultFunctions.unregister(name);
}
