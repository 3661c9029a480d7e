import { afterEach, describe, expect, it } from "vitest";
import { EvalError } from "../src/errors";
import { evaluate, evaluateWith } from "../src/evaluator";
import {
  createFunctionRegistry,
  defaultFunctions,
  FunctionRegistry,
  registerFunction,
  unregisterFunction,
} from "../src/functions";
import { parse } from "../src/parser";
import type { Value } from "../src/value";
import { expectInteger, integer, list } from "../src/value";
import { ScriptedRandom } from "./support/scripted-random";

const run = (source: string) => evaluate(parse(source));

function evalError(fn: () => unknown): EvalError {
  try {
    fn();
  } catch (error) {
    if (error instanceof EvalError) return error;
    throw error;
  }
  throw new Error("Expected an EvalError");
}

const double = ([x]: readonly Value[]) => integer(expectInteger(x, "x") * 2);

describe("FunctionRegistry", () => {
  it("registers, finds and removes functions", () => {
    const registry = new FunctionRegistry();
    expect(registry.register("double", 1, double)).toBe(registry);
    expect(registry.has("double")).toBe(true);
    expect(registry.get("double")?.signature).toBe(1);
    expect(registry.names()).toEqual(["double"]);
    expect(registry.call("double", [integer(4)])).toEqual(integer(8));

    expect(registry.unregister("double")).toBe(true);
    expect(registry.unregister("double")).toBe(false);
    expect(registry.has("double")).toBe(false);
  });

  it("rejects names that could not be written in an expression", () => {
    const registry = new FunctionRegistry();
    expect(() => registry.register("2x", 1, double)).toThrow(
      "Invalid function name '2x'"
    );
    expect(() => registry.register("a-b", 1, double)).toThrow(TypeError);
  });

  it("replaces a function registered under the same name", () => {
    const registry = new FunctionRegistry()
      .register("f", 1, double)
      .register("f", 1, () => integer(0));
    expect(registry.call("f", [integer(4)])).toEqual(integer(0));
    expect(registry.names()).toEqual(["f"]);
  });

  describe("Signatures", () => {
    const registry = new FunctionRegistry()
      .register("pair", 2, () => integer(0))
      .register("some", { min: 1 }, () => integer(0))
      .register("few", { min: 1, max: 2 }, () => integer(0));

    it("checks an exact arity", () => {
      const error = evalError(() => registry.call("pair", [integer(1)]));
      expect(error.code).toBe("ArityMismatch");
      expect(error.message).toBe(
        "Function 'pair' expects 2 argument(s), got 1"
      );
    });

    it("checks a lower bound", () => {
      expect(evalError(() => registry.call("some", [])).message).toBe(
        "Function 'some' expects at least 1 argument(s), got 0"
      );
    });

    it("checks a bounded range", () => {
      const args = [integer(1), integer(2), integer(3)];
      expect(evalError(() => registry.call("few", args)).message).toBe(
        "Function 'few' expects 1 to 2 argument(s), got 3"
      );
      expect(registry.call("few", args.slice(0, 2))).toEqual(integer(0));
    });

    it("lets a validator reject arguments with its own error", () => {
      const rejection = new EvalError("InvalidArgument", "needs a list");
      const strict = new FunctionRegistry().register(
        "only_lists",
        (args) => {
          if (args.some((a) => a.type !== "list")) throw rejection;
        },
        ([x]) => x
      );

      expect(strict.call("only_lists", [list("normal", [1])])).toEqual(
        list("normal", [1])
      );
      expect(evalError(() => strict.call("only_lists", [integer(1)]))).toBe(
        rejection
      );
    });

    it("reports an unknown name at the given span", () => {
      const error = evalError(() =>
        registry.call("nope", [], { start: 2, end: 8 })
      );
      expect(error.code).toBe("UnknownFunction");
      expect(error.span).toEqual({ start: 2, end: 8 });
    });
  });

  it("passes errors thrown by a function through unchanged", () => {
    const failure = new Error("boom");
    const functions = new FunctionRegistry().register("fail", 0, () => {
      throw failure;
    });
    expect(() => evaluate(parse("fail()"), { functions })).toThrow(failure);
  });
});

describe("Calls from expressions", () => {
  it("reports an arity mismatch at the call", () => {
    const error = evalError(() => run("max()"));
    expect(error.code).toBe("ArityMismatch");
    expect(error.span).toEqual({ start: 0, end: 5 });
  });

  it("evaluates arguments left to right", () => {
    const functions = new FunctionRegistry().register(
      "both",
      2,
      ([a, b]) => list("normal", [expectInteger(a, "a"), expectInteger(b, "b")])
    );
    const random = new ScriptedRandom([5, 7]);
    expect(
      evaluateWith(parse("both(1d6, 1d8)"), random, { functions })
    ).toEqual(list("normal", [5, 7]));
    expect(random.calls).toEqual([
      [1, 6],
      [1, 8],
    ]);
  });

  it("uses only the registry passed in the options", () => {
    const functions = new FunctionRegistry();
    expect(
      evalError(() => evaluate(parse("max(1)"), { functions })).code
    ).toBe("UnknownFunction");
  });

  describe("Process-wide registry", () => {
    afterEach(() => {
      unregisterFunction("triple");
    });

    it("makes registered functions visible to every evaluation", () => {
      registerFunction("triple", 1, ([x]) =>
        integer(expectInteger(x, "x") * 3)
      );
      expect(defaultFunctions.has("triple")).toBe(true);
      expect(run("triple(2) + 1")).toEqual(integer(7));
    });

    it("forgets a function once it is unregistered", () => {
      registerFunction("triple", 1, ([x]) => x);
      expect(unregisterFunction("triple")).toBe(true);
      expect(evalError(() => run("triple(2)")).code).toBe("UnknownFunction");
    });
  });
});

describe("Built-in functions", () => {
  it("are registered in a fixed order", () => {
    expect(createFunctionRegistry().names()).toEqual([
      "sum",
      "len",
      "max",
      "min",
      "abs",
      "sort",
    ]);
  });

  it("sum adds up a list of either kind", () => {
    expect(run("sum({1,2,3})")).toEqual(integer(6));
    expect(run("sum({{1,2}})")).toEqual(integer(3));
    expect(run("sum(4)")).toEqual(integer(4));
  });

  it("len counts elements", () => {
    expect(run("len({1,2,3})")).toEqual(integer(3));
    expect(run("len([1, 10])")).toEqual(integer(10));
    const error = evalError(() => run("len(5)"));
    expect(error.code).toBe("ExpectedList");
    expect(error.message).toBe(
      "Function 'len' expects a list, but got an integer"
    );
  });

  it("max and min pick from one list", () => {
    expect(run("max({3,9,2})")).toEqual(integer(9));
    expect(run("min({3,9,2})")).toEqual(integer(2));
    expect(run("max({{1,2}})")).toEqual(integer(2));
  });

  it("max and min pick from several integers", () => {
    expect(run("max(3, 9, 2)")).toEqual(integer(9));
    expect(run("min(3, -9, 2)")).toEqual(integer(-9));
    expect(run("max(7)")).toEqual(integer(7));
  });

  it("max rejects an empty list", () => {
    const error = evalError(() => run("max({})"));
    expect(error.code).toBe("InvalidArgument");
    expect(error.message).toBe("Function 'max' needs a non-empty list");
  });

  it("max rejects a strong list among several arguments", () => {
    expect(evalError(() => run("max({{1,2}}, 3)")).message).toBe(
      "Expected an integer for max() argument, but got a strong list of 2 elements"
    );
  });

  it("abs takes the magnitude", () => {
    expect(run("abs(-5)")).toEqual(integer(5));
    expect(run("abs({-2,-3})")).toEqual(integer(5));
  });

  it("sort orders ascending and keeps the list kind", () => {
    expect(run("sort({3,1,2})")).toEqual(list("normal", [1, 2, 3]));
    expect(run("sort({{3,1,2}})")).toEqual(list("strong", [1, 2, 3]));
    expect(evalError(() => run("sort(5)")).code).toBe("ExpectedList");
  });
});
