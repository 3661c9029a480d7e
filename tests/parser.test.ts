import { describe, expect, it } from "vitest";
import { formatExpression } from "../src/explain";
import { parse } from "../src/parser";

const shape = (source: string) => formatExpression(parse(source));

describe("Parser", () => {
  describe("Node construction", () => {
    it("builds a dice roll plus a modifier with source spans", () => {
      expect(parse("2d6 + 3")).toEqual({
        type: "binary",
        operator: "add",
        left: {
          type: "binary",
          operator: "dice",
          left: { type: "integer", value: 2, span: { start: 0, end: 1 } },
          right: { type: "integer", value: 6, span: { start: 2, end: 3 } },
          span: { start: 0, end: 3 },
        },
        right: { type: "integer", value: 3, span: { start: 6, end: 7 } },
        span: { start: 0, end: 7 },
      });
    });

    it("ignores surrounding whitespace", () => {
      expect(parse(" 12 ")).toEqual({
        type: "integer",
        value: 12,
        span: { start: 1, end: 3 },
      });
    });

    it("builds a call with its arguments in order", () => {
      const node = parse("max(3d6, 10)");
      expect(node.type).toBe("call");
      if (node.type === "call") {
        expect(node.name).toBe("max");
        expect(node.args.map(formatExpression)).toEqual(["(3 d 6)", "10"]);
        expect(node.span).toEqual({ start: 0, end: 12 });
      }
    });

    it("accepts calls without arguments and with a trailing comma", () => {
      expect(shape("f()")).toBe("f()");
      expect(shape("max(1, 2,)")).toBe("max(1, 2)");
    });
  });

  describe("Precedence and associativity", () => {
    const cases: [string, string][] = [
      ["1 + 2 * 3", "(1 + (2 * 3))"],
      ["1 * 2 + 3", "((1 * 2) + 3)"],
      ["1 - 2 - 3", "((1 - 2) - 3)"],
      ["1 - 2 + 3", "((1 - 2) + 3)"],
      ["1d2d3", "(1 d (2 d 3))"],
      ["4d6kh3", "((4 d 6) kh 3)"],
      ["4d6kh3dl1", "(((4 d 6) kh 3) dl 1)"],
      ["2 * 3d6", "(2 * (3 d 6))"],
      ["4d6kh3 + 2", "(((4 d 6) kh 3) + 2)"],
      ["1 + 2 == 3", "((1 + 2) == 3)"],
      ["1 < 2 < 3", "((1 < 2) < 3)"],
      ["3d6 >= 10", "((3 d 6) >= 10)"],
      ["(1 + 2) * 3", "((1 + 2) * 3)"],
      [
        "(3 + 2d6) * 4 + 5 * 1d2d3",
        "(((3 + (2 d 6)) * 4) + (5 * (1 d (2 d 3))))",
      ],
    ];

    for (const [source, expected] of cases) {
      it(`parses ${source} as ${expected}`, () => {
        expect(shape(source)).toBe(expected);
      });
    }
  });

  describe("Braces", () => {
    it("reads comma-separated items as an explicit list", () => {
      const node = parse("{1, 2, 3}");
      expect(node.type).toBe("list");
      if (node.type === "list") expect(node.elements).toHaveLength(3);
      expect(node.span).toEqual({ start: 0, end: 9 });
    });

    it("reads a single bare expression as a strong wrap", () => {
      expect(parse("{3d6}").type).toBe("strong");
      expect(parse("{5}").type).toBe("strong");
      expect(shape("{3d6}")).toBe("{(3 d 6)}");
    });

    it("wraps an explicit list in a strong wrap for double braces", () => {
      const node = parse("{{1,2,3}}");
      expect(node.type).toBe("strong");
      if (node.type === "strong") expect(node.inner.type).toBe("list");
    });

    it("reads empty braces as an empty list", () => {
      expect(parse("{}")).toEqual({
        type: "list",
        elements: [],
        span: { start: 0, end: 2 },
      });
    });

    it("reads a single item with a trailing comma as a one-element list", () => {
      const node = parse("{5,}");
      expect(node.type).toBe("list");
      if (node.type === "list") expect(node.elements).toHaveLength(1);
    });

    it("accepts full expressions as list items", () => {
      expect(shape("{1, 2d6, max(1)}")).toBe("{1, (2 d 6), max(1)}");
    });
  });

  describe("Ranges", () => {
    it("reads start and end", () => {
      const node = parse("[10, 5]");
      expect(node.type).toBe("range");
      if (node.type === "range") {
        expect(node.step).toBeUndefined();
        expect(formatExpression(node.start)).toBe("10");
        expect(formatExpression(node.end)).toBe("5");
      }
    });

    it("reads an optional step, which may be negative", () => {
      expect(shape("[1, 10, 2]")).toBe("[1, 10, 2]");
      expect(shape("[1, 10, -2]")).toBe("[1, 10, -2]");
    });

    it("accepts expressions as bounds", () => {
      expect(shape("[1, 3 + 2]")).toBe("[1, (3 + 2)]");
    });
  });

  describe("Negative literals", () => {
    it("reads a minus touching digits as a negative integer", () => {
      expect(parse("-7")).toEqual({
        type: "integer",
        value: -7,
        span: { start: 0, end: 2 },
      });
    });

    it("reads a minus after an operand as subtraction", () => {
      expect(shape("3-2")).toBe("(3 - 2)");
      expect(shape("3 - -2")).toBe("(3 - -2)");
      expect(shape("3--2")).toBe("(3 - -2)");
    });

    it("accepts negative operands on the right of other operators", () => {
      expect(shape("2 * -3")).toBe("(2 * -3)");
      expect(shape("{1,2}dl-1")).toBe("({1, 2} dl -1)");
    });

    it("reads the extremes of the safe integer range", () => {
      expect(parse("9007199254740991")).toMatchObject({
        value: 9007199254740991,
      });
      expect(parse("-9007199254740991")).toMatchObject({
        value: -9007199254740991,
      });
    });

    it("reads -0 as 0", () => {
      const node = parse("-0");
      expect(node.type).toBe("integer");
      if (node.type === "integer") expect(Object.is(node.value, 0)).toBe(true);
    });
  });
});
