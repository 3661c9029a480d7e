import type { ExpressionNode, IntegerNode, RangeNode } from "./ast";
import { OPERATORS } from "./ast";
import { rangeLength } from "./value";

export type ExplainOptions = {
  /** Depth of the root line; each level indents by two spaces. */
  indent?: number;
};

/**
 * Render the structure of an expression, one node per line, children
 * indented under their parent. The tree is never evaluated.
 *
 * ```
 * Binary Operation: + (Addition)
 *   Binary Operation: d (Dice Roll)
 *     Literal: 2 (Integer)
 *     Literal: 6 (Integer)
 *   Literal: 3 (Integer)
 * ```
 */
export function explain(
  ast: ExpressionNode,
  options: ExplainOptions = {}
): string {
  const lines: string[] = [];
  explainNode(ast, options.indent ?? 0, lines);
  return lines.join("\n");
}

function explainNode(
  node: ExpressionNode,
  depth: number,
  lines: string[]
): void {
  const pad = "  ".repeat(depth);

  switch (node.type) {
    case "integer":
      lines.push(`${pad}Literal: ${node.value} (Integer)`);
      return;

    case "list": {
      const n = node.elements.length;
      lines.push(
        `${pad}Literal: ${formatExpression(node)} (List with ${n} elements)`
      );
      // Integer-only lists are fully shown on the header line.
      if (!node.elements.every(isIntegerLiteral)) {
        for (const element of node.elements) {
          explainNode(element, depth + 1, lines);
        }
      }
      return;
    }

    case "range": {
      const count = literalRangeLength(node);
      if (count !== undefined) {
        lines.push(
          `${pad}Literal: ${formatExpression(node)} (Range with ${count} elements)`
        );
        return;
      }
      lines.push(`${pad}Literal: ${formatExpression(node)} (Range)`);
      explainNode(node.start, depth + 1, lines);
      explainNode(node.end, depth + 1, lines);
      if (node.step) explainNode(node.step, depth + 1, lines);
      return;
    }

    case "strong":
      lines.push(`${pad}Strong List:`);
      explainNode(node.inner, depth + 1, lines);
      return;

    case "binary": {
      const { symbol, description } = OPERATORS[node.operator];
      lines.push(`${pad}Binary Operation: ${symbol} (${description})`);
      explainNode(node.left, depth + 1, lines);
      explainNode(node.right, depth + 1, lines);
      return;
    }

    case "call":
      lines.push(
        `${pad}Function Call: ${node.name} (${node.args.length} args)`
      );
      for (const arg of node.args) explainNode(arg, depth + 1, lines);
      return;
  }
}

function isIntegerLiteral(node: ExpressionNode): node is IntegerNode {
  return node.type === "integer";
}

function literalRangeLength(node: RangeNode): number | undefined {
  const { start, end, step } = node;
  if (!isIntegerLiteral(start) || !isIntegerLiteral(end)) return undefined;
  if (step === undefined) return rangeLength(start.value, end.value);
  if (!isIntegerLiteral(step) || step.value === 0) return undefined;
  return rangeLength(start.value, end.value, step.value);
}

/**
 * Single-line rendering with every binary operation parenthesized, e.g.
 * `((4 d 6) kh 3)`. Parsing the output gives back an equivalent tree.
 */
export function formatExpression(node: ExpressionNode): string {
  switch (node.type) {
    case "integer":
      return String(node.value);
    case "list": {
      const items = node.elements.map(formatExpression);
      // `{5}` would read back as a strong wrap
      return items.length === 1 ? `{${items[0]},}` : `{${items.join(", ")}}`;
    }
    case "range": {
      const parts = [node.start, node.end];
      if (node.step) parts.push(node.step);
      return `[${parts.map(formatExpression).join(", ")}]`;
    }
    case "strong":
      return `{${formatExpression(node.inner)}}`;
    case "binary": {
      const { symbol } = OPERATORS[node.operator];
      const left = formatExpression(node.left);
      const right = formatExpression(node.right);
      return `(${left} ${symbol} ${right})`;
    }
    case "call":
      return `${node.name}(${node.args.map(formatExpression).join(", ")})`;
  }
}
