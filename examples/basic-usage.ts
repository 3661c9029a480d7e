import {
  EvalError,
  ParseError,
  SeededRandom,
  explain,
  formatValue,
  parse,
  registerFunction,
  roll,
} from "../src/index";

function printRoll(expression: string, random = new SeededRandom(7)) {
  try {
    const result = formatValue(roll(expression, random));
    console.log(`${expression.padEnd(24)} => ${result}`);
  } catch (error) {
    if (error instanceof ParseError || error instanceof EvalError) {
      console.log(`${expression.padEnd(24)} !! ${error.message}`);
      return;
    }
    throw error;
  }
}

function basicRollsExample() {
  console.log("Basic rolls (seed 7)\n");
  for (const expression of [
    "2d6 + 3",
    "4d6kh3",
    "{{1,2,3}} + 5",
    "[1, 10, 2]",
    "2d{1, 1, 2, 3}",
    "3d6 >= 10",
    "max(2d20)",
  ]) {
    printRoll(expression);
  }
}

function errorsExample() {
  console.log("\nErrors\n");
  for (const expression of [
    "{5}",
    "{{1,2}} + {{1,2,3}}",
    "[1, 10, 0]",
    "1 +",
  ]) {
    printRoll(expression);
  }
}

function explainExample() {
  console.log("\nExplain\n");
  console.log(explain(parse("2d6 + {3d4} * 2")));
}

function customFunctionExample() {
  console.log("\nCustom function\n");
  registerFunction("explode", 1, ([faces]) => {
    if (faces.type !== "list") return faces;
    const elements = faces.elements.map((n) => (n === 6 ? 12 : n));
    return { ...faces, elements };
  });
  printRoll("explode(4d6)");
}

basicRollsExample();
errorsExample();
explainExample();
customFunctionExample();
