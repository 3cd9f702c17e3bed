import { describe, expect, it } from "vitest";
import {
  ArgumentTypeError,
  ArgumentValueError,
  EvalTree,
  EvalTreeNode,
  EvaluationError,
  InputTypeError,
  Operator,
  ParseError,
  Roll,
  getOperator,
  tokenText,
} from "../src/index";
import { ScriptedRandom, fixed, shape } from "./helpers";

const op = getOperator;

function tree(source: string): EvalTree {
  return EvalTree.fromString(source);
}

function parseErrorOf(build: () => unknown): ParseError {
  try {
    build();
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error("Expected a parse error");
}

function codes(nodes: Iterable<EvalTreeNode>): Array<string | number> {
  return [...nodes].map((node) =>
    node.payload instanceof Operator ? node.payload.code : tokenText(node.payload)
  );
}

const crits = (): ScriptedRandom => new ScriptedRandom([1, 20, 1, 20, 1, 20]);

describe("EvalTree construction", () => {
  it("should respect precedence", () => {
    expect(shape(tree("1+2*4").root)).toEqual(["+", 1, ["*", 2, 4]]);
    expect(shape(tree("(1+2)*4").root)).toEqual(["*", ["+", 1, 2], 4]);
    expect(shape(tree("4d6h3").root)).toEqual(["h", ["d", 4, 6], 3]);
  });

  it("should group left-associative operators to the left", () => {
    expect(shape(tree("10-4-3").root)).toEqual(["-", ["-", 10, 4], 3]);
  });

  it("should group exponents to the right", () => {
    expect(shape(tree("2^3^2").root)).toEqual(["^", 2, ["^", 3, 2]]);
  });

  it("should let a sign follow an exponent", () => {
    expect(shape(tree("2^-1").root)).toEqual(["^", 2, ["m", null, 1]]);
  });

  it("should bind signs more loosely than exponents and factorials", () => {
    expect(shape(tree("-2^2").root)).toEqual(["m", null, ["^", 2, 2]]);
    expect(shape(tree("-5!").root)).toEqual(["m", null, ["!", 5, null]]);
  });

  it("should nest rolls as sides", () => {
    expect(shape(tree("2d(1d4)").root)).toEqual(["d", 2, ["d", 1, 4]]);
  });

  it("should build the literal 0 from nothing", () => {
    expect(shape(tree("").root)).toBe(0);
    expect(EvalTree.fromTokens([]).evaluate()).toBe(0);
  });

  it("should build from every accepted source", () => {
    expect(EvalTree.from(5).evaluate()).toBe(5);
    expect(EvalTree.from([2, op("*"), 3]).evaluate()).toBe(6);
    expect(EvalTree.from("2*3").evaluate()).toBe(6);
    expect(EvalTree.from(null).root).toBeNull();
    const original = tree("1+1");
    const copy = EvalTree.from(original);
    expect(copy.root).not.toBe(original.root);
    expect(shape(copy.root)).toEqual(shape(original.root));
  });

  it("should refuse anything else", () => {
    expect(() => EvalTree.from(JSON.parse("true"))).toThrow(InputTypeError);
  });
});

describe("EvalTree construction errors", () => {
  it("should report a missing right operand", () => {
    const error = parseErrorOf(() => tree("1+"));
    expect(error.message).toBe("Operator '+' is missing its right operand.");
    expect(error.offset).toBe(1);
  });

  it("should report a missing left operand", () => {
    const error = parseErrorOf(() => tree("!4"));
    expect(error.message).toBe("Operator '!' is missing its left operand.");
    expect(error.offset).toBe(0);
    expect(parseErrorOf(() => tree("*3")).offset).toBe(0);
  });

  it("should report leftover expressions", () => {
    const error = parseErrorOf(() => tree("1 2"));
    expect(error.message).toBe("Expected a single expression.");
    expect(error.offset).toBe(2);
  });

  it("should locate errors in rendered tokens", () => {
    const error = parseErrorOf(() => EvalTree.fromTokens([1, op("+")]));
    expect(error.source).toBe("1 +");
    expect(error.offset).toBe(2);
  });

  it("should report unbalanced parentheses in token lists", () => {
    const unclosed = parseErrorOf(() => EvalTree.fromTokens(["(", 1]));
    expect(unclosed.message).toBe("Unclosed parenthesis detected.");
    expect(unclosed.offset).toBe(0);
    const unopened = parseErrorOf(() => EvalTree.fromTokens([1, ")"]));
    expect(unopened.message).toBe("Unopened parenthesis detected.");
    expect(unopened.offset).toBe(2);
  });

  it("should wrap anything unexpected in the token list", () => {
    const error = parseErrorOf(() => EvalTree.fromTokens(JSON.parse('["x"]')));
    expect(error.message).toBe("Failed to construct an expression from the token list.");
    expect(error.cause).toBeInstanceOf(InputTypeError);
  });
});

describe("EvalTree.evaluate", () => {
  it("should total rolls", () => {
    expect(tree("3d4").evaluate(fixed(4))).toBe(12);
    expect(tree("3d4+2").evaluate(fixed(4))).toBe(14);
  });

  it("should do arithmetic", () => {
    expect(tree("(1+2)*3").evaluate()).toBe(9);
    expect(tree("2^3^2").evaluate()).toBe(512);
    expect(tree("10-4-3").evaluate()).toBe(3);
    expect(tree("2^-1").evaluate()).toBe(0.5);
    expect(tree("-2^2").evaluate()).toBe(-4);
    expect(tree("7%3").evaluate()).toBe(1);
  });

  it("should sum a side list on its own", () => {
    expect(EvalTree.fromTokens([[1, 2, 3]]).evaluate()).toBe(6);
  });

  it("should give 0 for an empty tree", () => {
    expect(new EvalTree().evaluate()).toBe(0);
  });

  it("should record the value of each node", () => {
    const t = tree("1+2");
    t.evaluate();
    expect(t.root?.value).toBe(3);
    expect(t.root?.left?.value).toBe(1);
  });

  it("should roll the left operand first", () => {
    const t = tree("1d6+1d8");
    const random = new ScriptedRandom([2, 7]);
    expect(t.evaluate(random)).toBe(9);
    expect(random.calls).toEqual([
      [1, 6],
      [1, 8],
    ]);
  });

  it("should wrap operator failures", () => {
    let caught: unknown;
    try {
      tree("1/0").evaluate();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(EvaluationError);
    expect(caught).toHaveProperty("message", "Failed to evaluate expression: Division by zero.");
    expect(caught).toHaveProperty("cause");
    expect(caught instanceof Error && caught.cause).toBeInstanceOf(ArgumentValueError);
  });

  it("should wrap type failures", () => {
    expect(() => tree("2h1").evaluate()).toThrow(
      "Failed to evaluate expression: Expecting the roll to be a roll, was 2 instead."
    );
    try {
      tree("2h1").evaluate();
    } catch (error) {
      expect(error instanceof Error && error.cause).toBeInstanceOf(ArgumentTypeError);
    }
  });

  it("should refuse an operator without operands", () => {
    expect(() => new EvalTree(new EvalTreeNode(op("+"))).evaluate()).toThrow(
      "Failed to evaluate expression: Operator '+' has no operands."
    );
  });
});

describe("EvalTree transforms", () => {
  it("should turn rolls into critical rolls", () => {
    expect(shape(tree("1d4+1da4+1dm4").critify().root)).toEqual([
      "+",
      ["+", ["dc", 1, 4], ["dc", 1, 4]],
      ["dm", 1, 4],
    ]);
  });

  it("should turn normal rolls into average rolls", () => {
    expect(shape(tree("1d4+1dc4").averageify().root)).toEqual([
      "+",
      ["da", 1, 4],
      ["dc", 1, 4],
    ]);
  });

  it("should turn every roll into a maximum roll", () => {
    expect(shape(tree("1d4+1da4+1dc4").maxify().root)).toEqual([
      "+",
      ["+", ["dm", 1, 4], ["dm", 1, 4]],
      ["dm", 1, 4],
    ]);
  });

  it("should give the same tree for maxify after critify as maxify alone", () => {
    const source = "2d6+1da8-(3d4h2)";
    expect(shape(tree(source).critify().maxify().root)).toEqual(
      shape(tree(source).maxify().root)
    );
  });

  it("should roll fixed dice through each mode", () => {
    expect(tree("3d4").averageify().evaluate()).toBe(7.5);
    expect(tree("3d6").maxify().evaluate()).toBe(18);
    expect(tree("3d4").critify().evaluate(fixed(4))).toBe(24);
  });

  it("should rewrite in place", () => {
    const t = tree("1d4");
    expect(t.maxify()).toBe(t);
  });
});

describe("EvalTree.verboseResult", () => {
  it("should show arithmetic unchanged", () => {
    expect(tree("1+2*4").verboseResult()).toBe("1+2*4 = 9");
    expect(tree("(1+2)*4").verboseResult()).toBe("(1+2)*4 = 12");
  });

  it("should show every die", () => {
    expect(tree("1+4d20").verboseResult(crits())).toBe("1+[d20: 1, 1, 20, 20] = 43");
  });

  it("should show discarded dice", () => {
    const random = new ScriptedRandom([1, 2, 3, 4]);
    expect(tree("4d6h3").verboseResult(random)).toBe("[d6: 2, 3, 4; (1)] = 9");
  });

  it("should show the value of postfix operators", () => {
    expect(tree("-5!").verboseResult()).toBe("-120 = -120");
  });

  it("should bracket a looser child", () => {
    expect(tree("2^-1").verboseResult()).toBe("2^(-1) = 0.5");
  });

  it("should show side list dice", () => {
    expect(tree("1d[1,3]").verboseResult(new ScriptedRandom())).toBe("[d[1, 3]: 1] = 1");
  });

  it("should reuse an earlier evaluation", () => {
    const t = tree("2d6");
    t.evaluate(new ScriptedRandom([3, 5]));
    expect(t.verboseResult(fixed(1))).toBe("[d6: 3, 5] = 8");
  });

  it("should be empty for an empty tree", () => {
    expect(new EvalTree().verboseResult()).toBe("");
  });
});

describe("EvalTree.toExpression", () => {
  const cases: Array<[string, string]> = [
    ["1 + 2 * 4", "1+2*4"],
    ["(1+2)*4", "(1+2)*4"],
    ["10-(4-3)", "10-(4-3)"],
    ["(10-4)-3", "10-4-3"],
    ["2^3^2", "2^3^2"],
    ["(2^3)^2", "(2^3)^2"],
    ["2^-1", "2^(-1)"],
    ["--1", "--1"],
    ["-5!", "-5!"],
    ["4d6h3+2dF", "4d6h3+2dF"],
    ["1d[1.5, 2]", "1d[1.5, 2]"],
    ["", "0"],
  ];

  for (const [source, expected] of cases) {
    it(`should write "${source}" as "${expected}"`, () => {
      expect(tree(source).toExpression()).toBe(expected);
    });
  }

  it("should parse back into the same tree", () => {
    for (const source of ["10-(4-3)*2", "(2^3)^2", "-(1+2)", "2d(1d4)r1"]) {
      const original = tree(source);
      expect(shape(tree(original.toExpression()).root), source).toEqual(shape(original.root));
    }
  });

  it("should be empty for an empty tree", () => {
    expect(new EvalTree().toExpression()).toBe("");
  });
});

describe("EvalTree traversal", () => {
  it("should walk in pre-order", () => {
    expect(codes(tree("1+2*3").preOrder())).toEqual(["+", "1", "*", "2", "3"]);
  });

  it("should stop descending where told", () => {
    const t = tree("1+2*3");
    const stopAtProducts = (node: EvalTreeNode): boolean => node.payload === op("*");
    expect(codes(t.preOrder(stopAtProducts))).toEqual(["+", "1", "*"]);
  });

  it("should walk in order with brackets", () => {
    const items = [...tree("(1+2)*3").inOrder()].map((item) =>
      typeof item === "string" ? item : tokenText(item.payload)
    );
    expect(items).toEqual(["(", "1", "+", "2", ")", "*", "3"]);
  });

  it("should yield nothing for an empty tree", () => {
    expect([...new EvalTree().preOrder()]).toEqual([]);
    expect([...new EvalTree().inOrder()]).toEqual([]);
  });
});

describe("EvalTree critical and fail checks", () => {
  it("should find a kept natural 20", () => {
    const t = tree("2d20h1");
    t.evaluate(crits());
    expect(t.isCritical()).toBe(true);
    expect(t.isFail()).toBe(false);
  });

  it("should ignore dropped dice", () => {
    const t = tree("10d20h5l2");
    t.evaluate(crits());
    expect(t.isCritical()).toBe(false);
    expect(t.isFail()).toBe(false);
  });

  it("should find a kept natural 1", () => {
    const t = tree("2d20l1");
    t.evaluate(crits());
    expect(t.isCritical()).toBe(false);
    expect(t.isFail()).toBe(true);
  });

  it("should look at every d20 in the expression", () => {
    const t = tree("1d20 + 1d20");
    t.evaluate(crits());
    expect(t.isCritical()).toBe(true);
    expect(t.isFail()).toBe(true);
  });

  it("should only count d20s", () => {
    const t = tree("1d6");
    t.evaluate(fixed(1));
    expect(t.isFail()).toBe(false);
  });

  it("should find nothing before evaluation", () => {
    expect(tree("1d20").isCritical()).toBe(false);
  });
});

describe("EvalTree copying and combining", () => {
  it("should copy deeply", () => {
    const t = tree("2d6");
    t.evaluate(fixed(3));
    const copy = t.copy();
    expect(copy.root).not.toBe(t.root);
    expect(copy.root?.value).not.toBe(t.root?.value);
    expect(copy.root?.value).toEqual(t.root?.value);
    copy.evaluate(fixed(6));
    expect(t.root?.value).toEqual(new Roll([3, 3], 6));
  });

  it("should combine copies of both trees", () => {
    const left = tree("1d4");
    const right = tree("1-2");
    const joined = left.combine(right, "-");
    expect(joined.toExpression()).toBe("1d4-(1-2)");
    expect(joined.root?.left).not.toBe(left.root);
    expect(joined.evaluate(fixed(4))).toBe(5);
  });

  it("should use 0 for an empty side", () => {
    expect(tree("3").combine(new EvalTree(), "+").toExpression()).toBe("3+0");
  });

  it("should combine in place", () => {
    const left = tree("5");
    const right = tree("2");
    const result = left.combineInPlace(right, "+");
    expect(result).toBe(left);
    expect(left.root?.right).toBe(right.root);
    expect(left.evaluate()).toBe(7);
  });

  it("should refuse to combine with something that is not a tree", () => {
    expect(() => tree("1").combine(JSON.parse("{}"), "+")).toThrow(InputTypeError);
    expect(() => tree("1").combineInPlace(JSON.parse("3"), "-")).toThrow(InputTypeError);
  });
});
