import { describe, it, expect } from "vitest";
import { evaluateCondition, parseCondition, referencedVariables, tokenize } from "../expression.js";
import { ConditionEvalError, ConditionParseError } from "../../errors.js";

function run(condition: string, context: Record<string, unknown>): boolean {
  return evaluateCondition(parseCondition(condition), context);
}

describe("tokenize", () => {
  it("splits numbers, identifiers and two-character operators", () => {
    const tokens = tokenize("zscore >= -2.5e1 && x!=1");
    expect(tokens.map((t) => t.text)).toEqual(["zscore", ">=", "-", "2.5e1", "&&", "x", "!=", "1", ""]);
  });

  it("rejects characters outside the grammar", () => {
    expect(() => tokenize("x > 2; y")).toThrow(ConditionParseError);
  });
});

describe("parseCondition", () => {
  it("respects precedence of arithmetic over comparison", () => {
    expect(run("1 + 2 * 3 == 7", {})).toBe(true);
    expect(run("(1 + 2) * 3 == 9", {})).toBe(true);
    expect(run("2 ** 3 ** 2 == 512", {})).toBe(true);
    expect(run("-2 ** 2 == -4", {})).toBe(true);
  });

  it("binds and tighter than or", () => {
    expect(run("true or false and false", {})).toBe(true);
    expect(run("(true or false) and false", {})).toBe(false);
  });

  it("reports the position of an unexpected token", () => {
    try {
      parseCondition("x > > 2");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConditionParseError);
      if (error instanceof ConditionParseError) {
        expect(error.code).toBe("INVALID_CONDITION");
        expect(error.position).toBe(4);
      }
    }
  });

  it("rejects empty conditions, unknown functions and member access", () => {
    expect(() => parseCondition("   ")).toThrow(ConditionParseError);
    expect(() => parseCondition("exec(1)")).toThrow("Unknown function 'exec'");
    expect(() => parseCondition("x.constructor")).toThrow(ConditionParseError);
    expect(() => parseCondition("x = 1")).toThrow(ConditionParseError);
    expect(() => parseCondition("(x > 1")).toThrow("Expected ')' but found end of condition");
    expect(() => parseCondition("abs(1, 2)")).toThrow("abs() takes exactly one argument");
  });

  it("bounds nesting depth", () => {
    const nest = (levels: number) => "(".repeat(levels) + "x" + ")".repeat(levels) + " > 2";
    expect(run(nest(100), { x: 3 })).toBe(true);

    try {
      parseCondition(nest(101));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConditionParseError);
      if (error instanceof ConditionParseError) {
        expect(error.message).toBe("Condition is nested too deeply");
        expect(error.position).toBe(100);
      }
    }
    expect(() => parseCondition("-".repeat(150) + "x > 0")).toThrow("Condition is nested too deeply");
    expect(() => parseCondition("not ".repeat(150) + "true")).toThrow("Condition is nested too deeply");
  });

  it("bounds the number of tokens", () => {
    try {
      parseCondition("x" + " + x".repeat(600));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConditionParseError);
      if (error instanceof ConditionParseError) {
        expect(error.message).toBe("Condition has more than 1000 tokens");
        expect(error.position).toBe(2000);
      }
    }
  });

  it("lists referenced variables once each", () => {
    expect(referencedVariables(parseCondition("abs(zscore) > 2 and zscore < max(a, 3)"))).toEqual(["zscore", "a"]);
  });
});

describe("evaluateCondition", () => {
  it("reads variables from the context", () => {
    expect(run("zscore > 2", { zscore: 2.5 })).toBe(true);
    expect(run("zscore > 2", { zscore: 1.5 })).toBe(false);
  });

  it("supports keyword and symbolic logic", () => {
    const context = { a: 1, b: 5 };
    expect(run("a < 2 and b > 4", context)).toBe(true);
    expect(run("a < 2 && b > 9", context)).toBe(false);
    expect(run("a > 2 || b > 4", context)).toBe(true);
    expect(run("not a > 2", context)).toBe(true);
    expect(run("!(b > 4)", context)).toBe(false);
  });

  it("chains comparisons", () => {
    expect(run("1 < x < 3", { x: 2 })).toBe(true);
    expect(run("1 < x < 3", { x: 3 })).toBe(false);
  });

  it("evaluates functions and modulo", () => {
    expect(run("abs(x) >= 2", { x: -2 })).toBe(true);
    expect(run("min(a, b, 4) == 1", { a: 1, b: 7 })).toBe(true);
    expect(run("max(a, b) == 7", { a: 1, b: 7 })).toBe(true);
    expect(run("x % 4 == 3", { x: 11 })).toBe(true);
  });

  it("short-circuits so the right side may be unevaluable", () => {
    expect(run("false and missing > 1", {})).toBe(false);
    expect(run("true or missing > 1", {})).toBe(true);
  });

  it("throws on unknown variables", () => {
    expect(() => run("missing > 1", { x: 1 })).toThrow("Unknown variable 'missing'");
  });

  it("does not expose inherited properties", () => {
    expect(() => run("toString > 1", {})).toThrow(ConditionEvalError);
    expect(() => run("constructor > 1", {})).toThrow(ConditionEvalError);
  });

  it("throws on non-numeric variables and type mismatches", () => {
    expect(() => run("x > 1", { x: "3" })).toThrow("Variable 'x' is not a number");
    expect(() => run("x + 1", { x: 1 })).toThrow("Condition expects a boolean, got number");
    expect(() => run("(x > 1) + 1 > 0", { x: 2 })).toThrow("'+' expects a number, got boolean");
    expect(() => run("x == true", { x: 1 })).toThrow(ConditionEvalError);
  });

  it("throws on division by zero", () => {
    expect(() => run("x / y > 1", { x: 1, y: 0 })).toThrow("Division by zero");
    expect(() => run("x % 0 > 1", { x: 1 })).toThrow("Modulo by zero");
  });
});
