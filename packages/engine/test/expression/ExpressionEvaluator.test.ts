import { describe, it, expect, beforeEach } from "vitest";
import { STATE_VARIABLES, UPDATE_VARIABLES } from "@equatone/contracts";
import { ExpressionEvaluator } from "../../src/expression/ExpressionEvaluator";
import { EvaluationError, InvalidExpressionError } from "../../src/errors";

describe("ExpressionEvaluator", () => {
  let evaluator: ExpressionEvaluator;

  beforeEach(() => {
    evaluator = new ExpressionEvaluator();
  });

  function evaluate(expr: string, x = 0, y = 0, z = 0): number {
    return evaluator.compile(expr, STATE_VARIABLES).evaluate(x, y, z);
  }

  describe("arithmetic", () => {
    it("evaluates over x, y, z in parameter order", () => {
      expect(evaluate("sin(x) + y * z", 0, 2, 3)).toBe(6);
    });

    it("treats power as right-associative", () => {
      expect(evaluate("2 ** 3 ** 2")).toBe(512);
    });

    it("accepts ^ as an alias for **", () => {
      expect(evaluate("3 ^ 2")).toBe(9);
    });

    it("binds power tighter than prefix minus", () => {
      expect(evaluate("-2 ^ 2")).toBe(-4);
      expect(evaluate("2 ** -1")).toBe(0.5);
    });

    it("uses floored modulo", () => {
      expect(evaluate("7 % 3")).toBe(1);
      expect(evaluate("-7 % 3")).toBe(2);
      expect(evaluate("Mod(-7, 3)")).toBe(2);
    });

    it("reads decimal and exponent literals", () => {
      expect(evaluate(".5 + 1e-3 * 1000")).toBe(1.5);
    });

    it("knows pi and E", () => {
      expect(evaluate("pi")).toBe(Math.PI);
      expect(evaluate("E")).toBe(Math.E);
    });

    it("supports log with an optional base", () => {
      expect(evaluate("log(E)")).toBeCloseTo(1, 12);
      expect(evaluate("log(8, 2)")).toBeCloseTo(3, 12);
    });

    it("supports variadic min and max with capitalized aliases", () => {
      expect(evaluate("max(x, y, z)", 1, 5, 3)).toBe(5);
      expect(evaluate("Min(x, y, z)", 1, 5, 3)).toBe(1);
      expect(evaluate("Abs(x) + ceiling(y)", -2, 0.2)).toBe(3);
    });

    it("compiles update rules over x, y, z, t", () => {
      const compiled = evaluator.compile("x + t", UPDATE_VARIABLES);
      expect(compiled.evaluate(1, 0, 0, 2)).toBe(3);
      expect(compiled.symbols).toEqual(["t", "x"]);
    });
  });

  describe("compiled expression", () => {
    it("records source, parameters and referenced symbols", () => {
      const compiled = evaluator.compile("z * cos(x)", STATE_VARIABLES);
      expect(compiled.source).toBe("z * cos(x)");
      expect(compiled.parameters).toEqual(["x", "y", "z"]);
      expect(compiled.symbols).toEqual(["x", "z"]);
    });
  });

  describe("rejection", () => {
    it("lists every unsupported symbol, sorted", () => {
      let caught: unknown;
      try {
        evaluator.compile("x + foo(b) + a", STATE_VARIABLES);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(InvalidExpressionError);
      if (caught instanceof InvalidExpressionError) {
        expect(caught.offendingSymbols).toEqual(["a", "b", "foo"]);
        expect(caught.expression).toBe("x + foo(b) + a");
      }
    });

    it("rejects t in the main expression", () => {
      expect(() => evaluator.compile("sin(t)", STATE_VARIABLES)).toThrow(InvalidExpressionError);
    });

    it("rejects syntax errors", () => {
      expect(() => evaluator.compile("x +", STATE_VARIABLES)).toThrow(InvalidExpressionError);
      expect(() => evaluator.compile("2x", STATE_VARIABLES)).toThrow(InvalidExpressionError);
      expect(() => evaluator.compile("(x", STATE_VARIABLES)).toThrow(InvalidExpressionError);
      expect(() => evaluator.compile("x $ y", STATE_VARIABLES)).toThrow(InvalidExpressionError);
    });

    it("rejects calls with the wrong number of arguments", () => {
      expect(() => evaluator.compile("sin(x, y)", STATE_VARIABLES)).toThrow(InvalidExpressionError);
      expect(() => evaluator.compile("atan2(x)", STATE_VARIABLES)).toThrow(InvalidExpressionError);
    });
  });

  describe("runtime failures", () => {
    it("throws EvaluationError on division by zero", () => {
      expect(() => evaluate("1 / x", 0)).toThrow(EvaluationError);
    });

    it("throws EvaluationError on modulo by zero", () => {
      expect(() => evaluate("x % y", 3, 0)).toThrow(EvaluationError);
    });

    it("throws EvaluationError on NaN results", () => {
      expect(() => evaluate("sqrt(x)", -1)).toThrow("result is not a number");
    });

    it("passes infinite results through", () => {
      expect(evaluate("exp(x)", 1000)).toBe(Infinity);
    });
  });
});
