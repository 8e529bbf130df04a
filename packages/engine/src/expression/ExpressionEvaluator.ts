/**
 * Expression Evaluator
 *
 * Compiles expression text into a closure tree over a fixed parameter list.
 *
 * Compile time: syntax errors and any identifier that is not a parameter,
 * a constant or a known function raise InvalidExpressionError.
 * Run time: division or modulo by zero and NaN results raise
 * EvaluationError. Infinite results pass through.
 *
 * @see IExpressionEvaluator for the contract the engine depends on
 */

import type { CompiledExpression, IExpressionEvaluator } from "@equatone/contracts";

import { EvaluationError, InvalidExpressionError } from "../errors";
import {
  CONSTANTS,
  DomainError,
  FUNCTIONS,
  floorMod,
  isConstantName,
  isFunctionName,
} from "./functions";
import { ExpressionSyntaxError, parseExpression } from "./parser";
import type { BinaryOperator, ExpressionNode } from "./parser";

type Closure = (args: readonly number[]) => number;

export class ExpressionEvaluator implements IExpressionEvaluator {
  compile(expr: string, parameters: readonly string[]): CompiledExpression {
    let ast: ExpressionNode;
    try {
      ast = parseExpression(expr);
    } catch (err) {
      if (err instanceof ExpressionSyntaxError) {
        throw new InvalidExpressionError(expr, [], `Invalid expression "${expr}": ${err.message}`);
      }
      throw err;
    }

    const referenced = new Set<string>();
    const offending = new Set<string>();
    const arityErrors: string[] = [];
    collectSymbols(ast, parameters, referenced, offending, arityErrors);

    if (offending.size > 0) {
      const symbols = Array.from(offending).sort();
      throw new InvalidExpressionError(
        expr,
        symbols,
        `Expression "${expr}" uses unsupported symbols: ${symbols.join(", ")}` +
          ` (allowed: ${parameters.join(", ")})`
      );
    }
    if (arityErrors.length > 0) {
      throw new InvalidExpressionError(expr, [], `Invalid expression "${expr}": ${arityErrors[0]}`);
    }

    const closure = compileNode(ast, parameters);

    return {
      source: expr,
      parameters: [...parameters],
      symbols: Array.from(referenced).sort(),
      evaluate(...args: number[]): number {
        let value: number;
        try {
          value = closure(args);
        } catch (err) {
          if (err instanceof DomainError) {
            throw new EvaluationError(expr, err.message);
          }
          throw err;
        }
        if (Number.isNaN(value)) {
          throw new EvaluationError(expr, "result is not a number");
        }
        return value;
      },
    };
  }
}

function collectSymbols(
  node: ExpressionNode,
  parameters: readonly string[],
  referenced: Set<string>,
  offending: Set<string>,
  arityErrors: string[]
): void {
  switch (node.kind) {
    case "number":
      return;
    case "identifier":
      if (parameters.includes(node.name)) {
        referenced.add(node.name);
      } else if (!isConstantName(node.name)) {
        offending.add(node.name);
      }
      return;
    case "unary":
      collectSymbols(node.operand, parameters, referenced, offending, arityErrors);
      return;
    case "binary":
      collectSymbols(node.left, parameters, referenced, offending, arityErrors);
      collectSymbols(node.right, parameters, referenced, offending, arityErrors);
      return;
    case "call": {
      if (!isFunctionName(node.name)) {
        offending.add(node.name);
      } else {
        const fn = FUNCTIONS[node.name];
        if (node.args.length < fn.minArgs || node.args.length > fn.maxArgs) {
          arityErrors.push(`${node.name}() does not take ${node.args.length} argument(s)`);
        }
      }
      for (const arg of node.args) {
        collectSymbols(arg, parameters, referenced, offending, arityErrors);
      }
      return;
    }
  }
}

function compileNode(node: ExpressionNode, parameters: readonly string[]): Closure {
  switch (node.kind) {
    case "number": {
      const value = node.value;
      return () => value;
    }
    case "identifier": {
      const index = parameters.indexOf(node.name);
      if (index >= 0) {
        return (args) => args[index] ?? Number.NaN;
      }
      const value = CONSTANTS[node.name];
      return () => value;
    }
    case "unary": {
      const operand = compileNode(node.operand, parameters);
      return node.op === "-" ? (args) => -operand(args) : operand;
    }
    case "binary":
      return compileBinary(
        node.op,
        compileNode(node.left, parameters),
        compileNode(node.right, parameters)
      );
    case "call": {
      const fn = FUNCTIONS[node.name];
      const args = node.args.map((arg) => compileNode(arg, parameters));
      return (values) => fn.apply(args.map((arg) => arg(values)));
    }
  }
}

function compileBinary(op: BinaryOperator, left: Closure, right: Closure): Closure {
  switch (op) {
    case "+":
      return (args) => left(args) + right(args);
    case "-":
      return (args) => left(args) - right(args);
    case "*":
      return (args) => left(args) * right(args);
    case "/":
      return (args) => {
        const divisor = right(args);
        if (divisor === 0) {
          throw new DomainError("division by zero");
        }
        return left(args) / divisor;
      };
    case "%":
      return (args) => floorMod(left(args), right(args));
    case "**":
      return (args) => {
        const base = left(args);
        const exponent = right(args);
        if (base === 0 && exponent < 0) {
          throw new DomainError("zero raised to a negative power");
        }
        return Math.pow(base, exponent);
      };
  }
}
