/**
 * Functions and constants available inside expressions.
 *
 * Names follow the usual math-expression conventions, including the
 * capitalized aliases (Abs, Min, Max, Mod) and `ceiling`.
 */

export interface MathFunction {
  minArgs: number;
  /** Infinity for variadic functions */
  maxArgs: number;
  apply(args: readonly number[]): number;
}

/**
 * Thrown by functions on inputs outside their domain where the result is
 * not representable (division by zero). NaN results are caught later.
 */
export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DomainError";
  }
}

/**
 * Floored modulo: the result takes the sign of the divisor.
 */
export function floorMod(a: number, b: number): number {
  if (b === 0) {
    throw new DomainError("modulo by zero");
  }
  return a - b * Math.floor(a / b);
}

function unary(fn: (x: number) => number): MathFunction {
  return { minArgs: 1, maxArgs: 1, apply: (args) => fn(args[0]) };
}

function variadic(fn: (...xs: number[]) => number): MathFunction {
  return { minArgs: 1, maxArgs: Infinity, apply: (args) => fn(...args) };
}

const min = variadic(Math.min);
const max = variadic(Math.max);
const abs = unary(Math.abs);
const ceil = unary(Math.ceil);
const ln = unary(Math.log);

const mod: MathFunction = {
  minArgs: 2,
  maxArgs: 2,
  apply: (args) => floorMod(args[0], args[1]),
};

export const FUNCTIONS: Readonly<Record<string, MathFunction>> = {
  sin: unary(Math.sin),
  cos: unary(Math.cos),
  tan: unary(Math.tan),
  asin: unary(Math.asin),
  acos: unary(Math.acos),
  atan: unary(Math.atan),
  atan2: { minArgs: 2, maxArgs: 2, apply: (args) => Math.atan2(args[0], args[1]) },
  sinh: unary(Math.sinh),
  cosh: unary(Math.cosh),
  tanh: unary(Math.tanh),
  exp: unary(Math.exp),
  log: {
    minArgs: 1,
    maxArgs: 2,
    apply: (args) =>
      args.length === 2 ? Math.log(args[0]) / Math.log(args[1]) : Math.log(args[0]),
  },
  ln,
  sqrt: unary(Math.sqrt),
  abs,
  Abs: abs,
  floor: unary(Math.floor),
  ceil,
  ceiling: ceil,
  sign: unary(Math.sign),
  min,
  Min: min,
  max,
  Max: max,
  Mod: mod,
};

export const CONSTANTS: Readonly<Record<string, number>> = {
  pi: Math.PI,
  E: Math.E,
};

export function isFunctionName(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(FUNCTIONS, name);
}

export function isConstantName(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(CONSTANTS, name);
}
