/**
 * Engine error types.
 *
 * InvalidExpressionError and DuplicateEquationError are fatal and surface
 * before any simulation starts. EvaluationError is thrown by compiled
 * expressions at run time and is always recovered by the caller.
 */

export class InvalidExpressionError extends Error {
  constructor(
    public readonly expression: string,
    public readonly offendingSymbols: readonly string[],
    message: string
  ) {
    super(message);
    this.name = "InvalidExpressionError";
  }
}

export class EvaluationError extends Error {
  constructor(
    public readonly expression: string,
    public readonly reason: string
  ) {
    super(`Cannot evaluate "${expression}": ${reason}`);
    this.name = "EvaluationError";
  }
}

export class DuplicateEquationError extends Error {
  constructor(public readonly equationName: string) {
    super(`Equation name "${equationName}" is used more than once`);
    this.name = "DuplicateEquationError";
  }
}
