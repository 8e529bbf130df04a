/**
 * Expression Evaluator Contract
 *
 * The engine depends on this capability only, not on a particular parser.
 * Implementations must reject expressions whose free symbols are not a
 * subset of the allowed set, and may throw at evaluation time for domain
 * errors (callers recover from those).
 */

/**
 * A compiled expression, callable with one number per parameter.
 */
export interface CompiledExpression {
  /** Original text */
  readonly source: string;

  /** Parameter order expected by evaluate() */
  readonly parameters: readonly string[];

  /** Free variables actually referenced, sorted */
  readonly symbols: readonly string[];

  evaluate(...args: number[]): number;
}

export interface IExpressionEvaluator {
  /**
   * Compile `expr` over the given parameters.
   * Throws when the text is not a valid expression over `parameters`.
   */
  compile(expr: string, parameters: readonly string[]): CompiledExpression;
}
