/**
 * Expression Parser
 *
 * Recursive-descent parser for arithmetic expressions. Produces an AST;
 * symbol checking and compilation happen in ExpressionEvaluator.
 *
 * Precedence, lowest first:
 *   additive        + -
 *   multiplicative  * / %
 *   unary           + - (prefix)
 *   power           ** ^ (right-associative, binds tighter than prefix minus)
 *   primary         number, identifier, call, ( expr )
 */

// ============================================================================
// AST
// ============================================================================

export type BinaryOperator = "+" | "-" | "*" | "/" | "%" | "**";

export type ExpressionNode =
  | { kind: "number"; value: number }
  | { kind: "identifier"; name: string }
  | { kind: "unary"; op: "+" | "-"; operand: ExpressionNode }
  | { kind: "binary"; op: BinaryOperator; left: ExpressionNode; right: ExpressionNode }
  | { kind: "call"; name: string; args: ExpressionNode[] };

/**
 * Raised on malformed input. `position` is a character offset.
 */
export class ExpressionSyntaxError extends Error {
  constructor(message: string, public readonly position: number) {
    super(message);
    this.name = "ExpressionSyntaxError";
  }
}

// ============================================================================
// Tokenizer
// ============================================================================

type Token =
  | { type: "number"; value: number; pos: number }
  | { type: "identifier"; name: string; pos: number }
  | { type: "operator"; op: string; pos: number }
  | { type: "end"; pos: number };

const NUMBER_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;
const OPERATORS = ["**", "+", "-", "*", "/", "%", "^", "(", ")", ","];

export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < text.length) {
    const ch = text[pos];
    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    const rest = text.slice(pos);

    const num = NUMBER_PATTERN.exec(rest);
    if (num) {
      tokens.push({ type: "number", value: Number(num[0]), pos });
      pos += num[0].length;
      continue;
    }

    const ident = IDENTIFIER_PATTERN.exec(rest);
    if (ident) {
      tokens.push({ type: "identifier", name: ident[0], pos });
      pos += ident[0].length;
      continue;
    }

    const op = OPERATORS.find((o) => rest.startsWith(o));
    if (op) {
      // "^" is an alias for exponentiation
      tokens.push({ type: "operator", op: op === "^" ? "**" : op, pos });
      pos += op.length;
      continue;
    }

    throw new ExpressionSyntaxError(`Unexpected character '${ch}' at position ${pos}`, pos);
  }

  tokens.push({ type: "end", pos });
  return tokens;
}

// ============================================================================
// Parser
// ============================================================================

export function parseExpression(text: string): ExpressionNode {
  return new Parser(tokenize(text)).parse();
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ExpressionNode {
    const node = this.parseAdditive();
    const next = this.peek();
    if (next.type !== "end") {
      throw this.unexpected(next);
    }
    return node;
  }

  private parseAdditive(): ExpressionNode {
    let left = this.parseMultiplicative();
    for (;;) {
      const op = this.matchOperator("+", "-");
      if (op === null) return left;
      const right = this.parseMultiplicative();
      left = { kind: "binary", op, left, right };
    }
  }

  private parseMultiplicative(): ExpressionNode {
    let left = this.parseUnary();
    for (;;) {
      const op = this.matchOperator("*", "/", "%");
      if (op === null) return left;
      const right = this.parseUnary();
      left = { kind: "binary", op, left, right };
    }
  }

  private parseUnary(): ExpressionNode {
    const op = this.matchOperator("+", "-");
    if (op !== null) {
      return { kind: "unary", op, operand: this.parseUnary() };
    }
    return this.parsePower();
  }

  private parsePower(): ExpressionNode {
    const base = this.parsePrimary();
    if (this.matchOperator("**") !== null) {
      // Exponent may carry its own sign: 2 ** -1
      const exponent = this.parseUnary();
      return { kind: "binary", op: "**", left: base, right: exponent };
    }
    return base;
  }

  private parsePrimary(): ExpressionNode {
    const token = this.advance();

    if (token.type === "number") {
      return { kind: "number", value: token.value };
    }

    if (token.type === "identifier") {
      if (this.matchOperator("(") !== null) {
        return { kind: "call", name: token.name, args: this.parseArguments() };
      }
      return { kind: "identifier", name: token.name };
    }

    if (token.type === "operator" && token.op === "(") {
      const inner = this.parseAdditive();
      this.expectOperator(")");
      return inner;
    }

    throw this.unexpected(token);
  }

  private parseArguments(): ExpressionNode[] {
    const args: ExpressionNode[] = [];
    if (this.matchOperator(")") !== null) {
      return args;
    }
    for (;;) {
      args.push(this.parseAdditive());
      if (this.matchOperator(",") !== null) continue;
      this.expectOperator(")");
      return args;
    }
  }

  // === Token helpers ===

  private peek(): Token {
    return this.tokens[this.index];
  }

  private advance(): Token {
    const token = this.tokens[this.index];
    if (token.type !== "end") {
      this.index++;
    }
    return token;
  }

  private matchOperator<T extends string>(...ops: T[]): T | null {
    const token = this.peek();
    if (token.type !== "operator") return null;
    const found = ops.find((op) => op === token.op);
    if (found === undefined) return null;
    this.index++;
    return found;
  }

  private expectOperator(op: string): void {
    if (this.matchOperator(op) === null) {
      const token = this.peek();
      throw new ExpressionSyntaxError(
        `Expected '${op}' at position ${token.pos}`,
        token.pos
      );
    }
  }

  private unexpected(token: Token): ExpressionSyntaxError {
    if (token.type === "end") {
      return new ExpressionSyntaxError("Unexpected end of expression", token.pos);
    }
    const text =
      token.type === "number"
        ? String(token.value)
        : token.type === "identifier"
          ? token.name
          : token.op;
    return new ExpressionSyntaxError(
      `Unexpected '${text}' at position ${token.pos}`,
      token.pos
    );
  }
}
