/**
 * Infix expression parser. Builds the graph directly through the builder
 * functions, so parsed and hand-built expressions are indistinguishable.
 */

import { add, cos, div, exp, log, mul, neg, sin, sub } from './Builders';
import { ExpressionSyntaxError } from './Errors';
import { Constant, Variable } from './Expression';
import type { Expression } from './Expression';

enum TokenType {
  NUMBER,
  IDENTIFIER,
  PLUS,
  MINUS,
  MULTIPLY,
  DIVIDE,
  LPAREN,
  RPAREN,
  EOF
}

interface Token {
  type: TokenType;
  text: string;
  pos: number;
}

const FUNCTIONS = new Map<string, (arg: Expression) => Expression>([
  ['sin', sin],
  ['cos', cos],
  ['exp', exp],
  ['log', log],
]);

/** Deepest nesting of parentheses, calls and signs a parse accepts. */
export const MAX_NESTING = 500;

const NUMBER_PATTERN = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/;

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < text.length) {
    const ch = text[pos];

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (/[0-9.]/.test(ch)) {
      const match = NUMBER_PATTERN.exec(text.slice(pos));
      if (!match) {
        throw new ExpressionSyntaxError(`Malformed number`, pos);
      }
      tokens.push({ type: TokenType.NUMBER, text: match[0], pos });
      pos += match[0].length;
      continue;
    }

    if (/[a-zA-Z_]/.test(ch)) {
      const start = pos;
      while (pos < text.length && /[a-zA-Z0-9_]/.test(text[pos])) pos++;
      tokens.push({ type: TokenType.IDENTIFIER, text: text.slice(start, pos), pos: start });
      continue;
    }

    switch (ch) {
      case '+': tokens.push({ type: TokenType.PLUS, text: ch, pos }); break;
      case '-': tokens.push({ type: TokenType.MINUS, text: ch, pos }); break;
      case '*': tokens.push({ type: TokenType.MULTIPLY, text: ch, pos }); break;
      case '/': tokens.push({ type: TokenType.DIVIDE, text: ch, pos }); break;
      case '(': tokens.push({ type: TokenType.LPAREN, text: ch, pos }); break;
      case ')': tokens.push({ type: TokenType.RPAREN, text: ch, pos }); break;
      default:
        throw new ExpressionSyntaxError(`Unexpected character '${ch}'`, pos);
    }
    pos++;
  }

  tokens.push({ type: TokenType.EOF, text: '', pos: text.length });
  return tokens;
}

/**
 * Result of {@link parseExpression}: the root plus every variable it refers to.
 * @public
 */
export interface ParsedExpression {
  root: Expression;
  variables: Map<string, Variable>;
}

/**
 * Recursive descent parser.
 * Grammar (precedence from lowest to highest):
 *   expression → term (('+' | '-') term)*
 *   term       → unary (('*' | '/') unary)*
 *   unary      → ('+' | '-') unary | primary
 *   primary    → NUMBER | IDENTIFIER | IDENTIFIER '(' expression ')' | '(' expression ')'
 */
class Parser {
  private readonly tokens: Token[];
  private current = 0;
  private depth = 0;

  constructor(text: string, private readonly variables: Map<string, Variable>) {
    this.tokens = tokenize(text);
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== TokenType.EOF) {
      this.current++;
    }
    return token;
  }

  private expect(type: TokenType, message: string): Token {
    const token = this.peek();
    if (token.type !== type) {
      throw new ExpressionSyntaxError(message, token.pos);
    }
    return this.advance();
  }

  parse(): Expression {
    const root = this.expression();
    const trailing = this.peek();
    if (trailing.type !== TokenType.EOF) {
      throw new ExpressionSyntaxError(`Unexpected '${trailing.text}'`, trailing.pos);
    }
    return root;
  }

  private expression(): Expression {
    let left = this.term();
    while (this.peek().type === TokenType.PLUS || this.peek().type === TokenType.MINUS) {
      const op = this.advance();
      const right = this.term();
      left = op.type === TokenType.PLUS ? add(left, right) : sub(left, right);
    }
    return left;
  }

  private term(): Expression {
    let left = this.unary();
    while (this.peek().type === TokenType.MULTIPLY || this.peek().type === TokenType.DIVIDE) {
      const op = this.advance();
      const right = this.unary();
      left = op.type === TokenType.MULTIPLY ? mul(left, right) : div(left, right);
    }
    return left;
  }

  private unary(): Expression {
    const token = this.peek();
    if (this.depth >= MAX_NESTING) {
      throw new ExpressionSyntaxError('Expression nested too deeply', token.pos);
    }
    this.depth++;
    try {
      return this.signed(token);
    } finally {
      this.depth--;
    }
  }

  private signed(token: Token): Expression {
    if (token.type === TokenType.MINUS) {
      this.advance();
      return neg(this.unary());
    }
    if (token.type === TokenType.PLUS) {
      this.advance();
      return this.unary();
    }
    return this.primary();
  }

  private primary(): Expression {
    const token = this.advance();

    switch (token.type) {
      case TokenType.NUMBER:
        return new Constant(Number(token.text));

      case TokenType.IDENTIFIER: {
        if (this.peek().type === TokenType.LPAREN) {
          const fn = FUNCTIONS.get(token.text);
          if (!fn) {
            throw new ExpressionSyntaxError(`Unknown function '${token.text}'`, token.pos);
          }
          this.advance();
          const arg = this.expression();
          this.expect(TokenType.RPAREN, `Expected ')' after argument of ${token.text}`);
          return fn(arg);
        }
        return this.variable(token.text);
      }

      case TokenType.LPAREN: {
        const inner = this.expression();
        this.expect(TokenType.RPAREN, `Expected ')'`);
        return inner;
      }

      case TokenType.EOF:
        throw new ExpressionSyntaxError('Unexpected end of input', token.pos);

      default:
        throw new ExpressionSyntaxError(`Unexpected '${token.text}'`, token.pos);
    }
  }

  private variable(name: string): Variable {
    let v = this.variables.get(name);
    if (!v) {
      v = new Variable(name);
      this.variables.set(name, v);
    }
    return v;
  }
}

/**
 * Parses an infix string such as `exp(5 / x) - 5`.
 *
 * Each identifier maps to one Variable for the whole string, so `x * x`
 * references the same leaf twice. Pass `variables` to reuse existing
 * Variable instances; new ones are added to the returned map.
 *
 * @throws ExpressionSyntaxError on malformed input
 * @public
 */
export function parseExpression(
  text: string,
  variables: ReadonlyMap<string, Variable> = new Map()
): ParsedExpression {
  const known = new Map(variables);
  const root = new Parser(text, known).parse();
  return { root, variables: known };
}
