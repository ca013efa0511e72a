// Recursive descent parser for arithmetic expressions
//
//   expr    = mul (("+" | "-") mul)*
//   mul     = primary (("*" | "/") primary)*
//   primary = "(" expr ")" | number

import { CompileError, type SourcePosition } from '../diagnostics.js';
import { type Token, type Punctuator, tokenize } from './lexer.js';
import type { Expr, BinaryOp, SourceLocation } from '../types/ast.js';

// Each open parenthesis costs three stack frames (expr, mul, primary);
// operator chains are loops and cost none
export const MAX_NESTING_DEPTH = 1000;

export class ParseError extends CompileError {
  constructor(message: string, position: SourcePosition) {
    super(message, position);
    this.name = 'ParseError';
  }
}

export class Parser {
  private tokens: Token[] = [];
  private pos: number = 0;
  private depth: number = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): Expr {
    this.pos = 0;
    this.depth = 0;
    const expr = this.parseExpr();

    if (!this.isAtEnd()) {
      throw this.error('unexpected trailing input');
    }

    return expr;
  }

  private parseExpr(): Expr {
    let left = this.parseMul();

    while (this.checkPunct('+') || this.checkPunct('-')) {
      const loc = this.location();
      const op: BinaryOp = this.advance().value === '+' ? '+' : '-';
      const right = this.parseMul();
      left = { type: 'BinaryExpr', op, left, right, loc };
    }

    return left;
  }

  private parseMul(): Expr {
    let left = this.parsePrimary();

    while (this.checkPunct('*') || this.checkPunct('/')) {
      const loc = this.location();
      const op: BinaryOp = this.advance().value === '*' ? '*' : '/';
      const right = this.parsePrimary();
      left = { type: 'BinaryExpr', op, left, right, loc };
    }

    return left;
  }

  private parsePrimary(): Expr {
    // Parenthesized expression
    if (this.checkPunct('(')) {
      if (this.depth >= MAX_NESTING_DEPTH) {
        throw this.error('expression too deeply nested');
      }
      this.advance();
      this.depth++;
      const expr = this.parseExpr();
      if (!this.matchPunct(')')) {
        throw this.error("expected ')'");
      }
      this.depth--;
      return expr;
    }

    const token = this.current();
    if (token.type === 'NUMBER') {
      this.advance();
      return { type: 'NumberExpr', value: token.number, loc: this.locationOf(token) };
    }

    throw this.error('expected a number');
  }

  // Helper methods

  private current(): Token {
    return this.tokens[this.pos];
  }

  private isAtEnd(): boolean {
    return this.current().type === 'EOF';
  }

  private checkPunct(value: Punctuator): boolean {
    const token = this.current();
    return token.type === 'PUNCT' && token.value === value;
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.pos++;
    return this.tokens[this.pos - 1];
  }

  private matchPunct(value: Punctuator): boolean {
    if (this.checkPunct(value)) {
      this.advance();
      return true;
    }
    return false;
  }

  private location(): SourceLocation {
    return this.locationOf(this.current());
  }

  private locationOf(token: Token): SourceLocation {
    return { line: token.line, column: token.column, offset: token.offset };
  }

  private error(message: string): ParseError {
    return new ParseError(message, this.location());
  }
}

export function parse(tokens: Token[]): Expr {
  return new Parser(tokens).parse();
}

export function parseSource(source: string): Expr {
  return parse(tokenize(source));
}
