// Lexer for arithmetic expressions

import { CompileError, type SourcePosition } from '../diagnostics.js';

export type TokenType =
  | 'PUNCT'   // + - * / ( )
  | 'NUMBER'
  | 'EOF';

export type Punctuator = '+' | '-' | '*' | '/' | '(' | ')';

interface TokenBase extends SourcePosition {
  type: TokenType;
  value: string;
}

export interface PunctToken extends TokenBase {
  type: 'PUNCT';
  value: Punctuator;
}

export interface NumberToken extends TokenBase {
  type: 'NUMBER';
  number: number;
}

export interface EofToken extends TokenBase {
  type: 'EOF';
  value: '';
}

export type Token = PunctToken | NumberToken | EofToken;

// Largest literal a sign-extended imm32 `push` can carry
export const MAX_LITERAL = 2147483647;

const PUNCTUATORS: ReadonlySet<string> = new Set(['+', '-', '*', '/', '(', ')']);

function isPunctuator(char: string): char is Punctuator {
  return PUNCTUATORS.has(char);
}

export class LexError extends CompileError {
  constructor(message: string, position: SourcePosition) {
    super(message, position);
    this.name = 'LexError';
  }
}

export class Lexer {
  private source: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private tokens: Token[] = [];

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    while (!this.isAtEnd()) {
      const char = this.peek();

      if (this.isWhitespace(char)) {
        this.advance();
        continue;
      }

      if (isPunctuator(char)) {
        this.tokens.push({ type: 'PUNCT', value: char, ...this.position() });
        this.advance();
        continue;
      }

      if (this.isDigit(char)) {
        this.readNumber();
        continue;
      }

      throw new LexError('invalid token', this.position());
    }

    this.tokens.push({ type: 'EOF', value: '', ...this.position() });
    return this.tokens;
  }

  private readNumber(): void {
    const start = this.position();

    const previous = this.tokens[this.tokens.length - 1];
    if (previous?.type === 'NUMBER') {
      throw new LexError('unexpected number', start);
    }

    while (!this.isAtEnd() && this.isDigit(this.peek())) {
      this.advance();
    }

    const text = this.source.slice(start.offset, this.pos);
    const value = parseInt(text, 10);
    if (value > MAX_LITERAL) {
      throw new LexError('number out of range', start);
    }

    this.tokens.push({ type: 'NUMBER', value: text, number: value, ...start });
  }

  private position(): SourcePosition {
    return { line: this.line, column: this.column, offset: this.pos };
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.source[this.pos];
  }

  private advance(): void {
    if (this.source[this.pos] === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.pos++;
  }

  private isWhitespace(char: string): boolean {
    return char === ' ' || char === '\t' || char === '\n' ||
           char === '\v' || char === '\f' || char === '\r';
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }
}

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
