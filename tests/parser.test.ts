import { describe, it, expect } from 'vitest';
import { Parser, ParseError, parse, parseSource, MAX_NESTING_DEPTH } from '../src/parser/parser.js';
import { tokenize } from '../src/parser/lexer.js';
import { formatExpr, isBinaryExpr, isNumberExpr } from '../src/types/ast.js';

function shape(source: string): string {
  return formatExpr(parseSource(source));
}

function parseError(source: string): ParseError {
  try {
    parseSource(source);
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  throw new Error(`Expected '${source}' to fail`);
}

describe('Parser', () => {
  describe('literals', () => {
    it('should parse a single number', () => {
      const ast = parse(tokenize('42'));
      expect(ast).toEqual({
        type: 'NumberExpr',
        value: 42,
        loc: { line: 1, column: 1, offset: 0 },
      });
    });

    it('should unwrap nested parentheses', () => {
      expect(shape('((7))')).toBe('7');
    });
  });

  describe('precedence', () => {
    it('should bind * tighter than +', () => {
      expect(shape('1+2*3')).toBe('(+ 1 (* 2 3))');
    });

    it('should bind / tighter than -', () => {
      expect(shape('9-6/3')).toBe('(- 9 (/ 6 3))');
    });

    it('should group products on both sides of a sum', () => {
      expect(shape('2*3+4*5')).toBe('(+ (* 2 3) (* 4 5))');
    });

    it('should let parentheses override precedence', () => {
      expect(shape('(1+2)*3')).toBe('(* (+ 1 2) 3)');
    });
  });

  describe('associativity', () => {
    it('should fold subtraction to the left', () => {
      expect(shape('8-3-2')).toBe('(- (- 8 3) 2)');
    });

    it('should fold division to the left', () => {
      expect(shape('8/4/2')).toBe('(/ (/ 8 4) 2)');
    });

    it('should fold mixed multiplicative operators to the left', () => {
      expect(shape('2*6/3*4')).toBe('(* (/ (* 2 6) 3) 4)');
    });

    it('should build a left-leaning tree', () => {
      const ast = parseSource('1+2+3');
      expect(isBinaryExpr(ast)).toBe(true);
      if (isBinaryExpr(ast)) {
        expect(isBinaryExpr(ast.left)).toBe(true);
        expect(isNumberExpr(ast.right)).toBe(true);
      }
    });
  });

  describe('whitespace', () => {
    it('should produce the same tree regardless of spacing', () => {
      expect(shape(' 1 + 2 ')).toBe(shape('1+2'));
      expect(shape('\t( 1+2 )\n* 3')).toBe(shape('(1+2)*3'));
    });
  });

  describe('locations', () => {
    it('should locate operator nodes at the operator token', () => {
      const ast = parseSource('1 + 2');
      expect(ast.loc).toEqual({ line: 1, column: 3, offset: 2 });
      if (isBinaryExpr(ast)) {
        expect(ast.left.loc).toEqual({ line: 1, column: 1, offset: 0 });
        expect(ast.right.loc).toEqual({ line: 1, column: 5, offset: 4 });
      }
    });
  });

  describe('errors', () => {
    it('should require an operand after an operator', () => {
      const error = parseError('1+');
      expect(error.name).toBe('ParseError');
      expect(error.message).toBe('expected a number');
      expect(error.offset).toBe(2);
      expect(error.column).toBe(3);
    });

    it('should require a closing parenthesis', () => {
      const error = parseError('1+(2');
      expect(error.message).toBe("expected ')'");
      expect(error.offset).toBe(4);
    });

    it('should point at the token found instead of a closing parenthesis', () => {
      const error = parseError('(1+2(');
      expect(error.message).toBe("expected ')'");
      expect(error.offset).toBe(4);
    });

    it('should reject empty input', () => {
      const error = parseError('');
      expect(error.message).toBe('expected a number');
      expect(error.offset).toBe(0);
    });

    it('should reject empty parentheses', () => {
      const error = parseError('()');
      expect(error.message).toBe('expected a number');
      expect(error.offset).toBe(1);
    });

    it('should reject a leading operator', () => {
      const error = parseError('-7/2');
      expect(error.message).toBe('expected a number');
      expect(error.offset).toBe(0);
    });

    it('should reject two operators in a row', () => {
      const error = parseError('1+*2');
      expect(error.message).toBe('expected a number');
      expect(error.offset).toBe(2);
    });

    it('should reject trailing input after a complete expression', () => {
      const error = parseError('1)');
      expect(error.message).toBe('unexpected trailing input');
      expect(error.offset).toBe(1);
    });

    it('should reject a trailing group', () => {
      const error = parseError('(1+2)(3)');
      expect(error.message).toBe('unexpected trailing input');
      expect(error.offset).toBe(5);
    });
  });

  describe('nesting limit', () => {
    function nested(depth: number): string {
      return '('.repeat(depth) + '1' + ')'.repeat(depth);
    }

    it('should accept parentheses nested up to the limit', () => {
      expect(shape(nested(MAX_NESTING_DEPTH))).toBe('1');
    });

    it('should reject the first parenthesis past the limit', () => {
      const error = parseError(nested(MAX_NESTING_DEPTH + 1));
      expect(error.message).toBe('expression too deeply nested');
      expect(error.offset).toBe(MAX_NESTING_DEPTH);
    });

    it('should reject very deep nesting without exhausting the stack', () => {
      const error = parseError(nested(20000));
      expect(error.message).toBe('expression too deeply nested');
    });

    it('should count only open parentheses', () => {
      const source = Array(MAX_NESTING_DEPTH * 2).fill('(1)').join('+');
      expect(() => parseSource(source)).not.toThrow();
    });
  });

  it('should fold a long chain without recursion', () => {
    const ast = parseSource(Array(50000).fill('2').join('*'));
    expect(ast.type).toBe('BinaryExpr');
  });

  it('should reparse the same tokens to the same tree', () => {
    const parser = new Parser(tokenize('4*(5-1)'));
    expect(parser.parse()).toEqual(parser.parse());
  });
});
