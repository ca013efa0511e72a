// AST node types for arithmetic expressions

import type { SourcePosition } from '../diagnostics.js';

export type SourceLocation = SourcePosition;

export interface ASTNode {
  loc?: SourceLocation;
}

// Every expression is a literal or one of the four binary operators
export type Expr = BinaryExpr | NumberExpr;

export type BinaryOp = '+' | '-' | '*' | '/';

// left op right; loc points at the operator
export interface BinaryExpr extends ASTNode {
  type: 'BinaryExpr';
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

// Integer literal
export interface NumberExpr extends ASTNode {
  type: 'NumberExpr';
  value: number;
}

// Helper type guards
export function isBinaryExpr(expr: Expr): expr is BinaryExpr {
  return expr.type === 'BinaryExpr';
}

export function isNumberExpr(expr: Expr): expr is NumberExpr {
  return expr.type === 'NumberExpr';
}

// Fully parenthesized prefix form, e.g. "(+ 1 (* 2 3))". Ignores locations.
export function formatExpr(expr: Expr): string {
  const parts: string[] = [];
  const work: Array<Expr | string> = [expr];

  for (let item = work.pop(); item !== undefined; item = work.pop()) {
    if (typeof item === 'string') {
      parts.push(item);
    } else if (isNumberExpr(item)) {
      parts.push(String(item.value));
    } else {
      // Reversed: "(op", left, right, ")" come off in source order
      work.push(')', item.right, ' ', item.left, ' ', `(${item.op}`);
    }
  }

  return parts.join('');
}
