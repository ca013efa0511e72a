// Stack code generator: Expr -> x86-64 instructions -> assembly listing
//
// Every subtree leaves exactly one value on the machine stack. A binary
// node pops its right operand into rdi, its left into rax, combines them
// in rax and pushes the result back.
//
// Example:
//   1+2*3
//   ->
//   push 1
//   push 2
//   push 3
//   pop rdi
//   pop rax
//   imul rax, rdi
//   push rax
//   ...

import type { Expr, BinaryOp } from '../types/ast.js';
import { parse } from '../parser/parser.js';
import { tokenize } from '../parser/lexer.js';
import { formatInstruction, type Instruction } from './instructions.js';

export interface CodegenOptions {
  /** Global symbol of the entry point (default 'main'; '_main' on Mach-O) */
  entrySymbol?: string;
}

const DEFAULT_ENTRY_SYMBOL = 'main';

interface WorkItem {
  expr: Expr;
  expanded: boolean;
}

export function generate(tree: Expr): Instruction[] {
  const out: Instruction[] = [];
  generateExpr(tree, out);

  // The result is left on top of the stack; hand it back in rax
  out.push({ op: 'pop', dst: 'rax' });
  out.push({ op: 'ret' });
  return out;
}

// Post-order walk over an explicit work stack: an operator chain builds
// a left spine as deep as the chain is long
function generateExpr(tree: Expr, out: Instruction[]): void {
  const work: WorkItem[] = [{ expr: tree, expanded: false }];

  for (let item = work.pop(); item !== undefined; item = work.pop()) {
    const { expr } = item;

    if (expr.type === 'NumberExpr') {
      out.push({ op: 'push', src: expr.value });
      continue;
    }

    if (item.expanded) {
      out.push({ op: 'pop', dst: 'rdi' });
      out.push({ op: 'pop', dst: 'rax' });
      generateBinaryOp(expr.op, out);
      out.push({ op: 'push', src: 'rax' });
      continue;
    }

    // Popped in reverse: left subtree, right subtree, then the operator
    work.push({ expr, expanded: true });
    work.push({ expr: expr.right, expanded: false });
    work.push({ expr: expr.left, expanded: false });
  }
}

function generateBinaryOp(op: BinaryOp, out: Instruction[]): void {
  switch (op) {
    case '+':
      out.push({ op: 'add', dst: 'rax', src: 'rdi' });
      break;
    case '-':
      out.push({ op: 'sub', dst: 'rax', src: 'rdi' });
      break;
    case '*':
      out.push({ op: 'imul', dst: 'rax', src: 'rdi' });
      break;
    case '/':
      // Sign-extend rax into rdx:rax, then truncating signed divide
      out.push({ op: 'cqo' });
      out.push({ op: 'idiv', src: 'rdi' });
      break;
  }
}

export function emitAssembly(instructions: Instruction[], options: CodegenOptions = {}): string {
  const entry = options.entrySymbol ?? DEFAULT_ENTRY_SYMBOL;
  const lines = [
    '.intel_syntax noprefix',
    `.globl ${entry}`,
    `${entry}:`,
    ...instructions.map(formatInstruction),
  ];
  return lines.join('\n') + '\n';
}

/**
 * Compile an expression to a complete assembly listing.
 * Throws LexError or ParseError on malformed input.
 */
export function compile(source: string, options: CodegenOptions = {}): string {
  const tree = parse(tokenize(source));
  return emitAssembly(generate(tree), options);
}
