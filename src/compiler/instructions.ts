/**
 * x86-64 instruction subset used by the stack code generator.
 *
 * Operands follow Intel syntax: destination first.
 */

export type Register = 'rax' | 'rdi' | 'rdx';

export type Instruction =
  | { op: 'push'; src: Register | number }
  | { op: 'pop'; dst: Register }
  | { op: 'add' | 'sub' | 'imul'; dst: Register; src: Register }
  | { op: 'cqo' }
  | { op: 'idiv'; src: Register }
  | { op: 'ret' };

export function formatInstruction(instr: Instruction): string {
  switch (instr.op) {
    case 'push':
      return `  push ${instr.src}`;
    case 'pop':
      return `  pop ${instr.dst}`;
    case 'add':
    case 'sub':
    case 'imul':
      return `  ${instr.op} ${instr.dst}, ${instr.src}`;
    case 'idiv':
      return `  idiv ${instr.src}`;
    case 'cqo':
    case 'ret':
      return `  ${instr.op}`;
  }
}
