/**
 * Stack Machine Emulator
 *
 * Executes generated instruction lists with x86-64 integer semantics:
 * 64-bit two's complement registers, wrapping add/sub/imul, and a
 * trapping truncating idiv on rdx:rax.
 */

import type { Instruction, Register } from '../compiler/instructions.js';
import { generate } from '../compiler/codegen.js';
import { parse } from '../parser/parser.js';
import { tokenize } from '../parser/lexer.js';

export interface MachineState {
  /** General-purpose registers used by the generator */
  registers: Record<Register, bigint>;
  /** Value stack, top at the end */
  stack: bigint[];
  /** Index of the next instruction */
  pc: number;
  /** Instructions executed so far */
  steps: number;
}

export interface MachineConfig {
  /** Maximum stack depth in values (default 1 << 20) */
  maxStackDepth?: number;
}

export class MachineError extends Error {
  constructor(message: string, public pc: number) {
    super(message);
    this.name = 'MachineError';
  }
}

const toInt64 = (value: bigint): bigint => BigInt.asIntN(64, value);

const toUint64 = (value: bigint): bigint => BigInt.asUintN(64, value);

export class StackMachine {
  private state: MachineState;
  private maxStackDepth: number;

  constructor(config: MachineConfig = {}) {
    this.maxStackDepth = config.maxStackDepth ?? 1 << 20;
    this.state = StackMachine.initialState();
  }

  private static initialState(): MachineState {
    return {
      registers: { rax: 0n, rdi: 0n, rdx: 0n },
      stack: [],
      pc: 0,
      steps: 0,
    };
  }

  // Snapshot; changing it does not affect the machine
  getState(): MachineState {
    const { registers, stack } = this.state;
    return { ...this.state, registers: { ...registers }, stack: [...stack] };
  }

  reset(): void {
    this.state = StackMachine.initialState();
  }

  /**
   * Run instructions from a fresh state until `ret`, returning rax.
   */
  run(instructions: Instruction[]): bigint {
    this.reset();
    const state = this.state;

    while (state.pc < instructions.length) {
      const instr = instructions[state.pc];
      if (instr.op === 'ret') {
        state.steps++;
        return state.registers.rax;
      }
      this.step(instr);
      state.pc++;
      state.steps++;
    }

    throw new MachineError('missing ret', state.pc);
  }

  private step(instr: Exclude<Instruction, { op: 'ret' }>): void {
    const regs = this.state.registers;

    switch (instr.op) {
      case 'push':
        this.push(typeof instr.src === 'number' ? BigInt(instr.src) : regs[instr.src]);
        break;
      case 'pop':
        regs[instr.dst] = this.pop();
        break;
      case 'add':
        regs[instr.dst] = toInt64(regs[instr.dst] + regs[instr.src]);
        break;
      case 'sub':
        regs[instr.dst] = toInt64(regs[instr.dst] - regs[instr.src]);
        break;
      case 'imul':
        regs[instr.dst] = toInt64(regs[instr.dst] * regs[instr.src]);
        break;
      case 'cqo':
        regs.rdx = regs.rax < 0n ? -1n : 0n;
        break;
      case 'idiv':
        this.idiv(regs[instr.src]);
        break;
    }
  }

  // Signed divide of the 128-bit rdx:rax; BigInt division truncates toward zero
  private idiv(divisor: bigint): void {
    const regs = this.state.registers;
    if (divisor === 0n) {
      throw new MachineError('division by zero', this.state.pc);
    }

    const dividend = (regs.rdx << 64n) | toUint64(regs.rax);
    const quotient = dividend / divisor;
    if (toInt64(quotient) !== quotient) {
      throw new MachineError('division overflow', this.state.pc);
    }

    regs.rax = quotient;
    regs.rdx = dividend % divisor;
  }

  private push(value: bigint): void {
    if (this.state.stack.length >= this.maxStackDepth) {
      throw new MachineError('stack overflow', this.state.pc);
    }
    this.state.stack.push(value);
  }

  private pop(): bigint {
    const value = this.state.stack.pop();
    if (value === undefined) {
      throw new MachineError('stack underflow', this.state.pc);
    }
    return value;
  }
}

// Compile and execute an expression in one go
export function evaluate(source: string): bigint {
  const instructions = generate(parse(tokenize(source)));
  return new StackMachine().run(instructions);
}
