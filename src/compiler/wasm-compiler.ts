// WASM Code Generator using Binaryen
// Lowers an expression tree to a module exporting `main: () -> i64`

import binaryen from 'binaryen';
import type { Expr, BinaryOp } from '../types/ast.js';

export interface WasmOptions {
  /** Name of the exported function (default 'main') */
  exportName?: string;
  /** Run Binaryen's optimizer before emitting */
  optimize?: boolean;
}

export interface CompiledWasm {
  binary: Uint8Array;
  text: string;
  exportName: string;
  run: () => bigint;
}

/**
 * Compile an expression tree to WebAssembly
 *
 * i64 arithmetic mirrors the x86 listing: add/sub/mul wrap, and
 * i64.div_s truncates toward zero and traps on a zero divisor or on
 * INT64_MIN / -1.
 */
export function compileToWasm(tree: Expr, options: WasmOptions = {}): CompiledWasm {
  const exportName = options.exportName ?? 'main';
  const mod = new binaryen.Module();

  try {
    mod.addFunction(
      exportName,
      binaryen.none,
      binaryen.i64,
      [],
      generateExpr(mod, tree)
    );
    mod.addFunctionExport(exportName, exportName);

    if (options.optimize) {
      mod.optimize();
    }

    if (!mod.validate()) {
      throw new Error('Generated WASM module is invalid');
    }

    const binary = mod.emitBinary();
    const text = mod.emitText();

    return {
      binary,
      text,
      exportName,
      run: () => runWasm(binary, exportName),
    };
  } finally {
    mod.dispose();
  }
}

interface WorkItem {
  expr: Expr;
  expanded: boolean;
}

// Same post-order walk as the x86 generator; finished subtrees wait on
// a value stack until their parent combines them
function generateExpr(mod: binaryen.Module, tree: Expr): binaryen.ExpressionRef {
  const work: WorkItem[] = [{ expr: tree, expanded: false }];
  const values: binaryen.ExpressionRef[] = [];

  for (let item = work.pop(); item !== undefined; item = work.pop()) {
    const { expr } = item;

    if (expr.type === 'NumberExpr') {
      // Literals are non-negative and below 2^31, so the high word is zero
      values.push(mod.i64.const(expr.value, 0));
      continue;
    }

    if (item.expanded) {
      const right = values.pop();
      const left = values.pop();
      if (left === undefined || right === undefined) {
        throw new Error(`Missing operand for '${expr.op}'`);
      }
      values.push(generateBinaryOp(mod, expr.op, left, right));
      continue;
    }

    work.push({ expr, expanded: true });
    work.push({ expr: expr.right, expanded: false });
    work.push({ expr: expr.left, expanded: false });
  }

  const result = values.pop();
  if (result === undefined || values.length > 0) {
    throw new Error('Expression did not reduce to a single value');
  }
  return result;
}

function generateBinaryOp(
  mod: binaryen.Module,
  op: BinaryOp,
  left: binaryen.ExpressionRef,
  right: binaryen.ExpressionRef
): binaryen.ExpressionRef {
  switch (op) {
    case '+': return mod.i64.add(left, right);
    case '-': return mod.i64.sub(left, right);
    case '*': return mod.i64.mul(left, right);
    case '/': return mod.i64.div_s(left, right);
  }
}

function runWasm(binary: Uint8Array, exportName: string): bigint {
  const wasmModule = new WebAssembly.Module(new Uint8Array(binary));
  const wasmInstance = new WebAssembly.Instance(wasmModule, {});

  const entry = wasmInstance.exports[exportName];
  if (typeof entry !== 'function') {
    throw new Error(`WASM module does not export function '${exportName}'`);
  }

  const result: unknown = entry();
  if (typeof result !== 'bigint') {
    throw new Error(`Expected i64 result from '${exportName}', got ${typeof result}`);
  }
  return result;
}
