// exprc - arithmetic expression compiler
// Lexer, parser and stack code generator for x86-64 and WebAssembly

// Front end
export {
  Lexer,
  LexError,
  tokenize,
  MAX_LITERAL,
  type Token,
  type TokenType,
  type Punctuator,
  type PunctToken,
  type NumberToken,
  type EofToken,
} from './parser/lexer.js';

export {
  Parser,
  ParseError,
  parse,
  parseSource,
  MAX_NESTING_DEPTH,
} from './parser/parser.js';

export {
  formatExpr,
  isBinaryExpr,
  isNumberExpr,
  type Expr,
  type BinaryExpr,
  type NumberExpr,
  type BinaryOp,
  type SourceLocation,
} from './types/ast.js';

// Diagnostics
export {
  CompileError,
  formatDiagnostic,
  isCompileError,
  type SourcePosition,
} from './diagnostics.js';

// x86-64 back end
export {
  generate,
  emitAssembly,
  compile,
  type CodegenOptions,
} from './compiler/codegen.js';

export {
  formatInstruction,
  type Instruction,
  type Register,
} from './compiler/instructions.js';

// WebAssembly back end
export {
  compileToWasm,
  type CompiledWasm,
  type WasmOptions,
} from './compiler/wasm-compiler.js';

// Reference executor
export {
  StackMachine,
  MachineError,
  evaluate,
  type MachineState,
  type MachineConfig,
} from './emulator/stack-machine.js';

export { main as runCli, ArgumentError } from './cli.js';
