// Compile errors and caret-style diagnostic rendering

export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

export class CompileError extends Error {
  readonly line: number;
  readonly column: number;
  readonly offset: number;

  constructor(message: string, position: SourcePosition) {
    super(message);
    this.name = 'CompileError';
    this.line = position.line;
    this.column = position.column;
    this.offset = position.offset;
  }
}

export function isCompileError(value: unknown): value is CompileError {
  return value instanceof CompileError;
}

/**
 * Render an error the way a terminal user wants to see it:
 *
 *   1+@
 *     ^ invalid token
 *
 * Only the line holding the error is echoed, so multi-line input still
 * gets a single caret line.
 */
export function formatDiagnostic(source: string, error: CompileError): string {
  const lines = source.split(/\r?\n/);
  const text = lines[error.line - 1] ?? '';
  const padding = ' '.repeat(Math.max(error.column - 1, 0));
  return `${text}\n${padding}^ ${error.message}`;
}
