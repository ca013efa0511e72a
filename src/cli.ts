#!/usr/bin/env node
/**
 * Expression Compiler CLI
 *
 * Usage: exprc <expression>
 *
 * Writes an x86-64 assembly listing to stdout. On a lexical or syntax
 * error, echoes the input with a caret under the offending character.
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { compile } from './compiler/codegen.js';
import { formatDiagnostic, isCompileError } from './diagnostics.js';

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

function parseArgs(args: string[]): string {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length !== 1) {
    throw new ArgumentError('exprc: invalid number of arguments');
  }

  return cliArgs[0];
}

function printUsage(): void {
  console.error(`Usage: exprc <expression>

Examples:
  exprc '1+2*3'
  exprc '(8-3-2) / 2' > expr.s && cc -o expr expr.s && ./expr; echo $?`);
}

export function main(args: string[] = process.argv): number {
  let source: string;
  try {
    source = parseArgs(args);
  } catch (e) {
    if (!(e instanceof ArgumentError)) throw e;
    console.error(e.message);
    printUsage();
    return 1;
  }

  let listing: string;
  try {
    listing = compile(source);
  } catch (e) {
    if (!isCompileError(e)) throw e;
    console.error(formatDiagnostic(source, e));
    return 1;
  }

  // console.log supplies the final newline
  console.log(listing.trimEnd());
  return 0;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Run if executed directly
if (isEntryPoint()) {
  process.exit(main());
}
