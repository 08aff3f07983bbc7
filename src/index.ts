#!/usr/bin/env node

import { OneCompiler, CompilerOptions } from './one_compiler';
import { disassembleModule, serializeModule } from './compiler_module';
import { CompileError } from './common/errors';
import * as fs from 'fs';

// 导出公共 API
export { OneCompiler };
export type { CompilerOptions };
export { Lexer, tokenize, KEYWORDS } from './lexer';
export { Parser, parse } from './parser';
export { TypeChecker, checkProgram, BUILTIN_SIGNATURES } from './checker';
export type { CheckResult, Type } from './checker';
export {
  CodeGenerator,
  generate,
  disassembleFunction,
  disassembleInstruction,
  disassembleModule,
  serializeModule,
  deserializeModule,
} from './compiler_module';
export * from './common/errors';
export * from './types';

const USAGE = 'Usage: onec <file.one> [-o out.json] [-t] [-v] [-d]';

export interface CliArgs {
  input: string;
  output?: string;
  disassemble: boolean;
  options: CompilerOptions;
}

export function parseArgs(args: string[]): CliArgs {
  let input: string | undefined;
  let output: string | undefined;
  let disassemble = false;
  const options: CompilerOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-o': {
        const next = args[i + 1];
        if (next === undefined) throw new Error('-o requires a file name');
        output = next;
        i++;
        break;
      }
      case '-t':
        disassemble = true;
        break;
      case '-v':
        options.verbose = true;
        break;
      case '-d':
        options.debug = true;
        break;
      default:
        if (arg.startsWith('-')) throw new Error(`Unknown option: ${arg}`);
        if (input !== undefined) throw new Error(`Unexpected argument: ${arg}`);
        input = arg;
    }
  }

  if (input === undefined) throw new Error(USAGE);
  return { input, output, disassemble, options };
}

/** Stage errors keep their label, e.g. `Error: Parse error: a.one:4:3: …`. */
export function formatCliError(error: unknown): string {
  if (error instanceof CompileError) return `Error: ${error.format()}`;
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    console.error(USAGE);
    process.exit(1);
  }

  try {
    const cli = parseArgs(args);
    if (!fs.existsSync(cli.input)) {
      throw new Error(`File '${cli.input}' not found`);
    }

    const bytecode = new OneCompiler(cli.options).compileFile(cli.input);

    if (cli.disassemble) {
      console.log(disassembleModule(bytecode));
    }
    if (cli.output !== undefined) {
      fs.writeFileSync(cli.output, serializeModule(bytecode) + '\n');
      console.log(`Wrote ${cli.output}`);
    }
    if (!cli.disassemble && cli.output === undefined) {
      console.log(`Compiled ${bytecode.functions.size} functions from ${cli.input}`);
    }
  } catch (error) {
    console.error(formatCliError(error));
    process.exit(1);
  }
}

if (require.main === module) {
  main();
}
