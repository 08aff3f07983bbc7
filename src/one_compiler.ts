/**
 * One Compiler - 主入口
 * 源代码 -> tokens -> AST -> 类型检查 -> 字节码模块
 */

import * as fs from 'fs';
import { Lexer } from './lexer';
import { Parser } from './parser';
import { TypeChecker } from './checker';
import { CodeGenerator, disassembleModule, formatAst } from './compiler_module';
import { CompilationError } from './common/errors';
import { BytecodeModule, DEFAULT_ENTRY_POINT, formatToken } from './types';

export interface CompilerOptions {
  // Log each stage
  verbose?: boolean;
  // Also dump the first tokens, the syntax tree and the disassembly
  debug?: boolean;
  entryPoint?: string;
}

const DEBUG_TOKEN_LIMIT = 20;

export class OneCompiler {
  private readonly options: Required<CompilerOptions>;

  constructor(options: CompilerOptions = {}) {
    this.options = {
      verbose: options.verbose ?? false,
      debug: options.debug ?? false,
      entryPoint: options.entryPoint ?? DEFAULT_ENTRY_POINT,
    };
  }

  /**
   * 编译源代码
   * @param sourceName used as the `source` of every location
   * @throws CompilationError when the checker reports diagnostics; stage errors propagate as thrown
   */
  compile(source: string, sourceName: string = '<input>'): BytecodeModule {
    this.log(`Compiling ${sourceName}...`);

    // 1. 词法分析
    this.log('Stage 1: Lexical analysis...');
    const tokens = new Lexer(source, sourceName).tokenize();
    this.log(`  Generated ${tokens.length} tokens`);
    if (this.options.debug) {
      console.log('=== Tokens ===');
      for (const token of tokens.slice(0, DEBUG_TOKEN_LIMIT)) {
        console.log(`    ${formatToken(token)}`);
      }
      if (tokens.length > DEBUG_TOKEN_LIMIT) {
        console.log(`    ... (${tokens.length - DEBUG_TOKEN_LIMIT} more)`);
      }
    }

    // 2. 语法分析
    this.log('Stage 2: Parsing...');
    const ast = new Parser(tokens).parse();
    this.log(`  Parsed ${ast.declarations.length} declarations`);
    if (this.options.debug) {
      console.log('=== AST ===');
      console.log(formatAst(ast, 2));
    }

    // 3. 类型检查
    this.log('Stage 3: Type checking...');
    const checker = new TypeChecker();
    if (!checker.check(ast)) {
      const count = checker.diagnostics.length;
      throw new CompilationError(
        `Type checking failed with ${count} error${count === 1 ? '' : 's'}:\n` +
          checker.diagnostics.map(d => `  ${d.format()}`).join('\n'),
        checker.diagnostics
      );
    }
    this.log('  Type checking passed');

    // 4. 代码生成
    this.log('Stage 4: Code generation...');
    const module = new CodeGenerator().generate(ast, this.options.entryPoint);
    this.log(`  Generated ${module.functions.size} functions`);
    if (this.options.debug) {
      console.log('=== Bytecode ===');
      console.log(disassembleModule(module));
    }

    this.log('Compilation successful!');
    return module;
  }

  compileFile(filePath: string): BytecodeModule {
    const source = fs.readFileSync(filePath, 'utf-8');
    return this.compile(source, filePath);
  }

  private log(message: string): void {
    if (this.options.verbose || this.options.debug) {
      console.log(message);
    }
  }
}
