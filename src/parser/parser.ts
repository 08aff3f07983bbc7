import { Program, Token, TokenType } from '../types';
import { ParseError } from '../common/errors';
import * as declarations from './declarations';
import * as statements from './statements';
import * as expressions from './expressions';

/**
 * 语法分析器 - 将 token 流转换为 AST
 *
 * Single pass, no backtracking and no error recovery: the first
 * ungrammatical token raises a ParseError.
 */
export class Parser {
  private tokens: Token[];
  pos: number = 0;

  constructor(tokens: Token[]) {
    const last = tokens[tokens.length - 1];
    if (!last || last.type !== TokenType.EOF) {
      throw new ParseError(
        'Token stream must end with an end-of-input token',
        last ? last.location : { source: '<input>', line: 1, column: 1 }
      );
    }
    // Private copy: splitting '>>' inside type arguments must not touch the caller's tokens
    this.tokens = [...tokens];
  }

  parse(): Program {
    return this.parseProgram();
  }

  // Declarations
  parseProgram = declarations.parseProgram;
  parseFunction = declarations.parseFunction;
  parseParameterList = declarations.parseParameterList;
  parseParameter = declarations.parseParameter;
  parseTypeAnnotation = declarations.parseTypeAnnotation;
  parseRequirementList = declarations.parseRequirementList;

  // Statements
  parseBlock = statements.parseBlock;
  parseStatement = statements.parseStatement;
  parseReturn = statements.parseReturn;
  parseIf = statements.parseIf;
  parseWhile = statements.parseWhile;
  parseEnsure = statements.parseEnsure;
  parseAssignmentOrExpression = statements.parseAssignmentOrExpression;

  // Expressions
  parseExpression = expressions.parseExpression;
  parseOr = expressions.parseOr;
  parseAnd = expressions.parseAnd;
  parseEquality = expressions.parseEquality;
  parseComparison = expressions.parseComparison;
  parseAddition = expressions.parseAddition;
  parseMultiplication = expressions.parseMultiplication;
  parseUnary = expressions.parseUnary;
  parsePostfix = expressions.parsePostfix;
  parsePrimary = expressions.parsePrimary;

  peek(offset: number = 0): Token {
    const index = this.pos + offset;
    return index < this.tokens.length ? this.tokens[index] : this.tokens[this.tokens.length - 1];
  }

  previous(): Token {
    return this.tokens[Math.max(this.pos - 1, 0)];
  }

  isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  advance(): Token {
    if (!this.isAtEnd()) this.pos++;
    return this.previous();
  }

  check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type) && !this.isAtEnd()) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  expect(type: TokenType, message: string): Token {
    if (this.check(type) && !this.isAtEnd()) return this.advance();
    throw this.error(message);
  }

  skipNewlines(): void {
    while (this.match(TokenType.NEWLINE)) {
      // skip
    }
  }

  /** Replaces a '>>' at the cursor with two '>' tokens. */
  splitShift(): void {
    const token = this.peek();
    if (token.type !== TokenType.RSHIFT) return;
    const first: Token = { type: TokenType.GT, lexeme: '>', location: token.location };
    const second: Token = {
      type: TokenType.GT,
      lexeme: '>',
      location: { ...token.location, column: token.location.column + 1 },
    };
    this.tokens.splice(this.pos, 1, first, second);
  }

  error(message: string): ParseError {
    return new ParseError(message, this.peek().location);
  }

  unexpected(): ParseError {
    const token = this.peek();
    return this.error(`Unexpected token: ${token.type === TokenType.EOF ? 'end of input' : token.type === TokenType.NEWLINE ? 'newline' : token.lexeme}`);
  }
}

export const parse = (tokens: Token[]): Program => new Parser(tokens).parse();
