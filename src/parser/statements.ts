import type { Parser } from './parser';
import {
  AssignmentOperator,
  ASTNodeType,
  Block,
  Ensure,
  Expression,
  If,
  Return,
  Statement,
  TokenType,
  While,
} from '../types';

const ASSIGNMENT_OPERATORS = new Map<TokenType, AssignmentOperator>([
  [TokenType.ASSIGN, '='],
  [TokenType.PLUS_ASSIGN, '+='],
  [TokenType.MINUS_ASSIGN, '-='],
  [TokenType.STAR_ASSIGN, '*='],
  [TokenType.SLASH_ASSIGN, '/='],
]);

/**
 * A block is either `{ … }` or an indentation-implied run of statements.
 * The implied form ends before the next `function`, `else`, `otherwise` or
 * `}` (those belong to the enclosing construct) or at end of input.
 */
export function parseBlock(this: Parser): Block {
  const block: Block = {
    type: ASTNodeType.BLOCK,
    location: this.peek().location,
    metadata: {},
    statements: [],
  };

  if (this.match(TokenType.LBRACE)) {
    while (!this.isAtEnd()) {
      this.skipNewlines();
      if (this.check(TokenType.RBRACE) || this.isAtEnd()) break;
      block.statements.push(this.parseStatement());
    }
    this.expect(TokenType.RBRACE, "Expected '}' after block");
    return block;
  }

  while (!this.isAtEnd()) {
    this.skipNewlines();
    if (this.isAtEnd()) break;
    if (
      this.check(TokenType.FUNCTION) ||
      this.check(TokenType.ELSE) ||
      this.check(TokenType.OTHERWISE) ||
      this.check(TokenType.RBRACE)
    ) break;
    block.statements.push(this.parseStatement());
  }

  return block;
}

export function parseStatement(this: Parser): Statement {
  this.skipNewlines();

  if (this.match(TokenType.RETURN)) return this.parseReturn();
  if (this.match(TokenType.IF)) return this.parseIf();
  if (this.match(TokenType.WHILE)) return this.parseWhile();
  if (this.match(TokenType.ENSURE)) return this.parseEnsure();
  if (this.match(TokenType.BREAK)) {
    return { type: ASTNodeType.BREAK, location: this.previous().location, metadata: {} };
  }
  if (this.match(TokenType.CONTINUE)) {
    return { type: ASTNodeType.CONTINUE, location: this.previous().location, metadata: {} };
  }

  return this.parseAssignmentOrExpression();
}

export function parseReturn(this: Parser): Return {
  const location = this.previous().location;
  let value: Expression | null = null;
  if (!this.check(TokenType.NEWLINE) && !this.check(TokenType.RBRACE) && !this.isAtEnd()) {
    value = this.parseExpression();
  }
  return { type: ASTNodeType.RETURN, location, metadata: {}, value };
}

export function parseIf(this: Parser): If {
  const location = this.previous().location;
  const condition = this.parseExpression();
  this.expect(TokenType.COLON, "Expected ':' after if condition");
  this.skipNewlines();
  const thenBlock = this.parseBlock();

  let elseBlock: Block | null = null;
  this.skipNewlines();
  if (this.match(TokenType.ELSE)) {
    this.expect(TokenType.COLON, "Expected ':' after else");
    this.skipNewlines();
    elseBlock = this.parseBlock();
  }

  return { type: ASTNodeType.IF, location, metadata: {}, condition, thenBlock, elseBlock };
}

export function parseWhile(this: Parser): While {
  const location = this.previous().location;
  const condition = this.parseExpression();
  this.expect(TokenType.COLON, "Expected ':' after while condition");
  this.skipNewlines();
  const body = this.parseBlock();
  return { type: ASTNodeType.WHILE, location, metadata: {}, condition, body };
}

export function parseEnsure(this: Parser): Ensure {
  const location = this.previous().location;
  const condition = this.parseExpression();
  this.expect(TokenType.COLON, "Expected ':' after ensure condition");
  this.skipNewlines();
  const thenBlock = this.parseBlock();

  let elseBlock: Block | null = null;
  this.skipNewlines();
  if (this.match(TokenType.OTHERWISE)) {
    this.expect(TokenType.COLON, "Expected ':' after otherwise");
    this.skipNewlines();
    elseBlock = this.parseBlock();
  }

  return { type: ASTNodeType.ENSURE, location, metadata: {}, condition, thenBlock, elseBlock };
}

/**
 * Parses an expression and reinterprets it as an assignment target when an
 * assignment operator follows.
 */
export function parseAssignmentOrExpression(this: Parser): Statement {
  const expression = this.parseExpression();

  const operator = ASSIGNMENT_OPERATORS.get(this.peek().type);
  if (operator !== undefined) {
    this.advance();
    const value = this.parseExpression();
    return {
      type: ASTNodeType.ASSIGNMENT,
      location: expression.location,
      metadata: {},
      target: expression,
      operator,
      value,
    };
  }

  return {
    type: ASTNodeType.EXPRESSION_STATEMENT,
    location: expression.location,
    metadata: {},
    expression,
  };
}
