import type { Parser } from './parser';
import {
  ASTNodeType,
  BinaryOperator,
  Expression,
  ListLiteral,
  TokenType,
  UnaryOperator,
} from '../types';

const OR_OPERATORS = new Map<TokenType, BinaryOperator>([[TokenType.OR, 'or']]);
const AND_OPERATORS = new Map<TokenType, BinaryOperator>([[TokenType.AND, 'and']]);
const EQUALITY_OPERATORS = new Map<TokenType, BinaryOperator>([
  [TokenType.EQ, '=='],
  [TokenType.NE, '!='],
]);
const COMPARISON_OPERATORS = new Map<TokenType, BinaryOperator>([
  [TokenType.LT, '<'],
  [TokenType.GT, '>'],
  [TokenType.LE, '<='],
  [TokenType.GE, '>='],
]);
const ADDITIVE_OPERATORS = new Map<TokenType, BinaryOperator>([
  [TokenType.PLUS, '+'],
  [TokenType.MINUS, '-'],
]);
const MULTIPLICATIVE_OPERATORS = new Map<TokenType, BinaryOperator>([
  [TokenType.STAR, '*'],
  [TokenType.SLASH, '/'],
  [TokenType.PERCENT, '%'],
]);
const UNARY_OPERATORS = new Map<TokenType, UnaryOperator>([
  [TokenType.MINUS, '-'],
  [TokenType.NOT, 'not'],
  [TokenType.TILDE, '~'],
]);

// One left-associative precedence level
function parseBinaryLevel(
  parser: Parser,
  operators: Map<TokenType, BinaryOperator>,
  operand: () => Expression
): Expression {
  let left = operand();
  let operator = operators.get(parser.peek().type);
  while (operator !== undefined) {
    parser.advance();
    const right = operand();
    left = { type: ASTNodeType.BINARY_OP, location: left.location, metadata: {}, left, operator, right };
    operator = operators.get(parser.peek().type);
  }
  return left;
}

export function parseExpression(this: Parser): Expression {
  return this.parseOr();
}

export function parseOr(this: Parser): Expression {
  return parseBinaryLevel(this, OR_OPERATORS, () => this.parseAnd());
}

export function parseAnd(this: Parser): Expression {
  return parseBinaryLevel(this, AND_OPERATORS, () => this.parseEquality());
}

export function parseEquality(this: Parser): Expression {
  return parseBinaryLevel(this, EQUALITY_OPERATORS, () => this.parseComparison());
}

export function parseComparison(this: Parser): Expression {
  return parseBinaryLevel(this, COMPARISON_OPERATORS, () => this.parseAddition());
}

export function parseAddition(this: Parser): Expression {
  return parseBinaryLevel(this, ADDITIVE_OPERATORS, () => this.parseMultiplication());
}

export function parseMultiplication(this: Parser): Expression {
  return parseBinaryLevel(this, MULTIPLICATIVE_OPERATORS, () => this.parseUnary());
}

export function parseUnary(this: Parser): Expression {
  const operator = UNARY_OPERATORS.get(this.peek().type);
  if (operator !== undefined) {
    const location = this.advance().location;
    const operand = this.parseUnary();
    return { type: ASTNodeType.UNARY_OP, location, metadata: {}, operator, operand };
  }
  return this.parsePostfix();
}

export function parsePostfix(this: Parser): Expression {
  let expr = this.parsePrimary();

  // eslint-disable-next-line no-constant-condition
  while (true) {
    if (this.match(TokenType.LPAREN)) {
      const args: Expression[] = [];
      if (!this.check(TokenType.RPAREN)) {
        do {
          args.push(this.parseExpression());
        } while (this.match(TokenType.COMMA));
      }
      this.expect(TokenType.RPAREN, "Expected ')' after arguments");
      expr = { type: ASTNodeType.CALL, location: expr.location, metadata: {}, callee: expr, args };
    } else if (this.match(TokenType.DOT)) {
      const member = this.expect(TokenType.IDENTIFIER, 'Expected member name').lexeme;
      expr = { type: ASTNodeType.MEMBER, location: expr.location, metadata: {}, object: expr, member };
    } else if (this.match(TokenType.LBRACKET)) {
      const index = this.parseExpression();
      this.expect(TokenType.RBRACKET, "Expected ']' after index");
      expr = { type: ASTNodeType.INDEX, location: expr.location, metadata: {}, object: expr, index };
    } else {
      break;
    }
  }

  return expr;
}

export function parsePrimary(this: Parser): Expression {
  if (this.match(
    TokenType.TRUE, TokenType.FALSE, TokenType.NULL,
    TokenType.INTEGER, TokenType.FLOAT, TokenType.STRING
  )) {
    const token = this.previous();
    return { type: ASTNodeType.LITERAL, location: token.location, metadata: {}, value: token.literal ?? null };
  }

  if (this.match(TokenType.IDENTIFIER)) {
    const token = this.previous();
    return { type: ASTNodeType.IDENTIFIER, location: token.location, metadata: {}, name: token.lexeme };
  }

  if (this.match(TokenType.LPAREN)) {
    const expr = this.parseExpression();
    this.expect(TokenType.RPAREN, "Expected ')' after expression");
    return expr;
  }

  if (this.match(TokenType.LBRACKET)) {
    const list: ListLiteral = {
      type: ASTNodeType.LIST_LITERAL,
      location: this.previous().location,
      metadata: {},
      elements: [],
    };
    if (!this.check(TokenType.RBRACKET)) {
      do {
        list.elements.push(this.parseExpression());
      } while (this.match(TokenType.COMMA));
    }
    this.expect(TokenType.RBRACKET, "Expected ']' after list elements");
    return list;
  }

  throw this.unexpected();
}
