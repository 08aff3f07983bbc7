/**
 * Token 类型定义
 */
export interface SourceLocation {
  source: string;
  line: number;
  column: number;
}

export type LiteralValue = bigint | number | string | boolean | null;

export interface Token {
  type: TokenType;
  lexeme: string;
  location: SourceLocation;
  literal?: LiteralValue;
}

export enum TokenType {
  // Keywords
  FUNCTION,
  TYPE,
  MODULE,
  IMPORT,
  EXPORT,
  INPUTS,
  OUTPUTS,
  REQUIREMENTS,
  IMPLEMENTATION,
  WHERE,
  INVARIANT,
  ENSURE,
  OTHERWISE,
  MATCH,
  IF,
  ELSE,
  LOOP,
  WHILE,
  FOR,
  IN,
  RETURN,
  BREAK,
  CONTINUE,
  CONST,
  LET,
  VAR,
  TRUE,
  FALSE,
  NULL,
  AND,
  OR,
  NOT,
  SYNTAX,
  WITH_SYNTAX,
  USE_SYNTAX,

  // Identifiers and literals
  IDENTIFIER,
  INTEGER,
  FLOAT,
  STRING,

  // Operators
  PLUS,
  MINUS,
  STAR,
  SLASH,
  PERCENT,
  POWER,
  EQ,
  NE,
  LT,
  GT,
  LE,
  GE,
  ASSIGN,
  PLUS_ASSIGN,
  MINUS_ASSIGN,
  STAR_ASSIGN,
  SLASH_ASSIGN,
  AMPERSAND,
  PIPE,
  CARET,
  TILDE,
  LSHIFT,
  RSHIFT,
  ARROW,
  FAT_ARROW,

  // Delimiters
  LPAREN,
  RPAREN,
  LBRACE,
  RBRACE,
  LBRACKET,
  RBRACKET,
  COMMA,
  COLON,
  SEMICOLON,
  DOT,
  QUESTION,

  // Structure
  NEWLINE,
  EOF,
}

export const formatLocation = (location: SourceLocation): string =>
  `${location.source}:${location.line}:${location.column}`;

export const formatToken = (token: Token): string =>
  `${TokenType[token.type]}(${token.type === TokenType.NEWLINE ? '\\n' : token.lexeme}) at ${formatLocation(token.location)}`;
