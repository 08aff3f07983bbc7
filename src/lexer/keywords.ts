import { LiteralValue, TokenType } from '../types';

export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['function', TokenType.FUNCTION],
  ['type', TokenType.TYPE],
  ['module', TokenType.MODULE],
  ['import', TokenType.IMPORT],
  ['export', TokenType.EXPORT],
  ['inputs', TokenType.INPUTS],
  ['outputs', TokenType.OUTPUTS],
  ['requirements', TokenType.REQUIREMENTS],
  ['implementation', TokenType.IMPLEMENTATION],
  ['where', TokenType.WHERE],
  ['invariant', TokenType.INVARIANT],
  ['ensure', TokenType.ENSURE],
  ['otherwise', TokenType.OTHERWISE],
  ['match', TokenType.MATCH],
  ['if', TokenType.IF],
  ['else', TokenType.ELSE],
  ['loop', TokenType.LOOP],
  ['while', TokenType.WHILE],
  ['for', TokenType.FOR],
  ['in', TokenType.IN],
  ['return', TokenType.RETURN],
  ['break', TokenType.BREAK],
  ['continue', TokenType.CONTINUE],
  ['const', TokenType.CONST],
  ['let', TokenType.LET],
  ['var', TokenType.VAR],
  ['true', TokenType.TRUE],
  ['false', TokenType.FALSE],
  ['null', TokenType.NULL],
  ['and', TokenType.AND],
  ['or', TokenType.OR],
  ['not', TokenType.NOT],
  ['syntax', TokenType.SYNTAX],
  ['with_syntax', TokenType.WITH_SYNTAX],
  ['use_syntax', TokenType.USE_SYNTAX],
]);

// Keywords that decode to a literal value at lex time
export const KEYWORD_LITERALS: ReadonlyMap<TokenType, LiteralValue> = new Map<TokenType, LiteralValue>([
  [TokenType.TRUE, true],
  [TokenType.FALSE, false],
  [TokenType.NULL, null],
]);

// Longest match first: every entry here is tried before its one-character prefix
export const TWO_CHAR_OPERATORS: ReadonlyMap<string, TokenType> = new Map([
  ['==', TokenType.EQ],
  ['!=', TokenType.NE],
  ['<=', TokenType.LE],
  ['>=', TokenType.GE],
  ['<<', TokenType.LSHIFT],
  ['>>', TokenType.RSHIFT],
  ['+=', TokenType.PLUS_ASSIGN],
  ['-=', TokenType.MINUS_ASSIGN],
  ['*=', TokenType.STAR_ASSIGN],
  ['/=', TokenType.SLASH_ASSIGN],
  ['->', TokenType.ARROW],
  ['=>', TokenType.FAT_ARROW],
  ['**', TokenType.POWER],
]);

export const SINGLE_CHAR_TOKENS: ReadonlyMap<string, TokenType> = new Map([
  ['+', TokenType.PLUS],
  ['-', TokenType.MINUS],
  ['*', TokenType.STAR],
  ['/', TokenType.SLASH],
  ['%', TokenType.PERCENT],
  ['<', TokenType.LT],
  ['>', TokenType.GT],
  ['=', TokenType.ASSIGN],
  ['&', TokenType.AMPERSAND],
  ['|', TokenType.PIPE],
  ['^', TokenType.CARET],
  ['~', TokenType.TILDE],
  ['(', TokenType.LPAREN],
  [')', TokenType.RPAREN],
  ['{', TokenType.LBRACE],
  ['}', TokenType.RBRACE],
  ['[', TokenType.LBRACKET],
  [']', TokenType.RBRACKET],
  [',', TokenType.COMMA],
  [':', TokenType.COLON],
  [';', TokenType.SEMICOLON],
  ['.', TokenType.DOT],
  ['?', TokenType.QUESTION],
]);

export const ESCAPES: ReadonlyMap<string, string> = new Map([
  ['n', '\n'],
  ['t', '\t'],
  ['r', '\r'],
  ['\\', '\\'],
  ['"', '"'],
]);
