import { LiteralValue, SourceLocation, Token, TokenType } from '../types';
import { LexError } from '../common/errors';
import { ESCAPES, KEYWORDS, KEYWORD_LITERALS, SINGLE_CHAR_TOKENS, TWO_CHAR_OPERATORS } from './keywords';

/**
 * 词法分析器 - 将源代码转换为 token 流
 */
export class Lexer {
  private code: string;
  private sourceName: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private tokens: Token[] = [];

  constructor(code: string, sourceName: string = '<input>') {
    this.code = code;
    this.sourceName = sourceName;
  }

  tokenize(): Token[] {
    const location = (): SourceLocation => ({
      source: this.sourceName,
      line: this.line,
      column: this.column,
    });

    const advance = (n: number = 1): string => {
      let consumed = '';
      for (let i = 0; i < n && this.pos < this.code.length; i++) {
        const char = this.code[this.pos];
        if (char === '\n') {
          this.line++;
          this.column = 1;
        } else {
          this.column++;
        }
        this.pos++;
        consumed += char;
      }
      return consumed;
    };

    const peek = (n: number = 0) => this.code[this.pos + n] || '';

    const isDigit = (char: string) => char >= '0' && char <= '9';
    const isIdentStart = (char: string) => /^[A-Za-z_]$/.test(char);
    const isIdentPart = (char: string) => /^[A-Za-z0-9_]$/.test(char);

    const pushToken = (type: TokenType, lexeme: string, start: SourceLocation, literal?: LiteralValue) => {
      const token: Token = { type, lexeme, location: start };
      if (literal !== undefined) token.literal = literal;
      this.tokens.push(token);
    };

    while (this.pos < this.code.length) {
      const char = peek();

      if (char === ' ' || char === '\t' || char === '\r') {
        advance();
        continue;
      }

      const start = location();

      // Comments
      if (char === '/' && peek(1) === '/') {
        while (this.pos < this.code.length && peek() !== '\n') {
          advance();
        }
        continue;
      }

      if (char === '/' && peek(1) === '*') {
        advance(2);
        let closed = false;
        while (this.pos < this.code.length) {
          if (peek() === '*' && peek(1) === '/') {
            advance(2);
            closed = true;
            break;
          }
          advance();
        }
        if (!closed) {
          throw new LexError('Unterminated block comment', location());
        }
        continue;
      }

      if (char === '\n') {
        advance();
        pushToken(TokenType.NEWLINE, '\n', start);
        continue;
      }

      // Strings
      if (char === '"') {
        const startPos = this.pos;
        advance();
        let value = '';
        let closed = false;
        while (this.pos < this.code.length) {
          const next = peek();
          if (next === '"') {
            advance();
            closed = true;
            break;
          }
          if (next === '\\') {
            advance();
            if (this.pos >= this.code.length) break;
            const escaped = ESCAPES.get(peek());
            if (escaped === undefined) {
              throw new LexError(`Unknown escape sequence: \\${peek()}`, location());
            }
            value += escaped;
            advance();
            continue;
          }
          value += advance();
        }
        if (!closed) {
          throw new LexError('Unterminated string literal', start);
        }
        pushToken(TokenType.STRING, this.code.slice(startPos, this.pos), start, value);
        continue;
      }

      // Numbers
      if (isDigit(char)) {
        let num = '';
        while (isDigit(peek())) {
          num += advance();
        }
        if (peek() === '.' && isDigit(peek(1))) {
          num += advance();
          while (isDigit(peek())) {
            num += advance();
          }
          pushToken(TokenType.FLOAT, num, start, parseFloat(num));
        } else {
          pushToken(TokenType.INTEGER, num, start, BigInt(num));
        }
        continue;
      }

      // Identifiers and keywords
      if (isIdentStart(char)) {
        let ident = '';
        while (isIdentPart(peek())) {
          ident += advance();
        }
        const type = KEYWORDS.get(ident) ?? TokenType.IDENTIFIER;
        pushToken(type, ident, start, KEYWORD_LITERALS.has(type) ? KEYWORD_LITERALS.get(type) : undefined);
        continue;
      }

      // Operators and delimiters
      const pair = char + peek(1);
      const twoChar = TWO_CHAR_OPERATORS.get(pair);
      if (twoChar !== undefined) {
        advance(2);
        pushToken(twoChar, pair, start);
        continue;
      }

      const single = SINGLE_CHAR_TOKENS.get(char);
      if (single !== undefined) {
        advance();
        pushToken(single, char, start);
        continue;
      }

      throw new LexError(`Unexpected character: '${char}'`, start);
    }

    pushToken(TokenType.EOF, '', location());

    return this.tokens;
  }
}

export const tokenize = (source: string, sourceName: string = '<input>'): Token[] =>
  new Lexer(source, sourceName).tokenize();
