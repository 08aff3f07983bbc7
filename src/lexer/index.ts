export { Lexer, tokenize } from './lexer';
export { KEYWORDS } from './keywords';
