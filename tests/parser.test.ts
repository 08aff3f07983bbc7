import { Parser, parse } from '../src/parser';
import { tokenize } from '../src/lexer';
import { ParseError } from '../src/common/errors';
import { ASTNodeType, Program, Statement, TokenType } from '../src/types';

const parseSource = (source: string): Program => parse(tokenize(source));

const withBody = (...lines: string[]): string =>
  ['function f:', '  implementation:', ...lines.map(line => `    ${line}`)].join('\n');

const firstStatement = (source: string): Statement => {
  const [fn] = parseSource(source).declarations;
  return fn.body.statements[0];
};

const parseError = (source: string): ParseError => {
  try {
    parseSource(source);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error('expected a parse error');
};

describe('Parser', () => {
  describe('declarations', () => {
    it('parses an empty program', () => {
      const program = parseSource('\n\n');
      expect(program.type).toBe(ASTNodeType.PROGRAM);
      expect(program.declarations).toEqual([]);
    });

    it('parses inputs, outputs, requirements and body', () => {
      const program = parseSource([
        'function add:',
        '  inputs:',
        '    a: Integer',
        '    b: Integer',
        '  outputs:',
        '    result: Integer',
        '  requirements:',
        '    - returns the sum of a and b',
        '  implementation:',
        '    return a + b',
      ].join('\n'));

      expect(program.declarations).toHaveLength(1);
      const [fn] = program.declarations;
      expect(fn.name).toBe('add');
      expect(fn.location).toEqual({ source: '<input>', line: 1, column: 1 });
      expect(fn.inputs.map(p => p.name)).toEqual(['a', 'b']);
      expect(fn.inputs.map(p => p.typeAnnotation?.name)).toEqual(['Integer', 'Integer']);
      expect(fn.outputs.map(p => p.name)).toEqual(['result']);
      expect(fn.requirements.map(r => r.description)).toEqual(['returns the sum of a and b']);
      expect(fn.requirements[0].location).toEqual({ source: '<input>', line: 8, column: 5 });
      expect(fn.body.statements).toHaveLength(1);
      expect(fn.body.statements[0]).toMatchObject({
        type: ASTNodeType.RETURN,
        value: {
          type: ASTNodeType.BINARY_OP,
          operator: '+',
          left: { type: ASTNodeType.IDENTIFIER, name: 'a' },
          right: { type: ASTNodeType.IDENTIFIER, name: 'b' },
        },
      });
    });

    it('ends an implied body at the next function', () => {
      const program = parseSource([
        'function one:',
        '  implementation:',
        '    return 1',
        '',
        'function two:',
        '  implementation:',
        '    return 2',
      ].join('\n'));
      expect(program.declarations.map(d => d.name)).toEqual(['one', 'two']);
      expect(program.declarations.map(d => d.body.statements.length)).toEqual([1, 1]);
    });

    it('accepts parameters without a type', () => {
      const [fn] = parseSource('function f:\n  inputs:\n    x\n  implementation:\n    return x').declarations;
      expect(fn.inputs).toHaveLength(1);
      expect(fn.inputs[0].typeAnnotation).toBeNull();
    });

    it('splits >> closing nested type arguments', () => {
      const [fn] = parseSource([
        'function f:',
        '  inputs:',
        '    grid: List<List<Integer>>',
        '  implementation:',
        '    return grid',
      ].join('\n')).declarations;

      expect(fn.inputs[0].typeAnnotation).toMatchObject({
        name: 'List',
        typeArgs: [{ name: 'List', typeArgs: [{ name: 'Integer', typeArgs: [] }] }],
      });
    });

    it('does not modify the caller token list when splitting >>', () => {
      const tokens = tokenize('function f:\n  inputs:\n    g: List<List<Integer>>\n  implementation:\n    return g');
      const before = tokens.length;
      new Parser(tokens).parse();
      expect(tokens.length).toBe(before);
      expect(tokens.some(t => t.type === TokenType.RSHIFT)).toBe(true);
    });

    it('skips where constraints to the end of the line', () => {
      const [fn] = parseSource([
        'function f:',
        '  inputs:',
        '    n: Integer where n >= 0 and n < 10',
        '    m: Integer',
        '  implementation:',
        '    return n',
      ].join('\n')).declarations;
      expect(fn.inputs.map(p => p.name)).toEqual(['n', 'm']);
    });
  });

  describe('statements', () => {
    it('parses if/else with implied blocks', () => {
      const stmt = firstStatement([
        'function f:',
        '  inputs:',
        '    x: Boolean',
        '  implementation:',
        '    if x:',
        '      y = 1',
        '    else:',
        '      y = 2',
      ].join('\n'));

      expect(stmt).toMatchObject({
        type: ASTNodeType.IF,
        condition: { type: ASTNodeType.IDENTIFIER, name: 'x' },
        thenBlock: { statements: [{ type: ASTNodeType.ASSIGNMENT, value: { value: 1n } }] },
        elseBlock: { statements: [{ type: ASTNodeType.ASSIGNMENT, value: { value: 2n } }] },
      });
    });

    it('parses brace blocks so statements can follow them', () => {
      const [fn] = parseSource(withBody(
        'while i < 3: {',
        '  i += 1',
        '  if i == 2: { break }',
        '}',
        'return i',
      )).declarations;

      expect(fn.body.statements.map(s => s.type)).toEqual([ASTNodeType.WHILE, ASTNodeType.RETURN]);
      expect(fn.body.statements[0]).toMatchObject({
        body: {
          statements: [
            { type: ASTNodeType.ASSIGNMENT, operator: '+=' },
            { type: ASTNodeType.IF, thenBlock: { statements: [{ type: ASTNodeType.BREAK }] }, elseBlock: null },
          ],
        },
      });
    });

    it('ends an implied block at the closing brace of the enclosing block', () => {
      const [fn] = parseSource('function f:\n  implementation: {\n    if c: x = 1\n  }').declarations;
      expect(fn.body.statements).toHaveLength(1);
      expect(fn.body.statements[0]).toMatchObject({
        type: ASTNodeType.IF,
        thenBlock: { statements: [{ type: ASTNodeType.ASSIGNMENT, target: { name: 'x' } }] },
        elseBlock: null,
      });
    });

    it('still rejects a stray closing brace at top level', () => {
      expect(parseError(withBody('x = 1', '}')).detail).toBe('Unexpected token: }');
    });

    it('parses ensure/otherwise', () => {
      const stmt = firstStatement(withBody('ensure ok: { return 1 }', 'otherwise: { return 0 }'));
      expect(stmt).toMatchObject({
        type: ASTNodeType.ENSURE,
        thenBlock: { statements: [{ type: ASTNodeType.RETURN }] },
        elseBlock: { statements: [{ type: ASTNodeType.RETURN }] },
      });
    });

    it('parses a bare return', () => {
      expect(firstStatement(withBody('return', 'x = 1'))).toMatchObject({ type: ASTNodeType.RETURN, value: null });
      expect(firstStatement(withBody('if c: { return }'))).toMatchObject({
        thenBlock: { statements: [{ type: ASTNodeType.RETURN, value: null }] },
      });
    });

    it('turns any expression followed by an assignment operator into an assignment', () => {
      expect(firstStatement(withBody('p.x -= 2'))).toMatchObject({
        type: ASTNodeType.ASSIGNMENT,
        operator: '-=',
        target: { type: ASTNodeType.MEMBER, member: 'x' },
      });
    });

    it('wraps other expressions in an expression statement', () => {
      const stmt = firstStatement(withBody('println("hi")'));
      expect(stmt).toMatchObject({
        type: ASTNodeType.EXPRESSION_STATEMENT,
        expression: { type: ASTNodeType.CALL, args: [{ value: 'hi' }] },
      });
      expect(stmt.location).toEqual({ source: '<input>', line: 3, column: 5 });
    });
  });

  describe('expressions', () => {
    const valueOf = (expr: string) => firstStatement(withBody(`v = ${expr}`));

    it('binds * tighter than +', () => {
      expect(valueOf('1 + 2 * 3')).toMatchObject({
        value: {
          operator: '+',
          left: { value: 1n },
          right: { operator: '*', left: { value: 2n }, right: { value: 3n } },
        },
      });
    });

    it('is left associative', () => {
      expect(valueOf('a - b - c')).toMatchObject({
        value: { operator: '-', left: { operator: '-', left: { name: 'a' } }, right: { name: 'c' } },
      });
    });

    it('orders or < and < equality < comparison', () => {
      expect(valueOf('a or b and c == d < e')).toMatchObject({
        value: {
          operator: 'or',
          right: { operator: 'and', right: { operator: '==', right: { operator: '<' } } },
        },
      });
    });

    it('applies unary operators to the nearest operand', () => {
      expect(valueOf('not a == b')).toMatchObject({
        value: { operator: '==', left: { type: ASTNodeType.UNARY_OP, operator: 'not' } },
      });
      expect(valueOf('- -x')).toMatchObject({
        value: { operator: '-', operand: { operator: '-', operand: { name: 'x' } } },
      });
    });

    it('chains calls, indexing and member access', () => {
      const stmt = valueOf('f(1, 2)[0].x');
      expect(stmt).toMatchObject({
        value: {
          type: ASTNodeType.MEMBER,
          member: 'x',
          object: {
            type: ASTNodeType.INDEX,
            index: { value: 0n },
            object: { type: ASTNodeType.CALL, callee: { name: 'f' }, args: [{ value: 1n }, { value: 2n }] },
          },
        },
      });
    });

    it('parses list literals and parentheses', () => {
      expect(valueOf('[]')).toMatchObject({ value: { type: ASTNodeType.LIST_LITERAL, elements: [] } });
      expect(valueOf('[(1 + 2), true, null]')).toMatchObject({
        value: { elements: [{ operator: '+' }, { value: true }, { value: null }] },
      });
    });

    it('locates a binary expression at its left operand', () => {
      const stmt = valueOf('x + 1');
      expect(stmt).toMatchObject({ value: { location: { line: 3, column: 9 } } });
    });
  });

  describe('errors', () => {
    it('rejects top-level statements', () => {
      const error = parseError('x = 1');
      expect(error.message).toBe('<input>:1:1: Unexpected token: x');
    });

    it('requires an implementation section', () => {
      const error = parseError('function f:\n  return 1');
      expect(error.detail).toBe("Expected 'implementation'");
      expect(error.location).toEqual({ source: '<input>', line: 2, column: 3 });
    });

    it('requires a dash before each requirement', () => {
      const error = parseError('function f:\n  requirements:\n    something\n  implementation:\n    return 1');
      expect(error.detail).toBe("Expected '-' before requirement");
      expect(error.location).toEqual({ source: '<input>', line: 3, column: 5 });
    });

    it('reports an unclosed brace block at end of input', () => {
      const error = parseError('function f:\n  implementation: {\n    return 1\n');
      expect(error.detail).toBe("Expected '}' after block");
      expect(error.location).toEqual({ source: '<input>', line: 4, column: 1 });
    });

    it('reports a missing operand', () => {
      expect(parseError(withBody('x = ')).detail).toBe('Unexpected token: end of input');
      expect(parseError(withBody('x = ', 'y = 1')).detail).toBe('Unexpected token: newline');
    });

    it('rejects a token stream without EOF', () => {
      expect(() => new Parser([])).toThrow(ParseError);
    });
  });
});
