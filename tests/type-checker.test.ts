import { TypeChecker, checkProgram, typeToString, typeEquals, INTEGER_TYPE } from '../src/checker';
import { parse } from '../src/parser';
import { tokenize } from '../src/lexer';
import { ASTNodeType, Expression, Program } from '../src/types';

const parseSource = (source: string): Program => parse(tokenize(source));

const withBody = (...lines: string[]): string =>
  ['function f:', '  implementation:', ...lines.map(line => `    ${line}`)].join('\n');

const expressionOf = (source: string): Expression => {
  const [fn] = parseSource(withBody(`v = ${source}`)).declarations;
  const stmt = fn.body.statements[0];
  if (stmt.type !== ASTNodeType.ASSIGNMENT) throw new Error('expected an assignment');
  return stmt.value;
};

const ADD_PROGRAM = [
  'function main:',
  '  implementation:',
  '    total = add(1, 2)',
  '    println(int_to_str(total))',
  '    return 0',
  '',
  'function add:',
  '  inputs:',
  '    a: Integer',
  '    b: Integer',
  '  outputs:',
  '    result: Integer',
  '  implementation:',
  '    return a + b',
].join('\n');

describe('TypeChecker', () => {
  it('accepts a program that calls a function declared later', () => {
    const result = checkProgram(parseSource(ADD_PROGRAM));
    expect(result.success).toBe(true);
    expect(result.diagnostics).toEqual([]);
  });

  it('reports references to unbound names with their location', () => {
    const result = checkProgram(parseSource(withBody('return y')));
    expect(result.success).toBe(false);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0].format()).toBe('Type error: <input>:3:12: Undefined variable: y');
  });

  it('collects every diagnostic instead of stopping at the first', () => {
    const result = checkProgram(parseSource(withBody('x = a + b', 'return c')));
    expect(result.diagnostics.map(d => d.detail)).toEqual([
      'Undefined variable: a',
      'Undefined variable: b',
      'Undefined variable: c',
    ]);
  });

  it('discards names bound inside a branch', () => {
    const result = checkProgram(parseSource(withBody('if true: { t = 1 }', 'return t')));
    expect(result.diagnostics.map(d => d.detail)).toEqual(['Undefined variable: t']);
  });

  it('lets a branch see names from the enclosing scopes', () => {
    const source = [
      'function f:',
      '  inputs:',
      '    n: Integer',
      '  implementation:',
      '    total = 0',
      '    while total < n: { total += 1 }',
      '    return total',
    ].join('\n');
    expect(checkProgram(parseSource(source)).success).toBe(true);
  });

  it('does not leak parameters between functions', () => {
    const source = [
      'function f:',
      '  inputs:',
      '    secret: Integer',
      '  implementation:',
      '    return secret',
      '',
      'function g:',
      '  implementation:',
      '    return secret',
    ].join('\n');
    const result = checkProgram(parseSource(source));
    expect(result.diagnostics.map(d => d.location.line)).toEqual([9]);
  });

  it('gives the same answer when run twice on one program', () => {
    const checker = new TypeChecker();
    const program = parseSource(withBody('return y'));

    expect(checker.check(program)).toBe(false);
    const first = checker.diagnostics.map(d => d.message);
    expect(checker.check(program)).toBe(false);
    expect(checker.diagnostics.map(d => d.message)).toEqual(first);
  });

  it('does not modify the AST', () => {
    const program = parseSource(ADD_PROGRAM);
    const before = JSON.stringify(program, (_key, value) => (typeof value === 'bigint' ? `${value}n` : value));
    checkProgram(program);
    const after = JSON.stringify(program, (_key, value) => (typeof value === 'bigint' ? `${value}n` : value));
    expect(after).toBe(before);
  });

  describe('expression types', () => {
    const typeOf = (source: string): string => typeToString(new TypeChecker().checkExpression(expressionOf(source)));

    it.each([
      ['1', 'Integer'],
      ['2.5', 'Float'],
      ['"s"', 'String'],
      ['true', 'Boolean'],
      ['null', 'Void'],
      ['1 + 2', 'Integer'],
      ['1 * 2.5', 'Float'],
      ['"a" + 1', 'Integer'],
      ['1 < 2', 'Boolean'],
      ['1 and 2', 'Boolean'],
      ['-2.5', 'Float'],
      ['not 1', 'Boolean'],
      ['~1', 'Integer'],
      ['[]', 'List<Integer>'],
      ['[[1.5], [2]]', 'List<List<Float>>'],
      ['["a"][0]', 'String'],
      ['[1].size', 'Integer'],
    ])('%s is %s', (source, expected) => {
      expect(typeOf(source)).toBe(expected);
    });

    it('uses declared and built-in return types for calls', () => {
      const checker = new TypeChecker();
      checker.check(parseSource(ADD_PROGRAM));
      expect(typeToString(checker.checkExpression(expressionOf('add(1, 2)')))).toBe('Integer');
      expect(typeToString(checker.checkExpression(expressionOf('substr("abc", 0, 1)')))).toBe('String');
      expect(typeToString(checker.checkExpression(expressionOf('println("x")')))).toBe('Void');
    });
  });

  describe('type annotations', () => {
    const checker = new TypeChecker();
    const annotationOf = (type: string) => {
      const [fn] = parseSource(`function f:\n  inputs:\n    p: ${type}\n  implementation:\n    return p`).declarations;
      return fn.inputs[0].typeAnnotation;
    };

    it('resolves primitives and lists', () => {
      expect(typeToString(checker.resolveTypeAnnotation(annotationOf('Boolean')))).toBe('Boolean');
      expect(typeToString(checker.resolveTypeAnnotation(annotationOf('List<String>')))).toBe('List<String>');
      expect(typeToString(checker.resolveTypeAnnotation(annotationOf('List')))).toBe('List<Integer>');
    });

    it('falls back to Integer for unknown names', () => {
      expect(typeEquals(checker.resolveTypeAnnotation(annotationOf('Widget')), INTEGER_TYPE)).toBe(true);
      expect(typeToString(checker.resolveTypeAnnotation(annotationOf('Map<Widget>')))).toBe('Integer');
    });

    it('treats a missing annotation as Void', () => {
      expect(typeToString(checker.resolveTypeAnnotation(null))).toBe('Void');
    });
  });
});
