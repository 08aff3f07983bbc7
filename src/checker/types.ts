export type PrimitiveName = 'Integer' | 'Float' | 'String' | 'Boolean';

export type Type =
  | { kind: 'primitive'; name: PrimitiveName }
  | { kind: 'function'; params: Type[]; returnType: Type }
  | { kind: 'list'; element: Type }
  | { kind: 'void' };

export const INTEGER_TYPE: Type = { kind: 'primitive', name: 'Integer' };
export const FLOAT_TYPE: Type = { kind: 'primitive', name: 'Float' };
export const STRING_TYPE: Type = { kind: 'primitive', name: 'String' };
export const BOOLEAN_TYPE: Type = { kind: 'primitive', name: 'Boolean' };
export const VOID_TYPE: Type = { kind: 'void' };

export const listType = (element: Type): Type => ({ kind: 'list', element });

export const functionType = (params: Type[], returnType: Type): Type => ({ kind: 'function', params, returnType });

export const isNumeric = (type: Type): boolean =>
  type.kind === 'primitive' && (type.name === 'Integer' || type.name === 'Float');

export function typeEquals(a: Type, b: Type): boolean {
  switch (a.kind) {
    case 'primitive':
      return b.kind === 'primitive' && a.name === b.name;
    case 'list':
      return b.kind === 'list' && typeEquals(a.element, b.element);
    case 'function':
      return (
        b.kind === 'function' &&
        a.params.length === b.params.length &&
        a.params.every((param, i) => typeEquals(param, b.params[i])) &&
        typeEquals(a.returnType, b.returnType)
      );
    case 'void':
      return b.kind === 'void';
  }
}

export function typeToString(type: Type): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'list':
      return `List<${typeToString(type.element)}>`;
    case 'function':
      return `(${type.params.map(typeToString).join(', ')}) -> ${typeToString(type.returnType)}`;
    case 'void':
      return 'Void';
  }
}
