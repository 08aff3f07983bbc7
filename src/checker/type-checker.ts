import {
  ASTNodeType,
  BinaryOp,
  Block,
  Call,
  Expression,
  FunctionDeclaration,
  Literal,
  Program,
  Statement,
  TypeAnnotation,
  UnaryOp,
} from '../types';
import { TypeCheckError } from '../common/errors';
import { assertNever } from '../common/assert';
import { TypeEnvironment } from './environment';
import { BUILTIN_SIGNATURES } from './builtins';
import {
  BOOLEAN_TYPE,
  FLOAT_TYPE,
  INTEGER_TYPE,
  STRING_TYPE,
  Type,
  VOID_TYPE,
  functionType,
  isNumeric,
  listType,
} from './types';

export interface CheckResult {
  success: boolean;
  diagnostics: TypeCheckError[];
}

/**
 * Advisory type checker. Unknown or unresolved types fall back to Integer;
 * the only diagnostic it reports is a reference to an unbound name. It
 * never mutates the AST.
 */
export class TypeChecker {
  diagnostics: TypeCheckError[] = [];
  private globalEnv: TypeEnvironment = new TypeEnvironment();
  private env: TypeEnvironment = this.globalEnv;

  check(program: Program): boolean {
    this.diagnostics = [];
    this.globalEnv = new TypeEnvironment();
    this.env = this.globalEnv;
    for (const [name, type] of BUILTIN_SIGNATURES) {
      this.globalEnv.define(name, type);
    }

    // Pass 1: signatures, so calls can refer to functions declared later
    for (const decl of program.declarations) {
      this.globalEnv.define(decl.name, this.signatureOf(decl));
    }

    // Pass 2: bodies
    for (const decl of program.declarations) {
      this.checkFunction(decl);
    }

    return this.diagnostics.length === 0;
  }

  resolveTypeAnnotation(annotation: TypeAnnotation | null): Type {
    if (annotation === null) return VOID_TYPE;

    switch (annotation.name) {
      case 'Integer': return INTEGER_TYPE;
      case 'Float': return FLOAT_TYPE;
      case 'String': return STRING_TYPE;
      case 'Boolean': return BOOLEAN_TYPE;
      case 'List': {
        const [element] = annotation.typeArgs;
        return listType(element ? this.resolveTypeAnnotation(element) : INTEGER_TYPE);
      }
      default:
        return INTEGER_TYPE;
    }
  }

  private signatureOf(decl: FunctionDeclaration): Type {
    const params = decl.inputs.map(param => this.resolveTypeAnnotation(param.typeAnnotation));
    const [output] = decl.outputs;
    const returnType = output ? this.resolveTypeAnnotation(output.typeAnnotation) : VOID_TYPE;
    return functionType(params, returnType);
  }

  private checkFunction(decl: FunctionDeclaration): void {
    this.env = this.globalEnv.child();
    for (const param of decl.inputs) {
      this.env.define(param.name, this.resolveTypeAnnotation(param.typeAnnotation));
    }
    this.checkBlock(decl.body);
    this.env = this.globalEnv;
  }

  private checkBlock(block: Block): Type {
    let lastType: Type = VOID_TYPE;
    for (const stmt of block.statements) {
      lastType = this.checkStatement(stmt);
    }
    return lastType;
  }

  // Branch and loop bodies get a child scope that is discarded afterwards
  private checkScopedBlock(block: Block): void {
    const saved = this.env;
    this.env = saved.child();
    try {
      this.checkBlock(block);
    } finally {
      this.env = saved;
    }
  }

  private checkStatement(stmt: Statement): Type {
    switch (stmt.type) {
      case ASTNodeType.RETURN:
        return stmt.value ? this.checkExpression(stmt.value) : VOID_TYPE;

      case ASTNodeType.IF:
      case ASTNodeType.ENSURE:
        this.checkExpression(stmt.condition);
        this.checkScopedBlock(stmt.thenBlock);
        if (stmt.elseBlock) this.checkScopedBlock(stmt.elseBlock);
        return VOID_TYPE;

      case ASTNodeType.WHILE:
        this.checkExpression(stmt.condition);
        this.checkScopedBlock(stmt.body);
        return VOID_TYPE;

      case ASTNodeType.ASSIGNMENT: {
        const valueType = this.checkExpression(stmt.value);
        // Every assignment (re)defines the name in the current scope
        if (stmt.target.type === ASTNodeType.IDENTIFIER) {
          this.env.define(stmt.target.name, valueType);
        }
        return valueType;
      }

      case ASTNodeType.EXPRESSION_STATEMENT:
        return this.checkExpression(stmt.expression);

      case ASTNodeType.BREAK:
      case ASTNodeType.CONTINUE:
        return VOID_TYPE;

      default:
        return assertNever(stmt, 'TypeChecker');
    }
  }

  checkExpression(expr: Expression): Type {
    switch (expr.type) {
      case ASTNodeType.LITERAL:
        return this.checkLiteral(expr);

      case ASTNodeType.IDENTIFIER: {
        const type = this.env.lookup(expr.name);
        if (type === undefined) {
          this.diagnostics.push(new TypeCheckError(`Undefined variable: ${expr.name}`, expr.location));
          return INTEGER_TYPE;
        }
        return type;
      }

      case ASTNodeType.BINARY_OP:
        return this.checkBinaryOp(expr);

      case ASTNodeType.UNARY_OP:
        return this.checkUnaryOp(expr);

      case ASTNodeType.CALL:
        return this.checkCall(expr);

      case ASTNodeType.MEMBER:
        this.checkExpression(expr.object);
        return INTEGER_TYPE;

      case ASTNodeType.INDEX: {
        const objectType = this.checkExpression(expr.object);
        this.checkExpression(expr.index);
        return objectType.kind === 'list' ? objectType.element : INTEGER_TYPE;
      }

      case ASTNodeType.LIST_LITERAL: {
        if (expr.elements.length === 0) return listType(INTEGER_TYPE);
        // Element types are not unified: the first one decides
        const [first, ...rest] = expr.elements;
        const elementType = this.checkExpression(first);
        for (const element of rest) {
          this.checkExpression(element);
        }
        return listType(elementType);
      }

      default:
        return assertNever(expr, 'TypeChecker');
    }
  }

  private checkLiteral(literal: Literal): Type {
    const value = literal.value;
    if (typeof value === 'bigint') return INTEGER_TYPE;
    if (typeof value === 'number') return FLOAT_TYPE;
    if (typeof value === 'string') return STRING_TYPE;
    if (typeof value === 'boolean') return BOOLEAN_TYPE;
    return VOID_TYPE;
  }

  private checkBinaryOp(binop: BinaryOp): Type {
    const left = this.checkExpression(binop.left);
    const right = this.checkExpression(binop.right);

    switch (binop.operator) {
      case '+':
      case '-':
      case '*':
      case '/':
      case '%':
      case '**':
        if (isNumeric(left) && isNumeric(right)) {
          const eitherFloat = [left, right].some(t => t.kind === 'primitive' && t.name === 'Float');
          return eitherFloat ? FLOAT_TYPE : INTEGER_TYPE;
        }
        return INTEGER_TYPE;

      case '==':
      case '!=':
      case '<':
      case '>':
      case '<=':
      case '>=':
      case 'and':
      case 'or':
        return BOOLEAN_TYPE;
    }
  }

  private checkUnaryOp(unop: UnaryOp): Type {
    const operand = this.checkExpression(unop.operand);
    switch (unop.operator) {
      case '-': return operand;
      case 'not': return BOOLEAN_TYPE;
      case '~': return INTEGER_TYPE;
    }
  }

  private checkCall(call: Call): Type {
    const calleeType = this.checkExpression(call.callee);
    for (const arg of call.args) {
      this.checkExpression(arg);
    }
    return calleeType.kind === 'function' ? calleeType.returnType : VOID_TYPE;
  }
}

export const checkProgram = (program: Program): CheckResult => {
  const checker = new TypeChecker();
  const success = checker.check(program);
  return { success, diagnostics: checker.diagnostics };
};
