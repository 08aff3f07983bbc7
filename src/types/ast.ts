import { LiteralValue, SourceLocation } from './token';

export enum ASTNodeType {
  PROGRAM = 'Program',
  FUNCTION = 'Function',
  PARAMETER = 'Parameter',
  TYPE_ANNOTATION = 'TypeAnnotation',
  REQUIREMENT = 'Requirement',

  BLOCK = 'Block',
  RETURN = 'Return',
  IF = 'If',
  WHILE = 'While',
  ENSURE = 'Ensure',
  ASSIGNMENT = 'Assignment',
  EXPRESSION_STATEMENT = 'ExpressionStatement',
  BREAK = 'Break',
  CONTINUE = 'Continue',

  BINARY_OP = 'BinaryOp',
  UNARY_OP = 'UnaryOp',
  CALL = 'Call',
  MEMBER = 'Member',
  INDEX = 'Index',
  LITERAL = 'Literal',
  IDENTIFIER = 'Identifier',
  LIST_LITERAL = 'ListLiteral',
}

export type BinaryOperator =
  | '+' | '-' | '*' | '/' | '%' | '**'
  | '==' | '!=' | '<' | '>' | '<=' | '>='
  | 'and' | 'or';

export type UnaryOperator = '-' | 'not' | '~';

export type AssignmentOperator = '=' | '+=' | '-=' | '*=' | '/=';

export interface BaseASTNode<T extends ASTNodeType = ASTNodeType> {
  type: T;
  location: SourceLocation;
  // Reserved for tooling; the compiler stages never read or write it.
  metadata: Record<string, unknown>;
}

export interface Program extends BaseASTNode<ASTNodeType.PROGRAM> {
  declarations: Declaration[];
}

export interface TypeAnnotation extends BaseASTNode<ASTNodeType.TYPE_ANNOTATION> {
  name: string;
  typeArgs: TypeAnnotation[];
}

export interface Parameter extends BaseASTNode<ASTNodeType.PARAMETER> {
  name: string;
  typeAnnotation: TypeAnnotation | null;
}

export interface Requirement extends BaseASTNode<ASTNodeType.REQUIREMENT> {
  description: string;
}

export interface FunctionDeclaration extends BaseASTNode<ASTNodeType.FUNCTION> {
  name: string;
  inputs: Parameter[];
  outputs: Parameter[];
  requirements: Requirement[];
  body: Block;
}

export interface Block extends BaseASTNode<ASTNodeType.BLOCK> {
  statements: Statement[];
}

export interface Return extends BaseASTNode<ASTNodeType.RETURN> {
  value: Expression | null;
}

export interface If extends BaseASTNode<ASTNodeType.IF> {
  condition: Expression;
  thenBlock: Block;
  elseBlock: Block | null;
}

export interface While extends BaseASTNode<ASTNodeType.WHILE> {
  condition: Expression;
  body: Block;
}

/** `ensure cond: … otherwise: …`, the alternate spelling of if/else. */
export interface Ensure extends BaseASTNode<ASTNodeType.ENSURE> {
  condition: Expression;
  thenBlock: Block;
  elseBlock: Block | null;
}

export interface Assignment extends BaseASTNode<ASTNodeType.ASSIGNMENT> {
  target: Expression;
  operator: AssignmentOperator;
  value: Expression;
}

export interface ExpressionStatement extends BaseASTNode<ASTNodeType.EXPRESSION_STATEMENT> {
  expression: Expression;
}

export interface Break extends BaseASTNode<ASTNodeType.BREAK> {
}

export interface Continue extends BaseASTNode<ASTNodeType.CONTINUE> {
}

export interface BinaryOp extends BaseASTNode<ASTNodeType.BINARY_OP> {
  left: Expression;
  operator: BinaryOperator;
  right: Expression;
}

export interface UnaryOp extends BaseASTNode<ASTNodeType.UNARY_OP> {
  operator: UnaryOperator;
  operand: Expression;
}

export interface Call extends BaseASTNode<ASTNodeType.CALL> {
  callee: Expression;
  args: Expression[];
}

export interface Member extends BaseASTNode<ASTNodeType.MEMBER> {
  object: Expression;
  member: string;
}

export interface Index extends BaseASTNode<ASTNodeType.INDEX> {
  object: Expression;
  index: Expression;
}

export interface Literal extends BaseASTNode<ASTNodeType.LITERAL> {
  value: LiteralValue;
}

export interface Identifier extends BaseASTNode<ASTNodeType.IDENTIFIER> {
  name: string;
}

export interface ListLiteral extends BaseASTNode<ASTNodeType.LIST_LITERAL> {
  elements: Expression[];
}

export type Declaration = FunctionDeclaration;

export type Statement =
  | Return
  | If
  | While
  | Ensure
  | Assignment
  | ExpressionStatement
  | Break
  | Continue;

export type Expression =
  | BinaryOp
  | UnaryOp
  | Call
  | Member
  | Index
  | Literal
  | Identifier
  | ListLiteral;

export type ASTNode =
  | Program
  | FunctionDeclaration
  | Parameter
  | TypeAnnotation
  | Requirement
  | Block
  | Statement
  | Expression;
