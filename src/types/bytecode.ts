import { SourceLocation } from './token';

/**
 * 字节码类型定义
 *
 * The opcode numbering, operand shapes and stack effects below are the
 * contract with the execution engine. Jump operands are absolute
 * instruction indices.
 */
export enum OpCode {
  // Stack operations
  LOAD_CONST = 1,  // 0 -> 1, operand: constant
  LOAD_VAR,        // 0 -> 1, operand: variable name
  STORE_VAR,       // 1 -> 0, operand: variable name
  POP,             // 1 -> 0

  // Arithmetic (left operand is pushed first)
  ADD,             // 2 -> 1
  SUB,
  MUL,
  DIV,
  MOD,
  POW,
  NEG,             // 1 -> 1

  // Comparison, 2 -> 1
  EQ,
  NE,
  LT,
  GT,
  LE,
  GE,

  // Logical
  AND,             // 2 -> 1, both operands already evaluated
  OR,              // 2 -> 1
  NOT,             // 1 -> 1

  // Control flow
  JUMP,            // 0 -> 0, operand: target index
  JUMP_IF_FALSE,   // 1 -> 0, operand: target index
  JUMP_IF_TRUE,    // 1 -> 0, operand: target index

  // Functions
  CALL,            // argc -> 1, operand: { name, argc }
  RETURN,          // 1 -> 0
  HALT,            // 0 -> 0

  // Lists
  BUILD_LIST,      // n -> 1, operand: n
  INDEX,           // 2 -> 1

  // Print intrinsics, operand: argument count; push void
  PRINT,           // n -> 1
  PRINTLN,         // n -> 1
}

export type ConstantValue = bigint | number | string | boolean | null;

export interface CallOperand {
  name: string;
  argc: number;
}

/**
 * `number` is a jump target or an element/argument count. During generation
 * a jump carries its label name (a string) until the label is patched.
 */
export type Operand = ConstantValue | CallOperand;

export interface Instruction {
  opcode: OpCode;
  operand?: Operand;
  location?: SourceLocation;
}

export interface CompiledFunction {
  name: string;
  paramCount: number;
  paramNames: string[];
  instructions: Instruction[];
  // Distinct constants loaded by this function, in order of first use
  constants: ConstantValue[];
}

export interface BytecodeModule {
  functions: Map<string, CompiledFunction>;
  entryPoint: string;
}

export const DEFAULT_ENTRY_POINT = 'main';

export const JUMP_OPCODES: ReadonlySet<OpCode> = new Set([
  OpCode.JUMP,
  OpCode.JUMP_IF_FALSE,
  OpCode.JUMP_IF_TRUE,
]);

export const isCallOperand = (operand: Operand | undefined): operand is CallOperand =>
  typeof operand === 'object' && operand !== null;
