import {
    BytecodeModule,
    CompiledFunction,
    ConstantValue,
    Instruction,
    OpCode,
    Operand,
    SourceLocation,
    isCallOperand,
} from '../types';

export const BYTECODE_FORMAT = 'one-bytecode';
export const BYTECODE_VERSION = 1;

type EncodedValue =
    | string
    | number
    | boolean
    | null
    | { $int: string }
    | { $float: string }
    | { $call: string; argc: number };

interface EncodedInstruction {
    op: string;
    operand?: EncodedValue;
    location?: SourceLocation;
}

interface EncodedFunction {
    name: string;
    paramCount: number;
    paramNames: string[];
    constants: EncodedValue[];
    instructions: EncodedInstruction[];
}

interface EncodedModule {
    format: typeof BYTECODE_FORMAT;
    version: typeof BYTECODE_VERSION;
    entryPoint: string;
    functions: EncodedFunction[];
}

const OPCODES_BY_NAME: ReadonlyMap<string, OpCode> = new Map(
    Object.values(OpCode)
        .filter((value): value is OpCode => typeof value === 'number')
        .map((op): [string, OpCode] => [OpCode[op], op])
);

// Constants tag every number so Infinity and NaN survive JSON
const encodeConstant = (value: ConstantValue): EncodedValue => {
    if (typeof value === 'bigint') return { $int: value.toString() };
    if (typeof value === 'number') return { $float: String(value) };
    return value;
};

const encodeOperand = (opcode: OpCode, operand: Operand): EncodedValue => {
    if (isCallOperand(operand)) return { $call: operand.name, argc: operand.argc };
    if (opcode === OpCode.LOAD_CONST) return encodeConstant(operand);
    // Jump targets and counts stay plain numbers
    return typeof operand === 'bigint' ? { $int: operand.toString() } : operand;
};

const encodeInstruction = (instr: Instruction): EncodedInstruction => {
    const encoded: EncodedInstruction = { op: OpCode[instr.opcode] };
    if (instr.operand !== undefined) encoded.operand = encodeOperand(instr.opcode, instr.operand);
    if (instr.location !== undefined) encoded.location = instr.location;
    return encoded;
};

const encodeFunction = (fn: CompiledFunction): EncodedFunction => ({
    name: fn.name,
    paramCount: fn.paramCount,
    paramNames: fn.paramNames,
    constants: fn.constants.map(encodeConstant),
    instructions: fn.instructions.map(encodeInstruction),
});

export const serializeModule = (module: BytecodeModule): string => {
    const doc: EncodedModule = {
        format: BYTECODE_FORMAT,
        version: BYTECODE_VERSION,
        entryPoint: module.entryPoint,
        functions: Array.from(module.functions.values(), encodeFunction),
    };
    return JSON.stringify(doc, null, 2);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const malformed = (what: string): Error => new Error(`Malformed bytecode: ${what}`);

const expectString = (value: unknown, what: string): string => {
    if (typeof value !== 'string') throw malformed(`${what} must be a string`);
    return value;
};

const expectInteger = (value: unknown, what: string): number => {
    if (typeof value !== 'number' || !Number.isInteger(value)) throw malformed(`${what} must be an integer`);
    return value;
};

const expectCount = (value: unknown, what: string): number => {
    const count = expectInteger(value, what);
    if (count < 0) throw malformed(`${what} must be a non-negative count`);
    return count;
};

// Everything String(number) can produce
const FLOAT_TEXT = /^(-?(\d+(\.\d+)?([eE][+-]?\d+)?|Infinity)|NaN)$/;

const expectArray = (value: unknown, what: string): unknown[] => {
    if (!Array.isArray(value)) throw malformed(`${what} must be an array`);
    return value;
};

const decodeValue = (value: unknown, what: string): Operand => {
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if (isRecord(value)) {
        if ('$int' in value) {
            const digits = expectString(value.$int, `${what}.$int`);
            if (!/^-?\d+$/.test(digits)) throw malformed(`${what}.$int is not an integer literal`);
            return BigInt(digits);
        }
        if ('$float' in value) {
            const text = expectString(value.$float, `${what}.$float`);
            if (!FLOAT_TEXT.test(text)) throw malformed(`${what}.$float is not a number`);
            return Number(text);
        }
        if ('$call' in value) {
            return {
                name: expectString(value.$call, `${what}.$call`),
                argc: expectCount(value.argc, `${what}.argc`),
            };
        }
    }
    throw malformed(`${what} has an unknown encoding`);
};

const decodeConstant = (value: unknown, what: string): ConstantValue => {
    const decoded = decodeValue(value, what);
    if (isCallOperand(decoded)) throw malformed(`${what} cannot be a call`);
    return decoded;
};

const decodeLocation = (value: unknown, what: string): SourceLocation => {
    if (!isRecord(value)) throw malformed(`${what} must be an object`);
    return {
        source: expectString(value.source, `${what}.source`),
        line: expectInteger(value.line, `${what}.line`),
        column: expectInteger(value.column, `${what}.column`),
    };
};

// Each opcode takes exactly one operand shape; jumps must land inside the function
const decodeOperand = (opcode: OpCode, value: unknown, instructionCount: number, what: string): Operand | undefined => {
    switch (opcode) {
        case OpCode.JUMP:
        case OpCode.JUMP_IF_FALSE:
        case OpCode.JUMP_IF_TRUE: {
            const target = expectInteger(value, what);
            if (target < 0 || target >= instructionCount) {
                throw malformed(`${what} jump target ${target} is out of range`);
            }
            return target;
        }

        case OpCode.BUILD_LIST:
        case OpCode.PRINT:
        case OpCode.PRINTLN:
            return expectCount(value, what);

        case OpCode.CALL: {
            const call = decodeValue(value, what);
            if (!isCallOperand(call)) throw malformed(`${what} must be a call`);
            return call;
        }

        case OpCode.LOAD_VAR:
        case OpCode.STORE_VAR:
            return expectString(value, what);

        case OpCode.LOAD_CONST:
            return decodeConstant(value, what);

        default:
            if (value !== undefined) throw malformed(`${what} is not allowed for ${OpCode[opcode]}`);
            return undefined;
    }
};

const decodeInstruction = (value: unknown, instructionCount: number, what: string): Instruction => {
    if (!isRecord(value)) throw malformed(`${what} must be an object`);
    const name = expectString(value.op, `${what}.op`);
    const opcode = OPCODES_BY_NAME.get(name);
    if (opcode === undefined) throw malformed(`${what} has unknown opcode ${name}`);

    const instr: Instruction = { opcode };
    const operand = decodeOperand(opcode, value.operand, instructionCount, `${what}.operand`);
    if (operand !== undefined) instr.operand = operand;
    if (value.location !== undefined) instr.location = decodeLocation(value.location, `${what}.location`);
    return instr;
};

const decodeFunction = (value: unknown, what: string): CompiledFunction => {
    if (!isRecord(value)) throw malformed(`${what} must be an object`);
    const name = expectString(value.name, `${what}.name`);
    const paramCount = expectCount(value.paramCount, `${name}.paramCount`);
    const paramNames = expectArray(value.paramNames, `${name}.paramNames`)
        .map((param, i) => expectString(param, `${name}.paramNames[${i}]`));
    if (paramNames.length !== paramCount) {
        throw malformed(`${name}.paramCount is ${paramCount} but ${paramNames.length} parameter names are given`);
    }
    const instructions = expectArray(value.instructions, `${name}.instructions`);
    return {
        name,
        paramCount,
        paramNames,
        constants: expectArray(value.constants, `${name}.constants`)
            .map((constant, i) => decodeConstant(constant, `${name}.constants[${i}]`)),
        instructions: instructions
            .map((instr, i) => decodeInstruction(instr, instructions.length, `${name}.instructions[${i}]`)),
    };
};

export const deserializeModule = (text: string): BytecodeModule => {
    let doc: unknown;
    try {
        doc = JSON.parse(text);
    } catch (e) {
        throw malformed(e instanceof Error ? e.message : String(e));
    }

    if (!isRecord(doc)) throw malformed('top level must be an object');
    if (doc.format !== BYTECODE_FORMAT) throw malformed(`unknown format ${String(doc.format)}`);
    if (doc.version !== BYTECODE_VERSION) throw malformed(`unsupported version ${String(doc.version)}`);

    const module: BytecodeModule = {
        functions: new Map(),
        entryPoint: expectString(doc.entryPoint, 'entryPoint'),
    };
    expectArray(doc.functions, 'functions').forEach((value, i) => {
        const fn = decodeFunction(value, `functions[${i}]`);
        module.functions.set(fn.name, fn);
    });
    return module;
};
