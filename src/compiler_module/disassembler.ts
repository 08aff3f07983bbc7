import { BytecodeModule, CompiledFunction, Instruction, OpCode, isCallOperand } from '../types';

const formatOperand = (instr: Instruction): string => {
    const operand = instr.operand;
    if (isCallOperand(operand)) return `${operand.name}/${operand.argc}`;
    if (instr.opcode === OpCode.LOAD_CONST && typeof operand === 'string') return JSON.stringify(operand);
    return String(operand);
};

export const disassembleInstruction = (instr: Instruction, index: number): string => {
    const head = `  ${String(index).padStart(4)}: ${OpCode[instr.opcode]}`;
    return instr.operand === undefined ? head : `${head} ${formatOperand(instr)}`;
};

export const disassembleFunction = (fn: CompiledFunction): string => {
    const lines = [`Function ${fn.name} (${fn.paramCount} params):`];
    fn.instructions.forEach((instr, i) => lines.push(disassembleInstruction(instr, i)));
    return lines.join('\n');
};

export const disassembleModule = (module: BytecodeModule): string => {
    const lines = ['Bytecode Module:', `Entry point: ${module.entryPoint}`, ''];
    for (const fn of module.functions.values()) {
        lines.push(disassembleFunction(fn), '');
    }
    return lines.join('\n');
};
