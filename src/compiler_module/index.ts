export { CodeGenerator, generate } from './code_generator';
export { LabelTable } from './labels';
export { formatAst } from './ast_printer';
export { disassembleFunction, disassembleInstruction, disassembleModule } from './disassembler';
export { serializeModule, deserializeModule, BYTECODE_FORMAT, BYTECODE_VERSION } from './serializer';
