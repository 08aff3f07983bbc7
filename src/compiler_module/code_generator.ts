import {
    Assignment,
    ASTNodeType,
    BinaryOperator,
    Block,
    BytecodeModule,
    Call,
    CompiledFunction,
    ConstantValue,
    DEFAULT_ENTRY_POINT,
    Expression,
    FunctionDeclaration,
    Instruction,
    JUMP_OPCODES,
    OpCode,
    Operand,
    Program,
    SourceLocation,
    Statement,
    UnaryOperator,
} from '../types';
import { GenerationError } from '../common/errors';
import { assertNever } from '../common/assert';
import { LabelTable } from './labels';

const BINARY_OPCODES: Record<BinaryOperator, OpCode> = {
    '+': OpCode.ADD,
    '-': OpCode.SUB,
    '*': OpCode.MUL,
    '/': OpCode.DIV,
    '%': OpCode.MOD,
    '**': OpCode.POW,
    '==': OpCode.EQ,
    '!=': OpCode.NE,
    '<': OpCode.LT,
    '>': OpCode.GT,
    '<=': OpCode.LE,
    '>=': OpCode.GE,
    'and': OpCode.AND,
    'or': OpCode.OR,
};

// '~' parses but has no opcode
const UNARY_OPCODES: Partial<Record<UnaryOperator, OpCode>> = {
    '-': OpCode.NEG,
    'not': OpCode.NOT,
};

const COMPOUND_OPCODES: Record<Exclude<Assignment['operator'], '='>, OpCode> = {
    '+=': OpCode.ADD,
    '-=': OpCode.SUB,
    '*=': OpCode.MUL,
    '/=': OpCode.DIV,
};

// Call targets lowered to dedicated opcodes instead of CALL
const INTRINSICS: ReadonlyMap<string, OpCode> = new Map([
    ['print', OpCode.PRINT],
    ['println', OpCode.PRINTLN],
]);

interface LoopContext {
    breakLabel: string;
    // Instruction index where the loop condition is re-evaluated
    continueTarget: number;
}

/**
 * Emits one function's instructions in a single left-to-right pass. Label
 * and loop bookkeeping live and die with the instance.
 */
class FunctionCompiler {
    private instructions: Instruction[] = [];
    private constants: ConstantValue[] = [];
    private labels = new LabelTable();
    private loopStack: LoopContext[] = [];

    constructor(private readonly decl: FunctionDeclaration) {}

    compile(): CompiledFunction {
        this.visitBlock(this.decl.body);

        if (this.needsImplicitReturn()) {
            this.emitConstant(null, this.decl.location);
            this.emit(OpCode.RETURN, undefined, this.decl.location);
        }

        const pending = this.labels.unresolved();
        if (pending.length > 0) {
            throw new GenerationError(`Unresolved labels in ${this.decl.name}: ${pending.join(', ')}`, this.decl.location);
        }

        return {
            name: this.decl.name,
            paramCount: this.decl.inputs.length,
            paramNames: this.decl.inputs.map(param => param.name),
            instructions: this.instructions,
            constants: this.constants,
        };
    }

    // The body must end in RETURN, and a jump past the last instruction needs one to land on
    private needsImplicitReturn(): boolean {
        const last = this.instructions[this.instructions.length - 1];
        if (!last || last.opcode !== OpCode.RETURN) return true;
        const end = this.instructions.length;
        return this.instructions.some(instr => JUMP_OPCODES.has(instr.opcode) && instr.operand === end);
    }

    private emit(opcode: OpCode, operand?: Operand, location?: SourceLocation): number {
        const instr: Instruction = { opcode };
        if (operand !== undefined) instr.operand = operand;
        if (location !== undefined) instr.location = location;
        this.instructions.push(instr);
        return this.instructions.length - 1;
    }

    private emitConstant(value: ConstantValue, location: SourceLocation): void {
        if (!this.constants.includes(value)) this.constants.push(value);
        this.emit(OpCode.LOAD_CONST, value, location);
    }

    private emitJump(opcode: OpCode, label: string, location: SourceLocation): void {
        const index = this.emit(opcode, label, location);
        this.labels.reference(label, index);
    }

    private patchLabel(label: string): void {
        this.labels.patch(label, this.instructions, this.instructions.length);
    }

    private visitBlock(block: Block): void {
        for (const stmt of block.statements) {
            this.visitStatement(stmt);
        }
    }

    private visitStatement(stmt: Statement): void {
        switch (stmt.type) {
            case ASTNodeType.RETURN:
                if (stmt.value) {
                    this.visitExpression(stmt.value);
                } else {
                    this.emitConstant(null, stmt.location);
                }
                this.emit(OpCode.RETURN, undefined, stmt.location);
                break;

            case ASTNodeType.IF:
            case ASTNodeType.ENSURE:
                // ensure/otherwise has no opcode of its own
                this.visitConditional(stmt.condition, stmt.thenBlock, stmt.elseBlock, stmt.location);
                break;

            case ASTNodeType.WHILE: {
                const endLabel = this.labels.newLabel();
                const start = this.instructions.length;
                this.loopStack.push({ breakLabel: endLabel, continueTarget: start });

                this.visitExpression(stmt.condition);
                this.emitJump(OpCode.JUMP_IF_FALSE, endLabel, stmt.location);
                this.visitBlock(stmt.body);
                this.emit(OpCode.JUMP, start, stmt.location);

                this.patchLabel(endLabel);
                this.loopStack.pop();
                break;
            }

            case ASTNodeType.ASSIGNMENT:
                this.visitAssignment(stmt);
                break;

            case ASTNodeType.EXPRESSION_STATEMENT:
                this.visitExpression(stmt.expression);
                this.emit(OpCode.POP, undefined, stmt.location);
                break;

            case ASTNodeType.BREAK: {
                const loop = this.loopStack[this.loopStack.length - 1];
                if (!loop) {
                    throw new GenerationError('break outside of loop', stmt.location);
                }
                this.emitJump(OpCode.JUMP, loop.breakLabel, stmt.location);
                break;
            }

            case ASTNodeType.CONTINUE: {
                const loop = this.loopStack[this.loopStack.length - 1];
                if (!loop) {
                    throw new GenerationError('continue outside of loop', stmt.location);
                }
                this.emit(OpCode.JUMP, loop.continueTarget, stmt.location);
                break;
            }

            default:
                assertNever(stmt, 'CodeGenerator');
        }
    }

    private visitConditional(condition: Expression, thenBlock: Block, elseBlock: Block | null, location: SourceLocation): void {
        const elseLabel = this.labels.newLabel();
        const endLabel = this.labels.newLabel();

        this.visitExpression(condition);
        this.emitJump(OpCode.JUMP_IF_FALSE, elseLabel, location);

        this.visitBlock(thenBlock);
        this.emitJump(OpCode.JUMP, endLabel, location);

        this.patchLabel(elseLabel);
        if (elseBlock) {
            this.visitBlock(elseBlock);
        }
        this.patchLabel(endLabel);
    }

    private visitAssignment(stmt: Assignment): void {
        const target = stmt.target;
        if (target.type !== ASTNodeType.IDENTIFIER) {
            throw new GenerationError(`Unsupported assignment target: ${target.type}`, target.location);
        }

        this.visitExpression(stmt.value);

        // x op= v  =>  v, x, op, store x
        if (stmt.operator !== '=') {
            this.emit(OpCode.LOAD_VAR, target.name, target.location);
            this.emit(COMPOUND_OPCODES[stmt.operator], undefined, stmt.location);
        }

        this.emit(OpCode.STORE_VAR, target.name, target.location);
    }

    private visitExpression(expr: Expression): void {
        switch (expr.type) {
            case ASTNodeType.LITERAL:
                this.emitConstant(expr.value, expr.location);
                break;

            case ASTNodeType.IDENTIFIER:
                this.emit(OpCode.LOAD_VAR, expr.name, expr.location);
                break;

            case ASTNodeType.BINARY_OP:
                this.visitExpression(expr.left);
                this.visitExpression(expr.right);
                this.emit(BINARY_OPCODES[expr.operator], undefined, expr.location);
                break;

            case ASTNodeType.UNARY_OP: {
                const opcode = UNARY_OPCODES[expr.operator];
                if (opcode === undefined) {
                    throw new GenerationError(`Unsupported unary operator: ${expr.operator}`, expr.location);
                }
                this.visitExpression(expr.operand);
                this.emit(opcode, undefined, expr.location);
                break;
            }

            case ASTNodeType.CALL:
                this.visitCall(expr);
                break;

            case ASTNodeType.MEMBER:
                // No member opcode in the engine: member reads evaluate to null
                this.emitConstant(null, expr.location);
                break;

            case ASTNodeType.INDEX:
                this.visitExpression(expr.object);
                this.visitExpression(expr.index);
                this.emit(OpCode.INDEX, undefined, expr.location);
                break;

            case ASTNodeType.LIST_LITERAL:
                for (const element of expr.elements) {
                    this.visitExpression(element);
                }
                this.emit(OpCode.BUILD_LIST, expr.elements.length, expr.location);
                break;

            default:
                assertNever(expr, 'CodeGenerator');
        }
    }

    private visitCall(call: Call): void {
        const callee = call.callee;
        if (callee.type !== ASTNodeType.IDENTIFIER) {
            throw new GenerationError('Only simple function calls are supported', callee.location);
        }

        for (const arg of call.args) {
            this.visitExpression(arg);
        }

        const intrinsic = INTRINSICS.get(callee.name);
        if (intrinsic !== undefined) {
            this.emit(intrinsic, call.args.length, call.location);
        } else {
            this.emit(OpCode.CALL, { name: callee.name, argc: call.args.length }, call.location);
        }
    }
}

/**
 * 代码生成器 - 将 AST 编译为字节码模块
 */
export class CodeGenerator {
    generate(program: Program, entryPoint: string = DEFAULT_ENTRY_POINT): BytecodeModule {
        const module: BytecodeModule = { functions: new Map(), entryPoint };

        for (const decl of program.declarations) {
            const compiled = new FunctionCompiler(decl).compile();
            if (module.functions.has(decl.name)) {
                console.warn(`CodeGenerator: function '${decl.name}' redefined; keeping the later definition`);
            }
            module.functions.set(decl.name, compiled);
        }

        return module;
    }
}

export const generate = (program: Program, entryPoint: string = DEFAULT_ENTRY_POINT): BytecodeModule =>
    new CodeGenerator().generate(program, entryPoint);
