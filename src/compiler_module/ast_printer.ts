import { ASTNode, ASTNodeType } from '../types';

const NODE_TYPES: ReadonlySet<string> = new Set<string>(Object.values(ASTNodeType));

// Fields every node carries that say nothing about its shape
const SKIPPED_FIELDS: ReadonlySet<string> = new Set(['type', 'location', 'metadata']);

const isASTNode = (value: unknown): value is ASTNode =>
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    NODE_TYPES.has(value.type);

/**
 * Indented outline of a syntax tree: one line per node, then its fields.
 * Empty lists and null fields are left out.
 */
export const formatAst = (node: ASTNode, indent: number = 0): string => {
    const prefix = ' '.repeat(indent);

    if (node.type === ASTNodeType.PROGRAM) {
        return [`${prefix}Program:`, ...node.declarations.map(decl => formatAst(decl, indent + 2))].join('\n');
    }

    const lines = [`${prefix}${node.type}`];
    const fields: [string, unknown][] = Object.entries(node);
    for (const [key, value] of fields) {
        if (SKIPPED_FIELDS.has(key)) continue;

        if (Array.isArray(value)) {
            if (value.length === 0) continue;
            lines.push(`${prefix}  ${key}:`);
            for (const item of value) {
                lines.push(isASTNode(item) ? formatAst(item, indent + 4) : `${prefix}    ${String(item)}`);
            }
        } else if (isASTNode(value)) {
            lines.push(`${prefix}  ${key}:`, formatAst(value, indent + 4));
        } else if (value !== null && value !== undefined) {
            lines.push(`${prefix}  ${key}: ${String(value)}`);
        }
    }
    return lines.join('\n');
};
