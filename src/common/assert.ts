/** Exhaustiveness guard for switches over closed node unions. */
export function assertNever(value: never, context: string): never {
  const node: { type?: unknown } = value;
  throw new Error(`${context}: unhandled node type ${String(node.type)}`);
}
