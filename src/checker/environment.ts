import { Type } from './types';

/**
 * One scope in the checker's environment chain. Lookups walk outward;
 * a binding in a child shadows the parent's.
 */
export class TypeEnvironment {
  readonly parent: TypeEnvironment | null;
  private bindings: Map<string, Type> = new Map();

  constructor(parent: TypeEnvironment | null = null) {
    this.parent = parent;
  }

  define(name: string, type: Type): void {
    this.bindings.set(name, type);
  }

  lookup(name: string): Type | undefined {
    const own = this.bindings.get(name);
    if (own !== undefined) return own;
    return this.parent ? this.parent.lookup(name) : undefined;
  }

  child(): TypeEnvironment {
    return new TypeEnvironment(this);
  }
}
