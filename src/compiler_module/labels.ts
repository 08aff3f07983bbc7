import { Instruction } from '../types';
import { GenerationError } from '../common/errors';

/**
 * Symbolic jump targets for one function. Each jump that names a label is
 * recorded as a patch site; `patch` rewrites exactly those sites once the
 * label's position is known.
 */
export class LabelTable {
    private counter = 0;
    private sites: Map<string, number[]> = new Map();

    newLabel(): string {
        const label = `L${this.counter++}`;
        this.sites.set(label, []);
        return label;
    }

    reference(label: string, index: number): void {
        const sites = this.sites.get(label);
        if (!sites) {
            throw new GenerationError(`Jump to unknown or already patched label ${label}`);
        }
        sites.push(index);
    }

    patch(label: string, instructions: Instruction[], target: number): void {
        const sites = this.sites.get(label);
        if (!sites) {
            throw new GenerationError(`Label ${label} patched twice or never allocated`);
        }
        for (const index of sites) {
            instructions[index].operand = target;
        }
        this.sites.delete(label);
        if (process.env.DEBUG_CODEGEN) {
            console.log(`LABEL: ${label} -> ${target} (sites: ${sites.join(', ') || 'none'})`);
        }
    }

    unresolved(): string[] {
        return Array.from(this.sites.keys());
    }
}
