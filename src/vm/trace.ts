import { Opcode } from './instruction';
import { Register } from './register';

export interface TraceEntry {
    readonly pc: number;
    readonly opcode: Opcode;
    readonly dest: number;
    readonly source: number;
    readonly immediate: number;
    readonly registers: readonly Readonly<Register>[];
}

export class TraceBuffer {

    private items: TraceEntry[] = [];

    record(entry: TraceEntry) {
        this.items.push(Object.freeze({
            ...entry,
            registers: Object.freeze(entry.registers.map(r => Object.freeze({ ...r }))),
        }));
    }

    get entries(): readonly TraceEntry[] {
        return this.items;
    }

    get length(): number {
        return this.items.length;
    }
}
