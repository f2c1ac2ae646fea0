import { VmError } from '../common/errors';

export enum Opcode {
    HALT = 0,
    COPY = 1,
    LOAD = 2,
    WRITE = 3,
    ADD = 4,
    LOAD_IMM = 5,
    STORE_OUT = 6,
}

export interface InstructionFields {
    opcode: number;
    dest: number;
    source: number;
    immediate: number;
}

export interface Instruction extends InstructionFields {
    opcode: Opcode;
}

//  15 14 13 12 | 11 10 9 8 | 7 6 5 4 | 3 2 1 0
//     opcode   |   dest    |  source |   imm
//
// Fields wider than four bits are truncated, not rejected.
export function encode(opcode: number, dest: number, source: number, immediate: number): number {
    return ((opcode & 0xf) << 12) | ((dest & 0xf) << 8) | ((source & 0xf) << 4) | (immediate & 0xf);
}

export function decodeFields(word: number): InstructionFields {
    return {
        opcode: (word >> 12) & 0xf,
        dest: (word >> 8) & 0xf,
        source: (word >> 4) & 0xf,
        immediate: word & 0xf,
    };
}

export function toOpcode(raw: number): Opcode {
    switch (raw) {
        case Opcode.HALT: return Opcode.HALT;
        case Opcode.COPY: return Opcode.COPY;
        case Opcode.LOAD: return Opcode.LOAD;
        case Opcode.WRITE: return Opcode.WRITE;
        case Opcode.ADD: return Opcode.ADD;
        case Opcode.LOAD_IMM: return Opcode.LOAD_IMM;
        case Opcode.STORE_OUT: return Opcode.STORE_OUT;
        default:
            throw new VmError('UnknownOpcode', `0x${raw.toString(16)}`);
    }
}

export function decode(word: number): Instruction {
    const fields = decodeFields(word);
    return { ...fields, opcode: toOpcode(fields.opcode) };
}

export function formatInstruction(instr: Instruction): string {
    return `${Opcode[instr.opcode]} ${instr.dest} ${instr.source} ${instr.immediate}`;
}
