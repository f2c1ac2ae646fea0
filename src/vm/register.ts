import { INSTRUCTION_SIZE, START_ADDRESS, WORD_MAX } from '../common/constants';
import { VmError } from '../common/errors';

/*
    R0..R3 are general purpose, R0 doubles as the accumulator.
    PC holds the address of the next instruction, IR the word being executed,
    IM the immediate nibble of the current instruction.
*/
export enum RegisterId {
    R0 = 0,
    R1 = 1,
    R2 = 2,
    R3 = 3,
    PC = 4,
    IR = 5,
    IM = 6,
}

export const registerIds: RegisterId[] = [
    RegisterId.R0,
    RegisterId.R1,
    RegisterId.R2,
    RegisterId.R3,
    RegisterId.PC,
    RegisterId.IR,
    RegisterId.IM,
];

// Registers hold copies of values; an address in a register is just a number.
export interface Register {
    id: RegisterId;
    value: number;
}

export class RegisterBank {

    private registers = new Map<number, Register>();

    constructor(programCounter: number = START_ADDRESS) {
        for (const id of registerIds) {
            this.registers.set(id, { id, value: id === RegisterId.PC ? programCounter : 0 });
        }
    }

    get(id: number): Register {
        return { ...this.getMut(id) };
    }

    getMut(id: number): Register {
        const r = this.registers.get(id);
        if (!r) throw new VmError('UnknownRegister', `id ${id}`);
        return r;
    }

    advanceProgramCounter() {
        const pc = this.getMut(RegisterId.PC);
        const next = pc.value + INSTRUCTION_SIZE;
        if (next > WORD_MAX) throw new VmError('Overflow', `program counter ${pc.value}`);
        pc.value = next;
    }

    snapshot(): Register[] {
        return registerIds.map(id => this.get(id));
    }
}
