import { INSTRUCTION_SIZE, START_ADDRESS } from '../common/constants';
import { BusDevice } from './bus';
import { encode, Opcode } from './instruction';
import { RegisterId } from './register';

export function loadProgram(bus: BusDevice, program: number[], origin: number = START_ADDRESS) {
    program.forEach((word, i) => bus.write16(origin + i * INSTRUCTION_SIZE, word));
}

// out <- 5 + 3
export function buildSimpleProgram(): number[] {
    return [
        encode(Opcode.COPY, RegisterId.R0, RegisterId.IM, 5),
        encode(Opcode.COPY, RegisterId.R1, RegisterId.IM, 3),
        encode(Opcode.ADD, RegisterId.R0, RegisterId.R1, 0),
        encode(Opcode.STORE_OUT, 0, RegisterId.R0, 0),
        encode(Opcode.HALT, 0, 0, 0),
    ];
}

// Same sum, staging each immediate in IM with LOAD_IMM first.
export function buildStagedProgram(): number[] {
    return [
        encode(Opcode.LOAD_IMM, RegisterId.IM, 0, 5),
        encode(Opcode.COPY, RegisterId.R0, RegisterId.IM, 0),
        encode(Opcode.LOAD_IMM, RegisterId.IM, 0, 3),
        encode(Opcode.COPY, RegisterId.R1, RegisterId.IM, 0),
        encode(Opcode.ADD, RegisterId.R0, RegisterId.R1, 0),
        encode(Opcode.STORE_OUT, 0, RegisterId.R0, 0),
        encode(Opcode.HALT, 0, 0, 0),
    ];
}
