import { OUTPUT_ADDRESS, START_ADDRESS } from '../common/constants';
import { VmError } from '../common/errors';
import { BusDevice } from '../vm/bus';
import { RegisterBank, RegisterId } from '../vm/register';
import { TraceEntry } from '../vm/trace';
import { commit } from './hash';
import { FIELD_ZERO, fieldToHex, padWitness } from './field';
import {
    serializeOpcode,
    serializeRegisterBank,
    serializeRegisterSnapshot,
    serializeWord,
    serializeWords,
} from './serialize';

export interface TraceCommitment {
    publicInputs: bigint[];
    privateInputs: bigint[];
}

export interface SavedWitness {
    publicProgramHash: string;
    privateProgramHash: string;
    publicOutputHash: string;
    privateOutputHash: string;
    publicTrace: string[];
    privateTrace: string[];
}

/*
    Every public value is poseidon(sha256(data) mod r); the private witness is
    the reduced sha256 itself.
*/
export class CommitmentContext {

    publicProgramHash = FIELD_ZERO;
    privateProgramHash = FIELD_ZERO;
    publicOutputHash = FIELD_ZERO;
    privateOutputHash = FIELD_ZERO;
    publicTrace: bigint[] = [];
    privateTrace: bigint[] = [];

    public setPublicProgram(program: number[]) {
        const pair = commit([serializeWords(program)]);
        this.publicProgramHash = pair.publicValue;
        this.privateProgramHash = pair.privateValue;
    }

    // Output word, the program region up to the final PC, and the register bank.
    public setPublicOutput(registers: RegisterBank, bus: BusDevice) {
        const pc = registers.get(RegisterId.PC).value;
        const output = bus.read16(OUTPUT_ADDRESS);
        if (output === undefined) throw new VmError('MemoryReadError', `output at ${OUTPUT_ADDRESS}`);

        const pair = commit([
            serializeWord(output),
            bus.subset(START_ADDRESS, pc),
            serializeRegisterBank(registers.snapshot()),
        ]);
        this.publicOutputHash = pair.publicValue;
        this.privateOutputHash = pair.privateValue;
    }

    /**
     * One public/private pair per trace entry, in execution order. With a
     * `capacity`, both sequences are padded with zeros up to it; a capacity
     * below the number of steps is a configuration error.
     */
    public commitTrace(entries: readonly TraceEntry[], bus: BusDevice, capacity?: number): TraceCommitment {
        if (capacity !== undefined && capacity < entries.length)
            throw new VmError('ConfigError', `trace capacity ${capacity} is below ${entries.length} steps`);

        const publicInputs: bigint[] = [];
        const privateInputs: bigint[] = [];
        for (const entry of entries) {
            const pair = commit([
                serializeRegisterSnapshot(entry.registers),
                serializeWord(bus.valueAt(entry.pc)),
                serializeWord(entry.pc),
                serializeOpcode(entry.opcode),
            ]);
            publicInputs.push(pair.publicValue);
            privateInputs.push(pair.privateValue);
        }

        this.publicTrace = capacity === undefined ? publicInputs : padWitness(publicInputs, capacity);
        this.privateTrace = capacity === undefined ? privateInputs : padWitness(privateInputs, capacity);
        return { publicInputs: this.publicTrace, privateInputs: this.privateTrace };
    }

    public toWitness(): SavedWitness {
        return {
            publicProgramHash: fieldToHex(this.publicProgramHash),
            privateProgramHash: fieldToHex(this.privateProgramHash),
            publicOutputHash: fieldToHex(this.publicOutputHash),
            privateOutputHash: fieldToHex(this.privateOutputHash),
            publicTrace: this.publicTrace.map(fieldToHex),
            privateTrace: this.privateTrace.map(fieldToHex),
        };
    }
}
