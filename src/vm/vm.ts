import { OUTPUT_ADDRESS, WORD_MAX } from '../common/constants';
import { VmError } from '../common/errors';
import { Logger, silentLogger } from '../common/logger';
import { BusDevice } from './bus';
import { decode, formatInstruction, Opcode } from './instruction';
import { Register, RegisterBank, RegisterId } from './register';
import { TraceBuffer } from './trace';

export interface VmOptions {
    trace?: boolean;
    logger?: Logger;
}

/*
    Fetch-decode-execute over one bus. Each instance runs one program from
    start to halt; a halted VM, faulted or not, stays halted.
*/
export class VM {

    readonly registers = new RegisterBank();
    readonly trace?: TraceBuffer;

    private _halted = false;
    private _ticks = 0;
    private bus: BusDevice;
    private logger: Logger;
    private logSteps: boolean;

    constructor(bus: BusDevice, options: VmOptions = {}) {
        this.bus = bus;
        this.logger = options.logger ?? silentLogger;
        this.logSteps = options.logger !== undefined && options.logger !== silentLogger;
        if (options.trace) this.trace = new TraceBuffer();
    }

    get memory(): BusDevice {
        return this.bus;
    }

    get halted(): boolean {
        return this._halted;
    }

    get ticks(): number {
        return this._ticks;
    }

    public tick() {
        if (this._halted) throw new VmError('Halted');
        this._ticks++;
        try {
            this.execute();
        } catch (e) {
            this._halted = true;
            this.logger.error('VM fault:', e instanceof Error ? e.message : e);
            throw e;
        }
    }

    /** Ticks until halted or until `maxTicks` ticks ran; returns the number of ticks. */
    public run(maxTicks: number = Infinity): number {
        const start = this.ticks;
        while (!this.halted && this.ticks - start < maxTicks) {
            this.tick();
        }
        return this.ticks - start;
    }

    private execute() {
        const pc = this.registers.get(RegisterId.PC).value;
        const word = this.bus.read16(pc);
        if (word === undefined) throw new VmError('MemoryReadError', `fetch at ${pc}`);

        this.registers.getMut(RegisterId.IR).value = word;
        this.registers.advanceProgramCounter();

        const instr = decode(word);
        if (this.logSteps) this.logger.log(`${pc}: ${formatInstruction(instr)}`);

        this.trace?.record({
            pc,
            opcode: instr.opcode,
            dest: instr.dest,
            source: instr.source,
            immediate: instr.immediate,
            registers: this.registers.snapshot(),
        });

        const dest = this.resolve(instr.dest, instr.immediate);
        const source = this.resolve(instr.source, instr.immediate);

        switch (instr.opcode) {
            case Opcode.HALT:
                this._halted = true;
                break;
            case Opcode.COPY:
                dest.value = source.value;
                break;
            case Opcode.LOAD:
                dest.value = this.load(source.value);
                break;
            case Opcode.WRITE:
                this.bus.write16(dest.value, source.value);
                break;
            case Opcode.ADD:
                dest.value = this.add(dest.value, source.value);
                break;
            case Opcode.LOAD_IMM:
                // resolve() already placed the immediate in IM
                break;
            case Opcode.STORE_OUT:
                this.bus.write16(OUTPUT_ADDRESS, source.value);
                break;
            default: {
                const unreachable: never = instr.opcode;
                throw new VmError('UnknownOpcode', `${unreachable}`);
            }
        }
    }

    // A zero immediate does not overwrite IM, so "load immediate 0" reuses IM's
    // previous value.
    private resolve(id: number, immediate: number): Register {
        const r = this.registers.getMut(id);
        if (id === RegisterId.IM && immediate !== 0) r.value = immediate;
        return r;
    }

    private load(addr: number): number {
        const value = this.bus.read16(addr);
        if (value === undefined) throw new VmError('MemoryReadError', `address ${addr}`);
        return value;
    }

    private add(a: number, b: number): number {
        const sum = a + b;
        if (sum > WORD_MAX) throw new VmError('Overflow', `${a} + ${b}`);
        return sum;
    }
}
