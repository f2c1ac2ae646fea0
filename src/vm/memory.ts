import { ADDRESS_SPACE, BYTE_MAX } from '../common/constants';
import { VmError } from '../common/errors';
import { BusDevice } from './bus';

export class LinearMemory extends BusDevice {

    readonly bytes: Uint8Array;

    constructor(size: number) {
        super();
        if (!Number.isInteger(size) || size < 0 || size > ADDRESS_SPACE)
            throw new Error(`Invalid memory size: ${size}`);
        this.bytes = new Uint8Array(size);
    }

    read(addr: number): number | undefined {
        return this.inRange(addr) ? this.bytes[addr] : undefined;
    }

    write(addr: number, value: number) {
        if (!this.inRange(addr)) throw new VmError('OutOfBounds', `address ${addr}`);
        this.bytes[addr] = value & BYTE_MAX;
    }

    memoryRange(): number {
        return this.bytes.length;
    }

    subset(start: number, end: number): Uint8Array {
        if (!(Number.isInteger(start) && Number.isInteger(end) && 0 <= start && start <= end && end <= this.bytes.length))
            throw new Error(`Invalid memory range: [${start}, ${end})`);
        return this.bytes.slice(start, end);
    }
}
