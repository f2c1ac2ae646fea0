import { BYTE_MAX } from '../common/constants';
import { VmError } from '../common/errors';

/**
 * A byte-addressable device the VM reads and writes through.
 *
 * Devices implement the byte primitives; the 16-bit helpers are derived here so
 * every device shares the same little-endian layout and failure order.
 */
export abstract class BusDevice {

    /** Returns the byte at `addr`, or `undefined` when `addr` is outside the device. */
    abstract read(addr: number): number | undefined;

    /** Throws `OutOfBounds` and leaves the device untouched when `addr` is outside the device. */
    abstract write(addr: number, value: number): void;

    abstract memoryRange(): number;

    /** Copy of the bytes in `[start, end)`. The range must lie inside the device. */
    abstract subset(start: number, end: number): Uint8Array;

    read16(addr: number): number | undefined {
        const low = this.read(addr);
        if (low === undefined) return undefined;
        const high = this.read(addr + 1);
        if (high === undefined) return undefined;
        return low | (high << 8);
    }

    // The low byte stays written when the high byte fails.
    write16(addr: number, value: number) {
        this.write(addr, value & BYTE_MAX);
        this.write(addr + 1, (value >> 8) & BYTE_MAX);
    }

    copy16(src: number, dst: number) {
        const value = this.read16(src);
        if (value === undefined) throw new VmError('CopyFailed', `address ${src}`);
        this.write16(dst, value);
    }

    valueAt(index: number): number {
        const value = this.read16(index);
        if (value === undefined) throw new Error(`Invalid memory index: ${index}`);
        return value;
    }

    protected inRange(addr: number): boolean {
        return Number.isInteger(addr) && addr >= 0 && addr < this.memoryRange();
    }
}
