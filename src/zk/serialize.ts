import { MAX_REGISTERS } from '../common/constants';
import { Opcode } from '../vm/instruction';
import { Register } from '../vm/register';

/*
    Canonical byte layouts fed to SHA-256. All integers are little-endian.

    word              u16
    opcode            u8
    word sequence     u64 length, u16 per word
    register snapshot MAX_REGISTERS x u16, ids without a register as 0
    register bank     u64 count, then u8 id + u16 value per register, ascending id
*/

export function serializeWord(value: number): Buffer {
    const buf = Buffer.alloc(2);
    buf.writeUInt16LE(value, 0);
    return buf;
}

export function serializeOpcode(opcode: Opcode): Buffer {
    return Buffer.from([opcode]);
}

export function serializeWords(words: number[]): Buffer {
    const buf = Buffer.alloc(8 + words.length * 2);
    buf.writeBigUInt64LE(BigInt(words.length), 0);
    words.forEach((w, i) => buf.writeUInt16LE(w, 8 + i * 2));
    return buf;
}

export function snapshotValues(registers: readonly Register[]): number[] {
    const values: number[] = new Array(MAX_REGISTERS).fill(0);
    for (const r of registers) {
        if (r.id < MAX_REGISTERS) values[r.id] = r.value;
    }
    return values;
}

export function serializeRegisterSnapshot(registers: readonly Register[]): Buffer {
    const buf = Buffer.alloc(MAX_REGISTERS * 2);
    snapshotValues(registers).forEach((v, i) => buf.writeUInt16LE(v, i * 2));
    return buf;
}

export function serializeRegisterBank(registers: readonly Register[]): Buffer {
    const sorted = [...registers].sort((a, b) => a.id - b.id);
    const buf = Buffer.alloc(8 + sorted.length * 3);
    buf.writeBigUInt64LE(BigInt(sorted.length), 0);
    sorted.forEach((r, i) => {
        buf.writeUInt8(r.id, 8 + i * 3);
        buf.writeUInt16LE(r.value, 8 + i * 3 + 1);
    });
    return buf;
}
