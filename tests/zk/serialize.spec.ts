import { describe, expect, it } from '@jest/globals';
import { Opcode } from '../../src/vm/instruction';
import { RegisterBank, RegisterId } from '../../src/vm/register';
import {
    serializeOpcode,
    serializeRegisterBank,
    serializeRegisterSnapshot,
    serializeWord,
    serializeWords,
    snapshotValues,
} from '../../src/zk/serialize';

describe('Canonical serialization', () => {

    it('writes words little-endian', () => {
        expect(Array.from(serializeWord(0x1234))).toEqual([0x34, 0x12]);
        expect(Array.from(serializeWord(0))).toEqual([0, 0]);
    });

    it('writes opcodes as one byte', () => {
        expect(Array.from(serializeOpcode(Opcode.STORE_OUT))).toEqual([6]);
    });

    it('prefixes word sequences with a u64 length', () => {
        expect(Array.from(serializeWords([0x1065, 0x0000]))).toEqual([
            2, 0, 0, 0, 0, 0, 0, 0,
            0x65, 0x10,
            0x00, 0x00,
        ]);
        expect(Array.from(serializeWords([]))).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
    });

    it('fills ids without a register with zero', () => {
        const bank = new RegisterBank();
        bank.getMut(RegisterId.IM).value = 0xabcd;
        expect(snapshotValues(bank.snapshot())).toEqual([0, 0, 0, 0, 0x100, 0, 0xabcd, 0]);
        expect(snapshotValues([{ id: RegisterId.R3, value: 4 }])).toEqual([0, 0, 0, 4, 0, 0, 0, 0]);
    });

    it('writes snapshots as fixed-width arrays', () => {
        const bank = new RegisterBank();
        expect(Array.from(serializeRegisterSnapshot(bank.snapshot()))).toEqual([
            0, 0, 0, 0, 0, 0, 0, 0,
            0x00, 0x01,
            0, 0, 0, 0,
            0, 0,
        ]);
    });

    it('writes the register bank with ids in ascending order', () => {
        const bank = new RegisterBank();
        bank.getMut(RegisterId.R1).value = 0x0203;
        const reversed = [...bank.snapshot()].reverse();
        expect(Array.from(serializeRegisterBank(reversed))).toEqual([
            7, 0, 0, 0, 0, 0, 0, 0,
            0, 0, 0,
            1, 0x03, 0x02,
            2, 0, 0,
            3, 0, 0,
            4, 0x00, 0x01,
            5, 0, 0,
            6, 0, 0,
        ]);
    });
});
