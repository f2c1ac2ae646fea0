// Programs load here; the 256 bytes below are a reserved prefix.
export const START_ADDRESS = 0x0100;

// STORE_OUT target, inside the reserved prefix.
export const OUTPUT_ADDRESS = 0x0000;

export const WORD_MAX = 0xffff;
export const BYTE_MAX = 0xff;

// Instructions are one word wide.
export const INSTRUCTION_SIZE = 2;

// Width of a register snapshot; ids without a register serialize as 0.
export const MAX_REGISTERS = 8;

export const ADDRESS_SPACE = WORD_MAX + 1;
export const DEFAULT_MEMORY_SIZE = 5000;
