export type VmErrorKind =
    | 'OutOfBounds'
    | 'UnknownRegister'
    | 'UnknownOpcode'
    | 'Overflow'
    | 'MemoryReadError'
    | 'CopyFailed'
    | 'Halted'
    | 'ConfigError';

const messages: Record<VmErrorKind, string> = {
    OutOfBounds: 'Memory access is out of bounds',
    UnknownRegister: 'Unknown register',
    UnknownOpcode: 'Unknown opcode',
    Overflow: 'Arithmetic overflow',
    MemoryReadError: 'Memory read failed',
    CopyFailed: 'Copy failed: source is not readable',
    Halted: 'Cannot use a halted machine',
    ConfigError: 'Invalid configuration',
};

export class VmError extends Error {

    readonly kind: VmErrorKind;

    constructor(kind: VmErrorKind, detail?: string) {
        super(detail ? `${messages[kind]}: ${detail}` : messages[kind]);
        this.name = 'VmError';
        this.kind = kind;
    }
}

export function isVmError(e: unknown, kind?: VmErrorKind): e is VmError {
    return e instanceof VmError && (kind === undefined || e.kind === kind);
}
