// Order r of the BN254 scalar field, the field circom circuits and Poseidon work in.
export const BN254_SCALAR_MODULUS = 21888242871839275222246405745257275088548364400416034343698204186575808495617n;

export const FIELD_ZERO = 0n;

export function bytesToBigintBE(bytes: Uint8Array): bigint {
    let n = 0n;
    for (const b of bytes) {
        n = (n << 8n) | BigInt(b);
    }
    return n;
}

/**
 * Reduces a 256-bit SHA-256 digest into the scalar field. The digest range
 * exceeds r, and Poseidon rejects inputs that are not reduced.
 */
export function reduceToField(digest: Uint8Array): bigint {
    if (digest.length !== 32) throw new Error(`Invalid digest size: ${digest.length}`);
    return bytesToBigintBE(digest) % BN254_SCALAR_MODULUS;
}

export function isFieldElement(n: bigint): boolean {
    return n >= 0n && n < BN254_SCALAR_MODULUS;
}

export function padHex(s: string, bytes: number): string {
    return s.padStart(bytes * 2, '0');
}

export function fieldToHex(n: bigint): string {
    return '0x' + padHex(n.toString(16), 32);
}

export function padWitness(values: bigint[], capacity: number): bigint[] {
    const padded = [...values];
    while (padded.length < capacity) padded.push(FIELD_ZERO);
    return padded;
}
