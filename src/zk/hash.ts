import { createHash } from 'node:crypto';
import { poseidon1 } from 'poseidon-lite';

import { BN254_SCALAR_MODULUS, isFieldElement, reduceToField } from './field';

export function sha256(chunks: Uint8Array[]): Buffer {
    const hasher = createHash('sha256');
    for (const chunk of chunks) hasher.update(chunk);
    return hasher.digest();
}

/** SHA-256 over the concatenated chunks, reduced mod r. This is the private pre-image. */
export function sha256ToField(chunks: Uint8Array[]): bigint {
    return reduceToField(sha256(chunks));
}

/** Circom-compatible Poseidon with one input (t = 2). This is the public value. */
export function poseidonHash(x: bigint): bigint {
    if (!isFieldElement(x)) throw new Error(`Not an element of the field mod ${BN254_SCALAR_MODULUS}: ${x}`);
    return poseidon1([x]);
}

export interface FieldPair {
    publicValue: bigint;
    privateValue: bigint;
}

export function commit(chunks: Uint8Array[]): FieldPair {
    const privateValue = sha256ToField(chunks);
    return { publicValue: poseidonHash(privateValue), privateValue };
}
