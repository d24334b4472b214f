export const BIGINT_0 = BigInt(0);
export const BIGINT_1 = BigInt(1);
export const BIGINT_2 = BigInt(2);
export const BIGINT_7 = BigInt(7);
export const BIGINT_8 = BigInt(8);
export const BIGINT_31 = BigInt(31);
export const BIGINT_32 = BigInt(32);
export const BIGINT_64 = BigInt(64);
export const BIGINT_255 = BigInt(255);
export const BIGINT_256 = BigInt(256);

export const TWO_POW256 = BIGINT_2 ** BIGINT_256;

/** 2^256-1 */
export const MAX_INTEGER_BIGINT = TWO_POW256 - BIGINT_1;

/** 2^64-1 */
export const MAX_UINT64 = (BIGINT_1 << BIGINT_64) - BIGINT_1;

export const MAX_NUM = BigInt(Number.MAX_SAFE_INTEGER);

export function mod(a: bigint, b: bigint) {
    let r = a % b;
    if (r < BIGINT_0) {
        r = b + r;
    }
    return r;
}

/** Reads a word as a two's complement signed integer */
export function fromTwos(a: bigint) {
    return BigInt.asIntN(256, a);
}

export function toTwos(a: bigint) {
    return BigInt.asUintN(256, a);
}

/** Square-and-multiply, modulo 2^256 */
export function exponentiation(base: bigint, exp: bigint) {
    let t = BIGINT_1;
    while (exp > BIGINT_0) {
        if (exp & BIGINT_1) {
            t = (t * base) % TWO_POW256;
        }
        base = (base * base) % TWO_POW256;
        exp >>= BIGINT_1;
    }
    return t;
}

/** Modular exponentiation with an arbitrary modulus (used by the modexp precompile) */
export function modPow(base: bigint, exp: bigint, modulus: bigint) {
    if (modulus === BIGINT_1) {
        return BIGINT_0;
    }
    let t = BIGINT_1;
    base %= modulus;
    while (exp > BIGINT_0) {
        if (exp & BIGINT_1) {
            t = (t * base) % modulus;
        }
        base = (base * base) % modulus;
        exp >>= BIGINT_1;
    }
    return t;
}

/** Number of 32 bytes words needed to hold the given byte count */
export function toWordCount(bytes: bigint) {
    return (bytes + BIGINT_31) / BIGINT_32;
}

export function minBigInt(a: bigint, b: bigint) {
    return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint) {
    return a > b ? a : b;
}
