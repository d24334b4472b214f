import { HexString } from './interfaces';

const BIGINT_0 = BigInt(0);

// Caching this info speeds up bytesToHex() a lot
const hexByByte = Array.from({ length: 256 }, (v, i) => i.toString(16).padStart(2, '0'));

export const bytesToHex = (bytes: Uint8Array): HexString => {
    let hex = '';
    for (const byte of bytes) {
        hex += hexByByte[byte];
    }
    return `0x${hex}`;
};

/** Accepts an even-length hex string, with or without 0x prefix */
export const hexToBytes = (hex: string): Uint8Array => {
    if (hex.startsWith('0x')) {
        hex = hex.substring(2);
    }
    if (hex.length % 2 || !/^[0-9a-fA-F]*$/.test(hex)) {
        throw new Error(`Invalid hex string: ${hex}`);
    }
    const bytes = new Uint8Array(hex.length / 2);
    for (let i = 0; i < bytes.length; i++) {
        bytes[i] = parseInt(hex.substring(i * 2, i * 2 + 2), 16);
    }
    return bytes;
};

export const bytesToBigInt = (bytes: Uint8Array): bigint => {
    const hex = bytesToHex(bytes);
    if (hex === '0x') {
        return BIGINT_0;
    }
    return BigInt(hex);
};

/** Minimal big-endian encoding (empty array for zero) */
export const bigIntToBytes = (num: bigint): Uint8Array => {
    if (num === BIGINT_0) {
        return new Uint8Array(0);
    }
    let hex = num.toString(16);
    if (hex.length % 2) {
        hex = '0' + hex;
    }
    return hexToBytes(hex);
};

/** Left-pads (or left-truncates) the given bytes to the given length */
export const setLengthLeft = (msg: Uint8Array, length: number): Uint8Array => {
    if (msg.length >= length) {
        return msg.subarray(msg.length - length);
    }
    const ret = new Uint8Array(length);
    ret.set(msg, length - msg.length);
    return ret;
};

export function toBytes32(v: bigint | number): Uint8Array {
    return setLengthLeft(bigIntToBytes(BigInt(v)), 32);
}

export const concatBytes = (...arrays: Uint8Array[]): Uint8Array => {
    const length = arrays.reduce((a, arr) => a + arr.length, 0);
    const result = new Uint8Array(length);
    let offset = 0;
    for (const arr of arrays) {
        result.set(arr, offset);
        offset += arr.length;
    }
    return result;
};

/** Big-endian encoding on a fixed number of bytes (values that do not fit are truncated) */
export function uintToBytes(value: bigint | number, size: number): Uint8Array {
    return setLengthLeft(bigIntToBytes(BigInt.asUintN(size * 8, BigInt(value))), size);
}
