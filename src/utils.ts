import { keccak256 } from 'ethereum-cryptography/keccak.js';
import { utf8ToBytes } from 'ethereum-cryptography/utils.js';
import { Address, HexString } from './interfaces';
import { bytesToBigInt, concatBytes, hexToBytes, toBytes32, uintToBytes } from './bytes';

export const MAX_UINT = toUint('0xFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFF');

export type UIntSource = number | Uint8Array | HexString | string | bigint | number[];
export function toUint(buf: UIntSource): bigint {
    if (typeof buf === 'number') {
        return BigInt(buf);
    }
    if (typeof buf === 'bigint') {
        return buf;
    }
    if (typeof buf === 'string') {
        buf = parseBuffer(buf);
    }
    if (Array.isArray(buf)) {
        buf = new Uint8Array(buf);
    }
    return bytesToBigInt(buf);
}

const address_mask = (BigInt(1) << BigInt(160)) - BigInt(1);

export function toAddress(address: UIntSource): Address {
    return toUint(address) & address_mask;
}

export function to0xAddress(address: HexString | bigint): HexString {
    if (typeof address === 'string') {
        return address;
    }
    const ret = (address & address_mask).toString(16);
    return `0x${ret.padStart(40, '0')}`;
}

export function dumpU256(num: bigint): string {
    return num.toString(16);
}


export function shaOf(buffer: Uint8Array): bigint {
    return bytesToBigInt(keccak256(buffer));
}

const HOST_ACCOUNT_ID = /^(([a-z\d]+[-_])*[a-z\d]+\.)*([a-z\d]+[-_])*[a-z\d]+$/;

/** 2 to 64 chars: lowercase alphanumeric parts separated by single '-', '_' or '.' */
export function isValidHostAccountId(accountId: string): boolean {
    return accountId.length >= 2 && accountId.length <= 64 && HOST_ACCOUNT_ID.test(accountId);
}

/**
 * Maps a host account id to the EVM address that represents it:
 * the last 20 bytes of keccak256(accountId)
 */
export function hostAccountToAddress(accountId: string): Address {
    return toAddress(keccak256(utf8ToBytes(accountId)).subarray(12));
}

export function parseBuffer(data: HexString | string): Uint8Array {
    if (data.startsWith('0x')) {
        data = data.substring(2);
    }
    if (data.length % 2) {
        data = '0' + data;
    }
    return hexToBytes(data);
}

/**
 * Hash of a past block, as seen by BLOCKHASH.
 * The host exposes no block hashes: they are derived from the chain id, the engine account and the height.
 */
export function computeBlockHash(chainId: bigint, engineAccountId: string, number: bigint): bigint {
    return shaOf(concatBytes(new Uint8Array([0]), toBytes32(chainId), utf8ToBytes(engineAccountId), uintToBytes(number, 8)));
}
