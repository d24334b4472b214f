import { Map as ImMap } from 'immutable';
import { Address, IHost } from './interfaces';
import { bytesToHex, concatBytes, toBytes32, uintToBytes } from './bytes';
import { utf8ToBytes } from 'ethereum-cryptography/utils.js';

/** Bumped whenever the key layout changes */
export const KEY_VERSION = 0x01;

export enum KeyPrefix {
    Config = 0x0,
    Nonce = 0x1,
    Balance = 0x2,
    Code = 0x3,
    Storage = 0x4,
    Generation = 0x5,
    Upgrade = 0x6,
    BlockOverride = 0x7,
    UsedProof = 0x8,
}

function addressBytes(address: Address): Uint8Array {
    return uintToBytes(address, 20);
}

export const keys = {
    config: (name: string) => concatBytes(new Uint8Array([KEY_VERSION, KeyPrefix.Config]), utf8ToBytes(name)),
    nonce: (address: Address) => concatBytes(new Uint8Array([KEY_VERSION, KeyPrefix.Nonce]), addressBytes(address)),
    balance: (address: Address) => concatBytes(new Uint8Array([KEY_VERSION, KeyPrefix.Balance]), addressBytes(address)),
    code: (address: Address) => concatBytes(new Uint8Array([KEY_VERSION, KeyPrefix.Code]), addressBytes(address)),
    generation: (address: Address) => concatBytes(new Uint8Array([KEY_VERSION, KeyPrefix.Generation]), addressBytes(address)),
    storage: (address: Address, generation: number, slot: bigint) =>
        concatBytes(
            new Uint8Array([KEY_VERSION, KeyPrefix.Storage]),
            addressBytes(address),
            uintToBytes(generation, 4),
            toBytes32(slot),
        ),
    upgrade: (name: 'code' | 'index') => concatBytes(new Uint8Array([KEY_VERSION, KeyPrefix.Upgrade]), utf8ToBytes(name)),
    blockOverride: () => new Uint8Array([KEY_VERSION, KeyPrefix.BlockOverride]),
    usedProof: (key: Uint8Array) => concatBytes(new Uint8Array([KEY_VERSION, KeyPrefix.UsedProof]), key),
};

export interface MemoryHostOpts {
    currentAccountId?: string;
    predecessorAccountId?: string;
    blockIndex?: bigint;
    blockTimestamp?: bigint;
}

/**
 * In-process host: a plain map as key-value store, and settable block/caller context.
 * Used by tests and local tooling.
 */
export class MemoryHost implements IHost {
    private store = ImMap<string, Uint8Array>();
    private _blockIndex: bigint;
    private _timestamp: bigint;
    currentAccount: string;
    predecessor: string;
    /** Code handed to `deploySelf`, if any */
    deployedCode: Uint8Array | null = null;
    /** Number of write/remove operations received */
    writeCount = 0;

    constructor(opts?: MemoryHostOpts) {
        this.currentAccount = opts?.currentAccountId ?? 'evm.host';
        this.predecessor = opts?.predecessorAccountId ?? 'alice.host';
        this._blockIndex = opts?.blockIndex ?? BigInt(1);
        this._timestamp = opts?.blockTimestamp ?? BigInt(1_700_000_000);
    }

    read(key: Uint8Array): Uint8Array | null {
        return this.store.get(bytesToHex(key))?.slice() ?? null;
    }

    write(key: Uint8Array, value: Uint8Array): void {
        this.writeCount++;
        this.store = this.store.set(bytesToHex(key), value.slice());
    }

    remove(key: Uint8Array): void {
        this.writeCount++;
        this.store = this.store.delete(bytesToHex(key));
    }

    blockIndex(): bigint {
        return this._blockIndex;
    }

    blockTimestamp(): bigint {
        return this._timestamp;
    }

    predecessorAccountId(): string {
        return this.predecessor;
    }

    currentAccountId(): string {
        return this.currentAccount;
    }

    deploySelf(code: Uint8Array): void {
        this.deployedCode = code.slice();
    }

    /** Moves to a later block (1 second per block) */
    advanceBlocks(count: number) {
        this._blockIndex += BigInt(count);
        this._timestamp += BigInt(count);
        return this;
    }

    /** Switches the host account calling the engine */
    as(predecessor: string) {
        this.predecessor = predecessor;
        return this;
    }

    get size(): number {
        return this.store.size;
    }

    /** Copy of the whole store (for before/after comparisons) */
    snapshot(): ReadonlyMap<string, string> {
        return new Map([...this.store.entries()].map(([k, v]) => [k, bytesToHex(v)]));
    }

    has(key: Uint8Array) {
        return this.store.has(bytesToHex(key));
    }
}
