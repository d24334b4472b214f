import { Map as ImMap } from 'immutable';
import { Address, HexString, IHost } from './interfaces';
import { keys } from './host';
import { bytesToBigInt, bytesToHex, hexToBytes, toBytes32, uintToBytes } from './bytes';
import { BIGINT_0, BIGINT_1 } from './arithmetic';
import { ERROR, trap } from './errors';
import { checkedAdd, checkedSub, Wei } from './wei';
import { debugState } from './logger';
import { to0xAddress } from './utils';

/** Pending writes, keyed by hex-encoded host key. `null` marks a removal */
type Writes = ImMap<HexString, Uint8Array | null>;

interface Overlay {
    readonly id: number;
    writes: Writes;
}

export type OverlayHandle = number;

export interface StateDiffEntry {
    readonly key: HexString;
    /** null when the key is removed */
    readonly value: HexString | null;
}

const EMPTY_BYTES = new Uint8Array(0);

/**
 * Transactional view of the EVM world state over the host key-value store.
 *
 * Every frame opens an overlay. Overlays nest: a child starts from its parent's view,
 * so it sees writes-in-progress of the frames above it. Committing a child makes its
 * view the parent's; committing the root overlay flushes everything to the host in one pass.
 * Discarding never touches the host.
 */
export class StateAdapter {
    private overlays: Overlay[] = [];
    private nextId = 1;

    constructor(readonly host: IHost) {}

    get depth(): number {
        return this.overlays.length;
    }

    // ========== overlays

    beginOverlay(): OverlayHandle {
        const parent = this.overlays[this.overlays.length - 1];
        const overlay: Overlay = {
            id: this.nextId++,
            writes: parent?.writes ?? ImMap<HexString, Uint8Array | null>(),
        };
        this.overlays.push(overlay);
        return overlay.id;
    }

    commit(handle: OverlayHandle) {
        const overlay = this.innermost(handle);
        this.overlays.pop();
        const parent = this.overlays[this.overlays.length - 1];
        if (parent) {
            parent.writes = overlay.writes;
            return;
        }
        this.flush(overlay.writes);
    }

    discard(handle: OverlayHandle) {
        this.innermost(handle);
        this.overlays.pop();
    }

    /** Drops the given overlay and every overlay opened above it */
    rollback(handle: OverlayHandle) {
        const index = this.overlays.findIndex(o => o.id === handle);
        if (index < 0) {
            throw new Error(`Overlay #${handle} is not open`);
        }
        this.overlays.length = index;
    }

    /** Writes that the given (innermost) overlay would flush, sorted by key */
    diff(handle: OverlayHandle): StateDiffEntry[] {
        const overlay = this.innermost(handle);
        const base = this.overlays.length > 1 ? this.overlays[this.overlays.length - 2].writes : null;
        return [...overlay.writes.entries()]
            .filter(([k, v]) => !base || base.get(k) !== v)
            .map(([key, value]) => ({ key, value: value && bytesToHex(value) }))
            .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    }

    private innermost(handle: OverlayHandle): Overlay {
        const top = this.overlays[this.overlays.length - 1];
        if (!top || top.id !== handle) {
            throw new Error(`Overlay #${handle} is not the innermost open overlay`);
        }
        return top;
    }

    private flush(writes: Writes) {
        // sorted, so that the host always sees the same sequence of operations
        const sorted = [...writes.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        for (const [key, value] of sorted) {
            if (value) {
                this.host.write(hexToBytes(key), value);
            } else {
                this.host.remove(hexToBytes(key));
            }
        }
        debugState(`flushed ${sorted.length} writes to host`);
    }

    // ========== raw access

    readRaw(key: Uint8Array): Uint8Array | null {
        const top = this.overlays[this.overlays.length - 1];
        if (top) {
            const hex = bytesToHex(key);
            if (top.writes.has(hex)) {
                return top.writes.get(hex) ?? null;
            }
        }
        return this.host.read(key);
    }

    writeRaw(key: Uint8Array, value: Uint8Array | null) {
        const top = this.overlays[this.overlays.length - 1];
        if (!top) {
            throw new Error('Cannot write state outside of an overlay');
        }
        top.writes = top.writes.set(bytesToHex(key), value && value.length ? value.slice() : null);
    }

    private readUint(key: Uint8Array): bigint {
        const raw = this.readRaw(key);
        return raw ? bytesToBigInt(raw) : BIGINT_0;
    }

    private writeUint(key: Uint8Array, value: bigint) {
        this.writeRaw(key, value === BIGINT_0 ? null : toBytes32(value));
    }

    // ========== accounts

    getNonce(address: Address): bigint {
        return this.readUint(keys.nonce(address));
    }

    setNonce(address: Address, nonce: bigint) {
        this.writeUint(keys.nonce(address), nonce);
    }

    incrementNonce(address: Address): bigint {
        const nonce = this.getNonce(address) + BIGINT_1;
        this.setNonce(address, nonce);
        return nonce;
    }

    getBalance(address: Address): Wei {
        return this.readUint(keys.balance(address));
    }

    setBalance(address: Address, balance: Wei) {
        if (balance < BIGINT_0) {
            throw new Error('Balance cannot be negative');
        }
        this.writeUint(keys.balance(address), balance);
    }

    addBalance(address: Address, value: Wei) {
        const balance = checkedAdd(this.getBalance(address), value);
        if (balance === null) {
            trap(ERROR.VALUE_OVERFLOW, `balance of ${to0xAddress(address)}`);
        }
        this.setBalance(address, balance);
    }

    subBalance(address: Address, value: Wei) {
        const balance = checkedSub(this.getBalance(address), value);
        if (balance === null) {
            trap(ERROR.INSUFFICIENT_BALANCE, `${to0xAddress(address)} cannot spend ${value}`);
        }
        this.setBalance(address, balance);
    }

    transfer(from: Address, to: Address, value: Wei) {
        if (value === BIGINT_0) {
            return;
        }
        this.subBalance(from, value);
        this.addBalance(to, value);
    }

    getCode(address: Address): Uint8Array {
        return this.readRaw(keys.code(address)) ?? EMPTY_BYTES;
    }

    setCode(address: Address, code: Uint8Array) {
        this.writeRaw(keys.code(address), code);
    }

    /** EIP-161 emptiness: no nonce, no balance, no code */
    isEmpty(address: Address): boolean {
        return this.getNonce(address) === BIGINT_0 && this.getBalance(address) === BIGINT_0 && this.getCode(address).length === 0;
    }

    /**
     * Removes an account. Its storage is not enumerated: the account generation is bumped,
     * which makes every slot of the previous generation unreachable.
     */
    destroyAccount(address: Address) {
        this.setNonce(address, BIGINT_0);
        this.setBalance(address, BIGINT_0);
        this.setCode(address, EMPTY_BYTES);
        this.writeRaw(keys.generation(address), uintToBytes(this.getGeneration(address) + 1, 4));
    }

    getGeneration(address: Address): number {
        return Number(this.readUint(keys.generation(address)));
    }

    // ========== storage

    getStorage(address: Address, slot: bigint): bigint {
        return this.readUint(keys.storage(address, this.getGeneration(address), slot));
    }

    /** Value of the slot before the current top-level invocation started */
    getOriginalStorage(address: Address, slot: bigint): bigint {
        const raw = this.host.read(keys.storage(address, this.getGeneration(address), slot));
        return raw ? bytesToBigInt(raw) : BIGINT_0;
    }

    /** Writing zero removes the slot (recorded as a removal, not as "untouched") */
    setStorage(address: Address, slot: bigint, value: bigint) {
        this.writeUint(keys.storage(address, this.getGeneration(address), slot), value);
    }

    // ========== engine metadata

    getConfig(name: string): Uint8Array | null {
        return this.readRaw(keys.config(name));
    }

    setConfig(name: string, value: Uint8Array) {
        this.writeRaw(keys.config(name), value);
    }
}
