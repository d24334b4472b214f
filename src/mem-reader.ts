import { IMemReader } from './interfaces';
import { bytesToBigInt } from './bytes';

/** Read-only, zero-padded view over a byte buffer (calldata, returndata, code) */
export class MemReader implements IMemReader {
    constructor(protected mem: Uint8Array) {}

    get size(): number {
        return this.mem.length;
    }

    get(offset: number): bigint {
        return bytesToBigInt(this.slice(offset, 32));
    }

    getByte(offset: number): number {
        return this.mem[offset] ?? 0;
    }

    slice(offset: number, size: number): Uint8Array {
        const ret = new Uint8Array(size);
        if (offset < this.mem.length) {
            ret.set(this.mem.subarray(offset, Math.min(offset + size, this.mem.length)), 0);
        }
        return ret;
    }
}

export const EMPTY_READER: IMemReader = new MemReader(new Uint8Array(0));
