import { MemReader } from './mem-reader';
import { toBytes32 } from './bytes';

const PAGE = 4096;

/**
 * Linear memory of a frame.
 * Grows word by word: the gas for a growth is billed by the executor (see `memoryExpansionCost`)
 * before `resize` is called.
 */
export class Memory extends MemReader {
    private _size = 0;

    constructor() {
        super(new Uint8Array(0));
    }

    get size(): number {
        return this._size;
    }

    get wordCount(): number {
        return this._size / 32;
    }

    set(index: number, byte: number) {
        if (byte < 0 || byte > 255) {
            throw new Error('Wrong byte value ' + byte);
        }
        this.resize(index + 1);
        this.mem[index] = byte;
    }

    write(index: number, data: Uint8Array) {
        if (!data.length) {
            return;
        }
        this.resize(index + data.length);
        this.mem.set(data, index);
    }

    setUint256(index: number, value: bigint) {
        this.write(index, toBytes32(value));
    }

    resize(_toSize: number) {
        // only grow word by word
        const rem = _toSize % 32;
        const toSize = rem ? _toSize - rem + 32 : _toSize;
        if (this._size >= toSize) {
            return;
        }
        if (this.mem.length < toSize) {
            const grown = new Uint8Array(Math.ceil(Math.max(toSize, this.mem.length * 2) / PAGE) * PAGE);
            grown.set(this.mem.subarray(0, this._size), 0);
            this.mem = grown;
        }
        this._size = toSize;
    }

    slice(offset: number, size: number): Uint8Array {
        const ret = new Uint8Array(size);
        if (offset < this._size) {
            ret.set(this.mem.subarray(offset, Math.min(offset + size, this._size)), 0);
        }
        return ret;
    }

}
