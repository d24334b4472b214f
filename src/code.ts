import { CompiledCode } from './interfaces';
import { MemReader } from './mem-reader';
import { shaOf } from './utils';

const OP_JUMPDEST = 0x5b;
const OP_PUSH1 = 0x60;
const OP_PUSH32 = 0x7f;

const cache = new Map<bigint, CompiledCode>();
const MAX_CACHED = 512;

/**
 * Analyzes contract code once: finds the valid jump destinations
 * (JUMPDEST opcodes that are not inside PUSH data).
 *
 * Results are cached by code hash, since the same code is typically called many times.
 */
export function compileCode(contractCode: Uint8Array): CompiledCode {
    const hash = shaOf(contractCode);
    const cached = cache.get(hash);
    if (cached) {
        return cached;
    }

    const jumpdests = new Uint8Array(contractCode.length);
    for (let i = 0; i < contractCode.length; i++) {
        const opcode = contractCode[i];
        if (opcode >= OP_PUSH1 && opcode <= OP_PUSH32) {
            // skip push data
            i += opcode - OP_PUSH1 + 1;
        } else if (opcode === OP_JUMPDEST) {
            jumpdests[i] = 1;
        }
    }

    const compiled: CompiledCode = {
        code: new MemReader(contractCode.slice()),
        jumpdests,
        hash,
    };
    if (cache.size >= MAX_CACHED) {
        // evict the oldest entry (Map preserves insertion order)
        const first = cache.keys().next();
        if (!first.done) {
            cache.delete(first.value);
        }
    }
    cache.set(hash, compiled);
    return compiled;
}

export function isValidJump(code: CompiledCode, dest: bigint): boolean {
    return dest < BigInt(code.jumpdests.length) && code.jumpdests[Number(dest)] === 1;
}
