import { Map as ImMap } from 'immutable';
import { keccak256 } from 'ethereum-cryptography/keccak.js';
import { sha256 } from 'ethereum-cryptography/sha256.js';
import { ripemd160 } from 'ethereum-cryptography/ripemd160.js';
import { secp256k1 } from 'ethereum-cryptography/secp256k1.js';
import { utf8ToBytes } from 'ethereum-cryptography/utils.js';
import { utils } from 'ethers';
import { Buffer } from 'buffer';
import { Address, Log } from './interfaces';
import { StateAdapter } from './state';
import { MemReader } from './mem-reader';
import { BIGINT_0, BIGINT_1, BIGINT_8, maxBigInt, MAX_NUM, modPow, toWordCount } from './arithmetic';
import { bigIntToBytes, bytesToBigInt, concatBytes, setLengthLeft } from './bytes';
import { ERROR, trap } from './errors';
import { hostAccountToAddress, isValidHostAccountId, toAddress } from './utils';
import { debugPrecompile } from './logger';

export interface PrecompileContext {
    readonly caller: Address;
    /** Address the precompile is called at */
    readonly address: Address;
    /** Value transferred to the precompile (already credited to its balance) */
    readonly value: bigint;
    readonly isStatic: boolean;
    readonly state: StateAdapter;
    readonly predecessorAccountId: string;
    readonly currentAccountId: string;
    /** Host account bridging value out of the engine ('' when none is configured) */
    readonly bridgeProvider: string;
    emitLog(log: Log): void;
}

/**
 * A built-in contract: runs instead of bytecode when its address is called.
 * `run` may throw an EvmError (typically PRECOMPILE_INPUT) to fail the call.
 */
export interface Precompile {
    readonly name: string;
    gas(input: Uint8Array): bigint;
    run(input: Uint8Array, ctx: PrecompileContext): Uint8Array;
}

/** Address of a host-specific precompile: last 20 bytes of keccak256(name) */
export function precompileAddress(name: string): Address {
    return hostAccountToAddress(name);
}

export const PRECOMPILES = {
    ecrecover: BigInt(1),
    sha256: BigInt(2),
    ripemd160: BigInt(3),
    identity: BigInt(4),
    modexp: BigInt(5),
    exitToHost: precompileAddress('exitToHost'),
    predecessorAccountId: precompileAddress('predecessorAccountId'),
    currentAccountId: precompileAddress('currentAccountId'),
};

function linearGas(base: bigint, perWord: bigint) {
    return (input: Uint8Array) => base + perWord * toWordCount(BigInt(input.length));
}

// ========== standard precompiles

const ecrecover: Precompile = {
    name: 'ecrecover',
    gas: () => BigInt(3000),
    run: input => {
        const data = new MemReader(input);
        const hash = data.slice(0, 32);
        const v = data.get(32);
        const r = data.slice(64, 32);
        const s = data.slice(96, 32);
        if (v !== BigInt(27) && v !== BigInt(28)) {
            return new Uint8Array(0);
        }
        let publicKey: Uint8Array;
        try {
            publicKey = secp256k1.Signature.fromCompact(concatBytes(r, s))
                .addRecoveryBit(Number(v - BigInt(27)))
                .recoverPublicKey(hash)
                .toRawBytes(false);
        } catch (e) {
            // an unrecoverable signature is not a failure: the precompile returns nothing
            debugPrecompile(`ecrecover: ${e instanceof Error ? e.message : String(e)}`);
            return new Uint8Array(0);
        }
        return setLengthLeft(keccak256(publicKey.subarray(1)).subarray(12), 32);
    },
};

const sha256Precompile: Precompile = {
    name: 'sha256',
    gas: linearGas(BigInt(60), BigInt(12)),
    run: input => sha256(input),
};

const ripemd160Precompile: Precompile = {
    name: 'ripemd160',
    gas: linearGas(BigInt(600), BigInt(120)),
    run: input => setLengthLeft(ripemd160(input), 32),
};

const identity: Precompile = {
    name: 'identity',
    gas: linearGas(BigInt(15), BigInt(3)),
    run: input => input.slice(),
};

interface ModexpArgs {
    baseLen: bigint;
    expLen: bigint;
    modLen: bigint;
    data: MemReader;
}

function modexpArgs(input: Uint8Array): ModexpArgs {
    const data = new MemReader(input);
    return { baseLen: data.get(0), expLen: data.get(32), modLen: data.get(64), data };
}

/** Reads `len` bytes at `offset` of the modexp input, as a number (lengths are checked by the gas cost first) */
function readModexpNumber(data: MemReader, offset: bigint, len: bigint): bigint {
    if (len === BIGINT_0 || offset > MAX_NUM) {
        return BIGINT_0;
    }
    return bytesToBigInt(data.slice(Number(offset), Number(len)));
}

const modexp: Precompile = {
    name: 'modexp',
    // EIP-2565
    gas: input => {
        const { baseLen, expLen, modLen, data } = modexpArgs(input);
        const words = (maxBigInt(baseLen, modLen) + BigInt(7)) / BIGINT_8;
        const multiplicationComplexity = words * words;

        const headLen = expLen > BigInt(32) ? BigInt(32) : expLen;
        const expHead = readModexpNumber(data, BigInt(96) + baseLen, headLen);
        const headBits = BigInt(expHead === BIGINT_0 ? 0 : expHead.toString(2).length);
        let iterations = BIGINT_0;
        if (expLen <= BigInt(32)) {
            iterations = headBits === BIGINT_0 ? BIGINT_0 : headBits - BIGINT_1;
        } else {
            iterations = BIGINT_8 * (expLen - BigInt(32)) + maxBigInt(headBits - BIGINT_1, BIGINT_0);
        }
        iterations = maxBigInt(iterations, BIGINT_1);
        return maxBigInt(BigInt(200), (multiplicationComplexity * iterations) / BigInt(3));
    },
    run: input => {
        const { baseLen, expLen, modLen, data } = modexpArgs(input);
        if (modLen === BIGINT_0) {
            return new Uint8Array(0);
        }
        const base = readModexpNumber(data, BigInt(96), baseLen);
        const exp = readModexpNumber(data, BigInt(96) + baseLen, expLen);
        const modulus = readModexpNumber(data, BigInt(96) + baseLen + expLen, modLen);
        const result = modulus === BIGINT_0 ? BIGINT_0 : modPow(base, exp, modulus);
        return setLengthLeft(bigIntToBytes(result), Number(modLen));
    },
};

// ========== host-specific precompiles

export const EXIT_TO_HOST_TOPIC = BigInt(utils.id('ExitToHost(address,uint256,string)'));

/**
 * Moves the attached value out of the engine, to a host account.
 * The value is burnt from the precompile balance, and an ExitToHost log tells the bridge provider
 * which host account is to be credited.
 */
const exitToHost: Precompile = {
    name: 'exitToHost',
    gas: () => BigInt(10_000),
    run: (input, ctx) => {
        if (ctx.address !== PRECOMPILES.exitToHost) {
            trap(ERROR.PRECOMPILE_INPUT, 'exitToHost must be called directly');
        }
        if (ctx.isStatic) {
            trap(ERROR.WRITE_PROTECTION, 'exitToHost in static context');
        }
        if (!ctx.bridgeProvider) {
            trap(ERROR.PRECOMPILE_INPUT, 'no bridge provider configured');
        }
        if (ctx.value === BIGINT_0) {
            trap(ERROR.PRECOMPILE_INPUT, 'nothing to exit');
        }
        const recipient = Buffer.from(input).toString('utf-8');
        if (!isValidHostAccountId(recipient)) {
            trap(ERROR.PRECOMPILE_INPUT, `invalid recipient "${recipient}"`);
        }
        ctx.state.subBalance(ctx.address, ctx.value);
        ctx.emitLog({
            address: ctx.address,
            topics: [EXIT_TO_HOST_TOPIC, ctx.caller],
            data: utils.arrayify(utils.defaultAbiCoder.encode(['uint256', 'string'], [ctx.value, recipient])),
        });
        debugPrecompile(`exit of ${ctx.value} wei to ${recipient} (via ${ctx.bridgeProvider})`);
        return new Uint8Array(0);
    },
};

const predecessorAccountId: Precompile = {
    name: 'predecessorAccountId',
    gas: () => BigInt(100),
    run: (_, ctx) => utf8ToBytes(ctx.predecessorAccountId),
};

const currentAccountId: Precompile = {
    name: 'currentAccountId',
    gas: () => BigInt(100),
    run: (_, ctx) => utf8ToBytes(ctx.currentAccountId),
};

/**
 * Table of the built-in contracts known by an engine deployment.
 * Immutable: `register` returns a new registry.
 */
export class PrecompileRegistry {
    constructor(private readonly table = ImMap<Address, Precompile>()) {}

    static standard(): PrecompileRegistry {
        return new PrecompileRegistry()
            .register(PRECOMPILES.ecrecover, ecrecover)
            .register(PRECOMPILES.sha256, sha256Precompile)
            .register(PRECOMPILES.ripemd160, ripemd160Precompile)
            .register(PRECOMPILES.identity, identity)
            .register(PRECOMPILES.modexp, modexp)
            .register(PRECOMPILES.exitToHost, exitToHost)
            .register(PRECOMPILES.predecessorAccountId, predecessorAccountId)
            .register(PRECOMPILES.currentAccountId, currentAccountId);
    }

    register(address: Address, precompile: Precompile): PrecompileRegistry {
        return new PrecompileRegistry(this.table.set(toAddress(address), precompile));
    }

    unregister(address: Address): PrecompileRegistry {
        return new PrecompileRegistry(this.table.delete(toAddress(address)));
    }

    get(address: Address): Precompile | undefined {
        return this.table.get(address);
    }

    has(address: Address): boolean {
        return this.table.has(address);
    }

    addresses(): Address[] {
        return [...this.table.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    }
}
