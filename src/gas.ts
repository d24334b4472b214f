import { BIGINT_0, toWordCount } from './arithmetic';

/**
 * Gas schedule (Istanbul costs: EIP-1884 repricing, EIP-2200 SSTORE net metering).
 * Names follow the yellow paper G_* constants.
 */
export const cost = {
    zero: 0n,
    jumpDest: 1n,
    base: 2n,
    veryLow: 3n,
    low: 5n,
    mid: 8n,
    high: 10n,
    /** Gbalance, Gextcodehash */
    balance: 700n,
    extCode: 700n,
    sload: 800n,
    /** SSTORE when the slot is clean (original == current) and goes 0 -> non-zero */
    storageSet: 20_000n,
    storageReset: 5_000n,
    /** SSTORE on a dirty slot, or a no-op write */
    storageDirty: 800n,
    refundStorageClear: 15_000n,
    /** An SSTORE must fail when the remaining gas does not exceed the call stipend */
    sstoreSentry: 2_300n,
    selfDestruct: 5_000n,
    refundSelfDestruct: 24_000n,
    create: 32_000n,
    codeDeposit: 200n,
    call: 700n,
    callValue: 9_000n,
    callStipend: 2_300n,
    newAccount: 25_000n,
    exp: 10n,
    expByte: 50n,
    memory: 3n,
    quadCoeffDiv: 512n,
    txCreate: 32_000n,
    txDataZero: 4n,
    txDataNonZero: 16n,
    transaction: 21_000n,
    log: 375n,
    logData: 8n,
    logTopic: 375n,
    keccak256: 30n,
    keccak256Word: 6n,
    copy: 3n,
    blockHash: 20n,
} as const;

/** Maximum share of gas used that a refund can give back */
export const MAX_REFUND_QUOTIENT = 2n;

export const MAX_CODE_SIZE = 24_576;

/** Total cost of a memory holding the given number of words */
export function memoryCost(words: bigint): bigint {
    return cost.memory * words + (words * words) / cost.quadCoeffDiv;
}

/** Extra cost of growing memory from `currentWords` so that [offset, offset + size) fits */
export function memoryExpansionCost(currentWords: number, offset: bigint, size: bigint): { cost: bigint; words: bigint } {
    if (size === BIGINT_0) {
        return { cost: BIGINT_0, words: BigInt(currentWords) };
    }
    const words = toWordCount(offset + size);
    const current = BigInt(currentWords);
    if (words <= current) {
        return { cost: BIGINT_0, words: current };
    }
    return { cost: memoryCost(words) - memoryCost(current), words };
}

/** Cost of copying `size` bytes (CALLDATACOPY, CODECOPY, ...) */
export function copyCost(size: bigint): bigint {
    return cost.copy * toWordCount(size);
}

/**
 * EIP-2200 SSTORE pricing.
 * Returns the gas to charge and the refund counter delta (which can be negative).
 */
export function sstoreCost(original: bigint, current: bigint, value: bigint): { gas: bigint; refund: bigint } {
    if (current === value) {
        return { gas: cost.storageDirty, refund: BIGINT_0 };
    }
    if (original === current) {
        if (original === BIGINT_0) {
            return { gas: cost.storageSet, refund: BIGINT_0 };
        }
        return { gas: cost.storageReset, refund: value === BIGINT_0 ? cost.refundStorageClear : BIGINT_0 };
    }
    // dirty slot
    let refund = BIGINT_0;
    if (original !== BIGINT_0) {
        if (current === BIGINT_0) {
            refund -= cost.refundStorageClear;
        } else if (value === BIGINT_0) {
            refund += cost.refundStorageClear;
        }
    }
    if (original === value) {
        refund += original === BIGINT_0 ? cost.storageSet - cost.storageDirty : cost.storageReset - cost.storageDirty;
    }
    return { gas: cost.storageDirty, refund };
}

/** Gas charged before the first opcode of a top-level call runs */
export function intrinsicGas(data: Uint8Array, isCreation: boolean): bigint {
    let gas = cost.transaction;
    for (const b of data) {
        gas += b === 0 ? cost.txDataZero : cost.txDataNonZero;
    }
    if (isCreation) {
        gas += cost.txCreate;
    }
    return gas;
}

/** All but one 64th (EIP-150) */
export function maxCallGas(gasLeft: bigint): bigint {
    return gasLeft - gasLeft / 64n;
}
