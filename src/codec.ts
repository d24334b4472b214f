import { BigNumber, utils } from 'ethers';
import { Address, ExecutionOutcome, Log } from './interfaces';
import { MetaCallArgs } from './meta-call';
import { DepositProof, DepositReceipt } from './deposit';
import { EngineError, errorCode } from './errors';
import { bytesToHex, toBytes32 } from './bytes';
import { to0xAddress, toAddress } from './utils';

/** ABI argument types of the entry points that take structured input */
export const ARGS = {
    new: ['string', 'uint256', 'string', 'uint64'],
    call: ['address', 'uint256', 'bytes', 'uint64'],
    meta_call: ['address', 'uint256', 'uint256', 'address', 'address', 'uint256', 'bytes', 'uint256', 'address', 'bytes'],
    view: ['address', 'address', 'uint256', 'bytes'],
    get_storage_at: ['address', 'bytes32'],
    begin_chain: ['uint256', 'tuple(address,uint256)[]'],
    begin_block: ['uint64', 'uint64', 'address', 'uint256', 'uint64'],
    deposit: ['bytes', 'uint64', 'uint64', 'bytes32'],
} as const;

const DEPOSIT_RECEIPT = ['address', 'uint256', 'address', 'uint256'];

const OUTCOME = ['uint8', 'uint8', 'uint64', 'bytes', 'tuple(address,bytes32[],bytes)[]'];

export interface NewArgs {
    readonly owner: string;
    readonly chainId: bigint;
    readonly bridgeProvider: string;
    /** 0 means "the configured default" */
    readonly upgradeDelayBlocks: bigint;
}

export interface CallArgs {
    readonly contract: Address;
    readonly value: bigint;
    readonly input: Uint8Array;
    /** 0 means "the configured default" */
    readonly gasLimit: bigint;
}

export interface ViewArgs {
    readonly sender: Address;
    readonly contract: Address;
    readonly value: bigint;
    readonly input: Uint8Array;
}

export interface GenesisAccount {
    readonly address: Address;
    readonly balance: bigint;
}

export interface BlockOverride {
    readonly number: bigint;
    readonly timestamp: bigint;
    readonly coinbase: Address;
    readonly prevRandao: bigint;
    readonly gasLimit: bigint;
}

/** An outcome read back from its boundary encoding */
export interface DecodedOutcome {
    readonly status: number;
    /** 0 when the outcome is not an error */
    readonly error: number;
    readonly gasUsed: bigint;
    readonly returnData: Uint8Array;
    readonly logs: readonly Log[];
}

// ========== narrowing of decoded values

function fail(what: string): never {
    throw new EngineError('ERR_DESERIALIZE', what);
}

function asBigInt(value: unknown): bigint {
    if (!BigNumber.isBigNumber(value)) {
        fail('expected a number');
    }
    return value.toBigInt();
}

function asNumber(value: unknown): number {
    if (typeof value === 'number') {
        return value;
    }
    return Number(asBigInt(value));
}

function asString(value: unknown): string {
    if (typeof value !== 'string') {
        fail('expected a string');
    }
    return value;
}

function asBytes(value: unknown): Uint8Array {
    return utils.arrayify(asString(value));
}

function asAddress(value: unknown): Address {
    return toAddress(asString(value));
}

function asArray(value: unknown): readonly unknown[] {
    if (!Array.isArray(value)) {
        fail('expected an array');
    }
    return value;
}

function decodeAs(types: readonly string[], data: Uint8Array, what: string): readonly unknown[] {
    try {
        return utils.defaultAbiCoder.decode(types, data);
    } catch (e) {
        fail(`cannot decode ${what}: ${e instanceof Error ? e.message : String(e)}`);
    }
}

function decode(method: keyof typeof ARGS, data: Uint8Array): readonly unknown[] {
    return decodeAs(ARGS[method], data, `${method} arguments`);
}

// ========== entry point arguments

export function decodeNewArgs(data: Uint8Array): NewArgs {
    const [owner, chainId, bridgeProvider, upgradeDelayBlocks] = decode('new', data);
    return {
        owner: asString(owner),
        chainId: asBigInt(chainId),
        bridgeProvider: asString(bridgeProvider),
        upgradeDelayBlocks: asBigInt(upgradeDelayBlocks),
    };
}

export function decodeCallArgs(data: Uint8Array): CallArgs {
    const [contract, value, input, gasLimit] = decode('call', data);
    return { contract: asAddress(contract), value: asBigInt(value), input: asBytes(input), gasLimit: asBigInt(gasLimit) };
}

export function decodeMetaCallArgs(data: Uint8Array): MetaCallArgs {
    const [sender, nonce, feeAmount, feeAddress, contract, value, input, chainId, verifyingContract, signature] = decode('meta_call', data);
    return {
        sender: asAddress(sender),
        nonce: asBigInt(nonce),
        feeAmount: asBigInt(feeAmount),
        feeAddress: asAddress(feeAddress),
        contract: asAddress(contract),
        value: asBigInt(value),
        input: asBytes(input),
        chainId: asBigInt(chainId),
        verifyingContract: asAddress(verifyingContract),
        signature: asBytes(signature),
    };
}

export function decodeViewArgs(data: Uint8Array): ViewArgs {
    const [sender, contract, value, input] = decode('view', data);
    return { sender: asAddress(sender), contract: asAddress(contract), value: asBigInt(value), input: asBytes(input) };
}

export function decodeStorageAtArgs(data: Uint8Array): { address: Address; slot: bigint } {
    const [address, slot] = decode('get_storage_at', data);
    return { address: asAddress(address), slot: BigInt(asString(slot)) };
}

export function decodeBeginChainArgs(data: Uint8Array): { chainId: bigint; genesis: GenesisAccount[] } {
    const [chainId, alloc] = decode('begin_chain', data);
    return {
        chainId: asBigInt(chainId),
        genesis: asArray(alloc).map(entry => {
            const [address, balance] = asArray(entry);
            return { address: asAddress(address), balance: asBigInt(balance) };
        }),
    };
}

export function decodeBeginBlockArgs(data: Uint8Array): BlockOverride {
    const [number, timestamp, coinbase, prevRandao, gasLimit] = decode('begin_block', data);
    return {
        number: asBigInt(number),
        timestamp: asBigInt(timestamp),
        coinbase: asAddress(coinbase),
        prevRandao: asBigInt(prevRandao),
        gasLimit: asBigInt(gasLimit),
    };
}

export function decodeDepositArgs(data: Uint8Array): DepositProof {
    const [logEntry, logIndex, receiptIndex, blockHash] = decode('deposit', data);
    return {
        logEntry: asBytes(logEntry),
        logIndex: asBigInt(logIndex),
        receiptIndex: asBigInt(receiptIndex),
        blockHash: BigInt(asString(blockHash)),
    };
}

/** Accessors take the raw 20 address bytes */
export function decodeRawAddress(data: Uint8Array): Address {
    if (data.length !== 20) {
        fail(`expected a 20 bytes address, got ${data.length} bytes`);
    }
    return toAddress(data);
}

// ========== results

export function encodeUint(value: bigint, type: 'uint64' | 'uint256' = 'uint256'): Uint8Array {
    return utils.arrayify(utils.defaultAbiCoder.encode([type], [value]));
}

export function decodeUint(data: Uint8Array): bigint {
    return asBigInt(decodeAs(['uint256'], data, 'integer')[0]);
}

export function encodeOutcome(outcome: ExecutionOutcome): Uint8Array {
    return utils.arrayify(
        utils.defaultAbiCoder.encode(OUTCOME, [
            outcome.status,
            outcome.error ? errorCode(outcome.error) : 0,
            outcome.gasUsed,
            bytesToHex(outcome.returnData),
            outcome.logs.map(log => [to0xAddress(log.address), log.topics.map(t => bytesToHex(toBytes32(t))), bytesToHex(log.data)]),
        ]),
    );
}

export function encodeDepositReceipt(receipt: DepositReceipt): Uint8Array {
    return utils.arrayify(
        utils.defaultAbiCoder.encode(DEPOSIT_RECEIPT, [to0xAddress(receipt.recipient), receipt.credited, to0xAddress(receipt.feeRecipient), receipt.fee]),
    );
}

export function decodeDepositReceipt(data: Uint8Array): DepositReceipt {
    const [recipient, credited, feeRecipient, fee] = decodeAs(DEPOSIT_RECEIPT, data, 'deposit receipt');
    return { recipient: asAddress(recipient), credited: asBigInt(credited), feeRecipient: asAddress(feeRecipient), fee: asBigInt(fee) };
}

export function decodeOutcome(data: Uint8Array): DecodedOutcome {
    const [status, error, gasUsed, returnData, logs] = decodeAs(OUTCOME, data, 'outcome');
    return {
        status: asNumber(status),
        error: asNumber(error),
        gasUsed: asBigInt(gasUsed),
        returnData: asBytes(returnData),
        logs: asArray(logs).map(entry => {
            const [address, topics, logData] = asArray(entry);
            return {
                address: asAddress(address),
                topics: asArray(topics).map(t => BigInt(asString(t))),
                data: asBytes(logData),
            };
        }),
    };
}
