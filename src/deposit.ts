import { BigNumber, utils } from 'ethers';
import { keccak256 } from 'ethereum-cryptography/keccak.js';
import { Address } from './interfaces';
import { StateAdapter } from './state';
import { keys } from './host';
import { EngineError, ERROR, EvmError } from './errors';
import { BIGINT_0 } from './arithmetic';
import { bytesToHex, concatBytes, toBytes32, uintToBytes } from './bytes';
import { hostAccountToAddress, isValidHostAccountId, to0xAddress, toAddress } from './utils';
import { Wei } from './wei';
import { debugBridge } from './logger';

export const DEPOSITED_EVENT = 'event Deposited(address indexed sender, string recipient, uint256 amount, uint256 fee)';

const DEPOSIT_EVENTS = new utils.Interface([DEPOSITED_EVENT]);

const MAX_U128 = (BigInt(1) << BigInt(128)) - BigInt(1);

/** A log of the bridged chain, as found in its receipts */
export interface LogEntry {
    readonly address: Address;
    readonly topics: readonly bigint[];
    readonly data: Uint8Array;
}

/**
 * Who a deposit is for, parsed from the event `recipient` field:
 * - `account` credits the address of a host account
 * - `relayer:0x<address>` credits an EVM address, the fee going to the relayer host account
 */
export type DepositRecipient =
    | { readonly type: 'host'; readonly accountId: string }
    | { readonly type: 'evm'; readonly relayerAccountId: string; readonly address: Address };

export interface DepositedEvent {
    /** Contract that emitted the event on the bridged chain */
    readonly custodian: Address;
    readonly sender: Address;
    readonly recipient: DepositRecipient;
    readonly amount: Wei;
    readonly fee: Wei;
}

/** A Deposited log, with the position that identifies it on the bridged chain */
export interface DepositProof {
    /** RLP of [address, topics, data] */
    readonly logEntry: Uint8Array;
    readonly logIndex: bigint;
    readonly receiptIndex: bigint;
    readonly blockHash: bigint;
}

export interface DepositReceipt {
    readonly recipient: Address;
    /** amount - fee */
    readonly credited: Wei;
    readonly feeRecipient: Address;
    readonly fee: Wei;
}

function rlpFailed(what: string): never {
    throw new EngineError('ERR_RLP_FAILED', what);
}

function asHexData(value: unknown, length?: number): string {
    if (typeof value !== 'string' || (length !== undefined && utils.hexDataLength(value) !== length)) {
        rlpFailed('unexpected log entry item');
    }
    return value;
}

export function decodeLogEntry(raw: Uint8Array): LogEntry {
    let decoded: unknown;
    try {
        decoded = utils.RLP.decode(raw);
    } catch (e) {
        rlpFailed(e instanceof Error ? e.message : String(e));
    }
    if (!Array.isArray(decoded) || decoded.length !== 3) {
        rlpFailed('a log entry is a list of 3 items');
    }
    const items: readonly unknown[] = decoded;
    const topics = items[1];
    if (!Array.isArray(topics)) {
        rlpFailed('log topics must be a list');
    }
    const topicList: readonly unknown[] = topics;
    return {
        address: toAddress(asHexData(items[0], 20)),
        topics: topicList.map(t => BigInt(asHexData(t, 32))),
        data: utils.arrayify(asHexData(items[2])),
    };
}

/** Accepts 40 hex chars, optionally 0x prefixed */
export function parseEthAddress(raw: string): Address {
    let hex = raw;
    if (raw.length === 42) {
        if (!raw.startsWith('0x')) {
            throw new EngineError('ERR_FAILED_DECODE_ETH_ADDRESS', raw);
        }
        hex = raw.substring(2);
    }
    if (hex.length % 2 || !/^[0-9a-fA-F]*$/.test(hex)) {
        throw new EngineError('ERR_FAILED_DECODE_ETH_ADDRESS', raw);
    }
    if (hex.length !== 40) {
        throw new EngineError('ERR_WRONG_ETH_ADDRESS_LENGTH', raw);
    }
    return toAddress(`0x${hex}`);
}

export function parseDepositRecipient(message: string): DepositRecipient {
    const parts = message.split(':');
    if (parts.length >= 3) {
        throw new EngineError('ERR_INVALID_EVENT_MESSAGE_FORMAT', message);
    }
    const [accountId] = parts;
    if (!isValidHostAccountId(accountId)) {
        throw new EngineError('ERR_INVALID_ACCOUNT_ID', accountId);
    }
    if (parts.length === 1) {
        return { type: 'host', accountId };
    }
    return { type: 'evm', relayerAccountId: accountId, address: parseEthAddress(parts[1]) };
}

function asU128(value: unknown, code: 'ERR_INVALID_AMOUNT' | 'ERR_INVALID_FEE'): Wei {
    if (!BigNumber.isBigNumber(value)) {
        throw new EngineError(code, 'not a number');
    }
    const n = value.toBigInt();
    if (n > MAX_U128) {
        throw new EngineError(code, `${n} does not fit in 128 bits`);
    }
    return n;
}

export function parseDepositedEvent(entry: LogEntry): DepositedEvent {
    let fields: readonly unknown[];
    try {
        const { args } = DEPOSIT_EVENTS.parseLog({
            topics: entry.topics.map(t => bytesToHex(toBytes32(t))),
            data: bytesToHex(entry.data),
        });
        fields = [args.sender, args.recipient, args.amount, args.fee];
    } catch (e) {
        throw new EngineError('ERR_PARSE_DEPOSIT_EVENT', e instanceof Error ? e.message : String(e));
    }
    const [sender, recipient, amount, fee] = fields;
    if (typeof sender !== 'string') {
        throw new EngineError('ERR_INVALID_SENDER', 'not an address');
    }
    if (typeof recipient !== 'string') {
        throw new EngineError('ERR_PARSE_DEPOSIT_EVENT', 'recipient is not a string');
    }
    return {
        custodian: entry.address,
        sender: toAddress(sender),
        recipient: parseDepositRecipient(recipient),
        amount: asU128(amount, 'ERR_INVALID_AMOUNT'),
        fee: asU128(fee, 'ERR_INVALID_FEE'),
    };
}

/** Key under which a processed deposit is remembered */
export function depositProofKey(proof: DepositProof): Uint8Array {
    return keccak256(concatBytes(toBytes32(proof.blockHash), uintToBytes(proof.receiptIndex, 8), uintToBytes(proof.logIndex, 8)));
}

/**
 * Inbound half of the bridge: mints the value locked on the bridged chain.
 * Proofs are checked by the bridge provider, the only account allowed to submit them.
 */
export class BridgeDeposits {
    constructor(
        private readonly state: StateAdapter,
        private readonly bridgeProvider: string,
        /** When set, only events emitted by this contract are accepted */
        private readonly custodian: Address | null,
    ) {}

    isUsed(proof: DepositProof): boolean {
        return this.state.readRaw(keys.usedProof(depositProofKey(proof))) !== null;
    }

    deposit(caller: string, proof: DepositProof): DepositReceipt {
        if (!this.bridgeProvider || caller !== this.bridgeProvider) {
            throw new EngineError('ERR_NOT_ALLOWED', `only the bridge provider can deposit (called by ${caller})`);
        }
        const event = parseDepositedEvent(decodeLogEntry(proof.logEntry));
        if (this.custodian !== null && event.custodian !== this.custodian) {
            throw new EngineError('ERR_WRONG_EVENT_ADDRESS', `event emitted by ${to0xAddress(event.custodian)}`);
        }
        if (event.fee > event.amount) {
            throw new EngineError('ERR_NOT_ENOUGH_BALANCE_FOR_FEE', `fee ${event.fee} exceeds amount ${event.amount}`);
        }
        if (this.isUsed(proof)) {
            throw new EngineError('ERR_PROOF_EXIST', 'deposit already processed');
        }

        const { recipient } = event;
        const receipt: DepositReceipt =
            recipient.type === 'host'
                ? {
                      recipient: hostAccountToAddress(recipient.accountId),
                      credited: event.amount - event.fee,
                      feeRecipient: hostAccountToAddress(caller),
                      fee: event.fee,
                  }
                : {
                      recipient: recipient.address,
                      credited: event.amount - event.fee,
                      feeRecipient: hostAccountToAddress(recipient.relayerAccountId),
                      fee: event.fee,
                  };

        this.state.writeRaw(keys.usedProof(depositProofKey(proof)), new Uint8Array([1]));
        this.credit(receipt.recipient, receipt.credited);
        if (receipt.fee > BIGINT_0) {
            this.credit(receipt.feeRecipient, receipt.fee);
        }
        debugBridge(`deposit of ${event.amount} from ${to0xAddress(event.sender)}: ${receipt.credited} to ${to0xAddress(receipt.recipient)}, fee ${receipt.fee}`);
        return receipt;
    }

    private credit(address: Address, value: Wei) {
        try {
            this.state.addBalance(address, value);
        } catch (e) {
            if (e instanceof EvmError && e.error === ERROR.VALUE_OVERFLOW) {
                throw new EngineError('ERR_BALANCE_OVERFLOW', `balance of ${to0xAddress(address)}`);
            }
            throw e;
        }
    }
}
