import { ERROR } from './errors';

export type HexString = `0x${string}`;

/** 160 bits address, held as a bigint (like every other word the VM handles) */
export type Address = bigint;

/** 256 bits unsigned word */
export type Word = bigint;

/**
 * What the host runtime provides to the engine.
 * Keys and values are opaque byte strings: the layout is owned by the state adapter.
 */
export interface IHost {
    read(key: Uint8Array): Uint8Array | null;
    write(key: Uint8Array, value: Uint8Array): void;
    remove(key: Uint8Array): void;
    /** Index of the block this invocation is executed in */
    blockIndex(): bigint;
    /** Block timestamp, in seconds */
    blockTimestamp(): bigint;
    /** Host account that invoked the engine */
    predecessorAccountId(): string;
    /** Host account the engine is deployed at */
    currentAccountId(): string;
    /** Replace the engine's own code (used by staged upgrades) */
    deploySelf(code: Uint8Array): void;
}

export interface IMemReader {
    readonly size: number;
    get(offset: number): bigint;
    getByte(offset: number): number;
    slice(offset: number, size: number): Uint8Array;
}

export interface CompiledCode {
    readonly code: IMemReader;
    /** One flag per byte, set on JUMPDEST opcodes that are not PUSH data */
    readonly jumpdests: Uint8Array;
    readonly hash: bigint;
}

export interface BlockContext {
    readonly number: bigint;
    readonly timestamp: bigint;
    readonly coinbase: Address;
    readonly prevRandao: bigint;
    readonly gasLimit: bigint;
    readonly baseFee: bigint;
    readonly chainId: bigint;
}

/** Shared by every frame of one top-level invocation */
export interface TxContext {
    readonly origin: Address;
    readonly gasPrice: bigint;
    readonly block: BlockContext;
    /** Host account id of the engine, used to derive block hashes */
    readonly engineAccountId: string;
}

export interface CallFrame {
    readonly caller: Address;
    /** Account whose storage & balance are used */
    readonly address: Address;
    /** Account whose code runs (differs from address on DELEGATECALL/CALLCODE) */
    readonly codeAddress: Address;
    readonly value: bigint;
    readonly input: Uint8Array;
    readonly gasLimit: bigint;
    readonly isStatic: boolean;
    readonly depth: number;
}

export type CallType = 'call' | 'callcode' | 'delegatecall' | 'staticcall' | 'create' | 'create2';

export interface Log {
    readonly address: Address;
    readonly topics: readonly Word[];
    readonly data: Uint8Array;
}

export enum Status {
    Success = 0,
    Revert = 1,
    Error = 2,
}

export interface ExecutionOutcome {
    readonly status: Status;
    /** Set when status is Error */
    readonly error?: ERROR;
    readonly returnData: Uint8Array;
    readonly gasUsed: bigint;
    readonly logs: readonly Log[];
    /** Address of the created contract (creations only, on success) */
    readonly createdAddress?: Address;
}

export function isSuccess(outcome: ExecutionOutcome) {
    return outcome.status === Status.Success;
}

export type StopReason =
    | { type: 'stop'; data?: null; gasLeft: bigint }
    | { type: 'return'; data: Uint8Array; gasLeft: bigint }
    | { type: 'end of code'; data?: null; gasLeft: bigint }
    | { type: 'revert'; data: Uint8Array; gasLeft: bigint }
    | { type: 'error'; error: ERROR; data?: null; gasLeft: bigint };

/** What an executor asks its dispatcher to do when it reaches a CALL/CREATE-like opcode */
export type SubCallRequest =
    | {
          readonly type: 'call' | 'callcode' | 'delegatecall' | 'staticcall';
          readonly gas: bigint;
          readonly target: Address;
          readonly value: bigint;
          readonly input: Uint8Array;
          readonly retOffset: number;
          readonly retSize: number;
      }
    | {
          readonly type: 'create' | 'create2';
          readonly gas: bigint;
          readonly value: bigint;
          readonly initCode: Uint8Array;
          readonly salt?: bigint;
      };

export type ExecResult = { readonly type: 'done'; readonly stop: StopReason } | { readonly type: 'suspended'; readonly request: SubCallRequest };

export interface EIP {
    /** PUSH0 opcode */
    eip_3855_push0?: boolean;
    /** Reject new code starting with 0xEF */
    eip_3541_reject_ef?: boolean;
    /** 24576 bytes maximum deployed code size */
    eip_170_code_size?: boolean;
}

export type OnStep = (frame: CallFrame, pc: number, opcode: number, opName: string, gasLeft: bigint, stack: readonly Word[]) => void;
export type OnStartingCall = (frame: CallFrame, callType: CallType) => void;
export type OnEndedCall = (frame: CallFrame, callType: CallType, outcome: ExecutionOutcome) => void;
export type OnLog = (log: Log) => void;

export interface TxOpts {
    gasLimit?: bigint;
    gasPrice?: bigint;
    /** Defaults to the sender */
    origin?: Address;
}
