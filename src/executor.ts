import { keccak256 } from 'ethereum-cryptography/keccak.js';
import {
    Address,
    CallFrame,
    CompiledCode,
    EIP,
    ExecResult,
    IMemReader,
    Log,
    OnStep,
    StopReason,
    SubCallRequest,
    TxContext,
} from './interfaces';
import { EMPTY_READER, MemReader } from './mem-reader';
import { Memory } from './memory';
import { StateAdapter } from './state';
import { isValidJump } from './code';
import { computeBlockHash, dumpU256, toAddress } from './utils';
import { bytesToBigInt } from './bytes';
import {
    BIGINT_0,
    BIGINT_1,
    BIGINT_255,
    BIGINT_256,
    BIGINT_31,
    BIGINT_7,
    BIGINT_8,
    exponentiation,
    fromTwos,
    MAX_INTEGER_BIGINT,
    MAX_NUM,
    minBigInt,
    mod,
    toTwos,
    toWordCount,
    TWO_POW256,
} from './arithmetic';
import { copyCost, cost, maxCallGas, memoryExpansionCost, sstoreCost } from './gas';
import { ERROR, EvmError, trap } from './errors';
import { debugGas, debugOps } from './logger';

const MAX_HEIGHT = 1024;

/** Memory offsets beyond this cannot be paid for anyway */
const MAX_MEMORY = BigInt(0xffffffff);

/** Everything a frame needs from the world around it */
export interface FrameContext {
    readonly frame: CallFrame;
    readonly tx: TxContext;
    /** Explicit store handle (overlays are opened/closed by the dispatcher) */
    readonly state: StateAdapter;
    supports(eip: keyof EIP): boolean;
    readonly onStep?: OnStep;
}

/** Outcome of a child frame, as seen by the frame that spawned it */
export interface ChildResult {
    readonly success: boolean;
    readonly returnData: Uint8Array;
    /** Unused gas given back to the parent */
    readonly gasLeft: bigint;
    /** Logs of the child (only meaningful on success) */
    readonly logs: readonly Log[];
    readonly refund: bigint;
    readonly createdAddress?: Address;
}

type PendingReturn = { readonly offset: number; readonly size: number } | 'create';

/**
 * Runs the bytecode of one frame.
 *
 * Execution is synchronous and resumable: when a CALL/CREATE-like opcode is reached,
 * `execute()` returns a suspension carrying the sub-call request. The dispatcher runs the child frame,
 * then calls `resume()` with its result and `execute()` again.
 */
export class Executor {
    private _stack: bigint[] = [];
    private _len = 0;
    readonly mem = new Memory();
    readonly logs: Log[] = [];
    private stop: StopReason | null = null;
    private pending: SubCallRequest | null = null;
    private pendingReturn: PendingReturn | null = null;
    private lastReturndata: IMemReader = EMPTY_READER;
    private pc = 0;
    gas: bigint;
    /** Refund counter of this frame (can be negative until merged into the parent) */
    refund = BIGINT_0;

    constructor(readonly ctx: FrameContext, readonly code: CompiledCode) {
        this.gas = ctx.frame.gasLimit;
    }

    get frame(): CallFrame {
        return this.ctx.frame;
    }

    get state(): StateAdapter {
        return this.ctx.state;
    }

    get address(): Address {
        return this.ctx.frame.address;
    }

    get gasSpent(): bigint {
        return this.ctx.frame.gasLimit - this.gas;
    }

    execute(): ExecResult {
        try {
            while (!this.stop) {
                if (this.pc >= this.code.code.size) {
                    this.stop = { type: 'end of code', gasLeft: this.gas };
                    break;
                }
                const pc = this.pc;
                const opcode = this.code.code.getByte(pc);
                const op = ops[opcode];
                if (!op) {
                    trap(ERROR.INVALID_OPCODE, `0x${opcode.toString(16)} at pc ${pc}`);
                }
                if (this.ctx.onStep) {
                    this.ctx.onStep(this.frame, pc, opcode, op.name, this.gas, this.copyStack());
                }
                if (debugOps.enabled) {
                    debugOps(`${pc.toString().padStart(5)} ${op.name.padEnd(14)} gas ${this.gas} [${this.dumpStack().join(', ')}]`);
                }
                this.useGas(op.fee, op.name);
                this.pc++;
                op.fn.call(this, opcode, pc);
                if (this.pending) {
                    return { type: 'suspended', request: this.pending };
                }
            }
        } catch (e) {
            if (!(e instanceof EvmError)) {
                throw e;
            }
            // exceptional halt: the whole frame gas is consumed
            this.gas = BIGINT_0;
            this.stop = { type: 'error', error: e.error, gasLeft: BIGINT_0 };
            debugOps(`frame ${dumpU256(this.address)} failed: ${e.message}`);
        }
        return { type: 'done', stop: this.stop ?? { type: 'end of code', gasLeft: this.gas } };
    }

    /** Feeds back the result of the sub-call this executor is suspended on */
    resume(result: ChildResult) {
        const ret = this.pendingReturn;
        if (!this.pending || !ret) {
            throw new Error('Executor is not waiting for a sub-call');
        }
        this.pending = null;
        this.pendingReturn = null;
        this.gas += result.gasLeft;
        if (result.success) {
            this.logs.push(...result.logs);
            this.refund += result.refund;
        }

        if (ret === 'create') {
            // returndata is only kept when the init code reverted
            this.lastReturndata = new MemReader(result.success ? new Uint8Array(0) : result.returnData);
            this.push(result.success && result.createdAddress !== undefined ? result.createdAddress : BIGINT_0);
            return;
        }

        this.lastReturndata = new MemReader(result.returnData);
        this.pushBool(result.success);
        const toCopy = Math.min(ret.size, result.returnData.length);
        if (toCopy) {
            this.mem.write(ret.offset, result.returnData.subarray(0, toCopy));
        }
    }

    // ========== stack

    copyStack(): readonly bigint[] {
        return this._stack.slice(0, this._len);
    }

    dumpStack() {
        return this.copyStack()
            .map(i => dumpU256(i))
            .reverse();
    }


    popN(num: number): bigint[] {
        if (this._len < num) {
            trap(ERROR.STACK_UNDERFLOW);
        }
        const arr: bigint[] = Array(num);
        for (let pop = 0; pop < num; pop++) {
            // Note: this thus also (correctly) reduces the length of the internal array (without deleting items)
            arr[pop] = this._stack[--this._len];
        }
        return arr;
    }

    pop(): bigint {
        if (this._len < 1) {
            trap(ERROR.STACK_UNDERFLOW);
        }
        return this._stack[--this._len];
    }

    /**
     * Swap top of stack with an item in the stack.
     * @param position - Index of item from top of the stack (0-indexed)
     */
    swap(position: number) {
        if (this._len <= position) {
            trap(ERROR.STACK_UNDERFLOW);
        }
        const head = this._len - 1;
        const i = head - position;
        const tmp = this._stack[head];
        this._stack[head] = this._stack[i];
        this._stack[i] = tmp;
    }

    /**
     * Pushes a copy of an item in the stack.
     * @param position - Index of item to be copied (1-indexed)
     */
    dup(position: number) {
        if (this._len < position) {
            trap(ERROR.STACK_UNDERFLOW);
        }
        this.push(this._stack[this._len - position]);
    }

    push(value: bigint) {
        if (this._len >= MAX_HEIGHT) {
            trap(ERROR.STACK_OVERFLOW);
        }
        this._stack[this._len++] = value;
    }

    pushBool(elt: boolean) {
        this.push(elt ? BIGINT_1 : BIGINT_0);
    }

    // ========== gas & memory

    useGas(amount: bigint, context?: string): void {
        if (this.gas < amount) {
            this.gas = BIGINT_0;
            trap(ERROR.OUT_OF_GAS, context);
        }
        this.gas -= amount;
        if (debugGas.enabled && amount > BIGINT_0) {
            debugGas(`${context ?? 'gas'}: used ${amount} (-> ${this.gas})`);
        }
    }

    /**
     * Bills the memory expansion needed to access [offset, offset + size), then grows the memory.
     * Returns the offset as a number.
     */
    private useMemory(offset: bigint, size: bigint): number {
        if (size === BIGINT_0) {
            return 0;
        }
        if (offset + size > MAX_MEMORY) {
            this.gas = BIGINT_0;
            trap(ERROR.OUT_OF_GAS, 'memory offset');
        }
        const expansion = memoryExpansionCost(this.mem.wordCount, offset, size);
        this.useGas(expansion.cost, 'memory expansion');
        this.mem.resize(Number(offset + size));
        return Number(offset);
    }

    private checkWritable(opName: string) {
        if (this.frame.isStatic) {
            trap(ERROR.WRITE_PROTECTION, `"${opName}" in a static context`);
        }
    }

    private getData(): Uint8Array {
        const [offset, size] = this.popN(2);
        const at = this.useMemory(offset, size);
        return this.mem.slice(at, Number(size));
    }

    private copyToMem(from: IMemReader) {
        const [destOffset, offset, size] = this.popN(3);
        this.useGas(copyCost(size), 'copy');
        const dest = this.useMemory(destOffset, size);
        if (size === BIGINT_0) {
            return;
        }
        const data = offset > MAX_NUM ? new Uint8Array(Number(size)) : from.slice(Number(offset), Number(size));
        this.mem.write(dest, data);
    }

    // ========== opcodes

    op_stop() {
        this.stop = { type: 'stop', gasLeft: this.gas };
    }
    op_add() {
        const [a, b] = this.popN(2);
        this.push(mod(a + b, TWO_POW256));
    }
    op_mul() {
        const [a, b] = this.popN(2);
        this.push(mod(a * b, TWO_POW256));
    }
    op_sub() {
        const [a, b] = this.popN(2);
        this.push(mod(a - b, TWO_POW256));
    }
    op_div() {
        const [a, b] = this.popN(2);
        this.push(b === BIGINT_0 ? BIGINT_0 : a / b);
    }
    op_sdiv() {
        const [a, b] = this.popN(2);
        this.push(b === BIGINT_0 ? BIGINT_0 : toTwos(fromTwos(a) / fromTwos(b)));
    }
    op_mod() {
        const [a, b] = this.popN(2);
        this.push(b === BIGINT_0 ? BIGINT_0 : a % b);
    }
    op_smod() {
        const [a, b] = this.popN(2);
        this.push(b === BIGINT_0 ? BIGINT_0 : toTwos(fromTwos(a) % fromTwos(b)));
    }
    op_addmod() {
        const [a, b, c] = this.popN(3);
        this.push(c === BIGINT_0 ? BIGINT_0 : (a + b) % c);
    }
    op_mulmod() {
        const [a, b, c] = this.popN(3);
        this.push(c === BIGINT_0 ? BIGINT_0 : (a * b) % c);
    }
    op_exp() {
        const [base, exponent] = this.popN(2);
        const exponentBytes = exponent === BIGINT_0 ? 0 : Math.ceil(exponent.toString(16).length / 2);
        this.useGas(cost.expByte * BigInt(exponentBytes), 'EXP');
        if (exponent === BIGINT_0) {
            this.push(BIGINT_1);
            return;
        }
        if (base === BIGINT_0) {
            this.push(BIGINT_0);
            return;
        }
        this.push(exponentiation(base, exponent));
    }
    op_signextend() {
        // https://ethereum.stackexchange.com/questions/63062/evm-signextend-opcode-explanation
        let [k, val] = this.popN(2);
        if (k < BIGINT_31) {
            const signBit = k * BIGINT_8 + BIGINT_7;
            const mask = (BIGINT_1 << signBit) - BIGINT_1;
            if ((val >> signBit) & BIGINT_1) {
                val = val | BigInt.asUintN(256, ~mask);
            } else {
                val = val & mask;
            }
        }
        this.push(val);
    }
    op_lt() {
        const [a, b] = this.popN(2);
        this.pushBool(a < b);
    }
    op_gt() {
        const [a, b] = this.popN(2);
        this.pushBool(a > b);
    }
    op_slt() {
        const [a, b] = this.popN(2);
        this.pushBool(fromTwos(a) < fromTwos(b));
    }
    op_sgt() {
        const [a, b] = this.popN(2);
        this.pushBool(fromTwos(a) > fromTwos(b));
    }
    op_eq() {
        const [a, b] = this.popN(2);
        this.pushBool(a === b);
    }
    op_iszero() {
        this.pushBool(this.pop() === BIGINT_0);
    }
    op_and() {
        const [a, b] = this.popN(2);
        this.push(a & b);
    }
    op_or() {
        const [a, b] = this.popN(2);
        this.push(a | b);
    }
    op_xor() {
        const [a, b] = this.popN(2);
        this.push(a ^ b);
    }
    op_not() {
        this.push(BigInt.asUintN(256, ~this.pop()));
    }
    op_byte() {
        const [pos, word] = this.popN(2);
        if (pos > BIGINT_31) {
            this.push(BIGINT_0);
            return;
        }
        this.push((word >> ((BIGINT_31 - pos) * BIGINT_8)) & BIGINT_255);
    }
    op_shl() {
        const [shift, value] = this.popN(2);
        this.push(shift >= BIGINT_256 ? BIGINT_0 : (value << shift) & MAX_INTEGER_BIGINT);
    }
    op_shr() {
        const [shift, value] = this.popN(2);
        this.push(shift >= BIGINT_256 ? BIGINT_0 : value >> shift);
    }
    op_sar() {
        const [shift, value] = this.popN(2);
        const signed = fromTwos(value);
        if (shift >= BIGINT_256) {
            this.push(signed < BIGINT_0 ? MAX_INTEGER_BIGINT : BIGINT_0);
            return;
        }
        this.push(toTwos(signed >> shift));
    }
    op_sha3() {
        const [offset, size] = this.popN(2);
        this.useGas(cost.keccak256Word * toWordCount(size), 'KECCAK256');
        const at = this.useMemory(offset, size);
        this.push(bytesToBigInt(keccak256(this.mem.slice(at, Number(size)))));
    }
    op_address() {
        this.push(this.address);
    }
    op_balance() {
        this.push(this.state.getBalance(toAddress(this.pop())));
    }
    op_origin() {
        this.push(this.ctx.tx.origin);
    }
    op_caller() {
        this.push(this.frame.caller);
    }
    op_callvalue() {
        this.push(this.frame.value);
    }
    op_calldataload() {
        const offset = this.pop();
        if (offset > MAX_NUM) {
            this.push(BIGINT_0);
            return;
        }
        this.push(new MemReader(this.frame.input).get(Number(offset)));
    }
    op_calldatasize() {
        this.push(BigInt(this.frame.input.length));
    }
    op_calldatacopy() {
        this.copyToMem(new MemReader(this.frame.input));
    }
    op_codesize() {
        this.push(BigInt(this.code.code.size));
    }
    op_codecopy() {
        this.copyToMem(this.code.code);
    }
    op_gasprice() {
        this.push(this.ctx.tx.gasPrice);
    }
    op_extcodesize() {
        this.push(BigInt(this.state.getCode(toAddress(this.pop())).length));
    }
    op_extcodecopy() {
        const address = toAddress(this.pop());
        this.copyToMem(new MemReader(this.state.getCode(address)));
    }
    op_returndatasize() {
        this.push(BigInt(this.lastReturndata.size));
    }
    op_returndatacopy() {
        const [destOffset, offset, size] = this.popN(3);
        if (offset + size > BigInt(this.lastReturndata.size)) {
            trap(ERROR.RETURNDATA_OUT_OF_BOUNDS, `${size} bytes at ${offset} of ${this.lastReturndata.size}`);
        }
        this.useGas(copyCost(size), 'copy');
        const dest = this.useMemory(destOffset, size);
        if (size > BIGINT_0) {
            this.mem.write(dest, this.lastReturndata.slice(Number(offset), Number(size)));
        }
    }
    op_extcodehash() {
        const address = toAddress(this.pop());
        if (this.state.isEmpty(address)) {
            this.push(BIGINT_0);
            return;
        }
        this.push(bytesToBigInt(keccak256(this.state.getCode(address))));
    }
    op_blockhash() {
        const number = this.pop();
        const current = this.ctx.tx.block.number;
        if (number >= current || current - number > BIGINT_256) {
            this.push(BIGINT_0);
            return;
        }
        this.push(computeBlockHash(this.ctx.tx.block.chainId, this.ctx.tx.engineAccountId, number));
    }
    op_coinbase() {
        this.push(this.ctx.tx.block.coinbase);
    }
    op_timestamp() {
        this.push(this.ctx.tx.block.timestamp);
    }
    op_number() {
        this.push(this.ctx.tx.block.number);
    }
    op_prevrandao() {
        this.push(this.ctx.tx.block.prevRandao);
    }
    op_gaslimit() {
        this.push(this.ctx.tx.block.gasLimit);
    }
    op_chainid() {
        this.push(this.ctx.tx.block.chainId);
    }
    op_selfbalance() {
        this.push(this.state.getBalance(this.address));
    }
    op_basefee() {
        this.push(this.ctx.tx.block.baseFee);
    }
    op_pop() {
        this.pop();
    }
    op_mload() {
        const at = this.useMemory(this.pop(), BigInt(32));
        this.push(this.mem.get(at));
    }
    op_mstore() {
        const [offset, value] = this.popN(2);
        this.mem.setUint256(this.useMemory(offset, BigInt(32)), value);
    }
    op_mstore8() {
        const [offset, value] = this.popN(2);
        this.mem.set(this.useMemory(offset, BIGINT_1), Number(value & BIGINT_255));
    }
    op_sload() {
        this.push(this.state.getStorage(this.address, this.pop()));
    }
    op_sstore() {
        this.checkWritable('sstore');
        if (this.gas <= cost.sstoreSentry) {
            trap(ERROR.OUT_OF_GAS, 'SSTORE sentry');
        }
        const [key, value] = this.popN(2);
        const current = this.state.getStorage(this.address, key);
        const original = this.state.getOriginalStorage(this.address, key);
        const { gas, refund } = sstoreCost(original, current, value);
        this.useGas(gas, 'SSTORE');
        this.refund += refund;
        this.state.setStorage(this.address, key, value);
    }
    op_jump() {
        const dest = this.pop();
        if (!isValidJump(this.code, dest)) {
            trap(ERROR.INVALID_JUMP, `to ${dest}`);
        }
        this.pc = Number(dest);
    }
    op_jumpi() {
        const [dest, condition] = this.popN(2);
        if (condition === BIGINT_0) {
            return;
        }
        if (!isValidJump(this.code, dest)) {
            trap(ERROR.INVALID_JUMP, `to ${dest}`);
        }
        this.pc = Number(dest);
    }
    op_pc(_opcode: number, pc: number) {
        this.push(BigInt(pc));
    }
    op_msize() {
        this.push(BigInt(this.mem.size));
    }
    op_gas() {
        this.push(this.gas);
    }
    op_jumpdest() {
        // do nothing
    }
    op_push0() {
        if (!this.ctx.supports('eip_3855_push0')) {
            trap(ERROR.INVALID_OPCODE, 'PUSH0 is not enabled');
        }
        this.push(BIGINT_0);
    }
    op_push(opcode: number) {
        const nBytes = opcode - 0x5f;
        // truncated push data at the end of code reads as zeros
        this.push(bytesToBigInt(this.code.code.slice(this.pc, nBytes)));
        this.pc += nBytes;
    }
    op_dup(opcode: number) {
        this.dup(opcode - 0x7f);
    }
    op_swap(opcode: number) {
        this.swap(opcode - 0x8f);
    }
    op_log(opcode: number) {
        this.checkWritable('log');
        const topicCount = opcode - 0xa0;
        const [offset, size] = this.popN(2);
        const topics = this.popN(topicCount);
        this.useGas(cost.logTopic * BigInt(topicCount) + cost.logData * size, 'LOG');
        const at = this.useMemory(offset, size);
        this.logs.push({ address: this.address, topics, data: this.mem.slice(at, Number(size)) });
    }

    op_create() {
        this.checkWritable('create');
        const [value, offset, size] = this.popN(3);
        const at = this.useMemory(offset, size);
        this.requestCreate({ type: 'create', value, initCode: this.mem.slice(at, Number(size)) });
    }
    op_create2() {
        this.checkWritable('create2');
        const [value, offset, size, salt] = this.popN(4);
        this.useGas(cost.keccak256Word * toWordCount(size), 'CREATE2 hashing');
        const at = this.useMemory(offset, size);
        this.requestCreate({ type: 'create2', value, initCode: this.mem.slice(at, Number(size)), salt });
    }

    private requestCreate(req: { type: 'create' | 'create2'; value: bigint; initCode: Uint8Array; salt?: bigint }) {
        const gas = maxCallGas(this.gas);
        this.useGas(gas, 'CREATE forwarded');
        this.pending = { ...req, gas };
        this.pendingReturn = 'create';
    }

    op_call() {
        const [gasReq, to, value, inOffset, inSize, outOffset, outSize] = this.popN(7);
        if (value !== BIGINT_0) {
            this.checkWritable('call with value');
        }
        const target = toAddress(to);
        let extra = BIGINT_0;
        if (value !== BIGINT_0) {
            extra += cost.callValue;
            if (this.state.isEmpty(target)) {
                extra += cost.newAccount;
            }
        }
        this.requestCall('call', gasReq, target, value, inOffset, inSize, outOffset, outSize, extra);
    }
    op_callcode() {
        const [gasReq, to, value, inOffset, inSize, outOffset, outSize] = this.popN(7);
        const extra = value !== BIGINT_0 ? cost.callValue : BIGINT_0;
        this.requestCall('callcode', gasReq, toAddress(to), value, inOffset, inSize, outOffset, outSize, extra);
    }
    op_delegatecall() {
        const [gasReq, to, inOffset, inSize, outOffset, outSize] = this.popN(6);
        this.requestCall('delegatecall', gasReq, toAddress(to), this.frame.value, inOffset, inSize, outOffset, outSize, BIGINT_0);
    }
    op_staticcall() {
        const [gasReq, to, inOffset, inSize, outOffset, outSize] = this.popN(6);
        this.requestCall('staticcall', gasReq, toAddress(to), BIGINT_0, inOffset, inSize, outOffset, outSize, BIGINT_0);
    }

    private requestCall(
        type: 'call' | 'callcode' | 'delegatecall' | 'staticcall',
        gasReq: bigint,
        target: Address,
        value: bigint,
        inOffset: bigint,
        inSize: bigint,
        outOffset: bigint,
        outSize: bigint,
        extraGas: bigint,
    ) {
        // memory is billed for the largest of both areas
        const inAt = this.useMemory(inOffset, inSize);
        const outAt = this.useMemory(outOffset, outSize);
        this.useGas(extraGas, `${type} extra`);

        // EIP-150: a call cannot forward more than all but one 64th of what is left
        const gas = minBigInt(gasReq, maxCallGas(this.gas));
        this.useGas(gas, `${type} forwarded`);
        const transfersValue = (type === 'call' || type === 'callcode') && value !== BIGINT_0;

        this.pending = {
            type,
            gas: transfersValue ? gas + cost.callStipend : gas,
            target,
            value,
            input: this.mem.slice(inAt, Number(inSize)),
            retOffset: outAt,
            retSize: Number(outSize),
        };
        this.pendingReturn = { offset: outAt, size: Number(outSize) };
    }

    op_return() {
        this.stop = { type: 'return', data: this.getData(), gasLeft: this.gas };
    }
    op_revert() {
        const data = this.getData();
        this.stop = { type: 'revert', data, gasLeft: this.gas };
    }
    op_invalid() {
        trap(ERROR.INVALID_OPCODE, 'INVALID');
    }
    op_selfdestruct() {
        this.checkWritable('selfdestruct');
        const beneficiary = toAddress(this.pop());
        const balance = this.state.getBalance(this.address);
        if (balance > BIGINT_0 && this.state.isEmpty(beneficiary)) {
            this.useGas(cost.newAccount, 'SELFDESTRUCT new account');
        }
        this.refund += cost.refundSelfDestruct;
        if (beneficiary !== this.address) {
            this.state.transfer(this.address, beneficiary, balance);
        }
        this.state.destroyAccount(this.address);
        this.stop = { type: 'stop', gasLeft: this.gas };
    }
}

// ========== opcode table

export type OpFn = (this: Executor, opcode: number, pc: number) => void;

export interface OpInfo {
    readonly name: string;
    /** Static fee, charged before the handler runs */
    readonly fee: bigint;
    readonly fn: OpFn;
}

const p = Executor.prototype;

/** Static dispatch table, indexed by opcode. Holes are invalid opcodes */
export const ops: readonly (OpInfo | undefined)[] = (() => {
    const table: (OpInfo | undefined)[] = Array.from({ length: 256 }, () => undefined);
    const def = (opcode: number, name: string, fee: bigint, fn: OpFn) => {
        table[opcode] = { name, fee, fn };
    };
    def(0x00, 'STOP', cost.zero, p.op_stop);
    def(0x01, 'ADD', cost.veryLow, p.op_add);
    def(0x02, 'MUL', cost.low, p.op_mul);
    def(0x03, 'SUB', cost.veryLow, p.op_sub);
    def(0x04, 'DIV', cost.low, p.op_div);
    def(0x05, 'SDIV', cost.low, p.op_sdiv);
    def(0x06, 'MOD', cost.low, p.op_mod);
    def(0x07, 'SMOD', cost.low, p.op_smod);
    def(0x08, 'ADDMOD', cost.mid, p.op_addmod);
    def(0x09, 'MULMOD', cost.mid, p.op_mulmod);
    def(0x0a, 'EXP', cost.exp, p.op_exp);
    def(0x0b, 'SIGNEXTEND', cost.low, p.op_signextend);

    def(0x10, 'LT', cost.veryLow, p.op_lt);
    def(0x11, 'GT', cost.veryLow, p.op_gt);
    def(0x12, 'SLT', cost.veryLow, p.op_slt);
    def(0x13, 'SGT', cost.veryLow, p.op_sgt);
    def(0x14, 'EQ', cost.veryLow, p.op_eq);
    def(0x15, 'ISZERO', cost.veryLow, p.op_iszero);
    def(0x16, 'AND', cost.veryLow, p.op_and);
    def(0x17, 'OR', cost.veryLow, p.op_or);
    def(0x18, 'XOR', cost.veryLow, p.op_xor);
    def(0x19, 'NOT', cost.veryLow, p.op_not);
    def(0x1a, 'BYTE', cost.veryLow, p.op_byte);
    def(0x1b, 'SHL', cost.veryLow, p.op_shl);
    def(0x1c, 'SHR', cost.veryLow, p.op_shr);
    def(0x1d, 'SAR', cost.veryLow, p.op_sar);

    def(0x20, 'KECCAK256', cost.keccak256, p.op_sha3);

    def(0x30, 'ADDRESS', cost.base, p.op_address);
    def(0x31, 'BALANCE', cost.balance, p.op_balance);
    def(0x32, 'ORIGIN', cost.base, p.op_origin);
    def(0x33, 'CALLER', cost.base, p.op_caller);
    def(0x34, 'CALLVALUE', cost.base, p.op_callvalue);
    def(0x35, 'CALLDATALOAD', cost.veryLow, p.op_calldataload);
    def(0x36, 'CALLDATASIZE', cost.base, p.op_calldatasize);
    def(0x37, 'CALLDATACOPY', cost.veryLow, p.op_calldatacopy);
    def(0x38, 'CODESIZE', cost.base, p.op_codesize);
    def(0x39, 'CODECOPY', cost.veryLow, p.op_codecopy);
    def(0x3a, 'GASPRICE', cost.base, p.op_gasprice);
    def(0x3b, 'EXTCODESIZE', cost.extCode, p.op_extcodesize);
    def(0x3c, 'EXTCODECOPY', cost.extCode, p.op_extcodecopy);
    def(0x3d, 'RETURNDATASIZE', cost.base, p.op_returndatasize);
    def(0x3e, 'RETURNDATACOPY', cost.veryLow, p.op_returndatacopy);
    def(0x3f, 'EXTCODEHASH', cost.extCode, p.op_extcodehash);

    def(0x40, 'BLOCKHASH', cost.blockHash, p.op_blockhash);
    def(0x41, 'COINBASE', cost.base, p.op_coinbase);
    def(0x42, 'TIMESTAMP', cost.base, p.op_timestamp);
    def(0x43, 'NUMBER', cost.base, p.op_number);
    def(0x44, 'PREVRANDAO', cost.base, p.op_prevrandao);
    def(0x45, 'GASLIMIT', cost.base, p.op_gaslimit);
    def(0x46, 'CHAINID', cost.base, p.op_chainid);
    def(0x47, 'SELFBALANCE', cost.low, p.op_selfbalance);
    def(0x48, 'BASEFEE', cost.base, p.op_basefee);

    def(0x50, 'POP', cost.base, p.op_pop);
    def(0x51, 'MLOAD', cost.veryLow, p.op_mload);
    def(0x52, 'MSTORE', cost.veryLow, p.op_mstore);
    def(0x53, 'MSTORE8', cost.veryLow, p.op_mstore8);
    def(0x54, 'SLOAD', cost.sload, p.op_sload);
    def(0x55, 'SSTORE', cost.zero, p.op_sstore);
    def(0x56, 'JUMP', cost.mid, p.op_jump);
    def(0x57, 'JUMPI', cost.high, p.op_jumpi);
    def(0x58, 'PC', cost.base, p.op_pc);
    def(0x59, 'MSIZE', cost.base, p.op_msize);
    def(0x5a, 'GAS', cost.base, p.op_gas);
    def(0x5b, 'JUMPDEST', cost.jumpDest, p.op_jumpdest);
    def(0x5f, 'PUSH0', cost.base, p.op_push0);
    for (let n = 1; n <= 32; n++) {
        def(0x5f + n, `PUSH${n}`, cost.veryLow, p.op_push);
    }
    for (let n = 1; n <= 16; n++) {
        def(0x7f + n, `DUP${n}`, cost.veryLow, p.op_dup);
        def(0x8f + n, `SWAP${n}`, cost.veryLow, p.op_swap);
    }
    for (let n = 0; n <= 4; n++) {
        def(0xa0 + n, `LOG${n}`, cost.log, p.op_log);
    }

    def(0xf0, 'CREATE', cost.create, p.op_create);
    def(0xf1, 'CALL', cost.call, p.op_call);
    def(0xf2, 'CALLCODE', cost.call, p.op_callcode);
    def(0xf3, 'RETURN', cost.zero, p.op_return);
    def(0xf4, 'DELEGATECALL', cost.call, p.op_delegatecall);
    def(0xf5, 'CREATE2', cost.create, p.op_create2);
    def(0xfa, 'STATICCALL', cost.call, p.op_staticcall);
    def(0xfd, 'REVERT', cost.zero, p.op_revert);
    def(0xfe, 'INVALID', cost.zero, p.op_invalid);
    def(0xff, 'SELFDESTRUCT', cost.selfDestruct, p.op_selfdestruct);
    return table;
})();

export function opName(opcode: number): string {
    return ops[opcode]?.name ?? `UNKNOWN_0x${opcode.toString(16).padStart(2, '0')}`;
}
