import { keccak256 } from 'ethereum-cryptography/keccak.js';
import { utils } from 'ethers';
import {
    Address,
    CallFrame,
    CallType,
    ExecutionOutcome,
    Log,
    OnEndedCall,
    OnLog,
    OnStartingCall,
    OnStep,
    Status,
    StopReason,
    SubCallRequest,
    TxContext,
    TxOpts,
} from './interfaces';
import { ChildResult, Executor } from './executor';
import { StateAdapter, OverlayHandle } from './state';
import { compileCode } from './code';
import { Precompile, PrecompileContext } from './precompiles';
import { EngineConfig, supportsEip } from './config';
import { cost, intrinsicGas, MAX_CODE_SIZE, MAX_REFUND_QUOTIENT } from './gas';
import { ERROR, EngineError, EvmError } from './errors';
import { BIGINT_0, BIGINT_1, minBigInt } from './arithmetic';
import { toBytes32, uintToBytes } from './bytes';
import { to0xAddress, toAddress } from './utils';
import { Wei } from './wei';
import { debugDispatch } from './logger';

/** Deepest frame index allowed (the root frame has depth 0) */
export const MAX_CALL_DEPTH = 1024;

const EMPTY = new Uint8Array(0);

export interface DispatchHooks {
    onStep?: OnStep;
    onStartingCall?: OnStartingCall;
    onEndingCall?: OnEndedCall;
    onLog?: OnLog;
}

/** What a dispatcher needs to run frames of one top-level invocation */
export interface DispatchEnv {
    readonly state: StateAdapter;
    readonly tx: TxContext;
    readonly config: Pick<EngineConfig, 'eips' | 'precompiles' | 'defaultGasLimit'>;
    readonly predecessorAccountId: string;
    readonly currentAccountId: string;
    readonly bridgeProvider: string;
    readonly hooks?: DispatchHooks;
}

export interface CallOpts extends TxOpts {
    /** Increments the sender nonce before running (kept even if the call fails) */
    consumeNonce?: boolean;
    /** Paid by the sender before running (kept even if the call fails) */
    fee?: { readonly amount: Wei; readonly to: Address };
}

interface FrameResult extends ChildResult {
    readonly status: Status;
    readonly error?: ERROR;
}

/** A frame about to be entered */
interface PendingFrame {
    readonly frame: CallFrame;
    readonly callType: CallType;
    /** Creations only */
    readonly initCode?: Uint8Array;
    readonly salt?: bigint;
    /** Creations whose address (and creator nonce) has already been settled */
    readonly createdAddress?: Address;
}

interface ActiveFrame {
    readonly exec: Executor;
    readonly frame: CallFrame;
    readonly callType: CallType;
    readonly overlay: OverlayHandle;
    readonly createdAddress?: Address;
}

function isCreation(callType: CallType) {
    return callType === 'create' || callType === 'create2';
}

function failed(error: ERROR, gasLeft: bigint): FrameResult {
    return { success: false, status: Status.Error, error, returnData: EMPTY, gasLeft, logs: [], refund: BIGINT_0 };
}

/** Address of a contract created by `creator` when its nonce was `nonce` */
export function createAddress(creator: Address, nonce: bigint): Address {
    return toAddress(utils.getContractAddress({ from: to0xAddress(creator), nonce }));
}

export function create2Address(creator: Address, salt: bigint, initCode: Uint8Array): Address {
    return toAddress(utils.getCreate2Address(to0xAddress(creator), toBytes32(salt), keccak256(initCode)));
}

/**
 * Runs the frames of one top-level invocation.
 *
 * Frames live on an explicit array: an executor that reaches a call/create opcode suspends,
 * the child is pushed, and the parent is resumed with the child's outcome once it is done.
 * Each frame runs in its own state overlay, committed into its parent on success and discarded otherwise.
 */
export class CallDispatcher {
    constructor(private readonly env: DispatchEnv) {}

    private get state() {
        return this.env.state;
    }

    /** Runs init code, endowing the new contract with `value`; on success, the returned data is the new address */
    deployCode(sender: Address, value: bigint, initCode: Uint8Array, opts?: CallOpts): ExecutionOutcome {
        const outcome = this.transact(sender, null, value, initCode, false, true, opts);
        if (outcome.status === Status.Success && outcome.createdAddress !== undefined) {
            return { ...outcome, returnData: uintToBytes(outcome.createdAddress, 20) };
        }
        return outcome;
    }

    call(sender: Address, target: Address, value: bigint, input: Uint8Array, opts?: CallOpts): ExecutionOutcome {
        return this.transact(sender, target, value, input, false, true, opts);
    }

    /** Read-only call: the state is never persisted */
    view(sender: Address, target: Address, value: bigint, input: Uint8Array, opts?: CallOpts): ExecutionOutcome {
        return this.transact(sender, target, value, input, true, false, opts);
    }

    private transact(
        sender: Address,
        target: Address | null,
        value: bigint,
        input: Uint8Array,
        isStatic: boolean,
        persist: boolean,
        opts: CallOpts | undefined,
    ): ExecutionOutcome {
        const gasLimit = opts?.gasLimit ?? this.env.config.defaultGasLimit;
        const invocation = this.state.beginOverlay();
        try {
            // bookkeeping that survives a failed execution
            let createdAddress: Address | undefined;
            if (target === null) {
                createdAddress = createAddress(sender, this.state.getNonce(sender));
            }
            if (target === null || opts?.consumeNonce) {
                this.state.incrementNonce(sender);
            }
            if (opts?.fee && opts.fee.amount > BIGINT_0) {
                this.payFee(sender, opts.fee.to, opts.fee.amount);
            }

            const outcome = this.runRoot(sender, target, createdAddress, value, input, isStatic, gasLimit);

            if (persist) {
                this.state.commit(invocation);
            } else {
                this.state.discard(invocation);
            }
            if (outcome.status === Status.Success && this.env.hooks?.onLog) {
                outcome.logs.forEach(this.env.hooks.onLog);
            }
            debugDispatch(`${target === null ? 'deploy' : 'call'} from ${to0xAddress(sender)}: status ${Status[outcome.status]}, ${outcome.gasUsed} gas used`);
            return outcome;
        } catch (e) {
            this.state.rollback(invocation);
            throw e;
        }
    }

    private payFee(sender: Address, to: Address, amount: Wei) {
        try {
            this.state.transfer(sender, to, amount);
        } catch (e) {
            if (e instanceof EvmError && e.error === ERROR.INSUFFICIENT_BALANCE) {
                throw new EngineError('ERR_INSUFFICIENT_BALANCE', `${to0xAddress(sender)} cannot pay a fee of ${amount}`);
            }
            throw e;
        }
    }

    private runRoot(
        sender: Address,
        target: Address | null,
        createdAddress: Address | undefined,
        value: bigint,
        input: Uint8Array,
        isStatic: boolean,
        gasLimit: bigint,
    ): ExecutionOutcome {
        const creation = target === null;
        const intrinsic = intrinsicGas(input, creation);
        if (gasLimit < intrinsic) {
            return { status: Status.Error, error: ERROR.OUT_OF_GAS, returnData: EMPTY, gasUsed: gasLimit, logs: [] };
        }

        const address = target ?? createdAddress ?? BIGINT_0;
        const result = this.runFrames({
            frame: {
                caller: sender,
                address,
                codeAddress: address,
                value,
                input: creation ? EMPTY : input,
                gasLimit: gasLimit - intrinsic,
                isStatic,
                depth: 0,
            },
            callType: creation ? 'create' : 'call',
            initCode: creation ? input : undefined,
            createdAddress,
        });

        let gasUsed = gasLimit - result.gasLeft;
        if (result.success && result.refund > BIGINT_0) {
            gasUsed -= minBigInt(result.refund, gasUsed / MAX_REFUND_QUOTIENT);
        }
        return {
            status: result.status,
            error: result.error,
            returnData: result.returnData,
            gasUsed,
            logs: result.success ? result.logs : [],
            createdAddress: result.success ? result.createdAddress : undefined,
        };
    }

    private runFrames(root: PendingFrame): FrameResult {
        const stack: ActiveFrame[] = [];
        let result = this.enter(root, stack);
        for (;;) {
            if (result) {
                const parent = stack[stack.length - 1];
                if (!parent) {
                    return result;
                }
                parent.exec.resume(result);
                result = null;
            }
            const top = stack[stack.length - 1];
            const ran = top.exec.execute();
            if (ran.type === 'suspended') {
                result = this.enter(this.childOf(top, ran.request), stack);
                continue;
            }
            stack.pop();
            result = this.leave(top, ran.stop);
        }
    }

    private childOf(parent: ActiveFrame, req: SubCallRequest): PendingFrame {
        const p = parent.frame;
        const depth = p.depth + 1;
        switch (req.type) {
            case 'create':
            case 'create2':
                return {
                    frame: {
                        caller: p.address,
                        // settled when entering
                        address: BIGINT_0,
                        codeAddress: BIGINT_0,
                        value: req.value,
                        input: EMPTY,
                        gasLimit: req.gas,
                        isStatic: p.isStatic,
                        depth,
                    },
                    callType: req.type,
                    initCode: req.initCode,
                    salt: req.salt,
                };
            case 'call':
                return {
                    callType: 'call',
                    frame: { caller: p.address, address: req.target, codeAddress: req.target, value: req.value, input: req.input, gasLimit: req.gas, isStatic: p.isStatic, depth },
                };
            case 'callcode':
                return {
                    callType: 'callcode',
                    frame: { caller: p.address, address: p.address, codeAddress: req.target, value: req.value, input: req.input, gasLimit: req.gas, isStatic: p.isStatic, depth },
                };
            case 'delegatecall':
                return {
                    callType: 'delegatecall',
                    frame: { caller: p.caller, address: p.address, codeAddress: req.target, value: p.value, input: req.input, gasLimit: req.gas, isStatic: p.isStatic, depth },
                };
            case 'staticcall':
                return {
                    callType: 'staticcall',
                    frame: { caller: p.address, address: req.target, codeAddress: req.target, value: BIGINT_0, input: req.input, gasLimit: req.gas, isStatic: true, depth },
                };
        }
    }

    /**
     * Starts a frame. Returns its result when it completes without bytecode to run
     * (failed checks, precompiles, empty code), or null once an executor has been pushed.
     */
    private enter(pending: PendingFrame, stack: ActiveFrame[]): FrameResult | null {
        let { frame } = pending;
        const { callType } = pending;
        this.env.hooks?.onStartingCall?.(frame, callType);
        const done = (result: FrameResult) => this.ended(frame, callType, result);

        if (frame.depth > MAX_CALL_DEPTH) {
            return done(failed(ERROR.CALL_DEPTH_EXCEEDED, frame.gasLimit));
        }
        const transfersValue = callType !== 'delegatecall' && callType !== 'staticcall' && frame.value > BIGINT_0;
        if (transfersValue && this.state.getBalance(frame.caller) < frame.value) {
            return done(failed(ERROR.INSUFFICIENT_BALANCE, frame.gasLimit));
        }

        let createdAddress: Address | undefined;
        if (isCreation(callType)) {
            createdAddress = pending.createdAddress;
            if (createdAddress === undefined) {
                const initCode = pending.initCode ?? EMPTY;
                createdAddress =
                    callType === 'create2'
                        ? create2Address(frame.caller, pending.salt ?? BIGINT_0, initCode)
                        : createAddress(frame.caller, this.state.getNonce(frame.caller));
                this.state.incrementNonce(frame.caller);
            }
            frame = { ...frame, address: createdAddress, codeAddress: createdAddress };
            if (this.state.getNonce(createdAddress) !== BIGINT_0 || this.state.getCode(createdAddress).length > 0) {
                return done(failed(ERROR.CREATE_COLLISION, BIGINT_0));
            }
        }

        const overlay = this.state.beginOverlay();
        if (createdAddress !== undefined) {
            // EIP-161: contracts start at nonce 1
            this.state.setNonce(createdAddress, BIGINT_1);
        }
        if (transfersValue && frame.caller !== frame.address) {
            this.state.transfer(frame.caller, frame.address, frame.value);
        }

        if (!isCreation(callType)) {
            const precompile = this.env.config.precompiles.get(frame.codeAddress);
            if (precompile) {
                return done(this.runPrecompile(frame, overlay, precompile));
            }
        }

        const code = isCreation(callType) ? pending.initCode ?? EMPTY : this.state.getCode(frame.codeAddress);
        if (!code.length) {
            this.state.commit(overlay);
            return done({
                success: true,
                status: Status.Success,
                returnData: EMPTY,
                gasLeft: frame.gasLimit,
                logs: [],
                refund: BIGINT_0,
                createdAddress,
            });
        }

        const exec = new Executor(
            {
                frame,
                tx: this.env.tx,
                state: this.state,
                supports: eip => supportsEip(this.env.config, eip),
                onStep: this.env.hooks?.onStep,
            },
            compileCode(code),
        );
        stack.push({ exec, frame, callType, overlay, createdAddress });
        return null;
    }

    private runPrecompile(frame: CallFrame, overlay: OverlayHandle, precompile: Precompile): FrameResult {
        const gas = precompile.gas(frame.input);
        if (gas > frame.gasLimit) {
            this.state.discard(overlay);
            return failed(ERROR.OUT_OF_GAS, BIGINT_0);
        }
        const logs: Log[] = [];
        try {
            const returnData = precompile.run(frame.input, this.precompileContext(frame, logs));
            this.state.commit(overlay);
            return { success: true, status: Status.Success, returnData, gasLeft: frame.gasLimit - gas, logs, refund: BIGINT_0 };
        } catch (e) {
            if (!(e instanceof EvmError)) {
                throw e;
            }
            debugDispatch(`precompile ${precompile.name} failed: ${e.message}`);
            this.state.discard(overlay);
            return failed(e.error, BIGINT_0);
        }
    }

    private precompileContext(frame: CallFrame, logs: Log[]): PrecompileContext {
        return {
            caller: frame.caller,
            address: frame.address,
            value: frame.value,
            isStatic: frame.isStatic,
            state: this.state,
            predecessorAccountId: this.env.predecessorAccountId,
            currentAccountId: this.env.currentAccountId,
            bridgeProvider: this.env.bridgeProvider,
            emitLog: (log: Log) => {
                logs.push(log);
            },
        };
    }

    /** Tears a frame down once its executor has stopped */
    private leave(active: ActiveFrame, stop: StopReason): FrameResult {
        const { exec, frame, callType, overlay, createdAddress } = active;
        const done = (result: FrameResult) => this.ended(frame, callType, result);

        switch (stop.type) {
            case 'error':
                this.state.discard(overlay);
                return done(failed(stop.error, BIGINT_0));
            case 'revert':
                this.state.discard(overlay);
                return done({ success: false, status: Status.Revert, returnData: stop.data, gasLeft: stop.gasLeft, logs: [], refund: BIGINT_0 });
        }

        const returnData = stop.type === 'return' ? stop.data : EMPTY;
        let gasLeft = stop.gasLeft;

        if (createdAddress !== undefined) {
            if (supportsEip(this.env.config, 'eip_170_code_size') && returnData.length > MAX_CODE_SIZE) {
                this.state.discard(overlay);
                return done(failed(ERROR.CODESIZE_EXCEEDS_MAXIMUM, BIGINT_0));
            }
            if (supportsEip(this.env.config, 'eip_3541_reject_ef') && returnData[0] === 0xef) {
                this.state.discard(overlay);
                return done(failed(ERROR.INVALID_CODE_PREFIX, BIGINT_0));
            }
            const deposit = cost.codeDeposit * BigInt(returnData.length);
            if (gasLeft < deposit) {
                this.state.discard(overlay);
                return done(failed(ERROR.OUT_OF_GAS, BIGINT_0));
            }
            gasLeft -= deposit;
            this.state.setCode(createdAddress, returnData);
            this.state.commit(overlay);
            debugDispatch(`created ${to0xAddress(createdAddress)} (${returnData.length} bytes of code)`);
            return done({
                success: true,
                status: Status.Success,
                returnData: EMPTY,
                gasLeft,
                logs: exec.logs,
                refund: exec.refund,
                createdAddress,
            });
        }

        this.state.commit(overlay);
        return done({ success: true, status: Status.Success, returnData, gasLeft, logs: exec.logs, refund: exec.refund });
    }

    private ended(frame: CallFrame, callType: CallType, result: FrameResult): FrameResult {
        this.env.hooks?.onEndingCall?.(frame, callType, {
            status: result.status,
            error: result.error,
            returnData: result.returnData,
            gasUsed: frame.gasLimit - result.gasLeft,
            logs: result.logs,
            createdAddress: result.createdAddress,
        });
        return result;
    }
}
