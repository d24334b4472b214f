import { utils, Transaction } from 'ethers';
import { bytesToUtf8, utf8ToBytes } from 'ethereum-cryptography/utils.js';
import { Address, BlockContext, ExecutionOutcome, IHost, OnEndedCall, OnLog, OnStartingCall, OnStep, TxOpts } from './interfaces';
import { StateAdapter } from './state';
import { keys } from './host';
import { CallDispatcher, DispatchHooks } from './dispatcher';
import { MetaCallArgs, MetaCallVerifier } from './meta-call';
import { UpgradeController } from './upgrade';
import { BridgeDeposits, DepositProof, DepositReceipt } from './deposit';
import { ENGINE_VERSION, EngineConfig, EngineOpts, loadConfig } from './config';
import { EngineError } from './errors';
import { BIGINT_0 } from './arithmetic';
import { bytesToBigInt, concatBytes, toBytes32, uintToBytes } from './bytes';
import { MemReader } from './mem-reader';
import { hostAccountToAddress, to0xAddress, toAddress } from './utils';
import {
    BlockOverride,
    CallArgs,
    decodeBeginBlockArgs,
    decodeBeginChainArgs,
    decodeCallArgs,
    decodeDepositArgs,
    decodeMetaCallArgs,
    decodeNewArgs,
    decodeRawAddress,
    decodeStorageAtArgs,
    decodeViewArgs,
    encodeDepositReceipt,
    encodeOutcome,
    encodeUint,
    GenesisAccount,
    NewArgs,
    ViewArgs,
} from './codec';
import { debugEngine } from './logger';

const EMPTY = new Uint8Array(0);

/** Names of the engine metadata entries */
const META = {
    owner: 'owner',
    chainId: 'chain_id',
    bridgeProvider: 'bridge_provider',
    upgradeDelay: 'upgrade_delay_blocks',
} as const;

export interface EngineMetadata {
    readonly owner: string;
    readonly chainId: bigint;
    /** '' when none */
    readonly bridgeProvider: string;
    readonly upgradeDelayBlocks: bigint;
}

export function newEngine(host: IHost, opts?: EngineOpts) {
    return new Engine(host, opts);
}

/**
 * Entry points of an engine deployment.
 *
 * Every mutating entry point runs in a state overlay that is flushed to the host at once,
 * or dropped when the entry point is rejected.
 */
export class Engine {
    readonly config: EngineConfig;
    readonly state: StateAdapter;
    private readonly hooks: DispatchHooks = {};

    constructor(readonly host: IHost, opts?: EngineOpts) {
        this.config = loadConfig(opts);
        this.state = new StateAdapter(host);
    }

    // ========== tracing

    /** Called before every executed opcode */
    watch(fn: OnStep): this {
        this.hooks.onStep = fn;
        return this;
    }

    onStartingCall(fn: OnStartingCall): this {
        this.hooks.onStartingCall = fn;
        return this;
    }

    onEndingCall(fn: OnEndedCall): this {
        this.hooks.onEndingCall = fn;
        return this;
    }

    /** Called for each log of a successful top-level call */
    onLog(fn: OnLog): this {
        this.hooks.onLog = fn;
        return this;
    }

    // ========== identities

    /** EVM address of the engine itself (used as EIP-712 verifying contract) */
    get address(): Address {
        return hostAccountToAddress(this.host.currentAccountId());
    }

    /** EVM address of the host account calling the engine */
    get callerAddress(): Address {
        return hostAccountToAddress(this.host.predecessorAccountId());
    }

    private mutate<T>(fn: () => T): T {
        const handle = this.state.beginOverlay();
        try {
            const ret = fn();
            this.state.commit(handle);
            return ret;
        } catch (e) {
            this.state.rollback(handle);
            throw e;
        }
    }

    // ========== metadata

    private readString(name: string): string | null {
        const raw = this.state.getConfig(name);
        return raw && bytesToUtf8(raw);
    }

    get isInitialized(): boolean {
        return this.state.getConfig(META.owner) !== null;
    }

    get metadata(): EngineMetadata {
        const owner = this.readString(META.owner);
        if (owner === null) {
            throw new EngineError('ERR_NOT_INITIALIZED', 'the engine has not been initialized');
        }
        const chainId = this.state.getConfig(META.chainId);
        const delay = this.state.getConfig(META.upgradeDelay);
        return {
            owner,
            chainId: chainId ? bytesToBigInt(chainId) : BIGINT_0,
            bridgeProvider: this.readString(META.bridgeProvider) ?? '',
            upgradeDelayBlocks: delay ? bytesToBigInt(delay) : this.config.upgradeDelayBlocks,
        };
    }

    /** `new` entry point: sets the deployment metadata, once */
    init(args: NewArgs) {
        if (this.isInitialized) {
            throw new EngineError('ERR_ALREADY_INITIALIZED', 'the engine is already initialized');
        }
        if (!args.owner) {
            throw new EngineError('ERR_DESERIALIZE', 'an owner is required');
        }
        const upgradeDelayBlocks = args.upgradeDelayBlocks || this.config.upgradeDelayBlocks;
        this.mutate(() => {
            this.state.setConfig(META.owner, utf8ToBytes(args.owner));
            this.state.setConfig(META.chainId, toBytes32(args.chainId));
            this.state.setConfig(META.bridgeProvider, utf8ToBytes(args.bridgeProvider));
            this.state.setConfig(META.upgradeDelay, uintToBytes(upgradeDelayBlocks, 8));
        });
        debugEngine(`initialized for chain ${args.chainId}, owned by ${args.owner}`);
    }

    getVersion(): string {
        return ENGINE_VERSION;
    }

    getOwner(): string {
        return this.metadata.owner;
    }

    getBridgeProvider(): string {
        return this.metadata.bridgeProvider;
    }

    getChainId(): bigint {
        return this.metadata.chainId;
    }

    // ========== upgrades

    private upgrades(): UpgradeController {
        const { owner, upgradeDelayBlocks } = this.metadata;
        return new UpgradeController(this.state, this.host, owner, upgradeDelayBlocks);
    }

    stageUpgrade(code: Uint8Array): bigint {
        const upgrades = this.upgrades();
        return this.mutate(() => upgrades.stageUpgrade(this.host.predecessorAccountId(), code));
    }

    getUpgradeIndex(): bigint {
        return this.upgrades().getUpgradeIndex();
    }

    deployUpgrade() {
        const upgrades = this.upgrades();
        this.mutate(() => upgrades.deployUpgrade(this.host.predecessorAccountId()));
    }

    // ========== bridge

    private deposits(): BridgeDeposits {
        return new BridgeDeposits(this.state, this.metadata.bridgeProvider, this.config.bridgeCustodian);
    }

    /** Credits a Deposited event of the bridged chain, submitted by the bridge provider */
    deposit(proof: DepositProof): DepositReceipt {
        const deposits = this.deposits();
        return this.mutate(() => deposits.deposit(this.host.predecessorAccountId(), proof));
    }

    isUsedProof(proof: DepositProof): boolean {
        return this.deposits().isUsed(proof);
    }

    // ========== execution

    blockContext(chainId: bigint): BlockContext {
        const override = this.state.readRaw(keys.blockOverride());
        if (override) {
            const data = new MemReader(override);
            return {
                number: bytesToBigInt(data.slice(0, 8)),
                timestamp: bytesToBigInt(data.slice(8, 8)),
                coinbase: bytesToBigInt(data.slice(16, 20)),
                prevRandao: bytesToBigInt(data.slice(36, 32)),
                gasLimit: bytesToBigInt(data.slice(68, 8)),
                baseFee: BIGINT_0,
                chainId,
            };
        }
        return {
            number: this.host.blockIndex(),
            timestamp: this.host.blockTimestamp(),
            coinbase: BIGINT_0,
            prevRandao: BIGINT_0,
            gasLimit: this.config.defaultGasLimit,
            baseFee: BIGINT_0,
            chainId,
        };
    }

    private dispatcher(origin: Address, gasPrice?: bigint): CallDispatcher {
        const { chainId, bridgeProvider } = this.metadata;
        return new CallDispatcher({
            state: this.state,
            tx: {
                origin,
                gasPrice: gasPrice ?? BIGINT_0,
                block: this.blockContext(chainId),
                engineAccountId: this.host.currentAccountId(),
            },
            config: this.config,
            predecessorAccountId: this.host.predecessorAccountId(),
            currentAccountId: this.host.currentAccountId(),
            bridgeProvider,
            hooks: this.hooks,
        });
    }

    /** Deploys a contract on behalf of the calling host account */
    deployCode(initCode: Uint8Array, opts?: TxOpts): ExecutionOutcome {
        const sender = this.callerAddress;
        return this.dispatcher(opts?.origin ?? sender, opts?.gasPrice).deployCode(sender, BIGINT_0, initCode, opts);
    }

    /** Calls a contract on behalf of the calling host account */
    call(args: CallArgs, opts?: TxOpts): ExecutionOutcome {
        const sender = this.callerAddress;
        return this.dispatcher(opts?.origin ?? sender, opts?.gasPrice).call(sender, args.contract, args.value, args.input, {
            ...opts,
            gasLimit: args.gasLimit || opts?.gasLimit,
        });
    }

    /** Executes a signed Ethereum transaction (RLP, legacy or typed) */
    rawCall(signedTx: Uint8Array): ExecutionOutcome {
        let tx: Transaction;
        try {
            tx = utils.parseTransaction(signedTx);
        } catch (e) {
            throw new EngineError('ERR_DESERIALIZE', `invalid transaction: ${e instanceof Error ? e.message : String(e)}`);
        }
        if (!tx.from) {
            throw new EngineError('ERR_INVALID_SIGNATURE', 'unsigned transaction');
        }
        const { chainId } = this.metadata;
        if (BigInt(tx.chainId) !== chainId) {
            throw new EngineError('ERR_INVALID_CHAIN_ID', `expected chain ${chainId}, got ${tx.chainId}`);
        }
        const sender = toAddress(tx.from);
        const expectedNonce = this.state.getNonce(sender);
        if (BigInt(tx.nonce) !== expectedNonce) {
            throw new EngineError('ERR_INCORRECT_NONCE', `expected ${expectedNonce}, got ${tx.nonce}`);
        }

        const gasPrice = (tx.gasPrice ?? tx.maxFeePerGas)?.toBigInt();
        const opts = { gasLimit: tx.gasLimit.toBigInt(), gasPrice };
        const data = utils.arrayify(tx.data);
        const dispatcher = this.dispatcher(sender, gasPrice);
        if (!tx.to) {
            return dispatcher.deployCode(sender, tx.value.toBigInt(), data, opts);
        }
        return dispatcher.call(sender, toAddress(tx.to), tx.value.toBigInt(), data, { ...opts, consumeNonce: true });
    }

    /** Executes a call signed by an EVM account and submitted by a relayer */
    metaCall(args: MetaCallArgs): ExecutionOutcome {
        const { chainId } = this.metadata;
        const verified = new MetaCallVerifier(chainId, this.address).verify(args, this.state, this.callerAddress);
        return this.dispatcher(verified.sender).call(verified.sender, verified.contract, verified.value, verified.input, {
            consumeNonce: true,
            fee: verified.fee,
        });
    }

    /** Runs a call without persisting anything */
    view(args: ViewArgs, opts?: TxOpts): ExecutionOutcome {
        return this.dispatcher(opts?.origin ?? args.sender, opts?.gasPrice).view(args.sender, args.contract, args.value, args.input, opts);
    }

    // ========== accessors

    getCode(address: Address): Uint8Array {
        return this.state.getCode(address);
    }

    getBalance(address: Address): bigint {
        return this.state.getBalance(address);
    }

    getNonce(address: Address): bigint {
        return this.state.getNonce(address);
    }

    getStorageAt(address: Address, slot: bigint): bigint {
        return this.state.getStorage(address, slot);
    }

    // ========== benchmarking

    private requireBenchmark(method: string) {
        if (!this.config.benchmark) {
            throw new EngineError('ERR_BENCHMARK_DISABLED', `${method} is only available in benchmark mode`);
        }
    }

    /** Resets the chain id and credits genesis balances */
    beginChain(chainId: bigint, genesis: readonly GenesisAccount[]) {
        this.requireBenchmark('begin_chain');
        if (!this.isInitialized) {
            throw new EngineError('ERR_NOT_INITIALIZED', 'the engine has not been initialized');
        }
        this.mutate(() => {
            this.state.setConfig(META.chainId, toBytes32(chainId));
            for (const { address, balance } of genesis) {
                this.state.setBalance(address, balance);
            }
        });
        debugEngine(`chain ${chainId} started with ${genesis.length} funded accounts`);
    }

    /** Overrides the block context seen by the following calls */
    beginBlock(block: BlockOverride) {
        this.requireBenchmark('begin_block');
        this.mutate(() =>
            this.state.writeRaw(
                keys.blockOverride(),
                concatBytes(
                    uintToBytes(block.number, 8),
                    uintToBytes(block.timestamp, 8),
                    uintToBytes(block.coinbase, 20),
                    toBytes32(block.prevRandao),
                    uintToBytes(block.gasLimit, 8),
                ),
            ),
        );
        debugEngine(`block ${block.number} begins`);
    }

    // ========== host boundary

    /** Runs an entry point from its serialized input, and serializes its result */
    invoke(method: string, input: Uint8Array = EMPTY): Uint8Array {
        debugEngine(`${method} invoked by ${this.host.predecessorAccountId()} (${input.length} bytes)`);
        switch (method) {
            case 'new':
                this.init(decodeNewArgs(input));
                return EMPTY;
            case 'get_version':
                return utf8ToBytes(this.getVersion());
            case 'get_owner':
                return utf8ToBytes(this.getOwner());
            case 'get_bridge_provider':
                return utf8ToBytes(this.getBridgeProvider());
            case 'get_chain_id':
                return encodeUint(this.getChainId());
            case 'get_upgrade_index':
                return encodeUint(this.getUpgradeIndex(), 'uint64');
            case 'stage_upgrade':
                this.stageUpgrade(input);
                return EMPTY;
            case 'deploy_upgrade':
                this.deployUpgrade();
                return EMPTY;
            case 'deposit':
                return encodeDepositReceipt(this.deposit(decodeDepositArgs(input)));
            case 'deploy_code':
                return encodeOutcome(this.deployCode(input));
            case 'call':
                return encodeOutcome(this.call(decodeCallArgs(input)));
            case 'raw_call':
                return encodeOutcome(this.rawCall(input));
            case 'meta_call':
                return encodeOutcome(this.metaCall(decodeMetaCallArgs(input)));
            case 'view':
                return encodeOutcome(this.view(decodeViewArgs(input)));
            case 'get_code':
                return this.getCode(decodeRawAddress(input));
            case 'get_balance':
                return encodeUint(this.getBalance(decodeRawAddress(input)));
            case 'get_nonce':
                return encodeUint(this.getNonce(decodeRawAddress(input)));
            case 'get_storage_at': {
                const { address, slot } = decodeStorageAtArgs(input);
                return toBytes32(this.getStorageAt(address, slot));
            }
            case 'begin_chain': {
                const { chainId, genesis } = decodeBeginChainArgs(input);
                this.beginChain(chainId, genesis);
                return EMPTY;
            }
            case 'begin_block':
                this.beginBlock(decodeBeginBlockArgs(input));
                return EMPTY;
            default:
                throw new EngineError('ERR_UNKNOWN_METHOD', `unknown method "${method}"`);
        }
    }

    toString() {
        return `Engine(${this.host.currentAccountId()} @ ${to0xAddress(this.address)})`;
    }
}
