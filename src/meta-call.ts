import { utils } from 'ethers';
import { Address } from './interfaces';
import { StateAdapter } from './state';
import { EngineError } from './errors';
import { BIGINT_0 } from './arithmetic';
import { bytesToHex } from './bytes';
import { to0xAddress, toAddress } from './utils';
import { Wei } from './wei';
import { debugMeta } from './logger';

export const META_CALL_DOMAIN_NAME = 'HostEVM';
export const META_CALL_DOMAIN_VERSION = '1';

export const META_CALL_TYPES = {
    MetaCall: [
        { name: 'nonce', type: 'uint256' },
        { name: 'feeAmount', type: 'uint256' },
        { name: 'feeAddress', type: 'address' },
        { name: 'contract', type: 'address' },
        { name: 'value', type: 'uint256' },
        { name: 'input', type: 'bytes' },
    ],
};

/** The signed part of a meta-transaction */
export interface MetaCallMessage {
    readonly nonce: bigint;
    readonly feeAmount: Wei;
    /** Zero means "whoever relays it" */
    readonly feeAddress: Address;
    readonly contract: Address;
    readonly value: Wei;
    readonly input: Uint8Array;
}

/** A meta-transaction envelope, as submitted by a relayer */
export interface MetaCallArgs extends MetaCallMessage {
    /** Declared signer */
    readonly sender: Address;
    readonly chainId: bigint;
    readonly verifyingContract: Address;
    /** 65 bytes r ‖ s ‖ v */
    readonly signature: Uint8Array;
}

/** An envelope that passed verification: the inner call can run on behalf of `sender` */
export interface VerifiedMetaCall {
    readonly sender: Address;
    readonly contract: Address;
    readonly value: Wei;
    readonly input: Uint8Array;
    readonly fee: { readonly amount: Wei; readonly to: Address };
}

function typedValue(msg: MetaCallMessage) {
    return {
        nonce: msg.nonce,
        feeAmount: msg.feeAmount,
        feeAddress: to0xAddress(msg.feeAddress),
        contract: to0xAddress(msg.contract),
        value: msg.value,
        input: bytesToHex(msg.input),
    };
}

/**
 * Checks EIP-712 signed envelopes that let a relayer submit calls on behalf of an EVM account.
 * The domain binds signatures to one chain id and one engine deployment.
 */
export class MetaCallVerifier {
    constructor(readonly chainId: bigint, readonly engineAddress: Address) {}

    get domain() {
        return {
            name: META_CALL_DOMAIN_NAME,
            version: META_CALL_DOMAIN_VERSION,
            chainId: this.chainId,
            verifyingContract: to0xAddress(this.engineAddress),
        };
    }

    /** EIP-712 digest that the sender signs */
    digest(msg: MetaCallMessage): string {
        return utils._TypedDataEncoder.hash(this.domain, META_CALL_TYPES, typedValue(msg));
    }

    /**
     * Validates an envelope against the current state, without mutating anything.
     * @param relayer - Address the fee goes to when the envelope names none
     */
    verify(args: MetaCallArgs, state: StateAdapter, relayer: Address): VerifiedMetaCall {
        if (args.chainId !== this.chainId || args.verifyingContract !== this.engineAddress) {
            throw new EngineError('ERR_DOMAIN_MISMATCH', `envelope for chain ${args.chainId} at ${to0xAddress(args.verifyingContract)}`);
        }

        let signer: Address;
        try {
            signer = toAddress(utils.verifyTypedData(this.domain, META_CALL_TYPES, typedValue(args), args.signature));
        } catch (e) {
            debugMeta(`signature recovery failed: ${e instanceof Error ? e.message : String(e)}`);
            throw new EngineError('ERR_INVALID_SIGNATURE', 'cannot recover signer');
        }
        if (signer !== args.sender) {
            throw new EngineError('ERR_INVALID_SIGNATURE', `signed by ${to0xAddress(signer)}, not by ${to0xAddress(args.sender)}`);
        }

        const expectedNonce = state.getNonce(args.sender);
        if (args.nonce !== expectedNonce) {
            throw new EngineError('ERR_INCORRECT_NONCE', `expected ${expectedNonce}, got ${args.nonce}`);
        }
        if (args.feeAmount > state.getBalance(args.sender)) {
            throw new EngineError('ERR_INSUFFICIENT_BALANCE', `cannot pay a fee of ${args.feeAmount}`);
        }

        debugMeta(`meta call #${args.nonce} of ${to0xAddress(args.sender)} verified`);
        return {
            sender: args.sender,
            contract: args.contract,
            value: args.value,
            input: args.input,
            fee: { amount: args.feeAmount, to: args.feeAddress === BIGINT_0 ? relayer : args.feeAddress },
        };
    }
}

/** Signs a meta-call message (tooling and tests) */
export function signMetaCall(privateKey: utils.BytesLike, verifier: MetaCallVerifier, msg: MetaCallMessage): Uint8Array {
    const signature = new utils.SigningKey(privateKey).signDigest(verifier.digest(msg));
    return utils.arrayify(utils.joinSignature(signature));
}
