/**
 * Frame-level failures. These end the frame that raised them (and discard its overlay),
 * but never the host invocation: the parent frame just sees a failed outcome.
 */
export enum ERROR {
    OUT_OF_GAS = 'out of gas',
    STACK_UNDERFLOW = 'stack underflow',
    STACK_OVERFLOW = 'stack overflow',
    INVALID_OPCODE = 'invalid opcode',
    INVALID_JUMP = 'invalid JUMP',
    WRITE_PROTECTION = 'write protection',
    INSUFFICIENT_BALANCE = 'insufficient balance',
    CALL_DEPTH_EXCEEDED = 'call depth exceeded',
    CREATE_COLLISION = 'create collision',
    CODESIZE_EXCEEDS_MAXIMUM = 'code size to deposit exceeds maximum code size',
    INVALID_CODE_PREFIX = 'invalid bytecode deployed',
    PRECOMPILE_INPUT = 'invalid precompile input',
    RETURNDATA_OUT_OF_BOUNDS = 'returndata out of bounds',
    VALUE_OVERFLOW = 'value overflow',
}

/** Stable numeric codes, used when an outcome crosses the host boundary */
export const ERROR_CODES: readonly ERROR[] = [
    ERROR.OUT_OF_GAS,
    ERROR.STACK_UNDERFLOW,
    ERROR.STACK_OVERFLOW,
    ERROR.INVALID_OPCODE,
    ERROR.INVALID_JUMP,
    ERROR.WRITE_PROTECTION,
    ERROR.INSUFFICIENT_BALANCE,
    ERROR.CALL_DEPTH_EXCEEDED,
    ERROR.CREATE_COLLISION,
    ERROR.CODESIZE_EXCEEDS_MAXIMUM,
    ERROR.INVALID_CODE_PREFIX,
    ERROR.PRECOMPILE_INPUT,
    ERROR.RETURNDATA_OUT_OF_BOUNDS,
    ERROR.VALUE_OVERFLOW,
];

export function errorCode(error: ERROR): number {
    return ERROR_CODES.indexOf(error) + 1;
}

export class EvmError extends Error {
    constructor(readonly error: ERROR, detail?: string) {
        super(detail ? `${error}: ${detail}` : error);
        this.name = 'EvmError';
    }
}

export function trap(error: ERROR, detail?: string): never {
    throw new EvmError(error, detail);
}

/**
 * Codes surfaced to the host when a whole invocation is rejected.
 * Nothing has been written when one of these is raised.
 */
export type EngineErrorCode =
    | 'ERR_DESERIALIZE'
    | 'ERR_UNKNOWN_METHOD'
    | 'ERR_NOT_INITIALIZED'
    | 'ERR_ALREADY_INITIALIZED'
    | 'ERR_NOT_ALLOWED'
    | 'ERR_NOT_READY'
    | 'ERR_INVALID_SIGNATURE'
    | 'ERR_DOMAIN_MISMATCH'
    | 'ERR_INVALID_CHAIN_ID'
    | 'ERR_INCORRECT_NONCE'
    | 'ERR_INSUFFICIENT_BALANCE'
    | 'ERR_BENCHMARK_DISABLED'
    // bridge deposits
    | 'ERR_RLP_FAILED'
    | 'ERR_PARSE_DEPOSIT_EVENT'
    | 'ERR_INVALID_SENDER'
    | 'ERR_INVALID_AMOUNT'
    | 'ERR_INVALID_FEE'
    | 'ERR_INVALID_EVENT_MESSAGE_FORMAT'
    | 'ERR_INVALID_ACCOUNT_ID'
    | 'ERR_FAILED_DECODE_ETH_ADDRESS'
    | 'ERR_WRONG_ETH_ADDRESS_LENGTH'
    | 'ERR_WRONG_EVENT_ADDRESS'
    | 'ERR_NOT_ENOUGH_BALANCE_FOR_FEE'
    | 'ERR_PROOF_EXIST'
    | 'ERR_BALANCE_OVERFLOW';

export class EngineError extends Error {
    constructor(readonly code: EngineErrorCode, message?: string) {
        super(message ? `${code}: ${message}` : code);
        this.name = 'EngineError';
    }
}

export function isEngineError(e: unknown, code?: EngineErrorCode): e is EngineError {
    return e instanceof EngineError && (!code || e.code === code);
}
