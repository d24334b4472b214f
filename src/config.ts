import * as dotenv from 'dotenv';
import { Address, EIP } from './interfaces';
import { toAddress } from './utils';
import { PrecompileRegistry } from './precompiles';

export const ENGINE_VERSION = '1.0.0';

export interface EngineOpts {
    /** Blocks to wait between stage_upgrade and deploy_upgrade */
    upgradeDelayBlocks?: bigint;
    /** Gas limit of top-level calls that do not specify one */
    defaultGasLimit?: bigint;
    /** Enables begin_chain/begin_block (never on a production deployment) */
    benchmark?: boolean;
    /** EIPs to take into account (defaults to "all") */
    eips?: 'all' | EIP;
    precompiles?: PrecompileRegistry;
    /** Bridged-chain contract whose Deposited events are accepted (any when null) */
    bridgeCustodian?: Address | null;
}

export type EngineConfig = Required<EngineOpts>;

const DEFAULT_UPGRADE_DELAY = BigInt(1);
const DEFAULT_GAS_LIMIT = BigInt(30_000_000);

function parseAddress(name: string, raw: string | undefined): Address | null {
    if (raw === undefined || raw === '') {
        return null;
    }
    if (!/^(0x)?[0-9a-fA-F]{40}$/.test(raw)) {
        throw new Error(`Invalid ${name} environment variable: "${raw}" is not an address`);
    }
    return toAddress(raw.startsWith('0x') ? raw : `0x${raw}`);
}

function parseBigInt(name: string, raw: string | undefined, fallback: bigint): bigint {
    if (raw === undefined || raw === '') {
        return fallback;
    }
    if (!/^\d+$/.test(raw)) {
        throw new Error(`Invalid ${name} environment variable: "${raw}" is not a positive integer`);
    }
    return BigInt(raw);
}

/**
 * Resolves engine options: explicit options first, then environment variables
 * (a .env file is loaded if present), then defaults.
 */
export function loadConfig(opts?: EngineOpts, env: NodeJS.ProcessEnv = process.env): EngineConfig {
    if (env === process.env) {
        dotenv.config();
    }
    return {
        upgradeDelayBlocks:
            opts?.upgradeDelayBlocks ?? parseBigInt('ENGINE_UPGRADE_DELAY_BLOCKS', env.ENGINE_UPGRADE_DELAY_BLOCKS, DEFAULT_UPGRADE_DELAY),
        defaultGasLimit: opts?.defaultGasLimit ?? parseBigInt('ENGINE_DEFAULT_GAS_LIMIT', env.ENGINE_DEFAULT_GAS_LIMIT, DEFAULT_GAS_LIMIT),
        benchmark: opts?.benchmark ?? env.ENGINE_BENCHMARK === 'true',
        eips: opts?.eips ?? 'all',
        precompiles: opts?.precompiles ?? PrecompileRegistry.standard(),
        bridgeCustodian: opts?.bridgeCustodian !== undefined ? opts.bridgeCustodian : parseAddress('ENGINE_BRIDGE_CUSTODIAN', env.ENGINE_BRIDGE_CUSTODIAN),
    };
}

export function supportsEip(config: Pick<EngineConfig, 'eips'>, eip: keyof EIP): boolean {
    return config.eips === 'all' || !!config.eips[eip];
}
