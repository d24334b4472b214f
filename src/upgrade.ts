import { IHost } from './interfaces';
import { StateAdapter } from './state';
import { keys } from './host';
import { EngineError } from './errors';
import { MAX_UINT64 } from './arithmetic';
import { bytesToBigInt, uintToBytes } from './bytes';
import { debugUpgrade } from './logger';

/** Returned by `getUpgradeIndex` when nothing is staged */
export const NO_UPGRADE_INDEX = MAX_UINT64;

export interface PendingUpgrade {
    readonly code: Uint8Array;
    /** First block index at which the upgrade can be deployed */
    readonly unlockIndex: bigint;
}

/**
 * Owner-gated, delayed replacement of the engine's own code.
 * Staging records the code and the block it unlocks at; deploying hands it to the host.
 */
export class UpgradeController {
    constructor(
        private readonly state: StateAdapter,
        private readonly host: IHost,
        private readonly owner: string,
        private readonly delayBlocks: bigint,
    ) {}

    private checkOwner(caller: string, action: string) {
        if (caller !== this.owner) {
            throw new EngineError('ERR_NOT_ALLOWED', `only the owner can ${action} an upgrade (called by ${caller})`);
        }
    }

    get pending(): PendingUpgrade | null {
        const code = this.state.readRaw(keys.upgrade('code'));
        const index = this.state.readRaw(keys.upgrade('index'));
        if (!code || !index) {
            return null;
        }
        return { code, unlockIndex: bytesToBigInt(index) };
    }

    /** Stages `code`, replacing any previously staged upgrade */
    stageUpgrade(caller: string, code: Uint8Array): bigint {
        this.checkOwner(caller, 'stage');
        if (!code.length) {
            throw new EngineError('ERR_DESERIALIZE', 'empty upgrade code');
        }
        const unlockIndex = this.host.blockIndex() + this.delayBlocks;
        this.state.writeRaw(keys.upgrade('code'), code);
        this.state.writeRaw(keys.upgrade('index'), uintToBytes(unlockIndex, 8));
        debugUpgrade(`staged ${code.length} bytes, unlocked at block ${unlockIndex}`);
        return unlockIndex;
    }

    getUpgradeIndex(): bigint {
        return this.pending?.unlockIndex ?? NO_UPGRADE_INDEX;
    }

    deployUpgrade(caller: string) {
        this.checkOwner(caller, 'deploy');
        const pending = this.pending;
        if (!pending) {
            throw new EngineError('ERR_NOT_READY', 'no upgrade staged');
        }
        const current = this.host.blockIndex();
        if (current < pending.unlockIndex) {
            throw new EngineError('ERR_NOT_READY', `upgrade unlocks at block ${pending.unlockIndex} (now ${current})`);
        }
        this.state.writeRaw(keys.upgrade('code'), null);
        this.state.writeRaw(keys.upgrade('index'), null);
        this.host.deploySelf(pending.code);
        debugUpgrade(`deployed ${pending.code.length} bytes at block ${current}`);
    }
}
