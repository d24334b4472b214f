import 'mocha';
import { expect } from 'chai';
import { expectEngineError, newTestEngine, OWNER, TestEngine } from './test-utils';
import { NO_UPGRADE_INDEX } from '../src/upgrade';
import { decodeUint } from '../src/codec';

const NEW_CODE = new Uint8Array([0x00, 0x61, 0x73, 0x6d]);

describe('Upgrades', () => {
    let t: TestEngine;
    beforeEach(() => {
        // block 1, default delay of 1 block
        t = newTestEngine();
    });

    it('nothing is staged initially', () => {
        expect(t.engine.getUpgradeIndex()).to.equal(NO_UPGRADE_INDEX);
        expect(decodeUint(t.engine.invoke('get_upgrade_index'))).to.equal(BigInt('18446744073709551615'));
    });

    it('only the owner can stage', () => {
        expectEngineError(() => t.engine.stageUpgrade(NEW_CODE), 'ERR_NOT_ALLOWED');
        expect(t.engine.getUpgradeIndex()).to.equal(NO_UPGRADE_INDEX);
    });

    it('staging records the unlock block', () => {
        t.host.as(OWNER);
        expect(t.engine.stageUpgrade(NEW_CODE)).to.equal(BigInt(2));
        expect(t.engine.getUpgradeIndex()).to.equal(BigInt(2));
    });

    it('staging again replaces the staged code', () => {
        t.host.as(OWNER);
        t.engine.stageUpgrade(new Uint8Array([1]));
        t.host.advanceBlocks(3);
        t.engine.stageUpgrade(NEW_CODE);
        expect(t.engine.getUpgradeIndex()).to.equal(BigInt(5));
        t.host.advanceBlocks(1);
        t.engine.deployUpgrade();
        expect(t.host.deployedCode).to.deep.equal(NEW_CODE);
    });

    it('rejects empty code', () => {
        t.host.as(OWNER);
        expectEngineError(() => t.engine.invoke('stage_upgrade', new Uint8Array(0)), 'ERR_DESERIALIZE');
    });

    it('cannot deploy before the delay', () => {
        t.host.as(OWNER);
        t.engine.stageUpgrade(NEW_CODE);
        expectEngineError(() => t.engine.deployUpgrade(), 'ERR_NOT_READY');
        expect(t.host.deployedCode).to.equal(null);
    });

    it('cannot deploy when nothing is staged', () => {
        t.host.as(OWNER);
        expectEngineError(() => t.engine.deployUpgrade(), 'ERR_NOT_READY');
    });

    it('deploys once the delay has passed', () => {
        t.host.as(OWNER);
        t.engine.invoke('stage_upgrade', NEW_CODE);
        t.host.advanceBlocks(1);
        t.engine.invoke('deploy_upgrade');
        expect(t.host.deployedCode).to.deep.equal(NEW_CODE);
        expect(t.engine.getUpgradeIndex()).to.equal(NO_UPGRADE_INDEX);
    });

    it('only the owner can deploy', () => {
        t.host.as(OWNER);
        t.engine.stageUpgrade(NEW_CODE);
        t.host.advanceBlocks(10).as('mallory.host');
        expectEngineError(() => t.engine.deployUpgrade(), 'ERR_NOT_ALLOWED');
        expect(t.host.deployedCode).to.equal(null);
    });

    it('uses the delay given at initialization', () => {
        const { engine, host } = newTestEngine(undefined, false);
        engine.init({ owner: OWNER, chainId: BigInt(1), bridgeProvider: '', upgradeDelayBlocks: BigInt(5) });
        host.as(OWNER);
        expect(engine.stageUpgrade(NEW_CODE)).to.equal(BigInt(6));
    });

    it('falls back to the configured delay', () => {
        const { engine, host } = newTestEngine({ upgradeDelayBlocks: BigInt(3) });
        host.as(OWNER);
        expect(engine.stageUpgrade(NEW_CODE)).to.equal(BigInt(4));
    });

    it('requires an initialized engine', () => {
        const { engine } = newTestEngine(undefined, false);
        expectEngineError(() => engine.getUpgradeIndex(), 'ERR_NOT_INITIALIZED');
    });
});
