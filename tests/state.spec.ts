import 'mocha';
import { expect } from 'chai';
import { StateAdapter } from '../src/state';
import { keys, MemoryHost } from '../src/host';
import { ERROR, EvmError } from '../src/errors';
import { bytesToHex } from '../src/bytes';

const A = BigInt(0xa);
const B = BigInt(0xb);

function newState() {
    const host = new MemoryHost();
    return { host, state: new StateAdapter(host) };
}

describe('State adapter', () => {
    it('reads zero for absent entries', () => {
        const { state } = newState();
        expect(state.getBalance(A)).to.equal(BigInt(0));
        expect(state.getNonce(A)).to.equal(BigInt(0));
        expect(state.getCode(A).length).to.equal(0);
        expect(state.getStorage(A, BigInt(1))).to.equal(BigInt(0));
        expect(state.isEmpty(A)).to.equal(true);
    });

    it('cannot write outside of an overlay', () => {
        const { state } = newState();
        expect(() => state.setBalance(A, BigInt(1))).to.throw('outside of an overlay');
    });

    it('does not touch the host until the root overlay commits', () => {
        const { state, host } = newState();
        const root = state.beginOverlay();
        state.setBalance(A, BigInt(100));
        expect(host.size).to.equal(0);
        expect(state.getBalance(A)).to.equal(BigInt(100));
        state.commit(root);
        expect(host.size).to.equal(1);
        expect(state.getBalance(A)).to.equal(BigInt(100));
    });

    it('discard drops every write', () => {
        const { state, host } = newState();
        const root = state.beginOverlay();
        state.setBalance(A, BigInt(100));
        state.setStorage(A, BigInt(1), BigInt(2));
        state.discard(root);
        expect(host.size).to.equal(0);
        expect(state.getBalance(A)).to.equal(BigInt(0));
    });

    it('a child sees its parent writes, and its commit is visible to the parent', () => {
        const { state } = newState();
        const root = state.beginOverlay();
        state.setBalance(A, BigInt(10));
        const child = state.beginOverlay();
        expect(state.getBalance(A)).to.equal(BigInt(10));
        state.setBalance(B, BigInt(5));
        state.commit(child);
        expect(state.getBalance(B)).to.equal(BigInt(5));
        state.commit(root);
        expect(state.getBalance(B)).to.equal(BigInt(5));
    });

    it('a discarded child leaves its parent untouched', () => {
        const { state } = newState();
        const root = state.beginOverlay();
        state.setStorage(A, BigInt(1), BigInt(1));
        const child = state.beginOverlay();
        state.setStorage(A, BigInt(1), BigInt(2));
        state.discard(child);
        expect(state.getStorage(A, BigInt(1))).to.equal(BigInt(1));
        state.commit(root);
    });

    it('only the innermost overlay can be closed', () => {
        const { state } = newState();
        const root = state.beginOverlay();
        state.beginOverlay();
        expect(() => state.commit(root)).to.throw('not the innermost');
        expect(() => state.discard(root)).to.throw('not the innermost');
    });

    it('rollback closes nested overlays', () => {
        const { state, host } = newState();
        const root = state.beginOverlay();
        state.setBalance(A, BigInt(1));
        state.beginOverlay();
        state.setBalance(B, BigInt(1));
        state.rollback(root);
        expect(state.depth).to.equal(0);
        expect(host.size).to.equal(0);
    });

    it('writing zero removes the host entry', () => {
        const { state, host } = newState();
        let h = state.beginOverlay();
        state.setStorage(A, BigInt(1), BigInt(7));
        state.commit(h);
        expect(host.has(keys.storage(A, 0, BigInt(1)))).to.equal(true);

        h = state.beginOverlay();
        state.setStorage(A, BigInt(1), BigInt(0));
        expect(state.diff(h)).to.deep.equal([{ key: bytesToHex(keys.storage(A, 0, BigInt(1))), value: null }]);
        state.commit(h);
        expect(host.has(keys.storage(A, 0, BigInt(1)))).to.equal(false);
    });

    it('original storage is the committed value', () => {
        const { state } = newState();
        let h = state.beginOverlay();
        state.setStorage(A, BigInt(1), BigInt(7));
        state.commit(h);
        h = state.beginOverlay();
        state.setStorage(A, BigInt(1), BigInt(8));
        expect(state.getOriginalStorage(A, BigInt(1))).to.equal(BigInt(7));
        expect(state.getStorage(A, BigInt(1))).to.equal(BigInt(8));
        state.discard(h);
    });

    it('diff lists writes sorted by key', () => {
        const { state } = newState();
        const h = state.beginOverlay();
        state.setNonce(B, BigInt(1));
        state.setBalance(A, BigInt(1));
        const diff = state.diff(h);
        expect(diff.map(d => d.key)).to.deep.equal([bytesToHex(keys.nonce(B)), bytesToHex(keys.balance(A))]);
    });

    it('flushes in key order', () => {
        const host = new MemoryHost();
        const written: string[] = [];
        const write = host.write.bind(host);
        host.write = (key, value) => {
            written.push(bytesToHex(key));
            write(key, value);
        };
        const state = new StateAdapter(host);
        const h = state.beginOverlay();
        state.setBalance(B, BigInt(1));
        state.setNonce(A, BigInt(1));
        state.setBalance(A, BigInt(1));
        state.commit(h);
        expect(written).to.deep.equal([bytesToHex(keys.nonce(A)), bytesToHex(keys.balance(A)), bytesToHex(keys.balance(B))]);
    });

    describe('balances', () => {
        it('transfer', () => {
            const { state } = newState();
            state.beginOverlay();
            state.setBalance(A, BigInt(10));
            state.transfer(A, B, BigInt(4));
            expect(state.getBalance(A)).to.equal(BigInt(6));
            expect(state.getBalance(B)).to.equal(BigInt(4));
        });

        it('transfer fails on insufficient balance', () => {
            const { state } = newState();
            state.beginOverlay();
            state.setBalance(A, BigInt(3));
            try {
                state.transfer(A, B, BigInt(4));
                expect.fail('should have thrown');
            } catch (e) {
                expect(e).to.be.instanceOf(EvmError);
                expect(e instanceof EvmError && e.error).to.equal(ERROR.INSUFFICIENT_BALANCE);
            }
            expect(state.getBalance(A)).to.equal(BigInt(3));
        });
    });

    describe('accounts', () => {
        it('incrementNonce', () => {
            const { state } = newState();
            state.beginOverlay();
            expect(state.incrementNonce(A)).to.equal(BigInt(1));
            expect(state.incrementNonce(A)).to.equal(BigInt(2));
        });

        it('destroying an account orphans its storage', () => {
            const { state } = newState();
            state.beginOverlay();
            state.setCode(A, new Uint8Array([0x00]));
            state.setNonce(A, BigInt(1));
            state.setStorage(A, BigInt(1), BigInt(99));
            state.destroyAccount(A);
            expect(state.getGeneration(A)).to.equal(1);
            expect(state.getStorage(A, BigInt(1))).to.equal(BigInt(0));
            expect(state.isEmpty(A)).to.equal(true);

            state.setStorage(A, BigInt(1), BigInt(5));
            expect(state.getStorage(A, BigInt(1))).to.equal(BigInt(5));
        });
    });
});
