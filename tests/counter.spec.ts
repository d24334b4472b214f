import 'mocha';
import { expect } from 'chai';
import { counterRuntime, deploy, newTestEngine, selector, TestEngine, word } from './test-utils';
import { Address, Status } from '../src/interfaces';
import { MAX_INTEGER_BIGINT } from '../src/arithmetic';

describe('Counter contract', () => {
    let t: TestEngine;
    let counter: Address;

    beforeEach(() => {
        t = newTestEngine();
        counter = deploy(t, counterRuntime());
    });

    function send(method: string) {
        const outcome = t.engine.call({ contract: counter, value: BigInt(0), input: selector(method), gasLimit: BigInt(0) });
        expect(outcome.status).to.equal(Status.Success);
        return outcome;
    }

    function get() {
        return word(t.engine.view({ sender: t.sender, contract: counter, value: BigInt(0), input: selector('get()') }));
    }

    it('starts at zero', () => {
        expect(get()).to.equal(BigInt(0));
    });

    it('increments', () => {
        send('increment()');
        expect(get()).to.equal(BigInt(1));
        send('increment()');
        expect(get()).to.equal(BigInt(2));
    });

    it('increments then decrements', () => {
        send('increment()');
        send('decrement()');
        expect(get()).to.equal(BigInt(0));
    });

    it('wraps around below zero', () => {
        send('decrement()');
        expect(get()).to.equal(MAX_INTEGER_BIGINT);
    });

    it('reverts on unknown methods', () => {
        const outcome = t.engine.call({ contract: counter, value: BigInt(0), input: selector('reset()'), gasLimit: BigInt(0) });
        expect(outcome.status).to.equal(Status.Revert);
    });

    it('calls do not consume the sender nonce', () => {
        const before = t.engine.getNonce(t.sender);
        send('increment()');
        expect(t.engine.getNonce(t.sender)).to.equal(before);
    });
});
