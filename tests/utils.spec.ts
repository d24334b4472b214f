import 'mocha';
import { assert, expect } from 'chai';
import { computeBlockHash, dumpU256, hostAccountToAddress, to0xAddress, toAddress, toUint } from '../src/utils';
import { MemReader } from '../src/mem-reader';
import { Memory } from '../src/memory';
import { bytesToHex, toBytes32 } from '../src/bytes';
import { checkedAdd, checkedSub, formatWei, weiFromEth } from '../src/wei';
import { intrinsicGas, maxCallGas, memoryExpansionCost, sstoreCost } from '../src/gas';
import { compileCode, isValidJump } from '../src/code';
import { opName } from '../src/executor';
import { MAX_INTEGER_BIGINT } from '../src/arithmetic';
import { asm } from './test-utils';

function incrementingArray(len: number, start: number) {
    return Array.from({ length: len }, (_, i) => (start + i) % 256);
}

describe('Utils', () => {
    it('to0xAddress()', () => {
        expect(to0xAddress(BigInt(1))).to.equal('0x0000000000000000000000000000000000000001');
        expect(to0xAddress(BigInt(0x12345af))).to.equal('0x00000000000000000000000000000000012345af');
    });

    it('toAddress() keeps the low 160 bits', () => {
        const address = '0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48';
        expect(to0xAddress(toAddress(address))).to.equal(address);
        expect(toAddress(MAX_INTEGER_BIGINT)).to.equal((BigInt(1) << BigInt(160)) - BigInt(1));
    });

    it('toUint()', () => {
        const num = toUint(new Uint8Array([...Array(32 - 4).fill(0), 0x01, 0x23, 0x45, 0xaf]));
        assert.equal(num, BigInt(0x12345af));
        expect(toUint('0x0100')).to.equal(BigInt(256));
        expect(toUint([1, 0])).to.equal(BigInt(256));
    });

    it('dumpU256()', () => {
        expect(dumpU256(BigInt(0x12345af))).to.equal('12345af');
    });

    it('u256 the expected layout', () => {
        const arr = toBytes32(0x12345af);
        expect(arr.length).to.equal(32);
        expect(bytesToHex(arr)).to.equal('0x' + '00'.repeat(28) + '012345af');
    });

    it('host accounts map to stable addresses', () => {
        expect(hostAccountToAddress('alice.host')).to.equal(hostAccountToAddress('alice.host'));
        expect(hostAccountToAddress('alice.host')).not.to.equal(hostAccountToAddress('bob.host'));
        expect(hostAccountToAddress('alice.host') >> BigInt(160)).to.equal(BigInt(0));
    });

    it('block hashes depend on the chain, the engine and the height', () => {
        const hash = computeBlockHash(BigInt(1), 'evm.host', BigInt(10));
        expect(computeBlockHash(BigInt(1), 'evm.host', BigInt(10))).to.equal(hash);
        expect(computeBlockHash(BigInt(2), 'evm.host', BigInt(10))).not.to.equal(hash);
        expect(computeBlockHash(BigInt(1), 'other.host', BigInt(10))).not.to.equal(hash);
        expect(computeBlockHash(BigInt(1), 'evm.host', BigInt(11))).not.to.equal(hash);
    });

    describe('MemReader', () => {
        it('can read inside', () => {
            const reader = new MemReader(new Uint8Array(incrementingArray(100, 0)));
            expect([...reader.slice(10, 10)]).to.deep.equal(incrementingArray(10, 10));
        });

        it('can read outside', () => {
            const reader = new MemReader(new Uint8Array(incrementingArray(100, 0)));
            expect([...reader.slice(1000, 10)]).to.deep.equal(Array(10).fill(0));
        });

        it('can read overlap', () => {
            const reader = new MemReader(new Uint8Array(incrementingArray(100, 0)));
            expect([...reader.slice(90, 20)]).to.deep.equal([...incrementingArray(10, 90), ...Array(10).fill(0)]);
        });

        it('reads words', () => {
            const reader = new MemReader(new Uint8Array([1, 2]));
            expect(reader.get(0)).to.equal(BigInt('0x0102') << BigInt(240));
            expect(reader.getByte(5)).to.equal(0);
        });
    });

    describe('Memory', () => {
        it('grows by words', () => {
            const mem = new Memory();
            mem.write(40, new Uint8Array([7]));
            expect(mem.size).to.equal(64);
            expect(mem.slice(40, 1)[0]).to.equal(7);
        });
    });

    describe('Wei', () => {
        it('checked arithmetic', () => {
            expect(checkedAdd(BigInt(1), BigInt(2))).to.equal(BigInt(3));
            expect(checkedAdd(MAX_INTEGER_BIGINT, BigInt(1))).to.equal(null);
            expect(checkedSub(BigInt(1), BigInt(2))).to.equal(null);
        });

        it('converts and formats', () => {
            const amount = weiFromEth(BigInt(2));
            expect(amount).to.equal(BigInt('2000000000000000000'));
            expect(formatWei(BigInt('1500000000000000000'))).to.equal('1.5 ETH');
            expect(formatWei(BigInt('3000000000000000000'))).to.equal('3 ETH');
        });
    });

    describe('Gas', () => {
        it('intrinsic gas', () => {
            expect(intrinsicGas(new Uint8Array([0, 1, 0]), false)).to.equal(BigInt(21_000 + 4 + 16 + 4));
            expect(intrinsicGas(new Uint8Array(0), true)).to.equal(BigInt(53_000));
        });

        it('all but one 64th', () => {
            expect(maxCallGas(BigInt(6400))).to.equal(BigInt(6300));
        });

        it('memory expansion', () => {
            expect(memoryExpansionCost(0, BigInt(0), BigInt(32))).to.deep.equal({ cost: BigInt(3), words: BigInt(1) });
            expect(memoryExpansionCost(1, BigInt(0), BigInt(32))).to.deep.equal({ cost: BigInt(0), words: BigInt(1) });
            // 3 * 32 + 32 * 32 / 512 = 98, minus the first word
            expect(memoryExpansionCost(1, BigInt(1000), BigInt(24))).to.deep.equal({ cost: BigInt(95), words: BigInt(32) });
        });

        it('net metered SSTORE', () => {
            const n = BigInt;
            expect(sstoreCost(n(0), n(0), n(1))).to.deep.equal({ gas: n(20_000), refund: n(0) });
            expect(sstoreCost(n(1), n(1), n(0))).to.deep.equal({ gas: n(5_000), refund: n(15_000) });
            expect(sstoreCost(n(1), n(1), n(1))).to.deep.equal({ gas: n(800), refund: n(0) });
            // dirty slot, back to its original value
            expect(sstoreCost(n(0), n(1), n(0))).to.deep.equal({ gas: n(800), refund: n(19_200) });
            expect(sstoreCost(n(1), n(0), n(1))).to.deep.equal({ gas: n(800), refund: n(-15_000 + 4_200) });
        });
    });

    describe('Code analysis', () => {
        it('finds jump destinations', () => {
            const code = compileCode(asm('PUSH1 3 JUMP :dest STOP'));
            expect(isValidJump(code, BigInt(3))).to.equal(true);
            expect(isValidJump(code, BigInt(0))).to.equal(false);
            expect(isValidJump(code, BigInt(100))).to.equal(false);
        });

        it('ignores JUMPDEST bytes inside PUSH data', () => {
            const code = compileCode(asm('PUSH2 0x5b5b :dest'));
            expect(isValidJump(code, BigInt(1))).to.equal(false);
            expect(isValidJump(code, BigInt(2))).to.equal(false);
            expect(isValidJump(code, BigInt(3))).to.equal(true);
        });

        it('names opcodes', () => {
            expect(opName(0x01)).to.equal('ADD');
            expect(opName(0x7f)).to.equal('PUSH32');
            expect(opName(0x0c)).to.equal('UNKNOWN_0x0c');
        });

        it('caches by code hash', () => {
            expect(compileCode(asm('STOP'))).to.equal(compileCode(asm('STOP')));
        });
    });
});
