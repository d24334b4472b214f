import 'mocha';
import { expect } from 'chai';
import { asm, executeBytecode, frameError, runFrame, TEST_CHAIN_ID, uintBuffer } from './test-utils';
import { Status } from '../src/interfaces';
import { ERROR } from '../src/errors';
import { toBytes32 } from '../src/bytes';
import { computeBlockHash, MAX_UINT, toUint } from '../src/utils';

describe('Bytecode', () => {
    describe('through the engine', () => {
        it('add', () => {
            const { result } = executeBytecode('600360040160005260ff6000f3');
            expect(result).to.deep.eq(uintBuffer(7, 0xff));
        });

        it('mul', () => {
            const { result } = executeBytecode('600360040260005260ff6000f3');
            expect(result).to.deep.eq(uintBuffer(12, 0xff));
        });

        it('sub', () => {
            const { result } = executeBytecode('600360070360005260ff6000f3');
            expect(result).to.deep.eq(uintBuffer(4, 0xff));
        });

        it('div', () => {
            const { result } = executeBytecode('6003600f0460005260ff6000f3');
            expect(result).to.deep.eq(uintBuffer(5, 0xff));
        });

        it('mulmod', () => {
            const { result } = executeBytecode('6008600a60030960005260ff6000f3');
            expect(result).to.deep.eq(uintBuffer(6, 0xff));
        });

        it('charges intrinsic, static, and memory gas', () => {
            const { outcome } = executeBytecode('600360040160005260ff6000f3');
            expect(outcome.status).to.equal(Status.Success);
            // 21000 + 7 cheap ops + 1 word for MSTORE + growth to 8 words for RETURN
            expect(outcome.gasUsed).to.equal(BigInt(21_045));
        });

        it('chainid', () => {
            const { result } = executeBytecode('4660005260206000f3');
            expect(toUint(new Uint8Array(result))).to.equal(TEST_CHAIN_ID);
        });

        it('reverts with data', () => {
            // mstore 0x2a, revert(0, 32)
            const { outcome } = executeBytecode('602a60005260206000fd');
            expect(outcome.status).to.equal(Status.Revert);
            expect(toUint(outcome.returnData)).to.equal(BigInt(42));
        });
    });

    describe('arithmetic', () => {
        it('sdiv', () => {
            const { exec } = runFrame(asm('PUSH1 2 PUSH1 8 PUSH1 0 SUB SDIV'));
            // -8 / 2
            expect(exec.pop()).to.equal(MAX_UINT - BigInt(3));
        });

        it('sdiv by zero', () => {
            const { exec } = runFrame(asm('PUSH1 0 PUSH1 8 SDIV'));
            expect(exec.pop()).to.equal(BigInt(0));
        });

        it('smod keeps the sign of the dividend', () => {
            const { exec } = runFrame(asm('PUSH1 3 PUSH1 8 PUSH1 0 SUB SMOD'));
            expect(exec.pop()).to.equal(MAX_UINT - BigInt(1));
        });

        it('sub wraps around', () => {
            const { exec } = runFrame(asm('PUSH1 1 PUSH1 0 SUB'));
            expect(exec.pop()).to.equal(MAX_UINT);
        });

        it('add wraps around', () => {
            const { exec } = runFrame(asm('PUSH1 1 PUSH1 0 NOT ADD'));
            expect(exec.pop()).to.equal(BigInt(0));
        });

        it('exp', () => {
            const { exec } = runFrame(asm('PUSH1 10 PUSH1 2 EXP'));
            expect(exec.pop()).to.equal(BigInt(1024));
            // 2 pushes, EXP, and 50 per exponent byte
            expect(exec.gasSpent).to.equal(BigInt(66));
        });

        it('exp overflows to zero', () => {
            const { exec } = runFrame(asm('PUSH2 0x0100 PUSH1 2 EXP'));
            expect(exec.pop()).to.equal(BigInt(0));
        });

        it('addmod does not overflow', () => {
            const { exec } = runFrame(asm('PUSH1 7 PUSH1 2 PUSH1 0 NOT ADDMOD'));
            // (2^256 - 1 + 2) % 7 = (2^256 + 1) % 7
            expect(exec.pop()).to.equal((MAX_UINT + BigInt(2)) % BigInt(7));
        });

        it('signextend', () => {
            let { exec } = runFrame(asm('PUSH1 0xff PUSH1 0 SIGNEXTEND'));
            expect(exec.pop()).to.equal(MAX_UINT);
            ({ exec } = runFrame(asm('PUSH1 0x7f PUSH1 0 SIGNEXTEND')));
            expect(exec.pop()).to.equal(BigInt(0x7f));
        });

        it('slt compares signed values', () => {
            const { exec } = runFrame(asm('PUSH1 1 PUSH1 1 PUSH1 0 SUB SLT'));
            expect(exec.pop()).to.equal(BigInt(1));
        });
    });

    describe('bitwise', () => {
        it('byte', () => {
            let { exec } = runFrame(asm('PUSH2 0xabcd PUSH1 31 BYTE'));
            expect(exec.pop()).to.equal(BigInt(0xcd));
            ({ exec } = runFrame(asm('PUSH2 0xabcd PUSH1 32 BYTE')));
            expect(exec.pop()).to.equal(BigInt(0));
        });

        it('shl', () => {
            const { exec } = runFrame(asm('PUSH1 1 PUSH1 4 SHL'));
            expect(exec.pop()).to.equal(BigInt(16));
        });

        it('shr', () => {
            const { exec } = runFrame(asm('PUSH1 0x10 PUSH1 4 SHR'));
            expect(exec.pop()).to.equal(BigInt(1));
        });

        it('sar keeps the sign', () => {
            const { exec } = runFrame(asm('PUSH1 0x10 PUSH1 0 SUB PUSH1 4 SAR'));
            expect(exec.pop()).to.equal(MAX_UINT);
        });

        it('shifts of 256 bits or more', () => {
            let { exec } = runFrame(asm('PUSH1 1 PUSH2 0x0100 SHL'));
            expect(exec.pop()).to.equal(BigInt(0));
            ({ exec } = runFrame(asm('PUSH1 1 PUSH1 0 SUB PUSH2 0x0100 SAR')));
            expect(exec.pop()).to.equal(MAX_UINT);
        });
    });

    describe('environment', () => {
        it('keccak256 of nothing', () => {
            const { exec } = runFrame(asm('PUSH1 0 PUSH1 0 SHA3'));
            expect(exec.pop()).to.equal(BigInt('0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470'));
            expect(exec.gasSpent).to.equal(BigInt(36));
        });

        it('calldataload', () => {
            const input = toBytes32(0x1234);
            let { exec } = runFrame(asm('PUSH1 0 CALLDATALOAD'), { input });
            expect(exec.pop()).to.equal(BigInt(0x1234));
            ({ exec } = runFrame(asm('PUSH1 0x40 CALLDATALOAD'), { input }));
            expect(exec.pop()).to.equal(BigInt(0));
        });

        it('block info', () => {
            const { exec } = runFrame(asm('CHAINID NUMBER TIMESTAMP'));
            expect(exec.popN(3)).to.deep.equal([BigInt(1_700_000_000), BigInt(100), TEST_CHAIN_ID]);
        });

        it('blockhash of recent blocks', () => {
            const { exec } = runFrame(asm('PUSH1 99 BLOCKHASH PUSH1 100 BLOCKHASH'));
            expect(exec.pop()).to.equal(BigInt(0));
            expect(exec.pop()).to.equal(computeBlockHash(TEST_CHAIN_ID, 'evm.host', BigInt(99)));
        });

        it('pc', () => {
            const { exec } = runFrame(asm('PUSH1 0 POP PC'));
            expect(exec.pop()).to.equal(BigInt(3));
        });

        it('gas', () => {
            const { exec } = runFrame(asm('GAS'), { gasLimit: BigInt(1000) });
            expect(exec.pop()).to.equal(BigInt(998));
        });
    });

    describe('memory', () => {
        it('bills memory growth', () => {
            const { exec } = runFrame(asm('PUSH1 1 PUSH1 0 MSTORE MSIZE'));
            expect(exec.pop()).to.equal(BigInt(32));
            // 2 pushes + MSTORE + 1 word + MSIZE
            expect(exec.gasSpent).to.equal(BigInt(14));
        });

        it('mload reads back', () => {
            const { exec } = runFrame(asm('PUSH2 0x1234 PUSH1 4 MSTORE PUSH1 4 MLOAD'));
            expect(exec.pop()).to.equal(BigInt(0x1234));
        });

        it('mstore8 writes a single byte', () => {
            const { exec } = runFrame(asm('PUSH2 0x1234 PUSH1 1 MSTORE8 MSIZE PUSH1 0 MLOAD'));
            expect(exec.pop()).to.equal(BigInt(0x34) << BigInt(8 * 30));
            expect(exec.pop()).to.equal(BigInt(32));
        });

        it('returndatacopy out of bounds', () => {
            const { result } = runFrame(asm('PUSH1 1 PUSH1 0 PUSH1 0 RETURNDATACOPY'));
            expect(frameError(result)).to.equal(ERROR.RETURNDATA_OUT_OF_BOUNDS);
        });
    });

    describe('flow', () => {
        it('jumps to a jumpdest', () => {
            const { exec, result } = runFrame(asm('PUSH1 4 JUMP INVALID JUMPDEST PUSH1 42'));
            expect(frameError(result)).to.equal(null);
            expect(exec.pop()).to.equal(BigInt(42));
        });

        it('cannot jump into push data', () => {
            // the byte at offset 1 is 0x5b, but it is PUSH1 data
            const { result, exec } = runFrame(asm('PUSH1 0x5b PUSH1 1 JUMP'));
            expect(frameError(result)).to.equal(ERROR.INVALID_JUMP);
            expect(exec.gas).to.equal(BigInt(0));
        });

        it('jumpi falls through on zero', () => {
            const { exec } = runFrame(asm('PUSH1 0 PUSH1 0xff JUMPI PUSH1 7'));
            expect(exec.pop()).to.equal(BigInt(7));
        });

        it('invalid opcodes', () => {
            expect(frameError(runFrame('0c').result)).to.equal(ERROR.INVALID_OPCODE);
            expect(frameError(runFrame('fe').result)).to.equal(ERROR.INVALID_OPCODE);
        });

        it('push0 behind its flag', () => {
            const { exec } = runFrame('5f');
            expect(exec.pop()).to.equal(BigInt(0));
            expect(frameError(runFrame('5f', { push0: false }).result)).to.equal(ERROR.INVALID_OPCODE);
        });

        it('truncated push reads zeros', () => {
            const { exec } = runFrame('61ab');
            expect(exec.pop()).to.equal(BigInt(0xab00));
        });
    });

    describe('stack', () => {
        it('underflow', () => {
            expect(frameError(runFrame(asm('PUSH1 1 ADD')).result)).to.equal(ERROR.STACK_UNDERFLOW);
        });

        it('overflow', () => {
            const code = new Uint8Array(1025).fill(0x5f);
            expect(frameError(runFrame(code).result)).to.equal(ERROR.STACK_OVERFLOW);
        });

        it('1024 items are fine', () => {
            const { exec, result } = runFrame(new Uint8Array(1024).fill(0x5f));
            expect(frameError(result)).to.equal(null);
            expect(exec.copyStack().length).to.equal(1024);
        });

        it('dup & swap', () => {
            const { exec } = runFrame(asm('PUSH1 1 PUSH1 2 PUSH1 3 DUP3 SWAP1'));
            expect(exec.popN(4)).to.deep.equal([BigInt(3), BigInt(1), BigInt(2), BigInt(1)]);
        });
    });

    describe('storage', () => {
        it('sstore fails when out of gas', () => {
            const { result } = runFrame(asm('PUSH1 1 PUSH1 0 SSTORE'), { gasLimit: BigInt(5000) });
            expect(frameError(result)).to.equal(ERROR.OUT_OF_GAS);
        });

        it('sstore needs more than the stipend', () => {
            const { result } = runFrame(asm('PUSH1 1 PUSH1 0 SSTORE'), { gasLimit: BigInt(2306) });
            expect(frameError(result)).to.equal(ERROR.OUT_OF_GAS);
        });

        it('sstore is forbidden in static frames', () => {
            const { result } = runFrame(asm('PUSH1 1 PUSH1 0 SSTORE'), { isStatic: true });
            expect(frameError(result)).to.equal(ERROR.WRITE_PROTECTION);
        });

        it('log is forbidden in static frames', () => {
            const { result } = runFrame(asm('PUSH1 0 PUSH1 0 LOG0'), { isStatic: true });
            expect(frameError(result)).to.equal(ERROR.WRITE_PROTECTION);
        });

        it('sstore then sload', () => {
            const { exec, state } = runFrame(asm('PUSH1 42 PUSH1 7 SSTORE PUSH1 7 SLOAD'));
            expect(exec.pop()).to.equal(BigInt(42));
            expect(state.getStorage(exec.address, BigInt(7))).to.equal(BigInt(42));
            // 3 pushes, SSTORE of a fresh slot, SLOAD
            expect(exec.gasSpent).to.equal(BigInt(3 * 3 + 20_000 + 800));
        });

        it('clearing a slot earns a refund', () => {
            const { exec } = runFrame(asm('PUSH1 42 PUSH1 7 SSTORE PUSH1 0 PUSH1 7 SSTORE'));
            // set then reset within the same call: 20000 - 800 refunded
            expect(exec.refund).to.equal(BigInt(19_200));
        });
    });

    describe('sub-calls', () => {
        it('suspends on CALL, then resumes', () => {
            const { exec, result } = runFrame(asm('PUSH1 0 PUSH1 0 PUSH1 0 PUSH1 0 PUSH1 0 PUSH1 0xaa PUSH2 0xffff CALL'));
            expect(result.type).to.equal('suspended');
            if (result.type !== 'suspended' || result.request.type !== 'call') {
                throw new Error('Expected a call request');
            }
            expect(result.request.target).to.equal(BigInt(0xaa));
            expect(result.request.gas).to.equal(BigInt(0xffff));
            expect(exec.gas).to.equal(BigInt(1_000_000 - 7 * 3 - 700 - 0xffff));

            exec.resume({ success: true, returnData: new Uint8Array(0), gasLeft: BigInt(0xffff), logs: [], refund: BigInt(0) });
            const next = exec.execute();
            expect(next.type).to.equal('done');
            expect(exec.pop()).to.equal(BigInt(1));
            expect(exec.gas).to.equal(BigInt(1_000_000 - 7 * 3 - 700));
        });
    });
});
