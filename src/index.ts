export * from './interfaces';
export * from './errors';
export * from './config';
export * from './engine';
export * from './dispatcher';
export * from './executor';
export * from './state';
export * from './host';
export * from './precompiles';
export * from './meta-call';
export * from './upgrade';
export * from './deposit';
export * from './codec';
export * from './gas';
export * from './wei';
export { compileCode, isValidJump } from './code';
export { computeBlockHash, hostAccountToAddress, to0xAddress, toAddress, toUint } from './utils';
export { bytesToHex, hexToBytes } from './bytes';
