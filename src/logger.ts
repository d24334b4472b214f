import { debug as createDebugLogger } from 'debug';

// enable with DEBUG=host-evm:*
export const debugEngine = createDebugLogger('host-evm:engine');
export const debugDispatch = createDebugLogger('host-evm:dispatch');
export const debugState = createDebugLogger('host-evm:state');
export const debugOps = createDebugLogger('host-evm:ops');
export const debugGas = createDebugLogger('host-evm:gas');
export const debugMeta = createDebugLogger('host-evm:meta');
export const debugUpgrade = createDebugLogger('host-evm:upgrade');
export const debugPrecompile = createDebugLogger('host-evm:precompile');
export const debugBridge = createDebugLogger('host-evm:bridge');
