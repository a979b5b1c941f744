export type { ChainInfo, ChainReader, FetchOptions } from './types.js';
export { EvmRpcChainReader, type EvmRpcChainReaderConfig } from './evm-rpc/evm-rpc.chain-reader.js';
export { mapTransportError } from './evm-rpc/evm-rpc.mapper-utils.js';
