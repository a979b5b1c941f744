import {
  createAccountState,
  formatBlockRef,
  maskAddress,
  toRpcBlockParam,
  type AccountState,
  type BlockRef,
  type FetchError,
} from '@soundness/core';
import { HttpClient, sanitizeUrl, type HttpEffects } from '@soundness/http';
import { getLogger, type Logger } from '@soundness/logger';
import { err, ok, type Result } from 'neverthrow';

import type { ChainInfo, ChainReader, FetchOptions } from '../types.js';

import {
  findBatchResponse,
  mapQuantityResult,
  mapTransportError,
  toSafeNonce,
} from './evm-rpc.mapper-utils.js';
import { JsonRpcBatchResponseSchema, JsonRpcResponseSchema, type JsonRpcRequest } from './evm-rpc.schemas.js';

export interface EvmRpcChainReaderConfig {
  endpoint: string;
  /** Short name used in log categories, e.g. "A". */
  name: string;
  /** Send the calls of one read as a single JSON-RPC batch instead of one request per call. */
  batch?: boolean | undefined;
  retries?: number | undefined;
  timeoutMs?: number | undefined;
}

interface RpcCall {
  method: string;
  params: unknown[];
}

type CallPair = readonly [RpcCall, RpcCall];
type QuantityPair = readonly [bigint, bigint];

/**
 * ChainReader over the standard Ethereum JSON-RPC API (`eth_getBalance`, `eth_getTransactionCount`).
 */
export class EvmRpcChainReader implements ChainReader {
  private readonly httpClient: HttpClient;
  private readonly logger: Logger;
  private readonly endpoint: string;
  private readonly batch: boolean;
  private nextRequestId = 1;

  constructor(config: EvmRpcChainReaderConfig, effects?: Partial<HttpEffects>) {
    this.endpoint = config.endpoint;
    this.batch = config.batch ?? false;
    this.logger = getLogger(`EvmRpcChainReader:${config.name}`);
    this.httpClient = new HttpClient(
      {
        baseUrl: config.endpoint,
        providerName: `rpc-${config.name}`,
        retries: config.retries,
        timeout: config.timeoutMs,
      },
      effects
    );
  }

  async fetchAccountState(
    address: string,
    blockRef: BlockRef,
    options: FetchOptions = {}
  ): Promise<Result<AccountState, FetchError>> {
    const blockParam = toRpcBlockParam(blockRef);
    this.logger.debug(`Fetching account state - Address: ${maskAddress(address)}, Block: ${formatBlockRef(blockRef)}`);

    const results = await this.callQuantities(
      [
        { method: 'eth_getBalance', params: [address, blockParam] },
        { method: 'eth_getTransactionCount', params: [address, blockParam] },
      ],
      options.signal
    );
    if (results.isErr()) {
      this.logger.debug(
        `Account state fetch failed - Address: ${maskAddress(address)}, Kind: ${results.error.kind}, Error: ${results.error.message}`
      );
      return err(results.error);
    }

    const [balance, rawNonce] = results.value;
    const nonce = toSafeNonce(rawNonce);
    if (nonce.isErr()) {
      return err(nonce.error);
    }

    return ok(createAccountState(address, balance, nonce.value));
  }

  async probe(options: FetchOptions = {}): Promise<Result<ChainInfo, FetchError>> {
    const results = await this.callQuantities(
      [
        { method: 'eth_chainId', params: [] },
        { method: 'eth_blockNumber', params: [] },
      ],
      options.signal
    );
    if (results.isErr()) {
      return err(results.error);
    }

    const [chainId, latestBlock] = results.value;
    this.logger.debug(
      `Endpoint reachable - URL: ${sanitizeUrl(this.endpoint)}, ChainId: ${chainId.toString()}, LatestBlock: ${latestBlock.toString()}`
    );
    return ok({ chainId, latestBlock });
  }

  close(): Promise<void> {
    return this.httpClient.close();
  }

  /**
   * Run two quantity-returning calls, either one after the other or as one batch, so a read never
   * holds more than one HTTP request open. Results come back in call order; the first failure wins.
   */
  private async callQuantities(calls: CallPair, signal: AbortSignal | undefined): Promise<Result<QuantityPair, FetchError>> {
    if (this.batch) {
      return this.callBatch(calls, signal);
    }

    const first = await this.callSingle(calls[0], signal);
    if (first.isErr()) {
      return err(first.error);
    }
    const second = await this.callSingle(calls[1], signal);
    return second.map((b): QuantityPair => [first.value, b]);
  }

  private async callSingle(call: RpcCall, signal: AbortSignal | undefined): Promise<Result<bigint, FetchError>> {
    const request = this.buildRequest(call);
    const response = await this.httpClient.post('/', request, { schema: JsonRpcResponseSchema, signal });
    if (response.isErr()) {
      return err(mapTransportError(response.error, sanitizeUrl(this.endpoint)));
    }
    return mapQuantityResult(response.value, call.method);
  }

  private async callBatch(calls: CallPair, signal: AbortSignal | undefined): Promise<Result<QuantityPair, FetchError>> {
    const requests = [this.buildRequest(calls[0]), this.buildRequest(calls[1])] as const;
    const response = await this.httpClient.post('/', requests, { schema: JsonRpcBatchResponseSchema, signal });
    if (response.isErr()) {
      return err(mapTransportError(response.error, sanitizeUrl(this.endpoint)));
    }

    const replies = response.value;
    const [firstRequest, secondRequest] = requests;
    const first = findBatchResponse(replies, firstRequest.id).andThen((reply) =>
      mapQuantityResult(reply, firstRequest.method)
    );
    const second = findBatchResponse(replies, secondRequest.id).andThen((reply) =>
      mapQuantityResult(reply, secondRequest.method)
    );
    return first.andThen((a) => second.map((b): QuantityPair => [a, b]));
  }

  private buildRequest(call: RpcCall): JsonRpcRequest {
    return { id: this.nextRequestId++, jsonrpc: '2.0', method: call.method, params: call.params };
  }
}
