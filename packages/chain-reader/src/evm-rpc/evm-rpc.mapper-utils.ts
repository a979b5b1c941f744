import { FetchError, getErrorMessage } from '@soundness/core';
import {
  HttpError,
  NetworkError,
  RateLimitError,
  RequestAbortedError,
  RequestTimeoutError,
  ResponseValidationError,
} from '@soundness/http';
import { err, ok, type Result } from 'neverthrow';

import { HexQuantitySchema, type JsonRpcResponse } from './evm-rpc.schemas.js';

/**
 * Translate an HTTP client failure into the FetchError kind callers classify on.
 */
export function mapTransportError(error: Error, endpoint: string): FetchError {
  const context = { endpoint };

  if (error instanceof RequestTimeoutError) {
    return new FetchError('TIMEOUT', error.message, { ...context, timeoutMs: error.timeoutMs });
  }
  if (error instanceof RequestAbortedError) {
    return new FetchError('CANCELLED', 'Request cancelled', context);
  }
  if (error instanceof NetworkError) {
    if (error.code === 'ECONNREFUSED') {
      return new FetchError('CONNECTION_REFUSED', `Connection refused by ${endpoint}`, context);
    }
    const detail = error.code ? `${error.message} (${error.code})` : error.message;
    return new FetchError('NETWORK_ERROR', detail, { ...context, code: error.code });
  }
  if (error instanceof HttpError) {
    return new FetchError('HTTP_ERROR', error.message, { ...context, status: error.statusCode });
  }
  if (error instanceof RateLimitError) {
    return new FetchError('HTTP_ERROR', `HTTP 429: ${error.message}`, { ...context, status: 429 });
  }
  if (error instanceof ResponseValidationError) {
    return new FetchError('INVALID_RESPONSE', error.message, context);
  }
  return new FetchError('NETWORK_ERROR', getErrorMessage(error), context);
}

/**
 * Extract a hex quantity result from a response envelope. A JSON-RPC `error` member becomes RPC_ERROR;
 * anything other than a hex quantity in `result` becomes INVALID_RESPONSE.
 */
export function mapQuantityResult(response: JsonRpcResponse, method: string): Result<bigint, FetchError> {
  if (response.error) {
    return err(
      new FetchError('RPC_ERROR', `${method} failed with RPC error ${response.error.code}: ${response.error.message}`, {
        method,
        rpcCode: response.error.code,
      })
    );
  }

  const parsed = HexQuantitySchema.safeParse(response.result);
  if (!parsed.success) {
    const received = JSON.stringify(response.result) ?? 'nothing';
    return err(
      new FetchError('INVALID_RESPONSE', `${method} returned ${received}, expected a hex quantity`, { method })
    );
  }

  return ok(parsed.data);
}

/**
 * Nonces are JS numbers; a count beyond the safe integer range is a corrupt response.
 */
export function toSafeNonce(value: bigint): Result<number, FetchError> {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    return err(new FetchError('INVALID_RESPONSE', `Nonce ${value.toString()} exceeds the safe integer range`));
  }
  return ok(Number(value));
}

/**
 * Pick the reply to one request out of a batch. Order inside a batch reply is not guaranteed.
 */
export function findBatchResponse(responses: JsonRpcResponse[], requestId: number): Result<JsonRpcResponse, FetchError> {
  const response = responses.find((item) => item.id === requestId);
  if (!response) {
    return err(new FetchError('INVALID_RESPONSE', `Batch response is missing id ${requestId}`, { requestId }));
  }
  return ok(response);
}
