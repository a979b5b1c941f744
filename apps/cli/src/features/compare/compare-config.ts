import {
  ConfigError,
  createSourceRef,
  normalizeEvmAddress,
  parseBlockRef,
  type SourceLabel,
  type SourceRef,
} from '@soundness/core';
import { sanitizeUrl } from '@soundness/http';
import { err, ok, Result } from 'neverthrow';

import type { CliEnv, CompareCommandOptions } from '../shared/schemas.js';
import { EndpointUrlSchema } from '../shared/schemas.js';

import type { CompareConfig } from './compare-types.js';

export interface BuildCompareConfigContext {
  env: CliEnv;
  /** Whether the terminal can show colours at all; `--no-color` can only turn them off. */
  colorSupported: boolean;
}

/**
 * Resolve validated flags and environment defaults into a CompareConfig.
 */
export function buildCompareConfig(
  options: CompareCommandOptions,
  context: BuildCompareConfigContext
): Result<CompareConfig, ConfigError> {
  const sourceA = resolveSource('A', options.rpcA ?? context.env.RPC_URL, options.blockA, '--rpc-a', 'RPC_URL');
  if (sourceA.isErr()) {
    return err(sourceA.error);
  }

  const sourceB = resolveSource('B', options.rpcB ?? context.env.RPC_URL_B, options.blockB, '--rpc-b', 'RPC_URL_B');
  if (sourceB.isErr()) {
    return err(sourceB.error);
  }

  const addresses = Result.combine(options.address.map((address) => normalizeEvmAddress(address)));
  if (addresses.isErr()) {
    return err(addresses.error);
  }

  const config: CompareConfig = {
    addresses: addresses.value,
    batch: options.batch,
    color: options.color && context.colorSupported,
    format: options.json ? 'json' : 'text',
    maxConcurrency: options.concurrency,
    preflight: options.preflight,
    retries: options.retries,
    sourceA: sourceA.value,
    sourceB: sourceB.value,
    timeoutMs: Math.max(1, Math.round(options.timeout * 1000)),
    verbose: options.verbose ?? false,
  };
  return ok(config);
}

function resolveSource(
  label: SourceLabel,
  endpoint: string | undefined,
  block: string,
  flag: string,
  envName: string
): Result<SourceRef, ConfigError> {
  if (!endpoint) {
    return err(new ConfigError(`Missing RPC endpoint for source ${label}: pass ${flag} or set ${envName}`));
  }

  const url = EndpointUrlSchema.safeParse(endpoint);
  if (!url.success) {
    return err(
      new ConfigError(
        `Invalid RPC endpoint for source ${label} (${sanitizeUrl(endpoint)}): must be an http:// or https:// URL`
      )
    );
  }

  return parseBlockRef(block).map((blockRef) => createSourceRef(label, url.data, blockRef));
}
