import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

/** Longest per-request timeout a Node timer can hold, in whole seconds. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

const positiveInteger = (flag: string) =>
  z.coerce
    .number({ invalid_type_error: `${flag} must be a number` })
    .int({ message: `${flag} must be a whole number` })
    .positive({ message: `${flag} must be greater than zero` });

/**
 * Compare command options. Values arrive from commander as strings or booleans.
 */
export const CompareCommandOptionsSchema = z
  .object({
    rpcA: z.string().optional(),
    rpcB: z.string().optional(),
    address: z
      .array(z.string())
      .default([])
      .refine((addresses) => addresses.length > 0, {
        message: 'At least one --address is required',
      }),
    blockA: z.string().default('latest'),
    blockB: z.string().default('latest'),
    timeout: z.coerce
      .number({ invalid_type_error: '--timeout must be a number' })
      .positive({ message: '--timeout must be greater than zero' })
      .max(MAX_TIMEOUT_SECONDS, { message: `--timeout must be at most ${MAX_TIMEOUT_SECONDS} seconds` })
      .default(30),
    concurrency: positiveInteger('--concurrency').default(8),
    retries: positiveInteger('--retries').default(1),
    batch: z.boolean().default(false),
    preflight: z.boolean().default(true),
    color: z.boolean().default(true),
  })
  .extend(JsonFlagSchema.shape)
  .extend(VerboseFlagSchema.shape);

export type CompareCommandOptions = z.infer<typeof CompareCommandOptionsSchema>;

const optionalEnvString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

/**
 * Environment the CLI reads once, after `.env` has been loaded.
 */
export const CliEnvSchema = z.object({
  RPC_URL: optionalEnvString,
  RPC_URL_B: optionalEnvString,
});

export type CliEnv = z.infer<typeof CliEnvSchema>;

export function validateCliEnv(env: NodeJS.ProcessEnv = process.env): CliEnv {
  return CliEnvSchema.parse(env);
}

export const EndpointUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'must be an http:// or https:// URL' });
