import { z } from 'zod';

const JsonRpcIdSchema = z.union([z.number(), z.string(), z.null()]);

const JsonRpcErrorSchema = z.object({
  code: z.number(),
  data: z.unknown().optional(),
  message: z.string(),
});

/**
 * Envelope of a single JSON-RPC 2.0 response. `result` stays unknown here; each method's
 * mapper checks its own result shape.
 */
export const JsonRpcResponseSchema = z
  .object({
    error: JsonRpcErrorSchema.optional(),
    id: JsonRpcIdSchema.optional(),
    jsonrpc: z.string().optional(),
    result: z.unknown().optional(),
  })
  .refine((response) => response.error !== undefined || response.result !== undefined, {
    message: 'Response must contain either result or error',
  });

export const JsonRpcBatchResponseSchema = z.array(JsonRpcResponseSchema);

/**
 * Hex-encoded unsigned integer (`0x0`, `0x1bc16d674ec80000`).
 */
export const HexQuantitySchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]+$/, 'Expected a 0x-prefixed hex quantity')
  .transform((value) => BigInt(value));

export type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>;

export interface JsonRpcRequest {
  id: number;
  jsonrpc: '2.0';
  method: string;
  params: unknown[];
}
