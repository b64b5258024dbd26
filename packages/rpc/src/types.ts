/**
 * JSON-RPC 2.0 wire types
 */

import { z } from 'zod';

export const JSONRPC_VERSION = '2.0';

export const RPC_ERROR_CODE = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  /** Error raised by a method implementation */
  SERVER_ERROR: -32000
} as const;

export const RpcIdSchema = z.union([z.string(), z.number(), z.null()]);

export const RpcParamsSchema = z.union([z.array(z.unknown()), z.record(z.unknown())]);

export const RpcRequestSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  method: z.string().min(1),
  params: RpcParamsSchema.optional(),
  // Absent for notifications
  id: RpcIdSchema.optional()
});

export const RpcErrorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional()
});

// Error branch first: a result-less error response also satisfies the result shape
export const RpcResponseSchema = z.union([
  z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: RpcIdSchema,
    error: RpcErrorObjectSchema
  }),
  z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: RpcIdSchema,
    result: z.unknown()
  })
]);

export type RpcId = z.infer<typeof RpcIdSchema>;
export type RpcParams = z.infer<typeof RpcParamsSchema>;
export type RpcRequest = z.infer<typeof RpcRequestSchema>;
export type RpcErrorObject = z.infer<typeof RpcErrorObjectSchema>;
export type RpcResponse = z.infer<typeof RpcResponseSchema>;
