/**
 * @relaytest/rpc - JSON-RPC endpoint, client and method tables
 */

export { RpcClient } from './client.js';
export type { RpcClientOptions } from './client.js';
export { RpcEndpoint, withEndpoint } from './endpoint.js';
export type { EndpointAddress, RpcEndpointOptions } from './endpoint.js';
export { defineMethods, method, notificationMethods } from './methods.js';
export type { MethodTable, RpcHandler } from './methods.js';
export {
  JSONRPC_VERSION,
  RPC_ERROR_CODE,
  RpcErrorObjectSchema,
  RpcIdSchema,
  RpcParamsSchema,
  RpcRequestSchema,
  RpcResponseSchema
} from './types.js';
export type {
  RpcErrorObject,
  RpcId,
  RpcParams,
  RpcRequest,
  RpcResponse
} from './types.js';
