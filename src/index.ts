// This is the package entrypoint that re-exports the client, its types and its error taxonomy.

export { RpcClient, withRpcClient } from './rpc/client.js';
export { FetchTransport, DEFAULT_TIMEOUT_MS } from './rpc/transport.js';
export type { FetchTransportOptions } from './rpc/transport.js';
export { buildNotification, buildRequest, decodeRequest, encodeEnvelope, interpretResponse } from './rpc/envelope.js';
export { createRequestId, createSequentialIdGenerator } from './rpc/ids.js';
export { loadClientConfig } from './config/env.js';
export type { ClientConfig } from './config/env.js';
export {
  ConfigurationError,
  HttpStatusError,
  JSONRPC_ERROR_CODES,
  MalformedResponseError,
  ProtocolError,
  RpcClientError,
  TransportError,
  isRetryableError,
  isRpcClientError
} from './utils/errors.js';
export type { MalformedResponseReason, RpcClientErrorKind, RpcClientFailure } from './utils/errors.js';
export { buildLoggerOptions, createLogger } from './utils/logger.js';
export type { HttpTransport, RpcClientOptions, TransportRequest, TransportResponse } from './types/client.js';
export type {
  JsonRpcErrorObject,
  JsonRpcErrorResponse,
  JsonRpcId,
  JsonRpcNotification,
  JsonRpcOutgoing,
  JsonRpcParams,
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcSuccessResponse
} from './types/jsonrpc.js';
export { CLIENT_NAME, CLIENT_VERSION } from './version.js';
