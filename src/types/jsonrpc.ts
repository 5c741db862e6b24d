// This file defines the JSON-RPC 2.0 envelope types exchanged with the remote endpoint.

export type JsonRpcId = string | number;

export type JsonRpcParams = readonly unknown[] | Record<string, unknown>;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: string;
  params?: JsonRpcParams;
  id: JsonRpcId;
}

// Notifications carry no id key at all, so the server must not answer them.
export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: JsonRpcParams;
}

export type JsonRpcOutgoing = JsonRpcRequest | JsonRpcNotification;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

// This shape is what survives response validation on the success path.
export interface InterpretedResult {
  id: JsonRpcId | null | undefined;
  result: unknown;
}
