// This file defines the client configuration surface and the transport contract it sends through.

import type { Logger } from 'pino';
import type { JsonRpcId } from './jsonrpc.js';

export interface TransportRequest {
  url: string;
  body: string;
  headers: Record<string, string>;
}

export interface TransportResponse {
  status: number;
  body: string;
}

// A transport performs one POST round trip per send and must tolerate concurrent sends.
export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
  close(): Promise<void>;
}

export interface RpcClientOptions {
  endpoint: string;
  // An externally owned transport; the client never closes it.
  transport?: HttpTransport;
  // Factory for owned transports; ignored when transport is supplied.
  createTransport?: () => HttpTransport;
  timeoutMs?: number;
  headers?: Record<string, string>;
  idGenerator?: () => JsonRpcId;
  logger?: Logger;
}
