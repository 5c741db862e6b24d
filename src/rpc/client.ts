// This module implements the JSON-RPC 2.0 client: one POST round trip per call or notification.

import type { Logger } from 'pino';
import type { HttpTransport, RpcClientOptions, TransportResponse } from '../types/client.js';
import type { JsonRpcId, JsonRpcParams } from '../types/jsonrpc.js';
import { HttpStatusError, TransportError, isRpcClientError } from '../utils/errors.js';
import { createLogger, errorForLog, sanitizeForLog } from '../utils/logger.js';
import { formatUserAgent } from '../version.js';
import { buildNotification, buildRequest, encodeEnvelope, interpretResponse } from './envelope.js';
import { createRequestId } from './ids.js';
import { FetchTransport } from './transport.js';

interface AcquiredTransport {
  transport: HttpTransport;
  release: () => Promise<void>;
}

type ExchangeKind = 'call' | 'notify';

// This helper rejects endpoints that fetch could not post to.
function normalizeEndpoint(endpoint: string): string {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    throw new TypeError(`Invalid JSON-RPC endpoint URL: ${endpoint}`, { cause: error });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new TypeError(`JSON-RPC endpoint must use http or https: ${endpoint}`);
  }

  return url.toString();
}

// This class issues calls and notifications against one endpoint and owns or borrows its transport.
export class RpcClient {
  public readonly endpoint: string;
  public readonly ownsTransport: boolean;
  private transport: HttpTransport | undefined;
  private readonly createTransport: () => HttpTransport;
  private readonly headers: Record<string, string>;
  private readonly idGenerator: () => JsonRpcId;
  private readonly logger: Logger;

  public constructor(options: RpcClientOptions) {
    this.endpoint = normalizeEndpoint(options.endpoint);
    this.transport = options.transport;
    this.ownsTransport = options.transport === undefined;
    this.createTransport =
      options.createTransport ?? (() => new FetchTransport({ timeoutMs: options.timeoutMs }));
    this.headers = { ...options.headers };
    this.idGenerator = options.idGenerator ?? createRequestId;
    this.logger = (options.logger ?? createLogger()).child({
      component: 'rpc_client'
    });
  }

  // This helper writes one structured client event with sanitized details.
  private log(level: 'debug' | 'info' | 'warn' | 'error', event: string, details?: Record<string, unknown>): void {
    const sanitized = sanitizeForLog(details ?? {});
    this.logger[level](
      {
        event,
        endpoint: this.endpoint,
        ...(typeof sanitized === 'object' && sanitized !== null ? sanitized : {})
      },
      event
    );
  }

  // This method creates the long-lived owned transport on scope entry; borrowing clients are unaffected.
  public open(): this {
    if (this.ownsTransport && this.transport === undefined) {
      this.transport = this.createTransport();
      this.log('debug', 'rpc_transport_created', { scope: 'client' });
    }

    return this;
  }

  // This method releases the owned transport once; later calls and borrowed transports are no-ops.
  public async close(): Promise<void> {
    if (!this.ownsTransport || this.transport === undefined) {
      return;
    }

    const transport = this.transport;
    this.transport = undefined;
    await transport.close();
    this.log('debug', 'rpc_transport_closed', { scope: 'client' });
  }

  // Without an opened or borrowed transport, each exchange gets a fresh one that is closed when it ends.
  private acquireTransport(): AcquiredTransport {
    const current = this.transport;
    if (current !== undefined) {
      return {
        transport: current,
        release: async () => undefined
      };
    }

    const transport = this.createTransport();
    this.log('debug', 'rpc_transport_created', { scope: 'exchange' });

    return {
      transport,
      // A failed close is logged so the exchange outcome still reaches the caller.
      release: async () => {
        try {
          await transport.close();
          this.log('debug', 'rpc_transport_closed', { scope: 'exchange' });
        } catch (error) {
          this.log('warn', 'rpc_transport_close_failed', {
            scope: 'exchange',
            error: errorForLog(error)
          });
        }
      }
    };
  }

  private buildHeaders(): Record<string, string> {
    return {
      Accept: 'application/json',
      'User-Agent': formatUserAgent(),
      ...this.headers,
      'Content-Type': 'application/json'
    };
  }

  // This helper performs the round trip and applies transport and status checks shared by calls and notifications.
  private async exchange(
    kind: ExchangeKind,
    method: string,
    body: string,
    headers: Record<string, string>
  ): Promise<TransportResponse> {
    const { transport, release } = this.acquireTransport();

    try {
      let response: TransportResponse;
      try {
        response = await transport.send({
          url: this.endpoint,
          body,
          headers
        });
      } catch (error) {
        throw new TransportError(method, this.endpoint, error);
      }

      this.log('debug', `rpc_${kind}_response`, {
        method,
        status: response.status
      });

      if (response.status < 200 || response.status > 299) {
        throw new HttpStatusError(method, response.status, response.body);
      }

      return response;
    } finally {
      await release();
    }
  }

  private logFailure(kind: ExchangeKind, method: string, startedAt: number, error: unknown): void {
    this.log('error', `rpc_${kind}_failed`, {
      method,
      kind: isRpcClientError(error) ? error.kind : 'unknown',
      durationMs: Date.now() - startedAt,
      error: errorForLog(error)
    });
  }

  // This method sends one request and returns the result member of the response, unmodified.
  public async call(method: string, params?: JsonRpcParams, id?: JsonRpcId): Promise<unknown> {
    const requestId = id ?? this.idGenerator();
    const envelope = buildRequest(method, params, requestId);
    const headers = this.buildHeaders();
    const startedAt = Date.now();

    this.log('debug', 'rpc_call_started', {
      method,
      requestId,
      params,
      headers
    });

    try {
      const response = await this.exchange('call', method, encodeEnvelope(envelope), headers);
      const interpreted = interpretResponse(method, response.body);

      if (interpreted.id !== undefined && interpreted.id !== requestId) {
        this.log('warn', 'rpc_response_id_mismatch', {
          method,
          requestId,
          responseId: interpreted.id
        });
      }

      this.log('debug', 'rpc_call_completed', {
        method,
        requestId,
        durationMs: Date.now() - startedAt
      });

      return interpreted.result;
    } catch (error) {
      this.logFailure('call', method, startedAt, error);
      throw error;
    }
  }

  // This method sends one notification; any response body is ignored.
  public async notify(method: string, params?: JsonRpcParams): Promise<void> {
    const envelope = buildNotification(method, params);
    const headers = this.buildHeaders();
    const startedAt = Date.now();

    this.log('debug', 'rpc_notify_started', {
      method,
      params,
      headers
    });

    try {
      const response = await this.exchange('notify', method, encodeEnvelope(envelope), headers);
      this.log('debug', 'rpc_notify_completed', {
        method,
        status: response.status,
        durationMs: Date.now() - startedAt
      });
    } catch (error) {
      this.logFailure('notify', method, startedAt, error);
      throw error;
    }
  }
}

// This helper runs work against an opened client and closes it exactly once, whatever the outcome.
export async function withRpcClient<T>(options: RpcClientOptions, work: (client: RpcClient) => Promise<T>): Promise<T> {
  const client = new RpcClient(options).open();

  try {
    return await work(client);
  } finally {
    await client.close();
  }
}
