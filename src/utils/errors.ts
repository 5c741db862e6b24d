// This module defines the typed failures a JSON-RPC call can surface to its caller.

export type RpcClientErrorKind = 'transport' | 'http_status' | 'malformed_response' | 'protocol';

export type MalformedResponseReason = 'invalid_body' | 'invalid_envelope' | 'invalid_error_object' | 'missing_result';

// Standard JSON-RPC 2.0 error codes as reported by servers.
export const JSONRPC_ERROR_CODES = {
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603
} as const;

export abstract class RpcClientError extends Error {
  public abstract readonly kind: RpcClientErrorKind;
  public readonly method: string;
  public readonly details?: unknown;

  protected constructor(method: string, message: string, options?: { cause?: unknown; details?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.method = method;
    this.details = options?.details;
  }
}

// The request never produced an HTTP response: refused connection, DNS failure, timeout, abort.
export class TransportError extends RpcClientError {
  public readonly kind = 'transport' as const;
  public readonly endpoint: string;

  public constructor(method: string, endpoint: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(method, `Request error calling ${method}: ${reason}`, { cause });
    this.name = 'TransportError';
    this.endpoint = endpoint;
  }
}

export class HttpStatusError extends RpcClientError {
  public readonly kind = 'http_status' as const;
  public readonly status: number;
  public readonly body: string;

  public constructor(method: string, status: number, body: string) {
    super(method, `HTTP error calling ${method}: ${status} - ${body}`);
    this.name = 'HttpStatusError';
    this.status = status;
    this.body = body;
  }
}

export class MalformedResponseError extends RpcClientError {
  public readonly kind = 'malformed_response' as const;
  public readonly reason: MalformedResponseReason;
  public readonly body: string;

  public constructor(method: string, reason: MalformedResponseReason, body: string, details?: unknown) {
    super(method, `${describeMalformedReason(reason)} from ${method}`, { details });
    this.name = 'MalformedResponseError';
    this.reason = reason;
    this.body = body;
  }
}

export class ProtocolError extends RpcClientError {
  public readonly kind = 'protocol' as const;
  public readonly code: number;
  public readonly rpcMessage: string;
  public readonly data: unknown;
  // Surfaced as received so callers can spot servers that rewrite ids.
  public readonly responseId: unknown;

  public constructor(method: string, error: { code: number; message: string; data?: unknown }, responseId: unknown) {
    super(method, `JSON-RPC Error ${error.code}: ${error.message}`);
    this.name = 'ProtocolError';
    this.code = error.code;
    this.rpcMessage = error.message;
    this.data = error.data;
    this.responseId = responseId;
  }
}

export type RpcClientFailure = TransportError | HttpStatusError | MalformedResponseError | ProtocolError;

export class ConfigurationError extends Error {
  public readonly issues: string[];

  public constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

function describeMalformedReason(reason: MalformedResponseReason): string {
  switch (reason) {
    case 'invalid_body':
      return 'Invalid response body';
    case 'invalid_envelope':
      return 'Invalid JSON-RPC envelope';
    case 'invalid_error_object':
      return 'Invalid JSON-RPC error object';
    case 'missing_result':
      return 'Missing result field';
  }
}

// This guard narrows unknown failures to the four client error kinds.
export function isRpcClientError(error: unknown): error is RpcClientFailure {
  return (
    error instanceof TransportError ||
    error instanceof HttpStatusError ||
    error instanceof MalformedResponseError ||
    error instanceof ProtocolError
  );
}

// This helper tells callers whether repeating the same request may succeed; the client itself never retries.
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TransportError) {
    return true;
  }

  if (error instanceof HttpStatusError) {
    return error.status === 408 || error.status === 425 || error.status === 429 || error.status >= 500;
  }

  return false;
}
