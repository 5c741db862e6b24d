// This module builds outgoing JSON-RPC envelopes and validates incoming response envelopes.

import { z } from 'zod';
import type {
  InterpretedResult,
  JsonRpcId,
  JsonRpcNotification,
  JsonRpcOutgoing,
  JsonRpcParams,
  JsonRpcRequest
} from '../types/jsonrpc.js';
import { MalformedResponseError, ProtocolError } from '../utils/errors.js';
import { isJsonObject, parseResponseJson } from '../utils/json.js';
import { JSONRPC_VERSION } from '../version.js';

const errorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional()
});

const responseIdSchema = z.union([z.string(), z.number(), z.null()]).optional();

function assertMethod(method: string): void {
  if (typeof method !== 'string' || method.length === 0) {
    throw new TypeError('JSON-RPC method must be a non-empty string.');
  }
}

// Params are either positional (array) or named (plain or null-prototype object); anything else is rejected before sending.
function assertParams(params: JsonRpcParams | undefined): void {
  if (params === undefined || Array.isArray(params)) {
    return;
  }

  const prototype: unknown = isJsonObject(params) ? Object.getPrototypeOf(params) : undefined;
  if (prototype !== Object.prototype && prototype !== null) {
    throw new TypeError('JSON-RPC params must be an array or a plain object.');
  }
}

function assertId(id: JsonRpcId): void {
  if (typeof id === 'string') {
    return;
  }

  if (!Number.isSafeInteger(id)) {
    throw new TypeError('JSON-RPC id must be a string or a safe integer.');
  }
}

export function buildRequest(method: string, params: JsonRpcParams | undefined, id: JsonRpcId): JsonRpcRequest {
  assertMethod(method);
  assertParams(params);
  assertId(id);

  return {
    jsonrpc: JSONRPC_VERSION,
    method,
    ...(params !== undefined && { params }),
    id
  };
}

export function buildNotification(method: string, params?: JsonRpcParams): JsonRpcNotification {
  assertMethod(method);
  assertParams(params);

  return {
    jsonrpc: JSONRPC_VERSION,
    method,
    ...(params !== undefined && { params })
  };
}

export function encodeEnvelope(envelope: JsonRpcOutgoing): string {
  return JSON.stringify(envelope);
}

// This helper decodes a request body the way a server would, used by stand-in servers and tests.
export function decodeRequest(text: string): JsonRpcOutgoing {
  const parsed: unknown = JSON.parse(text);
  if (!isJsonObject(parsed) || parsed.jsonrpc !== JSONRPC_VERSION) {
    throw new TypeError('Body is not a JSON-RPC 2.0 request object.');
  }

  const method = parsed.method;
  if (typeof method !== 'string') {
    throw new TypeError('JSON-RPC method must be a string.');
  }

  const params = parsed.params;
  if (params !== undefined && !Array.isArray(params) && !isJsonObject(params)) {
    throw new TypeError('JSON-RPC params must be an array or an object.');
  }

  const base: JsonRpcNotification = {
    jsonrpc: JSONRPC_VERSION,
    method,
    ...(params !== undefined && { params })
  };

  if (!('id' in parsed)) {
    return base;
  }

  const id = parsed.id;
  if (typeof id !== 'string' && typeof id !== 'number') {
    throw new TypeError('JSON-RPC id must be a string or a number.');
  }

  return { ...base, id };
}

// This function applies body, envelope, error and result checks in that order and returns the untouched result.
export function interpretResponse(method: string, body: string): InterpretedResult {
  const parsed = parseResponseJson(body, method);

  if (!isJsonObject(parsed)) {
    throw new MalformedResponseError(method, 'invalid_envelope', body);
  }

  // An error member wins over a result member when a server sends both; its id is surfaced as received.
  if (parsed.error !== undefined && parsed.error !== null) {
    const errorCheck = errorObjectSchema.safeParse(parsed.error);
    if (!errorCheck.success) {
      throw new MalformedResponseError(method, 'invalid_error_object', body, {
        issues: errorCheck.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      });
    }

    throw new ProtocolError(method, errorCheck.data, parsed.id);
  }

  if (!('result' in parsed)) {
    throw new MalformedResponseError(method, 'missing_result', body);
  }

  const idCheck = responseIdSchema.safeParse(parsed.id);
  if (!idCheck.success) {
    throw new MalformedResponseError(method, 'invalid_envelope', body, {
      issues: idCheck.error.issues.map((issue) => issue.message)
    });
  }

  return {
    id: idCheck.data,
    result: parsed.result
  };
}
