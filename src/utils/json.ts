// This utility module keeps JSON parsing of response bodies explicit about failure.

import { MalformedResponseError } from './errors.js';

// This helper parses one response body and raises a malformed-response error that retains the raw text.
export function parseResponseJson(body: string, method: string): unknown {
  try {
    return JSON.parse(body) as unknown;
  } catch (error) {
    throw new MalformedResponseError(method, 'invalid_body', body, {
      originalMessage: error instanceof Error ? error.message : 'unknown'
    });
  }
}

// This helper narrows parsed JSON to a plain object record.
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
