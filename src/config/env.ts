// This module reads client configuration from environment variables and validates it before use.

import { z } from 'zod';
import type { RpcClientOptions } from '../types/client.js';
import { ConfigurationError } from '../utils/errors.js';
import { DEFAULT_TIMEOUT_MS } from '../rpc/transport.js';

const headersSchema = z.record(z.string(), z.string());

const envSchema = z.object({
  JSONRPC_ENDPOINT: z
    .string({ required_error: 'JSONRPC_ENDPOINT is required' })
    .url()
    .refine((value) => value.startsWith('http://') || value.startsWith('https://'), {
      message: 'JSONRPC_ENDPOINT must use http or https'
    }),
  JSONRPC_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  JSONRPC_HEADERS: z.string().optional()
});

export type ClientConfig = Required<Pick<RpcClientOptions, 'endpoint' | 'timeoutMs' | 'headers'>>;

// This helper parses the optional JSON header map, e.g. {"Authorization":"Bearer test-secret"}.
function parseHeaders(raw: string | undefined): Record<string, string> {
  if (raw === undefined || raw.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError('Invalid client configuration.', [
      `JSONRPC_HEADERS: ${error instanceof Error ? error.message : 'invalid JSON'}`
    ]);
  }

  const result = headersSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError('Invalid client configuration.', [
      'JSONRPC_HEADERS: expected a JSON object of string values'
    ]);
  }

  return result.data;
}

// This function builds client options from the environment or raises one error listing every issue.
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid client configuration.',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    endpoint: result.data.JSONRPC_ENDPOINT,
    timeoutMs: result.data.JSONRPC_TIMEOUT_MS,
    headers: parseHeaders(result.data.JSONRPC_HEADERS)
  };
}
