// This module centralizes client identity values so request headers and logs stay in sync.

export const CLIENT_NAME = 'jsonrpc-http-client';
export const CLIENT_VERSION = '0.1.0';
export const JSONRPC_VERSION = '2.0';

// This helper returns the User-Agent value sent with every request.
export function formatUserAgent(): string {
  return `${CLIENT_NAME}/${CLIENT_VERSION}`;
}
