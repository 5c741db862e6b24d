// This module generates request ids for calls that do not supply their own.

import { randomUUID } from 'node:crypto';

export function createRequestId(): string {
  return randomUUID();
}

// This helper returns a generator of increasing integer ids, for servers that reject string ids.
export function createSequentialIdGenerator(start = 1): () => number {
  let next = start;
  return () => {
    const id = next;
    next += 1;
    return id;
  };
}
