// This module implements the default HTTP transport on top of the global fetch API.

import type { HttpTransport, TransportRequest, TransportResponse } from '../types/client.js';

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface FetchTransportOptions {
  timeoutMs?: number;
}

// This class performs one POST per send, each with its own abort controller and timeout.
export class FetchTransport implements HttpTransport {
  private readonly timeoutMs: number;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  public constructor(options: FetchTransportOptions = {}) {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError('Transport timeout must be a positive number of milliseconds.');
    }

    this.timeoutMs = timeoutMs;
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public async send(request: TransportRequest): Promise<TransportResponse> {
    if (this.closed) {
      throw new Error('Transport is closed.');
    }

    const abortController = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      abortController.abort();
    }, this.timeoutMs);
    this.inFlight.add(abortController);

    try {
      const response = await fetch(request.url, {
        method: 'POST',
        headers: request.headers,
        body: request.body,
        signal: abortController.signal
      });

      // The body is read inside the timeout window so a stalled stream cannot hang the call.
      const body = await response.text();
      return {
        status: response.status,
        body
      };
    } catch (error) {
      if (timedOut) {
        throw new Error(`Request timed out after ${this.timeoutMs}ms`, { cause: error });
      }

      if (abortController.signal.aborted) {
        throw new Error('Request aborted because the transport was closed.', { cause: error });
      }

      throw error;
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(abortController);
    }
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }
}
