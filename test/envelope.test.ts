// This test suite verifies request construction, server-side decoding and response interpretation.

import { describe, expect, it } from 'vitest';
import { buildNotification, buildRequest, decodeRequest, encodeEnvelope, interpretResponse } from '../src/rpc/envelope.js';
import { MalformedResponseError, ProtocolError } from '../src/utils/errors.js';

describe('request envelopes', () => {
  it('omits params when absent instead of sending null', () => {
    expect(encodeEnvelope(buildRequest('ping', undefined, 'a1'))).toBe('{"jsonrpc":"2.0","method":"ping","id":"a1"}');
    expect(encodeEnvelope(buildNotification('tick'))).toBe('{"jsonrpc":"2.0","method":"tick"}');
  });

  it('decodes an encoded request back to the same method, params and id', () => {
    const params = { query: 'café', limit: 10, filters: [{ field: 'tag', values: ['a', 'b'] }], nested: { on: true } };
    const decoded = decodeRequest(encodeEnvelope(buildRequest('search/run', params, 17)));

    expect(decoded).toEqual({ jsonrpc: '2.0', method: 'search/run', params, id: 17 });
  });

  it('decodes notifications without inventing an id', () => {
    const decoded = decodeRequest(encodeEnvelope(buildNotification('log', ['line'])));

    expect(decoded).toEqual({ jsonrpc: '2.0', method: 'log', params: ['line'] });
    expect('id' in decoded).toBe(false);
  });

  it('accepts null-prototype objects as named params', () => {
    const params = Object.assign(Object.create(null), { a: 1 });

    expect(encodeEnvelope(buildRequest('m', params, 1))).toBe('{"jsonrpc":"2.0","method":"m","params":{"a":1},"id":1}');
  });

  it('rejects invalid methods, params and ids', () => {
    expect(() => buildRequest('', undefined, 1)).toThrow('JSON-RPC method must be a non-empty string.');
    expect(() => buildRequest('m', undefined, Number.NaN)).toThrow('JSON-RPC id must be a string or a safe integer.');
    expect(() => buildNotification('m', Object.create({ inherited: true }))).toThrow(
      'JSON-RPC params must be an array or a plain object.'
    );
    expect(() => decodeRequest('{"jsonrpc":"1.0","method":"m"}')).toThrow(TypeError);
    expect(() => decodeRequest('not json')).toThrow(SyntaxError);
  });
});

describe('response interpretation', () => {
  it('returns the result and the response id', () => {
    expect(interpretResponse('m', '{"jsonrpc":"2.0","id":"x","result":{"a":[1,2]}}')).toEqual({
      id: 'x',
      result: { a: [1, 2] }
    });
  });

  it('keeps the raw body on malformed responses', () => {
    try {
      interpretResponse('m', '{"jsonrpc":');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedResponseError);
      expect(error).toMatchObject({ reason: 'invalid_body', body: '{"jsonrpc":' });
    }
  });

  it('rejects ids that are neither string, number nor null', () => {
    expect(() => interpretResponse('m', '{"jsonrpc":"2.0","id":{"n":1},"result":1}')).toThrow(MalformedResponseError);
  });

  it('does not enforce the jsonrpc version member on responses', () => {
    expect(interpretResponse('m', '{"id":1,"result":"ok"}')).toEqual({ id: 1, result: 'ok' });
  });

  it('checks the error member before validating the response id', () => {
    expect(() => interpretResponse('m', '{"id":[1],"error":{"code":-32600,"message":"Invalid Request"}}')).toThrow(
      ProtocolError
    );
  });

  it('prefers the error member over the result member', () => {
    expect(() => interpretResponse('m', '{"id":1,"result":1,"error":{"code":-32603,"message":"Internal error"}}')).toThrow(
      ProtocolError
    );
  });
});
