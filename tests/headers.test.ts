import { describe, it, expect } from 'vitest';
import { forwardRequestHeaders, relayResponseHeaders } from '../server/headers.js';

describe('forwardRequestHeaders', () => {
  it('drops hop-by-hop and transport headers', () => {
    const out = forwardRequestHeaders({
      host: 'proxy.local',
      connection: 'keep-alive, x-trace',
      'keep-alive': 'timeout=5',
      'transfer-encoding': 'chunked',
      upgrade: 'h2c',
      te: 'trailers',
      'content-length': '42',
      'accept-encoding': 'gzip',
      'x-trace': 'abc',
      authorization: 'Bearer test-secret',
      'content-type': 'application/json',
      accept: 'text/event-stream',
    });
    expect(out).toEqual({
      authorization: 'Bearer test-secret',
      'content-type': 'application/json',
      accept: 'text/event-stream',
    });
  });

  it('can leave out content-type and folds repeated values', () => {
    const out = forwardRequestHeaders(
      { 'content-type': 'text/plain', 'x-tag': ['a', 'b'] },
      { dropContentType: true },
    );
    expect(out).toEqual({ 'x-tag': 'a, b' });
  });
});

describe('relayResponseHeaders', () => {
  it('drops hop-by-hop and encoding headers and keeps cookies separate', () => {
    const headers = new Headers([
      ['content-type', 'application/json'],
      ['content-length', '10'],
      ['content-encoding', 'gzip'],
      ['connection', 'close'],
      ['x-request-id', 'r-1'],
      ['set-cookie', 'a=1'],
      ['set-cookie', 'b=2'],
    ]);
    expect(relayResponseHeaders(headers)).toEqual({
      'content-type': 'application/json',
      'x-request-id': 'r-1',
      'set-cookie': ['a=1', 'b=2'],
    });
  });
});
