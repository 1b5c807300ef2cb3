import type { IncomingHttpHeaders, OutgoingHttpHeaders } from 'node:http';

const HOP_BY_HOP = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'trailers',
  'transfer-encoding',
  'upgrade',
]);

// fetch decompresses bodies itself, so encoding is left for it to negotiate
const REQUEST_ONLY = new Set(['host', 'content-length', 'accept-encoding']);
const RESPONSE_ONLY = new Set(['content-length', 'content-encoding']);

function connectionTokens(value: string | null | undefined): Set<string> {
  if (!value) return new Set();
  return new Set(
    value
      .split(',')
      .map((t) => t.trim().toLowerCase())
      .filter(Boolean),
  );
}

export type ForwardOptions = { dropContentType?: boolean };

/** Request headers safe to pass upstream. Array values are joined the way HTTP folds them. */
export function forwardRequestHeaders(headers: IncomingHttpHeaders, opts: ForwardOptions = {}): Record<string, string> {
  const listed = connectionTokens(typeof headers.connection === 'string' ? headers.connection : undefined);
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    const name = key.toLowerCase();
    if (value === undefined || HOP_BY_HOP.has(name) || REQUEST_ONLY.has(name) || listed.has(name)) continue;
    if (opts.dropContentType && name === 'content-type') continue;
    out[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return out;
}

/** Upstream response headers to relay to the client; `set-cookie` values stay separate. */
export function relayResponseHeaders(headers: Headers): OutgoingHttpHeaders {
  const listed = connectionTokens(headers.get('connection'));
  const out: OutgoingHttpHeaders = {};
  headers.forEach((value, key) => {
    if (HOP_BY_HOP.has(key) || RESPONSE_ONLY.has(key) || listed.has(key) || key === 'set-cookie') return;
    out[key] = value;
  });
  const cookies = headers.getSetCookie();
  if (cookies.length) out['set-cookie'] = cookies;
  return out;
}
