import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest, type FastifyServerOptions } from 'fastify';
import { StreamSession, transformCompletion } from './accumulator.js';
import { InvalidRequestError, ProxyError, UpstreamUnavailableError } from './errors.js';
import { forwardRequestHeaders, relayResponseHeaders } from './headers.js';
import { readBody, relayBytes, relayEventStream } from './relay.js';
import type { MarkerPair } from './scanner.js';
import { StreamWriter, sseHeaders } from './sse.js';
import type { UpstreamClient } from './upstream.js';

export const CHAT_COMPLETIONS_PATH = '/v1/chat/completions';
const DEFAULT_BODY_LIMIT = 10 * 1024 * 1024;

export type ServerOptions = {
  upstream: UpstreamClient;
  markers: MarkerPair;
  reasoningField: string;
  defaultReasoningEffort: string;
  bodyLimit?: number;
  logger?: FastifyServerOptions['logger'];
};

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseChatBody(body: unknown): Record<string, unknown> {
  if (!Buffer.isBuffer(body) || body.length === 0) {
    throw new InvalidRequestError('Request body must be a JSON object');
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString('utf8'));
  } catch (err) {
    throw new InvalidRequestError('Request body is not valid JSON', { cause: err });
  }
  if (!isJsonObject(parsed)) throw new InvalidRequestError('Request body must be a JSON object');
  return parsed;
}

// Ties the upstream call to the client connection: a client that goes away before the reply finished cancels it.
function abortOnDisconnect(reply: FastifyReply) {
  const abort = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableFinished) abort.abort();
  });
  return abort;
}

// Whole-body read for replies that are not relayed as a stream; a failed read cancels the upstream call.
async function readWhole(res: Response, client: UpstreamClient, abort: AbortController) {
  try {
    return await readBody(res.body, client.timeoutMs);
  } catch (err) {
    abort.abort();
    throw err;
  }
}

function relayVerbatim(res: Response, body: Buffer, reply: FastifyReply) {
  return reply.code(res.status).headers(relayResponseHeaders(res.headers)).send(body);
}

export function buildServer(opts: ServerOptions): FastifyInstance {
  const app = Fastify({
    logger: opts.logger ?? true,
    bodyLimit: opts.bodyLimit ?? DEFAULT_BODY_LIMIT,
    // HEAD is relayed like every other method
    exposeHeadRoutes: false,
  });
  const { upstream } = opts;

  app.addHook('onReady', async () => {
    upstream.open();
  });
  app.addHook('onClose', async () => {
    upstream.close();
  });

  // Bodies are relayed byte-for-byte; the chat route parses its own JSON.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  app.setErrorHandler((err, request, reply) => {
    if (err instanceof ProxyError) {
      request.log.warn({ err }, err.message);
      return reply.code(err.statusCode).send({ error: err.message });
    }
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: err.message });
    }
    request.log.error({ err }, 'unexpected proxy error');
    return reply.code(500).send({ error: 'Internal server error' });
  });

  const requireUpstream = () => {
    if (!upstream.ready) throw new UpstreamUnavailableError();
    return upstream;
  };

  app.post(CHAT_COMPLETIONS_PATH, async (request, reply) => {
    const client = requireUpstream();
    const body = parseChatBody(request.body);
    if (body.reasoning_effort === undefined) body.reasoning_effort = opts.defaultReasoningEffort;
    const stream = body.stream === true;

    const abort = abortOnDisconnect(reply);
    const res = await client.send({
      method: 'POST',
      path: request.url,
      headers: { ...forwardRequestHeaders(request.headers, { dropContentType: true }), 'content-type': 'application/json' },
      body: JSON.stringify(body),
      signal: abort.signal,
    });

    if (!res.ok) return relayVerbatim(res, await readWhole(res, client, abort), reply);

    if (!stream) {
      const raw = await readWhole(res, client, abort);
      let completion: unknown;
      try {
        completion = JSON.parse(raw.toString('utf8'));
      } catch (err) {
        request.log.warn({ err }, 'upstream completion is not JSON, relaying unchanged');
        return relayVerbatim(res, raw, reply);
      }
      transformCompletion(completion, opts.markers, opts.reasoningField);
      return reply.code(res.status).type('application/json').send(completion);
    }

    reply.hijack();
    reply.raw.writeHead(res.status, { ...sseHeaders(), 'Content-Type': res.headers.get('content-type') ?? 'text/event-stream' });
    const writer = new StreamWriter(reply.raw);
    if (!res.body) {
      writer.end();
      return;
    }
    const session = new StreamSession({ markers: opts.markers, reasoningField: opts.reasoningField, log: request.log });
    await relayEventStream({ body: res.body, writer, session, idleTimeoutMs: client.timeoutMs, log: request.log, abort });
  });

  app.all('/*', async (request: FastifyRequest, reply: FastifyReply) => {
    const client = requireUpstream();
    const abort = abortOnDisconnect(reply);
    const body = Buffer.isBuffer(request.body) && request.body.length > 0 ? request.body : undefined;
    const res = await client.send({
      method: request.method,
      path: request.url,
      headers: forwardRequestHeaders(request.headers),
      body,
      signal: abort.signal,
    });

    reply.hijack();
    reply.raw.writeHead(res.status, relayResponseHeaders(res.headers));
    const writer = new StreamWriter(reply.raw);
    if (!res.body) {
      writer.end();
      return;
    }
    await relayBytes({ body: res.body, writer, idleTimeoutMs: client.timeoutMs, log: request.log, abort });
  });

  return app;
}
