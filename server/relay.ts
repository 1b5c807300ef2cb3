import type { FastifyBaseLogger } from 'fastify';
import type { StreamSession } from './accumulator.js';
import { ProxyError, UpstreamRequestError, UpstreamTimeoutError } from './errors.js';
import { SseDecoder, encodeFrame, encodeRaw, isTerminal, type SseFrame, type StreamWriter } from './sse.js';
import { withTimeout } from './upstream.js';

export type RelayOptions = {
  body: ReadableStream<Uint8Array>;
  writer: StreamWriter;
  idleTimeoutMs: number;
  log: FastifyBaseLogger;
  /** Aborts the upstream call; fired once relaying stops for any reason. */
  abort: AbortController;
};

async function* readChunks(body: ReadableStream<Uint8Array>, idleTimeoutMs: number): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  while (true) {
    const { value, done } = await withTimeout(reader.read(), idleTimeoutMs, () => new UpstreamTimeoutError(idleTimeoutMs));
    if (done) return;
    if (value) yield value;
  }
}

/** Reads a whole upstream body with the idle timeout applied to each read. */
export async function readBody(body: ReadableStream<Uint8Array> | null, idleTimeoutMs: number): Promise<Buffer> {
  if (!body) return Buffer.alloc(0);
  const chunks: Uint8Array[] = [];
  try {
    for await (const chunk of readChunks(body, idleTimeoutMs)) chunks.push(chunk);
  } catch (err) {
    if (err instanceof ProxyError) throw err;
    throw new UpstreamRequestError(err);
  }
  return Buffer.concat(chunks);
}

function logStop(opts: RelayOptions, err: unknown) {
  if (!opts.writer.open) {
    opts.log.debug({ err }, 'client went away, upstream stream released');
  } else {
    opts.log.warn({ err }, 'upstream stream failed, ending client stream');
  }
}

/** Copies an upstream body to the client unchanged. */
export async function relayBytes(opts: RelayOptions): Promise<void> {
  try {
    for await (const chunk of readChunks(opts.body, opts.idleTimeoutMs)) {
      if (!opts.writer.open) break;
      await opts.writer.write(chunk);
    }
  } catch (err) {
    logStop(opts, err);
  } finally {
    opts.abort.abort();
    opts.writer.end();
  }
}

/**
 * Relays a chat-completion event stream, passing every data payload through
 * the session. Text held back as a possible marker is flushed when the stream
 * ends normally, either at the [DONE] sentinel or at a clean upstream close.
 * A failed or timed-out upstream ends the client stream without that flush.
 */
export async function relayEventStream(opts: RelayOptions & { session: StreamSession }): Promise<void> {
  const { writer, session } = opts;
  const decoder = new SseDecoder();

  const flushSession = async () => {
    const data = session.finish();
    if (data !== null) await writer.write(encodeFrame({ data }));
  };

  // true once the terminal sentinel has been forwarded
  const forward = async (frames: SseFrame[]) => {
    for (const frame of frames) {
      if (isTerminal(frame)) {
        await flushSession();
        await writer.write(encodeRaw(frame));
        return true;
      }
      if (frame.data === null) {
        await writer.write(encodeRaw(frame));
        continue;
      }
      const data = session.transform(frame.data);
      if (data === null) continue;
      await writer.write(data === frame.data ? encodeRaw(frame) : encodeFrame({ event: frame.event, id: frame.id, data }));
    }
    return false;
  };

  try {
    let ended = false;
    for await (const chunk of readChunks(opts.body, opts.idleTimeoutMs)) {
      if (!writer.open) return;
      ended = await forward(decoder.push(chunk));
      if (ended) break;
    }
    if (!ended && writer.open) {
      ended = await forward(decoder.end());
      if (!ended) await flushSession();
    }
  } catch (err) {
    logStop(opts, err);
  } finally {
    opts.abort.abort();
    writer.end();
  }
}
