import type { Writable } from 'node:stream';

export const DONE_SENTINEL = '[DONE]';

export function sseHeaders() {
  return {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache, no-transform',
    Connection: 'keep-alive',
    'X-Accel-Buffering': 'no',
  } as const;
}

export type SseFrame = {
  /** Frame text as received, line endings normalised, without the blank-line delimiter. */
  raw: string;
  /** Joined `data:` lines, or null for frames that carry none (comments, bare `event:`). */
  data: string | null;
  event?: string;
  id?: string;
};

export function isTerminal(frame: SseFrame): boolean {
  return frame.data !== null && frame.data.trim() === DONE_SENTINEL;
}

export function encodeFrame(frame: { data: string; event?: string; id?: string }): string {
  let out = '';
  if (frame.event !== undefined) out += `event: ${frame.event}\n`;
  if (frame.id !== undefined) out += `id: ${frame.id}\n`;
  for (const line of frame.data.split('\n')) out += `data: ${line}\n`;
  return out + '\n';
}

export function encodeRaw(frame: SseFrame): string {
  return `${frame.raw}\n\n`;
}

function parseFrame(raw: string): SseFrame {
  const frame: SseFrame = { raw, data: null };
  const data: string[] = [];
  for (const line of raw.split('\n')) {
    if (!line || line.startsWith(':')) continue;
    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);
    switch (field) {
      case 'data':
        data.push(value);
        break;
      case 'event':
        frame.event = value;
        break;
      case 'id':
        frame.id = value;
        break;
    }
  }
  if (data.length) frame.data = data.join('\n');
  return frame;
}

/**
 * Incremental event-stream decoder. Bytes may be split anywhere, including
 * inside a UTF-8 sequence or between `\r` and `\n`; frames are only returned
 * once their blank-line delimiter has arrived.
 */
export class SseDecoder {
  private buffer = '';
  private pendingCr = false;
  private decoder = new TextDecoder();

  push(chunk: Uint8Array | string): SseFrame[] {
    const text = typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true });
    this.append(text);
    return this.drain();
  }

  end(): SseFrame[] {
    this.append(this.decoder.decode());
    if (this.pendingCr) {
      this.buffer += '\n';
      this.pendingCr = false;
    }
    const frames = this.drain();
    const rest = this.buffer.replace(/^\n+|\n+$/g, '');
    this.buffer = '';
    if (rest) frames.push(parseFrame(rest));
    return frames;
  }

  private append(text: string) {
    let incoming = (this.pendingCr ? '\r' : '') + text;
    this.pendingCr = incoming.endsWith('\r');
    if (this.pendingCr) incoming = incoming.slice(0, -1);
    this.buffer += incoming.replace(/\r\n?/g, '\n');
  }

  private drain(): SseFrame[] {
    const frames: SseFrame[] = [];
    let idx;
    while ((idx = this.buffer.indexOf('\n\n')) !== -1) {
      const raw = this.buffer.slice(0, idx).replace(/^\n+/, '');
      this.buffer = this.buffer.slice(idx + 2);
      if (raw) frames.push(parseFrame(raw));
    }
    return frames;
  }
}

/** Writes to a raw response, waiting for `drain` when the socket buffer is full. */
export class StreamWriter {
  private ended = false;

  constructor(private out: Writable) {}

  get open() {
    return !this.ended && !this.out.destroyed;
  }

  async write(chunk: string | Uint8Array) {
    if (!this.open) return;
    if (!this.out.write(chunk)) {
      await onceDrain(this.out);
    }
  }

  end() {
    if (this.ended) return;
    this.ended = true;
    if (!this.out.destroyed) this.out.end();
  }
}

function onceDrain(out: Writable) {
  return new Promise<void>((resolve) => {
    const done = () => {
      out.off('drain', done);
      out.off('close', done);
      resolve();
    };
    out.once('drain', done);
    out.once('close', done);
  });
}
