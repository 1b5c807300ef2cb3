import { SseDecoder, isTerminal } from '../../server/sse.js';

export type ChatDelta = { content?: string; reasoning?: string };
export type OnDelta = (d: ChatDelta) => void;
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type StreamChatOptions = {
  url?: string;
  /** Chat-completions request body; `stream` is forced to true. */
  body: Record<string, unknown>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  reasoningField?: string;
  fetch?: FetchLike;
  onDelta?: OnDelta;
};

export type ChatResult = { content: string; reasoning: string };

function parseEvent(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch {
    return undefined;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deltaOf(event: unknown, reasoningField: string): ChatDelta | null {
  if (!isObject(event) || !Array.isArray(event.choices)) return null;
  const first: unknown = event.choices[0];
  if (!isObject(first) || !isObject(first.delta)) return null;
  const d: ChatDelta = {};
  const content = first.delta.content;
  const reasoning = first.delta[reasoningField];
  if (typeof content === 'string' && content) d.content = content;
  if (typeof reasoning === 'string' && reasoning) d.reasoning = reasoning;
  return d.content !== undefined || d.reasoning !== undefined ? d : null;
}

/** Streams a chat completion through the proxy and collects answer and reasoning separately. */
export async function streamChat(opts: StreamChatOptions): Promise<ChatResult> {
  const url = opts.url ?? 'http://localhost:8000/v1/chat/completions';
  const fetchImpl: FetchLike = opts.fetch ?? ((u, init) => fetch(u, init));
  const reasoningField = opts.reasoningField ?? 'reasoning_content';

  const res = await fetchImpl(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...opts.headers },
    body: JSON.stringify({ ...opts.body, stream: true }),
    signal: opts.signal,
  });
  if (!res.ok || !res.body) {
    const t = await res.text();
    throw new Error(`HTTP ${res.status}: ${t}`);
  }

  const result: ChatResult = { content: '', reasoning: '' };
  const decoder = new SseDecoder();
  const reader = res.body.getReader();

  const handle = (frames: ReturnType<SseDecoder['push']>) => {
    for (const frame of frames) {
      if (isTerminal(frame)) return true;
      if (frame.data === null) continue;
      // events that are not chat chunks carry nothing to collect
      const delta = deltaOf(parseEvent(frame.data), reasoningField);
      if (!delta) continue;
      result.content += delta.content ?? '';
      result.reasoning += delta.reasoning ?? '';
      opts.onDelta?.(delta);
    }
    return false;
  };

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        handle(decoder.end());
        return result;
      }
      if (handle(decoder.push(value))) return result;
    }
  } finally {
    reader.releaseLock();
  }
}
