import type { FastifyBaseLogger } from 'fastify';
import { advance, flush, splitReasoning, OUTSIDE, type MarkerPair, type ScannerState, type SplitResult } from './scanner.js';

type JsonObject = Record<string, unknown>;

export type SessionOptions = {
  markers: MarkerPair;
  reasoningField: string;
  log: Pick<FastifyBaseLogger, 'warn'>;
};

// Fields copied onto the synthetic chunk emitted when held text is flushed at stream end.
const CHUNK_META = ['id', 'object', 'created', 'model', 'system_fingerprint'] as const;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Narrow view over `choices[]`: only entries that are objects, keyed by their `index`.
function choicesOf(payload: unknown): Array<{ index: number; choice: JsonObject }> | null {
  if (!isObject(payload) || !Array.isArray(payload.choices)) return null;
  const out: Array<{ index: number; choice: JsonObject }> = [];
  payload.choices.forEach((choice: unknown, position: number) => {
    if (!isObject(choice)) return;
    out.push({ index: typeof choice.index === 'number' ? choice.index : position, choice });
  });
  return out;
}

function appendReasoning(target: JsonObject, field: string, reasoning: string) {
  const existing = target[field];
  target[field] = typeof existing === 'string' ? existing + reasoning : reasoning;
}

/** Writes a split back onto a streamed `delta`. Both parts empty means the text field is dropped. */
export function applyToDelta(delta: JsonObject, split: SplitResult, field: string) {
  if (!split.visible && !split.reasoning) {
    delete delta.content;
    return;
  }
  delta.content = split.visible || null;
  if (split.reasoning) appendReasoning(delta, field, split.reasoning);
}

/** Writes a split back onto a whole `message`. */
export function applyToMessage(message: JsonObject, split: SplitResult, field: string) {
  message.content = !split.visible && split.reasoning ? null : split.visible;
  if (split.reasoning) appendReasoning(message, field, split.reasoning);
}

/**
 * Scanner state for one streamed chat completion. Each choice index keeps its
 * own state; nothing is shared with other sessions.
 */
export class StreamSession {
  private states = new Map<number, ScannerState>();
  private meta: JsonObject = {};

  constructor(private readonly opts: SessionOptions) {}

  /**
   * Rewrites one event payload. Returns the payload to forward, the input
   * string itself when nothing needed rewriting, or null when the payload is
   * not JSON and the event must be dropped.
   */
  transform(data: string): string | null {
    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch (err) {
      this.opts.log.warn({ err, data }, 'dropping malformed stream event');
      return null;
    }

    const choices = choicesOf(payload);
    if (!choices || !isObject(payload)) return data;

    let touched = false;
    for (const { index, choice } of choices) {
      const delta = choice.delta;
      if (!isObject(delta)) continue;
      const text = typeof delta.content === 'string' ? delta.content : '';
      const held = this.states.get(index) ?? OUTSIDE;
      // the event carrying finish_reason is the last one for its choice, so held text goes out with it
      const finished = typeof choice.finish_reason === 'string';
      if (!text && !(finished && held.kind === 'partial')) continue;

      const { split, state } = advance(held, text, this.opts.markers);
      if (finished) {
        const rest = flush(state);
        split.visible += rest.visible;
        split.reasoning += rest.reasoning;
        this.states.delete(index);
      } else {
        this.states.set(index, state);
      }
      applyToDelta(delta, split, this.opts.reasoningField);
      touched = true;
    }
    if (!touched) return data;

    this.meta = {};
    for (const key of CHUNK_META) {
      if (key in payload) this.meta[key] = payload[key];
    }
    return JSON.stringify(payload);
  }

  /**
   * Ends the session after a normal end of stream. Returns one extra chunk
   * payload carrying text still held as a possible marker, or null. Choices
   * that already saw their finish_reason were flushed into that event and
   * contribute nothing here.
   */
  finish(): string | null {
    const choices: JsonObject[] = [];
    for (const [index, state] of this.states) {
      const split = flush(state);
      if (!split.visible && !split.reasoning) continue;
      const delta: JsonObject = {};
      applyToDelta(delta, split, this.opts.reasoningField);
      choices.push({ index, delta, finish_reason: null });
    }
    this.states.clear();
    if (!choices.length) return null;
    return JSON.stringify({ ...this.meta, choices });
  }
}

/**
 * Non-streaming counterpart: splits `message.content` of every choice in a
 * `chat.completion` body, in place. Returns false when the body has no
 * choices to rewrite.
 */
export function transformCompletion(body: unknown, markers: MarkerPair, reasoningField: string): boolean {
  const choices = choicesOf(body);
  if (!choices) return false;
  let touched = false;
  for (const { choice } of choices) {
    const message = choice.message;
    if (!isObject(message) || typeof message.content !== 'string') continue;
    applyToMessage(message, splitReasoning(message.content, markers), reasoningField);
    touched = true;
  }
  return touched;
}
