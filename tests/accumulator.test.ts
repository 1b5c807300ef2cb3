import { describe, it, expect, vi } from 'vitest';
import { StreamSession, transformCompletion } from '../server/accumulator.js';
import { markerPair } from '../server/scanner.js';

const THINK = markerPair('<think>', '</think>');

function makeSession(reasoningField = 'reasoning_content') {
  const log = { warn: vi.fn() };
  const session = new StreamSession({ markers: THINK, reasoningField, log });
  return { session, log };
}

function chunk(content: string | null, extra: Record<string, unknown> = {}) {
  return JSON.stringify({
    id: 'chatcmpl-1',
    object: 'chat.completion.chunk',
    created: 1700000000,
    model: 'test-model',
    choices: [{ index: 0, delta: { content, ...extra }, finish_reason: null }],
  });
}

function deltaOf(data: string | null, choice = 0) {
  if (data === null) throw new Error('event was dropped');
  return JSON.parse(data).choices[choice].delta;
}

describe('StreamSession.transform', () => {
  it('moves tagged text into the reasoning field across events', () => {
    const { session } = makeSession();
    expect(deltaOf(session.transform(chunk('Hi <think>pl')))).toEqual({ content: 'Hi ', reasoning_content: 'pl' });
    expect(deltaOf(session.transform(chunk('an</think> there')))).toEqual({ content: ' there', reasoning_content: 'an' });
  });

  it('sets content to null when an event only carries reasoning', () => {
    const { session } = makeSession();
    session.transform(chunk('<think>'));
    expect(deltaOf(session.transform(chunk('deep thought')))).toEqual({ content: null, reasoning_content: 'deep thought' });
  });

  it('drops the text field but keeps other fields when nothing is emitted', () => {
    const { session } = makeSession();
    const out = session.transform(chunk('<think>', { role: 'assistant' }));
    expect(out).not.toBeNull();
    const parsed = JSON.parse(out ?? '');
    expect(parsed.id).toBe('chatcmpl-1');
    expect(parsed.choices[0]).toEqual({ index: 0, delta: { role: 'assistant' }, finish_reason: null });
  });

  it('holds a split marker until the next event resolves it', () => {
    const { session } = makeSession();
    expect(deltaOf(session.transform(chunk('<thi')))).toEqual({});
    expect(deltaOf(session.transform(chunk('nk>x</think>y')))).toEqual({ content: 'y', reasoning_content: 'x' });
  });

  it('returns events without text unchanged', () => {
    const { session } = makeSession();
    const roleOnly = JSON.stringify({ id: 'c', choices: [{ index: 0, delta: { role: 'assistant' } }] });
    const empty = chunk('');
    const nullContent = chunk(null);
    const usage = '{"id":"c","choices":[],"usage":{"total_tokens":12}}';
    const noChoices = '{"usage":{"total_tokens":12}}';
    for (const data of [roleOnly, empty, nullContent, usage, noChoices]) {
      expect(session.transform(data)).toBe(data);
    }
  });

  it('drops a malformed event, logs it, and keeps going', () => {
    const { session, log } = makeSession();
    session.transform(chunk('<think>a'));
    expect(session.transform('{not json')).toBeNull();
    expect(log.warn).toHaveBeenCalledTimes(1);
    expect(log.warn.mock.calls[0][1]).toBe('dropping malformed stream event');
    expect(deltaOf(session.transform(chunk('b</think>c')))).toEqual({ content: 'c', reasoning_content: 'b' });
  });

  it('appends to reasoning the upstream already put in the event', () => {
    const { session } = makeSession();
    const out = session.transform(chunk('<think>mine', { reasoning_content: 'theirs ' }));
    expect(deltaOf(out)).toEqual({ content: null, reasoning_content: 'theirs mine' });
  });

  it('keeps a separate scanner state per choice index', () => {
    const { session } = makeSession();
    const event = (a: string, b: string) =>
      JSON.stringify({
        choices: [
          { index: 0, delta: { content: a } },
          { index: 1, delta: { content: b } },
        ],
      });
    session.transform(event('<think>zero', 'one'));
    const out = session.transform(event('</think>A', 'B'));
    expect(deltaOf(out, 0)).toEqual({ content: 'A' });
    expect(deltaOf(out, 1)).toEqual({ content: 'B' });
  });

  it('writes reasoning under the configured field name', () => {
    const { session } = makeSession('reasoning');
    expect(deltaOf(session.transform(chunk('<think>r</think>v')))).toEqual({ content: 'v', reasoning: 'r' });
  });
});

describe('StreamSession finish_reason handling', () => {
  const finishing = (content: string | null) =>
    JSON.stringify({ id: 'chatcmpl-1', choices: [{ index: 0, delta: { content }, finish_reason: 'stop' }] });

  it('flushes held text into the finishing event of its choice', () => {
    const { session } = makeSession();
    session.transform(chunk('answer <thi'));
    expect(deltaOf(session.transform(finishing(null)))).toEqual({ content: '<thi' });
    expect(session.finish()).toBeNull();
  });

  it('flushes a held end-marker prefix arriving with the finishing text', () => {
    const { session } = makeSession();
    session.transform(chunk('<think>plan'));
    expect(deltaOf(session.transform(finishing(' more</th')))).toEqual({ content: null, reasoning_content: ' more</th' });
    expect(session.finish()).toBeNull();
  });

  it('passes a finishing event through unchanged when nothing is held', () => {
    const { session } = makeSession();
    session.transform(chunk('done'));
    const data = finishing(null);
    expect(session.transform(data)).toBe(data);
  });
});

describe('StreamSession.finish', () => {
  it('emits held marker text as a final chunk', () => {
    const { session } = makeSession();
    session.transform(chunk('answer <thi'));
    const out = session.finish();
    expect(out).not.toBeNull();
    expect(JSON.parse(out ?? '')).toEqual({
      id: 'chatcmpl-1',
      object: 'chat.completion.chunk',
      created: 1700000000,
      model: 'test-model',
      choices: [{ index: 0, delta: { content: '<thi' }, finish_reason: null }],
    });
  });

  it('gives a held end-marker prefix to reasoning', () => {
    const { session } = makeSession();
    session.transform(chunk('<think>plan</th'));
    expect(deltaOf(session.finish())).toEqual({ content: null, reasoning_content: '</th' });
  });

  it('returns null when nothing is held', () => {
    const { session } = makeSession();
    session.transform(chunk('<think>open block'));
    expect(session.finish()).toBeNull();
  });
});

describe('transformCompletion', () => {
  const completion = (content: unknown) => ({
    id: 'chatcmpl-2',
    object: 'chat.completion',
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
    usage: { total_tokens: 9 },
  });

  it('splits the message text and adds the reasoning field', () => {
    const body = completion('<think>plan</think>Answer');
    expect(transformCompletion(body, THINK, 'reasoning_content')).toBe(true);
    expect(body.choices[0].message).toEqual({ role: 'assistant', content: 'Answer', reasoning_content: 'plan' });
    expect(body.usage).toEqual({ total_tokens: 9 });
  });

  it('omits the reasoning field when there is none', () => {
    const body = completion('Just an answer');
    transformCompletion(body, THINK, 'reasoning_content');
    expect(body.choices[0].message).toEqual({ role: 'assistant', content: 'Just an answer' });
  });

  it('sets content to null when the message is only reasoning', () => {
    const body = completion('<think>unfinished');
    transformCompletion(body, THINK, 'reasoning_content');
    expect(body.choices[0].message).toEqual({ role: 'assistant', content: null, reasoning_content: 'unfinished' });
  });

  it('leaves bodies without text content alone', () => {
    const body = completion(null);
    expect(transformCompletion(body, THINK, 'reasoning_content')).toBe(false);
    expect(transformCompletion({ error: 'nope' }, THINK, 'reasoning_content')).toBe(false);
    expect(body.choices[0].message).toEqual({ role: 'assistant', content: null });
  });
});
