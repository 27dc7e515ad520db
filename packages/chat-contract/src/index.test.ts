import { describe, expect, it } from 'vitest';
import {
  buildAnswerEnvelope,
  buildReasoningEnvelope,
  createEnvelopeIdentity,
  DONE_FRAME,
  formatDataFrame,
  parseOutputFrame,
  TIMEOUT_ERROR_FRAME,
} from './index';
import { createTimeoutError, RelayError, toStreamError, TransportError } from './errors';

const identity = createEnvelopeIdentity(1_700_000_000_000);

describe('envelopes', () => {
  it('derives a stable id and a created timestamp in seconds', () => {
    expect(identity).toEqual({ id: 'chatcmpl-18bcfe56800', created: 1_700_000_000 });
  });

  it('duplicates reasoning text into content', () => {
    const envelope = buildReasoningEnvelope(identity, 'deepseek-reasoner', 'step one');
    expect(envelope).toEqual({
      id: 'chatcmpl-18bcfe56800',
      object: 'chat.completion.chunk',
      created: 1_700_000_000,
      model: 'deepseek-reasoner',
      choices: [{ index: 0, delta: { role: 'assistant', content: 'step one', reasoningContent: 'step one' } }],
    });
  });

  it('leaves reasoningContent off answer deltas', () => {
    const envelope = buildAnswerEnvelope(identity, 'claude', 'Hi');
    expect(envelope.choices[0].delta).toEqual({ role: 'assistant', content: 'Hi' });
    expect('reasoningContent' in envelope.choices[0].delta).toBe(false);
  });

  it('formats data frames with a blank-line terminator', () => {
    expect(formatDataFrame({ a: 1 })).toBe('data: {"a":1}\n\n');
    expect(DONE_FRAME).toBe('data: [DONE]\n\n');
    expect(TIMEOUT_ERROR_FRAME).toBe('data: {"error": "Operation timeout"}\n\n');
  });
});

describe('parseOutputFrame', () => {
  it('reads envelopes back', () => {
    const frame = formatDataFrame(buildAnswerEnvelope(identity, 'claude', 'Hi'));
    const parsed = parseOutputFrame(frame);
    expect(parsed.type).toBe('envelope');
    if (parsed.type === 'envelope') {
      expect(parsed.envelope.choices[0].delta.content).toBe('Hi');
    }
  });

  it('recognises the done sentinel and the timeout error', () => {
    expect(parseOutputFrame(DONE_FRAME)).toEqual({ type: 'done' });
    expect(parseOutputFrame(TIMEOUT_ERROR_FRAME)).toEqual({ type: 'error', message: 'Operation timeout' });
  });

  it('returns unknown for anything else', () => {
    expect(parseOutputFrame('data: not json\n\n')).toEqual({ type: 'unknown', raw: 'not json' });
    expect(parseOutputFrame('data: {"hello":"world"}\n\n')).toEqual({ type: 'unknown', raw: '{"hello":"world"}' });
  });
});

describe('errors', () => {
  it('marks throttling and server failures as retryable', () => {
    expect(new TransportError('x', { url: 'http://test', status: 503 }).retryable).toBe(true);
    expect(new TransportError('x', { url: 'http://test', status: 429 }).retryable).toBe(true);
    expect(new TransportError('x', { url: 'http://test', status: 401 }).retryable).toBe(false);
    expect(new TransportError('x', { url: 'http://test' }).retryable).toBe(true);
  });

  it('normalises thrown values into stream errors', () => {
    expect(toStreamError(createTimeoutError(5))).toEqual({ code: 'timeout', message: 'Operation timeout', retryable: true });
    expect(toStreamError(new Error('boom'))).toEqual({ code: 'internal_error', message: 'boom', retryable: false });
    expect(toStreamError('bad')).toEqual({ code: 'internal_error', message: 'bad', retryable: false });
  });

  it('serialises relay errors with their details', () => {
    const error = new RelayError('invalid_config', 'ANSWER_API_KEY is required', { details: { key: 'ANSWER_API_KEY' } });
    expect(error.toJSON()).toEqual({
      code: 'invalid_config',
      message: 'ANSWER_API_KEY is required',
      retryable: false,
      details: { key: 'ANSWER_API_KEY' },
    });
  });
});
