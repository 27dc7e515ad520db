import { describe, expect, it, vi } from 'vitest';
import { TransportError, type ChatRequestMessage, type SemanticEvent } from '@reasoning-relay/chat-contract';
import { contentFrame, createFakeTransport, doneFrame, reasoningFrame, type FakeTransportScript } from '@reasoning-relay/test-support';
import { createAnswerChunkDecoder } from './decoders/answerDecoder';
import { createProviderStreamClient } from './providerClient';
import { createReasoningClient, DEFAULT_REASONING_API_URL } from './reasoningClient';
import {
  clampAnthropicMaxTokens,
  createChatCompletionsAnswerClient,
  DEFAULT_ANSWER_API_URL,
  splitAnthropicMessages,
  toOpenAiMessage,
} from './answerClients';
import type { LlmLogger } from './types';

const PROVIDER_URL = 'http://provider.test/v1/chat/completions';
const messages: ChatRequestMessage[] = [{ role: 'user', content: 'Hi' }];

async function collect(events: AsyncIterable<SemanticEvent>): Promise<SemanticEvent[]> {
  const collected: SemanticEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

function answerClient(scripts: FakeTransportScript[], logger?: LlmLogger) {
  const transport = createFakeTransport(scripts);
  const client = createProviderStreamClient({
    provider: 'answer',
    transport,
    url: PROVIDER_URL,
    apiKey: 'test-secret',
    maxTokens: 100,
    temperature: 0.5,
    logger,
    createDecoder: ({ onDecodeError }) => createAnswerChunkDecoder({ onDecodeError }),
  });
  return { client, transport };
}

describe('createProviderStreamClient', () => {
  it('sends an authorised streaming request and yields decoded events', async () => {
    const { client, transport } = answerClient([{ chunks: [contentFrame('Hel'), contentFrame('lo'), doneFrame()] }]);

    await expect(collect(client.streamChat(messages, 'test-model'))).resolves.toEqual([
      { kind: 'answer', text: 'Hel' },
      { kind: 'answer', text: 'lo' },
    ]);
    expect(transport.requests).toEqual([
      {
        url: PROVIDER_URL,
        headers: { Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' },
        body: {
          model: 'test-model',
          messages: [{ role: 'user', content: 'Hi' }],
          stream: true,
          max_tokens: 100,
          temperature: 0.5,
        },
        signal: undefined,
      },
    ]);
  });

  it('refuses to start without an API key', () => {
    expect(() =>
      createProviderStreamClient({
        provider: 'answer',
        transport: createFakeTransport([]),
        url: PROVIDER_URL,
        apiKey: '  ',
        createDecoder: () => createAnswerChunkDecoder(),
      })
    ).toThrow('Missing API key for the answer provider.');
  });

  it('ends the sequence quietly when the transport fails', async () => {
    const logger = vi.fn<LlmLogger>();
    const failure = new TransportError('Provider responded with 500', { url: PROVIDER_URL, status: 500 });
    const { client } = answerClient([{ chunks: [contentFrame('partial')], error: failure }], logger);

    await expect(collect(client.streamChat(messages, 'test-model'))).resolves.toEqual([
      { kind: 'answer', text: 'partial' },
    ]);
    expect(logger).toHaveBeenCalledWith(
      'llm.stream_error',
      expect.objectContaining({
        provider: 'answer',
        model: 'test-model',
        eventCount: 1,
        error: { code: 'transport_error', message: 'Provider responded with 500', retryable: true },
      })
    );
  });

  it('logs malformed lines and keeps going', async () => {
    const logger = vi.fn<LlmLogger>();
    const { client } = answerClient([{ chunks: ['data: {bad\n\n', contentFrame('ok')] }], logger);

    await expect(collect(client.streamChat(messages, 'test-model'))).resolves.toEqual([{ kind: 'answer', text: 'ok' }]);
    expect(logger).toHaveBeenCalledWith('llm.decode_error', { provider: 'answer', model: 'test-model', line: '{bad' });
  });

  it('stops reading the transport at the done sentinel', async () => {
    const { client, transport } = answerClient([{ chunks: [contentFrame('a') + doneFrame(), contentFrame('ignored')] }]);

    await expect(collect(client.streamChat(messages, 'test-model'))).resolves.toEqual([{ kind: 'answer', text: 'a' }]);
    expect(transport.stats.released).toBe(1);
  });

  it('rethrows when the caller aborts', async () => {
    const { client } = answerClient([{ hang: true }]);
    const controller = new AbortController();

    const pending = collect(client.streamChat(messages, 'test-model', { signal: controller.signal }));
    controller.abort(new Error('stop'));

    await expect(pending).rejects.toThrow('stop');
  });
});

describe('createReasoningClient', () => {
  it('asks for an event stream and picks the field channel for deepseek-reasoner', async () => {
    const transport = createFakeTransport([{ chunks: [reasoningFrame('hmm'), contentFrame('4'), doneFrame()] }]);
    const client = createReasoningClient({ apiKey: 'test-secret', transport });

    await expect(collect(client.streamChat(messages, 'deepseek-reasoner'))).resolves.toEqual([
      { kind: 'reasoning', text: 'hmm' },
      { kind: 'content', text: '4' },
    ]);
    expect(transport.requests[0]?.url).toBe(DEFAULT_REASONING_API_URL);
    expect(transport.requests[0]?.headers).toEqual({
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json',
      Accept: 'text/event-stream',
    });
    expect(transport.requests[0]?.body).toEqual({
      model: 'deepseek-reasoner',
      messages: [{ role: 'user', content: 'Hi' }],
      stream: true,
    });
  });

  it('honours a forced marker channel', async () => {
    const transport = createFakeTransport([{ chunks: [contentFrame('<think>x</think>'), doneFrame()] }]);
    const client = createReasoningClient({ apiKey: 'test-secret', transport, channel: 'marker' });

    await expect(collect(client.streamChat(messages, 'deepseek-reasoner'))).resolves.toEqual([
      { kind: 'reasoning', text: '<think>x</think>' },
      { kind: 'content', text: '' },
    ]);
  });
});

describe('answer clients', () => {
  it('adds gateway attribution headers and default tuning', async () => {
    const transport = createFakeTransport([{ chunks: [contentFrame('Hi'), doneFrame()] }]);
    const client = createChatCompletionsAnswerClient({
      apiKey: 'test-secret',
      transport,
      referer: 'https://relay.test',
      title: 'Relay Test',
    });

    await expect(collect(client.streamChat(messages, 'anthropic/claude-3.5-sonnet'))).resolves.toEqual([
      { kind: 'answer', text: 'Hi' },
    ]);
    expect(transport.requests[0]).toMatchObject({
      url: DEFAULT_ANSWER_API_URL,
      headers: { 'HTTP-Referer': 'https://relay.test', 'X-Title': 'Relay Test' },
      body: { max_tokens: 8192, temperature: 0.7 },
    });
  });

  it('maps roles for the OpenAI SDK', () => {
    expect(toOpenAiMessage({ role: 'system', content: 's' })).toEqual({ role: 'system', content: 's' });
    expect(toOpenAiMessage({ role: 'assistant', content: 'a' })).toEqual({ role: 'assistant', content: 'a' });
  });

  it('moves system turns into the Anthropic system field', () => {
    expect(
      splitAnthropicMessages([
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Hi' },
        { role: 'system', content: 'Be kind.' },
        { role: 'assistant', content: 'Hello' },
      ])
    ).toEqual({
      system: 'Be brief.\n\nBe kind.',
      conversation: [
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello' },
      ],
    });
  });

  it('clamps Anthropic max tokens', () => {
    expect(clampAnthropicMaxTokens(undefined)).toBe(8192);
    expect(clampAnthropicMaxTokens(-3)).toBe(8192);
    expect(clampAnthropicMaxTokens(100.7)).toBe(100);
    expect(clampAnthropicMaxTokens(50_000)).toBe(8192);
  });
});
