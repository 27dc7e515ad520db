import { describe, expect, it, vi } from 'vitest';
import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import {
  buildAnswerEnvelope,
  buildReasoningEnvelope,
  createEnvelopeIdentity,
  DONE_FRAME,
  formatDataFrame,
  TIMEOUT_ERROR_FRAME,
} from '@reasoning-relay/chat-contract';
import { contentFrame, createFakeTransport, doneFrame, reasoningFrame } from '@reasoning-relay/test-support';
import { createAnswerClient, createReasoningRelayServer } from './bootstrap';
import { RelayConfigSchema, type RelayConfig } from './config';
import type { RelayServerLogger } from './server';

const NOW = 1_700_000_000_000;
const identity = createEnvelopeIdentity(NOW);

function buildConfig(answer: Partial<RelayConfig['answer']> = {}): RelayConfig {
  return RelayConfigSchema.parse({
    reasoning: { apiKey: 'test-secret' },
    answer: { apiKey: 'test-secret', model: 'claude-test', ...answer },
  });
}

describe('createReasoningRelayServer', () => {
  it('relays a field-channel reasoning stream into the answer provider over HTTP', async () => {
    const transport = createFakeTransport([
      { chunks: [reasoningFrame('<think>'), reasoningFrame('4'), reasoningFrame('</think>'), contentFrame('4'), doneFrame()] },
      { chunks: [contentFrame('The answer '), contentFrame('is 4.'), doneFrame()] },
    ]);
    const logger = vi.fn<RelayServerLogger>();
    const server = createReasoningRelayServer(buildConfig({ title: 'Relay' }), { transport, logger, now: () => NOW });

    const response = await server.handler.POST(
      new Request('http://localhost/v1/chat/completions', {
        method: 'POST',
        body: JSON.stringify({ messages: [{ role: 'system', content: 'Be brief.' }, { role: 'user', content: '2+2?' }] }),
      })
    );

    await expect(response.text()).resolves.toBe(
      [
        formatDataFrame(buildReasoningEnvelope(identity, 'deepseek-reasoner', '<think>')),
        formatDataFrame(buildReasoningEnvelope(identity, 'deepseek-reasoner', '4')),
        formatDataFrame(buildReasoningEnvelope(identity, 'deepseek-reasoner', '</think>')),
        formatDataFrame(buildAnswerEnvelope(identity, 'claude-test', 'The answer ')),
        formatDataFrame(buildAnswerEnvelope(identity, 'claude-test', 'is 4.')),
        DONE_FRAME,
      ].join('')
    );

    expect(transport.requests).toHaveLength(2);
    const [reasoningRequest, answerRequest] = transport.requests;
    expect(reasoningRequest?.url).toBe('https://api.deepseek.com/v1/chat/completions');
    expect(reasoningRequest?.headers.Authorization).toBe('Bearer test-secret');
    expect(reasoningRequest?.body).toMatchObject({
      model: 'deepseek-reasoner',
      stream: true,
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: '2+2?' },
      ],
    });
    expect(answerRequest?.url).toBe('https://openrouter.ai/api/v1/chat/completions');
    expect(answerRequest?.headers['X-Title']).toBe('Relay');
    expect(answerRequest?.body).toMatchObject({
      model: 'claude-test',
      max_tokens: 8192,
      temperature: 0.7,
      messages: [
        { role: 'user', content: '2+2?' },
        {
          role: 'assistant',
          content: "Here's my reasoning process:\n<think>4</think>\n\nBased on this reasoning, I will now provide my response:",
        },
      ],
    });
    // the reasoning stream is left at the first answer token and the answer stream at [DONE]
    expect(transport.stats.released).toBe(2);
  });

  it('times out a stalled reasoning provider with the error frame', async () => {
    const transport = createFakeTransport([{ chunks: [reasoningFrame('slow')], hang: true }]);
    const config = { ...buildConfig(), timeoutMs: 20 };
    const server = createReasoningRelayServer(config, { transport, logger: vi.fn<RelayServerLogger>(), now: () => NOW });

    const frames: string[] = [];
    for await (const frame of server.relay.streamChatCompletions([{ role: 'user', content: 'q' }])) {
      frames.push(frame);
    }

    expect(frames).toEqual([
      formatDataFrame(buildReasoningEnvelope(identity, 'deepseek-reasoner', 'slow')),
      'data: {"error": "Operation timeout"}\n\n',
      DONE_FRAME,
    ]);
    expect(transport.requests).toHaveLength(1);
  });

  it('applies the configured timeout to requests served by the handler', async () => {
    const transport = createFakeTransport([{ chunks: [reasoningFrame('slow')], hang: true }]);
    const config = { ...buildConfig(), timeoutMs: 20 };
    const server = createReasoningRelayServer(config, { transport, logger: vi.fn<RelayServerLogger>(), now: () => NOW });

    const response = await server.handler.POST(
      new Request('http://localhost/v1/chat/completions', {
        method: 'POST',
        body: JSON.stringify({ messages: [{ role: 'user', content: 'q' }] }),
      })
    );

    expect(await response.text()).toBe(
      formatDataFrame(buildReasoningEnvelope(identity, 'deepseek-reasoner', 'slow')) + TIMEOUT_ERROR_FRAME + DONE_FRAME
    );
  });

  it('sends no provider request once the deadline has already passed', async () => {
    const transport = createFakeTransport([{ chunks: [reasoningFrame('a'), contentFrame('b'), doneFrame()] }]);
    const config = { ...buildConfig(), timeoutMs: 0 };
    const server = createReasoningRelayServer(config, { transport, logger: vi.fn<RelayServerLogger>(), now: () => NOW });

    const frames: string[] = [];
    for await (const frame of server.relay.streamChatCompletions([{ role: 'user', content: 'q' }])) {
      frames.push(frame);
    }

    expect(frames).toEqual([TIMEOUT_ERROR_FRAME, DONE_FRAME]);
    expect(transport.requests).toHaveLength(0);
  });
});

describe('createAnswerClient', () => {
  const transport = createFakeTransport([{ chunks: [] }]);

  it('defaults to the chat-completions client', () => {
    expect(createAnswerClient(buildConfig().answer, transport).provider).toBe('answer');
  });

  it('builds SDK-backed clients for the openai and anthropic providers', () => {
    const openai = createAnswerClient(buildConfig({ provider: 'openai' }).answer, transport, {
      openAiClient: new OpenAI({ apiKey: 'test-secret' }),
    });
    const anthropic = createAnswerClient(buildConfig({ provider: 'anthropic' }).answer, transport, {
      anthropicClient: new Anthropic({ apiKey: 'test-secret' }),
    });

    expect(openai.provider).toBe('answer.openai');
    expect(anthropic.provider).toBe('answer.anthropic');
  });
});
