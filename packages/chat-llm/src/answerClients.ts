import type OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type Anthropic from '@anthropic-ai/sdk';
import { toStreamError, type ChatRequestMessage, type SemanticEvent } from '@reasoning-relay/chat-contract';
import { createAnswerChunkDecoder } from './decoders/answerDecoder';
import { createProviderStreamClient } from './providerClient';
import type { ChatTransport } from './transport';
import type { LlmLogger, ProviderStreamClient, StreamChatOptions } from './types';

export const DEFAULT_ANSWER_API_URL = 'https://openrouter.ai/api/v1/chat/completions';
export const DEFAULT_ANSWER_MODEL = 'anthropic/claude-3.5-sonnet';
export const DEFAULT_ANSWER_MAX_TOKENS = 8192;
export const DEFAULT_ANSWER_TEMPERATURE = 0.7;

type AnswerTuning = {
  maxTokens?: number;
  temperature?: number;
  logger?: LlmLogger;
};

export type ChatCompletionsAnswerClientOptions = AnswerTuning & {
  apiKey: string;
  transport: ChatTransport;
  apiUrl?: string;
  /** Attribution headers understood by OpenRouter-style gateways. */
  referer?: string;
  title?: string;
};

export function createChatCompletionsAnswerClient(options: ChatCompletionsAnswerClientOptions): ProviderStreamClient {
  return createProviderStreamClient({
    provider: 'answer',
    transport: options.transport,
    url: options.apiUrl ?? DEFAULT_ANSWER_API_URL,
    apiKey: options.apiKey,
    headers: {
      ...(options.referer ? { 'HTTP-Referer': options.referer } : {}),
      ...(options.title ? { 'X-Title': options.title } : {}),
    },
    maxTokens: options.maxTokens ?? DEFAULT_ANSWER_MAX_TOKENS,
    temperature: options.temperature ?? DEFAULT_ANSWER_TEMPERATURE,
    logger: options.logger,
    createDecoder: ({ onDecodeError }) => createAnswerChunkDecoder({ onDecodeError }),
  });
}

export function toOpenAiMessage(message: ChatRequestMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    default:
      return { role: 'assistant', content: message.content };
  }
}

export type OpenAiAnswerClientOptions = AnswerTuning & {
  headers?: Record<string, string>;
};

export function createOpenAiAnswerClient(client: OpenAI, options: OpenAiAnswerClientOptions = {}): ProviderStreamClient {
  const provider = 'answer.openai';
  const logger = options.logger;

  return {
    provider,
    async *streamChat(
      messages: readonly ChatRequestMessage[],
      model: string,
      streamOptions: StreamChatOptions = {}
    ): AsyncGenerator<SemanticEvent> {
      const { signal } = streamOptions;
      logger?.('llm.request', { provider, model, messageCount: messages.length, streaming: true });
      try {
        const stream = await client.chat.completions.create(
          {
            model,
            messages: messages.map(toOpenAiMessage),
            stream: true,
            max_tokens: options.maxTokens ?? DEFAULT_ANSWER_MAX_TOKENS,
            temperature: options.temperature ?? DEFAULT_ANSWER_TEMPERATURE,
          },
          { signal, headers: options.headers }
        );
        for await (const chunk of stream) {
          const content = chunk.choices[0]?.delta?.content;
          if (typeof content === 'string') {
            yield { kind: 'answer', text: content };
          }
        }
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        logger?.('llm.stream_error', { provider, model, error: toStreamError(error) });
      }
    },
  };
}

export function clampAnthropicMaxTokens(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return DEFAULT_ANSWER_MAX_TOKENS;
  }
  return Math.max(1, Math.min(DEFAULT_ANSWER_MAX_TOKENS, Math.floor(value)));
}

export type AnthropicConversation = {
  system: string;
  conversation: Array<{ role: 'user' | 'assistant'; content: string }>;
};

/** Anthropic takes system text as a separate field rather than as turns. */
export function splitAnthropicMessages(messages: readonly ChatRequestMessage[]): AnthropicConversation {
  const system = messages
    .filter((message) => message.role === 'system')
    .map((message) => message.content)
    .join('\n\n');
  const conversation = messages
    .filter((message) => message.role !== 'system')
    .map((message) => ({
      role: message.role === 'assistant' ? ('assistant' as const) : ('user' as const),
      content: message.content,
    }));
  return { system, conversation };
}

export function createAnthropicAnswerClient(client: Anthropic, options: AnswerTuning = {}): ProviderStreamClient {
  const provider = 'answer.anthropic';
  const logger = options.logger;

  return {
    provider,
    async *streamChat(
      messages: readonly ChatRequestMessage[],
      model: string,
      streamOptions: StreamChatOptions = {}
    ): AsyncGenerator<SemanticEvent> {
      const { signal } = streamOptions;
      const { system, conversation } = splitAnthropicMessages(messages);

      logger?.('llm.request', { provider, model, messageCount: conversation.length, streaming: true });
      try {
        const stream = client.messages.stream(
          {
            model,
            max_tokens: clampAnthropicMaxTokens(options.maxTokens),
            temperature: options.temperature ?? DEFAULT_ANSWER_TEMPERATURE,
            messages: conversation,
            ...(system ? { system } : {}),
          },
          signal ? { signal } : undefined
        );
        for await (const event of stream) {
          if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
            yield { kind: 'answer', text: event.delta.text };
          }
        }
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        logger?.('llm.stream_error', { provider, model, error: toStreamError(error) });
      }
    },
  };
}
