import {
  RelayError,
  toStreamError,
  type ChatCompletionsRequestBody,
  type ChatRequestMessage,
  type DecodeError,
  type SemanticEvent,
} from '@reasoning-relay/chat-contract';
import type { ChunkDecoder } from './decoders/framing';
import type { ChatTransport } from './transport';
import type { LlmLogger, ProviderStreamClient, StreamChatOptions } from './types';

export type DecoderContext = {
  model: string;
  onDecodeError: (error: DecodeError) => void;
};

export type ProviderStreamClientOptions = {
  provider: string;
  transport: ChatTransport;
  url: string;
  apiKey: string;
  createDecoder: (context: DecoderContext) => ChunkDecoder;
  headers?: Record<string, string>;
  maxTokens?: number;
  temperature?: number;
  logger?: LlmLogger;
};

function buildRequestBody(
  messages: readonly ChatRequestMessage[],
  model: string,
  options: Pick<ProviderStreamClientOptions, 'maxTokens' | 'temperature'>
): ChatCompletionsRequestBody {
  return {
    model,
    messages: messages.map((message) => ({ role: message.role, content: message.content })),
    stream: true,
    ...(typeof options.maxTokens === 'number' && Number.isFinite(options.maxTokens) && options.maxTokens > 0
      ? { max_tokens: Math.floor(options.maxTokens) }
      : {}),
    ...(typeof options.temperature === 'number' && Number.isFinite(options.temperature)
      ? { temperature: options.temperature }
      : {}),
  };
}

export function createProviderStreamClient(options: ProviderStreamClientOptions): ProviderStreamClient {
  const apiKey = options.apiKey.trim();
  if (!apiKey) {
    throw new RelayError('invalid_config', `Missing API key for the ${options.provider} provider.`);
  }
  const { provider, transport, url, logger } = options;

  return {
    provider,
    async *streamChat(
      messages: readonly ChatRequestMessage[],
      model: string,
      streamOptions: StreamChatOptions = {}
    ): AsyncGenerator<SemanticEvent> {
      const { signal } = streamOptions;
      const decoder = options.createDecoder({
        model,
        onDecodeError: (error) => logger?.('llm.decode_error', { provider, model, line: error.line }),
      });
      const startedAt = Date.now();
      let eventCount = 0;

      logger?.('llm.request', { provider, model, messageCount: messages.length, streaming: true });

      try {
        const chunks = transport({
          url,
          headers: {
            Authorization: `Bearer ${apiKey}`,
            'Content-Type': 'application/json',
            ...(options.headers ?? {}),
          },
          body: buildRequestBody(messages, model, options),
          signal,
        });

        for await (const chunk of chunks) {
          const { events, done } = decoder.decode(chunk);
          for (const event of events) {
            eventCount += 1;
            yield event;
          }
          if (done) {
            logger?.('llm.stream_complete', { provider, model, eventCount, durationMs: Date.now() - startedAt });
            return;
          }
        }

        for (const event of decoder.finish()) {
          eventCount += 1;
          yield event;
        }
        logger?.('llm.stream_complete', { provider, model, eventCount, durationMs: Date.now() - startedAt, sentinel: false });
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        logger?.('llm.stream_error', {
          provider,
          model,
          eventCount,
          durationMs: Date.now() - startedAt,
          error: toStreamError(error),
        });
      }
    },
  };
}
