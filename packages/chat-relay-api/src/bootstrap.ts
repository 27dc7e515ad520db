import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import {
  createAnthropicAnswerClient,
  createChatCompletionsAnswerClient,
  createFetchTransport,
  createOpenAiAnswerClient,
  createReasoningClient,
  type ChatTransport,
  type ProviderStreamClient,
} from '@reasoning-relay/chat-llm';
import { createReasoningRelay, type ReasoningRelay } from '@reasoning-relay/chat-orchestrator';
import { resolveAnswerApiUrl, type RelayConfig } from './config';
import { createChatCompletionsHandler, type ChatCompletionsHandler } from './handler';
import { createRelayServerLogger, type RelayServerLogger } from './server';

export type RelayServerDeps = {
  transport?: ChatTransport;
  logger?: RelayServerLogger;
  /** Prebuilt SDK clients; built from the config when omitted. */
  openAiClient?: OpenAI;
  anthropicClient?: Anthropic;
  now?: () => number;
};

export type RelayServer = {
  relay: ReasoningRelay;
  handler: ChatCompletionsHandler;
  reasoningClient: ProviderStreamClient;
  answerClient: ProviderStreamClient;
};

export function createAnswerClient(
  config: RelayConfig['answer'],
  transport: ChatTransport,
  deps: Pick<RelayServerDeps, 'openAiClient' | 'anthropicClient' | 'logger'> = {}
): ProviderStreamClient {
  const tuning = { maxTokens: config.maxTokens, temperature: config.temperature, logger: deps.logger };

  switch (config.provider) {
    case 'openai': {
      const client = deps.openAiClient ?? new OpenAI({ apiKey: config.apiKey, baseURL: config.apiUrl });
      const headers: Record<string, string> = {
        ...(config.referer ? { 'HTTP-Referer': config.referer } : {}),
        ...(config.title ? { 'X-Title': config.title } : {}),
      };
      return createOpenAiAnswerClient(client, { ...tuning, headers });
    }
    case 'anthropic': {
      const client = deps.anthropicClient ?? new Anthropic({ apiKey: config.apiKey, baseURL: config.apiUrl });
      return createAnthropicAnswerClient(client, tuning);
    }
    default:
      return createChatCompletionsAnswerClient({
        ...tuning,
        apiKey: config.apiKey,
        transport,
        apiUrl: resolveAnswerApiUrl(config),
        referer: config.referer,
        title: config.title,
      });
  }
}

export function createReasoningRelayServer(config: RelayConfig, deps: RelayServerDeps = {}): RelayServer {
  const logger = deps.logger ?? createRelayServerLogger();
  const transport = deps.transport ?? createFetchTransport({ logger });

  const reasoningClient = createReasoningClient({
    apiKey: config.reasoning.apiKey,
    transport,
    apiUrl: config.reasoning.apiUrl,
    channel: config.reasoning.channel,
    logger,
  });
  const answerClient = createAnswerClient(config.answer, transport, { ...deps, logger });

  const relay = createReasoningRelay({
    reasoningClient,
    answerClient,
    reasoningModel: config.reasoning.model,
    answerModel: config.answer.model,
    timeoutMs: config.timeoutMs,
    logger,
    now: deps.now,
  });

  const handler = createChatCompletionsHandler({ relay, answerModel: config.answer.model, logger });

  return { relay, handler, reasoningClient, answerClient };
}
