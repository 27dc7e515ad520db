import type { ChatRequestMessage, SemanticEvent } from '@reasoning-relay/chat-contract';

export type LlmLogger = (event: string, payload: Record<string, unknown>) => void;

export type StreamChatOptions = {
  signal?: AbortSignal;
};

/**
 * A provider stream ends early instead of throwing when the provider fails.
 * Only an abort of `options.signal` escapes as an exception.
 */
export type ProviderStreamClient = {
  provider: string;
  streamChat(
    messages: readonly ChatRequestMessage[],
    model: string,
    options?: StreamChatOptions
  ): AsyncIterable<SemanticEvent>;
};
