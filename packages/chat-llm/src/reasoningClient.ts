import { createReasoningChunkDecoder, resolveReasoningChannel, type ReasoningChannel } from './decoders/reasoningDecoder';
import type { ThinkMarkers } from './decoders/thinkMarker';
import { createProviderStreamClient } from './providerClient';
import type { ChatTransport } from './transport';
import type { LlmLogger, ProviderStreamClient } from './types';

export const DEFAULT_REASONING_API_URL = 'https://api.deepseek.com/v1/chat/completions';
export const DEFAULT_REASONING_MODEL = 'deepseek-reasoner';

export type ReasoningClientOptions = {
  apiKey: string;
  transport: ChatTransport;
  apiUrl?: string;
  /** Forces a channel mode; otherwise picked from the model name per request. */
  channel?: ReasoningChannel;
  markers?: ThinkMarkers;
  logger?: LlmLogger;
};

export function createReasoningClient(options: ReasoningClientOptions): ProviderStreamClient {
  return createProviderStreamClient({
    provider: 'reasoning',
    transport: options.transport,
    url: options.apiUrl ?? DEFAULT_REASONING_API_URL,
    apiKey: options.apiKey,
    headers: { Accept: 'text/event-stream' },
    logger: options.logger,
    createDecoder: ({ model, onDecodeError }) =>
      createReasoningChunkDecoder({
        channel: options.channel ?? resolveReasoningChannel(model),
        markers: options.markers,
        onDecodeError,
      }),
  });
}
