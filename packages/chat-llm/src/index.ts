export type { LlmLogger, ProviderStreamClient, StreamChatOptions } from './types';
export { createFetchTransport, type ChatTransport, type FetchTransportOptions, type TransportRequest } from './transport';
export {
  createFramedDecoder,
  parseProviderDelta,
  type ChunkDecoder,
  type ChunkDecodeResult,
  type ChunkDecoderOptions,
} from './decoders/framing';
export { createAnswerChunkDecoder } from './decoders/answerDecoder';
export {
  createReasoningChunkDecoder,
  resolveReasoningChannel,
  type ReasoningChannel,
  type ReasoningChunkDecoderOptions,
} from './decoders/reasoningDecoder';
export { createThinkMarkerTracker, partialMarkerLength, type ThinkMarkers, type ThinkMarkerTracker } from './decoders/thinkMarker';
export { createProviderStreamClient, type DecoderContext, type ProviderStreamClientOptions } from './providerClient';
export {
  createReasoningClient,
  DEFAULT_REASONING_API_URL,
  DEFAULT_REASONING_MODEL,
  type ReasoningClientOptions,
} from './reasoningClient';
export {
  clampAnthropicMaxTokens,
  createAnthropicAnswerClient,
  createChatCompletionsAnswerClient,
  createOpenAiAnswerClient,
  DEFAULT_ANSWER_API_URL,
  DEFAULT_ANSWER_MAX_TOKENS,
  DEFAULT_ANSWER_MODEL,
  DEFAULT_ANSWER_TEMPERATURE,
  splitAnthropicMessages,
  toOpenAiMessage,
  type AnthropicConversation,
  type ChatCompletionsAnswerClientOptions,
  type OpenAiAnswerClientOptions,
} from './answerClients';
