import type { ChatRequestMessage, EnvelopeIdentity } from '@reasoning-relay/chat-contract';
import type { ProviderStreamClient } from '@reasoning-relay/chat-llm';
import type { Channel, Handoff } from './runtime/channel';

export type RelayLogger = (event: string, payload: Record<string, unknown>) => void;

export type StageName = 'reasoning' | 'answer';

export type RelayPhase = 'init' | 'running' | 'draining' | 'done' | 'timeout' | 'cancelled' | 'failed';

export type RelayItem =
  | { type: 'frame'; stage: StageName; frame: string }
  | { type: 'complete'; stage: StageName };

export type ReasoningRelayOptions = {
  reasoningClient: ProviderStreamClient;
  answerClient: ProviderStreamClient;
  reasoningModel: string;
  answerModel: string;
  /** Whole-request budget. Defaults to five minutes. */
  timeoutMs?: number;
  logger?: RelayLogger;
  now?: () => number;
};

export type RelayRequestOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

export type ReasoningRelay = {
  streamChatCompletions(
    messages: readonly ChatRequestMessage[],
    options?: RelayRequestOptions
  ): AsyncGenerator<string, void, undefined>;
};

export type StageContext = {
  requestId: string;
  identity: EnvelopeIdentity;
  messages: readonly ChatRequestMessage[];
  client: ProviderStreamClient;
  model: string;
  output: Channel<RelayItem>;
  handoff: Handoff<string>;
  signal: AbortSignal;
  logger?: RelayLogger;
};
