export type {
  ReasoningRelay,
  ReasoningRelayOptions,
  RelayItem,
  RelayLogger,
  RelayPhase,
  RelayRequestOptions,
  StageContext,
  StageName,
} from './pipelineTypes';
export { buildReasoningHandoffPrompt, reasoningHandoffTemplate } from './pipelinePrompts';
export { createReasoningRelay, DEFAULT_RELAY_TIMEOUT_MS } from './runtime/coordinator';
export { runAnswerStage, runReasoningStage } from './runtime/stages';
export { abortReason, createChannel, createHandoff, type Channel, type Handoff } from './runtime/channel';
export { createDeadline, MAX_TIMER_DELAY_MS, type Deadline } from './runtime/deadline';
export { iterateUntilAborted, linkSignals, raceAbort, type LinkedSignal } from './runtime/abortable';
export { buildAnswerMessages, stripSystemMessages } from './runtime/handoffMessages';
export { collectChatCompletion, type CollectFallback } from './runtime/collect';
