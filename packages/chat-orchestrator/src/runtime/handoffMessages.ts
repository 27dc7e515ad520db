import type { ChatRequestMessage } from '@reasoning-relay/chat-contract';
import { buildReasoningHandoffPrompt } from '../pipelinePrompts';

export function stripSystemMessages(messages: readonly ChatRequestMessage[]): ChatRequestMessage[] {
  return messages.filter((message) => message.role !== 'system');
}

/**
 * Messages sent to the answer provider: the caller's conversation without
 * system turns, plus one assistant turn holding the reasoning when there is any.
 */
export function buildAnswerMessages(messages: readonly ChatRequestMessage[], reasoning: string): ChatRequestMessage[] {
  const conversation = stripSystemMessages(messages);
  if (!reasoning) {
    return conversation;
  }
  return [...conversation, { role: 'assistant', content: buildReasoningHandoffPrompt(reasoning) }];
}
