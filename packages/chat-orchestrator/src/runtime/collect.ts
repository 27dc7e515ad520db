import {
  createEnvelopeIdentity,
  parseOutputFrame,
  type ChatCompletion,
  type ChatCompletionFinishReason,
} from '@reasoning-relay/chat-contract';

export type CollectFallback = {
  /** Reported when the stream carried no answer frame. */
  model: string;
  nowMs?: number;
};

/** Folds a relay frame stream into a single non-streaming completion. */
export async function collectChatCompletion(
  frames: AsyncIterable<string>,
  fallback: CollectFallback
): Promise<ChatCompletion> {
  let identity: { id: string; created: number } | null = null;
  let model = fallback.model;
  let content = '';
  let reasoningContent = '';
  let finishReason: ChatCompletionFinishReason = 'stop';

  for await (const frame of frames) {
    const parsed = parseOutputFrame(frame);
    if (parsed.type === 'error') {
      finishReason = 'timeout';
      continue;
    }
    if (parsed.type !== 'envelope') {
      continue;
    }
    const { envelope } = parsed;
    identity ??= { id: envelope.id, created: envelope.created };
    const delta = envelope.choices[0]?.delta;
    if (!delta) {
      continue;
    }
    if (delta.reasoningContent !== undefined) {
      reasoningContent += delta.reasoningContent;
    } else {
      content += delta.content;
      model = envelope.model;
    }
  }

  const { id, created } = identity ?? createEnvelopeIdentity(fallback.nowMs);
  return {
    id,
    object: 'chat.completion',
    created,
    model,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content, reasoningContent },
        finish_reason: finishReason,
      },
    ],
  };
}
