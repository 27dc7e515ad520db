import type { ProviderDelta } from '@reasoning-relay/chat-contract';

const encoder = new TextEncoder();

/** One provider SSE frame carrying `delta` in choices[0]. */
export function providerFrame(delta: ProviderDelta): string {
  const chunk = {
    id: 'chatcmpl-test',
    object: 'chat.completion.chunk',
    created: 1,
    model: 'test-model',
    choices: [{ index: 0, delta, finish_reason: null }],
  };
  return `data: ${JSON.stringify(chunk)}\n\n`;
}

export function reasoningFrame(text: string): string {
  return providerFrame({ role: 'assistant', content: null, reasoning_content: text });
}

export function contentFrame(text: string): string {
  return providerFrame({ role: 'assistant', content: text, reasoning_content: null });
}

export function doneFrame(): string {
  return 'data: [DONE]\n\n';
}
