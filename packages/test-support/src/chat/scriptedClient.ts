import type { ChatRequestMessage, SemanticEvent } from '@reasoning-relay/chat-contract';
import type { ProviderStreamClient, StreamChatOptions } from '@reasoning-relay/chat-llm';

export type ScriptStep =
  | SemanticEvent
  | { kind: 'error'; error: unknown }
  /** Blocks until the call's signal aborts, then throws its reason. */
  | { kind: 'hang' }
  /** Blocks forever and ignores the signal. */
  | { kind: 'stall' }
  | { kind: 'delay'; ms: number };

export type ScriptedCall = {
  messages: ChatRequestMessage[];
  model: string;
  signal?: AbortSignal;
};

export type ScriptedClient = ProviderStreamClient & {
  readonly calls: ScriptedCall[];
  /** Calls whose generator was left before the script ran out. */
  readonly stats: { released: number };
};

export function reasoning(text: string): SemanticEvent {
  return { kind: 'reasoning', text };
}

export function content(text: string): SemanticEvent {
  return { kind: 'content', text };
}

export function answer(text: string): SemanticEvent {
  return { kind: 'answer', text };
}

function waitForAbort(signal: AbortSignal | undefined): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (!signal) {
      return;
    }
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

/** A provider client that replays `steps` on every call and records what it was asked. */
export function createScriptedClient(steps: readonly ScriptStep[], provider = 'scripted'): ScriptedClient {
  const calls: ScriptedCall[] = [];
  const stats = { released: 0 };

  return {
    provider,
    calls,
    stats,
    async *streamChat(
      messages: readonly ChatRequestMessage[],
      model: string,
      options: StreamChatOptions = {}
    ): AsyncGenerator<SemanticEvent> {
      calls.push({ messages: [...messages], model, signal: options.signal });
      let finished = false;
      try {
        for (const step of steps) {
          switch (step.kind) {
            case 'error':
              finished = true;
              throw step.error;
            case 'hang':
              await waitForAbort(options.signal);
              break;
            case 'stall':
              await new Promise<never>(() => undefined);
              break;
            case 'delay':
              await new Promise((resolve) => setTimeout(resolve, step.ms));
              break;
            default:
              yield step;
          }
        }
        finished = true;
      } finally {
        if (!finished) {
          stats.released += 1;
        }
      }
    },
  };
}
