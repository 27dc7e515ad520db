import { RelayError, type ChatRequestMessage } from '@reasoning-relay/chat-contract';
import { linkSignals, type ReasoningRelay } from '@reasoning-relay/chat-orchestrator';

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache, no-transform',
  Connection: 'keep-alive',
} as const;

type StreamOptions = {
  /** Usually the incoming request's signal. */
  signal?: AbortSignal;
  onError?: (error: unknown) => void;
};

/**
 * Encodes the relay's frames as a byte stream. Frames are pulled on demand,
 * and cancelling the stream cancels the relay request.
 */
export function createChatSseStream(
  relay: ReasoningRelay,
  messages: readonly ChatRequestMessage[],
  options: StreamOptions = {}
): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  const abortController = new AbortController();
  const linked = linkSignals(options.signal, abortController.signal);
  const frames = relay.streamChatCompletions(messages, { signal: linked.signal });

  let cancelled = false;

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      let next: IteratorResult<string, void>;
      try {
        next = await frames.next();
      } catch (error) {
        if (!cancelled) {
          options.onError?.(error);
          linked.dispose();
          controller.close();
        }
        return;
      }
      // a read still in flight when the client went away has nowhere to go
      if (cancelled) {
        return;
      }
      if (next.done) {
        linked.dispose();
        controller.close();
        return;
      }
      controller.enqueue(encoder.encode(next.value));
    },
    async cancel(reason) {
      cancelled = true;
      if (!abortController.signal.aborted) {
        abortController.abort(reason instanceof Error ? reason : new RelayError('cancelled', 'Client disconnected.'));
      }
      linked.dispose();
      await frames.return(undefined);
    },
  });
}
