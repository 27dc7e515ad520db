import { randomUUID } from 'node:crypto';
import { toStreamError, type RelayErrorCode } from '@reasoning-relay/chat-contract';
import { collectChatCompletion, type ReasoningRelay } from '@reasoning-relay/chat-orchestrator';
import { logRelayDebug, runWithRelayLogContext, type RelayServerLogger } from './server';
import { createChatSseStream, SSE_HEADERS } from './stream';
import { validateChatCompletionsBody } from './validation';

export type ChatCompletionsHandlerOptions = {
  relay: ReasoningRelay;
  /** Reported by non-streaming responses that carried no answer. */
  answerModel: string;
  logger?: RelayServerLogger;
};

export type ChatCompletionsHandler = {
  POST(request: Request): Promise<Response>;
};

function buildErrorResponse(code: RelayErrorCode, message: string, status: number): Response {
  return Response.json({ error: { code, message } }, { status });
}

export function createChatCompletionsHandler(options: ChatCompletionsHandlerOptions): ChatCompletionsHandler {
  const log = options.logger ?? logRelayDebug;

  return {
    async POST(request: Request): Promise<Response> {
      const correlationId = randomUUID();
      let body: unknown;
      try {
        body = await request.json();
      } catch {
        return buildErrorResponse('invalid_request', 'Request body must be valid JSON.', 400);
      }

      const validation = validateChatCompletionsBody(body);
      if (!validation.ok) {
        return buildErrorResponse('invalid_request', validation.error, validation.status);
      }
      const { messages, stream } = validation.value;

      return runWithRelayLogContext({ correlationId }, async () => {
        log('api.chat.request', { correlationId, messageCount: messages.length, stream });
        try {
          if (!stream) {
            const frames = options.relay.streamChatCompletions(messages, { signal: request.signal });
            const completion = await collectChatCompletion(frames, { model: options.answerModel });
            return Response.json(completion);
          }

          const sse = createChatSseStream(options.relay, messages, {
            signal: request.signal,
            onError: (error) => log('api.chat.stream_error', { correlationId, error: toStreamError(error) }),
          });
          return new Response(sse, { headers: SSE_HEADERS });
        } catch (error) {
          log('api.chat.error', { correlationId, error: toStreamError(error) });
          return buildErrorResponse('internal_error', 'Relay unavailable.', 500);
        }
      });
    },
  };
}
