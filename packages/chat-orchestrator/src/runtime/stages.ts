import {
  buildAnswerEnvelope,
  buildReasoningEnvelope,
  formatDataFrame,
  toStreamError,
} from '@reasoning-relay/chat-contract';
import type { StageContext } from '../pipelineTypes';
import { iterateUntilAborted } from './abortable';
import { buildAnswerMessages } from './handoffMessages';

function releaseErrorLogger(context: StageContext) {
  return (error: unknown) =>
    context.logger?.('relay.stage.release_error', {
      requestId: context.requestId,
      model: context.model,
      error: toStreamError(error),
    });
}

/**
 * Streams reasoning frames to the output and hands the accumulated reasoning
 * to the answer stage on the first content event. The handoff always happens
 * once: with the text gathered so far when the stream ends without content,
 * and with an empty string when the stream fails.
 */
export async function runReasoningStage(context: StageContext): Promise<void> {
  const { requestId, identity, messages, client, model, output, handoff, signal, logger } = context;
  const reasoning: string[] = [];
  const startedAt = Date.now();

  const handOff = (text: string, reason: string) => {
    if (handoff.send(text)) {
      logger?.('relay.handoff', { requestId, reason, chunks: reasoning.length, chars: text.length });
    }
  };

  logger?.('relay.stage.start', { requestId, stage: 'reasoning', model, messageCount: messages.length });
  try {
    const events = client.streamChat(messages, model, { signal });
    for await (const event of iterateUntilAborted(events, signal, releaseErrorLogger(context))) {
      if (event.kind === 'reasoning') {
        reasoning.push(event.text);
        output.send({
          type: 'frame',
          stage: 'reasoning',
          frame: formatDataFrame(buildReasoningEnvelope(identity, model, event.text)),
        });
        continue;
      }
      if (event.kind === 'content') {
        if (reasoning.length === 0) {
          logger?.('relay.reasoning.empty', { requestId, model });
        }
        handOff(reasoning.join(''), 'content');
        break;
      }
    }
    handOff(reasoning.join(''), 'stream_end');
  } catch (error) {
    if (!signal.aborted) {
      logger?.('relay.stage.error', { requestId, stage: 'reasoning', model, error: toStreamError(error) });
    }
    handOff('', signal.aborted ? 'cancelled' : 'failure');
  } finally {
    logger?.('relay.stage.complete', {
      requestId,
      stage: 'reasoning',
      model,
      chunks: reasoning.length,
      durationMs: Date.now() - startedAt,
      cancelled: signal.aborted,
    });
    output.send({ type: 'complete', stage: 'reasoning' });
  }
}

/** Waits for the handoff, then streams answer frames. The answer client is called at most once. */
export async function runAnswerStage(context: StageContext): Promise<void> {
  const { requestId, identity, messages, client, model, output, handoff, signal, logger } = context;
  const startedAt = Date.now();
  let chunks = 0;

  try {
    const reasoning = await handoff.receive(signal);
    const forwarded = buildAnswerMessages(messages, reasoning);
    if (!reasoning) {
      logger?.('relay.answer.without_reasoning', { requestId, model });
    }
    logger?.('relay.stage.start', {
      requestId,
      stage: 'answer',
      model,
      messageCount: forwarded.length,
      reasoningChars: reasoning.length,
    });

    const events = client.streamChat(forwarded, model, { signal });
    for await (const event of iterateUntilAborted(events, signal, releaseErrorLogger(context))) {
      if (event.kind !== 'answer' || !event.text) {
        continue;
      }
      chunks += 1;
      output.send({
        type: 'frame',
        stage: 'answer',
        frame: formatDataFrame(buildAnswerEnvelope(identity, model, event.text)),
      });
    }
  } catch (error) {
    if (!signal.aborted) {
      logger?.('relay.stage.error', { requestId, stage: 'answer', model, error: toStreamError(error) });
    }
  } finally {
    logger?.('relay.stage.complete', {
      requestId,
      stage: 'answer',
      model,
      chunks,
      durationMs: Date.now() - startedAt,
      cancelled: signal.aborted,
    });
    output.send({ type: 'complete', stage: 'answer' });
  }
}
