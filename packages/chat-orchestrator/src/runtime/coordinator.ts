import {
  createEnvelopeIdentity,
  DONE_FRAME,
  RelayError,
  TIMEOUT_ERROR_FRAME,
  toStreamError,
  type ChatRequestMessage,
} from '@reasoning-relay/chat-contract';
import type {
  ReasoningRelay,
  ReasoningRelayOptions,
  RelayItem,
  RelayPhase,
  RelayRequestOptions,
  StageContext,
  StageName,
} from '../pipelineTypes';
import { linkSignals } from './abortable';
import { createChannel, createHandoff } from './channel';
import { createDeadline } from './deadline';
import { runAnswerStage, runReasoningStage } from './stages';

export const DEFAULT_RELAY_TIMEOUT_MS = 300_000;

const STAGE_COUNT = 2;

function snapshotMessages(messages: readonly ChatRequestMessage[]): readonly ChatRequestMessage[] {
  return Object.freeze(messages.map((message) => Object.freeze({ role: message.role, content: message.content })));
}

export function createReasoningRelay(options: ReasoningRelayOptions): ReasoningRelay {
  const { reasoningClient, answerClient, reasoningModel, answerModel, logger } = options;
  const now = options.now ?? Date.now;

  return {
    async *streamChatCompletions(
      messages: readonly ChatRequestMessage[],
      requestOptions: RelayRequestOptions = {}
    ): AsyncGenerator<string, void, undefined> {
      const startedAt = now();
      const identity = createEnvelopeIdentity(startedAt);
      const requestId = identity.id;
      const input = snapshotMessages(messages);
      const timeoutMs = requestOptions.timeoutMs ?? options.timeoutMs ?? DEFAULT_RELAY_TIMEOUT_MS;
      const callerSignal = requestOptions.signal;

      let phase: RelayPhase = 'init';
      const setPhase = (next: RelayPhase) => {
        logger?.('relay.phase', { requestId, from: phase, to: next });
        phase = next;
      };

      const output = createChannel<RelayItem>();
      const handoff = createHandoff<string>();
      const controllers: Record<StageName, AbortController> = {
        reasoning: new AbortController(),
        answer: new AbortController(),
      };
      const cancelStages = (reason: unknown) => {
        for (const controller of Object.values(controllers)) {
          if (!controller.signal.aborted) {
            controller.abort(reason);
          }
        }
      };

      const deadline = createDeadline(timeoutMs);
      const wait = linkSignals(deadline.signal, callerSignal);

      logger?.('relay.request', {
        requestId,
        reasoningModel,
        answerModel,
        messageCount: input.length,
        timeoutMs,
      });

      const shared = { requestId, identity, messages: input, output, handoff, logger };
      const reasoningContext: StageContext = {
        ...shared,
        client: reasoningClient,
        model: reasoningModel,
        signal: controllers.reasoning.signal,
      };
      const answerContext: StageContext = {
        ...shared,
        client: answerClient,
        model: answerModel,
        signal: controllers.answer.signal,
      };

      // a request that is already over never reaches a provider
      const launch = !wait.signal.aborted;
      if (launch) {
        setPhase('running');
      }
      const stages = launch ? [runReasoningStage(reasoningContext), runAnswerStage(answerContext)] : [];
      let completed = 0;
      let frames = 0;

      try {
        setPhase('draining');
        while (completed < STAGE_COUNT) {
          const item = await output.receive(wait.signal);
          if (item.type === 'complete') {
            completed += 1;
            continue;
          }
          frames += 1;
          yield item.frame;
        }
        setPhase('done');
        yield DONE_FRAME;
      } catch (error) {
        if (deadline.expired) {
          setPhase('timeout');
          logger?.('relay.timeout', { requestId, timeoutMs, completedStages: completed, frames });
          cancelStages(deadline.signal.reason);
          output.close();
          yield TIMEOUT_ERROR_FRAME;
          yield DONE_FRAME;
        } else if (callerSignal?.aborted) {
          setPhase('cancelled');
          logger?.('relay.cancelled', { requestId, completedStages: completed, frames });
        } else {
          setPhase('failed');
          logger?.('relay.error', { requestId, error: toStreamError(error) });
          yield DONE_FRAME;
        }
      } finally {
        deadline.clear();
        wait.dispose();
        cancelStages(new RelayError('cancelled', 'The relay request ended before the stage finished.'));
        output.close();
        await Promise.allSettled(stages);
        logger?.('relay.request.complete', { requestId, phase, frames, durationMs: now() - startedAt });
      }
    },
  };
}
