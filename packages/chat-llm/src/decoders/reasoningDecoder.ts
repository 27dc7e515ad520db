import type { SemanticEvent } from '@reasoning-relay/chat-contract';
import { createFramedDecoder, type ChunkDecoder, type ChunkDecoderOptions } from './framing';
import { createThinkMarkerTracker, type ThinkMarkers } from './thinkMarker';

/**
 * `field`: the provider streams reasoning on a separate `reasoning_content` channel.
 * `marker`: everything arrives as content and reasoning is bracketed by think markers.
 */
export type ReasoningChannel = 'field' | 'marker';

export type ReasoningChunkDecoderOptions = ChunkDecoderOptions & {
  channel: ReasoningChannel;
  markers?: ThinkMarkers;
};

const FIELD_CHANNEL_MODEL_PATTERN = /(^|\/)deepseek-reasoner$/i;

export function resolveReasoningChannel(model: string): ReasoningChannel {
  return FIELD_CHANNEL_MODEL_PATTERN.test(model.trim()) ? 'field' : 'marker';
}

export function createReasoningChunkDecoder(options: ReasoningChunkDecoderOptions): ChunkDecoder {
  const tracker = createThinkMarkerTracker(options.markers);
  let contentEmitted = false;

  const track = (events: SemanticEvent[]): SemanticEvent[] => {
    if (events.some((event) => event.kind === 'content')) {
      contentEmitted = true;
    }
    return events;
  };

  return createFramedDecoder({
    onDecodeError: options.onDecodeError,
    onDelta(delta) {
      const reasoning = delta.reasoning_content;
      if (typeof reasoning === 'string' && reasoning.length > 0) {
        return [{ kind: 'reasoning', text: reasoning }];
      }
      const content = delta.content;
      if (typeof content !== 'string' || content.length === 0) {
        return [];
      }
      if (options.channel === 'field') {
        // Content only marks the end of reasoning once the reasoning channel is gone.
        return reasoning === null || reasoning === undefined ? track([{ kind: 'content', text: content }]) : [];
      }
      return track(tracker.classify(content));
    },
    onEnd() {
      const flushed = track(tracker.flush());
      // Lets the coordinator hand off even when reasoning never produced an answer trigger.
      return contentEmitted ? flushed : [{ kind: 'content', text: '' }];
    },
  });
}
