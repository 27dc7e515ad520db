import type { SemanticEvent } from '@reasoning-relay/chat-contract';
import { createFramedDecoder, type ChunkDecoder, type ChunkDecoderOptions } from './framing';

export function createAnswerChunkDecoder(options: ChunkDecoderOptions = {}): ChunkDecoder {
  return createFramedDecoder({
    onDecodeError: options.onDecodeError,
    onDelta(delta): SemanticEvent[] {
      if (typeof delta.content !== 'string') {
        return [];
      }
      return [{ kind: 'answer', text: delta.content }];
    },
    onEnd: () => [],
  });
}
