import { createParser, type EventSourceParser, type ParseEvent } from 'eventsource-parser';
import { z } from 'zod';
import { DecodeError, STREAM_DONE_SENTINEL, type ProviderDelta, type SemanticEvent } from '@reasoning-relay/chat-contract';

export type ChunkDecodeResult = {
  events: SemanticEvent[];
  /** True once the provider's `[DONE]` sentinel has been seen. */
  done: boolean;
};

export type ChunkDecoder = {
  decode(chunk: Uint8Array | string): ChunkDecodeResult;
  /** Flushes a trailing partial line after the transport ends. */
  finish(): SemanticEvent[];
};

export type ChunkDecoderOptions = {
  onDecodeError?: (error: DecodeError) => void;
};

type SseLineReader = {
  push(chunk: Uint8Array | string): string[];
  flush(): string[];
};

const ProviderDeltaSchema = z.object({
  content: z.string().nullish(),
  reasoning_content: z.string().nullish(),
});

const ProviderStreamChunkSchema = z.object({
  choices: z.array(z.object({ delta: ProviderDeltaSchema.nullish() })).nullish(),
});

function createSseLineReader(): SseLineReader {
  const textDecoder = new TextDecoder();
  let pending: string[] = [];
  const parser: EventSourceParser = createParser((event: ParseEvent) => {
    if (event.type !== 'event') {
      return;
    }
    // Some providers pack several data lines into one event; each line is its own payload.
    for (const line of event.data.split('\n')) {
      const payload = line.trim();
      if (payload) {
        pending.push(payload);
      }
    }
  });

  const drain = () => {
    const lines = pending;
    pending = [];
    return lines;
  };

  return {
    push(chunk) {
      parser.feed(typeof chunk === 'string' ? chunk : textDecoder.decode(chunk, { stream: true }));
      return drain();
    },
    flush() {
      parser.feed(`${textDecoder.decode()}\n\n`);
      return drain();
    },
  };
}

/**
 * Reads `choices[0].delta` from one data payload. Returns null for payloads without a
 * delta and reports malformed JSON through `onDecodeError` instead of throwing.
 */
export function parseProviderDelta(line: string, onDecodeError?: (error: DecodeError) => void): ProviderDelta | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    onDecodeError?.(new DecodeError(line, error));
    return null;
  }
  const parsed = ProviderStreamChunkSchema.safeParse(raw);
  if (!parsed.success) {
    onDecodeError?.(new DecodeError(line, parsed.error));
    return null;
  }
  return parsed.data.choices?.[0]?.delta ?? null;
}

type FramedDecoderHandlers = ChunkDecoderOptions & {
  onDelta: (delta: ProviderDelta) => SemanticEvent[];
  onEnd: () => SemanticEvent[];
};

export function createFramedDecoder(handlers: FramedDecoderHandlers): ChunkDecoder {
  const reader = createSseLineReader();
  let done = false;

  const decodeLines = (lines: string[]): SemanticEvent[] => {
    const events: SemanticEvent[] = [];
    for (const line of lines) {
      if (line === STREAM_DONE_SENTINEL) {
        done = true;
        events.push(...handlers.onEnd());
        break;
      }
      const delta = parseProviderDelta(line, handlers.onDecodeError);
      if (delta) {
        events.push(...handlers.onDelta(delta));
      }
    }
    return events;
  };

  return {
    decode(chunk) {
      if (done) {
        return { events: [], done };
      }
      const events = decodeLines(reader.push(chunk));
      return { events, done };
    },
    finish() {
      if (done) {
        return [];
      }
      const events = decodeLines(reader.flush());
      if (!done) {
        done = true;
        events.push(...handlers.onEnd());
      }
      return events;
    },
  };
}
