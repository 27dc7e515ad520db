import { z } from 'zod';
export * from './errors';

export const CHAT_ROLE_VALUES = ['system', 'user', 'assistant'] as const;

export type ChatRole = (typeof CHAT_ROLE_VALUES)[number];

export type ChatRequestMessage = {
  readonly role: ChatRole;
  readonly content: string;
};

export const ChatRequestMessageSchema = z.object({
  role: z.enum(CHAT_ROLE_VALUES),
  content: z.string(),
});

// Semantic events produced by the provider decoders

export type SemanticEventKind = 'reasoning' | 'content' | 'answer';

export type SemanticEvent = {
  kind: SemanticEventKind;
  text: string;
};

export type ReasoningEvent = SemanticEvent & { kind: 'reasoning' | 'content' };

// Provider-facing frames (`data: {json}` with a choices[0].delta object)

export type ProviderDelta = {
  role?: string;
  content?: string | null;
  reasoning_content?: string | null;
};

export type ChatCompletionsRequestBody = {
  model: string;
  messages: ChatRequestMessage[];
  stream: true;
  max_tokens?: number;
  temperature?: number;
};

// Outgoing wire envelope

export type EnvelopeDelta = {
  role: 'assistant';
  content: string;
  reasoningContent?: string;
};

export type OutputEnvelope = {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    delta: EnvelopeDelta;
  }>;
};

export type ChatCompletionFinishReason = 'stop' | 'timeout';

export type ChatCompletion = {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    message: {
      role: 'assistant';
      content: string;
      reasoningContent: string;
    };
    finish_reason: ChatCompletionFinishReason;
  }>;
};

export const STREAM_DONE_SENTINEL = '[DONE]';
export const SSE_DATA_PREFIX = 'data: ';
export const DONE_FRAME = `${SSE_DATA_PREFIX}${STREAM_DONE_SENTINEL}\n\n`;
export const TIMEOUT_ERROR_MESSAGE = 'Operation timeout';
export const TIMEOUT_ERROR_FRAME = `${SSE_DATA_PREFIX}{"error": "${TIMEOUT_ERROR_MESSAGE}"}\n\n`;

export const THINK_OPEN_MARKER = '<think>';
export const THINK_CLOSE_MARKER = '</think>';

export type EnvelopeIdentity = {
  id: string;
  created: number;
};

export function createEnvelopeIdentity(nowMs: number = Date.now()): EnvelopeIdentity {
  return {
    id: `chatcmpl-${Math.floor(nowMs).toString(16)}`,
    created: Math.floor(nowMs / 1000),
  };
}

export function buildReasoningEnvelope(identity: EnvelopeIdentity, model: string, text: string): OutputEnvelope {
  return {
    id: identity.id,
    object: 'chat.completion.chunk',
    created: identity.created,
    model,
    // content duplicates the reasoning so consumers that only read content still see it
    choices: [{ index: 0, delta: { role: 'assistant', content: text, reasoningContent: text } }],
  };
}

export function buildAnswerEnvelope(identity: EnvelopeIdentity, model: string, text: string): OutputEnvelope {
  return {
    id: identity.id,
    object: 'chat.completion.chunk',
    created: identity.created,
    model,
    choices: [{ index: 0, delta: { role: 'assistant', content: text } }],
  };
}

export function formatDataFrame(payload: unknown): string {
  return `${SSE_DATA_PREFIX}${JSON.stringify(payload)}\n\n`;
}

const EnvelopeSchema = z.object({
  id: z.string(),
  object: z.literal('chat.completion.chunk'),
  created: z.number(),
  model: z.string(),
  choices: z
    .array(
      z.object({
        index: z.number(),
        delta: z.object({
          role: z.literal('assistant'),
          content: z.string(),
          reasoningContent: z.string().optional(),
        }),
      })
    )
    .min(1),
});

export type ParsedFrame =
  | { type: 'envelope'; envelope: OutputEnvelope }
  | { type: 'error'; message: string }
  | { type: 'done' }
  | { type: 'unknown'; raw: string };

/**
 * Parses one outgoing frame back into its structured form. Used by the
 * non-streaming collector and by consumers of the relay stream.
 */
export function parseOutputFrame(frame: string): ParsedFrame {
  const raw = frame.startsWith(SSE_DATA_PREFIX) ? frame.slice(SSE_DATA_PREFIX.length).trim() : frame.trim();
  if (raw === STREAM_DONE_SENTINEL) {
    return { type: 'done' };
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { type: 'unknown', raw };
  }
  const envelope = EnvelopeSchema.safeParse(parsed);
  if (envelope.success) {
    return { type: 'envelope', envelope: envelope.data };
  }
  const error = z.object({ error: z.string() }).safeParse(parsed);
  if (error.success) {
    return { type: 'error', message: error.data.error };
  }
  return { type: 'unknown', raw };
}
