import { z } from 'zod';
import { ChatRequestMessageSchema } from '@reasoning-relay/chat-contract';

/**
 * Other chat-completions fields (`model`, `temperature`, ...) are accepted and
 * dropped: the relay answers with the models it was configured with.
 */
export const ChatCompletionsBodySchema = z.object({
  messages: z.array(ChatRequestMessageSchema).min(1, 'No messages provided.'),
  stream: z.boolean().default(true),
});

export type ChatCompletionsBody = z.infer<typeof ChatCompletionsBodySchema>;

type ValidationError = { ok: false; error: string; status: number };
type ValidationSuccess = { ok: true; value: ChatCompletionsBody };

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

export function validateChatCompletionsBody(body: unknown): ValidationError | ValidationSuccess {
  const parsed = ChatCompletionsBodySchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, error: formatIssues(parsed.error), status: 400 };
  }
  return { ok: true, value: parsed.data };
}
