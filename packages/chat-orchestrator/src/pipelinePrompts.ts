// Synthetic assistant turn that carries the reasoning into the answer request.
export const reasoningHandoffTemplate = `Here's my reasoning process:
{{REASONING}}

Based on this reasoning, I will now provide my response:`;

export function buildReasoningHandoffPrompt(reasoning: string): string {
  return reasoningHandoffTemplate.replace('{{REASONING}}', () => reasoning);
}
