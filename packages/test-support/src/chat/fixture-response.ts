const encoder = new TextEncoder();

export type ProviderFixtureResponseOptions = {
  frames?: readonly string[];
  status?: number;
  /** Plain body for error responses. */
  body?: string;
  headers?: HeadersInit;
};

/** A fetch Response shaped like a streaming chat-completions reply. */
export function buildProviderFixtureResponse({
  frames = [],
  status = 200,
  body,
  headers = {},
}: ProviderFixtureResponseOptions = {}): Response {
  if (body !== undefined) {
    return new Response(body, { status, headers: { 'Content-Type': 'application/json', ...headers } });
  }

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const frame of frames) {
        controller.enqueue(encoder.encode(frame));
      }
      controller.close();
    },
  });

  return new Response(stream, {
    status,
    headers: { 'Content-Type': 'text/event-stream', ...headers },
  });
}
