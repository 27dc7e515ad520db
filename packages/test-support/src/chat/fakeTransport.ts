import type { ChatTransport, TransportRequest } from '@reasoning-relay/chat-llm';

const encoder = new TextEncoder();

export type FakeTransportScript = {
  chunks?: ReadonlyArray<string | Uint8Array>;
  /** Thrown after the chunks are delivered. */
  error?: unknown;
  /** Block after the chunks until the request signal aborts. */
  hang?: boolean;
};

export type FakeTransport = ChatTransport & {
  readonly requests: TransportRequest[];
  /** Counts streams whose consumer stopped before the script ran out. */
  readonly stats: { released: number };
};

function waitForAbort(signal: AbortSignal | undefined): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (!signal) {
      return;
    }
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

/**
 * In-process stand-in for the HTTP transport. Each call consumes the next
 * script; the last script is reused once the list runs out.
 */
export function createFakeTransport(scripts: readonly FakeTransportScript[]): FakeTransport {
  const requests: TransportRequest[] = [];
  const stats = { released: 0 };

  async function* stream(request: TransportRequest): AsyncGenerator<Uint8Array> {
    const script = scripts[Math.min(requests.length, scripts.length - 1)] ?? {};
    requests.push(request);
    let finished = false;
    try {
      for (const chunk of script.chunks ?? []) {
        yield typeof chunk === 'string' ? encoder.encode(chunk) : chunk;
      }
      if (script.error !== undefined) {
        finished = true;
        throw script.error;
      }
      if (script.hang) {
        await waitForAbort(request.signal);
      }
      finished = true;
    } finally {
      if (!finished) {
        stats.released += 1;
      }
    }
  }

  return Object.assign((request: TransportRequest) => stream(request), { requests, stats });
}
