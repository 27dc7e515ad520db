import { TransportError, isAbortError } from '@reasoning-relay/chat-contract';
import type { LlmLogger } from './types';

export type TransportRequest = {
  url: string;
  headers: Record<string, string>;
  body: unknown;
  signal?: AbortSignal;
};

/**
 * Opens a streaming request and yields raw response chunks lazily. Connection
 * problems and non-2xx responses fail with `TransportError`; aborts propagate as-is.
 */
export type ChatTransport = (request: TransportRequest) => AsyncIterable<Uint8Array>;

export type FetchTransportOptions = {
  fetch?: typeof fetch;
  logger?: LlmLogger;
};

const MAX_ERROR_BODY_CHARS = 500;

function summarizeBody(bodyText: string): string {
  const compact = bodyText.replace(/\s+/g, ' ').trim();
  return compact.length > MAX_ERROR_BODY_CHARS ? `${compact.slice(0, MAX_ERROR_BODY_CHARS)}…` : compact;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createFetchTransport(options: FetchTransportOptions = {}): ChatTransport {
  const fetchImpl = options.fetch ?? globalThis.fetch;
  const logger = options.logger;

  return async function* fetchTransport(request: TransportRequest): AsyncGenerator<Uint8Array> {
    const { url, signal } = request;
    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: 'POST',
        headers: request.headers,
        body: JSON.stringify(request.body),
        signal,
      });
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw error;
      }
      throw new TransportError(`Request to ${url} failed: ${describeError(error)}`, { url, cause: error });
    }

    if (!response.ok || !response.body) {
      const bodyText = await response.text().catch(() => '');
      const body = summarizeBody(bodyText);
      logger?.('llm.transport_error', { url, status: response.status, body });
      throw new TransportError(`Provider responded with ${response.status}`, { url, status: response.status, body });
    }

    const reader = response.body.getReader();
    try {
      while (true) {
        let result: Awaited<ReturnType<typeof reader.read>>;
        try {
          result = await reader.read();
        } catch (error) {
          if (signal?.aborted || isAbortError(error)) {
            throw error;
          }
          throw new TransportError(`Stream from ${url} was interrupted: ${describeError(error)}`, { url, cause: error });
        }
        if (result.done) {
          return;
        }
        if (result.value.byteLength > 0) {
          yield result.value;
        }
      }
    } finally {
      await reader.cancel().catch((error: unknown) => {
        logger?.('llm.transport_cancel_error', { url, error: describeError(error) });
      });
    }
  };
}
