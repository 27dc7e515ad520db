import { describe, expect, it, vi } from 'vitest';
import { TransportError } from '@reasoning-relay/chat-contract';
import { buildProviderFixtureResponse, contentFrame } from '@reasoning-relay/test-support';
import { createFetchTransport, type TransportRequest } from './transport';

const URL_UNDER_TEST = 'http://provider.test/v1/chat/completions';

const request: TransportRequest = {
  url: URL_UNDER_TEST,
  headers: { Authorization: 'Bearer test-secret' },
  body: { model: 'test-model', stream: true },
};

async function collectText(chunks: AsyncIterable<Uint8Array>): Promise<string> {
  const decoder = new TextDecoder();
  let text = '';
  for await (const chunk of chunks) {
    text += decoder.decode(chunk, { stream: true });
  }
  return text + decoder.decode();
}

describe('createFetchTransport', () => {
  it('posts the JSON body and yields the response bytes', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => buildProviderFixtureResponse({ frames: [contentFrame('a')] }));
    const transport = createFetchTransport({ fetch: fetchMock });

    await expect(collectText(transport(request))).resolves.toBe(contentFrame('a'));
    expect(fetchMock).toHaveBeenCalledWith(URL_UNDER_TEST, {
      method: 'POST',
      headers: { Authorization: 'Bearer test-secret' },
      body: '{"model":"test-model","stream":true}',
      signal: undefined,
    });
  });

  it('fails with a TransportError carrying the status and body on non-2xx responses', async () => {
    const logger = vi.fn();
    const fetchMock = vi.fn<typeof fetch>(async () =>
      buildProviderFixtureResponse({ status: 429, body: 'rate   limited' })
    );
    const transport = createFetchTransport({ fetch: fetchMock, logger });

    const failure = collectText(transport(request));

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toMatchObject({ status: 429, retryable: true, message: 'Provider responded with 429' });
    expect(logger).toHaveBeenCalledWith('llm.transport_error', { url: URL_UNDER_TEST, status: 429, body: 'rate limited' });
  });

  it('wraps connection failures', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });
    const transport = createFetchTransport({ fetch: fetchMock });

    await expect(collectText(transport(request))).rejects.toMatchObject({
      name: 'TransportError',
      message: `Request to ${URL_UNDER_TEST} failed: fetch failed`,
      status: undefined,
    });
  });

  it('rethrows aborts untouched', async () => {
    const controller = new AbortController();
    controller.abort();
    const abortError = Object.assign(new Error('The operation was aborted.'), { name: 'AbortError' });
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw abortError;
    });
    const transport = createFetchTransport({ fetch: fetchMock });

    await expect(collectText(transport({ ...request, signal: controller.signal }))).rejects.toBe(abortError);
  });

  it('cancels the response body when the consumer stops early', async () => {
    let cancelled = false;
    const encoder = new TextEncoder();
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.enqueue(encoder.encode(contentFrame('more')));
      },
      cancel() {
        cancelled = true;
      },
    });
    const fetchMock = vi.fn<typeof fetch>(async () => new Response(body));
    const transport = createFetchTransport({ fetch: fetchMock });

    for await (const chunk of transport(request)) {
      expect(chunk.byteLength).toBeGreaterThan(0);
      break;
    }

    expect(cancelled).toBe(true);
  });
});
