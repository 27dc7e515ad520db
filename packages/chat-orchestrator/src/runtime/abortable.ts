import { abortReason } from './channel';

export type LinkedSignal = {
  signal: AbortSignal;
  dispose(): void;
};

/** One signal that aborts when any of the given signals does. */
export function linkSignals(...signals: Array<AbortSignal | undefined>): LinkedSignal {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const source of signals) {
    if (!source) {
      continue;
    }
    if (source.aborted) {
      controller.abort(abortReason(source));
      break;
    }
    const onAbort = () => controller.abort(abortReason(source));
    source.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => source.removeEventListener('abort', onAbort));
  }

  return {
    signal: controller.signal,
    dispose() {
      for (const cleanup of cleanups.splice(0, cleanups.length)) {
        cleanup();
      }
    },
  };
}

export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Iterates `iterable` but gives up as soon as `signal` aborts, even when the
 * source is blocked on a pending read. A source left mid-read is released in
 * the background; `onReleaseError` sees any failure from that release.
 */
export async function* iterateUntilAborted<T>(
  iterable: AsyncIterable<T>,
  signal: AbortSignal,
  onReleaseError?: (error: unknown) => void
): AsyncGenerator<T, void, undefined> {
  const iterator = iterable[Symbol.asyncIterator]();
  let exhausted = false;

  try {
    while (true) {
      if (signal.aborted) {
        throw abortReason(signal);
      }
      const result = await raceAbort(iterator.next(), signal);
      if (result.done) {
        exhausted = true;
        return;
      }
      yield result.value;
    }
  } finally {
    if (!exhausted && iterator.return) {
      const release = iterator.return();
      if (signal.aborted) {
        void release.catch((error: unknown) => onReleaseError?.(error));
      } else {
        await release.catch((error: unknown) => onReleaseError?.(error));
      }
    }
  }
}
