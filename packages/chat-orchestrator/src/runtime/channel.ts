import { RelayError } from '@reasoning-relay/chat-contract';

export type Channel<T> = {
  /** Never blocks. Returns false once the channel is closed. */
  send(item: T): boolean;
  receive(signal?: AbortSignal): Promise<T>;
  close(): void;
  readonly closed: boolean;
  readonly size: number;
};

export type Handoff<T> = {
  /** Succeeds once; later sends are dropped and return false. */
  send(value: T): boolean;
  /** May be called once per handoff. */
  receive(signal?: AbortSignal): Promise<T>;
  readonly delivered: boolean;
};

type Waiter<T> = {
  resolve: (item: T) => void;
  reject: (reason: unknown) => void;
};

export function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new RelayError('cancelled', 'The operation was aborted.');
}

export function createChannel<T>(): Channel<T> {
  const items: Array<{ value: T }> = [];
  const waiters: Array<Waiter<T>> = [];
  let closed = false;

  return {
    get closed() {
      return closed;
    },
    get size() {
      return items.length;
    },
    send(item) {
      if (closed) {
        return false;
      }
      const waiter = waiters.shift();
      if (waiter) {
        waiter.resolve(item);
      } else {
        items.push({ value: item });
      }
      return true;
    },
    receive(signal) {
      if (signal?.aborted) {
        return Promise.reject(abortReason(signal));
      }
      const head = items.shift();
      if (head) {
        return Promise.resolve(head.value);
      }
      if (closed) {
        return Promise.reject(new RelayError('cancelled', 'The channel is closed.'));
      }
      return new Promise<T>((resolve, reject) => {
        const onAbort = () => {
          const index = waiters.indexOf(waiter);
          if (index !== -1) {
            waiters.splice(index, 1);
          }
          reject(signal ? abortReason(signal) : undefined);
        };
        const waiter: Waiter<T> = {
          resolve: (item) => {
            signal?.removeEventListener('abort', onAbort);
            resolve(item);
          },
          reject: (reason) => {
            signal?.removeEventListener('abort', onAbort);
            reject(reason);
          },
        };
        signal?.addEventListener('abort', onAbort, { once: true });
        waiters.push(waiter);
      });
    },
    close() {
      if (closed) {
        return;
      }
      closed = true;
      for (const waiter of waiters.splice(0, waiters.length)) {
        waiter.reject(new RelayError('cancelled', 'The channel is closed.'));
      }
    },
  };
}

export function createHandoff<T>(): Handoff<T> {
  const channel = createChannel<T>();
  let delivered = false;
  let consumed = false;

  return {
    get delivered() {
      return delivered;
    },
    send(value) {
      if (delivered) {
        return false;
      }
      delivered = true;
      return channel.send(value);
    },
    receive(signal) {
      if (consumed) {
        return Promise.reject(new RelayError('handoff_consumed', 'The reasoning handoff can only be read once.'));
      }
      consumed = true;
      return channel.receive(signal);
    },
  };
}
