export type RelayErrorCode =
  | 'transport_error'
  | 'decode_error'
  | 'handoff_consumed'
  | 'timeout'
  | 'cancelled'
  | 'invalid_config'
  | 'invalid_request'
  | 'internal_error';

export type ChatStreamError = {
  code: RelayErrorCode;
  message: string;
  retryable: boolean;
};

export type RelayErrorOptions = {
  retryable?: boolean;
  cause?: unknown;
  details?: Record<string, unknown>;
};

export class RelayError extends Error {
  readonly code: RelayErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(code: RelayErrorCode, message: string, options: RelayErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'RelayError';
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
  }

  toJSON(): ChatStreamError & { details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

export class TransportError extends RelayError {
  readonly status?: number;
  readonly url: string;

  constructor(message: string, options: { url: string; status?: number; body?: string; cause?: unknown }) {
    super('transport_error', message, {
      cause: options.cause,
      retryable: options.status === undefined || options.status === 429 || options.status >= 500,
      details: { url: options.url, status: options.status, body: options.body },
    });
    this.name = 'TransportError';
    this.status = options.status;
    this.url = options.url;
  }
}

export class DecodeError extends RelayError {
  readonly line: string;

  constructor(line: string, cause: unknown) {
    super('decode_error', `Malformed provider frame: ${line.slice(0, 120)}`, { cause });
    this.name = 'DecodeError';
    this.line = line;
  }
}

export function createTimeoutError(timeoutMs: number): RelayError {
  return new RelayError('timeout', 'Operation timeout', { retryable: true, details: { timeoutMs } });
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function toStreamError(error: unknown): ChatStreamError {
  if (isRelayError(error)) {
    return { code: error.code, message: error.message, retryable: error.retryable };
  }
  if (error instanceof Error) {
    return { code: 'internal_error', message: error.message, retryable: false };
  }
  return { code: 'internal_error', message: String(error), retryable: false };
}
