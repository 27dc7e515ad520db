import { AsyncLocalStorage } from 'node:async_hooks';

export type RelayDebugLogEntry = {
  timestamp: string;
  event: string;
  payload?: unknown;
  correlationId?: string;
};

export type RelayLogContext = {
  correlationId?: string;
};

const DEFAULT_LOG_LIMIT = 500;
const MIN_LOG_LIMIT = 50;

const buffer: RelayDebugLogEntry[] = [];
const relayLogContext = new AsyncLocalStorage<RelayLogContext>();

/**
 * 0 silences non-error events, 1 logs everything except `.raw` events,
 * 2 adds raw events, 3 also redacts secret-looking payload keys.
 */
export function getRelayDebugLevel(env: NodeJS.ProcessEnv = process.env): number {
  const parsed = Number.parseInt(env.RELAY_DEBUG_LOG ?? '', 10);
  if (Number.isFinite(parsed)) {
    return parsed;
  }
  return env.NODE_ENV === 'production' ? 0 : 1;
}

function getLogLimit(): number {
  const parsed = Number(process.env.RELAY_DEBUG_LOG_LIMIT ?? DEFAULT_LOG_LIMIT);
  return Math.max(MIN_LOG_LIMIT, Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_LOG_LIMIT);
}

function isBufferEnabled(): boolean {
  return process.env.NODE_ENV !== 'production';
}

function pruneBuffer() {
  const limit = getLogLimit();
  if (buffer.length <= limit) {
    return;
  }
  buffer.splice(0, buffer.length - limit);
}

function isRawEvent(event: string): boolean {
  return event.includes('.raw');
}

function isErrorEvent(event: string): boolean {
  return /(?:^|[._:])(?:error|failure)(?:$|[._:])/i.test(event);
}

function splitEvent(event: string): { namespace: string; action: string } {
  const [namespace, ...rest] = event.split('.');
  const action = rest.length > 0 ? rest.join('.') : namespace || 'relay';
  return { namespace: namespace || 'relay', action };
}

function shouldLogEvent(event: string, level: number): boolean {
  if (level < 1) return false;
  if (level === 1 && isRawEvent(event)) return false;
  return true;
}

function safeClonePayload(payload: unknown): unknown {
  if (!payload || typeof payload !== 'object') {
    return payload;
  }
  try {
    return JSON.parse(JSON.stringify(payload));
  } catch {
    return String(payload);
  }
}

const SECRET_KEY_HINTS = ['api', 'key', 'token', 'secret', 'auth', 'cookie', 'credential', 'password', 'header'];

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SECRET_KEY_HINTS.some((hint) => lower.includes(hint));
}

export function redactValue(key: string, value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string') {
    return isSensitiveKey(key) ? '[redacted]' : value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(key, item));
  }
  if (typeof value === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      redacted[childKey] = redactValue(childKey, childValue);
    }
    return redacted;
  }
  return value;
}

function logToConsole(event: string, payload: unknown, level: number, severity: 'info' | 'error') {
  const { namespace, action } = splitEvent(event);
  const tags = ['relay-debug', `level-${level}`];
  const context = relayLogContext.getStore();
  if (context?.correlationId) {
    tags.push(`cid:${context.correlationId}`);
  }
  const prefix = `[${tags.join('|')}] [${namespace}] ${action}`;
  const log = severity === 'error' ? console.error : console.info;
  if (payload === undefined) {
    log(prefix);
    return;
  }
  log(prefix, payload);
}

export function logRelayDebug(event: string, payload?: unknown) {
  const level = getRelayDebugLevel();
  const forceEmit = isErrorEvent(event);
  const loggable = shouldLogEvent(event, level);
  if (!forceEmit && !loggable) {
    return;
  }
  const context = relayLogContext.getStore();
  const safePayload = safeClonePayload(payload);
  const storedPayload = level === 3 ? redactValue('', safePayload) : safePayload;
  if (isBufferEnabled() && loggable) {
    buffer.push({
      timestamp: new Date().toISOString(),
      event,
      payload: storedPayload,
      correlationId: context?.correlationId,
    });
    pruneBuffer();
  }
  logToConsole(event, storedPayload, level, forceEmit ? 'error' : 'info');
}

export function getRelayDebugLogs(): RelayDebugLogEntry[] {
  const level = getRelayDebugLevel();
  if (level === 0 || !isBufferEnabled()) return [];
  const logs = buffer.slice();
  if (level === 1) {
    return logs.filter((entry) => !isRawEvent(entry.event));
  }
  return logs;
}

export function resetRelayDebugLogs() {
  buffer.length = 0;
}

export function runWithRelayLogContext<T>(context: RelayLogContext, callback: () => Promise<T> | T): Promise<T> {
  return relayLogContext.run(context, () => Promise.resolve(callback()));
}
