import {
  getRelayDebugLevel,
  getRelayDebugLogs,
  logRelayDebug,
  resetRelayDebugLogs,
  runWithRelayLogContext,
  type RelayDebugLogEntry,
  type RelayLogContext,
} from './debugLogBuffer';

export type RelayServerLogger = (event: string, payload: Record<string, unknown>) => void;

export function createRelayServerLogger(onEvent?: RelayServerLogger): RelayServerLogger {
  return (event, payload) => {
    logRelayDebug(event, payload);
    onEvent?.(event, payload);
  };
}

export {
  logRelayDebug,
  getRelayDebugLogs,
  getRelayDebugLevel,
  resetRelayDebugLogs,
  runWithRelayLogContext,
  type RelayDebugLogEntry,
  type RelayLogContext,
};
