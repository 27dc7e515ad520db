export { SSE_HEADERS, createChatSseStream } from './stream';
export {
  ChatCompletionsBodySchema,
  formatIssues,
  validateChatCompletionsBody,
  type ChatCompletionsBody,
} from './validation';
export {
  createChatCompletionsHandler,
  type ChatCompletionsHandler,
  type ChatCompletionsHandlerOptions,
} from './handler';
export {
  createRelayServerLogger,
  getRelayDebugLevel,
  getRelayDebugLogs,
  logRelayDebug,
  resetRelayDebugLogs,
  runWithRelayLogContext,
  type RelayDebugLogEntry,
  type RelayLogContext,
  type RelayServerLogger,
} from './server';
export { DEFAULT_ENV_FILES, loadRelayEnv, parseEnvLine, RELAY_ENV_KEY, type EnvFileResult, type EnvRecord } from './env';
export {
  ANSWER_PROVIDERS,
  DEFAULT_CONFIG_FILE,
  RelayConfigSchema,
  loadConfigFile,
  loadRelayConfig,
  resolveAnswerApiUrl,
  type AnswerProviderKind,
  type LoadRelayConfigOptions,
  type RelayConfig,
} from './config';
export {
  createAnswerClient,
  createReasoningRelayServer,
  type RelayServer,
  type RelayServerDeps,
} from './bootstrap';
