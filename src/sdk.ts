/**
 * teamsnap-kit
 * 程式使用的公開 API
 */

export { TeamSnapClient } from './services/client.js';
export type { TeamSnapClientOptions } from './services/client.js';
export { AssistantClient } from './services/assistant-client.js';
export type { AssistantClientOptions } from './services/assistant-client.js';
export { BaseApiClient, API_ROOT, DEFAULT_TIMEOUT_MS } from './services/api.js';
export type { ApiClientOptions, RequestOptions, RequestResult } from './services/api.js';
export { RecordPage, ReadableResource, UpdatableResource, WritableResource, RESOURCES } from './services/resources.js';
export type { SearchAllOptions } from './services/resources.js';
export { Authorizer, StaticTokenProvider, AUTHORIZE_ENDPOINT, TOKEN_ENDPOINT, DEFAULT_SCOPE } from './services/auth.js';
export type { AuthorizerOptions } from './services/auth.js';
export { TokenStore } from './services/token-store.js';
export { ConfigService, resolveConfigPath, readAssistantSettings } from './services/config.js';
export { ModeGate, parseReadOnlyFlag } from './services/mode-gate.js';
export type { Mode } from './services/mode-gate.js';
export { DeprecationMonitor } from './services/deprecation-monitor.js';
export type { ApiWarning, WarningListener } from './services/deprecation-monitor.js';
export { OfetchTransport } from './services/transport.js';
export type { HttpMethod, HttpRequest, HttpResponse, HttpTransport, QueryParams } from './services/transport.js';
export { decodeItem, decodeCollection, extractLink, encodeTemplate, isEnvelope } from './lib/envelope.js';
export * from './lib/errors.js';
export { StructuredLogger, createLoggers, loggers, consoleSink, stderrSink } from './lib/logger.js';
export type { LogLevel, LogContext, LogEntry, LoggerConfig, LogSink, Loggers } from './lib/logger.js';
export * from './types/auth.js';
export type * from './types/envelope.js';
export * from './types/resources.js';
export type { AssistantSettings } from './types/config.js';
