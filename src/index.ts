// Promise API
export { BackendClient } from './lib/Client/BackendClient.js';
export type {
  BackendClientOptions,
  BackgroundRequest,
  RequestHeaders,
} from './lib/Client/BackendClient.js';

// Effect services
export * from './lib/Session/SessionManager.service.js';
export * from './lib/Executor/RequestExecutor.service.js';
export * from './lib/Transport/Transport.service.js';
export * from './lib/Dispatch/AsyncDispatcher.js';
export * from './lib/Dispatch/types.js';
export * from './lib/Credentials/CredentialProvider.js';
export * from './lib/Http/types.js';

// Configuration
export type {
  ClientConfigOptions,
  ClientConfigService,
} from './lib/Config/ClientConfig.service.js';
export {
  ClientConfig,
  makeClientConfig,
  resolveClientConfigOptions,
} from './lib/Config/ClientConfig.service.js';

// Logging
export type {
  ClientLogEvent,
  ClientLogEventType,
  ClientLoggerOptions,
} from './lib/Logging/ClientLogger.service.js';
export {
  ClientLogger,
  ClientLoggerLive,
  makeClientLogger,
} from './lib/Logging/ClientLogger.service.js';

// Errors
export * from './lib/errors.js';
