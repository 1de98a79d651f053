import { Console, Context, Effect, Layer } from 'effect';
import * as fs from 'fs';
import * as path from 'path';

export type ClientLogEventType =
  | 'session_setup'
  | 'test_mode'
  | 'token_acquired'
  | 'token_invalidated'
  | 'session_established'
  | 'session_failed'
  | 'request_start'
  | 'request_complete'
  | 'request_failed'
  | 'dispatch_launch'
  | 'dispatch_complete'
  | 'callback_error';

export interface ClientLogEvent {
  timestamp: string;
  type: ClientLogEventType;
  origin?: string;
  url?: string;
  method?: string;
  dispatchId?: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface ClientLogger {
  readonly logEvent: (
    event: Omit<ClientLogEvent, 'timestamp'>
  ) => Effect.Effect<void>;
  readonly logSessionSetup: (
    origin: string,
    mode: 'interactive' | 'token_supplied'
  ) => Effect.Effect<void>;
  readonly logTestMode: (origin: string) => Effect.Effect<void>;
  readonly logTokenAcquired: (
    origin: string,
    account: string,
    attempt: 'initial' | 'refresh'
  ) => Effect.Effect<void>;
  readonly logTokenInvalidated: (
    origin: string,
    account: string
  ) => Effect.Effect<void>;
  readonly logSessionEstablished: (
    origin: string,
    cookieName: string
  ) => Effect.Effect<void>;
  readonly logSessionFailed: (
    origin: string,
    reason: string,
    errorTag: string
  ) => Effect.Effect<void>;
  readonly logRequestStart: (
    method: string,
    url: string,
    bodyBytes: number
  ) => Effect.Effect<void>;
  readonly logRequestComplete: (
    method: string,
    url: string,
    status: number,
    bodyBytes: number,
    durationMs: number
  ) => Effect.Effect<void>;
  readonly logRequestFailed: (
    method: string,
    url: string,
    reason: string,
    durationMs: number
  ) => Effect.Effect<void>;
  readonly logDispatch: (
    dispatchId: string,
    event: 'launch' | 'complete',
    details?: Record<string, unknown>
  ) => Effect.Effect<void>;
  readonly logCallbackError: (
    dispatchId: string,
    notification: 'reportProgress' | 'reportError' | 'done',
    error: unknown
  ) => Effect.Effect<void>;
}

export const ClientLogger = Context.GenericTag<ClientLogger>('ClientLogger');

export interface ClientLoggerOptions {
  /** Directory for JSON-lines log files; nothing is written to disk when absent */
  readonly logDir?: string;
  /** Event types echoed to the console */
  readonly consoleTypes?: ReadonlyArray<ClientLogEventType>;
  /** Receives every event, e.g. to forward it to an application logger */
  readonly sink?: (event: ClientLogEvent) => void;
}

const DEFAULT_CONSOLE_TYPES: ReadonlyArray<ClientLogEventType> = [
  'session_established',
  'session_failed',
  'request_failed',
  'callback_error',
];

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const makeClientLogger = (
  options: ClientLoggerOptions = {}
): ClientLogger => {
  const consoleTypes = options.consoleTypes ?? DEFAULT_CONSOLE_TYPES;

  let logFilePath: string | undefined;
  if (options.logDir !== undefined) {
    if (!fs.existsSync(options.logDir)) {
      fs.mkdirSync(options.logDir, { recursive: true });
    }
    const logFileName = `client-${new Date().toISOString().replace(/[:.]/g, '-')}.jsonl`;
    logFilePath = path.join(options.logDir, logFileName);
  }

  // A failing file write or sink only loses the event; requests carry on.
  const writeLogEvent = (event: ClientLogEvent) =>
    Effect.gen(function* () {
      if (logFilePath !== undefined) {
        const target = logFilePath;
        yield* Effect.try({
          try: () => fs.appendFileSync(target, JSON.stringify(event) + '\n'),
          catch: describeError,
        }).pipe(
          Effect.catchAll((reason) =>
            Console.error(`Failed to write log event to ${target}: ${reason}`)
          )
        );
      }

      if (options.sink !== undefined) {
        const sink = options.sink;
        yield* Effect.try({ try: () => sink(event), catch: describeError }).pipe(
          Effect.catchAll((reason) =>
            Console.error(`Log sink rejected ${event.type} event: ${reason}`)
          )
        );
      }

      if (consoleTypes.includes(event.type)) {
        const originInfo = event.origin ? ` [${event.origin}]` : '';
        yield* Console.log(`[${event.type}]${originInfo} ${event.message}`);
      }
    });

  const now = () => new Date().toISOString();

  return {
    logEvent: (event) =>
      writeLogEvent({
        ...event,
        timestamp: now(),
      }),

    logSessionSetup: (origin, mode) =>
      writeLogEvent({
        timestamp: now(),
        type: 'session_setup',
        origin,
        message: `Setting up ${mode.replace('_', '-')} session for ${origin}`,
        details: { mode },
      }),

    logTestMode: (origin) =>
      writeLogEvent({
        timestamp: now(),
        type: 'test_mode',
        origin,
        message: `Test-mode origin ${origin}: using placeholder session`,
      }),

    logTokenAcquired: (origin, account, attempt) =>
      writeLogEvent({
        timestamp: now(),
        type: 'token_acquired',
        origin,
        message: `Acquired ${attempt} token for ${account}`,
        details: { account, attempt },
      }),

    logTokenInvalidated: (origin, account) =>
      writeLogEvent({
        timestamp: now(),
        type: 'token_invalidated',
        origin,
        message: `Invalidated cached token for ${account}`,
        details: { account },
      }),

    logSessionEstablished: (origin, cookieName) =>
      writeLogEvent({
        timestamp: now(),
        type: 'session_established',
        origin,
        message: `Session established (${cookieName})`,
        details: { cookieName },
      }),

    logSessionFailed: (origin, reason, errorTag) =>
      writeLogEvent({
        timestamp: now(),
        type: 'session_failed',
        origin,
        message: `Session setup failed: ${reason}`,
        details: { reason, error: errorTag },
      }),

    logRequestStart: (method, url, bodyBytes) =>
      writeLogEvent({
        timestamp: now(),
        type: 'request_start',
        method,
        url,
        message: `${method} ${url}`,
        details: { bodyBytes },
      }),

    logRequestComplete: (method, url, status, bodyBytes, durationMs) =>
      writeLogEvent({
        timestamp: now(),
        type: 'request_complete',
        method,
        url,
        message: `${method} ${url} -> ${status} (${bodyBytes} bytes in ${durationMs}ms)`,
        details: { status, bodyBytes, durationMs },
      }),

    logRequestFailed: (method, url, reason, durationMs) =>
      writeLogEvent({
        timestamp: now(),
        type: 'request_failed',
        method,
        url,
        message: `${method} ${url} failed after ${durationMs}ms: ${reason}`,
        details: { reason, durationMs },
      }),

    logDispatch: (dispatchId, event, details) =>
      writeLogEvent({
        timestamp: now(),
        type: event === 'launch' ? 'dispatch_launch' : 'dispatch_complete',
        dispatchId,
        message: `Dispatch ${dispatchId} ${event}`,
        details,
      }),

    logCallbackError: (dispatchId, notification, error) =>
      writeLogEvent({
        timestamp: now(),
        type: 'callback_error',
        dispatchId,
        message: `Callback ${notification} threw: ${describeError(error)}`,
        details: { notification },
      }),
  };
};

export const ClientLoggerLive = Layer.succeed(ClientLogger, makeClientLogger());
