/**
 * Request Executor Service
 * Performs authenticated GET and POST exchanges against the backend.
 */

import { Context, Effect, Layer, Option } from 'effect';
import { type IOError, type RequestFailure, TransportError } from '../errors.js';
import {
  ClientRequest,
  ClientResponse,
  type HeaderMap,
  type HttpMethod,
  methodOf,
} from '../Http/types.js';
import { ClientLogger } from '../Logging/ClientLogger.service.js';
import { SessionManager } from '../Session/SessionManager.service.js';
import { Transport } from '../Transport/Transport.service.js';

/**
 * Receives human-readable progress messages while a request runs.
 */
export type ProgressReporter = (message: string) => Effect.Effect<void>;

export const ProgressMessages = {
  sendingRequest: 'sending request',
  sent: (bytes: number) => `sent ${bytes} bytes`,
  receivingResponse: 'receiving response',
  received: (bytes: number) => `received ${bytes} bytes`,
} as const;

const silent: ProgressReporter = () => Effect.void;

export interface RequestExecutorService {
  /**
   * Run one request with the session attached.
   *
   * The session is set up first; if that fails nothing is sent. The connection
   * is released exactly once however the exchange ends, and the whole response
   * body is read before the effect succeeds. HTTP error statuses are returned
   * as responses.
   *
   * Waits for session setup and network I/O; do not run it where waiting is
   * forbidden.
   */
  readonly execute: (
    request: ClientRequest,
    report?: ProgressReporter
  ) => Effect.Effect<ClientResponse, RequestFailure>;

  readonly get: (
    uri: URL,
    headers?: HeaderMap
  ) => Effect.Effect<ClientResponse, RequestFailure>;

  readonly post: (
    uri: URL,
    headers: HeaderMap,
    body: Uint8Array
  ) => Effect.Effect<ClientResponse, RequestFailure>;
}

export class RequestExecutor extends Context.Tag('RequestExecutor')<
  RequestExecutor,
  RequestExecutorService
>() {}

/**
 * Create a RequestExecutor service implementation
 */
export const makeRequestExecutor = Effect.gen(function* () {
  const sessions = yield* SessionManager;
  const transport = yield* Transport;
  const logger = yield* ClientLogger;

  const asTransportError =
    (method: HttpMethod) =>
    <A>(effect: Effect.Effect<A, IOError>) =>
      Effect.mapError(effect, (error) => TransportError.fromIO(method, error));

  const execute = (
    request: ClientRequest,
    report: ProgressReporter = silent
  ): Effect.Effect<ClientResponse, RequestFailure> => {
    const method = methodOf(request);
    const url = request.uri.href;
    const body: Option.Option<Uint8Array> =
      request._tag === 'Post' ? Option.some(request.body) : Option.none();
    const io = asTransportError(method);
    let startedAt = Date.now();

    return Effect.gen(function* () {
      yield* sessions.setup();

      startedAt = Date.now();
      yield* logger.logRequestStart(
        method,
        url,
        Option.match(body, { onNone: () => 0, onSome: (bytes) => bytes.byteLength })
      );
      yield* report(ProgressMessages.sendingRequest);

      const response = yield* Effect.acquireUseRelease(
        io(transport.open(request.uri)),
        (connection) =>
          Effect.gen(function* () {
            yield* sessions.authenticate(connection);

            for (const [name, values] of Object.entries(request.headers)) {
              for (const value of values) {
                yield* connection.addRequestProperty(name, value);
              }
            }

            if (Option.isSome(body)) {
              yield* connection.setFixedLengthStreamingMode(body.value.byteLength);
            }

            const head = yield* io(connection.transmit(method, body));
            if (Option.isSome(body)) {
              yield* report(ProgressMessages.sent(body.value.byteLength));
            }

            yield* report(ProgressMessages.receivingResponse);
            const bytes = yield* io(connection.readBody());
            yield* report(ProgressMessages.received(bytes.byteLength));

            return new ClientResponse({
              status: head.status,
              headers: head.headers,
              body: bytes,
            });
          }),
        (connection) => connection.disconnect()
      );

      yield* logger.logRequestComplete(
        method,
        url,
        response.status,
        response.body.byteLength,
        Date.now() - startedAt
      );
      return response;
    }).pipe(
      Effect.tapError((error) =>
        logger.logRequestFailed(method, url, error.message, Date.now() - startedAt)
      )
    );
  };

  const service: RequestExecutorService = {
    execute,

    get: (uri, headers = {}) => execute(ClientRequest.Get({ uri, headers })),

    post: (uri, headers, body) => execute(ClientRequest.Post({ uri, headers, body })),
  };
  return service;
});

/**
 * RequestExecutor Layer with dependencies
 */
export const RequestExecutorLive = Layer.effect(RequestExecutor, makeRequestExecutor);
