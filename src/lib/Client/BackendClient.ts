/**
 * Backend Client
 * Promise API over the session and request services, for callers that do not
 * run Effect programs themselves.
 */

import { Effect, Either, Layer, ManagedRuntime, Option } from 'effect';
import {
  ClientConfig,
  type ClientConfigOptions,
  type ClientConfigService,
  makeClientConfig,
} from '../Config/ClientConfig.service.js';
import {
  type Account,
  CredentialProvider,
  type CredentialProviderService,
} from '../Credentials/CredentialProvider.js';
import { type DispatchHandle, makeAsyncDispatcher } from '../Dispatch/AsyncDispatcher.js';
import type { RequestCallback } from '../Dispatch/types.js';
import { type ConfigurationError, IOError, TransportError } from '../errors.js';
import {
  RequestExecutor,
  RequestExecutorLive,
} from '../Executor/RequestExecutor.service.js';
import {
  ClientRequest,
  type ClientResponse,
  type HttpMethod,
  toHeaderMap,
} from '../Http/types.js';
import {
  ClientLogger,
  type ClientLoggerOptions,
  makeClientLogger,
} from '../Logging/ClientLogger.service.js';
import { Authentication, SessionManager } from '../Session/SessionManager.service.js';
import {
  FetchTransportLive,
  Transport,
  type TransportService,
} from '../Transport/Transport.service.js';

/**
 * Headers as callers usually hold them: one string or a list per name.
 */
export type RequestHeaders = Readonly<Record<string, string | ReadonlyArray<string>>>;

export interface BackendClientOptions {
  /** Overrides merged over the protocol defaults */
  readonly config?: Partial<ClientConfigOptions>;
  /** Logger to use instead of one built from `log` */
  readonly logger?: ClientLogger;
  readonly log?: ClientLoggerOptions;
  /** Transport to use instead of the fetch-based one */
  readonly transport?: TransportService;
}

/**
 * A background request started by {@link BackendClient.backgroundGet} or
 * {@link BackendClient.backgroundPost}.
 */
export interface BackgroundRequest {
  readonly id: string;
  /** Resolves once the callback has received `done` or `reportError` */
  readonly completion: Promise<void>;
}

type ClientServices =
  | RequestExecutor
  | SessionManager
  | Transport
  | ClientConfig
  | ClientLogger;

const resolveConfig = (config?: Partial<ClientConfigOptions>): ClientConfigService => {
  const resolved = Effect.runSync(Effect.either(makeClientConfig(config)));
  if (Either.isLeft(resolved)) {
    throw resolved.left;
  }
  return resolved.right;
};

const toUrl = (uri: URL | string): URL => (typeof uri === 'string' ? new URL(uri) : uri);

const parseUri = (
  method: HttpMethod,
  uri: URL | string
): Either.Either<URL, TransportError> =>
  typeof uri === 'string'
    ? Either.try({
        try: () => new URL(uri),
        catch: (error) => TransportError.fromIO(method, IOError.fromCause(uri, 'open', error)),
      })
    : Either.right(uri);

/**
 * Client for one backend origin.
 *
 * `get` and `post` resolve once the whole exchange is done: session setup,
 * transmit and the full response read. They never reject for request failures;
 * they resolve `null` and leave the reason in {@link errorMessage}. HTTP error
 * statuses resolve as responses.
 *
 * @example
 * ```typescript
 * const client = BackendClient.interactive(
 *   'https://my-app.example.com',
 *   new Account({ name: 'user@example.com', type: 'com.example' }),
 *   provider
 * );
 *
 * const response = await client.get('https://my-app.example.com/api/items');
 * if (response === null) {
 *   console.error(await client.errorMessage());
 * }
 *
 * // Hand the token to a client that must never prompt
 * const token = await client.token();
 * if (token !== null) {
 *   const worker = BackendClient.withToken('https://my-app.example.com', token);
 * }
 * ```
 *
 * @group Client
 * @public
 */
export class BackendClient {
  private lastError: Option.Option<string> = Option.none();

  private constructor(
    readonly origin: URL,
    private readonly runtime: ManagedRuntime.ManagedRuntime<
      ClientServices,
      ConfigurationError
    >
  ) {}

  /**
   * Client that asks the credential provider for the account's token, which
   * may prompt the user. Throws a ConfigurationError for invalid options and a
   * TypeError for an unparseable origin.
   */
  static interactive(
    origin: URL | string,
    account: Account,
    provider: CredentialProviderService,
    options: BackendClientOptions & { readonly interaction?: unknown } = {}
  ): BackendClient {
    return BackendClient.create(
      toUrl(origin),
      Authentication.Interactive({ account, interaction: options.interaction }),
      Layer.succeed(CredentialProvider, provider),
      options
    );
  }

  /**
   * Client that authenticates with a token obtained earlier and never prompts.
   * Throws a ConfigurationError for invalid options.
   */
  static withToken(
    origin: URL | string,
    token: string,
    options: BackendClientOptions = {}
  ): BackendClient {
    return BackendClient.create(
      toUrl(origin),
      Authentication.TokenSupplied({ token }),
      Layer.empty,
      options
    );
  }

  private static create(
    origin: URL,
    authentication: Authentication,
    credentials: Layer.Layer<never>,
    options: BackendClientOptions
  ): BackendClient {
    const config = resolveConfig(options.config);
    const logger = options.logger ?? makeClientLogger(options.log);

    const transportLayer: Layer.Layer<Transport, never, ClientConfigService> =
      options.transport === undefined
        ? FetchTransportLive
        : Layer.succeed(Transport, options.transport);

    const infrastructure = transportLayer.pipe(
      Layer.provideMerge(
        Layer.mergeAll(
          ClientConfig.Live(config),
          Layer.succeed(ClientLogger, logger),
          credentials
        )
      )
    );

    const services = RequestExecutorLive.pipe(
      Layer.provideMerge(SessionManager.layer(origin, authentication)),
      Layer.provideMerge(infrastructure)
    );

    return new BackendClient(origin, ManagedRuntime.make(services));
  }

  /**
   * GET `uri` with the session attached.
   */
  get(uri: URL | string, headers: RequestHeaders = {}): Promise<ClientResponse | null> {
    return this.perform(
      Either.map(parseUri('GET', uri), (url) =>
        ClientRequest.Get({ uri: url, headers: toHeaderMap(headers) })
      )
    );
  }

  /**
   * POST `body` to `uri` with the session attached. The body length is declared
   * up front.
   */
  post(
    uri: URL | string,
    headers: RequestHeaders,
    body: Uint8Array
  ): Promise<ClientResponse | null> {
    return this.perform(
      Either.map(parseUri('POST', uri), (url) =>
        ClientRequest.Post({ uri: url, headers: toHeaderMap(headers), body })
      )
    );
  }

  /**
   * Reason the last `get`, `post` or `token` call failed, or `null` when the
   * last call succeeded.
   */
  async errorMessage(): Promise<string | null> {
    return Option.getOrNull(this.lastError);
  }

  /**
   * Set up the session and return the identity token it was obtained with.
   * Resolves `null` when setup fails and leaves the reason in
   * {@link errorMessage}.
   */
  async token(): Promise<string | null> {
    const outcome = await this.runtime.runPromise(
      Effect.either(Effect.flatMap(SessionManager, (sessions) => sessions.token()))
    );
    if (Either.isLeft(outcome)) {
      this.lastError = Option.some(outcome.left.message);
      return null;
    }
    this.lastError = Option.none();
    return outcome.right;
  }

  /**
   * Start a GET in the background. Progress and the outcome reach `callback`
   * in order, ending with exactly one `done` or `reportError`.
   */
  backgroundGet(
    uri: URL | string,
    headers: RequestHeaders,
    callback: RequestCallback
  ): Promise<BackgroundRequest> {
    return this.dispatch(
      Either.map(parseUri('GET', uri), (url) =>
        ClientRequest.Get({ uri: url, headers: toHeaderMap(headers) })
      ),
      callback
    );
  }

  /**
   * Start a POST in the background.
   */
  backgroundPost(
    uri: URL | string,
    headers: RequestHeaders,
    body: Uint8Array,
    callback: RequestCallback
  ): Promise<BackgroundRequest> {
    return this.dispatch(
      Either.map(parseUri('POST', uri), (url) =>
        ClientRequest.Post({ uri: url, headers: toHeaderMap(headers), body })
      ),
      callback
    );
  }

  /**
   * Release the services behind this client. Background requests already
   * launched still deliver their terminal notification.
   */
  dispose(): Promise<void> {
    return this.runtime.dispose();
  }

  private async perform(
    request: Either.Either<ClientRequest, TransportError>
  ): Promise<ClientResponse | null> {
    if (Either.isLeft(request)) {
      this.lastError = Option.some(request.left.message);
      return null;
    }
    const outcome = await this.runtime.runPromise(
      Effect.either(
        Effect.flatMap(RequestExecutor, (executor) => executor.execute(request.right))
      )
    );
    if (Either.isLeft(outcome)) {
      this.lastError = Option.some(outcome.left.message);
      return null;
    }
    this.lastError = Option.none();
    return outcome.right;
  }

  private async dispatch(
    request: Either.Either<ClientRequest, TransportError>,
    callback: RequestCallback
  ): Promise<BackgroundRequest> {
    const handle: DispatchHandle = await this.runtime.runPromise(
      Effect.flatMap(makeAsyncDispatcher, (dispatcher) =>
        Either.match(request, {
          onLeft: (failure) =>
            dispatcher.refuse(failure.method, failure.url, failure.message, callback),
          onRight: (built) => dispatcher.launch(built, callback),
        })
      )
    );
    return {
      id: handle.id,
      completion: this.runtime.runPromise(handle.await),
    };
  }
}
