import { Effect, Layer } from 'effect';
import { ConfigurationError } from '../errors.js';

/**
 * Configuration options for authentication and request behaviour.
 *
 * The defaults describe the login-exchange protocol of the hosted backend;
 * override them only to talk to a backend that deviates from it.
 *
 * @group Configuration
 * @public
 */
export interface ClientConfigOptions {
  /** Path of the login-exchange endpoint, relative to the app origin (default: '_ah/login') */
  readonly loginPath: string;
  /** Value sent as the `continue` parameter of the login exchange (default: 'http://localhost/') */
  readonly continueUrl: string;
  /** Token type requested from the credential provider (default: 'ah') */
  readonly authTokenType: string;
  /** Session cookie name issued to https origins (default: 'SACSID') */
  readonly secureCookieName: string;
  /** Session cookie name issued to plain http origins (default: 'ACSID') */
  readonly plainCookieName: string;
  /**
   * Host prefix of development backends that perform no authentication.
   * Requests to such hosts get a placeholder session and skip the provider
   * and the login exchange entirely (default: '192.168').
   */
  readonly testModeHostPrefix: string;
  /** Placeholder cookie used in test mode (default: 'Testing=TRUE') */
  readonly testModeCookie: string;
  /** Placeholder token used in test mode (default: 'whatever') */
  readonly testModeToken: string;
  /** Abort a transport exchange after this many milliseconds (default: 30000) */
  readonly requestTimeoutMs: number;
}

/**
 * Service interface for accessing client configuration.
 *
 * @group Configuration
 * @public
 */
export interface ClientConfigService {
  /** Get the complete configuration options */
  getOptions: () => Effect.Effect<ClientConfigOptions>;
  /** Whether an origin is a development backend served in test mode */
  isTestModeOrigin: (origin: URL) => Effect.Effect<boolean>;
  /** Session cookie name the backend issues for an origin */
  getCookieName: (origin: URL) => Effect.Effect<string>;
  /** Build the login-exchange URL for an origin and identity token */
  getLoginUrl: (origin: URL, token: string) => Effect.Effect<URL>;
  /** Get the transport timeout in milliseconds */
  getRequestTimeout: () => Effect.Effect<number>;
}

const DEFAULT_OPTIONS: ClientConfigOptions = {
  loginPath: '_ah/login',
  continueUrl: 'http://localhost/',
  authTokenType: 'ah',
  secureCookieName: 'SACSID',
  plainCookieName: 'ACSID',
  testModeHostPrefix: '192.168',
  testModeCookie: 'Testing=TRUE',
  testModeToken: 'whatever',
  requestTimeoutMs: 30000,
};

/**
 * The main ClientConfig service for dependency injection.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const config = yield* ClientConfig;
 *   const login = yield* config.getLoginUrl(new URL('https://my-app.example.com'), 'token');
 *   console.log(login.href);
 * });
 *
 * await Effect.runPromise(program.pipe(Effect.provide(ClientConfig.Default)));
 * ```
 *
 * @group Configuration
 * @public
 */
export class ClientConfig extends Effect.Service<ClientConfigService>()(
  'session-rest-client/ClientConfig',
  {
    effect: Effect.sync(() => buildClientConfig(DEFAULT_OPTIONS)),
  }
) {
  /**
   * Creates a Layer that provides ClientConfig with custom options.
   * Fails with a ConfigurationError when an option is out of range.
   */
  static Live = (
    config: Partial<ClientConfigOptions> | ClientConfigService
  ) => {
    const service: Effect.Effect<ClientConfigService, ConfigurationError> =
      'getOptions' in config ? Effect.succeed(config) : makeClientConfig(config);
    return Layer.effect(ClientConfig, service);
  };
}

const requireNonEmpty = (
  options: ClientConfigOptions,
  field: keyof ClientConfigOptions
): Effect.Effect<void, ConfigurationError> => {
  const value = options[field];
  return typeof value === 'string' && value.trim().length > 0
    ? Effect.void
    : Effect.fail(ConfigurationError.invalid(field, value, 'a non-empty string'));
};

/**
 * Merge partial options over the defaults and check every value.
 */
export const resolveClientConfigOptions = (
  options: Partial<ClientConfigOptions> = {}
): Effect.Effect<ClientConfigOptions, ConfigurationError> =>
  Effect.gen(function* () {
    const merged: ClientConfigOptions = { ...DEFAULT_OPTIONS, ...options };

    for (const field of [
      'loginPath',
      'authTokenType',
      'secureCookieName',
      'plainCookieName',
      'testModeHostPrefix',
      'testModeCookie',
    ] as const) {
      yield* requireNonEmpty(merged, field);
    }

    if (!URL.canParse(merged.continueUrl)) {
      return yield* Effect.fail(
        ConfigurationError.invalid('continueUrl', merged.continueUrl, 'an absolute URL')
      );
    }

    if (!Number.isInteger(merged.requestTimeoutMs) || merged.requestTimeoutMs <= 0) {
      return yield* Effect.fail(
        ConfigurationError.invalid(
          'requestTimeoutMs',
          merged.requestTimeoutMs,
          'a positive integer'
        )
      );
    }

    return merged;
  });

function buildClientConfig(options: ClientConfigOptions): ClientConfigService {
  return {
    getOptions: () => Effect.succeed(options),

    isTestModeOrigin: (origin: URL) =>
      Effect.succeed(origin.hostname.startsWith(options.testModeHostPrefix)),

    getCookieName: (origin: URL) =>
      Effect.succeed(
        origin.protocol === 'https:'
          ? options.secureCookieName
          : options.plainCookieName
      ),

    getLoginUrl: (origin: URL, token: string) =>
      Effect.sync(() => {
        // The exchange always runs over TLS, whatever the app's own scheme.
        const href = origin.href;
        let base = `https${href.substring(href.indexOf(':'))}`;
        if (!base.endsWith('/')) {
          base = `${base}/`;
        }
        const path = options.loginPath.replace(/^\/+/, '');
        return new URL(
          `${base}${path}?continue=${options.continueUrl}&auth=${encodeURIComponent(token)}`
        );
      }),

    getRequestTimeout: () => Effect.succeed(options.requestTimeoutMs),
  };
}

/**
 * Creates a ClientConfigService with options merged over the defaults.
 *
 * @param options - Partial configuration options to merge with defaults
 */
export const makeClientConfig = (
  options: Partial<ClientConfigOptions> = {}
): Effect.Effect<ClientConfigService, ConfigurationError> =>
  Effect.map(resolveClientConfigOptions(options), buildClientConfig);
