/**
 * Session Manager Service
 * Turns a platform identity token into a backend session cookie and attaches
 * it to outbound connections.
 */

import { Context, Data, Deferred, Effect, Exit, Layer, Option, Ref } from 'effect';
import { Cookie } from 'tough-cookie';
import { ClientConfig } from '../Config/ClientConfig.service.js';
import {
  Account,
  CredentialProvider,
  type CredentialProviderService,
} from '../Credentials/CredentialProvider.js';
import {
  CredentialError,
  ProtocolError,
  SessionExchangeError,
  type SessionFailure,
} from '../errors.js';
import { headerValues, type HeaderMap } from '../Http/types.js';
import { ClientLogger } from '../Logging/ClientLogger.service.js';
import { type Connection, Transport } from '../Transport/Transport.service.js';

/**
 * How a session manager obtains its identity token.
 *
 * - `Interactive`: asks the {@link CredentialProvider}, which may prompt the user.
 * - `TokenSupplied`: uses a token obtained earlier and never prompts, so it is
 *   safe in background jobs with no way to reach the user.
 *
 * @group Data Types
 * @public
 */
export type Authentication = Data.TaggedEnum<{
  Interactive: {
    readonly account: Account;
    readonly interaction?: unknown;
  };
  TokenSupplied: {
    readonly token: string;
  };
}>;

export const Authentication = Data.taggedEnum<Authentication>();

/**
 * An established session with the backend.
 *
 * @group Data Types
 * @public
 */
export class Session extends Data.Class<{
  /** `name=value` pair sent back in the `Cookie` header */
  readonly cookie: string;
  /** Identity token the cookie was obtained with */
  readonly token: string;
  readonly origin: URL;
}> {}

/**
 * Authentication progress of one session manager.
 *
 * Unauthenticated → TokenAcquired → SessionEstablished, with Failed reachable
 * from every step. Failed only ends the current setup; the next setup starts
 * over from Unauthenticated. SessionEstablished is final.
 *
 * @group Data Types
 * @public
 */
export type SessionState = Data.TaggedEnum<{
  Unauthenticated: {};
  TokenAcquired: { readonly token: string };
  SessionEstablished: { readonly session: Session };
  Failed: { readonly error: SessionFailure };
}>;

export const SessionState = Data.taggedEnum<SessionState>();

export interface SessionManagerService {
  /** Origin of the backend this manager authenticates against */
  readonly origin: URL;

  /**
   * Establish the session if it is not established yet. Once a cookie is
   * cached this returns it without any I/O.
   *
   * Waits for the credential provider, which may be prompting the user, and
   * performs network I/O; callers must not run it where waiting is forbidden.
   */
  readonly setup: () => Effect.Effect<Session, SessionFailure>;

  /**
   * Set up the session and attach its cookie to a connection.
   */
  readonly authenticate: (connection: Connection) => Effect.Effect<void, SessionFailure>;

  /**
   * Set up the session and return the identity token in use. Hand it to a
   * `TokenSupplied` manager to authenticate without prompting.
   */
  readonly token: () => Effect.Effect<string, SessionFailure>;

  /** Diagnostic from the last failed setup, if any */
  readonly errorMessage: () => Effect.Effect<Option.Option<string>>;

  readonly state: () => Effect.Effect<SessionState>;
}

export class SessionManager extends Context.Tag('SessionManager')<
  SessionManager,
  SessionManagerService
>() {
  static readonly layer = (origin: URL, authentication: Authentication) =>
    Layer.effect(SessionManager, makeSessionManager(origin, authentication));
}

/**
 * Pick the session cookie out of `Set-Cookie` headers: the first value that
 * starts with `cookieName`, with its attributes cut off.
 */
export const selectSessionCookie = (
  headers: HeaderMap,
  cookieName: string
): Option.Option<string> =>
  Option.map(
    Option.fromNullable(
      headerValues(headers, 'set-cookie').find((value) =>
        value.startsWith(cookieName)
      )
    ),
    (value) => {
      const semi = value.indexOf(';');
      return semi === -1 ? value : value.substring(0, semi);
    }
  );

/**
 * Create a SessionManager for one backend origin
 */
export const makeSessionManager = (origin: URL, authentication: Authentication) =>
  Effect.gen(function* () {
    const config = yield* ClientConfig;
    const transport = yield* Transport;
    const logger = yield* ClientLogger;
    const provider = yield* Effect.serviceOption(CredentialProvider);
    const options = yield* config.getOptions();

    const stateRef = yield* Ref.make<SessionState>(SessionState.Unauthenticated());
    const lastError = yield* Ref.make<Option.Option<string>>(Option.none());
    const setupLock = yield* Effect.makeSemaphore(1);
    const originLabel = origin.origin;

    // The provider settles on its own schedule, possibly after prompting the
    // user; the calling fiber waits on the deferred until it does.
    const requestToken = (
      credentials: CredentialProviderService,
      account: Account,
      interaction: unknown
    ) =>
      Effect.gen(function* () {
        const resolved = yield* Deferred.make<string, CredentialError>();
        yield* Effect.sync(() => {
          void Promise.resolve()
            .then(() =>
              credentials.requestToken({
                account,
                tokenType: options.authTokenType,
                interaction,
              })
            )
            .then(
              (token) =>
                Deferred.unsafeDone(
                  resolved,
                  token === undefined || token.length === 0
                    ? Exit.fail(CredentialError.noToken(account.name))
                    : Exit.succeed(token)
                ),
              (error: unknown) =>
                Deferred.unsafeDone(
                  resolved,
                  Exit.fail(CredentialError.fromCause(account.name, error))
                )
            );
        });
        return yield* Deferred.await(resolved);
      });

    // Cached provider tokens may already be stale for this backend, so the
    // first token is thrown away and a fresh one requested, once per cold start.
    const acquireFreshToken = (account: Account, interaction: unknown) =>
      Effect.gen(function* () {
        if (Option.isNone(provider)) {
          return yield* Effect.fail(CredentialError.noProvider(account.name));
        }
        const credentials = provider.value;

        const cached = yield* requestToken(credentials, account, interaction);
        yield* logger.logTokenAcquired(originLabel, account.name, 'initial');

        yield* Effect.try({
          try: () => credentials.invalidateToken(account.type, cached),
          catch: (error) => CredentialError.fromCause(account.name, error),
        });
        yield* logger.logTokenInvalidated(originLabel, account.name);

        const fresh = yield* requestToken(credentials, account, interaction);
        yield* logger.logTokenAcquired(originLabel, account.name, 'refresh');
        return fresh;
      });

    const exchangeForCookie = (token: string) =>
      Effect.gen(function* () {
        const loginUrl = yield* config.getLoginUrl(origin, token);
        const cookieName = yield* config.getCookieName(origin);

        const headers = yield* Effect.acquireUseRelease(
          transport.open(loginUrl, { followRedirects: false }),
          (connection) =>
            Effect.gen(function* () {
              const head = yield* connection.transmit('GET', Option.none());
              // Drain the body so the connection can be reclaimed.
              yield* connection.readBody();
              return head.headers;
            }),
          (connection) => connection.disconnect()
        ).pipe(
          Effect.mapError((error) => SessionExchangeError.fromCause(originLabel, error))
        );

        const selected = selectSessionCookie(headers, cookieName);
        if (Option.isNone(selected)) {
          return yield* Effect.fail(SessionExchangeError.noCookie(originLabel, cookieName));
        }
        const pair = selected.value;

        if (Cookie.parse(pair) === undefined) {
          return yield* Effect.fail(ProtocolError.malformedCookie(originLabel, pair));
        }

        yield* logger.logSessionEstablished(originLabel, cookieName);
        return new Session({ cookie: pair, token, origin });
      });

    const establish = Effect.gen(function* () {
      const current = yield* Ref.get(stateRef);
      if (current._tag === 'SessionEstablished') {
        return current.session;
      }

      if (yield* config.isTestModeOrigin(origin)) {
        const session = new Session({
          cookie: options.testModeCookie,
          token: options.testModeToken,
          origin,
        });
        yield* Ref.set(stateRef, SessionState.SessionEstablished({ session }));
        yield* logger.logTestMode(originLabel);
        return session;
      }

      yield* Ref.set(lastError, Option.none());
      yield* Ref.set(stateRef, SessionState.Unauthenticated());

      const token =
        authentication._tag === 'Interactive'
          ? yield* Effect.zipRight(
              logger.logSessionSetup(originLabel, 'interactive'),
              acquireFreshToken(authentication.account, authentication.interaction)
            )
          : yield* Effect.as(
              logger.logSessionSetup(originLabel, 'token_supplied'),
              authentication.token
            );
      yield* Ref.set(stateRef, SessionState.TokenAcquired({ token }));

      const session = yield* exchangeForCookie(token);
      yield* Ref.set(stateRef, SessionState.SessionEstablished({ session }));
      return session;
    }).pipe(
      Effect.tapError((error) =>
        Effect.all([
          Ref.set(stateRef, SessionState.Failed({ error })),
          Ref.set(lastError, Option.some(error.message)),
          logger.logSessionFailed(originLabel, error.message, error._tag),
        ])
      )
    );

    const setup = () => setupLock.withPermits(1)(establish);

    const service: SessionManagerService = {
      origin,

      setup,

      authenticate: (connection) =>
        Effect.flatMap(setup(), (session) =>
          connection.addRequestProperty('Cookie', session.cookie)
        ),

      token: () => Effect.map(setup(), (session) => session.token),

      errorMessage: () => Ref.get(lastError),

      state: () => Ref.get(stateRef),
    };
    return service;
  });
