import { Data } from 'effect';

const describe = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

const AUTH_FAILED = 'Authentication failed';

/**
 * Low-level transport fault (connection refused, reset, aborted, unreadable body).
 * Raised by {@link Transport} implementations; callers of the executor see it
 * wrapped in a {@link TransportError} or {@link SessionExchangeError}.
 */
export class IOError extends Data.TaggedError('IOError')<{
  readonly url: string;
  readonly operation: 'open' | 'transmit' | 'read';
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(
    url: string,
    operation: 'open' | 'transmit' | 'read',
    cause: unknown
  ): IOError {
    return new IOError({ url, operation, cause, message: describe(cause) });
  }
}

/**
 * The credential provider could not supply an identity token.
 * Terminal for the setup call that raised it.
 */
export class CredentialError extends Data.TaggedError('CredentialError')<{
  readonly account: string;
  readonly reason: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(account: string, cause: unknown): CredentialError {
    const reason = describe(cause);
    return new CredentialError({
      account,
      reason,
      cause,
      message: `${AUTH_FAILED}: ${reason}`,
    });
  }

  static noToken(account: string): CredentialError {
    const reason = 'No authentication token was issued';
    return new CredentialError({
      account,
      reason,
      message: `${AUTH_FAILED}: ${reason}`,
    });
  }

  static noProvider(account: string): CredentialError {
    const reason = 'No credential provider is available';
    return new CredentialError({
      account,
      reason,
      message: `${AUTH_FAILED}: ${reason}`,
    });
  }
}

/**
 * Exchanging the identity token for a session cookie failed.
 */
export class SessionExchangeError extends Data.TaggedError(
  'SessionExchangeError'
)<{
  readonly origin: string;
  readonly reason: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static noCookie(origin: string, cookieName: string): SessionExchangeError {
    const reason = `No ${cookieName} cookie in login response`;
    return new SessionExchangeError({
      origin,
      reason,
      message: `${AUTH_FAILED}: ${reason}`,
    });
  }

  static fromCause(origin: string, cause: unknown): SessionExchangeError {
    const reason = describe(cause);
    return new SessionExchangeError({
      origin,
      reason,
      cause,
      message: `${AUTH_FAILED}: ${reason}`,
    });
  }
}

/**
 * The backend answered with something that could not be understood.
 */
export class ProtocolError extends Data.TaggedError('ProtocolError')<{
  readonly url: string;
  readonly expected: string;
  readonly received?: string;
  readonly message: string;
}> {
  static malformedCookie(url: string, received: string): ProtocolError {
    return new ProtocolError({
      url,
      expected: 'cookie pair',
      received,
      message: `${AUTH_FAILED}: Malformed session cookie from ${url}`,
    });
  }
}

/**
 * IO fault while performing a data request.
 */
export class TransportError extends Data.TaggedError('TransportError')<{
  readonly method: 'GET' | 'POST';
  readonly url: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromIO(method: 'GET' | 'POST', error: IOError): TransportError {
    return new TransportError({
      method,
      url: error.url,
      cause: error,
      message: `${method} failed: ${error.message}`,
    });
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends Data.TaggedError('ConfigurationError')<{
  readonly field: string;
  readonly value?: unknown;
  readonly reason: string;
  readonly message: string;
}> {
  static invalid(field: string, value: unknown, expected: string): ConfigurationError {
    const reason = `Expected ${expected}, got ${JSON.stringify(value)}`;
    return new ConfigurationError({
      field,
      value,
      reason,
      message: `Configuration error for '${field}': ${reason}`,
    });
  }
}

/**
 * A dispatcher instance was asked to run a second request.
 */
export class DispatcherReusedError extends Data.TaggedError(
  'DispatcherReusedError'
)<{
  readonly message: string;
}> {
  static make(): DispatcherReusedError {
    return new DispatcherReusedError({
      message: 'A dispatcher runs exactly one request; create a new one per call',
    });
  }
}

/**
 * Everything that can stop a session from being established.
 */
export type SessionFailure = CredentialError | SessionExchangeError | ProtocolError;

/**
 * Everything a data request can fail with.
 */
export type RequestFailure = SessionFailure | TransportError;
