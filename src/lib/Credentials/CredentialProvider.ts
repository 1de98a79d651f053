/**
 * Credential Provider boundary
 * The platform component that holds the user's identity and issues tokens.
 */

import { Context, Data } from 'effect';

/**
 * An account known to the credential provider.
 *
 * @group Data Types
 * @public
 */
export class Account extends Data.Class<{
  /** Account identifier, e.g. an email address */
  readonly name: string;
  /** Provider-specific account type */
  readonly type: string;
}> {}

/**
 * What the session manager asks the provider for.
 */
export interface TokenRequest {
  readonly account: Account;
  /** Token type (scope) the backend accepts */
  readonly tokenType: string;
  /**
   * Host-specific handle the provider may use to prompt the user, such as a
   * window or terminal. Absent when prompting is impossible.
   */
  readonly interaction?: unknown;
}

/**
 * Platform credential provider.
 *
 * `requestToken` may take arbitrarily long (the provider can prompt a human)
 * and may settle from any context. A resolved `undefined` means the provider
 * finished without issuing a token.
 *
 * @example
 * ```typescript
 * const provider: CredentialProviderService = {
 *   requestToken: ({ account }) => keychain.tokenFor(account.name),
 *   invalidateToken: (accountType, token) => keychain.forget(accountType, token),
 * };
 * ```
 *
 * @group Services
 * @public
 */
export interface CredentialProviderService {
  readonly requestToken: (request: TokenRequest) => Promise<string | undefined>;
  /** Fire-and-forget: drop a cached token so the next request issues a fresh one */
  readonly invalidateToken: (accountType: string, token: string) => void;
}

export class CredentialProvider extends Context.Tag('CredentialProvider')<
  CredentialProvider,
  CredentialProviderService
>() {}
