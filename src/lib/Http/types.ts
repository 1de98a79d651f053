/**
 * Request and response values exchanged with the backend.
 * Using Effect's Data module for immutability and structural equality.
 */

import { Data, Option } from 'effect';

/**
 * Header multimap: header name to its values, in the order they were sent or
 * received.
 *
 * @group Data Types
 * @public
 */
export type HeaderMap = Readonly<Record<string, ReadonlyArray<string>>>;

/**
 * A single data request. Only `Post` carries a body.
 *
 * @example
 * ```typescript
 * const get = ClientRequest.Get({ uri: new URL('https://my-app.example.com/items'), headers: {} });
 * const post = ClientRequest.Post({
 *   uri: new URL('https://my-app.example.com/items'),
 *   headers: { 'Content-Type': ['application/json'] },
 *   body: new TextEncoder().encode('{"name":"a"}'),
 * });
 * ```
 *
 * @group Data Types
 * @public
 */
export type ClientRequest = Data.TaggedEnum<{
  Get: {
    readonly uri: URL;
    readonly headers: HeaderMap;
  };
  Post: {
    readonly uri: URL;
    readonly headers: HeaderMap;
    readonly body: Uint8Array;
  };
}>;

export const ClientRequest = Data.taggedEnum<ClientRequest>();

export type HttpMethod = 'GET' | 'POST';

export const methodOf: (request: ClientRequest) => HttpMethod = ClientRequest.$match({
  Get: () => 'GET' as const,
  Post: () => 'POST' as const,
});

/**
 * Response to a data request, exactly as received. Any HTTP status,
 * 4xx and 5xx included, is a response rather than a failure.
 *
 * @group Data Types
 * @public
 */
export class ClientResponse extends Data.Class<{
  /** HTTP status code */
  readonly status: number;
  /** All response headers */
  readonly headers: HeaderMap;
  /** The full response body */
  readonly body: Uint8Array;
}> {
  /**
   * Decode the body as UTF-8 text
   */
  text(): string {
    return new TextDecoder().decode(this.body);
  }

  /**
   * First value of a header, matched case-insensitively
   */
  header(name: string): Option.Option<string> {
    return Option.fromNullable(headerValues(this.headers, name)[0]);
  }
}

/**
 * All values of a header, matched case-insensitively, in order.
 */
export const headerValues = (
  headers: HeaderMap,
  name: string
): ReadonlyArray<string> => {
  const wanted = name.toLowerCase();
  return Object.entries(headers)
    .filter(([key]) => key.toLowerCase() === wanted)
    .flatMap(([, values]) => values);
};

/**
 * Normalise the loose header shapes callers pass (single strings or lists,
 * possibly absent) into a {@link HeaderMap}.
 */
export const toHeaderMap = (
  headers?: Readonly<Record<string, string | ReadonlyArray<string>>>
): HeaderMap => {
  const map: Record<string, ReadonlyArray<string>> = {};
  for (const [name, value] of Object.entries(headers ?? {})) {
    map[name] = typeof value === 'string' ? [value] : [...value];
  }
  return map;
};
