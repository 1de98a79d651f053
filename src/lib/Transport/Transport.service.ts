/**
 * Transport Service
 * Opens one HTTP(S) connection per exchange. The live implementation is built
 * on the global fetch; tests substitute an in-process transport.
 */

import { Context, Effect, Layer, Option } from 'effect';
import { ClientConfig } from '../Config/ClientConfig.service.js';
import { IOError } from '../errors.js';
import type { HeaderMap, HttpMethod } from '../Http/types.js';

/**
 * Status line and headers of a response, available once the request has been
 * transmitted. The body is read separately through {@link Connection.readBody}.
 */
export interface ResponseHead {
  readonly status: number;
  readonly headers: HeaderMap;
}

export interface OpenOptions {
  /** Follow 3xx responses (default: true) */
  readonly followRedirects?: boolean;
}

/**
 * A single outbound exchange. Lifecycle: add headers, optionally declare a
 * fixed body length, transmit, read the body, disconnect.
 */
export interface Connection {
  readonly url: URL;

  /**
   * Add a request header. Repeated names keep every value, in order.
   */
  readonly addRequestProperty: (name: string, value: string) => Effect.Effect<void>;

  /**
   * Declare the exact number of body bytes that {@link transmit} will send.
   */
  readonly setFixedLengthStreamingMode: (length: number) => Effect.Effect<void>;

  /**
   * Send the request, including the whole body, and wait for the response head.
   */
  readonly transmit: (
    method: HttpMethod,
    body: Option.Option<Uint8Array>
  ) => Effect.Effect<ResponseHead, IOError>;

  /**
   * Read the response body to its end.
   */
  readonly readBody: () => Effect.Effect<Uint8Array, IOError>;

  /**
   * Release the connection and everything it holds. Idempotent.
   */
  readonly disconnect: () => Effect.Effect<void>;
}

export interface TransportService {
  readonly open: (
    url: URL,
    options?: OpenOptions
  ) => Effect.Effect<Connection, IOError>;
}

export class Transport extends Context.Tag('Transport')<
  Transport,
  TransportService
>() {}

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Convert fetch headers into a multimap. `Set-Cookie` keeps one entry per
 * header line; other repeated headers arrive already joined by fetch.
 */
export const readFetchHeaders = (headers: Headers): HeaderMap => {
  const map: Record<string, string[]> = {};
  headers.forEach((value, name) => {
    if (name === 'set-cookie') return;
    (map[name] ??= []).push(value);
  });
  const cookies = headers.getSetCookie();
  if (cookies.length > 0) {
    map['set-cookie'] = cookies;
  }
  return map;
};

const makeFetchConnection = (
  url: URL,
  followRedirects: boolean,
  timeoutMs: number
): Connection => {
  const headers = new Headers();
  const controller = new AbortController();
  let declaredLength: Option.Option<number> = Option.none();
  let response: Response | undefined;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  let released = false;

  const clearTimer = () => {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
      timeoutId = undefined;
    }
  };

  return {
    url,

    addRequestProperty: (name, value) =>
      Effect.sync(() => headers.append(name, value)),

    setFixedLengthStreamingMode: (length) =>
      Effect.sync(() => {
        declaredLength = Option.some(length);
      }),

    transmit: (method, body) =>
      Effect.gen(function* () {
        if (Option.isSome(body) && Option.isSome(declaredLength)) {
          const expected = declaredLength.value;
          if (body.value.byteLength !== expected) {
            return yield* Effect.fail(
              IOError.fromCause(
                url.href,
                'transmit',
                `expected ${expected} body bytes, got ${body.value.byteLength}`
              )
            );
          }
        }

        const resp = yield* Effect.tryPromise({
          try: () => {
            timeoutId = setTimeout(
              () => controller.abort(new Error(`Timed out after ${timeoutMs}ms`)),
              timeoutMs
            );
            // A Uint8Array body has a known size, so fetch sends a fixed
            // Content-Length rather than chunked encoding.
            return fetch(url, {
              method,
              headers,
              body: Option.getOrUndefined(body),
              redirect: followRedirects ? 'follow' : 'manual',
              signal: controller.signal,
            });
          },
          catch: (error) => IOError.fromCause(url.href, 'transmit', error),
        });

        response = resp;
        return { status: resp.status, headers: readFetchHeaders(resp.headers) };
      }),

    readBody: () => {
      const current = response;
      if (current === undefined) {
        return Effect.fail(
          IOError.fromCause(url.href, 'read', 'no response has been received')
        );
      }
      return Effect.tryPromise({
        try: async () => new Uint8Array(await current.arrayBuffer()),
        catch: (error) => IOError.fromCause(url.href, 'read', error),
      });
    },

    disconnect: () =>
      Effect.sync(() => {
        clearTimer();
        if (!released) {
          released = true;
          // Aborting drops any unread body and frees the socket.
          controller.abort();
        }
      }),
  };
};

/**
 * Create a fetch-based Transport
 */
export const makeFetchTransport = Effect.gen(function* () {
  const config = yield* ClientConfig;
  const timeoutMs = yield* config.getRequestTimeout();

  const service: TransportService = {
    open: (url, options = {}) =>
      SUPPORTED_PROTOCOLS.has(url.protocol)
        ? Effect.sync(() =>
            makeFetchConnection(url, options.followRedirects ?? true, timeoutMs)
          )
        : Effect.fail(
            IOError.fromCause(url.href, 'open', `unsupported protocol ${url.protocol}`)
          ),
  };
  return service;
});

/**
 * Fetch Transport Layer
 */
export const FetchTransportLive = Layer.effect(Transport, makeFetchTransport);
