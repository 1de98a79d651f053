import { Effect, Either } from 'effect';
import type { RequestCallback } from '../../index.js';

/**
 * Run an Effect and return its result as a Promise
 */
export const runEffect = <A, E>(effect: Effect.Effect<A, E, never>): Promise<A> =>
  Effect.runPromise(effect);

/**
 * Run an Effect and return its outcome as an Either
 */
export const runEffectEither = <A, E>(
  effect: Effect.Effect<A, E, never>
): Promise<Either.Either<A, E>> => Effect.runPromise(Effect.either(effect));

export const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

export const decode = (body: Uint8Array): string => new TextDecoder().decode(body);

/**
 * A callback that records every notification as one line, in arrival order.
 */
export const recordingCallback = (): RequestCallback & { readonly received: string[] } => {
  const received: string[] = [];
  return {
    received,
    reportProgress: (message) => {
      received.push(`progress ${message}`);
    },
    reportError: (reason) => {
      received.push(`error ${reason}`);
    },
    done: (status, _headers, body) => {
      received.push(`done ${status} ${decode(body)}`);
    },
  };
};
