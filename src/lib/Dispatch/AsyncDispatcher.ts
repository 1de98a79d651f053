/**
 * Async Dispatcher
 * Runs one request in the background and relays its progress and outcome to a
 * {@link RequestCallback}.
 */

import { Cause, Effect, Exit, Fiber, Option, Queue, Ref } from 'effect';
import { DispatcherReusedError } from '../errors.js';
import { type ClientRequest, type HttpMethod, methodOf } from '../Http/types.js';
import { ClientLogger } from '../Logging/ClientLogger.service.js';
import { RequestExecutor } from '../Executor/RequestExecutor.service.js';
import { DispatchEvent, type RequestCallback } from './types.js';

export interface DispatchHandle {
  readonly id: string;
  /** Completes after the terminal notification has been delivered */
  readonly await: Effect.Effect<void>;
}

export interface AsyncDispatcher {
  /**
   * Start the request on a background fiber and return immediately.
   *
   * The worker never touches the callback: progress and the outcome travel
   * through a queue that a caller-side fiber drains in order. Fails with
   * {@link DispatcherReusedError} if this dispatcher has already launched.
   */
  readonly launch: (
    request: ClientRequest,
    callback: RequestCallback
  ) => Effect.Effect<DispatchHandle, DispatcherReusedError>;

  /**
   * Use up this dispatcher on a request that could not be built. The callback
   * receives `reportError` with `reason` as its only notification.
   */
  readonly refuse: (
    method: HttpMethod,
    target: string,
    reason: string,
    callback: RequestCallback
  ) => Effect.Effect<DispatchHandle, DispatcherReusedError>;
}

let dispatchCounter = 0;

const nextDispatchId = (): string => {
  dispatchCounter += 1;
  return `dispatch-${Date.now().toString(36)}-${dispatchCounter}`;
};

const failureReason = (cause: Cause.Cause<{ readonly message: string }>): string =>
  Option.match(Cause.failureOption(cause), {
    onNone: () => Cause.pretty(cause),
    onSome: (error) => error.message,
  });

/**
 * Create a single-use dispatcher. Build a new one for every background call.
 */
export const makeAsyncDispatcher = Effect.gen(function* () {
  const executor = yield* RequestExecutor;
  const logger = yield* ClientLogger;
  const launched = yield* Ref.make(false);

  const begin = (method: HttpMethod, target: string) =>
    Effect.gen(function* () {
      if (yield* Ref.getAndSet(launched, true)) {
        return yield* Effect.fail(DispatcherReusedError.make());
      }

      const id = nextDispatchId();
      const events = yield* Queue.unbounded<DispatchEvent>();
      yield* logger.logDispatch(id, 'launch', { method, url: target });
      return { id, events };
    });

  const relayTo = (
    id: string,
    events: Queue.Queue<DispatchEvent>,
    callback: RequestCallback
  ) =>
    Effect.gen(function* () {
      // A throwing callback is logged and does not stop the relay.
      const deliver = (
        notification: 'reportProgress' | 'reportError' | 'done',
        invoke: () => void
      ) =>
        Effect.try({ try: invoke, catch: (error) => error }).pipe(
          Effect.catchAll((error) => logger.logCallbackError(id, notification, error))
        );

      const relay = Effect.gen(function* () {
        while (true) {
          const event = yield* Queue.take(events);
          switch (event._tag) {
            case 'Progress':
              yield* deliver('reportProgress', () =>
                callback.reportProgress(event.message)
              );
              break;
            case 'Failed':
              yield* deliver('reportError', () => callback.reportError(event.reason));
              yield* logger.logDispatch(id, 'complete', { outcome: 'error' });
              return;
            case 'Completed': {
              const { response } = event;
              yield* deliver('done', () =>
                callback.done(response.status, response.headers, response.body)
              );
              yield* logger.logDispatch(id, 'complete', {
                outcome: 'done',
                status: response.status,
              });
              return;
            }
          }
        }
      });

      const relayFiber = yield* Effect.forkDaemon(relay);
      const handle: DispatchHandle = {
        id,
        await: Fiber.join(relayFiber),
      };
      return handle;
    });

  const dispatcher: AsyncDispatcher = {
    launch: (request, callback) =>
      Effect.gen(function* () {
        const { id, events } = yield* begin(methodOf(request), request.uri.href);

        const worker = Effect.gen(function* () {
          const outcome = yield* Effect.exit(
            executor.execute(request, (message) =>
              Effect.asVoid(Queue.offer(events, DispatchEvent.Progress({ message })))
            )
          );
          yield* Queue.offer(
            events,
            Exit.match(outcome, {
              onFailure: (cause) => DispatchEvent.Failed({ reason: failureReason(cause) }),
              onSuccess: (response) => DispatchEvent.Completed({ response }),
            })
          );
        });

        yield* Effect.forkDaemon(worker);
        return yield* relayTo(id, events, callback);
      }),

    refuse: (method, target, reason, callback) =>
      Effect.gen(function* () {
        const { id, events } = yield* begin(method, target);
        yield* Queue.offer(events, DispatchEvent.Failed({ reason }));
        return yield* relayTo(id, events, callback);
      }),
  };
  return dispatcher;
});
