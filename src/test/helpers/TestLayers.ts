import { Effect, Layer } from 'effect';
import {
  ClientConfig,
  type ClientConfigOptions,
} from '../../lib/Config/ClientConfig.service.js';
import { CredentialProvider } from '../../lib/Credentials/CredentialProvider.js';
import {
  RequestExecutor,
  RequestExecutorLive,
} from '../../lib/Executor/RequestExecutor.service.js';
import {
  type ClientLogEvent,
  ClientLogger,
  makeClientLogger,
} from '../../lib/Logging/ClientLogger.service.js';
import {
  type Authentication,
  SessionManager,
} from '../../lib/Session/SessionManager.service.js';
import { Transport } from '../../lib/Transport/Transport.service.js';
import { InMemoryTransport } from './InMemoryTransport.js';
import { ScriptedCredentialProvider } from './ScriptedCredentialProvider.js';

export type TestServices = RequestExecutor | SessionManager | ClientLogger | Transport;

export interface Harness {
  readonly transport: InMemoryTransport;
  readonly provider: ScriptedCredentialProvider;
  readonly events: ClientLogEvent[];
  readonly run: <A, E>(effect: Effect.Effect<A, E, TestServices>) => Promise<A>;
}

export interface HarnessOptions {
  readonly provider?: ScriptedCredentialProvider | null;
  readonly config?: Partial<ClientConfigOptions>;
}

/**
 * Wire the session and executor services to an in-memory transport, a
 * scripted credential provider and a logger that records every event.
 * `provider: null` leaves the credential provider out of the context.
 */
export const makeHarness = (
  origin: string,
  authentication: Authentication,
  options: HarnessOptions = {}
): Harness => {
  const transport = new InMemoryTransport();
  const provider = options.provider ?? new ScriptedCredentialProvider();
  const events: ClientLogEvent[] = [];
  const logger = makeClientLogger({ consoleTypes: [], sink: (event) => events.push(event) });

  const credentials: Layer.Layer<never> =
    options.provider === null ? Layer.empty : Layer.succeed(CredentialProvider, provider);

  const layer = RequestExecutorLive.pipe(
    Layer.provideMerge(SessionManager.layer(new URL(origin), authentication)),
    Layer.provideMerge(
      Layer.mergeAll(
        ClientConfig.Live(options.config ?? {}),
        Layer.succeed(Transport, transport),
        Layer.succeed(ClientLogger, logger),
        credentials
      )
    )
  );

  return {
    transport,
    provider,
    events,
    run: (effect) => Effect.runPromise(Effect.provide(effect, layer)),
  };
};
