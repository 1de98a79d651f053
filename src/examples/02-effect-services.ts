/**
 * Example 02: Effect services with an interactive credential provider
 *
 * This example demonstrates:
 * - Wiring SessionManager and RequestExecutor layers by hand
 * - A credential provider that reads tokens from the environment
 * - Inspecting the session state after setup
 *
 * Set BACKEND_URL and ACCOUNT_TOKEN before running against a real backend.
 */

import { Effect, Layer } from 'effect';
import {
  Account,
  Authentication,
  ClientConfig,
  ClientLoggerLive,
  CredentialProvider,
  type CredentialProviderService,
  FetchTransportLive,
  RequestExecutor,
  RequestExecutorLive,
  SessionManager,
} from '../index.js';

const backend = new URL(process.env.BACKEND_URL ?? 'https://my-app.example.com');
const account = new Account({ name: 'user@example.com', type: 'com.example' });

const environmentProvider: CredentialProviderService = {
  requestToken: async () => process.env.ACCOUNT_TOKEN,
  invalidateToken: (accountType, token) =>
    console.log(`Invalidating ${accountType} token ending in ${token.slice(-4)}`),
};

const program = Effect.gen(function* () {
  console.log('Example 02: Effect services');
  console.log(`Backend: ${backend.href}\n`);

  const sessions = yield* SessionManager;
  const session = yield* sessions.setup();
  console.log(`Session cookie: ${session.cookie.split('=')[0]}`);

  const state = yield* sessions.state();
  console.log(`State: ${state._tag}`);

  const executor = yield* RequestExecutor;
  const response = yield* executor.get(new URL('/api/profile', backend));
  console.log(`GET /api/profile -> ${response.status}`);
  return response.status;
});

const services = RequestExecutorLive.pipe(
  Layer.provideMerge(
    SessionManager.layer(backend, Authentication.Interactive({ account }))
  ),
  Layer.provideMerge(FetchTransportLive),
  Layer.provideMerge(
    Layer.mergeAll(
      ClientConfig.Default,
      ClientLoggerLive,
      Layer.succeed(CredentialProvider, environmentProvider)
    )
  )
);

Effect.runPromise(program.pipe(Effect.provide(services)))
  .then((status) => {
    console.log(`\n✅ Example completed with status ${status}`);
    process.exit(0);
  })
  .catch((error: unknown) => {
    console.error('\n❌ Example failed:', error);
    process.exit(1);
  });
