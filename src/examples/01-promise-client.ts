/**
 * Example 01: Promise client against a development backend
 *
 * This example demonstrates:
 * - A token-supplied client, which never prompts
 * - Waiting GET and POST calls and errorMessage()
 * - A background GET with progress notifications
 *
 * Expects a development backend on the 192.168 network, which is served in
 * test mode without any login exchange. Set BACKEND_URL to point elsewhere.
 */

import { BackendClient } from '../index.js';

const backend = process.env.BACKEND_URL ?? 'http://192.168.0.10:8080';

const main = async () => {
  console.log('Example 01: Promise client');
  console.log(`Backend: ${backend}\n`);

  const client = BackendClient.withToken(backend, process.env.BACKEND_TOKEN ?? 'dev-token', {
    log: { logDir: './client-logs' },
  });

  try {
    const listing = await client.get(new URL('/api/items', backend), {
      Accept: 'application/json',
    });
    if (listing === null) {
      console.error(`GET failed: ${await client.errorMessage()}`);
    } else {
      console.log(`GET ${listing.status}: ${listing.text()}`);
    }

    const created = await client.post(
      new URL('/api/items', backend),
      { 'Content-Type': 'application/json' },
      new TextEncoder().encode(JSON.stringify({ name: 'example' }))
    );
    console.log(
      created === null
        ? `POST failed: ${await client.errorMessage()}`
        : `POST ${created.status}: ${created.text()}`
    );

    const background = await client.backgroundGet(new URL('/api/items', backend), {}, {
      reportProgress: (message) => console.log(`  … ${message}`),
      reportError: (reason) => console.error(`  background GET failed: ${reason}`),
      done: (status, _headers, body) =>
        console.log(`  background GET ${status} (${body.byteLength} bytes)`),
    });
    await background.completion;
  } finally {
    await client.dispose();
  }
};

main()
  .then(() => {
    console.log('\n✅ Example completed');
    process.exit(0);
  })
  .catch((error: unknown) => {
    console.error('\n❌ Example failed:', error);
    process.exit(1);
  });
