/**
 * BackendClient Tests
 * The Promise API over the in-memory transport
 */

import { describe, expect, it, vi } from 'vitest';
import { BackendClient } from '../../../lib/Client/BackendClient.js';
import { Account } from '../../../lib/Credentials/CredentialProvider.js';
import {
  type ClientLogEvent,
  makeClientLogger,
} from '../../../lib/Logging/ClientLogger.service.js';
import { InMemoryTransport } from '../../helpers/InMemoryTransport.js';
import { ScriptedCredentialProvider } from '../../helpers/ScriptedCredentialProvider.js';
import { bytes, recordingCallback } from '../../utils/test-helpers.js';

const TEST_ORIGIN = 'http://192.168.0.5:8080';

const quietLogger = (events: ClientLogEvent[] = []) =>
  makeClientLogger({ consoleTypes: [], sink: (event) => events.push(event) });

describe('BackendClient', () => {
  it('should resolve a GET with the full response', async () => {
    const transport = new InMemoryTransport().respond(
      200,
      { 'content-type': ['application/json'] },
      '{"items":[]}'
    );
    const client = BackendClient.withToken(TEST_ORIGIN, 'tok', {
      transport,
      logger: quietLogger(),
    });

    const response = await client.get(`${TEST_ORIGIN}/items`, { Accept: 'application/json' });

    expect(response?.status).toBe(200);
    expect(response?.text()).toBe('{"items":[]}');
    expect(await client.errorMessage()).toBeNull();
    expect(transport.exchanges[0]?.headers).toEqual([
      ['Cookie', 'Testing=TRUE'],
      ['Accept', 'application/json'],
    ]);
    await client.dispose();
  });

  it('should resolve null and keep the reason when a request fails', async () => {
    const transport = new InMemoryTransport().failOn('open', 'connection refused');
    const client = BackendClient.withToken(TEST_ORIGIN, 'tok', {
      transport,
      logger: quietLogger(),
    });

    const response = await client.post(`${TEST_ORIGIN}/items`, {}, bytes('x'));

    expect(response).toBeNull();
    expect(await client.errorMessage()).toBe('POST failed: connection refused');
    await client.dispose();
  });

  it('should clear the reason after a later success', async () => {
    const transport = new InMemoryTransport()
      .failOn('transmit', 'broken pipe')
      .respond(200, {}, 'ok');
    const client = BackendClient.withToken(TEST_ORIGIN, 'tok', {
      transport,
      logger: quietLogger(),
    });

    expect(await client.get(`${TEST_ORIGIN}/a`)).toBeNull();
    expect(await client.errorMessage()).toBe('GET failed: broken pipe');
    expect((await client.get(`${TEST_ORIGIN}/b`))?.status).toBe(200);
    expect(await client.errorMessage()).toBeNull();
    await client.dispose();
  });

  it('should hand out the refreshed token of an interactive session', async () => {
    const provider = new ScriptedCredentialProvider('stale-token', 'fresh-token');
    const transport = new InMemoryTransport().respond(302, {
      'set-cookie': ['SACSID=s1; Secure'],
    });
    const client = BackendClient.interactive(
      'https://app.example.com',
      new Account({ name: 'user@example.com', type: 'com.example' }),
      provider,
      { transport, logger: quietLogger() }
    );

    expect(await client.token()).toBe('fresh-token');
    expect(provider.calls).toEqual([
      'request user@example.com ah',
      'invalidate com.example stale-token',
      'request user@example.com ah',
    ]);
    await client.dispose();
  });

  it('should resolve a null token and keep the reason when setup fails', async () => {
    const provider = new ScriptedCredentialProvider(undefined);
    const client = BackendClient.interactive(
      'https://app.example.com',
      new Account({ name: 'user@example.com', type: 'com.example' }),
      provider,
      { transport: new InMemoryTransport(), logger: quietLogger() }
    );

    expect(await client.token()).toBeNull();
    expect(await client.errorMessage()).toBe(
      'Authentication failed: No authentication token was issued'
    );
    await client.dispose();
  });

  it('should resolve null for a URL that cannot be parsed', async () => {
    const transport = new InMemoryTransport();
    const client = BackendClient.withToken(TEST_ORIGIN, 'tok', {
      transport,
      logger: quietLogger(),
    });

    expect(await client.get('not a url')).toBeNull();
    expect(await client.errorMessage()).toBe('GET failed: Invalid URL');
    expect(await client.post('not a url', {}, bytes('abc'))).toBeNull();
    expect(await client.errorMessage()).toBe('POST failed: Invalid URL');
    expect(transport.openCount).toBe(0);
    await client.dispose();
  });

  it('should run a background POST to completion', async () => {
    const transport = new InMemoryTransport().respond(201, {}, 'saved');
    const events: ClientLogEvent[] = [];
    const client = BackendClient.withToken(TEST_ORIGIN, 'tok', {
      transport,
      logger: quietLogger(events),
    });
    const callback = recordingCallback();

    const request = await client.backgroundPost(
      `${TEST_ORIGIN}/items`,
      { 'Content-Type': 'text/plain' },
      bytes('abc'),
      callback
    );
    await request.completion;

    expect(callback.received).toEqual([
      'progress sending request',
      'progress sent 3 bytes',
      'progress receiving response',
      'progress received 5 bytes',
      'done 201 saved',
    ]);
    expect(events.find((event) => event.type === 'dispatch_launch')?.dispatchId).toBe(
      request.id
    );
    await client.dispose();
  });

  it('should run a background GET that fails with one error notification', async () => {
    const transport = new InMemoryTransport().failOn('read', 'stream truncated');
    const client = BackendClient.withToken(TEST_ORIGIN, 'tok', {
      transport,
      logger: quietLogger(),
    });
    const callback = recordingCallback();

    const request = await client.backgroundGet(`${TEST_ORIGIN}/items`, {}, callback);
    await request.completion;

    expect(callback.received).toEqual([
      'progress sending request',
      'progress receiving response',
      'error GET failed: stream truncated',
    ]);
    await client.dispose();
  });

  it('should report an unparseable background URL through the callback', async () => {
    const transport = new InMemoryTransport();
    const events: ClientLogEvent[] = [];
    const client = BackendClient.withToken(TEST_ORIGIN, 'tok', {
      transport,
      logger: quietLogger(events),
    });
    const callback = recordingCallback();

    const request = await client.backgroundGet('not a url', {}, callback);
    await request.completion;

    expect(callback.received).toEqual(['error GET failed: Invalid URL']);
    expect(transport.openCount).toBe(0);
    expect(
      events.filter((event) => event.dispatchId === request.id).map((event) => event.type)
    ).toEqual(['dispatch_launch', 'dispatch_complete']);
    await client.dispose();
  });

  describe('when the log sink throws', () => {
    const failingLogger = () =>
      makeClientLogger({
        consoleTypes: [],
        sink: () => {
          throw new Error('sink down');
        },
      });

    it('should still resolve a GET', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const client = BackendClient.withToken(TEST_ORIGIN, 'tok', {
        transport: new InMemoryTransport().respond(200, {}, 'ok'),
        logger: failingLogger(),
      });

      const response = await client.get(`${TEST_ORIGIN}/items`);

      expect(response?.status).toBe(200);
      expect(response?.text()).toBe('ok');
      expect(await client.errorMessage()).toBeNull();
      await client.dispose();
    });

    it('should still deliver every background notification', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const client = BackendClient.withToken(TEST_ORIGIN, 'tok', {
        transport: new InMemoryTransport().respond(200, {}, 'ok'),
        logger: failingLogger(),
      });
      const callback = recordingCallback();

      const request = await client.backgroundGet(`${TEST_ORIGIN}/items`, {}, callback);
      await request.completion;

      expect(callback.received).toEqual([
        'progress sending request',
        'progress receiving response',
        'progress received 2 bytes',
        'done 200 ok',
      ]);
      await client.dispose();
    });
  });

  it('should throw for invalid configuration', () => {
    expect(() =>
      BackendClient.withToken(TEST_ORIGIN, 'tok', { config: { requestTimeoutMs: 0 } })
    ).toThrow("Configuration error for 'requestTimeoutMs': Expected a positive integer, got 0");
  });
});
