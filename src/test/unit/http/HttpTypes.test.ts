import { describe, expect, it } from 'vitest';
import { Option } from 'effect';
import {
  ClientRequest,
  ClientResponse,
  headerValues,
  methodOf,
  toHeaderMap,
} from '../../../lib/Http/types.js';
import { bytes } from '../../utils/test-helpers.js';

describe('Http types', () => {
  it('should report the method of each request variant', () => {
    const uri = new URL('https://api.example.com/items');

    expect(methodOf(ClientRequest.Get({ uri, headers: {} }))).toBe('GET');
    expect(methodOf(ClientRequest.Post({ uri, headers: {}, body: bytes('x') }))).toBe('POST');
  });

  it('should collect header values case-insensitively in order', () => {
    const headers = { 'Set-Cookie': ['A=1'], 'set-cookie': ['B=2', 'C=3'], Other: ['x'] };

    expect(headerValues(headers, 'SET-COOKIE')).toEqual(['A=1', 'B=2', 'C=3']);
    expect(headerValues(headers, 'missing')).toEqual([]);
  });

  it('should normalise single values and lists into a header map', () => {
    expect(toHeaderMap({ Accept: 'text/plain', 'X-Trace': ['a', 'b'] })).toEqual({
      Accept: ['text/plain'],
      'X-Trace': ['a', 'b'],
    });
    expect(toHeaderMap()).toEqual({});
  });

  it('should decode the body and look up headers of a response', () => {
    const response = new ClientResponse({
      status: 200,
      headers: { 'Content-Type': ['text/plain; charset=utf-8'] },
      body: bytes('héllo'),
    });

    expect(response.text()).toBe('héllo');
    expect(response.header('content-type')).toEqual(Option.some('text/plain; charset=utf-8'));
    expect(response.header('etag')).toEqual(Option.none());
  });
});
