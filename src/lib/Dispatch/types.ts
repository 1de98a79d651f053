import { Data } from 'effect';
import type { ClientResponse, HeaderMap } from '../Http/types.js';

/**
 * Receives the outcome of a background request.
 *
 * `reportProgress` is called zero or more times, in order, followed by exactly
 * one of `reportError` or `done`. Nothing is called after the terminal
 * notification.
 *
 * @group Interfaces
 * @public
 */
export interface RequestCallback {
  readonly reportProgress: (message: string) => void;
  readonly reportError: (reason: string) => void;
  readonly done: (status: number, headers: HeaderMap, body: Uint8Array) => void;
}

/**
 * What the worker fiber hands to the caller side.
 */
export type DispatchEvent = Data.TaggedEnum<{
  Progress: { readonly message: string };
  Failed: { readonly reason: string };
  Completed: { readonly response: ClientResponse };
}>;

export const DispatchEvent = Data.taggedEnum<DispatchEvent>();
