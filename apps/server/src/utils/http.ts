/**
 * HTTP helpers for talking to Plex and plex.tv
 *
 * Every request carries a timeout. Connection failures and timeouts surface as
 * UpstreamUnreachableError, non-2xx responses as UpstreamError with the
 * upstream status, so callers can tell the two apart.
 */

import { TIMEOUTS } from '@streamclip/shared';
import { UpstreamError, UpstreamUnreachableError } from './errors.js';

const CLIENT_IDENTIFIER = 'streamclip';
const PRODUCT_NAME = 'Streamclip';
const PRODUCT_VERSION = '1.0.0';

export interface FetchOptions {
  method?: 'GET' | 'POST' | 'DELETE';
  headers?: Record<string, string>;
  body?: string | URLSearchParams;
  /** Service name used in error messages (e.g. 'plex', 'plex.tv') */
  service: string;
  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * Headers for Plex Media Server and plex.tv requests
 */
export function plexHeaders(token?: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: 'application/json',
    'X-Plex-Client-Identifier': CLIENT_IDENTIFIER,
    'X-Plex-Product': PRODUCT_NAME,
    'X-Plex-Version': PRODUCT_VERSION,
  };
  if (token) {
    headers['X-Plex-Token'] = token;
  }
  return headers;
}

/**
 * AbortSignal.timeout rejects with a DOMException named TimeoutError
 */
function isAbort(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) return false;
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

async function request(url: string, options: FetchOptions): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: options.method ?? 'GET',
      headers: options.headers,
      body: options.body,
      signal: AbortSignal.timeout(options.timeout ?? TIMEOUTS.PLEX_REQUEST_MS),
    });
  } catch (error) {
    throw new UpstreamUnreachableError(options.service, error);
  }

  if (!response.ok) {
    throw new UpstreamError(options.service, response.status, response.statusText);
  }

  return response;
}

/**
 * Fetch and parse a JSON document
 */
export async function fetchJson(url: string, options: FetchOptions): Promise<unknown> {
  const response = await request(url, options);
  try {
    const data: unknown = await response.json();
    return data;
  } catch (error) {
    // The request timeout also covers reading the body
    if (isAbort(error)) {
      throw new UpstreamUnreachableError(options.service, error);
    }
    throw new UpstreamError(options.service, 502, 'Invalid JSON response');
  }
}

