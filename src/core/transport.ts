/**
 * HTTP transport used to probe and download shared files.
 *
 * The interface is the seam for injecting another HTTP client; the default
 * implementation uses the global fetch available in Node.js.
 */

import { getRequestTimeout } from './config';
import { TransportError } from './errors';

// ============================================================================
// Types
// ============================================================================

/**
 * Response of a HEAD request.
 */
export interface TransportResponse {
  status: number;
}

/**
 * Response of a GET request. The body is only read for status 200.
 */
export interface TransportBodyResponse extends TransportResponse {
  body: Uint8Array;
}

/**
 * Shared interface for HTTP implementations.
 */
export interface HttpTransport {
  /** Header-only request */
  head(url: string): Promise<TransportResponse>;
  /** Full request including the body */
  get(url: string): Promise<TransportBodyResponse>;
}

export interface FetchTransportOptions {
  /** Timeout in milliseconds; defaults to the configured request timeout */
  timeout?: number;
}

// ============================================================================
// Fetch with Timeout
// ============================================================================

/**
 * Fetch with timeout support.
 *
 * @throws TransportError with a null status on timeout or network failure
 */
async function fetchWithTimeout(url: string, method: 'HEAD' | 'GET', timeout: number): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    return await fetch(url, {
      method,
      signal: controller.signal,
      redirect: 'follow',
    });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new TransportError(null, `${method} timed out after ${timeout}ms`, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new TransportError(null, `${method} failed: ${message}`, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Create a transport backed by the global fetch.
 */
export function createFetchTransport(options: FetchTransportOptions = {}): HttpTransport {
  const timeoutFor = (): number => options.timeout ?? getRequestTimeout();

  return {
    async head(url: string): Promise<TransportResponse> {
      const response = await fetchWithTimeout(url, 'HEAD', timeoutFor());
      return { status: response.status };
    },

    async get(url: string): Promise<TransportBodyResponse> {
      const response = await fetchWithTimeout(url, 'GET', timeoutFor());
      if (response.status !== 200) {
        await response.body?.cancel();
        return { status: response.status, body: new Uint8Array() };
      }
      const arrayBuffer = await response.arrayBuffer();
      return { status: response.status, body: new Uint8Array(arrayBuffer) };
    },
  };
}
