/**
 * Probing and downloading shared files.
 *
 * Fetching Strategy:
 * 1. Probe with a HEAD request when the caller only wants reachability
 * 2. Download with a GET request and stage the body under a unique key
 * 3. Hand back a StagedResource whose release deletes the staged bytes
 */

import { debugLog } from './config';
import { TransportError } from './errors';
import type { StagingStore } from './staging';
import type { HttpTransport } from './transport';

// ============================================================================
// Types
// ============================================================================

/**
 * Downloaded bytes held in a staging store until released.
 */
export interface StagedResource {
  /** Staging key, derived from the file ID */
  readonly key: string;
  /** Store location of the staged bytes */
  readonly location: string;
  /** Read the staged bytes as UTF-8 text */
  readText(): Promise<string>;
  /** Delete the staged bytes. Only the first call does anything. */
  release(): Promise<void>;
}

export interface FetchCollaborators {
  transport: HttpTransport;
  store: StagingStore;
}

// ============================================================================
// Staging Keys
// ============================================================================

/** Counter for generating unique staging keys */
let stagingCounter = 0;

/**
 * Build a staging key unique to this call.
 * Concurrent downloads of the same file never share a key.
 */
export function createStagingKey(resourceId: string): string {
  return `${resourceId}-${Date.now()}-${stagingCounter++}`;
}

// ============================================================================
// Probe
// ============================================================================

/**
 * Check whether a download URL answers with status 200.
 * Transport failures are logged and reported as `false`.
 */
export async function isAccessible(url: string, transport: HttpTransport): Promise<boolean> {
  try {
    const response = await transport.head(url);
    debugLog('Fetcher', `HEAD ${url} -> ${response.status}`);
    return response.status === 200;
  } catch (error) {
    console.warn(`[Fetcher] Probe failed for ${url}:`, error);
    return false;
  }
}

// ============================================================================
// Download & Stage
// ============================================================================

/**
 * Download a file and stage its bytes.
 *
 * @param url - Direct download URL
 * @param resourceId - File ID the staging key is derived from
 * @returns Handle to the staged bytes; the caller must release it
 * @throws TransportError when the response status is not 200
 */
export async function fetchAndStage(
  url: string,
  resourceId: string,
  { transport, store }: FetchCollaborators
): Promise<StagedResource> {
  const key = createStagingKey(resourceId);

  if (await store.exists(key)) {
    await store.remove(key);
  }

  debugLog('Fetcher', `GET ${url}`);
  const response = await transport.get(url);

  if (response.status !== 200) {
    throw new TransportError(response.status, `Download failed with status ${response.status}`);
  }

  try {
    await store.write(key, response.body);
  } catch (error) {
    await store.remove(key).catch((removeError: unknown) => {
      console.warn(`[Fetcher] Could not clear partial write for ${key}:`, removeError);
    });
    throw error;
  }
  const location = store.locationFor(key);
  debugLog('Fetcher', `Staged ${response.body.byteLength} bytes at ${location}`);

  let released = false;

  return {
    key,
    location,
    readText: () => store.readText(key),
    async release(): Promise<void> {
      if (released) return;
      released = true;
      await store.remove(key);
      debugLog('Fetcher', `Released ${location}`);
    },
  };
}

/**
 * Release a staged resource, logging instead of throwing when the store
 * cannot remove it.
 */
async function releaseQuietly(resource: StagedResource): Promise<void> {
  try {
    await resource.release();
  } catch (error) {
    console.warn(`[Fetcher] Could not release ${resource.location}:`, error);
  }
}

/**
 * Run an operation against a staged resource, then release it.
 *
 * The release runs whether the operation resolves or throws. A failed
 * release is logged and never replaces the operation's result or error;
 * the leftover file sits in the staging directory under a unique key.
 */
export async function withStagedResource<T>(
  resource: StagedResource,
  use: (resource: StagedResource) => Promise<T>
): Promise<T> {
  let result: T;
  try {
    result = await use(resource);
  } catch (error) {
    await releaseQuietly(resource);
    throw error;
  }
  await releaseQuietly(resource);
  return result;
}
