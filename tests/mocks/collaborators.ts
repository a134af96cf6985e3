/**
 * In-process stand-ins for the HTTP transport and the staging store.
 *
 * Lets the fetch-and-parse flow run in unit tests without network access
 * or a filesystem.
 */

import { vi, type Mock } from 'vitest';
import type { StagingStore } from '../../src/core/staging';
import { decodeUtf8 } from '../../src/core/staging';
import type { HttpTransport, TransportBodyResponse, TransportResponse } from '../../src/core/transport';

// ============================================================================
// Staging Store
// ============================================================================

/**
 * Staging store backed by a Map, with spies on every operation.
 */
export interface MockStagingStore extends StagingStore {
  files: Map<string, Uint8Array>;
}

export function createMemoryStore(): MockStagingStore {
  const files = new Map<string, Uint8Array>();

  return {
    files,
    locationFor: vi.fn((key: string) => `memory://${key}.tmp`),
    write: vi.fn(async (key: string, bytes: Uint8Array) => {
      files.set(key, bytes);
    }),
    exists: vi.fn(async (key: string) => files.has(key)),
    readText: vi.fn(async (key: string) => {
      const bytes = files.get(key);
      if (!bytes) {
        throw new Error(`Nothing staged under ${key}`);
      }
      return decodeUtf8(bytes);
    }),
    remove: vi.fn(async (key: string) => {
      files.delete(key);
    }),
  };
}

// ============================================================================
// Transport
// ============================================================================

export interface MockTransport extends HttpTransport {
  head: Mock<(url: string) => Promise<TransportResponse>>;
  get: Mock<(url: string) => Promise<TransportBodyResponse>>;
}

/**
 * Transport answering every GET with the given status and text body.
 */
export function createMockTransport(body: string | Uint8Array = '', status: number = 200): MockTransport {
  const bytes = typeof body === 'string' ? new TextEncoder().encode(body) : body;

  return {
    head: vi.fn<(url: string) => Promise<TransportResponse>>(async () => ({ status })),
    get: vi.fn<(url: string) => Promise<TransportBodyResponse>>(async () => ({
      status,
      body: status === 200 ? bytes : new Uint8Array(),
    })),
  };
}
