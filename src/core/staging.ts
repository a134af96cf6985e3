/**
 * Temporary storage for downloaded files.
 *
 * Bytes are staged under a key before parsing and removed afterwards.
 * The default store writes `<dir>/<key>.tmp` files.
 */

import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { getStagingDirectory } from './config';

// ============================================================================
// Types
// ============================================================================

/**
 * Shared interface for staging implementations.
 */
export interface StagingStore {
  /** Where the bytes for a key live (for logging and diagnostics) */
  locationFor(key: string): string;
  /** Write bytes under a key, replacing anything already there */
  write(key: string, bytes: Uint8Array): Promise<void>;
  /** Whether data is staged under a key */
  exists(key: string): Promise<boolean>;
  /** Read staged bytes back as UTF-8 text */
  readText(key: string): Promise<string>;
  /** Delete staged data; a missing key is not an error */
  remove(key: string): Promise<void>;
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decode UTF-8 bytes, rejecting malformed sequences.
 * A leading byte order mark is dropped.
 *
 * @throws TypeError when the bytes are not valid UTF-8
 */
export function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

// ============================================================================
// Temp Directory Store
// ============================================================================

/**
 * Create a store that stages files in a directory on disk.
 *
 * @param dir - Directory to stage in; defaults to the configured staging
 *   directory, resolved on every call
 */
export function createTempDirStore(dir?: string): StagingStore {
  const baseDir = (): string => dir ?? getStagingDirectory();
  const pathFor = (key: string): string => join(baseDir(), `${key}.tmp`);

  return {
    locationFor(key: string): string {
      return pathFor(key);
    },

    async write(key: string, bytes: Uint8Array): Promise<void> {
      await mkdir(baseDir(), { recursive: true });
      await writeFile(pathFor(key), bytes);
    },

    async exists(key: string): Promise<boolean> {
      try {
        await stat(pathFor(key));
        return true;
      } catch (error) {
        if (isNotFound(error)) {
          return false;
        }
        throw error;
      }
    },

    async readText(key: string): Promise<string> {
      return decodeUtf8(await readFile(pathFor(key)));
    },

    async remove(key: string): Promise<void> {
      await rm(pathFor(key), { force: true });
    },
  };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
