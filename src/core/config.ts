/**
 * Runtime configuration.
 *
 * Module-level settings shared by every source created with default
 * collaborators. Per-source overrides go through ShareLinkSourceOptions.
 */

import { tmpdir } from 'node:os';

// ============================================================================
// Defaults
// ============================================================================

/** Default timeout for download requests (30 seconds) */
export const DEFAULT_TIMEOUT = 30000;

let requestTimeout = DEFAULT_TIMEOUT;
let stagingDirectory: string | null = null;
let debugLogging = false;

// ============================================================================
// Request Timeout
// ============================================================================

/**
 * Set the timeout applied to each request by the fetch transport.
 * @param timeout - Timeout in milliseconds; must be positive
 */
export function setRequestTimeout(timeout: number): void {
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new RangeError(`Request timeout must be a positive number, got ${timeout}`);
  }
  requestTimeout = timeout;
}

export function getRequestTimeout(): number {
  return requestTimeout;
}

// ============================================================================
// Staging Directory
// ============================================================================

/**
 * Set the directory downloaded files are staged in.
 * @param dir - Directory path, or null for the OS temp directory
 */
export function setStagingDirectory(dir: string | null): void {
  stagingDirectory = dir;
}

export function getStagingDirectory(): string {
  return stagingDirectory !== null && stagingDirectory.trim() !== '' ? stagingDirectory : tmpdir();
}

// ============================================================================
// Logging
// ============================================================================

/**
 * Enable or disable progress logging. Warnings and errors are always logged.
 */
export function setDebugLogging(enabled: boolean): void {
  debugLogging = enabled;
}

export function isDebugLogging(): boolean {
  return debugLogging;
}

/**
 * Log a progress line when debug logging is on.
 */
export function debugLog(tag: string, message: string): void {
  if (debugLogging) {
    console.log(`[${tag}] ${message}`);
  }
}

/**
 * Restore every setting to its default.
 */
export function resetConfig(): void {
  requestTimeout = DEFAULT_TIMEOUT;
  stagingDirectory = null;
  debugLogging = false;
}
