/**
 * Google Drive share link parsing and validation utilities.
 *
 * Only file share links are accepted:
 * - https://drive.google.com/file/d/{ID}/view
 * - https://drive.google.com/file/d/{ID}/view?usp=sharing
 * - https://drive.google.com/file/d/{ID}/view?usp=drive_link
 */

import type { ParsedShareLink } from '../core/types';

// ============================================================================
// Constants
// ============================================================================

/**
 * Full share link pattern. The file ID can contain alphanumeric
 * characters, hyphens, and underscores; anything may follow `/view`.
 */
const SHARE_LINK_PATTERN = /^https:\/\/drive\.google\.com\/file\/d\/([a-zA-Z0-9_-]+)\/view.*$/;

/**
 * Pattern to validate that the link is from the Drive domain.
 */
const DRIVE_DOMAIN_PATTERN = /^https:\/\/drive\.google\.com\//;

/**
 * Pattern to detect Docs, Sheets and Slides links (to reject them).
 */
const GOOGLE_EDITOR_PATTERN = /^https?:\/\/docs\.google\.com\/(document|spreadsheets|presentation)\/d\//;

/**
 * Pattern to find the file segment without the trailing `/view`.
 */
const FILE_SEGMENT_PATTERN = /\/file\/d\/([a-zA-Z0-9_-]+)/;

/** Direct download endpoint for public Drive files */
const DOWNLOAD_ENDPOINT = 'https://drive.google.com/uc';

// ============================================================================
// Link Validation
// ============================================================================

/**
 * Check a raw link against the share link pattern.
 */
export function isValidShareLink(link: string): boolean {
  return SHARE_LINK_PATTERN.test(link);
}

/**
 * Extract the file ID from a share link.
 *
 * @returns The ID, or an empty string when the link does not match.
 * Call {@link isValidShareLink} first to tell the two apart.
 */
export function extractResourceId(link: string): string {
  const match = link.match(SHARE_LINK_PATTERN);
  return match?.[1] ?? '';
}

/**
 * Parse a share link and explain why it was rejected.
 *
 * @param link - The link to parse (can be empty, malformed, or valid)
 * @returns ParsedShareLink with validation result and extracted ID
 *
 * @example
 * parseShareLink('https://drive.google.com/file/d/abc123/view?usp=sharing')
 * // => { isValid: true, resourceId: 'abc123' }
 *
 * @example
 * parseShareLink('https://drive.google.com/file/d/abc123/edit')
 * // => { isValid: false, resourceId: '', errorMessage: 'Link must end in /view ...' }
 */
export function parseShareLink(link: string): ParsedShareLink {
  if (!link.trim()) {
    return {
      isValid: false,
      resourceId: '',
      errorMessage: 'Please enter a Google Drive share link',
    };
  }

  if (!link.startsWith('https://')) {
    return {
      isValid: false,
      resourceId: '',
      errorMessage: 'Link must start with https://',
    };
  }

  if (GOOGLE_EDITOR_PATTERN.test(link)) {
    return {
      isValid: false,
      resourceId: '',
      errorMessage: 'This is a Docs, Sheets or Slides link. Share the file from Google Drive instead.',
    };
  }

  if (!DRIVE_DOMAIN_PATTERN.test(link)) {
    return {
      isValid: false,
      resourceId: '',
      errorMessage: 'Link must be from drive.google.com',
    };
  }

  if (!FILE_SEGMENT_PATTERN.test(link)) {
    return {
      isValid: false,
      resourceId: '',
      errorMessage: 'Could not find a file ID in the link. Use the "Copy link" button in Google Drive.',
    };
  }

  const resourceId = extractResourceId(link);
  if (!resourceId) {
    return {
      isValid: false,
      resourceId: '',
      errorMessage: 'Link must end in /view followed by optional parameters',
    };
  }

  return { isValid: true, resourceId };
}

// ============================================================================
// URL Building
// ============================================================================

/**
 * Build the direct download URL for a file ID.
 *
 * @example
 * buildDownloadUrl('abc123')
 * // => 'https://drive.google.com/uc?export=download&id=abc123'
 */
export function buildDownloadUrl(resourceId: string): string {
  return `${DOWNLOAD_ENDPOINT}?export=download&id=${resourceId}`;
}

/**
 * Build the canonical share link for a file ID.
 */
export function buildViewUrl(resourceId: string): string {
  return `https://drive.google.com/file/d/${resourceId}/view`;
}

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Quick check for whether a string could be a Drive file link.
 * This is a cheap test before attempting full parsing.
 */
export function looksLikeShareLink(link: string): boolean {
  const trimmed = link.trim().toLowerCase();
  return trimmed.includes('drive.google.com') && trimmed.includes('/file/d/');
}

/**
 * Normalize a share link to its canonical form.
 * Useful for comparing links or storing them.
 *
 * @returns Canonical link, or the input unchanged if it is not valid
 */
export function normalizeShareLink(link: string): string {
  const parsed = parseShareLink(link);
  if (!parsed.isValid) {
    return link;
  }
  return buildViewUrl(parsed.resourceId);
}
