/**
 * Page-ID extraction from Notion page URLs
 *
 * Recognized shapes include
 * - https://www.notion.so/<32-hex>
 * - https://www.notion.so/<workspace>/<Title-With-Dashes>-<32-hex>
 * - https://<workspace>.notion.site/<Title>-<8-4-4-4-12 hex>
 *
 * Only the path is scanned, and the host is not checked, so new URL shapes keep working
 * as long as the ID stays in the path.
 */

import { ExtractionError } from '../../types/errors.js';

/**
 * Canonical page ID: 32 lowercase hex characters grouped 8-4-4-4-12
 */
export type PageId = string;

export interface ExtractedPageId {
  pageId: PageId;
  /** The input exactly as given */
  url: string;
}

// A run of exactly 32 hex chars, bare or hyphen-grouped, not touching further hex chars
const PAGE_ID_PATTERN =
  /(?<![0-9a-f])(?:[0-9a-f]{32}|[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})(?![0-9a-f])/gi;

const COMPACT_PAGE_ID = /^[0-9a-f]{32}$/;

/**
 * Group 32 hex characters (hyphens allowed, any case) as 8-4-4-4-12 lowercase
 *
 * @throws {TypeError} If the value is not 32 hex characters once hyphens are stripped
 */
export function formatPageId(raw: string): PageId {
  const hex = compactPageId(raw);
  if (!COMPACT_PAGE_ID.test(hex)) {
    throw new TypeError(`Not a page ID: ${raw}`);
  }
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

/**
 * Strip hyphens and lowercase, the form Notion uses inside page URLs
 */
export function compactPageId(pageId: string): string {
  return pageId.replace(/-/g, '').toLowerCase();
}

/**
 * Extract the canonical page ID from a page URL
 *
 * Takes the last 32-hex run in the path, so a workspace or title segment that
 * happens to look like an ID never wins over the trailing one.
 *
 * @throws {ExtractionError} If the input is not an http(s) URL or its path holds no page ID
 */
export function extractPageId(input: string): ExtractedPageId {
  let parsed: URL;
  try {
    parsed = new URL(input.trim());
  } catch {
    throw new ExtractionError(input, 'not a well-formed URL');
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ExtractionError(input, `unsupported protocol ${parsed.protocol}`);
  }

  const matches = parsed.pathname.match(PAGE_ID_PATTERN);
  const lastMatch = matches?.[matches.length - 1];
  if (!lastMatch) {
    throw new ExtractionError(input, 'no 32-character hex page ID in the path');
  }

  return { pageId: formatPageId(lastMatch), url: input };
}

