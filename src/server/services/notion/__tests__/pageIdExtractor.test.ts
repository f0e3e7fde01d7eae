import { describe, it, expect } from 'vitest';
import { compactPageId, extractPageId, formatPageId } from '../pageIdExtractor.js';
import { ExtractionError, ErrorCode } from '../../../types/errors.js';

const HEX = '0123456789abcdef0123456789abcdef';
const CANONICAL = '01234567-89ab-cdef-0123-456789abcdef';

describe('extractPageId', () => {
  it('reads a bare 32-hex path', () => {
    expect(extractPageId(`https://www.notion.so/${HEX}`)).toEqual({
      pageId: CANONICAL,
      url: `https://www.notion.so/${HEX}`,
    });
  });

  it('reads the ID off the end of a title slug', () => {
    const url = `https://www.notion.so/acme/Reading-List-${HEX}`;
    expect(extractPageId(url).pageId).toBe(CANONICAL);
  });

  it('accepts hyphen-grouped IDs on notion.site', () => {
    const url = `https://acme.notion.site/Roadmap-${CANONICAL}`;
    expect(extractPageId(url).pageId).toBe(CANONICAL);
  });

  it('lowercases uppercase hex', () => {
    const url = `https://www.notion.so/${HEX.toUpperCase()}`;
    expect(extractPageId(url).pageId).toBe(CANONICAL);
  });

  it('ignores query string and fragment', () => {
    const other = 'ffffffffffffffffffffffffffffffff';
    const url = `https://www.notion.so/Page-${HEX}?v=${other}#${other}`;
    expect(extractPageId(url).pageId).toBe(CANONICAL);
  });

  it('takes the last ID when the path holds several', () => {
    const first = 'aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa';
    const url = `https://www.notion.so/${first}/Child-${HEX}`;
    expect(extractPageId(url).pageId).toBe(CANONICAL);
  });

  it('does not take a 32-hex window out of a longer hex run', () => {
    expect(() => extractPageId(`https://www.notion.so/${HEX}0`)).toThrow(ExtractionError);
  });

  it('does not check the host', () => {
    expect(extractPageId(`http://example.com/${HEX}`).pageId).toBe(CANONICAL);
  });

  it('keeps the input as given in url', () => {
    const url = `https://www.notion.so/Page-${HEX}?pvs=4`;
    expect(extractPageId(url).url).toBe(url);
  });

  it('rejects input that is not a URL', () => {
    expect(() => extractPageId('not a url')).toThrow('Could not extract page ID from URL: not a url (not a well-formed URL)');
  });

  it('rejects non-http protocols', () => {
    expect(() => extractPageId(`ftp://www.notion.so/${HEX}`)).toThrow(
      `Could not extract page ID from URL: ftp://www.notion.so/${HEX} (unsupported protocol ftp:)`
    );
  });

  it('rejects paths without a page ID', () => {
    try {
      extractPageId('https://www.notion.so/acme/Some-Page');
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ExtractionError);
      if (error instanceof ExtractionError) {
        expect(error.input).toBe('https://www.notion.so/acme/Some-Page');
        expect(error.code).toBe(ErrorCode.INVALID_PAGE_URL);
        expect(error.statusCode).toBe(400);
      }
    }
  });

  it('rejects an ID that is one character short', () => {
    expect(() => extractPageId(`https://www.notion.so/${HEX.slice(1)}`)).toThrow(ExtractionError);
  });
});

describe('formatPageId', () => {
  it('groups compact IDs as 8-4-4-4-12', () => {
    expect(formatPageId(HEX)).toBe(CANONICAL);
  });

  it('is idempotent on canonical IDs', () => {
    expect(formatPageId(CANONICAL)).toBe(CANONICAL);
  });

  it('throws on anything that is not 32 hex characters', () => {
    expect(() => formatPageId('xyz')).toThrow(TypeError);
  });
});

describe('compactPageId', () => {
  it('strips hyphens and lowercases', () => {
    expect(compactPageId(CANONICAL.toUpperCase())).toBe(HEX);
  });
});
