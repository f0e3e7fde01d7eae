import { describe, it, expect } from 'vitest';
import { extractProperties, extractPropertyValue, extractTitle } from '../pageProperties.js';
import type { NotionPage } from '../../external/notionSchemas.js';

function page(properties: NotionPage['properties'], id = 'abcdef12-3456-7890-abcd-ef1234567890'): NotionPage {
  return { id, properties };
}

describe('extractPropertyValue', () => {
  it('joins title and rich_text fragments', () => {
    expect(extractPropertyValue({ type: 'title', title: [{ plain_text: 'My ' }, { plain_text: 'Book' }] })).toBe('My Book');
    expect(extractPropertyValue({ type: 'rich_text', rich_text: [] })).toBe('');
  });

  it('reads select and status option names', () => {
    expect(extractPropertyValue({ type: 'select', select: { name: 'Draft', color: 'red' } })).toBe('Draft');
    expect(extractPropertyValue({ type: 'status', status: { name: 'Done' } })).toBe('Done');
    expect(extractPropertyValue({ type: 'select', select: null })).toBeNull();
  });

  it('lists multi_select option names', () => {
    expect(
      extractPropertyValue({ type: 'multi_select', multi_select: [{ name: 'a' }, { name: 'b' }] })
    ).toEqual(['a', 'b']);
  });

  it('reads the start of a date', () => {
    expect(extractPropertyValue({ type: 'date', date: { start: '2024-03-01', end: null } })).toBe('2024-03-01');
    expect(extractPropertyValue({ type: 'date', date: null })).toBeNull();
  });

  it('reads numbers and checkboxes', () => {
    expect(extractPropertyValue({ type: 'number', number: 7 })).toBe(7);
    expect(extractPropertyValue({ type: 'number', number: null })).toBeNull();
    expect(extractPropertyValue({ type: 'checkbox', checkbox: true })).toBe(true);
    expect(extractPropertyValue({ type: 'checkbox', checkbox: 'yes' })).toBe(false);
  });

  it('reads url, email and phone_number strings', () => {
    expect(extractPropertyValue({ type: 'url', url: 'https://example.com' })).toBe('https://example.com');
    expect(extractPropertyValue({ type: 'email', email: null })).toBeNull();
  });

  it('returns undefined for property types it does not flatten', () => {
    expect(extractPropertyValue({ type: 'formula', formula: { type: 'number', number: 1 } })).toBeUndefined();
  });
});

describe('extractProperties', () => {
  it('keys values by property name and drops unsupported types', () => {
    const result = extractProperties(
      page({
        Name: { type: 'title', title: [{ plain_text: 'Chapter 1' }] },
        Order: { type: 'number', number: 1 },
        Related: { type: 'relation', relation: [] },
      })
    );
    expect(result).toEqual({ Name: 'Chapter 1', Order: 1 });
  });
});

describe('extractTitle', () => {
  it('uses the title property whatever its name', () => {
    expect(extractTitle(page({ Chapter: { type: 'title', title: [{ plain_text: 'Intro' }] } }))).toBe('Intro');
  });

  it('falls back to a label built from the page ID', () => {
    expect(extractTitle(page({ Name: { type: 'title', title: [] } }))).toBe('Untitled Page (abcdef12)');
    expect(extractTitle(page({}))).toBe('Untitled Page (abcdef12)');
  });
});
