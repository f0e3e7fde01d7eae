import { describe, it, expect, beforeEach } from 'vitest';
import { NotionPageService } from '../NotionPageService.js';
import { ExtractionError, NotionFetchError } from '../../../types/errors.js';
import { FakeNotionSource, paragraph } from './fakeNotionSource.js';

const PAGE_ID = '11111111-2222-3333-4444-555555555555';
const PAGE_URL = 'https://www.notion.so/acme/Weekly-Notes-11111111222233334444555555555555';

describe('NotionPageService', () => {
  let source: FakeNotionSource;
  let service: NotionPageService;

  beforeEach(() => {
    source = new FakeNotionSource();
    service = new NotionPageService(source);
  });

  it('reads a page by URL into a markdown document', async () => {
    source.addPage(
      PAGE_ID,
      'Weekly Notes',
      [
        { id: 'h', type: 'heading_2', heading_2: { rich_text: [{ plain_text: 'Monday' }] } },
        paragraph('p', 'Standup moved.'),
        { id: 'd', type: 'divider', divider: {} },
      ],
      { Tags: { id: 't', type: 'multi_select', multi_select: [{ name: 'work' }] } }
    );

    const document = await service.getPage(PAGE_URL);

    expect(document.pageId).toBe(PAGE_ID);
    expect(document.url).toBe(PAGE_URL);
    expect(document.title).toBe('Weekly Notes');
    expect(document.properties).toEqual({ Name: 'Weekly Notes', Tags: ['work'] });
    expect(document.content).toBe('## Monday\n\nStandup moved.\n\n---');
    expect(document.blocks).toHaveLength(3);
    expect(source.fetchedPageIds).toEqual([PAGE_ID]);
  });

  it('returns a frozen document', async () => {
    source.addPage(PAGE_ID, 'Frozen', []);
    const document = await service.getPage(PAGE_URL);
    expect(Object.isFrozen(document)).toBe(true);
    expect(document.content).toBe('');
  });

  it('does not call Notion when the URL holds no page ID', async () => {
    await expect(service.getPage('https://www.notion.so/acme/Weekly-Notes')).rejects.toBeInstanceOf(ExtractionError);
    expect(source.fetchedPageIds).toEqual([]);
  });

  it('passes fetch failures through', async () => {
    await expect(service.getPage(PAGE_URL)).rejects.toBeInstanceOf(NotionFetchError);
  });

  it('canonicalizes IDs given to getPageById', async () => {
    source.addPage(PAGE_ID, 'By ID', []);
    const document = await service.getPageById('11111111222233334444555555555555', 'https://example.com/x');
    expect(document.pageId).toBe(PAGE_ID);
    expect(document.title).toBe('By ID');
  });
});
