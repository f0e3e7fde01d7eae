import { describe, it, expect, beforeEach } from 'vitest';
import { BookIngestionService, pageUrlFromId } from '../BookIngestionService.js';
import { NotionFetchError } from '../../../types/errors.js';
import { FakeNotionSource, childDatabase, paragraph } from './fakeNotionSource.js';

const BOOK_ID = 'b0000000-0000-0000-0000-000000000001';
const BOOK_URL = 'https://www.notion.so/My-Book-b0000000000000000000000000000001';
const CHAPTERS_DB = 'd0000000-0000-0000-0000-000000000001';
const NOTES_DB = 'd0000000-0000-0000-0000-000000000002';
const CHAPTER_1 = 'c0000000-0000-0000-0000-000000000001';
const CHAPTER_2 = 'c0000000-0000-0000-0000-000000000002';
const NOTE_1 = 'e0000000-0000-0000-0000-000000000001';

describe('pageUrlFromId', () => {
  it('builds a notion.so URL from the compact ID', () => {
    expect(pageUrlFromId(CHAPTER_1)).toBe('https://www.notion.so/c0000000000000000000000000000001');
  });
});

describe('BookIngestionService', () => {
  let source: FakeNotionSource;
  let service: BookIngestionService;

  beforeEach(() => {
    source = new FakeNotionSource();
    service = new BookIngestionService(source, { concurrency: 2 });
  });

  it('ingests the first child database as chapters and reports the rest', async () => {
    source.addPage(BOOK_ID, 'My Book', [
      paragraph('intro', 'A book.'),
      childDatabase(CHAPTERS_DB, 'Chapters'),
      childDatabase(NOTES_DB, 'Notes'),
    ]);
    const chapter1 = source.addPage(CHAPTER_1, 'Beginnings', [paragraph('c1p', 'It starts.')]);
    const chapter2 = source.addPage(CHAPTER_2, 'Endings', [paragraph('c2p', 'It ends.')]);
    const note = source.addPage(NOTE_1, 'Scratch', []);
    source.addDatabase(CHAPTERS_DB, 'Chapters', [chapter1, chapter2]);
    source.addDatabase(NOTES_DB, 'Notes', [note]);

    const result = await service.ingestBook(BOOK_URL);

    expect(result.bookId).toBe(BOOK_ID);
    expect(result.bookTitle).toBe('My Book');
    expect(result.bookUrl).toBe(BOOK_URL);
    expect(result.totalChapters).toBe(2);
    expect(result.totalPages).toBe(3);
    expect(result.chaptersDatabase?.title).toBe('Chapters');
    expect(result.chaptersDatabase?.pages.map((page) => page.title)).toEqual(['Beginnings', 'Endings']);
    expect(result.chaptersDatabase?.pages[0]?.content).toBe('It starts.');
    expect(result.chaptersDatabase?.pages[0]?.url).toBe('https://www.notion.so/c0000000000000000000000000000001');
    expect(result.otherDatabases.map((database) => database.title)).toEqual(['Notes']);
  });

  it('returns no chapters for a page without child databases', async () => {
    source.addPage(BOOK_ID, 'Plain Page', [paragraph('p', 'text')]);

    const result = await service.ingestBook(BOOK_URL);

    expect(result.chaptersDatabase).toBeNull();
    expect(result.otherDatabases).toEqual([]);
    expect(result.totalChapters).toBe(0);
    expect(result.totalPages).toBe(0);
  });

  it('skips a database that fails to load', async () => {
    source.addPage(BOOK_ID, 'My Book', [childDatabase(NOTES_DB, 'Missing'), childDatabase(CHAPTERS_DB, 'Chapters')]);
    const chapter1 = source.addPage(CHAPTER_1, 'Only Chapter', []);
    source.addDatabase(CHAPTERS_DB, 'Chapters', [chapter1]);

    const result = await service.ingestBook(BOOK_URL);

    expect(result.chaptersDatabase?.id).toBe(CHAPTERS_DB);
    expect(result.totalChapters).toBe(1);
  });

  it('skips pages that fail to load', async () => {
    source.addPage(BOOK_ID, 'My Book', [childDatabase(CHAPTERS_DB, 'Chapters')]);
    const chapter1 = source.addPage(CHAPTER_1, 'Present', []);
    source.addDatabase(CHAPTERS_DB, 'Chapters', [chapter1, { id: CHAPTER_2, properties: {} }]);

    const result = await service.ingestBook(BOOK_URL);

    expect(result.chaptersDatabase?.pages.map((page) => page.pageId)).toEqual([CHAPTER_1]);
  });

  it('falls back to a placeholder database title', async () => {
    source.addPage(BOOK_ID, 'My Book', [childDatabase(CHAPTERS_DB, 'Chapters')]);
    source.addDatabase(CHAPTERS_DB, '', []);

    const result = await service.ingestBook(BOOK_URL);

    expect(result.chaptersDatabase?.title).toBe('Untitled Database');
  });

  it('fails when the book page itself cannot be read', async () => {
    await expect(service.ingestBook(BOOK_URL)).rejects.toBeInstanceOf(NotionFetchError);
  });
});
